import { InMemoryMediaBuyRepository, type MediaBuyRecord } from '../services/media-buy-repository.js';

function makeRecord(overrides: Partial<MediaBuyRecord> = {}): MediaBuyRecord {
  return {
    mediaBuyId: 'mb_1',
    tenantId: 'tenant-a',
    buyerRef: 'buyer-1',
    status: 'active',
    startTime: '2026-03-01T00:00:00Z',
    endTime: '2026-03-31T00:00:00Z',
    totalBudget: 1000,
    currency: 'USD',
    targeting: {},
    packages: [
      { packageId: 'pkg_1', productId: 'prod-a', formatIds: ['f'], slots: [{ kind: 'exact', width: 300, height: 250 }] },
    ],
    creatives: [],
    rejectedPackages: [],
    requestFingerprint: 'fp-1',
    createdAt: '2026-02-01T00:00:00.000Z',
    ...overrides,
  };
}

describe('InMemoryMediaBuyRepository', () => {
  it('scopes lookups by tenant', async () => {
    const repository = new InMemoryMediaBuyRepository();
    await repository.save(makeRecord());

    await expect(repository.get('tenant-b', 'mb_1')).resolves.toBeUndefined();
    await expect(repository.findByBuyerRef('tenant-a', 'buyer-1')).resolves.toMatchObject({ mediaBuyId: 'mb_1' });
    await expect(repository.findByBuyerRef('tenant-b', 'buyer-1')).resolves.toBeUndefined();
  });

  it('keeps package slots fixed once saved', async () => {
    const repository = new InMemoryMediaBuyRepository();
    await repository.save(makeRecord());

    await repository.save(
      makeRecord({
        orderId: 'order_1',
        packages: [{ packageId: 'pkg_1', productId: 'prod-a', formatIds: ['f'], slots: [{ kind: 'programmatic_wildcard' }] }],
      })
    );

    const stored = await repository.get('tenant-a', 'mb_1');
    expect(stored?.orderId).toBe('order_1');
    expect(stored?.packages[0].slots).toEqual([{ kind: 'exact', width: 300, height: 250 }]);
  });

  it('upserts creative assignments per package', async () => {
    const repository = new InMemoryMediaBuyRepository();
    await repository.save(makeRecord());

    await repository.upsertCreative('tenant-a', 'mb_1', { creativeId: 'cr_1', packageId: 'pkg_1', status: 'pending' });
    await repository.upsertCreative('tenant-a', 'mb_1', { creativeId: 'cr_1', packageId: 'pkg_1', status: 'approved' });

    const stored = await repository.get('tenant-a', 'mb_1');
    expect(stored?.creatives).toEqual([{ creativeId: 'cr_1', packageId: 'pkg_1', status: 'approved' }]);
    await expect(
      repository.upsertCreative('tenant-a', 'mb_2', { creativeId: 'cr_1', packageId: 'pkg_1', status: 'approved' })
    ).rejects.toThrow('Media buy mb_2 not found for tenant tenant-a');
  });
});
