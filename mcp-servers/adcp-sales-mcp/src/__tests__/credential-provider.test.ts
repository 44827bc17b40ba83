import { EnvCredentialProvider, MissingCredentialError } from '../adserver/credential-provider.js';

const applyOrder = (tenantId: string, backend = 'gam') => ({ tenantId, backend, operation: 'orders/apply' });

describe('EnvCredentialProvider', () => {
  const provider = new EnvCredentialProvider({
    tokenMapRaw: JSON.stringify({
      'tenant-a': ' tenant-secret ',
      'tenant-b': { gam: 'gam-secret', kevel: ' ' },
      '': 'ignored',
    }),
    globalToken: 'test-secret',
  });

  it('uses the per-backend token before the tenant and global ones', async () => {
    await expect(provider.getCredential(applyOrder('tenant-b'))).resolves.toEqual({
      token: 'gam-secret',
      source: 'tenant_backend',
    });
    await expect(provider.getCredential(applyOrder('tenant-a'))).resolves.toEqual({
      token: 'tenant-secret',
      source: 'tenant',
    });
    await expect(provider.getCredential(applyOrder('tenant-b', 'kevel'))).resolves.toEqual({
      token: 'test-secret',
      source: 'global',
    });
  });

  it('names the operation and backend when nothing is configured', async () => {
    const empty = new EnvCredentialProvider({});
    const request = { tenantId: 'tenant-a', backend: 'gam', operation: 'creatives/associate' };

    await expect(empty.getCredential(request)).rejects.toBeInstanceOf(MissingCredentialError);
    await expect(empty.getCredential(request)).rejects.toThrow(
      'Cannot creatives/associate on gam for tenant tenant-a: no credential in AD_SERVER_TOKEN_MAP and no AD_SERVER_GLOBAL_TOKEN'
    );
  });

  it('rejects a token map with values that are neither tokens nor backend maps', () => {
    expect(() => new EnvCredentialProvider({ tokenMapRaw: '{"tenant-a": 42}' })).toThrow();
    expect(() => new EnvCredentialProvider({ tokenMapRaw: '{"tenant-a": {"gam": 7}}' })).toThrow();
  });
});
