import type {
  AppliedLineItems,
  AssociationResult,
  CreativeAssociationSpec,
  OrderSpec,
} from '../adserver/ad-server-client.js';
import type { EnvConfig } from '../config/env.js';
import { buildClassificationTable } from '../engine/targeting-classification.js';
import { CatalogFormatStorage, parseFormatCatalog, parseStandardFormats } from '../services/format-store.js';
import { MediaBuyService } from '../services/MediaBuyService.js';
import { InMemoryMediaBuyRepository } from '../services/media-buy-repository.js';
import type { CreateMediaBuyParams } from '../types/adcp.js';

export const env: EnvConfig = {
  nodeEnv: 'test',
  port: 3001,
  logLevel: 'error',
  adServerMode: 'dry_run',
  adServerTimeoutMs: 5_000,
  adServerRetry: { maxRetries: 0, baseDelayMs: 1, maxDelayMs: 1, jitterMs: 0 },
  tenantConfigMap: {
    'tenant-a': { adServer: 'gam', manualApprovalRequired: false },
    'tenant-approval': { adServer: 'gam', manualApprovalRequired: true },
  },
  standardFormatsPath: 'unused',
  formatCatalogPath: 'unused',
  targetingClassificationPath: 'unused',
};

export const standard = parseStandardFormats({
  formats: [
    {
      formatId: 'display_300x250_image',
      name: 'Medium Rectangle',
      mediaKind: 'display',
      requirements: { width: 300, height: 250 },
      platformConfig: { gam: { creative_placeholder: { width: 300, height: 250 } } },
    },
    {
      formatId: 'display_728x90_image',
      name: 'Leaderboard',
      mediaKind: 'display',
      requirements: { width: 728, height: 90 },
    },
    {
      formatId: 'native_standard',
      name: 'Native In-Feed',
      mediaKind: 'native',
      platformConfig: { gam: { creative_placeholder: { width: 1, height: 1 } } },
    },
    { formatId: 'audio_standard_30s', name: 'Audio 30s', mediaKind: 'audio' },
  ],
});

export const catalog = parseFormatCatalog({
  tenants: {
    'tenant-a': {
      customFormats: [
        {
          formatId: 'native_standard',
          platformConfig: { gam: { creative_placeholder: { creative_template_id: '12345678' } } },
        },
        {
          formatId: 'display_1200x627_sponsored',
          name: 'Sponsored Article Image',
          mediaKind: 'display',
          requirements: { width: 1200, height: 627 },
        },
      ],
      products: [
        { productId: 'prod-display', name: 'Homepage Display', formatIds: ['display_300x250_image', 'display_728x90_image'] },
        { productId: 'prod-native', name: 'Native Feed', formatIds: ['native_standard'] },
        { productId: 'prod-audio', name: 'Audio Spots', formatIds: ['audio_standard_30s'] },
      ],
      managedSignals: { key_value_pairs: { aee_segment: 'high_value' } },
    },
    'tenant-approval': {
      products: [{ productId: 'prod-approval', name: 'Reviewed Display', formatIds: ['display_300x250_image'] }],
    },
  },
});

export const classification = buildClassificationTable({
  dimensions: [
    { name: 'geo_country_any_of', access: 'overlay' },
    { name: 'geo_city_any_of', access: 'overlay' },
    { name: 'custom', access: 'overlay' },
    { name: 'audiences_any_of', access: 'hybrid' },
    { name: 'key_value_pairs', access: 'managed_only' },
  ],
});

export function fakeAdServer() {
  return {
    applyLineItems: jest.fn(
      async (spec: OrderSpec): Promise<AppliedLineItems> => ({
        orderId: 'order_1',
        lineItemIds: Object.fromEntries(spec.lineItems.map((lineItem) => [lineItem.packageId, `li_${lineItem.packageId}`])),
      })
    ),
    associateCreative: jest.fn(
      async (spec: CreativeAssociationSpec): Promise<AssociationResult> => ({
        adServerCreativeId: `adcr_${spec.creativeId}`,
        associationId: `lica_${spec.packageId}`,
      })
    ),
  };
}

export function buildService() {
  const storage = new CatalogFormatStorage(standard, catalog);
  const adServer = fakeAdServer();
  let next = 0;
  const service = new MediaBuyService({
    env,
    storage,
    signals: storage,
    classification,
    adServer,
    repository: new InMemoryMediaBuyRepository(),
    idFn: () => {
      next += 1;
      return `id_${next}`;
    },
    nowFn: () => new Date('2026-02-01T00:00:00Z'),
  });
  return { service, adServer };
}

export function createParams(overrides: Partial<CreateMediaBuyParams> = {}): CreateMediaBuyParams {
  return {
    tenantId: 'tenant-a',
    buyerRef: 'buyer-1',
    packages: [{ productId: 'prod-display' }, { packageId: 'native', productId: 'prod-native' }],
    targetingOverlay: { geo_country_any_of: ['US'] },
    startTime: '2026-03-01T00:00:00Z',
    endTime: '2026-03-31T00:00:00Z',
    budget: 5000,
    ...overrides,
  };
}
