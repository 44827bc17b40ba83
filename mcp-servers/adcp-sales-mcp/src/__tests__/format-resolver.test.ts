import { FormatResolver, deepMerge } from '../engine/format-resolver.js';
import { UnknownFormatError, type FormatDefinition } from '../engine/core/types.js';
import { CatalogFormatStorage, parseFormatCatalog } from '../services/format-store.js';

const standardFormats: FormatDefinition[] = [
  {
    formatId: 'display_300x250_image',
    name: 'Medium Rectangle',
    mediaKind: 'display',
    requirements: { width: 300, height: 250, maxFileSizeKb: 200 },
    platformConfig: { gam: { creative_placeholder: { width: 300, height: 250 } } },
  },
  {
    formatId: 'native_standard',
    name: 'Native In-Feed',
    mediaKind: 'native',
    requirements: {},
    platformConfig: { gam: { creative_placeholder: { width: 1, height: 1 } } },
  },
  {
    formatId: 'video_standard_30s',
    name: 'Instream Video 30s',
    mediaKind: 'video',
    requirements: { width: 1920, height: 1080, maxDurationMs: 30000 },
    platformConfig: {},
  },
];

const catalog = parseFormatCatalog({
  tenants: {
    'tenant-a': {
      customFormats: [
        {
          formatId: 'native_standard',
          platformConfig: { gam: { creative_placeholder: { creative_template_id: '12345678' } } },
        },
        {
          formatId: 'display_1200x627_sponsored',
          name: 'Sponsored Article',
          mediaKind: 'display',
          requirements: { width: 1200, height: 627 },
        },
      ],
      products: [
        {
          productId: 'prod-a',
          name: 'Homepage',
          formatIds: ['display_300x250_image', 'native_standard'],
          formatOverrides: {
            display_300x250_image: {
              name: 'Homepage Rectangle',
              platformConfig: { gam: { creative_placeholder: { width: 1, height: 1, creative_template_id: '999' } } },
            },
            ghost_format: { platformConfig: { gam: { creative_placeholder: { width: 1, height: 1 } } } },
          },
        },
      ],
    },
  },
});

function buildResolver(): FormatResolver {
  return new FormatResolver(new CatalogFormatStorage(standardFormats, catalog));
}

describe('FormatResolver', () => {
  it('returns the standard definition when no tenant or product context is given', () => {
    const outcome = buildResolver().resolve('display_300x250_image');

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.scope).toBe('standard');
    expect(outcome.format.name).toBe('Medium Rectangle');
  });

  it('deep-merges a tenant template id over the standard placement config', () => {
    const outcome = buildResolver().resolve('native_standard', { tenantId: 'tenant-a' });

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.scope).toBe('tenant');
    expect(outcome.format.name).toBe('Native In-Feed');
    expect(outcome.format.platformConfig.gam).toEqual({
      creative_placeholder: { width: 1, height: 1, creative_template_id: '12345678' },
    });
  });

  it('prefers the product override and keeps inherited requirements', () => {
    const outcome = buildResolver().resolve('display_300x250_image', {
      tenantId: 'tenant-a',
      productId: 'prod-a',
    });

    expect(outcome.ok).toBe(true);
    if (!outcome.ok) return;
    expect(outcome.scope).toBe('product');
    expect(outcome.format.name).toBe('Homepage Rectangle');
    expect(outcome.format.requirements).toEqual({ width: 300, height: 250, maxFileSizeKb: 200 });
    expect(outcome.format.platformConfig.gam).toEqual({
      creative_placeholder: { width: 1, height: 1, creative_template_id: '999' },
    });
  });

  it('resolves tenant-only formats for that tenant', () => {
    const resolver = buildResolver();

    expect(resolver.resolve('display_1200x627_sponsored', { tenantId: 'tenant-a' }).ok).toBe(true);
    expect(resolver.resolve('display_1200x627_sponsored', { tenantId: 'tenant-b' }).ok).toBe(false);
  });

  it('fails with UnknownFormat listing every searched scope', () => {
    const outcome = buildResolver().resolve('display_1x2_missing', {
      tenantId: 'tenant-a',
      productId: 'prod-a',
    });

    expect(outcome.ok).toBe(false);
    if (outcome.ok) return;
    expect(outcome.error).toBeInstanceOf(UnknownFormatError);
    expect(outcome.error.message).toBe(
      "Unknown format_id 'display_1x2_missing'; searched product(prod-a/display_1x2_missing), tenant(tenant-a/display_1x2_missing), standard(display_1x2_missing)"
    );
    expect(outcome.error.toDomainError()).toEqual({
      code: 'UNKNOWN_FORMAT',
      message: outcome.error.message,
      recoverable: false,
      details: {
        formatId: 'display_1x2_missing',
        searchedScopes: [
          { scope: 'product', key: 'prod-a/display_1x2_missing' },
          { scope: 'tenant', key: 'tenant-a/display_1x2_missing' },
          { scope: 'standard', key: 'display_1x2_missing' },
        ],
      },
    });
  });

  it('treats a product override without any base definition as unknown', () => {
    const outcome = buildResolver().resolve('ghost_format', { tenantId: 'tenant-a', productId: 'prod-a' });

    expect(outcome.ok).toBe(false);
  });

  it('is deterministic and does not leak mutable state between calls', () => {
    const resolver = buildResolver();
    const first = resolver.resolve('native_standard', { tenantId: 'tenant-a' });
    if (!first.ok) throw new Error('expected resolution');
    first.format.platformConfig.gam = { creative_placeholder: { width: 5, height: 5 } };

    const second = resolver.resolve('native_standard', { tenantId: 'tenant-a' });

    expect(second).toEqual({
      ok: true,
      scope: 'tenant',
      format: {
        formatId: 'native_standard',
        name: 'Native In-Feed',
        mediaKind: 'native',
        requirements: {},
        platformConfig: { gam: { creative_placeholder: { width: 1, height: 1, creative_template_id: '12345678' } } },
      },
    });
  });

  it('lists tenant-visible formats sorted by id with filters applied', () => {
    const resolver = buildResolver();

    expect(resolver.listAvailable('tenant-a').map((format) => format.formatId)).toEqual([
      'display_1200x627_sponsored',
      'display_300x250_image',
      'native_standard',
      'video_standard_30s',
    ]);
    expect(
      resolver.listAvailable('tenant-a', { type: 'display', minWidth: 500 }).map((format) => format.formatId)
    ).toEqual(['display_1200x627_sponsored']);
    expect(resolver.listAvailable(undefined, { nameSearch: 'VIDEO' }).map((format) => format.formatId)).toEqual([
      'video_standard_30s',
    ]);
  });
});

describe('deepMerge', () => {
  it('merges nested objects and replaces arrays and scalars', () => {
    expect(
      deepMerge(
        { a: { b: 1, c: [1, 2] }, d: 'x' },
        { a: { c: [3], e: true }, d: 'y' }
      )
    ).toEqual({ a: { b: 1, c: [3], e: true }, d: 'y' });
  });
});
