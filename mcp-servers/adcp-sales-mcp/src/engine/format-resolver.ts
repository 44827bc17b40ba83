import { logger } from '../utils/logger.js';
import {
  UnknownFormatError,
  type FormatDefinition,
  type FormatScope,
  type JsonObject,
  type JsonValue,
  type PartialFormatDefinition,
  type PlacementConfig,
  type ResolutionContext,
  type SearchedScope,
} from './core/types.js';

/** External collaborator holding the three lookup scopes. Implementations own their concurrency. */
export interface FormatStorage {
  lookupProductOverride(productId: string, formatId: string): PartialFormatDefinition | undefined;
  lookupTenantCustom(tenantId: string, formatId: string): PartialFormatDefinition | undefined;
  lookupStandard(formatId: string): FormatDefinition | undefined;
  listStandard(): FormatDefinition[];
  listTenantCustom(tenantId: string): PartialFormatDefinition[];
}

export type ResolveOutcome =
  | { ok: true; format: FormatDefinition; scope: FormatScope }
  | { ok: false; error: UnknownFormatError };

interface FormatLayer {
  scope: FormatScope;
  key(formatId: string, ctx: ResolutionContext): string | undefined;
  lookup(formatId: string, ctx: ResolutionContext): PartialFormatDefinition | undefined;
}

export interface FormatFilter {
  type?: FormatDefinition['mediaKind'];
  formatIds?: string[];
  minWidth?: number;
  maxWidth?: number;
  minHeight?: number;
  maxHeight?: number;
  nameSearch?: string;
}

function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Override wins on key conflict; nested objects merge, arrays and scalars replace. */
export function deepMerge(base: JsonObject, override: JsonObject): JsonObject {
  const merged: JsonObject = { ...base };
  for (const [key, value] of Object.entries(override)) {
    const current = merged[key];
    merged[key] = isJsonObject(current) && isJsonObject(value) ? deepMerge(current, value) : value;
  }
  return merged;
}

function mergePlacement(
  base: PlacementConfig | undefined,
  override: PlacementConfig | undefined
): PlacementConfig {
  const merged: PlacementConfig = { ...(base || {}) };
  for (const [backend, config] of Object.entries(override || {})) {
    const current = merged[backend];
    merged[backend] = current ? deepMerge(current, config) : config;
  }
  return merged;
}

function mergeDefinitions(
  base: PartialFormatDefinition,
  override: PartialFormatDefinition
): PartialFormatDefinition {
  return {
    formatId: override.formatId,
    name: override.name ?? base.name,
    mediaKind: override.mediaKind ?? base.mediaKind,
    requirements: { ...(base.requirements || {}), ...(override.requirements || {}) },
    platformConfig: mergePlacement(base.platformConfig, override.platformConfig),
  };
}

function toComplete(definition: PartialFormatDefinition): FormatDefinition | undefined {
  if (!definition.name || !definition.mediaKind) return undefined;
  return structuredClone({
    formatId: definition.formatId,
    name: definition.name,
    mediaKind: definition.mediaKind,
    requirements: definition.requirements || {},
    platformConfig: definition.platformConfig || {},
  });
}

export class FormatResolver {
  private readonly storage: FormatStorage;
  private readonly layers: readonly FormatLayer[];

  constructor(storage: FormatStorage) {
    this.storage = storage;
    this.layers = [
      {
        scope: 'product',
        key: (formatId, ctx) => (ctx.productId ? `${ctx.productId}/${formatId}` : undefined),
        lookup: (formatId, ctx) =>
          ctx.productId ? storage.lookupProductOverride(ctx.productId, formatId) : undefined,
      },
      {
        scope: 'tenant',
        key: (formatId, ctx) => (ctx.tenantId ? `${ctx.tenantId}/${formatId}` : undefined),
        lookup: (formatId, ctx) =>
          ctx.tenantId ? storage.lookupTenantCustom(ctx.tenantId, formatId) : undefined,
      },
      {
        scope: 'standard',
        key: (formatId) => formatId,
        lookup: (formatId) => storage.lookupStandard(formatId),
      },
    ];
  }

  /**
   * Product override, then tenant custom, then the standard registry. The highest scope that
   * matches wins, and each matching scope's partial definition is merged over the ones below it.
   */
  resolve(formatId: string, ctx: ResolutionContext = {}): ResolveOutcome {
    const searched: SearchedScope[] = [];
    const hits: Array<{ scope: FormatScope; definition: PartialFormatDefinition }> = [];

    for (const layer of this.layers) {
      const key = layer.key(formatId, ctx);
      if (!key) continue;
      searched.push({ scope: layer.scope, key });
      const definition = layer.lookup(formatId, ctx);
      if (definition) hits.push({ scope: layer.scope, definition });
    }

    const winner = hits[0];
    if (!winner) {
      logger.info('Format resolution exhausted all scopes', { formatId, searched });
      return { ok: false, error: new UnknownFormatError(formatId, searched) };
    }

    const merged = hits
      .slice(1)
      .reduce<PartialFormatDefinition>(
        (acc, hit) => mergeDefinitions(hit.definition, acc),
        winner.definition
      );
    const format = toComplete(merged);
    if (!format) {
      logger.warn('Format override has no base definition', {
        formatId,
        scope: winner.scope,
        tenantId: ctx.tenantId,
        productId: ctx.productId,
      });
      return { ok: false, error: new UnknownFormatError(formatId, searched) };
    }

    logger.debug('Resolved format', {
      formatId,
      scope: winner.scope,
      tenantId: ctx.tenantId,
      productId: ctx.productId,
    });
    return { ok: true, format, scope: winner.scope };
  }

  /** Formats visible to a tenant: standard ones plus tenant custom definitions shadowing them by id. */
  listAvailable(tenantId: string | undefined, filter: FormatFilter = {}): FormatDefinition[] {
    const ids = new Set<string>(this.storage.listStandard().map((format) => format.formatId));
    if (tenantId) {
      for (const custom of this.storage.listTenantCustom(tenantId)) ids.add(custom.formatId);
    }

    const formats: FormatDefinition[] = [];
    for (const formatId of [...ids].sort()) {
      const outcome = this.resolve(formatId, { tenantId });
      if (outcome.ok && matchesFilter(outcome.format, filter)) formats.push(outcome.format);
    }
    return formats;
  }
}

function matchesFilter(format: FormatDefinition, filter: FormatFilter): boolean {
  if (filter.type && format.mediaKind !== filter.type) return false;
  if (filter.formatIds && !filter.formatIds.includes(format.formatId)) return false;

  const { width, height } = format.requirements;
  const hasSizeFilter =
    filter.minWidth != null ||
    filter.maxWidth != null ||
    filter.minHeight != null ||
    filter.maxHeight != null;
  if (hasSizeFilter && (width == null || height == null)) return false;
  if (filter.minWidth != null && width != null && width < filter.minWidth) return false;
  if (filter.maxWidth != null && width != null && width > filter.maxWidth) return false;
  if (filter.minHeight != null && height != null && height < filter.minHeight) return false;
  if (filter.maxHeight != null && height != null && height > filter.maxHeight) return false;

  if (filter.nameSearch) {
    const needle = filter.nameSearch.toLowerCase();
    if (!format.name.toLowerCase().includes(needle)) return false;
  }
  return true;
}
