import fs from 'fs';
import { z } from 'zod';
import {
  FormatRegistryError,
  type FormatDefinition,
  type PartialFormatDefinition,
  type TargetingValue,
} from '../engine/core/types.js';
import { jsonValueSchema } from '../engine/core/json-schema.js';
import type { FormatStorage } from '../engine/format-resolver.js';
import { logger } from '../utils/logger.js';

const mediaKindSchema = z.enum(['display', 'video', 'audio', 'native']);

const requirementsSchema = z
  .object({
    width: z.number().int().positive(),
    height: z.number().int().positive(),
    minDurationMs: z.number().int().nonnegative(),
    maxDurationMs: z.number().int().positive(),
    minFileSizeKb: z.number().nonnegative(),
    maxFileSizeKb: z.number().positive(),
  })
  .partial()
  .strict();

const placementSchema = z.record(z.record(jsonValueSchema));

const partialFormatFields = {
  name: z.string().min(1).optional(),
  mediaKind: mediaKindSchema.optional(),
  requirements: requirementsSchema.optional(),
  platformConfig: placementSchema.optional(),
};

const partialFormatSchema = z.object({ formatId: z.string().min(1), ...partialFormatFields });

const standardFormatSchema = z.object({
  formatId: z.string().min(1),
  name: z.string().min(1),
  mediaKind: mediaKindSchema,
  requirements: requirementsSchema.default({}),
  platformConfig: placementSchema.default({}),
});

const productSchema = z.object({
  productId: z.string().min(1),
  name: z.string().min(1),
  formatIds: z.array(z.string().min(1)).min(1),
  formatOverrides: z.record(z.object(partialFormatFields)).default({}),
});

const tenantCatalogSchema = z.object({
  customFormats: z.array(partialFormatSchema).default([]),
  products: z.array(productSchema).default([]),
  managedSignals: z.record(jsonValueSchema).default({}),
});

const standardRegistrySchema = z.object({ formats: z.array(standardFormatSchema) });
const catalogSchema = z.object({ tenants: z.record(tenantCatalogSchema).default({}) });

export type FormatCatalog = z.infer<typeof catalogSchema>;

export interface ProductDefinition {
  productId: string;
  name: string;
  formatIds: string[];
}

export interface ProductCatalog {
  getProduct(tenantId: string, productId: string): ProductDefinition | undefined;
}

/** Trusted, server-side source of managed targeting values. Never fed from request input. */
export interface ManagedSignalProvider {
  getManagedSignals(tenantId: string): Readonly<Record<string, TargetingValue>>;
}

interface StoredProduct extends ProductDefinition {
  tenantId: string;
  overrides: Map<string, PartialFormatDefinition>;
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`).join('; ');
}

function readJson(filePath: string): unknown {
  try {
    return JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new FormatRegistryError(
      `Cannot read ${filePath}: ${error instanceof Error ? error.message : 'Unknown error'}`
    );
  }
}

export function parseStandardFormats(raw: unknown): FormatDefinition[] {
  const parsed = standardRegistrySchema.safeParse(raw);
  if (!parsed.success) {
    throw new FormatRegistryError(`Invalid standard format registry: ${describeIssues(parsed.error)}`);
  }
  return parsed.data.formats;
}

export function parseFormatCatalog(raw: unknown): FormatCatalog {
  const parsed = catalogSchema.safeParse(raw);
  if (!parsed.success) {
    throw new FormatRegistryError(`Invalid format catalog: ${describeIssues(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * In-memory format storage built from the standard registry and the tenant catalog. Read-only
 * after construction.
 */
export class CatalogFormatStorage implements FormatStorage, ProductCatalog, ManagedSignalProvider {
  private readonly standard = new Map<string, FormatDefinition>();
  private readonly tenantCustom = new Map<string, Map<string, PartialFormatDefinition>>();
  private readonly products = new Map<string, StoredProduct>();
  private readonly managedSignals = new Map<string, Readonly<Record<string, TargetingValue>>>();

  constructor(standardFormats: FormatDefinition[], catalog: FormatCatalog = { tenants: {} }) {
    for (const format of standardFormats) {
      if (this.standard.has(format.formatId)) {
        throw new FormatRegistryError(`Standard format '${format.formatId}' is declared more than once`);
      }
      this.standard.set(format.formatId, format);
    }

    for (const [tenantId, tenant] of Object.entries(catalog.tenants)) {
      const custom = new Map<string, PartialFormatDefinition>();
      for (const format of tenant.customFormats) {
        if (custom.has(format.formatId)) {
          throw new FormatRegistryError(
            `Tenant ${tenantId} declares custom format '${format.formatId}' more than once`
          );
        }
        custom.set(format.formatId, format);
      }
      this.tenantCustom.set(tenantId, custom);

      for (const product of tenant.products) {
        if (this.products.has(product.productId)) {
          throw new FormatRegistryError(`Product '${product.productId}' is declared more than once`);
        }
        const overrides = new Map<string, PartialFormatDefinition>();
        for (const [formatId, override] of Object.entries(product.formatOverrides)) {
          overrides.set(formatId, { formatId, ...override });
        }
        this.products.set(product.productId, {
          tenantId,
          productId: product.productId,
          name: product.name,
          formatIds: product.formatIds,
          overrides,
        });
      }

      this.managedSignals.set(tenantId, Object.freeze({ ...tenant.managedSignals }));
    }
  }

  static fromFiles(standardPath: string, catalogPath: string): CatalogFormatStorage {
    const standard = parseStandardFormats(readJson(standardPath));
    const catalog = fs.existsSync(catalogPath) ? parseFormatCatalog(readJson(catalogPath)) : { tenants: {} };
    logger.info('Loaded format catalog', {
      standardFormats: standard.length,
      tenants: Object.keys(catalog.tenants).length,
    });
    return new CatalogFormatStorage(standard, catalog);
  }

  lookupProductOverride(productId: string, formatId: string): PartialFormatDefinition | undefined {
    return this.products.get(productId)?.overrides.get(formatId);
  }

  lookupTenantCustom(tenantId: string, formatId: string): PartialFormatDefinition | undefined {
    return this.tenantCustom.get(tenantId)?.get(formatId);
  }

  lookupStandard(formatId: string): FormatDefinition | undefined {
    return this.standard.get(formatId);
  }

  listStandard(): FormatDefinition[] {
    return [...this.standard.values()];
  }

  listTenantCustom(tenantId: string): PartialFormatDefinition[] {
    return [...(this.tenantCustom.get(tenantId)?.values() || [])];
  }

  /** Products are visible only to the tenant that owns them. */
  getProduct(tenantId: string, productId: string): ProductDefinition | undefined {
    const product = this.products.get(productId);
    if (!product || product.tenantId !== tenantId) return undefined;
    return { productId: product.productId, name: product.name, formatIds: [...product.formatIds] };
  }

  getManagedSignals(tenantId: string): Readonly<Record<string, TargetingValue>> {
    return this.managedSignals.get(tenantId) || {};
  }
}
