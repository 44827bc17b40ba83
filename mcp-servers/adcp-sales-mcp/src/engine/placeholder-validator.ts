import { z } from 'zod';
import { logger } from '../utils/logger.js';
import {
  FormatRegistryError,
  NoPlaceholdersConfiguredError,
  SlotMismatchError,
  type AttemptedSlot,
  type CreativeAsset,
  type FormatDefinition,
  type PackageSlots,
  type PlaceholderSlot,
} from './core/types.js';

const slotKindSchema = z.enum(['exact', 'native_template', 'programmatic_wildcard']);

const placeholderSchema = z
  .object({
    width: z.number().int().positive().optional(),
    height: z.number().int().positive().optional(),
    creative_template_id: z.union([z.string().min(1), z.number().int()]).optional(),
    expected_creative_count: z.number().int().positive().optional(),
    slot_kind: slotKindSchema.optional(),
  })
  .passthrough();

type RawPlaceholder = z.infer<typeof placeholderSchema>;

export type ValidationOutcome =
  | {
      accepted: true;
      packageId: string;
      matchedSlot: PlaceholderSlot;
      packagesWithoutPlaceholders: string[];
    }
  | { accepted: false; error: NoPlaceholdersConfiguredError | SlotMismatchError };

function isWildcard(slot: PlaceholderSlot): boolean {
  return slot.kind === 'native_template' || slot.kind === 'programmatic_wildcard';
}

export function slotFromPlaceholder(raw: RawPlaceholder, format: FormatDefinition): PlaceholderSlot {
  const width = raw.width ?? format.requirements.width;
  const height = raw.height ?? format.requirements.height;
  const templateId = raw.creative_template_id != null ? String(raw.creative_template_id) : undefined;
  const expected = raw.expected_creative_count;
  const withCount = <T extends PlaceholderSlot>(slot: T): T =>
    expected != null ? { ...slot, expectedCreativeCount: expected } : slot;

  const kind =
    raw.slot_kind ??
    (width === 1 && height === 1
      ? templateId
        ? 'native_template'
        : 'programmatic_wildcard'
      : 'exact');

  switch (kind) {
    case 'native_template':
      if (!templateId) {
        throw new FormatRegistryError(
          `Format ${format.formatId}: native_template placeholder has no creative_template_id`
        );
      }
      return withCount({ kind: 'native_template', templateId });
    case 'programmatic_wildcard':
      return withCount({ kind: 'programmatic_wildcard' });
    case 'exact':
      if (width == null || height == null) {
        throw new FormatRegistryError(
          `Format ${format.formatId}: placeholder is missing width or height`
        );
      }
      return withCount({ kind: 'exact', width, height });
  }
}

/**
 * Slots a line item built from this format reserves on the given ad-server backend. Reads
 * `platformConfig[backend].creative_placeholder` (object or array), falling back to the
 * requirement dimensions. Formats with neither produce no slot.
 */
export function deriveSlots(format: FormatDefinition, backend: string): PlaceholderSlot[] {
  const configured = format.platformConfig[backend]?.creative_placeholder;

  if (configured == null) {
    const { width, height } = format.requirements;
    if (width == null || height == null) return [];
    return [slotFromPlaceholder({ width, height }, format)];
  }

  const parsed = z.union([placeholderSchema, z.array(placeholderSchema)]).safeParse(configured);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'creative_placeholder'}: ${issue.message}`)
      .join('; ');
    throw new FormatRegistryError(
      `Format ${format.formatId}: invalid creative_placeholder for ${backend}: ${issues}`
    );
  }

  const entries = Array.isArray(parsed.data) ? parsed.data : [parsed.data];
  return entries.map((entry) => slotFromPlaceholder(entry, format));
}

function slotMatches(slot: PlaceholderSlot, asset: CreativeAsset): boolean {
  switch (slot.kind) {
    case 'native_template':
    case 'programmatic_wildcard':
      return true;
    case 'exact':
      return asset.width === slot.width && asset.height === slot.height;
  }
}

function describeAssetSize(asset: CreativeAsset): string {
  return asset.width != null && asset.height != null ? `${asset.width}x${asset.height}` : 'unmeasured';
}

/**
 * Accepts the asset on the first slot it fits across its assigned packages. Wildcard slots are
 * tried before exact ones within each package. Packages without slots never accept vacuously.
 */
export function validateCreative(
  asset: CreativeAsset,
  packages: readonly PackageSlots[]
): ValidationOutcome {
  const attempted: AttemptedSlot[] = [];
  const withoutPlaceholders: string[] = [];

  for (const pkg of packages) {
    if (pkg.slots.length === 0) {
      withoutPlaceholders.push(pkg.packageId);
      continue;
    }

    const ordered = [
      ...pkg.slots.filter((slot) => isWildcard(slot)),
      ...pkg.slots.filter((slot) => !isWildcard(slot)),
    ];
    for (const slot of ordered) {
      attempted.push({ packageId: pkg.packageId, slot });
      if (slotMatches(slot, asset)) {
        logger.debug('Creative matched placeholder', {
          creativeId: asset.creativeId,
          packageId: pkg.packageId,
          slotKind: slot.kind,
        });
        return {
          accepted: true,
          packageId: pkg.packageId,
          matchedSlot: slot,
          packagesWithoutPlaceholders: withoutPlaceholders,
        };
      }
    }
  }

  if (attempted.length === 0) {
    logger.info('Creative has no placeholders to validate against', {
      creativeId: asset.creativeId,
      packageIds: withoutPlaceholders,
    });
    return {
      accepted: false,
      error: new NoPlaceholdersConfiguredError(asset.creativeId, withoutPlaceholders),
    };
  }

  const error = new SlotMismatchError(
    asset.creativeId,
    describeAssetSize(asset),
    attempted,
    withoutPlaceholders
  );
  logger.info('Creative rejected by placeholder validation', {
    creativeId: asset.creativeId,
    reason: error.message,
  });
  return { accepted: false, error };
}
