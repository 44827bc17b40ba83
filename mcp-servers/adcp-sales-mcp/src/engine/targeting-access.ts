import { logger } from '../utils/logger.js';
import {
  ManagedOnlyViolationError,
  UnknownTargetingDimensionError,
  type TargetingOverlay,
  type TargetingValue,
} from './core/types.js';
import type { ClassificationTable } from './targeting-classification.js';

export type AccessOutcome =
  | { ok: true; overlay: TargetingOverlay; managedApplied: string[] }
  | { ok: false; error: ManagedOnlyViolationError | UnknownTargetingDimensionError };

function hasOwn(record: Readonly<Record<string, TargetingValue>>, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(record, key);
}

/**
 * Two phases: reject caller overlays that touch managed-only or unknown dimensions, then merge
 * trusted managed signals over the accepted baseline. No managed-only value from the caller
 * ever reaches the merged overlay.
 */
export class TargetingAccessController {
  private readonly table: ClassificationTable;

  constructor(table: ClassificationTable) {
    this.table = table;
  }

  apply(
    externalOverlay: Readonly<Record<string, TargetingValue>>,
    managedSignals: Readonly<Record<string, TargetingValue>> = {}
  ): AccessOutcome {
    for (const [dimension, access] of this.table) {
      if (access === 'managed_only' && hasOwn(externalOverlay, dimension)) {
        logger.info('Rejected managed-only targeting dimension from caller', { dimension });
        return { ok: false, error: new ManagedOnlyViolationError(dimension) };
      }
    }

    const unknown = Object.keys(externalOverlay)
      .filter((dimension) => !this.table.has(dimension))
      .sort();
    if (unknown.length > 0) {
      logger.info('Rejected unknown targeting dimension', { dimension: unknown[0] });
      return { ok: false, error: new UnknownTargetingDimensionError(unknown[0]) };
    }

    const overlay: Record<string, TargetingValue> = {};
    const managedApplied: string[] = [];

    for (const [dimension, access] of this.table) {
      if (access !== 'overlay' && hasOwn(managedSignals, dimension)) {
        overlay[dimension] = structuredClone(managedSignals[dimension]);
        managedApplied.push(dimension);
      } else if (access !== 'managed_only' && hasOwn(externalOverlay, dimension)) {
        overlay[dimension] = structuredClone(externalOverlay[dimension]);
      }
    }

    for (const dimension of Object.keys(managedSignals)) {
      const access = this.table.get(dimension);
      if (access === 'overlay' || access === undefined) {
        logger.warn('Ignoring managed signal for non-managed targeting dimension', {
          dimension,
          access: access ?? 'unknown',
        });
      }
    }

    logger.debug('Applied targeting access control', {
      dimensions: Object.keys(overlay),
      managedApplied,
    });
    return { ok: true, overlay: Object.freeze(overlay), managedApplied };
  }
}
