import fs from 'fs';
import { z } from 'zod';
import { logger } from '../utils/logger.js';
import { TargetingClassificationError, type AccessClass } from './core/types.js';

const classificationSchema = z.object({
  dimensions: z
    .array(
      z.object({
        name: z.string().min(1),
        access: z.enum(['overlay', 'managed_only', 'hybrid']),
      })
    )
    .min(1),
});

/** Dimension name to access class. Iteration order is declaration order; never mutated after load. */
export type ClassificationTable = ReadonlyMap<string, AccessClass>;

export function buildClassificationTable(raw: unknown, source = 'classification table'): ClassificationTable {
  const parsed = classificationSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`)
      .join('; ');
    throw new TargetingClassificationError(`Invalid targeting ${source}: ${issues}`);
  }

  const entries = new Map<string, AccessClass>();
  for (const { name, access } of parsed.data.dimensions) {
    if (entries.has(name)) {
      throw new TargetingClassificationError(
        `Invalid targeting ${source}: dimension '${name}' is declared more than once`
      );
    }
    entries.set(name, access);
  }
  return entries;
}

const tableCache = new Map<string, ClassificationTable>();

/** Loaded once per path for the life of the process. */
export function loadClassificationTable(filePath: string): ClassificationTable {
  const cached = tableCache.get(filePath);
  if (cached) return cached;

  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    logger.error('Failed to read targeting classification table', {
      path: filePath,
      error: error instanceof Error ? error.message : String(error),
    });
    throw new TargetingClassificationError(
      `Cannot read targeting classification table at ${filePath}: ${
        error instanceof Error ? error.message : 'Unknown error'
      }`
    );
  }

  const table = buildClassificationTable(raw, `classification table at ${filePath}`);
  tableCache.set(filePath, table);
  logger.info('Loaded targeting classification table', { path: filePath, dimensions: table.size });
  return table;
}
