import path from 'path';
import dotenv from 'dotenv';

export type AdServerMode = 'dry_run' | 'http';

export interface AdServerRetryConfig {
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterMs: number;
}

export interface TenantConfig {
  adServer: string;
  manualApprovalRequired: boolean;
}

export interface EnvConfig {
  nodeEnv: string;
  port: number;
  logLevel: string;
  adServerMode: AdServerMode;
  adServerBaseUrl?: string;
  adServerTokenMapRaw?: string;
  adServerGlobalToken?: string;
  adServerTimeoutMs: number;
  adServerRetry: AdServerRetryConfig;
  tenantConfigMap: Record<string, TenantConfig>;
  standardFormatsPath: string;
  formatCatalogPath: string;
  targetingClassificationPath: string;
}

export const DEFAULT_AD_SERVER = 'gam';

let envLoaded = false;
let cachedConfig: EnvConfig | null = null;

function parsePositiveInt(raw: string | undefined, fallback: number): number {
  if (!raw) return fallback;
  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed) || parsed <= 0) return fallback;
  return parsed;
}

function parseNonNegativeInt(raw: string | undefined, fallback: number): number {
  if (!raw) return fallback;
  const parsed = Number.parseInt(raw, 10);
  if (!Number.isFinite(parsed) || parsed < 0) return fallback;
  return parsed;
}

function parseJsonRecord(raw: string | undefined, varName: string): Record<string, unknown> {
  if (!raw) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new Error(
      `Invalid ${varName}. Expected JSON object. ${
        error instanceof Error ? error.message : 'Unknown parse error'
      }`
    );
  }
  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new Error(`Invalid ${varName}. Expected JSON object.`);
  }
  return { ...parsed };
}

export function parseTenantConfigMap(raw: string | undefined): Record<string, TenantConfig> {
  const input = parseJsonRecord(raw, 'TENANT_CONFIG_MAP');

  const output: Record<string, TenantConfig> = {};
  for (const [tenantId, value] of Object.entries(input)) {
    const cfg: Record<string, unknown> =
      value && typeof value === 'object' && !Array.isArray(value) ? { ...value } : {};
    output[tenantId] = {
      adServer: typeof cfg.adServer === 'string' && cfg.adServer ? cfg.adServer : DEFAULT_AD_SERVER,
      manualApprovalRequired: cfg.manualApprovalRequired === true,
    };
  }

  return output;
}

function resolveConfigPath(raw: string | undefined, fallback: string): string {
  return path.resolve(process.cwd(), raw || fallback);
}

export function loadEnvConfig(): EnvConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  if (!envLoaded) {
    dotenv.config();
    envLoaded = true;
  }

  // Validates eagerly so a malformed map fails at startup rather than on first use.
  parseJsonRecord(process.env.AD_SERVER_TOKEN_MAP, 'AD_SERVER_TOKEN_MAP');

  const adServerMode: AdServerMode =
    (process.env.AD_SERVER_MODE || 'dry_run').toLowerCase().trim() === 'http' ? 'http' : 'dry_run';

  cachedConfig = {
    nodeEnv: process.env.NODE_ENV || 'development',
    port: parsePositiveInt(process.env.PORT, 3001),
    logLevel: process.env.LOG_LEVEL || 'info',
    adServerMode,
    adServerBaseUrl: process.env.AD_SERVER_BASE_URL,
    adServerTokenMapRaw: process.env.AD_SERVER_TOKEN_MAP,
    adServerGlobalToken: process.env.AD_SERVER_GLOBAL_TOKEN,
    adServerTimeoutMs: parsePositiveInt(process.env.AD_SERVER_TIMEOUT_MS, 30_000),
    adServerRetry: {
      maxRetries: parseNonNegativeInt(process.env.AD_SERVER_MAX_RETRIES, 3),
      baseDelayMs: parsePositiveInt(process.env.AD_SERVER_BASE_DELAY_MS, 300),
      maxDelayMs: parsePositiveInt(process.env.AD_SERVER_MAX_DELAY_MS, 3_000),
      jitterMs: parseNonNegativeInt(process.env.AD_SERVER_RETRY_JITTER_MS, 100),
    },
    tenantConfigMap: parseTenantConfigMap(process.env.TENANT_CONFIG_MAP),
    standardFormatsPath: resolveConfigPath(
      process.env.STANDARD_FORMATS_PATH,
      'config/standard-formats.json'
    ),
    formatCatalogPath: resolveConfigPath(process.env.FORMAT_CATALOG_PATH, 'config/format-catalog.json'),
    targetingClassificationPath: resolveConfigPath(
      process.env.TARGETING_CLASSIFICATION_PATH,
      'config/targeting-dimensions.json'
    ),
  };

  return cachedConfig;
}

export function getEnvConfig(): EnvConfig {
  return cachedConfig || loadEnvConfig();
}

export function getTenantConfig(env: EnvConfig, tenantId: string): TenantConfig {
  return env.tenantConfigMap[tenantId] || { adServer: DEFAULT_AD_SERVER, manualApprovalRequired: false };
}
