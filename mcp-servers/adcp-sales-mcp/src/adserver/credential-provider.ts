import { z } from 'zod';
import { logger } from '../utils/logger.js';

/** What the ad server client is about to do, and for whom. */
export interface CredentialRequest {
  tenantId: string;
  backend: string;
  operation: string;
}

export interface AdServerCredential {
  token: string;
  /** Which configuration entry supplied the token. */
  source: 'tenant_backend' | 'tenant' | 'global';
}

export interface CredentialProvider {
  getCredential(request: CredentialRequest): Promise<AdServerCredential>;
}

export class MissingCredentialError extends Error {
  readonly tenantId: string;
  readonly backend: string;

  constructor(request: CredentialRequest) {
    super(
      `Cannot ${request.operation} on ${request.backend} for tenant ${request.tenantId}: no credential in AD_SERVER_TOKEN_MAP and no AD_SERVER_GLOBAL_TOKEN`
    );
    this.name = 'MissingCredentialError';
    this.tenantId = request.tenantId;
    this.backend = request.backend;
  }
}

// A tenant maps to one token for every backend, or to a token per backend.
const tokenMapSchema = z.record(z.union([z.string(), z.record(z.string())]));

interface TenantTokens {
  default?: string;
  byBackend: Map<string, string>;
}

function parseTokenMap(raw: string | undefined): Map<string, TenantTokens> {
  const tenants = new Map<string, TenantTokens>();
  if (!raw) return tenants;

  for (const [key, entry] of Object.entries(tokenMapSchema.parse(JSON.parse(raw)))) {
    const tenantId = key.trim();
    if (!tenantId) continue;
    const tokens: TenantTokens = { byBackend: new Map<string, string>() };
    if (typeof entry === 'string') {
      tokens.default = entry.trim() || undefined;
    } else {
      for (const [backend, token] of Object.entries(entry)) {
        if (token.trim()) tokens.byBackend.set(backend.trim(), token.trim());
      }
    }
    if (tokens.default || tokens.byBackend.size > 0) tenants.set(tenantId, tokens);
  }
  return tenants;
}

/** Resolves tokens from AD_SERVER_TOKEN_MAP, most specific entry first, then AD_SERVER_GLOBAL_TOKEN. */
export class EnvCredentialProvider implements CredentialProvider {
  private readonly tenants: Map<string, TenantTokens>;
  private readonly globalToken?: string;

  constructor(options: { tokenMapRaw?: string; globalToken?: string }) {
    this.tenants = parseTokenMap(options.tokenMapRaw);
    this.globalToken = options.globalToken?.trim() || undefined;
  }

  async getCredential(request: CredentialRequest): Promise<AdServerCredential> {
    const tenant = this.tenants.get(request.tenantId);
    const backendToken = tenant?.byBackend.get(request.backend);
    const credential: AdServerCredential | undefined = backendToken
      ? { token: backendToken, source: 'tenant_backend' }
      : tenant?.default
        ? { token: tenant.default, source: 'tenant' }
        : this.globalToken
          ? { token: this.globalToken, source: 'global' }
          : undefined;

    if (!credential) throw new MissingCredentialError(request);
    logger.debug('Resolved ad server credential', {
      tenantId: request.tenantId,
      backend: request.backend,
      operation: request.operation,
      source: credential.source,
    });
    return credential;
  }
}
