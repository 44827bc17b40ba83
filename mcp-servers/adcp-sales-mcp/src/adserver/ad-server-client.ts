import axios, { type AxiosRequestConfig, type AxiosResponse } from 'axios';
import { z } from 'zod';
import type { AdServerRetryConfig } from '../config/env.js';
import type { PlaceholderSlot } from '../engine/core/types.js';
import { UpstreamAdServerError } from '../engine/core/types.js';
import type { AdServerTargeting } from '../engine/ad-server-targeting.js';
import type { CreativeType, SnippetType } from '../engine/creative-assets.js';
import { logger } from '../utils/logger.js';
import { MissingCredentialError, type CredentialProvider } from './credential-provider.js';

export type HttpResponse = Pick<AxiosResponse<unknown>, 'status' | 'data'>;

export interface HttpClient {
  request(config: AxiosRequestConfig): Promise<HttpResponse>;
}

function defaultHttpClient(): HttpClient {
  const instance = axios.create();
  return { request: (config) => instance.request<unknown>(config) };
}

export interface LineItemSpec {
  packageId: string;
  productId: string;
  formatIds: string[];
  placeholders: PlaceholderSlot[];
  targeting: AdServerTargeting;
  budget?: number;
}

export interface OrderSpec {
  tenantId: string;
  /** Ad server the tenant trades through, e.g. `gam`. */
  backend: string;
  /** Same key on retry means the same order; the ad server must not duplicate it. */
  idempotencyKey: string;
  buyerRef: string;
  orderName: string;
  startTime: string;
  endTime: string;
  totalBudget: number;
  currency: string;
  lineItems: LineItemSpec[];
}

export interface AppliedLineItems {
  orderId: string;
  /** packageId to ad-server line item id */
  lineItemIds: Record<string, string>;
}

export interface CreativeAssociationSpec {
  tenantId: string;
  backend: string;
  idempotencyKey: string;
  creativeId: string;
  creativeType: CreativeType;
  packageId: string;
  lineItemId: string;
  slot: PlaceholderSlot;
  name: string;
  mediaUrl?: string;
  clickUrl?: string;
  snippet?: string;
  snippetType?: SnippetType;
  width?: number;
  height?: number;
}

export interface AssociationResult {
  adServerCreativeId: string;
  associationId: string;
}

/** Both operations are idempotent under the caller-supplied key and safe to retry. */
export interface AdServerClient {
  applyLineItems(spec: OrderSpec): Promise<AppliedLineItems>;
  associateCreative(spec: CreativeAssociationSpec): Promise<AssociationResult>;
}

interface HttpAdServerClientOptions {
  baseUrl: string;
  retry: AdServerRetryConfig;
  timeoutMs: number;
  httpClient?: HttpClient;
  sleepFn?: (ms: number) => Promise<void>;
}

const appliedSchema = z.object({
  orderId: z.union([z.string(), z.number()]).transform(String),
  lineItemIds: z.record(z.union([z.string(), z.number()]).transform(String)),
});

const associationSchema = z.object({
  adServerCreativeId: z.union([z.string(), z.number()]).transform(String),
  associationId: z.union([z.string(), z.number()]).transform(String),
});

const errorBodySchema = z.object({
  error: z
    .object({
      message: z.string().optional(),
      code: z.union([z.string(), z.number()]).optional(),
    })
    .passthrough(),
});

function isRetryableStatus(status: number): boolean {
  return status === 429 || (status >= 500 && status <= 599);
}

function describeAdServerError(status: number, data: unknown): string {
  const parsed = errorBodySchema.safeParse(data);
  const parts = [`Ad server request failed with status ${status}`];
  if (parsed.success) {
    if (parsed.data.error.code != null) parts.push(`code=${parsed.data.error.code}`);
    if (parsed.data.error.message) parts.push(`message=${parsed.data.error.message}`);
  }
  return parts.join(' | ');
}

function isTimeout(error: unknown): boolean {
  return axios.isAxiosError(error) && (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT');
}

export class HttpAdServerClient implements AdServerClient {
  private readonly credentials: CredentialProvider;
  private readonly baseUrl: string;
  private readonly retry: AdServerRetryConfig;
  private readonly timeoutMs: number;
  private readonly httpClient: HttpClient;
  private readonly sleepFn: (ms: number) => Promise<void>;

  constructor(credentials: CredentialProvider, options: HttpAdServerClientOptions) {
    this.credentials = credentials;
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.retry = options.retry;
    this.timeoutMs = options.timeoutMs;
    this.httpClient = options.httpClient || defaultHttpClient();
    this.sleepFn = options.sleepFn || ((ms: number) => new Promise((resolve) => setTimeout(resolve, ms)));
  }

  async applyLineItems(spec: OrderSpec): Promise<AppliedLineItems> {
    const data = await this.post('orders/apply', spec);
    return this.parseResponse(appliedSchema, data, 'orders/apply');
  }

  async associateCreative(spec: CreativeAssociationSpec): Promise<AssociationResult> {
    const data = await this.post('creatives/associate', spec);
    return this.parseResponse(associationSchema, data, 'creatives/associate');
  }

  private parseResponse<S extends z.ZodTypeAny>(schema: S, data: unknown, path: string): z.output<S> {
    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      throw new UpstreamAdServerError(`Ad server returned an unexpected ${path} response`, {
        isRetryable: false,
        attempt: 1,
      });
    }
    return parsed.data;
  }

  private async post(path: string, spec: OrderSpec | CreativeAssociationSpec): Promise<unknown> {
    const { tenantId, backend, idempotencyKey } = spec;
    let token: string;
    try {
      ({ token } = await this.credentials.getCredential({ tenantId, backend, operation: path }));
    } catch (error) {
      if (!(error instanceof MissingCredentialError)) throw error;
      throw new UpstreamAdServerError(error.message, { isRetryable: false, attempt: 0 });
    }

    const url = `${this.baseUrl}/${path}`;
    const maxAttempts = this.retry.maxRetries + 1;

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      try {
        const response = await this.httpClient.request({
          method: 'POST',
          url,
          data: spec,
          headers: {
            Authorization: `Bearer ${token}`,
            'Idempotency-Key': idempotencyKey,
          },
          timeout: this.timeoutMs,
          validateStatus: () => true,
        });

        if (response.status >= 200 && response.status < 300) {
          return response.data;
        }

        const retryable = isRetryableStatus(response.status);
        if (retryable && attempt < maxAttempts) {
          logger.warn('Retrying ad server request', { tenantId, path, status: response.status, attempt });
          await this.backoff(attempt);
          continue;
        }

        throw new UpstreamAdServerError(describeAdServerError(response.status, response.data), {
          status: response.status,
          isRetryable: retryable,
          attempt,
        });
      } catch (error) {
        if (error instanceof UpstreamAdServerError) {
          throw error;
        }

        const status = axios.isAxiosError(error) ? error.response?.status : undefined;
        const retryable = status ? isRetryableStatus(status) : true;
        const timedOut = isTimeout(error);

        if (retryable && attempt < maxAttempts) {
          logger.warn('Retrying ad server request after transport error', { tenantId, path, attempt, timedOut });
          await this.backoff(attempt);
          continue;
        }

        throw new UpstreamAdServerError(
          `Ad server request failed: ${error instanceof Error ? error.message : 'Unknown error'}`,
          { status, isRetryable: retryable, attempt, timedOut }
        );
      }
    }

    throw new UpstreamAdServerError('Ad server request retry budget exhausted', {
      isRetryable: true,
      attempt: maxAttempts,
    });
  }

  private async backoff(attempt: number): Promise<void> {
    const exponentialDelay = this.retry.baseDelayMs * 2 ** (attempt - 1);
    const jitter = this.retry.jitterMs > 0 ? Math.floor(Math.random() * this.retry.jitterMs) : 0;
    const sleepTime = Math.min(exponentialDelay + jitter, this.retry.maxDelayMs);
    await this.sleepFn(sleepTime);
  }
}
