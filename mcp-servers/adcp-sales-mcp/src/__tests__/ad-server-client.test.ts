import { AxiosError, type AxiosRequestConfig } from 'axios';
import {
  HttpAdServerClient,
  type CreativeAssociationSpec,
  type HttpResponse,
  type OrderSpec,
} from '../adserver/ad-server-client.js';
import {
  EnvCredentialProvider,
  type AdServerCredential,
  type CredentialRequest,
} from '../adserver/credential-provider.js';
import { UpstreamAdServerError } from '../engine/core/types.js';

const retry = { maxRetries: 2, baseDelayMs: 100, maxDelayMs: 1_000, jitterMs: 0 };

const order: OrderSpec = {
  tenantId: 'tenant-a',
  backend: 'gam',
  idempotencyKey: 'tenant-a:buyer-1',
  buyerRef: 'buyer-1',
  orderName: 'buyer-1 (mb_1)',
  startTime: '2026-03-01T00:00:00Z',
  endTime: '2026-03-31T00:00:00Z',
  totalBudget: 5000,
  currency: 'USD',
  lineItems: [
    {
      packageId: 'pkg_1',
      productId: 'prod-a',
      formatIds: ['display_300x250_image'],
      placeholders: [{ kind: 'exact', width: 300, height: 250 }],
      targeting: {},
    },
  ],
};

function queuedHttp(responses: Array<HttpResponse | Error>) {
  return {
    request: jest.fn(async (_config: AxiosRequestConfig): Promise<HttpResponse> => {
      const next = responses.shift();
      if (!next) throw new Error('no response queued');
      if (next instanceof Error) throw next;
      return next;
    }),
  };
}

function buildClient(httpClient: ReturnType<typeof queuedHttp>, maxRetries = retry.maxRetries) {
  const sleepFn = jest.fn(async (_ms: number) => undefined);
  const credentials = {
    getCredential: jest.fn(
      async (_request: CredentialRequest): Promise<AdServerCredential> => ({ token: 'test-token', source: 'global' })
    ),
  };
  const client = new HttpAdServerClient(credentials, {
    baseUrl: 'https://ads.test/api/',
    retry: { ...retry, maxRetries },
    timeoutMs: 5_000,
    httpClient,
    sleepFn,
  });
  return { client, sleepFn, credentials };
}

async function captureError(promise: Promise<unknown>): Promise<UpstreamAdServerError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof UpstreamAdServerError) return error;
    throw error;
  }
  throw new Error('expected the request to fail');
}

describe('HttpAdServerClient', () => {
  it('retries on 429 and returns the parsed order', async () => {
    const http = queuedHttp([
      { status: 429, data: {} },
      { status: 200, data: { orderId: 123, lineItemIds: { pkg_1: 456 } } },
    ]);
    const { client, sleepFn, credentials } = buildClient(http);

    await expect(client.applyLineItems(order)).resolves.toEqual({
      orderId: '123',
      lineItemIds: { pkg_1: '456' },
    });
    expect(credentials.getCredential.mock.calls).toEqual([
      [{ tenantId: 'tenant-a', backend: 'gam', operation: 'orders/apply' }],
    ]);
    expect(http.request).toHaveBeenCalledTimes(2);
    expect(sleepFn.mock.calls.map(([ms]) => ms)).toEqual([100]);
    expect(http.request.mock.calls[0][0]).toMatchObject({
      method: 'POST',
      url: 'https://ads.test/api/orders/apply',
      timeout: 5_000,
      headers: { Authorization: 'Bearer test-token', 'Idempotency-Key': 'tenant-a:buyer-1' },
    });
  });

  it('stops after the retry budget and reports the last status', async () => {
    const busy: HttpResponse = { status: 503, data: { error: { code: 'UNAVAILABLE', message: 'maintenance' } } };
    const http = queuedHttp([busy, busy, busy]);
    const { client, sleepFn } = buildClient(http);

    const error = await captureError(client.applyLineItems(order));

    expect(error.message).toBe('Ad server request failed with status 503 | code=UNAVAILABLE | message=maintenance');
    expect(error.status).toBe(503);
    expect(error.attempt).toBe(3);
    expect(error.isRetryable).toBe(true);
    expect(error.recoverable).toBe(false);
    expect(sleepFn.mock.calls.map(([ms]) => ms)).toEqual([100, 200]);
  });

  it('does not retry client errors', async () => {
    const http = queuedHttp([{ status: 400, data: { error: { message: 'bad targeting' } } }]);
    const { client } = buildClient(http);

    const error = await captureError(client.applyLineItems(order));

    expect(http.request).toHaveBeenCalledTimes(1);
    expect(error.message).toBe('Ad server request failed with status 400 | message=bad targeting');
    expect(error.isRetryable).toBe(false);
  });

  it('flags a timeout as recoverable', async () => {
    const http = queuedHttp([new AxiosError('timeout of 5000ms exceeded', 'ECONNABORTED')]);
    const { client } = buildClient(http, 0);

    const error = await captureError(client.applyLineItems(order));

    expect(error.message).toBe('Ad server request failed: timeout of 5000ms exceeded');
    expect(error.timedOut).toBe(true);
    expect(error.recoverable).toBe(true);
  });

  it('fails without calling the ad server when no credential is available', async () => {
    const http = queuedHttp([]);
    const client = new HttpAdServerClient(new EnvCredentialProvider({}), {
      baseUrl: 'https://ads.test',
      retry,
      timeoutMs: 5_000,
      httpClient: http,
    });

    const error = await captureError(client.applyLineItems(order));

    expect(error.attempt).toBe(0);
    expect(error.recoverable).toBe(false);
    expect(error.message).toBe(
      'Cannot orders/apply on gam for tenant tenant-a: no credential in AD_SERVER_TOKEN_MAP and no AD_SERVER_GLOBAL_TOKEN'
    );
    expect(http.request).not.toHaveBeenCalled();
  });

  it('rejects an unexpected response body', async () => {
    const http = queuedHttp([{ status: 200, data: { ok: true } }]);
    const { client } = buildClient(http);

    await expect(client.applyLineItems(order)).rejects.toThrow(
      'Ad server returned an unexpected orders/apply response'
    );
  });

  it('associates creatives with their line item', async () => {
    const http = queuedHttp([{ status: 201, data: { adServerCreativeId: 'cr-99', associationId: 77 } }]);
    const { client } = buildClient(http);
    const spec: CreativeAssociationSpec = {
      tenantId: 'tenant-a',
      backend: 'gam',
      idempotencyKey: 'mb_1:cr_1:pkg_1',
      creativeId: 'cr_1',
      creativeType: 'hosted_asset',
      packageId: 'pkg_1',
      lineItemId: 'li_1',
      slot: { kind: 'exact', width: 300, height: 250 },
      name: 'Spring banner',
      width: 300,
      height: 250,
    };

    await expect(client.associateCreative(spec)).resolves.toEqual({
      adServerCreativeId: 'cr-99',
      associationId: '77',
    });
    expect(http.request.mock.calls[0][0].url).toBe('https://ads.test/api/creatives/associate');
  });
});
