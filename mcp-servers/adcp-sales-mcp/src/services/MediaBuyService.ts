import { createHash, randomUUID } from 'crypto';
import { DryRunAdServerClient } from '../adserver/dry-run-client.js';
import {
  HttpAdServerClient,
  type AdServerClient,
  type AppliedLineItems,
  type LineItemSpec,
  type OrderSpec,
} from '../adserver/ad-server-client.js';
import { EnvCredentialProvider } from '../adserver/credential-provider.js';
import { getEnvConfig, getTenantConfig, type EnvConfig } from '../config/env.js';
import { buildAdServerTargeting } from '../engine/ad-server-targeting.js';
import {
  classifyCreative,
  isMeasurable,
  resolveCreativeDimensions,
  type CreativeSubmission,
} from '../engine/creative-assets.js';
import {
  BuyerRefConflictError,
  MediaBuyNotFoundError,
  UpstreamAdServerError,
  describeSlot,
  type AdcpDomainError,
  type CreativeAsset,
  type DomainError,
  type DomainResult,
  type ItemOutcome,
  type PackageSlots,
  type PlaceholderSlot,
  type TargetingValue,
} from '../engine/core/types.js';
import { FormatResolver, type FormatStorage } from '../engine/format-resolver.js';
import { deriveSlots, validateCreative } from '../engine/placeholder-validator.js';
import { TargetingAccessController } from '../engine/targeting-access.js';
import {
  loadClassificationTable,
  type ClassificationTable,
} from '../engine/targeting-classification.js';
import type {
  CreateMediaBuyParams,
  CreateMediaBuyPayload,
  CreativeResult,
  GetMediaBuyParams,
  GetMediaBuyPayload,
  ListCreativeFormatsParams,
  ListCreativeFormatsPayload,
  MediaBuyView,
  PackageRequest,
  PackageResult,
  SyncCreativesParams,
  SyncCreativesPayload,
} from '../types/adcp.js';
import { logger } from '../utils/logger.js';
import {
  CatalogFormatStorage,
  type ManagedSignalProvider,
  type ProductCatalog,
} from './format-store.js';
import {
  InMemoryMediaBuyRepository,
  type MediaBuyRecord,
  type MediaBuyRepository,
  type RejectedPackage,
  type StoredPackage,
} from './media-buy-repository.js';

interface ServiceDependencies {
  env?: EnvConfig;
  storage?: FormatStorage & ProductCatalog;
  signals?: ManagedSignalProvider;
  classification?: ClassificationTable;
  adServer?: AdServerClient;
  repository?: MediaBuyRepository;
  idFn?: () => string;
  nowFn?: () => Date;
}

interface PlannedPackage {
  packageId: string;
  productId: string;
  formatIds: string[];
  slots: PlaceholderSlot[];
  budget?: number;
}

function createAdServerClient(env: EnvConfig): AdServerClient {
  if (env.adServerMode === 'dry_run') {
    return new DryRunAdServerClient();
  }
  if (!env.adServerBaseUrl) {
    throw new Error('AD_SERVER_BASE_URL is required when AD_SERVER_MODE=http');
  }
  const credentials = new EnvCredentialProvider({
    tokenMapRaw: env.adServerTokenMapRaw,
    globalToken: env.adServerGlobalToken,
  });
  return new HttpAdServerClient(credentials, {
    baseUrl: env.adServerBaseUrl,
    retry: env.adServerRetry,
    timeoutMs: env.adServerTimeoutMs,
  });
}

function canonicalJson(value: unknown): string {
  if (Array.isArray(value)) return `[${value.map((entry) => canonicalJson(entry)).join(',')}]`;
  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value)
      .filter(([, entry]) => entry !== undefined)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([key, entry]) => `${JSON.stringify(key)}:${canonicalJson(entry)}`).join(',')}}`;
  }
  return JSON.stringify(value) ?? 'null';
}

function requestFingerprint(params: CreateMediaBuyParams): string {
  const normalized = {
    packages: params.packages.map((request, index) => ({
      ...request,
      packageId: request.packageId || `pkg_${index + 1}`,
    })),
    targetingOverlay: params.targetingOverlay || {},
    startTime: params.startTime,
    endTime: params.endTime,
    budget: params.budget,
    currency: params.currency || 'USD',
  };
  return createHash('sha256').update(canonicalJson(normalized)).digest('hex');
}

/** Keys under the tenant's managed key-values; callers may not write them through custom targeting. */
function managedKeyValueKeys(signals: Readonly<Record<string, TargetingValue>>): string[] {
  const managed = signals.key_value_pairs;
  return managed !== null && typeof managed === 'object' && !Array.isArray(managed) ? Object.keys(managed) : [];
}

function rejectedPackage(
  packageId: string,
  productId: string,
  formatIds: string[],
  error: DomainError
): PackageResult {
  return { packageId, productId, status: 'rejected', formatIds, placeholders: [], error };
}

function toView(record: MediaBuyRecord): MediaBuyView {
  return {
    mediaBuyId: record.mediaBuyId,
    buyerRef: record.buyerRef,
    status: record.status,
    orderId: record.orderId,
    workflowStepId: record.workflowStepId,
    startTime: record.startTime,
    endTime: record.endTime,
    totalBudget: record.totalBudget,
    currency: record.currency,
    targeting: record.targeting,
    packages: record.packages.map((pkg) => ({
      packageId: pkg.packageId,
      productId: pkg.productId,
      formatIds: [...pkg.formatIds],
      placeholders: pkg.slots.map((slot) => describeSlot(slot)),
      lineItemId: pkg.lineItemId,
      budget: pkg.budget,
    })),
    creatives: record.creatives.map((creative) => ({
      creativeId: creative.creativeId,
      packageId: creative.packageId,
      status: creative.status,
    })),
  };
}

/**
 * Orchestrates media-buy operations over the engine components. Every method returns a
 * DomainResult; domain rejections never surface as exceptions.
 */
export class MediaBuyService {
  private readonly env: EnvConfig;
  private readonly storage: FormatStorage & ProductCatalog;
  private readonly signals: ManagedSignalProvider;
  private readonly resolver: FormatResolver;
  private readonly access: TargetingAccessController;
  private readonly adServer: AdServerClient;
  private readonly repository: MediaBuyRepository;
  private readonly idFn: () => string;
  private readonly nowFn: () => Date;
  private readonly inFlight = new Map<string, Promise<DomainResult<CreateMediaBuyPayload>>>();

  constructor(deps: ServiceDependencies = {}) {
    this.env = deps.env || getEnvConfig();

    let catalog: CatalogFormatStorage | undefined;
    const loadCatalog = (): CatalogFormatStorage => {
      catalog = catalog || CatalogFormatStorage.fromFiles(this.env.standardFormatsPath, this.env.formatCatalogPath);
      return catalog;
    };

    this.storage = deps.storage || loadCatalog();
    this.signals = deps.signals || loadCatalog();
    this.resolver = new FormatResolver(this.storage);
    this.access = new TargetingAccessController(
      deps.classification || loadClassificationTable(this.env.targetingClassificationPath)
    );
    this.adServer = deps.adServer || createAdServerClient(this.env);
    this.repository = deps.repository || new InMemoryMediaBuyRepository();
    this.idFn = deps.idFn || randomUUID;
    this.nowFn = deps.nowFn || (() => new Date());
  }

  /**
   * Creates a media buy, or replays the one already created for this (tenant, buyer_ref).
   * Requests for the same key are serialized so a concurrent repeat waits and replays.
   */
  async createMediaBuy(params: CreateMediaBuyParams): Promise<DomainResult<CreateMediaBuyPayload>> {
    const key = `${params.tenantId}:${params.buyerRef}`;
    for (let running = this.inFlight.get(key); running; running = this.inFlight.get(key)) {
      await Promise.allSettled([running]);
    }

    const task = this.createOnce(params);
    this.inFlight.set(key, task);
    try {
      return await task;
    } finally {
      if (this.inFlight.get(key) === task) this.inFlight.delete(key);
    }
  }

  private async createOnce(params: CreateMediaBuyParams): Promise<DomainResult<CreateMediaBuyPayload>> {
    const { tenantId, buyerRef } = params;
    const tenant = getTenantConfig(this.env, tenantId);
    const fingerprint = requestFingerprint(params);

    const fail = (error: AdcpDomainError): DomainResult<CreateMediaBuyPayload> => ({
      operation: 'create_media_buy',
      payload: { buyerRef, packages: [] },
      items: [],
      errors: [error.toDomainError()],
    });

    const existing = await this.repository.findByBuyerRef(tenantId, buyerRef);
    if (existing) {
      if (existing.requestFingerprint !== fingerprint) {
        logger.warn('Rejected reuse of buyer_ref with a different request', {
          tenantId,
          buyerRef,
          mediaBuyId: existing.mediaBuyId,
        });
        return fail(new BuyerRefConflictError(buyerRef, existing.mediaBuyId));
      }
      logger.info('Replaying media buy for repeated buyer_ref', {
        tenantId,
        buyerRef,
        mediaBuyId: existing.mediaBuyId,
      });
      return this.replayCreate(existing);
    }

    const managedSignals = this.signals.getManagedSignals(tenantId);
    const accessOutcome = this.access.apply(params.targetingOverlay || {}, managedSignals);
    if (!accessOutcome.ok) return fail(accessOutcome.error);

    const translation = buildAdServerTargeting(
      accessOutcome.overlay,
      tenant.adServer,
      managedKeyValueKeys(managedSignals)
    );
    if (!translation.ok) return fail(translation.error);

    const rejected: RejectedPackage[] = [];
    const planned: PlannedPackage[] = [];
    params.packages.forEach((request, index) => {
      const packageId = request.packageId || `pkg_${index + 1}`;
      const outcome = this.planPackage(tenantId, tenant.adServer, packageId, request);
      if (outcome.ok) {
        planned.push(outcome.plan);
      } else {
        rejected.push({
          packageId,
          productId: request.productId,
          formatIds: request.formatIds || [],
          error: outcome.error,
        });
      }
    });
    const results = rejected.map((pkg) => rejectedPackage(pkg.packageId, pkg.productId, pkg.formatIds, pkg.error));

    const rejectedItems: ItemOutcome[] = rejected.map((pkg): ItemOutcome => ({
      id: pkg.packageId,
      kind: 'package',
      outcome: 'rejected',
      reason: pkg.error.message,
    }));
    const acceptedItems: ItemOutcome[] = planned.map((plan): ItemOutcome => ({
      id: plan.packageId,
      kind: 'package',
      outcome: 'accepted',
    }));

    if (planned.length === 0) {
      return {
        operation: 'create_media_buy',
        payload: { buyerRef, packages: results },
        items: rejectedItems,
        errors: [],
      };
    }

    const mediaBuyId = `mb_${this.idFn()}`;
    const currency = params.currency || 'USD';
    const record: MediaBuyRecord = {
      mediaBuyId,
      tenantId,
      buyerRef,
      status: 'active',
      startTime: params.startTime,
      endTime: params.endTime,
      totalBudget: params.budget,
      currency,
      targeting: accessOutcome.overlay,
      packages: planned.map((plan) => ({ ...plan })),
      rejectedPackages: rejected,
      requestFingerprint: fingerprint,
      creatives: [],
      createdAt: this.nowFn().toISOString(),
    };

    if (tenant.manualApprovalRequired) {
      const workflowStepId = `ws_${this.idFn()}`;
      await this.repository.save({ ...record, status: 'pending_approval', workflowStepId });
      logger.info('Media buy awaiting manual approval', { tenantId, mediaBuyId, workflowStepId });
      return {
        operation: 'create_media_buy',
        payload: {
          buyerRef,
          mediaBuyId,
          workflowStepId,
          packages: [
            ...planned.map((plan): PackageResult => ({
              packageId: plan.packageId,
              productId: plan.productId,
              status: 'pending_approval',
              formatIds: plan.formatIds,
              placeholders: plan.slots.map((slot) => describeSlot(slot)),
            })),
            ...results,
          ],
        },
        items: [...acceptedItems, ...rejectedItems],
        errors: [],
        pending: { reason: 'awaiting manual approval by the publisher', workflowStepId },
      };
    }

    const lineItems: LineItemSpec[] = planned.map((plan) => ({
      packageId: plan.packageId,
      productId: plan.productId,
      formatIds: plan.formatIds,
      placeholders: plan.slots,
      targeting: translation.targeting,
      budget: plan.budget,
    }));

    const order = await this.applyOrder({
      tenantId,
      backend: tenant.adServer,
      idempotencyKey: `${tenantId}:${buyerRef}`,
      buyerRef,
      orderName: `${buyerRef} (${mediaBuyId})`,
      startTime: params.startTime,
      endTime: params.endTime,
      totalBudget: params.budget,
      currency,
      lineItems,
    });
    if (!order.ok) {
      return {
        operation: 'create_media_buy',
        payload: { buyerRef, packages: results },
        items: [...acceptedItems, ...rejectedItems],
        errors: [order.error.toDomainError()],
      };
    }
    const applied = order.applied;

    const packages: StoredPackage[] = planned.map((plan) => ({
      ...plan,
      lineItemId: applied.lineItemIds[plan.packageId],
    }));
    await this.repository.save({ ...record, orderId: applied.orderId, packages });
    logger.info('Media buy created', { tenantId, mediaBuyId, orderId: applied.orderId });

    return {
      operation: 'create_media_buy',
      payload: {
        buyerRef,
        mediaBuyId,
        orderId: applied.orderId,
        packages: [
          ...packages.map((pkg): PackageResult => ({
            packageId: pkg.packageId,
            productId: pkg.productId,
            status: 'created',
            formatIds: pkg.formatIds,
            placeholders: pkg.slots.map((slot) => describeSlot(slot)),
            lineItemId: pkg.lineItemId,
          })),
          ...results,
        ],
      },
      items: [...acceptedItems, ...rejectedItems],
      errors: [],
      summary: `Media buy ${mediaBuyId} created.`,
    };
  }

  async syncCreatives(params: SyncCreativesParams): Promise<DomainResult<SyncCreativesPayload>> {
    const { tenantId, mediaBuyId } = params;
    const record = await this.repository.get(tenantId, mediaBuyId);
    if (!record) {
      return {
        operation: 'sync_creatives',
        payload: { mediaBuyId, creatives: [] },
        items: [],
        errors: [new MediaBuyNotFoundError(mediaBuyId).toDomainError()],
      };
    }

    const awaitingApproval = record.status === 'pending_approval';
    const packagesById = new Map<string, StoredPackage>(record.packages.map((pkg) => [pkg.packageId, pkg]));
    const creatives: CreativeResult[] = [];
    const items: ItemOutcome[] = [];
    const errors: DomainError[] = [];

    for (const creative of params.creatives) {
      const result = await this.syncCreative(record, packagesById, creative, awaitingApproval, errors);
      creatives.push(result);
      items.push({
        id: creative.creativeId,
        kind: 'creative',
        outcome: result.status === 'rejected' ? 'rejected' : 'accepted',
        reason: result.error?.message,
      });
    }

    return {
      operation: 'sync_creatives',
      payload: { mediaBuyId, creatives },
      items,
      errors,
      pending: awaitingApproval
        ? {
            reason: 'media buy is awaiting manual approval; creatives will be associated once approved',
            workflowStepId: record.workflowStepId,
          }
        : undefined,
    };
  }

  async getMediaBuy(params: GetMediaBuyParams): Promise<DomainResult<GetMediaBuyPayload>> {
    const record = await this.repository.get(params.tenantId, params.mediaBuyId);
    if (!record) {
      return {
        operation: 'get_media_buy',
        payload: {},
        items: [],
        errors: [new MediaBuyNotFoundError(params.mediaBuyId).toDomainError()],
      };
    }
    return {
      operation: 'get_media_buy',
      payload: { mediaBuy: toView(record) },
      items: [],
      errors: [],
      summary: `Media buy ${record.mediaBuyId} has ${record.packages.length} package${
        record.packages.length === 1 ? '' : 's'
      }.`,
    };
  }

  listCreativeFormats(params: ListCreativeFormatsParams): DomainResult<ListCreativeFormatsPayload> {
    const { tenantId, ...filter } = params;
    const formats = this.resolver.listAvailable(tenantId, filter);
    return {
      operation: 'list_creative_formats',
      payload: { formats },
      items: [],
      errors: [],
      summary: `Found ${formats.length} creative format${formats.length === 1 ? '' : 's'}.`,
    };
  }

  private async applyOrder(
    spec: OrderSpec
  ): Promise<{ ok: true; applied: AppliedLineItems } | { ok: false; error: UpstreamAdServerError }> {
    try {
      return { ok: true, applied: await this.adServer.applyLineItems(spec) };
    } catch (error) {
      if (!(error instanceof UpstreamAdServerError)) throw error;
      logger.error('Ad server rejected order', {
        tenantId: spec.tenantId,
        buyerRef: spec.buyerRef,
        error: error.message,
        timedOut: error.timedOut,
      });
      return { ok: false, error };
    }
  }

  private planPackage(
    tenantId: string,
    backend: string,
    packageId: string,
    request: PackageRequest
  ): { ok: true; plan: PlannedPackage } | { ok: false; error: DomainError } {
    const product = this.storage.getProduct(tenantId, request.productId);
    if (!product) {
      return {
        ok: false,
        error: {
          code: 'UNKNOWN_PRODUCT',
          message: `Product '${request.productId}' is not offered by this tenant`,
          recoverable: false,
          details: { productId: request.productId },
        },
      };
    }

    const formatIds = request.formatIds && request.formatIds.length > 0 ? request.formatIds : product.formatIds;
    const unsupported = formatIds.filter((formatId) => !product.formatIds.includes(formatId));
    if (unsupported.length > 0) {
      return {
        ok: false,
        error: {
          code: 'FORMAT_NOT_IN_PRODUCT',
          message: `Product '${product.productId}' does not offer formats: ${unsupported.join(', ')}`,
          recoverable: false,
          details: { productId: product.productId, formatIds: unsupported },
        },
      };
    }

    const slots: PlaceholderSlot[] = [];
    for (const formatId of formatIds) {
      const resolved = this.resolver.resolve(formatId, { tenantId, productId: product.productId });
      if (!resolved.ok) return { ok: false, error: resolved.error.toDomainError() };
      slots.push(...deriveSlots(resolved.format, backend));
    }

    return {
      ok: true,
      plan: { packageId, productId: product.productId, formatIds, slots, budget: request.budget },
    };
  }

  private async syncCreative(
    record: MediaBuyRecord,
    packagesById: Map<string, StoredPackage>,
    creative: CreativeSubmission,
    awaitingApproval: boolean,
    errors: DomainError[]
  ): Promise<CreativeResult> {
    const { tenantId, mediaBuyId } = record;
    const backend = getTenantConfig(this.env, tenantId).adServer;
    const creativeType = classifyCreative(creative);
    const assignmentErrors: Record<string, string> = {};
    const rejected = (error: DomainError): CreativeResult => ({
      creativeId: creative.creativeId,
      status: 'rejected',
      creativeType,
      assignedTo: [],
      assignmentErrors,
      error,
    });

    const assigned: StoredPackage[] = [];
    for (const packageId of creative.packageIds) {
      const pkg = packagesById.get(packageId);
      if (pkg) assigned.push(pkg);
      else assignmentErrors[packageId] = `Package '${packageId}' is not part of media buy ${mediaBuyId}`;
    }

    const resolved = this.resolver.resolve(creative.formatId, {
      tenantId,
      productId: assigned[0]?.productId,
    });
    if (!resolved.ok) return rejected(resolved.error.toDomainError());

    const dimensions =
      creative.width && creative.height
        ? { width: creative.width, height: creative.height }
        : isMeasurable(creativeType)
          ? resolveCreativeDimensions(creative, resolved.format)
          : undefined;
    const asset: CreativeAsset = {
      creativeId: creative.creativeId,
      mediaKind: resolved.format.mediaKind,
      width: dimensions?.width,
      height: dimensions?.height,
      thirdPartyUrl: creativeType === 'third_party_tag' ? creative.snippet : undefined,
    };

    const packageSlots: PackageSlots[] = assigned.map((pkg) => ({ packageId: pkg.packageId, slots: pkg.slots }));
    const validation = validateCreative(asset, packageSlots);
    if (!validation.accepted) {
      for (const pkg of assigned) {
        await this.repository.upsertCreative(tenantId, mediaBuyId, {
          creativeId: creative.creativeId,
          packageId: pkg.packageId,
          status: 'rejected',
        });
      }
      return rejected(validation.error.toDomainError());
    }

    const assignedTo: string[] = [];
    let associationFailure: DomainError | undefined;
    for (const pkg of assigned) {
      const fit = validateCreative(asset, [{ packageId: pkg.packageId, slots: pkg.slots }]);
      if (!fit.accepted) {
        assignmentErrors[pkg.packageId] = fit.error.message;
        continue;
      }

      if (awaitingApproval || !pkg.lineItemId) {
        await this.repository.upsertCreative(tenantId, mediaBuyId, {
          creativeId: creative.creativeId,
          packageId: pkg.packageId,
          status: 'pending',
        });
        assignedTo.push(pkg.packageId);
        continue;
      }

      try {
        const association = await this.adServer.associateCreative({
          tenantId,
          backend,
          idempotencyKey: `${mediaBuyId}:${creative.creativeId}:${pkg.packageId}`,
          creativeId: creative.creativeId,
          creativeType,
          packageId: pkg.packageId,
          lineItemId: pkg.lineItemId,
          slot: fit.matchedSlot,
          name: creative.name,
          mediaUrl: creative.mediaUrl,
          clickUrl: creative.clickUrl,
          snippet: creative.snippet,
          snippetType: creative.snippetType,
          width: asset.width,
          height: asset.height,
        });
        await this.repository.upsertCreative(tenantId, mediaBuyId, {
          creativeId: creative.creativeId,
          packageId: pkg.packageId,
          status: 'approved',
          adServerCreativeId: association.adServerCreativeId,
          associationId: association.associationId,
        });
        assignedTo.push(pkg.packageId);
      } catch (error) {
        if (!(error instanceof UpstreamAdServerError)) throw error;
        logger.warn('Creative association failed', {
          tenantId,
          mediaBuyId,
          creativeId: creative.creativeId,
          packageId: pkg.packageId,
          error: error.message,
        });
        assignmentErrors[pkg.packageId] = error.message;
        associationFailure = error.toDomainError();
        if (error.recoverable) errors.push(associationFailure);
      }
    }

    if (assignedTo.length === 0 && associationFailure && !associationFailure.recoverable) {
      return rejected(associationFailure);
    }

    return {
      creativeId: creative.creativeId,
      status: awaitingApproval || assignedTo.length === 0 ? 'pending' : 'approved',
      creativeType,
      assignedTo,
      assignmentErrors,
      matchedSlot: describeSlot(validation.matchedSlot),
    };
  }

  private replayCreate(record: MediaBuyRecord): DomainResult<CreateMediaBuyPayload> {
    const pending = record.status === 'pending_approval';
    return {
      operation: 'create_media_buy',
      payload: {
        buyerRef: record.buyerRef,
        mediaBuyId: record.mediaBuyId,
        orderId: record.orderId,
        workflowStepId: record.workflowStepId,
        replayed: true,
        packages: [
          ...record.packages.map((pkg): PackageResult => ({
            packageId: pkg.packageId,
            productId: pkg.productId,
            status: pending ? 'pending_approval' : 'created',
            formatIds: [...pkg.formatIds],
            placeholders: pkg.slots.map((slot) => describeSlot(slot)),
            lineItemId: pkg.lineItemId,
          })),
          ...record.rejectedPackages.map((pkg) =>
            rejectedPackage(pkg.packageId, pkg.productId, pkg.formatIds, pkg.error)
          ),
        ],
      },
      items: [
        ...record.packages.map((pkg): ItemOutcome => ({ id: pkg.packageId, kind: 'package', outcome: 'accepted' })),
        ...record.rejectedPackages.map(
          (pkg): ItemOutcome => ({ id: pkg.packageId, kind: 'package', outcome: 'rejected', reason: pkg.error.message })
        ),
      ],
      errors: [],
      pending: pending
        ? { reason: 'awaiting manual approval by the publisher', workflowStepId: record.workflowStepId }
        : undefined,
      summary: pending ? undefined : `Media buy ${record.mediaBuyId} created.`,
    };
  }
}
