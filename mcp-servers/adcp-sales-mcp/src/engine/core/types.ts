export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export type MediaKind = 'display' | 'video' | 'audio' | 'native';

export interface FormatRequirements {
  width?: number;
  height?: number;
  minDurationMs?: number;
  maxDurationMs?: number;
  minFileSizeKb?: number;
  maxFileSizeKb?: number;
}

/** Per ad-server backend key/value block, e.g. `{ gam: { creative_placeholder: {...} } }`. */
export type PlacementConfig = Record<string, JsonObject>;

export interface FormatDefinition {
  formatId: string;
  name: string;
  mediaKind: MediaKind;
  requirements: FormatRequirements;
  platformConfig: PlacementConfig;
}

export interface PartialFormatDefinition {
  formatId: string;
  name?: string;
  mediaKind?: MediaKind;
  requirements?: FormatRequirements;
  platformConfig?: PlacementConfig;
}

export type FormatScope = 'product' | 'tenant' | 'standard';

export interface ResolutionContext {
  tenantId?: string;
  productId?: string;
}

export type PlaceholderSlot =
  | { kind: 'exact'; width: number; height: number; expectedCreativeCount?: number }
  | { kind: 'native_template'; templateId: string; expectedCreativeCount?: number }
  | { kind: 'programmatic_wildcard'; expectedCreativeCount?: number };

export interface PackageSlots {
  packageId: string;
  slots: readonly PlaceholderSlot[];
}

export type CreativeStatus = 'pending' | 'approved' | 'rejected';

export interface CreativeAsset {
  creativeId: string;
  mediaKind?: MediaKind;
  /** Measured, or declared when the asset cannot be measured (third-party tags). */
  width?: number;
  height?: number;
  thirdPartyUrl?: string;
}

export type AccessClass = 'overlay' | 'managed_only' | 'hybrid';

export type TargetingValue = JsonValue;
export type TargetingOverlay = Readonly<Record<string, TargetingValue>>;

export type OperationName =
  | 'create_media_buy'
  | 'sync_creatives'
  | 'get_media_buy'
  | 'list_creative_formats';

export type ItemKind = 'package' | 'creative';

export interface ItemOutcome {
  id: string;
  kind: ItemKind;
  outcome: 'accepted' | 'rejected';
  reason?: string;
}

export interface DomainError {
  code: string;
  message: string;
  recoverable: boolean;
  details?: JsonObject;
}

export interface PendingWork {
  reason: string;
  workflowStepId?: string;
}

/** Business outcome of an operation. Carries no transport status, task id or message. */
export interface DomainResult<TPayload extends object = JsonObject> {
  operation: OperationName;
  payload: TPayload;
  items: ItemOutcome[];
  errors: DomainError[];
  pending?: PendingWork;
  summary?: string;
}

export type EnvelopeStatus = 'completed' | 'partial' | 'pending' | 'failed';
export type TransportKind = 'tool_call' | 'task_artifact';

export interface ProtocolEnvelope<TPayload extends object = JsonObject> {
  transport: TransportKind;
  status: EnvelopeStatus;
  message: string;
  correlationId?: string;
  result: DomainResult<TPayload>;
}

export interface AttemptedSlot {
  packageId: string;
  slot: PlaceholderSlot;
}

export interface SearchedScope {
  scope: FormatScope;
  key: string;
}

export abstract class AdcpDomainError extends Error {
  abstract readonly code: string;

  get recoverable(): boolean {
    return false;
  }

  abstract get details(): JsonObject;

  toDomainError(): DomainError {
    return {
      code: this.code,
      message: this.message,
      recoverable: this.recoverable,
      details: this.details,
    };
  }
}

export class UnknownFormatError extends AdcpDomainError {
  readonly code = 'UNKNOWN_FORMAT';
  readonly formatId: string;
  readonly searchedScopes: SearchedScope[];

  constructor(formatId: string, searchedScopes: SearchedScope[]) {
    const searched = searchedScopes.map((entry) => `${entry.scope}(${entry.key})`).join(', ');
    super(`Unknown format_id '${formatId}'; searched ${searched}`);
    this.name = 'UnknownFormatError';
    this.formatId = formatId;
    this.searchedScopes = searchedScopes;
  }

  get details(): JsonObject {
    return {
      formatId: this.formatId,
      searchedScopes: this.searchedScopes.map((entry) => ({ scope: entry.scope, key: entry.key })),
    };
  }
}

export function describeSlot(slot: PlaceholderSlot): string {
  switch (slot.kind) {
    case 'exact':
      return `${slot.width}x${slot.height}`;
    case 'native_template':
      return `1x1 (native template ${slot.templateId})`;
    case 'programmatic_wildcard':
      return '1x1 (programmatic)';
  }
}

function serializeAttempted(attempted: AttemptedSlot[]): JsonValue[] {
  return attempted.map((entry) => ({
    packageId: entry.packageId,
    slot: describeSlot(entry.slot),
  }));
}

export class NoPlaceholdersConfiguredError extends AdcpDomainError {
  readonly code = 'NO_PLACEHOLDERS_CONFIGURED';
  readonly creativeId: string;
  readonly packageIds: string[];

  constructor(creativeId: string, packageIds: string[]) {
    super(
      packageIds.length > 0
        ? `Creative ${creativeId}: no placeholders configured on assigned packages ${packageIds.join(', ')}`
        : `Creative ${creativeId} is not assigned to any package with placeholders`
    );
    this.name = 'NoPlaceholdersConfiguredError';
    this.creativeId = creativeId;
    this.packageIds = packageIds;
  }

  get details(): JsonObject {
    return { creativeId: this.creativeId, packageIds: [...this.packageIds], attemptedSlots: [] };
  }
}

export class SlotMismatchError extends AdcpDomainError {
  readonly code = 'SLOT_MISMATCH';
  readonly creativeId: string;
  readonly assetSize: string;
  readonly attemptedSlots: AttemptedSlot[];
  readonly packagesWithoutPlaceholders: string[];

  constructor(
    creativeId: string,
    assetSize: string,
    attemptedSlots: AttemptedSlot[],
    packagesWithoutPlaceholders: string[] = []
  ) {
    const tried = attemptedSlots.map((entry) => describeSlot(entry.slot)).join(', ');
    super(`Creative ${creativeId} size ${assetSize} does not match any of: ${tried}`);
    this.name = 'SlotMismatchError';
    this.creativeId = creativeId;
    this.assetSize = assetSize;
    this.attemptedSlots = attemptedSlots;
    this.packagesWithoutPlaceholders = packagesWithoutPlaceholders;
  }

  get details(): JsonObject {
    return {
      creativeId: this.creativeId,
      assetSize: this.assetSize,
      attemptedSlots: serializeAttempted(this.attemptedSlots),
      packagesWithoutPlaceholders: [...this.packagesWithoutPlaceholders],
    };
  }
}

export class ManagedOnlyViolationError extends AdcpDomainError {
  readonly code = 'MANAGED_ONLY_VIOLATION';
  readonly dimension: string;

  constructor(dimension: string) {
    super(`Targeting dimension '${dimension}' is managed-only and cannot be set by the caller`);
    this.name = 'ManagedOnlyViolationError';
    this.dimension = dimension;
  }

  get details(): JsonObject {
    return { dimension: this.dimension };
  }
}

export class UnknownTargetingDimensionError extends AdcpDomainError {
  readonly code = 'UNKNOWN_TARGETING_DIMENSION';
  readonly dimension: string;

  constructor(dimension: string) {
    super(`Targeting dimension '${dimension}' is not recognised`);
    this.name = 'UnknownTargetingDimensionError';
    this.dimension = dimension;
  }

  get details(): JsonObject {
    return { dimension: this.dimension };
  }
}

export class MediaBuyNotFoundError extends AdcpDomainError {
  readonly code = 'MEDIA_BUY_NOT_FOUND';
  readonly mediaBuyId: string;

  constructor(mediaBuyId: string) {
    super(`Media buy '${mediaBuyId}' not found`);
    this.name = 'MediaBuyNotFoundError';
    this.mediaBuyId = mediaBuyId;
  }

  get details(): JsonObject {
    return { mediaBuyId: this.mediaBuyId };
  }
}

/** A buyer_ref may only be repeated with the request that first used it. */
export class BuyerRefConflictError extends AdcpDomainError {
  readonly code = 'BUYER_REF_CONFLICT';
  readonly buyerRef: string;
  readonly mediaBuyId: string;

  constructor(buyerRef: string, mediaBuyId: string) {
    super(`buyer_ref '${buyerRef}' was already used for media buy ${mediaBuyId} with a different request`);
    this.name = 'BuyerRefConflictError';
    this.buyerRef = buyerRef;
    this.mediaBuyId = mediaBuyId;
  }

  get details(): JsonObject {
    return { buyerRef: this.buyerRef, mediaBuyId: this.mediaBuyId };
  }
}

export interface TargetingIssue {
  dimension: string;
  reason: string;
}

export class UnsupportedTargetingError extends AdcpDomainError {
  readonly code = 'UNSUPPORTED_TARGETING';
  readonly backend: string;
  readonly issues: TargetingIssue[];

  constructor(backend: string, issues: TargetingIssue[]) {
    super(
      `Targeting cannot be fulfilled by ${backend}: ${issues
        .map((issue) => `${issue.dimension} (${issue.reason})`)
        .join('; ')}`
    );
    this.name = 'UnsupportedTargetingError';
    this.backend = backend;
    this.issues = issues;
  }

  get details(): JsonObject {
    return {
      backend: this.backend,
      issues: this.issues.map((issue) => ({ dimension: issue.dimension, reason: issue.reason })),
    };
  }
}

export class UpstreamAdServerError extends AdcpDomainError {
  readonly code = 'UPSTREAM_AD_SERVER_ERROR';
  readonly status?: number;
  readonly attempt: number;
  readonly isRetryable: boolean;
  readonly timedOut: boolean;

  constructor(
    message: string,
    options: { status?: number; isRetryable: boolean; attempt: number; timedOut?: boolean }
  ) {
    super(message);
    this.name = 'UpstreamAdServerError';
    this.status = options.status;
    this.attempt = options.attempt;
    this.isRetryable = options.isRetryable;
    this.timedOut = Boolean(options.timedOut);
  }

  // A timed-out call may still land on the ad server; the outcome is unknown, not failed.
  get recoverable(): boolean {
    return this.timedOut;
  }

  get details(): JsonObject {
    const details: JsonObject = {
      attempt: this.attempt,
      retryable: this.isRetryable,
      timedOut: this.timedOut,
    };
    if (this.status != null) details.status = this.status;
    return details;
  }
}

/** Malformed targeting classification table. Fatal: aborts the request. */
export class TargetingClassificationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TargetingClassificationError';
  }
}

/** Corrupted format registry or catalog entry. Fatal: aborts the request. */
export class FormatRegistryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FormatRegistryError';
  }
}
