import type {
  CreativeStatus,
  DomainError,
  FormatDefinition,
  TargetingOverlay,
  TargetingValue,
} from '../engine/core/types.js';
import type { CreativeSubmission, CreativeType } from '../engine/creative-assets.js';
import type { FormatFilter } from '../engine/format-resolver.js';
import type { MediaBuyStatus } from '../services/media-buy-repository.js';

export interface PackageRequest {
  packageId?: string;
  productId: string;
  formatIds?: string[];
  budget?: number;
}

export interface CreateMediaBuyParams {
  tenantId: string;
  buyerRef: string;
  packages: PackageRequest[];
  targetingOverlay?: Record<string, TargetingValue>;
  startTime: string;
  endTime: string;
  budget: number;
  currency?: string;
}

export interface SyncCreativesParams {
  tenantId: string;
  mediaBuyId: string;
  creatives: CreativeSubmission[];
}

export interface GetMediaBuyParams {
  tenantId: string;
  mediaBuyId: string;
}

export interface ListCreativeFormatsParams extends FormatFilter {
  tenantId?: string;
}

export interface PackageResult {
  packageId: string;
  productId: string;
  status: 'created' | 'pending_approval' | 'rejected';
  formatIds: string[];
  placeholders: string[];
  lineItemId?: string;
  error?: DomainError;
}

export interface CreateMediaBuyPayload {
  buyerRef: string;
  mediaBuyId?: string;
  orderId?: string;
  workflowStepId?: string;
  replayed?: boolean;
  packages: PackageResult[];
}

export interface CreativeResult {
  creativeId: string;
  status: CreativeStatus;
  creativeType: CreativeType;
  assignedTo: string[];
  assignmentErrors: Record<string, string>;
  matchedSlot?: string;
  error?: DomainError;
}

export interface SyncCreativesPayload {
  mediaBuyId: string;
  creatives: CreativeResult[];
}

export interface MediaBuyView {
  mediaBuyId: string;
  buyerRef: string;
  status: MediaBuyStatus;
  orderId?: string;
  workflowStepId?: string;
  startTime: string;
  endTime: string;
  totalBudget: number;
  currency: string;
  targeting: TargetingOverlay;
  packages: Array<{
    packageId: string;
    productId: string;
    formatIds: string[];
    placeholders: string[];
    lineItemId?: string;
    budget?: number;
  }>;
  creatives: Array<{ creativeId: string; packageId: string; status: CreativeStatus }>;
}

export interface GetMediaBuyPayload {
  mediaBuy?: MediaBuyView;
}

export interface ListCreativeFormatsPayload {
  formats: FormatDefinition[];
}
