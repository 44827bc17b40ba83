import type {
  CreativeStatus,
  DomainError,
  PlaceholderSlot,
  TargetingOverlay,
} from '../engine/core/types.js';

export type MediaBuyStatus = 'active' | 'pending_approval';

export interface StoredPackage {
  packageId: string;
  productId: string;
  formatIds: string[];
  /** Fixed when the line item is created; changing slots means recreating the package. */
  slots: readonly PlaceholderSlot[];
  lineItemId?: string;
  budget?: number;
}

/** A package turned away at creation; kept so a repeated request reports it again. */
export interface RejectedPackage {
  packageId: string;
  productId: string;
  formatIds: string[];
  error: DomainError;
}

export interface CreativeAssignment {
  creativeId: string;
  packageId: string;
  status: CreativeStatus;
  adServerCreativeId?: string;
  associationId?: string;
}

export interface MediaBuyRecord {
  mediaBuyId: string;
  tenantId: string;
  buyerRef: string;
  status: MediaBuyStatus;
  orderId?: string;
  workflowStepId?: string;
  startTime: string;
  endTime: string;
  totalBudget: number;
  currency: string;
  targeting: TargetingOverlay;
  packages: StoredPackage[];
  rejectedPackages: RejectedPackage[];
  /** Hash of the create request, compared when the buyer_ref is reused. */
  requestFingerprint: string;
  creatives: CreativeAssignment[];
  createdAt: string;
}

/** Persistence seam for media buys. Implementations must keep package slots immutable. */
export interface MediaBuyRepository {
  findByBuyerRef(tenantId: string, buyerRef: string): Promise<MediaBuyRecord | undefined>;
  get(tenantId: string, mediaBuyId: string): Promise<MediaBuyRecord | undefined>;
  save(record: MediaBuyRecord): Promise<void>;
  upsertCreative(tenantId: string, mediaBuyId: string, assignment: CreativeAssignment): Promise<void>;
}

function freezePackages(packages: StoredPackage[]): StoredPackage[] {
  return packages.map((pkg) => ({ ...pkg, slots: Object.freeze(pkg.slots.map((slot) => Object.freeze({ ...slot }))) }));
}

export class InMemoryMediaBuyRepository implements MediaBuyRepository {
  private readonly records = new Map<string, MediaBuyRecord>();

  private key(tenantId: string, mediaBuyId: string): string {
    return `${tenantId}:${mediaBuyId}`;
  }

  async findByBuyerRef(tenantId: string, buyerRef: string): Promise<MediaBuyRecord | undefined> {
    for (const record of this.records.values()) {
      if (record.tenantId === tenantId && record.buyerRef === buyerRef) return structuredClone(record);
    }
    return undefined;
  }

  async get(tenantId: string, mediaBuyId: string): Promise<MediaBuyRecord | undefined> {
    const record = this.records.get(this.key(tenantId, mediaBuyId));
    return record ? structuredClone(record) : undefined;
  }

  async save(record: MediaBuyRecord): Promise<void> {
    const existing = this.records.get(this.key(record.tenantId, record.mediaBuyId));
    const stored = structuredClone(record);
    stored.packages = freezePackages(existing ? existing.packages : stored.packages);
    this.records.set(this.key(record.tenantId, record.mediaBuyId), stored);
  }

  async upsertCreative(tenantId: string, mediaBuyId: string, assignment: CreativeAssignment): Promise<void> {
    const record = this.records.get(this.key(tenantId, mediaBuyId));
    if (!record) {
      throw new Error(`Media buy ${mediaBuyId} not found for tenant ${tenantId}`);
    }
    const index = record.creatives.findIndex(
      (entry) => entry.creativeId === assignment.creativeId && entry.packageId === assignment.packageId
    );
    if (index >= 0) {
      record.creatives[index] = { ...assignment };
    } else {
      record.creatives.push({ ...assignment });
    }
  }
}
