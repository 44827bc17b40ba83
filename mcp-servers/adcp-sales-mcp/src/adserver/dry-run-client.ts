import { createHash } from 'crypto';
import { logger } from '../utils/logger.js';
import type {
  AdServerClient,
  AppliedLineItems,
  AssociationResult,
  CreativeAssociationSpec,
  OrderSpec,
} from './ad-server-client.js';

function shortHash(input: string): string {
  return createHash('sha256').update(input).digest('hex').slice(0, 12);
}

/** Logs what would be sent and returns ids derived from the idempotency key. */
export class DryRunAdServerClient implements AdServerClient {
  async applyLineItems(spec: OrderSpec): Promise<AppliedLineItems> {
    const orderId = `dry_order_${shortHash(spec.idempotencyKey)}`;
    const lineItemIds: Record<string, string> = {};
    for (const lineItem of spec.lineItems) {
      lineItemIds[lineItem.packageId] = `dry_li_${shortHash(`${spec.idempotencyKey}:${lineItem.packageId}`)}`;
    }

    logger.info('Dry run: would apply order and line items', {
      tenantId: spec.tenantId,
      orderName: spec.orderName,
      orderId,
      lineItems: spec.lineItems.length,
    });
    return { orderId, lineItemIds };
  }

  async associateCreative(spec: CreativeAssociationSpec): Promise<AssociationResult> {
    const adServerCreativeId = `dry_creative_${shortHash(`${spec.tenantId}:${spec.creativeId}`)}`;
    const associationId = `dry_lica_${shortHash(spec.idempotencyKey)}`;

    logger.info('Dry run: would associate creative', {
      tenantId: spec.tenantId,
      creativeId: spec.creativeId,
      lineItemId: spec.lineItemId,
      creativeType: spec.creativeType,
    });
    return { adServerCreativeId, associationId };
  }
}
