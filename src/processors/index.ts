/**
 * Event processors - apply one normalized marketplace event to local state
 *
 * Every processor is idempotent: replaying an event it has already applied
 * yields a noop mutation and leaves the database unchanged.
 */

import type { MarketplaceEvent } from '../types';
import { processEnded, processListed, processOutOfStock, processRevised } from './items';
import { processDelivered, processShipped, processSold } from './orders';
import type { ProcessorContext, ProcessorResult } from './types';

export type { Mutation, NoopReason, ProcessorContext, ProcessorFailure, ProcessorResult } from './types';
export { applySale, type IncomingOrder } from './apply-sale';

export function processEvent(ctx: ProcessorContext, event: MarketplaceEvent): ProcessorResult {
  switch (event.topic) {
    case 'item_listed':
    case 'item_relisted':
      return processListed(ctx, event);
    case 'item_revised':
      return processRevised(ctx, event);
    case 'item_ended':
      return processEnded(ctx, event);
    case 'item_out_of_stock':
      return processOutOfStock(ctx, event);
    case 'item_sold':
      return processSold(ctx, event);
    case 'order_shipped':
      return processShipped(ctx, event);
    case 'order_delivered':
      return processDelivered(ctx, event);
  }
}
