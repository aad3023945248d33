/**
 * Processor contract: every processor returns a Result describing the
 * mutation it applied, or why it could not apply one.
 */

import type { Database } from '../db/index';
import type { NotificationService } from '../notifications/index';
import type { MatcherOptions } from '../matching/sale-matcher';
import type { EndReason, MatchMethod, SaleStatus } from '../types';
import type { Result } from '../utils/result';

export interface ProcessorContext {
  db: Database;
  userId: string;
  /** Wall clock at processing time; also the event time when the payload has none. */
  now: number;
  notifications: NotificationService;
  matcher: MatcherOptions;
}

export type NoopReason = 'stale' | 'orphan' | 'unchanged' | 'already_ended';

export type Mutation =
  | { kind: 'item_created'; itemId: string }
  | { kind: 'item_reactivated'; itemId: string }
  | { kind: 'item_updated'; itemId: string; fields: string[] }
  | { kind: 'item_ended'; itemId: string; endReason: EndReason }
  | { kind: 'item_out_of_stock'; itemId: string }
  | { kind: 'sale_created'; saleId: string; itemId: string | null; matchMethod: MatchMethod | null }
  | { kind: 'sale_updated'; saleId: string; status: SaleStatus; fields: string[] }
  | { kind: 'noop'; reason: NoopReason; objectId: string };

export interface ProcessorFailure {
  reason: 'conflict' | 'invalid_event';
  message: string;
}

export type ProcessorResult = Result<Mutation, ProcessorFailure>;
