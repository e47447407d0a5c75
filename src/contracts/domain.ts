// src/contracts/domain.ts

// Enums
export type FunnelType = 'language' | 'non_language';

export const FUNNEL_TYPES: readonly FunnelType[] = ['language', 'non_language'] as const;

export type OutboxStatus = 'pending' | 'success' | 'error';

export const OUTBOX_STATUSES: readonly OutboxStatus[] = ['pending', 'success', 'error'] as const;

export type OperationType = 'upsert_contact' | 'update_after_purchase';

export const OPERATION_TYPES: readonly OperationType[] = [
  'upsert_contact',
  'update_after_purchase',
] as const;

export function isFunnelType(v: unknown): v is FunnelType {
  return typeof v === 'string' && (FUNNEL_TYPES as readonly string[]).includes(v);
}

export function isOutboxStatus(v: unknown): v is OutboxStatus {
  return typeof v === 'string' && (OUTBOX_STATUSES as readonly string[]).includes(v);
}

export function isOperationType(v: unknown): v is OperationType {
  return typeof v === 'string' && (OPERATION_TYPES as readonly string[]).includes(v);
}

// Brevo contact attribute values are flat scalars
export type AttributeValue = string | number | boolean | null;
export type ContactAttributes = Record<string, AttributeValue>;

// SQLite rows (snake_case)
export interface FunnelEntryRow {
  id: number;
  email: string;
  funnel_type: FunnelType;
  user_id: number | null;
  test_id: number | null;
  entered_at: number;                       // seconds
  certificate_purchased: number;            // 0/1
  certificate_purchased_at: number | null;  // seconds
}

export interface OutboxJobRow {
  id: number;
  funnel_entry_id: number;
  // kept as string: rows written by older releases may carry unknown operations
  operation_type: string;
  payload: string;                          // JSON snapshot taken at enqueue time
  status: OutboxStatus;
  retry_count: number;
  last_error: string | null;
  created_at: number;                       // seconds
  updated_at: number;                       // seconds
}

// Store inputs/outputs (camelCase)
export interface NewFunnelEntry {
  email: string;
  funnelType: FunnelType;
  userId?: number | null;
  testId?: number | null;
}

export type CreateResult =
  | { created: true; id: number }
  | { created: false };

export interface PendingFunnelEntry {
  id: number;
  email: string;
  funnelType: FunnelType;
  userId: number | null;
  testId: number | null;
}

export interface FunnelConversion {
  funnelType: FunnelType;
  totalEntries: number;
  totalPurchased: number;
  conversionRate: number;                   // 0..1
}

// External collaborators
export interface FunnelCandidate {
  userId: number | null;
  testId: number | null;
  email: string;
}

export interface PurchaseRecord {
  orderRef: number;
  /** Raw value as the purchase source produced it; validated by the caller. */
  purchasedAt: unknown;
}

// Gateway DTOs
export interface BrevoContact {
  email: string;
  listIds: number[];
  attributes: ContactAttributes;
  updateEnabled: boolean;
}

export type ContactUpsertResponse = Record<string, unknown>;

// Run summaries
export interface OutboxRunSummary {
  processed: number;
  succeeded: number;
  failed: number;
  /** Set when another run held the worker and this one did nothing. */
  skipped?: true;
}

export interface IntakeSummary {
  funnelType: FunnelType;
  listId: number;
  fetched: number;
  created: number;
  skipped: number;
  enqueued: number;
}

export interface PurchaseSyncSummary {
  scanned: number;
  purchasesFound: number;
  entriesUpdated: number;
  enqueued: number;
}
