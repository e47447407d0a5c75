// src/db/OutboxStore.ts
import type Database from 'better-sqlite3';

import type { IOutboxStore } from '../contracts/dao';
import type { OperationType, OutboxJobRow, OutboxStatus } from '../contracts/domain';
import { isOperationType, OUTBOX_STATUSES } from '../contracts/domain';

const nowSec = () => Math.floor(Date.now() / 1000);

const MAX_ERROR_LENGTH = 2000;

/**
 * Durable job table behind the Brevo sync.
 *
 * Reading pending jobs and recording their outcome are separate steps: there is
 * no claim/lock, so a crash between the two leaves the job PENDING for the next
 * run (at-least-once). Outcome transitions only apply to PENDING rows, which makes
 * repeated marks no-ops.
 */
export class OutboxStore implements IOutboxStore {
  constructor(
    private readonly db: Database.Database,
    private readonly clock: () => number = nowSec,
  ) {}

  enqueue(funnelEntryId: number, operationType: OperationType, payload: object): number {
    if (!Number.isInteger(funnelEntryId) || funnelEntryId <= 0) {
      throw new TypeError('funnelEntryId must be a positive integer');
    }
    if (!isOperationType(operationType)) {
      throw new TypeError(`unknown operation_type: ${String(operationType)}`);
    }
    const now = this.clock();
    const info = this.db
      .prepare<[number, string, string, number, number]>(`
        INSERT INTO brevo_sync_outbox (
          funnel_entry_id, operation_type, payload, status, retry_count, created_at, updated_at
        ) VALUES (?, ?, ?, 'pending', 0, ?, ?)
      `)
      .run(funnelEntryId, operationType, JSON.stringify(payload), now, now);
    return Number(info.lastInsertRowid);
  }

  fetchPending(limit: number): OutboxJobRow[] {
    OutboxStore.assertLimit(limit);
    return this.db
      .prepare<[number], OutboxJobRow>(`
        SELECT *
          FROM brevo_sync_outbox
         WHERE status = 'pending'
         ORDER BY created_at ASC, id ASC
         LIMIT ?
      `)
      .all(limit);
  }

  markSuccess(jobId: number): boolean {
    const info = this.db
      .prepare<[number, number]>(`
        UPDATE brevo_sync_outbox
           SET status = 'success', last_error = NULL, updated_at = ?
         WHERE id = ? AND status = 'pending'
      `)
      .run(this.clock(), jobId);
    return info.changes === 1;
  }

  markError(jobId: number, message: string): boolean {
    const text = String(message ?? '').slice(0, MAX_ERROR_LENGTH);
    const info = this.db
      .prepare<[string, number, number]>(`
        UPDATE brevo_sync_outbox
           SET status = 'error',
               last_error = ?,
               retry_count = retry_count + 1,
               updated_at = ?
         WHERE id = ? AND status = 'pending'
      `)
      .run(text, this.clock(), jobId);
    return info.changes === 1;
  }

  // Operational re-delivery: ERROR → PENDING, oldest first. retry_count and last_error stay.
  requeueErrors(limit: number): number {
    OutboxStore.assertLimit(limit);
    const info = this.db
      .prepare<[number, number]>(`
        UPDATE brevo_sync_outbox
           SET status = 'pending', updated_at = ?
         WHERE id IN (
           SELECT id FROM brevo_sync_outbox
            WHERE status = 'error'
            ORDER BY created_at ASC, id ASC
            LIMIT ?
         )
      `)
      .run(this.clock(), limit);
    return info.changes;
  }

  countByStatus(): Record<OutboxStatus, number> {
    const out: Record<OutboxStatus, number> = { pending: 0, success: 0, error: 0 };
    const rows = this.db
      .prepare<[], { status: string; n: number }>(
        `SELECT status, COUNT(*) AS n FROM brevo_sync_outbox GROUP BY status`,
      )
      .all();
    for (const r of rows) {
      const status = OUTBOX_STATUSES.find((s) => s === r.status);
      if (status) out[status] = Number(r.n);
    }
    return out;
  }

  listByStatus(status: OutboxStatus, limit: number): OutboxJobRow[] {
    OutboxStore.assertLimit(limit);
    return this.db
      .prepare<[string, number], OutboxJobRow>(`
        SELECT *
          FROM brevo_sync_outbox
         WHERE status = ?
         ORDER BY updated_at DESC, id DESC
         LIMIT ?
      `)
      .all(status, limit);
  }

  getById(jobId: number): OutboxJobRow | undefined {
    return this.db
      .prepare<[number], OutboxJobRow>(`SELECT * FROM brevo_sync_outbox WHERE id = ? LIMIT 1`)
      .get(jobId);
  }

  private static assertLimit(limit: number): void {
    if (!Number.isInteger(limit) || limit <= 0) {
      throw new TypeError('limit must be a positive integer');
    }
  }
}
