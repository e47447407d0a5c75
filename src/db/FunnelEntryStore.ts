// src/db/FunnelEntryStore.ts
import type Database from 'better-sqlite3';

import type { IFunnelEntryStore } from '../contracts/dao';
import type {
  CreateResult,
  FunnelConversion,
  FunnelEntryRow,
  FunnelType,
  NewFunnelEntry,
  PendingFunnelEntry,
} from '../contracts/domain';
import { isFunnelType } from '../contracts/domain';
import { SqlPredicateBuilder, type SqlParam } from '../delegates/SqlPredicateBuilder';
import { conversionRate } from '../delegates/ConversionRate';

const nowSec = () => Math.floor(Date.now() / 1000);

type SummaryRow = { funnel_type: FunnelType; total_entries: number; total_purchased: number | null };

export class FunnelEntryStore implements IFunnelEntryStore {
  constructor(
    private readonly db: Database.Database,
    private readonly clock: () => number = nowSec,
  ) {}

  exists(email: string, funnelType: FunnelType, testId?: number | null): boolean {
    const { sql, params } = new SqlPredicateBuilder()
      .where('email = ?', email)
      .where('funnel_type = ?', funnelType)
      .whereIf(testId, 'test_id = ?')
      .build();
    const row = this.db
      .prepare<SqlParam[], { one: number }>(`SELECT 1 AS one FROM funnel_entries ${sql} LIMIT 1`)
      .get(...params);
    return !!row;
  }

  // Uniqueness conflicts are absorbed by ON CONFLICT DO NOTHING; anything else still throws.
  createIfAbsent(entry: NewFunnelEntry): CreateResult {
    if (typeof entry.email !== 'string' || entry.email.trim().length === 0) {
      throw new TypeError('email must be a non-empty string');
    }
    if (!isFunnelType(entry.funnelType)) {
      throw new TypeError(`unknown funnel_type: ${String(entry.funnelType)}`);
    }

    const info = this.db
      .prepare<SqlParam[]>(`
        INSERT INTO funnel_entries (email, funnel_type, user_id, test_id, entered_at)
        VALUES (?, ?, ?, ?, ?)
        ON CONFLICT DO NOTHING
      `)
      .run(entry.email, entry.funnelType, entry.userId ?? null, entry.testId ?? null, this.clock());

    if (info.changes === 0) return { created: false };
    return { created: true, id: Number(info.lastInsertRowid) };
  }

  // Multi-row on purpose: historical duplicates for (email, type) are repaired together.
  markPurchasedIfUnmarked(
    email: string,
    funnelType: FunnelType,
    testId: number | null,
    purchasedAt: Date,
  ): number {
    if (!(purchasedAt instanceof Date) || Number.isNaN(purchasedAt.getTime())) {
      throw new TypeError('purchasedAt must be a valid Date');
    }
    const { sql, params } = new SqlPredicateBuilder()
      .where('email = ?', email)
      .where('funnel_type = ?', funnelType)
      .whereIf(testId, 'test_id = ?')
      .where('certificate_purchased = 0')
      .build();

    const info = this.db
      .prepare<SqlParam[]>(
        `UPDATE funnel_entries
            SET certificate_purchased = 1,
                certificate_purchased_at = ?
          ${sql}`,
      )
      .run(Math.floor(purchasedAt.getTime() / 1000), ...params);
    return info.changes;
  }

  fetchUnpurchased(limit: number): PendingFunnelEntry[] {
    FunnelEntryStore.assertLimit(limit);
    const rows = this.db
      .prepare<[number], Pick<FunnelEntryRow, 'id' | 'email' | 'funnel_type' | 'user_id' | 'test_id'>>(`
        SELECT id, email, funnel_type, user_id, test_id
          FROM funnel_entries
         WHERE certificate_purchased = 0
         ORDER BY entered_at ASC, id ASC
         LIMIT ?
      `)
      .all(limit);
    return rows.map((r) => ({
      id: r.id,
      email: r.email,
      funnelType: r.funnel_type,
      userId: r.user_id,
      testId: r.test_id,
    }));
  }

  /** `from` is inclusive, `to` exclusive; both apply to entered_at. */
  aggregateConversion(from?: Date, to?: Date): FunnelConversion[] {
    const { sql, params } = new SqlPredicateBuilder()
      .whereIf(FunnelEntryStore.toEpoch(from), 'entered_at >= ?')
      .whereIf(FunnelEntryStore.toEpoch(to), 'entered_at < ?')
      .build();

    const rows = this.db
      .prepare<SqlParam[], SummaryRow>(`
        SELECT funnel_type,
               COUNT(*) AS total_entries,
               SUM(CASE WHEN certificate_purchased = 1 THEN 1 ELSE 0 END) AS total_purchased
          FROM funnel_entries
          ${sql}
         GROUP BY funnel_type
         ORDER BY funnel_type
      `)
      .all(...params);

    return rows.map((r) => {
      const totalEntries = Number(r.total_entries);
      const totalPurchased = Number(r.total_purchased ?? 0);
      return {
        funnelType: r.funnel_type,
        totalEntries,
        totalPurchased,
        conversionRate: conversionRate(totalEntries, totalPurchased),
      };
    });
  }

  getByEmail(email: string): FunnelEntryRow[] {
    return this.db
      .prepare<[string], FunnelEntryRow>(`SELECT * FROM funnel_entries WHERE email = ? ORDER BY id ASC`)
      .all(email);
  }

  // Utilities

  private static toEpoch(d?: Date): number | undefined {
    if (d === undefined) return undefined;
    if (!(d instanceof Date) || Number.isNaN(d.getTime())) {
      throw new TypeError('date bounds must be valid Dates');
    }
    return Math.floor(d.getTime() / 1000);
  }

  private static assertLimit(limit: number): void {
    if (!Number.isInteger(limit) || limit <= 0) {
      throw new TypeError('limit must be a positive integer');
    }
  }
}
