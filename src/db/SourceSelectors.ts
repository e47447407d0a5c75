// src/db/SourceSelectors.ts
import type Database from 'better-sqlite3';

import type { ICandidateSource, IPurchaseSource } from '../contracts/interfaces';
import type { FunnelCandidate, FunnelType, PurchaseRecord } from '../contracts/domain';

export const CANDIDATE_LOOKBACK_DAYS = 30;

// modx_cert_payment.id_status for a completed payment
const PAYMENT_STATUS_PAID = 2;

// modx_cert_test.type per funnel
const CERT_TEST_TYPE: Record<FunnelType, number> = { language: 1, non_language: 2 };

const pad = (n: number) => String(n).padStart(2, '0');

/** 'YYYY-MM-DD HH:MM:SS' in UTC, the format the legacy tables store. */
export function toSqlDateTime(d: Date): string {
  return `${d.getUTCFullYear()}-${pad(d.getUTCMonth() + 1)}-${pad(d.getUTCDate())} ${pad(d.getUTCHours())}:${pad(d.getUTCMinutes())}:${pad(d.getUTCSeconds())}`;
}

/**
 * Legacy datetimes come back as text. Well-formed values become Dates;
 * anything else is handed back untouched so the caller can reject it.
 */
export function parseSqlDateTime(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  const m = /^(\d{4})-(\d{2})-(\d{2})[ T](\d{2}):(\d{2}):(\d{2})(\.\d+)?(Z|[+-]\d{2}:\d{2})?$/.exec(value.trim());
  if (!m) return value;
  const [y, mo, day, h, mi, sec] = m.slice(1, 7).map(Number);
  // Date rolls 02-30 over into March; the wall-clock fields must survive as written
  const wall = new Date(Date.UTC(y, mo - 1, day, h, mi, sec));
  if (
    wall.getUTCFullYear() !== y ||
    wall.getUTCMonth() !== mo - 1 ||
    wall.getUTCDate() !== day ||
    wall.getUTCHours() !== h ||
    wall.getUTCMinutes() !== mi ||
    wall.getUTCSeconds() !== sec
  ) {
    return value;
  }
  const d = new Date(`${m[1]}-${m[2]}-${m[3]}T${m[4]}:${m[5]}:${m[6]}${m[7] ?? ''}${m[8] ?? 'Z'}`);
  return Number.isNaN(d.getTime()) ? value : d;
}

type CandidateRow = { user_id: number; test_id: number | null; email: string };

export class SqliteCandidateSource implements ICandidateSource {
  constructor(
    private readonly db: Database.Database,
    private readonly now: () => Date = () => new Date(),
  ) {}

  fetchCandidates(funnelType: FunnelType, limit: number): FunnelCandidate[] {
    if (funnelType === 'non_language') {
      // no selector exists for non-language tests yet
      return [];
    }
    const cutoff = new Date(this.now().getTime() - CANDIDATE_LOOKBACK_DAYS * 24 * 60 * 60 * 1000);
    const rows = this.db
      .prepare<[string, string, number], CandidateRow>(`
        SELECT u.Id     AS user_id,
               u.TestId AS test_id,
               u.Email  AS email
          FROM simpletest_users AS u
         INNER JOIN simpletest_test AS t ON t.Id = u.TestId
         INNER JOIN simpletest_lang AS l ON l.Id = t.LangId
          LEFT JOIN funnel_entries AS f
                 ON f.email = u.Email
                AND f.funnel_type = ?
         WHERE u.Email IS NOT NULL
           AND u.Email <> ''
           AND u.Datep >= ?
           AND f.id IS NULL
         ORDER BY u.Datep DESC
         LIMIT ?
      `)
      .all(funnelType, toSqlDateTime(cutoff), limit);

    return rows.map((r) => ({ userId: r.user_id, testId: r.test_id, email: String(r.email) }));
  }
}

type PaymentRow = { id: number; datetime_payment: unknown };

export class SqlitePurchaseSource implements IPurchaseSource {
  constructor(private readonly db: Database.Database) {}

  // Matches by email and funnel type only; the earliest paid certificate wins.
  fetchPurchase(email: string, funnelType: FunnelType): PurchaseRecord | undefined {
    const row = this.db
      .prepare<[string, number, number], PaymentRow>(`
        SELECT p.id, p.datetime_payment
          FROM modx_cert_payment AS p
         INNER JOIN modx_cert_result AS r ON r.id = p.id_result
         INNER JOIN modx_cert_users  AS u ON u.id = r.id_user
         INNER JOIN modx_cert_test   AS t ON t.id = r.id_test
         WHERE u.email = ?
           AND p.id_status = ?
           AND p.datetime_payment IS NOT NULL
           AND t.type = ?
         ORDER BY p.datetime_payment ASC
         LIMIT 1
      `)
      .get(email, PAYMENT_STATUS_PAID, CERT_TEST_TYPE[funnelType]);

    if (!row) return undefined;
    return { orderRef: Number(row.id), purchasedAt: parseSqlDateTime(row.datetime_payment) };
  }
}
