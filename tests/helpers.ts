import type Database from "better-sqlite3";

import { openDatabaseAndMigrate } from "../src/db/SqliteDatabase";
import { toSqlDateTime } from "../src/db/SourceSelectors";
import type { IContactGateway } from "../src/contracts/interfaces";
import type { BrevoContact, ContactUpsertResponse } from "../src/contracts/domain";

export function memDb(): Database.Database {
  return openDatabaseAndMigrate(":memory:", { withSourceTables: true });
}

/** Records every contact; throws the configured value for listed emails. */
export class FakeGateway implements IContactGateway {
  readonly calls: BrevoContact[] = [];
  readonly failures = new Map<string, unknown>();

  async upsertContact(contact: BrevoContact): Promise<ContactUpsertResponse> {
    this.calls.push(contact);
    if (this.failures.has(contact.email)) throw this.failures.get(contact.email);
    return { id: this.calls.length };
  }
}

export const DAY_MS = 24 * 60 * 60 * 1000;

/** Inserts one language test taker; returns the simpletest_users id and the test id. */
export function seedTestTaker(
  db: Database.Database,
  email: string | null,
  takenAt: Date,
  testId = 500,
): { userId: number; testId: number } {
  db.prepare("INSERT OR IGNORE INTO simpletest_lang (Id) VALUES (1)").run();
  db.prepare(
    "INSERT INTO simpletest_test (Id, LangId) SELECT ?, 1 WHERE NOT EXISTS (SELECT 1 FROM simpletest_test WHERE Id = ?)",
  ).run(testId, testId);
  const user = db
    .prepare("INSERT INTO simpletest_users (Email, TestId, Datep, Status) VALUES (?, ?, ?, 1)")
    .run(email, testId, toSqlDateTime(takenAt));
  return { userId: Number(user.lastInsertRowid), testId };
}

/** Inserts a certificate payment for `email`; certType 1 = language, 2 = non-language. */
export function seedPayment(
  db: Database.Database,
  email: string,
  opts: { certType: number; status: number; paidAt: string | null },
): number {
  const user = db.prepare("INSERT INTO modx_cert_users (email) VALUES (?)").run(email);
  const test = db.prepare("INSERT INTO modx_cert_test (type) VALUES (?)").run(opts.certType);
  const result = db
    .prepare("INSERT INTO modx_cert_result (id_user, id_test) VALUES (?, ?)")
    .run(Number(user.lastInsertRowid), Number(test.lastInsertRowid));
  const payment = db
    .prepare("INSERT INTO modx_cert_payment (id_result, id_status, datetime_payment) VALUES (?, ?, ?)")
    .run(Number(result.lastInsertRowid), opts.status, opts.paidAt);
  return Number(payment.lastInsertRowid);
}
