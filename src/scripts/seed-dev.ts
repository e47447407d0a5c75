// src/scripts/seed-dev.ts
import 'dotenv/config';
import path from 'path';

import { openDatabaseAndMigrate } from '../db/SqliteDatabase';
import { toSqlDateTime } from '../db/SourceSelectors';

/**
 * Fills the legacy test/certificate tables with a few rows so that
 * `sync-funnels` and `sync-purchases` have something to pick up locally.
 */
function main(): void {
  const dbPath = process.env.DB_PATH ? String(process.env.DB_PATH) : path.join(process.cwd(), 'data.sqlite');
  const db = openDatabaseAndMigrate(dbPath, { withSourceTables: true });

  const now = Date.now();
  const daysAgo = (n: number) => toSqlDateTime(new Date(now - n * 24 * 60 * 60 * 1000));

  const seed = db.transaction(() => {
    db.prepare('INSERT OR IGNORE INTO simpletest_lang (Id) VALUES (?)').run(1);
    const testId = 101;
    db.prepare(
      'INSERT INTO simpletest_test (Id, LangId) SELECT ?, 1 WHERE NOT EXISTS (SELECT 1 FROM simpletest_test WHERE Id = ?)',
    ).run(testId, testId);

    const addUser = db.prepare('INSERT INTO simpletest_users (Email, TestId, Datep, Status) VALUES (?, ?, ?, 1)');
    addUser.run('dev-buyer@example.com', testId, daysAgo(3));
    addUser.run('dev-browser@example.com', testId, daysAgo(5));
    addUser.run('dev-stale@example.com', testId, daysAgo(45));

    const certTest = db.prepare('INSERT INTO modx_cert_test (type) VALUES (1)').run();
    const certUser = db.prepare('INSERT INTO modx_cert_users (email) VALUES (?)').run('dev-buyer@example.com');
    const result = db
      .prepare('INSERT INTO modx_cert_result (id_user, id_test) VALUES (?, ?)')
      .run(Number(certUser.lastInsertRowid), Number(certTest.lastInsertRowid));
    db.prepare('INSERT INTO modx_cert_payment (id_result, id_status, datetime_payment) VALUES (?, 2, ?)')
      .run(Number(result.lastInsertRowid), daysAgo(1));
  });

  try {
    seed();
  } finally {
    db.close();
  }

  // eslint-disable-next-line no-console
  console.log(`Seeded ${dbPath} with 3 test takers (1 outside the lookback window) and 1 paid certificate`);
  // eslint-disable-next-line no-console
  console.log('Try these:');
  // eslint-disable-next-line no-console
  console.log('  node dist/index.js sync-funnels');
  // eslint-disable-next-line no-console
  console.log('  node dist/index.js sync-purchases');
  // eslint-disable-next-line no-console
  console.log('  node dist/index.js run-outbox');
}

main();
