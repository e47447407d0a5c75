import { describe, it, expect, beforeEach } from "vitest";
import type Database from "better-sqlite3";

import {
  SqliteCandidateSource,
  SqlitePurchaseSource,
  parseSqlDateTime,
  toSqlDateTime,
} from "../../src/db/SourceSelectors";
import { FunnelEntryStore } from "../../src/db/FunnelEntryStore";
import { DAY_MS, memDb, seedPayment, seedTestTaker } from "../helpers";

const NOW = new Date("2026-03-01T12:00:00Z");

describe("date helpers", () => {
  it("formats dates as UTC SQL datetimes", () => {
    expect(toSqlDateTime(new Date("2026-01-05T07:08:09.123Z"))).toBe("2026-01-05 07:08:09");
  });

  it("parses SQL datetimes as UTC and hands anything else back", () => {
    expect(parseSqlDateTime("2026-02-01 10:00:00")).toEqual(new Date("2026-02-01T10:00:00Z"));
    expect(parseSqlDateTime("2026-02-01T10:00:00+02:00")).toEqual(new Date("2026-02-01T08:00:00Z"));
    expect(parseSqlDateTime("yesterday")).toBe("yesterday");
    expect(parseSqlDateTime("2026-13-45 99:00:00")).toBe("2026-13-45 99:00:00");
  });

  it("refuses calendar dates that do not exist instead of rolling them over", () => {
    expect(parseSqlDateTime("2026-02-30 10:00:00")).toBe("2026-02-30 10:00:00");
    expect(parseSqlDateTime("2026-04-31 00:00:00")).toBe("2026-04-31 00:00:00");
    expect(parseSqlDateTime("2026-01-10 24:00:00")).toBe("2026-01-10 24:00:00");
    expect(parseSqlDateTime("2024-02-29 23:59:59")).toEqual(new Date("2024-02-29T23:59:59Z"));
    expect(parseSqlDateTime(42)).toBe(42);
    expect(parseSqlDateTime(null)).toBeNull();
  });
});

describe("SqliteCandidateSource", () => {
  let db: Database.Database;
  let source: SqliteCandidateSource;

  beforeEach(() => {
    db = memDb();
    source = new SqliteCandidateSource(db, () => NOW);
  });

  it("returns recent language test takers, newest first", () => {
    const older = seedTestTaker(db, "older@example.com", new Date(NOW.getTime() - 10 * DAY_MS));
    const newer = seedTestTaker(db, "newer@example.com", new Date(NOW.getTime() - 2 * DAY_MS));
    seedTestTaker(db, "stale@example.com", new Date(NOW.getTime() - 31 * DAY_MS));
    seedTestTaker(db, "", new Date(NOW.getTime() - DAY_MS));
    seedTestTaker(db, null, new Date(NOW.getTime() - DAY_MS));

    expect(source.fetchCandidates("language", 10)).toEqual([
      { userId: newer.userId, testId: newer.testId, email: "newer@example.com" },
      { userId: older.userId, testId: older.testId, email: "older@example.com" },
    ]);
    expect(source.fetchCandidates("language", 1).map((c) => c.email)).toEqual(["newer@example.com"]);
  });

  it("skips emails already in the funnel", () => {
    seedTestTaker(db, "known@example.com", new Date(NOW.getTime() - DAY_MS));
    seedTestTaker(db, "fresh@example.com", new Date(NOW.getTime() - DAY_MS));
    new FunnelEntryStore(db).createIfAbsent({ email: "known@example.com", funnelType: "language" });

    expect(source.fetchCandidates("language", 10).map((c) => c.email)).toEqual(["fresh@example.com"]);
  });

  it("has no non-language candidates", () => {
    seedTestTaker(db, "someone@example.com", new Date(NOW.getTime() - DAY_MS));

    expect(source.fetchCandidates("non_language", 10)).toEqual([]);
  });
});

describe("SqlitePurchaseSource", () => {
  let db: Database.Database;
  let source: SqlitePurchaseSource;

  beforeEach(() => {
    db = memDb();
    source = new SqlitePurchaseSource(db);
  });

  it("returns the earliest paid certificate of the funnel's type", () => {
    seedPayment(db, "buyer@example.com", { certType: 1, status: 2, paidAt: "2026-02-20 09:00:00" });
    const earliest = seedPayment(db, "buyer@example.com", { certType: 1, status: 2, paidAt: "2026-02-10 08:30:00" });
    seedPayment(db, "buyer@example.com", { certType: 1, status: 1, paidAt: "2026-02-01 08:00:00" });

    expect(source.fetchPurchase("buyer@example.com", "language")).toEqual({
      orderRef: earliest,
      purchasedAt: new Date("2026-02-10T08:30:00Z"),
    });
  });

  it("matches the certificate type to the funnel", () => {
    const paid = seedPayment(db, "buyer@example.com", { certType: 2, status: 2, paidAt: "2026-02-10 08:30:00" });

    expect(source.fetchPurchase("buyer@example.com", "language")).toBeUndefined();
    expect(source.fetchPurchase("buyer@example.com", "non_language")?.orderRef).toBe(paid);
  });

  it("ignores unpaid and undated payments", () => {
    seedPayment(db, "buyer@example.com", { certType: 1, status: 1, paidAt: "2026-02-10 08:30:00" });
    seedPayment(db, "buyer@example.com", { certType: 1, status: 2, paidAt: null });

    expect(source.fetchPurchase("buyer@example.com", "language")).toBeUndefined();
    expect(source.fetchPurchase("nobody@example.com", "language")).toBeUndefined();
  });

  it("passes a malformed payment date through for the caller to reject", () => {
    seedPayment(db, "buyer@example.com", { certType: 1, status: 2, paidAt: "not-a-date" });

    expect(source.fetchPurchase("buyer@example.com", "language")?.purchasedAt).toBe("not-a-date");
  });
});
