import { describe, it, expect, beforeEach } from "vitest";
import type Database from "better-sqlite3";

import { OutboxStore } from "../../src/db/OutboxStore";
import { memDb } from "../helpers";

describe("OutboxStore", () => {
  let db: Database.Database;
  let now: number;
  let outbox: OutboxStore;

  beforeEach(() => {
    db = memDb();
    now = 100;
    outbox = new OutboxStore(db, () => now);
  });

  it("enqueues a pending job with the payload serialized", () => {
    const id = outbox.enqueue(7, "upsert_contact", { email: "a@example.com", list_ids: [1] });

    expect(outbox.getById(id)).toEqual({
      id,
      funnel_entry_id: 7,
      operation_type: "upsert_contact",
      payload: '{"email":"a@example.com","list_ids":[1]}',
      status: "pending",
      retry_count: 0,
      last_error: null,
      created_at: 100,
      updated_at: 100,
    });
  });

  it("does not deduplicate", () => {
    const a = outbox.enqueue(1, "upsert_contact", { email: "a@example.com" });
    const b = outbox.enqueue(1, "upsert_contact", { email: "a@example.com" });

    expect(b).not.toBe(a);
    expect(outbox.fetchPending(10)).toHaveLength(2);
  });

  it("fetches pending jobs by creation time, then id, up to the limit", () => {
    now = 200;
    const late = outbox.enqueue(1, "upsert_contact", { email: "late@example.com" });
    now = 100;
    const first = outbox.enqueue(2, "upsert_contact", { email: "first@example.com" });
    const second = outbox.enqueue(3, "update_after_purchase", { email: "second@example.com" });

    expect(outbox.fetchPending(10).map((j) => j.id)).toEqual([first, second, late]);
    expect(outbox.fetchPending(2).map((j) => j.id)).toEqual([first, second]);
  });

  it("marks success once and ignores later outcomes", () => {
    const id = outbox.enqueue(1, "upsert_contact", { email: "a@example.com" });
    now = 150;

    expect(outbox.markSuccess(id)).toBe(true);
    expect(outbox.markSuccess(id)).toBe(false);
    expect(outbox.markError(id, "late failure")).toBe(false);

    expect(outbox.getById(id)).toMatchObject({ status: "success", last_error: null, retry_count: 0, updated_at: 150 });
    expect(outbox.fetchPending(10)).toEqual([]);
  });

  it("records an error and counts it", () => {
    const id = outbox.enqueue(1, "upsert_contact", { email: "a@example.com" });

    expect(outbox.markError(id, "Brevo API error 400: bad")).toBe(true);
    expect(outbox.markError(id, "again")).toBe(false);

    expect(outbox.getById(id)).toMatchObject({ status: "error", last_error: "Brevo API error 400: bad", retry_count: 1 });
    expect(outbox.fetchPending(10)).toEqual([]);
  });

  it("requeues the oldest failed jobs and keeps their history", () => {
    now = 10;
    const older = outbox.enqueue(1, "upsert_contact", { email: "a@example.com" });
    now = 20;
    const newer = outbox.enqueue(2, "upsert_contact", { email: "b@example.com" });
    outbox.markError(older, "first failure");
    outbox.markError(newer, "second failure");

    expect(outbox.requeueErrors(1)).toBe(1);
    expect(outbox.getById(older)).toMatchObject({ status: "pending", retry_count: 1, last_error: "first failure" });
    expect(outbox.getById(newer)?.status).toBe("error");

    expect(outbox.requeueErrors(10)).toBe(1);
    expect(outbox.requeueErrors(10)).toBe(0);
  });

  it("counts jobs per status, including empty ones", () => {
    const a = outbox.enqueue(1, "upsert_contact", { email: "a@example.com" });
    const b = outbox.enqueue(2, "upsert_contact", { email: "b@example.com" });
    outbox.enqueue(3, "upsert_contact", { email: "c@example.com" });
    outbox.markSuccess(a);
    outbox.markSuccess(b);

    expect(outbox.countByStatus()).toEqual({ pending: 1, success: 2, error: 0 });
  });

  it("lists jobs of one status, most recently updated first", () => {
    const a = outbox.enqueue(1, "upsert_contact", { email: "a@example.com" });
    const b = outbox.enqueue(2, "upsert_contact", { email: "b@example.com" });
    now = 300;
    outbox.markError(a, "x");
    now = 200;
    outbox.markError(b, "y");

    expect(outbox.listByStatus("error", 10).map((j) => j.id)).toEqual([a, b]);
    expect(outbox.listByStatus("success", 10)).toEqual([]);
  });

  it("rejects a non-positive funnel entry id", () => {
    expect(() => outbox.enqueue(0, "upsert_contact", {})).toThrow(TypeError);
  });
});
