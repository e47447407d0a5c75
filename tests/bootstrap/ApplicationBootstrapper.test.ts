import { describe, it, expect, beforeEach } from "vitest";
import type Database from "better-sqlite3";

import { ApplicationBootstrapper, type AppContext } from "../../src/bootstrap/ApplicationBootstrapper";
import { ConfigService } from "../../src/config/ConfigService";
import { loadEnvSnapshot } from "../../src/config/env";
import { parseArgs } from "../../src/cli/CommandLine";
import { configureLogging } from "../../src/utils/logger";
import { DAY_MS, FakeGateway, memDb, seedPayment, seedTestTaker } from "../helpers";

describe("ApplicationBootstrapper", () => {
  let db: Database.Database;
  let gateway: FakeGateway;
  let boot: ApplicationBootstrapper;
  let ctx: AppContext;
  let out: string[];

  beforeEach(() => {
    db = memDb();
    gateway = new FakeGateway();
    const cfg = new ConfigService(
      loadEnvSnapshot({ APP_DRY_RUN: "false", BREVO_LANGUAGE_LIST_ID: "100", APP_LOG_LEVEL: "error" }),
    );
    boot = new ApplicationBootstrapper(cfg, { db, gateway });
    ctx = boot.wire();
    // wire() applies the configured level; keep the sink quiet
    configureLogging({ sink: () => undefined });
    out = [];
  });

  const run = (...argv: string[]) => boot.runCommand(ctx, parseArgs(argv), (line) => out.push(line));

  it("runs the whole pipeline with run-all", async () => {
    seedTestTaker(db, "test@example.com", new Date(Date.now() - 2 * DAY_MS));

    await run("run-all");

    expect(out).toEqual([
      "intake: language=1",
      "purchases: updated=0 enqueued=0",
      "outbox: processed=1 succeeded=1 failed=0",
    ]);
    expect(gateway.calls.map((c) => [c.email, c.listIds])).toEqual([["test@example.com", [100]]]);
  });

  it("runs the individual steps and prints the report", async () => {
    seedTestTaker(db, "test@example.com", new Date(Date.now() - 2 * DAY_MS));
    seedPayment(db, "test@example.com", { certType: 1, status: 2, paidAt: "2026-02-10 08:30:00" });

    await run("sync-funnels", "--limit", "10");
    await run("sync-purchases");
    await run("run-outbox");
    await run("report", "--days", "0", "--funnel", "language");

    expect(out).toEqual([
      "language: fetched=1 created=1 skipped=0 enqueued=1",
      "scanned=1 purchases=1 updated=1 enqueued=1",
      "processed=2 succeeded=2 failed=0",
      "Funnel conversion (all time)",
      "  language: entries=1 purchased=1 conversion=100.00%",
    ]);
    expect(gateway.calls[1].attributes).toMatchObject({ CERTIFICATE_PURCHASED: 1 });
  });

  it("requeues failed jobs", async () => {
    const id = ctx.outbox.enqueue(1, "upsert_contact", { email: "a@example.com" });
    ctx.outbox.markError(id, "Brevo API error 500: down");

    await run("requeue-errors");

    expect(out).toEqual(["requeued=1"]);
    expect(ctx.outbox.getById(id)?.status).toBe("pending");
  });

  it("does not run serve as a one-shot command", async () => {
    await expect(run("serve")).rejects.toThrow(TypeError);
  });
});
