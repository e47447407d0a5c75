// src/bootstrap/ApplicationBootstrapper.ts
import type Database from 'better-sqlite3';
import type { Server } from 'http';

import type { IConfigService, IContactGateway } from '../contracts/interfaces';
import type { CliOptions } from '../cli/CommandLine';
import { ConfigService } from '../config/ConfigService';
import { openDatabaseAndMigrate } from '../db/SqliteDatabase';
import { FunnelEntryStore } from '../db/FunnelEntryStore';
import { OutboxStore } from '../db/OutboxStore';
import { SqliteCandidateSource, SqlitePurchaseSource } from '../db/SourceSelectors';
import { BrevoContactGateway } from '../clients/BrevoContactGateway';
import { OutboxWorker } from '../outbox/OutboxWorker';
import { FunnelIntakeService } from '../services/FunnelIntakeService';
import { PurchaseSyncService } from '../services/PurchaseSyncService';
import { ConversionReportService } from '../services/ConversionReportService';
import { SyncScheduler, runSyncCycle } from '../schedulers/SyncScheduler';
import { AdminAuth } from '../middleware/AdminAuth';
import { AdminApiController } from '../controllers/AdminApiController';
import { HealthController } from '../controllers/HealthController';
import { HttpApiServer } from '../server/HttpApiServer';
import { Logger, configureLogging } from '../utils/logger';

const bootLog = new Logger('boot');

function log(step: string, msg: string) {
  bootLog.child(step).info(msg);
}

const mask = (s?: string) =>
  typeof s === 'string' && s.length > 6 ? `${s.slice(0, 4)}…[${s.length}b]` : s ? '***' : '<unset>';

export type Output = (line: string) => void;

export type AppContext = {
  cfg: IConfigService;
  db: Database.Database;
  entries: FunnelEntryStore;
  outbox: OutboxStore;
  gateway: IContactGateway;
  worker: OutboxWorker;
  intake: FunnelIntakeService;
  purchases: PurchaseSyncService;
  reports: ConversionReportService;
};

let handlersInstalled = false;

export function installProcessHandlers(): void {
  if (handlersInstalled) return;
  handlersInstalled = true;
  const fatal = new Logger('fatal');
  process.on('uncaughtException', (err) => {
    fatal.error('uncaughtException', err);
  });
  process.on('unhandledRejection', (reason) => {
    fatal.error('unhandledRejection', reason);
  });
}

export class ApplicationBootstrapper {
  constructor(
    private readonly cfg: IConfigService = new ConfigService(),
    private readonly overrides: { db?: Database.Database; gateway?: IContactGateway } = {},
  ) {}

  /** Builds every component over one database handle. The caller owns `ctx.db`. */
  wire(): AppContext {
    const cfg = this.cfg;
    configureLogging({ level: cfg.getLogLevel() });

    // 1) Config
    const brevo = cfg.getBrevoConfig();
    const listIds = cfg.getListIds();
    log('CONFIG', `env=${cfg.getEnvironment()} dryRun=${cfg.isDryRun()} logLevel=${cfg.getLogLevel()}`);
    log('CONFIG', `brevo=${brevo.baseUrl} apiKey=${mask(brevo.apiKey)} retries=${brevo.maxRetries} backoff=${brevo.backoffBaseMs}ms`);
    log('CONFIG', `lists language=${listIds.language} non_language=${listIds.non_language}`);

    // 2) Database
    let db = this.overrides.db;
    if (!db) {
      log('DB', `opening sqlite at ${cfg.getDbPath()}`);
      db = openDatabaseAndMigrate(cfg.getDbPath(), { withSourceTables: true });
      log('DB', 'migrations up-to-date');
    }

    // 3) Stores and sources
    const entries = new FunnelEntryStore(db);
    const outbox = new OutboxStore(db);
    const candidates = new SqliteCandidateSource(db);
    const purchaseSource = new SqlitePurchaseSource(db);

    // 4) Gateway + worker
    const gateway =
      this.overrides.gateway ??
      new BrevoContactGateway({
        apiKey: brevo.apiKey,
        baseUrl: brevo.baseUrl,
        dryRun: cfg.isDryRun(),
        timeoutMs: brevo.timeoutMs,
        retry: { maxRetries: brevo.maxRetries, backoffBaseMs: brevo.backoffBaseMs },
      });
    const worker = new OutboxWorker(outbox, gateway);

    // 5) Orchestrators
    const intake = new FunnelIntakeService({
      entries,
      outbox,
      candidates,
      listIds,
      dryRun: cfg.isDryRun(),
    });
    const purchases = new PurchaseSyncService({
      entries,
      outbox,
      purchases: purchaseSource,
      dryRun: cfg.isDryRun(),
    });
    const reports = new ConversionReportService(entries);
    log('DOMAIN', 'intake, purchase sync, outbox worker and reports wired');

    return { cfg, db, entries, outbox, gateway, worker, intake, purchases, reports };
  }

  /** Runs a one-shot command, writing its result lines to `out`. */
  async runCommand(ctx: AppContext, opts: CliOptions, out: Output): Promise<void> {
    const batch = ctx.cfg.getBatchConfig();
    const syncRows = opts.limit ?? batch.syncMaxRows;
    const jobs = opts.limit ?? batch.outboxBatchLimit;

    switch (opts.command) {
      case 'sync-funnels': {
        for (const s of ctx.intake.sync(syncRows)) {
          out(`${s.funnelType}: fetched=${s.fetched} created=${s.created} skipped=${s.skipped} enqueued=${s.enqueued}`);
        }
        return;
      }
      case 'sync-purchases': {
        const s = ctx.purchases.sync(syncRows);
        out(`scanned=${s.scanned} purchases=${s.purchasesFound} updated=${s.entriesUpdated} enqueued=${s.enqueued}`);
        return;
      }
      case 'run-outbox': {
        const s = await ctx.worker.runOnce(jobs);
        out(`processed=${s.processed} succeeded=${s.succeeded} failed=${s.failed}`);
        return;
      }
      case 'requeue-errors': {
        out(`requeued=${ctx.outbox.requeueErrors(jobs)}`);
        return;
      }
      case 'report': {
        const rows = ctx.reports.report(ctx.reports.buildPeriod(opts.days), opts.funnel);
        for (const line of ctx.reports.formatReport(rows, opts.days)) out(line);
        return;
      }
      case 'run-all': {
        const r = await runSyncCycle(ctx, { syncMaxRows: syncRows, outboxBatchLimit: batch.outboxBatchLimit });
        out(`intake: ${r.intake.map((s) => `${s.funnelType}=${s.enqueued}`).join(' ') || 'no funnels enabled'}`);
        out(`purchases: updated=${r.purchases.entriesUpdated} enqueued=${r.purchases.enqueued}`);
        out(`outbox: processed=${r.outbox.processed} succeeded=${r.outbox.succeeded} failed=${r.outbox.failed}`);
        return;
      }
      case 'serve':
        throw new TypeError('serve is a long-running command; use serve()');
    }
  }

  /** Starts the admin API and the periodic sync; resolves once listening. */
  async serve(ctx: AppContext, port = ctx.cfg.getHttpPort()): Promise<{ server: Server; scheduler: SyncScheduler }> {
    const batch = ctx.cfg.getBatchConfig();

    const adminAuth = new AdminAuth(ctx.cfg.getAdminToken());
    if (!ctx.cfg.getAdminToken()) log('HTTP', 'ADMIN_TOKEN unset: admin routes will refuse every request');

    const http = new HttpApiServer();
    const app = http.createApp({
      adminAuth,
      healthCtrl: new HealthController(() => {
        ctx.db.prepare('SELECT 1').get();
      }),
      adminCtrl: new AdminApiController({
        outbox: ctx.outbox,
        worker: ctx.worker,
        reports: ctx.reports,
        batchLimit: batch.outboxBatchLimit,
      }),
    });
    const server = await http.listen(app, port);

    const scheduler = new SyncScheduler(ctx, {
      syncMaxRows: batch.syncMaxRows,
      outboxBatchLimit: batch.outboxBatchLimit,
    });
    scheduler.bootstrapScheduler(batch.syncIntervalSecs);
    log('SCHED', `SyncScheduler every ${batch.syncIntervalSecs}s`);

    return { server, scheduler };
  }
}
