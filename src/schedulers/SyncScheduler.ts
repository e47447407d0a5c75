// src/schedulers/SyncScheduler.ts
import type { ReentrancyGuard } from '../contracts/concurrency';
import type {
  IFunnelIntakeService,
  IOutboxWorker,
  IPurchaseSyncService,
} from '../contracts/interfaces';
import type { IntakeSummary, OutboxRunSummary, PurchaseSyncSummary } from '../contracts/domain';
import { Logger } from '../utils/logger';
import { SingleFlight } from '../utils/single-flight';

export type SyncCycleResult = {
  intake: IntakeSummary[];
  purchases: PurchaseSyncSummary;
  outbox: OutboxRunSummary;
};

export type SyncLimits = { syncMaxRows: number; outboxBatchLimit: number };

/** Intake, then purchase detection, then one outbox batch. */
export async function runSyncCycle(
  deps: { intake: IFunnelIntakeService; purchases: IPurchaseSyncService; worker: IOutboxWorker },
  limits: SyncLimits,
): Promise<SyncCycleResult> {
  const intake = deps.intake.sync(limits.syncMaxRows);
  const purchases = deps.purchases.sync(limits.syncMaxRows);
  const outbox = await deps.worker.runOnce(limits.outboxBatchLimit);
  return { intake, purchases, outbox };
}

export class SyncScheduler {
  private intervalId: NodeJS.Timeout | undefined;
  private readonly guard: ReentrancyGuard = new SingleFlight();
  private readonly log = new Logger('sched');

  constructor(
    private readonly deps: { intake: IFunnelIntakeService; purchases: IPurchaseSyncService; worker: IOutboxWorker },
    private readonly limits: SyncLimits,
  ) {}

  bootstrapScheduler(intervalSecs: number): void {
    if (this.intervalId) return;
    if (!Number.isFinite(intervalSecs) || intervalSecs <= 0) {
      throw new TypeError('intervalSecs must be a positive number');
    }
    this.intervalId = setInterval(() => this.timerCallback(), intervalSecs * 1000);
    this.log.info(`Sync cycle every ${intervalSecs}s`);
  }

  stop(): void {
    if (!this.intervalId) return;
    clearInterval(this.intervalId);
    this.intervalId = undefined;
  }

  isRunning(): boolean {
    return this.intervalId !== undefined;
  }

  private timerCallback(): void {
    void this.tick().catch((e: unknown) => this.log.error('Sync cycle failed', e));
  }

  /** Runs one cycle unless one is still in flight; resolves undefined when skipped. */
  async tick(): Promise<SyncCycleResult | undefined> {
    if (!this.guard.guardReentrancy()) {
      this.log.warn('Previous sync cycle still running; skipping tick');
      return undefined;
    }
    try {
      return await runSyncCycle(this.deps, this.limits);
    } finally {
      this.guard.release();
    }
  }
}
