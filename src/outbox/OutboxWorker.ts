// src/outbox/OutboxWorker.ts
import type { ReentrancyGuard } from '../contracts/concurrency';
import type { IOutboxStore } from '../contracts/dao';
import type { IContactGateway, IOutboxWorker } from '../contracts/interfaces';
import type { OutboxJobRow, OutboxRunSummary } from '../contracts/domain';
import { PayloadDecodeError, errorMessage, isSyncError } from '../contracts/errors';
import { makeContact } from '../delegates/ContactPayloadBuilder';
import { decodeOutboxPayload, purchaseAttributes } from '../delegates/OutboxPayloadCodec';
import { FoldLog } from '../utils/fold-logger';
import { Logger } from '../utils/logger';
import { SingleFlight } from '../utils/single-flight';

const GENERIC_FAILURE = 'Unexpected error while processing outbox job';

/**
 * Drains PENDING jobs in creation order and records one terminal outcome per job.
 *
 * Per-job faults never escape runOnce: they become ERROR rows. A failure to read
 * the pending batch itself is a store fault and propagates to the caller.
 * fetchPending takes no claim, so one worker is the only consumer: a run that
 * starts while another is in flight returns a skipped summary.
 */
export class OutboxWorker implements IOutboxWorker {
  private readonly log: Logger;
  private readonly guard: ReentrancyGuard = new SingleFlight();

  constructor(
    private readonly outbox: IOutboxStore,
    private readonly gateway: IContactGateway,
    logger?: Logger,
  ) {
    this.log = logger ?? new Logger('outbox');
  }

  async runOnce(limit = 100): Promise<OutboxRunSummary> {
    if (!this.guard.guardReentrancy()) {
      this.log.warn('Outbox run already in flight; skipping');
      return { processed: 0, succeeded: 0, failed: 0, skipped: true };
    }
    try {
      return await this.drain(limit);
    } finally {
      this.guard.release();
    }
  }

  private async drain(limit: number): Promise<OutboxRunSummary> {
    const jobs = this.outbox.fetchPending(limit);
    const summary: OutboxRunSummary = { processed: 0, succeeded: 0, failed: 0 };
    if (jobs.length === 0) {
      this.log.debug('No pending outbox jobs');
      return summary;
    }

    this.log.info(`Processing ${jobs.length} pending job(s)`);
    const fold = new FoldLog(this.log);

    for (const job of jobs) {
      summary.processed++;
      if (await this.processJob(job, fold)) summary.succeeded++;
      else summary.failed++;
    }
    fold.flushAll();

    this.log.info(
      `Outbox run finished: processed=${summary.processed} succeeded=${summary.succeeded} failed=${summary.failed}`,
    );
    return summary;
  }

  private async processJob(job: OutboxJobRow, fold: FoldLog): Promise<boolean> {
    try {
      await this.dispatch(job);
    } catch (e) {
      const message = errorMessage(e, GENERIC_FAILURE);
      const kind = isSyncError(e) ? e.kind : 'unexpected';
      fold.line(
        `${kind}|${job.operation_type}`,
        `Job ${job.id} (${job.operation_type}) failed [${kind}]: ${message}`,
        kind === 'transient' ? 'warn' : 'error',
        `${job.operation_type} jobs failed [${kind}]`,
      );
      this.record(job, () => this.outbox.markError(job.id, message));
      return false;
    }

    this.record(job, () => this.outbox.markSuccess(job.id));
    this.log.debug(`Job ${job.id} (${job.operation_type}) delivered`);
    return true;
  }

  private async dispatch(job: OutboxJobRow): Promise<void> {
    const payload = decodeOutboxPayload(job);

    switch (job.operation_type) {
      case 'upsert_contact':
        await this.gateway.upsertContact(
          makeContact({
            email: payload.email,
            listIds: payload.list_ids,
            attributes: payload.attributes,
            updateEnabled: payload.update_enabled,
          }),
        );
        return;
      case 'update_after_purchase':
        await this.gateway.upsertContact(
          makeContact({
            email: payload.email,
            listIds: payload.list_ids,
            attributes: purchaseAttributes(payload),
            updateEnabled: true,
          }),
        );
        return;
      default:
        throw new PayloadDecodeError(`Unknown operation_type '${job.operation_type}' for job ${job.id}`);
    }
  }

  // A job that is no longer PENDING was settled elsewhere; the outcome is dropped.
  private record(job: OutboxJobRow, mark: () => boolean): void {
    let applied: boolean;
    try {
      applied = mark();
    } catch (e) {
      this.log.error(`Could not record outcome for job ${job.id}`, e);
      return;
    }
    if (!applied) {
      this.log.warn(`Job ${job.id} was not pending anymore; outcome not recorded`);
    }
  }
}
