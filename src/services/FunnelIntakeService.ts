// src/services/FunnelIntakeService.ts
import type { IFunnelEntryStore, IOutboxStore } from '../contracts/dao';
import type { ICandidateSource, IFunnelIntakeService } from '../contracts/interfaces';
import type { FunnelCandidate, FunnelType, IntakeSummary } from '../contracts/domain';
import { FUNNEL_TYPES } from '../contracts/domain';
import { buildUpsertPayload } from '../delegates/OutboxPayloadCodec';
import { Logger } from '../utils/logger';

export type FunnelIntakeDeps = {
  entries: IFunnelEntryStore;
  outbox: IOutboxStore;
  candidates: ICandidateSource;
  /** Destination list per funnel; <= 0 disables the funnel. */
  listIds: Record<FunnelType, number>;
  dryRun: boolean;
  logger?: Logger;
};

type CandidateOutcome = 'dry_run' | 'already_ledgered' | 'conflict' | 'enqueued';

/**
 * Moves new test takers into the funnel ledger and queues one upsert_contact job per
 * created entry. The ledger write and the enqueue are separate statements.
 */
export class FunnelIntakeService implements IFunnelIntakeService {
  private readonly log: Logger;

  constructor(private readonly deps: FunnelIntakeDeps) {
    this.log = deps.logger ?? new Logger('intake');
  }

  sync(maxRowsPerType = 100): IntakeSummary[] {
    if (!Number.isInteger(maxRowsPerType) || maxRowsPerType <= 0) {
      throw new TypeError('maxRowsPerType must be a positive integer');
    }

    const summaries: IntakeSummary[] = [];
    for (const funnelType of FUNNEL_TYPES) {
      const listId = this.deps.listIds[funnelType];
      if (!(listId > 0)) {
        this.log.info(`Skipping ${funnelType} funnel: no Brevo list configured`);
        continue;
      }
      summaries.push(this.syncFunnel(funnelType, listId, maxRowsPerType));
    }
    return summaries;
  }

  private syncFunnel(funnelType: FunnelType, listId: number, limit: number): IntakeSummary {
    const candidates = this.deps.candidates.fetchCandidates(funnelType, limit);
    const summary: IntakeSummary = { funnelType, listId, fetched: candidates.length, created: 0, skipped: 0, enqueued: 0 };
    this.log.info(`Fetched ${candidates.length} ${funnelType} candidate(s)`);

    for (const candidate of candidates) {
      const outcome = this.admit(candidate, funnelType, listId);
      if (outcome === 'enqueued') {
        summary.created++;
        summary.enqueued++;
      } else {
        summary.skipped++;
      }
    }

    this.log.info(
      `${funnelType} intake done: fetched=${summary.fetched} created=${summary.created} skipped=${summary.skipped} enqueued=${summary.enqueued}`,
    );
    return summary;
  }

  private admit(candidate: FunnelCandidate, funnelType: FunnelType, listId: number): CandidateOutcome {
    const { entries, outbox } = this.deps;
    const testId = candidate.testId ?? null;
    const userId = candidate.userId ?? null;

    if (this.deps.dryRun) {
      this.log.info(
        `[DRY RUN] Would add ${candidate.email} to ${funnelType} funnel (test_id=${String(testId)}) and queue upsert for list ${listId}`,
      );
      return 'dry_run';
    }

    if (entries.exists(candidate.email, funnelType, testId)) {
      this.log.debug(`${candidate.email} already in ${funnelType} funnel`);
      return 'already_ledgered';
    }

    const result = entries.createIfAbsent({ email: candidate.email, funnelType, userId, testId });
    if (!result.created) {
      this.log.debug(`${candidate.email} was ledgered concurrently; skipping`);
      return 'conflict';
    }

    const jobId = outbox.enqueue(
      result.id,
      'upsert_contact',
      buildUpsertPayload({ email: candidate.email, funnelType, userId, testId, listId }),
    );
    this.log.info(`Added ${candidate.email} to ${funnelType} funnel (entry=${result.id}, job=${jobId})`);
    return 'enqueued';
  }
}
