// src/services/PurchaseSyncService.ts
import type { IFunnelEntryStore, IOutboxStore } from '../contracts/dao';
import type { IPurchaseSource, IPurchaseSyncService } from '../contracts/interfaces';
import type { PurchaseSyncSummary } from '../contracts/domain';
import { DataIntegrityError } from '../contracts/errors';
import { buildPurchasePayload } from '../delegates/OutboxPayloadCodec';
import { Logger } from '../utils/logger';

export type PurchaseSyncDeps = {
  entries: IFunnelEntryStore;
  outbox: IOutboxStore;
  purchases: IPurchaseSource;
  dryRun: boolean;
  logger?: Logger;
};

export function ensureTimestamp(value: unknown): Date {
  if (value instanceof Date && !Number.isNaN(value.getTime())) return value;
  const shown = typeof value === 'string' ? `'${value}'` : typeof value;
  throw new DataIntegrityError(`Unexpected purchased_at value type: ${shown}`);
}

export class PurchaseSyncService implements IPurchaseSyncService {
  private readonly log: Logger;

  constructor(private readonly deps: PurchaseSyncDeps) {
    this.log = deps.logger ?? new Logger('purchases');
  }

  /** Flags unpurchased entries that now have a paid certificate and queues the contact update. */
  sync(maxRows = 100): PurchaseSyncSummary {
    const { entries, outbox, purchases } = this.deps;
    const pending = entries.fetchUnpurchased(maxRows);
    const summary: PurchaseSyncSummary = { scanned: pending.length, purchasesFound: 0, entriesUpdated: 0, enqueued: 0 };

    for (const entry of pending) {
      const purchase = purchases.fetchPurchase(entry.email, entry.funnelType);
      if (!purchase) continue;
      summary.purchasesFound++;

      const purchasedAt = ensureTimestamp(purchase.purchasedAt);

      if (this.deps.dryRun) {
        this.log.info(
          `[DRY RUN] Would mark ${entry.email} (${entry.funnelType}) purchased at ${purchasedAt.toISOString()} (order ${purchase.orderRef})`,
        );
        continue;
      }

      const updated = entries.markPurchasedIfUnmarked(entry.email, entry.funnelType, entry.testId, purchasedAt);
      if (updated === 0) {
        this.log.debug(`${entry.email} (${entry.funnelType}) already marked purchased`);
        continue;
      }
      summary.entriesUpdated += updated;

      const jobId = outbox.enqueue(
        entry.id,
        'update_after_purchase',
        buildPurchasePayload({
          email: entry.email,
          funnelType: entry.funnelType,
          userId: entry.userId,
          testId: entry.testId,
          purchasedAt,
          orderRef: purchase.orderRef,
        }),
      );
      summary.enqueued++;
      this.log.info(`Marked ${entry.email} (${entry.funnelType}) purchased; queued job ${jobId}`);
    }

    this.log.info(
      `Purchase sync done: scanned=${summary.scanned} found=${summary.purchasesFound} updated=${summary.entriesUpdated} enqueued=${summary.enqueued}`,
    );
    return summary;
  }
}
