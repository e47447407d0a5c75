// src/contracts/dao.ts
import type {
  CreateResult,
  FunnelConversion,
  FunnelType,
  NewFunnelEntry,
  OperationType,
  OutboxJobRow,
  OutboxStatus,
  PendingFunnelEntry,
} from './domain';

export interface IFunnelEntryStore {
  exists(email: string, funnelType: FunnelType, testId?: number | null): boolean;
  createIfAbsent(entry: NewFunnelEntry): CreateResult;
  markPurchasedIfUnmarked(
    email: string,
    funnelType: FunnelType,
    testId: number | null,
    purchasedAt: Date,
  ): number;
  fetchUnpurchased(limit: number): PendingFunnelEntry[];
  aggregateConversion(from?: Date, to?: Date): FunnelConversion[];
}

export interface IOutboxStore {
  enqueue(funnelEntryId: number, operationType: OperationType, payload: object): number;
  fetchPending(limit: number): OutboxJobRow[];
  markSuccess(jobId: number): boolean;
  markError(jobId: number, message: string): boolean;

  // Operational surface
  requeueErrors(limit: number): number;
  countByStatus(): Record<OutboxStatus, number>;
  listByStatus(status: OutboxStatus, limit: number): OutboxJobRow[];
  getById(jobId: number): OutboxJobRow | undefined;
}
