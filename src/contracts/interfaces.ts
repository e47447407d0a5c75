// src/contracts/interfaces.ts
import type {
  BrevoContact,
  ContactUpsertResponse,
  FunnelCandidate,
  FunnelType,
  IntakeSummary,
  OutboxRunSummary,
  PurchaseRecord,
  PurchaseSyncSummary,
} from './domain';
import type { LogLevel } from '../utils/logger';

export interface IConfigService {
  getEnvironment(): string;
  isDryRun(): boolean;
  getLogLevel(): LogLevel;
  getDbPath(): string;
  getBrevoConfig(): {
    apiKey: string | undefined;
    baseUrl: string;
    maxRetries: number;
    backoffBaseMs: number;
    timeoutMs: number;
  };
  /** Destination list per funnel; a value <= 0 disables the funnel. */
  getListIds(): Record<FunnelType, number>;
  getBatchConfig(): {
    syncMaxRows: number;
    outboxBatchLimit: number;
    syncIntervalSecs: number;
  };
  getHttpPort(): number;
  getAdminToken(): string | undefined;
}

export interface IContactGateway {
  upsertContact(contact: BrevoContact): Promise<ContactUpsertResponse>;
}

export interface ICandidateSource {
  fetchCandidates(funnelType: FunnelType, limit: number): FunnelCandidate[];
}

export interface IPurchaseSource {
  fetchPurchase(email: string, funnelType: FunnelType): PurchaseRecord | undefined;
}

export interface IOutboxWorker {
  runOnce(limit?: number): Promise<OutboxRunSummary>;
}

export interface IFunnelIntakeService {
  sync(maxRowsPerType?: number): IntakeSummary[];
}

export interface IPurchaseSyncService {
  sync(maxRows?: number): PurchaseSyncSummary;
}
