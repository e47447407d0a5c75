// src/config/ConfigService.ts

import type { IConfigService } from '../contracts/interfaces';
import type { IConfigSnapshot } from '../contracts/state';
import type { FunnelType } from '../contracts/domain';
import type { LogLevel } from '../utils/logger';
import { loadEnvSnapshot } from './env';

export class ConfigService implements IConfigService {
  private readonly snap: IConfigSnapshot;

  constructor(snap: IConfigSnapshot = loadEnvSnapshot()) {
    this.snap = snap;
  }

  getEnvironment(): string {
    return this.snap.environment;
  }

  isDryRun(): boolean {
    return this.snap.dryRun;
  }

  getLogLevel(): LogLevel {
    return this.snap.logLevel;
  }

  getDbPath(): string {
    return this.snap.dbPath;
  }

  getBrevoConfig(): {
    apiKey: string | undefined;
    baseUrl: string;
    maxRetries: number;
    backoffBaseMs: number;
    timeoutMs: number;
  } {
    return {
      apiKey: this.snap.brevoApiKey,
      baseUrl: this.snap.brevoBaseUrl,
      maxRetries: this.snap.brevoMaxRetries,
      backoffBaseMs: this.snap.brevoBackoffBaseMs,
      timeoutMs: this.snap.brevoTimeoutMs,
    };
  }

  getListIds(): Record<FunnelType, number> {
    return {
      language: this.snap.languageListId,
      non_language: this.snap.nonLanguageListId,
    };
  }

  getBatchConfig(): {
    syncMaxRows: number;
    outboxBatchLimit: number;
    syncIntervalSecs: number;
  } {
    return {
      syncMaxRows: this.snap.syncMaxRows,
      outboxBatchLimit: this.snap.outboxBatchLimit,
      syncIntervalSecs: this.snap.syncIntervalSecs,
    };
  }

  getHttpPort(): number {
    return this.snap.httpPort;
  }

  getAdminToken(): string | undefined {
    return this.snap.adminToken;
  }
}
