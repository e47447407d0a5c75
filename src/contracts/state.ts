// src/contracts/state.ts

import type { LogLevel } from '../utils/logger';

// Immutable configuration snapshot
export interface IConfigSnapshot {
  environment: string;
  dryRun: boolean;
  logLevel: LogLevel;
  dbPath: string;

  brevoApiKey: string | undefined;
  brevoBaseUrl: string;
  languageListId: number;
  nonLanguageListId: number;
  brevoMaxRetries: number;
  brevoBackoffBaseMs: number;
  brevoTimeoutMs: number;

  syncMaxRows: number;
  outboxBatchLimit: number;
  syncIntervalSecs: number;

  httpPort: number;
  adminToken: string | undefined;
}
