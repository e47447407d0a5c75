// src/config/env.ts
import path from 'path';

import type { IConfigSnapshot } from '../contracts/state';
import { parseLogLevel } from '../utils/logger';

type Env = Record<string, string | undefined>;

export function readBoolean(env: Env, name: string, fallback: boolean): boolean {
  const v = env[name];
  if (v === undefined) return fallback;
  return ['1', 'true', 'yes', 'y'].includes(v.trim().toLowerCase());
}

export function readInteger(env: Env, name: string, fallback: number): number {
  const v = env[name];
  if (v === undefined || v.trim() === '') return fallback;
  const n = Number(v.trim());
  return Number.isInteger(n) ? n : fallback;
}

function readString(env: Env, name: string, fallback: string): string {
  const v = env[name];
  return v === undefined || v.trim() === '' ? fallback : v.trim();
}

function readOptional(env: Env, name: string): string | undefined {
  const v = env[name]?.trim();
  return v ? v : undefined;
}

export function loadEnvSnapshot(env: Env = process.env): IConfigSnapshot {
  return Object.freeze({
    environment: readString(env, 'APP_ENV', 'development'),
    dryRun: readBoolean(env, 'APP_DRY_RUN', true),
    logLevel: parseLogLevel(env.APP_LOG_LEVEL),
    dbPath: readString(env, 'DB_PATH', path.join(process.cwd(), 'data.sqlite')),

    brevoApiKey: readOptional(env, 'BREVO_API_KEY'),
    brevoBaseUrl: readString(env, 'BREVO_BASE_URL', 'https://api.brevo.com/v3'),
    languageListId: readInteger(env, 'BREVO_LANGUAGE_LIST_ID', 0),
    nonLanguageListId: readInteger(env, 'BREVO_NON_LANGUAGE_LIST_ID', 0),
    brevoMaxRetries: Math.max(0, readInteger(env, 'BREVO_MAX_RETRIES', 3)),
    brevoBackoffBaseMs: Math.max(0, readInteger(env, 'BREVO_BACKOFF_BASE_MS', 500)),
    brevoTimeoutMs: Math.max(1, readInteger(env, 'BREVO_TIMEOUT_MS', 10000)),

    syncMaxRows: Math.max(1, readInteger(env, 'SYNC_MAX_ROWS', 100)),
    outboxBatchLimit: Math.max(1, readInteger(env, 'OUTBOX_BATCH_LIMIT', 100)),
    syncIntervalSecs: Math.max(1, readInteger(env, 'SYNC_INTERVAL_SECS', 300)),

    httpPort: readInteger(env, 'HTTP_PORT', 3000),
    adminToken: readOptional(env, 'ADMIN_TOKEN'),
  });
}
