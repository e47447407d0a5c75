// src/clients/BrevoContactGateway.ts
import axios, { type AxiosAdapter, type AxiosInstance, type AxiosResponse } from 'axios';

import type { IContactGateway } from '../contracts/interfaces';
import type { BrevoContact, ContactUpsertResponse } from '../contracts/domain';
import type { ContactRetryPolicy, Sleep } from '../contracts/concurrency';
import {
  ConfigurationError,
  FatalContactError,
  TransientContactError,
  errorMessage,
} from '../contracts/errors';
import { buildContactBody } from '../delegates/ContactPayloadBuilder';
import { classifyStatus, parseRetryAfter, truncateBody } from '../delegates/FailureClassifier';
import { Logger } from '../utils/logger';

export type BrevoGatewayOptions = {
  apiKey?: string;
  baseUrl: string;
  dryRun: boolean;
  timeoutMs?: number;
  retry?: Partial<ContactRetryPolicy>;
  /** Transport override (tests). */
  adapter?: AxiosAdapter;
  sleep?: Sleep;
  logger?: Logger;
};

const DEFAULT_RETRY: ContactRetryPolicy = { maxRetries: 3, backoffBaseMs: 500 };
const DEFAULT_TIMEOUT_MS = 10_000;

const defaultSleep: Sleep = (ms) => new Promise((res) => setTimeout(res, ms));

function isPlainObject(v: unknown): v is Record<string, unknown> {
  return typeof v === 'object' && v !== null && !Array.isArray(v);
}

/**
 * Brevo contacts API: POST /contacts as an upsert (create or update by email).
 *
 * Transient failures (no response, 429, 5xx) are retried with exponential backoff
 * inside one call; any other 4xx aborts at once. In dry-run mode the call is logged
 * and short-circuited before any network I/O or credential check.
 */
export class BrevoContactGateway implements IContactGateway {
  private readonly apiKey: string;
  private readonly baseUrl: string;
  private readonly dryRun: boolean;
  private readonly retry: ContactRetryPolicy;
  private readonly sleep: Sleep;
  private readonly log: Logger;
  private readonly http: AxiosInstance;

  constructor(opts: BrevoGatewayOptions) {
    this.apiKey = (opts.apiKey ?? '').trim();
    this.baseUrl = opts.baseUrl.replace(/\/+$/, '');
    this.dryRun = opts.dryRun;
    this.retry = { ...DEFAULT_RETRY, ...opts.retry };
    this.sleep = opts.sleep ?? defaultSleep;
    this.log = opts.logger ?? new Logger('brevo');
    this.http = axios.create({
      baseURL: this.baseUrl,
      timeout: opts.timeoutMs ?? DEFAULT_TIMEOUT_MS,
      // status handling is ours; axios only rejects on transport failures
      validateStatus: () => true,
      ...(opts.adapter ? { adapter: opts.adapter } : {}),
    });
  }

  async upsertContact(contact: BrevoContact): Promise<ContactUpsertResponse> {
    const body = buildContactBody(contact);

    this.log.info(
      `Sending contact to Brevo (email=${contact.email}, lists=[${contact.listIds.join(',')}], dry_run=${this.dryRun})`,
    );

    if (this.dryRun) {
      this.log.info(`Brevo dry run request: POST ${this.baseUrl}/contacts payload=${JSON.stringify(body)}`);
      return { dryRun: true };
    }

    if (!this.apiKey) {
      throw new ConfigurationError('Brevo API key is not configured');
    }

    return this.withRetry(() => this.postOnce('/contacts', body));
  }

  private async withRetry<T>(op: () => Promise<T>): Promise<T> {
    const attempts = this.retry.maxRetries + 1;
    let lastErr: TransientContactError | undefined;

    for (let i = 0; i < attempts; i++) {
      try {
        return await op();
      } catch (e) {
        if (!(e instanceof TransientContactError)) throw e;
        lastErr = e;
        if (i === attempts - 1) break;

        const backoff = this.retry.backoffBaseMs * Math.pow(2, i);
        const waitMs = e.retryAfterMs !== undefined ? Math.max(backoff, e.retryAfterMs) : backoff;
        this.log.warn(`Transient Brevo failure (attempt ${i + 1}/${attempts}): ${e.message}; retrying in ${waitMs}ms`);
        await this.sleep(waitMs);
      }
    }

    this.log.error(`Brevo call failed after ${attempts} attempts: ${lastErr?.message ?? 'unknown error'}`);
    throw lastErr ?? new TransientContactError('Brevo request failed');
  }

  private async postOnce(path: string, body: object): Promise<ContactUpsertResponse> {
    let resp: AxiosResponse<unknown>;
    try {
      resp = await this.http.post<unknown>(path, body, {
        headers: {
          'api-key': this.apiKey,
          'Content-Type': 'application/json',
          Accept: 'application/json',
        },
      });
    } catch (e) {
      throw new TransientContactError(`Brevo request error: ${errorMessage(e, 'network failure')}`, undefined, {
        cause: e,
      });
    }

    const outcome = classifyStatus(resp.status);
    if (outcome === 'ok') {
      // non-JSON bodies (e.g. 204) come back as strings
      return isPlainObject(resp.data) ? resp.data : {};
    }

    const message = `Brevo API error ${resp.status}: ${truncateBody(resp.data)}`;
    if (outcome === 'transient') {
      const retryAfterHeader: unknown = resp.headers['retry-after'];
      throw new TransientContactError(message, resp.status, {
        retryAfterMs: resp.status === 429 ? parseRetryAfter(retryAfterHeader) : undefined,
      });
    }
    throw new FatalContactError(message, resp.status);
  }
}
