// src/delegates/FailureClassifier.ts

export type ResponseClass = 'ok' | 'transient' | 'fatal';

export const MAX_ERROR_BODY_LENGTH = 500;

// 429 and 5xx are worth another try; the rest of 4xx will fail the same way again.
export function classifyStatus(status: number): ResponseClass {
  if (status >= 200 && status < 300) return 'ok';
  if (status === 429 || status >= 500) return 'transient';
  if (status >= 400) return 'fatal';
  // 1xx/3xx after redirects were followed: nothing usable came back
  return 'fatal';
}

export function truncateBody(body: unknown, max = MAX_ERROR_BODY_LENGTH): string {
  let text: string;
  if (typeof body === 'string') {
    text = body;
  } else if (body === undefined || body === null) {
    text = '';
  } else {
    try {
      text = JSON.stringify(body);
    } catch {
      text = String(body);
    }
  }
  return text.length > max ? text.slice(0, max) : text;
}

/** Retry-After in ms (delta-seconds form only), capped. */
export function parseRetryAfter(raw: unknown, capMs = 30_000): number | undefined {
  if (typeof raw !== 'string' && typeof raw !== 'number') return undefined;
  const secs = Number(raw);
  if (!Number.isFinite(secs) || secs < 0) return undefined;
  return Math.min(secs * 1000, capMs);
}
