// src/contracts/concurrency.ts

// Concurrency & Synchronization Handling

/**
 * Single-flight guard for scheduler ticks.
 * Returns false if a tick is already running and the new one should be skipped.
 */
export interface ReentrancyGuard {
  guardReentrancy(): boolean;
  release(): void;
}

// Error Handling & Fault Tolerance

/**
 * Retry policy for one gateway call.
 * Attempts = maxRetries + 1; the wait before retry n (0-based) is backoffBaseMs * 2^n.
 */
export interface ContactRetryPolicy {
  maxRetries: number;
  backoffBaseMs: number;
}

export type Sleep = (ms: number) => Promise<void>;
