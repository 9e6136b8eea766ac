/**
 * 指数バックオフ付きリトライ
 */

import { CancelledError } from '../core/errors.js';

export interface RetryOptions {
  /** 初回を含む最大試行回数 @default 3 */
  maxAttempts?: number;
  /** 初回リトライまでの待ち時間 @default 500 */
  baseDelayMs?: number;
  /** 失敗ごとの待ち時間の倍率 @default 2 */
  backoffFactor?: number;
  /** @default 8000 */
  maxDelayMs?: number;
  /** false を返したエラーは即座に再送出する */
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  /** 待機に入る直前に呼ばれる */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  signal?: AbortSignal;
}

const DEFAULTS = {
  maxAttempts: 3,
  baseDelayMs: 500,
  backoffFactor: 2,
  maxDelayMs: 8_000,
};

export function backoffDelay(
  attempt: number,
  baseDelayMs: number = DEFAULTS.baseDelayMs,
  backoffFactor: number = DEFAULTS.backoffFactor,
  maxDelayMs: number = DEFAULTS.maxDelayMs
): number {
  return Math.min(baseDelayMs * backoffFactor ** (attempt - 1), maxDelayMs);
}

/**
 * fn を最大 maxAttempts 回実行する。最後のエラーはそのまま投げる
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULTS.maxAttempts);
  const baseDelayMs = options.baseDelayMs ?? DEFAULTS.baseDelayMs;
  const backoffFactor = options.backoffFactor ?? DEFAULTS.backoffFactor;
  const maxDelayMs = options.maxDelayMs ?? DEFAULTS.maxDelayMs;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      const retryable = options.shouldRetry ? options.shouldRetry(error, attempt) : true;
      if (!retryable || attempt >= maxAttempts || options.signal?.aborted) {
        throw error;
      }
      const delay = backoffDelay(attempt, baseDelayMs, backoffFactor, maxDelayMs);
      options.onRetry?.(error, attempt, delay);
      await sleep(delay, options.signal);
    }
  }
}

/** signal が中断されたら CancelledError で reject */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
