/**
 * SDK / HTTP エラーを ProviderError に分類する
 */

import {
  isProviderError,
  ProviderAuthError,
  ProviderProtocolError,
  ProviderUnreachableError,
  type ProviderError,
} from '../errors.js';
import type { ProviderKind } from '../types.js';

const NETWORK_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'ETIMEDOUT',
  'EPIPE',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_SOCKET',
]);

const CONNECTION_ERROR_NAMES = new Set(['APIConnectionError', 'APIConnectionTimeoutError', 'FetchError']);

function readProperty(value: unknown, key: string): unknown {
  if (typeof value !== 'object' || value === null || !(key in value)) {
    return undefined;
  }
  return Reflect.get(value, key);
}

export function statusOf(error: unknown): number | undefined {
  const status = readProperty(error, 'status');
  return typeof status === 'number' ? status : undefined;
}

function isNetworkError(error: unknown): boolean {
  if (
    error instanceof Error &&
    (CONNECTION_ERROR_NAMES.has(error.name) || CONNECTION_ERROR_NAMES.has(error.constructor.name))
  ) {
    return true;
  }
  // fetch は TypeError('fetch failed') の cause に本当の原因を持つ
  for (let current: unknown = error, depth = 0; current !== undefined && depth < 4; depth++) {
    const code = readProperty(current, 'code');
    if (typeof code === 'string' && NETWORK_ERROR_CODES.has(code)) {
      return true;
    }
    current = readProperty(current, 'cause');
  }
  return error instanceof TypeError && error.message.includes('fetch failed');
}

/**
 * 401/403 → 認証エラー（リトライしない）
 * 接続失敗・タイムアウト・408/409/429/5xx → 到達不能（リトライ対象）
 * それ以外 → プロトコルエラー
 */
export function classifyProviderError(error: unknown, provider: ProviderKind): ProviderError {
  if (isProviderError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const status = statusOf(error);

  if (status === 401 || status === 403) {
    return new ProviderAuthError(`${provider}: authentication failed (${status}): ${message}`, provider, status, {
      cause: error,
    });
  }
  if (status !== undefined && (status === 408 || status === 409 || status === 429 || status >= 500)) {
    return new ProviderUnreachableError(`${provider}: service unavailable (${status}): ${message}`, provider, status, {
      cause: error,
    });
  }
  if (status === undefined && isNetworkError(error)) {
    return new ProviderUnreachableError(`${provider}: connection failed: ${message}`, provider, undefined, {
      cause: error,
    });
  }
  return new ProviderProtocolError(`${provider}: request rejected: ${message}`, provider, status, { cause: error });
}
