/**
 * @fileoverview JSON-over-HTTP helper for provider clients.
 *
 * One bounded-timeout request, no retry loop: callers decide whether a
 * failure degrades or propagates.
 */

import { ProviderError, type ProviderErrorReason, type ProviderKind } from '../core/errors.js';
import { getErrorMessage } from '../utils/errors.js';

export interface JsonRequest {
  provider: string;
  kind: ProviderKind;
  url: string;
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
  body?: unknown;
  timeoutMs: number;
}

function errorName(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'name' in error && typeof error.name === 'string') {
    return error.name;
  }
  return undefined;
}

function reasonForStatus(status: number): { reason: ProviderErrorReason; retryable: boolean } {
  if (status === 401 || status === 403) return { reason: 'auth_failed', retryable: false };
  if (status === 429) return { reason: 'rate_limit', retryable: true };
  if (status >= 500) return { reason: 'unavailable', retryable: true };
  return { reason: 'invalid_response', retryable: false };
}

export async function requestJson(request: JsonRequest): Promise<unknown> {
  const { provider, kind, url, timeoutMs } = request;
  let response: Response;
  try {
    response = await fetch(url, {
      method: request.method ?? (request.body === undefined ? 'GET' : 'POST'),
      headers: {
        Accept: 'application/json',
        ...(request.body === undefined ? {} : { 'Content-Type': 'application/json' }),
        ...request.headers,
      },
      body: request.body === undefined ? undefined : JSON.stringify(request.body),
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (error) {
    const name = errorName(error);
    if (name === 'TimeoutError' || name === 'AbortError') {
      throw new ProviderError(provider, kind, 'timeout', true, `no response within ${timeoutMs}ms`);
    }
    throw new ProviderError(provider, kind, 'network_error', true, getErrorMessage(error));
  }

  if (!response.ok) {
    const { reason, retryable } = reasonForStatus(response.status);
    throw new ProviderError(provider, kind, reason, retryable, `HTTP ${response.status}`);
  }

  try {
    return await response.json();
  } catch (error) {
    throw new ProviderError(provider, kind, 'invalid_response', false, `body is not JSON: ${getErrorMessage(error)}`);
  }
}
