/**
 * JSON-over-HTTP transport for the AI adapters: per-attempt timeout, retry
 * with exponential backoff on 429/5xx/network errors, and mapping of every
 * failure to an `AdapterErrorKind`.
 */

import { err, ok, type Result } from '../../types/common';
import { errorMessage } from '../../utils/errors';
import type { Log } from '../../utils/logger';
import type { AdapterErrorKind } from './types';
import { sleep, type TokenBucketRateLimiter } from './rateLimiter';

export interface JsonPostRequest {
  /** Provider label used in error messages, e.g. `Gemini` */
  service: string;
  url: string;
  headers: Record<string, string>;
  body: unknown;
  timeoutMs: number;
  maxRetries: number;
  retryDelayMs: number;
}

export interface HttpTransportDeps {
  fetchImpl: typeof fetch;
  rateLimiter: TokenBucketRateLimiter;
  log: Log;
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}

export async function postJson(
  deps: HttpTransportDeps,
  request: JsonPostRequest
): Promise<Result<unknown, AdapterErrorKind>> {
  const { service } = request;

  for (let attempt = 1; ; attempt++) {
    const canRetry = attempt <= request.maxRetries;
    const backoff = request.retryDelayMs * Math.pow(2, attempt - 1);

    await deps.rateLimiter.acquire();

    let response: Response;
    try {
      response = await deps.fetchImpl(request.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json', ...request.headers },
        body: JSON.stringify(request.body),
        signal: AbortSignal.timeout(request.timeoutMs),
      });
    } catch (error) {
      if (isAbortError(error)) {
        return err('timeout', `${service} request timed out after ${request.timeoutMs}ms`);
      }
      if (canRetry) {
        deps.log.warn('AI request failed, retrying', { service, attempt, error: errorMessage(error) });
        await sleep(backoff);
        continue;
      }
      return err('provider_error', `${service} request error: ${errorMessage(error)}`);
    }

    if (response.status === 429) {
      if (canRetry) {
        const retryAfterMs = parseInt(response.headers.get('Retry-After') || '0', 10) * 1000;
        await sleep(Math.max(retryAfterMs || 0, backoff));
        continue;
      }
      return err('quota_exceeded', `${service} quota exceeded (HTTP 429)`);
    }

    if (response.status >= 500 && canRetry) {
      deps.log.warn('AI provider server error, retrying', { service, attempt, status: response.status });
      await sleep(backoff);
      continue;
    }

    if (!response.ok) {
      const detail = (await response.text()).slice(0, 300);
      return err('provider_error', `${service} API error: HTTP ${response.status} ${detail}`.trim());
    }

    try {
      const body: unknown = await response.json();
      return ok(body);
    } catch {
      return err('invalid_response', `${service} response was not valid JSON`);
    }
  }
}
