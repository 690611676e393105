import type { z } from 'zod';
import { HttpError, errorMessage } from './errors.js';
import { getLogger } from './logger.js';
import { backoffMs, sleep } from './sleep.js';

export const USER_AGENT = 'vla-paper-tracker/0.1 (+https://github.com/vla-paper-tracker/vla-paper-tracker)';

export interface RetryOptions {
  /** Total attempts including the first. */
  maxAttempts?: number;
  timeoutMs?: number;
  /** Status codes handed back to the caller instead of thrown or retried. */
  passthroughStatus?: number[];
}

function isRetryableStatus(status: number): boolean {
  return status === 429 || (status >= 500 && status <= 599);
}

/**
 * fetch with a hard per-attempt timeout, retrying 429/5xx and network
 * errors with exponential backoff. Non-retryable statuses throw HttpError.
 */
export async function fetchWithRetry(url: string, init: RequestInit = {}, opts: RetryOptions = {}): Promise<Response> {
  const { maxAttempts = 3, timeoutMs = 30_000, passthroughStatus = [] } = opts;

  const headers = new Headers(init.headers);
  if (!headers.has('User-Agent')) headers.set('User-Agent', USER_AGENT);

  for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
    let res: Response;
    try {
      res = await fetch(url, { ...init, headers, signal: AbortSignal.timeout(timeoutMs) });
    } catch (err) {
      // Timeout (AbortError/TimeoutError) or network error
      if (attempt === maxAttempts) {
        throw new HttpError(`Request failed for ${url} (attempt ${attempt}): ${errorMessage(err)}`, 0, true, url);
      }
      const waitMs = backoffMs(attempt);
      getLogger().warn({ url, attempt, waitMs, err: errorMessage(err) }, 'Network error, backing off');
      await sleep(waitMs);
      continue;
    }

    if (res.ok || passthroughStatus.includes(res.status)) return res;

    const retryable = isRetryableStatus(res.status);
    if (!retryable || attempt === maxAttempts) {
      let body: unknown;
      try {
        body = await res.text();
      } catch {
        body = undefined;
      }
      throw new HttpError(`HTTP ${res.status} ${res.statusText} for ${url}`, res.status, retryable, url, body);
    }

    const waitMs = backoffMs(attempt);
    getLogger().warn({ url, status: res.status, attempt, waitMs }, 'Retryable HTTP status, backing off');
    await sleep(waitMs);
  }

  throw new HttpError(`Request failed for ${url}: exceeded retries`, 0, false, url);
}

/** fetchWithRetry + JSON body validated against a zod schema. */
export async function fetchJson<S extends z.ZodTypeAny>(
  url: string,
  schema: S,
  init: RequestInit = {},
  opts: RetryOptions = {}
): Promise<z.infer<S>> {
  const res = await fetchWithRetry(url, init, opts);
  const json: unknown = await res.json();
  return schema.parse(json);
}

export function withQuery(base: string, params: Record<string, string | number | undefined>): string {
  const url = new URL(base);
  for (const [k, v] of Object.entries(params)) {
    if (v !== undefined) url.searchParams.set(k, String(v));
  }
  return url.toString();
}
