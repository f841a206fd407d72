import type { FastifyBaseLogger } from 'fastify';
import type {
  FetchFailure,
  HttpClientOptions,
  QueryParams,
} from './http-client.types.js';

const DEFAULT_MAX_RETRIES = 3;
const DEFAULT_TIMEOUT_MS = 10_000;
const DEFAULT_RETRY_DELAY_MS = 1_000;
const DEFAULT_BACKOFF_BASE_MS = 1_000;

function describeFailure(failure: FetchFailure): string {
  switch (failure.kind) {
    case 'retries_exhausted':
      return `retries exhausted after ${failure.attempts} attempts${
        failure.lastError ? `: ${failure.lastError}` : ''
      }`;
    case 'http_status':
      return `request failed: ${failure.status} ${failure.body}`;
    case 'invalid_json':
      return `response with status ${failure.status} is not valid JSON`;
  }
}

export class FetchError extends Error {
  constructor(
    readonly url: string,
    readonly failure: FetchFailure,
  ) {
    super(describeFailure(failure));
    this.name = 'FetchError';
  }

  get status(): number | undefined {
    return this.failure.kind === 'retries_exhausted'
      ? undefined
      : this.failure.status;
  }
}

export function isFetchError(err: unknown): err is FetchError {
  return err instanceof FetchError;
}

export function buildUrl(url: string, params?: QueryParams): string {
  if (!params) return url;
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined) continue;
    search.append(key, String(value));
  }
  const qs = search.toString();
  if (!qs) return url;
  return `${url}${url.includes('?') ? '&' : '?'}${qs}`;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function errorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.name === 'AbortError' || err.name === 'TimeoutError'
      ? 'request timed out'
      : err.message;
  }
  return String(err);
}

export class HttpClient {
  private readonly maxRetries: number;
  private readonly timeoutMs: number;
  private readonly retryDelayMs: number;
  private readonly backoffBaseMs: number;
  private readonly wait: (ms: number) => Promise<void>;

  constructor(
    private readonly log: FastifyBaseLogger,
    opts: HttpClientOptions = {},
  ) {
    this.maxRetries = Math.max(1, opts.maxRetries ?? DEFAULT_MAX_RETRIES);
    this.timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.retryDelayMs = opts.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
    this.backoffBaseMs = opts.backoffBaseMs ?? DEFAULT_BACKOFF_BASE_MS;
    this.wait = opts.sleep ?? sleep;
  }

  async getJson<T>(url: string, params?: QueryParams): Promise<T> {
    const target = buildUrl(url, params);
    let lastError: string | undefined;

    for (let attempt = 0; attempt < this.maxRetries; attempt++) {
      const isLast = attempt === this.maxRetries - 1;
      let res: Response;
      const controller = new AbortController();
      const timer = setTimeout(() => controller.abort(), this.timeoutMs);
      try {
        res = await fetch(target, { signal: controller.signal });
      } catch (err) {
        clearTimeout(timer);
        lastError = errorMessage(err);
        this.log.warn(
          { url: target, attempt: attempt + 1, err: lastError },
          'request attempt failed',
        );
        if (!isLast) await this.wait(this.retryDelayMs);
        continue;
      }

      try {
        if (res.status === 429) {
          const waitMs = this.backoffBaseMs * 2 ** attempt;
          lastError = 'rate limited';
          this.log.warn(
            { url: target, attempt: attempt + 1, waitMs },
            'rate limit exceeded',
          );
          await res.body?.cancel();
          if (!isLast) await this.wait(waitMs);
          continue;
        }

        if (!res.ok) {
          const body = await res.text();
          this.log.warn(
            { url: target, attempt: attempt + 1, status: res.status },
            'request rejected',
          );
          throw new FetchError(target, {
            kind: 'http_status',
            status: res.status,
            body,
          });
        }

        const raw = await res.text();
        try {
          return JSON.parse(raw) as T;
        } catch {
          throw new FetchError(target, {
            kind: 'invalid_json',
            status: res.status,
          });
        }
      } catch (err) {
        if (isFetchError(err)) throw err;
        lastError = errorMessage(err);
        this.log.warn(
          { url: target, attempt: attempt + 1, err: lastError },
          'failed to read response body',
        );
        if (!isLast) await this.wait(this.retryDelayMs);
      } finally {
        clearTimeout(timer);
      }
    }

    throw new FetchError(target, {
      kind: 'retries_exhausted',
      attempts: this.maxRetries,
      ...(lastError ? { lastError } : {}),
    });
  }
}
