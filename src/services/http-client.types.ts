export type QueryValue = string | number | boolean | undefined;

export type QueryParams = Record<string, QueryValue>;

export type FetchFailure =
  | { kind: 'retries_exhausted'; attempts: number; lastError?: string }
  | { kind: 'http_status'; status: number; body: string }
  | { kind: 'invalid_json'; status: number };

export interface HttpClientOptions {
  /** total attempts, including the first request */
  maxRetries?: number;
  timeoutMs?: number;
  /** wait after a network error or timeout */
  retryDelayMs?: number;
  /** rate-limit wait is backoffBaseMs * 2^attempt */
  backoffBaseMs?: number;
  sleep?: (ms: number) => Promise<void>;
}
