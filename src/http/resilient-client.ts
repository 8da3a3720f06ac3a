import { TransportError } from '../errors.js';
import type { LoggerLike } from '../logging/logger.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type QueryParams = Record<string, string | number | boolean | undefined>;

export interface ResilientClientOptions {
  /** Maximum number of attempts for network errors and 5xx responses. */
  maxAttempts?: number;
  /** Backoff before retry N is `backoffBaseSeconds ** N` seconds. */
  backoffBaseSeconds?: number;
  /** Per-attempt timeout in ms. */
  timeoutMs?: number;
  /** Wait used when a 429 response carries no usable Retry-After. */
  defaultRetryAfterSeconds?: number;
  /** How many 429 responses are tolerated for a single request. */
  maxRateLimitRetries?: number;
  /** Replaces the real timer (tests). */
  sleep?: (ms: number) => Promise<void>;
}

export const DEFAULT_CLIENT_OPTIONS = {
  maxAttempts: 3,
  backoffBaseSeconds: 2,
  timeoutMs: 30_000,
  defaultRetryAfterSeconds: 5,
  maxRateLimitRetries: 10,
} as const;

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Parse a Retry-After header value into seconds. Accepts delta-seconds and
 * HTTP dates; anything else yields the fallback.
 */
export function parseRetryAfter(
  value: string | null,
  fallbackSeconds: number,
  now: number = Date.now(),
): number {
  const trimmed = value?.trim() ?? '';
  if (trimmed === '') return fallbackSeconds;
  if (/^\d+$/.test(trimmed)) return Number(trimmed);

  const at = Date.parse(trimmed);
  if (Number.isNaN(at)) return fallbackSeconds;
  return Math.max(0, Math.ceil((at - now) / 1000));
}

/**
 * Only server-side failures are worth another attempt. 429 is handled
 * separately and every other 4xx is final.
 */
export function isRetryableStatus(status: number): boolean {
  return status >= 500 && status <= 599;
}

function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.name === 'TimeoutError' ? 'request timed out' : err.message;
  }
  return String(err);
}

function hasAuthorization(headers: Record<string, string>): boolean {
  return Object.entries(headers).some(
    ([name, value]) => name.toLowerCase() === 'authorization' && value.trim() !== '',
  );
}

function withQuery(url: string, params?: QueryParams): string {
  if (!params) return url;
  const target = new URL(url);
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined) target.searchParams.set(key, String(value));
  }
  return target.toString();
}

/**
 * HTTP client with timeout, exponential backoff for transient failures
 * and Retry-After handling for rate limits.
 */
export class ResilientHttpClient {
  private readonly maxAttempts: number;
  private readonly backoffBaseSeconds: number;
  private readonly timeoutMs: number;
  private readonly defaultRetryAfterSeconds: number;
  private readonly maxRateLimitRetries: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly logger: LoggerLike,
    options: ResilientClientOptions = {},
  ) {
    this.maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_CLIENT_OPTIONS.maxAttempts);
    this.backoffBaseSeconds = options.backoffBaseSeconds ?? DEFAULT_CLIENT_OPTIONS.backoffBaseSeconds;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_CLIENT_OPTIONS.timeoutMs;
    this.defaultRetryAfterSeconds =
      options.defaultRetryAfterSeconds ?? DEFAULT_CLIENT_OPTIONS.defaultRetryAfterSeconds;
    this.maxRateLimitRetries =
      options.maxRateLimitRetries ?? DEFAULT_CLIENT_OPTIONS.maxRateLimitRetries;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Issue a request and return the first successful response, with its
   * body already read.
   *
   * @throws TransportError when the request is rejected with a non-retryable
   *   status, or when every attempt failed.
   */
  async request(
    method: HttpMethod,
    url: string,
    headers: Record<string, string>,
    params?: QueryParams,
    body?: unknown,
  ): Promise<Response> {
    const target = withQuery(url, params);
    if (!hasAuthorization(headers)) {
      throw new TransportError(`Refusing to send ${method} ${target} without an Authorization header`, target, 0);
    }

    let attempt = 1;
    let rateLimitRetries = 0;

    for (;;) {
      let response: Response;
      let text: string;
      try {
        response = await globalThis.fetch(target, {
          method,
          headers,
          body: body === undefined ? undefined : JSON.stringify(body),
          signal: AbortSignal.timeout(this.timeoutMs),
        });
        // The body shares the attempt's timeout, so it is read here.
        text = await response.text();
      } catch (err) {
        if (attempt >= this.maxAttempts) {
          throw new TransportError(
            `${method} ${target} failed after ${attempt} attempt(s): ${describeError(err)}`,
            target,
            attempt,
            { cause: err },
          );
        }
        await this.backoff(method, target, attempt, describeError(err));
        attempt++;
        continue;
      }

      if (response.ok) {
        return new Response(text === '' ? null : text, {
          status: response.status,
          statusText: response.statusText,
          headers: response.headers,
        });
      }

      if (response.status === 429) {
        if (rateLimitRetries >= this.maxRateLimitRetries) {
          throw new TransportError(
            `${method} ${target} still rate limited after ${rateLimitRetries} retries`,
            target,
            attempt,
            { status: 429 },
          );
        }
        rateLimitRetries++;
        const waitSeconds = parseRetryAfter(
          response.headers.get('Retry-After'),
          this.defaultRetryAfterSeconds,
        );
        this.logger.warn(`${method} ${target}: rate limited, retrying in ${waitSeconds}s`, {
          data: { rateLimitRetries, waitSeconds },
        });
        await this.sleep(waitSeconds * 1000);
        continue;
      }

      const reason = `HTTP ${response.status} ${response.statusText}`.trim();

      if (!isRetryableStatus(response.status) || attempt >= this.maxAttempts) {
        throw new TransportError(
          `${method} ${target} failed after ${attempt} attempt(s): ${reason}${text ? ` — ${text}` : ''}`,
          target,
          attempt,
          { status: response.status },
        );
      }

      await this.backoff(method, target, attempt, reason);
      attempt++;
    }
  }

  private async backoff(method: HttpMethod, target: string, attempt: number, reason: string): Promise<void> {
    const delaySeconds = this.backoffBaseSeconds ** attempt;
    this.logger.warn(
      `${method} ${target}: attempt ${attempt}/${this.maxAttempts} failed (${reason}), retrying in ${delaySeconds}s`,
    );
    await this.sleep(delaySeconds * 1000);
  }
}
