import type { Logger } from "@maplink/types";
import { RetryableError } from "./errors.js";
import { withRetry } from "./retry.js";

export interface HttpRetryConfig {
  readonly maxRetryAttempts: number;
  readonly retryBaseDelayMs: number;
}

export interface FetchJsonOptions {
  readonly label: string;
  readonly retry: HttpRetryConfig;
  /** Builds the client's own error for a failed request. */
  readonly fail: (message: string, status: number | undefined, cause?: unknown) => Error;
  /** Called before a 401 is retried, e.g. to drop a cached token. */
  readonly onUnauthorized?: () => void;
  /**
   * False for requests that must not be sent twice. A network failure or
   * 5xx may come after the server acted, so those fail at once; 429 and
   * 401 are still retried.
   */
  readonly retryUnsafe?: boolean;
  readonly logger?: Logger;
  readonly sleep?: (ms: number) => Promise<void>;
}

const retryAfterMs = (res: Response): number | undefined => {
  const header = res.headers.get("retry-after");
  if (!header) {
    return undefined;
  }
  const seconds = Number(header);
  return Number.isFinite(seconds) ? seconds * 1000 : undefined;
};

const transientError = (
  options: FetchJsonOptions,
  message: string,
  status: number | undefined,
  cause?: unknown,
): Error =>
  options.retryUnsafe === false
    ? options.fail(message, status, cause)
    : new RetryableError(message, { status });

/**
 * Sends a request, retrying network failures, 429 and 5xx responses.
 * `buildInit` runs once per attempt so headers such as tokens stay fresh.
 */
export async function fetchJson(
  url: string,
  buildInit: () => Promise<RequestInit>,
  options: FetchJsonOptions,
): Promise<unknown> {
  try {
    return await withRetry(
      async () => {
        const init = await buildInit();
        let res: Response;
        try {
          res = await fetch(url, init);
        } catch (error) {
          throw transientError(
            options,
            `Network error for ${options.label}: ${String(error)}`,
            undefined,
            error,
          );
        }

        if (res.status === 429) {
          throw new RetryableError(`Rate limited: ${options.label}`, {
            status: res.status,
            retryAfterMs: retryAfterMs(res),
          });
        }

        if (res.status === 401 && options.onUnauthorized) {
          options.onUnauthorized();
          throw new RetryableError(`Unauthorized: ${options.label}`, { status: res.status });
        }

        if (res.status >= 500) {
          throw transientError(
            options,
            `Upstream server error ${res.status}: ${options.label}`,
            res.status,
          );
        }

        if (!res.ok) {
          throw options.fail(`Request failed ${res.status}: ${options.label}`, res.status);
        }

        try {
          const body: unknown = await res.json();
          return body;
        } catch (error) {
          throw options.fail(`Invalid JSON from ${options.label}`, res.status, error);
        }
      },
      {
        maxAttempts: options.retry.maxRetryAttempts,
        baseDelayMs: options.retry.retryBaseDelayMs,
        sleep: options.sleep,
        onRetry: ({ attempt, delayMs, error }) => {
          options.logger?.warn("http_retry", {
            label: options.label,
            attempt,
            delayMs,
            error: error.message,
          });
        },
      },
    );
  } catch (error) {
    if (error instanceof RetryableError) {
      throw options.fail(error.message, error.status, error);
    }
    throw error;
  }
}
