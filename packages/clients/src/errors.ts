export class RetryableError extends Error {
  readonly retryAfterMs: number | undefined;
  readonly status: number | undefined;

  constructor(message: string, options: { retryAfterMs?: number; status?: number } = {}) {
    super(message);
    this.name = "RetryableError";
    this.retryAfterMs = options.retryAfterMs;
    this.status = options.status;
  }
}

/** Reddit rejected or failed a request: network, auth, rate limit or a reply error. */
export class PlatformError extends Error {
  readonly status: number | undefined;

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "PlatformError";
    this.status = options.status;
  }
}

/** The osu! API failed at the transport or protocol level. Not raised for missing beatmaps. */
export class RemoteError extends Error {
  readonly status: number | undefined;

  constructor(message: string, options: { status?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = "RemoteError";
    this.status = options.status;
  }
}
