/** Error carrying the HTTP status the proxy answers with. */
export class HttpError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "HttpError";
  }

  /** Body rendered as `{ detail }`. */
  get detail(): unknown {
    return this.message;
  }
}

/** Required Storefront settings are missing; never recovered. */
export class ConfigurationError extends HttpError {
  constructor(message: string) {
    super(message, 500);
    this.name = "ConfigurationError";
  }
}

/**
 * The Storefront API could not be reached, answered with a non-2xx status,
 * or returned GraphQL errors. `upstreamDetail` is passed to the caller as-is.
 */
export class UpstreamError extends HttpError {
  public readonly upstreamStatus: number | null;
  private readonly upstreamDetail: unknown;

  constructor(message: string, options: { detail?: unknown; upstreamStatus?: number | null; cause?: unknown } = {}) {
    super(message, 502, { cause: options.cause });
    this.name = "UpstreamError";
    this.upstreamDetail = options.detail ?? message;
    this.upstreamStatus = options.upstreamStatus ?? null;
  }

  override get detail(): unknown {
    return this.upstreamDetail;
  }
}

export class NotFoundError extends HttpError {
  constructor(message: string) {
    super(message, 404);
    this.name = "NotFoundError";
  }
}

export function toErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
