/** Base class for everything this package throws. */
export class VpicError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export interface TransportErrorOptions {
  status?: number;
  detail?: string;
  url?: string;
  cause?: unknown;
}

/**
 * Network failure, non-2xx response or an unreadable body. Surfaced to the
 * caller as is; nothing above the transport retries it.
 */
export class TransportError extends VpicError {
  readonly status: number | null;
  readonly detail: string | null;
  readonly url: string | null;

  constructor(message: string, options: TransportErrorOptions = {}) {
    super(message);
    this.status = options.status ?? null;
    this.detail = options.detail ?? null;
    this.url = options.url ?? null;
    if (options.cause !== undefined) this.cause = options.cause;
  }
}

export class InvalidRequest extends TransportError {}
export class InvalidParameters extends TransportError {}
export class MethodNotFound extends TransportError {}
// 429 and 503 carry a Retry-After header upstream
export class TooManyRequests extends TransportError {}
export class InternalError extends TransportError {}
export class ServiceUnavailable extends TransportError {}

/** A payload that could not be unified, normalized or mapped. */
export class MappingError extends VpicError {
  readonly record: unknown;

  constructor(message: string, record: unknown) {
    super(message);
    this.record = record;
  }
}

/** A local precondition failed; no request was sent. */
export class ValidationError extends VpicError {
  readonly field: string | null;

  constructor(message: string, field?: string) {
    super(message);
    this.field = field ?? null;
  }
}

const HTTP_ERRORS: Record<number, typeof TransportError> = {
  400: InvalidRequest,
  404: MethodNotFound,
  429: TooManyRequests,
  500: InternalError,
  503: ServiceUnavailable,
};

/**
 * Build the error for a failed response. vPIC error bodies look like
 * `{ "message": "...", "messageDetail": "..." }`; anything else falls back to
 * the status line.
 */
export function errorFromResponse(
  status: number,
  body: unknown,
  url: string,
  statusText = ""
): TransportError {
  let message = `HTTP ${status}${statusText ? ` ${statusText}` : ""} for ${url}`;
  let detail: string | undefined;

  if (typeof body === "object" && body !== null) {
    if ("message" in body && typeof body.message === "string" && body.message) {
      message = body.message;
    }
    if ("messageDetail" in body && typeof body.messageDetail === "string") {
      detail = body.messageDetail;
    }
  }

  let ErrorClass = HTTP_ERRORS[status] ?? TransportError;
  if (status === 400 && detail?.startsWith("The parameters dictionary")) {
    ErrorClass = InvalidParameters;
  }

  return new ErrorClass(message, { status, detail, url });
}
