export type RadarErrorType = "InvalidInput" | "FetchFailure";

export type FetchFailureReason =
  | "rate_limited"
  | "not_found"
  | "forbidden"
  | "timeout"
  | "network"
  | "unknown";

export interface RadarErrorPayload {
  type: RadarErrorType;
  message: string;
  details?: string[];
  reason?: FetchFailureReason;
  target?: string;
  statusCode?: number;
}

export abstract class RadarError extends Error {
  abstract readonly type: RadarErrorType;

  toPayload(): RadarErrorPayload {
    return { type: this.type, message: this.message };
  }
}

/**
 * Raised before any fetch when arguments are missing, out of range or malformed.
 */
export class InvalidInputError extends RadarError {
  readonly type = "InvalidInput";

  constructor(
    message: string,
    readonly details: string[] = []
  ) {
    super(message);
    this.name = "InvalidInputError";
  }

  toPayload(): RadarErrorPayload {
    return this.details.length
      ? { type: this.type, message: this.message, details: this.details }
      : super.toPayload();
  }
}

export class FetchFailureError extends RadarError {
  readonly type = "FetchFailure";

  constructor(
    message: string,
    readonly reason: FetchFailureReason,
    readonly target: string,
    readonly statusCode?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "FetchFailureError";
  }

  toPayload(): RadarErrorPayload {
    return {
      type: this.type,
      message: this.message,
      reason: this.reason,
      target: this.target,
      ...(this.statusCode !== undefined ? { statusCode: this.statusCode } : {}),
    };
  }
}

function readStatusCode(err: unknown): number | undefined {
  if (typeof err !== "object" || err === null) return undefined;
  if ("statusCode" in err && typeof err.statusCode === "number") {
    return err.statusCode;
  }
  if ("status" in err && typeof err.status === "number") {
    return err.status;
  }
  return undefined;
}

function readCode(err: unknown): string {
  if (typeof err === "object" && err !== null && "code" in err) {
    return String(err.code);
  }
  return "";
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function classifyFetchError(err: unknown): FetchFailureReason {
  const statusCode = readStatusCode(err);
  const code = readCode(err);
  const msg = describeError(err);

  if (statusCode === 429 || /rate ?limit/i.test(msg)) return "rate_limited";
  if (statusCode === 404 || /not found/i.test(msg)) return "not_found";
  if (statusCode === 403 || statusCode === 401) return "forbidden";
  if (code === "ETIMEDOUT" || code === "ESOCKETTIMEDOUT" || /timed? ?out/i.test(msg)) {
    return "timeout";
  }
  if (["ECONNRESET", "ECONNREFUSED", "ENOTFOUND", "EAI_AGAIN"].includes(code)) {
    return "network";
  }
  return "unknown";
}

/**
 * Wraps an upstream error from the Reddit client. Errors that are already
 * FetchFailureErrors pass through untouched.
 */
export function toFetchFailure(err: unknown, target: string): FetchFailureError {
  if (err instanceof FetchFailureError) return err;
  const reason = classifyFetchError(err);
  return new FetchFailureError(
    `Failed to fetch ${target}: ${describeError(err)}`,
    reason,
    target,
    readStatusCode(err),
    { cause: err }
  );
}
