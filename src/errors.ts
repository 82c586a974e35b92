import type { Dialect } from "./canonical";

export type ErrorKind =
  | "invalid_request"
  | "authentication"
  | "permission"
  | "not_found"
  | "request_too_large"
  | "rate_limit"
  | "server_error"
  | "service_unavailable"
  | "timeout"
  | "upstream_error";

export class GatewayError extends Error {
  readonly status: number;
  readonly kind: ErrorKind;

  constructor(message: string, status: number, kind: ErrorKind) {
    super(message);
    this.name = "GatewayError";
    this.status = status;
    this.kind = kind;
  }
}

export class InvalidRequestError extends GatewayError {
  constructor(message: string) {
    super(message, 400, "invalid_request");
    this.name = "InvalidRequestError";
  }
}

export class CredentialError extends GatewayError {
  constructor(message = "Failed to obtain upstream credential") {
    super(message, 401, "authentication");
    this.name = "CredentialError";
  }
}

export class UpstreamError extends GatewayError {
  /** Raw upstream body, kept for debug logging. */
  readonly body: string;

  constructor(message: string, status: number, kind: ErrorKind = classifyStatus(status), body = "") {
    super(message, status, kind);
    this.name = "UpstreamError";
    this.body = body;
  }
}

/** Connection-level failure: refused, reset, DNS, timeout. Always retryable. */
export class NetworkError extends GatewayError {
  readonly timedOut: boolean;

  constructor(message: string, timedOut = false, options?: { cause?: unknown }) {
    super(message, 502, "upstream_error");
    this.name = "NetworkError";
    this.timedOut = timedOut;
    if (options && options.cause !== undefined) this.cause = options.cause;
  }
}

/** A malformed upstream stream element. Logged and skipped, never surfaced. */
export class TranscodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TranscodeError";
  }
}

export function classifyStatus(status: number): ErrorKind {
  switch (status) {
    case 400:
    case 422:
      return "invalid_request";
    case 401:
      return "authentication";
    case 403:
      return "permission";
    case 404:
      return "not_found";
    case 413:
      return "request_too_large";
    case 429:
      return "rate_limit";
    case 500:
    case 502:
      return "server_error";
    case 503:
      return "service_unavailable";
    case 504:
      return "timeout";
    default:
      return "upstream_error";
  }
}

export const RETRYABLE_STATUSES: ReadonlySet<number> = new Set([429, 500, 502, 503, 504]);

export function isRetryableStatus(status: number): boolean {
  return RETRYABLE_STATUSES.has(status);
}

export function toGatewayError(err: unknown): GatewayError {
  if (err instanceof GatewayError) return err;
  const message = err instanceof Error ? err.message : String(err ?? "unknown error");
  return new GatewayError(message, 500, "server_error");
}

function openaiErrorType(kind: ErrorKind): string {
  switch (kind) {
    case "invalid_request":
    case "request_too_large":
      return "invalid_request_error";
    case "authentication":
      return "authentication_error";
    case "permission":
      return "permission_error";
    case "not_found":
      return "not_found_error";
    case "rate_limit":
      return "rate_limit_error";
    case "timeout":
      return "timeout_error";
    default:
      return "server_error";
  }
}

export function claudeErrorType(kind: ErrorKind): string {
  switch (kind) {
    case "invalid_request":
      return "invalid_request_error";
    case "authentication":
      return "authentication_error";
    case "permission":
      return "permission_error";
    case "not_found":
      return "not_found_error";
    case "request_too_large":
      return "request_too_large";
    case "rate_limit":
      return "rate_limit_error";
    case "service_unavailable":
      return "overloaded_error";
    default:
      return "api_error";
  }
}

export type OpenAIErrorBody = { error: { message: string; type: string; code: string } };
export type ClaudeErrorBody = { type: "error"; error: { type: string; message: string } };

export function openaiErrorBody(kind: ErrorKind, message: string): OpenAIErrorBody {
  return { error: { message, type: openaiErrorType(kind), code: kind } };
}

export function claudeErrorBody(kind: ErrorKind, message: string): ClaudeErrorBody {
  return { type: "error", error: { type: claudeErrorType(kind), message } };
}

export function errorBodyFor(dialect: Dialect, err: GatewayError): OpenAIErrorBody | ClaudeErrorBody {
  if (dialect === "claude") return claudeErrorBody(err.kind, err.message);
  return openaiErrorBody(err.kind, err.message);
}
