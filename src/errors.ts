export type TransportErrorKind = "unreachable" | "timeout" | "primitive_failed" | "bad_capture" | "session";

export class TransportError extends Error {
  readonly kind: TransportErrorKind;

  constructor(kind: TransportErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransportError";
    this.kind = kind;
  }
}

export type ModelErrorKind =
  | "timeout"
  | "rate_limit"
  | "quota"
  | "transport"
  | "server"
  | "auth"
  | "bad_request"
  | "malformed_response"
  | "invalid_response"
  | "missing_api_key";

const TRANSIENT_MODEL_ERRORS: ReadonlySet<ModelErrorKind> = new Set([
  "timeout",
  "rate_limit",
  "transport",
  "server"
]);

export class ModelError extends Error {
  readonly kind: ModelErrorKind;

  constructor(kind: ModelErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ModelError";
    this.kind = kind;
  }

  get transient(): boolean {
    return TRANSIENT_MODEL_ERRORS.has(this.kind);
  }
}

export class ConfigError extends Error {
  readonly source?: string;

  constructor(message: string, source?: string) {
    super(source ? `${source}: ${message}` : message);
    this.name = "ConfigError";
    this.source = source;
  }
}

export type ExecutionErrorKind = "missing_target" | "ambiguous_target" | "unknown_target" | "missing_message";

export class ExecutionError extends Error {
  readonly kind: ExecutionErrorKind;

  constructor(kind: ExecutionErrorKind, message: string) {
    super(message);
    this.name = "ExecutionError";
    this.kind = kind;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
