export type NotePMErrorCode =
  | "CONFIGURATION"
  | "INVALID_ARGUMENTS"
  | "UNKNOWN_OPERATION"
  | "UPSTREAM_REQUEST"
  | "UPSTREAM_TIMEOUT"
  | "INVALID_RESPONSE";

export class NotePMError extends Error {
  constructor(
    public readonly code: NotePMErrorCode,
    message: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = "NotePMError";
  }
}

/** Missing or malformed startup settings. Fatal: the server must not start. */
export class ConfigurationError extends NotePMError {
  constructor(public readonly issues: string[]) {
    super("CONFIGURATION", `Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigurationError";
  }
}

export class InvalidArgumentsError extends NotePMError {
  constructor(
    public readonly operation: string,
    public readonly issues: string[]
  ) {
    super("INVALID_ARGUMENTS", `Invalid arguments for "${operation}": ${issues.join("; ")}`);
    this.name = "InvalidArgumentsError";
  }
}

export class UnknownOperationError extends NotePMError {
  constructor(public readonly operation: string) {
    super("UNKNOWN_OPERATION", `Unknown tool: ${operation}`);
    this.name = "UnknownOperationError";
  }
}

export class UpstreamRequestError extends NotePMError {
  constructor(
    public readonly status: number,
    public readonly body: string
  ) {
    super("UPSTREAM_REQUEST", `NotePM API error (${status}): ${body}`);
    this.name = "UpstreamRequestError";
  }
}

export class UpstreamTimeoutError extends NotePMError {
  constructor(
    public readonly url: string,
    public readonly timeoutMs: number,
    cause?: unknown
  ) {
    super("UPSTREAM_TIMEOUT", `NotePM API request timed out after ${timeoutMs}ms: ${url}`, cause);
    this.name = "UpstreamTimeoutError";
  }
}

export class InvalidResponseError extends NotePMError {
  constructor(
    public readonly detail: string,
    cause?: unknown
  ) {
    super("INVALID_RESPONSE", `Invalid JSON response: ${detail}`, cause);
    this.name = "InvalidResponseError";
  }
}

export function isNotePMError(value: unknown): value is NotePMError {
  return value instanceof NotePMError;
}
