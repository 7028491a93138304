export type PaginationErrorCode = "CONFIGURATION" | "TOKEN_SHAPE" | "HTTP_STATUS";

export class PaginationError extends Error {
  readonly code: PaginationErrorCode;

  constructor(code: PaginationErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConfigurationError extends PaginationError {
  constructor(message: string) {
    super("CONFIGURATION", message);
  }
}

export class TokenShapeError extends PaginationError {
  constructor(message = "The iterator token definition and the current token value are incompatible") {
    super("TOKEN_SHAPE", message);
  }
}

export class HttpStatusError extends PaginationError {
  readonly status: number;
  readonly body: unknown;

  constructor(operation: string, status: number, statusText: string, body: unknown) {
    super("HTTP_STATUS", `${operation} failed with HTTP ${status}${statusText ? ` ${statusText}` : ""}`);
    this.status = status;
    this.body = body;
  }
}
