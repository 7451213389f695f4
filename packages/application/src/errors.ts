export type AppErrorCode =
  | "CATALOG_FORMAT_ERROR"
  | "CATALOG_READ_ERROR"
  | "INVALID_CONFIGURATION"
  | "USAGE_ERROR"
  | "INTERNAL_ERROR";

export const EXIT_STATUS_FAILURE = 1;
export const EXIT_STATUS_INVALID_ARGS = 2;

export interface AppErrorInput {
  message: string;
  code: AppErrorCode;
  exitStatus: number;
  details?: unknown;
  cause?: unknown;
}

export class AppError extends Error {
  readonly code: AppErrorCode;
  readonly exitStatus: number;
  readonly details?: unknown;

  constructor(input: AppErrorInput) {
    super(
      input.message,
      input.cause !== undefined ? { cause: input.cause } : undefined,
    );
    this.name = new.target.name;
    this.code = input.code;
    this.exitStatus = input.exitStatus;
    if (input.details !== undefined) this.details = input.details;
  }
}

export class CatalogFormatError extends AppError {
  constructor(message = "Catalog file is malformed", details?: unknown) {
    super({
      message,
      code: "CATALOG_FORMAT_ERROR",
      exitStatus: EXIT_STATUS_FAILURE,
      ...(details !== undefined ? { details } : {}),
    });
  }
}

export class CatalogReadError extends AppError {
  constructor(
    message = "Catalog file could not be read",
    details?: unknown,
    cause?: unknown,
  ) {
    super({
      message,
      code: "CATALOG_READ_ERROR",
      exitStatus: EXIT_STATUS_FAILURE,
      ...(details !== undefined ? { details } : {}),
      ...(cause !== undefined ? { cause } : {}),
    });
  }
}

export class ConfigurationError extends AppError {
  constructor(message = "Invalid configuration", details?: unknown) {
    super({
      message,
      code: "INVALID_CONFIGURATION",
      exitStatus: EXIT_STATUS_FAILURE,
      ...(details !== undefined ? { details } : {}),
    });
  }
}

export class UsageError extends AppError {
  constructor(message = "Invalid arguments", details?: unknown) {
    super({
      message,
      code: "USAGE_ERROR",
      exitStatus: EXIT_STATUS_INVALID_ARGS,
      ...(details !== undefined ? { details } : {}),
    });
  }
}

export class InternalError extends AppError {
  constructor(message = "Unexpected error", details?: unknown) {
    super({
      message,
      code: "INTERNAL_ERROR",
      exitStatus: EXIT_STATUS_FAILURE,
      ...(details !== undefined ? { details } : {}),
    });
  }
}
