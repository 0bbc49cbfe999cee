/**
 * Standard error classes for mongoprobe
 *
 * The inference and validation core never throws on data; these classes
 * belong to the layers that talk to MongoDB, the filesystem and the CLI.
 */

export enum ErrorCode {
  GENERAL_ERROR = "GENERAL_ERROR",
  MONGO_CONNECTION_ERROR = "MONGO_CONNECTION_ERROR",
  FILE_IO_ERROR = "FILE_IO_ERROR",
  CONFIG_ERROR = "CONFIG_ERROR",
  SCHEMA_ERROR = "SCHEMA_ERROR",
  VALIDATION_ERROR = "VALIDATION_ERROR",
  EXECUTION_ERROR = "EXECUTION_ERROR",
  INPUT_READ_ERROR = "INPUT_READ_ERROR",
}

export interface ErrorResponse {
  status: "error";
  phase: string;
  error: {
    code: ErrorCode;
    message: string;
    details?: unknown;
    cause?: string;
  };
}

export class MongoProbeError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: unknown,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "MongoProbeError";
  }

  /**
   * Convert error to a format suitable for CLI output
   */
  toResponse(phase: string): ErrorResponse {
    return {
      status: "error",
      phase,
      error: {
        code: this.code,
        message: this.message,
        ...(this.details !== undefined ? { details: this.details } : {}),
        ...(this.cause !== undefined ? { cause: String(this.cause) } : {}),
      },
    };
  }
}

export class MongoConnectionError extends MongoProbeError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.MONGO_CONNECTION_ERROR, message, details, options);
    this.name = "MongoConnectionError";
  }
}

export class ConfigError extends MongoProbeError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.CONFIG_ERROR, message, details, options);
    this.name = "ConfigError";
  }
}

export class FileIOError extends MongoProbeError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.FILE_IO_ERROR, message, details, options);
    this.name = "FileIOError";
  }
}

export class SchemaError extends MongoProbeError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.SCHEMA_ERROR, message, details, options);
    this.name = "SchemaError";
  }
}

export class ValidationError extends MongoProbeError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.VALIDATION_ERROR, message, details, options);
    this.name = "ValidationError";
  }
}

export class ExecutionError extends MongoProbeError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.EXECUTION_ERROR, message, details, options);
    this.name = "ExecutionError";
  }
}

/**
 * Wrap any thrown value in a MongoProbeError, keeping project errors as-is
 */
export function toMongoProbeError(error: unknown): MongoProbeError {
  if (error instanceof MongoProbeError) {
    return error;
  }
  return new MongoProbeError(
    ErrorCode.GENERAL_ERROR,
    error instanceof Error ? error.message : String(error),
    undefined,
    { cause: error },
  );
}

/**
 * CLI exit code for an error category
 */
export function exitCodeFor(error: MongoProbeError): number {
  switch (error.code) {
    case ErrorCode.CONFIG_ERROR:
      return 2;
    case ErrorCode.MONGO_CONNECTION_ERROR:
      return 3;
    case ErrorCode.FILE_IO_ERROR:
    case ErrorCode.INPUT_READ_ERROR:
      return 4;
    default:
      return 1;
  }
}
