/**
 * Standard error classes for mongo-liveness
 */

export enum ErrorCode {
  GENERAL_ERROR = "GENERAL_ERROR",
  CONFIG_ERROR = "CONFIG_ERROR",
  STORAGE_ERROR = "STORAGE_ERROR",
  CONNECTIVITY_DEGRADED = "CONNECTIVITY_DEGRADED",
  FILE_IO_ERROR = "FILE_IO_ERROR",
}

export type ErrorDetails = Record<string, unknown>;

export class LivenessError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: ErrorDetails,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "LivenessError";
  }

  /**
   * Convert error to a format suitable for CLI output
   */
  toResponse(phase: string) {
    return {
      status: "error",
      phase,
      error: {
        code: this.code,
        message: this.message,
        ...(this.details ? { details: this.details } : {}),
        ...(this.cause ? { cause: String(this.cause) } : {}),
      },
    };
  }
}

/**
 * Invalid or inconsistent configuration. Fatal before the pool starts.
 */
export class ConfigError extends LivenessError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.CONFIG_ERROR, message, details, options);
    this.name = "ConfigError";
  }
}

export type StorageErrorCode =
  | "NETWORK"
  | "TIMEOUT"
  | "NOT_FOUND"
  | "DUPLICATE_KEY"
  | "SERVER_ERROR"
  | "UNKNOWN";

/**
 * A single storage call failed. `transient` hints whether a retry could succeed.
 */
export class StorageError extends LivenessError {
  constructor(
    public readonly storageCode: StorageErrorCode,
    message: string,
    public readonly transient: boolean,
    details?: ErrorDetails,
    options?: ErrorOptions,
  ) {
    super(ErrorCode.STORAGE_ERROR, message, { ...details, storageCode, transient }, options);
    this.name = "StorageError";
  }
}

/**
 * Raised by the heartbeat after sustained probe failures.
 */
export class ConnectivityError extends LivenessError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.CONNECTIVITY_DEGRADED, message, details, options);
    this.name = "ConnectivityError";
  }
}

export class FileIOError extends LivenessError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.FILE_IO_ERROR, message, details, options);
    this.name = "FileIOError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
