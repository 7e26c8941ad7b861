/**
 * Standard error classes for RecordLoom
 */

import type { ChunkReport, LoadStage } from "../types/data-model.js";

export enum ErrorCode {
  GENERAL_ERROR = "GENERAL_ERROR",
  STORE_UNAVAILABLE = "STORE_UNAVAILABLE",
  VERSION_RACE_LOST = "VERSION_RACE_LOST",
  SCHEMA_VERSION_ERROR = "SCHEMA_VERSION_ERROR",
  BATCH_FAILED = "BATCH_FAILED",
  FILE_IO_ERROR = "FILE_IO_ERROR",
  CONFIG_ERROR = "CONFIG_ERROR",
  INPUT_READ_ERROR = "INPUT_READ_ERROR",
}

export type ErrorDetails = Record<string, unknown>;

export class RecordLoomError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: ErrorDetails,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "RecordLoomError";
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

export class StoreUnavailableError extends RecordLoomError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.STORE_UNAVAILABLE, message, details, options);
    this.name = "StoreUnavailableError";
  }
}

/**
 * Raised by a store when another writer already claimed a schema version number.
 */
export class VersionRaceLostError extends RecordLoomError {
  constructor(
    public readonly version: number,
    options?: ErrorOptions,
  ) {
    super(
      ErrorCode.VERSION_RACE_LOST,
      `Schema version ${version} was claimed by a concurrent writer`,
      { version },
      options,
    );
    this.name = "VersionRaceLostError";
  }
}

export class SchemaVersionError extends RecordLoomError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.SCHEMA_VERSION_ERROR, message, details, options);
    this.name = "SchemaVersionError";
  }
}

export class ConfigError extends RecordLoomError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.CONFIG_ERROR, message, details, options);
    this.name = "ConfigError";
  }
}

export class FileIOError extends RecordLoomError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.FILE_IO_ERROR, message, details, options);
    this.name = "FileIOError";
  }
}

export class InputReadError extends RecordLoomError {
  constructor(message: string, details?: ErrorDetails, options?: ErrorOptions) {
    super(ErrorCode.INPUT_READ_ERROR, message, details, options);
    this.name = "InputReadError";
  }
}

/**
 * Terminal error of an upload: names the failed stage and what was already committed
 */
export class BatchFailedError extends RecordLoomError {
  constructor(
    public readonly stage: LoadStage,
    public readonly committedChunks: ChunkReport[],
    options?: ErrorOptions,
  ) {
    const committed = committedChunks.reduce((sum, chunk) => sum + chunk.inserted + chunk.updated, 0);
    super(
      ErrorCode.BATCH_FAILED,
      `Upload failed during ${stage} after committing ${committedChunks.length} chunk(s)`,
      { stage, committedChunks: committedChunks.map((chunk) => ({ ...chunk })), committedRecords: committed },
      options,
    );
    this.name = "BatchFailedError";
  }
}

/**
 * Wrap an unknown thrown value as a RecordLoomError, keeping existing ones as-is
 */
export function toRecordLoomError(error: unknown): RecordLoomError {
  if (error instanceof RecordLoomError) {
    return error;
  }
  return new RecordLoomError(
    ErrorCode.GENERAL_ERROR,
    error instanceof Error ? error.message : String(error),
    undefined,
    { cause: error },
  );
}
