/**
 * Error codes for the caption pipeline.
 *
 * Fatal codes abort the current file (or the whole run for ENGINE_MISSING);
 * everything recoverable is reported as a Degradation instead of thrown.
 */
export const ErrorCode = {
  ENGINE_MISSING: "ENGINE_MISSING",
  ENGINE_FAILED: "ENGINE_FAILED",
  ENGINE_TIMEOUT: "ENGINE_TIMEOUT",
  ALIGNED_REQUIRED: "ALIGNED_REQUIRED",
  ALIGNED_OUTPUT_INVALID: "ALIGNED_OUTPUT_INVALID",
  BASE_OUTPUT_EMPTY: "BASE_OUTPUT_EMPTY",
  DESYNC: "DESYNC",
  CONFIG_INVALID: "CONFIG_INVALID",
  ABORTED: "ABORTED",
} as const;

export type ErrorCodeValue = (typeof ErrorCode)[keyof typeof ErrorCode];

export interface CaptionSyncErrorOptions {
  /** Input media file the error belongs to */
  file?: string;
  cause?: unknown;
}

export class CaptionSyncError extends Error {
  readonly code: ErrorCodeValue;
  file?: string;

  constructor(
    code: ErrorCodeValue,
    message: string,
    options: CaptionSyncErrorOptions = {}
  ) {
    super(message, { cause: options.cause });
    this.name = "CaptionSyncError";
    this.code = code;
    this.file = options.file;
  }
}

export class EngineMissingError extends CaptionSyncError {
  readonly dependency: string;

  constructor(dependency: string, path: string, options?: CaptionSyncErrorOptions) {
    super(
      ErrorCode.ENGINE_MISSING,
      `Required ${dependency} not found: ${path}`,
      options
    );
    this.name = "EngineMissingError";
    this.dependency = dependency;
  }
}

export class AlignedOutputError extends CaptionSyncError {
  constructor(message: string, options?: CaptionSyncErrorOptions) {
    super(ErrorCode.ALIGNED_OUTPUT_INVALID, message, options);
    this.name = "AlignedOutputError";
  }
}

export interface DesyncStats {
  clipped: number;
  total: number;
  ratio: number;
  threshold: number;
}

export class DesyncError extends CaptionSyncError {
  readonly stats: DesyncStats;

  constructor(stats: DesyncStats, options?: CaptionSyncErrorOptions) {
    super(
      ErrorCode.DESYNC,
      `Timing sources are desynchronized: ${stats.clipped}/${stats.total} elements clipped (${formatRatio(stats.ratio)} > ${formatRatio(stats.threshold)})`,
      options
    );
    this.name = "DesyncError";
    this.stats = stats;
  }
}

export class ConfigError extends CaptionSyncError {
  constructor(message: string, options?: CaptionSyncErrorOptions) {
    super(ErrorCode.CONFIG_INVALID, message, options);
    this.name = "ConfigError";
  }
}

export function isCaptionSyncError(error: unknown): error is CaptionSyncError {
  return error instanceof CaptionSyncError;
}

/** Attaches the input file to an error that was raised without one. */
export function withFile(error: unknown, file: string): unknown {
  if (isCaptionSyncError(error) && !error.file) {
    error.file = file;
  }
  return error;
}

const formatRatio = (ratio: number) => `${(ratio * 100).toFixed(1)}%`;
