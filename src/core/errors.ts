export type HoardErrorSeverity = "fatal" | "recoverable" | "warning";

export const DISCOVERY_ERROR_CODES = ["INVALID_NAME", "RATE_LIMITED", "LISTING_FAILED"] as const;

export const DOWNLOAD_ERROR_CODES = ["CLONE_FAILED", "CLONE_TIMEOUT", "CLONE_ABORTED"] as const;

export const ARCHIVE_ERROR_CODES = ["ARCHIVE_WRITE_FAILED"] as const;

export const RUN_ERROR_CODES = [
  "NO_REPOSITORIES_DOWNLOADED",
  "RUN_ABORTED",
  "WORKDIR_CLEANUP_FAILED",
] as const;

export const CONFIG_ERROR_CODES = ["CONFIG_INVALID", "CONFIG_SECRET_MISSING"] as const;

export const HOARD_ERROR_CODES = [
  ...DISCOVERY_ERROR_CODES,
  ...DOWNLOAD_ERROR_CODES,
  ...ARCHIVE_ERROR_CODES,
  ...RUN_ERROR_CODES,
  ...CONFIG_ERROR_CODES,
] as const;

export type DiscoveryErrorCode = (typeof DISCOVERY_ERROR_CODES)[number];
export type DownloadErrorCode = (typeof DOWNLOAD_ERROR_CODES)[number];
export type ArchiveErrorCode = (typeof ARCHIVE_ERROR_CODES)[number];
export type RunErrorCode = (typeof RUN_ERROR_CODES)[number];
export type ConfigErrorCode = (typeof CONFIG_ERROR_CODES)[number];
export type HoardErrorCode = (typeof HOARD_ERROR_CODES)[number];

export interface HoardErrorOptions {
  severity?: HoardErrorSeverity;
  context?: Record<string, unknown>;
  cause?: unknown;
}

export class HoardError extends Error {
  public readonly code: HoardErrorCode;
  public readonly severity: HoardErrorSeverity;
  public readonly context?: Record<string, unknown>;
  public override readonly cause?: unknown;

  public constructor(
    message: string,
    code: HoardErrorCode,
    severity: HoardErrorSeverity,
    context?: Record<string, unknown>,
    cause?: unknown,
  ) {
    super(message);
    this.name = "HoardError";
    this.code = code;
    this.severity = severity;
    this.context = context;
    this.cause = cause;
  }
}

function createError(
  code: HoardErrorCode,
  message: string,
  defaultSeverity: HoardErrorSeverity,
  options: HoardErrorOptions = {},
): HoardError {
  return new HoardError(
    message,
    code,
    options.severity ?? defaultSeverity,
    options.context,
    options.cause,
  );
}

export function discoveryError(
  code: DiscoveryErrorCode,
  message: string,
  options: HoardErrorOptions = {},
): HoardError {
  return createError(code, message, "recoverable", options);
}

export function downloadError(
  code: DownloadErrorCode,
  message: string,
  options: HoardErrorOptions = {},
): HoardError {
  return createError(code, message, "recoverable", options);
}

export function archiveError(
  code: ArchiveErrorCode,
  message: string,
  options: HoardErrorOptions = {},
): HoardError {
  return createError(code, message, "fatal", options);
}

export function runError(
  code: RunErrorCode,
  message: string,
  options: HoardErrorOptions = {},
): HoardError {
  return createError(code, message, "fatal", options);
}

export function configError(
  code: ConfigErrorCode,
  message: string,
  options: HoardErrorOptions = {},
): HoardError {
  return createError(code, message, "fatal", options);
}

/**
 * Wraps an arbitrary thrown value so per-task failures can travel on the
 * event bus with a code attached. Existing `HoardError`s pass through.
 */
export function toHoardError(
  error: unknown,
  fallbackCode: DiscoveryErrorCode | DownloadErrorCode,
  message: string,
): HoardError {
  if (error instanceof HoardError) {
    return error;
  }

  return new HoardError(message, fallbackCode, "recoverable", undefined, error);
}
