// Error type shared by every stage of the download pipeline

export type BiliErrorCode =
  | "PARSE_ERROR"
  | "ASSIGNMENT_NOT_FOUND"
  | "METADATA_NOT_FOUND"
  | "TITLE_MISSING"
  | "TITLE_AMBIGUOUS"
  | "DECODE_ERROR"
  | "RESOURCE_NOT_FOUND"
  | "QUALITY_LABEL_MISSING"
  | "UNKNOWN_QUALITY"
  | "INVALID_VIDEO_ID"
  | "FETCH_ERROR"
  | "MERGE_ERROR";

export interface BiliErrorDetails {
  cause?: unknown;
  path?: string; // offending field for DECODE_ERROR, e.g. "$.data.dash"
  stdout?: string;
  stderr?: string;
  exitCode?: number | null;
  signal?: string | null;
}

export class BiliError extends Error {
  readonly code: BiliErrorCode;
  readonly path?: string;
  readonly stdout?: string;
  readonly stderr?: string;
  readonly exitCode?: number | null;
  readonly signal?: string | null;

  constructor(code: BiliErrorCode, message: string, details: BiliErrorDetails = {}) {
    super(message, details.cause === undefined ? undefined : { cause: details.cause });
    this.name = "BiliError";
    this.code = code;
    this.path = details.path;
    this.stdout = details.stdout;
    this.stderr = details.stderr;
    this.exitCode = details.exitCode;
    this.signal = details.signal;
  }
}

/**
 * Narrows an unknown value to a BiliError, optionally of one code.
 */
export function isBiliError(error: unknown, code?: BiliErrorCode): error is BiliError {
  return error instanceof BiliError && (code === undefined || error.code === code);
}

/**
 * Extracts a printable message from anything thrown.
 */
export function formatError(error: unknown): string {
  if (error instanceof BiliError) {
    return `${error.code}: ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
