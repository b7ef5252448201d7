/**
 * Error taxonomy for the Gerrit review parser.
 *
 * Fatal errors (malformed input, fetch, config, render mode) abort the CLI
 * with exit code 1. InvalidCommentError and ContextReadError are recovered
 * where they are raised.
 *
 * @module errors
 */

export type GerritReviewErrorCode =
  | 'MALFORMED_INPUT'
  | 'INVALID_COMMENT'
  | 'CONTEXT_READ'
  | 'INVALID_MODE'
  | 'CONFIG'
  | 'FETCH';

export class GerritReviewError extends Error {
  readonly code: GerritReviewErrorCode;

  constructor(code: GerritReviewErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The review payload is not JSON or lacks the change number or subject. */
export class MalformedInputError extends GerritReviewError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('MALFORMED_INPUT', message, options);
  }
}

/** A single comment record is unusable; the record is skipped. */
export class InvalidCommentError extends GerritReviewError {
  /** Position of the record among all comment records in the payload */
  readonly index: number;

  constructor(index: number, message: string) {
    super('INVALID_COMMENT', `Comment #${index + 1}: ${message}`);
    this.index = index;
  }
}

export class ContextReadError extends GerritReviewError {
  readonly filePath: string;

  constructor(filePath: string, message: string, options?: { cause?: unknown }) {
    super('CONTEXT_READ', `Cannot read ${filePath}: ${message}`, options);
    this.filePath = filePath;
  }
}

export class InvalidModeError extends GerritReviewError {
  readonly mode: string;

  constructor(mode: string) {
    super('INVALID_MODE', `Unsupported render mode "${mode}". Must be one of: text, json`);
    this.mode = mode;
  }
}

export class ConfigError extends GerritReviewError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONFIG', message, options);
  }
}

/** The Gerrit query could not be run or exited non-zero. */
export class FetchError extends GerritReviewError {
  readonly stderr: string;

  constructor(message: string, stderr = '', options?: { cause?: unknown }) {
    super('FETCH', message, options);
    this.stderr = stderr;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
