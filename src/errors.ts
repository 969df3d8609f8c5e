/**
 * Error codes for fatal scan failures. Every one of them ends the run with exit code 3.
 */
export type ScanErrorCode =
  | 'PATH_NOT_FOUND'
  | 'READ_FAILED'
  | 'DECODE_FAILED'
  | 'NO_RESOURCES'
  | 'OUTPUT_FAILED';

export class ScanError extends Error {
  readonly code: ScanErrorCode;

  constructor(code: ScanErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ScanError';
    this.code = code;
  }

  /** Same code and cause, message prefixed with the step that failed. */
  withContext(context: string): ScanError {
    return new ScanError(this.code, `${context}: ${this.message}`, { cause: this.cause });
  }
}

export function isScanError(err: unknown): err is ScanError {
  return err instanceof ScanError;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
