/**
 * Error types
 *
 * Every error raised by this package is a DocGenError carrying a stable
 * code. Recognition misses are never errors.
 *
 * @since 2026-10-19
 */

export const DocGenErrorCodes = {
  UNSUPPORTED_FILE_TYPE: 'UNSUPPORTED_FILE_TYPE',
  SOURCE_NOT_FOUND: 'SOURCE_NOT_FOUND',
  INVALID_DIALECT_SET: 'INVALID_DIALECT_SET',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type DocGenErrorCode = typeof DocGenErrorCodes[keyof typeof DocGenErrorCodes];

export class DocGenError extends Error {
  readonly code: DocGenErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(message: string, code: DocGenErrorCode, context?: Record<string, unknown>) {
    super(message);
    this.name = 'DocGenError';
    this.code = code;
    this.context = context;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toString(): string {
    return `${this.name} [${this.code}]: ${this.message}`;
  }
}

/**
 * Raised before scanning when a file's extension is not on the allowlist
 */
export class UnsupportedFileTypeError extends DocGenError {
  readonly filePath: string;

  constructor(filePath: string, supportedExtensions: readonly string[]) {
    super(
      `Unsupported file type: ${filePath} (expected one of ${supportedExtensions.join(', ')})`,
      DocGenErrorCodes.UNSUPPORTED_FILE_TYPE,
      { filePath, supportedExtensions: [...supportedExtensions] }
    );
    this.name = 'UnsupportedFileTypeError';
    this.filePath = filePath;
  }
}

/**
 * A file or directory handed to the batch layer does not exist
 */
export class SourceNotFoundError extends DocGenError {
  readonly sourcePath: string;

  constructor(sourcePath: string, kind: 'file' | 'directory') {
    super(`${kind === 'file' ? 'File' : 'Directory'} not found: ${sourcePath}`, DocGenErrorCodes.SOURCE_NOT_FOUND, {
      sourcePath,
      kind,
    });
    this.name = 'SourceNotFoundError';
    this.sourcePath = sourcePath;
  }
}

export function isDocGenError(error: unknown): error is DocGenError {
  return error instanceof DocGenError;
}

/**
 * Message of any thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
