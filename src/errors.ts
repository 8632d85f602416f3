export type NotebookErrorCode = 'INDEX_OUT_OF_RANGE' | 'MISSING_CONTENT' | 'MALFORMED_INPUT';

/**
 * Base class for every failure reported by the notebook operations
 */
export class NotebookError extends Error {
  constructor(
    message: string,
    readonly code: NotebookErrorCode
  ) {
    super(message);
    this.name = 'NotebookError';
  }
}

/**
 * A cell index outside the valid range of an operation.
 * `min` and `max` are inclusive; `max < min` means no index is valid.
 */
export class IndexOutOfRangeError extends NotebookError {
  constructor(
    readonly index: number,
    readonly min: number,
    readonly max: number
  ) {
    super(
      max < min
        ? `Cell index ${index} is out of range: notebook has no cells`
        : `Cell index ${index} is out of range (valid: ${min}..${max})`,
      'INDEX_OUT_OF_RANGE'
    );
    this.name = 'IndexOutOfRangeError';
  }
}

export class MissingContentError extends NotebookError {
  constructor(readonly operation: string) {
    super(`No content given for ${operation}: pass --content or --content-file`, 'MISSING_CONTENT');
    this.name = 'MissingContentError';
  }
}

export class MalformedInputError extends NotebookError {
  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message, 'MALFORMED_INPUT');
    this.name = 'MalformedInputError';
  }
}

export function isNotebookError(error: unknown): error is NotebookError {
  return error instanceof NotebookError;
}
