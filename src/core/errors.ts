export const ERROR_CODES = {
  INPUT_PRECONDITION: 'INPUT_PRECONDITION',
  TABLE_PARSE: 'TABLE_PARSE',
  MERGE_WRITE: 'MERGE_WRITE'
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export class NodepackError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Bad observation handed in by the caller. Never coerced. */
export class InputPreconditionError extends NodepackError {
  constructor(message: string) {
    super(ERROR_CODES.INPUT_PRECONDITION, message);
  }
}

export class TableParseError extends NodepackError {
  readonly line?: number;

  constructor(message: string, line?: number) {
    super(ERROR_CODES.TABLE_PARSE, line === undefined ? message : `${message} (line ${line})`);
    this.line = line;
  }
}

export class MergeWriteError extends NodepackError {
  readonly path: string;

  constructor(path: string, cause: unknown) {
    super(ERROR_CODES.MERGE_WRITE, `could not write ${path}: ${describeError(cause)}`, { cause });
    this.path = path;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
