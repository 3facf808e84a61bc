export abstract class AppError extends Error {
  constructor(
    message: string,
    public readonly is_operational: boolean,
    public readonly context?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export enum TABLE_ERROR {
  OUT_OF_MEMORY = "OUT_OF_MEMORY",
  INVALID_CAPACITY = "INVALID_CAPACITY",
  INVALID_OPTION = "INVALID_OPTION",
  TABLE_FULL = "TABLE_FULL",
  DUPLICATE_KEY = "DUPLICATE_KEY",
  TABLE_RELEASED = "TABLE_RELEASED",
}

export class TableError extends AppError {
  constructor(
    public readonly category: TABLE_ERROR,
    message?: string,
    context?: Record<string, unknown>,
  ) {
    super(message ?? category, true, context);
  }
}

export function is_table_error(error: unknown): error is TableError {
  return error instanceof TableError;
}
