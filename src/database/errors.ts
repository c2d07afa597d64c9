export type CompilationDatabaseErrorCode =
  | 'IO_ERROR'
  | 'DESERIALIZATION_ERROR'
  | 'SERIALIZATION_ERROR'
  | 'PATH_ENCODING_ERROR'
  | 'CONVERSION_ERROR';

export class CompilationDatabaseError extends Error {
  override name = 'CompilationDatabaseError';
  readonly code: CompilationDatabaseErrorCode;
  readonly details?: Record<string, unknown>;

  constructor(
    code: CompilationDatabaseErrorCode,
    message: string,
    options?: { cause?: unknown; details?: Record<string, unknown> },
  ) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.code = code;
    this.details = options?.details;
  }
}

export function isCompilationDatabaseError(
  value: unknown,
  code?: CompilationDatabaseErrorCode,
): value is CompilationDatabaseError {
  if (!(value instanceof CompilationDatabaseError)) return false;
  return code === undefined || value.code === code;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
