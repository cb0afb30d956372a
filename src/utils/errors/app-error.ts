export class AppError extends Error {
  public readonly code: string;
  public readonly isOperational: boolean;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string = 'INTERNAL_ERROR',
    isOperational: boolean = true,
    details?: Record<string, unknown>,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = this.constructor.name;
    this.code = code;
    this.isOperational = isOperational;
    this.details = details;

    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Missing or malformed configuration. Raised before any network or database I/O.
 */
export class ConfigError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_ERROR', true, details);
  }
}

/**
 * Network failure, non-success HTTP status, or an error notice embedded in a provider payload.
 */
export class FetchError extends AppError {
  public readonly provider: string;
  public readonly status?: number;

  constructor(provider: string, message: string, status?: number, cause?: unknown) {
    super(`${provider}: ${message}`, 'FETCH_ERROR', true, { provider, status }, cause);
    this.provider = provider;
    this.status = status;
  }
}

/**
 * A single raw record that could not be converted. Callers skip the record and continue.
 */
export class RecordError extends AppError {
  public readonly recordKey: string;

  constructor(recordKey: string, message: string, details?: Record<string, unknown>) {
    super(`Invalid record ${recordKey}: ${message}`, 'RECORD_ERROR', true, details);
    this.recordKey = recordKey;
  }
}

/**
 * Database connection or statement failure. The dataset's transaction has been rolled back.
 */
export class LoadError extends AppError {
  public readonly table?: string;
  public readonly pgCode?: string;
  public readonly detail?: string;

  constructor(message: string, table?: string, cause?: unknown) {
    const pgCode = readStringField(cause, 'code');
    const detail = readStringField(cause, 'detail');
    const reason = cause instanceof Error ? `: ${cause.message}` : '';
    super(`${message}${reason}`, 'LOAD_ERROR', true, { table, pgCode, detail }, cause);
    this.table = table;
    this.pgCode = pgCode;
    this.detail = detail;
  }
}

function readStringField(source: unknown, field: string): string | undefined {
  if (typeof source !== 'object' || source === null || !(field in source)) {
    return undefined;
  }
  const value: unknown = Reflect.get(source, field);
  return typeof value === 'string' ? value : undefined;
}
