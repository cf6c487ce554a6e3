/**
 * Error taxonomy for the ingestion run.
 * Every failure the CLI reports is one of these.
 */

export class IngestionError extends Error {
  public readonly code: string;
  public readonly context?: Record<string, unknown>;

  constructor(message: string, code: string = 'INGESTION_ERROR', context?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.context = context;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
    };
  }
}

/** Unknown source, malformed mapping file, unknown cleaner or column */
export class ConfigurationError extends IngestionError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'CONFIGURATION_ERROR', context);
  }
}

export class MissingFieldError extends IngestionError {
  public readonly field: string;

  constructor(field: string, source: string) {
    super(`Required field '${field}' missing from ${source} record`, 'MISSING_FIELD', { field, source });
    this.field = field;
  }
}

export class TypeCoercionError extends IngestionError {
  constructor(cleaner: string, value: unknown, reason?: string) {
    const shown = typeof value === 'string' ? `'${value}'` : String(value);
    super(
      `${cleaner} cannot convert ${shown}${reason ? `: ${reason}` : ''}`,
      'TYPE_COERCION',
      { cleaner, value }
    );
  }
}

export class NetworkError extends IngestionError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'NETWORK_ERROR', context);
  }
}

export class PersistenceError extends IngestionError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'PERSISTENCE_ERROR', context);
  }
}

/** Bad ticker, date range or period supplied by the caller */
export class InvalidRequestError extends IngestionError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, 'INVALID_REQUEST', context);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
