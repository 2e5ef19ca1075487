export class AppError extends Error {
  constructor(
    public message: string,
    public statusCode: number,
    public errorCode?: string,
    public isOperational = true,
    public metadata?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      error: {
        message: this.message,
        statusCode: this.statusCode,
        ...(this.errorCode && { errorCode: this.errorCode }),
        ...(this.metadata && { metadata: this.metadata }),
      },
    };
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string) {
    super(`${resource} not found`, 404);
  }
}

export class ConflictError extends AppError {
  constructor(message: string, errorCode: string, metadata?: Record<string, unknown>) {
    super(message, 409, errorCode, true, metadata);
  }
}

export class BusinessRuleError extends AppError {
  constructor(message: string, errorCode: string, metadata?: Record<string, unknown>) {
    super(message, 422, errorCode, true, metadata);
  }
}

/**
 * A source value could not be converted to the type the star schema needs
 * (an unparseable timestamp or amount).
 */
export class DataConversionError extends AppError {
  constructor(entity: string, field: string, value: unknown) {
    super(
      `Cannot convert ${entity}.${field} value ${JSON.stringify(value)}`,
      500,
      'DATA_CONVERSION_FAILED',
      false,
      { entity, field, value }
    );
  }
}

/** A staged row would violate a key constraint of the target schema. */
export class DataIntegrityError extends AppError {
  constructor(message: string, metadata?: Record<string, unknown>) {
    super(message, 500, 'DATA_INTEGRITY_VIOLATION', false, metadata);
  }
}

export class EtlPhaseError extends AppError {
  constructor(
    public phase: string,
    public runId: number,
    public cause: unknown
  ) {
    super(
      `ETL phase ${phase} failed: ${cause instanceof Error ? cause.message : String(cause)}`,
      500,
      'ETL_PHASE_FAILED',
      false,
      { phase, runId }
    );
  }
}

export class DimensionLoadError extends AppError {
  constructor(public failures: Array<{ dimension: string; error: unknown }>) {
    super(
      `Dimension load failed: ${failures
        .map(({ dimension, error }) => `${dimension} (${error instanceof Error ? error.message : String(error)})`)
        .join(', ')}`,
      500,
      'DIMENSION_LOAD_FAILED',
      false,
      { dimensions: failures.map(({ dimension }) => dimension) }
    );
  }
}
