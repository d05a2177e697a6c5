/**
 * Errors raised at the configuration and ingestion boundaries.
 * Record content never throws; the engine turns it into violations instead.
 */
export class AppError extends Error {
  constructor(
    message: string,
    public code: string
  ) {
    super(message);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ConfigError extends AppError {
  constructor(message: string) {
    super(message, 'CONFIG_ERROR');
  }
}

export interface ValidationIssue {
  path: string;
  message: string;
}

export class InputValidationError extends AppError {
  constructor(
    message: string,
    public details: ValidationIssue[] = []
  ) {
    super(message, 'VALIDATION_ERROR');
  }
}
