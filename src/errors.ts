/**
 * Error hierarchy for tallytree.
 */

export interface ErrorOptions {
  cause?: Error;
}

export class TotalError extends Error {
  readonly code: string;
  readonly details: Record<string, unknown>;
  override readonly cause?: Error;
  readonly timestamp: string;

  constructor(code: string, message: string, details?: Record<string, unknown>, cause?: Error) {
    super(message, cause ? { cause } : undefined);
    this.name = 'TotalError';
    this.code = code;
    this.details = details ?? {};
    this.cause = cause;
    this.timestamp = new Date().toISOString();
  }

  override toString(): string {
    return `[${this.code}] ${this.message}`;
  }

  toJSON(): Record<string, unknown> {
    const obj: Record<string, unknown> = {
      code: this.code,
      message: this.message,
    };
    if (Object.keys(this.details).length > 0) {
      obj.details = this.details;
    }
    if (this.cause !== undefined) {
      obj.cause = String(this.cause);
    }
    obj.timestamp = this.timestamp;
    return obj;
  }
}

export class ConfigNotFoundError extends TotalError {
  constructor(configPath: string, options?: ErrorOptions) {
    super('CONFIG_NOT_FOUND', `Configuration file not found: ${configPath}`, { configPath }, options?.cause);
    this.name = 'ConfigNotFoundError';
  }
}

export class ConfigError extends TotalError {
  constructor(message: string, details?: Record<string, unknown>, options?: ErrorOptions) {
    super('CONFIG_INVALID', message, details, options?.cause);
    this.name = 'ConfigError';
  }
}

export class InvalidInputError extends TotalError {
  constructor(message: string = 'Invalid input', details?: Record<string, unknown>, options?: ErrorOptions) {
    super('GENERAL_INVALID_INPUT', message, details, options?.cause);
    this.name = 'InvalidInputError';
  }
}

/**
 * Raised when a written value cannot be read as a finite number.
 */
export class InvalidValueError extends TotalError {
  constructor(key: string, value: unknown, options?: ErrorOptions) {
    super(
      'INVALID_VALUE',
      `Value for '${key}' is not a finite number: ${describeValue(value)}`,
      { key, value },
      options?.cause,
    );
    this.name = 'InvalidValueError';
  }

  get key(): string {
    return String(this.details['key']);
  }
}

/**
 * Raised when a write would create a nested node beneath a scalar leaf.
 */
export class StructuralConflictError extends TotalError {
  constructor(key: string, leafPath: string, options?: ErrorOptions) {
    super(
      'STRUCTURAL_CONFLICT',
      `Cannot nest under scalar leaf '${leafPath}' while writing '${key}'`,
      { key, leafPath },
      options?.cause,
    );
    this.name = 'StructuralConflictError';
  }

  get key(): string {
    return String(this.details['key']);
  }

  get leafPath(): string {
    return String(this.details['leafPath']);
  }
}

function describeValue(value: unknown): string {
  if (typeof value === 'string') return `'${value}'`;
  return String(value);
}

export const ErrorCodes = Object.freeze({
  CONFIG_NOT_FOUND: 'CONFIG_NOT_FOUND',
  CONFIG_INVALID: 'CONFIG_INVALID',
  GENERAL_INVALID_INPUT: 'GENERAL_INVALID_INPUT',
  INVALID_VALUE: 'INVALID_VALUE',
  STRUCTURAL_CONFLICT: 'STRUCTURAL_CONFLICT',
} as const);

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];
