/**
 * Structural errors that are allowed to escape the engine.
 *
 * Data quality findings are never thrown; they are reported as issues.
 */

export class DataLoadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DataLoadError';
  }
}

export class DimensionMismatchError extends Error {
  readonly expected: number;
  readonly actual: number;
  readonly field: string;

  constructor(field: string, expected: number, actual: number) {
    super(`Length mismatch for ${field}: expected ${expected}, got ${actual}`);
    this.name = 'DimensionMismatchError';
    this.field = field;
    this.expected = expected;
    this.actual = actual;
  }
}

export class InvalidInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidInputError';
  }
}

export class ConfigError extends Error {
  readonly errors: string[];

  constructor(message: string, errors: string[] = []) {
    super(errors.length > 0 ? `${message}: ${errors.join('; ')}` : message);
    this.name = 'ConfigError';
    this.errors = errors;
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
