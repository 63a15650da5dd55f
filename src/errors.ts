/**
 * Error classes for the replay memory subsystem.
 *
 * "Not enough data" is never an error: sampling methods return `null` for it.
 * Everything here signals a misconfigured caller.
 */

export class MemoryError extends Error {
  readonly code: string;
  readonly details?: unknown;

  constructor(message: string, code: string, details?: unknown) {
    super(message);
    this.name = 'MemoryError';
    this.code = code;
    this.details = details;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      details: this.details,
    };
  }
}

/** A caller broke an argument contract (zero capacity, mismatched lengths, ...). */
export class PreconditionError extends MemoryError {
  constructor(message: string, details?: unknown) {
    super(message, 'PRECONDITION_FAILED', details);
    this.name = 'PreconditionError';
  }
}

/** Configuration input failed schema validation. */
export class ConfigError extends MemoryError {
  constructor(message: string, details?: unknown) {
    super(message, 'INVALID_CONFIG', details);
    this.name = 'ConfigError';
  }
}

export function ensure(condition: boolean, message: string, details?: unknown): asserts condition {
  if (!condition) throw new PreconditionError(message, details);
}

export function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}
