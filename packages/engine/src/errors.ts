export class EngineError extends Error {
  constructor(
    public code: string,
    message: string,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Malformed loan file or loan record. Raised before any simulation starts. */
export class InputValidationError extends EngineError {
  constructor(
    message: string,
    public row?: number,
  ) {
    super('INPUT_VALIDATION', row === undefined ? message : `[row ${row}] ${message}`);
  }
}

/**
 * A loan operation would break its own bookkeeping, e.g. a payment larger
 * than the outstanding balance. Always an allocation bug in the caller.
 */
export class InvariantViolationError extends EngineError {
  constructor(message: string) {
    super('INVARIANT_VIOLATION', message);
  }
}

export class ConfigurationError extends EngineError {
  constructor(message: string) {
    super('CONFIGURATION', message);
  }
}
