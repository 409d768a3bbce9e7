/** Base class for everything the estimator throws. */
export class DgimError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidConfigurationError extends DgimError {
  constructor(readonly field: string, readonly value: unknown, reason: string) {
    super(`invalid ${field} (${String(value)}): ${reason}`);
  }
}

/** Raised by update() for anything other than 0 or 1. */
export class InvalidInputError extends DgimError {
  constructor(readonly value: unknown) {
    super(`expected a bit (0 or 1), got ${String(value)}`);
  }
}
