export type BrewinErrorType = 'NameError' | 'TypeError' | 'FaultError';

/**
 * The universal exception thrown while running a Brewin program.
 * Every subclass is fatal: the run is aborted at the first one.
 */
export abstract class BrewinError<T extends BrewinErrorType = BrewinErrorType> extends Error {
  constructor(public readonly errorType: T, public readonly reason: string) {
    super(reason);
    this.name = errorType;
  }

  toString(): string {
    return `[${this.errorType}]: ${this.reason}`;
  }
}

/** Undefined or redefined names, ambiguous function references. */
export class BrewinNameError extends BrewinError<'NameError'> {
  constructor(reason: string) {
    super('NameError', reason);
  }
}

/** Operand, declared-type, conversion, signature and interface mismatches. */
export class BrewinTypeError extends BrewinError<'TypeError'> {
  constructor(reason: string) {
    super('TypeError', reason);
  }
}

/** Dereferencing nil. */
export class BrewinFaultError extends BrewinError<'FaultError'> {
  constructor(reason: string) {
    super('FaultError', reason);
  }
}

export const failWithNameError = (reason: string): never => {
  throw new BrewinNameError(reason);
};

export const failWithTypeError = (reason: string): never => {
  throw new BrewinTypeError(reason);
};

export const failWithFaultError = (reason: string): never => {
  throw new BrewinFaultError(reason);
};
