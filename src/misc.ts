import inspect from 'object-inspect';

export function assertNever(never: never, message?: string): never {
  throw new Error(message || `Reached unreachable code: unexpected value ${inspect(never)}`);
}

// Raised when an upstream pass let through something it should have rejected.
// These are fatal: nothing in the translator catches them to carry on.
export class InvariantViolation extends Error {
  constructor(message: string) {
    super(`Internal error: ${message}`);
    this.name = 'InvariantViolation';
  }
}

export function invariant(condition: unknown, message: string | (() => string)): asserts condition {
  if (!condition) {
    throw new InvariantViolation(typeof message === 'string' ? message : message());
  }
}
