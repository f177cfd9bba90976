/**
 * Error thrown when a core invariant is broken. These are programming errors:
 * callers let them propagate instead of recovering.
 */
export class InvariantViolationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantViolationError';
  }
}

export function invariant(condition: unknown, message: string): asserts condition {
  if (!condition) {
    throw new InvariantViolationError(`INVARIANT VIOLATION: ${message}`);
  }
}
