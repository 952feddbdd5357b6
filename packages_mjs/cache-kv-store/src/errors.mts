/**
 * Error thrown when a key or tag is not acceptable to a backend
 */
export class InvalidArgumentError extends Error {
  readonly code = 'INVALID_ARGUMENT';

  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}
