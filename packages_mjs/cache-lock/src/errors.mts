/**
 * Error thrown when a lock cannot be released because it is no longer held
 * (expired, stolen or never acquired)
 */
export class LockReleasingError extends Error {
  readonly code = 'LOCK_RELEASING';
  readonly resource: string;

  constructor(resource: string, message?: string) {
    super(message ?? `Failed to release the "${resource}" lock.`);
    this.name = 'LockReleasingError';
    this.resource = resource;
  }
}
