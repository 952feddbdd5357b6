/**
 * Errors raised by the HTTP cache store
 */

/**
 * The store was built with options it cannot work with, or asked for a
 * capability its backend does not have
 */
export class ConfigurationError extends Error {
  readonly code = 'CONFIGURATION_ERROR';
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

/**
 * A response without any expiration time was handed to write()
 */
export class UncacheableResponseError extends Error {
  readonly code = 'UNCACHEABLE_RESPONSE';

  constructor(message: string = 'A response without any cache expiration time cannot be stored.') {
    super(message);
    this.name = 'UncacheableResponseError';
  }
}

/**
 * The backend refused to persist a response body
 */
export class StorageError extends Error {
  readonly code = 'STORAGE_FAILURE';
  readonly key: string;

  constructor(key: string, message: string = 'Unable to store the entity.') {
    super(message);
    this.name = 'StorageError';
    this.key = key;
  }
}
