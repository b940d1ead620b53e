import { BaseError } from '@feedyard/shared/Types/errors.js';
import type { RuntimeOperation } from '../runtime/types.js';

/**
 * Base error for all controller errors
 * Extends shared BaseError for consistent error handling
 */
export class ControllerError extends BaseError {
  constructor(
    message: string,
    code: string,
    details?: unknown
  ) {
    super(message, code, details);
    this.name = 'ControllerError';
  }
}

/**
 * A feed file that cannot be parsed or validated. The entry is excluded from
 * desired state; other feeds are unaffected.
 */
export class FeedConfigError extends ControllerError {
  constructor(
    message: string,
    public feedName: string,
    public file: string,
    details?: unknown
  ) {
    super(message, 'FEED_CONFIG_ERROR', details);
    this.name = 'FeedConfigError';
  }
}

/**
 * Ownership of the configuration root could not be acquired. Fatal at startup.
 */
export class LockError extends ControllerError {
  constructor(
    message: string,
    public lockPath: string,
    details?: unknown
  ) {
    super(message, 'LOCK_ERROR', details);
    this.name = 'LockError';
  }
}

/**
 * A worker did not reach the running state in time.
 */
export class LaunchError extends ControllerError {
  constructor(
    message: string,
    public feedName: string,
    public diagnostics: string,
    details?: unknown
  ) {
    super(message, 'LAUNCH_ERROR', details);
    this.name = 'LaunchError';
  }
}

/**
 * A call to the container runtime failed or timed out.
 */
export class RuntimeCallError extends ControllerError {
  constructor(
    message: string,
    public operation: RuntimeOperation,
    public target: string,
    details?: unknown
  ) {
    super(message, 'RUNTIME_CALL_ERROR', details);
    this.name = 'RuntimeCallError';
  }
}
