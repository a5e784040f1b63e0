import { MentionDirection, MentionStatus } from '../domain/enums';

/**
 * Base class for every error raised by the Webmention engine
 */
export class WebmentionError extends Error {
  constructor(message: string, public readonly cause?: Error) {
    super(message);
    this.name = 'WebmentionError';
  }
}

/**
 * The notification or mention is malformed or not acceptable.
 * Always surfaced to the caller, never retried.
 */
export class ValidationError extends WebmentionError {
  constructor(
    message: string,
    public readonly source?: string,
    public readonly target?: string,
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Network failure, timeout or server error while fetching a resource or
 * discovering an endpoint. Transient: safe to retry later.
 */
export class ResolutionFailure extends WebmentionError {
  constructor(
    message: string,
    public readonly url: string,
    public readonly status?: number,
    cause?: Error,
  ) {
    super(message, cause);
    this.name = 'ResolutionFailure';
  }
}

/**
 * The target was reached and does not advertise a Webmention endpoint
 */
export class UnsupportedTarget extends WebmentionError {
  constructor(public readonly target: string) {
    super(`Target does not advertise a Webmention endpoint: ${target}`);
    this.name = 'UnsupportedTarget';
  }
}

/**
 * The endpoint answered a notification with a non-2xx status
 */
export class DeliveryFailure extends WebmentionError {
  constructor(
    message: string,
    public readonly endpoint: string,
    public readonly status: number,
  ) {
    super(message);
    this.name = 'DeliveryFailure';
  }

  get retryable(): boolean {
    return this.status === 429 || this.status >= 500;
  }
}

/**
 * Raised by storage adapters. Propagated to the caller unmodified.
 */
export class StorageFailure extends WebmentionError {
  constructor(
    message: string,
    public readonly operation: string,
    cause?: Error,
  ) {
    super(message, cause);
    this.name = 'StorageFailure';
  }
}

/**
 * A user callback threw or rejected. Logged, never propagated.
 */
export class CallbackFailure extends WebmentionError {
  constructor(
    public readonly callback: string,
    public readonly source: string,
    public readonly target: string,
    public readonly direction: MentionDirection,
    cause?: Error,
  ) {
    super(
      `Callback ${callback} failed for <source=${source} target=${target} direction=${direction}>: ${cause?.message ?? 'unknown error'}`,
      cause,
    );
    this.name = 'CallbackFailure';
  }
}

/**
 * A status transition is not allowed for the mention's direction
 */
export class TransitionValidationError extends WebmentionError {
  constructor(
    message: string,
    public readonly fromStatus: MentionStatus | null,
    public readonly toStatus: MentionStatus,
    public readonly reason: string,
  ) {
    super(message);
    this.name = 'TransitionValidationError';
  }
}

/**
 * The handler configuration is invalid
 */
export class ConfigurationError extends WebmentionError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Normalize anything thrown into an Error
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
