import { Webmention } from '../domain/models';
import { MentionStatus } from '../domain/enums';
import { StorageAdapter } from './storage.adapter';
import { HttpTransport } from './http-transport.interface';

/**
 * User hook invoked with a copy of a processed or deleted mention
 */
export type MentionCallback = (mention: Webmention) => void | Promise<void>;

/**
 * Webmentions handler configuration
 */
export interface WebmentionsConfig {
  /**
   * Storage adapter
   */
  storage: StorageAdapter;

  /**
   * HTTP transport. Without one, the handler builds it with the factory it
   * was given.
   */
  transport?: HttpTransport;

  /**
   * Root URL of the local site; incoming targets must live under it
   */
  baseUrl?: string;

  /**
   * Status given to newly received mentions
   */
  initialMentionStatus?: MentionStatus;

  onMentionProcessed?: MentionCallback;

  onMentionDeleted?: MentionCallback;

  /**
   * Timeout for every HTTP call (ms)
   */
  httpTimeoutMs?: number;

  userAgent?: string;

  /**
   * Batch size for outgoing sends and retractions
   */
  concurrency?: number;

  /**
   * Re-notify a target's endpoint after retracting a mention of it
   */
  notifyRetractions?: boolean;

  logger?: Logger;
}

/**
 * Configuration with defaults applied
 */
export interface ResolvedWebmentionsConfig
  extends Required<
    Omit<
      WebmentionsConfig,
      'baseUrl' | 'onMentionProcessed' | 'onMentionDeleted' | 'logger'
    >
  > {
  baseUrl: string | null;
  onMentionProcessed?: MentionCallback;
  onMentionDeleted?: MentionCallback;
  logger?: Logger;
}

/**
 * Logger interface
 */
export interface Logger {
  error(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  log(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
  verbose(message: string, ...args: unknown[]): void;
}
