import { ContentFormat } from '../domain/enums';
import { Webmention } from '../domain/models';
import { WebmentionError } from '../errors';
import { DispatchResult } from '../events';

/**
 * Options for processing a local resource's outgoing mentions
 */
export interface OutgoingOptions {
  /**
   * Current content; fetched from the source URL when omitted
   */
  text?: string;
  format?: ContentFormat;
}

/**
 * `retraction` marks a target deleted locally whose endpoint was not told
 */
export type OutgoingFailureStage = 'resolution' | 'delivery' | 'retraction';

export interface OutgoingFailure {
  target: string;
  stage: OutgoingFailureStage;
  error: WebmentionError;
}

/**
 * Result of processing a local resource's outgoing mentions
 */
export interface OutgoingResult {
  processingId: string;
  source: string;
  /**
   * Targets notified and stored as confirmed
   */
  sent: string[];
  /**
   * Targets no longer linked, marked deleted
   */
  retracted: string[];
  /**
   * Targets without a Webmention endpoint
   */
  unsupported: string[];
  failures: OutgoingFailure[];
  /**
   * Targets linked before and now, left alone
   */
  unchanged: string[];
  durationMs: number;
}

export type IncomingStatus = 'accepted' | 'deleted' | 'unchanged';

/**
 * Result of processing a received notification
 */
export interface IncomingResult {
  processingId: string;
  status: IncomingStatus;
  mention: Webmention;
  dispatch?: DispatchResult;
  durationMs: number;
}
