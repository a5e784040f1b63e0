import { Logger as NestLogger } from '@nestjs/common';
import { Webmention } from '../domain/models';
import { CallbackFailure, toError } from '../errors';
import { Logger, MentionCallback } from '../interfaces';

export type CallbackName = 'onMentionProcessed' | 'onMentionDeleted';

/**
 * Outcome of one dispatch
 */
export interface DispatchResult {
  callback: CallbackName;
  invoked: boolean;
  success: boolean;
  durationMs: number;
  error?: CallbackFailure;
}

export interface CallbackStatistics {
  calls: number;
  successes: number;
  failures: number;
}

/**
 * Callback dispatcher - invokes the user's mention callbacks
 *
 * Each callback receives its own copy of the mention. Throws and rejections
 * are logged as CallbackFailure and never reach the caller.
 */
export class CallbackDispatcher {
  private readonly callbacks: Partial<Record<CallbackName, MentionCallback>> = {};
  private readonly statistics: Record<CallbackName, CallbackStatistics> = {
    onMentionProcessed: { calls: 0, successes: 0, failures: 0 },
    onMentionDeleted: { calls: 0, successes: 0, failures: 0 },
  };
  private readonly logger: Logger;

  constructor(
    options: {
      onMentionProcessed?: MentionCallback;
      onMentionDeleted?: MentionCallback;
    } = {},
    logger?: Logger,
  ) {
    this.callbacks.onMentionProcessed = options.onMentionProcessed;
    this.callbacks.onMentionDeleted = options.onMentionDeleted;
    this.logger = logger ?? new NestLogger(CallbackDispatcher.name);
  }

  /**
   * Replace (or clear) one of the callbacks
   */
  setCallback(name: CallbackName, callback: MentionCallback | undefined): void {
    this.callbacks[name] = callback;
  }

  hasCallback(name: CallbackName): boolean {
    return this.callbacks[name] !== undefined;
  }

  dispatchProcessed(mention: Webmention): Promise<DispatchResult> {
    return this.dispatch('onMentionProcessed', mention);
  }

  dispatchDeleted(mention: Webmention): Promise<DispatchResult> {
    return this.dispatch('onMentionDeleted', mention);
  }

  getStatistics(): Record<CallbackName, CallbackStatistics> {
    return {
      onMentionProcessed: { ...this.statistics.onMentionProcessed },
      onMentionDeleted: { ...this.statistics.onMentionDeleted },
    };
  }

  private async dispatch(
    name: CallbackName,
    mention: Webmention,
  ): Promise<DispatchResult> {
    const callback = this.callbacks[name];
    if (!callback) {
      return { callback: name, invoked: false, success: true, durationMs: 0 };
    }

    const stats = this.statistics[name];
    stats.calls++;
    const startTime = Date.now();
    try {
      await callback(mention.clone());
      stats.successes++;
      return {
        callback: name,
        invoked: true,
        success: true,
        durationMs: Date.now() - startTime,
      };
    } catch (error) {
      stats.failures++;
      const failure = new CallbackFailure(
        name,
        mention.source,
        mention.target,
        mention.direction,
        toError(error),
      );
      this.logger.error(failure.message, failure.cause?.stack);
      return {
        callback: name,
        invoked: true,
        success: false,
        durationMs: Date.now() - startTime,
        error: failure,
      };
    }
  }
}
