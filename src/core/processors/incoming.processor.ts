import { Logger as NestLogger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import {
  MentionDirection,
  MentionStatus,
  TransitionTrigger,
} from '../domain/enums';
import { Webmention } from '../domain/models';
import { TransitionValidationError, ValidationError } from '../errors';
import { CallbackDispatcher } from '../events';
import { HttpTransport, Logger, StorageAdapter } from '../interfaces';
import {
  ContentParser,
  inferContentFormat,
  isUnderBaseUrl,
  normalizeUrl,
} from '../parser';
import { MentionStateMachine } from '../state-machine';
import { KeyedMutex } from './keyed-mutex';
import { fetchSource } from './source-fetcher';
import { IncomingResult } from './types';

export interface IncomingProcessorConfig {
  storage: StorageAdapter;
  transport: HttpTransport;
  parser: ContentParser;
  dispatcher: CallbackDispatcher;
  stateMachine: MentionStateMachine;
  baseUrl: string | null;
  initialMentionStatus: MentionStatus;
  httpTimeoutMs?: number;
  logger?: Logger;
}

/**
 * Incoming processor - validates, fetches, classifies and stores a received
 * Webmention notification
 *
 * Processing steps:
 * 1. Validation - URLs, self-mentions, foreign targets
 * 2. Fetch - GET the source (404/410 means gone)
 * 3. Verification - the source must still link to the target
 * 4. Extraction - microformats and HTML metadata for the target
 * 5. Persist - skipped when nothing changed or a moderator removed it
 * 6. Dispatch - user callbacks
 */
export class IncomingProcessor {
  private readonly logger: Logger;
  private readonly mutex = new KeyedMutex();

  constructor(private readonly config: IncomingProcessorConfig) {
    this.logger = config.logger ?? new NestLogger(IncomingProcessor.name);
  }

  async processIncoming(
    source: string | null | undefined,
    target: string | null | undefined,
  ): Promise<IncomingResult> {
    const { sourceUrl, targetUrl } = this.validate(source, target);
    return this.mutex.runExclusive(`${sourceUrl} ${targetUrl}`, () =>
      this.process(sourceUrl, targetUrl),
    );
  }

  private async process(
    sourceUrl: string,
    targetUrl: string,
  ): Promise<IncomingResult> {
    const startTime = Date.now();
    const processingId = uuidv4();
    const { storage, parser, dispatcher } = this.config;

    const fetched = await fetchSource(
      this.config.transport,
      sourceUrl,
      this.config.httpTimeoutMs,
    );
    const format = inferContentFormat(
      fetched.text,
      fetched.contentType,
      fetched.url,
    );
    const linked =
      !fetched.gone &&
      parser.mentionsTarget(fetched.text, format, sourceUrl, targetUrl);

    const existing = await storage.findWebmention(
      sourceUrl,
      targetUrl,
      MentionDirection.IN,
    );

    if (!linked) {
      if (!existing) {
        throw new ValidationError(
          fetched.gone
            ? `Source ${sourceUrl} is gone`
            : `Source ${sourceUrl} does not link to ${targetUrl}`,
          sourceUrl,
          targetUrl,
        );
      }
      if (existing.isDeleted()) {
        return {
          processingId,
          status: 'deleted',
          mention: existing,
          durationMs: Date.now() - startTime,
        };
      }

      this.config.stateMachine.transitionOrThrow(
        existing,
        MentionStatus.DELETED,
        TransitionTrigger.RETRACTION,
      );
      const deleted =
        (await storage.deleteWebmention(sourceUrl, targetUrl, MentionDirection.IN)) ??
        existing.clone({ status: MentionStatus.DELETED });
      this.logger.log(`Webmention ${sourceUrl} -> ${targetUrl} retracted by source`);
      const dispatch = await dispatcher.dispatchDeleted(deleted);
      return {
        processingId,
        status: 'deleted',
        mention: deleted,
        dispatch,
        durationMs: Date.now() - startTime,
      };
    }

    if (existing?.isModeratedAway()) {
      this.logger.debug(
        `Webmention ${sourceUrl} -> ${targetUrl} was removed by moderation, ignoring`,
      );
      return {
        processingId,
        status: 'unchanged',
        mention: existing,
        durationMs: Date.now() - startTime,
      };
    }

    const details = parser.extractMentionDetails(
      parser.render(fetched.text, format),
      sourceUrl,
      targetUrl,
    );
    // New, or relinked after the source dropped it
    const status =
      existing && !existing.isDeleted()
        ? existing.status
        : this.config.initialMentionStatus;
    if (!existing || existing.isDeleted()) {
      const from = existing?.status ?? null;
      const check = this.config.stateMachine.validateTransition(
        MentionDirection.IN,
        from,
        status,
        TransitionTrigger.RECEIVED,
      );
      if (!check.success) {
        throw new TransitionValidationError(
          `Cannot receive a mention as ${status}`,
          from,
          status,
          check.reason ?? 'Transition rejected',
        );
      }
    }

    const candidate = new Webmention({
      source: sourceUrl,
      target: targetUrl,
      direction: MentionDirection.IN,
      status,
      ...details,
      createdAt: existing?.createdAt ?? null,
      updatedAt: existing?.updatedAt ?? null,
    });

    if (existing && existing.hasSameContentAs(candidate)) {
      this.logger.debug(`Webmention ${sourceUrl} -> ${targetUrl} unchanged`);
      return {
        processingId,
        status: 'unchanged',
        mention: existing,
        durationMs: Date.now() - startTime,
      };
    }

    const stored = await storage.storeWebmention(candidate);
    this.logger.log(
      `Webmention ${sourceUrl} -> ${targetUrl} stored as ${stored.mentionType} (${stored.status})`,
    );
    const dispatch = await dispatcher.dispatchProcessed(stored);
    return {
      processingId,
      status: 'accepted',
      mention: stored,
      dispatch,
      durationMs: Date.now() - startTime,
    };
  }

  /**
   * Reject malformed, self-referencing and foreign notifications before any
   * network or storage access
   */
  private validate(
    source: string | null | undefined,
    target: string | null | undefined,
  ): { sourceUrl: string; targetUrl: string } {
    if (!source || !target) {
      throw new ValidationError(
        'Missing source or target URL',
        source ?? undefined,
        target ?? undefined,
      );
    }

    const sourceUrl = normalizeUrl(source);
    const targetUrl = normalizeUrl(target);
    if (!sourceUrl || !targetUrl) {
      throw new ValidationError(
        'Source and target must be absolute http(s) URLs',
        source,
        target,
      );
    }
    if (sourceUrl === targetUrl) {
      throw new ValidationError(
        'Source and target must be different resources',
        source,
        target,
      );
    }
    if (this.config.baseUrl && !isUnderBaseUrl(targetUrl, this.config.baseUrl)) {
      throw new ValidationError(
        `Target ${targetUrl} is not served by ${this.config.baseUrl}`,
        source,
        target,
      );
    }
    return { sourceUrl, targetUrl };
  }
}
