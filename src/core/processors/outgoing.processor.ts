import { Logger as NestLogger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import {
  ContentFormat,
  MentionDirection,
  MentionStatus,
  TransitionTrigger,
} from '../domain/enums';
import { Webmention } from '../domain/models';
import {
  DeliveryFailure,
  ResolutionFailure,
  ValidationError,
  toError,
} from '../errors';
import { CallbackDispatcher } from '../events';
import {
  HttpResponse,
  HttpTransport,
  Logger,
  StorageAdapter,
  isSuccessStatus,
} from '../interfaces';
import { EndpointResolver } from '../discovery';
import {
  ContentParser,
  MicroformatEntry,
  classifyMention,
  inferContentFormat,
  normalizeUrl,
} from '../parser';
import { MentionStateMachine } from '../state-machine';
import { KeyedMutex, processInBatches } from './keyed-mutex';
import { fetchSource } from './source-fetcher';
import { OutgoingOptions, OutgoingResult } from './types';

export interface OutgoingProcessorConfig {
  storage: StorageAdapter;
  transport: HttpTransport;
  parser: ContentParser;
  resolver: EndpointResolver;
  dispatcher: CallbackDispatcher;
  stateMachine: MentionStateMachine;
  concurrency: number;
  notifyRetractions: boolean;
  httpTimeoutMs?: number;
  logger?: Logger;
}

/**
 * Outgoing processor - diffs a local resource's current links against the
 * mentions previously sent for it, notifies new targets and retracts the
 * ones no longer linked
 *
 * Runs are serialized per source URL.
 */
export class OutgoingProcessor {
  private readonly logger: Logger;
  private readonly mutex = new KeyedMutex();

  constructor(private readonly config: OutgoingProcessorConfig) {
    this.logger = config.logger ?? new NestLogger(OutgoingProcessor.name);
  }

  async processOutgoing(
    sourceUrl: string,
    options: OutgoingOptions = {},
  ): Promise<OutgoingResult> {
    const source = normalizeUrl(sourceUrl);
    if (!source) {
      throw new ValidationError(
        `Source must be an absolute http(s) URL: ${sourceUrl}`,
        sourceUrl,
      );
    }
    return this.mutex.runExclusive(source, () => this.process(source, options));
  }

  private async process(
    source: string,
    options: OutgoingOptions,
  ): Promise<OutgoingResult> {
    const startTime = Date.now();
    const result: OutgoingResult = {
      processingId: uuidv4(),
      source,
      sent: [],
      retracted: [],
      unsupported: [],
      failures: [],
      unchanged: [],
      durationMs: 0,
    };

    const { text, format } = await this.loadContent(source, options);
    const parsed = text
      ? this.config.parser.parse({ text, format, baseUrl: source })
      : null;
    const current = new Set(parsed?.links ?? []);

    const previousMentions = await this.config.storage.retrieveWebmentions(
      source,
      MentionDirection.OUT,
    );
    const previous = new Set(previousMentions.map((mention) => mention.target));

    const toSend = [...current].filter((target) => !previous.has(target));
    const toRetract = [...previous].filter((target) => !current.has(target));
    result.unchanged = [...current].filter((target) => previous.has(target));

    this.logger.debug(
      `Processing ${source}: ${toSend.length} to send, ${toRetract.length} to retract, ${result.unchanged.length} unchanged`,
    );

    const entry = parsed?.entry ?? null;
    await processInBatches(toSend, this.config.concurrency, (target) =>
      this.send(source, target, entry, result),
    );
    await processInBatches(toRetract, this.config.concurrency, (target) =>
      this.retract(source, target, result),
    );

    result.durationMs = Date.now() - startTime;
    this.logger.log(
      `Processed ${source}: sent ${result.sent.length}, retracted ${result.retracted.length}, unsupported ${result.unsupported.length}, failed ${result.failures.length}`,
    );
    return result;
  }

  private async loadContent(
    source: string,
    options: OutgoingOptions,
  ): Promise<{ text: string; format?: ContentFormat }> {
    if (options.text !== undefined) {
      return { text: options.text, format: options.format };
    }

    const fetched = await fetchSource(
      this.config.transport,
      source,
      this.config.httpTimeoutMs,
    );
    if (fetched.gone) {
      this.logger.log(`Source ${source} is gone, retracting its mentions`);
      return { text: '' };
    }
    return {
      text: fetched.text,
      format:
        options.format ??
        inferContentFormat(fetched.text, fetched.contentType, fetched.url),
    };
  }

  /**
   * Discover, notify, then persist. Network problems are reported in the
   * result; storage errors propagate.
   */
  private async send(
    source: string,
    target: string,
    entry: MicroformatEntry | null,
    result: OutgoingResult,
  ): Promise<void> {
    const resolution = await this.config.resolver.resolve(target);
    if (resolution.kind === 'unsupported') {
      this.logger.debug(resolution.error.message);
      result.unsupported.push(target);
      return;
    }
    if (resolution.kind === 'failed') {
      result.failures.push({ target, stage: 'resolution', error: resolution.error });
      return;
    }

    const response = await this.notify(resolution.endpoint, source, target);
    if (response instanceof Error) {
      this.logger.warn(`Failed to notify ${resolution.endpoint} for ${target}: ${response.message}`);
      result.failures.push({
        target,
        stage: response instanceof DeliveryFailure ? 'delivery' : 'resolution',
        error: response,
      });
      return;
    }

    const existing = await this.config.storage.findWebmention(
      source,
      target,
      MentionDirection.OUT,
    );
    const check = this.config.stateMachine.validateTransition(
      MentionDirection.OUT,
      existing?.status ?? null,
      MentionStatus.CONFIRMED,
      TransitionTrigger.SENT,
    );
    if (!check.success) {
      this.logger.warn(`Not recording mention of ${target}: ${check.reason}`);
      return;
    }

    const classification = entry
      ? classifyMention(entry, source, target)
      : null;
    const mention = new Webmention({
      source,
      target,
      direction: MentionDirection.OUT,
      status: MentionStatus.CONFIRMED,
      mentionType: classification?.mentionType,
      rsvp: classification?.rsvp,
      title: entry?.name ?? null,
      published: existing?.published ?? null,
      createdAt: existing?.createdAt ?? null,
    });

    const stored = await this.config.storage.storeWebmention(mention);
    result.sent.push(target);
    await this.config.dispatcher.dispatchProcessed(stored);
  }

  /**
   * Delete locally first; the courtesy notification cannot undo it. A failed
   * announcement is reported with the `retraction` stage.
   */
  private async retract(
    source: string,
    target: string,
    result: OutgoingResult,
  ): Promise<void> {
    const deleted = await this.config.storage.deleteWebmention(
      source,
      target,
      MentionDirection.OUT,
    );
    result.retracted.push(target);
    if (deleted) {
      await this.config.dispatcher.dispatchDeleted(deleted);
    }

    if (!this.config.notifyRetractions) {
      return;
    }
    const resolution = await this.config.resolver.resolve(target);
    if (resolution.kind === 'unsupported') {
      this.logger.debug(`Retraction of ${target} not announced: ${resolution.error.message}`);
      return;
    }
    if (resolution.kind === 'failed') {
      result.failures.push({ target, stage: 'retraction', error: resolution.error });
      return;
    }
    const response = await this.notify(resolution.endpoint, source, target);
    if (response instanceof Error) {
      this.logger.warn(`Failed to announce retraction to ${resolution.endpoint}: ${response.message}`);
      result.failures.push({ target, stage: 'retraction', error: response });
    }
  }

  /**
   * Submit a notification, returning the failure instead of throwing it
   */
  private async notify(
    endpoint: string,
    source: string,
    target: string,
  ): Promise<HttpResponse | DeliveryFailure | ResolutionFailure> {
    let response: HttpResponse;
    try {
      response = await this.config.transport.submitNotification(
        endpoint,
        source,
        target,
      );
    } catch (error) {
      return error instanceof ResolutionFailure
        ? error
        : new ResolutionFailure(
            `Failed to reach ${endpoint}`,
            endpoint,
            undefined,
            toError(error),
          );
    }

    if (!isSuccessStatus(response.status)) {
      return new DeliveryFailure(
        `Endpoint ${endpoint} answered ${response.status}`,
        endpoint,
        response.status,
      );
    }
    return response;
  }
}
