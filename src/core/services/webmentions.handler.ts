import { Logger as NestLogger } from '@nestjs/common';
import {
  MentionDirection,
  MentionStatus,
  TransitionTrigger,
} from '../domain/enums';
import { Webmention } from '../domain/models';
import { EndpointResolver } from '../discovery';
import { ValidationError } from '../errors';
import { CallbackDispatcher } from '../events';
import {
  HttpTransport,
  HttpTransportFactory,
  Logger,
  ResolvedWebmentionsConfig,
  StorageAdapter,
  WebmentionFilter,
  WebmentionsConfig,
} from '../interfaces';
import { ContentParser, normalizeUrl } from '../parser';
import {
  IncomingProcessor,
  IncomingResult,
  OutgoingOptions,
  OutgoingProcessor,
  OutgoingResult,
} from '../processors';
import { MentionStateMachine } from '../state-machine';
import { resolveWebmentionsConfig } from './webmentions.config';

/**
 * Webmentions handler - the entry point wiring storage, transport, parser,
 * resolver, dispatcher and both processors
 */
export class WebmentionsHandler {
  readonly config: ResolvedWebmentionsConfig;
  readonly storage: StorageAdapter;
  readonly transport: HttpTransport;
  readonly parser: ContentParser;
  readonly resolver: EndpointResolver;
  readonly dispatcher: CallbackDispatcher;
  readonly stateMachine: MentionStateMachine;
  readonly incoming: IncomingProcessor;
  readonly outgoing: OutgoingProcessor;
  private readonly logger: Logger;

  constructor(config: WebmentionsConfig, createTransport?: HttpTransportFactory) {
    this.config = resolveWebmentionsConfig(config, createTransport);
    const { logger } = this.config;
    this.logger = logger ?? new NestLogger(WebmentionsHandler.name);

    this.storage = this.config.storage;
    this.transport = this.config.transport;
    this.parser = new ContentParser(logger);
    this.resolver = new EndpointResolver(
      this.transport,
      this.config.httpTimeoutMs,
      logger,
    );
    this.dispatcher = new CallbackDispatcher(
      {
        onMentionProcessed: this.config.onMentionProcessed,
        onMentionDeleted: this.config.onMentionDeleted,
      },
      logger,
    );
    this.stateMachine = new MentionStateMachine();

    this.incoming = new IncomingProcessor({
      storage: this.storage,
      transport: this.transport,
      parser: this.parser,
      dispatcher: this.dispatcher,
      stateMachine: this.stateMachine,
      baseUrl: this.config.baseUrl,
      initialMentionStatus: this.config.initialMentionStatus,
      httpTimeoutMs: this.config.httpTimeoutMs,
      logger,
    });
    this.outgoing = new OutgoingProcessor({
      storage: this.storage,
      transport: this.transport,
      parser: this.parser,
      resolver: this.resolver,
      dispatcher: this.dispatcher,
      stateMachine: this.stateMachine,
      concurrency: this.config.concurrency,
      notifyRetractions: this.config.notifyRetractions,
      httpTimeoutMs: this.config.httpTimeoutMs,
      logger,
    });
  }

  /**
   * Process a received notification
   */
  processIncoming(
    source: string | null | undefined,
    target: string | null | undefined,
  ): Promise<IncomingResult> {
    return this.incoming.processIncoming(source, target);
  }

  /**
   * Send and retract mentions for a local resource
   */
  processOutgoing(
    sourceUrl: string,
    options?: OutgoingOptions,
  ): Promise<OutgoingResult> {
    return this.outgoing.processOutgoing(sourceUrl, options);
  }

  /**
   * Confirmed mentions of a resource: received ones by target, sent ones by
   * source
   */
  retrieveWebmentions(
    resource: string,
    direction: MentionDirection,
  ): Promise<Webmention[]> {
    return this.storage.retrieveWebmentions(
      normalizeUrl(resource) ?? resource,
      direction,
    );
  }

  /**
   * Mentions of any status, for moderation views
   */
  listWebmentions(filter?: WebmentionFilter): Promise<Webmention[]> {
    return this.storage.listWebmentions(filter);
  }

  /**
   * Moderate a stored mention through the state machine
   */
  async updateMentionStatus(
    source: string,
    target: string,
    direction: MentionDirection,
    status: MentionStatus,
  ): Promise<Webmention> {
    const sourceUrl = normalizeUrl(source) ?? source;
    const targetUrl = normalizeUrl(target) ?? target;
    const existing = await this.storage.findWebmention(
      sourceUrl,
      targetUrl,
      direction,
    );
    if (!existing) {
      throw new ValidationError(
        `No ${direction} mention from ${sourceUrl} to ${targetUrl}`,
        sourceUrl,
        targetUrl,
      );
    }

    const trigger =
      direction === MentionDirection.OUT && status === MentionStatus.CONFIRMED
        ? TransitionTrigger.SENT
        : TransitionTrigger.MODERATION;
    const updated = this.stateMachine.transitionOrThrow(existing, status, trigger);
    if (updated.status === existing.status) {
      return existing;
    }

    // A moderated-away mention stays deleted when its source notifies again
    const stored = await this.storage.storeWebmention(
      updated.withDeletionReason(
        status === MentionStatus.DELETED ? 'moderation' : null,
      ),
    );
    this.logger.log(
      `Moderated ${direction} mention ${sourceUrl} -> ${targetUrl}: ${existing.status} -> ${stored.status}`,
    );

    if (stored.status === MentionStatus.DELETED) {
      await this.dispatcher.dispatchDeleted(stored);
    } else {
      await this.dispatcher.dispatchProcessed(stored);
    }
    return stored;
  }

  isHealthy(): Promise<boolean> {
    return this.storage.isHealthy();
  }
}
