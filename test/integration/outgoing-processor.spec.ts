import {
  DeliveryFailure,
  MentionDirection,
  MentionStatus,
  MentionType,
  MockHttpTransport,
  MockMentionFactory,
  MockStorageAdapter,
  ResolutionFailure,
  StorageFailure,
  ValidationError,
  Webmention,
  WebmentionsConfig,
  WebmentionsHandler,
} from '../../src';
import { createSilentLogger } from '../utils/silent-logger';

describe('Outgoing Webmentions Integration Tests', () => {
  const source = 'https://blog.example/posts/1';
  const targetA = 'https://alice.example/notes/a';
  const targetB = 'https://bob.example/notes/b';
  const targetC = 'https://carol.example/notes/c';

  let storage: MockStorageAdapter;
  let transport: MockHttpTransport;
  let processed: Webmention[];
  let deleted: Webmention[];
  let handler: WebmentionsHandler;

  const createHandler = (overrides: Partial<WebmentionsConfig> = {}) =>
    new WebmentionsHandler({
      storage,
      transport,
      baseUrl: 'https://blog.example/',
      onMentionProcessed: (mention) => {
        processed.push(mention);
      },
      onMentionDeleted: (mention) => {
        deleted.push(mention);
      },
      logger: createSilentLogger(),
      ...overrides,
    });

  /**
   * Serve a target page advertising an endpoint that accepts notifications
   */
  const serveTarget = (target: string, status = 202): string => {
    const endpoint = `${new URL(target).origin}/webmention`;
    transport.onPage(target, MockMentionFactory.endpointPage(endpoint));
    transport.onEndpoint(endpoint, status);
    return endpoint;
  };

  const markdownLinking = (...targets: string[]): string =>
    targets.map((target, index) => `[link ${index}](${target})`).join(' and ');

  beforeEach(() => {
    storage = new MockStorageAdapter();
    transport = new MockHttpTransport();
    processed = [];
    deleted = [];
    handler = createHandler();
    serveTarget(targetA);
    serveTarget(targetB);
    serveTarget(targetC);
  });

  describe('Sending', () => {
    it('should notify every linked target and record it', async () => {
      const result = await handler.processOutgoing(source, {
        text: markdownLinking(targetA, targetB),
      });

      expect([...result.sent].sort()).toEqual([targetA, targetB]);
      expect(result.retracted).toEqual([]);
      expect(result.failures).toEqual([]);
      expect(
        transport
          .notifications()
          .map((notification) => notification.endpoint)
          .sort(),
      ).toEqual([
        'https://alice.example/webmention',
        'https://bob.example/webmention',
      ]);
      expect(transport.notifications()[0].source).toBe(source);

      const sent = await handler.retrieveWebmentions(source, MentionDirection.OUT);
      expect(sent.map((mention) => mention.target).sort()).toEqual([targetA, targetB]);
      expect(processed).toHaveLength(2);
    });

    it('should not notify targets again when nothing changed', async () => {
      await handler.processOutgoing(source, { text: markdownLinking(targetA) });

      const result = await handler.processOutgoing(source, {
        text: markdownLinking(targetA),
      });

      expect(result.sent).toEqual([]);
      expect(result.unchanged).toEqual([targetA]);
      expect(transport.notifications()).toHaveLength(1);
    });

    it('should classify the mention from the source entry', async () => {
      transport.onPage(
        source,
        MockMentionFactory.entryPage({
          name: 'My reply',
          inReplyTo: [targetA],
          content: 'Agreed',
        }),
      );

      const result = await handler.processOutgoing(source);

      expect(result.sent).toEqual([targetA]);
      const stored = await storage.findWebmention(source, targetA, MentionDirection.OUT);
      expect(stored?.mentionType).toBe(MentionType.REPLY);
      expect(stored?.title).toBe('My reply');
      expect(stored?.status).toBe(MentionStatus.CONFIRMED);
    });

    it('should skip links back to the source itself', async () => {
      const result = await handler.processOutgoing(source, {
        text: `<a href="#comments">comments</a> <a href="${targetA}">a</a>`,
      });

      expect(result.sent).toEqual([targetA]);
    });
  });

  describe('Diffing', () => {
    it('should send new links and retract removed ones', async () => {
      await handler.processOutgoing(source, { text: markdownLinking(targetA, targetB) });
      processed = [];

      const result = await handler.processOutgoing(source, {
        text: markdownLinking(targetB, targetC),
      });

      expect(result.sent).toEqual([targetC]);
      expect(result.retracted).toEqual([targetA]);
      expect(result.unchanged).toEqual([targetB]);
      expect(deleted.map((mention) => mention.target)).toEqual([targetA]);
      expect(processed.map((mention) => mention.target)).toEqual([targetC]);

      const stored = await storage.findWebmention(source, targetA, MentionDirection.OUT);
      expect(stored?.status).toBe(MentionStatus.DELETED);
      expect(
        transport.requestsTo('https://alice.example/webmention', 'POST'),
      ).toHaveLength(2);
    });

    it('should retract everything when the content is emptied', async () => {
      await handler.processOutgoing(source, { text: markdownLinking(targetA, targetB) });

      const result = await handler.processOutgoing(source, { text: '' });

      expect([...result.retracted].sort()).toEqual([targetA, targetB]);
      expect(deleted).toHaveLength(2);
      expect(await handler.retrieveWebmentions(source, MentionDirection.OUT)).toEqual([]);
    });

    it('should retract everything when the source is gone', async () => {
      await handler.processOutgoing(source, { text: markdownLinking(targetA) });
      transport.on(source, { status: 410 });

      const result = await handler.processOutgoing(source);

      expect(result.retracted).toEqual([targetA]);
      expect(deleted).toHaveLength(1);
    });

    it('should send again a link that comes back', async () => {
      await handler.processOutgoing(source, { text: markdownLinking(targetA) });
      await handler.processOutgoing(source, { text: '' });

      const result = await handler.processOutgoing(source, {
        text: markdownLinking(targetA),
      });

      expect(result.sent).toEqual([targetA]);
      const stored = await storage.findWebmention(source, targetA, MentionDirection.OUT);
      expect(stored?.status).toBe(MentionStatus.CONFIRMED);
    });

    it('should not announce retractions when disabled', async () => {
      handler = createHandler({ notifyRetractions: false });
      await handler.processOutgoing(source, { text: markdownLinking(targetA) });

      await handler.processOutgoing(source, { text: '' });

      expect(
        transport.requestsTo('https://alice.example/webmention', 'POST'),
      ).toHaveLength(1);
      expect(deleted).toHaveLength(1);
    });
  });

  describe('Failures', () => {
    it('should report targets without an endpoint', async () => {
      const plain = 'https://dana.example/notes/d';
      transport.onPage(plain, '<p>No endpoint</p>');

      const result = await handler.processOutgoing(source, {
        text: markdownLinking(plain),
      });

      expect(result.unsupported).toEqual([plain]);
      expect(storage.getAll()).toEqual([]);
    });

    it('should report rejected notifications and retry them next time', async () => {
      const endpoint = serveTarget(targetA, 400);

      const first = await handler.processOutgoing(source, {
        text: markdownLinking(targetA),
      });

      expect(first.sent).toEqual([]);
      expect(first.failures).toHaveLength(1);
      expect(first.failures[0].stage).toBe('delivery');
      expect(first.failures[0].error).toBeInstanceOf(DeliveryFailure);
      expect(storage.getAll()).toEqual([]);

      transport.onEndpoint(endpoint, 202);
      const second = await handler.processOutgoing(source, {
        text: markdownLinking(targetA),
      });

      expect(second.sent).toEqual([targetA]);
    });

    it('should report unreachable targets', async () => {
      transport.on(targetB, { error: new Error('connection reset') });

      const result = await handler.processOutgoing(source, {
        text: markdownLinking(targetA, targetB),
      });

      expect(result.sent).toEqual([targetA]);
      expect(result.failures.map((failure) => [failure.target, failure.stage])).toEqual([
        [targetB, 'resolution'],
      ]);
    });

    it('should keep a retraction whose announcement fails and report it', async () => {
      await handler.processOutgoing(source, { text: markdownLinking(targetA) });
      transport.on(
        'https://alice.example/webmention',
        { error: new Error('connection refused') },
        'POST',
      );

      const result = await handler.processOutgoing(source, { text: '' });

      expect(result.retracted).toEqual([targetA]);
      expect(result.failures).toHaveLength(1);
      expect(result.failures[0].target).toBe(targetA);
      expect(result.failures[0].stage).toBe('retraction');
      expect(result.failures[0].error).toBeInstanceOf(ResolutionFailure);
      expect(result.failures[0].error.message).toBe(
        'POST https://alice.example/webmention failed: connection refused',
      );
      const stored = await storage.findWebmention(source, targetA, MentionDirection.OUT);
      expect(stored?.status).toBe(MentionStatus.DELETED);
      expect(deleted).toHaveLength(1);
    });

    it('should report a retracted target that can no longer be reached', async () => {
      await handler.processOutgoing(source, { text: markdownLinking(targetA) });
      transport.on(targetA, { error: new Error('connection reset') });

      const result = await handler.processOutgoing(source, { text: '' });

      expect(result.retracted).toEqual([targetA]);
      expect(result.failures.map((failure) => [failure.target, failure.stage])).toEqual([
        [targetA, 'retraction'],
      ]);
      expect(await handler.retrieveWebmentions(source, MentionDirection.OUT)).toEqual([]);
    });

    it('should propagate storage failures', async () => {
      storage = new MockStorageAdapter({ failOn: ['storeWebmention'] });
      handler = createHandler();

      await expect(
        handler.processOutgoing(source, { text: markdownLinking(targetA) }),
      ).rejects.toThrow(new StorageFailure('Simulated storeWebmention failure', 'storeWebmention'));
      expect(transport.notifications()).toHaveLength(1);
    });

    it('should reject a source that is not an http(s) URL', async () => {
      await expect(
        handler.processOutgoing('file:///tmp/post.md', { text: '' }),
      ).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('Callbacks', () => {
    it('should send and retract even when the callbacks fail', async () => {
      handler = createHandler({
        onMentionProcessed: () => {
          throw new Error('processed hook exploded');
        },
        onMentionDeleted: () => Promise.reject(new Error('deleted hook rejected')),
      });

      const sent = await handler.processOutgoing(source, {
        text: markdownLinking(targetA),
      });

      expect(sent.sent).toEqual([targetA]);
      expect(
        (await storage.findWebmention(source, targetA, MentionDirection.OUT))?.status,
      ).toBe(MentionStatus.CONFIRMED);

      const retracted = await handler.processOutgoing(source, { text: '' });

      expect(retracted.retracted).toEqual([targetA]);
      expect(retracted.failures).toEqual([]);
      expect(
        (await storage.findWebmention(source, targetA, MentionDirection.OUT))?.status,
      ).toBe(MentionStatus.DELETED);
      expect(handler.dispatcher.getStatistics()).toEqual({
        onMentionProcessed: { calls: 1, successes: 0, failures: 1 },
        onMentionDeleted: { calls: 1, successes: 0, failures: 1 },
      });
    });
  });

  describe('Concurrency', () => {
    it('should serialize runs for the same source', async () => {
      const runs = await Promise.all([
        handler.processOutgoing(source, { text: markdownLinking(targetA) }),
        handler.processOutgoing(source, { text: markdownLinking(targetA) }),
      ]);

      expect(runs[0].sent).toEqual([targetA]);
      expect(runs[1].sent).toEqual([]);
      expect(runs[1].unchanged).toEqual([targetA]);
      expect(transport.notifications()).toHaveLength(1);
    });
  });
});
