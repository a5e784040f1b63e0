import {
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
  WebmentionsHandler,
  WebmentionsConfig,
} from '../../src';
import { createSilentLogger } from '../utils/silent-logger';

describe('Incoming Webmentions Integration Tests', () => {
  const source = 'https://alice.example/posts/1';
  const target = 'https://blog.example/articles/hello';

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

  beforeEach(() => {
    storage = new MockStorageAdapter();
    transport = new MockHttpTransport();
    processed = [];
    deleted = [];
    handler = createHandler();
  });

  describe('Accepting mentions', () => {
    it('should verify, classify and store a reply', async () => {
      transport.onPage(
        source,
        MockMentionFactory.reply(target, {
          content: 'Great post!',
          author: { name: 'Alice', url: 'https://alice.example/about' },
        }),
      );

      const result = await handler.processIncoming(source, target);

      expect(result.status).toBe('accepted');
      expect(result.mention.mentionType).toBe(MentionType.REPLY);
      expect(result.mention.status).toBe(MentionStatus.CONFIRMED);
      expect(result.mention.authorName).toBe('Alice');
      expect(result.mention.content).toBe('Great post!');
      expect(result.dispatch?.success).toBe(true);
      expect(transport.requestsTo(source, 'GET')).toHaveLength(1);

      const visible = await handler.retrieveWebmentions(target, MentionDirection.IN);
      expect(visible).toHaveLength(1);
      expect(visible[0].source).toBe(source);
      expect(processed).toHaveLength(1);
      expect(deleted).toHaveLength(0);
    });

    it('should store normalized URLs', async () => {
      transport.onPage(source, MockMentionFactory.plainPage([target]));

      const result = await handler.processIncoming(source, `${target}#comments`);

      expect(result.mention.target).toBe(target);
      expect(await handler.retrieveWebmentions(`${target}#top`, MentionDirection.IN)).toHaveLength(1);
    });

    it('should accept a plain text source', async () => {
      transport.on(source, {
        status: 200,
        headers: { 'content-type': 'text/plain' },
        body: `I liked ${target}, thanks.`,
      });

      const result = await handler.processIncoming(source, target);

      expect(result.status).toBe('accepted');
      expect(result.mention.mentionType).toBe(MentionType.MENTION);
    });

    it('should not write or notify when nothing changed', async () => {
      transport.onPage(source, MockMentionFactory.reply(target, { content: 'Great post!' }));
      const first = await handler.processIncoming(source, target);

      const second = await handler.processIncoming(source, target);

      expect(second.status).toBe('unchanged');
      expect(second.mention.updatedAt?.getTime()).toBe(first.mention.updatedAt?.getTime());
      expect(processed).toHaveLength(1);
    });

    it('should update a mention whose source changed', async () => {
      transport.onPage(source, MockMentionFactory.reply(target, { content: 'First draft' }));
      const first = await handler.processIncoming(source, target);

      transport.onPage(source, MockMentionFactory.reply(target, { content: 'Final version' }));
      const second = await handler.processIncoming(source, target);

      expect(second.status).toBe('accepted');
      expect(second.mention.content).toBe('Final version');
      expect(second.mention.createdAt?.getTime()).toBe(first.mention.createdAt?.getTime());
      expect(storage.getAll()).toHaveLength(1);
      expect(processed).toHaveLength(2);
    });
  });

  describe('Retractions', () => {
    beforeEach(async () => {
      transport.onPage(source, MockMentionFactory.reply(target, { content: 'Great post!' }));
      await handler.processIncoming(source, target);
    });

    it('should delete a mention the source no longer links to', async () => {
      transport.onPage(source, MockMentionFactory.plainPage(['https://blog.example/other']));

      const result = await handler.processIncoming(source, target);

      expect(result.status).toBe('deleted');
      expect(result.mention.status).toBe(MentionStatus.DELETED);
      expect(await handler.retrieveWebmentions(target, MentionDirection.IN)).toEqual([]);
      expect(
        await handler.listWebmentions({ status: MentionStatus.DELETED }),
      ).toHaveLength(1);
      expect(deleted).toHaveLength(1);
    });

    it('should restore a mention when the source links to the target again', async () => {
      transport.onPage(source, MockMentionFactory.plainPage(['https://blog.example/other']));
      await handler.processIncoming(source, target);
      transport.onPage(source, MockMentionFactory.reply(target, { content: 'Great post!' }));

      const result = await handler.processIncoming(source, target);

      expect(result.status).toBe('accepted');
      expect(result.mention.status).toBe(MentionStatus.CONFIRMED);
      expect(await handler.retrieveWebmentions(target, MentionDirection.IN)).toHaveLength(1);
      expect(processed.map((mention) => mention.status)).toEqual([
        MentionStatus.CONFIRMED,
        MentionStatus.CONFIRMED,
      ]);
    });

    it('should delete a mention whose source is gone', async () => {
      transport.on(source, { status: 410 });

      const result = await handler.processIncoming(source, target);

      expect(result.status).toBe('deleted');
      expect(deleted).toHaveLength(1);
    });

    it('should be idempotent', async () => {
      transport.on(source, { status: 404 });

      await handler.processIncoming(source, target);
      const again = await handler.processIncoming(source, target);

      expect(again.status).toBe('deleted');
      expect(again.dispatch).toBeUndefined();
      expect(deleted).toHaveLength(1);
    });
  });

  describe('Rejections', () => {
    it('should reject a source that never linked to the target', async () => {
      transport.onPage(source, MockMentionFactory.plainPage(['https://blog.example/other']));

      await expect(handler.processIncoming(source, target)).rejects.toThrow(
        new ValidationError(`Source ${source} does not link to ${target}`),
      );
      expect(storage.getAll()).toEqual([]);
    });

    it('should reject a gone source without a stored mention', async () => {
      transport.on(source, { status: 410 });

      await expect(handler.processIncoming(source, target)).rejects.toThrow(
        `Source ${source} is gone`,
      );
    });

    it.each<[string | null, string, string]>([
      [null, target, 'Missing source or target URL'],
      [source, '', 'Missing source or target URL'],
      ['not a url', target, 'Source and target must be absolute http(s) URLs'],
      [target, `${target}#self`, 'Source and target must be different resources'],
      [
        source,
        'https://other.example/page',
        'Target https://other.example/page is not served by https://blog.example/',
      ],
    ])('should reject source=%p target=%p before any request', async (from, to, message) => {
      await expect(handler.processIncoming(from, to)).rejects.toThrow(
        new ValidationError(message),
      );
      expect(transport.requests).toHaveLength(0);
    });

    it('should surface an unreachable source as a resolution failure', async () => {
      transport.on(source, { status: 500 });

      await expect(handler.processIncoming(source, target)).rejects.toBeInstanceOf(
        ResolutionFailure,
      );
      expect(storage.getAll()).toEqual([]);
    });

    it('should propagate storage failures', async () => {
      storage = new MockStorageAdapter({ failOn: ['storeWebmention'] });
      handler = createHandler();
      transport.onPage(source, MockMentionFactory.plainPage([target]));

      await expect(handler.processIncoming(source, target)).rejects.toBeInstanceOf(
        StorageFailure,
      );
      expect(processed).toHaveLength(0);
    });
  });

  describe('Moderation', () => {
    beforeEach(() => {
      handler = createHandler({ initialMentionStatus: MentionStatus.PENDING });
      transport.onPage(source, MockMentionFactory.reply(target, { content: 'Great post!' }));
    });

    it('should hold new mentions until approved', async () => {
      const result = await handler.processIncoming(source, target);

      expect(result.mention.status).toBe(MentionStatus.PENDING);
      expect(await handler.retrieveWebmentions(target, MentionDirection.IN)).toEqual([]);

      const approved = await handler.updateMentionStatus(
        source,
        target,
        MentionDirection.IN,
        MentionStatus.CONFIRMED,
      );

      expect(approved.status).toBe(MentionStatus.CONFIRMED);
      expect(await handler.retrieveWebmentions(target, MentionDirection.IN)).toHaveLength(1);
      expect(processed.map((mention) => mention.status)).toEqual([
        MentionStatus.PENDING,
        MentionStatus.CONFIRMED,
      ]);
    });

    it('should keep the moderated status when the source is sent again', async () => {
      await handler.processIncoming(source, target);
      await handler.updateMentionStatus(
        source,
        target,
        MentionDirection.IN,
        MentionStatus.DELETED,
      );

      const again = await handler.processIncoming(source, target);

      expect(again.status).toBe('unchanged');
      expect(again.mention.status).toBe(MentionStatus.DELETED);
      expect(deleted).toHaveLength(1);
    });

    it('should ignore edits to a mention removed by moderation', async () => {
      await handler.processIncoming(source, target);
      await handler.updateMentionStatus(
        source,
        target,
        MentionDirection.IN,
        MentionStatus.DELETED,
      );
      transport.onPage(source, MockMentionFactory.reply(target, { content: 'Edited' }));

      const again = await handler.processIncoming(source, target);

      expect(again.status).toBe('unchanged');
      expect(again.mention.status).toBe(MentionStatus.DELETED);
      expect(processed.map((mention) => mention.status)).toEqual([MentionStatus.PENDING]);
    });

    it('should bring a relinked mention back for moderation', async () => {
      await handler.processIncoming(source, target);
      transport.onPage(source, MockMentionFactory.plainPage(['https://blog.example/other']));
      await handler.processIncoming(source, target);
      transport.onPage(source, MockMentionFactory.reply(target, { content: 'Great post!' }));

      const result = await handler.processIncoming(source, target);

      expect(result.status).toBe('accepted');
      expect(result.mention.status).toBe(MentionStatus.PENDING);
    });

    it('should clear the moderation mark when a mention is restored', async () => {
      await handler.processIncoming(source, target);
      const removed = await handler.updateMentionStatus(
        source,
        target,
        MentionDirection.IN,
        MentionStatus.DELETED,
      );
      expect(removed.metadata.deletedBy).toBe('moderation');

      const restored = await handler.updateMentionStatus(
        source,
        target,
        MentionDirection.IN,
        MentionStatus.CONFIRMED,
      );

      expect(restored.metadata.deletedBy).toBeUndefined();
      expect(await handler.retrieveWebmentions(target, MentionDirection.IN)).toHaveLength(1);
    });

    it('should reject moderating an unknown mention', async () => {
      await expect(
        handler.updateMentionStatus(
          source,
          target,
          MentionDirection.IN,
          MentionStatus.CONFIRMED,
        ),
      ).rejects.toBeInstanceOf(ValidationError);
    });
  });

  describe('Callbacks', () => {
    it('should store the mention even when the callback throws', async () => {
      handler = createHandler({
        onMentionProcessed: () => {
          throw new Error('hook exploded');
        },
      });
      transport.onPage(source, MockMentionFactory.plainPage([target]));

      const result = await handler.processIncoming(source, target);

      expect(result.status).toBe('accepted');
      expect(result.dispatch?.success).toBe(false);
      expect(await handler.retrieveWebmentions(target, MentionDirection.IN)).toHaveLength(1);
    });
  });
});
