import {
  CallbackDispatcher,
  CallbackFailure,
  MockMentionFactory,
  Webmention,
} from '../../src';
import { createSilentLogger as silentLogger } from '../utils/silent-logger';

describe('CallbackDispatcher', () => {
  it('should pass each callback its own copy of the mention', async () => {
    const received: Webmention[] = [];
    const dispatcher = new CallbackDispatcher({
      onMentionProcessed: (mention) => {
        mention.metadata.touched = true;
        received.push(mention);
      },
    });
    const mention = MockMentionFactory.webmention();

    const result = await dispatcher.dispatchProcessed(mention);

    expect(result).toMatchObject({
      callback: 'onMentionProcessed',
      invoked: true,
      success: true,
    });
    expect(received).toHaveLength(1);
    expect(received[0]).not.toBe(mention);
    expect(mention.metadata).toEqual({});
  });

  it('should report a missing callback as not invoked', async () => {
    const dispatcher = new CallbackDispatcher();

    const result = await dispatcher.dispatchDeleted(MockMentionFactory.webmention());

    expect(result).toEqual({
      callback: 'onMentionDeleted',
      invoked: false,
      success: true,
      durationMs: 0,
    });
  });

  it('should log a throwing callback without propagating', async () => {
    const logger = silentLogger();
    const dispatcher = new CallbackDispatcher(
      {
        onMentionDeleted: () => {
          throw new Error('hook exploded');
        },
      },
      logger,
    );

    const result = await dispatcher.dispatchDeleted(MockMentionFactory.webmention());

    expect(result.success).toBe(false);
    expect(result.error).toBeInstanceOf(CallbackFailure);
    expect(result.error?.message).toBe(
      'Callback onMentionDeleted failed for <source=https://alice.example/posts/1 target=https://blog.example/articles/hello direction=incoming>: hook exploded',
    );
    expect(logger.error).toHaveBeenCalledTimes(1);
  });

  it('should catch rejected promises', async () => {
    const dispatcher = new CallbackDispatcher(
      { onMentionProcessed: () => Promise.reject(new Error('async failure')) },
      silentLogger(),
    );

    const result = await dispatcher.dispatchProcessed(MockMentionFactory.webmention());

    expect(result.success).toBe(false);
    expect(result.error?.cause?.message).toBe('async failure');
  });

  it('should count outcomes per callback', async () => {
    let fail = false;
    const dispatcher = new CallbackDispatcher(
      {
        onMentionProcessed: () => {
          if (fail) {
            throw new Error('second call fails');
          }
        },
      },
      silentLogger(),
    );

    await dispatcher.dispatchProcessed(MockMentionFactory.webmention());
    fail = true;
    await dispatcher.dispatchProcessed(MockMentionFactory.webmention());

    expect(dispatcher.getStatistics()).toEqual({
      onMentionProcessed: { calls: 2, successes: 1, failures: 1 },
      onMentionDeleted: { calls: 0, successes: 0, failures: 0 },
    });
  });

  it('should replace callbacks at runtime', async () => {
    const dispatcher = new CallbackDispatcher();
    const callback = jest.fn();

    dispatcher.setCallback('onMentionProcessed', callback);
    await dispatcher.dispatchProcessed(MockMentionFactory.webmention());

    expect(dispatcher.hasCallback('onMentionProcessed')).toBe(true);
    expect(callback).toHaveBeenCalledTimes(1);
  });
});
