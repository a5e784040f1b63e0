import {
  MentionDirection,
  MentionStatus,
  StorageAdapter,
  StorageFailure,
  StorageStatistics,
  Webmention,
  WebmentionFilter,
} from '../../../core';

export type MockStorageOperation =
  | 'storeWebmention'
  | 'deleteWebmention'
  | 'retrieveWebmentions'
  | 'findWebmention'
  | 'listWebmentions';

export interface MockStorageOptions {
  simulateLatency?: boolean;
  latencyMs?: number;
  /**
   * Make every operation fail with a StorageFailure
   */
  throwOnError?: boolean;
  /**
   * Make only these operations fail
   */
  failOn?: MockStorageOperation[];
}

/**
 * Mock storage adapter for testing
 * Provides in-memory storage with deterministic behavior
 */
export class MockStorageAdapter implements StorageAdapter {
  private mentions: Map<string, Webmention> = new Map();
  private readonly options: MockStorageOptions;

  constructor(options: MockStorageOptions = {}) {
    this.options = {
      simulateLatency: false,
      latencyMs: 10,
      throwOnError: false,
      failOn: [],
      ...options,
    };
  }

  /**
   * Simulate network latency if configured
   */
  private async simulateLatency(): Promise<void> {
    if (this.options.simulateLatency && this.options.latencyMs) {
      await new Promise((resolve) =>
        setTimeout(resolve, this.options.latencyMs),
      );
    }
  }

  private async enter(operation: MockStorageOperation): Promise<void> {
    await this.simulateLatency();
    if (this.options.throwOnError || this.options.failOn?.includes(operation)) {
      throw new StorageFailure(`Simulated ${operation} failure`, operation);
    }
  }

  async storeWebmention(mention: Webmention): Promise<Webmention> {
    await this.enter('storeWebmention');

    const key = mention.identityKey;
    const existing = this.mentions.get(key);
    const now = new Date();
    const stored = mention.clone({
      createdAt: existing?.createdAt ?? now,
      updatedAt: now,
    });
    this.mentions.set(key, stored);
    return stored.clone();
  }

  async deleteWebmention(
    source: string,
    target: string,
    direction: MentionDirection,
  ): Promise<Webmention | null> {
    await this.enter('deleteWebmention');

    const key = Webmention.identityKey(source, target, direction);
    const existing = this.mentions.get(key);
    if (!existing) {
      return null;
    }
    if (existing.isDeleted()) {
      return existing.clone();
    }

    const deleted = existing.clone({
      status: MentionStatus.DELETED,
      updatedAt: new Date(),
    });
    this.mentions.set(key, deleted);
    return deleted.clone();
  }

  async retrieveWebmentions(
    resource: string,
    direction: MentionDirection,
  ): Promise<Webmention[]> {
    await this.enter('retrieveWebmentions');

    return this.sorted(
      [...this.mentions.values()].filter(
        (mention) =>
          mention.direction === direction &&
          mention.resource === resource &&
          mention.status === MentionStatus.CONFIRMED,
      ),
    );
  }

  async findWebmention(
    source: string,
    target: string,
    direction: MentionDirection,
  ): Promise<Webmention | null> {
    await this.enter('findWebmention');

    const mention = this.mentions.get(
      Webmention.identityKey(source, target, direction),
    );
    return mention ? mention.clone() : null;
  }

  async listWebmentions(filter: WebmentionFilter = {}): Promise<Webmention[]> {
    await this.enter('listWebmentions');

    const matches = this.sorted(
      [...this.mentions.values()].filter(
        (mention) =>
          (!filter.source || mention.source === filter.source) &&
          (!filter.target || mention.target === filter.target) &&
          (!filter.direction || mention.direction === filter.direction) &&
          (!filter.status || mention.status === filter.status) &&
          (!filter.mentionType || mention.mentionType === filter.mentionType),
      ),
    );
    const offset = filter.offset ?? 0;
    return filter.limit === undefined
      ? matches.slice(offset)
      : matches.slice(offset, offset + filter.limit);
  }

  // ==================== Health & Monitoring ====================

  async isHealthy(): Promise<boolean> {
    await this.simulateLatency();
    return !this.options.throwOnError;
  }

  async getStatistics(): Promise<StorageStatistics> {
    await this.simulateLatency();

    const statistics: StorageStatistics = {
      total: this.mentions.size,
      byStatus: {
        [MentionStatus.PENDING]: 0,
        [MentionStatus.CONFIRMED]: 0,
        [MentionStatus.DELETED]: 0,
      },
      byDirection: {
        [MentionDirection.IN]: 0,
        [MentionDirection.OUT]: 0,
      },
    };
    for (const mention of this.mentions.values()) {
      statistics.byStatus[mention.status]++;
      statistics.byDirection[mention.direction]++;
    }
    return statistics;
  }

  // ==================== Testing Utilities ====================

  /**
   * Clear all data (for testing)
   */
  clear(): void {
    this.mentions.clear();
  }

  /**
   * Get all stored records, copies (for testing)
   */
  getAll(): Webmention[] {
    return [...this.mentions.values()].map((mention) => mention.clone());
  }

  /**
   * Newest first, copies
   */
  private sorted(mentions: Webmention[]): Webmention[] {
    return mentions
      .map((mention, index) => ({ mention, index }))
      .sort(
        (a, b) =>
          (b.mention.createdAt?.getTime() ?? 0) -
            (a.mention.createdAt?.getTime() ?? 0) || b.index - a.index,
      )
      .map(({ mention }) => mention.clone());
  }
}
