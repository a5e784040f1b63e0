import {
  DataSource,
  EntityManager,
  FindOptionsWhere,
  QueryFailedError,
  Repository,
} from 'typeorm';
import {
  MentionDirection,
  MentionStatus,
  StorageAdapter,
  StorageFailure,
  StorageStatistics,
  Webmention,
  WebmentionFilter,
  parseDate,
  parseRsvpValue,
  toError,
} from '../../../core';
import { WebmentionEntity } from './entities';

/**
 * TypeORM implementation of StorageAdapter
 *
 * Each write runs in its own database transaction. Errors reach the caller
 * as StorageFailure.
 */
export class TypeORMStorageAdapter implements StorageAdapter {
  private readonly webmentionRepo: Repository<WebmentionEntity>;

  constructor(private readonly dataSource: DataSource) {
    this.webmentionRepo = dataSource.getRepository(WebmentionEntity);
  }

  async storeWebmention(mention: Webmention): Promise<Webmention> {
    try {
      return await this.upsert(mention);
    } catch (error) {
      if (!(error instanceof QueryFailedError)) {
        throw this.toStorageFailure('storeWebmention', error);
      }
    }

    // A concurrent insert won the unique index; the retry updates it
    try {
      return await this.upsert(mention);
    } catch (error) {
      throw this.toStorageFailure('storeWebmention', error);
    }
  }

  async deleteWebmention(
    source: string,
    target: string,
    direction: MentionDirection,
  ): Promise<Webmention | null> {
    try {
      return await this.withTransaction(async (manager) => {
        const entity = await manager.findOne(WebmentionEntity, {
          where: { source, target, direction },
        });
        if (!entity) {
          return null;
        }
        if (entity.status !== MentionStatus.DELETED) {
          entity.status = MentionStatus.DELETED;
          entity.updatedAt = new Date();
          await manager.save(entity);
        }
        return this.mapEntityToDomain(entity);
      });
    } catch (error) {
      throw this.toStorageFailure('deleteWebmention', error);
    }
  }

  async retrieveWebmentions(
    resource: string,
    direction: MentionDirection,
  ): Promise<Webmention[]> {
    const where: FindOptionsWhere<WebmentionEntity> =
      direction === MentionDirection.IN
        ? { target: resource, direction, status: MentionStatus.CONFIRMED }
        : { source: resource, direction, status: MentionStatus.CONFIRMED };

    try {
      const entities = await this.webmentionRepo.find({
        where,
        order: { createdAt: 'DESC' },
      });
      return entities.map((entity) => this.mapEntityToDomain(entity));
    } catch (error) {
      throw this.toStorageFailure('retrieveWebmentions', error);
    }
  }

  async findWebmention(
    source: string,
    target: string,
    direction: MentionDirection,
  ): Promise<Webmention | null> {
    try {
      const entity = await this.webmentionRepo.findOne({
        where: { source, target, direction },
      });
      return entity ? this.mapEntityToDomain(entity) : null;
    } catch (error) {
      throw this.toStorageFailure('findWebmention', error);
    }
  }

  async listWebmentions(filter: WebmentionFilter = {}): Promise<Webmention[]> {
    const where: FindOptionsWhere<WebmentionEntity> = {};
    if (filter.source) where.source = filter.source;
    if (filter.target) where.target = filter.target;
    if (filter.direction) where.direction = filter.direction;
    if (filter.status) where.status = filter.status;
    if (filter.mentionType) where.mentionType = filter.mentionType;

    try {
      const entities = await this.webmentionRepo.find({
        where,
        order: { createdAt: 'DESC' },
        skip: filter.offset,
        take: filter.limit,
      });
      return entities.map((entity) => this.mapEntityToDomain(entity));
    } catch (error) {
      throw this.toStorageFailure('listWebmentions', error);
    }
  }

  /**
   * Health & Monitoring
   */

  async isHealthy(): Promise<boolean> {
    if (!this.dataSource.isInitialized) {
      return false;
    }
    try {
      await this.dataSource.query('SELECT 1');
      return true;
    } catch {
      return false;
    }
  }

  async getStatistics(): Promise<StorageStatistics> {
    try {
      const count = (where: FindOptionsWhere<WebmentionEntity>) =>
        this.webmentionRepo.count({ where });

      const [total, pending, confirmed, deleted, incoming, outgoing] =
        await Promise.all([
          count({}),
          count({ status: MentionStatus.PENDING }),
          count({ status: MentionStatus.CONFIRMED }),
          count({ status: MentionStatus.DELETED }),
          count({ direction: MentionDirection.IN }),
          count({ direction: MentionDirection.OUT }),
        ]);

      return {
        total,
        byStatus: {
          [MentionStatus.PENDING]: pending,
          [MentionStatus.CONFIRMED]: confirmed,
          [MentionStatus.DELETED]: deleted,
        },
        byDirection: {
          [MentionDirection.IN]: incoming,
          [MentionDirection.OUT]: outgoing,
        },
      };
    } catch (error) {
      throw this.toStorageFailure('getStatistics', error);
    }
  }

  /**
   * Execute operations within a transaction
   */
  async withTransaction<T>(
    callback: (manager: EntityManager) => Promise<T>,
  ): Promise<T> {
    const queryRunner = this.dataSource.createQueryRunner();
    await queryRunner.connect();
    await queryRunner.startTransaction();

    try {
      const result = await callback(queryRunner.manager);
      await queryRunner.commitTransaction();
      return result;
    } catch (error) {
      await queryRunner.rollbackTransaction();
      throw error;
    } finally {
      await queryRunner.release();
    }
  }

  /**
   * Insert or update by (source, target, direction), keeping the record id
   * and its creation time
   */
  private upsert(mention: Webmention): Promise<Webmention> {
    return this.withTransaction(async (manager) => {
      const existing = await manager.findOne(WebmentionEntity, {
        where: {
          source: mention.source,
          target: mention.target,
          direction: mention.direction,
        },
      });

      const now = new Date();
      const entity = existing ?? manager.create(WebmentionEntity, {
        source: mention.source,
        target: mention.target,
        direction: mention.direction,
        createdAt: now,
      });
      this.applyDomainToEntity(mention, entity);
      entity.updatedAt = now;

      const saved = await manager.save(entity);
      return this.mapEntityToDomain(saved);
    });
  }

  private applyDomainToEntity(
    mention: Webmention,
    entity: WebmentionEntity,
  ): void {
    entity.status = mention.status;
    entity.mentionType = mention.mentionType;
    entity.rsvp = mention.rsvp;
    entity.title = mention.title;
    entity.excerpt = mention.excerpt;
    entity.content = mention.content;
    entity.authorName = mention.authorName;
    entity.authorUrl = mention.authorUrl;
    entity.authorPhoto = mention.authorPhoto;
    entity.published = mention.published?.toISOString() ?? null;
    entity.metadata = mention.metadata;
  }

  /**
   * Map entity to domain model
   */
  private mapEntityToDomain(entity: WebmentionEntity): Webmention {
    return new Webmention({
      source: entity.source,
      target: entity.target,
      direction: entity.direction,
      status: entity.status,
      mentionType: entity.mentionType,
      rsvp: parseRsvpValue(entity.rsvp),
      title: entity.title,
      excerpt: entity.excerpt,
      content: entity.content,
      authorName: entity.authorName,
      authorUrl: entity.authorUrl,
      authorPhoto: entity.authorPhoto,
      published: parseDate(entity.published),
      metadata: entity.metadata ?? {},
      createdAt: entity.createdAt,
      updatedAt: entity.updatedAt,
    });
  }

  private toStorageFailure(operation: string, error: unknown): StorageFailure {
    if (error instanceof StorageFailure) {
      return error;
    }
    const cause = toError(error);
    return new StorageFailure(
      `Storage operation ${operation} failed: ${cause.message}`,
      operation,
      cause,
    );
  }
}
