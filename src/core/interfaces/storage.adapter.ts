import { Webmention } from '../domain/models';
import { MentionDirection } from '../domain/enums';
import { StorageStatistics, WebmentionFilter } from './common.types';

/**
 * Storage adapter interface - abstracts all persistence of Webmentions
 *
 * Adapters store and return copies: the core never holds a reference to a
 * stored record. Failures are raised as StorageFailure and reach the caller
 * unmodified.
 */
export interface StorageAdapter {
  /**
   * Insert or update by (source, target, direction)
   * Sets createdAt on first persistence and updatedAt on every write
   */
  storeWebmention(mention: Webmention): Promise<Webmention>;

  /**
   * Soft delete: mark the record DELETED, keeping its identity
   * Returns the updated record, or null when no record exists
   */
  deleteWebmention(
    source: string,
    target: string,
    direction: MentionDirection,
  ): Promise<Webmention | null>;

  /**
   * Reader-facing retrieval: CONFIRMED records only.
   * IN mentions are looked up by target, OUT mentions by source.
   */
  retrieveWebmentions(
    resource: string,
    direction: MentionDirection,
  ): Promise<Webmention[]>;

  /**
   * Find one record regardless of status
   */
  findWebmention(
    source: string,
    target: string,
    direction: MentionDirection,
  ): Promise<Webmention | null>;

  /**
   * List records of any status, newest first
   */
  listWebmentions(filter?: WebmentionFilter): Promise<Webmention[]>;

  // ==================== Health & Monitoring ====================

  /**
   * Check if storage is healthy and accessible
   */
  isHealthy(): Promise<boolean>;

  /**
   * Record counts by status and direction
   */
  getStatistics(): Promise<StorageStatistics>;
}
