import {
  MentionDirection,
  MentionStatus,
  MentionType,
} from '../domain/enums';

/**
 * Filter for listing stored Webmentions
 */
export interface WebmentionFilter {
  source?: string;
  target?: string;
  direction?: MentionDirection;
  status?: MentionStatus;
  mentionType?: MentionType;
  limit?: number;
  offset?: number;
}

/**
 * Storage statistics
 */
export interface StorageStatistics {
  total: number;
  byStatus: Record<MentionStatus, number>;
  byDirection: Record<MentionDirection, number>;
}
