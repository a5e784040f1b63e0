import {
  MentionDirection,
  MentionStatus,
  MentionType,
  RsvpValue,
  isVisibleStatus,
  parseMentionDirection,
  parseMentionType,
  parseRsvpValue,
} from '../enums';
import { ValidationError } from '../../errors';

/**
 * Metadata key marking a mention deleted by a moderator. Mentions deleted
 * because their source dropped the link carry no mark.
 */
export const DELETED_BY_KEY = 'deletedBy';

export type DeletionReason = 'moderation';

/**
 * Properties accepted when building a Webmention
 */
export interface WebmentionProps {
  source: string;
  target: string;
  direction: MentionDirection;
  status?: MentionStatus;
  mentionType?: MentionType;
  rsvp?: RsvpValue | null;
  title?: string | null;
  excerpt?: string | null;
  content?: string | null;
  authorName?: string | null;
  authorUrl?: string | null;
  authorPhoto?: string | null;
  published?: Date | null;
  metadata?: Record<string, unknown>;
  createdAt?: Date | null;
  updatedAt?: Date | null;
}

/**
 * JSON-safe representation of a Webmention
 */
export interface WebmentionRecord {
  source: string;
  target: string;
  direction: string;
  status: string;
  mentionType: string;
  rsvp: string | null;
  title: string | null;
  excerpt: string | null;
  content: string | null;
  authorName: string | null;
  authorUrl: string | null;
  authorPhoto: string | null;
  published: string | null;
  metadata: Record<string, unknown>;
  createdAt: string | null;
  updatedAt: string | null;
}

/**
 * Webmention domain model
 *
 * (source, target, direction) is the logical identity. Instances are passed
 * by value: storage adapters and callbacks always receive a clone.
 */
export class Webmention {
  readonly source: string;
  readonly target: string;
  readonly direction: MentionDirection;
  status: MentionStatus;
  mentionType: MentionType;
  rsvp: RsvpValue | null;
  title: string | null;
  excerpt: string | null;
  content: string | null;
  authorName: string | null;
  authorUrl: string | null;
  authorPhoto: string | null;
  published: Date | null;
  metadata: Record<string, unknown>;
  createdAt: Date | null;
  updatedAt: Date | null;

  constructor(props: WebmentionProps) {
    if (!props.source || !props.target) {
      throw new ValidationError(
        'Webmention requires both a source and a target',
        props.source,
        props.target,
      );
    }
    if (props.source === props.target) {
      throw new ValidationError(
        `Webmention source and target must differ: ${props.source}`,
        props.source,
        props.target,
      );
    }

    this.source = props.source;
    this.target = props.target;
    this.direction = props.direction;
    this.status = props.status ?? MentionStatus.CONFIRMED;
    this.mentionType = props.mentionType ?? MentionType.MENTION;
    this.rsvp = props.rsvp ?? null;
    this.title = props.title ?? null;
    this.excerpt = props.excerpt ?? null;
    this.content = props.content ?? null;
    this.authorName = props.authorName ?? null;
    this.authorUrl = props.authorUrl ?? null;
    this.authorPhoto = props.authorPhoto ?? null;
    this.published = props.published ?? null;
    this.metadata = props.metadata ?? {};
    this.createdAt = props.createdAt ?? null;
    this.updatedAt = props.updatedAt ?? null;
  }

  /**
   * Key built from the logical identity
   */
  get identityKey(): string {
    return Webmention.identityKey(this.source, this.target, this.direction);
  }

  static identityKey(
    source: string,
    target: string,
    direction: MentionDirection,
  ): string {
    return `${direction}|${source}|${target}`;
  }

  /**
   * Whether readers may see this mention
   */
  isVisible(): boolean {
    return isVisibleStatus(this.status);
  }

  isDeleted(): boolean {
    return this.status === MentionStatus.DELETED;
  }

  /**
   * Deleted by a moderator rather than by its source
   */
  isModeratedAway(): boolean {
    return this.isDeleted() && this.metadata[DELETED_BY_KEY] === 'moderation';
  }

  /**
   * Copy recording who deleted the mention. Null, or a status other than
   * deleted, clears the record.
   */
  withDeletionReason(reason: DeletionReason | null): Webmention {
    const metadata = { ...this.metadata };
    delete metadata[DELETED_BY_KEY];
    if (reason && this.isDeleted()) {
      metadata[DELETED_BY_KEY] = reason;
    }
    return this.clone({ metadata });
  }

  /**
   * The local resource this mention belongs to
   */
  get resource(): string {
    return this.direction === MentionDirection.IN ? this.target : this.source;
  }

  /**
   * Compare everything except timestamps
   */
  hasSameContentAs(other: Webmention): boolean {
    return (
      this.identityKey === other.identityKey &&
      this.status === other.status &&
      this.mentionType === other.mentionType &&
      this.rsvp === other.rsvp &&
      this.title === other.title &&
      this.excerpt === other.excerpt &&
      this.content === other.content &&
      this.authorName === other.authorName &&
      this.authorUrl === other.authorUrl &&
      this.authorPhoto === other.authorPhoto &&
      (this.published?.getTime() ?? null) ===
        (other.published?.getTime() ?? null) &&
      JSON.stringify(this.metadata) === JSON.stringify(other.metadata)
    );
  }

  /**
   * Deep copy, optionally overriding some properties
   */
  clone(overrides: Partial<Omit<WebmentionProps, 'source' | 'target' | 'direction'>> = {}): Webmention {
    return new Webmention({
      source: this.source,
      target: this.target,
      direction: this.direction,
      status: this.status,
      mentionType: this.mentionType,
      rsvp: this.rsvp,
      title: this.title,
      excerpt: this.excerpt,
      content: this.content,
      authorName: this.authorName,
      authorUrl: this.authorUrl,
      authorPhoto: this.authorPhoto,
      published: this.published ? new Date(this.published) : null,
      metadata: structuredClone(this.metadata),
      createdAt: this.createdAt ? new Date(this.createdAt) : null,
      updatedAt: this.updatedAt ? new Date(this.updatedAt) : null,
      ...overrides,
    });
  }

  /**
   * Convert to plain object for storage/serialization
   */
  toPlainObject(): WebmentionRecord {
    return {
      source: this.source,
      target: this.target,
      direction: this.direction,
      status: this.status,
      mentionType: this.mentionType,
      rsvp: this.rsvp,
      title: this.title,
      excerpt: this.excerpt,
      content: this.content,
      authorName: this.authorName,
      authorUrl: this.authorUrl,
      authorPhoto: this.authorPhoto,
      published: this.published?.toISOString() ?? null,
      metadata: this.metadata,
      createdAt: this.createdAt?.toISOString() ?? null,
      updatedAt: this.updatedAt?.toISOString() ?? null,
    };
  }

  /**
   * Create from plain object (for hydration from storage)
   */
  static fromPlainObject(data: WebmentionRecord): Webmention {
    const status = Object.values(MentionStatus).find((s) => s === data.status);
    return new Webmention({
      source: data.source,
      target: data.target,
      direction: parseMentionDirection(data.direction),
      status: status ?? MentionStatus.PENDING,
      mentionType: parseMentionType(data.mentionType),
      rsvp: parseRsvpValue(data.rsvp),
      title: data.title,
      excerpt: data.excerpt,
      content: data.content,
      authorName: data.authorName,
      authorUrl: data.authorUrl,
      authorPhoto: data.authorPhoto,
      published: parseDate(data.published),
      metadata: data.metadata ?? {},
      createdAt: parseDate(data.createdAt),
      updatedAt: parseDate(data.updatedAt),
    });
  }
}

/**
 * Parse an ISO date string, returning null for blank or invalid input
 */
export function parseDate(value: string | null | undefined): Date | null {
  if (!value || !value.trim()) {
    return null;
  }
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}
