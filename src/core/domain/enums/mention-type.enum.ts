/**
 * Semantic classification of a Webmention, derived from the microformats2
 * properties of the source h-entry
 */
export enum MentionType {
  UNKNOWN = 'unknown',
  MENTION = 'mention',
  REPLY = 'reply',
  LIKE = 'like',
  REPOST = 'repost',
  BOOKMARK = 'bookmark',
  FOLLOW = 'follow',
  RSVP = 'rsvp',
  LOCATION = 'location',
}

/**
 * RSVP answers carried by `p-rsvp`
 */
export enum RsvpValue {
  YES = 'yes',
  NO = 'no',
  MAYBE = 'maybe',
  INTERESTED = 'interested',
}

const MENTION_TYPE_ALIASES: Record<string, MentionType> = {
  'in-reply-to': MentionType.REPLY,
  reply: MentionType.REPLY,
  'like-of': MentionType.LIKE,
  like: MentionType.LIKE,
  'repost-of': MentionType.REPOST,
  repost: MentionType.REPOST,
  'bookmark-of': MentionType.BOOKMARK,
  bookmark: MentionType.BOOKMARK,
  'follow-of': MentionType.FOLLOW,
  follow: MentionType.FOLLOW,
  rsvp: MentionType.RSVP,
  location: MentionType.LOCATION,
  checkin: MentionType.LOCATION,
  mention: MentionType.MENTION,
};

/**
 * Map a microformats2 property name or a type name to a MentionType
 */
export function parseMentionType(raw: string | null | undefined): MentionType {
  if (!raw) {
    return MentionType.UNKNOWN;
  }
  return MENTION_TYPE_ALIASES[raw.trim().toLowerCase()] ?? MentionType.UNKNOWN;
}

/**
 * Map a `p-rsvp` value to an RsvpValue, or null when it is not one of the
 * four recognised answers
 */
export function parseRsvpValue(raw: string | null | undefined): RsvpValue | null {
  if (!raw) {
    return null;
  }
  const normalized = raw.trim().toLowerCase();
  for (const value of Object.values(RsvpValue)) {
    if (value === normalized) {
      return value;
    }
  }
  return null;
}
