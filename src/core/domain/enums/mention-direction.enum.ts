/**
 * Direction of a Webmention relative to the local site
 */
export enum MentionDirection {
  /**
   * Received: the target is a local resource
   */
  IN = 'incoming',

  /**
   * Sent: the source is a local resource
   */
  OUT = 'outgoing',
}

/**
 * Parse a direction from its value or its member name (case-insensitive)
 */
export function parseMentionDirection(raw: string): MentionDirection {
  const normalized = raw.trim().toLowerCase();
  for (const direction of Object.values(MentionDirection)) {
    if (direction === normalized) {
      return direction;
    }
  }

  switch (normalized) {
    case 'in':
      return MentionDirection.IN;
    case 'out':
      return MentionDirection.OUT;
    default:
      throw new Error(`Unknown mention direction: ${raw}`);
  }
}
