/**
 * Moderation state of a Webmention
 * Transitions are validated by the mention state machine
 */
export enum MentionStatus {
  /**
   * Accepted but awaiting moderation, hidden from readers
   */
  PENDING = 'pending',

  /**
   * Visible to readers
   */
  CONFIRMED = 'confirmed',

  /**
   * Retracted or moderated away. The record keeps its identity so that
   * deleting it again is a no-op.
   */
  DELETED = 'deleted',
}

/**
 * Only confirmed mentions are exposed to readers
 */
export function isVisibleStatus(status: MentionStatus): boolean {
  return status === MentionStatus.CONFIRMED;
}
