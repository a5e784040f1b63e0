/**
 * What caused a mention status transition
 */
export enum TransitionTrigger {
  /**
   * An inbound notification was accepted
   */
  RECEIVED = 'received',

  /**
   * An outbound notification was delivered
   */
  SENT = 'sent',

  /**
   * The source stopped linking to the target
   */
  RETRACTION = 'retraction',

  /**
   * A moderator or a callback changed the status
   */
  MODERATION = 'moderation',
}
