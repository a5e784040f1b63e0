import {
  MentionDirection,
  MentionStatus,
  TransitionTrigger,
} from '../domain/enums';
import { StateTransition } from './types';

/**
 * Mention lifecycle transition rules
 *
 * Received mentions can be moderated back and forth, and come back when a
 * source that dropped its link links again. Sent mentions are
 * confirmed on delivery, deleted on retraction and confirmed again when the
 * source links to the target once more.
 */
export const TRANSITION_RULES: StateTransition[] = [
  // ============ Incoming ============

  {
    direction: MentionDirection.IN,
    from: null,
    to: MentionStatus.PENDING,
    triggers: [TransitionTrigger.RECEIVED],
    description: 'Received, awaiting moderation',
  },
  {
    direction: MentionDirection.IN,
    from: null,
    to: MentionStatus.CONFIRMED,
    triggers: [TransitionTrigger.RECEIVED],
    description: 'Received and published',
  },
  {
    direction: MentionDirection.IN,
    from: MentionStatus.PENDING,
    to: MentionStatus.CONFIRMED,
    triggers: [TransitionTrigger.MODERATION],
    description: 'Approved',
  },
  {
    direction: MentionDirection.IN,
    from: MentionStatus.CONFIRMED,
    to: MentionStatus.PENDING,
    triggers: [TransitionTrigger.MODERATION],
    description: 'Hidden for moderation',
  },
  {
    direction: MentionDirection.IN,
    from: MentionStatus.PENDING,
    to: MentionStatus.DELETED,
    triggers: [TransitionTrigger.RETRACTION, TransitionTrigger.MODERATION],
    description: 'Retracted or rejected before publication',
  },
  {
    direction: MentionDirection.IN,
    from: MentionStatus.CONFIRMED,
    to: MentionStatus.DELETED,
    triggers: [TransitionTrigger.RETRACTION, TransitionTrigger.MODERATION],
    description: 'Retracted or removed',
  },
  {
    direction: MentionDirection.IN,
    from: MentionStatus.DELETED,
    to: MentionStatus.PENDING,
    triggers: [TransitionTrigger.MODERATION, TransitionTrigger.RECEIVED],
    description: 'Restored for moderation, or relinked by the source',
  },
  {
    direction: MentionDirection.IN,
    from: MentionStatus.DELETED,
    to: MentionStatus.CONFIRMED,
    triggers: [TransitionTrigger.MODERATION, TransitionTrigger.RECEIVED],
    description: 'Restored, or relinked by the source',
  },

  // ============ Outgoing ============

  {
    direction: MentionDirection.OUT,
    from: null,
    to: MentionStatus.CONFIRMED,
    triggers: [TransitionTrigger.SENT],
    description: 'Notification delivered',
  },
  {
    direction: MentionDirection.OUT,
    from: MentionStatus.CONFIRMED,
    to: MentionStatus.DELETED,
    triggers: [TransitionTrigger.RETRACTION, TransitionTrigger.MODERATION],
    description: 'Link removed from the source',
  },
  {
    direction: MentionDirection.OUT,
    from: MentionStatus.DELETED,
    to: MentionStatus.CONFIRMED,
    triggers: [TransitionTrigger.SENT],
    description: 'Link added back and delivered again',
  },
];

/**
 * Find a specific transition rule
 */
export function findTransitionRule(
  direction: MentionDirection,
  from: MentionStatus | null,
  to: MentionStatus,
): StateTransition | undefined {
  return TRANSITION_RULES.find(
    (rule) =>
      rule.direction === direction && rule.from === from && rule.to === to,
  );
}

/**
 * Get all valid target states from a given status
 */
export function getValidTargetStates(
  direction: MentionDirection,
  from: MentionStatus | null,
): MentionStatus[] {
  return TRANSITION_RULES.filter(
    (rule) => rule.direction === direction && rule.from === from,
  ).map((rule) => rule.to);
}

/**
 * Status given to a new record of the given direction
 */
export function getInitialStates(direction: MentionDirection): MentionStatus[] {
  return getValidTargetStates(direction, null);
}
