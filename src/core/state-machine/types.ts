import {
  MentionDirection,
  MentionStatus,
  TransitionTrigger,
} from '../domain/enums';
import { Webmention } from '../domain/models';

/**
 * State transition definition
 * `from: null` describes the creation of a record
 */
export interface StateTransition {
  direction: MentionDirection;
  from: MentionStatus | null;
  to: MentionStatus;
  triggers: TransitionTrigger[];
  description?: string;
}

/**
 * Transition result
 */
export interface TransitionResult {
  success: boolean;
  fromStatus: MentionStatus | null;
  toStatus: MentionStatus;
  trigger: TransitionTrigger;
  reason?: string;
  /**
   * Copy of the mention in its new status, set on success by applyTransition
   */
  mention?: Webmention;
}
