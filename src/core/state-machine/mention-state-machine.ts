import {
  MentionDirection,
  MentionStatus,
  TransitionTrigger,
} from '../domain/enums';
import { Webmention } from '../domain/models';
import { TransitionValidationError } from '../errors';
import { StateTransition, TransitionResult } from './types';
import { TRANSITION_RULES } from './transition-rules';

/**
 * Mention state machine - enforces valid status transitions per direction
 */
export class MentionStateMachine {
  private readonly transitions = new Map<string, StateTransition>();

  constructor(rules: StateTransition[] = TRANSITION_RULES) {
    for (const rule of rules) {
      this.transitions.set(
        this.getTransitionKey(rule.direction, rule.from, rule.to),
        rule,
      );
    }
  }

  /**
   * Validate a status transition
   * Same-status transitions are no-ops and always succeed
   */
  validateTransition(
    direction: MentionDirection,
    from: MentionStatus | null,
    to: MentionStatus,
    trigger: TransitionTrigger,
  ): TransitionResult {
    if (from === to) {
      return { success: true, fromStatus: from, toStatus: to, trigger };
    }

    const transition = this.transitions.get(
      this.getTransitionKey(direction, from, to),
    );
    if (!transition) {
      return {
        success: false,
        fromStatus: from,
        toStatus: to,
        trigger,
        reason: `Transition from ${from ?? 'new'} to ${to} is not defined for ${direction} mentions`,
      };
    }

    if (!transition.triggers.includes(trigger)) {
      return {
        success: false,
        fromStatus: from,
        toStatus: to,
        trigger,
        reason: `Trigger ${trigger} is not valid for transition from ${from ?? 'new'} to ${to}`,
      };
    }

    return { success: true, fromStatus: from, toStatus: to, trigger };
  }

  /**
   * Check if a transition is possible
   */
  canTransition(
    direction: MentionDirection,
    from: MentionStatus | null,
    to: MentionStatus,
    trigger: TransitionTrigger,
  ): boolean {
    return this.validateTransition(direction, from, to, trigger).success;
  }

  /**
   * Validate and return a copy of the mention in the target status.
   * The input mention is never mutated.
   */
  applyTransition(
    mention: Webmention,
    to: MentionStatus,
    trigger: TransitionTrigger,
  ): TransitionResult {
    const result = this.validateTransition(
      mention.direction,
      mention.status,
      to,
      trigger,
    );
    if (!result.success) {
      return result;
    }
    return { ...result, mention: mention.clone({ status: to }) };
  }

  /**
   * Like applyTransition, but throws on an invalid transition
   */
  transitionOrThrow(
    mention: Webmention,
    to: MentionStatus,
    trigger: TransitionTrigger,
  ): Webmention {
    const result = this.applyTransition(mention, to, trigger);
    if (!result.success || !result.mention) {
      const reason = result.reason ?? 'Transition rejected';
      throw new TransitionValidationError(
        `Cannot move ${mention.direction} mention ${mention.source} -> ${mention.target} to ${to}: ${reason}`,
        mention.status,
        to,
        reason,
      );
    }
    return result.mention;
  }

  /**
   * Get all possible next states from the current state
   */
  getNextStates(
    direction: MentionDirection,
    from: MentionStatus | null,
  ): MentionStatus[] {
    return [...this.transitions.values()]
      .filter((rule) => rule.direction === direction && rule.from === from)
      .map((rule) => rule.to);
  }

  private getTransitionKey(
    direction: MentionDirection,
    from: MentionStatus | null,
    to: MentionStatus,
  ): string {
    return `${direction}:${from ?? 'new'}->${to}`;
  }
}

export const defaultStateMachine = new MentionStateMachine();
