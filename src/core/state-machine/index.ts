/**
 * Mention lifecycle state machine
 * Enforces valid status transitions per mention direction
 */

// Main state machine
export * from './mention-state-machine';

// Types and interfaces
export * from './types';

// Transition rules
export * from './transition-rules';
