import { JobState, TERMINAL_STATES } from '../types/domain';

/**
 * Allowed lifecycle moves for stored jobs.
 *
 * - States only move forward
 * - succeeded, failed and rejected are terminal
 * - accepted may skip executing when the work fails before it starts
 */
export const TRANSITION_RULES: Readonly<Record<JobState, readonly JobState[]>> = {
  received: ['validating', 'rejected'],
  validating: ['rejected', 'executing', 'accepted'],
  accepted: ['executing', 'succeeded', 'failed'],
  executing: ['succeeded', 'failed'],
  rejected: [],
  succeeded: [],
  failed: [],
};

export function isTerminal(state: JobState): boolean {
  return TERMINAL_STATES.includes(state);
}

export function canTransition(from: JobState, to: JobState): boolean {
  return TRANSITION_RULES[from].includes(to);
}

// Source states from which `to` can be reached
export function sourcesOf(to: JobState): JobState[] {
  const states = Object.keys(TRANSITION_RULES).filter(isJobState);
  return states.filter((from) => TRANSITION_RULES[from].includes(to));
}

export function isJobState(value: string): value is JobState {
  return value in TRANSITION_RULES;
}
