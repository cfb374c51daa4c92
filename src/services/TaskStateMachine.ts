/**
 * TASK ASSIGNMENT STATE MACHINE
 *
 * STATES:
 * - assigned:        claimed by the child or assigned by a guardian
 * - in_progress:     child started working
 * - pending_review:  evidence submitted, awaiting a guardian
 * - approved:        XP credited (terminal)
 * - declined:        penalty applied; appealable until appeal_deadline
 * - appealed:        child contested the decline, awaiting re-review
 * - expired:         due date passed before submission (terminal)
 *
 * A declined assignment becomes terminal once its appeal window closes or
 * after an appeal was upheld (appeal_deadline cleared).
 */

import type { AssignmentStatus, TaskAssignment } from '../types';
import { StateConflictError } from '../lib/errors';

export const TASK_TRANSITIONS: Record<AssignmentStatus, AssignmentStatus[]> = {
  assigned: ['in_progress', 'expired'],
  in_progress: ['pending_review', 'expired'],
  pending_review: ['approved', 'declined'],
  declined: ['appealed'],
  appealed: ['approved', 'declined'],
  approved: [],  // Terminal
  expired: [],   // Terminal
};

export const TERMINAL_STATES: AssignmentStatus[] = ['approved', 'expired'];

export const REVIEWABLE_STATES: AssignmentStatus[] = ['pending_review', 'appealed'];

export const EXPIRABLE_STATES: AssignmentStatus[] = ['assigned', 'in_progress'];

export function canTransition(from: AssignmentStatus, to: AssignmentStatus): boolean {
  return TASK_TRANSITIONS[from].includes(to);
}

/**
 * Throws StateConflictError: the caller read a stale status and should refetch.
 */
export function assertTransition(assignment: TaskAssignment, to: AssignmentStatus): void {
  if (!canTransition(assignment.status, to)) {
    throw new StateConflictError(
      `Assignment '${assignment.id}' cannot move from ${assignment.status} to ${to}`
    );
  }
}

export function isAppealable(assignment: TaskAssignment, now: Date): boolean {
  return (
    assignment.status === 'declined' &&
    assignment.appealDeadline !== null &&
    now < assignment.appealDeadline
  );
}

export function isTerminal(assignment: TaskAssignment, now: Date): boolean {
  if (TERMINAL_STATES.includes(assignment.status)) {
    return true;
  }
  return assignment.status === 'declined' && !isAppealable(assignment, now);
}
