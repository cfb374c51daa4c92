/**
 * TaskReviewService v1.0.0 (Verification Workflow)
 *
 * Owns the lifecycle of one assigned task. A guardian decision is a single
 * unit: trust update → XP credit → badge check → outbox row, committed
 * together under the assignment's row lock.
 *
 * Only the claiming child may start, submit or appeal; only a guardian
 * with review authority over that child may approve or decline.
 */

import { randomUUID } from 'crypto';
import type {
  AssignmentStatus,
  EarnedBadge,
  HouseholdDirectory,
  ReviewDecision,
  TaskAssignment,
  TaskCatalog,
  TaskLevel,
  TaskTemplate,
} from '../types';
import { LEVEL_BASE_XP, WORKFLOW } from '../constants';
import { AuthorizationError, NotFoundError, StateConflictError, ValidationError } from '../lib/errors';
import { taskLogger, type Logger } from '../logger';
import { writeToOutbox } from '../jobs/outbox-helpers';
import type { EconomyStore, Tx } from './EconomyStore';
import type { LedgerService } from './LedgerService';
import type { ApprovalOutcome, CredibilityService, DeclineOutcome, UndoOutcome } from './CredibilityService';
import type { BadgeService } from './BadgeService';
import { getTier } from './CredibilityTiers';
import {
  assertTransition,
  isAppealable,
  EXPIRABLE_STATES,
  REVIEWABLE_STATES,
} from './TaskStateMachine';

// ============================================================================
// TYPES
// ============================================================================

export interface SubmitEvidence {
  photoURL: string;
  notes?: string;
  minutesTaken?: number;
}

export interface ApproveOptions {
  notes?: string;
  levelOverride?: TaskLevel;
}

export interface ApprovalResult {
  assignment: TaskAssignment;
  xpAwarded: number;
  credibility: ApprovalOutcome;
  badges: EarnedBadge[];
}

export interface DeclineResult {
  assignment: TaskAssignment;
  /** null when an appeal was upheld: no second penalty. */
  credibility: DeclineOutcome | null;
}

export interface DeclineRetraction {
  assignment: TaskAssignment;
  credibility: UndoOutcome;
}

export class AppealWindowClosedError extends ValidationError {
  constructor(assignmentId: string) {
    super(`The appeal window for assignment '${assignmentId}' has closed`, 'APPEAL_WINDOW_CLOSED');
  }
}

export function baseXPFor(level: TaskLevel, template: TaskTemplate | null): number {
  return template?.baseXPByLevel[level] ?? LEVEL_BASE_XP[level];
}

function requireText(value: string, message: string): string {
  const trimmed = value.trim();
  if (!trimmed) {
    throw new ValidationError(message);
  }
  return trimmed;
}

// ============================================================================
// SERVICE
// ============================================================================

export class TaskReviewService {
  constructor(
    private readonly store: EconomyStore,
    private readonly ledger: LedgerService,
    private readonly credibility: CredibilityService,
    private readonly badges: BadgeService,
    private readonly catalog: TaskCatalog,
    private readonly household: HouseholdDirectory,
    private readonly log: Logger = taskLogger
  ) {}

  // --------------------------------------------------------------------------
  // Creation
  // --------------------------------------------------------------------------

  /** Child self-claims a catalog task. */
  async claim(childId: string, templateId: string, level: TaskLevel): Promise<TaskAssignment> {
    const template = await this.requireTemplate(templateId);
    return this.create(childId, null, template, level, null);
  }

  /** Guardian assigns a catalog task to a child in their household. */
  async assign(
    guardianId: string,
    childId: string,
    templateId: string,
    level: TaskLevel,
    dueDate?: Date
  ): Promise<TaskAssignment> {
    await this.requireReviewer(guardianId, childId);
    if (dueDate && dueDate.getTime() <= Date.now()) {
      throw new ValidationError('Due date must be in the future');
    }
    const template = await this.requireTemplate(templateId);
    return this.create(childId, guardianId, template, level, dueDate ?? null);
  }

  // --------------------------------------------------------------------------
  // Child transitions
  // --------------------------------------------------------------------------

  async start(childId: string, assignmentId: string): Promise<TaskAssignment> {
    return this.store.run(undefined, async ({ repos }) => {
      const now = new Date();
      const assignment = await this.lockOwned(repos, assignmentId, childId);
      assertTransition(assignment, 'in_progress');
      this.assertNotOverdue(assignment, now);

      const updated: TaskAssignment = { ...assignment, status: 'in_progress', startedAt: now };
      await repos.assignments.save(updated);

      this.log.info({ assignmentId, childId }, 'Task started');
      return updated;
    });
  }

  /** Evidence is mandatory: no photo, no transition. */
  async submit(childId: string, assignmentId: string, evidence: SubmitEvidence): Promise<TaskAssignment> {
    const photoURL = requireText(evidence.photoURL, 'A photo is required to submit a task');

    return this.store.run(undefined, async ({ repos }) => {
      const now = new Date();
      const assignment = await this.lockOwned(repos, assignmentId, childId);
      assertTransition(assignment, 'pending_review');
      this.assertNotOverdue(assignment, now);

      const updated: TaskAssignment = {
        ...assignment,
        status: 'pending_review',
        completedAt: now,
        photoURL,
        childNotes: evidence.notes?.trim() || null,
        completionTimeMinutes: evidence.minutesTaken ?? null,
      };
      await repos.assignments.save(updated);

      this.log.info({ assignmentId, childId }, 'Task submitted for review');
      return updated;
    });
  }

  /** Valid only while declined and strictly before the appeal deadline. One appeal per assignment. */
  async appeal(childId: string, assignmentId: string, childNotes: string): Promise<TaskAssignment> {
    return this.store.run(undefined, async ({ repos }) => {
      const now = new Date();
      const assignment = await this.lockOwned(repos, assignmentId, childId);
      assertTransition(assignment, 'appealed');
      if (!isAppealable(assignment, now)) {
        throw new AppealWindowClosedError(assignmentId);
      }

      const updated: TaskAssignment = {
        ...assignment,
        status: 'appealed',
        appealedAt: now,
        appealNotes: childNotes.trim() || null,
      };
      await repos.assignments.save(updated);
      await writeToOutbox(repos.outbox, 'task.appealed', childId, {
        assignmentId,
        childId,
        appealedAt: now.toISOString(),
      }, now);

      this.log.info({ assignmentId, childId }, 'Decline appealed');
      return updated;
    });
  }

  // --------------------------------------------------------------------------
  // Guardian decisions
  // --------------------------------------------------------------------------

  /**
   * Approve from pending_review or appealed. From appealed the earlier
   * decline is retracted first. XP uses the tier multiplier of the score
   * read before this approval's own +2.
   */
  async approve(reviewerId: string, assignmentId: string, options: ApproveOptions = {}): Promise<ApprovalResult> {
    return this.store.run(undefined, async (tx) => {
      const { repos } = tx;
      const assignment = await this.lockReviewable(repos, assignmentId, reviewerId);
      assertTransition(assignment, 'approved');
      const childId = assignment.childId;

      // A decline already retracted by its guardian has nothing left to undo
      if (assignment.status === 'appealed' && (await this.credibility.hasActiveDecline(childId, assignmentId, tx))) {
        await this.credibility.undoDecline(childId, assignmentId, { reviewerId, tx });
      }

      const level = options.levelOverride ?? assignment.assignedLevel;
      const template = await this.catalog.getTemplate(assignment.templateId);
      const baseXP = baseXPFor(level, template);

      const trust = await this.credibility.applyApproval(childId, assignmentId, { reviewerId, tx });
      const multiplier = getTier(trust.previousScore).multiplier;
      const earn = await this.ledger.earn(childId, baseXP, multiplier, {
        taskId: assignmentId,
        credibilityAtTime: trust.previousScore,
        tx,
      });

      const edited = options.levelOverride !== undefined && options.levelOverride !== assignment.assignedLevel;
      const decision: ReviewDecision = edited ? 'approved_edited' : 'approved';
      const now = new Date();
      const updated: TaskAssignment = {
        ...assignment,
        status: 'approved',
        adjustedLevel: edited ? level : assignment.adjustedLevel,
        reviewedAt: now,
        reviewedBy: reviewerId,
        parentNotes: options.notes?.trim() || null,
        reviewDecision: decision,
        xpAwarded: earn.credited,
        appealDeadline: null,
      };
      await repos.assignments.save(updated);

      const badges = await this.badges.evaluateBadges(childId, tx);

      await writeToOutbox(repos.outbox, 'task.approved', childId, {
        assignmentId,
        childId,
        reviewerId,
        decision,
        xpAwarded: earn.credited,
        newScore: trust.newScore,
      }, now);

      this.log.info(
        { assignmentId, childId, reviewerId, decision, baseXP, multiplier, xpAwarded: earn.credited },
        'Task approved'
      );

      return { assignment: updated, xpAwarded: earn.credited, credibility: trust, badges };
    });
  }

  /**
   * Decline from pending_review applies the (possibly stacked) penalty and
   * opens a 24h appeal window. Declining an appeal upholds the original
   * decline: no new penalty, no further appeal.
   */
  async decline(reviewerId: string, assignmentId: string, reason: string): Promise<DeclineResult> {
    const trimmedReason = requireText(reason, 'A reason is required to decline a task');

    return this.store.run(undefined, async (tx) => {
      const { repos } = tx;
      const assignment = await this.lockReviewable(repos, assignmentId, reviewerId);
      assertTransition(assignment, 'declined');
      const childId = assignment.childId;
      const upholdingAppeal = assignment.status === 'appealed';

      const trust = upholdingAppeal
        ? null
        : await this.credibility.applyDecline(childId, assignmentId, trimmedReason, { reviewerId, tx });

      const now = new Date();
      const appealDeadline = upholdingAppeal
        ? null
        : new Date(now.getTime() + WORKFLOW.APPEAL_WINDOW_HOURS * 60 * 60 * 1000);

      const updated: TaskAssignment = {
        ...assignment,
        status: 'declined',
        reviewedAt: now,
        reviewedBy: reviewerId,
        parentNotes: trimmedReason,
        reviewDecision: 'declined',
        xpAwarded: 0,
        appealDeadline,
      };
      await repos.assignments.save(updated);

      const newScore = trust?.newScore ?? (await repos.credibility.find(childId))?.score ?? 0;
      await writeToOutbox(repos.outbox, 'task.declined', childId, {
        assignmentId,
        childId,
        reviewerId,
        reason: trimmedReason,
        penalty: trust?.appliedDelta ?? 0,
        newScore,
        appealDeadline: appealDeadline ? appealDeadline.toISOString() : null,
      }, now);

      this.log.info(
        { assignmentId, childId, reviewerId, upheldAppeal: upholdingAppeal, penalty: trust?.penalty ?? 0 },
        'Task declined'
      );

      return { assignment: updated, credibility: trust };
    });
  }

  /**
   * A guardian takes back the penalty of a decline issued in error. The
   * assignment keeps its status: a declined one stays appealable until its
   * deadline and an appealed one still awaits review, where approving it no
   * longer retracts anything.
   */
  async retractDecline(reviewerId: string, assignmentId: string, childId?: string): Promise<DeclineRetraction> {
    return this.store.run(undefined, async (tx) => {
      const assignment = await this.lockReviewable(tx.repos, assignmentId, reviewerId);
      if (childId !== undefined && assignment.childId !== childId) {
        throw new AuthorizationError(`Assignment '${assignmentId}' belongs to another child`);
      }
      if (assignment.status !== 'declined' && assignment.status !== 'appealed') {
        throw new StateConflictError(`Assignment '${assignmentId}' is ${assignment.status}, not declined`);
      }

      const credibility = await this.credibility.undoDecline(assignment.childId, assignmentId, { reviewerId, tx });

      this.log.info(
        { assignmentId, childId: assignment.childId, reviewerId, restored: credibility.appliedDelta },
        'Decline retracted'
      );
      return { assignment, credibility };
    });
  }

  // --------------------------------------------------------------------------
  // Sweep
  // --------------------------------------------------------------------------

  /**
   * Expire assigned / in-progress work whose due date has passed. No XP or
   * credibility effect. Returns the expired ids.
   */
  async expireSweep(): Promise<string[]> {
    const now = new Date();
    const overdue = await this.store.repos.assignments.listOverdue(now);
    const expired: string[] = [];

    for (const candidate of overdue) {
      const didExpire = await this.store.run(undefined, async ({ repos }) => {
        const assignment = await repos.assignments.lockById(candidate.id);
        if (
          !assignment ||
          !EXPIRABLE_STATES.includes(assignment.status) ||
          !assignment.dueDate ||
          assignment.dueDate >= now
        ) {
          return false;
        }

        await repos.assignments.save({ ...assignment, status: 'expired' });
        await writeToOutbox(repos.outbox, 'task.expired', assignment.childId, {
          assignmentId: assignment.id,
          childId: assignment.childId,
          dueDate: assignment.dueDate.toISOString(),
        }, now);
        return true;
      });

      if (didExpire) expired.push(candidate.id);
    }

    if (expired.length > 0) {
      this.log.info({ count: expired.length }, 'Expired overdue assignments');
    }
    return expired;
  }

  // --------------------------------------------------------------------------
  // Queries
  // --------------------------------------------------------------------------

  async getAssignment(assignmentId: string): Promise<TaskAssignment> {
    const assignment = await this.store.repos.assignments.findById(assignmentId);
    if (!assignment) {
      throw new NotFoundError(`Assignment with id '${assignmentId}' not found`);
    }
    return assignment;
  }

  async listForChild(childId: string, status?: AssignmentStatus): Promise<TaskAssignment[]> {
    return this.store.repos.assignments.listByChild(childId, status);
  }

  /** Pending and appealed work of every child the reviewer may review, oldest submission first. */
  async getPendingReviews(reviewerId: string): Promise<TaskAssignment[]> {
    const children = await this.household.childrenOf(reviewerId);
    return this.store.repos.assignments.listByChildren(children, REVIEWABLE_STATES);
  }

  async canReview(reviewerId: string, childId: string): Promise<boolean> {
    return this.household.canReview(reviewerId, childId);
  }

  // --------------------------------------------------------------------------
  // Internals
  // --------------------------------------------------------------------------

  private async create(
    childId: string,
    assignedBy: string | null,
    template: TaskTemplate,
    level: TaskLevel,
    dueDate: Date | null
  ): Promise<TaskAssignment> {
    const assignment: TaskAssignment = {
      id: randomUUID(),
      templateId: template.id,
      childId,
      assignedBy,
      title: template.title,
      description: template.description,
      category: template.category,
      assignedLevel: level,
      adjustedLevel: null,
      status: 'assigned',
      createdAt: new Date(),
      startedAt: null,
      completedAt: null,
      reviewedAt: null,
      dueDate,
      photoURL: null,
      childNotes: null,
      completionTimeMinutes: null,
      reviewedBy: null,
      parentNotes: null,
      reviewDecision: null,
      xpAwarded: 0,
      appealDeadline: null,
      appealedAt: null,
      appealNotes: null,
    };

    await this.store.run(undefined, ({ repos }) => repos.assignments.insert(assignment));

    this.log.info({ assignmentId: assignment.id, childId, assignedBy, templateId: template.id, level }, 'Task assigned');
    return assignment;
  }

  private async requireTemplate(templateId: string): Promise<TaskTemplate> {
    const template = await this.catalog.getTemplate(templateId);
    if (!template) {
      throw new NotFoundError(`Task template with id '${templateId}' not found`);
    }
    return template;
  }

  private async requireReviewer(reviewerId: string, childId: string): Promise<void> {
    if (!(await this.household.canReview(reviewerId, childId))) {
      throw new AuthorizationError(`User '${reviewerId}' cannot review tasks for '${childId}'`);
    }
  }

  private async lockAssignment(repos: Tx['repos'], assignmentId: string): Promise<TaskAssignment> {
    const assignment = await repos.assignments.lockById(assignmentId);
    if (!assignment) {
      throw new NotFoundError(`Assignment with id '${assignmentId}' not found`);
    }
    return assignment;
  }

  private async lockOwned(repos: Tx['repos'], assignmentId: string, childId: string): Promise<TaskAssignment> {
    const assignment = await this.lockAssignment(repos, assignmentId);
    if (assignment.childId !== childId) {
      throw new AuthorizationError(`Assignment '${assignmentId}' belongs to another child`);
    }
    return assignment;
  }

  private async lockReviewable(repos: Tx['repos'], assignmentId: string, reviewerId: string): Promise<TaskAssignment> {
    const assignment = await this.lockAssignment(repos, assignmentId);
    await this.requireReviewer(reviewerId, assignment.childId);
    return assignment;
  }

  private assertNotOverdue(assignment: TaskAssignment, now: Date): void {
    if (assignment.dueDate && assignment.dueDate < now) {
      throw new StateConflictError(`Assignment '${assignment.id}' is past its due date`);
    }
  }
}
