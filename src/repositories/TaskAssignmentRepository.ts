/**
 * Task Assignment Repository
 *
 * Data access layer for task_assignments. Encapsulates all workflow SQL
 * so services never write raw queries directly.
 */

import { BaseRepository } from './BaseRepository';
import type { TaskAssignmentRepository } from './contracts';
import type { AssignmentStatus, ReviewDecision, TaskAssignment, TaskLevel } from '../types';

interface TaskAssignmentRow {
  id: string;
  template_id: string;
  child_id: string;
  assigned_by: string | null;
  title: string;
  description: string;
  category: string;
  assigned_level: TaskLevel;
  adjusted_level: TaskLevel | null;
  status: AssignmentStatus;
  created_at: Date;
  started_at: Date | null;
  completed_at: Date | null;
  reviewed_at: Date | null;
  due_date: Date | null;
  photo_url: string | null;
  child_notes: string | null;
  completion_time_minutes: number | null;
  reviewed_by: string | null;
  parent_notes: string | null;
  review_decision: ReviewDecision | null;
  xp_awarded: number;
  appeal_deadline: Date | null;
  appealed_at: Date | null;
  appeal_notes: string | null;
}

const COLUMNS = [
  'id', 'template_id', 'child_id', 'assigned_by', 'title', 'description', 'category',
  'assigned_level', 'adjusted_level', 'status', 'created_at', 'started_at', 'completed_at',
  'reviewed_at', 'due_date', 'photo_url', 'child_notes', 'completion_time_minutes',
  'reviewed_by', 'parent_notes', 'review_decision', 'xp_awarded', 'appeal_deadline',
  'appealed_at', 'appeal_notes',
] as const;

function toParams(a: TaskAssignment): unknown[] {
  return [
    a.id, a.templateId, a.childId, a.assignedBy, a.title, a.description, a.category,
    a.assignedLevel, a.adjustedLevel, a.status, a.createdAt, a.startedAt, a.completedAt,
    a.reviewedAt, a.dueDate, a.photoURL, a.childNotes, a.completionTimeMinutes,
    a.reviewedBy, a.parentNotes, a.reviewDecision, a.xpAwarded, a.appealDeadline,
    a.appealedAt, a.appealNotes,
  ];
}

export class PgTaskAssignmentRepository
  extends BaseRepository<TaskAssignmentRow, TaskAssignment>
  implements TaskAssignmentRepository
{
  protected readonly tableName = 'task_assignments';

  protected toEntity(row: TaskAssignmentRow): TaskAssignment {
    return {
      id: row.id,
      templateId: row.template_id,
      childId: row.child_id,
      assignedBy: row.assigned_by,
      title: row.title,
      description: row.description,
      category: row.category,
      assignedLevel: row.assigned_level,
      adjustedLevel: row.adjusted_level,
      status: row.status,
      createdAt: row.created_at,
      startedAt: row.started_at,
      completedAt: row.completed_at,
      reviewedAt: row.reviewed_at,
      dueDate: row.due_date,
      photoURL: row.photo_url,
      childNotes: row.child_notes,
      completionTimeMinutes: row.completion_time_minutes,
      reviewedBy: row.reviewed_by,
      parentNotes: row.parent_notes,
      reviewDecision: row.review_decision,
      xpAwarded: row.xp_awarded,
      appealDeadline: row.appeal_deadline,
      appealedAt: row.appealed_at,
      appealNotes: row.appeal_notes,
    };
  }

  async insert(assignment: TaskAssignment): Promise<void> {
    const placeholders = COLUMNS.map((_, i) => `$${i + 1}`).join(', ');
    await this.query(
      `INSERT INTO ${this.tableName} (${COLUMNS.join(', ')}) VALUES (${placeholders})`,
      toParams(assignment)
    );
  }

  async findById(id: string): Promise<TaskAssignment | null> {
    return this.byKey('id', id);
  }

  async lockById(id: string): Promise<TaskAssignment | null> {
    return this.byKey('id', id, true);
  }

  async save(assignment: TaskAssignment): Promise<void> {
    // id is $1; every other column is assigned from its positional param
    const assignments = COLUMNS.slice(1).map((column, i) => `${column} = $${i + 2}`).join(', ');
    await this.query(
      `UPDATE ${this.tableName} SET ${assignments} WHERE id = $1`,
      toParams(assignment)
    );
  }

  async listByChild(childId: string, status?: AssignmentStatus): Promise<TaskAssignment[]> {
    if (status) {
      return this.many(
        `SELECT * FROM ${this.tableName} WHERE child_id = $1 AND status = $2 ORDER BY created_at DESC`,
        [childId, status]
      );
    }
    return this.many(
      `SELECT * FROM ${this.tableName} WHERE child_id = $1 ORDER BY created_at DESC`,
      [childId]
    );
  }

  async listByChildren(childIds: string[], statuses: AssignmentStatus[]): Promise<TaskAssignment[]> {
    if (childIds.length === 0 || statuses.length === 0) {
      return [];
    }
    return this.many(
      `SELECT * FROM ${this.tableName}
       WHERE child_id = ANY($1) AND status = ANY($2)
       ORDER BY completed_at ASC NULLS LAST, created_at ASC`,
      [childIds, statuses]
    );
  }

  async listOverdue(now: Date): Promise<TaskAssignment[]> {
    return this.many(
      `SELECT * FROM ${this.tableName}
       WHERE status IN ('assigned', 'in_progress') AND due_date IS NOT NULL AND due_date < $1
       ORDER BY due_date ASC`,
      [now]
    );
  }

  async countApproved(childId: string): Promise<number> {
    return this.countWhere(`child_id = $1 AND status = 'approved'`, [childId]);
  }
}
