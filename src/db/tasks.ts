/**
 * Task persistence.
 *
 * Every query takes the owning user id and filters on it; there is no method that can reach a
 * row without it.
 */
import type { Db } from './database';
import { runStoreOp } from './database';
import { InfrastructureError } from '../lib/errors';

export const ENERGY_LEVELS = ['light', 'medium', 'deep'] as const;

export type Energy = (typeof ENERGY_LEVELS)[number];

const isEnergy = (value: string): value is Energy => ENERGY_LEVELS.some((e) => e === value);

export type TaskRecord = {
  id: number;
  userId: string;
  title: string;
  project: string | null;
  priority: number;
  energy: Energy;
  timeEstimate: string;
  notes: string | null;
  dueDate: string | null;
  completed: boolean;
  completedAtMs: number | null;
  createdAtMs: number;
  updatedAtMs: number;
  calendarEventId: string | null;
  calendarEventUrl: string | null;
  scheduledStartMs: number | null;
  scheduledDuration: number | null;
};

export type NewTask = {
  title: string;
  project: string | null;
  priority: number;
  energy: Energy;
  timeEstimate: string;
  notes: string | null;
  dueDate: string | null;
};

export type TaskPatch = Partial<NewTask>;

export type TaskListFilter = {
  project?: string;
  priority?: number;
  showCompleted: boolean;
  limit: number;
  offset: number;
};

export type TaskCounts = {
  total: number;
  completed: number;
  incompleteByProject: Array<{ project: string | null; count: number }>;
  incompleteByPriority: Array<{ priority: number; count: number }>;
};

export type CalendarLink = {
  eventId: string;
  eventUrl: string | null;
  scheduledStartMs: number;
  durationMinutes: number;
};

type TaskRow = {
  id: number;
  user_id: string;
  title: string;
  project: string | null;
  priority: number;
  energy: string;
  time_estimate: string;
  notes: string | null;
  due_date: string | null;
  completed: number;
  completed_at_ms: number | null;
  created_at_ms: number;
  updated_at_ms: number;
  calendar_event_id: string | null;
  calendar_event_url: string | null;
  scheduled_start_ms: number | null;
  scheduled_duration: number | null;
};

type SqlValue = string | number | null;

const toTask = (row: TaskRow): TaskRecord => {
  if (!isEnergy(row.energy)) {
    throw new InfrastructureError('store_error', `Stored task ${row.id} has unknown energy level`);
  }
  return {
    id: row.id,
    userId: row.user_id,
    title: row.title,
    project: row.project,
    priority: row.priority,
    energy: row.energy,
    timeEstimate: row.time_estimate,
    notes: row.notes,
    dueDate: row.due_date,
    completed: row.completed === 1,
    completedAtMs: row.completed_at_ms,
    createdAtMs: row.created_at_ms,
    updatedAtMs: row.updated_at_ms,
    calendarEventId: row.calendar_event_id,
    calendarEventUrl: row.calendar_event_url,
    scheduledStartMs: row.scheduled_start_ms,
    scheduledDuration: row.scheduled_duration,
  };
};

const PATCH_COLUMNS: Array<[keyof TaskPatch, string]> = [
  ['title', 'title'],
  ['project', 'project'],
  ['priority', 'priority'],
  ['energy', 'energy'],
  ['timeEstimate', 'time_estimate'],
  ['notes', 'notes'],
  ['dueDate', 'due_date'],
];

const ORDER_BY = 'ORDER BY priority DESC, created_at_ms ASC, id ASC';

export class TaskRepository {
  constructor(private readonly db: Db) {}

  async insert(userId: string, task: NewTask, nowMs: number): Promise<TaskRecord> {
    return runStoreOp('insertTask', () => {
      const row = this.db
        .prepare<SqlValue[], TaskRow>(
          `INSERT INTO tasks
             (user_id, title, project, priority, energy, time_estimate, notes, due_date, completed, created_at_ms, updated_at_ms)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, 0, ?, ?)
           RETURNING *`
        )
        .get(
          userId,
          task.title,
          task.project,
          task.priority,
          task.energy,
          task.timeEstimate,
          task.notes,
          task.dueDate,
          nowMs,
          nowMs
        );
      if (!row) throw new InfrastructureError('store_error', 'Task insert returned no row');
      return toTask(row);
    });
  }

  async findOwned(userId: string, taskId: number): Promise<TaskRecord | null> {
    return runStoreOp('findTask', () => {
      const row = this.db
        .prepare<[number, string], TaskRow>('SELECT * FROM tasks WHERE id = ? AND user_id = ?')
        .get(taskId, userId);
      return row ? toTask(row) : null;
    });
  }

  async list(userId: string, filter: TaskListFilter): Promise<TaskRecord[]> {
    const where = ['user_id = ?'];
    const params: SqlValue[] = [userId];
    if (filter.project) {
      where.push('project = ?');
      params.push(filter.project);
    }
    if (filter.priority) {
      where.push('priority = ?');
      params.push(filter.priority);
    }
    if (!filter.showCompleted) {
      where.push('completed = 0');
    }
    params.push(filter.limit, filter.offset);

    return runStoreOp('listTasks', () =>
      this.db
        .prepare<SqlValue[], TaskRow>(`SELECT * FROM tasks WHERE ${where.join(' AND ')} ${ORDER_BY} LIMIT ? OFFSET ?`)
        .all(...params)
        .map(toTask)
    );
  }

  async update(userId: string, taskId: number, patch: TaskPatch, nowMs: number): Promise<TaskRecord | null> {
    const sets = ['updated_at_ms = ?'];
    const params: SqlValue[] = [nowMs];
    for (const [field, column] of PATCH_COLUMNS) {
      const value = patch[field];
      if (value !== undefined) {
        sets.push(`${column} = ?`);
        params.push(value);
      }
    }
    params.push(taskId, userId);

    return runStoreOp('updateTask', () => {
      const row = this.db
        .prepare<SqlValue[], TaskRow>(`UPDATE tasks SET ${sets.join(', ')} WHERE id = ? AND user_id = ? RETURNING *`)
        .get(...params);
      return row ? toTask(row) : null;
    });
  }

  async complete(userId: string, taskId: number, nowMs: number): Promise<TaskRecord | null> {
    return runStoreOp('completeTask', () => {
      const row = this.db
        .prepare<[number, number, number, string], TaskRow>(
          `UPDATE tasks SET completed = 1, completed_at_ms = ?, updated_at_ms = ?
           WHERE id = ? AND user_id = ?
           RETURNING *`
        )
        .get(nowMs, nowMs, taskId, userId);
      return row ? toTask(row) : null;
    });
  }

  async delete(userId: string, taskId: number): Promise<boolean> {
    return runStoreOp(
      'deleteTask',
      () => this.db.prepare<[number, string]>('DELETE FROM tasks WHERE id = ? AND user_id = ?').run(taskId, userId).changes > 0
    );
  }

  /** Case-insensitive substring match on title or notes. */
  async search(userId: string, query: string, limit: number): Promise<TaskRecord[]> {
    return runStoreOp('searchTasks', () =>
      this.db
        .prepare<[string, string, string, number], TaskRow>(
          `SELECT * FROM tasks
           WHERE user_id = ?
             AND (instr(lower(title), lower(?)) > 0 OR instr(lower(coalesce(notes, '')), lower(?)) > 0)
           ${ORDER_BY}
           LIMIT ?`
        )
        .all(userId, query, query, limit)
        .map(toTask)
    );
  }

  /** Totals and incomplete-only breakdowns, read in one transaction. */
  async counts(userId: string, project?: string): Promise<TaskCounts> {
    const scope = project ? 'user_id = ? AND project = ?' : 'user_id = ?';
    const params: SqlValue[] = project ? [userId, project] : [userId];

    return runStoreOp('countTasks', () =>
      this.db.transaction((): TaskCounts => {
        const totals = this.db
          .prepare<SqlValue[], { total: number; completed: number }>(
            `SELECT COUNT(*) AS total, COALESCE(SUM(completed), 0) AS completed FROM tasks WHERE ${scope}`
          )
          .get(...params);
        const byProject = this.db
          .prepare<SqlValue[], { project: string | null; count: number }>(
            `SELECT project, COUNT(*) AS count FROM tasks WHERE ${scope} AND completed = 0 GROUP BY project ORDER BY project`
          )
          .all(...params);
        const byPriority = this.db
          .prepare<SqlValue[], { priority: number; count: number }>(
            `SELECT priority, COUNT(*) AS count FROM tasks WHERE ${scope} AND completed = 0 GROUP BY priority ORDER BY priority`
          )
          .all(...params);
        return {
          total: totals?.total ?? 0,
          completed: totals?.completed ?? 0,
          incompleteByProject: byProject,
          incompleteByPriority: byPriority,
        };
      })()
    );
  }

  async linkCalendarEvent(userId: string, taskId: number, link: CalendarLink, nowMs: number): Promise<TaskRecord | null> {
    return runStoreOp('linkCalendarEvent', () => {
      const row = this.db
        .prepare<[string, string | null, number, number, number, number, string], TaskRow>(
          `UPDATE tasks
           SET calendar_event_id = ?, calendar_event_url = ?, scheduled_start_ms = ?, scheduled_duration = ?, updated_at_ms = ?
           WHERE id = ? AND user_id = ?
           RETURNING *`
        )
        .get(link.eventId, link.eventUrl, link.scheduledStartMs, link.durationMinutes, nowMs, taskId, userId);
      return row ? toTask(row) : null;
    });
  }
}
