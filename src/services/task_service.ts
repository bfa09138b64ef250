/**
 * Task operations behind the MCP tools.
 *
 * Tools never see the repository directly: they receive a {@link UserTasks} scope from
 * `TaskService.forUser`, which fixes the owning user id for every call. Another user's task id
 * therefore looks exactly like a missing one.
 */
import type { Db } from '../db/database';
import type { Energy, NewTask, TaskListFilter, TaskPatch, TaskRecord } from '../db/tasks';
import { TaskRepository } from '../db/tasks';
import { DomainError, errorMessage, NotFoundError } from '../lib/errors';
import { logger } from '../lib/logger';
import type { Clock } from '../lib/time';
import { parseTimestamp, systemClock, toIsoOrNull, toIso } from '../lib/time';

import type { CalendarClient, CalendarEvent, ProviderCredentials } from './calendar';
import { CalendarApiError } from './calendar';

/** A task as returned by the tools. */
export type Task = {
  id: number;
  user_id: string;
  title: string;
  project: string | null;
  priority: number;
  energy: Energy;
  time_estimate: string;
  notes: string | null;
  due_date: string | null;
  completed: boolean;
  completed_at: string | null;
  created_at: string;
  updated_at: string;
  calendar_event_id: string | null;
  calendar_event_url: string | null;
  scheduled_start: string | null;
  scheduled_duration: number | null;
};

export type TaskStats = {
  total_tasks: number;
  completed_tasks: number;
  incomplete_tasks: number;
  completion_rate: number;
  by_project: Record<string, number>;
  by_priority: Record<string, number>;
};

export type DeleteResult = {
  success: true;
  message: string;
};

export type ScheduleInput = {
  taskId: number;
  startTime: string;
  durationMinutes: number;
};

export const toTaskView = (record: TaskRecord): Task => ({
  id: record.id,
  user_id: record.userId,
  title: record.title,
  project: record.project,
  priority: record.priority,
  energy: record.energy,
  time_estimate: record.timeEstimate,
  notes: record.notes,
  due_date: record.dueDate,
  completed: record.completed,
  completed_at: toIsoOrNull(record.completedAtMs),
  created_at: toIso(record.createdAtMs),
  updated_at: toIso(record.updatedAtMs),
  calendar_event_id: record.calendarEventId,
  calendar_event_url: record.calendarEventUrl,
  scheduled_start: toIsoOrNull(record.scheduledStartMs),
  scheduled_duration: record.scheduledDuration,
});

const found = (record: TaskRecord | null): Task => {
  if (!record) throw new NotFoundError();
  return toTaskView(record);
};

export const completionRate = (completed: number, total: number) =>
  total === 0 ? 0 : Math.round((completed / total) * 10000) / 100;

export class TaskService {
  private readonly repo: TaskRepository;

  constructor(
    db: Db,
    private readonly calendar: CalendarClient,
    private readonly clock: Clock = systemClock
  ) {
    this.repo = new TaskRepository(db);
  }

  forUser(userId: string): UserTasks {
    return new UserTasks(userId, this.repo, this.calendar, this.clock);
  }
}

export class UserTasks {
  constructor(
    readonly userId: string,
    private readonly repo: TaskRepository,
    private readonly calendar: CalendarClient,
    private readonly clock: Clock
  ) {}

  async create(input: NewTask): Promise<Task> {
    const record = await this.repo.insert(this.userId, input, this.clock());
    logger.debug('Tasks', 'Task created', { userId: this.userId, taskId: record.id });
    return toTaskView(record);
  }

  async list(filter: TaskListFilter): Promise<Task[]> {
    return (await this.repo.list(this.userId, filter)).map(toTaskView);
  }

  async get(taskId: number): Promise<Task> {
    return found(await this.repo.findOwned(this.userId, taskId));
  }

  async update(taskId: number, patch: TaskPatch): Promise<Task> {
    return found(await this.repo.update(this.userId, taskId, patch, this.clock()));
  }

  async complete(taskId: number): Promise<Task> {
    return found(await this.repo.complete(this.userId, taskId, this.clock()));
  }

  async delete(taskId: number): Promise<DeleteResult> {
    if (!(await this.repo.delete(this.userId, taskId))) {
      throw new NotFoundError();
    }
    return { success: true, message: 'Task deleted successfully' };
  }

  async search(query: string, limit: number): Promise<Task[]> {
    return (await this.repo.search(this.userId, query, limit)).map(toTaskView);
  }

  async stats(project?: string): Promise<TaskStats> {
    const counts = await this.repo.counts(this.userId, project);
    const byProject: Record<string, number> = {};
    for (const { project: name, count } of counts.incompleteByProject) {
      const key = name ?? 'None';
      byProject[key] = (byProject[key] ?? 0) + count;
    }
    const byPriority: Record<string, number> = {};
    for (const { priority, count } of counts.incompleteByPriority) {
      byPriority[String(priority)] = count;
    }
    return {
      total_tasks: counts.total,
      completed_tasks: counts.completed,
      incomplete_tasks: counts.total - counts.completed,
      completion_rate: completionRate(counts.completed, counts.total),
      by_project: byProject,
      by_priority: byPriority,
    };
  }

  /**
   * Creates a calendar event for the task and records the link.
   *
   * The event is created before anything is written. When recording the link fails, the event
   * is deleted again so no half-scheduled state survives on either side.
   */
  async schedule(input: ScheduleInput, credentials: () => Promise<ProviderCredentials>): Promise<Task> {
    const task = await this.repo.findOwned(this.userId, input.taskId);
    if (!task) throw new NotFoundError();

    const startMs = parseTimestamp(input.startTime);
    if (startMs === null) {
      throw new DomainError('VALIDATION_ERROR', 'Invalid start_time: expected an ISO-8601 date-time');
    }

    const creds = await credentials();
    let event: CalendarEvent;
    try {
      event = await this.calendar.createEvent(creds, {
        summary: task.title,
        description: task.notes || `Priority: ${task.priority}`,
        startMs,
        durationMinutes: input.durationMinutes,
      });
    } catch (err) {
      if (!(err instanceof CalendarApiError)) throw err;
      logger.warn('Tasks', 'Calendar event creation failed', { taskId: task.id, status: err.status });
      throw new DomainError('SCHEDULE_FAILED', `Failed to schedule task: ${err.message}`, { cause: err });
    }

    let linked: TaskRecord | null;
    try {
      linked = await this.repo.linkCalendarEvent(
        this.userId,
        task.id,
        { eventId: event.id, eventUrl: event.htmlLink, scheduledStartMs: startMs, durationMinutes: input.durationMinutes },
        this.clock()
      );
    } catch (err) {
      await this.discardEvent(creds, event.id);
      throw err;
    }
    if (!linked) {
      // Deleted while the event was being created.
      await this.discardEvent(creds, event.id);
      throw new NotFoundError();
    }

    logger.info('Tasks', 'Task scheduled', { taskId: task.id, eventId: event.id });
    return toTaskView(linked);
  }

  private async discardEvent(credentials: ProviderCredentials, eventId: string) {
    try {
      await this.calendar.deleteEvent(credentials, eventId);
    } catch (err) {
      logger.error('Tasks', 'Failed to delete orphaned calendar event', { eventId, error: errorMessage(err) });
    }
  }
}
