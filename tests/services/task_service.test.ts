import type { AppContext } from '../../src/context';
import { TaskRepository } from '../../src/db/tasks';
import type { NewTask } from '../../src/db/tasks';
import { DomainError, InfrastructureError, NotFoundError } from '../../src/lib/errors';
import { completionRate } from '../../src/services/task_service';
import type { UserTasks } from '../../src/services/task_service';
import { BASE_TIME_MS, createTestContext, signIn } from '../helpers/fixtures';
import type { FakeCalendarClient, ManualClock } from '../helpers/fixtures';

const newTask = (overrides: Partial<NewTask> = {}): NewTask => ({
  title: 'Write report',
  project: null,
  priority: 3,
  energy: 'medium',
  timeEstimate: '1hr',
  notes: null,
  dueDate: null,
  ...overrides,
});

const credentials = async () => ({ accessToken: 'access-user-1', refreshToken: 'refresh-user-1' });

describe('completionRate', () => {
  test('is a percentage with two decimals', () => {
    expect(completionRate(1, 3)).toBe(33.33);
    expect(completionRate(2, 3)).toBe(66.67);
    expect(completionRate(0, 0)).toBe(0);
  });
});

describe('UserTasks', () => {
  let ctx: AppContext;
  let clock: ManualClock;
  let calendar: FakeCalendarClient;
  let tasks: UserTasks;
  let otherTasks: UserTasks;

  beforeEach(async () => {
    ({ ctx, clock, calendar } = createTestContext());
    await signIn(ctx, 'user-1');
    await signIn(ctx, 'user-2');
    tasks = ctx.tasks.forUser('user-1');
    otherTasks = ctx.tasks.forUser('user-2');
  });

  afterEach(async () => {
    await ctx.close();
  });

  test('create returns the stored task', async () => {
    const task = await tasks.create(newTask({ project: 'work', notes: 'Quarterly numbers', dueDate: '2025-01-31' }));

    expect(task).toEqual({
      id: task.id,
      user_id: 'user-1',
      title: 'Write report',
      project: 'work',
      priority: 3,
      energy: 'medium',
      time_estimate: '1hr',
      notes: 'Quarterly numbers',
      due_date: '2025-01-31',
      completed: false,
      completed_at: null,
      created_at: '2025-01-15T12:00:00.000Z',
      updated_at: '2025-01-15T12:00:00.000Z',
      calendar_event_id: null,
      calendar_event_url: null,
      scheduled_start: null,
      scheduled_duration: null,
    });
    expect(await tasks.get(task.id)).toEqual(task);
  });

  test('lists by priority, then creation time', async () => {
    await tasks.create(newTask({ title: 'low', priority: 1 }));
    clock.advance(1000);
    await tasks.create(newTask({ title: 'high', priority: 5 }));
    clock.advance(1000);
    await tasks.create(newTask({ title: 'mid-first', priority: 3 }));
    clock.advance(1000);
    await tasks.create(newTask({ title: 'mid-second', priority: 3 }));

    const listed = await tasks.list({ showCompleted: false, limit: 100, offset: 0 });
    expect(listed.map((t) => t.title)).toEqual(['high', 'mid-first', 'mid-second', 'low']);

    const page = await tasks.list({ showCompleted: false, limit: 2, offset: 1 });
    expect(page.map((t) => t.title)).toEqual(['mid-first', 'mid-second']);
  });

  test('list hides completed tasks unless asked and filters by project and priority', async () => {
    const done = await tasks.create(newTask({ title: 'done', project: 'home' }));
    await tasks.create(newTask({ title: 'open', project: 'home', priority: 4 }));
    await tasks.create(newTask({ title: 'elsewhere', project: 'work' }));
    await tasks.complete(done.id);

    expect((await tasks.list({ project: 'home', showCompleted: false, limit: 100, offset: 0 })).map((t) => t.title)).toEqual([
      'open',
    ]);
    expect(
      (await tasks.list({ project: 'home', showCompleted: true, limit: 100, offset: 0 })).map((t) => t.title)
    ).toEqual(['open', 'done']);
    expect((await tasks.list({ priority: 4, showCompleted: true, limit: 100, offset: 0 })).map((t) => t.title)).toEqual([
      'open',
    ]);
  });

  test('update changes only the given fields and bumps updated_at', async () => {
    const task = await tasks.create(newTask({ notes: 'keep me' }));
    clock.advance(5000);

    const updated = await tasks.update(task.id, { title: 'Write final report', priority: 5 });

    expect(updated.title).toBe('Write final report');
    expect(updated.priority).toBe(5);
    expect(updated.notes).toBe('keep me');
    expect(updated.created_at).toBe('2025-01-15T12:00:00.000Z');
    expect(updated.updated_at).toBe('2025-01-15T12:00:05.000Z');
  });

  test('complete records the completion time', async () => {
    const task = await tasks.create(newTask());
    clock.advance(60_000);
    const completed = await tasks.complete(task.id);
    expect(completed.completed).toBe(true);
    expect(completed.completed_at).toBe('2025-01-15T12:01:00.000Z');
  });

  test('delete removes the task', async () => {
    const task = await tasks.create(newTask());
    expect(await tasks.delete(task.id)).toEqual({ success: true, message: 'Task deleted successfully' });
    await expect(tasks.get(task.id)).rejects.toBeInstanceOf(NotFoundError);
    await expect(tasks.delete(task.id)).rejects.toMatchObject({ code: 'NOT_FOUND', message: 'Task not found' });
  });

  test("another user's task looks missing", async () => {
    const task = await tasks.create(newTask());

    await expect(otherTasks.get(task.id)).rejects.toMatchObject({ code: 'NOT_FOUND' });
    await expect(otherTasks.update(task.id, { title: 'mine now' })).rejects.toMatchObject({ code: 'NOT_FOUND' });
    await expect(otherTasks.complete(task.id)).rejects.toMatchObject({ code: 'NOT_FOUND' });
    await expect(otherTasks.delete(task.id)).rejects.toMatchObject({ code: 'NOT_FOUND' });
    expect(await otherTasks.list({ showCompleted: true, limit: 100, offset: 0 })).toEqual([]);
    expect((await tasks.get(task.id)).title).toBe('Write report');
  });

  test('search matches title or notes case-insensitively', async () => {
    await tasks.create(newTask({ title: 'Call the BANK' }));
    await tasks.create(newTask({ title: 'Groceries', notes: 'milk, bank statement' }));
    await tasks.create(newTask({ title: 'Gym' }));
    await otherTasks.create(newTask({ title: 'bank holiday' }));

    expect((await tasks.search('bank', 100)).map((t) => t.title)).toEqual(['Call the BANK', 'Groceries']);
    expect(await tasks.search('bank', 1)).toHaveLength(1);
  });

  test('stats count all tasks and break down the incomplete ones', async () => {
    await tasks.create(newTask({ project: 'work', priority: 3 }));
    await tasks.create(newTask({ project: null, priority: 5 }));
    const done = await tasks.create(newTask({ project: 'work', priority: 3 }));
    await tasks.complete(done.id);

    const stats = await tasks.stats();
    expect(stats).toEqual({
      total_tasks: 3,
      completed_tasks: 1,
      incomplete_tasks: 2,
      completion_rate: 33.33,
      by_project: { None: 1, work: 1 },
      by_priority: { '3': 1, '5': 1 },
    });
    const sum = (counts: Record<string, number>) => Object.values(counts).reduce((a, b) => a + b, 0);
    expect(sum(stats.by_project)).toBe(stats.incomplete_tasks);
    expect(sum(stats.by_priority)).toBe(stats.incomplete_tasks);

    expect(await tasks.stats('work')).toEqual({
      total_tasks: 2,
      completed_tasks: 1,
      incomplete_tasks: 1,
      completion_rate: 50,
      by_project: { work: 1 },
      by_priority: { '3': 1 },
    });
  });

  test('stats of an empty list', async () => {
    expect(await tasks.stats()).toEqual({
      total_tasks: 0,
      completed_tasks: 0,
      incomplete_tasks: 0,
      completion_rate: 0,
      by_project: {},
      by_priority: {},
    });
  });

  describe('schedule', () => {
    test('creates a UTC event and links it to the task', async () => {
      const task = await tasks.create(newTask({ priority: 4 }));
      clock.advance(1000);

      const scheduled = await tasks.schedule(
        { taskId: task.id, startTime: '2025-02-01T09:30:00', durationMinutes: 90 },
        credentials
      );

      expect(calendar.created).toEqual([
        {
          credentials: { accessToken: 'access-user-1', refreshToken: 'refresh-user-1' },
          event: {
            summary: 'Write report',
            description: 'Priority: 4',
            startMs: Date.UTC(2025, 1, 1, 9, 30),
            durationMinutes: 90,
          },
        },
      ]);
      expect(scheduled).toMatchObject({
        calendar_event_id: 'event-1',
        calendar_event_url: 'https://calendar.example/event?eid=event-1',
        scheduled_start: '2025-02-01T09:30:00.000Z',
        scheduled_duration: 90,
        updated_at: new Date(BASE_TIME_MS + 1000).toISOString(),
      });
    });

    test('uses the notes as the event description when present', async () => {
      const task = await tasks.create(newTask({ notes: 'Bring slides' }));
      await tasks.schedule({ taskId: task.id, startTime: '2025-02-01T09:30:00+02:00', durationMinutes: 60 }, credentials);
      expect(calendar.created[0].event).toMatchObject({
        description: 'Bring slides',
        startMs: Date.UTC(2025, 1, 1, 7, 30),
      });
    });

    test('a calendar failure is SCHEDULE_FAILED and leaves the task unscheduled', async () => {
      const task = await tasks.create(newTask());
      calendar.failCreateWith = 403;

      const failure = tasks.schedule({ taskId: task.id, startTime: '2025-02-01T09:30:00Z', durationMinutes: 60 }, credentials);
      await expect(failure).rejects.toBeInstanceOf(DomainError);
      await expect(failure).rejects.toMatchObject({
        code: 'SCHEDULE_FAILED',
        message: 'Failed to schedule task: Event creation failed with status 403',
      });
      expect((await tasks.get(task.id)).calendar_event_id).toBeNull();
    });

    test('an unparseable start time is a validation error', async () => {
      const task = await tasks.create(newTask());
      await expect(
        tasks.schedule({ taskId: task.id, startTime: 'next tuesday', durationMinutes: 60 }, credentials)
      ).rejects.toMatchObject({
        code: 'VALIDATION_ERROR',
        message: 'Invalid start_time: expected an ISO-8601 date-time',
      });
      expect(calendar.created).toHaveLength(0);
    });

    test('a missing task is NOT_FOUND and never reaches the calendar', async () => {
      await expect(
        tasks.schedule({ taskId: 999, startTime: '2025-02-01T09:30:00Z', durationMinutes: 60 }, credentials)
      ).rejects.toMatchObject({ code: 'NOT_FOUND' });
      expect(calendar.created).toHaveLength(0);
    });

    test('reads a space-separated start time as UTC', async () => {
      const task = await tasks.create(newTask());
      const scheduled = await tasks.schedule(
        { taskId: task.id, startTime: '2025-02-01 09:30:00', durationMinutes: 30 },
        credentials
      );
      expect(calendar.created[0].event.startMs).toBe(Date.UTC(2025, 1, 1, 9, 30));
      expect(scheduled.scheduled_start).toBe('2025-02-01T09:30:00.000Z');
    });

    describe('when recording the link fails', () => {
      const storeFailure = new InfrastructureError('store_error', 'database is locked', { retryable: true });
      let linkSpy: jest.SpyInstance;

      beforeEach(() => {
        linkSpy = jest.spyOn(TaskRepository.prototype, 'linkCalendarEvent').mockRejectedValueOnce(storeFailure);
      });

      afterEach(() => {
        linkSpy.mockRestore();
      });

      test('deletes the created event and reports the error', async () => {
        const task = await tasks.create(newTask());

        await expect(
          tasks.schedule({ taskId: task.id, startTime: '2025-02-01T09:30:00Z', durationMinutes: 60 }, credentials)
        ).rejects.toBe(storeFailure);

        expect(calendar.created).toHaveLength(1);
        expect(calendar.deleted).toEqual(['event-1']);
        expect((await tasks.get(task.id)).calendar_event_id).toBeNull();
      });

      test('still reports the store error when the event cannot be deleted', async () => {
        const task = await tasks.create(newTask());
        const deleteSpy = jest.spyOn(calendar, 'deleteEvent').mockRejectedValueOnce(new Error('calendar unreachable'));

        await expect(
          tasks.schedule({ taskId: task.id, startTime: '2025-02-01T09:30:00Z', durationMinutes: 60 }, credentials)
        ).rejects.toBe(storeFailure);
        expect(deleteSpy).toHaveBeenCalledWith(
          { accessToken: 'access-user-1', refreshToken: 'refresh-user-1' },
          'event-1'
        );
      });
    });

    test('deletes the event again when the task disappears mid-flight', async () => {
      const task = await tasks.create(newTask());
      calendar.beforeCreate = async () => {
        await tasks.delete(task.id);
      };

      await expect(
        tasks.schedule({ taskId: task.id, startTime: '2025-02-01T09:30:00Z', durationMinutes: 60 }, credentials)
      ).rejects.toMatchObject({ code: 'NOT_FOUND' });
      expect(calendar.deleted).toEqual(['event-1']);
    });
  });
});
