import { z } from 'zod';

import type { Task } from '../../services/task_service';
import type { ToolContext } from '../tool_context';
import { taskIdField } from './task_id';

export const taskScheduleSchema = z.object({
  task_id: taskIdField,
  start_time: z.string().min(1).describe('Event start as ISO-8601; read as UTC when it has no offset'),
  duration_minutes: z.number().int().min(5).max(480).default(60),
});

export async function taskSchedule(
  params: z.infer<typeof taskScheduleSchema>,
  { tasks, providerCredentials }: ToolContext
): Promise<Task> {
  return tasks.schedule(
    { taskId: params.task_id, startTime: params.start_time, durationMinutes: params.duration_minutes },
    providerCredentials
  );
}
