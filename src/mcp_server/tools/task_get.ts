import { z } from 'zod';

import type { Task } from '../../services/task_service';
import type { ToolContext } from '../tool_context';
import { taskIdField } from './task_id';

export const taskGetSchema = z.object({
  task_id: taskIdField,
});

export async function taskGet(params: z.infer<typeof taskGetSchema>, { tasks }: ToolContext): Promise<Task> {
  return tasks.get(params.task_id);
}
