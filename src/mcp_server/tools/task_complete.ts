import { z } from 'zod';

import type { Task } from '../../services/task_service';
import type { ToolContext } from '../tool_context';
import { taskIdField } from './task_id';

export const taskCompleteSchema = z.object({
  task_id: taskIdField,
});

export async function taskComplete(params: z.infer<typeof taskCompleteSchema>, { tasks }: ToolContext): Promise<Task> {
  return tasks.complete(params.task_id);
}
