import { z } from 'zod';

import type { DeleteResult } from '../../services/task_service';
import type { ToolContext } from '../tool_context';
import { taskIdField } from './task_id';

export const taskDeleteSchema = z.object({
  task_id: taskIdField,
});

export async function taskDelete(params: z.infer<typeof taskDeleteSchema>, { tasks }: ToolContext): Promise<DeleteResult> {
  return tasks.delete(params.task_id);
}
