import { z } from 'zod';

import type { Task } from '../../services/task_service';
import type { ToolContext } from '../tool_context';

export const taskListSchema = z.object({
  project: z.string().optional().describe('Only tasks in this project'),
  priority: z.number().int().min(1).max(5).optional().describe('Only tasks with this priority'),
  show_completed: z.boolean().default(false).describe('Include completed tasks'),
  limit: z.number().int().min(1).max(1000).default(100),
  offset: z.number().int().min(0).default(0),
});

export type TaskListParams = z.infer<typeof taskListSchema>;

export async function taskList(params: TaskListParams, { tasks }: ToolContext): Promise<Task[]> {
  return tasks.list({
    project: params.project,
    priority: params.priority,
    showCompleted: params.show_completed,
    limit: params.limit,
    offset: params.offset,
  });
}
