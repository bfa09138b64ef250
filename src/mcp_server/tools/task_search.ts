import { z } from 'zod';

import type { Task } from '../../services/task_service';
import type { ToolContext } from '../tool_context';

export const taskSearchSchema = z.object({
  query: z.string().min(1).describe('Text to look for in titles and notes'),
  limit: z.number().int().min(1).max(1000).default(100),
});

export async function taskSearch(params: z.infer<typeof taskSearchSchema>, { tasks }: ToolContext): Promise<Task[]> {
  return tasks.search(params.query, params.limit);
}
