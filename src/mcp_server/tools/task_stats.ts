import { z } from 'zod';

import type { TaskStats } from '../../services/task_service';
import type { ToolContext } from '../tool_context';

export const taskStatsSchema = z.object({
  project: z.string().optional().describe('Restrict every figure to this project'),
});

export async function taskStats(params: z.infer<typeof taskStatsSchema>, { tasks }: ToolContext): Promise<TaskStats> {
  return tasks.stats(params.project);
}
