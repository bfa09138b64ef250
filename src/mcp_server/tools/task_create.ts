import { z } from 'zod';

import { ENERGY_LEVELS } from '../../db/tasks';
import type { Task } from '../../services/task_service';
import type { ToolContext } from '../tool_context';

export const taskCreateSchema = z.object({
  title: z.string().min(1).max(500).describe('Task title'),
  project: z.string().max(100).optional().describe('Project name for grouping'),
  priority: z.number().int().min(1).max(5).default(3).describe('Priority from 1 (lowest) to 5 (highest)'),
  energy: z.enum(ENERGY_LEVELS).default('medium').describe('Energy the task needs'),
  time_estimate: z.string().max(50).default('1hr').describe('Free-form estimate such as "30min" or "2hr"'),
  notes: z.string().optional().describe('Additional notes'),
  due_date: z.string().optional().describe('Due date, for example 2025-01-31'),
});

export type TaskCreateParams = z.infer<typeof taskCreateSchema>;

export async function taskCreate(params: TaskCreateParams, { tasks }: ToolContext): Promise<Task> {
  return tasks.create({
    title: params.title,
    project: params.project ?? null,
    priority: params.priority,
    energy: params.energy,
    timeEstimate: params.time_estimate,
    notes: params.notes ?? null,
    dueDate: params.due_date ?? null,
  });
}
