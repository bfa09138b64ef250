import { z } from 'zod';

import { ENERGY_LEVELS } from '../../db/tasks';
import type { TaskPatch } from '../../db/tasks';
import type { Task } from '../../services/task_service';
import type { ToolContext } from '../tool_context';
import { taskIdField } from './task_id';

export const taskUpdateSchema = z.object({
  task_id: taskIdField,
  title: z.string().min(1).max(500).optional(),
  project: z.string().max(100).optional(),
  priority: z.number().int().min(1).max(5).optional(),
  energy: z.enum(ENERGY_LEVELS).optional(),
  time_estimate: z.string().max(50).optional(),
  notes: z.string().optional(),
  due_date: z.string().optional(),
});

export type TaskUpdateParams = z.infer<typeof taskUpdateSchema>;

// Only fields the caller sent are written.
export async function taskUpdate(params: TaskUpdateParams, { tasks }: ToolContext): Promise<Task> {
  const patch: TaskPatch = {};
  if (params.title !== undefined) patch.title = params.title;
  if (params.project !== undefined) patch.project = params.project;
  if (params.priority !== undefined) patch.priority = params.priority;
  if (params.energy !== undefined) patch.energy = params.energy;
  if (params.time_estimate !== undefined) patch.timeEstimate = params.time_estimate;
  if (params.notes !== undefined) patch.notes = params.notes;
  if (params.due_date !== undefined) patch.dueDate = params.due_date;
  return tasks.update(params.task_id, patch);
}
