import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';

import type { ToolContext } from './tool_context';
import { taskComplete, taskCompleteSchema } from './tools/task_complete';
import { taskCreate, taskCreateSchema } from './tools/task_create';
import { taskDelete, taskDeleteSchema } from './tools/task_delete';
import { taskGet, taskGetSchema } from './tools/task_get';
import { taskList, taskListSchema } from './tools/task_list';
import { taskSchedule, taskScheduleSchema } from './tools/task_schedule';
import { taskSearch, taskSearchSchema } from './tools/task_search';
import { taskStats, taskStatsSchema } from './tools/task_stats';
import { taskUpdate, taskUpdateSchema } from './tools/task_update';

export const TOOL_NAMES = [
  'task_create',
  'task_list',
  'task_get',
  'task_update',
  'task_complete',
  'task_delete',
  'task_search',
  'task_stats',
  'task_schedule',
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export const isToolName = (name: string): name is ToolName => TOOL_NAMES.some((t) => t === name);

/** Parameters either validated and bound to their handler, or the reason they were rejected. */
export type PreparedCall = { ok: true; run: (ctx: ToolContext) => Promise<unknown> } | { ok: false; error: string };

export type RegisteredTool = {
  descriptor: Tool;
  prepare(params: unknown): PreparedCall;
};

const readDescription = (name: ToolName) =>
  fs.readFileSync(path.join(__dirname, 'tools', `${name}.md`), 'utf-8').trim();

// Defaults make a field optional for callers, so the advertised schema is the input side.
const toInputSchema = (schema: z.ZodType): Tool['inputSchema'] => {
  const json = z.toJSONSchema(schema, { io: 'input' });
  return {
    type: 'object',
    properties: json.properties ?? {},
    ...(json.required && json.required.length > 0 ? { required: json.required } : {}),
  };
};

function defineTool<S extends z.ZodType>(
  name: ToolName,
  schema: S,
  handler: (params: z.output<S>, ctx: ToolContext) => Promise<unknown>
): RegisteredTool {
  return {
    descriptor: { name, description: readDescription(name), inputSchema: toInputSchema(schema) },
    prepare(params) {
      const parsed = schema.safeParse(params ?? {});
      if (!parsed.success) {
        const fields = parsed.error.issues.map((issue) => (issue.path.length ? issue.path.map(String).join('.') : 'params'));
        return { ok: false, error: `Invalid parameters: ${[...new Set(fields)].join(', ')}` };
      }
      const data = parsed.data;
      return { ok: true, run: (ctx) => handler(data, ctx) };
    },
  };
}

export const TOOLS: { [K in ToolName]: RegisteredTool } = {
  task_create: defineTool('task_create', taskCreateSchema, taskCreate),
  task_list: defineTool('task_list', taskListSchema, taskList),
  task_get: defineTool('task_get', taskGetSchema, taskGet),
  task_update: defineTool('task_update', taskUpdateSchema, taskUpdate),
  task_complete: defineTool('task_complete', taskCompleteSchema, taskComplete),
  task_delete: defineTool('task_delete', taskDeleteSchema, taskDelete),
  task_search: defineTool('task_search', taskSearchSchema, taskSearch),
  task_stats: defineTool('task_stats', taskStatsSchema, taskStats),
  task_schedule: defineTool('task_schedule', taskScheduleSchema, taskSchedule),
};

export const toolDescriptors = (): Tool[] => TOOL_NAMES.map((name) => TOOLS[name].descriptor);
