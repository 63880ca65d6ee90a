import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';
import type { TickTickClient } from '../../client.js';
import type { Logger } from '../../log.js';
import type { CreateTaskInput } from '../../model.js';
import { checkTaskKind } from '../../normalize/common.js';

export interface ToolContext {
  server: McpServer;
  client: TickTickClient;
  logger: Logger;
}

// Schemas only describe shapes. Value checks happen in the handlers and the
// client, so rejected input comes back as a Validation result, not a protocol error.

export const PrioritySchema = z.number().describe('0 none, 1 low, 3 medium, 5 high');

export const TimestampSchema = z.string().describe('ISO 8601 with offset, e.g. 2026-03-01T09:00:00Z');

export const DaySchema = z.string().describe('YYYY-MM-DD');

export const ColorSchema = z.string().describe('#rrggbb');

export const TaskKindSchema = z.string().describe('text, note or checklist');

export const ChecklistItemSchema = z.object({
  title: z.string(),
  completed: z.boolean().optional(),
  startDate: TimestampSchema.optional(),
});

export const NewTaskFields = {
  title: z.string(),
  description: z.string().optional(),
  priority: PrioritySchema.optional(),
  startDate: TimestampSchema.optional(),
  dueDate: TimestampSchema.optional(),
  isAllDay: z.boolean().optional(),
  timeZone: z.string().optional().describe('IANA zone, e.g. Europe/Berlin'),
  recurrence: z.string().optional().describe('RRULE string; requires startDate'),
  reminders: z.array(z.string()).optional().describe('Triggers, e.g. TRIGGER:-PT30M'),
  items: z.array(ChecklistItemSchema).optional(),
  kind: TaskKindSchema.optional(),
};

const NewTaskSchema = z.object(NewTaskFields);

export type NewTaskArgs = z.infer<typeof NewTaskSchema>;

export function newTaskInput({ kind, ...fields }: NewTaskArgs): Omit<CreateTaskInput, 'projectId' | 'parentId'> {
  return { ...fields, kind: checkTaskKind(kind) };
}

export const TaskRefParams = z.object({
  projectId: z.string(),
  taskId: z.string(),
});

export const DateWindowParams = z.object({
  from: DaySchema,
  to: DaySchema,
});
