import { z } from 'zod';
import { checkTaskKind } from '../../normalize/common.js';
import { respond } from '../respond.js';
import {
  ChecklistItemSchema,
  DateWindowParams,
  NewTaskFields,
  PrioritySchema,
  TaskKindSchema,
  TaskRefParams,
  TimestampSchema,
  newTaskInput,
  type ToolContext,
} from './shared.js';

const CreateTaskParams = z.object({
  ...NewTaskFields,
  projectId: z.string().optional().describe('Defaults to the inbox'),
});

const UpdateTaskParams = TaskRefParams.extend({
  title: z.string().optional(),
  description: z.string().nullable().optional(),
  priority: PrioritySchema.optional(),
  startDate: TimestampSchema.nullable().optional(),
  dueDate: TimestampSchema.nullable().optional().describe('null clears the start date too'),
  isAllDay: z.boolean().optional(),
  timeZone: z.string().optional(),
  recurrence: z.string().nullable().optional(),
  reminders: z.array(z.string()).optional(),
  items: z.array(ChecklistItemSchema).optional(),
  kind: TaskKindSchema.optional(),
});

const MoveTaskParams = z.object({
  taskId: z.string(),
  fromProjectId: z.string(),
  toProjectId: z.string(),
});

const MakeSubtaskParams = z.object({
  parentId: z.string(),
  projectId: z.string().describe('Project of both parent and child'),
  child: z.union([z.string().describe('Existing task id'), z.object(NewTaskFields)]),
});

const SetTaskTagsParams = TaskRefParams.extend({
  tags: z.array(z.string()),
});

const CompletedParams = DateWindowParams.extend({
  limit: z.number().optional().describe('1..500, default 100'),
});

export function registerTaskTools({ server, client, logger }: ToolContext): void {
  server.tool('create_task', 'Create a task (in the inbox unless projectId is given).', CreateTaskParams.shape, (args) =>
    respond('create_task', logger, () => {
      const { projectId, ...fields } = args;
      return client.createTask({ ...newTaskInput(fields), projectId });
    }),
  );

  server.tool('get_task', 'Fetch one task.', TaskRefParams.shape, ({ projectId, taskId }) =>
    respond('get_task', logger, () => client.getTask(projectId, taskId)),
  );

  server.tool(
    'update_task',
    'Change fields of a task; omitted fields are kept, null clears.',
    UpdateTaskParams.shape,
    ({ projectId, taskId, kind, ...changes }) =>
      respond('update_task', logger, () => client.updateTask(projectId, taskId, { ...changes, kind: checkTaskKind(kind) })),
  );

  server.tool('complete_task', 'Mark a task completed.', TaskRefParams.shape, ({ projectId, taskId }) =>
    respond('complete_task', logger, () => client.completeTask(projectId, taskId)),
  );

  server.tool('delete_task', 'Move a task to the trash.', TaskRefParams.shape, ({ projectId, taskId }) =>
    respond('delete_task', logger, () => client.deleteTask(projectId, taskId)),
  );

  server.tool('move_task', 'Move a task to another project.', MoveTaskParams.shape, ({ taskId, fromProjectId, toProjectId }) =>
    respond('move_task', logger, () => client.moveTask(taskId, fromProjectId, toProjectId)),
  );

  server.tool(
    'make_subtask',
    'Put a task (existing id, or a new one) under a parent task.',
    MakeSubtaskParams.shape,
    ({ parentId, projectId, child }) =>
      respond('make_subtask', logger, () =>
        client.makeSubtask({ parentId, projectId, child: typeof child === 'string' ? child : newTaskInput(child) }),
      ),
  );

  server.tool('unparent_task', 'Detach a subtask from its parent.', TaskRefParams.shape, ({ projectId, taskId }) =>
    respond('unparent_task', logger, () => client.unparentTask(projectId, taskId)),
  );

  server.tool('set_task_tags', "Replace a task's tags.", SetTaskTagsParams.shape, ({ projectId, taskId, tags }) =>
    respond('set_task_tags', logger, () => client.setTaskTags(projectId, taskId, tags)),
  );

  server.tool(
    'list_tasks',
    'Active tasks across all projects, or one project.',
    { projectId: z.string().optional() },
    ({ projectId }) => respond('list_tasks', logger, () => client.listTasks({ projectId })),
  );

  server.tool('search_tasks', 'Find active tasks by text in title or description.', { query: z.string() }, ({ query }) =>
    respond('search_tasks', logger, () => client.searchTasks(query)),
  );

  server.tool('get_tasks_by_tag', 'Active tasks carrying a tag.', { tag: z.string() }, ({ tag }) =>
    respond('get_tasks_by_tag', logger, () => client.getTasksByTag(tag)),
  );

  server.tool('list_completed_tasks', 'Tasks completed within a date window.', CompletedParams.shape, (args) =>
    respond('list_completed_tasks', logger, () => client.listCompletedTasks(args)),
  );

  server.tool(
    'list_deleted_tasks',
    'Tasks in the trash.',
    { limit: z.number().optional().describe('1..500, default 50') },
    ({ limit }) => respond('list_deleted_tasks', logger, () => client.listDeletedTasks(limit)),
  );
}
