import type {
  ChecklistItemInput,
  CreateProjectInput,
  CreateTaskInput,
  Project,
  Task,
  UpdateProjectInput,
  UpdateTaskInput,
} from '../model.js';
import type { OpenChecklistItemWrite, OpenProject, OpenProjectWrite, OpenTask, OpenTaskWrite } from '../transports/open.js';
import {
  optionalString,
  parseChecklist,
  parsePriority,
  parseProjectKind,
  parseStatus,
  parseTaskKind,
  parseTimestamp,
  parseViewMode,
  projectKindCode,
  requireString,
  taskKindCode,
  toWireTimestamp,
} from './common.js';

/**
 * Open API task to canonical. The open API reports no tags, so `tags` stays
 * unset; a missing `deleted` means the task is live.
 */
export function taskFromOpen(raw: OpenTask): Task {
  const kind = parseTaskKind(raw.kind);
  return {
    id: requireString(raw.id, 'task id'),
    projectId: requireString(raw.projectId, 'task projectId'),
    title: raw.title ?? '',
    description: optionalString(kind === 'checklist' ? raw.desc ?? raw.content : raw.content),
    status: parseStatus(raw.status),
    priority: parsePriority(raw.priority),
    startDate: parseTimestamp(raw.startDate, 'startDate'),
    dueDate: parseTimestamp(raw.dueDate, 'dueDate'),
    isAllDay: raw.isAllDay,
    timeZone: optionalString(raw.timeZone),
    recurrence: optionalString(raw.repeatFlag),
    reminders: [...(raw.reminders ?? [])],
    tags: undefined,
    parentId: optionalString(raw.parentId),
    items: parseChecklist(raw.items),
    kind,
    deleted: (raw.deleted ?? 0) !== 0,
    completedAt: parseTimestamp(raw.completedTime, 'completedTime'),
    modifiedAt: parseTimestamp(raw.modifiedTime, 'modifiedTime'),
  };
}

export function projectFromOpen(raw: OpenProject, inboxId?: string): Project {
  return {
    id: requireString(raw.id, 'project id'),
    name: raw.name ?? '',
    color: optionalString(raw.color),
    viewMode: parseViewMode(raw.viewMode),
    kind: parseProjectKind(raw.kind),
    folderId: optionalString(raw.groupId),
    isInbox: raw.id === inboxId,
    closed: raw.closed ?? false,
  };
}

function itemsToOpen(items: readonly ChecklistItemInput[]): OpenChecklistItemWrite[] {
  return items.map((i, n) => ({
    title: i.title,
    status: i.completed ? 1 : 0,
    ...(i.startDate !== undefined ? { startDate: toWireTimestamp(i.startDate, `items[${n}].startDate`) } : {}),
  }));
}

function descriptionFields(kind: string, description: string | null | undefined): Pick<OpenTaskWrite, 'content' | 'desc'> {
  if (description === undefined) return {};
  return kind === 'CHECKLIST' ? { desc: description } : { content: description };
}

/** Create body. `parentId` is deliberately not sent: the backend drops it. */
export function createTaskToOpen(input: CreateTaskInput, projectId: string): OpenTaskWrite {
  const kind = input.kind ? taskKindCode(input.kind) : input.items?.length ? 'CHECKLIST' : 'TEXT';
  const body: OpenTaskWrite = {
    projectId,
    title: input.title,
    ...descriptionFields(kind, input.description),
    kind,
    priority: input.priority,
    isAllDay: input.isAllDay,
    timeZone: input.timeZone,
    startDate: input.startDate !== undefined ? toWireTimestamp(input.startDate, 'startDate') : undefined,
    dueDate: input.dueDate !== undefined ? toWireTimestamp(input.dueDate, 'dueDate') : undefined,
    repeatFlag: input.recurrence,
    reminders: input.reminders,
    items: input.items ? itemsToOpen(input.items) : undefined,
  };
  return stripUndefined(body);
}

/**
 * Full update body: the stored task with `changes` applied. Sending every
 * field keeps the open API from blanking the ones a partial body leaves out.
 * Cleared fields go out as explicit `null`.
 */
export function updateTaskToOpen(current: Task, changes: UpdateTaskInput): OpenTaskWrite {
  const kind = taskKindCode(changes.kind ?? current.kind);
  const description = changes.description !== undefined ? changes.description : current.description ?? null;

  const startDate = pick(changes.startDate, current.startDate);
  const dueDate = pick(changes.dueDate, current.dueDate);

  const items: OpenChecklistItemWrite[] = changes.items
    ? itemsToOpen(changes.items)
    : current.items.map((i) => ({
        id: i.id,
        title: i.title,
        status: i.completed ? 1 : 0,
        ...(i.startDate ? { startDate: toWireTimestamp(i.startDate, 'item.startDate') } : {}),
      }));

  return stripUndefined({
    id: current.id,
    projectId: current.projectId,
    title: changes.title ?? current.title,
    ...descriptionFields(kind, description),
    kind,
    priority: changes.priority ?? current.priority,
    isAllDay: changes.isAllDay ?? current.isAllDay,
    timeZone: changes.timeZone ?? current.timeZone,
    startDate: startDate === null ? null : toWireTimestamp(startDate, 'startDate'),
    dueDate: dueDate === null ? null : toWireTimestamp(dueDate, 'dueDate'),
    repeatFlag: pick(changes.recurrence, current.recurrence),
    reminders: changes.reminders ?? current.reminders,
    items,
  });
}

function pick(change: string | null | undefined, current: string | undefined): string | null {
  if (change !== undefined) return change;
  return current ?? null;
}

export function createProjectToOpen(input: CreateProjectInput): OpenProjectWrite {
  return stripUndefined({
    name: input.name,
    color: input.color,
    viewMode: input.viewMode,
    kind: input.kind ? projectKindCode(input.kind) : undefined,
    groupId: input.folderId,
  });
}

export function updateProjectToOpen(input: UpdateProjectInput): OpenProjectWrite {
  return stripUndefined({
    name: input.name,
    color: input.color,
    viewMode: input.viewMode,
    groupId: input.folderId === null ? 'NONE' : input.folderId,
  });
}

/** Drop undefined keys so they are not sent; `null` is kept. */
function stripUndefined<T extends object>(obj: T): T {
  for (const k of Object.keys(obj)) {
    if (Reflect.get(obj, k) === undefined) Reflect.deleteProperty(obj, k);
  }
  return obj;
}
