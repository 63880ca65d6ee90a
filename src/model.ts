/**
 * Canonical entities. Every shape here is independent of which backend
 * produced it; see src/normalize for the mappings.
 */

export type TaskStatus = 'active' | 'completed' | 'abandoned';

export type TaskKind = 'text' | 'note' | 'checklist';

export type ViewMode = 'list' | 'kanban' | 'timeline';

export type ProjectKind = 'task' | 'note';

/** Wire codes are kept as-is: the scale is not contiguous (High is 5). */
export const Priority = {
  None: 0,
  Low: 1,
  Medium: 3,
  High: 5,
} as const;

export type Priority = (typeof Priority)[keyof typeof Priority];

export interface ChecklistItem {
  id: string;
  title: string;
  completed: boolean;
  startDate?: string;
  completedAt?: string;
}

export interface Task {
  id: string;
  projectId: string;
  title: string;
  description?: string;
  status: TaskStatus;
  priority: Priority;
  /** ISO 8601, UTC. */
  startDate?: string;
  /** ISO 8601, UTC. */
  dueDate?: string;
  isAllDay?: boolean;
  timeZone?: string;
  /** Opaque rule string, e.g. `RRULE:FREQ=DAILY;INTERVAL=1`. */
  recurrence?: string;
  /** Trigger strings, e.g. `TRIGGER:-PT30M`, in backend order. */
  reminders: string[];
  /**
   * Membership only. The backends do not keep tag order stable, so neither
   * does this. Unset when the source backend cannot report tags.
   */
  tags?: ReadonlySet<string>;
  parentId?: string;
  childIds?: string[];
  /** Order as given by the backend. */
  items: ChecklistItem[];
  kind: TaskKind;
  deleted: boolean;
  completedAt?: string;
  modifiedAt?: string;
}

export interface Project {
  id: string;
  name: string;
  color?: string;
  viewMode: ViewMode;
  kind: ProjectKind;
  folderId?: string;
  isInbox: boolean;
  closed: boolean;
}

export interface ProjectWithTasks {
  project: Project;
  tasks: Task[];
}

export interface Folder {
  id: string;
  name: string;
  /** Member projects, in the account's project order. */
  projectIds: string[];
}

export interface Tag {
  /** Identifying key, case-sensitive. */
  name: string;
  label: string;
  color?: string;
  parent?: string;
}

export interface UserProfile {
  username: string;
  displayName?: string;
  email?: string;
  locale?: string;
  avatarUrl?: string;
}

export interface UserStatus {
  userId: string;
  username: string;
  inboxId: string;
  isPro: boolean;
  proEndsAt?: string;
}

export interface UserStatistics {
  score: number;
  level: number;
  todayCompleted: number;
  yesterdayCompleted: number;
  totalCompleted: number;
  todayFocusCount: number;
  totalFocusCount: number;
  /** Minutes. */
  todayFocusDuration: number;
  /** Minutes. */
  totalFocusDuration: number;
}

export interface FocusDay {
  /** YYYY-MM-DD */
  day: string;
  minutes: number;
}

export interface FocusDistribution {
  /** Minutes per project id. */
  byProject: Record<string, number>;
  /** Minutes per tag name. */
  byTag: Record<string, number>;
}

/* ------------------------------------------------------------------ */
/*  Inputs                                                             */
/* ------------------------------------------------------------------ */

export interface ChecklistItemInput {
  title: string;
  completed?: boolean;
  startDate?: string;
}

export interface CreateTaskInput {
  title: string;
  /** Defaults to the inbox. */
  projectId?: string;
  description?: string;
  /** One of {@link Priority}; other codes are rejected. */
  priority?: number;
  startDate?: string;
  dueDate?: string;
  isAllDay?: boolean;
  timeZone?: string;
  /** Requires `startDate`; a rule without one never fires. */
  recurrence?: string;
  reminders?: string[];
  items?: ChecklistItemInput[];
  kind?: TaskKind;
  /**
   * Ignored: the backend drops it on create. Link with `makeSubtask` after
   * the task exists.
   */
  parentId?: string;
}

/** `null` clears a field. Clearing `dueDate` clears `startDate` as well. */
export interface UpdateTaskInput {
  title?: string;
  description?: string | null;
  /** One of {@link Priority}; other codes are rejected. */
  priority?: number;
  startDate?: string | null;
  dueDate?: string | null;
  isAllDay?: boolean;
  timeZone?: string;
  recurrence?: string | null;
  reminders?: string[];
  items?: ChecklistItemInput[];
  kind?: TaskKind;
}

export interface CreateProjectInput {
  name: string;
  color?: string;
  viewMode?: ViewMode;
  kind?: ProjectKind;
  folderId?: string;
}

export interface UpdateProjectInput {
  name?: string;
  color?: string;
  viewMode?: ViewMode;
  folderId?: string | null;
}

export interface CreateTagInput {
  name: string;
  color?: string;
  parent?: string;
}

export interface UpdateTagInput {
  color?: string;
  /** `null` detaches the tag from its parent. */
  parent?: string | null;
}

export interface MakeSubtaskInput {
  parentId: string;
  projectId: string;
  /** Existing task id, or a task to create first. */
  child: string | Omit<CreateTaskInput, 'projectId' | 'parentId'>;
}

export interface DateWindow {
  /** YYYY-MM-DD */
  from: string;
  /** YYYY-MM-DD */
  to: string;
}
