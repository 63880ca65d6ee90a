import { resolveSettings, type TickTickSettings } from './config.js';
import { ForbiddenError, NotFoundError, ValidationError, toTickTickError } from './errors.js';
import type { FetchLike } from './http.js';
import { silentLogger, type Logger } from './log.js';
import type {
  CreateProjectInput,
  CreateTagInput,
  CreateTaskInput,
  DateWindow,
  FocusDay,
  FocusDistribution,
  Folder,
  MakeSubtaskInput,
  Project,
  ProjectWithTasks,
  Tag,
  Task,
  UpdateProjectInput,
  UpdateTagInput,
  UpdateTaskInput,
  UserProfile,
  UserStatistics,
  UserStatus,
} from './model.js';
import { Dispatcher, type Backends } from './dispatch/dispatcher.js';
import { inPhase, mergeProjectsById, mergeTasksById } from './dispatch/joins.js';
import { canonicalTimestamp, checkColor, checkName, checkPriority, windowKeys } from './normalize/common.js';
import {
  createProjectToOpen,
  createTaskToOpen,
  projectFromOpen,
  taskFromOpen,
  updateProjectToOpen,
  updateTaskToOpen,
} from './normalize/open.js';
import {
  focusDaysFromSession,
  focusDistributionFromSession,
  foldersFromSession,
  inboxProject,
  profileFromSession,
  projectFromSession,
  statisticsFromSession,
  statusFromSession,
  tagFromSession,
  taskFromSession,
} from './normalize/session.js';
import { OpenApiTransport, type OpenTaskWrite } from './transports/open.js';
import { SessionApiTransport, newObjectId, type SessionTag, type SyncSnapshot } from './transports/session.js';

export interface TickTickClientOptions {
  /** Inject fetch for tests */
  fetcher?: FetchLike;
  logger?: Logger;
}

export interface ListTasksOptions {
  /** Restrict to one project. */
  projectId?: string;
}

export interface CompletedTasksQuery extends DateWindow {
  /** 1..500, default 100. */
  limit?: number;
}

function requireId(value: string, field: string): string {
  if (!value || !value.trim()) throw new ValidationError(`${field} is required`, { [field]: value });
  return value;
}

function checkRecurrence(recurrence: string | null | undefined, startDate: string | null | undefined): void {
  if (recurrence && !startDate) {
    throw new ValidationError('recurrence requires a start date; without one the rule never fires', { recurrence });
  }
}

function checkLimit(limit: number, max: number): number {
  if (!Number.isInteger(limit) || limit < 1 || limit > max) {
    throw new ValidationError(`limit must be an integer in 1..${max}`, { limit });
  }
  return limit;
}

/** Existing child by id, or the create body of a new one. */
function subtaskTarget(
  child: MakeSubtaskInput['child'],
  parentId: string,
  projectId: string,
): { id: string } | { body: OpenTaskWrite } {
  if (typeof child === 'string') {
    const id = requireId(child, 'child');
    if (id === parentId) throw new ValidationError('a task cannot be its own parent', { taskId: id });
    return { id };
  }
  const title = checkName(child.title, 'title');
  checkPriority(child.priority);
  checkRecurrence(child.recurrence, child.startDate);
  return { body: createTaskToOpen({ ...child, title }, projectId) };
}

/** Would making `parent` the parent of `name` close a loop? */
function createsTagCycle(tags: readonly SessionTag[], name: string, parent: string): boolean {
  const parents = new Map(tags.map((t) => [t.name, t.parent ?? undefined]));
  const visited = new Set<string>();
  let cursor: string | undefined = parent;
  while (cursor) {
    if (cursor === name) return true;
    if (visited.has(cursor)) return true;
    visited.add(cursor);
    cursor = parents.get(cursor);
  }
  return false;
}

/**
 * One client over both TickTick APIs.
 *
 * Obtain it with {@link TickTickClient.open} (or {@link withTickTick}, which
 * also closes it) and release it with {@link TickTickClient.close}. Nothing is
 * cached between calls except the two session tokens, so concurrent calls on
 * one instance are safe.
 */
export class TickTickClient {
  private constructor(
    private readonly backends: Backends,
    private readonly dispatch: Dispatcher,
    private readonly logger: Logger,
    /** Inbox project id of the logged-in account. */
    readonly inboxId: string,
  ) {}

  /**
   * Validate settings and log in to both backends. Fails on the first
   * authentication failure; neither session is left open in that case.
   */
  static async open(settings: TickTickSettings, options: TickTickClientOptions = {}): Promise<TickTickClient> {
    const s = resolveSettings(settings);
    const logger = options.logger ?? silentLogger;

    const open = new OpenApiTransport({
      accessToken: s.accessToken,
      host: s.host,
      timeoutMs: s.timeoutMs,
      fetcher: options.fetcher,
    });
    const session = new SessionApiTransport({
      username: s.username,
      password: s.password,
      deviceId: s.deviceId,
      host: s.host,
      timeoutMs: s.timeoutMs,
      fetcher: options.fetcher,
    });

    try {
      await Promise.all([open.authenticate(), session.authenticate()]);
    } catch (e) {
      await Promise.allSettled([open.close(), session.close()]);
      const err = toTickTickError(e);
      logger.error('open failed', { kind: err.kind, message: err.message });
      throw err;
    }

    logger.info('sessions established', { host: s.host, deviceId: session.deviceId });
    const backends: Backends = { open, session };
    return new TickTickClient(backends, new Dispatcher(backends, logger), logger, session.inboxId);
  }

  /** Release both sessions. Never throws; later calls fail with a Configuration error. */
  async close(): Promise<void> {
    this.dispatch.stop();
    const results = await Promise.allSettled([this.backends.open.close(), this.backends.session.close()]);
    for (const r of results) {
      if (r.status === 'rejected') this.logger.warn('close failed', toTickTickError(r.reason).message);
    }
    this.logger.debug('sessions closed');
  }

  /* ---------------------------------------------------------------- */
  /*  Tasks                                                            */
  /* ---------------------------------------------------------------- */

  async createTask(input: CreateTaskInput): Promise<Task> {
    const title = checkName(input.title, 'title');
    checkPriority(input.priority);
    checkRecurrence(input.recurrence, input.startDate);
    if (input.parentId) {
      this.logger.warn('createTask: parentId is ignored on create; use makeSubtask', { parentId: input.parentId });
    }
    const body = createTaskToOpen({ ...input, title }, input.projectId ?? this.inboxId);

    return this.dispatch.open('createTask', async (open) => taskFromOpen(await open.createTask(body)));
  }

  async getTask(projectId: string, taskId: string): Promise<Task> {
    requireId(projectId, 'projectId');
    requireId(taskId, 'taskId');
    return this.dispatch.open('getTask', async (open) => taskFromOpen(await open.getTask(projectId, taskId)));
  }

  /**
   * Read-modify-write update. Clearing `dueDate` clears `startDate` in the
   * same call: the backend would otherwise rebuild the due date from the start.
   */
  async updateTask(projectId: string, taskId: string, changes: UpdateTaskInput): Promise<Task> {
    requireId(projectId, 'projectId');
    requireId(taskId, 'taskId');
    checkPriority(changes.priority);
    if (changes.startDate !== undefined && changes.startDate !== null) canonicalTimestamp(changes.startDate, 'startDate');
    if (changes.dueDate !== undefined && changes.dueDate !== null) canonicalTimestamp(changes.dueDate, 'dueDate');
    changes.items?.forEach((item, n) => {
      if (item.startDate !== undefined) canonicalTimestamp(item.startDate, `items[${n}].startDate`);
    });

    const effective: UpdateTaskInput = { ...changes };
    if (changes.title !== undefined) effective.title = checkName(changes.title, 'title');
    if (changes.dueDate === null) {
      if (changes.startDate !== undefined && changes.startDate !== null) {
        throw new ValidationError('dueDate cannot be cleared while setting startDate; both are cleared together', {
          startDate: changes.startDate,
        });
      }
      effective.startDate = null;
    }
    if (effective.recurrence && effective.startDate === null) checkRecurrence(effective.recurrence, null);

    return this.dispatch.open('updateTask', async (open) => {
      const current = taskFromOpen(await open.getTask(projectId, taskId));
      const nextStart = effective.startDate === undefined ? current.startDate : effective.startDate;
      const nextRule = effective.recurrence === undefined ? current.recurrence : effective.recurrence;
      checkRecurrence(nextRule, nextStart);
      return taskFromOpen(await open.updateTask(taskId, updateTaskToOpen(current, effective)));
    });
  }

  async completeTask(projectId: string, taskId: string): Promise<void> {
    requireId(projectId, 'projectId');
    requireId(taskId, 'taskId');
    await this.dispatch.open('completeTask', (open) => open.completeTask(projectId, taskId));
  }

  /** Soft delete: the task moves to the trash and stays fetchable by id. */
  async deleteTask(projectId: string, taskId: string): Promise<void> {
    requireId(projectId, 'projectId');
    requireId(taskId, 'taskId');
    await this.dispatch.open('deleteTask', (open) => open.deleteTask(projectId, taskId));
  }

  async moveTask(taskId: string, fromProjectId: string, toProjectId: string): Promise<void> {
    requireId(taskId, 'taskId');
    requireId(fromProjectId, 'fromProjectId');
    requireId(toProjectId, 'toProjectId');
    if (fromProjectId === toProjectId) return;
    await this.dispatch.session('moveTask', (session) => session.moveTasks([{ taskId, fromProjectId, toProjectId }]));
  }

  /** Replace the task's tag set. */
  async setTaskTags(projectId: string, taskId: string, tags: Iterable<string>): Promise<void> {
    requireId(projectId, 'projectId');
    requireId(taskId, 'taskId');
    const names = [...new Set([...tags].map((t) => checkName(t, 'tag')))];
    await this.dispatch.session('setTaskTags', (session) =>
      session.batchTasks({ update: [{ id: taskId, projectId, tags: names }] }),
    );
  }

  /**
   * Link a child under a parent in two phases: `locate` fetches (or creates)
   * the child on the open API, `link` writes the parent on the session API.
   * A failure carries the phase; when `link` fails after `locate` created the
   * child, that task stays behind unlinked and its id is in `orphanTaskId`.
   */
  async makeSubtask(input: MakeSubtaskInput): Promise<Task> {
    const parentId = requireId(input.parentId, 'parentId');
    const projectId = requireId(input.projectId, 'projectId');
    const target = subtaskTarget(input.child, parentId, projectId);

    return this.dispatch.composite('makeSubtask', async ({ open, session }) => {
      let createdId: string | undefined;
      const located = await inPhase('locate', async () => {
        const parent = taskFromOpen(await open.getTask(projectId, parentId));
        if ('body' in target) {
          const created = taskFromOpen(await open.createTask(target.body));
          createdId = created.id;
          return created;
        }
        const existing = taskFromOpen(await open.getTask(projectId, target.id));
        if (parent.parentId === existing.id) {
          throw new ValidationError('parent is already a subtask of the child', { parentId, taskId: existing.id });
        }
        return existing;
      });

      await inPhase('link', () => session.setTaskParents([{ taskId: located.id, projectId, parentId }]), createdId);
      return { ...located, parentId };
    });
  }

  /** Detach a subtask from its parent. No-op when it has none. */
  async unparentTask(projectId: string, taskId: string): Promise<Task> {
    requireId(projectId, 'projectId');
    requireId(taskId, 'taskId');

    return this.dispatch.composite('unparentTask', async ({ open, session }) => {
      const task = await inPhase('locate', async () => taskFromOpen(await open.getTask(projectId, taskId)));
      const oldParentId = task.parentId;
      if (!oldParentId) return task;
      await inPhase('link', () => session.setTaskParents([{ taskId, projectId, oldParentId }]));
      return { ...task, parentId: undefined };
    });
  }

  /** Active, non-deleted tasks across every project (inbox included). */
  async listTasks(options: ListTasksOptions = {}): Promise<Task[]> {
    if (options.projectId !== undefined) requireId(options.projectId, 'projectId');
    return this.dispatch.composite('listTasks', (backends) => this.collectTasks(backends, options.projectId));
  }

  /** Case-insensitive substring match on title and description. */
  async searchTasks(query: string): Promise<Task[]> {
    const needle = query.trim().toLowerCase();
    if (!needle) throw new ValidationError('query must not be empty', { query });
    const tasks = await this.dispatch.composite('searchTasks', (backends) => this.collectTasks(backends));
    return tasks.filter(
      (t) => t.title.toLowerCase().includes(needle) || (t.description?.toLowerCase().includes(needle) ?? false),
    );
  }

  async getTasksByTag(tag: string): Promise<Task[]> {
    const name = checkName(tag, 'tag');
    const tasks = await this.dispatch.composite('getTasksByTag', (backends) => this.collectTasks(backends));
    return tasks.filter((t) => t.tags?.has(name) ?? false);
  }

  async listCompletedTasks(query: CompletedTasksQuery): Promise<Task[]> {
    windowKeys(query.from, query.to);
    const limit = checkLimit(query.limit ?? 100, 500);
    const from = `${query.from} 00:00:00`;
    const to = `${query.to} 23:59:59`;
    return this.dispatch.session('listCompletedTasks', async (session) =>
      (await session.listCompleted(from, to, limit)).map(taskFromSession),
    );
  }

  /** Tasks in the trash, newest first as the backend returns them. */
  async listDeletedTasks(limit = 50): Promise<Task[]> {
    checkLimit(limit, 500);
    return this.dispatch.session('listDeletedTasks', async (session) =>
      (await session.listTrash(limit)).map((t) => ({ ...taskFromSession(t), deleted: true })),
    );
  }

  private async collectTasks({ open, session }: Backends, projectId?: string): Promise<Task[]> {
    const [snapshot, projects] = await Promise.all([session.sync(), open.listProjects()]);
    const inboxId = snapshot.inboxId || this.inboxId;
    const projectIds = projectId ? [projectId] : [inboxId, ...projects.map((p) => p.id).filter((id) => id !== inboxId)];

    const data = await Promise.all(projectIds.map((id) => open.getProjectData(id)));
    const openTasks = data.flatMap((d) => (d.tasks ?? []).map(taskFromOpen));
    const sessionTasks = (snapshot.syncTaskBean?.update ?? [])
      .filter((t) => !projectId || t.projectId === projectId)
      .map(taskFromSession);

    return mergeTasksById(openTasks, sessionTasks).filter((t) => !t.deleted && t.status === 'active');
  }

  /* ---------------------------------------------------------------- */
  /*  Projects                                                         */
  /* ---------------------------------------------------------------- */

  async createProject(input: CreateProjectInput): Promise<Project> {
    const name = checkName(input.name, 'name');
    checkColor(input.color);
    const body = createProjectToOpen({ ...input, name });
    return this.dispatch.open('createProject', async (open) => projectFromOpen(await open.createProject(body), this.inboxId));
  }

  async getProject(projectId: string): Promise<Project> {
    requireId(projectId, 'projectId');
    const inboxId = this.inboxId;
    return this.dispatch.open('getProject', async (open) => {
      // the open API has no project record for the inbox
      if (projectId === inboxId) return inboxProject(inboxId);
      return projectFromOpen(await open.getProject(projectId), inboxId);
    });
  }

  async getProjectWithTasks(projectId: string): Promise<ProjectWithTasks> {
    requireId(projectId, 'projectId');
    const inboxId = this.inboxId;
    return this.dispatch.open('getProjectWithTasks', async (open) => {
      const data = await open.getProjectData(projectId);
      const tasks = (data.tasks ?? []).map(taskFromOpen);
      if (data.project) return { project: projectFromOpen(data.project, inboxId), tasks };
      if (projectId === inboxId) return { project: inboxProject(inboxId), tasks };
      throw new NotFoundError(`project ${projectId} not found`, { projectId });
    });
  }

  /** Every project, the inbox always among them. */
  async listProjects(): Promise<Project[]> {
    const inboxId = this.inboxId;
    return this.dispatch.composite('listProjects', async ({ open, session }) => {
      const [fromOpen, fromSession] = await Promise.all([open.listProjects(), session.listProjects()]);
      return mergeProjectsById(
        fromOpen.map((p) => projectFromOpen(p, inboxId)),
        fromSession.map((p) => projectFromSession(p, inboxId)),
        inboxId,
      );
    });
  }

  async updateProject(projectId: string, changes: UpdateProjectInput): Promise<Project> {
    requireId(projectId, 'projectId');
    if (changes.name !== undefined) checkName(changes.name, 'name');
    checkColor(changes.color);
    const body = updateProjectToOpen(changes);
    return this.dispatch.open('updateProject', async (open) => {
      this.refuseInbox(projectId, 'updated');
      return projectFromOpen(await open.updateProject(projectId, body), this.inboxId);
    });
  }

  async deleteProject(projectId: string): Promise<void> {
    requireId(projectId, 'projectId');
    await this.dispatch.open('deleteProject', async (open) => {
      this.refuseInbox(projectId, 'deleted');
      await open.deleteProject(projectId);
    });
  }

  private refuseInbox(projectId: string, verb: string): void {
    if (projectId === this.inboxId || projectId === 'inbox') {
      throw new ForbiddenError(`the inbox project cannot be ${verb}`, { projectId });
    }
  }

  /* ---------------------------------------------------------------- */
  /*  Folders                                                          */
  /* ---------------------------------------------------------------- */

  async listFolders(): Promise<Folder[]> {
    return this.dispatch.session('listFolders', async (session) => {
      const snapshot = await session.sync();
      return foldersFromSession(snapshot.projectGroups ?? [], snapshot.projectProfiles ?? []);
    });
  }

  async getFolder(folderId: string): Promise<Folder> {
    requireId(folderId, 'folderId');
    return this.dispatch.session('getFolder', async (session) => {
      const snapshot = await session.sync();
      const folder = foldersFromSession(snapshot.projectGroups ?? [], snapshot.projectProfiles ?? []).find(
        (f) => f.id === folderId,
      );
      if (!folder) throw new NotFoundError(`folder ${folderId} not found`, { folderId });
      return folder;
    });
  }

  async createFolder(name: string): Promise<Folder> {
    const folderName = checkName(name, 'name');
    const id = newObjectId();
    return this.dispatch.session('createFolder', async (session) => {
      await session.batchProjectGroups({ add: [{ id, name: folderName, listType: 'group' }] });
      return { id, name: folderName, projectIds: [] };
    });
  }

  async renameFolder(folderId: string, name: string): Promise<Folder> {
    requireId(folderId, 'folderId');
    const folderName = checkName(name, 'name');
    return this.dispatch.session('renameFolder', async (session) => {
      const snapshot = await session.sync();
      const group = (snapshot.projectGroups ?? []).find((g) => g.id === folderId);
      if (!group) throw new NotFoundError(`folder ${folderId} not found`, { folderId });
      await session.batchProjectGroups({ update: [{ ...group, name: folderName }] });
      const renamed = { ...group, name: folderName };
      return foldersFromSession([renamed], snapshot.projectProfiles ?? [])[0] ?? { id: folderId, name: folderName, projectIds: [] };
    });
  }

  /** Member projects are kept and leave the folder. */
  async deleteFolder(folderId: string): Promise<void> {
    requireId(folderId, 'folderId');
    await this.dispatch.session('deleteFolder', async (session) => {
      const snapshot = await session.sync();
      if (!(snapshot.projectGroups ?? []).some((g) => g.id === folderId)) {
        throw new NotFoundError(`folder ${folderId} not found`, { folderId });
      }
      await session.batchProjectGroups({ delete: [folderId] });
    });
  }

  /* ---------------------------------------------------------------- */
  /*  Tags                                                             */
  /* ---------------------------------------------------------------- */

  async listTags(): Promise<Tag[]> {
    return this.dispatch.session('listTags', async (session) => (await session.sync()).tags.map(tagFromSession));
  }

  async getTag(name: string): Promise<Tag> {
    const tagName = checkName(name, 'name');
    return this.dispatch.session('getTag', async (session) => tagFromSession(findTag((await session.sync()).tags, tagName)));
  }

  async createTag(input: CreateTagInput): Promise<Tag> {
    const name = checkName(input.name, 'name');
    checkColor(input.color);
    const parent = input.parent === undefined ? undefined : checkName(input.parent, 'parent');
    if (parent === name) throw new ValidationError('a tag cannot be its own parent', { name });

    return this.dispatch.session('createTag', async (session) => {
      const tags = (await session.sync()).tags;
      if (tags.some((t) => t.name === name)) {
        throw new ValidationError(`tag "${name}" already exists`, { name });
      }
      if (parent !== undefined) findTag(tags, parent);
      const raw: SessionTag = { name, label: name, ...(input.color ? { color: input.color } : {}), ...(parent ? { parent } : {}) };
      await session.batchTags({ add: [raw] });
      return tagFromSession(raw);
    });
  }

  /** Change color and/or parent. A parent that would close a loop is rejected. */
  async updateTag(name: string, changes: UpdateTagInput): Promise<Tag> {
    const tagName = checkName(name, 'name');
    checkColor(changes.color);
    const parent = typeof changes.parent === 'string' ? checkName(changes.parent, 'parent') : changes.parent;

    return this.dispatch.session('updateTag', async (session) => {
      const tags = (await session.sync()).tags;
      const current = findTag(tags, tagName);
      if (parent) {
        findTag(tags, parent);
        if (createsTagCycle(tags, tagName, parent)) {
          throw new ValidationError(`making "${parent}" the parent of "${tagName}" creates a cycle`, { name: tagName, parent });
        }
      }
      const next: SessionTag = {
        ...current,
        color: changes.color ?? current.color,
        parent: parent === undefined ? current.parent : parent,
      };
      await session.batchTags({ update: [next] });
      return tagFromSession(next);
    });
  }

  async deleteTag(name: string): Promise<void> {
    const tagName = checkName(name, 'name');
    await this.dispatch.session('deleteTag', async (session) => {
      findTag((await session.sync()).tags, tagName);
      await session.deleteTag(tagName);
    });
  }

  /**
   * Rename in one backend call; every tagged task follows. Renaming onto an
   * existing name is rejected: that is a merge.
   */
  async renameTag(from: string, to: string): Promise<Tag> {
    const oldName = checkName(from, 'from');
    const newName = checkName(to, 'to');

    return this.dispatch.session('renameTag', async (session) => {
      const tags = (await session.sync()).tags;
      const current = findTag(tags, oldName);
      if (oldName === newName) return tagFromSession(current);
      if (tags.some((t) => t.name === newName)) {
        throw new ValidationError(`tag "${newName}" already exists; use mergeTags`, { from: oldName, to: newName });
      }
      await session.renameTag(oldName, newName);
      return tagFromSession({ ...current, name: newName, label: newName });
    });
  }

  /**
   * Fold `source` into `target` in one backend call: tasks tagged `source`
   * end up tagged `target` and `source` disappears. Idempotent: a missing
   * source is a no-op. A missing target makes this a rename.
   */
  async mergeTags(source: string, target: string): Promise<void> {
    const from = checkName(source, 'source');
    const into = checkName(target, 'target');
    if (from === into) throw new ValidationError('source and target are the same tag', { source: from });

    await this.dispatch.session('mergeTags', async (session) => {
      const tags = (await session.sync()).tags;
      if (!tags.some((t) => t.name === from)) {
        this.logger.debug('mergeTags: source already absent', { source: from });
        return;
      }
      if (!tags.some((t) => t.name === into)) {
        await session.renameTag(from, into);
        return;
      }
      await session.mergeTags(from, into);
    });
  }

  /* ---------------------------------------------------------------- */
  /*  User & account                                                   */
  /* ---------------------------------------------------------------- */

  async getProfile(): Promise<UserProfile> {
    return this.dispatch.session('getProfile', async (session) => profileFromSession(await session.getUserProfile()));
  }

  async getStatus(): Promise<UserStatus> {
    return this.dispatch.session('getStatus', async (session) => statusFromSession(await session.getUserStatus()));
  }

  async getStatistics(): Promise<UserStatistics> {
    return this.dispatch.session('getStatistics', async (session) => statisticsFromSession(await session.getStatistics()));
  }

  async getFocusHeatmap(window: DateWindow): Promise<FocusDay[]> {
    const keys = windowKeys(window.from, window.to);
    return this.dispatch.session('getFocusHeatmap', async (session) =>
      focusDaysFromSession(await session.getFocusHeatmap(keys.from, keys.to)),
    );
  }

  async getFocusDistribution(window: DateWindow): Promise<FocusDistribution> {
    const keys = windowKeys(window.from, window.to);
    return this.dispatch.session('getFocusDistribution', async (session) =>
      focusDistributionFromSession(await session.getFocusDistribution(keys.from, keys.to)),
    );
  }

  /** The raw account snapshot, in the backend's own shape. */
  async fullSync(): Promise<SyncSnapshot> {
    return this.dispatch.session('fullSync', (session) => session.sync());
  }
}

function findTag(tags: readonly SessionTag[], name: string): SessionTag {
  const tag = tags.find((t) => t.name === name);
  if (!tag) throw new NotFoundError(`tag "${name}" not found`, { name });
  return tag;
}

/**
 * Open a client, run `fn`, and close the client on every exit path.
 */
export async function withTickTick<T>(
  settings: TickTickSettings,
  fn: (client: TickTickClient) => Promise<T>,
  options: TickTickClientOptions = {},
): Promise<T> {
  const client = await TickTickClient.open(settings, options);
  try {
    return await fn(client);
  } finally {
    await client.close();
  }
}
