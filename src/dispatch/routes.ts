/** How a composite operation combines the two backends. */
export type JoinStrategy =
  /** Session snapshot and open project data, merged per task id. */
  | 'tasks-by-id'
  /** Open projects and session profiles merged per project id, inbox appended. */
  | 'projects-by-id'
  /** Open API locates (or creates) the task, session API writes the parent link. */
  | 'locate-then-link';

export type Route =
  | { readonly via: 'open' }
  | { readonly via: 'session' }
  | { readonly via: 'composite'; readonly join: JoinStrategy };

const open = { via: 'open' } as const;
const session = { via: 'session' } as const;

/**
 * Backend(s) behind every facade operation. Fixed at definition time; the
 * dispatcher's typed entry points only accept operations routed to them.
 */
export const ROUTES = {
  createTask: open,
  getTask: open,
  updateTask: open,
  completeTask: open,
  deleteTask: open,
  moveTask: session,
  setTaskTags: session,
  makeSubtask: { via: 'composite', join: 'locate-then-link' },
  unparentTask: { via: 'composite', join: 'locate-then-link' },
  listTasks: { via: 'composite', join: 'tasks-by-id' },
  searchTasks: { via: 'composite', join: 'tasks-by-id' },
  getTasksByTag: { via: 'composite', join: 'tasks-by-id' },
  listCompletedTasks: session,
  listDeletedTasks: session,

  createProject: open,
  getProject: open,
  getProjectWithTasks: open,
  updateProject: open,
  deleteProject: open,
  listProjects: { via: 'composite', join: 'projects-by-id' },

  createFolder: session,
  getFolder: session,
  listFolders: session,
  renameFolder: session,
  deleteFolder: session,

  createTag: session,
  getTag: session,
  listTags: session,
  updateTag: session,
  deleteTag: session,
  renameTag: session,
  mergeTags: session,

  getProfile: session,
  getStatus: session,
  getStatistics: session,
  getFocusHeatmap: session,
  getFocusDistribution: session,
  fullSync: session,
} as const satisfies Record<string, Route>;

export type Operation = keyof typeof ROUTES;

type OperationsVia<V extends Route['via']> = {
  [K in Operation]: (typeof ROUTES)[K]['via'] extends V ? K : never;
}[Operation];

export type OpenOperation = OperationsVia<'open'>;
export type SessionOperation = OperationsVia<'session'>;
export type CompositeOperation = OperationsVia<'composite'>;
