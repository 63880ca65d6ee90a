import { toTickTickError, type SubtaskPhase } from '../errors.js';
import type { Project, Task } from '../model.js';
import { inboxProject } from '../normalize/session.js';

/**
 * Join open-API and session-API views of the same tasks.
 *
 * Field authority when both sides carry a task:
 * - open API: title, description, status, priority, dates, all-day flag,
 *   time zone, recurrence, reminders, checklist items, kind, project id;
 * - session API: tags, parent and child links, soft-delete flag.
 *
 * A task known to one side only is kept with what that side reports
 * (tags stay unset for open-only tasks). Output follows the open-side order,
 * then session-only tasks in snapshot order.
 */
export function mergeTasksById(openTasks: readonly Task[], sessionTasks: readonly Task[]): Task[] {
  const fromSession = new Map(sessionTasks.map((t) => [t.id, t]));
  const seen = new Set<string>();
  const out: Task[] = [];

  for (const a of openTasks) {
    seen.add(a.id);
    const b = fromSession.get(a.id);
    if (!b) {
      out.push(a);
      continue;
    }
    out.push({
      ...a,
      tags: b.tags,
      parentId: b.parentId,
      childIds: b.childIds,
      deleted: b.deleted,
      modifiedAt: a.modifiedAt ?? b.modifiedAt,
    });
  }

  for (const b of sessionTasks) {
    if (!seen.has(b.id)) out.push(b);
  }
  return out;
}

/**
 * Join project listings. The open API is authoritative for everything but
 * folder membership, which comes from the session API. The inbox, which
 * neither listing contains, is appended.
 */
export function mergeProjectsById(
  openProjects: readonly Project[],
  sessionProjects: readonly Project[],
  inboxId: string,
): Project[] {
  const fromSession = new Map(sessionProjects.map((p) => [p.id, p]));
  const seen = new Set<string>();
  const out: Project[] = [];

  for (const a of openProjects) {
    seen.add(a.id);
    const b = fromSession.get(a.id);
    out.push(b ? { ...a, folderId: b.folderId } : a);
  }
  for (const b of sessionProjects) {
    if (!seen.has(b.id)) out.push(b);
  }

  if (!out.some((p) => p.id === inboxId)) out.push(inboxProject(inboxId));
  return out.map((p) => (p.id === inboxId ? { ...p, isInbox: true } : p));
}

/**
 * Run one phase of a two-phase operation, tagging any failure with the phase.
 * Nothing is rolled back: a task created in `locate` survives a failed `link`,
 * and its id is reported as `orphanTaskId`.
 */
export async function inPhase<T>(phase: SubtaskPhase, step: () => Promise<T>, orphanTaskId?: string): Promise<T> {
  try {
    return await step();
  } catch (e) {
    const err = toTickTickError(e);
    err.phase = phase;
    if (orphanTaskId) err.orphanTaskId = orphanTaskId;
    throw err;
  }
}
