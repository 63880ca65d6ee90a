import type {
  FocusDay,
  FocusDistribution,
  Folder,
  Project,
  Tag,
  Task,
  UserProfile,
  UserStatistics,
  UserStatus,
} from '../model.js';
import type {
  SessionFocusDay,
  SessionFocusDistribution,
  SessionProject,
  SessionProjectGroup,
  SessionStatistics,
  SessionTag,
  SessionTask,
  SessionUserProfile,
  SessionUserStatus,
} from '../transports/session.js';
import {
  dayFromKey,
  optionalString,
  parseChecklist,
  parsePriority,
  parseProjectKind,
  parseStatus,
  parseTaskKind,
  parseTimestamp,
  parseViewMode,
  requireString,
} from './common.js';

export function taskFromSession(raw: SessionTask): Task {
  const kind = parseTaskKind(raw.kind);
  const childIds = raw.childIds?.filter(Boolean);
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
    reminders: (raw.reminders ?? []).map((r) => r.trigger),
    tags: new Set(raw.tags ?? []),
    parentId: optionalString(raw.parentId),
    childIds: childIds?.length ? childIds : undefined,
    items: parseChecklist(raw.items),
    kind,
    deleted: (raw.deleted ?? 0) !== 0,
    completedAt: parseTimestamp(raw.completedTime, 'completedTime'),
    modifiedAt: parseTimestamp(raw.modifiedTime, 'modifiedTime'),
  };
}

export function projectFromSession(raw: SessionProject, inboxId?: string): Project {
  return {
    id: requireString(raw.id, 'project id'),
    name: raw.name ?? '',
    color: optionalString(raw.color),
    viewMode: parseViewMode(raw.viewMode),
    kind: parseProjectKind(raw.kind),
    folderId: raw.groupId && raw.groupId !== 'NONE' ? raw.groupId : undefined,
    isInbox: raw.id === inboxId,
    closed: raw.closed ?? false,
  };
}

/** The inbox is not listed by either project endpoint; it is built from its id. */
export function inboxProject(inboxId: string): Project {
  return {
    id: inboxId,
    name: 'Inbox',
    viewMode: 'list',
    kind: 'task',
    isInbox: true,
    closed: false,
  };
}

const bySortOrder = <T extends { sortOrder?: number }>(a: T, b: T) => (a.sortOrder ?? 0) - (b.sortOrder ?? 0);

/** Folders with their member projects, both in account sort order. */
export function foldersFromSession(groups: readonly SessionProjectGroup[], projects: readonly SessionProject[]): Folder[] {
  const members = new Map<string, SessionProject[]>();
  for (const p of projects) {
    if (!p.groupId || p.groupId === 'NONE') continue;
    const list = members.get(p.groupId) ?? [];
    list.push(p);
    members.set(p.groupId, list);
  }

  return [...groups].sort(bySortOrder).map((g) => ({
    id: requireString(g.id, 'folder id'),
    name: g.name ?? '',
    projectIds: [...(members.get(g.id) ?? [])].sort(bySortOrder).map((p) => p.id),
  }));
}

export function tagFromSession(raw: SessionTag): Tag {
  const name = requireString(raw.name, 'tag name');
  return {
    name,
    label: raw.label || name,
    color: optionalString(raw.color),
    parent: optionalString(raw.parent),
  };
}

export function profileFromSession(raw: SessionUserProfile): UserProfile {
  return {
    username: requireString(raw.username, 'username'),
    displayName: optionalString(raw.displayName ?? raw.name),
    email: optionalString(raw.email),
    locale: optionalString(raw.locale),
    avatarUrl: optionalString(raw.picture),
  };
}

export function statusFromSession(raw: SessionUserStatus): UserStatus {
  return {
    userId: requireString(raw.userId, 'userId'),
    username: requireString(raw.username, 'username'),
    inboxId: requireString(raw.inboxId, 'inboxId'),
    isPro: raw.pro ?? false,
    proEndsAt: parseTimestamp(raw.proEndDate, 'proEndDate'),
  };
}

export function statisticsFromSession(raw: SessionStatistics): UserStatistics {
  return {
    score: raw.score ?? 0,
    level: raw.level ?? 0,
    todayCompleted: raw.todayCompleted ?? 0,
    yesterdayCompleted: raw.yesterdayCompleted ?? 0,
    totalCompleted: raw.totalCompleted ?? 0,
    todayFocusCount: raw.todayPomoCount ?? 0,
    totalFocusCount: raw.totalPomoCount ?? 0,
    todayFocusDuration: raw.todayPomoDuration ?? 0,
    totalFocusDuration: raw.totalPomoDuration ?? 0,
  };
}

export function focusDaysFromSession(raw: readonly SessionFocusDay[] | null | undefined): FocusDay[] {
  return (raw ?? []).map((d) => ({ day: dayFromKey(String(d.day)), minutes: d.duration ?? 0 }));
}

export function focusDistributionFromSession(raw: SessionFocusDistribution | null | undefined): FocusDistribution {
  return {
    byProject: { ...(raw?.projectDurations ?? {}) },
    byTag: { ...(raw?.tagDurations ?? {}) },
  };
}
