import { describe, expect, it } from 'vitest';
import { ServerError, ValidationError } from '../src/errors.js';
import { Priority, type Task } from '../src/model.js';
import {
  canonicalTimestamp,
  checkPriority,
  checkProjectKind,
  checkTaskKind,
  checkViewMode,
  dayKey,
  parsePriority,
  parseStatus,
  parseTimestamp,
  toWireTimestamp,
  windowKeys,
} from '../src/normalize/common.js';
import { createTaskToOpen, taskFromOpen, updateProjectToOpen, updateTaskToOpen } from '../src/normalize/open.js';
import {
  focusDaysFromSession,
  foldersFromSession,
  projectFromSession,
  statisticsFromSession,
  tagFromSession,
  taskFromSession,
} from '../src/normalize/session.js';

function task(overrides: Partial<Task> = {}): Task {
  return {
    id: 't1',
    projectId: 'p1',
    title: 'Write report',
    status: 'active',
    priority: Priority.None,
    reminders: [],
    items: [],
    kind: 'text',
    deleted: false,
    ...overrides,
  };
}

describe('priority and status codes', () => {
  it('keeps the non-contiguous priority scale', () => {
    expect(parsePriority(0)).toBe(Priority.None);
    expect(parsePriority(1)).toBe(Priority.Low);
    expect(parsePriority(3)).toBe(Priority.Medium);
    expect(parsePriority(5)).toBe(Priority.High);
    expect(parsePriority(undefined)).toBe(Priority.None);
  });

  it('accepts only scale codes from callers', () => {
    expect(checkPriority(3)).toBe(Priority.Medium);
    expect(checkPriority(undefined)).toBeUndefined();
    expect(() => checkPriority(2)).toThrow(ValidationError);
    expect(() => checkPriority(1.5)).toThrow(ValidationError);
    expect(checkTaskKind('checklist')).toBe('checklist');
    expect(() => checkTaskKind('CHECKLIST')).toThrow('kind must be one of text, note, checklist, got "CHECKLIST"');
    expect(checkViewMode(undefined)).toBeUndefined();
    expect(() => checkViewMode('grid')).toThrow(ValidationError);
    expect(() => checkProjectKind('folder')).toThrow(ValidationError);
  });

  it('fails closed on unknown priority codes', () => {
    expect(() => parsePriority(2)).toThrow(ServerError);
    try {
      parsePriority(4);
    } catch (e) {
      expect(e).toBeInstanceOf(ServerError);
      expect(e).toMatchObject({ kind: 'ServerError', reason: 'malformed' });
    }
  });

  it('maps status codes', () => {
    expect(parseStatus(0)).toBe('active');
    expect(parseStatus(2)).toBe('completed');
    expect(parseStatus(-1)).toBe('abandoned');
    expect(() => parseStatus(7)).toThrow(ServerError);
  });
});

describe('timestamps', () => {
  it('normalizes wire timestamps to UTC ISO', () => {
    expect(parseTimestamp('2026-02-10T09:00:00.000+0000', 'dueDate')).toBe('2026-02-10T09:00:00.000Z');
    expect(parseTimestamp('2026-02-10T10:30:00.000+0130', 'dueDate')).toBe('2026-02-10T09:00:00.000Z');
  });

  it('leaves absent timestamps unset instead of producing the epoch', () => {
    expect(parseTimestamp(undefined, 'dueDate')).toBeUndefined();
    expect(parseTimestamp(null, 'dueDate')).toBeUndefined();
    expect(parseTimestamp('', 'dueDate')).toBeUndefined();
  });

  it('rejects garbage from the backend as malformed', () => {
    expect(() => parseTimestamp('tomorrow', 'dueDate')).toThrow(ServerError);
  });

  it('writes the backend format', () => {
    expect(toWireTimestamp('2026-02-10T10:00:00+01:00', 'dueDate')).toBe('2026-02-10T09:00:00.000+0000');
    expect(toWireTimestamp('2026-02-10T09:00:00Z', 'dueDate')).toBe('2026-02-10T09:00:00.000+0000');
  });

  it('requires an offset on caller timestamps', () => {
    expect(() => canonicalTimestamp('2026-02-10T09:00:00', 'dueDate')).toThrow(ValidationError);
  });

  it('rejects days the calendar does not have instead of rolling over', () => {
    expect(() => canonicalTimestamp('2026-02-30T09:00:00Z', 'dueDate')).toThrow(ValidationError);
    expect(() => canonicalTimestamp('2026-04-31T09:00:00+02:00', 'dueDate')).toThrow(ValidationError);
    expect(() => parseTimestamp('2026-13-01T09:00:00.000+0000', 'dueDate')).toThrow(ServerError);
    expect(canonicalTimestamp('2028-02-29T09:00:00Z', 'dueDate')).toBe('2028-02-29T09:00:00.000Z');
  });

  it('validates calendar days and windows', () => {
    expect(dayKey('2026-03-01', 'from')).toBe('20260301');
    expect(() => dayKey('2026-02-30', 'from')).toThrow(ValidationError);
    expect(() => dayKey('2026/03/01', 'from')).toThrow(ValidationError);
    expect(windowKeys('2026-03-01', '2026-03-01')).toEqual({ from: '20260301', to: '20260301' });
    expect(() => windowKeys('2026-03-02', '2026-03-01')).toThrow(ValidationError);
  });
});

describe('task mapping', () => {
  it('maps an open-API checklist task, leaving tags unset', () => {
    const t = taskFromOpen({
      id: 't1',
      projectId: 'p1',
      title: 'Pack',
      desc: 'for the trip',
      content: '',
      kind: 'CHECKLIST',
      priority: 3,
      status: 0,
      reminders: ['TRIGGER:-PT30M'],
      items: [
        { id: 'i2', title: 'socks', status: 1 },
        { id: 'i1', title: 'passport', status: 0 },
      ],
    });

    expect(t).toMatchObject({
      kind: 'checklist',
      description: 'for the trip',
      priority: Priority.Medium,
      reminders: ['TRIGGER:-PT30M'],
      deleted: false,
    });
    expect(t.tags).toBeUndefined();
    expect(t.items.map((i) => [i.id, i.completed])).toEqual([
      ['i2', true],
      ['i1', false],
    ]);
  });

  it('maps a session-API task with tags, reminders and links', () => {
    const t = taskFromSession({
      id: 't2',
      projectId: 'p1',
      title: 'Child',
      content: 'body',
      startDate: '2026-02-10T09:00:00.000+0000',
      dueDate: null,
      tags: ['work', 'urgent'],
      reminders: [{ id: 'r1', trigger: 'TRIGGER:P0DT9H0M0S' }],
      parentId: 't1',
      childIds: null,
      deleted: 1,
    });

    expect(t.tags).toEqual(new Set(['urgent', 'work']));
    expect(t.reminders).toEqual(['TRIGGER:P0DT9H0M0S']);
    expect(t.parentId).toBe('t1');
    expect(t.childIds).toBeUndefined();
    expect(t.startDate).toBe('2026-02-10T09:00:00.000Z');
    expect(t.dueDate).toBeUndefined();
    expect(t.deleted).toBe(true);
  });
});

describe('write bodies', () => {
  it('never sends parentId on create and infers the checklist kind', () => {
    const body = createTaskToOpen({ title: 'Pack', parentId: 'p', items: [{ title: 'socks' }] }, 'inbox1');
    expect(body).toEqual({
      projectId: 'inbox1',
      title: 'Pack',
      kind: 'CHECKLIST',
      items: [{ title: 'socks', status: 0 }],
    });
  });

  it('sends the full merged task on update, clearing with null', () => {
    const current = task({
      description: 'draft',
      priority: Priority.High,
      startDate: '2026-02-10T09:00:00.000Z',
      dueDate: '2026-02-11T09:00:00.000Z',
      items: [],
    });

    const body = updateTaskToOpen(current, { dueDate: null, startDate: null, title: 'Final report' });

    expect(body).toEqual({
      id: 't1',
      projectId: 'p1',
      title: 'Final report',
      content: 'draft',
      kind: 'TEXT',
      priority: 5,
      startDate: null,
      dueDate: null,
      repeatFlag: null,
      reminders: [],
      items: [],
    });
  });

  it('keeps checklist item ids on update', () => {
    const current = task({
      kind: 'checklist',
      items: [{ id: 'i1', title: 'socks', completed: true }],
    });
    expect(updateTaskToOpen(current, { priority: Priority.Low }).items).toEqual([{ id: 'i1', title: 'socks', status: 1 }]);
  });

  it('writes folder removal as NONE', () => {
    expect(updateProjectToOpen({ folderId: null })).toEqual({ groupId: 'NONE' });
  });
});

describe('session entities', () => {
  it('drops the NONE folder marker', () => {
    expect(projectFromSession({ id: 'p1', name: 'Work', groupId: 'NONE' }).folderId).toBeUndefined();
    expect(projectFromSession({ id: 'p2', name: 'Home', groupId: 'g1' }).folderId).toBe('g1');
  });

  it('builds folders with members in sort order', () => {
    const folders = foldersFromSession(
      [
        { id: 'g2', name: 'Later', sortOrder: 2 },
        { id: 'g1', name: 'Now', sortOrder: 1 },
      ],
      [
        { id: 'p2', name: 'B', groupId: 'g1', sortOrder: 5 },
        { id: 'p1', name: 'A', groupId: 'g1', sortOrder: 1 },
        { id: 'p3', name: 'C', groupId: 'NONE' },
      ],
    );
    expect(folders).toEqual([
      { id: 'g1', name: 'Now', projectIds: ['p1', 'p2'] },
      { id: 'g2', name: 'Later', projectIds: [] },
    ]);
  });

  it('defaults a tag label to its name', () => {
    expect(tagFromSession({ name: 'work', label: '', parent: null })).toEqual({
      name: 'work',
      label: 'work',
      color: undefined,
      parent: undefined,
    });
  });

  it('renames focus statistics', () => {
    const s = statisticsFromSession({
      score: 10,
      level: 2,
      yesterdayCompleted: 1,
      todayCompleted: 0,
      totalCompleted: 11,
      todayPomoDuration: 50,
    });
    expect(s.todayFocusDuration).toBe(50);
    expect(s.totalFocusCount).toBe(0);
    expect(focusDaysFromSession([{ day: '20260301', duration: 25 }])).toEqual([{ day: '2026-03-01', minutes: 25 }]);
  });
});
