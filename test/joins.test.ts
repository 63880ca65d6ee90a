import { describe, expect, it } from 'vitest';
import { inPhase, mergeProjectsById, mergeTasksById } from '../src/dispatch/joins.js';
import { NotFoundError, ServerError, TickTickError } from '../src/errors.js';
import { Priority, type Project, type Task } from '../src/model.js';

function task(id: string, fields: Partial<Task> = {}): Task {
  return {
    id,
    projectId: 'p1',
    title: id,
    status: 'active',
    priority: Priority.None,
    reminders: [],
    items: [],
    kind: 'text',
    deleted: false,
    ...fields,
  };
}

function project(id: string, fields: Partial<Project> = {}): Project {
  return { id, name: id, viewMode: 'list', kind: 'task', isInbox: false, closed: false, ...fields };
}

describe('mergeTasksById', () => {
  it('takes content from the open side and links from the session side', () => {
    const [merged] = mergeTasksById(
      [task('t1', { title: 'Open title', priority: Priority.High, dueDate: '2026-03-02T00:00:00.000Z', parentId: 'stale' })],
      [
        task('t1', {
          title: 'Session title',
          priority: Priority.Low,
          tags: new Set(['work']),
          parentId: 't0',
          childIds: ['t2'],
          modifiedAt: '2026-03-01T12:00:00.000Z',
        }),
      ],
    );

    expect(merged).toEqual(
      task('t1', {
        title: 'Open title',
        priority: Priority.High,
        dueDate: '2026-03-02T00:00:00.000Z',
        tags: new Set(['work']),
        parentId: 't0',
        childIds: ['t2'],
        modifiedAt: '2026-03-01T12:00:00.000Z',
      }),
    );
  });

  it('keeps one-sided tasks, open order first', () => {
    const merged = mergeTasksById([task('a'), task('b')], [task('c'), task('b'), task('d')]);
    expect(merged.map((t) => t.id)).toEqual(['a', 'b', 'c', 'd']);
    expect(merged[0]?.tags).toBeUndefined();
  });
});

describe('mergeProjectsById', () => {
  it('takes folder membership from the session side and appends the inbox', () => {
    const merged = mergeProjectsById(
      [project('p1', { name: 'Work', folderId: 'g-old' }), project('p2')],
      [project('p1', { name: 'Stale', folderId: 'g1' }), project('p2'), project('p3', { folderId: 'g1' })],
      'inbox1',
    );

    expect(merged.map((p) => [p.id, p.name, p.folderId, p.isInbox])).toEqual([
      ['p1', 'Work', 'g1', false],
      ['p2', 'p2', undefined, false],
      ['p3', 'p3', 'g1', false],
      ['inbox1', 'Inbox', undefined, true],
    ]);
  });

  it('marks a listed inbox instead of appending a second one', () => {
    const merged = mergeProjectsById([project('inbox1', { name: 'Inbox' })], [], 'inbox1');
    expect(merged).toHaveLength(1);
    expect(merged[0]?.isInbox).toBe(true);
  });
});

describe('inPhase', () => {
  it('tags failures with the phase and the orphaned task', async () => {
    const err = await inPhase(
      'link',
      async () => {
        throw new NotFoundError('parent gone');
      },
      't9',
    ).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(NotFoundError);
    expect(err).toMatchObject({ phase: 'link', orphanTaskId: 't9' });
    if (err instanceof TickTickError) {
      expect(err.toJSON()).toEqual({ kind: 'NotFound', message: 'parent gone', phase: 'link', orphanTaskId: 't9' });
    }
  });

  it('wraps foreign errors and passes results through', async () => {
    await expect(inPhase('locate', async () => 42)).resolves.toBe(42);

    const err = await inPhase('locate', async () => {
      throw new TypeError('bad');
    }).catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ServerError);
    expect(err).toMatchObject({ phase: 'locate' });
    if (err instanceof TickTickError) expect(err.orphanTaskId).toBeUndefined();
  });
});
