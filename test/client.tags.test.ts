import { describe, expect, it } from 'vitest';
import { NotFoundError, ValidationError } from '../src/errors.js';
import { FakeTickTick } from './helpers/fakeTickTick.js';
import { openClient } from './helpers/openClient.js';

function tagged() {
  const fake = new FakeTickTick();
  fake.addTag({ name: 'work', color: '#3366ff' });
  fake.addTag({ name: 'urgent' });
  fake.addTag({ name: 'errand', parent: 'work' });
  fake.addTask({ id: 't1', title: 'Report', tags: ['work', 'urgent'] });
  fake.addTask({ id: 't2', title: 'Groceries', tags: ['errand'] });
  return fake;
}

describe('tags', () => {
  it('lists and fetches tags', async () => {
    const { client } = await openClient(tagged());

    expect((await client.listTags()).map((t) => t.name)).toEqual(['work', 'urgent', 'errand']);
    expect(await client.getTag('errand')).toEqual({ name: 'errand', label: 'errand', color: undefined, parent: 'work' });
    await expect(client.getTag('nope')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('creates a tag, refusing duplicates, missing parents and bad colors', async () => {
    const { fake, client } = await openClient(tagged());

    const tag = await client.createTag({ name: 'home', color: '#00aa00', parent: 'errand' });
    expect(tag).toEqual({ name: 'home', label: 'home', color: '#00aa00', parent: 'errand' });
    expect(fake.tags.get('home')?.parent).toBe('errand');

    await expect(client.createTag({ name: 'work' })).rejects.toBeInstanceOf(ValidationError);
    await expect(client.createTag({ name: 'later', parent: 'ghost' })).rejects.toBeInstanceOf(NotFoundError);
    await expect(client.createTag({ name: 'blue', color: 'blue' })).rejects.toBeInstanceOf(ValidationError);
  });

  it('updates color and parent, refusing cycles', async () => {
    const { fake, client } = await openClient(tagged());

    const recolored = await client.updateTag('work', { color: '#000000' });
    expect(recolored.color).toBe('#000000');

    await expect(client.updateTag('work', { parent: 'errand' })).rejects.toBeInstanceOf(ValidationError);
    await expect(client.updateTag('work', { parent: 'work' })).rejects.toBeInstanceOf(ValidationError);

    const detached = await client.updateTag('errand', { parent: null });
    expect(detached.parent).toBeUndefined();
    expect(fake.tags.get('errand')?.parent).toBeUndefined();
    expect(fake.tags.get('errand')?.color).toBeUndefined();
  });

  it('deletes a tag from every task', async () => {
    const { fake, client } = await openClient(tagged());

    await client.deleteTag('urgent');
    expect(fake.tags.has('urgent')).toBe(false);
    expect(fake.tasks.get('t1')?.tags).toEqual(['work']);
    await expect(client.deleteTag('urgent')).rejects.toBeInstanceOf(NotFoundError);
  });

  it('renames a tag on every task in one call', async () => {
    const { fake, client } = await openClient(tagged());

    const renamed = await client.renameTag('urgent', 'asap');

    expect(renamed.name).toBe('asap');
    expect(fake.tasks.get('t1')?.tags).toEqual(['work', 'asap']);
    expect(fake.calls.filter((c) => c.method === 'PUT').map((c) => c.path)).toEqual(['/tag/rename']);
  });

  it('finds the same tasks under the new name after a rename', async () => {
    const { client } = await openClient(tagged());

    const before = (await client.getTasksByTag('urgent')).map((t) => t.id);
    await client.renameTag('urgent', 'asap');

    expect(before).toEqual(['t1']);
    expect((await client.getTasksByTag('asap')).map((t) => t.id)).toEqual(before);
    expect(await client.getTasksByTag('urgent')).toEqual([]);
  });

  it('refuses to rename onto an existing tag', async () => {
    const { client } = await openClient(tagged());
    const err = await client.renameTag('urgent', 'work').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ValidationError);
    expect(err).toMatchObject({ message: 'tag "work" already exists; use mergeTags' });
  });

  it('treats a rename to the same name as a no-op', async () => {
    const { fake, client } = await openClient(tagged());
    expect((await client.renameTag('work', 'work')).name).toBe('work');
    expect(fake.calls.filter((c) => c.method === 'PUT')).toEqual([]);
  });

  it('merges one tag into another, idempotently', async () => {
    const fake = tagged();
    fake.addTask({ id: 't3', title: 'Both', tags: ['urgent', 'errand'] });
    const { client } = await openClient(fake);

    await client.mergeTags('urgent', 'errand');

    expect(fake.tags.has('urgent')).toBe(false);
    expect(fake.tasks.get('t1')?.tags).toEqual(['work', 'errand']);
    expect(fake.tasks.get('t3')?.tags).toEqual(['errand']);
    expect((await client.listTags()).map((t) => t.name)).toEqual(['work', 'errand']);
    expect((await client.getTasksByTag('errand')).map((t) => t.id)).toEqual(['t1', 't2', 't3']);

    fake.calls.length = 0;
    await client.mergeTags('urgent', 'errand');
    expect(fake.calls.filter((c) => c.method === 'PUT')).toEqual([]);
  });

  it('merging into a missing target renames the source', async () => {
    const { fake, client } = await openClient(tagged());

    await client.mergeTags('urgent', 'critical');

    expect(fake.tags.has('critical')).toBe(true);
    expect(fake.tasks.get('t1')?.tags).toEqual(['work', 'critical']);
    expect(fake.calls.filter((c) => c.method === 'PUT').map((c) => c.path)).toEqual(['/tag/rename']);
  });

  it('refuses to merge a tag into itself', async () => {
    const { fake, client } = await openClient(tagged());
    await expect(client.mergeTags('work', ' work')).rejects.toBeInstanceOf(ValidationError);
    expect(fake.calls).toEqual([]);
  });
});
