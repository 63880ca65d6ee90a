import { z } from 'zod';
import { respond } from '../respond.js';
import { ColorSchema, type ToolContext } from './shared.js';

const TagRef = { name: z.string() };

export function registerTagTools({ server, client, logger }: ToolContext): void {
  server.tool('list_tags', 'All tags.', () => respond('list_tags', logger, () => client.listTags()));

  server.tool('get_tag', 'Fetch one tag by name.', TagRef, ({ name }) =>
    respond('get_tag', logger, () => client.getTag(name)),
  );

  server.tool(
    'create_tag',
    'Create a tag. Fails if the name exists.',
    { ...TagRef, color: ColorSchema.optional(), parent: z.string().optional() },
    (args) => respond('create_tag', logger, () => client.createTag(args)),
  );

  server.tool(
    'update_tag',
    "Change a tag's color or parent.",
    {
      ...TagRef,
      color: ColorSchema.optional(),
      parent: z.string().nullable().optional().describe('null detaches from the parent'),
    },
    ({ name, ...changes }) => respond('update_tag', logger, () => client.updateTag(name, changes)),
  );

  server.tool('delete_tag', 'Delete a tag; tasks lose it.', TagRef, ({ name }) =>
    respond('delete_tag', logger, () => client.deleteTag(name)),
  );

  server.tool(
    'rename_tag',
    'Rename a tag on every task. Fails if the new name exists (use merge_tags).',
    { from: z.string(), to: z.string() },
    ({ from, to }) => respond('rename_tag', logger, () => client.renameTag(from, to)),
  );

  server.tool(
    'merge_tags',
    'Fold source into target: tasks tagged source get target, source is removed.',
    { source: z.string(), target: z.string() },
    ({ source, target }) => respond('merge_tags', logger, () => client.mergeTags(source, target)),
  );
}
