import { z } from 'zod';
import { respond } from '../respond.js';
import type { ToolContext } from './shared.js';

const FolderRef = { folderId: z.string() };

export function registerFolderTools({ server, client, logger }: ToolContext): void {
  server.tool('list_folders', 'Project folders with their member projects.', () =>
    respond('list_folders', logger, () => client.listFolders()),
  );

  server.tool('get_folder', 'Fetch one folder.', FolderRef, ({ folderId }) =>
    respond('get_folder', logger, () => client.getFolder(folderId)),
  );

  server.tool('create_folder', 'Create an empty folder.', { name: z.string() }, ({ name }) =>
    respond('create_folder', logger, () => client.createFolder(name)),
  );

  server.tool('rename_folder', 'Rename a folder.', { ...FolderRef, name: z.string() }, ({ folderId, name }) =>
    respond('rename_folder', logger, () => client.renameFolder(folderId, name)),
  );

  server.tool('delete_folder', 'Delete a folder; its projects are kept.', FolderRef, ({ folderId }) =>
    respond('delete_folder', logger, () => client.deleteFolder(folderId)),
  );
}
