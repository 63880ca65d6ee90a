import { registerFolderTools } from './folders.js';
import { registerProjectTools } from './projects.js';
import type { ToolContext } from './shared.js';
import { registerTagTools } from './tags.js';
import { registerTaskTools } from './tasks.js';
import { registerUserTools } from './user.js';

export type { ToolContext } from './shared.js';

export function registerTools(ctx: ToolContext): void {
  registerTaskTools(ctx);
  registerProjectTools(ctx);
  registerFolderTools(ctx);
  registerTagTools(ctx);
  registerUserTools(ctx);
}
