import { z } from 'zod';
import { checkProjectKind, checkViewMode } from '../../normalize/common.js';
import { respond } from '../respond.js';
import { ColorSchema, type ToolContext } from './shared.js';

const ViewModeSchema = z.string().describe('list, kanban or timeline');

const CreateProjectParams = z.object({
  name: z.string(),
  color: ColorSchema.optional(),
  viewMode: ViewModeSchema.optional(),
  kind: z.string().optional().describe('task or note'),
  folderId: z.string().optional(),
});

const UpdateProjectParams = z.object({
  projectId: z.string(),
  name: z.string().optional(),
  color: ColorSchema.optional(),
  viewMode: ViewModeSchema.optional(),
  folderId: z.string().nullable().optional().describe('null takes the project out of its folder'),
});

const ProjectRef = { projectId: z.string() };

export function registerProjectTools({ server, client, logger }: ToolContext): void {
  server.tool('create_project', 'Create a project.', CreateProjectParams.shape, ({ viewMode, kind, ...fields }) =>
    respond('create_project', logger, () =>
      client.createProject({ ...fields, viewMode: checkViewMode(viewMode), kind: checkProjectKind(kind) }),
    ),
  );

  server.tool('get_project', 'Fetch one project.', ProjectRef, ({ projectId }) =>
    respond('get_project', logger, () => client.getProject(projectId)),
  );

  server.tool('get_project_with_tasks', 'Fetch a project and its open tasks.', ProjectRef, ({ projectId }) =>
    respond('get_project_with_tasks', logger, () => client.getProjectWithTasks(projectId)),
  );

  server.tool('list_projects', 'All projects, inbox included.', () =>
    respond('list_projects', logger, () => client.listProjects()),
  );

  server.tool('update_project', 'Rename, recolor or refile a project.', UpdateProjectParams.shape, ({ projectId, viewMode, ...changes }) =>
    respond('update_project', logger, () => client.updateProject(projectId, { ...changes, viewMode: checkViewMode(viewMode) })),
  );

  server.tool('delete_project', 'Delete a project and its tasks.', ProjectRef, ({ projectId }) =>
    respond('delete_project', logger, () => client.deleteProject(projectId)),
  );
}
