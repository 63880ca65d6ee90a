import { z } from 'zod';
import { AuthenticationError, malformed } from '../errors.js';
import { requestJson, type FetchLike } from '../http.js';
import { apiBase, oauthBase, type Host, type Transport, type TransportRequestOptions } from './transport.js';

export interface OpenApiTransportOptions {
  /** OAuth access token. It is never refreshed here: on expiry, re-run the OAuth flow. */
  accessToken: string;
  host?: Host;
  timeoutMs: number;
  /** Inject fetch for tests */
  fetcher?: FetchLike;
}

/* ------------------------------------------------------------------ */
/*  Raw shapes (open API v1)                                           */
/* ------------------------------------------------------------------ */

export interface OpenChecklistItem {
  id: string;
  title: string;
  /** 0 open, 1 done */
  status?: number;
  sortOrder?: number;
  startDate?: string;
  isAllDay?: boolean;
  timeZone?: string;
  completedTime?: string;
}

export interface OpenTask {
  id: string;
  projectId: string;
  title: string;
  content?: string;
  desc?: string;
  isAllDay?: boolean;
  startDate?: string;
  dueDate?: string;
  timeZone?: string;
  reminders?: string[];
  repeatFlag?: string;
  priority?: number;
  status?: number;
  completedTime?: string;
  modifiedTime?: string;
  sortOrder?: number;
  items?: OpenChecklistItem[];
  kind?: string;
  parentId?: string;
  deleted?: number;
}

export interface OpenProject {
  id: string;
  name: string;
  color?: string;
  sortOrder?: number;
  closed?: boolean;
  groupId?: string;
  viewMode?: string;
  permission?: string;
  kind?: string;
}

export interface OpenProjectData {
  /** Absent for the inbox. */
  project?: OpenProject;
  tasks?: OpenTask[];
  columns?: unknown[];
}

export interface OpenChecklistItemWrite {
  id?: string;
  title: string;
  status: number;
  startDate?: string;
}

/** Write body. `null` clears a field on the server. */
export interface OpenTaskWrite {
  id?: string;
  projectId: string;
  title: string;
  content?: string | null;
  desc?: string | null;
  isAllDay?: boolean;
  startDate?: string | null;
  dueDate?: string | null;
  timeZone?: string;
  reminders?: string[];
  repeatFlag?: string | null;
  priority?: number;
  items?: OpenChecklistItemWrite[];
  kind?: string;
}

export interface OpenProjectWrite {
  name?: string;
  color?: string;
  viewMode?: string;
  kind?: string;
  groupId?: string | null;
}

const OAuthTokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string(),
  expires_in: z.number().optional(),
  scope: z.string().optional(),
});

export type OAuthTokenResponse = z.infer<typeof OAuthTokenResponseSchema>;

export const OAUTH_SCOPES = ['tasks:read', 'tasks:write'];

/* ------------------------------------------------------------------ */
/*  OAuth helpers (used by the out-of-band authorization script)       */
/* ------------------------------------------------------------------ */

export function buildAuthorizeUrl(opts: { clientId: string; redirectUri: string; state: string; host?: Host }): string {
  const u = new URL(`${oauthBase(opts.host ?? 'ticktick.com')}/authorize`);
  u.searchParams.set('client_id', opts.clientId);
  u.searchParams.set('redirect_uri', opts.redirectUri);
  u.searchParams.set('response_type', 'code');
  u.searchParams.set('scope', OAUTH_SCOPES.join(' '));
  u.searchParams.set('state', opts.state);
  return u.toString();
}

export async function exchangeAuthorizationCode(opts: {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
  code: string;
  host?: Host;
  fetcher?: FetchLike;
}): Promise<OAuthTokenResponse> {
  const fetcher = opts.fetcher ?? fetch;
  const body = new URLSearchParams({
    code: opts.code,
    grant_type: 'authorization_code',
    scope: OAUTH_SCOPES.join(' '),
    redirect_uri: opts.redirectUri,
  });
  const basic = Buffer.from(`${opts.clientId}:${opts.clientSecret}`).toString('base64');

  const res = await fetcher(`${oauthBase(opts.host ?? 'ticktick.com')}/token`, {
    method: 'POST',
    headers: {
      'content-type': 'application/x-www-form-urlencoded',
      authorization: `Basic ${basic}`,
    },
    body,
  });

  if (!res.ok) {
    const txt = await res.text().catch(() => '');
    throw new AuthenticationError(`Token exchange failed: HTTP ${res.status} ${txt}`, 'open', { status: res.status });
  }

  const parsed = OAuthTokenResponseSchema.safeParse(await res.json());
  if (!parsed.success) throw malformed('token response', { issues: parsed.error.issues.map((i) => i.message) });
  return parsed.data;
}

/* ------------------------------------------------------------------ */
/*  Transport                                                          */
/* ------------------------------------------------------------------ */

/** Adapter for the documented, token-based API. */
export class OpenApiTransport implements Transport {
  readonly backend = 'open' as const;

  private fetcher: FetchLike;
  private base: string;
  private token?: string;

  constructor(private opts: OpenApiTransportOptions) {
    this.fetcher = opts.fetcher ?? fetch;
    this.base = apiBase(opts.host ?? 'ticktick.com', 'open');
  }

  get authenticated(): boolean {
    return this.token !== undefined;
  }

  async authenticate(): Promise<void> {
    const candidate = this.opts.accessToken;
    try {
      await requestJson<OpenProject[]>(`${this.base}/project`, {
        headers: { authorization: `Bearer ${candidate}` },
        timeoutMs: this.opts.timeoutMs,
        backend: 'open',
      }, this.fetcher);
    } catch (e) {
      if (e instanceof AuthenticationError) {
        throw new AuthenticationError('Open API rejected the access token; re-run the OAuth flow', 'open', e.details);
      }
      throw e;
    }
    this.token = candidate;
  }

  async request<T>(path: string, init: TransportRequestOptions = {}): Promise<T> {
    if (!this.token) throw new AuthenticationError('Open API session is not established', 'open');
    return requestJson<T>(
      `${this.base}${path}`,
      {
        ...init,
        headers: { authorization: `Bearer ${this.token}`, ...(init.headers ?? {}) },
        timeoutMs: this.opts.timeoutMs,
        backend: 'open',
      },
      this.fetcher,
    );
  }

  async close(): Promise<void> {
    this.token = undefined;
  }

  listProjects(): Promise<OpenProject[]> {
    return this.request<OpenProject[]>('/project');
  }

  getProject(projectId: string): Promise<OpenProject> {
    return this.request<OpenProject>(`/project/${encodeURIComponent(projectId)}`);
  }

  getProjectData(projectId: string): Promise<OpenProjectData> {
    return this.request<OpenProjectData>(`/project/${encodeURIComponent(projectId)}/data`);
  }

  createProject(body: OpenProjectWrite): Promise<OpenProject> {
    return this.request<OpenProject>('/project', { method: 'POST', body });
  }

  updateProject(projectId: string, body: OpenProjectWrite): Promise<OpenProject> {
    return this.request<OpenProject>(`/project/${encodeURIComponent(projectId)}`, { method: 'POST', body });
  }

  async deleteProject(projectId: string): Promise<void> {
    await this.request<void>(`/project/${encodeURIComponent(projectId)}`, { method: 'DELETE' });
  }

  getTask(projectId: string, taskId: string): Promise<OpenTask> {
    return this.request<OpenTask>(`/project/${encodeURIComponent(projectId)}/task/${encodeURIComponent(taskId)}`);
  }

  createTask(body: OpenTaskWrite): Promise<OpenTask> {
    return this.request<OpenTask>('/task', { method: 'POST', body });
  }

  updateTask(taskId: string, body: OpenTaskWrite): Promise<OpenTask> {
    return this.request<OpenTask>(`/task/${encodeURIComponent(taskId)}`, {
      method: 'POST',
      body: { ...body, id: taskId },
    });
  }

  async completeTask(projectId: string, taskId: string): Promise<void> {
    await this.request<void>(
      `/project/${encodeURIComponent(projectId)}/task/${encodeURIComponent(taskId)}/complete`,
      { method: 'POST' },
    );
  }

  async deleteTask(projectId: string, taskId: string): Promise<void> {
    await this.request<void>(`/project/${encodeURIComponent(projectId)}/task/${encodeURIComponent(taskId)}`, {
      method: 'DELETE',
    });
  }
}
