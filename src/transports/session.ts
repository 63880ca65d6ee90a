import { randomBytes } from 'node:crypto';
import { AuthenticationError, NotFoundError, ValidationError, malformed } from '../errors.js';
import { requestJson, type FetchLike } from '../http.js';
import { apiBase, type Host, type Transport, type TransportRequestOptions } from './transport.js';

export interface SessionApiTransportOptions {
  username: string;
  password: string;
  /** 24-hex device id sent in X-Device. Random per instance when omitted. */
  deviceId?: string;
  host?: Host;
  timeoutMs: number;
  /** Inject fetch for tests */
  fetcher?: FetchLike;
}

/* ------------------------------------------------------------------ */
/*  Raw shapes (session API v2)                                        */
/* ------------------------------------------------------------------ */

export interface SessionReminder {
  id?: string;
  trigger: string;
}

export interface SessionChecklistItem {
  id: string;
  title: string;
  status?: number;
  sortOrder?: number;
  startDate?: string | null;
  isAllDay?: boolean;
  completedTime?: string | null;
}

export interface SessionTask {
  id: string;
  projectId: string;
  title: string;
  content?: string;
  desc?: string;
  startDate?: string | null;
  dueDate?: string | null;
  timeZone?: string;
  isAllDay?: boolean;
  priority?: number;
  status?: number;
  repeatFlag?: string | null;
  reminders?: SessionReminder[];
  tags?: string[];
  parentId?: string | null;
  childIds?: string[] | null;
  items?: SessionChecklistItem[];
  kind?: string | null;
  deleted?: number;
  completedTime?: string | null;
  modifiedTime?: string;
  sortOrder?: number;
  etag?: string;
}

export interface SessionProject {
  id: string;
  name: string;
  color?: string | null;
  groupId?: string | null;
  viewMode?: string | null;
  kind?: string | null;
  closed?: boolean | null;
  sortOrder?: number;
  etag?: string;
}

export interface SessionProjectGroup {
  id: string;
  name: string;
  sortOrder?: number;
  showAll?: boolean;
  etag?: string;
}

export interface SessionTag {
  name: string;
  label?: string;
  color?: string | null;
  parent?: string | null;
  sortOrder?: number;
  sortType?: string;
  etag?: string;
}

/** Account snapshot from `/batch/check/0`. Passed through unmodified. */
export interface SyncSnapshot {
  inboxId: string;
  projectProfiles: SessionProject[];
  projectGroups?: SessionProjectGroup[] | null;
  syncTaskBean: {
    update: SessionTask[];
    [key: string]: unknown;
  };
  tags: SessionTag[];
  checkPoint?: number;
  [key: string]: unknown;
}

export interface SessionUserStatus {
  userId: string;
  username: string;
  inboxId: string;
  pro?: boolean;
  proEndDate?: string | null;
  teamUser?: boolean;
}

export interface SessionUserProfile {
  username: string;
  name?: string | null;
  displayName?: string | null;
  email?: string | null;
  picture?: string | null;
  locale?: string | null;
}

export interface SessionStatistics {
  score: number;
  level: number;
  yesterdayCompleted: number;
  todayCompleted: number;
  totalCompleted: number;
  todayPomoCount?: number;
  totalPomoCount?: number;
  todayPomoDuration?: number;
  totalPomoDuration?: number;
}

export interface SessionFocusDay {
  /** yyyyMMdd */
  day: string;
  /** minutes */
  duration: number;
}

export interface SessionFocusDistribution {
  projectDurations?: Record<string, number> | null;
  tagDurations?: Record<string, number> | null;
}

export interface BatchResponse {
  id2etag?: Record<string, string>;
  id2error?: Record<string, string>;
}

export interface BatchBody<TAdd, TUpdate = TAdd, TDelete = string> {
  add?: TAdd[];
  update?: TUpdate[];
  delete?: TDelete[];
}

export type SessionTaskUpdate = Partial<SessionTask> & { id: string; projectId: string };

export interface TaskMove {
  taskId: string;
  fromProjectId: string;
  toProjectId: string;
}

export type TaskParentChange =
  | { taskId: string; projectId: string; parentId: string }
  | { taskId: string; projectId: string; oldParentId: string };

interface SignonResponse {
  token?: string;
  userId?: string;
  username?: string;
  inboxId?: string;
  authId?: string;
  expireTime?: number;
}

interface Session {
  readonly token: string;
  readonly userId: string;
  readonly inboxId: string;
}

export function newObjectId(): string {
  return randomBytes(12).toString('hex');
}

/**
 * Throw when a batch call answered 200 but rejected some ids. The session API
 * drops rejected entries silently otherwise.
 */
export function checkBatch(res: BatchResponse | undefined, what: string): void {
  const errors = Object.entries(res?.id2error ?? {});
  if (!errors.length) return;
  const details = { rejected: Object.fromEntries(errors) };
  const ids = errors.map(([id]) => id).join(', ');
  if (errors.some(([, code]) => code.toLowerCase().includes('not_found'))) {
    throw new NotFoundError(`${what}: not found (${ids})`, details);
  }
  throw new ValidationError(`${what}: rejected by backend (${ids})`, details);
}

/** Adapter for the undocumented, login-based API. */
export class SessionApiTransport implements Transport {
  readonly backend = 'session' as const;
  readonly deviceId: string;

  private fetcher: FetchLike;
  private base: string;
  private session?: Session;

  constructor(private opts: SessionApiTransportOptions) {
    this.fetcher = opts.fetcher ?? fetch;
    this.base = apiBase(opts.host ?? 'ticktick.com', 'session');
    this.deviceId = opts.deviceId ?? newObjectId();
  }

  get authenticated(): boolean {
    return this.session !== undefined;
  }

  /** Inbox project id of the logged-in account. */
  get inboxId(): string {
    if (!this.session) throw new AuthenticationError('Session API session is not established', 'session');
    return this.session.inboxId;
  }

  private deviceHeaders(): Record<string, string> {
    return {
      'x-device': JSON.stringify({
        platform: 'web',
        os: 'macOS 10.15.7',
        device: 'Firefox 123.0',
        name: '',
        version: 6070,
        id: this.deviceId,
        channel: 'website',
        campaign: '',
        websocket: '',
      }),
      'user-agent': 'Mozilla/5.0 (Macintosh; Intel Mac OS X 10.15; rv:123.0) Gecko/20100101 Firefox/123.0',
    };
  }

  async authenticate(): Promise<void> {
    let res: SignonResponse;
    try {
      res = await requestJson<SignonResponse>(
        `${this.base}/user/signon`,
        {
          method: 'POST',
          query: { wc: true, remember: true },
          headers: this.deviceHeaders(),
          body: { username: this.opts.username, password: this.opts.password },
          timeoutMs: this.opts.timeoutMs,
          backend: 'session',
        },
        this.fetcher,
      );
    } catch (e) {
      if (e instanceof ValidationError) {
        throw new AuthenticationError('Session API rejected the credentials', 'session', e.details);
      }
      throw e;
    }

    if (!res?.token) {
      if (res?.authId) {
        throw new AuthenticationError(
          'Two-factor authentication is enabled on this account; the session API login is not supported for it',
          'session',
          { twoFactorRequired: true },
        );
      }
      throw new AuthenticationError('Session API login returned no token', 'session');
    }
    if (!res.inboxId || !res.userId) throw malformed('signon response lacks inboxId/userId');

    this.session = { token: res.token, userId: res.userId, inboxId: res.inboxId };
  }

  async request<T>(path: string, init: TransportRequestOptions = {}): Promise<T> {
    if (!this.session) throw new AuthenticationError('Session API session is not established', 'session');
    return requestJson<T>(
      `${this.base}${path}`,
      {
        ...init,
        headers: { ...this.deviceHeaders(), cookie: `t=${this.session.token}`, ...(init.headers ?? {}) },
        timeoutMs: this.opts.timeoutMs,
        backend: 'session',
      },
      this.fetcher,
    );
  }

  async close(): Promise<void> {
    this.session = undefined;
  }

  sync(): Promise<SyncSnapshot> {
    return this.request<SyncSnapshot>('/batch/check/0');
  }

  getUserStatus(): Promise<SessionUserStatus> {
    return this.request<SessionUserStatus>('/user/status');
  }

  getUserProfile(): Promise<SessionUserProfile> {
    return this.request<SessionUserProfile>('/user/profile');
  }

  getStatistics(): Promise<SessionStatistics> {
    return this.request<SessionStatistics>('/statistics/general');
  }

  /** Dates as yyyyMMdd. */
  getFocusHeatmap(from: string, to: string): Promise<SessionFocusDay[]> {
    return this.request<SessionFocusDay[]>(`/pomodoros/statistics/heatmap/${from}/${to}`);
  }

  /** Dates as yyyyMMdd. */
  getFocusDistribution(from: string, to: string): Promise<SessionFocusDistribution> {
    return this.request<SessionFocusDistribution>(`/pomodoros/statistics/dist/${from}/${to}`);
  }

  listProjects(): Promise<SessionProject[]> {
    return this.request<SessionProject[]>('/projects');
  }

  async batchTasks(body: BatchBody<SessionTaskUpdate, SessionTaskUpdate, { taskId: string; projectId: string }>): Promise<BatchResponse> {
    const res = await this.request<BatchResponse>('/batch/task', { method: 'POST', body });
    checkBatch(res, 'task batch');
    return res;
  }

  async moveTasks(moves: TaskMove[]): Promise<BatchResponse> {
    const res = await this.request<BatchResponse>('/batch/taskProject', { method: 'POST', body: moves });
    checkBatch(res, 'task move');
    return res;
  }

  async setTaskParents(changes: TaskParentChange[]): Promise<BatchResponse> {
    const res = await this.request<BatchResponse>('/batch/taskParent', { method: 'POST', body: changes });
    checkBatch(res, 'task parent');
    return res;
  }

  async batchProjectGroups(body: BatchBody<SessionProjectGroup & { listType: 'group' }, SessionProjectGroup>): Promise<BatchResponse> {
    const res = await this.request<BatchResponse>('/batch/projectGroup', { method: 'POST', body });
    checkBatch(res, 'folder batch');
    return res;
  }

  async batchTags(body: BatchBody<SessionTag>): Promise<BatchResponse> {
    const res = await this.request<BatchResponse>('/batch/tag', { method: 'POST', body });
    checkBatch(res, 'tag batch');
    return res;
  }

  async renameTag(name: string, newName: string): Promise<void> {
    await this.request<void>('/tag/rename', { method: 'PUT', body: { name, newName } });
  }

  async mergeTags(name: string, newName: string): Promise<void> {
    await this.request<void>('/tag/merge', { method: 'PUT', body: { name, newName } });
  }

  async deleteTag(name: string): Promise<void> {
    await this.request<void>('/tag', { method: 'DELETE', query: { name } });
  }

  /** Bounds as `yyyy-MM-dd HH:mm:ss`. */
  listCompleted(from: string, to: string, limit: number): Promise<SessionTask[]> {
    return this.request<SessionTask[]>('/project/all/completed', { query: { from, to, limit } });
  }

  async listTrash(limit: number): Promise<SessionTask[]> {
    const res = await this.request<{ tasks?: SessionTask[] }>('/project/all/trash/pagination', {
      query: { start: 0, limit },
    });
    return res?.tasks ?? [];
  }
}
