import type { Backend, JsonRequestOptions } from '../http.js';

export type Host = 'ticktick.com' | 'dida365.com';

export type TransportRequestOptions = Omit<JsonRequestOptions, 'timeoutMs' | 'backend'>;

/** Capability set shared by both backend adapters. */
export interface Transport {
  readonly backend: Backend;
  readonly authenticated: boolean;

  /** Establish (or verify) the session. Fails with an Authentication error. */
  authenticate(): Promise<void>;

  /** Raw authenticated exchange, path relative to the API base. */
  request<T>(path: string, init?: TransportRequestOptions): Promise<T>;

  /** Drop the session. Safe to call more than once. */
  close(): Promise<void>;
}

export function apiBase(host: Host, backend: Backend): string {
  return backend === 'open' ? `https://api.${host}/open/v1` : `https://api.${host}/api/v2`;
}

export function oauthBase(host: Host): string {
  return `https://${host}/oauth`;
}
