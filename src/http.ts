import {
  AuthenticationError,
  ForbiddenError,
  NotFoundError,
  RateLimitError,
  ServerError,
  ValidationError,
  type TickTickError,
} from './errors.js';

export type FetchLike = typeof fetch;

export type Backend = 'open' | 'session';

export interface JsonRequestOptions {
  method?: 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';
  headers?: Record<string, string>;
  query?: Record<string, string | number | boolean | undefined>;
  body?: unknown;
  /** Applied to every call; there is no per-operation override. */
  timeoutMs: number;
  /** Which backend the call goes to, for error classification. */
  backend: Backend;
}

/** Error body both TickTick APIs send on failure. */
interface RemoteErrorBody {
  errorCode?: string;
  errorMessage?: string;
  errorId?: string;
}

function withQuery(url: string, query?: JsonRequestOptions['query']) {
  if (!query) return url;
  const u = new URL(url);
  for (const [k, v] of Object.entries(query)) {
    if (v === undefined) continue;
    u.searchParams.set(k, String(v));
  }
  return u.toString();
}

export function parseRetryAfterMs(v: string | null): number | undefined {
  if (!v) return undefined;
  const sec = Number(v);
  if (Number.isFinite(sec) && sec >= 0) return sec * 1000;
  const at = Date.parse(v);
  if (Number.isFinite(at)) return Math.max(0, at - Date.now());
  return undefined;
}

function parseRemoteError(text: string | undefined): RemoteErrorBody {
  if (!text) return {};
  try {
    const parsed: unknown = JSON.parse(text);
    if (parsed && typeof parsed === 'object') {
      const pick = (key: string) => {
        const v: unknown = Reflect.get(parsed, key);
        return typeof v === 'string' ? v : undefined;
      };
      return {
        errorCode: pick('errorCode'),
        errorMessage: pick('errorMessage'),
        errorId: pick('errorId'),
      };
    }
  } catch {
    // plain-text body
  }
  return {};
}

/**
 * Map a failed HTTP exchange onto the error taxonomy.
 *
 * The remote `errorCode` wins over the status where they disagree: the session
 * API reports missing entities as HTTP 500 with a `*_not_found` code.
 */
export function errorFromResponse(
  status: number,
  url: string,
  backend: Backend,
  responseText?: string,
  retryAfterMs?: number,
): TickTickError {
  const remote = parseRemoteError(responseText);
  const code = remote.errorCode;
  const message = `HTTP ${status} for ${url}${code ? ` (${code})` : ''}`;
  const details = { status, url, ...(code ? { errorCode: code } : {}), ...(remote.errorMessage ? { errorMessage: remote.errorMessage } : {}) };

  if (code && code.endsWith('not_found')) return new NotFoundError(message, details);
  if (code === 'username_password_not_match') return new AuthenticationError(message, backend, details);

  if (status === 401) return new AuthenticationError(message, backend, details);
  if (status === 403) return new ForbiddenError(message, details);
  if (status === 404) return new NotFoundError(message, details);
  if (status === 429) return new RateLimitError(message, retryAfterMs, details);
  if (status >= 500) return new ServerError(message, 'status', details);
  return new ValidationError(message, { ...details, remote: true });
}

function isAbortError(e: unknown) {
  return e instanceof Error && (e.name === 'TimeoutError' || e.name === 'AbortError');
}

/**
 * One JSON exchange. Never retries: rate limits and server errors go straight
 * back to the caller.
 */
export async function requestJson<T>(
  url: string,
  opts: JsonRequestOptions,
  fetcher: FetchLike = fetch,
): Promise<T> {
  const finalUrl = withQuery(url, opts.query);
  const hasBody = opts.body !== undefined;

  let res: Response;
  try {
    res = await fetcher(finalUrl, {
      method: opts.method ?? 'GET',
      headers: {
        accept: 'application/json',
        ...(hasBody ? { 'content-type': 'application/json' } : {}),
        ...(opts.headers ?? {}),
      },
      body: hasBody ? JSON.stringify(opts.body) : undefined,
      signal: AbortSignal.timeout(opts.timeoutMs),
    });
  } catch (e) {
    if (isAbortError(e)) {
      throw new ServerError(`Request timed out after ${opts.timeoutMs}ms: ${finalUrl}`, 'timeout', { url: finalUrl }, { cause: e });
    }
    const msg = e instanceof Error ? e.message : String(e);
    throw new ServerError(`Network failure for ${finalUrl}: ${msg}`, 'network', { url: finalUrl }, { cause: e });
  }

  if (!res.ok) {
    const txt = await res.text().catch(() => undefined);
    const retryAfterMs = parseRetryAfterMs(res.headers.get('retry-after'));
    throw errorFromResponse(res.status, finalUrl, opts.backend, txt, retryAfterMs);
  }

  // empty body
  if (res.status === 204) return undefined as T;

  const text = await res.text();
  if (!text) return undefined as T;
  try {
    return JSON.parse(text) as T;
  } catch (e) {
    throw new ServerError(`Invalid JSON from ${finalUrl}`, 'malformed', { url: finalUrl }, { cause: e });
  }
}
