import { ValidationError, malformed } from '../errors.js';
import { Priority, type ChecklistItem, type ProjectKind, type TaskKind, type TaskStatus, type ViewMode } from '../model.js';

/* ------------------------------------------------------------------ */
/*  Enumerations                                                       */
/* ------------------------------------------------------------------ */

const PRIORITY_BY_CODE = new Map<number, Priority>(Object.values(Priority).map((p): [number, Priority] => [p, p]));

/** Fails closed on codes outside the scale; absence means None. */
export function parsePriority(code: number | null | undefined): Priority {
  if (code === undefined || code === null) return Priority.None;
  const p = PRIORITY_BY_CODE.get(code);
  if (p === undefined) throw malformed(`unknown priority code ${code}`, { priority: code });
  return p;
}

export function isPriority(code: number): code is Priority {
  return PRIORITY_BY_CODE.has(code);
}

/** Caller-supplied priority; only the four scale codes are accepted. */
export function checkPriority(code: number | undefined): Priority | undefined {
  if (code === undefined) return undefined;
  if (!isPriority(code)) {
    throw new ValidationError(`priority must be one of 0, 1, 3, 5, got ${code}`, { priority: code });
  }
  return code;
}

function checkOneOf<T extends string>(allowed: readonly T[], raw: string | undefined, field: string): T | undefined {
  if (raw === undefined) return undefined;
  const v = allowed.find((a) => a === raw);
  if (!v) throw new ValidationError(`${field} must be one of ${allowed.join(', ')}, got "${raw}"`, { [field]: raw });
  return v;
}

const STATUS_BY_CODE: Record<string, TaskStatus> = {
  '0': 'active',
  '2': 'completed',
  '-1': 'abandoned',
};

const CODE_BY_STATUS: Record<TaskStatus, number> = {
  active: 0,
  completed: 2,
  abandoned: -1,
};

export function parseStatus(code: number | null | undefined): TaskStatus {
  if (code === undefined || code === null) return 'active';
  const s = STATUS_BY_CODE[String(code)];
  if (!s) throw malformed(`unknown task status ${code}`, { status: code });
  return s;
}

export function statusCode(status: TaskStatus): number {
  return CODE_BY_STATUS[status];
}

const TASK_KINDS: Record<string, TaskKind> = { TEXT: 'text', NOTE: 'note', CHECKLIST: 'checklist' };

export function parseTaskKind(raw: string | null | undefined): TaskKind {
  if (!raw) return 'text';
  const k = TASK_KINDS[raw.toUpperCase()];
  if (!k) throw malformed(`unknown task kind ${raw}`, { kind: raw });
  return k;
}

export function taskKindCode(kind: TaskKind): string {
  return kind.toUpperCase();
}

export function checkTaskKind(raw: string | undefined): TaskKind | undefined {
  return checkOneOf(Object.values(TASK_KINDS), raw, 'kind');
}

const VIEW_MODES: readonly ViewMode[] = ['list', 'kanban', 'timeline'];

export function parseViewMode(raw: string | null | undefined): ViewMode {
  if (!raw) return 'list';
  const v = VIEW_MODES.find((m) => m === raw.toLowerCase());
  if (!v) throw malformed(`unknown view mode ${raw}`, { viewMode: raw });
  return v;
}

export function checkViewMode(raw: string | undefined): ViewMode | undefined {
  return checkOneOf(VIEW_MODES, raw, 'viewMode');
}

const PROJECT_KINDS: readonly ProjectKind[] = ['task', 'note'];

export function checkProjectKind(raw: string | undefined): ProjectKind | undefined {
  return checkOneOf(PROJECT_KINDS, raw, 'kind');
}

export function parseProjectKind(raw: string | null | undefined): ProjectKind {
  if (!raw) return 'task';
  const upper = raw.toUpperCase();
  if (upper === 'TASK') return 'task';
  if (upper === 'NOTE') return 'note';
  throw malformed(`unknown project kind ${raw}`, { kind: raw });
}

export function projectKindCode(kind: ProjectKind): string {
  return kind.toUpperCase();
}

/* ------------------------------------------------------------------ */
/*  Timestamps                                                         */
/* ------------------------------------------------------------------ */

// Both APIs emit `2026-02-10T09:00:00.000+0000`; inputs may use `Z` or `+01:00`.
const TIMESTAMP = /^(\d{4}-\d{2}-\d{2})T(\d{2}:\d{2})(?::(\d{2})(?:\.(\d+))?)?(Z|[+-]\d{2}:?\d{2})$/i;

function toDate(raw: string): Date | undefined {
  const m = TIMESTAMP.exec(raw.trim());
  if (!m) return undefined;
  const [, date, hm, sec = '00', frac = '', zone] = m;
  const ms = (frac + '000').slice(0, 3);
  const offset = zone.toUpperCase() === 'Z' ? 'Z' : zone.includes(':') ? zone : `${zone.slice(0, 3)}:${zone.slice(3)}`;
  // Date rolls 02-30 over into March instead of failing
  if (!isCalendarDate(date)) return undefined;
  const d = new Date(`${date}T${hm}:${sec}.${ms}${offset}`);
  return Number.isNaN(d.getTime()) ? undefined : d;
}

function isCalendarDate(date: string): boolean {
  const d = new Date(`${date}T00:00:00.000Z`);
  return !Number.isNaN(d.getTime()) && d.toISOString().slice(0, 10) === date;
}

/**
 * Backend timestamp to canonical ISO 8601 UTC. Absent or empty stays
 * undefined; it never becomes the epoch.
 */
export function parseTimestamp(raw: string | null | undefined, field: string): string | undefined {
  if (raw === undefined || raw === null || raw === '') return undefined;
  const d = toDate(raw);
  if (!d) throw malformed(`unparseable ${field} "${raw}"`, { [field]: raw });
  return d.toISOString();
}

/** Canonical form of a caller-supplied timestamp. */
export function canonicalTimestamp(value: string, field: string): string {
  const d = toDate(value);
  if (!d) {
    throw new ValidationError(`${field} must be an ISO 8601 timestamp with a UTC offset, got "${value}"`, { [field]: value });
  }
  return d.toISOString();
}

/** Canonical or caller-supplied timestamp to the wire format. */
export function toWireTimestamp(value: string, field: string): string {
  return canonicalTimestamp(value, field).replace('Z', '+0000');
}

const DAY = /^(\d{4})-(\d{2})-(\d{2})$/;

/** Validate `YYYY-MM-DD`; returns the compact `yyyyMMdd` key. */
export function dayKey(day: string, field: string): string {
  const m = DAY.exec(day);
  if (!m || !isCalendarDate(day)) {
    throw new ValidationError(`${field} must be a calendar date YYYY-MM-DD, got "${day}"`, { [field]: day });
  }
  return `${m[1]}${m[2]}${m[3]}`;
}

export function dayFromKey(key: string): string {
  if (!/^\d{8}$/.test(key)) throw malformed(`unparseable day key "${key}"`);
  return `${key.slice(0, 4)}-${key.slice(4, 6)}-${key.slice(6, 8)}`;
}

/** Validate an ordered window and return both compact keys. */
export function windowKeys(from: string, to: string): { from: string; to: string } {
  const f = dayKey(from, 'from');
  const t = dayKey(to, 'to');
  if (f > t) throw new ValidationError(`from (${from}) is after to (${to})`, { from, to });
  return { from: f, to: t };
}

/* ------------------------------------------------------------------ */
/*  Shared fragments                                                   */
/* ------------------------------------------------------------------ */

export function requireString(value: unknown, field: string): string {
  if (typeof value !== 'string' || value === '') throw malformed(`missing ${field}`);
  return value;
}

/** Empty strings from the backends mean "not set". */
export function optionalString(value: string | null | undefined): string | undefined {
  return value ? value : undefined;
}

export interface RawChecklistItem {
  id: string;
  title: string;
  status?: number;
  startDate?: string | null;
  completedTime?: string | null;
}

/** Order is kept exactly as given. */
export function parseChecklist(items: readonly RawChecklistItem[] | null | undefined): ChecklistItem[] {
  return (items ?? []).map((i) => ({
    id: requireString(i.id, 'checklist item id'),
    title: i.title ?? '',
    completed: (i.status ?? 0) !== 0,
    startDate: parseTimestamp(i.startDate, 'item.startDate'),
    completedAt: parseTimestamp(i.completedTime, 'item.completedTime'),
  }));
}

const HEX_COLOR = /^#[0-9a-fA-F]{6}$/;

export function checkColor(color: string | undefined): void {
  if (color !== undefined && !HEX_COLOR.test(color)) {
    throw new ValidationError(`color must be #rrggbb, got "${color}"`, { color });
  }
}

export function checkName(value: string | undefined, field: string): string {
  const trimmed = value?.trim();
  if (!trimmed) throw new ValidationError(`${field} must not be empty`, { [field]: value });
  return trimmed;
}
