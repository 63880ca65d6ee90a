export type ErrorKind =
  | 'Authentication'
  | 'NotFound'
  | 'Validation'
  | 'RateLimit'
  | 'Forbidden'
  | 'ServerError'
  | 'Configuration';

/** Step of a two-phase subtask operation that failed. */
export type SubtaskPhase = 'locate' | 'link';

export interface ErrorDetails {
  [key: string]: unknown;
}

/**
 * Base of every error this library raises. Catch this to handle all failures,
 * or one of the subclasses (or switch on `kind`) to handle a single class.
 */
export abstract class TickTickError extends Error {
  abstract readonly kind: ErrorKind;
  /** Set on make-subtask / unparent failures. */
  phase?: SubtaskPhase;
  /** Task left behind without its parent link when `link` failed after `locate` created it. */
  orphanTaskId?: string;

  constructor(
    message: string,
    public readonly details?: ErrorDetails,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }

  toJSON() {
    return {
      kind: this.kind,
      message: this.message,
      ...(this.phase ? { phase: this.phase } : {}),
      ...(this.orphanTaskId ? { orphanTaskId: this.orphanTaskId } : {}),
      ...(this.details ? { details: this.details } : {}),
    };
  }
}

export class AuthenticationError extends TickTickError {
  readonly kind = 'Authentication' as const;

  constructor(
    message: string,
    public readonly backend: 'open' | 'session',
    details?: ErrorDetails & { twoFactorRequired?: boolean },
  ) {
    super(message, details);
  }

  get twoFactorRequired(): boolean {
    return this.details?.twoFactorRequired === true;
  }
}

export class NotFoundError extends TickTickError {
  readonly kind = 'NotFound' as const;
}

export class ValidationError extends TickTickError {
  readonly kind = 'Validation' as const;
}

export class RateLimitError extends TickTickError {
  readonly kind = 'RateLimit' as const;

  constructor(
    message: string,
    public readonly retryAfterMs?: number,
    details?: ErrorDetails,
  ) {
    super(message, details);
  }
}

export class ForbiddenError extends TickTickError {
  readonly kind = 'Forbidden' as const;
}

export type ServerErrorReason = 'status' | 'timeout' | 'network' | 'malformed' | 'unexpected';

export class ServerError extends TickTickError {
  readonly kind = 'ServerError' as const;

  constructor(
    message: string,
    public readonly reason: ServerErrorReason,
    details?: ErrorDetails,
    options?: { cause?: unknown },
  ) {
    super(message, details, options);
  }
}

export class ConfigurationError extends TickTickError {
  readonly kind = 'Configuration' as const;
}

/** A backend answered with a payload that cannot be mapped. */
export function malformed(message: string, details?: ErrorDetails): ServerError {
  return new ServerError(`Malformed backend payload: ${message}`, 'malformed', details);
}

export function isTickTickError(e: unknown): e is TickTickError {
  return e instanceof TickTickError;
}

/** Wrap anything that is not already part of the taxonomy. */
export function toTickTickError(e: unknown): TickTickError {
  if (e instanceof TickTickError) return e;
  const message = e instanceof Error ? e.message : String(e);
  return new ServerError(`Unexpected failure: ${message}`, 'unexpected', undefined, { cause: e });
}
