import { ConfigurationError, toTickTickError } from '../errors.js';
import type { Logger } from '../log.js';
import type { OpenApiTransport } from '../transports/open.js';
import type { SessionApiTransport } from '../transports/session.js';
import {
  ROUTES,
  type CompositeOperation,
  type OpenOperation,
  type Operation,
  type Route,
  type SessionOperation,
} from './routes.js';

export interface Backends {
  readonly open: OpenApiTransport;
  readonly session: SessionApiTransport;
}

function describe(route: Route) {
  return route.via === 'composite' ? `composite:${route.join}` : route.via;
}

/**
 * Runs an operation against the backend(s) its route names. Each entry point
 * only accepts operations routed that way, so a facade method cannot reach a
 * backend it is not routed to. Anything thrown leaves as a TickTickError.
 */
export class Dispatcher {
  private stopped = false;

  constructor(
    private readonly backends: Backends,
    private readonly logger: Logger,
  ) {}

  open<T>(op: OpenOperation, call: (open: OpenApiTransport) => Promise<T>): Promise<T> {
    return this.run(op, () => call(this.backends.open));
  }

  session<T>(op: SessionOperation, call: (session: SessionApiTransport) => Promise<T>): Promise<T> {
    return this.run(op, () => call(this.backends.session));
  }

  composite<T>(op: CompositeOperation, call: (backends: Backends) => Promise<T>): Promise<T> {
    return this.run(op, () => call(this.backends));
  }

  /** Refuse every later operation. */
  stop(): void {
    this.stopped = true;
  }

  private async run<T>(op: Operation, call: () => Promise<T>): Promise<T> {
    if (this.stopped) throw new ConfigurationError(`${op}: client is closed`);
    const route: Route = ROUTES[op];
    const started = Date.now();
    this.logger.debug(`${op} via ${describe(route)}`);
    try {
      const result = await call();
      this.logger.debug(`${op} done`, { ms: Date.now() - started });
      return result;
    } catch (e) {
      const err = toTickTickError(e);
      this.logger.warn(`${op} failed`, {
        kind: err.kind,
        message: err.message,
        ...(err.phase ? { phase: err.phase } : {}),
      });
      throw err;
    }
  }
}
