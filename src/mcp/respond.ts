import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { toTickTickError } from '../errors.js';
import type { Logger } from '../log.js';

/** Sets (task tags) go out as sorted arrays; everything else as-is. */
function replacer(_key: string, value: unknown): unknown {
  if (value instanceof Set) return [...value].map(String).sort();
  return value;
}

export function toJsonText(value: unknown): string {
  return JSON.stringify(value ?? { ok: true }, replacer, 2);
}

/**
 * Run one facade call for a tool. Results become JSON text; failures become an
 * `isError` result whose body keeps the error kind (and phase, when set).
 */
export async function respond(tool: string, logger: Logger, call: () => Promise<unknown>): Promise<CallToolResult> {
  try {
    const result = await call();
    return { content: [{ type: 'text', text: toJsonText(result) }] };
  } catch (e) {
    const err = toTickTickError(e);
    logger.warn(`[${tool}] ${err.kind}: ${err.message}`);
    return {
      isError: true,
      content: [{ type: 'text', text: toJsonText({ error: err.toJSON() }) }],
    };
  }
}
