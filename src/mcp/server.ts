import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { TickTickClient } from '../client.js';
import { silentLogger, type Logger } from '../log.js';
import { registerTools } from './tools/index.js';

export const SERVER_NAME = 'ticktick-bridge';
export const SERVER_VERSION = '0.1.0';

/** An MCP server exposing every client operation as a tool. The caller owns the client. */
export function createServer(client: TickTickClient, logger: Logger = silentLogger): McpServer {
  const server = new McpServer({ name: SERVER_NAME, version: SERVER_VERSION });
  registerTools({ server, client, logger });
  logger.debug('mcp tools registered');
  return server;
}
