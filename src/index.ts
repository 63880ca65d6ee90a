export { TickTickClient, withTickTick } from './client.js';
export type { CompletedTasksQuery, ListTasksOptions, TickTickClientOptions } from './client.js';
export { resolveSettings, settingsFromEnv, readEnv, doctorReport } from './config.js';
export type { TickTickSettings, ResolvedSettings } from './config.js';
export * from './errors.js';
export * from './model.js';
export { createLogger, silentLogger } from './log.js';
export type { Logger, LogLevel } from './log.js';
export type { FetchLike } from './http.js';
export { buildAuthorizeUrl, exchangeAuthorizationCode, OAUTH_SCOPES } from './transports/open.js';
export type { SyncSnapshot } from './transports/session.js';
export { createServer } from './mcp/server.js';
