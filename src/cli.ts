#!/usr/bin/env node
import { Command } from 'commander';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { withTickTick, TickTickClient } from './client.js';
import { doctorReport, readEnv, settingsFromEnv } from './config.js';
import { loadEnvFiles } from './env.js';
import { isTickTickError } from './errors.js';
import { createLogger } from './log.js';
import { SERVER_VERSION, createServer } from './mcp/server.js';

loadEnvFiles();

const program = new Command();

program
  .name('ticktick-bridge')
  .description('One client over both TickTick APIs, served as MCP tools')
  .version(SERVER_VERSION);

program
  .command('doctor')
  .description('Check environment/config and print what is missing')
  .action(() => {
    const report = doctorReport();
    console.log('ticktick-bridge doctor');
    console.log('host:', report.host);
    if (report.missing.length) {
      console.log('\nMissing env vars:');
      for (const k of report.missing) console.log(`- ${k}`);
      process.exitCode = 2;
    } else {
      console.log('\nNo missing env vars detected.');
    }

    if (report.notes.length) {
      console.log('\nNotes:');
      for (const n of report.notes) console.log(`- ${n}`);
    }
  });

program
  .command('serve')
  .description('Run the MCP server on stdio')
  .action(async () => {
    const env = readEnv();
    const logger = createLogger(env.TICKTICK_LOG_LEVEL ?? 'info');
    const client = await TickTickClient.open(settingsFromEnv(env), { logger });
    const server = createServer(client, logger);

    let closing = false;
    const shutdown = (reason: string) => {
      if (closing) return;
      closing = true;
      logger.info(`shutting down (${reason})`);
      server
        .close()
        .then(() => client.close())
        .catch((e: unknown) => {
          logger.error('shutdown failed', e);
          process.exitCode = 1;
        });
    };

    server.server.onclose = () => shutdown('transport closed');
    for (const signal of ['SIGINT', 'SIGTERM'] as const) {
      process.once(signal, () => shutdown(signal));
    }

    await server.connect(new StdioServerTransport());
    logger.info('mcp server listening on stdio');
  });

program
  .command('sync')
  .description('Print the raw full-sync snapshot as JSON')
  .action(async () => {
    const env = readEnv();
    const logger = createLogger(env.TICKTICK_LOG_LEVEL ?? 'warn');
    const snapshot = await withTickTick(settingsFromEnv(env), (client) => client.fullSync(), { logger });
    console.log(JSON.stringify(snapshot, null, 2));
  });

program
  .command('whoami')
  .description('Log in to both APIs and print the account')
  .option('--format <format>', 'Output format: pretty|json', 'pretty')
  .action(async (opts: { format?: string }) => {
    const env = readEnv();
    const logger = createLogger(env.TICKTICK_LOG_LEVEL ?? 'warn');
    const [status, profile] = await withTickTick(
      settingsFromEnv(env),
      (client) => Promise.all([client.getStatus(), client.getProfile()]),
      { logger },
    );

    if (opts.format === 'json') {
      console.log(JSON.stringify({ status, profile }, null, 2));
      return;
    }
    console.log(`user:    ${profile.displayName ?? profile.username} (${status.username})`);
    console.log(`userId:  ${status.userId}`);
    console.log(`inbox:   ${status.inboxId}`);
    console.log(`pro:     ${status.isPro ? `yes${status.proEndsAt ? ` until ${status.proEndsAt}` : ''}` : 'no'}`);
  });

program.parseAsync(process.argv).catch((err: unknown) => {
  if (isTickTickError(err)) console.error(`${err.kind}: ${err.message}`);
  else console.error(err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
});
