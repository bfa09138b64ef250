#!/usr/bin/env node
/**
 * This is the main entry point for the MCP server.
 *
 * `http` (the default) serves the app; `cleanup` sweeps expired sessions and client registrations
 * once and exits, for a cron job or scheduler to call; `migrate` creates the schema and exits.
 */
import { loadAppConfig } from '../config';
import { createAppContext } from '../context';
import { openDatabase } from '../db/database';
import { errorMessage } from '../lib/errors';
import { logger } from '../lib/logger';

import { McpServer } from './server';

async function main() {
  const command = process.argv[2] || 'http';
  const config = loadAppConfig();

  if (command === 'migrate') {
    // openDatabase applies the schema.
    openDatabase(config.databasePath, { busyTimeoutMs: config.databaseBusyTimeoutMs }).close();
    logger.info('Cli', 'Schema is up to date', { databasePath: config.databasePath });
    return;
  }

  if (command === 'cleanup') {
    const ctx = createAppContext(config);
    try {
      const sessions = await ctx.sessions.cleanupExpired();
      const clients = await ctx.clients.cleanupExpired();
      logger.info('Cli', 'Cleanup finished', { sessions, clients });
    } finally {
      await ctx.close();
    }
    return;
  }

  if (command === 'http') {
    const server = new McpServer(createAppContext(config));
    await server.startHttp(config.port);

    const shutdown = (signal: string) => {
      logger.info('Cli', `Received ${signal}, shutting down`);
      server.stop().catch((err) => {
        logger.error('Cli', 'Shutdown failed', { error: errorMessage(err) });
        process.exitCode = 1;
      });
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));
    return;
  }

  logger.error('Cli', `Unknown command: ${command}`, { expected: ['http', 'cleanup', 'migrate'] });
  process.exitCode = 1;
}

void main().catch((err) => {
  logger.error('Cli', 'Fatal error', { error: errorMessage(err) });
  process.exitCode = 1;
});
