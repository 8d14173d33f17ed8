/**
 * Sandbox Protocol responder: Entry Point
 *
 * Stdio transport by default; FATHOM_TRANSPORT=ws listens on FATHOM_HOST:FATHOM_PORT.
 */

import { mkdir } from 'node:fs/promises';
import { loadEnvSafely } from '@fathom/shared/Utils/env.js';
import { Logger } from '@fathom/shared/Utils/logger.js';
import { getConfig } from './config.js';
import { startResponder } from './server.js';

const logger = new Logger('fathom');

async function main() {
  loadEnvSafely(import.meta.url);
  const config = getConfig();

  // Ensure sandbox and log directories exist
  await mkdir(config.sandboxDir, { recursive: true });
  await mkdir(config.logDir, { recursive: true });

  logger.info('Starting Sandbox Protocol responder', { transport: config.transport });
  logger.info(`Sandbox: ${config.sandboxDir}`);
  logger.info(`Logs: ${config.logDir}`);

  const server = await startResponder({ config });

  // Graceful shutdown: cancel everything still running
  let stopping = false;
  const shutdown = async (signal: string) => {
    if (stopping) return;
    stopping = true;
    logger.info('Shutting down', { signal });
    await server.close(`responder received ${signal}`);
    process.exit(0);
  };
  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        logger.error('Shutdown failed', error);
        process.exit(1);
      });
    });
  }

  if (config.transport === 'stdio') {
    await server.closed();
    logger.info('Peer closed stdin, exiting');
    await server.close();
    process.exit(0);
  }

  logger.info(`Sandbox Protocol responder listening on ws://${config.host}:${server.port() ?? config.port}`);
}

main().catch((error) => {
  logger.error('Fatal error', error);
  process.exit(1);
});
