#!/usr/bin/env node
/**
 * core/server.ts
 *
 * The single entry point. Orchestrates startup in order:
 *   1. Load environment variables from .env
 *   2. Parse CLI args → determine transport mode
 *   3. Load session config (CLI > env > config/session.json > defaults)
 *   4. Initialise the logger
 *   5. Load TSDs from config/tsds/
 *   6. Import all tool modules (triggers self-registration)
 *   7. Initialise the registry with the TSD loader
 *   8. Start the selected transport
 */

import * as dotenv from 'dotenv';
dotenv.config();

import { Server } from 'http';
import { initLogger, scopedLogger } from './logger';
import { parseCli, loadSessionConfig } from './config';
import { registry } from './registry';
import { TsdLoader } from './tsd/loader';
import { listHooks } from './hooks';
import { errorMessage } from './errors';
import { startStdioTransport } from '../transports/stdio';
import { createHttpTransport } from '../transports/http';

const log = scopedLogger('core/server');

const SHUTDOWN_TIMEOUT_MS = 5000;

let httpServer: Server | null = null;

async function gracefulShutdown(signal: string): Promise<void> {
  log.info({ signal }, 'Received shutdown signal, starting graceful shutdown');

  const server = httpServer;
  if (server) {
    const closed = new Promise<void>(resolve => {
      server.close(() => resolve());
    });
    const timeout = new Promise<'timeout'>(resolve => {
      setTimeout(() => resolve('timeout'), SHUTDOWN_TIMEOUT_MS).unref();
    });
    if (await Promise.race([closed, timeout]) === 'timeout') {
      log.warn('Shutdown timeout reached, forcing exit');
    }
  }

  log.info('Graceful shutdown complete');
  process.exit(0);
}

function onSignal(signal: NodeJS.Signals): void {
  gracefulShutdown(signal).catch((e: unknown) => {
    log.error({ error: errorMessage(e) }, 'Shutdown failed');
    process.exit(1);
  });
}

async function main(): Promise<void> {
  const sessionConfig = loadSessionConfig({ cli: parseCli(process.argv.slice(2)) });

  initLogger(sessionConfig);
  log.info({ transport: sessionConfig.transportMode, port: sessionConfig.port }, 'PC Toolkit server starting');

  const tsdLoader = new TsdLoader();
  tsdLoader.load();

  // Tool modules register themselves on import
  await import('../tools/index');
  const { readPackageInfo } = await import('../tools/toolkit');

  registry.init(sessionConfig, tsdLoader);
  log.info({ toolCount: registry.list().length, hooks: listHooks() }, 'Tool registry initialised');

  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);

  switch (sessionConfig.transportMode) {
    case 'stdio':
      startStdioTransport(registry, readPackageInfo());
      break;

    case 'http': {
      const port = sessionConfig.port ?? 3000;
      httpServer = createHttpTransport(registry).listen(port, () => {
        log.info({ port }, 'HTTP server listening');
      });
      // Long cleanups (Disk Cleanup, large temp folders) can take a while
      httpServer.setTimeout(120000);
      httpServer.keepAliveTimeout = 65000;
      break;
    }
  }
}

main().catch((e: unknown) => {
  log.fatal({ error: errorMessage(e), stack: e instanceof Error ? e.stack : undefined }, 'Fatal error during startup');
  process.exit(1);
});
