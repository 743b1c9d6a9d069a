#!/usr/bin/env node

/**
 * Starts the registry server: reads DAP_REGISTRY_PROFILES (or the bundled
 * lldb profile), registers it, then serves MCP on stdio. Stdout belongs to
 * the transport, so every diagnostic goes through the stderr logger and a
 * crash exits with status 1.
 */

import { log } from './logging.js';

function fail(context: string, detail: string): never {
  log(`${context}: ${detail}`);
  process.exit(1);
}

process.on('uncaughtException', (error) => {
  fail('Uncaught exception', error.stack ?? error.message);
});

process.on('unhandledRejection', (reason) => {
  fail(
    'Unhandled rejection',
    reason instanceof Error ? reason.stack ?? reason.message : String(reason)
  );
});

// Loaded lazily so a bad profile or missing dependency is logged, not silent
async function main(): Promise<void> {
  try {
    const { startServer } = await import('./server.js');
    await startServer();
  } catch (error) {
    fail(
      'Failed to start',
      error instanceof Error ? error.stack ?? error.message : String(error)
    );
  }
}

void main();
