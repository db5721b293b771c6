/**
 * Filesystem MCP Server — Entry Point
 *
 * Loads the configuration, registers the filesystem tools and serves
 * JSON-RPC on stdio until stdin closes. Exits with status 1 when the
 * configuration is invalid.
 *
 * Tools (14):
 *   readFile, writeFile, listDirectory, searchFiles, normalizePath,
 *   copyFile, moveFile, deleteFile, createDirectory, executeScript,
 *   getAllowedDirectories, isSymlinksAllowed, watchDirectory,
 *   pollDirectoryWatch
 */

import { errorMessage } from '../../_shared/ts/errors';
import { componentLogger } from '../../_shared/ts/logger';
import { ConfigError, loadConfig } from './config';
import type { GatewayConfig } from './config';
import { createFilesystemServer } from './server';

const log = componentLogger('main');

// ─── Configuration ──────────────────────────────────────────────────────────

function configure(): GatewayConfig | null {
  try {
    return loadConfig();
  } catch (err) {
    if (err instanceof ConfigError) {
      log.error(err.message);
      return null;
    }
    throw err;
  }
}

// ─── Start ──────────────────────────────────────────────────────────────────

async function main(): Promise<number> {
  const config = configure();
  if (config === null) return 1;

  log.info('Configuration loaded', {
    allowedDirectories: config.allowedDirectories,
    writeEnabled: config.writeEnabled,
    symlinksAllowed: config.symlinksAllowed,
    maxFileSizeMb: config.maxFileSizeMb,
    pathStyle: config.pathStyle,
    scriptCommands: config.scriptCommands,
  });

  const server = createFilesystemServer(config);
  const stats = await server.start();
  log.info('stdin closed, exiting', { ...stats });
  return 0;
}

// ─── Graceful Shutdown ──────────────────────────────────────────────────────

process.on('SIGINT', () => process.exit(0));
process.on('SIGTERM', () => process.exit(0));

main().then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    log.error(`Fatal: ${errorMessage(err)}`);
    process.exitCode = 1;
  },
);
