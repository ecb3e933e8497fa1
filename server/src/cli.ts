#!/usr/bin/env node
/**
 * fsgate MCP server — CLI entry point.
 *
 * Two transports:
 *   1. **stdio** (default) — the MCP client spawns the process and talks over stdin/stdout
 *   2. **network** (`--network`) — WebSocket listener, one MCP session per connection
 *
 * stdout carries protocol traffic in stdio mode, so everything else goes to stderr.
 *
 * @module cli
 */

import fs from 'fs';
import path from 'path';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { Command, InvalidArgumentError } from 'commander';
import { z } from 'zod';

import { FileServerBackend } from './backend';
import { ConfigError, DEFAULT_PORT, loadConfig, type CliOptions } from './config';
import { errorMessage } from './errors';
import { getLogger, getRegistry, type DebugMode } from './logger';
import { NetworkServer } from './networkServer';
import { createMcpServer, type ServerInfo } from './server';

const EXIT_WATCHDOG_MS = 5000;

interface CommandOptions extends CliOptions {
  debug?: boolean | string;
  logFile?: string;
}

function readVersion(): string {
  const packageJson = fs.readFileSync(path.join(__dirname, '..', 'package.json'), 'utf8');
  return z.object({ version: z.string() }).parse(JSON.parse(packageJson)).version;
}

const VERSION = readVersion();

/** Parse --debug value into a DebugMode. */
function parseDebugMode(value: unknown): DebugMode {
  if (value === 'no_truncate') return 'no_truncate';
  if (value) return 'truncate';
  return false;
}

function parsePort(value: string): number {
  const port = Number(value);
  if (!/^\d+$/.test(value) || port > 65535) {
    throw new InvalidArgumentError('Port must be an integer between 0 and 65535.');
  }
  return port;
}

function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value];
}

/**
 * Shut down on SIGINT/SIGTERM (and stdin close in stdio mode), with a 5s
 * forced exit in case shutdown hangs.
 */
function setupExitWatchdog(shutdown: () => Promise<void>, watchStdin: boolean): void {
  let cleanupStarted = false;
  const logger = getLogger();

  const cleanup = (): void => {
    if (cleanupStarted) return;
    cleanupStarted = true;
    logger.log('[cli] Shutting down...');

    setTimeout(() => {
      logger.log('[cli] Forcing exit after timeout');
      process.exit(0);
    }, EXIT_WATCHDOG_MS).unref();

    shutdown().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error('[cli] Shutdown failed:', errorMessage(error));
        process.exit(1);
      }
    );
  };

  if (watchStdin) process.stdin.on('close', cleanup);
  process.on('SIGINT', cleanup);
  process.on('SIGTERM', cleanup);
}

/** Boot the server: logging, configuration, backend, then the selected transport. */
async function main(directories: string[], options: CommandOptions): Promise<void> {
  const debugMode = parseDebugMode(options.debug);
  getRegistry().debugMode = debugMode;

  const logger = getLogger(options.logFile);
  if (debugMode) {
    logger.enable();
    logger.log('[cli] Starting fsgate MCP server');
    logger.log('[cli] Version:', VERSION);
    logger.log('[cli] Debug mode:', debugMode);
    logger.log('[cli] Log file:', logger.logFilePath);
  }

  const config = await loadConfig(directories, options);
  if (config.configPath) logger.log('[cli] Config file:', config.configPath);
  logger.log('[cli] Backup directory:', config.backupDir);

  const backend = await FileServerBackend.create({
    allowedDirectories: config.allowedDirectories,
    caseInsensitive: config.caseInsensitive,
    backupDir: config.backupDir,
  });
  const info: ServerInfo = { name: 'fsgate', version: VERSION };

  if (config.network.enabled) {
    const listener = new NetworkServer(backend, { ...config.network, serverInfo: info });
    await listener.start();
    console.error(`fsgate ${VERSION} listening on ws://${config.network.host}:${listener.address?.port ?? config.network.port}`);
    setupExitWatchdog(() => listener.stop(), false);
    return;
  }

  const server = createMcpServer(backend, info);
  await server.connect(new StdioServerTransport());
  logger.log('[cli] MCP server ready on stdio');
  setupExitWatchdog(() => server.close(), true);
}

// --- CLI setup ---

const program = new Command();

program
  .version('Version ' + VERSION)
  .name('fsgate')
  .description('MCP server giving sandboxed, undoable access to local directories')
  .argument('[directories...]', 'Allowed directories (added to those in the config file)')
  .option('--config <path>', 'Config file (default: ./fsgate.config.json when present)')
  .option('--backup-dir <path>', 'Where edit backups are kept (default: <tmpdir>/fsgate-backups)')
  .option('--case-insensitive', 'Compare paths case-insensitively (default on Windows)')
  .option('--network', 'Serve MCP over WebSocket instead of stdio')
  .option('--host <host>', 'Listener host (default: localhost)')
  .option('--port <number>', `Listener port (default: ${DEFAULT_PORT})`, parsePort)
  .option('--allow-ip <address>', 'Accept connections from this address (repeatable)', collect)
  .option('--allow-subnet <cidr>', 'Accept connections from this subnet (repeatable)', collect)
  .option('--debug [mode]', 'Enable debug logging. Use --debug=no_truncate for full payloads.')
  .option('--log-file <path>', 'Custom log file path')
  .action(async (directories: string[], options: CommandOptions) => {
    await main(directories, options);
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  if (error instanceof ConfigError) {
    console.error(`Configuration error: ${error.message}`);
  } else {
    console.error(`fsgate failed to start: ${errorMessage(error)}`);
  }
  process.exit(1);
});
