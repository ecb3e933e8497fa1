/**
 * File Logger -- server and per-connection debug logging with truncation.
 *
 * Layout:
 *   - Server log:  `~/.fsgate/logs/server.log` (or `--log-file`)
 *   - Session logs: `~/.fsgate/logs/sessions/fsgate-session-{sessionId}-{timestamp}.log`,
 *     one per socket connection accepted by the network listener
 *
 * stdout belongs to the stdio transport, so every mirrored line goes to stderr.
 *
 * Public API:
 *   - `getLogger()` -- server-level logger
 *   - `getRegistry()` -- the global LoggerRegistry (debug mode, session logs)
 *   - `createLog(prefix)` -- prefixed debug logger, silent unless debug mode is on
 *   - `warn(...)` -- always reaches stderr, and the server log in debug mode
 *
 * @module logger
 */

import fs from 'fs';
import path from 'path';
import os from 'os';

const LOG_ROOT = path.join(os.homedir(), '.fsgate', 'logs');
const DEFAULT_TRUNCATE_LEN = 120;

// ─── Types ──────────────────────────────────────────────────

/** Debug mode: false (off), 'truncate' (default debug), 'no_truncate' (full payloads). */
export type DebugMode = false | 'truncate' | 'no_truncate';

// ─── FileLogger ─────────────────────────────────────────────

/**
 * Synchronous, append-only file logger. Writes ISO-timestamped lines and
 * mirrors them to stderr. Truncates the log file on construction.
 */
export class FileLogger {
  logFilePath: string;
  enabled: boolean = false;
  private _truncate: boolean = true;

  constructor(logFilePath: string) {
    this.logFilePath = logFilePath;

    const logDir = path.dirname(this.logFilePath);
    if (!fs.existsSync(logDir)) {
      fs.mkdirSync(logDir, { recursive: true });
    }

    if (fs.existsSync(this.logFilePath)) {
      fs.truncateSync(this.logFilePath, 0);
    }
  }

  get truncate(): boolean {
    return this._truncate;
  }

  set truncate(value: boolean) {
    this._truncate = value;
  }

  enable(): void {
    this.enabled = true;
    this.log('[FileLogger] Logging enabled — writing to:', this.logFilePath);
  }

  disable(): void {
    this.enabled = false;
  }

  /** Append a timestamped log line. No-ops if logger is disabled. */
  log(...args: unknown[]): void {
    if (!this.enabled) return;

    const timestamp = new Date().toISOString();
    const message = args
      .map((arg) => this.formatArg(arg))
      .join(' ');

    fs.appendFileSync(this.logFilePath, `[${timestamp}] ${message}\n`, 'utf8');
    console.error(message);
  }

  /** Serialize an argument to a log-safe string, applying truncation if enabled. */
  private formatArg(arg: unknown): string {
    if (typeof arg === 'string') {
      return this._truncate ? truncateString(arg, DEFAULT_TRUNCATE_LEN) : arg;
    }
    if (arg instanceof Error) {
      return arg.message;
    }
    if (typeof arg === 'object' && arg !== null) {
      try {
        const json = JSON.stringify(arg, replacer, 2);
        return this._truncate ? truncateString(json, DEFAULT_TRUNCATE_LEN * 4) : json;
      } catch {
        return String(arg);
      }
    }
    return String(arg);
  }
}

// ─── Session-aware logger registry ──────────────────────────

/**
 * Manages the server logger and per-session loggers.
 * Propagates debug mode (and truncation setting) to all managed loggers.
 */
class LoggerRegistry {
  private serverLogger: FileLogger | null = null;
  private sessionLoggers = new Map<string, FileLogger>();
  private _debugMode: DebugMode = false;

  constructor(private readonly logRoot: string = LOG_ROOT) {}

  get debugMode(): DebugMode {
    return this._debugMode;
  }

  set debugMode(mode: DebugMode) {
    this._debugMode = mode;
    const truncate = mode !== 'no_truncate';
    if (this.serverLogger) this.serverLogger.truncate = truncate;
    for (const logger of this.sessionLoggers.values()) {
      logger.truncate = truncate;
    }
  }

  /** Get or create the server-level logger. */
  getServerLogger(customLogPath?: string): FileLogger {
    if (!this.serverLogger) {
      const logPath = customLogPath ?? path.join(this.logRoot, 'server.log');
      this.serverLogger = new FileLogger(logPath);
      this.serverLogger.truncate = this._debugMode !== 'no_truncate';
    }
    return this.serverLogger;
  }

  /** Create a session log file and return its logger. */
  setSessionLog(sessionId: string): FileLogger {
    this.clearSessionLog(sessionId);

    const ts = new Date().toISOString().replace(/[:.]/g, '-');
    const filename = `fsgate-session-${sanitizeFilename(sessionId)}-${ts}.log`;
    const logPath = path.join(this.logRoot, 'sessions', filename);

    const logger = new FileLogger(logPath);
    logger.truncate = this._debugMode !== 'no_truncate';
    if (this._debugMode) {
      logger.enable();
      logger.log(`[Session] Session "${sessionId}" started`);
    }
    this.sessionLoggers.set(sessionId, logger);
    return logger;
  }

  /** Close and remove a session logger. */
  clearSessionLog(sessionId: string): void {
    const logger = this.sessionLoggers.get(sessionId);
    if (logger) {
      logger.log(`[Session] Session "${sessionId}" ended`);
      logger.disable();
      this.sessionLoggers.delete(sessionId);
    }
  }

  /** Get session logger if it exists, otherwise fall back to server logger. */
  getLogger(sessionId?: string | null): FileLogger {
    if (sessionId) {
      const sessionLogger = this.sessionLoggers.get(sessionId);
      if (sessionLogger) return sessionLogger;
    }
    return this.getServerLogger();
  }

  /** Reset for testing. */
  reset(): void {
    this.serverLogger = null;
    this.sessionLoggers.clear();
    this._debugMode = false;
  }
}

const registry = new LoggerRegistry();

// ─── Public API ─────────────────────────────────────────────

/** Get the server-level logger. */
export function getLogger(customLogPath?: string): FileLogger {
  return registry.getServerLogger(customLogPath);
}

/** Get the global logger registry for session management. */
export function getRegistry(): LoggerRegistry {
  return registry;
}

/**
 * Factory for prefixed debug loggers.
 * Only outputs when debug mode is on.
 * If sessionId is provided, routes to that session's log file.
 */
export const createLog = (prefix: string, sessionId?: string | null) =>
  (...args: unknown[]): void => {
    if (registry.debugMode) registry.getLogger(sessionId).log(prefix, ...args);
  };

/** Operator-facing warning: stderr always, server log too when debugging. */
export function warn(prefix: string, ...args: unknown[]): void {
  if (registry.debugMode) {
    registry.getServerLogger().log(prefix, 'WARNING:', ...args);
    return;
  }
  console.error(prefix, 'WARNING:', ...args.map((arg) => (arg instanceof Error ? arg.message : arg)));
}

// ─── Truncation helpers ─────────────────────────────────────

/** Truncate a string, replacing the middle with "..." if over limit. */
function truncateString(str: string, maxLen: number): string {
  if (str.length <= maxLen) return str;
  const half = Math.floor((maxLen - 3) / 2);
  return str.slice(0, half) + '...' + str.slice(-half);
}

/** JSON.stringify replacer: collapses strings over 200 chars whose first 100 look like base64. */
function replacer(_key: string, value: unknown): unknown {
  if (typeof value === 'string' && value.length > 200 && /^[A-Za-z0-9+/=]+$/.test(value.slice(0, 100))) {
    return `[base64 ${value.length} chars]`;
  }
  return value;
}

/** Sanitize a string for use as a filename. */
function sanitizeFilename(name: string): string {
  return name.replace(/[^a-zA-Z0-9_-]/g, '_').slice(0, 64);
}

export { LoggerRegistry };
