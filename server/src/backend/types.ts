/**
 * Shared types for the backend module.
 *
 * Kept apart from backend.ts so the MCP server factory and the network
 * listener can depend on the response shapes without importing the tools.
 *
 * @module backend/types
 */

import type { FsGateErrorCode } from '../errors';

/** Codes reported at the tool boundary: the classified ones plus two catch-alls. */
export type ToolErrorCode = FsGateErrorCode | 'UNKNOWN_TOOL' | 'IO_ERROR';

export interface CallToolOptions {
  /** Return plain objects instead of MCP content wrappers. */
  rawResult?: boolean;
}

export type TextContent = {
  type: 'text';
  text: string;
};

/** MCP `tools/call` result body. */
export type McpToolResponse = {
  content: TextContent[];
  isError?: boolean;
};

export type RawToolResponse =
  | ({ success: true } & Record<string, unknown>)
  | { success: false; error: ToolErrorCode; message: string };

export interface BackendOptions {
  /** Directories the tools may touch; resolved with `PathValidator.create`. */
  allowedDirectories: readonly string[];
  caseInsensitive: boolean;
  backupDir: string;
  /** Live edit records kept for undo. */
  historyCapacity?: number;
}
