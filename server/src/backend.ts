/**
 * FileServerBackend — tool registry and dispatch.
 *
 * Owns the sandbox, the file manager and the editor, and is shared by every
 * MCP session (stdio, or each network connection). Tool handlers live in
 * `tools/files.ts` and `tools/editing.ts`; this module decodes nothing itself
 * and only turns handler outcomes into MCP content or raw JSON.
 *
 * Errors never cross the protocol as exceptions: every failure becomes an
 * `isError` text block `Error [CODE]: message`.
 *
 * @module backend
 */

import { EditManager } from './editor/editManager';
import { errorMessage, isFsGateError } from './errors';
import { FileManager } from './filesystem/fileManager';
import { createLog } from './logger';
import { PathValidator } from './sandbox/pathValidator';
import { editingTools } from './tools/editing';
import { fileTools } from './tools/files';
import type { ToolContext, ToolDefinition, ToolResult, ToolSchema } from './tools/types';

export type {
  BackendOptions,
  CallToolOptions,
  McpToolResponse,
  RawToolResponse,
  ToolErrorCode,
} from './backend/types';
import type {
  BackendOptions,
  CallToolOptions,
  McpToolResponse,
  RawToolResponse,
  ToolErrorCode,
} from './backend/types';

const log = createLog('[Backend]');

export const ALL_TOOLS: readonly ToolDefinition[] = [...fileTools, ...editingTools];

export class FileServerBackend {
  readonly context: ToolContext;
  private readonly tools: ReadonlyMap<string, ToolDefinition>;

  constructor(context: ToolContext, tools: readonly ToolDefinition[] = ALL_TOOLS) {
    this.context = context;
    this.tools = new Map(tools.map((tool) => [tool.schema.name, tool]));
  }

  /** Resolve the allowed roots, prepare the backup directory and wire up the tools. */
  static async create(options: BackendOptions): Promise<FileServerBackend> {
    const validator = await PathValidator.create(options.allowedDirectories, {
      caseInsensitive: options.caseInsensitive,
    });
    const editor = await EditManager.create({
      backupDir: options.backupDir,
      capacity: options.historyCapacity,
    });
    log(`Allowed directories: ${validator.roots.join(', ')}`);
    return new FileServerBackend({ validator, files: new FileManager(validator), editor });
  }

  listTools(): ToolSchema[] {
    return [...this.tools.values()].map((tool) => tool.schema);
  }

  /**
   * Dispatch a tool call.
   * @param options.rawResult - return `{ success, ... }` objects instead of MCP content
   */
  async callTool(name: string, rawArguments?: unknown, options?: { rawResult?: false }): Promise<McpToolResponse>;
  async callTool(name: string, rawArguments: unknown, options: { rawResult: true }): Promise<RawToolResponse>;
  async callTool(
    name: string,
    rawArguments: unknown = {},
    options: CallToolOptions = {}
  ): Promise<McpToolResponse | RawToolResponse> {
    log(`callTool(${name})`);

    const tool = this.tools.get(name);
    if (!tool) {
      return this.error('UNKNOWN_TOOL', `Unknown tool: ${name}`, options);
    }

    try {
      const result = await tool.run(this.context, rawArguments);
      return this.formatResult(result, options);
    } catch (error) {
      log(`Tool error (${name}):`, errorMessage(error));
      const code: ToolErrorCode = isFsGateError(error) ? error.code : 'IO_ERROR';
      return this.error(code, errorMessage(error), options);
    }
  }

  // ─── Helpers ────────────────────────────────────────────────

  private formatResult(result: ToolResult, options: CallToolOptions): McpToolResponse | RawToolResponse {
    if (options.rawResult) return { ...result.data, success: true };
    return { content: [{ type: 'text', text: result.text }] };
  }

  private error(code: ToolErrorCode, message: string, options: CallToolOptions): McpToolResponse | RawToolResponse {
    if (options.rawResult) return { success: false, error: code, message };
    return {
      content: [{ type: 'text', text: `Error [${code}]: ${message}` }],
      isError: true,
    };
  }
}
