/**
 * Shared types for modular tool handlers.
 *
 * Defines {@link ToolSchema} (tool registration metadata),
 * {@link ToolContext} (what every handler receives) and
 * {@link defineTool}, which binds a zod argument schema to its handler.
 *
 * @module tools/types
 */

import { ToolSchema as McpToolSchema, type Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';

import type { EditManager } from '../editor/editManager';
import { InvalidArgumentError } from '../errors';
import type { FileManager } from '../filesystem/fileManager';
import type { PathValidator } from '../sandbox/pathValidator';

export type ToolInputSchema = Tool['inputSchema'];

/** Behaviour hints clients may use to decide on confirmation prompts. */
export interface ToolAnnotations {
  title?: string;
  readOnlyHint?: boolean;
  destructiveHint?: boolean;
  idempotentHint?: boolean;
}

/** MCP tool registration metadata, as returned by `tools/list`. */
export interface ToolSchema {
  /** Unique tool name, snake_case (e.g. `str_replace`). */
  name: string;
  /** Human-readable description shown to the agent. */
  description: string;
  /** JSON Schema describing the tool's arguments. */
  inputSchema: ToolInputSchema;
  annotations?: ToolAnnotations;
}

/** Services a handler may call. Paths must go through `validator` first. */
export interface ToolContext {
  validator: PathValidator;
  files: FileManager;
  editor: EditManager;
}

/**
 * What a handler produces: `text` for MCP content, `data` for raw-result
 * callers.
 */
export interface ToolResult {
  text: string;
  data: Record<string, unknown>;
}

export interface ToolDefinition {
  schema: ToolSchema;
  /** Decode `rawArgs` and run the handler. */
  run(ctx: ToolContext, rawArgs: unknown): Promise<ToolResult>;
}

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : 'arguments'}: ${issue.message}`)
    .join('; ');
}

export function defineTool<S extends z.ZodTypeAny>(spec: {
  name: string;
  description: string;
  args: S;
  annotations?: ToolAnnotations;
  handler: (ctx: ToolContext, args: z.output<S>) => Promise<ToolResult>;
}): ToolDefinition {
  const schema: ToolSchema = {
    name: spec.name,
    description: spec.description,
    inputSchema: McpToolSchema.shape.inputSchema.parse(zodToJsonSchema(spec.args)),
    ...(spec.annotations ? { annotations: spec.annotations } : {}),
  };

  return {
    schema,
    async run(ctx, rawArgs) {
      const parsed = spec.args.safeParse(rawArgs ?? {});
      if (!parsed.success) {
        throw new InvalidArgumentError(`Invalid arguments for ${spec.name}: ${describeIssues(parsed.error)}`);
      }
      return spec.handler(ctx, parsed.data);
    },
  };
}
