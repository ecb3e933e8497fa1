/**
 * MCP server factory: one SDK `Server` per session, all sharing a backend.
 *
 * @module server
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';

import type { FileServerBackend } from './backend';
import { createLog } from './logger';

export interface ServerInfo {
  name: string;
  version: string;
}

export function createMcpServer(backend: FileServerBackend, info: ServerInfo, sessionId?: string): Server {
  const log = createLog('[MCP]', sessionId);

  const server = new Server(
    { name: info.name, version: info.version },
    { capabilities: { tools: {} } }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    log('tools/list');
    return { tools: backend.listTools() };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    log(`tools/call ${name}`);
    return backend.callTool(name, args ?? {});
  });

  return server;
}
