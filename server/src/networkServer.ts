/**
 * Network listener — MCP over WebSocket.
 *
 * An HTTP server answers plain GETs with a banner and upgrades WebSocket
 * requests. Each accepted socket gets its own MCP `Server` bound to the shared
 * backend, its own transport and (in debug mode) its own session log.
 * Sockets from addresses outside the allow-list are closed with 1008.
 *
 * @module networkServer
 */

import { randomUUID } from 'crypto';
import http from 'http';
import type { AddressInfo } from 'net';
import type { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { WebSocketServer, type WebSocket } from 'ws';

import type { FileServerBackend } from './backend';
import { errorMessage } from './errors';
import { IpFilter } from './ipFilter';
import { createLog, getRegistry, warn } from './logger';
import { createMcpServer, type ServerInfo } from './server';
import { WebSocketServerTransport } from './transport';

const log = createLog('[Network]');

/** Close code for connections refused by the address filter. */
export const POLICY_VIOLATION = 1008;

export interface NetworkServerOptions {
  host: string;
  port: number;
  allowedIPs: readonly string[];
  allowedSubnets: readonly string[];
  serverInfo: ServerInfo;
}

interface Session {
  socket: WebSocket;
  server: Server;
}

export class NetworkServer {
  private _httpServer: http.Server | null = null;
  private _wss: WebSocketServer | null = null;
  private readonly _sessions = new Map<string, Session>();
  private readonly _filter: IpFilter;

  constructor(
    private readonly backend: FileServerBackend,
    private readonly options: NetworkServerOptions
  ) {
    this._filter = new IpFilter(options.allowedIPs, options.allowedSubnets);
  }

  /** Bound address once listening; useful when started on port 0. */
  get address(): AddressInfo | null {
    const address = this._httpServer?.address();
    return address && typeof address === 'object' ? address : null;
  }

  get sessionCount(): number {
    return this._sessions.size;
  }

  async start(): Promise<void> {
    if (this._filter.open) {
      warn('[Network]', `listening on ${this.options.host}:${this.options.port} with no IP allow-list; any client that can reach it may connect`);
    }

    const httpServer = http.createServer((_req, res) => {
      res.writeHead(200, { 'Content-Type': 'text/plain' });
      res.end(`${this.options.serverInfo.name} MCP server ${this.options.serverInfo.version}\n`);
    });
    const wss = new WebSocketServer({ server: httpServer });
    this._httpServer = httpServer;
    this._wss = wss;

    wss.on('connection', (socket, request) => this.accept(socket, request.socket.remoteAddress));

    await new Promise<void>((resolve, reject) => {
      const onError = (error: Error): void => {
        log('HTTP server error:', error);
        reject(error);
      };
      httpServer.once('error', onError);
      httpServer.listen(this.options.port, this.options.host, () => {
        httpServer.off('error', onError);
        log(`Listening on ${this.options.host}:${this.address?.port ?? this.options.port}`);
        resolve();
      });
    });
  }

  async stop(): Promise<void> {
    log('Stopping listener');

    const sessions = [...this._sessions.values()];
    this._sessions.clear();
    await Promise.all(sessions.map((session) => session.server.close()));

    const wss = this._wss;
    this._wss = null;
    if (wss) {
      for (const client of wss.clients) client.terminate();
      await new Promise<void>((resolve) => wss.close(() => resolve()));
    }

    const httpServer = this._httpServer;
    this._httpServer = null;
    if (httpServer?.listening) {
      await new Promise<void>((resolve, reject) => {
        httpServer.close((error) => (error ? reject(error) : resolve()));
      });
    }
  }

  private accept(socket: WebSocket, remoteAddress: string | undefined): void {
    if (!this._filter.allows(remoteAddress)) {
      warn('[Network]', `rejected connection from ${remoteAddress ?? 'unknown address'}`);
      socket.close(POLICY_VIOLATION, 'Address not allowed');
      return;
    }

    const sessionId = randomUUID();
    const registry = getRegistry();
    if (registry.debugMode) {
      registry.setSessionLog(sessionId);
    }
    const sessionLog = createLog('[Session]', sessionId);
    sessionLog(`connected from ${remoteAddress ?? 'unknown address'}`);

    const server = createMcpServer(this.backend, this.options.serverInfo, sessionId);
    const transport = new WebSocketServerTransport(socket, sessionId);
    this._sessions.set(sessionId, { socket, server });

    server.onclose = () => {
      sessionLog('disconnected');
      this._sessions.delete(sessionId);
      registry.clearSessionLog(sessionId);
    };
    server.onerror = (error) => sessionLog('transport error:', error);

    server.connect(transport).catch((error: unknown) => {
      warn('[Network]', `failed to start session ${sessionId}: ${errorMessage(error)}`);
      this._sessions.delete(sessionId);
      socket.terminate();
    });
  }
}
