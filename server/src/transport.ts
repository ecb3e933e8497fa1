/**
 * MCP transport over an accepted WebSocket: one JSON-RPC message per text frame.
 *
 * @module transport
 */

import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { JSONRPCMessageSchema, type JSONRPCMessage } from '@modelcontextprotocol/sdk/types.js';
import { WebSocket, type RawData } from 'ws';

function rawDataToString(data: RawData): string {
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  return Buffer.from(data).toString('utf8');
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

export class WebSocketServerTransport implements Transport {
  onclose?: () => void;
  onerror?: (error: Error) => void;
  onmessage?: (message: JSONRPCMessage) => void;

  private _started = false;
  private _closed = false;

  constructor(private readonly socket: WebSocket, readonly sessionId?: string) {}

  async start(): Promise<void> {
    if (this._started) {
      throw new Error('WebSocketServerTransport already started');
    }
    this._started = true;

    this.socket.on('message', (data, isBinary) => this.handleFrame(data, isBinary));
    this.socket.on('error', (error) => this.onerror?.(error));
    this.socket.on('close', () => this.handleClose());
  }

  async send(message: JSONRPCMessage): Promise<void> {
    if (this.socket.readyState !== WebSocket.OPEN) {
      throw new Error('WebSocket is not open');
    }
    await new Promise<void>((resolve, reject) => {
      this.socket.send(JSON.stringify(message), (error) => (error ? reject(error) : resolve()));
    });
  }

  async close(): Promise<void> {
    if (this.socket.readyState === WebSocket.OPEN || this.socket.readyState === WebSocket.CONNECTING) {
      this.socket.close(1000, 'Server closing');
    }
    this.handleClose();
  }

  private handleFrame(data: RawData, isBinary: boolean): void {
    if (isBinary) {
      this.onerror?.(new Error('Binary frames are not supported'));
      return;
    }

    let message: JSONRPCMessage;
    try {
      message = JSONRPCMessageSchema.parse(JSON.parse(rawDataToString(data)));
    } catch (error) {
      this.onerror?.(toError(error));
      return;
    }
    this.onmessage?.(message);
  }

  private handleClose(): void {
    if (this._closed) return;
    this._closed = true;
    this.onclose?.();
  }
}
