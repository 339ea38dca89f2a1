/**
 * Stream connection — PrinterConnection over any Node Writable.
 *
 * Shared by every stream-backed transport: sockets, file and fd write
 * streams, and stdout. Writes resolve from the stream's write callback,
 * so a caller that awaits each write never outruns the sink.
 */

import type { Writable } from 'node:stream';
import type { PrinterConnection, ConnectionInfo } from '../core/transport-api.js';

export interface StreamConnectionOptions {
  /**
   * Whether close() ends the underlying stream. False for streams the
   * process owns, such as stdout.
   */
  ownsStream?: boolean;
}

export class StreamConnection implements PrinterConnection {
  private errorHandlers: Array<(error: Error) => void> = [];
  private closeHandlers: Array<() => void> = [];
  private _connected = true;
  private readonly ownsStream: boolean;

  readonly info: ConnectionInfo;

  constructor(
    private stream: Writable,
    info: Omit<ConnectionInfo, 'connectedAt'>,
    options: StreamConnectionOptions = {},
  ) {
    this.info = { ...info, connectedAt: Date.now() };
    this.ownsStream = options.ownsStream ?? true;

    stream.on('error', (err: Error) => {
      for (const handler of this.errorHandlers) {
        handler(err);
      }
    });

    stream.on('close', () => {
      this.markClosed();
    });
  }

  get connected(): boolean {
    return this._connected && !this.stream.destroyed;
  }

  write(data: Uint8Array): Promise<void> {
    if (!this.connected) {
      return Promise.reject(new Error('Connection is closed'));
    }
    return new Promise((resolve, reject) => {
      this.stream.write(data, (err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  onError(handler: (error: Error) => void): void {
    this.errorHandlers.push(handler);
  }

  onClose(handler: () => void): void {
    this.closeHandlers.push(handler);
  }

  async close(): Promise<void> {
    if (!this._connected) return;
    if (this.ownsStream && !this.stream.destroyed) {
      await new Promise<void>((resolve) => {
        this.stream.end(() => resolve());
      });
    }
    this.markClosed();
  }

  private markClosed(): void {
    if (!this._connected) return;
    this._connected = false;
    for (const handler of this.closeHandlers) {
      handler();
    }
  }
}
