/**
 * In-memory transport — collects written bytes, no I/O.
 *
 * Used for testing, for previews, and anywhere a job should be rendered
 * and inspected rather than sent. Writes are accepted synchronously.
 */

import { concatBytes } from '../core/bytes.js';
import type { PrinterConnection, ConnectionInfo } from '../core/transport-api.js';

export class MemoryConnection implements PrinterConnection {
  private errorHandlers: Array<(error: Error) => void> = [];
  private closeHandlers: Array<() => void> = [];
  private _connected = true;
  private _chunks: Uint8Array[] = [];

  readonly info: ConnectionInfo;

  constructor(label = 'memory') {
    this.info = {
      scheme: 'memory',
      remoteAddress: label,
      connectedAt: Date.now(),
    };
  }

  get connected(): boolean {
    return this._connected;
  }

  /** Every chunk written so far, in order. */
  get chunks(): readonly Uint8Array[] {
    return this._chunks;
  }

  /** Everything written so far as one array. */
  bytes(): Uint8Array {
    return concatBytes(this._chunks);
  }

  async write(data: Uint8Array): Promise<void> {
    if (!this._connected) throw new Error('Connection is closed');
    this._chunks.push(Uint8Array.from(data));
  }

  /** Simulate a sink failure reported outside a write. */
  fail(error: Error): void {
    for (const handler of this.errorHandlers) {
      handler(error);
    }
  }

  onError(handler: (error: Error) => void): void {
    this.errorHandlers.push(handler);
  }

  onClose(handler: () => void): void {
    this.closeHandlers.push(handler);
  }

  async close(): Promise<void> {
    if (!this._connected) return;
    this._connected = false;
    for (const handler of this.closeHandlers) {
      handler();
    }
  }
}

export function createMemoryConnection(label?: string): MemoryConnection {
  return new MemoryConnection(label);
}
