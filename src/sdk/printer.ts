/**
 * Printer — buffers rendered output and hands it to a connection.
 *
 *   const printer = await connectPrinter('tcp://192.0.2.10:9100', { initialize: true });
 *   printer.println(styled('TOTAL').bold()).println('Thank you');
 *   await printer.close();
 *
 * Building a job is synchronous; bytes only leave the process on flush()
 * or close(). A failed flush keeps the job pending so it can be retried
 * against the same or a reconnected sink.
 */

import { ByteBuffer } from '../core/bytes.js';
import { Initialize, LineFeed } from '../core/commands.js';
import { silentLogger } from '../core/log.js';
import { PrinterUriError } from '../core/printer-uri.js';
import type { Logger } from '../core/log.js';
import { render } from '../core/render.js';
import type { TransportRegistry } from '../core/transport-registry.js';
import type { PrinterConnection } from '../core/transport-api.js';
import type { Command } from '../core/types.js';
import { createDefaultRegistry } from '../transports/index.js';
import { toNode } from './styled.js';
import type { Printable } from './styled.js';

export interface PrinterOptions {
  logger?: Logger;
}

export class Printer {
  private pending = new ByteBuffer();
  /** Tail of the flush chain. Never rejects. */
  private flushing: Promise<void> = Promise.resolve();
  private readonly logger: Logger;

  constructor(
    readonly connection: PrinterConnection,
    options: PrinterOptions = {},
  ) {
    this.logger = options.logger ?? silentLogger;

    connection.onError((err) => {
      this.logger.error(`Printer ${connection.info.remoteAddress} failed: ${err.message}`);
    });
    connection.onClose(() => {
      this.logger.debug(`Printer ${connection.info.remoteAddress} closed`);
    });
  }

  /** Size of the unflushed buffer in bytes. */
  get pendingBytes(): number {
    return this.pending.length;
  }

  send(command: Command): this {
    this.pending.push(command.encode());
    return this;
  }

  /** Queue bytes verbatim. */
  sendRaw(bytes: Uint8Array): this {
    this.pending.push(Uint8Array.from(bytes));
    return this;
  }

  /** Queue rendered content, leaving the device at the baseline style. */
  print(content: Printable): this {
    this.pending.push(render(toNode(content)));
    return this;
  }

  println(content: Printable = ''): this {
    return this.print(content).send(new LineFeed());
  }

  /** Queue ESC @, resetting every mode on the device. */
  initialize(): this {
    return this.send(new Initialize());
  }

  /**
   * Write everything pending as one chunk. On failure the bytes stay
   * pending and a PrinterIoError is thrown.
   *
   * Flushes run one at a time in call order, so a failed write is always
   * requeued before a later flush takes the buffer.
   */
  flush(): Promise<void> {
    const run = this.flushing.then(() => this.writePending());
    // The chain only orders the writes; each caller gets its own outcome from `run`.
    this.flushing = run.catch(() => undefined);
    return run;
  }

  /**
   * Flush, then close the connection. The connection is closed even when
   * the flush fails; the flush error is the one thrown.
   */
  async close(): Promise<void> {
    let flushFailed = false;
    let flushError: unknown;
    try {
      await this.flush();
    } catch (err) {
      flushFailed = true;
      flushError = err;
    }

    try {
      await this.connection.close();
    } catch (err) {
      const closeError = new PrinterIoError(`Failed to close ${this.connection.info.remoteAddress}`, { cause: err });
      if (!flushFailed) throw closeError;
      this.logger.error(closeError.message, err);
    }

    if (flushFailed) throw flushError;
  }

  private async writePending(): Promise<void> {
    if (this.pending.length === 0) return;
    if (!this.connection.connected) {
      throw new PrinterIoError(`Printer ${this.connection.info.remoteAddress} is not connected`);
    }

    const bytes = this.pending.toBytes();
    this.pending.clear();
    try {
      await this.connection.write(bytes);
    } catch (err) {
      // Put the job back ahead of anything queued during the write.
      const queuedMeanwhile = this.pending.toBytes();
      this.pending.clear();
      this.pending.push(bytes);
      this.pending.push(queuedMeanwhile);
      this.logger.error(`Write to ${this.connection.info.remoteAddress} failed`, err);
      throw new PrinterIoError(
        `Failed to write ${bytes.length} bytes to ${this.connection.info.remoteAddress}`,
        { cause: err },
      );
    }
    this.logger.debug(`Flushed ${bytes.length} bytes to ${this.connection.info.remoteAddress}`);
  }
}

// ── Connecting ───────────────────────────────────────────────────

export interface ConnectPrinterOptions extends PrinterOptions {
  /** Registry to look the scheme up in. Defaults to the built-in transports. */
  registry?: TransportRegistry;
  /** Connect timeout for network printers, in ms. */
  timeoutMs?: number;
  /** Queue ESC @ ahead of anything else. */
  initialize?: boolean;
}

/**
 * Open a connection to the printer at `uri` and wrap it in a Printer.
 * URI errors surface as PrinterUriError; a sink that cannot be opened
 * surfaces as PrinterIoError.
 */
export async function connectPrinter(uri: string, options: ConnectPrinterOptions = {}): Promise<Printer> {
  const registry = options.registry ?? createDefaultRegistry();
  const logger = options.logger ?? silentLogger;

  let connection: PrinterConnection;
  try {
    connection = await registry.connect(uri, { timeoutMs: options.timeoutMs });
  } catch (err) {
    if (err instanceof PrinterUriError) throw err;
    throw new PrinterIoError(`Failed to connect to ${uri}`, { cause: err });
  }

  logger.debug(`Connected to ${connection.info.remoteAddress} via ${connection.info.scheme}`);

  const printer = new Printer(connection, { logger });
  if (options.initialize) printer.initialize();
  return printer;
}

// ── Error ────────────────────────────────────────────────────────

export class PrinterIoError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'PrinterIoError';
  }
}
