/**
 * Transport API — the byte sinks a printer writes to.
 *
 * Each URI scheme (tcp, unix, file, fd, stdio) provides a
 * TransportConnector that opens a PrinterConnection. The transport
 * registry maps schemes to connectors.
 *
 * The transport layer deals in raw bytes — rendering and buffering happen
 * above this layer, in the Printer.
 */

import type { PrinterScheme, PrinterAddress, ParsedPrinterUri } from './printer-uri.js';

// ── Connection ───────────────────────────────────────────────────

/**
 * A live, write-only connection to a printer.
 *
 * Writes are delivered to the sink in call order. A write resolves once
 * the sink has accepted the bytes; it rejects when the sink fails or the
 * connection is closed.
 */
export interface PrinterConnection {
  /** Write bytes to the sink. */
  write(data: Uint8Array): Promise<void>;

  /** Register handler for errors raised by the sink outside a write. */
  onError(handler: (error: Error) => void): void;

  /** Register handler for connection close. */
  onClose(handler: () => void): void;

  /** Close the connection once pending writes have drained. */
  close(): Promise<void>;

  /** Whether the connection is currently open. */
  readonly connected: boolean;

  /** Metadata about this connection. */
  readonly info: ConnectionInfo;
}

export interface ConnectionInfo {
  /** The transport scheme used, or 'memory' for in-process sinks. */
  scheme: PrinterScheme | 'memory';
  /** Human-readable description of the sink. */
  remoteAddress: string;
  /** When the connection was established. */
  connectedAt: number;
}

// ── Connector ────────────────────────────────────────────────────

/**
 * Opens a connection to a printer. One implementation per transport scheme.
 */
export interface TransportConnector {
  /** Which scheme(s) this connector handles. */
  readonly schemes: PrinterScheme[];

  /** Open a connection to the sink at the given address. */
  connect(
    address: PrinterAddress,
    options: ConnectOptions,
  ): Promise<PrinterConnection>;
}

/** Connect timeout used when a caller sets none. */
export const DEFAULT_CONNECT_TIMEOUT_MS = 10_000;

export interface ConnectOptions {
  /** The original parsed URI (for scheme-specific params). */
  uri: ParsedPrinterUri;
  /** Connection timeout in ms. 0 = no timeout. */
  timeoutMs?: number;
}
