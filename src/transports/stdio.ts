/**
 * Stdio transport — command bytes on standard output.
 *
 * Lets a job be piped into another tool (`slipline print … | nc host 9100`)
 * or redirected to a device. Standard output belongs to the process, so
 * closing the connection leaves it open.
 */

import type { Writable } from 'node:stream';
import type {
  PrinterConnection,
  TransportConnector,
  ConnectOptions,
} from '../core/transport-api.js';
import type { PrinterScheme, PrinterAddress } from '../core/printer-uri.js';
import { StreamConnection } from './stream.js';

export class StdioConnector implements TransportConnector {
  readonly schemes: PrinterScheme[] = ['stdio'];

  constructor(private output: Writable = process.stdout) {}

  async connect(
    _address: PrinterAddress,
    options: ConnectOptions,
  ): Promise<PrinterConnection> {
    return new StreamConnection(
      this.output,
      { scheme: options.uri.scheme, remoteAddress: 'stdout' },
      { ownsStream: false },
    );
  }
}

export function createStdioConnector(output?: Writable): StdioConnector {
  return new StdioConnector(output);
}
