/**
 * File transport — handles file:// and fd://.
 *
 * USB and parallel receipt printers show up as character devices
 * (e.g. /dev/usb/lp0) that accept raw bytes; fd:// writes to a
 * descriptor inherited from the parent process. Plain files work too,
 * which is handy for capturing a job.
 */

import * as fs from 'node:fs';
import type {
  PrinterConnection,
  TransportConnector,
  ConnectOptions,
} from '../core/transport-api.js';
import type { PrinterScheme, PrinterAddress } from '../core/printer-uri.js';
import { PrinterUriError, describeAddress } from '../core/printer-uri.js';
import { StreamConnection } from './stream.js';

export class FileConnector implements TransportConnector {
  readonly schemes: PrinterScheme[] = ['file', 'fd'];

  async connect(
    address: PrinterAddress,
    options: ConnectOptions,
  ): Promise<PrinterConnection> {
    const scheme = options.uri.scheme;

    if (address.type === 'fd') {
      // The descriptor is already open; no 'open' event follows.
      const stream = fs.createWriteStream('', { fd: address.fd });
      return new StreamConnection(stream, { scheme, remoteAddress: describeAddress(address) });
    }

    if (address.type !== 'file') {
      throw new PrinterUriError(`FileConnector requires address type "file" or "fd", got "${address.type}"`);
    }

    const stream = fs.createWriteStream(address.path, { flags: address.append ? 'a' : 'w' });
    await new Promise<void>((resolve, reject) => {
      stream.once('open', () => {
        stream.removeListener('error', reject);
        resolve();
      });
      stream.once('error', reject);
    });
    return new StreamConnection(stream, { scheme, remoteAddress: describeAddress(address) });
  }
}

export function createFileConnector(): FileConnector {
  return new FileConnector();
}
