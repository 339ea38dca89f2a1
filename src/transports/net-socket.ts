/**
 * Net socket transport — handles tcp:// and unix://.
 *
 * Network receipt printers accept raw command bytes on a TCP port
 * (9100 by convention); local spoolers usually listen on a Unix socket.
 * Both use Node's `net` module and differ only in the connect address.
 */

import * as net from 'node:net';
import type {
  PrinterConnection,
  TransportConnector,
  ConnectOptions,
} from '../core/transport-api.js';
import { DEFAULT_CONNECT_TIMEOUT_MS } from '../core/transport-api.js';
import type { PrinterScheme, PrinterAddress } from '../core/printer-uri.js';
import { PrinterUriError, describeAddress } from '../core/printer-uri.js';
import { StreamConnection } from './stream.js';

function resolveNetOptions(address: PrinterAddress): net.NetConnectOpts {
  switch (address.type) {
    case 'socket':
      return { path: address.path };
    case 'host':
      return { host: address.host, port: address.port };
    default:
      throw new PrinterUriError(`NetSocketConnector does not handle address type "${address.type}"`);
  }
}

export class NetSocketConnector implements TransportConnector {
  readonly schemes: PrinterScheme[] = ['tcp', 'unix'];

  async connect(
    address: PrinterAddress,
    options: ConnectOptions,
  ): Promise<PrinterConnection> {
    const scheme = options.uri.scheme;
    const netOpts = resolveNetOptions(address);

    return new Promise((resolve, reject) => {
      const socket = net.createConnection(netOpts);

      const timeout = options.timeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
      if (timeout > 0) {
        socket.setTimeout(timeout);
        socket.once('timeout', () => {
          socket.destroy(new Error(`Connection timeout after ${timeout}ms`));
        });
      }

      const onConnectError = (err: Error): void => {
        reject(err);
      };
      socket.once('error', onConnectError);

      socket.once('connect', () => {
        socket.setTimeout(0); // clear connect timeout
        socket.removeListener('error', onConnectError);
        resolve(new StreamConnection(socket, { scheme, remoteAddress: describeAddress(address) }));
      });
    });
  }
}

/** Create the net socket connector (handles tcp and unix). */
export function createNetSocketConnector(): NetSocketConnector {
  return new NetSocketConnector();
}
