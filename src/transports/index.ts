/**
 * Transport module index — default registry with all built-in transports.
 *
 * Usage:
 *   import { createDefaultRegistry } from './transports/index.js';
 *   const registry = createDefaultRegistry();
 *
 * The default registry includes:
 *   - net-socket: tcp://, unix://
 *   - file: file://, fd://
 *   - stdio: stdio:
 *
 * To add a custom transport:
 *   registry.registerConnector(myConnector);
 */

import { TransportRegistry } from '../core/transport-registry.js';
import { createNetSocketConnector } from './net-socket.js';
import { createFileConnector } from './file.js';
import { createStdioConnector } from './stdio.js';

/**
 * Create a registry pre-loaded with all built-in transports.
 */
export function createDefaultRegistry(): TransportRegistry {
  const registry = new TransportRegistry();

  // Net socket — tcp, unix
  registry.registerConnector(createNetSocketConnector());

  // Files and inherited descriptors — file, fd
  registry.registerConnector(createFileConnector());

  // Standard output — stdio
  registry.registerConnector(createStdioConnector());

  return registry;
}

export { TransportRegistry } from '../core/transport-registry.js';
export { NetSocketConnector, createNetSocketConnector } from './net-socket.js';
export { FileConnector, createFileConnector } from './file.js';
export { StdioConnector, createStdioConnector } from './stdio.js';
export { StreamConnection } from './stream.js';
export type { StreamConnectionOptions } from './stream.js';
export { MemoryConnection, createMemoryConnection } from './memory.js';
export type {
  PrinterConnection,
  TransportConnector,
  ConnectOptions,
  ConnectionInfo,
} from '../core/transport-api.js';
export { DEFAULT_CONNECT_TIMEOUT_MS } from '../core/transport-api.js';
