/**
 * Transport Registry — maps URI schemes to connector implementations.
 *
 * Usage:
 *   const registry = createDefaultRegistry();
 *   const conn = await registry.connect('tcp://192.0.2.10:9100');
 *   await conn.write(bytes);
 */

import type {
  TransportConnector,
  PrinterConnection,
  ConnectOptions,
} from './transport-api.js';
import type { PrinterScheme } from './printer-uri.js';
import { parsePrinterUri, resolveAddress, PrinterUriError } from './printer-uri.js';

export class TransportRegistry {
  private connectors = new Map<PrinterScheme, TransportConnector>();

  /**
   * Register a transport connector.
   * A single connector can handle multiple schemes (e.g., tcp + unix).
   * Registering a scheme again replaces the previous connector.
   */
  registerConnector(connector: TransportConnector): void {
    for (const scheme of connector.schemes) {
      this.connectors.set(scheme, connector);
    }
  }

  /** Get the connector for a scheme, or undefined if not registered. */
  getConnector(scheme: PrinterScheme): TransportConnector | undefined {
    return this.connectors.get(scheme);
  }

  /** List all registered connector schemes. */
  get connectorSchemes(): PrinterScheme[] {
    return [...this.connectors.keys()];
  }

  /**
   * Connect to a printer using a URI string.
   *
   * Parses the URI, looks up the connector for the scheme, and opens
   * a connection. Throws if the scheme is not registered.
   */
  async connect(
    printerUri: string,
    options?: Partial<ConnectOptions>,
  ): Promise<PrinterConnection> {
    const parsed = parsePrinterUri(printerUri);
    const address = resolveAddress(parsed);

    const connector = this.connectors.get(parsed.scheme);
    if (!connector) {
      throw new PrinterUriError(
        `No connector registered for scheme "${parsed.scheme}". ` +
        `Available: ${[...this.connectors.keys()].join(', ') || 'none'}`,
      );
    }

    return connector.connect(address, {
      uri: parsed,
      timeoutMs: options?.timeoutMs,
    });
  }
}

/**
 * Create a new empty registry. Call registerConnector() to add transports.
 *
 * For a registry pre-loaded with built-in transports, use
 * createDefaultRegistry() from src/transports/index.ts.
 */
export function createRegistry(): TransportRegistry {
  return new TransportRegistry();
}
