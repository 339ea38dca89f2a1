/**
 * Printer URI parsing and target resolution.
 *
 * A printer is addressed by a URI naming the byte sink its commands are
 * written to:
 *
 *   tcp://192.0.2.10:9100        raw TCP port printing (JetDirect style)
 *   unix:///run/printer.sock     local spooler socket
 *   file:///dev/usb/lp0          device node or plain file
 *   fd://3                       inherited file descriptor
 *   stdio:                       standard output
 *
 * The SLIPLINE_PRINTER environment variable selects the default target.
 */

// ── Schemes ──────────────────────────────────────────────────────

export type PrinterScheme = 'tcp' | 'unix' | 'file' | 'fd' | 'stdio';

const ALL_SCHEMES = new Set<string>(['tcp', 'unix', 'file', 'fd', 'stdio']);

function isPrinterScheme(scheme: string): scheme is PrinterScheme {
  return ALL_SCHEMES.has(scheme);
}

/** Conventional raw printing port. */
export const RAW_PRINT_PORT = 9100;

export const DEFAULT_PRINTER_URI = 'stdio:';

// ── Addresses ────────────────────────────────────────────────────

/**
 * Parsed sink address — varies by scheme.
 */
export type PrinterAddress =
  | { type: 'host'; host: string; port: number }     // tcp
  | { type: 'socket'; path: string }                 // unix
  | { type: 'file'; path: string; append: boolean }  // file
  | { type: 'fd'; fd: number }                       // fd
  | { type: 'none' };                                // stdio

export interface ParsedPrinterUri {
  scheme: PrinterScheme;
  authority: string;
  path: string;
  params: Record<string, string>;
  raw: string;
}

/** A fully resolved printer target. */
export interface PrinterTarget {
  scheme: PrinterScheme;
  /** The original URI string. */
  uri: string;
  address: PrinterAddress;
  params: Record<string, string>;
}

// ── Parser ───────────────────────────────────────────────────────

/**
 * Parse a printer URI string into its components.
 *
 * Handles both authority-based (tcp://host:port) and opaque (stdio:) URIs.
 * Throws on unrecognized schemes.
 */
export function parsePrinterUri(uri: string): ParsedPrinterUri {
  const raw = uri.trim();

  const colonIdx = raw.indexOf(':');
  if (colonIdx === -1) {
    throw new PrinterUriError(`Invalid printer URI: missing scheme in "${raw}"`);
  }

  const scheme = raw.substring(0, colonIdx);
  if (!isPrinterScheme(scheme)) {
    throw new PrinterUriError(`Unknown printer scheme: "${scheme}"`);
  }

  const rest = raw.substring(colonIdx + 1);

  const qIdx = rest.indexOf('?');
  const params = parseQueryParams(qIdx !== -1 ? rest.substring(qIdx + 1) : '', raw);
  const beforeQuery = qIdx !== -1 ? rest.substring(0, qIdx) : rest;

  let authority = '';
  let path = '';

  if (beforeQuery.startsWith('//')) {
    const afterSlashes = beforeQuery.substring(2);
    const slashIdx = afterSlashes.indexOf('/');
    if (slashIdx === -1) {
      authority = afterSlashes;
    } else {
      authority = afterSlashes.substring(0, slashIdx);
      path = afterSlashes.substring(slashIdx);
    }
  } else {
    path = beforeQuery;
  }

  path = decodeComponent(path, raw);

  return { scheme, authority, path, params, raw };
}

function parseQueryParams(query: string, raw: string): Record<string, string> {
  const params: Record<string, string> = {};
  if (!query) return params;
  for (const pair of query.split('&')) {
    const eqIdx = pair.indexOf('=');
    if (eqIdx === -1) {
      params[decodeComponent(pair, raw)] = 'true';
    } else {
      params[decodeComponent(pair.substring(0, eqIdx), raw)] =
        decodeComponent(pair.substring(eqIdx + 1), raw);
    }
  }
  return params;
}

function decodeComponent(component: string, raw: string): string {
  try {
    return decodeURIComponent(component);
  } catch (err) {
    throw new PrinterUriError(`Invalid percent-encoding "${component}" in "${raw}"`, { cause: err });
  }
}

// ── Address Resolution ───────────────────────────────────────────

/**
 * Resolve a parsed URI into a typed sink address.
 */
export function resolveAddress(parsed: ParsedPrinterUri): PrinterAddress {
  switch (parsed.scheme) {
    case 'tcp':
      return parseHostPort(parsed);

    case 'unix': {
      // unix:///path/to/socket or unix://path (authority as path fallback)
      const path = parsed.path || (parsed.authority ? `/${parsed.authority}` : '');
      if (!path) {
        throw new PrinterUriError(`Missing socket path in "${parsed.raw}"`);
      }
      return { type: 'socket', path };
    }

    case 'file': {
      if (parsed.authority && parsed.authority !== 'localhost') {
        throw new PrinterUriError(`Remote file hosts are not supported in "${parsed.raw}"`);
      }
      if (!parsed.path) {
        throw new PrinterUriError(`Missing file path in "${parsed.raw}"`);
      }
      return { type: 'file', path: parsed.path, append: parsed.params['append'] === 'true' };
    }

    case 'fd': {
      const source = parsed.authority || parsed.path;
      const fd = /^\d+$/.test(source) ? parseInt(source, 10) : NaN;
      if (isNaN(fd)) {
        throw new PrinterUriError(`Invalid file descriptor in "${parsed.raw}"`);
      }
      return { type: 'fd', fd };
    }

    case 'stdio':
      return { type: 'none' };
  }
}

function parseHostPort(parsed: ParsedPrinterUri): PrinterAddress {
  const authority = parsed.authority;
  if (!authority) {
    throw new PrinterUriError(`Missing host in "${parsed.raw}"`);
  }

  // IPv6: [::1]:port or [::1]
  let host: string;
  let portStr: string | undefined;
  if (authority.startsWith('[')) {
    const bracketEnd = authority.indexOf(']');
    if (bracketEnd === -1) {
      throw new PrinterUriError(`Malformed IPv6 address in "${parsed.raw}"`);
    }
    host = authority.substring(1, bracketEnd);
    const afterBracket = authority.substring(bracketEnd + 1);
    portStr = afterBracket.startsWith(':') ? afterBracket.substring(1) : undefined;
  } else {
    const lastColon = authority.lastIndexOf(':');
    if (lastColon === -1) {
      host = authority;
    } else {
      host = authority.substring(0, lastColon);
      portStr = authority.substring(lastColon + 1);
    }
  }

  if (!host) {
    throw new PrinterUriError(`Missing host in "${parsed.raw}"`);
  }

  if (portStr === undefined) {
    return { type: 'host', host, port: RAW_PRINT_PORT };
  }

  const port = /^\d+$/.test(portStr) ? parseInt(portStr, 10) : NaN;
  if (isNaN(port) || port < 1 || port > 65535) {
    throw new PrinterUriError(`Invalid port "${portStr}" in "${parsed.raw}"`);
  }

  return { type: 'host', host, port };
}

// ── Target Resolution ────────────────────────────────────────────

export interface ResolveOptions {
  /** Override for the SLIPLINE_PRINTER env var (for testing). */
  printer?: string;
}

/**
 * Resolve the printer target from an explicit URI or the environment.
 * Falls back to standard output when nothing is configured.
 */
export function resolvePrinterTarget(options: ResolveOptions = {}): PrinterTarget {
  const configured = options.printer ?? process.env['SLIPLINE_PRINTER'];
  const uri = configured === undefined || configured.trim() === '' ? DEFAULT_PRINTER_URI : configured;

  const parsed = parsePrinterUri(uri);
  return {
    scheme: parsed.scheme,
    uri: parsed.raw,
    address: resolveAddress(parsed),
    params: parsed.params,
  };
}

/**
 * Get a human-readable description of a sink address.
 */
export function describeAddress(addr: PrinterAddress): string {
  switch (addr.type) {
    case 'host': return addr.host.includes(':') ? `[${addr.host}]:${addr.port}` : `${addr.host}:${addr.port}`;
    case 'socket': return addr.path;
    case 'file': return addr.append ? `${addr.path} (append)` : addr.path;
    case 'fd': return `fd ${addr.fd}`;
    case 'none': return 'stdout';
  }
}

// ── Error ────────────────────────────────────────────────────────

export class PrinterUriError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PrinterUriError';
  }
}
