/**
 * Printer configuration model.
 *
 * Unified configuration for the printing front ends, merged from
 * multiple sources: defaults → config file → env vars → CLI args.
 *
 * Front ends read this at startup to know:
 *   - Which printer URI to open
 *   - How long to wait for a network printer to accept the connection
 *   - Whether to reset the device before the first job
 *   - How much to log
 */

import { access, readFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { isLogLevel, LOG_LEVELS } from './log.js';
import type { LogLevel } from './log.js';
import { DEFAULT_PRINTER_URI } from './printer-uri.js';
import { DEFAULT_CONNECT_TIMEOUT_MS } from './transport-api.js';

// ── Configuration Schema ─────────────────────────────────────────

export interface PrinterConfig {
  /**
   * Printer URI. Selects a transport from the registry.
   *
   * Examples:
   *   "tcp://192.0.2.10:9100"
   *   "file:///dev/usb/lp0"
   *   "stdio:"
   */
  printer: string;

  /** Connect timeout for network printers, in ms. 0 = no timeout. */
  connectTimeoutMs: number;

  /** Send ESC @ before the first job. */
  initialize: boolean;

  /** Logging level. */
  logLevel: LogLevel;
}

// ── Defaults ─────────────────────────────────────────────────────

export const DEFAULT_CONFIG: PrinterConfig = {
  printer: DEFAULT_PRINTER_URI,
  connectTimeoutMs: DEFAULT_CONNECT_TIMEOUT_MS,
  initialize: false,
  logLevel: 'warn',
};

// ── Config Merging ───────────────────────────────────────────────

/**
 * Merge configuration from multiple sources.
 *
 * Sources are applied in order (later sources override earlier), on top
 * of DEFAULT_CONFIG. Fields a source leaves undefined are skipped.
 */
export function mergeConfigs(...sources: Partial<PrinterConfig>[]): PrinterConfig {
  let result: PrinterConfig = { ...DEFAULT_CONFIG };

  for (const source of sources) {
    result = mergeTwo(result, source);
  }

  return result;
}

function mergeTwo(base: PrinterConfig, override: Partial<PrinterConfig>): PrinterConfig {
  const result = { ...base };

  if (override.printer !== undefined) result.printer = override.printer;
  if (override.connectTimeoutMs !== undefined) result.connectTimeoutMs = override.connectTimeoutMs;
  if (override.initialize !== undefined) result.initialize = override.initialize;
  if (override.logLevel !== undefined) result.logLevel = override.logLevel;

  return result;
}

// ── CLI Argument Parsing ─────────────────────────────────────────

/**
 * Parse the common CLI flags into a partial PrinterConfig.
 *
 * Recognized flags:
 *   --printer <uri>          Printer URI
 *   --timeout <ms>           Connect timeout
 *   --init                   Initialize the printer first
 *   --log-level <level>      Logging level
 *   --config <path>          Config file path
 *   --help, -h               Show help
 *
 * Everything else is returned in `rest`, in order, for the subcommand.
 */
export interface ParsedCli {
  config: Partial<PrinterConfig>;
  configFilePath?: string;
  help: boolean;
  rest: string[];
}

export function parsePrinterArgs(argv: readonly string[]): ParsedCli {
  const config: Partial<PrinterConfig> = {};
  const rest: string[] = [];
  let configFilePath: string | undefined;
  let help = false;

  let i = 0;
  while (i < argv.length) {
    const arg = argv[i];

    switch (arg) {
      case '--printer':
        config.printer = takeValue(argv, ++i, arg);
        break;
      case '--timeout':
        config.connectTimeoutMs = parseTimeout(takeValue(argv, ++i, arg), arg);
        break;
      case '--init':
        config.initialize = true;
        break;
      case '--log-level':
        config.logLevel = parseLogLevel(takeValue(argv, ++i, arg), arg);
        break;
      case '--config':
        configFilePath = takeValue(argv, ++i, arg);
        break;
      case '--help':
      case '-h':
        help = true;
        break;
      default:
        rest.push(arg);
        break;
    }

    i++;
  }

  return { config, configFilePath, help, rest };
}

function takeValue(argv: readonly string[], index: number, flag: string): string {
  if (index >= argv.length) {
    throw new ConfigError(`Missing value for ${flag}`);
  }
  return argv[index];
}

function parseTimeout(value: unknown, source: string): number {
  const ms = typeof value === 'string' && /^\d+$/.test(value) ? Number(value) : value;
  if (typeof ms !== 'number' || !Number.isInteger(ms) || ms < 0) {
    throw new ConfigError(`Invalid connect timeout in ${source}: ${String(value)}`);
  }
  return ms;
}

function parseLogLevel(value: unknown, source: string): LogLevel {
  if (!isLogLevel(value)) {
    throw new ConfigError(
      `Invalid log level in ${source}: ${String(value)} (expected one of ${LOG_LEVELS.join(', ')})`,
    );
  }
  return value;
}

// ── Config File Loading ──────────────────────────────────────────

/**
 * Load a PrinterConfig from a JSON config file.
 *
 * Config files are plain JSON objects with any subset of the
 * PrinterConfig fields. Unknown fields are ignored.
 */
export async function loadConfigFile(path: string): Promise<Partial<PrinterConfig>> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (err) {
    throw new ConfigError(`Cannot read config file ${path}`, { cause: err });
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    throw new ConfigError(`Config file ${path} is not valid JSON`, { cause: err });
  }

  return validateConfig(raw, path);
}

/** Check a parsed JSON value against the PrinterConfig schema. */
export function validateConfig(raw: unknown, source: string): Partial<PrinterConfig> {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new ConfigError(`Config in ${source} must be a JSON object`);
  }

  const config: Partial<PrinterConfig> = {};
  const fields = new Map<string, unknown>(Object.entries(raw));

  const printer = fields.get('printer');
  if (printer !== undefined) {
    if (typeof printer !== 'string') {
      throw new ConfigError(`"printer" in ${source} must be a string`);
    }
    config.printer = printer;
  }

  const timeout = fields.get('connectTimeoutMs');
  if (timeout !== undefined) {
    config.connectTimeoutMs = parseTimeout(timeout, source);
  }

  const initialize = fields.get('initialize');
  if (initialize !== undefined) {
    if (typeof initialize !== 'boolean') {
      throw new ConfigError(`"initialize" in ${source} must be a boolean`);
    }
    config.initialize = initialize;
  }

  const logLevel = fields.get('logLevel');
  if (logLevel !== undefined) {
    config.logLevel = parseLogLevel(logLevel, source);
  }

  return config;
}

export interface ConfigEnvironment {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  home?: string;
}

/**
 * Search for a config file in standard locations.
 *
 * Checks (in order):
 *   1. SLIPLINE_CONFIG env var
 *   2. ./slipline.config.json (current directory)
 *   3. ~/.config/slipline/config.json (XDG)
 *
 * Returns the path of the first file found, or undefined.
 */
export async function findConfigFile(where: ConfigEnvironment = {}): Promise<string | undefined> {
  const env = where.env ?? process.env;

  const candidates: string[] = [];

  // Env var
  const envPath = env['SLIPLINE_CONFIG'];
  if (envPath) candidates.push(envPath);

  // Current directory
  candidates.push(join(where.cwd ?? process.cwd(), 'slipline.config.json'));

  // XDG config
  const xdgConfig = env['XDG_CONFIG_HOME'] || join(where.home ?? homedir(), '.config');
  candidates.push(join(xdgConfig, 'slipline', 'config.json'));

  for (const candidate of candidates) {
    if (await exists(candidate)) return candidate;
  }

  return undefined;
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

/** Settings carried by environment variables. */
export function envConfig(env: NodeJS.ProcessEnv = process.env): Partial<PrinterConfig> {
  const printer = env['SLIPLINE_PRINTER'];
  return printer ? { printer } : {};
}

// ── Full Resolution ──────────────────────────────────────────────

export interface ResolvedCli {
  config: PrinterConfig;
  /** The config file that was loaded, if any. */
  configFilePath?: string;
  help: boolean;
  rest: string[];
}

/**
 * Resolve the complete printer configuration from all sources.
 *
 * Merges: defaults → config file → env vars → CLI args
 */
export async function resolvePrinterConfig(
  argv: readonly string[] = process.argv.slice(2),
  where: ConfigEnvironment = {},
): Promise<ResolvedCli> {
  const cli = parsePrinterArgs(argv);

  const configFilePath = cli.configFilePath ?? await findConfigFile(where);
  const fileConfig = configFilePath ? await loadConfigFile(configFilePath) : {};

  return {
    config: mergeConfigs(fileConfig, envConfig(where.env), cli.config),
    configFilePath,
    help: cli.help,
    rest: cli.rest,
  };
}

// ── Error ────────────────────────────────────────────────────────

export class ConfigError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigError';
  }
}
