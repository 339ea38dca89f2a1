/**
 * slipline command line.
 *
 * Usage:
 *   slipline print [style flags] <text…>     Print one styled line
 *   slipline send <document.cbor>            Print a spooled document
 *   slipline preview <file>                  Show a job in the terminal
 *
 * Printer bytes go to the configured printer (stdout by default);
 * diagnostics go to stderr.
 */

import { readFile } from 'node:fs/promises';
import type { Writable } from 'node:stream';
import { createLogger } from '../core/log.js';
import type { Logger, LogSink } from '../core/log.js';
import { ConfigError, resolvePrinterConfig } from '../core/printer-config.js';
import type { PrinterConfig } from '../core/printer-config.js';
import { renderLine } from '../core/render.js';
import { treeDepth } from '../core/tree.js';
import type { StyledNode } from '../core/types.js';
import { decodeDocument } from '../protocol/index.js';
import { interpretStream, toAnsi } from '../preview/index.js';
import { connectPrinter } from '../sdk/printer.js';
import { styled } from '../sdk/styled.js';
import type { Styled } from '../sdk/styled.js';
import { createDefaultRegistry, createStdioConnector } from '../transports/index.js';

// ── I/O ──────────────────────────────────────────────────────────

/** Where the CLI reads its environment from and writes to. */
export interface CliIo {
  stdout: Writable;
  env: NodeJS.ProcessEnv;
  cwd: string;
  /** Home directory for the ~/.config fallback; the user's when unset. */
  home?: string;
  /** Receives log lines; stderr when unset. */
  logSink?: LogSink;
}

function defaultIo(): CliIo {
  return { stdout: process.stdout, env: process.env, cwd: process.cwd() };
}

const USAGE = `
slipline — styled text for receipt printers

Usage:
  slipline print [options] <text…>
  slipline send [options] <document.cbor>
  slipline preview [options] <file>

Style options (print):
  --bold               Emphasized
  --underline          Single underline
  --double-underline   Double underline
  --reverse            White on black
  --double-strike      Double-strike
  --upside-down        Upside-down
  --rotated            Rotated 90°
  --no-newline         Do not end with a line feed (print, send)

Options:
  --printer <uri>      tcp://host[:port], unix:///path, file:///path, fd://N, stdio:
  --config <path>      Config file (default: slipline.config.json)
  --timeout <ms>       Connect timeout for network printers
  --log-level <level>  silent, error, warn, info, debug
  --init               Send ESC @ before the job
  --help, -h           Show this help
`;

// ── Style flags ──────────────────────────────────────────────────

const STYLE_FLAGS: Record<string, (s: Styled) => Styled> = {
  '--bold': (s) => s.bold(),
  '--underline': (s) => s.underlined(),
  '--double-underline': (s) => s.doubleUnderlined(),
  '--reverse': (s) => s.reversed(),
  '--double-strike': (s) => s.doubleStrike(),
  '--upside-down': (s) => s.upsideDown(),
  '--rotated': (s) => s.rotated(),
};

interface CommandArgs {
  styles: Array<(s: Styled) => Styled>;
  newline: boolean;
  positional: string[];
}

function parseCommandArgs(args: readonly string[], allowStyles: boolean): CommandArgs {
  const parsed: CommandArgs = { styles: [], newline: true, positional: [] };
  let literal = false;

  for (const arg of args) {
    if (literal || !arg.startsWith('--')) {
      parsed.positional.push(arg);
    } else if (arg === '--') {
      literal = true;
    } else if (arg === '--no-newline') {
      parsed.newline = false;
    } else {
      const style = allowStyles ? STYLE_FLAGS[arg] : undefined;
      if (style === undefined) throw new ConfigError(`Unknown option: ${arg}`);
      parsed.styles.push(style);
    }
  }

  return parsed;
}

function singleFile(args: CommandArgs, command: string): string {
  if (args.positional.length !== 1) {
    throw new ConfigError(`${command} takes exactly one file argument`);
  }
  return args.positional[0];
}

// ── Commands ─────────────────────────────────────────────────────

interface Context {
  config: PrinterConfig;
  io: CliIo;
  logger: Logger;
}

async function output(ctx: Context, node: StyledNode, newline: boolean): Promise<void> {
  const registry = createDefaultRegistry();
  registry.registerConnector(createStdioConnector(ctx.io.stdout));

  const printer = await connectPrinter(ctx.config.printer, {
    registry,
    timeoutMs: ctx.config.connectTimeoutMs,
    initialize: ctx.config.initialize,
    logger: ctx.logger,
  });

  if (newline) printer.println(node);
  else printer.print(node);

  ctx.logger.info(`Sending ${printer.pendingBytes} bytes to ${printer.connection.info.remoteAddress}`);
  await printer.close();
}

async function printCommand(ctx: Context, rest: readonly string[]): Promise<void> {
  const args = parseCommandArgs(rest, true);
  if (args.positional.length === 0) throw new ConfigError('Nothing to print');

  let line = styled(args.positional.join(' '));
  for (const apply of args.styles) {
    line = apply(line);
  }

  await output(ctx, line.node, args.newline);
}

async function readDocument(ctx: Context, path: string): Promise<StyledNode> {
  const node = decodeDocument(await readFile(path));
  ctx.logger.debug(`Decoded ${path}: depth ${treeDepth(node)}`);
  return node;
}

async function sendCommand(ctx: Context, rest: readonly string[]): Promise<void> {
  const args = parseCommandArgs(rest, false);
  const node = await readDocument(ctx, singleFile(args, 'send'));
  await output(ctx, node, args.newline);
}

async function previewCommand(ctx: Context, rest: readonly string[]): Promise<void> {
  const args = parseCommandArgs(rest, false);
  const path = singleFile(args, 'preview');

  const bytes = path.endsWith('.cbor')
    ? renderLine(await readDocument(ctx, path))
    : await readFile(path);

  const result = interpretStream(bytes);
  ctx.logger.debug(`${result.commandCount} commands, ${result.lines.length} lines`);
  if (result.unknownCommands > 0) {
    ctx.logger.warn(`Skipped ${result.unknownCommands} unrecognized command(s) in ${path}`);
  }

  ctx.io.stdout.write(`${toAnsi(result)}\n`);
}

const COMMANDS: Record<string, (ctx: Context, rest: readonly string[]) => Promise<void>> = {
  print: printCommand,
  send: sendCommand,
  preview: previewCommand,
};

// ── Main ─────────────────────────────────────────────────────────

/**
 * Run the CLI. Resolves to the process exit code: 0 on success,
 * 1 on any error (logged at error level).
 */
export async function main(argv: readonly string[], io: CliIo = defaultIo()): Promise<number> {
  let logger = createLogger('warn', io.logSink);

  try {
    const resolved = await resolvePrinterConfig(argv, { env: io.env, cwd: io.cwd, home: io.home });
    logger = createLogger(resolved.config.logLevel, io.logSink);
    if (resolved.configFilePath) logger.debug(`Loaded config from ${resolved.configFilePath}`);

    const [name, ...rest] = resolved.rest;
    if (resolved.help || name === undefined) {
      io.stdout.write(USAGE);
      return resolved.help ? 0 : 1;
    }

    const command = COMMANDS[name];
    if (command === undefined) throw new ConfigError(`Unknown command: ${name}`);

    await command({ config: resolved.config, io, logger }, rest);
    return 0;
  } catch (err) {
    logger.error(err instanceof Error ? err.message : String(err));
    return 1;
  }
}
