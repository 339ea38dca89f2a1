/**
 * End-to-end tests for the slipline command line, with stdout captured
 * in memory and files in a temporary directory.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { Writable } from 'node:stream';
import { main } from '../../src/cli/main.js';
import type { CliIo } from '../../src/cli/main.js';
import { encodeDocument } from '../../src/protocol/index.js';
import { append, bold, text, underlined } from '../../src/core/tree.js';

const ascii = (s: string): number[] => [...s].map((c) => c.charCodeAt(0));

interface Captured {
  io: CliIo;
  stdout: () => Buffer;
  logs: string[];
}

function capture(dir: string, env: NodeJS.ProcessEnv = {}): Captured {
  const chunks: Buffer[] = [];
  const logs: string[] = [];
  const stdout = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(Buffer.from(chunk));
      callback();
    },
  });
  return {
    io: { stdout, env, cwd: dir, home: dir, logSink: (line) => { logs.push(line); } },
    stdout: () => Buffer.concat(chunks),
    logs,
  };
}

describe('slipline CLI', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'slipline-cli-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('print', () => {
    it('prints plain text followed by a line feed', async () => {
      const c = capture(dir);
      expect(await main(['print', 'Hello', 'world'], c.io)).toBe(0);
      expect(c.stdout()).toEqual(Buffer.from([...ascii('Hello world'), 0x0a]));
      expect(c.logs).toEqual([]);
    });

    it('applies style flags', async () => {
      const c = capture(dir);
      expect(await main(['print', '--bold', '--underline', 'Hi'], c.io)).toBe(0);
      expect(c.stdout()).toEqual(Buffer.from([
        0x1b, 0x2d, 1, 0x1b, 0x45, 1, ...ascii('Hi'), 0x1b, 0x45, 0, 0x1b, 0x2d, 0, 0x0a,
      ]));
    });

    it('honours --no-newline and --init', async () => {
      const c = capture(dir);
      expect(await main(['--init', 'print', '--no-newline', 'x'], c.io)).toBe(0);
      expect(c.stdout()).toEqual(Buffer.from([0x1b, 0x40, 0x78]));
    });

    it('treats everything after -- as text', async () => {
      const c = capture(dir);
      expect(await main(['print', '--', '--bold'], c.io)).toBe(0);
      expect(c.stdout().toString()).toBe('--bold\n');
    });

    it('writes to the printer named by --printer', async () => {
      const out = join(dir, 'job.bin');
      const c = capture(dir);
      expect(await main(['print', '--printer', `file://${out}`, '--reverse', 'R'], c.io)).toBe(0);
      expect(await readFile(out)).toEqual(Buffer.from([0x1d, 0x42, 1, 0x52, 0x1d, 0x42, 0, 0x0a]));
      expect(c.stdout().length).toBe(0);
    });

    it('reads the printer from SLIPLINE_PRINTER', async () => {
      const out = join(dir, 'env.bin');
      const c = capture(dir, { SLIPLINE_PRINTER: `file://${out}` });
      expect(await main(['print', 'E'], c.io)).toBe(0);
      expect((await readFile(out)).toString()).toBe('E\n');
    });

    it('fails without text', async () => {
      const c = capture(dir);
      expect(await main(['print', '--bold'], c.io)).toBe(1);
      expect(c.logs).toEqual(['[slipline] error: Nothing to print']);
    });

    it('fails on an unknown option', async () => {
      const c = capture(dir);
      expect(await main(['print', '--italic', 'x'], c.io)).toBe(1);
      expect(c.logs).toEqual(['[slipline] error: Unknown option: --italic']);
    });

    it('fails on a bad printer URI', async () => {
      const c = capture(dir);
      expect(await main(['print', '--printer', 'tcp://host:0', 'x'], c.io)).toBe(1);
      expect(c.logs).toEqual(['[slipline] error: Invalid port "0" in "tcp://host:0"']);
    });
  });

  describe('send', () => {
    it('prints a spooled document', async () => {
      const doc = join(dir, 'receipt.cbor');
      await writeFile(doc, encodeDocument(append(bold(text('A')), underlined(text('B')))));

      const c = capture(dir);
      expect(await main(['send', doc], c.io)).toBe(0);
      expect(c.stdout()).toEqual(Buffer.from([
        0x1b, 0x45, 1, 0x41, 0x1b, 0x45, 0, 0x1b, 0x2d, 1, 0x42, 0x1b, 0x2d, 0, 0x0a,
      ]));
    });

    it('reports a malformed document', async () => {
      const doc = join(dir, 'bad.cbor');
      await writeFile(doc, Uint8Array.of(0x82, 0x02, 0x61, 0x78));

      const c = capture(dir);
      expect(await main(['send', doc], c.io)).toBe(1);
      expect(c.logs).toEqual(['[slipline] error: Unsupported document version: 2 at $[0]']);
    });

    it('rejects style flags', async () => {
      const c = capture(dir);
      expect(await main(['send', '--bold', 'x.cbor'], c.io)).toBe(1);
      expect(c.logs).toEqual(['[slipline] error: Unknown option: --bold']);
    });

    it('requires exactly one file', async () => {
      const c = capture(dir);
      expect(await main(['send'], c.io)).toBe(1);
      expect(c.logs).toEqual(['[slipline] error: send takes exactly one file argument']);
    });
  });

  describe('preview', () => {
    it('previews a document as ANSI text', async () => {
      const doc = join(dir, 'receipt.cbor');
      await writeFile(doc, encodeDocument(append(bold(text('Total')), text(' 5'))));

      const c = capture(dir);
      expect(await main(['preview', doc], c.io)).toBe(0);
      expect(c.stdout().toString()).toBe('\x1b[1mTotal\x1b[0m 5\n');
    });

    it('previews a raw command stream and warns about unknown commands', async () => {
      const raw = join(dir, 'job.bin');
      await writeFile(raw, Uint8Array.from([0x1b, 0x61, ...ascii('a\n'), 0x1d, 0x42, 1, ...ascii('b\n')]));

      const c = capture(dir);
      expect(await main(['preview', raw], c.io)).toBe(0);
      expect(c.stdout().toString()).toBe('a\n\x1b[7mb\x1b[0m\n');
      expect(c.logs).toEqual([`[slipline] warn: Skipped 1 unrecognized command(s) in ${raw}`]);
    });
  });

  describe('configuration', () => {
    it('loads slipline.config.json from the working directory', async () => {
      const out = join(dir, 'configured.bin');
      await writeFile(join(dir, 'slipline.config.json'), JSON.stringify({ printer: `file://${out}`, initialize: true }));

      const c = capture(dir);
      expect(await main(['print', 'C'], c.io)).toBe(0);
      expect(await readFile(out)).toEqual(Buffer.from([0x1b, 0x40, 0x43, 0x0a]));
    });

    it('logs at the configured level', async () => {
      const c = capture(dir);
      expect(await main(['--log-level', 'info', 'print', 'x'], c.io)).toBe(0);
      expect(c.logs).toEqual(['[slipline] info: Sending 2 bytes to stdout']);
    });

    it('reports a broken config file', async () => {
      const path = join(dir, 'broken.json');
      await writeFile(path, 'not json');

      const c = capture(dir);
      expect(await main(['--config', path, 'print', 'x'], c.io)).toBe(1);
      expect(c.logs).toEqual([`[slipline] error: Config file ${path} is not valid JSON`]);
    });
  });

  describe('usage', () => {
    it('prints help and succeeds with --help', async () => {
      const c = capture(dir);
      expect(await main(['--help'], c.io)).toBe(0);
      expect(c.stdout().toString()).toContain('slipline print [options] <text…>');
    });

    it('fails without a command', async () => {
      const c = capture(dir);
      expect(await main([], c.io)).toBe(1);
    });

    it('fails on an unknown command', async () => {
      const c = capture(dir);
      expect(await main(['scan'], c.io)).toBe(1);
      expect(c.logs).toEqual(['[slipline] error: Unknown command: scan']);
    });
  });
});
