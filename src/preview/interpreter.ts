/**
 * Command stream interpreter.
 *
 * Replays a printer byte stream against a model of the device and
 * records what would come out: lines of text, each split into segments
 * that share one effective style. Used by the preview front end and by
 * tests that want to assert on what a job looks like rather than on raw
 * bytes.
 *
 * Only the character-formatting commands this package emits are
 * understood. Any other ESC or GS sequence is assumed to take one
 * command byte, is skipped, and is counted in `unknownCommands`.
 */

import { ESC, GS, LF } from '../core/types.js';
import type { Underline } from '../core/types.js';
import { StyleSet } from '../core/style.js';

const CR = 0x0d;

// ── Result model ─────────────────────────────────────────────────

export interface PreviewSegment {
  text: string;
  style: StyleSet;
}

export interface PreviewLine {
  segments: PreviewSegment[];
}

export interface InterpretResult {
  /** Printed lines. A trailing line without LF is included if non-empty. */
  lines: PreviewLine[];
  /** Device style after the last byte. */
  finalStyle: StyleSet;
  /** Recognized ESC/GS commands. */
  commandCount: number;
  /** ESC/GS sequences that were skipped. */
  unknownCommands: number;
}

// ── Parameter decoding ───────────────────────────────────────────

/** On/off parameters only look at the lowest bit. */
function flagParam(n: number): boolean {
  return (n & 1) === 1;
}

/** `ESC - n` accepts both 0-2 and ASCII '0'-'2'. */
function underlineParam(n: number): Underline {
  switch (n) {
    case 1:
    case 0x31:
      return 'single';
    case 2:
    case 0x32:
      return 'double';
    default:
      return 'none';
  }
}

/** `ESC V n`: 1 and 2 both turn rotation on (they differ in dot spacing). */
function rotationParam(n: number): boolean {
  return n === 1 || n === 2 || n === 0x31 || n === 0x32;
}

// ── Interpreter ──────────────────────────────────────────────────

class Replay {
  readonly lines: PreviewLine[] = [];
  style = StyleSet.DEFAULT;
  commandCount = 0;
  unknownCommands = 0;

  private segments: PreviewSegment[] = [];
  private run: number[] = [];
  private readonly decoder = new TextDecoder('utf-8');

  /** Add one printable byte under the current style. */
  pushByte(byte: number): void {
    this.run.push(byte);
  }

  /** Change style, closing the text run that was printed under the old one. */
  setStyle(next: StyleSet): void {
    if (next.equals(this.style)) return;
    this.closeRun();
    this.style = next;
  }

  lineFeed(): void {
    this.closeRun();
    this.lines.push({ segments: this.segments });
    this.segments = [];
  }

  finish(): void {
    this.closeRun();
    if (this.segments.length > 0) {
      this.lines.push({ segments: this.segments });
      this.segments = [];
    }
  }

  private closeRun(): void {
    if (this.run.length === 0) return;
    const text = this.decoder.decode(Uint8Array.from(this.run));
    this.run = [];

    const last = this.segments[this.segments.length - 1];
    if (last !== undefined && last.style.equals(this.style)) {
      last.text += text;
    } else {
      this.segments.push({ text, style: this.style });
    }
  }
}

/**
 * Interpret a command stream from the power-on state.
 *
 * Pure: the input is not modified.
 */
export function interpretStream(bytes: Uint8Array): InterpretResult {
  const replay = new Replay();

  let i = 0;
  while (i < bytes.length) {
    const byte = bytes[i];

    if (byte === LF) {
      replay.lineFeed();
      i += 1;
      continue;
    }

    if (byte === CR) {
      i += 1;
      continue;
    }

    if (byte !== ESC && byte !== GS) {
      replay.pushByte(byte);
      i += 1;
      continue;
    }

    // Truncated sequence at the end of the stream.
    if (i + 1 >= bytes.length) {
      replay.unknownCommands += 1;
      break;
    }

    const consumed = byte === ESC
      ? escCommand(replay, bytes, i)
      : gsCommand(replay, bytes, i);

    if (consumed > 0) {
      replay.commandCount += 1;
      i += consumed;
    } else {
      replay.unknownCommands += 1;
      i += 2;
    }
  }

  replay.finish();

  return {
    lines: replay.lines,
    finalStyle: replay.style,
    commandCount: replay.commandCount,
    unknownCommands: replay.unknownCommands,
  };
}

/** Apply an ESC sequence starting at `at`. Returns bytes consumed, or 0 if unrecognized. */
function escCommand(replay: Replay, bytes: Uint8Array, at: number): number {
  const code = bytes[at + 1];

  if (code === 0x40) {
    replay.setStyle(StyleSet.DEFAULT);
    return 2;
  }

  if (at + 2 >= bytes.length) return 0;
  const n = bytes[at + 2];
  const style = replay.style;

  switch (code) {
    case 0x45:
      replay.setStyle(style.withBold(flagParam(n)));
      return 3;
    case 0x2d:
      replay.setStyle(style.withUnderline(underlineParam(n)));
      return 3;
    case 0x47:
      replay.setStyle(style.withDoubleStrike(flagParam(n)));
      return 3;
    case 0x7b:
      replay.setStyle(style.withUpsideDown(flagParam(n)));
      return 3;
    case 0x56:
      replay.setStyle(style.withRotated(rotationParam(n)));
      return 3;
    default:
      return 0;
  }
}

/** Apply a GS sequence starting at `at`. Returns bytes consumed, or 0 if unrecognized. */
function gsCommand(replay: Replay, bytes: Uint8Array, at: number): number {
  const code = bytes[at + 1];
  if (code !== 0x42 || at + 2 >= bytes.length) return 0;

  replay.setStyle(replay.style.withReverse(flagParam(bytes[at + 2])));
  return 3;
}
