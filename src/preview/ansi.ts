/**
 * Terminal renderings of an interpreted job.
 */

import type { StyleSet } from '../core/style.js';
import type { InterpretResult } from './interpreter.js';

// ── ANSI escape codes ──────────────────────────────────────────────

const CSI = '\x1b[';
const RESET = `${CSI}0m`;

/**
 * SGR parameters approximating a device style. Emphasis and double-strike
 * both map to bold; upside-down and rotated have no terminal equivalent.
 */
export function sgrCodes(style: StyleSet): number[] {
  const codes: number[] = [];
  if (style.bold || style.doubleStrike) codes.push(1);
  if (style.underline === 'single') codes.push(4);
  if (style.underline === 'double') codes.push(21);
  if (style.reverse) codes.push(7);
  return codes;
}

/** Lines with SGR styling; every styled segment is followed by a reset. */
export function toAnsi(result: InterpretResult): string {
  return result.lines
    .map((line) => line.segments
      .map((segment) => {
        const codes = sgrCodes(segment.style);
        if (codes.length === 0) return segment.text;
        return `${CSI}${codes.join(';')}m${segment.text}${RESET}`;
      })
      .join(''))
    .join('\n');
}

/** The printed text with all styling dropped, one line per printed line. */
export function textProjection(result: InterpretResult): string {
  return result.lines
    .map((line) => line.segments.map((segment) => segment.text).join(''))
    .join('\n');
}
