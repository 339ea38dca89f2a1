/**
 * Core slipline types.
 *
 * These types are the shared language between the style model, the
 * renderer, the printer layer, and the preview interpreter.
 */

import type { StyleSet } from './style.js';

// ── Control bytes ──────────────────────────────────────────────────

/** Escape — starts most ESC/POS commands. */
export const ESC = 0x1b;
/** Group Separator — starts GS commands. */
export const GS = 0x1d;
/** Line Feed. */
export const LF = 0x0a;

// ── Attributes ─────────────────────────────────────────────────────

/** Underline level. Ordered: none < single < double. */
export type Underline = 'none' | 'single' | 'double';

/** The boolean print attributes. */
export type FlagAttribute = 'bold' | 'doubleStrike' | 'reverse' | 'upsideDown' | 'rotated';

export type Attribute = FlagAttribute | 'underline';

/**
 * Canonical attribute order. Transitions always visit attributes in this
 * order so identical style pairs produce identical bytes.
 */
export const ATTRIBUTE_ORDER: readonly Attribute[] = [
  'bold',
  'underline',
  'doubleStrike',
  'reverse',
  'upsideDown',
  'rotated',
];

export const FLAG_ATTRIBUTES: readonly FlagAttribute[] = [
  'bold',
  'doubleStrike',
  'reverse',
  'upsideDown',
  'rotated',
];

/** Plain-object view of a StyleSet. */
export interface StyleAttrs {
  bold: boolean;
  doubleStrike: boolean;
  reverse: boolean;
  upsideDown: boolean;
  rotated: boolean;
  underline: Underline;
}

// ── Styled text tree ───────────────────────────────────────────────

export interface TextNode {
  readonly kind: 'text';
  readonly content: string;
}

export interface GroupNode {
  readonly kind: 'group';
  readonly style: StyleSet;
  readonly children: readonly StyledNode[];
}

export type StyledNode = TextNode | GroupNode;

// ── Commands ───────────────────────────────────────────────────────

/** A command that can be sent to the printer. */
export interface Command {
  encode(): Uint8Array;
}
