/**
 * Styled document encoding for spooling print jobs.
 *
 * A document is a styled text tree serialised as CBOR so it can be
 * written to a spool file or handed to another process, then rendered
 * later against a concrete printer.
 *
 * Wire format: `[version, node]` as a CBOR array, where node is
 *   - a CBOR text string for a text leaf, or
 *   - `[flags, underline, ...children]` for a group.
 *
 * Flags is a bitmask of the boolean attributes (FLAG_BITS); underline is
 * 0 (none), 1 (single) or 2 (double). Small integers encode in one byte.
 *
 * Documents nest at most MAX_DOCUMENT_DEPTH levels, counting the leaves.
 */

import { encode, decode } from 'cborg';
import { StyleSet } from '../core/style.js';
import { group, text, treeDepth } from '../core/tree.js';
import { FLAG_ATTRIBUTES } from '../core/types.js';
import type { FlagAttribute, StyledNode, Underline } from '../core/types.js';

export const DOCUMENT_VERSION = 1;

export const MAX_DOCUMENT_DEPTH = 1024;

export const FLAG_BITS: Record<FlagAttribute, number> = {
  bold: 1 << 0,
  doubleStrike: 1 << 1,
  reverse: 1 << 2,
  upsideDown: 1 << 3,
  rotated: 1 << 4,
};

const ALL_FLAGS = 0b11111;

const UNDERLINE_CODES: readonly Underline[] = ['none', 'single', 'double'];

type EncodedNode = string | [number, number, ...EncodedNode[]];

// ── Codec ──────────────────────────────────────────────────────

export class DocumentCodec {
  readonly version = DOCUMENT_VERSION;

  /** Throws DocumentEncodeError for trees nested deeper than MAX_DOCUMENT_DEPTH. */
  encode(node: StyledNode): Uint8Array {
    const depth = treeDepth(node);
    if (depth > MAX_DOCUMENT_DEPTH) {
      throw new DocumentEncodeError(`Tree depth ${depth} exceeds ${MAX_DOCUMENT_DEPTH} levels`);
    }
    return encode([DOCUMENT_VERSION, this.encodeNode(node)]);
  }

  /** Decode and validate a document. Throws DocumentDecodeError. */
  decode(data: Uint8Array): StyledNode {
    let raw: unknown;
    try {
      raw = decode(data);
    } catch (err) {
      throw new DocumentDecodeError('Invalid CBOR in document', '$', { cause: err });
    }

    if (!Array.isArray(raw) || raw.length !== 2) {
      throw new DocumentDecodeError('Document must be a [version, node] array', '$');
    }
    const [version, root]: unknown[] = raw;
    if (version !== DOCUMENT_VERSION) {
      throw new DocumentDecodeError(`Unsupported document version: ${String(version)}`, '$[0]');
    }
    return this.decodeNode(root, '$[1]', 1);
  }

  // ── Encode helpers ──────────────────────────────────────────

  private encodeNode(node: StyledNode): EncodedNode {
    if (node.kind === 'text') return node.content;

    let flags = 0;
    for (const attr of FLAG_ATTRIBUTES) {
      if (node.style[attr]) flags |= FLAG_BITS[attr];
    }
    const underline = UNDERLINE_CODES.indexOf(node.style.underline);
    return [flags, underline, ...node.children.map((c) => this.encodeNode(c))];
  }

  // ── Decode helpers ──────────────────────────────────────────

  private decodeNode(value: unknown, path: string, depth: number): StyledNode {
    if (depth > MAX_DOCUMENT_DEPTH) {
      throw new DocumentDecodeError(`Document nesting exceeds ${MAX_DOCUMENT_DEPTH} levels`, path);
    }
    if (typeof value === 'string') return text(value);

    if (!Array.isArray(value) || value.length < 2) {
      throw new DocumentDecodeError('Node must be a string or a [flags, underline, ...children] array', path);
    }

    const [flags, underlineCode, ...children]: unknown[] = value;
    if (typeof flags !== 'number' || !Number.isInteger(flags) || flags < 0 || flags > ALL_FLAGS) {
      throw new DocumentDecodeError(`Invalid style flags: ${String(flags)}`, `${path}[0]`);
    }
    const underline = typeof underlineCode === 'number' ? UNDERLINE_CODES[underlineCode] : undefined;
    if (underline === undefined) {
      throw new DocumentDecodeError(`Invalid underline level: ${String(underlineCode)}`, `${path}[1]`);
    }

    const style = StyleSet.of({
      bold: (flags & FLAG_BITS.bold) !== 0,
      doubleStrike: (flags & FLAG_BITS.doubleStrike) !== 0,
      reverse: (flags & FLAG_BITS.reverse) !== 0,
      upsideDown: (flags & FLAG_BITS.upsideDown) !== 0,
      rotated: (flags & FLAG_BITS.rotated) !== 0,
      underline,
    });

    return group(style, children.map((c, i) => this.decodeNode(c, `${path}[${i + 2}]`, depth + 1)));
  }
}

/** Create a new document codec instance. */
export function createDocumentCodec(): DocumentCodec {
  return new DocumentCodec();
}

const defaultCodec = new DocumentCodec();

export function encodeDocument(node: StyledNode): Uint8Array {
  return defaultCodec.encode(node);
}

export function decodeDocument(data: Uint8Array): StyledNode {
  return defaultCodec.decode(data);
}

// ── Errors ───────────────────────────────────────────────────────

export class DocumentEncodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DocumentEncodeError';
  }
}

export class DocumentDecodeError extends Error {
  constructor(
    message: string,
    /** Location of the offending element, e.g. `$[1][2]`. */
    readonly path: string,
    options?: { cause?: unknown },
  ) {
    super(`${message} at ${path}`, options);
    this.name = 'DocumentDecodeError';
  }
}
