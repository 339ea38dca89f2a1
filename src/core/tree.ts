/**
 * Styled text tree construction.
 *
 * Every function returns a new frozen node and never touches its inputs,
 * so subtrees can be shared freely between documents.
 */

import { StyleSet } from './style.js';
import type { GroupNode, StyledNode, TextNode } from './types.js';

/** Create a text leaf. The content is emitted verbatim; no escaping. */
export function text(content: string): TextNode {
  const node: TextNode = { kind: 'text', content };
  return Object.freeze(node);
}

/** Create a style scope around the given children. */
export function group(style: StyleSet, children: readonly StyledNode[]): GroupNode {
  const node: GroupNode = { kind: 'group', style, children: Object.freeze([...children]) };
  return Object.freeze(node);
}

/** Wrap a node in a new scope carrying `style`. */
export function withStyle(node: StyledNode, style: StyleSet): GroupNode {
  return group(style, [node]);
}

/**
 * Sequence two nodes under a neutral (default-style) scope.
 *
 * The wrapper never merges either side's style, so styles cannot leak
 * from one sibling into the other.
 */
export function append(first: StyledNode, second: StyledNode): GroupNode {
  return group(StyleSet.DEFAULT, [first, second]);
}

export function bold(node: StyledNode): GroupNode {
  return withStyle(node, StyleSet.DEFAULT.withBold(true));
}

export function underlined(node: StyledNode): GroupNode {
  return withStyle(node, StyleSet.DEFAULT.withUnderline('single'));
}

export function doubleUnderlined(node: StyledNode): GroupNode {
  return withStyle(node, StyleSet.DEFAULT.withUnderline('double'));
}

/** White on black. */
export function reversed(node: StyledNode): GroupNode {
  return withStyle(node, StyleSet.DEFAULT.withReverse(true));
}

export function doubleStrike(node: StyledNode): GroupNode {
  return withStyle(node, StyleSet.DEFAULT.withDoubleStrike(true));
}

export function upsideDown(node: StyledNode): GroupNode {
  return withStyle(node, StyleSet.DEFAULT.withUpsideDown(true));
}

/** 90° clockwise. */
export function rotated(node: StyledNode): GroupNode {
  return withStyle(node, StyleSet.DEFAULT.withRotated(true));
}

/** Walk all nodes in depth-first pre-order. Iterative, so depth is unbounded. */
export function walkTree(
  node: StyledNode,
  visitor: (node: StyledNode, depth: number) => void,
  depth = 0,
): void {
  const pending: Array<[StyledNode, number]> = [[node, depth]];
  let next = pending.pop();
  while (next !== undefined) {
    const [current, level] = next;
    visitor(current, level);
    if (current.kind === 'group') {
      for (let i = current.children.length - 1; i >= 0; i--) {
        pending.push([current.children[i], level + 1]);
      }
    }
    next = pending.pop();
  }
}

/** The text content of a tree with all styling dropped. */
export function plainText(node: StyledNode): string {
  const parts: string[] = [];
  walkTree(node, (n) => {
    if (n.kind === 'text') parts.push(n.content);
  });
  return parts.join('');
}

/** Maximum nesting depth; a lone leaf has depth 1. */
export function treeDepth(node: StyledNode): number {
  let max = 0;
  walkTree(node, (_n, depth) => {
    if (depth + 1 > max) max = depth + 1;
  });
  return max;
}
