/**
 * Fluent builder over the styled text tree.
 *
 *   styled('Total').bold().append(styled('  $25.00').underlined()).renderLine()
 *
 * Every method returns a new Styled; the wrapped node is never modified.
 */

import { render, renderLine } from '../core/render.js';
import type { StyleSet } from '../core/style.js';
import * as tree from '../core/tree.js';
import type { StyledNode } from '../core/types.js';

/** Anything that can stand in for a node. */
export type Printable = string | StyledNode | Styled;

export class Styled {
  constructor(readonly node: StyledNode) {}

  bold(): Styled {
    return new Styled(tree.bold(this.node));
  }

  underlined(): Styled {
    return new Styled(tree.underlined(this.node));
  }

  doubleUnderlined(): Styled {
    return new Styled(tree.doubleUnderlined(this.node));
  }

  reversed(): Styled {
    return new Styled(tree.reversed(this.node));
  }

  doubleStrike(): Styled {
    return new Styled(tree.doubleStrike(this.node));
  }

  upsideDown(): Styled {
    return new Styled(tree.upsideDown(this.node));
  }

  rotated(): Styled {
    return new Styled(tree.rotated(this.node));
  }

  withStyle(style: StyleSet): Styled {
    return new Styled(tree.withStyle(this.node, style));
  }

  /** Sequence `other` after this node; styles stay independent. */
  append(other: Printable): Styled {
    return new Styled(tree.append(this.node, toNode(other)));
  }

  render(): Uint8Array {
    return render(this.node);
  }

  renderLine(): Uint8Array {
    return renderLine(this.node);
  }

  /** Text content without styling. */
  toString(): string {
    return tree.plainText(this.node);
  }
}

/** Start a fluent chain from a string, a node, or another Styled. */
export function styled(content: Printable): Styled {
  return content instanceof Styled ? content : new Styled(toNode(content));
}

export function toNode(content: Printable): StyledNode {
  if (typeof content === 'string') return tree.text(content);
  if (content instanceof Styled) return content.node;
  return content;
}
