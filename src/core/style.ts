/**
 * Style attribute sets and the scope combination rule.
 *
 * A StyleSet is an immutable value: every `withX` builder returns a new
 * instance with one field changed. Nothing removes an attribute from an
 * enclosing scope; only leaving the scope does.
 */

import type { StyleAttrs, Underline } from './types.js';

const UNDERLINE_RANK: Record<Underline, number> = {
  none: 0,
  single: 1,
  double: 2,
};

/** The stronger of two underline levels. */
export function strongerUnderline(a: Underline, b: Underline): Underline {
  return UNDERLINE_RANK[b] > UNDERLINE_RANK[a] ? b : a;
}

export class StyleSet implements StyleAttrs {
  /** The baseline: every attribute off, no underline. */
  static readonly DEFAULT = new StyleSet({
    bold: false,
    doubleStrike: false,
    reverse: false,
    upsideDown: false,
    rotated: false,
    underline: 'none',
  });

  readonly bold: boolean;
  readonly doubleStrike: boolean;
  readonly reverse: boolean;
  readonly upsideDown: boolean;
  readonly rotated: boolean;
  readonly underline: Underline;

  private constructor(attrs: StyleAttrs) {
    this.bold = attrs.bold;
    this.doubleStrike = attrs.doubleStrike;
    this.reverse = attrs.reverse;
    this.upsideDown = attrs.upsideDown;
    this.rotated = attrs.rotated;
    this.underline = attrs.underline;
    Object.freeze(this);
  }

  /** Build a style from the default with the given fields set. */
  static of(attrs: Partial<StyleAttrs>): StyleSet {
    return StyleSet.DEFAULT.update(attrs);
  }

  /**
   * Fold a scope stack (outermost first) into the effective style.
   *
   * Flags are OR-ed across every scope; underline takes the strongest
   * level requested anywhere. An empty stack yields the default.
   */
  static combine(stack: readonly StyleSet[]): StyleSet {
    const attrs = StyleSet.DEFAULT.toAttrs();
    for (const style of stack) {
      attrs.bold ||= style.bold;
      attrs.doubleStrike ||= style.doubleStrike;
      attrs.reverse ||= style.reverse;
      attrs.upsideDown ||= style.upsideDown;
      attrs.rotated ||= style.rotated;
      attrs.underline = strongerUnderline(attrs.underline, style.underline);
    }
    return new StyleSet(attrs);
  }

  withBold(on = true): StyleSet {
    return this.update({ bold: on });
  }

  withDoubleStrike(on = true): StyleSet {
    return this.update({ doubleStrike: on });
  }

  withReverse(on = true): StyleSet {
    return this.update({ reverse: on });
  }

  withUpsideDown(on = true): StyleSet {
    return this.update({ upsideDown: on });
  }

  withRotated(on = true): StyleSet {
    return this.update({ rotated: on });
  }

  withUnderline(level: Underline = 'single'): StyleSet {
    return this.update({ underline: level });
  }

  /** True when every attribute is off. */
  isDefault(): boolean {
    return this.equals(StyleSet.DEFAULT);
  }

  equals(other: StyleAttrs): boolean {
    return (
      this.bold === other.bold &&
      this.doubleStrike === other.doubleStrike &&
      this.reverse === other.reverse &&
      this.upsideDown === other.upsideDown &&
      this.rotated === other.rotated &&
      this.underline === other.underline
    );
  }

  toAttrs(): StyleAttrs {
    return {
      bold: this.bold,
      doubleStrike: this.doubleStrike,
      reverse: this.reverse,
      upsideDown: this.upsideDown,
      rotated: this.rotated,
      underline: this.underline,
    };
  }

  /** Compact description, e.g. `bold+underline:double`, or `default`. */
  toString(): string {
    const parts: string[] = [];
    if (this.bold) parts.push('bold');
    if (this.underline !== 'none') parts.push(`underline:${this.underline}`);
    if (this.doubleStrike) parts.push('doubleStrike');
    if (this.reverse) parts.push('reverse');
    if (this.upsideDown) parts.push('upsideDown');
    if (this.rotated) parts.push('rotated');
    return parts.length > 0 ? parts.join('+') : 'default';
  }

  private update(attrs: Partial<StyleAttrs>): StyleSet {
    return new StyleSet({ ...this.toAttrs(), ...attrs });
  }
}
