/**
 * Tests for StyleSet values and the scope combination rule.
 */

import { describe, it, expect } from 'vitest';
import { StyleSet, strongerUnderline } from '../../src/core/style.js';

describe('StyleSet', () => {
  it('DEFAULT has every attribute off', () => {
    expect(StyleSet.DEFAULT.toAttrs()).toEqual({
      bold: false,
      doubleStrike: false,
      reverse: false,
      upsideDown: false,
      rotated: false,
      underline: 'none',
    });
    expect(StyleSet.DEFAULT.isDefault()).toBe(true);
  });

  it('builders return a new value and leave the original untouched', () => {
    const base = StyleSet.DEFAULT;
    const bold = base.withBold();

    expect(bold.bold).toBe(true);
    expect(base.bold).toBe(false);
    expect(bold).not.toBe(base);
  });

  it('of() fills unspecified fields from the default', () => {
    const style = StyleSet.of({ reverse: true, underline: 'double' });
    expect(style.reverse).toBe(true);
    expect(style.underline).toBe('double');
    expect(style.bold).toBe(false);
    expect(style.rotated).toBe(false);
  });

  it('instances are frozen', () => {
    expect(Object.isFrozen(StyleSet.of({ bold: true }))).toBe(true);
  });

  it('equals compares every field', () => {
    expect(StyleSet.of({ bold: true }).equals(StyleSet.DEFAULT.withBold(true))).toBe(true);
    expect(StyleSet.of({ bold: true }).equals(StyleSet.of({ bold: true, rotated: true }))).toBe(false);
    expect(StyleSet.of({ underline: 'single' }).equals(StyleSet.of({ underline: 'double' }))).toBe(false);
  });

  it('withBold(false) switches an attribute back off', () => {
    expect(StyleSet.of({ bold: true }).withBold(false).isDefault()).toBe(true);
  });

  it('toString lists set attributes in canonical order', () => {
    expect(StyleSet.DEFAULT.toString()).toBe('default');
    expect(StyleSet.of({ rotated: true, bold: true, underline: 'double' }).toString())
      .toBe('bold+underline:double+rotated');
  });
});

describe('strongerUnderline', () => {
  it('orders none < single < double', () => {
    expect(strongerUnderline('none', 'single')).toBe('single');
    expect(strongerUnderline('double', 'single')).toBe('double');
    expect(strongerUnderline('single', 'double')).toBe('double');
    expect(strongerUnderline('none', 'none')).toBe('none');
  });
});

describe('StyleSet.combine', () => {
  it('returns the default for an empty stack', () => {
    expect(StyleSet.combine([]).isDefault()).toBe(true);
  });

  it('ORs boolean attributes across scopes', () => {
    const combined = StyleSet.combine([
      StyleSet.of({ bold: true }),
      StyleSet.of({ reverse: true }),
      StyleSet.DEFAULT,
    ]);
    expect(combined.equals(StyleSet.of({ bold: true, reverse: true }))).toBe(true);
  });

  it('an inner scope cannot switch an outer attribute off', () => {
    const combined = StyleSet.combine([
      StyleSet.of({ bold: true }),
      StyleSet.of({ bold: false }),
    ]);
    expect(combined.bold).toBe(true);
  });

  it('takes the strongest underline regardless of nesting order', () => {
    const outerDouble = StyleSet.combine([
      StyleSet.of({ underline: 'double' }),
      StyleSet.of({ underline: 'single' }),
    ]);
    const innerDouble = StyleSet.combine([
      StyleSet.of({ underline: 'single' }),
      StyleSet.of({ underline: 'double' }),
    ]);
    expect(outerDouble.underline).toBe('double');
    expect(innerDouble.underline).toBe('double');
  });

  it('does not mutate the stack entries', () => {
    const outer = StyleSet.of({ bold: true });
    StyleSet.combine([outer, StyleSet.of({ underline: 'double' })]);
    expect(outer.underline).toBe('none');
  });
});
