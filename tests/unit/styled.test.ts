/**
 * Tests for the fluent Styled builder.
 */

import { describe, it, expect } from 'vitest';
import { styled, toNode, Styled } from '../../src/sdk/styled.js';
import { StyleSet } from '../../src/core/style.js';
import { text, bold } from '../../src/core/tree.js';

const ascii = (s: string): number[] => [...s].map((c) => c.charCodeAt(0));

describe('Styled', () => {
  it('chains styles from the inside out', () => {
    const node = styled('x').bold().reversed().node;
    expect(node.kind).toBe('group');
    if (node.kind !== 'group') return;
    expect(node.style.equals(StyleSet.of({ reverse: true }))).toBe(true);
    const inner = node.children[0];
    expect(inner.kind === 'group' && inner.style.equals(StyleSet.of({ bold: true }))).toBe(true);
  });

  it('never modifies the receiver', () => {
    const base = styled('x');
    base.bold();
    expect(base.node).toEqual(text('x'));
  });

  it('append accepts strings, nodes and other builders', () => {
    const line = styled('a').append('b').append(bold(text('c'))).append(styled('d').underlined());
    expect(line.toString()).toBe('abcd');
  });

  it('renders the same bytes as the tree functions', () => {
    const bytes = styled('Total').bold().append(styled(' 9.99').underlined()).render();
    expect(bytes).toEqual(Uint8Array.from([
      0x1b, 0x45, 1, ...ascii('Total'), 0x1b, 0x45, 0,
      0x1b, 0x2d, 1, ...ascii(' 9.99'), 0x1b, 0x2d, 0,
    ]));
  });

  it('renderLine ends with a line feed', () => {
    expect(styled('ok').renderLine()).toEqual(Uint8Array.from([...ascii('ok'), 0x0a]));
  });

  it('withStyle applies a prepared style', () => {
    const style = StyleSet.of({ doubleStrike: true, upsideDown: true });
    expect(styled('x').withStyle(style).render()).toEqual(Uint8Array.from([
      0x1b, 0x47, 1, 0x1b, 0x7b, 1, 0x78, 0x1b, 0x47, 0, 0x1b, 0x7b, 0,
    ]));
  });

  it('styled() returns an existing builder as-is', () => {
    const s = styled('x');
    expect(styled(s)).toBe(s);
    expect(styled(text('y'))).toBeInstanceOf(Styled);
  });

  it('toNode unwraps every printable form', () => {
    const node = bold(text('n'));
    expect(toNode('s')).toEqual(text('s'));
    expect(toNode(node)).toBe(node);
    expect(toNode(new Styled(node))).toBe(node);
  });
});
