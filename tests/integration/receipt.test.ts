/**
 * Full pipeline: build a receipt with the fluent API, print it to an
 * in-memory printer, spool it through a document and replay the bytes.
 */

import { describe, it, expect } from 'vitest';
import {
  styled,
  Printer,
  createMemoryConnection,
  encodeDocument,
  decodeDocument,
  interpretStream,
  textProjection,
  toAnsi,
  renderLine,
  StyleSet,
} from '../../src/sdk/index.js';

function receipt(printer: Printer): Printer {
  return printer
    .initialize()
    .println(styled('CORNER CAFE').bold().doubleUnderlined())
    .println('Espresso        2.50')
    .println(styled('Croissant').append(styled('       3.10').doubleStrike()))
    .println(styled('TOTAL').bold().append('           ').append(styled('5.60').reversed()))
    .println(styled('thank you').upsideDown());
}

describe('receipt pipeline', () => {
  it('prints text that reads back line by line', async () => {
    const conn = createMemoryConnection();
    await receipt(new Printer(conn)).close();

    const result = interpretStream(conn.bytes());
    expect(textProjection(result)).toBe([
      'CORNER CAFE',
      'Espresso        2.50',
      'Croissant       3.10',
      'TOTAL           5.60',
      'thank you',
    ].join('\n'));
    expect(result.finalStyle.isDefault()).toBe(true);
    expect(result.unknownCommands).toBe(0);
  });

  it('keeps each line\'s styles to its own segments', async () => {
    const conn = createMemoryConnection();
    await receipt(new Printer(conn)).close();

    const lines = interpretStream(conn.bytes()).lines;
    expect(lines[0].segments).toEqual([
      { text: 'CORNER CAFE', style: StyleSet.of({ bold: true, underline: 'double' }) },
    ]);
    expect(lines[1].segments).toEqual([
      { text: 'Espresso        2.50', style: StyleSet.DEFAULT },
    ]);
    expect(lines[2].segments).toEqual([
      { text: 'Croissant', style: StyleSet.DEFAULT },
      { text: '       3.10', style: StyleSet.of({ doubleStrike: true }) },
    ]);
    expect(lines[3].segments).toEqual([
      { text: 'TOTAL', style: StyleSet.of({ bold: true }) },
      { text: '           ', style: StyleSet.DEFAULT },
      { text: '5.60', style: StyleSet.of({ reverse: true }) },
    ]);
    expect(lines[4].segments).toEqual([
      { text: 'thank you', style: StyleSet.of({ upsideDown: true }) },
    ]);
  });

  it('styles survive a trip through a spooled document', () => {
    const line = styled('TOTAL').bold().append(styled('5.60').reversed());
    const spooled = decodeDocument(encodeDocument(line.node));

    expect(renderLine(spooled)).toEqual(line.renderLine());
    expect(toAnsi(interpretStream(renderLine(spooled)))).toBe('\x1b[1mTOTAL\x1b[0m\x1b[7m5.60\x1b[0m');
  });

  it('writes the whole job in one chunk', async () => {
    const conn = createMemoryConnection();
    await receipt(new Printer(conn)).close();
    expect(conn.chunks).toHaveLength(1);
  });
});
