/**
 * ESC/POS character-formatting commands.
 *
 * Each command encodes to a fixed byte sequence. Style commands must be
 * sent before the text they affect; upside-down mode only takes effect at
 * the start of a line on most devices.
 */

import { ESC, GS, LF } from './types.js';
import type { Attribute, Command, Underline } from './types.js';

/** Underline thickness as the device encodes it. */
export enum UnderlineThickness {
  Off = 0,
  OneDot = 1,
  TwoDot = 2,
}

const THICKNESS: Record<Underline, UnderlineThickness> = {
  none: UnderlineThickness.Off,
  single: UnderlineThickness.OneDot,
  double: UnderlineThickness.TwoDot,
};

function flag(on: boolean): number {
  return on ? 1 : 0;
}

/** Emphasized (bold) mode. `ESC E n` */
export class SetEmphasized implements Command {
  constructor(readonly on: boolean) {}

  encode(): Uint8Array {
    return Uint8Array.of(ESC, 0x45, flag(this.on));
  }
}

/** Underline mode. `ESC - n` */
export class SetUnderline implements Command {
  constructor(readonly thickness: UnderlineThickness) {}

  encode(): Uint8Array {
    return Uint8Array.of(ESC, 0x2d, this.thickness);
  }
}

/** Double-strike mode. `ESC G n` */
export class SetDoubleStrike implements Command {
  constructor(readonly on: boolean) {}

  encode(): Uint8Array {
    return Uint8Array.of(ESC, 0x47, flag(this.on));
  }
}

/** White/black reverse printing. `GS B n` */
export class SetReverse implements Command {
  constructor(readonly on: boolean) {}

  encode(): Uint8Array {
    return Uint8Array.of(GS, 0x42, flag(this.on));
  }
}

/** 180° upside-down printing. `ESC { n` */
export class SetUpsideDown implements Command {
  constructor(readonly on: boolean) {}

  encode(): Uint8Array {
    return Uint8Array.of(ESC, 0x7b, flag(this.on));
  }
}

/** 90° clockwise rotation. `ESC V n` */
export class SetRotation implements Command {
  constructor(readonly on: boolean) {}

  encode(): Uint8Array {
    return Uint8Array.of(ESC, 0x56, flag(this.on));
  }
}

/** Print the line buffer and advance one line. */
export class LineFeed implements Command {
  encode(): Uint8Array {
    return Uint8Array.of(LF);
  }
}

/** Clear the print buffer and reset every mode to its power-on value. `ESC @` */
export class Initialize implements Command {
  encode(): Uint8Array {
    return Uint8Array.of(ESC, 0x40);
  }
}

/** Value an attribute can take: on/off for flags, a level for underline. */
export type AttributeState<A extends Attribute> = A extends 'underline' ? Underline : boolean;

/**
 * The command that puts one attribute into the given state.
 * Total over every attribute and state.
 */
export function attributeCommand<A extends Attribute>(attribute: A, state: AttributeState<A>): Command;
export function attributeCommand(attribute: Attribute, state: boolean | Underline): Command {
  if (attribute === 'underline') {
    return new SetUnderline(THICKNESS[typeof state === 'string' ? state : 'none']);
  }
  const on = state === true;
  switch (attribute) {
    case 'bold':
      return new SetEmphasized(on);
    case 'doubleStrike':
      return new SetDoubleStrike(on);
    case 'reverse':
      return new SetReverse(on);
    case 'upsideDown':
      return new SetUpsideDown(on);
    case 'rotated':
      return new SetRotation(on);
  }
}

/** Bytes that put one attribute into the given state. */
export function encodeAttribute<A extends Attribute>(attribute: A, state: AttributeState<A>): Uint8Array {
  return attributeCommand(attribute, state).encode();
}
