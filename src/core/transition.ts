/**
 * Style transitions — the minimal command sequence that moves the device
 * from one effective style to another.
 */

import { concatBytes } from './bytes.js';
import { attributeCommand } from './commands.js';
import type { StyleSet } from './style.js';
import { ATTRIBUTE_ORDER } from './types.js';
import type { Command } from './types.js';

/**
 * Commands for every attribute whose value differs between `before` and
 * `after`, in canonical attribute order. Unchanged attributes emit nothing.
 *
 * Underline commands set an absolute level, so any change to `none`
 * collapses to a single "underline off" and any change to `single` or
 * `double` selects that thickness directly.
 */
export function styleTransition(before: StyleSet, after: StyleSet): Command[] {
  const commands: Command[] = [];
  for (const attribute of ATTRIBUTE_ORDER) {
    if (attribute === 'underline') {
      if (before.underline !== after.underline) {
        commands.push(attributeCommand('underline', after.underline));
      }
    } else if (before[attribute] !== after[attribute]) {
      commands.push(attributeCommand(attribute, after[attribute]));
    }
  }
  return commands;
}

/** Concatenated bytes of `styleTransition(before, after)`. */
export function encodeTransition(before: StyleSet, after: StyleSet): Uint8Array {
  return concatBytes(styleTransition(before, after).map((cmd) => cmd.encode()));
}
