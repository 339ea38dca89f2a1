/**
 * Renderer — turns a styled text tree into the printer byte stream.
 *
 * Single depth-first pass over an explicit work stack. Entering a group
 * pushes its effective style onto the scope stack and emits the
 * transition into it; leaving it pops and emits the transition back.
 * Text is copied through verbatim.
 */

import { ByteBuffer, concatBytes } from './bytes.js';
import { LineFeed } from './commands.js';
import { StyleSet } from './style.js';
import { styleTransition } from './transition.js';
import type { StyledNode } from './types.js';

/**
 * Pending traversal work. Entering a group schedules its exit after its
 * children, so the walk needs no call stack and is bounded only by memory.
 */
type Frame =
  | { kind: 'enter'; node: StyledNode }
  | { kind: 'exit' };

interface RenderState {
  output: ByteBuffer;
  /**
   * Effective style of every open scope, outermost first. Always starts
   * with the baseline; entry i is the combination of scopes 0..i.
   */
  scopes: StyleSet[];
  /** The style the device is in after everything emitted so far. */
  current: StyleSet;
}

/**
 * Render a tree to bytes, ending with the device back at the baseline.
 *
 * Pure: the tree is not modified and repeated calls return identical bytes.
 */
export function render(node: StyledNode): Uint8Array {
  const state: RenderState = {
    output: new ByteBuffer(),
    scopes: [StyleSet.DEFAULT],
    current: StyleSet.DEFAULT,
  };

  const work: Frame[] = [{ kind: 'enter', node }];
  let frame = work.pop();
  while (frame !== undefined) {
    if (frame.kind === 'exit') {
      state.scopes.pop();
      moveTo(state, innermost(state));
    } else if (frame.node.kind === 'text') {
      state.output.pushText(frame.node.content);
    } else {
      // Combining is associative, so folding onto the enclosing effective
      // style equals folding the whole scope stack.
      const entered = StyleSet.combine([innermost(state), frame.node.style]);
      state.scopes.push(entered);
      moveTo(state, entered);

      work.push({ kind: 'exit' });
      const children = frame.node.children;
      for (let i = children.length - 1; i >= 0; i--) {
        work.push({ kind: 'enter', node: children[i] });
      }
    }
    frame = work.pop();
  }

  // Only emits something when a shape left residual state behind.
  moveTo(state, StyleSet.DEFAULT);

  return state.output.toBytes();
}

/** Render a tree followed by a line feed. */
export function renderLine(node: StyledNode): Uint8Array {
  return concatBytes([render(node), new LineFeed().encode()]);
}

function innermost(state: RenderState): StyleSet {
  return state.scopes[state.scopes.length - 1] ?? StyleSet.DEFAULT;
}

function moveTo(state: RenderState, target: StyleSet): void {
  for (const cmd of styleTransition(state.current, target)) {
    state.output.push(cmd.encode());
  }
  state.current = target;
}
