/**
 * Frame State
 *
 * Tracks the input vector a frame stream has put on the wire.
 *
 *   accumulate  each frame is a delta: inputs it leaves out keep the
 *               value from the previous frame
 *   replace     each frame is sent exactly as written; inputs it leaves
 *               out are up to the consumer
 *
 * Either way the state remembers every input name it has sent, so the
 * closing reset can neutralise extras beyond the configured axes and
 * buttons.
 */

import { InputVector } from '../sequence/types';
import { clampAxis, neutralOf, neutralVector } from '../sequence/input-vector';

export type FrameMode = 'accumulate' | 'replace';

export class FrameState {
  private current: InputVector = {};
  private seen: InputVector = {};
  private readonly mode: FrameMode;
  private readonly axes: readonly string[];
  private readonly buttons: readonly string[];

  constructor(mode: FrameMode, axes: readonly string[], buttons: readonly string[]) {
    this.mode = mode;
    this.axes = axes;
    this.buttons = buttons;
  }

  /** Apply a frame's inputs and return the vector to transmit */
  apply(inputs: InputVector): InputVector {
    const clean: InputVector = {};
    for (const [name, value] of Object.entries(inputs)) {
      clean[name] = typeof value === 'number' ? clampAxis(value) : value;
      this.seen[name] = neutralOf(value);
    }

    this.current = this.mode === 'accumulate'
      ? { ...this.current, ...clean }
      : clean;

    return { ...this.current };
  }

  /** The last vector returned by apply() */
  getCurrent(): InputVector {
    return { ...this.current };
  }

  /** Every known axis 0, every known button false, plus any extra input seen this run */
  neutral(): InputVector {
    return { ...this.seen, ...neutralVector(this.axes, this.buttons) };
  }
}
