/**
 * Input vector helpers shared by the loader, the frame editor helpers
 * and the frame streaming engine.
 */

import { InputValue, InputVector } from './types';

export const DEFAULT_AXES = ['throttle', 'steer', 'pitch', 'yaw', 'roll'] as const;
export const DEFAULT_BUTTONS = ['jump', 'boost', 'handbrake', 'airRollL', 'airRollR'] as const;

export function clampAxis(value: number, lo = -1, hi = 1): number {
  if (Number.isNaN(value)) return 0;
  return Math.max(lo, Math.min(hi, value));
}

/**
 * Keep numeric and boolean entries, clamping numbers into [-1, 1].
 * Anything else (strings, nested objects) has no meaning on the wire and is dropped.
 */
export function sanitizeInputs(raw: Record<string, unknown>): InputVector {
  const out: InputVector = {};
  for (const [name, value] of Object.entries(raw)) {
    if (typeof value === 'boolean') {
      out[name] = value;
    } else if (typeof value === 'number' && Number.isFinite(value)) {
      out[name] = clampAxis(value);
    }
  }
  return out;
}

/** The neutral value for an input of the same type */
export function neutralOf(value: InputValue): InputValue {
  return typeof value === 'boolean' ? false : 0;
}

/** Every axis at 0, every button false */
export function neutralVector(axes: readonly string[], buttons: readonly string[]): InputVector {
  const out: InputVector = {};
  for (const axis of axes) out[axis] = 0;
  for (const button of buttons) out[button] = false;
  return out;
}
