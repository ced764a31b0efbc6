/**
 * Match Evaluator
 *
 * Decides whether a snapshot satisfies an expectation label. Pure: no
 * timing, no I/O. The expect step polls this until it returns true or
 * the tolerance window runs out.
 *
 * Resolution order:
 *   1. the label is literally in snapshot.pressed (buttons, named triggers)
 *   2. stick heuristics on the (x, y) axes:
 *        "stick up"    y < -stickThreshold
 *        "stick down"  y >  stickThreshold
 *        "diagonal"    |x| > diagonalThreshold and |y| > diagonalThreshold
 *   3. otherwise false
 *
 * Screen-style axes: negative y is up.
 */

import { InputLabel } from '../sequence/types';
import { Snapshot } from '../input/snapshot';

export interface MatchThresholds {
  stickThreshold: number;
  diagonalThreshold: number;
}

export const DEFAULT_THRESHOLDS: MatchThresholds = {
  stickThreshold: 0.6,
  diagonalThreshold: 0.55,
};

type StickDirection = 'stick up' | 'stick down' | 'diagonal';

function normalizeLabel(label: string): string {
  return label.trim().toLowerCase().replace(/[\s_-]+/g, ' ');
}

function stickDirection(label: string): StickDirection | null {
  switch (normalizeLabel(label)) {
    case 'stick up':
      return 'stick up';
    case 'stick down':
      return 'stick down';
    case 'diagonal':
      return 'diagonal';
    default:
      return null;
  }
}

export function matchesInput(
  expected: InputLabel,
  snapshot: Snapshot,
  thresholds: MatchThresholds = DEFAULT_THRESHOLDS,
): boolean {
  if (snapshot.pressed.has(expected)) {
    return true;
  }

  const [x, y] = snapshot.axes;
  switch (stickDirection(expected)) {
    case 'stick up':
      return y < -thresholds.stickThreshold;
    case 'stick down':
      return y > thresholds.stickThreshold;
    case 'diagonal':
      return Math.abs(x) > thresholds.diagonalThreshold && Math.abs(y) > thresholds.diagonalThreshold;
    case null:
      return false;
  }
}
