/**
 * Macro editing helpers
 *
 * Small pure operations behind an editor: new macros with a sensible
 * starting sequence, frame duplication and reordering, and applying a
 * frame edit with the same clamping the streamer relies on.
 */

import { FrameStep, InputVector, SequenceEntry } from '../sequence/types';
import { DEFAULT_FRAME_MS } from '../sequence/loader';
import { DEFAULT_AXES, DEFAULT_BUTTONS, neutralVector, sanitizeInputs } from '../sequence/input-vector';
import { DEFAULT_STAGE, Macro, MacroKind } from './types';

export function newEmptyFrame(
  axes: readonly string[] = DEFAULT_AXES,
  buttons: readonly string[] = DEFAULT_BUTTONS,
): FrameStep {
  return { kind: 'frame', durationMs: DEFAULT_FRAME_MS, inputs: neutralVector(axes, buttons) };
}

/** A new macro: steps start as "wait 0.2s, tap space", frames as one neutral frame */
export function newMacro(name: string, kind: MacroKind = 'steps'): Macro {
  const sequence: SequenceEntry[] = kind === 'frames'
    ? [newEmptyFrame()]
    : [
        { kind: 'wait', seconds: 0.2 },
        { kind: 'key', key: 'space', action: 'press' },
        { kind: 'key', key: 'space', action: 'release' },
      ];
  return {
    name,
    kind,
    stage: DEFAULT_STAGE,
    description: '',
    hotkey: null,
    trigger: null,
    enabled: true,
    sequence,
  };
}

/** Insert a copy of the entry at index right after it. Out-of-range indexes leave the list unchanged. */
export function duplicateEntry(sequence: readonly SequenceEntry[], index: number): SequenceEntry[] {
  const out = [...sequence];
  const entry = sequence[index];
  if (entry === undefined) return out;
  const copy: SequenceEntry = entry.kind === 'frame'
    ? { ...entry, inputs: { ...entry.inputs } }
    : { ...entry };
  out.splice(index + 1, 0, copy);
  return out;
}

/**
 * Swap the entry at index with its neighbour (direction -1 = up, 1 = down).
 * Returns the new list and the entry's new index; moves past either end are ignored.
 */
export function moveEntry(
  sequence: readonly SequenceEntry[],
  index: number,
  direction: -1 | 1,
): { sequence: SequenceEntry[]; index: number } {
  const target = index + direction;
  if (index < 0 || index >= sequence.length || target < 0 || target >= sequence.length) {
    return { sequence: [...sequence], index };
  }
  const out = [...sequence];
  [out[index], out[target]] = [out[target], out[index]];
  return { sequence: out, index: target };
}

export interface FrameEdit {
  /** Free text from a duration field; unparseable means the default */
  durationMs: string | number;
  inputs: Record<string, unknown>;
}

/** Build the frame an editor's fields describe */
export function applyFrameEdit(edit: FrameEdit): FrameStep {
  const parsed = typeof edit.durationMs === 'number' ? edit.durationMs : parseFloat(edit.durationMs.trim());
  const durationMs = Number.isFinite(parsed) ? Math.max(1, Math.trunc(parsed)) : DEFAULT_FRAME_MS;
  const inputs: InputVector = sanitizeInputs(edit.inputs);
  return { kind: 'frame', durationMs, inputs };
}
