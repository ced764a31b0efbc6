/**
 * Sequence Types
 *
 * A sequence is an ordered list of steps played back by an engine:
 *   - wait    pause for a number of seconds
 *   - key     emulated key press or release
 *   - expect  advisory check that the live controller shows an input
 *   - frame   timed input vector streamed to a remote consumer
 *
 * Steps that could not be read from a persisted record are carried as
 * `malformed` entries so the engine can report and skip them in place.
 */

export type KeyActionType = 'press' | 'release';

/** Symbolic expectation, e.g. "jump", "stick up", "diagonal" */
export type InputLabel = string;

/** Axis name -> value in [-1, 1], button name -> pressed */
export type InputValue = number | boolean;
export type InputVector = Record<string, InputValue>;

export interface WaitStep {
  kind: 'wait';
  seconds: number;
}

export interface KeyStep {
  kind: 'key';
  key: string;
  action: KeyActionType;
}

export interface ExpectStep {
  kind: 'expect';
  label: string;
  expected: InputLabel;
}

export interface FrameStep {
  kind: 'frame';
  durationMs: number;
  inputs: InputVector;
}

export type Step = WaitStep | KeyStep | ExpectStep | FrameStep;

export interface MalformedStep {
  kind: 'malformed';
  reason: string;
  raw: unknown;
}

export type SequenceEntry = Step | MalformedStep;

export type Sequence = readonly SequenceEntry[];

/**
 * Copy a sequence so later edits to the source list cannot reach a run.
 * Non-object entries (e.g. null from hand-built JSON) pass through as-is
 * and are reported by the engine's step check.
 */
export function snapshotSequence(sequence: Sequence): SequenceEntry[] {
  return sequence.map((entry): SequenceEntry => {
    if (typeof entry !== 'object' || entry === null) {
      return entry;
    }
    if (entry.kind === 'frame') {
      return { ...entry, inputs: { ...entry.inputs } };
    }
    return { ...entry };
  });
}
