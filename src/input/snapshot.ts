/**
 * Input Snapshot
 *
 * An input source samples a controller on its own schedule and keeps the
 * latest state in a SnapshotCell. Engines only ever read a copy of that
 * state; they never write to it and never wait on the sampler.
 */

export type AxisPair = readonly [x: number, y: number];

export interface Snapshot {
  readonly pressed: ReadonlySet<string>;
  readonly axes: AxisPair;
  readonly timestamp: number;
}

/** Contract the playback engines consume */
export interface InputSnapshotSource {
  start(): void | Promise<unknown>;
  stop(): void;
  /** Latest sampled state. Never throws; no device means a neutral snapshot. */
  snapshot(): Snapshot;
}

export function neutralSnapshot(timestamp = Date.now()): Snapshot {
  return { pressed: new Set<string>(), axes: [0, 0], timestamp };
}

/**
 * Holds the most recent sampled state.
 *
 * Writes replace the whole state; reads hand out a fresh copy so a
 * reader can never observe a half-applied update or mutate the cell.
 */
export class SnapshotCell {
  private pressed: Set<string> = new Set();
  private axes: [number, number] = [0, 0];
  private updatedAt = 0;

  setPressed(name: string, down: boolean, at = Date.now()): void {
    if (down) {
      this.pressed.add(name);
    } else {
      this.pressed.delete(name);
    }
    this.updatedAt = at;
  }

  replacePressed(names: Iterable<string>, at = Date.now()): void {
    this.pressed = new Set(names);
    this.updatedAt = at;
  }

  setAxes(x: number, y: number, at = Date.now()): void {
    this.axes = [x, y];
    this.updatedAt = at;
  }

  reset(at = Date.now()): void {
    this.pressed = new Set();
    this.axes = [0, 0];
    this.updatedAt = at;
  }

  /** Time of the last write, 0 if never written */
  get lastUpdate(): number {
    return this.updatedAt;
  }

  read(): Snapshot {
    return {
      pressed: new Set(this.pressed),
      axes: [this.axes[0], this.axes[1]],
      timestamp: this.updatedAt,
    };
  }
}

/** Source for setups without a controller: always neutral */
export class NeutralInputSource implements InputSnapshotSource {
  start(): void {
    // Nothing to sample
  }

  stop(): void {
    // Nothing to release
  }

  snapshot(): Snapshot {
    return neutralSnapshot();
  }
}
