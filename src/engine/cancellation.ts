/**
 * Cooperative cancellation for playback runs.
 *
 * A token is created per run and handed to the worker. stop() only flips
 * the flag; the worker looks at it at its suspension points (between
 * steps, between sleep slices, between expect polls, between frames).
 */

import { setTimeout as delay } from 'node:timers/promises';
import { performance } from 'perf_hooks';

export class CancellationToken {
  private _cancelled = false;

  cancel(): void {
    this._cancelled = true;
  }

  get cancelled(): boolean {
    return this._cancelled;
  }
}

/**
 * Sleep for ms, checking the token every sliceMs.
 * Resolves true when the full duration elapsed, false when cancelled first.
 */
export async function sleepUnlessCancelled(
  ms: number,
  token: CancellationToken,
  sliceMs = 10,
): Promise<boolean> {
  const deadline = performance.now() + ms;
  for (;;) {
    if (token.cancelled) return false;
    const remaining = deadline - performance.now();
    if (remaining <= 0) return true;
    await delay(Math.min(sliceMs, Math.ceil(remaining)));
  }
}
