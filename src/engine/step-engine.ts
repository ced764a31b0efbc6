/**
 * Step Playback Engine
 *
 * Plays wait / key / expect steps in order:
 *
 *   wait    sleep, sliced so stop() lands within one poll interval
 *   key     resolve the key name and press or release it on the key sink
 *   expect  poll the input source until the label matches, the tolerance
 *           window closes, or the run is stopped; the result is reported
 *           and the run always moves on
 *
 * Frame steps belong to the FrameStreamEngine and are skipped here.
 * Malformed steps, and steps whose sink throws, are reported and skipped.
 *
 * Besides the PlaybackEngine events, emits:
 *   'expect' (index: number, result: ExpectResult, elapsedMs: number)
 */

import { setTimeout as delay } from 'node:timers/promises';
import { performance } from 'perf_hooks';
import { ExpectStep, KeyStep, SequenceEntry, Step } from '../sequence/types';
import { checkStep } from '../sequence/schema';
import { resolveKey, formatKeyId } from '../keys/key-names';
import { InputSnapshotSource } from '../input/snapshot';
import { KeySink } from '../output/key-sink';
import { MatchThresholds, DEFAULT_THRESHOLDS, matchesInput } from '../match/evaluator';
import { CancellationToken, sleepUnlessCancelled } from './cancellation';
import { PlaybackEngine, PlaybackEngineOptions } from './playback-engine';

export const DEFAULT_TOLERANCE_MS = 350;
export const DEFAULT_POLL_INTERVAL_MS = 10;

export interface StepEngineOptions extends PlaybackEngineOptions {
  keys: KeySink;
  input: InputSnapshotSource;
  toleranceMs?: number;
  pollIntervalMs?: number;
  thresholds?: MatchThresholds;
}

export type ExpectResult = 'matched' | 'not-detected' | 'cancelled';

export class StepPlaybackEngine extends PlaybackEngine {
  private readonly keys: KeySink;
  private readonly input: InputSnapshotSource;
  private readonly toleranceMs: number;
  private readonly pollIntervalMs: number;
  private readonly thresholds: MatchThresholds;

  constructor(opts: StepEngineOptions) {
    super('StepEngine', opts);
    this.keys = opts.keys;
    this.input = opts.input;
    this.toleranceMs = opts.toleranceMs ?? DEFAULT_TOLERANCE_MS;
    this.pollIntervalMs = Math.max(1, opts.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS);
    this.thresholds = opts.thresholds ?? DEFAULT_THRESHOLDS;
  }

  protected async perform(steps: SequenceEntry[], token: CancellationToken, name: string): Promise<void> {
    this.report(`Running "${name}" (${steps.length} steps)`);

    for (let i = 0; i < steps.length; i++) {
      if (token.cancelled) break;

      const check = checkStep(steps[i]);
      if (!check.ok) {
        this.report(`Step ${i + 1}: skipped malformed step (${check.reason})`);
        continue;
      }

      this.enterStep(i);
      this.emit('step', i, check.step);

      try {
        await this.dispatch(check.step, i, token);
      } catch (err) {
        const reason = err instanceof Error ? err.message : String(err);
        this.report(`Step ${i + 1}: ${check.step.kind} failed (${reason}); continuing`);
      }
    }
  }

  private async dispatch(step: Step, index: number, token: CancellationToken): Promise<void> {
    switch (step.kind) {
      case 'wait':
        this.log.debug(`Step ${index + 1}: wait ${step.seconds}s`);
        await sleepUnlessCancelled(step.seconds * 1000, token, this.pollIntervalMs);
        return;
      case 'key':
        this.dispatchKey(step, index);
        return;
      case 'expect':
        await this.expect(step, index, token);
        return;
      case 'frame':
        this.report(`Step ${index + 1}: frame steps play on the frame stream engine; skipped`);
        return;
    }
  }

  private dispatchKey(step: KeyStep, index: number): void {
    const key = resolveKey(step.key);
    this.log.debug(`Step ${index + 1}: ${step.action} ${formatKeyId(key)}`);
    if (step.action === 'press') {
      this.keys.press(key);
    } else {
      this.keys.release(key);
    }
  }

  /** Poll the input source inside the tolerance window */
  private async expect(step: ExpectStep, index: number, token: CancellationToken): Promise<ExpectResult> {
    const label = step.label || step.expected;
    this.report(`Step ${index + 1}: ${label} (expecting ${step.expected} within ${this.toleranceMs} ms)`);

    const started = performance.now();
    const deadline = started + this.toleranceMs;
    let result: ExpectResult = 'not-detected';

    for (;;) {
      if (token.cancelled) {
        result = 'cancelled';
        break;
      }
      if (matchesInput(step.expected, this.input.snapshot(), this.thresholds)) {
        result = 'matched';
        break;
      }
      const remaining = deadline - performance.now();
      if (remaining <= 0) break;
      await delay(Math.min(this.pollIntervalMs, Math.ceil(remaining)));
    }

    const elapsed = Math.round(performance.now() - started);
    switch (result) {
      case 'matched':
        this.report(`Step ${index + 1}: ${step.expected} matched after ${elapsed} ms`);
        break;
      case 'not-detected':
        this.report(`Step ${index + 1}: ${step.expected} not detected`);
        break;
      case 'cancelled':
        this.report(`Step ${index + 1}: ${step.expected} check cancelled`);
        break;
    }
    this.emit('expect', index, result, elapsed);
    return result;
  }
}
