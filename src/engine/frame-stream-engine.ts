/**
 * Frame Stream Engine
 *
 * Streams frame steps to a FrameSink:
 *
 *   start
 *   frame  (dt_ms, inputs)   then sleep dt_ms, once per frame
 *   end
 *   reset  (all inputs neutral)
 *
 * end and reset go out on every exit path (completion, stop, error), and
 * reset is always the last event of a run, so the consumer is never left
 * holding a non-neutral input.
 *
 * Stop is only checked between frames: worst-case latency is one frame.
 */

import { setTimeout as delay } from 'node:timers/promises';
import { SequenceEntry } from '../sequence/types';
import { checkStep } from '../sequence/schema';
import { DEFAULT_AXES, DEFAULT_BUTTONS } from '../sequence/input-vector';
import { FrameSink, StreamEvent, StreamEventType } from '../output/frame-sink';
import { CancellationToken } from './cancellation';
import { FrameMode, FrameState } from './frame-state';
import { PlaybackEngine, PlaybackEngineOptions } from './playback-engine';

export interface FrameStreamEngineOptions extends PlaybackEngineOptions {
  sink: FrameSink;
  mode?: FrameMode;
  axes?: readonly string[];
  buttons?: readonly string[];
}

export class FrameStreamEngine extends PlaybackEngine {
  private readonly sink: FrameSink;
  private readonly mode: FrameMode;
  private readonly axes: readonly string[];
  private readonly buttons: readonly string[];

  constructor(opts: FrameStreamEngineOptions) {
    super('FrameStream', opts);
    this.sink = opts.sink;
    this.mode = opts.mode ?? 'accumulate';
    this.axes = opts.axes ?? DEFAULT_AXES;
    this.buttons = opts.buttons ?? DEFAULT_BUTTONS;
  }

  protected async perform(steps: SequenceEntry[], token: CancellationToken, name: string): Promise<void> {
    const state = new FrameState(this.mode, this.axes, this.buttons);
    this.report(`Streaming "${name}" (${steps.length} frames, ${this.mode})`);

    try {
      this.transmit('start', name);

      for (let i = 0; i < steps.length; i++) {
        if (token.cancelled) break;

        const check = checkStep(steps[i]);
        if (!check.ok) {
          this.report(`Frame ${i + 1}: skipped malformed frame (${check.reason})`);
          continue;
        }
        const step = check.step;
        if (step.kind !== 'frame') {
          this.report(`Frame ${i + 1}: ${step.kind} steps cannot be streamed; skipped`);
          continue;
        }

        this.enterStep(i);
        this.emit('step', i, step);

        const inputs = state.apply(step.inputs);
        this.transmit('frame', name, { dt_ms: step.durationMs, inputs });
        this.log.debug(`Frame ${i + 1}: ${step.durationMs} ms`);
        await delay(step.durationMs);
      }
    } finally {
      this.transmit('end', name);
      this.transmit('reset', name, { inputs: state.neutral() });
    }
  }

  private transmit(type: StreamEventType, name: string, extra: Pick<StreamEvent, 'dt_ms' | 'inputs'> = {}): void {
    const event: StreamEvent = { type, name, ...extra, timestamp: Date.now() };
    try {
      this.sink.send(event);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      this.log.debug(`Dropped ${type} event: ${reason}`);
    }
  }
}
