/**
 * Playback Engine
 *
 * Shared run lifecycle for the step and frame engines:
 *
 *   idle -> running -> completed | cancelled -> idle
 *
 *   - Single flight: run() while a run is active is rejected, never queued.
 *   - run() returns immediately; the sequence plays on its own async worker.
 *   - stop() requests cancellation; the worker honours it at its next
 *     suspension point.
 *   - Every started run ends with exactly one terminal outcome.
 *
 * Emits:
 *   'state'    (state: RunState)
 *   'status'   (message: string)
 *   'step'     (index: number, step: Step)
 *   'rejected' (name: string)
 *   'complete' (outcome: RunOutcome, name: string)
 */

import { EventEmitter } from 'events';
import { Logger } from 'pino';
import { getLogger } from '../logger';
import { Sequence, SequenceEntry, snapshotSequence } from '../sequence/types';
import { CancellationToken } from './cancellation';

export type RunOutcome = 'completed' | 'cancelled';
export type RunState = 'idle' | 'running' | RunOutcome;

export type StatusObserver = (message: string) => void;

export interface PlaybackEngineOptions {
  /** Called from the worker for every progress message */
  onStatus?: StatusObserver;
}

export interface RunSnapshot {
  state: RunState;
  runName: string | null;
  stepIndex: number;       // -1 before the first step
  stepCount: number;
  lastOutcome: RunOutcome | null;
}

export abstract class PlaybackEngine extends EventEmitter {
  private state: RunState = 'idle';
  private token: CancellationToken | null = null;
  private worker: Promise<RunOutcome> | null = null;
  private runName: string | null = null;
  private stepIndex = -1;
  private stepCount = 0;
  private lastOutcome: RunOutcome | null = null;
  private readonly onStatus?: StatusObserver;
  protected readonly log: Logger;

  constructor(logModule: string, opts: PlaybackEngineOptions = {}) {
    super();
    this.onStatus = opts.onStatus;
    this.log = getLogger(logModule);
  }

  /**
   * Start playing a sequence.
   * @returns false when a run is already active (the new request is dropped)
   */
  run(sequence: Sequence, name = 'sequence'): boolean {
    if (this.isRunning()) {
      this.report(`Already running "${this.runName ?? ''}"; ignored "${name}"`);
      this.emit('rejected', name);
      return false;
    }

    const steps = snapshotSequence(sequence);
    const token = new CancellationToken();
    this.token = token;
    this.runName = name;
    this.stepIndex = -1;
    this.stepCount = steps.length;
    this.setState('running');

    this.worker = this.work(steps, token, name);
    return true;
  }

  /** Request cancellation of the active run. Never blocks. */
  stop(): void {
    if (this.token && !this.token.cancelled && this.isRunning()) {
      this.token.cancel();
      this.report(`Stop requested for "${this.runName ?? ''}"`);
    }
  }

  isRunning(): boolean {
    return this.state === 'running';
  }

  getState(): RunSnapshot {
    return {
      state: this.state,
      runName: this.runName,
      stepIndex: this.stepIndex,
      stepCount: this.stepCount,
      lastOutcome: this.lastOutcome,
    };
  }

  /** Resolves with the outcome of the active run, or of the last one (null if none) */
  whenIdle(): Promise<RunOutcome | null> {
    return this.worker ?? Promise.resolve(this.lastOutcome);
  }

  /** Interpret the copied steps. Must return once the token is cancelled. */
  protected abstract perform(steps: SequenceEntry[], token: CancellationToken, name: string): Promise<void>;

  /** Mark the step the worker is about to execute */
  protected enterStep(index: number): void {
    this.stepIndex = index;
  }

  /** Deliver a progress message to the observer, listeners and log */
  protected report(message: string): void {
    this.log.info(message);
    this.emit('status', message);
    if (this.onStatus) {
      try {
        this.onStatus(message);
      } catch (err) {
        this.log.warn({ err }, 'Status observer threw');
      }
    }
  }

  private async work(steps: SequenceEntry[], token: CancellationToken, name: string): Promise<RunOutcome> {
    // Let run() return before the first step executes
    await Promise.resolve();

    try {
      await this.perform(steps, token, name);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      this.log.error({ err }, `Run "${name}" failed`);
      this.report(`Run "${name}" stopped on error: ${reason}`);
    }

    const outcome: RunOutcome = token.cancelled ? 'cancelled' : 'completed';
    this.lastOutcome = outcome;
    this.token = null;
    this.setState(outcome);
    this.report(outcome === 'completed' ? `Completed "${name}"` : `Cancelled "${name}"`);
    this.setState('idle');
    this.emit('complete', outcome, name);
    return outcome;
  }

  private setState(state: RunState): void {
    this.state = state;
    this.emit('state', state);
  }
}
