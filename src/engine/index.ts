export { PlaybackEngine } from './playback-engine';
export type { PlaybackEngineOptions, RunOutcome, RunState, RunSnapshot, StatusObserver } from './playback-engine';
export { StepPlaybackEngine, DEFAULT_TOLERANCE_MS, DEFAULT_POLL_INTERVAL_MS } from './step-engine';
export type { StepEngineOptions, ExpectResult } from './step-engine';
export { FrameStreamEngine } from './frame-stream-engine';
export type { FrameStreamEngineOptions } from './frame-stream-engine';
export { FrameState } from './frame-state';
export type { FrameMode } from './frame-state';
export { CancellationToken, sleepUnlessCancelled } from './cancellation';
