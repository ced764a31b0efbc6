/**
 * MacroDeck
 *
 * Wires the pieces together:
 *
 *   MacroLibrary ──► MacroDeck ──► StepPlaybackEngine ──► KeySink
 *                        │                 └──────────────► InputSnapshotSource
 *                        └───────► FrameStreamEngine ─────► FrameSink
 *   ControlServer ──────►┘
 *
 * Only one macro plays at a time across both engines; a request that
 * arrives while something is playing is reported and dropped.
 *
 * Emits 'status' (message: string) for every engine and deck message.
 */

import { EventEmitter } from 'events';
import { Logger } from 'pino';
import { getLogger } from './logger';
import { Config } from './config';
import { StepPlaybackEngine } from './engine/step-engine';
import { FrameStreamEngine } from './engine/frame-stream-engine';
import { PlaybackEngine, RunOutcome, StatusObserver } from './engine/playback-engine';
import { InputSnapshotSource, NeutralInputSource } from './input/snapshot';
import { OscInputSource } from './input/osc-input-source';
import { KeySink, LogKeySink, OscKeySink } from './output/key-sink';
import { FrameSink, UdpFrameSink } from './output/frame-sink';
import { MacroLibrary } from './library/persistence';
import { Macro } from './library/types';
import { ControlCommand, ControlServer } from './control/control-server';

export interface DeckDeps {
  keys?: KeySink;
  frames?: FrameSink;
  input?: InputSnapshotSource;
  library?: MacroLibrary;
  onStatus?: StatusObserver;
}

/** Something the deck opened itself and must close on shutdown */
interface OwnedResource {
  open(): void | Promise<unknown>;
  close(): void;
}

export class MacroDeck extends EventEmitter {
  readonly steps: StepPlaybackEngine;
  readonly frames: FrameStreamEngine;
  readonly library: MacroLibrary;
  private readonly input: InputSnapshotSource;
  private readonly owned: OwnedResource[] = [];
  private control: ControlServer | null = null;
  private readonly config: Config;
  private readonly onStatus?: StatusObserver;
  private started = false;
  private log: Logger = getLogger('Deck');

  constructor(config: Config, deps: DeckDeps = {}) {
    super();
    this.config = config;
    this.onStatus = deps.onStatus;
    this.library = deps.library ?? new MacroLibrary(config.library.path);
    this.input = deps.input ?? this.createInput();

    const relay: StatusObserver = (message) => this.relayStatus(message);

    this.steps = new StepPlaybackEngine({
      keys: deps.keys ?? this.createKeySink(),
      input: this.input,
      toleranceMs: config.playback.toleranceMs,
      pollIntervalMs: config.playback.pollIntervalMs,
      thresholds: config.match,
      onStatus: relay,
    });

    this.frames = new FrameStreamEngine({
      sink: deps.frames ?? this.createFrameSink(),
      mode: config.playback.frameMode,
      axes: config.stream.axes,
      buttons: config.stream.buttons,
      onStatus: relay,
    });
  }

  /** Open sinks, start the input source and (if enabled) the control server */
  async start(): Promise<void> {
    if (this.started) return;
    this.started = true;

    for (const resource of this.owned) {
      await resource.open();
    }
    await this.input.start();

    if (this.config.control.enabled) {
      const control = new ControlServer({
        listenAddress: this.config.control.listenAddress,
        listenPort: this.config.control.listenPort,
      });
      control.on('command', (command: ControlCommand) => this.handleCommand(command));
      await control.start();
      this.control = control;
    }
  }

  /** Stop playback, wait for the engines to settle, release everything */
  async shutdown(): Promise<void> {
    this.stop();
    await Promise.all([this.steps.whenIdle(), this.frames.whenIdle()]);
    if (this.control) {
      this.control.stop();
      this.control = null;
    }
    this.input.stop();
    for (const resource of this.owned) {
      resource.close();
    }
    this.started = false;
  }

  /** Port the control server is bound to, null when not serving */
  get controlPort(): number | null {
    return this.control?.port ?? null;
  }

  isRunning(): boolean {
    return this.steps.isRunning() || this.frames.isRunning();
  }

  /** Run a library macro by name. Returns false when it did not start. */
  runMacro(name: string): boolean {
    const macro = this.library.get(name);
    if (!macro) {
      this.report(`No macro named "${name}"`);
      return false;
    }
    return this.play(macro);
  }

  /** Run a macro definition that may not be in the library */
  play(macro: Macro): boolean {
    if (!macro.enabled) {
      this.report(`Macro "${macro.name}" is disabled`);
      return false;
    }
    if (this.isRunning()) {
      const active = this.activeEngine()?.getState().runName ?? '';
      this.report(`Already running "${active}"; ignored "${macro.name}"`);
      return false;
    }
    return this.engineFor(macro).run(macro.sequence, macro.name);
  }

  stop(): void {
    this.steps.stop();
    this.frames.stop();
  }

  /** Resolves when the active run (if any) has finished */
  async whenIdle(): Promise<RunOutcome | null> {
    const engine = this.activeEngine();
    return engine ? engine.whenIdle() : null;
  }

  handleCommand(command: ControlCommand): void {
    switch (command.type) {
      case 'run':
        this.runMacro(command.name);
        break;
      case 'stop':
        this.stop();
        break;
      case 'hotkey': {
        const macro = this.library.findByHotkey(command.key);
        if (!macro) {
          this.log.debug(`No macro bound to hotkey ${command.key}`);
          return;
        }
        if (this.isRunning()) {
          this.log.debug(`Hotkey ${command.key} ignored while a macro is running`);
          return;
        }
        this.report(`Hotkey ${command.key}: running "${macro.name}"`);
        this.play(macro);
        break;
      }
      case 'trigger': {
        const macro = this.library.findByTrigger(command.address);
        if (macro) {
          this.play(macro);
        } else {
          this.log.debug(`Unrecognized address: ${command.address}`);
        }
        break;
      }
    }
  }

  private engineFor(macro: Macro): PlaybackEngine {
    return macro.kind === 'frames' ? this.frames : this.steps;
  }

  private activeEngine(): PlaybackEngine | null {
    if (this.steps.isRunning()) return this.steps;
    if (this.frames.isRunning()) return this.frames;
    return null;
  }

  /** Deck-level message: logged here, then relayed like engine status */
  private report(message: string): void {
    this.log.info(message);
    this.relayStatus(message);
  }

  private relayStatus(message: string): void {
    this.emit('status', message);
    if (this.onStatus) {
      try {
        this.onStatus(message);
      } catch (err) {
        this.log.warn({ err }, 'Status observer threw');
      }
    }
  }

  private createInput(): InputSnapshotSource {
    if (!this.config.input.enabled) {
      return new NeutralInputSource();
    }
    return new OscInputSource({
      listenAddress: this.config.input.listenAddress,
      listenPort: this.config.input.listenPort,
      staleAfterMs: this.config.input.staleAfterMs,
    });
  }

  private createKeySink(): KeySink {
    if (this.config.keys.mode === 'log') {
      return new LogKeySink();
    }
    const sink = new OscKeySink({ host: this.config.keys.host, port: this.config.keys.port });
    this.owned.push(sink);
    return sink;
  }

  private createFrameSink(): FrameSink {
    const sink = new UdpFrameSink({ host: this.config.stream.host, port: this.config.stream.port });
    this.owned.push(sink);
    return sink;
  }
}
