/**
 * OSC Input Source
 *
 * Receives controller state from an external bridge process over OSC/UDP
 * and keeps the latest state in a SnapshotCell. The bridge owns the
 * actual device polling; this side only records what it reports.
 *
 *   /input/button/{name}   int|float|bool   pressed above 0.5 (or true)
 *   /input/axes            float x, float y stick position, -1..1
 *   /input/pressed         string...        replace the whole pressed set
 *   /input/reset                            back to neutral
 *
 * When the bridge goes quiet for longer than staleAfterMs the snapshot
 * degrades to neutral, so a dead controller never looks like a held input.
 */

import { Logger } from 'pino';
import { getLogger } from '../logger';
import { OscListener } from '../osc/osc-listener';
import { TypedOscArg, getBool, getFloat, getStrings } from '../osc/osc-args';
import { clampAxis } from '../sequence/input-vector';
import { InputSnapshotSource, Snapshot, SnapshotCell, neutralSnapshot } from './snapshot';

export interface OscInputSourceOptions {
  listenAddress?: string;
  listenPort?: number;
  /** 0 disables staleness */
  staleAfterMs?: number;
}

export class OscInputSource implements InputSnapshotSource {
  private readonly cell = new SnapshotCell();
  private readonly listener: OscListener;
  private readonly staleAfterMs: number;
  private log: Logger = getLogger('Input');

  constructor(opts: OscInputSourceOptions = {}) {
    this.staleAfterMs = opts.staleAfterMs ?? 1000;
    this.listener = new OscListener({
      localAddress: opts.listenAddress,
      localPort: opts.listenPort,
      name: 'Input',
    });
    this.listener.on('message', (address: string, args: TypedOscArg[]) => {
      this.handleMessage(address, args);
    });
    this.listener.on('error', (err: Error) => {
      this.log.warn(`Input listener error: ${err.message}`);
    });
  }

  /** Resolves with the bound UDP port */
  start(): Promise<number> {
    return this.listener.start();
  }

  stop(): void {
    this.listener.stop();
    this.cell.reset();
  }

  get port(): number | null {
    return this.listener.port;
  }

  snapshot(): Snapshot {
    const now = Date.now();
    const last = this.cell.lastUpdate;
    if (last === 0 || (this.staleAfterMs > 0 && now - last > this.staleAfterMs)) {
      return neutralSnapshot(now);
    }
    return this.cell.read();
  }

  /** Apply one OSC message to the cell. Unknown addresses are ignored. */
  handleMessage(address: string, args: readonly unknown[]): void {
    const parts = address.replace(/\/$/, '').split('/').filter(Boolean);
    if (parts[0]?.toLowerCase() !== 'input') return;

    const command = parts[1]?.toLowerCase();
    switch (command) {
      case 'button': {
        const name = parts.slice(2).join('/');
        if (!name) return;
        this.cell.setPressed(name, getBool(args));
        break;
      }
      case 'axes':
        this.cell.setAxes(clampAxis(getFloat(args, 0)), clampAxis(getFloat(args, 1)));
        break;
      case 'pressed':
        this.cell.replacePressed(getStrings(args).filter(s => s.length > 0));
        break;
      case 'reset':
        this.cell.reset();
        break;
      default:
        this.log.debug(`Unrecognized input address: ${address}`);
    }
  }
}
