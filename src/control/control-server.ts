/**
 * Control Server
 *
 * OSC front door for running and stopping macros:
 *
 *   /macro/run      string name     Run a macro by name
 *   /macro/stop                     Stop whatever is playing
 *   /hotkey         string key      A hotkey bridge saw a key go down
 *   /{anything}                     Matched against macro trigger addresses
 *
 * Parsed commands are emitted as 'command' (ControlCommand); the deck
 * decides what to do with them.
 */

import { EventEmitter } from 'events';
import { Logger } from 'pino';
import { getLogger } from '../logger';
import { OscListener } from '../osc/osc-listener';
import { TypedOscArg, getString } from '../osc/osc-args';

export type ControlCommand =
  | { type: 'run'; name: string }
  | { type: 'stop' }
  | { type: 'hotkey'; key: string }
  | { type: 'trigger'; address: string };

export interface ControlServerOptions {
  listenAddress?: string;
  listenPort?: number;
}

export class ControlServer extends EventEmitter {
  private readonly listener: OscListener;
  private log: Logger = getLogger('Control');

  constructor(opts: ControlServerOptions = {}) {
    super();
    this.listener = new OscListener({
      localAddress: opts.listenAddress,
      localPort: opts.listenPort,
      name: 'Control',
    });
    this.listener.on('message', (address: string, args: TypedOscArg[]) => {
      const command = parseControlMessage(address, args);
      if (command) {
        this.log.debug(`${address} -> ${command.type}`);
        this.emit('command', command);
      } else {
        this.log.warn(`Ignored ${address}: missing argument`);
      }
    });
    this.listener.on('error', (err: Error) => {
      this.log.warn(`Control listener error: ${err.message}`);
    });
  }

  /** Resolves with the bound UDP port */
  start(): Promise<number> {
    return this.listener.start();
  }

  stop(): void {
    this.listener.stop();
  }

  get port(): number | null {
    return this.listener.port;
  }
}

/** Map an OSC message to a command; null when a required argument is missing */
export function parseControlMessage(address: string, args: readonly unknown[]): ControlCommand | null {
  const addr = address.toLowerCase().replace(/\/$/, '');

  switch (addr) {
    case '/macro/run': {
      const name = getString(args).trim();
      return name ? { type: 'run', name } : null;
    }
    case '/macro/stop':
      return { type: 'stop' };
    case '/hotkey': {
      const key = getString(args).trim();
      return key ? { type: 'hotkey', key } : null;
    }
    default:
      return { type: 'trigger', address: addr };
  }
}
