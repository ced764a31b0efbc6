/**
 * Key Sinks
 *
 * Where key steps land. The engine hands over a resolved KeyId and
 * expects no answer back.
 *
 *   LogKeySink   dry run: logs and remembers every call
 *   OscKeySink   sends /key/press and /key/release to a key injector
 *                process (e.g. a small helper bound to the OS input API)
 */

import * as dgram from 'dgram';
import * as osc from 'osc';
import { Logger } from 'pino';
import { getLogger } from '../logger';
import { KeyId, formatKeyId } from '../keys/key-names';
import { KeyActionType } from '../sequence/types';
import { stringArg } from '../osc/osc-args';

export interface KeySink {
  press(key: KeyId): void;
  release(key: KeyId): void;
}

export interface KeyEvent {
  action: KeyActionType;
  key: string;
  timestamp: number;
}

export class LogKeySink implements KeySink {
  private readonly events: KeyEvent[] = [];
  private readonly maxEvents: number;
  private log: Logger = getLogger('Keys');

  constructor(maxEvents = 200) {
    this.maxEvents = maxEvents;
  }

  press(key: KeyId): void {
    this.record('press', key);
  }

  release(key: KeyId): void {
    this.record('release', key);
  }

  /** Recorded key events, oldest first */
  getEvents(): KeyEvent[] {
    return [...this.events];
  }

  private record(action: KeyActionType, key: KeyId): void {
    const event: KeyEvent = { action, key: formatKeyId(key), timestamp: Date.now() };
    this.events.push(event);
    if (this.events.length > this.maxEvents) {
      this.events.shift();
    }
    this.log.info(`${action} ${event.key}`);
  }
}

export interface OscKeySinkOptions {
  host: string;
  port: number;
}

export class OscKeySink implements KeySink {
  private readonly host: string;
  private readonly port: number;
  private socket: dgram.Socket | null = null;
  private log: Logger = getLogger('Keys');

  constructor(opts: OscKeySinkOptions) {
    this.host = opts.host;
    this.port = opts.port;
  }

  open(): void {
    if (this.socket) return;
    const socket = dgram.createSocket('udp4');
    socket.on('error', (err: Error) => {
      this.log.error(`UDP error: ${err.message}`);
    });
    this.socket = socket;
  }

  close(): void {
    if (this.socket) {
      this.socket.close();
      this.socket = null;
    }
  }

  press(key: KeyId): void {
    this.send('/key/press', key);
  }

  release(key: KeyId): void {
    this.send('/key/release', key);
  }

  private send(address: string, key: KeyId): void {
    if (!this.socket) {
      this.log.warn(`Not open, dropped ${address} ${formatKeyId(key)}`);
      return;
    }

    const msg = osc.writeMessage({ address, args: [stringArg(formatKeyId(key))] });
    this.socket.send(msg, this.port, this.host, (err) => {
      if (err) {
        this.log.error(`Send error: ${err.message}`);
      }
    });
    this.log.debug(`-> ${address} ${formatKeyId(key)}`);
  }
}
