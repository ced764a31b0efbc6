/**
 * OSC Listener
 *
 * Binds a UDP socket and decodes incoming OSC messages. Used by the
 * controller input source and the macro control server, each on its
 * own port.
 *
 * Emits:
 *   'message' (address: string, args: TypedOscArg[], from: RemoteInfo)
 *   'ready'   (port: number)
 *   'error'   (err: Error)
 */

import { EventEmitter } from 'events';
import * as dgram from 'dgram';
import * as osc from 'osc';
import { Logger } from 'pino';
import { getLogger } from '../logger';
import { TypedOscArg } from './osc-args';

export interface OscListenerOptions {
  localAddress?: string;
  localPort?: number;
  /** Tag used for the scoped logger, e.g. "Input" or "Control" */
  name?: string;
}

export class OscListener extends EventEmitter {
  private socket: dgram.Socket | null = null;
  private readonly localAddress: string;
  private readonly localPort: number;
  private boundPort: number | null = null;
  private log: Logger;

  constructor(opts: OscListenerOptions = {}) {
    super();
    this.localAddress = opts.localAddress ?? '0.0.0.0';
    this.localPort = opts.localPort ?? 0;
    this.log = getLogger(opts.name ?? 'OSC');
  }

  /** Bind the socket. Resolves with the bound port (useful when localPort is 0). */
  start(): Promise<number> {
    if (this.socket && this.boundPort !== null) {
      return Promise.resolve(this.boundPort);
    }

    return new Promise((resolve, reject) => {
      const socket = dgram.createSocket('udp4');
      this.socket = socket;

      const onBindError = (err: Error) => {
        this.socket = null;
        reject(err);
      };
      socket.once('error', onBindError);

      socket.on('message', (buf: Buffer, rinfo: dgram.RemoteInfo) => {
        this.handleDatagram(buf, rinfo);
      });

      socket.bind(this.localPort, this.localAddress, () => {
        socket.off('error', onBindError);
        socket.on('error', (err: Error) => {
          this.log.error({ err }, `UDP error: ${err.message}`);
          this.emit('error', err);
        });
        this.boundPort = socket.address().port;
        this.log.info(`Listening on ${this.localAddress}:${this.boundPort}`);
        this.emit('ready', this.boundPort);
        resolve(this.boundPort);
      });
    });
  }

  stop(): void {
    if (this.socket) {
      this.socket.close();
      this.socket = null;
    }
    this.boundPort = null;
  }

  /** Bound port, or null when not listening */
  get port(): number | null {
    return this.boundPort;
  }

  private handleDatagram(buf: Buffer, rinfo: dgram.RemoteInfo): void {
    let message: osc.OSCMessage;
    try {
      message = osc.readMessage(buf, { metadata: true });
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      this.log.debug(`Dropped undecodable packet from ${rinfo.address}:${rinfo.port}: ${reason}`);
      return;
    }

    const args: TypedOscArg[] = message.args ?? [];
    this.emit('message', message.address, args, rinfo);
  }
}
