/**
 * FrameConsumerEmulator — stand-in for the remote frame consumer
 *
 * Binds a UDP port, decodes one JSON stream event per datagram and keeps:
 *   - an event log ring buffer
 *   - the input vector the consumer is currently "holding"
 *
 * Useful for trying out frame macros without the real consumer running,
 * and as the receiving end in tests.
 *
 * Emits 'event' (StreamEvent) for every decoded datagram.
 */

import { EventEmitter } from 'events';
import * as dgram from 'dgram';
import { z } from 'zod';
import { Logger } from 'pino';
import { getLogger } from '../logger';
import { StreamEvent } from '../output/frame-sink';
import { InputVector } from '../sequence/types';

const streamEventSchema = z.object({
  type: z.enum(['start', 'frame', 'end', 'reset']),
  name: z.string(),
  dt_ms: z.number().optional(),
  inputs: z.record(z.union([z.number(), z.boolean()])).optional(),
  timestamp: z.number(),
});

export interface FrameConsumerOptions {
  listenAddress?: string;
  listenPort?: number;
  maxLogSize?: number;
}

export class FrameConsumerEmulator extends EventEmitter {
  private socket: dgram.Socket | null = null;
  private readonly listenAddress: string;
  private readonly listenPort: number;
  private readonly maxLogSize: number;
  private received: StreamEvent[] = [];
  private holding: InputVector = {};
  private rejected = 0;
  private log: Logger = getLogger('Emulator:consumer');

  constructor(opts: FrameConsumerOptions = {}) {
    super();
    this.listenAddress = opts.listenAddress ?? '127.0.0.1';
    this.listenPort = opts.listenPort ?? 0;
    this.maxLogSize = opts.maxLogSize ?? 500;
  }

  /** Resolves with the bound port */
  start(): Promise<number> {
    return new Promise((resolve, reject) => {
      const socket = dgram.createSocket('udp4');
      this.socket = socket;
      socket.once('error', reject);
      socket.on('message', (buf: Buffer) => this.handleDatagram(buf));
      socket.bind(this.listenPort, this.listenAddress, () => {
        socket.off('error', reject);
        socket.on('error', (err: Error) => this.log.warn(`UDP error: ${err.message}`));
        const port = socket.address().port;
        this.log.info(`Consumer listening on ${this.listenAddress}:${port}`);
        resolve(port);
      });
    });
  }

  stop(): void {
    if (this.socket) {
      this.socket.close();
      this.socket = null;
    }
  }

  /** Received events, oldest first */
  getEvents(): StreamEvent[] {
    return [...this.received];
  }

  /** Inputs currently held, as a consumer that merges frames would see them */
  getHolding(): InputVector {
    return { ...this.holding };
  }

  /** Datagrams that were not valid stream events */
  get rejectedCount(): number {
    return this.rejected;
  }

  /** Resolves once count events have arrived, rejects after timeoutMs */
  waitForEvents(count: number, timeoutMs = 2000): Promise<StreamEvent[]> {
    if (this.received.length >= count) {
      return Promise.resolve(this.getEvents());
    }
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.off('event', onEvent);
        reject(new Error(`Timed out with ${this.received.length}/${count} events`));
      }, timeoutMs);
      const onEvent = () => {
        if (this.received.length >= count) {
          clearTimeout(timer);
          this.off('event', onEvent);
          resolve(this.getEvents());
        }
      };
      this.on('event', onEvent);
    });
  }

  private handleDatagram(buf: Buffer): void {
    let parsed: unknown;
    try {
      parsed = JSON.parse(buf.toString('utf-8'));
    } catch (err) {
      this.rejected++;
      this.log.debug(`Rejected non-JSON datagram: ${err instanceof Error ? err.message : String(err)}`);
      return;
    }

    const result = streamEventSchema.safeParse(parsed);
    if (!result.success) {
      this.rejected++;
      this.log.debug('Rejected datagram that is not a stream event');
      return;
    }

    const event: StreamEvent = result.data;
    if (event.inputs && (event.type === 'frame' || event.type === 'reset')) {
      this.holding = { ...this.holding, ...event.inputs };
    }

    this.received.push(event);
    if (this.received.length > this.maxLogSize) {
      this.received.shift();
    }
    this.log.debug(`${event.type} "${event.name}"${event.dt_ms !== undefined ? ` ${event.dt_ms} ms` : ''}`);
    this.emit('event', event);
  }
}
