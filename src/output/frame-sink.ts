/**
 * Frame Sinks
 *
 * Stream events for a remote consumer (a game bot, a virtual controller).
 * One JSON object per datagram, fire-and-forget: nothing is acknowledged,
 * nothing is retried. A late input frame does more harm to a real-time
 * consumer than a missing one.
 *
 *   { "type": "start", "name": "Flip", "timestamp": 1700000000000 }
 *   { "type": "frame", "name": "Flip", "dt_ms": 80, "inputs": {...}, "timestamp": ... }
 *   { "type": "end",   "name": "Flip", "timestamp": ... }
 *   { "type": "reset", "name": "Flip", "inputs": {...neutral}, "timestamp": ... }
 */

import * as dgram from 'dgram';
import { Logger } from 'pino';
import { getLogger } from '../logger';
import { InputVector } from '../sequence/types';

export type StreamEventType = 'start' | 'frame' | 'end' | 'reset';

export interface StreamEvent {
  type: StreamEventType;
  name: string;
  dt_ms?: number;
  inputs?: InputVector;
  timestamp: number;
}

export interface FrameSink {
  /** Must not throw; delivery is best effort */
  send(event: StreamEvent): void;
}

export interface UdpFrameSinkOptions {
  host: string;
  port: number;
}

export interface FrameSinkStats {
  sent: number;
  failed: number;
  lastError: string | null;
}

export class UdpFrameSink implements FrameSink {
  private readonly host: string;
  private readonly port: number;
  private socket: dgram.Socket | null = null;
  private stats: FrameSinkStats = { sent: 0, failed: 0, lastError: null };
  private log: Logger = getLogger('Stream');

  constructor(opts: UdpFrameSinkOptions) {
    this.host = opts.host;
    this.port = opts.port;
  }

  open(): void {
    if (this.socket) return;
    const socket = dgram.createSocket('udp4');
    socket.on('error', (err: Error) => {
      this.recordFailure(err.message);
    });
    this.socket = socket;
    this.log.debug(`Streaming to ${this.host}:${this.port}`);
  }

  close(): void {
    if (this.socket) {
      this.socket.close();
      this.socket = null;
    }
  }

  isOpen(): boolean {
    return this.socket !== null;
  }

  getStats(): FrameSinkStats {
    return { ...this.stats };
  }

  send(event: StreamEvent): void {
    if (!this.socket) {
      this.recordFailure(`not open, dropped ${event.type}`);
      return;
    }

    const payload = Buffer.from(JSON.stringify(event), 'utf-8');
    try {
      this.socket.send(payload, this.port, this.host, (err) => {
        if (err) {
          this.recordFailure(err.message);
        } else {
          this.stats.sent++;
        }
      });
    } catch (err) {
      this.recordFailure(err instanceof Error ? err.message : String(err));
    }
  }

  private recordFailure(message: string): void {
    this.stats.failed++;
    this.stats.lastError = message;
    this.log.debug(`Send failed: ${message}`);
  }
}
