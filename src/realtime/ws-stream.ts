/**
 * Adapts a `ws` socket to the PushStream interface.
 */

import type { RawData } from 'ws';
import type { InboundEvent, PushStream } from './connection';

const OPEN = 1;

// Inbound frames are liveness signals only; a flood beyond this is dropped.
const MAX_BUFFERED_EVENTS = 32;

/** The slice of a `ws` WebSocket the adapter uses. */
export interface WsLike {
  readonly readyState: number;
  send(data: string, cb?: (err?: Error) => void): void;
  ping(): void;
  close(code?: number, reason?: string): void;
  terminate(): void;
  on(event: 'message', listener: (data: RawData, isBinary: boolean) => void): this;
  on(event: 'pong', listener: () => void): this;
  on(event: 'close', listener: (code: number, reason: Buffer) => void): this;
  on(event: 'error', listener: (err: Error) => void): this;
}

export class WsPushStream implements PushStream {
  private readonly events: InboundEvent[] = [];
  private readonly waiters: Array<(event: InboundEvent) => void> = [];
  private readonly pendingSends = new Set<(err: Error) => void>();
  private ended: InboundEvent | null = null;

  constructor(private readonly socket: WsLike) {
    socket.on('message', (data, isBinary) => {
      this.emit({ type: 'message', data: isBinary ? '' : rawToString(data) });
    });
    socket.on('pong', () => this.emit({ type: 'pong' }));
    socket.on('error', (error) => this.end({ type: 'error', error }));
    socket.on('close', (code, reason) => {
      this.end({ type: 'close', code, reason: reason.toString() });
    });
  }

  send(data: string): Promise<void> {
    if (this.ended || this.socket.readyState !== OPEN) {
      return Promise.reject(new Error('Stream is not open'));
    }

    return new Promise<void>((resolve, reject) => {
      this.pendingSends.add(reject);
      this.socket.send(data, (err) => {
        this.pendingSends.delete(reject);
        if (err) reject(err);
        else resolve();
      });
    });
  }

  ping(): void {
    this.socket.ping();
  }

  next(): Promise<InboundEvent> {
    const [queued] = this.events.splice(0, 1);
    if (queued) return Promise.resolve(queued);
    if (this.ended) return Promise.resolve(this.ended);
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  close(code: number, reason: string): void {
    if (this.ended) return;
    this.socket.close(code, reason);
  }

  terminate(): void {
    this.socket.terminate();
  }

  private emit(event: InboundEvent): void {
    if (this.ended) return;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(event);
    } else if (this.events.length < MAX_BUFFERED_EVENTS) {
      this.events.push(event);
    }
  }

  private end(event: InboundEvent): void {
    if (this.ended) return;
    this.ended = event;

    for (const waiter of this.waiters.splice(0)) {
      waiter(event);
    }

    const closed = new Error('Stream closed');
    for (const reject of this.pendingSends) {
      reject(closed);
    }
    this.pendingSends.clear();
  }
}

function rawToString(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');
  return data.toString('utf8');
}
