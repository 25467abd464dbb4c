/**
 * Push Connection
 *
 * One authenticated push stream for one user. The hub writes serialized
 * frames into `queue`; the write pump is the only reader and the only writer
 * on the stream. The read pump exists to notice the peer going away.
 *
 * Lifecycle: construct → hub.register(conn) → conn.start()
 */

import { ulid } from 'ulidx';
import type { Logger } from '../logger';
import { wsLogger } from '../logger';
import { Channel } from './channel';
import type { UserId } from './frames';

// ============================================================================
// TYPES
// ============================================================================

export type QueueCloseReason = 'superseded' | 'backpressure' | 'unregistered' | 'shutdown';

export type InboundEvent =
  | { type: 'message'; data: string }
  | { type: 'pong' }
  | { type: 'close'; code: number; reason: string }
  | { type: 'error'; error: Error };

/**
 * Transport seen by a connection. `send` settles once the frame was handed
 * to the socket; `next` yields inbound events in order and keeps yielding
 * `close` once the stream has ended.
 */
export interface PushStream {
  send(data: string): Promise<void>;
  ping(): void;
  next(): Promise<InboundEvent>;
  close(code: number, reason: string): void;
  terminate(): void;
}

export interface HubLink {
  unregister(conn: Connection): void;
}

export interface ConnectionOptions {
  sendQueueSize: number;
  pingIntervalMs: number;
  idleTimeoutMs: number;
  logger?: Logger;
}

export const CLOSE_CODES: Record<QueueCloseReason, { code: number; reason: string }> = {
  superseded: { code: 4000, reason: 'superseded' },
  backpressure: { code: 4008, reason: 'backpressure' },
  unregistered: { code: 1000, reason: 'normal closure' },
  shutdown: { code: 1001, reason: 'server shutting down' },
};

type ReadOutcome = InboundEvent | { type: 'timeout' };

// ============================================================================
// CONNECTION
// ============================================================================

export class Connection {
  readonly id = ulid();
  readonly queue: Channel<string, QueueCloseReason>;

  private readonly log: Logger;
  private unregistered = false;
  private pumps: Promise<void> | null = null;

  constructor(
    readonly userId: UserId,
    private readonly stream: PushStream,
    private readonly hub: HubLink,
    private readonly opts: ConnectionOptions
  ) {
    this.queue = new Channel<string, QueueCloseReason>(opts.sendQueueSize);
    this.log = (opts.logger ?? wsLogger).child({ userId, connectionId: this.id });
  }

  /**
   * Starts both pumps. The returned promise settles when both have exited.
   */
  start(): Promise<void> {
    if (!this.pumps) {
      this.pumps = Promise.all([this.writePump(), this.readPump()]).then(() => {
        this.log.debug('Connection pumps exited');
      });
    }
    return this.pumps;
  }

  // --------------------------------------------------------------------------
  // Write pump
  // --------------------------------------------------------------------------

  async writePump(): Promise<void> {
    const ping = setInterval(() => this.sendPing(), this.opts.pingIntervalMs);

    // Backpressure tears the stream down at once, even mid-send
    void this.queue.closed.then((reason) => {
      if (reason === 'backpressure') {
        this.log.warn('Send queue full, disconnecting');
        this.stream.terminate();
      }
    }, () => undefined);

    let writeFailed = false;
    try {
      for await (const data of this.queue) {
        if (this.queue.closeReason === 'backpressure') break;
        await this.stream.send(data);
      }
    } catch (err) {
      writeFailed = true;
      this.log.warn({ err }, 'Write failed, closing stream');
    } finally {
      clearInterval(ping);
    }

    const reason = this.queue.closeReason;
    if (writeFailed || reason === null) {
      // The read pump sees the stream end and unregisters
      this.stream.terminate();
    } else if (reason !== 'backpressure') {
      const { code, reason: text } = CLOSE_CODES[reason];
      this.stream.close(code, text);
    }
  }

  private sendPing(): void {
    try {
      this.stream.ping();
    } catch (err) {
      this.log.warn({ err }, 'Ping failed, closing stream');
      this.stream.terminate();
    }
  }

  // --------------------------------------------------------------------------
  // Read pump
  // --------------------------------------------------------------------------

  async readPump(): Promise<void> {
    try {
      for (;;) {
        const event = await this.nextWithin(this.opts.idleTimeoutMs);

        if (event.type === 'message' || event.type === 'pong') {
          // Inbound frames only prove liveness
          continue;
        }

        if (event.type === 'timeout') {
          this.log.info({ idleTimeoutMs: this.opts.idleTimeoutMs }, 'Idle timeout, closing stream');
          this.stream.terminate();
        } else if (event.type === 'error') {
          this.log.warn({ err: event.error }, 'Stream error');
          this.stream.terminate();
        } else {
          this.log.info({ code: event.code, reason: event.reason }, 'Peer closed stream');
        }
        return;
      }
    } finally {
      this.leave();
    }
  }

  private nextWithin(timeoutMs: number): Promise<ReadOutcome> {
    return new Promise<ReadOutcome>((resolve) => {
      const timer = setTimeout(() => resolve({ type: 'timeout' }), timeoutMs);
      this.stream.next().then(
        (event) => {
          clearTimeout(timer);
          resolve(event);
        },
        (err: unknown) => {
          clearTimeout(timer);
          resolve({ type: 'error', error: err instanceof Error ? err : new Error(String(err)) });
        }
      );
    });
  }

  private leave(): void {
    if (this.unregistered) return;
    this.unregistered = true;
    this.hub.unregister(this);
  }
}
