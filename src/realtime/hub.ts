/**
 * Connection Hub
 *
 * Sole owner of the userId → Connection map. Registration, unregistration
 * and push jobs arrive on three channels and are applied one at a time by a
 * single control loop, so the map is never mutated from anywhere else.
 *
 * Hard rules:
 * - One connection per user; a newer one supersedes the older
 * - Producers never wait: a full queue means the job is dropped
 * - A user whose send queue is full is disconnected, nobody else is affected
 * - Memory-only, single node
 */

import type { Logger } from '../logger';
import { hubLogger } from '../logger';
import { pushDropsTotal, pushFramesEnqueuedTotal, wsConnectionsActive } from '../monitoring/metrics';
import type { PushDropReason } from '../monitoring/metrics';
import { Channel } from './channel';
import type { Connection } from './connection';
import { encodeFrame } from './frames';
import type { FrameEncoder, OutboundFrame, PushJob, UserId } from './frames';

// ============================================================================
// TYPES
// ============================================================================

export interface HubOptions {
  /** Capacity of the push channel shared by all producers. */
  pushQueueSize: number;
  encode?: FrameEncoder;
  logger?: Logger;
}

/** What the rest of the process may ask of the hub. */
export interface PushSink {
  submit(identity: UserId, frame: OutboundFrame): boolean;
}

// ============================================================================
// HUB
// ============================================================================

export class Hub implements PushSink {
  private readonly connections = new Map<UserId, Connection>();
  private readonly registerCh = new Channel<Connection>();
  private readonly unregisterCh = new Channel<Connection>();
  private readonly pushCh: Channel<PushJob>;
  private readonly encode: FrameEncoder;
  private readonly log: Logger;

  private wakeup: (() => void) | null = null;
  private idleWaiters: Array<() => void> = [];
  private loop: Promise<void> | null = null;
  private stopped = false;

  constructor(opts: HubOptions) {
    this.pushCh = new Channel<PushJob>(opts.pushQueueSize);
    this.encode = opts.encode ?? encodeFrame;
    this.log = opts.logger ?? hubLogger;
  }

  // --------------------------------------------------------------------------
  // Inputs (callable from anywhere)
  // --------------------------------------------------------------------------

  register(conn: Connection): void {
    if (this.registerCh.tryPush(conn)) {
      this.wake();
    } else {
      // Stopped: the connection can never be registered
      conn.queue.close('shutdown');
    }
  }

  unregister(conn: Connection): void {
    if (this.unregisterCh.tryPush(conn)) {
      this.wake();
    } else {
      conn.queue.close('shutdown');
    }
  }

  /**
   * Hand a frame to the loop without waiting. Returns false when the push
   * channel is saturated (or the hub stopped) and the frame was dropped.
   */
  submit(identity: UserId, frame: OutboundFrame): boolean {
    if (this.pushCh.tryPush({ identity, frame })) {
      this.wake();
      return true;
    }
    this.drop('hub_saturated', identity);
    return false;
  }

  // --------------------------------------------------------------------------
  // Read-side lookups (never mutate)
  // --------------------------------------------------------------------------

  isOnline(identity: UserId): boolean {
    return this.connections.has(identity);
  }

  onlineCount(): number {
    return this.connections.size;
  }

  get running(): boolean {
    return this.loop !== null && !this.stopped;
  }

  // --------------------------------------------------------------------------
  // Lifecycle
  // --------------------------------------------------------------------------

  start(): void {
    if (this.loop || this.stopped) return;
    this.loop = this.run();
    this.log.info('Hub loop started');
  }

  /**
   * Resolves the next time the loop has nothing left to apply.
   */
  idle(): Promise<void> {
    if (!this.loop || this.stopped || !this.hasWork()) return Promise.resolve();
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /**
   * Ends the loop. Queued jobs are dropped and every connection queue is
   * closed so the write pumps close their streams.
   */
  async stop(): Promise<void> {
    if (this.stopped) return;
    this.stopped = true;

    this.registerCh.close('shutdown');
    this.unregisterCh.close('shutdown');
    this.pushCh.close('shutdown');
    const dropped = this.pushCh.clear();

    this.wake();
    await this.loop;

    const pending = [...this.drain(this.registerCh), ...this.drain(this.unregisterCh)];
    for (const conn of [...this.connections.values(), ...pending]) {
      conn.queue.close('shutdown');
    }
    this.connections.clear();
    wsConnectionsActive.set(0);
    this.releaseIdleWaiters();

    this.log.info({ droppedJobs: dropped }, 'Hub loop stopped');
  }

  private async run(): Promise<void> {
    while (!this.stopped) {
      if (!this.step()) {
        this.releaseIdleWaiters();
        await new Promise<void>((resolve) => {
          this.wakeup = resolve;
        });
      }
    }
  }

  /**
   * Applies one command. Registration first, then unregistration, then
   * pushes, so a push never races ahead of the registration before it.
   */
  private step(): boolean {
    const registering = this.registerCh.tryReceive();
    if (registering) {
      this.guard('register', () => this.applyRegister(registering));
      return true;
    }

    const leaving = this.unregisterCh.tryReceive();
    if (leaving) {
      this.guard('unregister', () => this.applyUnregister(leaving));
      return true;
    }

    const job = this.pushCh.tryReceive();
    if (job) {
      this.guard('push', () => this.applyPush(job));
      return true;
    }

    return false;
  }

  private applyRegister(conn: Connection): void {
    const existing = this.connections.get(conn.userId);
    if (existing && existing !== conn) {
      this.connections.delete(conn.userId);
      existing.queue.close('superseded');
      this.log.info({ userId: conn.userId, connectionId: existing.id }, 'Connection superseded');
    }

    this.connections.set(conn.userId, conn);
    wsConnectionsActive.set(this.connections.size);
    this.log.info({ userId: conn.userId, connectionId: conn.id }, 'Connection registered');
  }

  private applyUnregister(conn: Connection): void {
    if (this.connections.get(conn.userId) === conn) {
      this.connections.delete(conn.userId);
      wsConnectionsActive.set(this.connections.size);
      this.log.info({ userId: conn.userId, connectionId: conn.id }, 'Connection unregistered');
    }
    conn.queue.close('unregistered');
  }

  private applyPush(job: PushJob): void {
    const conn = this.connections.get(job.identity);
    if (!conn) {
      this.drop('offline', job.identity);
      return;
    }

    let data: string;
    try {
      data = this.encode(job.frame);
    } catch (err) {
      this.drop('serialize_failed', job.identity, err);
      return;
    }

    if (conn.queue.tryPush(data)) {
      pushFramesEnqueuedTotal.inc();
      return;
    }

    // Slow consumer: forced unregister and stream teardown
    this.drop('queue_full', job.identity);
    this.connections.delete(conn.userId);
    wsConnectionsActive.set(this.connections.size);
    conn.queue.close('backpressure');
  }

  // --------------------------------------------------------------------------
  // Helpers
  // --------------------------------------------------------------------------

  private drop(reason: PushDropReason, userId: UserId, err?: unknown): void {
    pushDropsTotal.inc({ reason });
    if (reason === 'offline') {
      this.log.debug({ userId, reason }, 'Push dropped');
    } else {
      this.log.warn({ userId, reason, err }, 'Push dropped');
    }
  }

  /** The loop has no error exit; a failing command is logged and skipped. */
  private guard(command: string, fn: () => void): void {
    try {
      fn();
    } catch (err) {
      this.log.error({ err, command }, 'Hub command failed');
    }
  }

  private drain(ch: Channel<Connection>): Connection[] {
    const items: Connection[] = [];
    for (let conn = ch.tryReceive(); conn; conn = ch.tryReceive()) {
      items.push(conn);
    }
    return items;
  }

  private hasWork(): boolean {
    return this.registerCh.size > 0 || this.unregisterCh.size > 0 || this.pushCh.size > 0;
  }

  private wake(): void {
    const wakeup = this.wakeup;
    this.wakeup = null;
    wakeup?.();
  }

  private releaseIdleWaiters(): void {
    for (const resolve of this.idleWaiters.splice(0)) {
      resolve();
    }
  }
}
