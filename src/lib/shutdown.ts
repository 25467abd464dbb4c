import { logger } from '../logger';

export interface ShutdownHandler {
  name: string;
  priority: number;
  handler: () => Promise<void>;
}

export class GracefulShutdown {
  private handlers: ShutdownHandler[] = [];
  private isShuttingDown = false;
  private readonly forceExitTimeoutMs: number;
  private readonly exit: (code: number) => void;

  constructor(opts: { forceExitTimeoutMs?: number; exit?: (code: number) => void } = {}) {
    this.forceExitTimeoutMs = opts.forceExitTimeoutMs ?? 15000;
    this.exit = opts.exit ?? ((code) => process.exit(code));
  }

  /** Lower priority runs first. */
  register(name: string, priority: number, handler: () => Promise<void>): void {
    this.handlers.push({ name, priority, handler });
  }

  get shuttingDown(): boolean {
    return this.isShuttingDown;
  }

  async shutdown(): Promise<void> {
    if (this.isShuttingDown) {
      return;
    }

    this.isShuttingDown = true;
    logger.info('Graceful shutdown initiated');

    const timeout = setTimeout(() => {
      logger.error('Force exit timeout reached, exiting with error');
      this.exit(1);
    }, this.forceExitTimeoutMs);
    timeout.unref();

    const sortedHandlers = [...this.handlers].sort((a, b) => a.priority - b.priority);

    for (const { name, handler } of sortedHandlers) {
      try {
        logger.info(`Running shutdown handler: ${name}`);
        await handler();
        logger.info(`Shutdown handler completed: ${name}`);
      } catch (error) {
        logger.error({ err: error }, `Shutdown handler failed: ${name}`);
      }
    }

    clearTimeout(timeout);
    logger.info('Graceful shutdown completed');
    this.exit(0);
  }

  setup(): void {
    const onSignal = (signal: NodeJS.Signals) => {
      logger.info(`${signal} received`);
      this.shutdown().catch((err: unknown) => {
        logger.error({ err }, 'Shutdown failed');
        this.exit(1);
      });
    };

    process.on('SIGTERM', onSignal);
    process.on('SIGINT', onSignal);
  }
}

export const gracefulShutdown = new GracefulShutdown();
