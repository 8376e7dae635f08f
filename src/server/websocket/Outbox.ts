import type { ServerMessage } from '../../shared/types/websocket';
import { logger } from '../utils/logger';

/**
 * The single writer a connection has. Implemented over a Socket.IO socket
 * in production and by in-memory fakes in tests.
 */
export interface MessageTransport {
  write(message: ServerMessage): void | Promise<void>;
  close(reason: string): void;
}

/**
 * Per-connection outbound queue.
 *
 * Every broadcast path enqueues here; only the drain loop touches the
 * transport, and it awaits each write before starting the next, so two
 * writes to one socket never interleave.
 */
export class Outbox {
  private readonly queue: ServerMessage[] = [];
  private draining = false;
  private closed = false;
  private idleWaiters: Array<() => void> = [];

  constructor(
    private readonly handle: string,
    private readonly transport: MessageTransport,
    private readonly maxQueued: number
  ) {}

  /**
   * Queue a message for delivery. Returns false when the outbox is closed
   * or the message pushed it over its bound (which also closes it).
   */
  public enqueue(message: ServerMessage): boolean {
    if (this.closed) {
      return false;
    }

    if (this.queue.length >= this.maxQueued) {
      logger.warn('Outbound queue full, dropping connection', {
        connectionId: this.handle,
        queued: this.queue.length,
        messageType: message.type,
      });
      this.fail('outbound queue overflow');
      return false;
    }

    this.queue.push(message);
    if (!this.draining) {
      this.draining = true;
      this.drain().catch((err) => {
        logger.error('Outbox drain loop failed', {
          connectionId: this.handle,
          error: err instanceof Error ? err.message : String(err),
        });
      });
    }
    return true;
  }

  /**
   * Stop accepting messages and discard anything still queued.
   * Does not touch the transport.
   */
  public close(): void {
    this.closed = true;
    this.queue.length = 0;
    this.notifyIdle();
  }

  public isClosed(): boolean {
    return this.closed;
  }

  public get size(): number {
    return this.queue.length;
  }

  /**
   * Resolves once every queued message has been written (or the outbox
   * has been closed).
   */
  public whenIdle(): Promise<void> {
    if (!this.draining) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  private async drain(): Promise<void> {
    try {
      let next = this.queue.shift();
      while (next && !this.closed) {
        try {
          await this.transport.write(next);
        } catch (err) {
          logger.warn('Outbound write failed, closing connection', {
            connectionId: this.handle,
            messageType: next.type,
            error: err instanceof Error ? err.message : String(err),
          });
          this.fail('write failed');
          return;
        }
        next = this.queue.shift();
      }
    } finally {
      this.draining = false;
      this.notifyIdle();
    }
  }

  private fail(reason: string): void {
    this.close();
    this.transport.close(reason);
  }

  private notifyIdle(): void {
    if (this.draining) {
      return;
    }
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }
}
