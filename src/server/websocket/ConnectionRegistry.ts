import type { Principal } from '../../shared/types/game';
import type { ServerMessage } from '../../shared/types/websocket';
import { AsyncLock } from '../utils/asyncLock';
import { logger } from '../utils/logger';
import { Outbox, type MessageTransport } from './Outbox';

/** Opaque identity of one live connection. */
export type ConnectionHandle = string;

interface ConnectionEntry {
  principal: Principal;
  outbox: Outbox;
  /** Serializes inbound envelopes from this connection. */
  inbound: AsyncLock;
  /** Games this connection has been bound to, consulted on teardown. */
  sessions: Set<string>;
}

/**
 * Something that can deliver a message to a connection handle. Sessions and
 * the matchmaking queue only see this, never the registry itself.
 */
export interface MessageNotifier {
  send(handle: ConnectionHandle, message: ServerMessage): boolean;
}

/**
 * Owns every live connection: the principal bound to it, its outbox and its
 * inbound ordering lock. Holds no game logic; unregistering never touches a
 * session.
 */
export class ConnectionRegistry implements MessageNotifier {
  private readonly connections = new Map<ConnectionHandle, ConnectionEntry>();
  private nextId = 1;

  constructor(private readonly outboxMaxQueued: number) {}

  public allocateHandle(): ConnectionHandle {
    const handle = `conn-${this.nextId}`;
    this.nextId += 1;
    return handle;
  }

  public register(handle: ConnectionHandle, principal: Principal, transport: MessageTransport): void {
    if (this.connections.has(handle)) {
      throw new Error(`Connection ${handle} is already registered`);
    }
    this.connections.set(handle, {
      principal,
      outbox: new Outbox(handle, transport, this.outboxMaxQueued),
      inbound: new AsyncLock(),
      sessions: new Set(),
    });
    logger.debug('Connection registered', { connectionId: handle, userId: principal.id });
  }

  /**
   * Remove the handle and close its outbox. Returns the games the
   * connection was bound to so the caller can clear those bindings.
   */
  public unregister(handle: ConnectionHandle): string[] {
    const entry = this.connections.get(handle);
    if (!entry) {
      return [];
    }
    entry.outbox.close();
    this.connections.delete(handle);
    logger.debug('Connection unregistered', { connectionId: handle, userId: entry.principal.id });
    return Array.from(entry.sessions);
  }

  public principalOf(handle: ConnectionHandle): Principal | undefined {
    return this.connections.get(handle)?.principal;
  }

  public has(handle: ConnectionHandle): boolean {
    return this.connections.has(handle);
  }

  /**
   * Enqueue a message on the connection's outbox. Sending to a handle that
   * is no longer registered is a no-op.
   */
  public send(handle: ConnectionHandle, message: ServerMessage): boolean {
    const entry = this.connections.get(handle);
    if (!entry) {
      return false;
    }
    return entry.outbox.enqueue(message);
  }

  /**
   * Run an inbound handler for `handle` after every earlier envelope from
   * the same connection has finished.
   */
  public runInbound<T>(handle: ConnectionHandle, operation: () => Promise<T>): Promise<T> {
    const entry = this.connections.get(handle);
    if (!entry) {
      return Promise.reject(new Error(`Connection ${handle} is not registered`));
    }
    return entry.inbound.runExclusive(operation);
  }

  public trackSession(handle: ConnectionHandle, gameId: string): void {
    this.connections.get(handle)?.sessions.add(gameId);
  }

  public sessionsOf(handle: ConnectionHandle): string[] {
    const entry = this.connections.get(handle);
    return entry ? Array.from(entry.sessions) : [];
  }

  /** Resolves once the connection's outbox has flushed. */
  public async flush(handle: ConnectionHandle): Promise<void> {
    await this.connections.get(handle)?.outbox.whenIdle();
  }

  public get size(): number {
    return this.connections.size;
  }
}
