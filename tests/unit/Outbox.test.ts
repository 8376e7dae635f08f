/**
 * Outbox Unit Tests
 *
 * Per-connection write serialization and the bounded queue.
 */

import { Outbox, type MessageTransport } from '../../src/server/websocket/Outbox';
import type { ServerMessage } from '../../src/shared/types/websocket';
import { FakeTransport, settle } from '../helpers/relayTestUtils';

jest.mock('../../src/server/utils/logger', () => ({
  logger: {
    info: jest.fn(),
    error: jest.fn(),
    warn: jest.fn(),
    debug: jest.fn(),
  },
}));

const chat = (message: string): ServerMessage => ({ type: 'chat', payload: { sender: 'alice', message } });

describe('Outbox', () => {
  it('should deliver messages in enqueue order', async () => {
    const transport = new FakeTransport();
    const outbox = new Outbox('conn-1', transport, 8);

    expect(outbox.enqueue(chat('one'))).toBe(true);
    expect(outbox.enqueue(chat('two'))).toBe(true);
    expect(outbox.enqueue(chat('three'))).toBe(true);
    await outbox.whenIdle();

    expect(transport.sent.map((message) => (message.type === 'chat' ? message.payload.message : ''))).toEqual([
      'one',
      'two',
      'three',
    ]);
  });

  it('should never start a write before the previous one finished', async () => {
    let inFlight = 0;
    let maxInFlight = 0;
    const transport: MessageTransport = {
      write: async () => {
        inFlight += 1;
        maxInFlight = Math.max(maxInFlight, inFlight);
        await new Promise((resolve) => setImmediate(resolve));
        inFlight -= 1;
      },
      close: jest.fn(),
    };
    const outbox = new Outbox('conn-1', transport, 8);

    for (let i = 0; i < 5; i += 1) {
      outbox.enqueue(chat(`m${i}`));
    }
    await outbox.whenIdle();

    expect(maxInFlight).toBe(1);
  });

  it('should close the connection when the queue overflows', () => {
    const close = jest.fn();
    const transport: MessageTransport = {
      // A write that never completes keeps everything else queued.
      write: () => new Promise<void>(() => undefined),
      close,
    };
    const outbox = new Outbox('conn-1', transport, 2);

    expect(outbox.enqueue(chat('in flight'))).toBe(true);
    expect(outbox.enqueue(chat('queued 1'))).toBe(true);
    expect(outbox.enqueue(chat('queued 2'))).toBe(true);
    expect(outbox.enqueue(chat('overflow'))).toBe(false);

    expect(close).toHaveBeenCalledWith('outbound queue overflow');
    expect(outbox.isClosed()).toBe(true);
    expect(outbox.size).toBe(0);
    expect(outbox.enqueue(chat('after close'))).toBe(false);
  });

  it('should close the connection when a write fails', async () => {
    const transport = new FakeTransport();
    transport.failWrites = true;
    const outbox = new Outbox('conn-1', transport, 8);

    outbox.enqueue(chat('one'));
    outbox.enqueue(chat('two'));
    await settle();

    expect(transport.closedReason).toBe('write failed');
    expect(outbox.isClosed()).toBe(true);
    expect(transport.sent).toEqual([]);
  });

  it('should drop queued messages on close without touching the transport', async () => {
    const transport = new FakeTransport();
    const outbox = new Outbox('conn-1', transport, 8);

    outbox.close();
    expect(outbox.enqueue(chat('late'))).toBe(false);
    await outbox.whenIdle();

    expect(transport.sent).toEqual([]);
    expect(transport.closedReason).toBeNull();
  });
});
