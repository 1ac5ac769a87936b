import { EventEmitter } from 'node:events';
import { afterEach, describe, it, expect, vi } from 'vitest';
import { LineTransport } from '../transport.js';
import { ConnectError, ProtocolError, SendError } from '../errors.js';

class MockSocket extends EventEmitter {
  writes: Buffer[] = [];
  destroyed = false;
  connectArgs?: { port: number; host: string };
  private connectListener?: () => void;

  connect(port: number, host: string, listener: () => void): this {
    this.connectArgs = { port, host };
    this.connectListener = listener;
    return this;
  }

  /** Simulate the TCP handshake completing. */
  accept(): void {
    this.connectListener?.();
  }

  write(data: Uint8Array, callback: (err?: Error | null) => void): boolean {
    this.writes.push(Buffer.from(data));
    callback(null);
    return true;
  }

  destroy(): this {
    this.destroyed = true;
    return this;
  }
}

function setup(options: { connectTimeoutMs?: number; maxLineLength?: number } = {}) {
  const socket = new MockSocket();
  const transport = new LineTransport({ ...options, createSocket: () => socket });
  return { socket, transport };
}

async function connected(options?: { maxLineLength?: number }) {
  const { socket, transport } = setup(options);
  const pending = transport.connect({ host: '10.0.0.5' });
  socket.accept();
  await pending;
  return { socket, transport };
}

async function collect(iterable: AsyncIterable<string>): Promise<string[]> {
  const lines: string[] = [];
  for await (const line of iterable) lines.push(line);
  return lines;
}

afterEach(() => {
  vi.useRealTimers();
});

describe('LineTransport', () => {
  it('connects to the default CLI port', async () => {
    const { socket, transport } = await connected();
    expect(socket.connectArgs).toEqual({ port: 1255, host: '10.0.0.5' });
    expect(transport.connected).toBe(true);
  });

  it('connects to an explicit port', async () => {
    const { socket, transport } = setup();
    const pending = transport.connect({ host: '10.0.0.5', port: 2255 });
    socket.accept();
    await pending;
    expect(socket.connectArgs).toEqual({ port: 2255, host: '10.0.0.5' });
  });

  it('rejects with ConnectError when the socket errors before connecting', async () => {
    const { socket, transport } = setup();
    const pending = transport.connect({ host: '10.0.0.5' });
    socket.emit('error', new Error('ECONNREFUSED'));

    await expect(pending).rejects.toThrow(new ConnectError('Unable to connect to 10.0.0.5:1255: ECONNREFUSED'));
    expect(socket.destroyed).toBe(true);
    expect(transport.connected).toBe(false);
  });

  it('rejects with ConnectError when connecting takes too long', async () => {
    vi.useFakeTimers();
    const { transport } = setup({ connectTimeoutMs: 100 });
    const pending = transport.connect({ host: '10.0.0.5' }).catch((e: unknown) => e);

    vi.advanceTimersByTime(100);
    const error = await pending;
    expect(error).toBeInstanceOf(ConnectError);
    expect(error).toHaveProperty('message', 'Timed out connecting to 10.0.0.5:1255 after 100ms');
  });

  it('cannot be connected twice', async () => {
    const { transport } = await connected();
    await expect(transport.connect({ host: '10.0.0.5' })).rejects.toThrow('Transport has already been used');
  });

  it('writes lines terminated by CRLF', async () => {
    const { socket, transport } = await connected();
    await transport.send('heos://system/heart_beat');
    expect(socket.writes.map((b) => b.toString())).toEqual(['heos://system/heart_beat\r\n']);
  });

  it('rejects sends before connecting', async () => {
    const { transport } = setup();
    await expect(transport.send('heos://system/heart_beat')).rejects.toBeInstanceOf(SendError);
  });

  it('yields complete lines across reads and ends when the socket closes', async () => {
    const { socket, transport } = await connected();
    const lines = collect(transport.messages());

    socket.emit('data', Buffer.from('{"a":1}\r\n{"b"'));
    socket.emit('data', Buffer.from(':2}\r\n'));
    socket.emit('close');

    expect(await lines).toEqual(['{"a":1}', '{"b":2}']);
    expect(transport.connected).toBe(false);
  });

  it('closes with ProtocolError when a line exceeds the limit', async () => {
    const { socket, transport } = await connected({ maxLineLength: 16 });
    const lines = collect(transport.messages());

    socket.emit('data', Buffer.from('{"a":1}\r\n'));
    socket.emit('data', Buffer.from('x'.repeat(20)));

    await expect(lines).rejects.toBeInstanceOf(ProtocolError);
    expect(socket.destroyed).toBe(true);
  });

  it('unblocks a waiting consumer on close', async () => {
    const { transport } = await connected();
    const lines = collect(transport.messages());
    transport.close();
    expect(await lines).toEqual([]);
  });

  it('allows messages() to be iterated only once', async () => {
    const { transport } = await connected();
    const first = collect(transport.messages());
    expect(() => transport.messages()[Symbol.asyncIterator]()).toThrow('AsyncQueue can only be iterated once');
    transport.close();
    await first;
  });
});
