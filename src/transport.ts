import { Socket } from 'node:net';
import { ConnectError, ProtocolError, SendError } from './errors.js';
import { noopLogger, type HeosLogger } from './logger.js';
import { HEOS_PORT, DEFAULT_TIMINGS, type Endpoint } from './options.js';
import { encodeLine, parseLines } from './protocol/framing.js';
import { AsyncQueue } from './util/async-queue.js';

/**
 * Bidirectional line stream to one device endpoint.
 * A transport is single-use: once closed it cannot be reconnected.
 */
export interface Transport {
  readonly connected: boolean;
  /** Open the connection. Rejects with `ConnectError`. */
  connect(endpoint: Endpoint): Promise<void>;
  /** Write one message. Rejects with `SendError` when not connected. */
  send(line: string): Promise<void>;
  /**
   * Inbound messages, in wire order. Can be iterated once; ends when the connection closes,
   * or throws the error that closed it.
   */
  messages(): AsyncIterable<string>;
  close(error?: Error): void;
}

export type TransportFactory = () => Transport;

/** The subset of `net.Socket` the transport relies on. */
export interface SocketLike {
  connect(port: number, host: string, connectionListener: () => void): unknown;
  write(data: Uint8Array, callback: (err?: Error | null) => void): boolean;
  destroy(error?: Error): unknown;
  on(event: 'data', listener: (chunk: Buffer) => void): unknown;
  on(event: 'error', listener: (err: Error) => void): unknown;
  on(event: 'close', listener: () => void): unknown;
  once(event: 'error', listener: (err: Error) => void): unknown;
  once(event: 'close', listener: () => void): unknown;
  removeListener(event: 'error', listener: (err: Error) => void): unknown;
  removeListener(event: 'close', listener: () => void): unknown;
}

export interface LineTransportOptions {
  connectTimeoutMs?: number;
  maxLineLength?: number;
  logger?: HeosLogger;
  createSocket?: () => SocketLike;
}

/** HEOS CLI transport over a TCP socket, framed by CRLF. */
export class LineTransport implements Transport {
  private socket?: SocketLike;
  private buffer: Buffer = Buffer.alloc(0);
  private readonly inbound = new AsyncQueue<string>();
  private isConnected = false;
  private isClosed = false;
  private readonly connectTimeoutMs: number;
  private readonly maxLineLength: number;
  private readonly log: HeosLogger;
  private readonly createSocket: () => SocketLike;

  constructor(options: LineTransportOptions = {}) {
    this.connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_TIMINGS.connectTimeoutMs;
    this.maxLineLength = options.maxLineLength ?? DEFAULT_TIMINGS.maxLineLength;
    this.log = options.logger ?? noopLogger;
    this.createSocket = options.createSocket ?? (() => new Socket());
  }

  get connected(): boolean {
    return this.isConnected;
  }

  connect(endpoint: Endpoint): Promise<void> {
    const host = endpoint.host;
    const port = endpoint.port ?? HEOS_PORT;
    if (this.socket || this.isClosed) {
      return Promise.reject(new ConnectError('Transport has already been used'));
    }

    const socket = this.createSocket();
    this.socket = socket;

    return new Promise((resolve, reject) => {
      let settled = false;
      const fail = (error: ConnectError): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        socket.removeListener('error', onError);
        socket.removeListener('close', onClose);
        socket.destroy();
        this.close();
        reject(error);
      };
      const onError = (err: Error): void => {
        fail(new ConnectError(`Unable to connect to ${host}:${port}: ${err.message}`, { cause: err }));
      };
      const onClose = (): void => {
        fail(new ConnectError(`Connection to ${host}:${port} closed before it was established`));
      };
      const timer = setTimeout(() => {
        fail(new ConnectError(`Timed out connecting to ${host}:${port} after ${this.connectTimeoutMs}ms`));
      }, this.connectTimeoutMs);

      socket.once('error', onError);
      socket.once('close', onClose);
      socket.connect(port, host, () => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        socket.removeListener('error', onError);
        socket.removeListener('close', onClose);
        this.isConnected = true;
        this.attach(socket);
        this.log.debug('transport connected', { host, port });
        resolve();
      });
    });
  }

  send(line: string): Promise<void> {
    const socket = this.socket;
    if (!socket || !this.isConnected) {
      return Promise.reject(new SendError('Not connected'));
    }
    return new Promise((resolve, reject) => {
      socket.write(encodeLine(line), (err) => {
        if (err) {
          reject(new SendError(`Write failed: ${err.message}`, { cause: err }));
        } else {
          resolve();
        }
      });
    });
  }

  messages(): AsyncIterable<string> {
    return this.inbound;
  }

  close(error?: Error): void {
    if (this.isClosed) return;
    this.isClosed = true;
    this.isConnected = false;
    if (error) {
      this.log.warn('transport closed with error', { error: error.message });
    }
    this.socket?.destroy();
    this.buffer = Buffer.alloc(0);
    this.inbound.end(error);
  }

  private attach(socket: SocketLike): void {
    socket.on('data', (chunk) => this.onData(chunk));
    socket.on('error', (err) => this.close(err));
    socket.on('close', () => this.close());
  }

  private onData(chunk: Buffer): void {
    if (this.isClosed) return;
    this.buffer = this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);

    let parsed: { lines: string[]; remainder: Buffer };
    try {
      parsed = parseLines(this.buffer, this.maxLineLength);
    } catch (err) {
      this.close(err instanceof ProtocolError ? err : new ProtocolError(String(err), { cause: err }));
      return;
    }
    this.buffer = parsed.remainder;
    for (const line of parsed.lines) {
      this.inbound.push(line);
    }
  }
}
