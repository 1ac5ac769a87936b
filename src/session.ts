import { EventEmitter } from 'node:events';
import { CommandCorrelator, type SubmitOptions } from './correlator.js';
import { EventDemultiplexer } from './demultiplexer.js';
import {
  AuthError,
  CommandError,
  DisconnectedError,
  HeosError,
  ProtocolError,
  SendError,
} from './errors.js';
import { describeError, type HeosLogger } from './logger.js';
import { backoffDelay, type Endpoint, type HeosCredentials, type ResolvedOptions } from './options.js';
import { Commands } from './protocol/commands.js';
import type { HeosCommand, HeosResponse } from './protocol/messages.js';
import { LineTransport, type Transport } from './transport.js';

export enum SessionState {
  Disconnected = 'disconnected',
  Connecting = 'connecting',
  Authenticating = 'authenticating',
  Ready = 'ready',
  Degraded = 'degraded',
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * Owns the connection to one device: connects, authenticates, keeps the link alive with
 * heartbeats and reconnects with exponential backoff after the link drops.
 *
 * Events:
 * - `stateChange` (state, previous)
 * - `ready` after every transition into `ready`
 * - `error` when the session gives up (credentials rejected on reconnect)
 */
export class SessionManager extends EventEmitter {
  readonly correlator: CommandCorrelator;
  readonly demux: EventDemultiplexer;

  private currentState = SessionState.Disconnected;
  private transport?: Transport;
  private failure: Error | null = null;
  private stopped = true;
  private generation = 0;
  private attempt = 0;
  private heartbeatFailures = 0;
  private heartbeatTimer?: ReturnType<typeof setInterval>;
  private reconnectTimer?: ReturnType<typeof setTimeout>;
  private readonly readyHooks: Array<() => void> = [];
  private readonly log: HeosLogger;

  constructor(
    private readonly endpoint: Endpoint,
    private readonly credentials: HeosCredentials | undefined,
    private readonly options: ResolvedOptions,
  ) {
    super();
    this.log = options.logger;
    this.correlator = new CommandCorrelator({
      send: (line) => this.write(line),
      timeoutMs: options.commandTimeoutMs,
      logger: options.logger,
    });
    this.demux = new EventDemultiplexer({
      correlator: this.correlator,
      queueSize: options.subscriberQueueSize,
      logger: options.logger,
    });
  }

  get state(): SessionState {
    return this.currentState;
  }

  /** The error behind the last failed connection attempt or dropped connection. */
  get lastError(): Error | null {
    return this.failure;
  }

  /** Run `hook` on every transition into `ready`, including the first. */
  onReady(hook: () => void): void {
    this.readyHooks.push(hook);
  }

  /**
   * Connect and authenticate. Rejects with `ConnectError`, `AuthError` or `DisconnectedError`
   * and leaves the session disconnected when the first attempt fails.
   */
  async start(): Promise<void> {
    if (this.currentState !== SessionState.Disconnected) {
      throw new HeosError(`Session is already ${this.currentState}`);
    }
    this.stopped = false;
    this.attempt = 0;
    try {
      await this.establish();
    } catch (err) {
      const error = toError(err);
      this.failure = error;
      this.setState(SessionState.Disconnected);
      throw error;
    }
  }

  /** Send a command. Rejects immediately with `DisconnectedError` unless the session is usable. */
  submit(command: HeosCommand, options?: SubmitOptions): Promise<HeosResponse> {
    if (this.currentState !== SessionState.Ready && this.currentState !== SessionState.Authenticating) {
      return Promise.reject(new DisconnectedError(`Session is ${this.currentState}`));
    }
    return this.correlator.submit(command, options);
  }

  /** Close the connection for good. Outstanding commands fail with `DisconnectedError`. */
  shutdown(): void {
    this.stopped = true;
    this.generation += 1;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = undefined;
    }
    this.stopHeartbeat();
    const transport = this.transport;
    this.transport = undefined;
    transport?.close();
    this.correlator.failAll(new DisconnectedError('Session shut down'));
    this.setState(SessionState.Disconnected);
  }

  private async establish(): Promise<void> {
    const generation = ++this.generation;
    this.setState(SessionState.Connecting);

    const transport = this.options.transportFactory?.() ?? new LineTransport({
      connectTimeoutMs: this.options.connectTimeoutMs,
      maxLineLength: this.options.maxLineLength,
      logger: this.log,
    });
    await transport.connect(this.endpoint);
    if (this.stopped || generation !== this.generation) {
      transport.close();
      throw new DisconnectedError('Session shut down while connecting');
    }

    this.transport = transport;
    this.readLoop(transport).catch((err: unknown) => {
      this.log.error('read loop failed', { error: describeError(err) });
    });

    this.setState(SessionState.Authenticating);
    try {
      await this.authenticate();
    } catch (err) {
      if (this.transport === transport) this.transport = undefined;
      transport.close();
      throw err;
    }
    if (this.stopped || generation !== this.generation) {
      throw new DisconnectedError('Session shut down while authenticating');
    }

    this.attempt = 0;
    this.failure = null;
    this.setState(SessionState.Ready);
    this.startHeartbeat();
    this.log.info('session ready', { host: this.endpoint.host });
    for (const hook of this.readyHooks) {
      try {
        hook();
      } catch (err) {
        this.log.error('ready hook threw', { error: describeError(err) });
      }
    }
    try {
      this.emit('ready');
    } catch (err) {
      this.log.error('ready listener threw', { error: describeError(err) });
    }
  }

  private async authenticate(): Promise<void> {
    await this.correlator.submit(Commands.registerForChangeEvents(true));
    if (!this.credentials) return;

    const { username, password } = this.credentials;
    const account = await this.correlator.submit(Commands.checkAccount());
    if ('signed_in' in account.attributes && account.attributes.un === username) {
      this.log.debug('already signed in', { username });
      return;
    }

    try {
      await this.correlator.submit(Commands.signIn(username, password));
    } catch (err) {
      if (err instanceof CommandError) {
        throw new AuthError(`Sign in failed for ${username}: ${err.text}`, { cause: err });
      }
      throw err;
    }
    this.log.info('signed in', { username });
  }

  private async readLoop(transport: Transport): Promise<void> {
    let error: Error | undefined;
    try {
      for await (const line of transport.messages()) {
        try {
          this.demux.handle(line);
        } catch (err) {
          if (err instanceof ProtocolError) {
            this.log.warn('dropping connection after protocol error', { error: err.message });
            transport.close(err);
            error = err;
            break;
          }
          this.log.error('inbound message handling failed', { error: describeError(err) });
        }
      }
    } catch (err) {
      error = toError(err);
    }
    this.connectionLost(transport, error);
  }

  private connectionLost(transport: Transport, error?: Error): void {
    if (transport !== this.transport) return;
    this.transport = undefined;
    this.stopHeartbeat();
    this.correlator.failAll(
      new DisconnectedError(error ? `Connection lost: ${error.message}` : 'Connection closed', { cause: error }),
    );

    // While connecting or authenticating the pending attempt fails and handles the retry.
    if (this.currentState !== SessionState.Ready) return;
    this.failure = error ?? new DisconnectedError();
    this.log.warn('connection lost', { error: error?.message });
    this.setState(SessionState.Degraded);
    this.scheduleReconnect();
  }

  private scheduleReconnect(): void {
    if (this.stopped) return;
    const delayMs = backoffDelay(this.attempt, this.options);
    this.attempt += 1;
    this.log.info('reconnecting', { attempt: this.attempt, delayMs });
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = undefined;
      this.reconnect().catch((err: unknown) => {
        this.log.error('reconnect failed unexpectedly', { error: describeError(err) });
      });
    }, delayMs);
  }

  private async reconnect(): Promise<void> {
    if (this.stopped) return;
    try {
      await this.establish();
    } catch (err) {
      if (this.stopped) return;
      const error = toError(err);
      this.failure = error;
      if (error instanceof AuthError) {
        this.log.error('credentials rejected, giving up', { error: error.message });
        this.stopped = true;
        this.setState(SessionState.Disconnected);
        if (this.listenerCount('error') > 0) this.emit('error', error);
        return;
      }
      this.log.warn('reconnect attempt failed', { attempt: this.attempt, error: error.message });
      this.setState(SessionState.Degraded);
      this.scheduleReconnect();
    }
  }

  private startHeartbeat(): void {
    this.stopHeartbeat();
    this.heartbeatFailures = 0;
    this.heartbeatTimer = setInterval(() => {
      this.heartbeat().catch((err: unknown) => {
        this.log.error('heartbeat failed unexpectedly', { error: describeError(err) });
      });
    }, this.options.heartbeatIntervalMs);
  }

  private stopHeartbeat(): void {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = undefined;
    }
  }

  private async heartbeat(): Promise<void> {
    const transport = this.transport;
    if (!transport || this.currentState !== SessionState.Ready) return;
    try {
      await this.correlator.submit(Commands.heartBeat());
      this.heartbeatFailures = 0;
    } catch (err) {
      if (transport !== this.transport) return;
      this.heartbeatFailures += 1;
      this.log.warn('heartbeat failed', { failures: this.heartbeatFailures, error: describeError(err) });
      if (this.heartbeatFailures >= this.options.heartbeatFailureThreshold) {
        transport.close(new DisconnectedError(`${this.heartbeatFailures} consecutive heartbeats failed`));
      }
    }
  }

  private write(line: string): Promise<void> {
    const transport = this.transport;
    if (!transport) return Promise.reject(new SendError('Not connected'));
    return transport.send(line);
  }

  private setState(state: SessionState): void {
    if (state === this.currentState) return;
    const previous = this.currentState;
    this.currentState = state;
    this.log.debug('session state', { from: previous, to: state });
    this.emit('stateChange', state, previous);
  }
}
