import { EventEmitter } from 'node:events';
import type { EventCallback, Unsubscribe } from './demultiplexer.js';
import { RefreshError } from './errors.js';
import { CommandFacade, type PlaybackCommand, type VolumeTarget } from './facade.js';
import { describeError, type HeosLogger } from './logger.js';
import { resolveOptions, type Endpoint, type HeosCredentials, type HeosOptions } from './options.js';
import type { EventOf, HeosEventType } from './protocol/events.js';
import type { Group, Player } from './player.js';
import { RegistrySync } from './refresh.js';
import { Registry, type RegistryDiff, type RegistrySnapshot } from './registry.js';
import { SessionManager, SessionState } from './session.js';

/**
 * Connected handle to a HEOS system: one session to one device, the registry it keeps in sync
 * and the commands that act on it.
 *
 * Re-emits the session's `stateChange`, `ready` and `error` events.
 */
export class HeosSystem extends EventEmitter {
  readonly registry: Registry;
  readonly commands: CommandFacade;
  private readonly session: SessionManager;
  private readonly sync: RegistrySync;
  private readonly log: HeosLogger;

  constructor(endpoint: Endpoint, credentials?: HeosCredentials, options: HeosOptions = {}) {
    super();
    const resolved = resolveOptions(options);
    this.log = resolved.logger;
    this.session = new SessionManager(endpoint, credentials, resolved);
    this.registry = new Registry({
      logger: resolved.logger,
      onUnknownEntity: () => this.sync.requestRefresh(),
    });
    this.sync = new RegistrySync(this.session, this.registry, {
      logger: resolved.logger,
      refreshRetryDelayMs: resolved.refreshRetryDelayMs,
      publish: (event) => this.session.demux.publish(event),
    });
    this.commands = new CommandFacade(this.session, this.registry, this.sync, {
      logger: resolved.logger,
      groupGracePeriodMs: resolved.groupGracePeriodMs,
    });

    this.session.demux.addApplier(this.sync.applier);
    this.session.demux.addApplier((event) => {
      if (event.type === 'sources-changed') this.commands.invalidateSources();
    });
    this.session.onReady(() => this.sync.requestRefresh());

    this.session.on('stateChange', (state: SessionState, previous: SessionState) => this.emit('stateChange', state, previous));
    this.session.on('ready', () => this.emit('ready'));
    this.session.on('error', (err: Error) => {
      if (this.listenerCount('error') > 0) this.emit('error', err);
    });
  }

  /**
   * Connect, authenticate and load the registry. A failed initial refresh is logged and
   * retried in the background; the handle is usable regardless.
   */
  static async connect(endpoint: Endpoint, credentials?: HeosCredentials, options?: HeosOptions): Promise<HeosSystem> {
    const system = new HeosSystem(endpoint, credentials, options);
    await system.start();
    return system;
  }

  async start(): Promise<void> {
    this.sync.resume();
    await this.session.start();
    try {
      // The ready hook has already requested the first enumeration.
      await this.sync.latestRefresh();
    } catch (err) {
      if (!(err instanceof RefreshError)) throw err;
      this.log.warn('initial refresh failed, retrying in background', { error: describeError(err) });
    }
  }

  get state(): SessionState {
    return this.session.state;
  }

  get lastError(): Error | null {
    return this.session.lastError;
  }

  listPlayers(): Player[] {
    return this.registry.players();
  }

  listGroups(): Group[] {
    return this.registry.groups();
  }

  snapshot(): RegistrySnapshot {
    return this.registry.snapshot();
  }

  sendPlaybackCommand(playerId: number, command: PlaybackCommand): Promise<void> {
    return this.commands.sendPlaybackCommand(playerId, command);
  }

  setVolume(target: VolumeTarget, level: number): Promise<void> {
    return this.commands.setVolume(target, level);
  }

  createGroup(leaderId: number, memberIds: readonly number[]): Promise<Group | null> {
    return this.commands.createGroup(leaderId, memberIds);
  }

  dissolveGroup(groupId: number): Promise<void> {
    return this.commands.dissolveGroup(groupId);
  }

  subscribe<T extends HeosEventType>(type: T, callback: EventCallback<EventOf<T>>): Unsubscribe;
  subscribe(type: '*', callback: EventCallback): Unsubscribe;
  subscribe(type: HeosEventType | '*', callback: EventCallback): Unsubscribe {
    return type === '*' ? this.session.demux.subscribe('*', callback) : this.session.demux.subscribe(type, callback);
  }

  /** Re-enumerate players and groups. Rejects with `RefreshError`. */
  refresh(): Promise<RegistryDiff> {
    return this.sync.refresh();
  }

  shutdown(): void {
    this.sync.stop();
    this.session.shutdown();
  }
}
