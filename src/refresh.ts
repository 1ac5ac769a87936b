import { CommandError, RefreshError } from './errors.js';
import type { EventApplier } from './demultiplexer.js';
import { describeError, type HeosLogger } from './logger.js';
import type { HeosTimings } from './options.js';
import { Commands, playStateFromWire, repeatFromWire } from './protocol/commands.js';
import type { HeosEvent } from './protocol/events.js';
import type { HeosCommand, HeosResponse } from './protocol/messages.js';
import {
  DEFAULT_PLAYER_STATE,
  parseGroupList,
  parseNowPlaying,
  parsePlayerList,
  type Group,
  type GroupIdentity,
  type Player,
  type PlayerIdentity,
} from './player.js';
import type { Registry, RegistryDiff } from './registry.js';
import { SessionState } from './session.js';
import { parseInteger, parseOnOff } from './util/values.js';

/** The part of the session the refresher needs. */
export interface CommandSubmitter {
  readonly state: SessionState;
  submit(command: HeosCommand): Promise<HeosResponse>;
}

export interface RegistrySyncOptions extends Pick<HeosTimings, 'refreshRetryDelayMs'> {
  logger: HeosLogger;
  /** Receives locally synthesised `player-added` / `player-removed` events. */
  publish: (event: HeosEvent) => void;
}

/**
 * Runs `work` one at a time. Requests made while a run is in flight share one fresh run
 * started after it.
 */
class SerialRunner<T> {
  private running?: Promise<T>;
  private queued?: Promise<T>;

  constructor(private readonly work: () => Promise<T>) {}

  run(): Promise<T> {
    if (!this.running) return this.start();
    if (!this.queued) {
      const next = () => {
        this.queued = undefined;
        return this.start();
      };
      this.queued = this.running.then(next, next);
    }
    return this.queued;
  }

  /** The newest run already requested, or a new one. */
  latest(): Promise<T> {
    return this.queued ?? this.running ?? this.start();
  }

  private start(): Promise<T> {
    const run = this.work().finally(() => {
      if (this.running === run) this.running = undefined;
    });
    this.running = run;
    return run;
  }
}

/**
 * Keeps the registry in step with the device: full enumeration on demand, group and
 * now-playing refreshes triggered by events, and retries after failed refreshes.
 */
export class RegistrySync {
  private readonly fullRefresh = new SerialRunner(() => this.enumerate());
  private readonly groupRefresh = new SerialRunner(() => this.enumerateGroups());
  /** Events applied while an enumeration waits for the device, one buffer per enumeration */
  private readonly windows = new Set<HeosEvent[]>();
  private retryTimer?: ReturnType<typeof setTimeout>;
  private stopped = false;
  private readonly log: HeosLogger;

  constructor(
    private readonly session: CommandSubmitter,
    private readonly registry: Registry,
    private readonly options: RegistrySyncOptions,
  ) {
    this.log = options.logger;
  }

  /** Applier for the demultiplexer: updates the registry and starts follow-up refreshes. */
  readonly applier: EventApplier = (event) => {
    for (const buffer of this.windows) buffer.push(event);
    this.registry.applyEvent(event);
    switch (event.type) {
      case 'players-changed':
        this.requestRefresh();
        break;
      case 'group-changed':
        this.background('group refresh', this.refreshGroups());
        break;
      case 'now-playing-changed':
        if (this.registry.player(event.playerId)) {
          this.background('now playing refresh', this.refreshNowPlaying(event.playerId));
        }
        break;
      default:
        break;
    }
  };

  /**
   * Enumerate players and groups and install the result. A call made while an enumeration
   * runs waits for a fresh one after it. Rejects with `RefreshError`, leaving the registry as
   * it was and scheduling a retry.
   */
  refresh(): Promise<RegistryDiff> {
    return this.fullRefresh.run();
  }

  /** Join the enumeration already requested, if any, instead of queueing another. */
  latestRefresh(): Promise<RegistryDiff> {
    return this.fullRefresh.latest();
  }

  /** Request an enumeration, queued after any in flight; failures are logged and retried. */
  requestRefresh(): void {
    this.background('refresh', this.refresh());
  }

  /** Reload groups only. Rejects with `RefreshError` and schedules a full refresh. */
  refreshGroups(): Promise<void> {
    return this.groupRefresh.run();
  }

  async refreshNowPlaying(playerId: number): Promise<void> {
    const response = await this.session.submit(Commands.getNowPlayingMedia(playerId));
    this.registry.applyNowPlaying(playerId, parseNowPlaying(response.payload));
  }

  /** Allow retries again after `stop()`. */
  resume(): void {
    this.stopped = false;
  }

  stop(): void {
    this.stopped = true;
    if (this.retryTimer) {
      clearTimeout(this.retryTimer);
      this.retryTimer = undefined;
    }
  }

  private async enumerate(): Promise<RegistryDiff> {
    let players: Player[];
    let groups: Group[];
    const seen: HeosEvent[] = [];
    this.windows.add(seen);
    try {
      const playersResponse = await this.session.submit(Commands.getPlayers());
      const groupsResponse = await this.session.submit(Commands.getGroups());
      players = await Promise.all(parsePlayerList(playersResponse.payload).map((p) => this.loadPlayer(p)));
      groups = await this.loadGroups(parseGroupList(groupsResponse.payload), players);
    } catch (err) {
      this.scheduleRetry();
      throw new RefreshError(`Registry refresh failed: ${describeError(err)}`, { cause: err });
    } finally {
      this.windows.delete(seen);
    }

    const diff = this.registry.replace(players, groups);
    this.replay(seen);
    this.log.info('registry refreshed', { players: players.length, groups: groups.length });
    for (const playerId of diff.added) this.options.publish({ type: 'player-added', playerId });
    for (const playerId of diff.removed) this.options.publish({ type: 'player-removed', playerId });
    return diff;
  }

  private async enumerateGroups(): Promise<void> {
    let groups: Group[];
    const seen: HeosEvent[] = [];
    this.windows.add(seen);
    try {
      const response = await this.session.submit(Commands.getGroups());
      groups = await this.loadGroups(parseGroupList(response.payload), this.registry.players());
    } catch (err) {
      this.scheduleRetry();
      throw new RefreshError(`Group refresh failed: ${describeError(err)}`, { cause: err });
    } finally {
      this.windows.delete(seen);
    }
    this.registry.replaceGroups(groups);
    for (const event of seen) {
      if (event.type === 'group-volume-changed') this.registry.applyEvent(event);
    }
  }

  /**
   * Re-apply events that arrived while the enumeration was reading the device: they are at
   * least as new as the values it read.
   */
  private replay(events: readonly HeosEvent[]): void {
    for (const event of events) {
      this.registry.applyEvent(event);
      if (event.type === 'now-playing-changed' && this.registry.player(event.playerId)) {
        this.background('now playing refresh', this.refreshNowPlaying(event.playerId));
      } else if (event.type === 'group-changed') {
        // A group refresh started by this event may have finished before the older groups landed.
        this.background('group refresh', this.refreshGroups());
      }
    }
  }

  private async loadPlayer(identity: PlayerIdentity): Promise<Player> {
    const pid = identity.id;
    const [playState, volume, mute, playMode, media] = await Promise.all([
      this.session.submit(Commands.getPlayState(pid)),
      this.session.submit(Commands.getVolume(pid)),
      this.session.submit(Commands.getMute(pid)),
      this.session.submit(Commands.getPlayMode(pid)),
      this.session.submit(Commands.getNowPlayingMedia(pid)),
    ]);
    return {
      ...identity,
      online: true,
      volume: parseInteger(volume.attributes.level) ?? DEFAULT_PLAYER_STATE.volume,
      muted: parseOnOff(mute.attributes.state) ?? DEFAULT_PLAYER_STATE.muted,
      playbackState: playStateFromWire(playState.attributes.state) ?? DEFAULT_PLAYER_STATE.playbackState,
      repeat: repeatFromWire(playMode.attributes.repeat) ?? DEFAULT_PLAYER_STATE.repeat,
      shuffle: parseOnOff(playMode.attributes.shuffle) ?? DEFAULT_PLAYER_STATE.shuffle,
      nowPlaying: parseNowPlaying(media.payload),
    };
  }

  private loadGroups(identities: GroupIdentity[], players: readonly Player[]): Promise<Group[]> {
    const volumes = new Map(players.map((p) => [p.id, p.volume]));
    return Promise.all(identities.map((group) => this.loadGroup(group, volumes)));
  }

  /** Group volume as reported by the device, or the mean member volume when it reports none. */
  private async loadGroup(group: GroupIdentity, volumes: ReadonlyMap<number, number>): Promise<Group> {
    let volume: number | null = null;
    let muted = false;
    try {
      const [volumeResponse, muteResponse] = await Promise.all([
        this.session.submit(Commands.getGroupVolume(group.id)),
        this.session.submit(Commands.getGroupMute(group.id)),
      ]);
      volume = parseInteger(volumeResponse.attributes.level);
      muted = parseOnOff(muteResponse.attributes.state) ?? false;
    } catch (err) {
      if (!(err instanceof CommandError)) throw err;
      this.log.debug('group volume unavailable', { groupId: group.id, error: err.message });
    }
    if (volume === null) {
      const known = group.memberIds.flatMap((id) => {
        const level = volumes.get(id);
        return level === undefined ? [] : [level];
      });
      volume = known.length > 0 ? Math.round(known.reduce((sum, level) => sum + level, 0) / known.length) : 0;
    }
    return { ...group, volume, muted };
  }

  private scheduleRetry(): void {
    if (this.stopped || this.retryTimer) return;
    this.retryTimer = setTimeout(() => {
      this.retryTimer = undefined;
      if (this.session.state !== SessionState.Ready) {
        // The next transition into ready refreshes anyway.
        return;
      }
      this.requestRefresh();
    }, this.options.refreshRetryDelayMs);
  }

  private background(label: string, work: Promise<unknown>): void {
    work.catch((err: unknown) => {
      this.log.warn(`${label} failed`, { error: describeError(err) });
    });
  }
}
