import { EventEmitter } from 'node:events';
import { noopLogger, type HeosLogger } from './logger.js';
import type { HeosEvent } from './protocol/events.js';
import type { Group, NowPlayingMedia, Player, PlayerState } from './player.js';

export type RegistryChange = 'players' | 'groups' | 'player' | 'group';

export interface RegistryDiff {
  added: number[];
  removed: number[];
  updated: number[];
}

/** Deterministic, id-sorted view of the registry. */
export interface RegistrySnapshot {
  readonly players: readonly Player[];
  readonly groups: readonly Group[];
}

interface RegistryState {
  readonly players: ReadonlyMap<number, Player>;
  readonly groups: ReadonlyMap<number, Group>;
}

export interface RegistryOptions {
  logger?: HeosLogger;
  /** Called when an event names a player or group the registry does not know. */
  onUnknownEntity?: (event: HeosEvent) => void;
}

function freezeMedia(media: NowPlayingMedia | null | undefined): Readonly<NowPlayingMedia> | null {
  return media ? Object.freeze({ ...media }) : null;
}

function freezePlayer(player: Player): Player {
  return Object.freeze({ ...player, nowPlaying: freezeMedia(player.nowPlaying) });
}

function freezeGroup(group: Group): Group {
  return Object.freeze({ ...group, memberIds: Object.freeze([...group.memberIds]) });
}

/** JSON with object keys sorted, so equal content always serialises to the same text. */
export function canonicalJson(value: unknown): string {
  return JSON.stringify(value, (_key, item: unknown) => {
    if (item === null || typeof item !== 'object' || Array.isArray(item)) return item;
    const sorted: Record<string, unknown> = {};
    for (const [key, entry] of Object.entries(item).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
      sorted[key] = entry;
    }
    return sorted;
  });
}

const EMPTY_STATE: RegistryState = { players: new Map(), groups: new Map() };

/**
 * Local model of players and groups.
 *
 * The state is an immutable snapshot replaced wholesale on every mutation, so a reader holding
 * `players()` or `snapshot()` never observes a half-applied update. Only refresh results and
 * device events mutate it; commands never do.
 *
 * Emits `change` with a {@link RegistryChange} kind (and the id for `player` / `group`).
 */
export class Registry extends EventEmitter {
  private state: RegistryState = EMPTY_STATE;
  private readonly log: HeosLogger;
  private readonly onUnknownEntity?: (event: HeosEvent) => void;

  constructor(options: RegistryOptions = {}) {
    super();
    this.log = options.logger ?? noopLogger;
    this.onUnknownEntity = options.onUnknownEntity;
  }

  players(): Player[] {
    return [...this.state.players.values()].sort((a, b) => a.id - b.id);
  }

  groups(): Group[] {
    return [...this.state.groups.values()].sort((a, b) => a.id - b.id);
  }

  player(id: number): Player | undefined {
    return this.state.players.get(id);
  }

  group(id: number): Group | undefined {
    return this.state.groups.get(id);
  }

  /** The group `playerId` belongs to, as leader or member. */
  groupOf(playerId: number): Group | undefined {
    for (const group of this.state.groups.values()) {
      if (group.memberIds.includes(playerId)) return group;
    }
    return undefined;
  }

  snapshot(): RegistrySnapshot {
    return Object.freeze({
      players: Object.freeze(this.players()),
      groups: Object.freeze(this.groups()),
    });
  }

  /** Install the result of a full refresh. Players missing from `players` are removed. */
  replace(players: readonly Player[], groups: readonly Group[]): RegistryDiff {
    const previous = this.state.players;
    const nextGroups = this.validGroups(groups, new Set(players.map((p) => p.id)));
    const membership = groupMembership(nextGroups);

    const nextPlayers = new Map<number, Player>();
    for (const player of players) {
      nextPlayers.set(player.id, freezePlayer({ ...player, groupId: membership.get(player.id) ?? null }));
    }

    const diff: RegistryDiff = { added: [], removed: [], updated: [] };
    for (const [id, player] of nextPlayers) {
      const before = previous.get(id);
      if (!before) {
        diff.added.push(id);
      } else if (canonicalJson(before) !== canonicalJson(player)) {
        diff.updated.push(id);
      }
    }
    for (const id of previous.keys()) {
      if (!nextPlayers.has(id)) diff.removed.push(id);
    }
    diff.added.sort((a, b) => a - b);
    diff.removed.sort((a, b) => a - b);
    diff.updated.sort((a, b) => a - b);

    this.state = { players: nextPlayers, groups: nextGroups };
    this.log.debug('registry replaced', { players: nextPlayers.size, groups: nextGroups.size, ...diff });

    if (diff.added.length > 0 || diff.removed.length > 0 || diff.updated.length > 0) {
      this.emit('change', 'players');
    }
    this.emit('change', 'groups');
    return diff;
  }

  /** Install the result of a group-only refresh. */
  replaceGroups(groups: readonly Group[]): void {
    const nextGroups = this.validGroups(groups, new Set(this.state.players.keys()));
    const membership = groupMembership(nextGroups);

    const nextPlayers = new Map<number, Player>();
    for (const [id, player] of this.state.players) {
      const groupId = membership.get(id) ?? null;
      nextPlayers.set(id, player.groupId === groupId ? player : freezePlayer({ ...player, groupId }));
    }

    this.state = { players: nextPlayers, groups: nextGroups };
    this.emit('change', 'groups');
  }

  /**
   * Apply the fields an event carries. Returns true when the event concerned known state.
   * Events naming an unknown player or group are ignored and reported to `onUnknownEntity`.
   */
  applyEvent(event: HeosEvent): boolean {
    switch (event.type) {
      case 'player-state-changed':
        return this.patchPlayer(event, event.playerId, { playbackState: event.state });
      case 'volume-changed':
        return this.patchPlayer(event, event.playerId, { volume: event.level, muted: event.muted });
      case 'play-mode-changed':
        return this.patchPlayer(event, event.playerId, {
          ...(event.repeat === undefined ? {} : { repeat: event.repeat }),
          ...(event.shuffle === undefined ? {} : { shuffle: event.shuffle }),
        });
      case 'now-playing-progress': {
        const player = this.knownPlayer(event, event.playerId);
        if (!player?.nowPlaying) return false;
        return this.patchPlayer(event, event.playerId, {
          nowPlaying: { ...player.nowPlaying, elapsed: event.elapsed, duration: event.duration },
        });
      }
      case 'now-playing-changed':
      case 'queue-changed':
        // Carry no state; the owner fetches what changed.
        return this.knownPlayer(event, event.playerId) !== undefined;
      case 'group-volume-changed':
        return this.patchGroup(event, event.groupId, { volume: event.level, muted: event.muted });
      default:
        return false;
    }
  }

  /** Install now-playing media fetched for one player. Progress restarts at zero. */
  applyNowPlaying(playerId: number, media: NowPlayingMedia | null): boolean {
    return this.applyPlayerState(playerId, { nowPlaying: media });
  }

  applyPlayerState(playerId: number, patch: Partial<PlayerState>): boolean {
    const player = this.state.players.get(playerId);
    if (!player) return false;
    this.updatePlayer(player, patch);
    return true;
  }

  private knownPlayer(event: HeosEvent, playerId: number): Player | undefined {
    const player = this.state.players.get(playerId);
    if (!player) this.unknown(event, { playerId });
    return player;
  }

  private patchPlayer(event: HeosEvent, playerId: number, patch: Partial<PlayerState>): boolean {
    const player = this.knownPlayer(event, playerId);
    if (!player) return false;
    this.updatePlayer(player, patch);
    return true;
  }

  private updatePlayer(player: Player, patch: Partial<PlayerState>): void {
    const next = freezePlayer({ ...player, ...patch });
    if (canonicalJson(next) === canonicalJson(player)) return;
    const players = new Map(this.state.players);
    players.set(player.id, next);
    this.state = { players, groups: this.state.groups };
    this.emit('change', 'player', player.id);
  }

  private patchGroup(event: HeosEvent, groupId: number, patch: Pick<Group, 'volume' | 'muted'>): boolean {
    const group = this.state.groups.get(groupId);
    if (!group) {
      this.unknown(event, { groupId });
      return false;
    }
    if (group.volume === patch.volume && group.muted === patch.muted) return true;
    const groups = new Map(this.state.groups);
    groups.set(groupId, freezeGroup({ ...group, ...patch }));
    this.state = { players: this.state.players, groups };
    this.emit('change', 'group', groupId);
    return true;
  }

  private unknown(event: HeosEvent, meta: Record<string, number>): void {
    this.log.debug('event for unknown entity', { event: event.type, ...meta });
    this.onUnknownEntity?.(event);
  }

  /** Drop groups led by unknown players; a player stays in the first group that lists it. */
  private validGroups(groups: readonly Group[], knownPlayers: ReadonlySet<number>): Map<number, Group> {
    const result = new Map<number, Group>();
    const claimed = new Set<number>();
    for (const group of [...groups].sort((a, b) => a.id - b.id)) {
      if (!knownPlayers.has(group.leaderId) || claimed.has(group.leaderId)) {
        this.log.warn('ignoring group with unknown or already grouped leader', { groupId: group.id, leaderId: group.leaderId });
        continue;
      }
      const memberIds = [group.leaderId];
      for (const id of group.memberIds) {
        if (memberIds.includes(id) || claimed.has(id) || !knownPlayers.has(id)) continue;
        memberIds.push(id);
      }
      for (const id of memberIds) claimed.add(id);
      result.set(group.id, freezeGroup({ ...group, memberIds }));
    }
    return result;
  }
}

function groupMembership(groups: ReadonlyMap<number, Group>): Map<number, number> {
  const membership = new Map<number, number>();
  for (const group of groups.values()) {
    for (const id of group.memberIds) membership.set(id, group.id);
  }
  return membership;
}
