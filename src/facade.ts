import { AuthError, CommandError, HeosError, InvalidGroupError } from './errors.js';
import type { HeosLogger } from './logger.js';
import type { HeosTimings } from './options.js';
import { parseBrowseResult, parseMusicSources, SourceId, type BrowseResult, type MusicSource } from './media.js';
import type { Group } from './player.js';
import { AddCriteria, Commands, type RepeatMode } from './protocol/commands.js';
import type { HeosCommand } from './protocol/messages.js';
import type { CommandSubmitter, RegistrySync } from './refresh.js';
import type { Registry, RegistryChange } from './registry.js';

export type PlaybackCommand = 'play' | 'pause' | 'stop' | 'next' | 'previous';

/** A player, or a group addressed by its id (which equals its leader's player id). */
export type VolumeTarget = { playerId: number } | { groupId: number };

export interface PlayMode {
  repeat?: RepeatMode;
  shuffle?: boolean;
}

export interface AccountStatus {
  signedIn: boolean;
  username: string | null;
}

export interface BrowseRange {
  start: number;
  end: number;
}

export interface CommandFacadeOptions extends Pick<HeosTimings, 'groupGracePeriodMs'> {
  logger: HeosLogger;
}

function assertLevel(level: number): void {
  if (!Number.isInteger(level) || level < 0 || level > 100) {
    throw new RangeError(`Volume level must be an integer from 0 to 100, got ${level}`);
  }
}

function assertStep(step: number): void {
  if (!Number.isInteger(step) || step < 1 || step > 10) {
    throw new RangeError(`Volume step must be an integer from 1 to 10, got ${step}`);
  }
}

/**
 * Resolves once the registry reports a group update satisfying `settled`, or with false when
 * the grace period armed after the command's response expires first.
 */
class GroupUpdateWaiter {
  readonly done: Promise<boolean>;
  private finish: (arrived: boolean) => void = () => {};
  private finished = false;
  private timer?: ReturnType<typeof setTimeout>;
  private readonly listener: (kind: RegistryChange) => void;

  constructor(
    private readonly registry: Registry,
    settled: () => boolean,
  ) {
    this.done = new Promise<boolean>((resolve) => {
      this.finish = (arrived) => {
        if (this.finished) return;
        this.finished = true;
        this.dispose();
        resolve(arrived);
      };
    });
    this.listener = (kind) => {
      if (kind === 'groups' && settled()) this.finish(true);
    };
    registry.on('change', this.listener);
  }

  arm(graceMs: number): void {
    if (this.finished) return;
    this.timer = setTimeout(() => this.finish(false), graceMs);
  }

  cancel(): void {
    this.finish(false);
  }

  private dispose(): void {
    if (this.timer) clearTimeout(this.timer);
    this.registry.removeListener('change', this.listener);
  }
}

/**
 * Typed operations on players, groups and music sources. Commands never touch the registry
 * directly; state changes become visible when the device reports them.
 */
export class CommandFacade {
  private sources?: MusicSource[];
  private readonly log: HeosLogger;

  constructor(
    private readonly session: CommandSubmitter,
    private readonly registry: Registry,
    private readonly sync: Pick<RegistrySync, 'refreshGroups'>,
    private readonly options: CommandFacadeOptions,
  ) {
    this.log = options.logger;
  }

  // --- playback ---

  async sendPlaybackCommand(playerId: number, command: PlaybackCommand): Promise<void> {
    switch (command) {
      case 'next':
        await this.session.submit(Commands.playNext(playerId));
        return;
      case 'previous':
        await this.session.submit(Commands.playPrevious(playerId));
        return;
      default:
        await this.session.submit(Commands.setPlayState(playerId, command));
    }
  }

  /** Set repeat and/or shuffle; the field left out keeps its current value. */
  async setPlayMode(playerId: number, mode: PlayMode): Promise<void> {
    const player = this.registry.player(playerId);
    const repeat = mode.repeat ?? player?.repeat;
    const shuffle = mode.shuffle ?? player?.shuffle;
    if (repeat === undefined || shuffle === undefined) {
      throw new HeosError(`Unknown player ${playerId}; pass both repeat and shuffle`);
    }
    await this.session.submit(Commands.setPlayMode(playerId, repeat, shuffle));
  }

  async clearQueue(playerId: number): Promise<void> {
    await this.session.submit(Commands.clearQueue(playerId));
  }

  // --- volume ---

  async setVolume(target: VolumeTarget, level: number): Promise<void> {
    assertLevel(level);
    await this.session.submit(
      'groupId' in target ? Commands.setGroupVolume(target.groupId, level) : Commands.setVolume(target.playerId, level),
    );
  }

  async volumeUp(target: VolumeTarget, step = 5): Promise<void> {
    assertStep(step);
    await this.session.submit(
      'groupId' in target ? Commands.groupVolumeUp(target.groupId, step) : Commands.volumeUp(target.playerId, step),
    );
  }

  async volumeDown(target: VolumeTarget, step = 5): Promise<void> {
    assertStep(step);
    await this.session.submit(
      'groupId' in target ? Commands.groupVolumeDown(target.groupId, step) : Commands.volumeDown(target.playerId, step),
    );
  }

  async setMute(target: VolumeTarget, muted: boolean): Promise<void> {
    await this.session.submit(
      'groupId' in target ? Commands.setGroupMute(target.groupId, muted) : Commands.setMute(target.playerId, muted),
    );
  }

  async toggleMute(target: VolumeTarget): Promise<void> {
    await this.session.submit(
      'groupId' in target ? Commands.toggleGroupMute(target.groupId) : Commands.toggleMute(target.playerId),
    );
  }

  // --- grouping ---

  /**
   * Group `memberIds` under `leaderId`. Resolves with the registry's group led by the leader
   * once the device reports it, or after a group refresh when no update arrives in time;
   * null when the device did not form the group.
   */
  async createGroup(leaderId: number, memberIds: readonly number[]): Promise<Group | null> {
    this.validateGroup(leaderId, memberIds);
    const expected = new Set([leaderId, ...memberIds]);
    await this.applyGrouping(Commands.setGroup([leaderId, ...memberIds]), () => {
      const group = this.groupLedBy(leaderId);
      return group !== undefined && group.memberIds.length === expected.size && group.memberIds.every((id) => expected.has(id));
    });
    return this.groupLedBy(leaderId) ?? null;
  }

  async dissolveGroup(groupId: number): Promise<void> {
    const group = this.registry.group(groupId);
    if (!group) throw new InvalidGroupError(`Unknown group ${groupId}`);
    const leaderId = group.leaderId;
    await this.applyGrouping(Commands.setGroup([leaderId]), () => this.groupLedBy(leaderId) === undefined);
  }

  // --- browse ---

  /** Music sources, cached until the device reports `sources-changed`. */
  async getMusicSources(refresh = false): Promise<MusicSource[]> {
    if (!this.sources || refresh) {
      const response = await this.session.submit(Commands.getMusicSources());
      this.sources = parseMusicSources(response.payload);
    }
    return [...this.sources];
  }

  invalidateSources(): void {
    this.sources = undefined;
  }

  async browse(sourceId: number, containerId?: string, range?: BrowseRange): Promise<BrowseResult> {
    const response = await this.session.submit(Commands.browse(sourceId, containerId, range));
    return parseBrowseResult(response.payload, response.attributes, sourceId, containerId ?? null);
  }

  getFavorites(): Promise<BrowseResult> {
    return this.browse(SourceId.Favorites);
  }

  getPlaylists(): Promise<BrowseResult> {
    return this.browse(SourceId.Playlists);
  }

  async playInput(playerId: number, input: string): Promise<void> {
    await this.session.submit(Commands.playInput(playerId, input));
  }

  /** Play a favorite by its 1-based position. */
  async playPreset(playerId: number, preset: number): Promise<void> {
    if (!Number.isInteger(preset) || preset < 1) {
      throw new RangeError(`Preset must be a positive integer, got ${preset}`);
    }
    await this.session.submit(Commands.playPreset(playerId, preset));
  }

  async playUrl(playerId: number, url: string): Promise<void> {
    await this.session.submit(Commands.playUrl(playerId, url));
  }

  async playStream(playerId: number, sourceId: number, mediaId: string, containerId?: string): Promise<void> {
    await this.session.submit(Commands.playStream(playerId, sourceId, mediaId, containerId));
  }

  async addToQueue(
    playerId: number,
    sourceId: number,
    containerId: string,
    criteria: AddCriteria = AddCriteria.PlayNow,
    mediaId?: string,
  ): Promise<void> {
    await this.session.submit(Commands.addToQueue(playerId, sourceId, containerId, criteria, mediaId));
  }

  // --- account ---

  async checkAccount(): Promise<AccountStatus> {
    const response = await this.session.submit(Commands.checkAccount());
    const signedIn = 'signed_in' in response.attributes;
    return { signedIn, username: signedIn ? response.attributes.un ?? null : null };
  }

  async signIn(username: string, password: string): Promise<void> {
    try {
      await this.session.submit(Commands.signIn(username, password));
    } catch (err) {
      if (err instanceof CommandError) {
        throw new AuthError(`Sign in failed for ${username}: ${err.text}`, { cause: err });
      }
      throw err;
    }
  }

  async signOut(): Promise<void> {
    await this.session.submit(Commands.signOut());
  }

  private groupLedBy(leaderId: number): Group | undefined {
    return this.registry.groups().find((group) => group.leaderId === leaderId);
  }

  private validateGroup(leaderId: number, memberIds: readonly number[]): void {
    if (memberIds.length === 0) {
      throw new InvalidGroupError('A group needs at least one member besides the leader');
    }
    for (const id of [leaderId, ...memberIds]) {
      if (!this.registry.player(id)) throw new InvalidGroupError(`Unknown player ${id}`);
    }
    if (memberIds.includes(leaderId)) {
      throw new InvalidGroupError(`Leader ${leaderId} cannot also be a member`);
    }
    if (new Set(memberIds).size !== memberIds.length) {
      throw new InvalidGroupError('Group members must be unique');
    }
    const leaderGroup = this.registry.groupOf(leaderId);
    if (leaderGroup && leaderGroup.leaderId !== leaderId) {
      throw new InvalidGroupError(`Player ${leaderId} is a member of group ${leaderGroup.id} led by ${leaderGroup.leaderId}`);
    }
    for (const id of memberIds) {
      const group = this.registry.groupOf(id);
      if (group && group.leaderId !== leaderId) {
        throw new InvalidGroupError(`Player ${id} already belongs to group ${group.id} led by ${group.leaderId}`);
      }
    }
  }

  /** Send a grouping command, then wait for the registry to reflect it or fall back to a refresh. */
  private async applyGrouping(command: HeosCommand, settled: () => boolean): Promise<void> {
    // Listen before sending: the device may report the change before it answers.
    const waiter = new GroupUpdateWaiter(this.registry, settled);
    try {
      await this.session.submit(command);
    } catch (err) {
      waiter.cancel();
      throw err;
    }
    waiter.arm(this.options.groupGracePeriodMs);
    if (!(await waiter.done)) {
      this.log.debug('no group update within grace period, refreshing groups');
      await this.sync.refreshGroups();
    }
  }
}
