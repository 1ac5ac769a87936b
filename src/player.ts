import type { PlayState, RepeatMode } from './protocol/commands.js';
import { isRecord, readInteger, readOptionalString, readString } from './util/values.js';

export interface NowPlayingMedia {
  /** `song`, `station`, ... as reported by the device */
  type: string;
  title: string;
  artist: string;
  album: string;
  imageUrl: string | null;
  /** Milliseconds, from progress events */
  duration: number;
  /** Milliseconds, from progress events */
  elapsed: number;
  sourceId: number | null;
  sourceName: string | null;
  station: string | null;
  mediaId: string | null;
  albumId: string | null;
  queueId: number | null;
}

export interface Player {
  readonly id: number;
  readonly name: string;
  readonly model: string;
  readonly version: string;
  readonly ip: string;
  readonly network: string;
  readonly serial: string | null;
  readonly online: boolean;
  readonly volume: number;
  readonly muted: boolean;
  readonly playbackState: PlayState;
  readonly repeat: RepeatMode;
  readonly shuffle: boolean;
  readonly nowPlaying: Readonly<NowPlayingMedia> | null;
  readonly groupId: number | null;
}

export interface Group {
  readonly id: number;
  readonly name: string;
  readonly leaderId: number;
  /** Leader first, then members in device order */
  readonly memberIds: readonly number[];
  readonly volume: number;
  readonly muted: boolean;
}

/** Identity and descriptive fields from `player/get_players`. */
export type PlayerIdentity = Pick<Player, 'id' | 'name' | 'model' | 'version' | 'ip' | 'network' | 'serial' | 'groupId'>;

export type PlayerState = Pick<Player, 'volume' | 'muted' | 'playbackState' | 'repeat' | 'shuffle' | 'nowPlaying'>;

export const DEFAULT_PLAYER_STATE: PlayerState = {
  volume: 0,
  muted: false,
  playbackState: 'stop',
  repeat: 'off',
  shuffle: false,
  nowPlaying: null,
};

export function parsePlayerIdentity(value: unknown): PlayerIdentity | null {
  if (!isRecord(value)) return null;
  const id = readInteger(value, 'pid');
  if (id === null) return null;
  return {
    id,
    name: readString(value, 'name', `Player ${id}`),
    model: readString(value, 'model', 'Unknown'),
    version: readString(value, 'version'),
    ip: readString(value, 'ip'),
    network: readString(value, 'network', 'unknown'),
    serial: readOptionalString(value, 'serial'),
    groupId: readInteger(value, 'gid'),
  };
}

export function parsePlayerList(payload: unknown): PlayerIdentity[] {
  if (!Array.isArray(payload)) return [];
  const players: PlayerIdentity[] = [];
  for (const item of payload) {
    const player = parsePlayerIdentity(item);
    if (player) players.push(player);
  }
  return players;
}

/** `group/get_groups` entry, before volume is known. */
export type GroupIdentity = Pick<Group, 'id' | 'name' | 'leaderId' | 'memberIds'>;

export function parseGroup(value: unknown): GroupIdentity | null {
  if (!isRecord(value)) return null;
  const id = readInteger(value, 'gid');
  if (id === null || !Array.isArray(value.players)) return null;

  let leaderId: number | null = null;
  const members: number[] = [];
  for (const entry of value.players) {
    if (!isRecord(entry)) continue;
    const pid = readInteger(entry, 'pid');
    if (pid === null) continue;
    if (entry.role === 'leader' && leaderId === null) {
      leaderId = pid;
    } else if (!members.includes(pid)) {
      members.push(pid);
    }
  }
  if (leaderId === null) return null;

  return {
    id,
    name: readString(value, 'name', `Group ${id}`),
    leaderId,
    memberIds: [leaderId, ...members.filter((pid) => pid !== leaderId)],
  };
}

export function parseGroupList(payload: unknown): GroupIdentity[] {
  if (!Array.isArray(payload)) return [];
  const groups: GroupIdentity[] = [];
  for (const item of payload) {
    const group = parseGroup(item);
    if (group) groups.push(group);
  }
  return groups;
}

/** Parse `player/get_now_playing_media`; null when the payload is empty (nothing playing). */
export function parseNowPlaying(payload: unknown): NowPlayingMedia | null {
  if (!isRecord(payload) || Object.keys(payload).length === 0) return null;
  const type = readString(payload, 'type', 'song');
  const station = readOptionalString(payload, 'station');
  return {
    type,
    title: readString(payload, 'song') || (station ?? ''),
    artist: readString(payload, 'artist'),
    album: readString(payload, 'album'),
    imageUrl: readOptionalString(payload, 'image_url'),
    duration: 0,
    elapsed: 0,
    sourceId: readInteger(payload, 'sid'),
    sourceName: null,
    station,
    mediaId: readOptionalString(payload, 'mid'),
    albumId: readOptionalString(payload, 'album_id'),
    queueId: readInteger(payload, 'qid'),
  };
}

export function formatDuration(ms: number): string {
  const totalSeconds = Math.floor(ms / 1000);
  const minutes = Math.floor(totalSeconds / 60);
  const seconds = totalSeconds % 60;
  return `${minutes}:${String(seconds).padStart(2, '0')}`;
}

export function describePlayer(player: Player): string {
  const parts = [`${player.name} (${player.id}) [${player.model}]`, player.playbackState, `vol ${player.volume}${player.muted ? ' muted' : ''}`];
  const media = player.nowPlaying;
  if (media) {
    const title = [media.title, media.artist && `by ${media.artist}`].filter(Boolean).join(' ');
    if (title) parts.push(title);
    if (media.duration > 0) parts.push(`${formatDuration(media.elapsed)}/${formatDuration(media.duration)}`);
  }
  return parts.join(' - ');
}
