/**
 * Closed set of events understood by the engine.
 * Every inbound `event/*` message is decoded into one of these variants before any other logic sees it.
 */

import { parseInteger, parseOnOff } from '../util/values.js';
import { playStateFromWire, repeatFromWire, type PlayState, type RepeatMode } from './commands.js';
import type { RawEvent } from './messages.js';

export interface PlayerStateChangedEvent {
  type: 'player-state-changed';
  playerId: number;
  state: PlayState;
}

export interface NowPlayingChangedEvent {
  type: 'now-playing-changed';
  playerId: number;
}

export interface NowPlayingProgressEvent {
  type: 'now-playing-progress';
  playerId: number;
  /** Milliseconds */
  elapsed: number;
  /** Milliseconds */
  duration: number;
}

export interface VolumeChangedEvent {
  type: 'volume-changed';
  playerId: number;
  level: number;
  muted: boolean;
}

export interface PlayModeChangedEvent {
  type: 'play-mode-changed';
  playerId: number;
  repeat?: RepeatMode;
  shuffle?: boolean;
}

export interface GroupChangedEvent {
  type: 'group-changed';
}

export interface GroupVolumeChangedEvent {
  type: 'group-volume-changed';
  groupId: number;
  level: number;
  muted: boolean;
}

export interface PlayersChangedEvent {
  type: 'players-changed';
}

/** Synthesised from the refresh that follows `players-changed`. */
export interface PlayerAddedEvent {
  type: 'player-added';
  playerId: number;
}

/** Synthesised from the refresh that follows `players-changed`. */
export interface PlayerRemovedEvent {
  type: 'player-removed';
  playerId: number;
}

export interface SourcesChangedEvent {
  type: 'sources-changed';
}

export interface QueueChangedEvent {
  type: 'queue-changed';
  playerId: number;
}

export interface UserChangedEvent {
  type: 'user-changed';
  signedIn: boolean;
  username: string | null;
}

export interface SystemErrorEvent {
  type: 'system-error';
  playerId: number | null;
  message: string;
}

export type HeosEvent =
  | PlayerStateChangedEvent
  | NowPlayingChangedEvent
  | NowPlayingProgressEvent
  | VolumeChangedEvent
  | PlayModeChangedEvent
  | GroupChangedEvent
  | GroupVolumeChangedEvent
  | PlayersChangedEvent
  | PlayerAddedEvent
  | PlayerRemovedEvent
  | SourcesChangedEvent
  | QueueChangedEvent
  | UserChangedEvent
  | SystemErrorEvent;

export type HeosEventType = HeosEvent['type'];

export type EventOf<T extends HeosEventType> = Extract<HeosEvent, { type: T }>;

export const EVENT_TYPES: readonly HeosEventType[] = [
  'player-state-changed',
  'now-playing-changed',
  'now-playing-progress',
  'volume-changed',
  'play-mode-changed',
  'group-changed',
  'group-volume-changed',
  'players-changed',
  'player-added',
  'player-removed',
  'sources-changed',
  'queue-changed',
  'user-changed',
  'system-error',
];

export function isEventType(value: string): value is HeosEventType {
  const known: readonly string[] = EVENT_TYPES;
  return known.includes(value);
}

/** Events that name a player. */
export function eventPlayerId(event: HeosEvent): number | null {
  return 'playerId' in event ? event.playerId : null;
}

/**
 * Decode a raw event. Returns null for unknown event names or events missing the attributes they need.
 */
export function decodeEvent(raw: RawEvent): HeosEvent | null {
  const attrs = raw.attributes;
  const pid = parseInteger(attrs.pid);

  switch (raw.name) {
    case 'player_state_changed': {
      const state = playStateFromWire(attrs.state);
      if (pid === null || state === null) return null;
      return { type: 'player-state-changed', playerId: pid, state };
    }
    case 'player_now_playing_changed':
      return pid === null ? null : { type: 'now-playing-changed', playerId: pid };
    case 'player_now_playing_progress': {
      const elapsed = parseInteger(attrs.cur_pos);
      const duration = parseInteger(attrs.duration);
      if (pid === null || elapsed === null) return null;
      return { type: 'now-playing-progress', playerId: pid, elapsed, duration: duration ?? 0 };
    }
    case 'player_volume_changed': {
      const level = parseInteger(attrs.level);
      const muted = parseOnOff(attrs.mute);
      if (pid === null || level === null) return null;
      return { type: 'volume-changed', playerId: pid, level, muted: muted ?? false };
    }
    case 'repeat_mode_changed': {
      const repeat = repeatFromWire(attrs.repeat);
      if (pid === null || repeat === null) return null;
      return { type: 'play-mode-changed', playerId: pid, repeat };
    }
    case 'shuffle_mode_changed': {
      const shuffle = parseOnOff(attrs.shuffle);
      if (pid === null || shuffle === null) return null;
      return { type: 'play-mode-changed', playerId: pid, shuffle };
    }
    case 'groups_changed':
      return { type: 'group-changed' };
    case 'group_volume_changed': {
      const gid = parseInteger(attrs.gid);
      const level = parseInteger(attrs.level);
      if (gid === null || level === null) return null;
      return { type: 'group-volume-changed', groupId: gid, level, muted: parseOnOff(attrs.mute) ?? false };
    }
    case 'players_changed':
      return { type: 'players-changed' };
    case 'sources_changed':
      return { type: 'sources-changed' };
    case 'player_queue_changed':
      return pid === null ? null : { type: 'queue-changed', playerId: pid };
    case 'user_changed': {
      const signedIn = 'signed_in' in attrs;
      return { type: 'user-changed', signedIn, username: signedIn ? attrs.un ?? null : null };
    }
    case 'player_playback_error':
      return { type: 'system-error', playerId: pid, message: attrs.error ?? raw.message };
    default:
      return null;
  }
}
