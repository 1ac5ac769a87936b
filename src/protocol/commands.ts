import type { AttributeValue, CommandNamespace, HeosCommand } from './messages.js';

export type PlayState = 'play' | 'pause' | 'stop';
export type RepeatMode = 'off' | 'all' | 'one';

const WIRE_REPEAT: Record<RepeatMode, string> = {
  off: 'off',
  all: 'on_all',
  one: 'on_one',
};

function command(
  namespace: CommandNamespace,
  name: string,
  attributes: Record<string, AttributeValue | undefined> = {},
): HeosCommand {
  return { namespace, name, attributes };
}

export function repeatToWire(mode: RepeatMode): string {
  return WIRE_REPEAT[mode];
}

export function repeatFromWire(value: string | undefined): RepeatMode | null {
  switch (value) {
    case 'off': return 'off';
    case 'on_all': return 'all';
    case 'on_one': return 'one';
    default: return null;
  }
}

export function playStateFromWire(value: string | undefined): PlayState | null {
  return value === 'play' || value === 'pause' || value === 'stop' ? value : null;
}

/** Builders for every command this library issues. */
export const Commands = {
  // --- system ---
  registerForChangeEvents: (enable: boolean) =>
    command('system', 'register_for_change_events', { enable }),
  checkAccount: () => command('system', 'check_account'),
  signIn: (username: string, password: string) =>
    command('system', 'sign_in', { un: username, pw: password }),
  signOut: () => command('system', 'sign_out'),
  heartBeat: () => command('system', 'heart_beat'),

  // --- player ---
  getPlayers: () => command('player', 'get_players'),
  getPlayState: (pid: number) => command('player', 'get_play_state', { pid }),
  setPlayState: (pid: number, state: PlayState) => command('player', 'set_play_state', { pid, state }),
  getNowPlayingMedia: (pid: number) => command('player', 'get_now_playing_media', { pid }),
  getVolume: (pid: number) => command('player', 'get_volume', { pid }),
  setVolume: (pid: number, level: number) => command('player', 'set_volume', { pid, level }),
  volumeUp: (pid: number, step: number) => command('player', 'volume_up', { pid, step }),
  volumeDown: (pid: number, step: number) => command('player', 'volume_down', { pid, step }),
  getMute: (pid: number) => command('player', 'get_mute', { pid }),
  setMute: (pid: number, muted: boolean) => command('player', 'set_mute', { pid, state: muted }),
  toggleMute: (pid: number) => command('player', 'toggle_mute', { pid }),
  getPlayMode: (pid: number) => command('player', 'get_play_mode', { pid }),
  setPlayMode: (pid: number, repeat: RepeatMode, shuffle: boolean) =>
    command('player', 'set_play_mode', { pid, repeat: repeatToWire(repeat), shuffle }),
  playNext: (pid: number) => command('player', 'play_next', { pid }),
  playPrevious: (pid: number) => command('player', 'play_previous', { pid }),
  clearQueue: (pid: number) => command('player', 'clear_queue', { pid }),

  // --- group ---
  getGroups: () => command('group', 'get_groups'),
  setGroup: (playerIds: readonly number[]) => command('group', 'set_group', { pid: playerIds.join(',') }),
  getGroupVolume: (gid: number) => command('group', 'get_volume', { gid }),
  setGroupVolume: (gid: number, level: number) => command('group', 'set_volume', { gid, level }),
  groupVolumeUp: (gid: number, step: number) => command('group', 'volume_up', { gid, step }),
  groupVolumeDown: (gid: number, step: number) => command('group', 'volume_down', { gid, step }),
  getGroupMute: (gid: number) => command('group', 'get_mute', { gid }),
  setGroupMute: (gid: number, muted: boolean) => command('group', 'set_mute', { gid, state: muted }),
  toggleGroupMute: (gid: number) => command('group', 'toggle_mute', { gid }),

  // --- browse ---
  getMusicSources: () => command('browse', 'get_music_sources'),
  browse: (sid: number, cid?: string, range?: { start: number; end: number }) =>
    command('browse', 'browse', {
      sid,
      cid,
      range: range ? `${range.start},${range.end}` : undefined,
    }),
  playStream: (pid: number, sid: number, mid: string, cid?: string) =>
    command('browse', 'play_stream', { pid, sid, cid, mid }),
  playInput: (pid: number, input: string) => command('browse', 'play_input', { pid, input }),
  playPreset: (pid: number, preset: number) => command('browse', 'play_preset', { pid, preset }),
  playUrl: (pid: number, url: string) => command('browse', 'play_stream', { pid, url }),
  addToQueue: (pid: number, sid: number, cid: string, aid: AddCriteria, mid?: string) =>
    command('browse', 'add_to_queue', { pid, sid, cid, mid, aid }),
} as const;

/** `aid` values accepted by browse/add_to_queue. */
export enum AddCriteria {
  PlayNow = 1,
  PlayNext = 2,
  AddToEnd = 3,
  ReplaceAndPlay = 4,
}
