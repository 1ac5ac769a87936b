#!/usr/bin/env node
import { scan } from '../discovery.js';
import { HeosSystem } from '../heos.js';
import { createConsoleLogger, isLogLevel } from '../logger.js';
import type { HeosCredentials } from '../options.js';
import { describePlayer } from '../player.js';
import type { PlaybackCommand, VolumeTarget } from '../facade.js';

const PLAYBACK_COMMANDS = new Set<string>(['play', 'pause', 'stop', 'next', 'previous']);

function isPlaybackCommand(value: string): value is PlaybackCommand {
  return PLAYBACK_COMMANDS.has(value);
}

function parseId(value: string | undefined, label: string): number {
  const id = Number(value);
  if (!value || !Number.isInteger(id)) {
    throw new Error(`Expected a numeric ${label}, got "${value ?? ''}"`);
  }
  return id;
}

/** `123` addresses a player, `g:123` a group. */
function parseTarget(value: string | undefined): VolumeTarget {
  if (value?.startsWith('g:')) return { groupId: parseId(value.slice(2), 'group id') };
  return { playerId: parseId(value, 'player id') };
}

function credentialsFromEnv(): HeosCredentials | undefined {
  const username = process.env.HEOS_USERNAME;
  const password = process.env.HEOS_PASSWORD;
  return username && password ? { username, password } : undefined;
}

async function resolveHost(): Promise<string> {
  if (process.env.HEOS_HOST) return process.env.HEOS_HOST;
  console.log('HEOS_HOST not set, scanning...');
  const devices = await scan({ timeout: 3000 });
  if (devices.length === 0) {
    throw new Error('No HEOS devices found. Set HEOS_HOST to the address of one.');
  }
  console.log(`Using ${devices[0]}`);
  return devices[0].address;
}

async function connect(): Promise<HeosSystem> {
  const level = process.env.HEOS_LOG_LEVEL ?? 'warn';
  const host = await resolveHost();
  return HeosSystem.connect({ host }, credentialsFromEnv(), {
    logger: createConsoleLogger({ level: isLogLevel(level) ? level : 'warn' }),
  });
}

async function withSystem(action: (system: HeosSystem) => Promise<void>): Promise<void> {
  const system = await connect();
  try {
    await action(system);
  } finally {
    system.shutdown();
  }
}

async function cmdScan() {
  console.log('Scanning for HEOS devices...');
  const devices = await scan({ timeout: 5000 });
  if (devices.length === 0) {
    console.log('No HEOS devices found.');
    return;
  }
  devices.forEach((d, i) => {
    console.log(`  ${i + 1}. ${d}`);
  });
}

async function cmdPlayers() {
  await withSystem(async (system) => {
    const players = system.listPlayers();
    if (players.length === 0) {
      console.log('No players.');
      return;
    }
    for (const player of players) {
      console.log(`  ${describePlayer(player)}`);
    }
  });
}

async function cmdGroups() {
  await withSystem(async (system) => {
    const groups = system.listGroups();
    if (groups.length === 0) {
      console.log('No groups.');
      return;
    }
    for (const group of groups) {
      const members = group.memberIds.map((id) => system.registry.player(id)?.name ?? String(id));
      console.log(`  ${group.name} (${group.id}) vol ${group.volume}${group.muted ? ' muted' : ''}: ${members.join(', ')}`);
    }
  });
}

async function cmdPlayback(command: PlaybackCommand, pid?: string) {
  const playerId = parseId(pid, 'player id');
  await withSystem(async (system) => {
    await system.sendPlaybackCommand(playerId, command);
    console.log(`Sent: ${command}`);
  });
}

async function cmdVolume(target?: string, level?: string) {
  const parsedTarget = parseTarget(target);
  const parsedLevel = parseId(level, 'volume level');
  await withSystem(async (system) => {
    await system.setVolume(parsedTarget, parsedLevel);
    console.log(`Volume set to ${parsedLevel}`);
  });
}

async function cmdMute(target?: string) {
  const parsedTarget = parseTarget(target);
  await withSystem(async (system) => {
    await system.commands.toggleMute(parsedTarget);
    console.log('Mute toggled');
  });
}

async function cmdGroup(leader?: string, members: string[] = []) {
  const leaderId = parseId(leader, 'leader id');
  const memberIds = members.map((m) => parseId(m, 'member id'));
  await withSystem(async (system) => {
    const group = await system.createGroup(leaderId, memberIds);
    console.log(group ? `Group ${group.name} (${group.id}) formed` : 'The device did not form the group.');
  });
}

async function cmdUngroup(gid?: string) {
  const groupId = parseId(gid, 'group id');
  await withSystem(async (system) => {
    await system.dissolveGroup(groupId);
    console.log(`Group ${groupId} dissolved`);
  });
}

async function cmdSources() {
  await withSystem(async (system) => {
    const sources = await system.commands.getMusicSources();
    for (const source of sources) {
      console.log(`  ${source.id}\t${source.name}${source.available ? '' : ' (unavailable)'}`);
    }
  });
}

async function cmdBrowse(sid?: string, cid?: string) {
  const sourceId = parseId(sid, 'source id');
  await withSystem(async (system) => {
    const result = await system.commands.browse(sourceId, cid);
    console.log(`${result.returned} of ${result.total} items`);
    for (const item of result.items) {
      const id = item.containerId ? `cid=${item.containerId}` : `mid=${item.mediaId ?? ''}`;
      const flags = [item.browsable && 'browse', item.playable && 'play'].filter(Boolean).join(',');
      console.log(`  ${item.name} [${item.type}] ${id} ${flags}`);
    }
  });
}

async function cmdEvents() {
  const system = await connect();
  console.log('Listening for events (Ctrl+C to stop)...\n');

  system.on('stateChange', (state: string) => console.log(`[session] ${state}`));
  system.subscribe('*', (event) => {
    console.log(JSON.stringify(event));
  });

  process.on('SIGINT', () => {
    console.log('\nDisconnecting...');
    system.shutdown();
    process.exit(0);
  });
}

function usage() {
  console.log('Usage:');
  console.log('  heos scan                          Scan for HEOS devices');
  console.log('  heos players                       List players and what they play');
  console.log('  heos groups                        List groups');
  console.log('  heos <play|pause|stop|next|previous> <pid>');
  console.log('  heos volume <pid|g:gid> <0-100>    Set player or group volume');
  console.log('  heos mute <pid|g:gid>              Toggle mute');
  console.log('  heos group <leader> <member...>    Form a group');
  console.log('  heos ungroup <gid>                 Dissolve a group');
  console.log('  heos sources                       List music sources');
  console.log('  heos browse <sid> [cid]            Browse a source or container');
  console.log('  heos events                        Stream events');
  console.log('');
  console.log('Environment: HEOS_HOST, HEOS_USERNAME, HEOS_PASSWORD, HEOS_LOG_LEVEL');
}

// Main
const [, , cmd = '', ...args] = process.argv;

function run(): Promise<void> {
  if (isPlaybackCommand(cmd)) return cmdPlayback(cmd, args[0]);
  switch (cmd) {
    case 'scan':
      return cmdScan();
    case 'players':
      return cmdPlayers();
    case 'groups':
      return cmdGroups();
    case 'volume':
      return cmdVolume(args[0], args[1]);
    case 'mute':
      return cmdMute(args[0]);
    case 'group':
      return cmdGroup(args[0], args.slice(1));
    case 'ungroup':
      return cmdUngroup(args[0]);
    case 'sources':
      return cmdSources();
    case 'browse':
      return cmdBrowse(args[0], args[1]);
    case 'events':
      return cmdEvents();
    default:
      usage();
      return Promise.resolve();
  }
}

run().catch((err: unknown) => {
  console.error(err instanceof Error ? `Error: ${err.message}` : err);
  process.exitCode = 1;
});
