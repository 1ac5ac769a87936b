import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { HeosSystem } from '../heos.js';
import type { HeosEvent } from '../protocol/events.js';
import { SessionState } from '../session.js';
import { FakeDevice, Household, flush, TWO_PLAYERS } from './helpers/fake-device.js';

const STUDY = { name: 'Study', pid: 3, model: 'HEOS 3', version: '3.34.620', ip: '192.168.1.23', network: 'wifi' };

function setup() {
  const device = new FakeDevice();
  const household = new Household(device);
  const connect = () => HeosSystem.connect({ host: '10.0.0.5' }, undefined, { transportFactory: device.factory });
  return { device, household, connect };
}

beforeEach(() => {
  vi.useFakeTimers();
});

afterEach(() => {
  vi.useRealTimers();
});

describe('HeosSystem', () => {
  it('connects and loads the registry', async () => {
    const { household, connect } = setup();
    household.player(2).state = 'play';

    const system = await connect();

    expect(system.state).toBe(SessionState.Ready);
    expect(system.listPlayers().map((p) => [p.id, p.name, p.playbackState])).toEqual([
      [1, 'Kitchen', 'stop'],
      [2, 'Lounge', 'play'],
    ]);
    expect(system.listGroups()).toEqual([]);
    system.shutdown();
  });

  it('delivers device events to subscribers after the registry applied them', async () => {
    const { device, connect } = setup();
    const system = await connect();
    const seen: Array<[number, number | undefined]> = [];
    const all: HeosEvent[] = [];
    system.subscribe('volume-changed', (event) => {
      seen.push([event.level, system.registry.player(event.playerId)?.volume]);
    });
    system.subscribe('*', (event) => {
      all.push(event);
    });

    device.emit('player_volume_changed', 'pid=2&level=64&mute=off');
    await flush();

    expect(seen).toEqual([[64, 64]]);
    expect(all).toEqual([{ type: 'volume-changed', playerId: 2, level: 64, muted: false }]);
    system.shutdown();
  });

  it('refreshes when an event names an unknown player', async () => {
    const { device, household, connect } = setup();
    const system = await connect();
    const added: number[] = [];
    system.subscribe('player-added', (event) => {
      added.push(event.playerId);
    });

    household.players = [...TWO_PLAYERS, STUDY];
    device.emit('player_state_changed', 'pid=3&state=play');
    await flush();

    expect(system.listPlayers().map((p) => p.id)).toEqual([1, 2, 3]);
    expect(added).toEqual([3]);
    system.shutdown();
  });

  it('drops cached music sources when the device reports a change', async () => {
    const { device, connect } = setup();
    device.handle('browse/get_music_sources', () => ({ payload: [{ name: 'Local Music', sid: 1024, type: 'heos_server', available: 'true' }] }));
    const system = await connect();
    const fetches = () => device.sentPaths().filter((path) => path === 'browse/get_music_sources').length;

    await system.commands.getMusicSources();
    await system.commands.getMusicSources();
    expect(fetches()).toBe(1);

    device.emit('sources_changed');
    await flush();
    await system.commands.getMusicSources();
    expect(fetches()).toBe(2);
    system.shutdown();
  });

  it('stays usable when the initial refresh fails and retries it', async () => {
    const { device, household, connect } = setup();
    device.handle('player/get_players', () => ({ result: 'fail', message: 'eid=11&text=Internal error' }));

    const system = await connect();
    expect(system.state).toBe(SessionState.Ready);
    expect(system.listPlayers()).toEqual([]);

    device.handle('player/get_players', () => ({ payload: household.players }));
    vi.advanceTimersByTime(5000);
    await flush();

    expect(system.listPlayers().map((p) => p.id)).toEqual([1, 2]);
    system.shutdown();
  });

  it('reloads the registry after reconnecting', async () => {
    const { device, household, connect } = setup();
    const system = await connect();
    const states: SessionState[] = [];
    system.on('stateChange', (state: SessionState) => {
      states.push(state);
    });

    household.player(1).level = 70;
    device.current.close();
    await flush();
    expect(system.state).toBe(SessionState.Degraded);
    expect(system.listPlayers()).toHaveLength(2);

    vi.advanceTimersByTime(1000);
    await flush();

    expect(states).toEqual(['degraded', 'connecting', 'authenticating', 'ready']);
    expect(system.registry.player(1)?.volume).toBe(70);
    system.shutdown();
  });

  it('shuts down and can be restarted', async () => {
    const { device, connect } = setup();
    const system = await connect();

    system.shutdown();
    expect(system.state).toBe(SessionState.Disconnected);
    expect(device.current.closed).toBe(true);

    await system.start();
    expect(system.state).toBe(SessionState.Ready);
    expect(device.transports).toHaveLength(2);
    system.shutdown();
  });
});
