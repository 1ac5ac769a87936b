import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { SessionManager, SessionState } from '../session.js';
import { AuthError, ConnectError, DisconnectedError } from '../errors.js';
import { resolveOptions, type HeosCredentials } from '../options.js';
import { Commands } from '../protocol/commands.js';
import { FakeDevice, flush } from './helpers/fake-device.js';

const CREDENTIALS: HeosCredentials = { username: 'user@example.com', password: 'test-secret' };

function setup(credentials?: HeosCredentials) {
  const device = new FakeDevice();
  const session = new SessionManager({ host: '10.0.0.5' }, credentials, resolveOptions({ transportFactory: device.factory }));
  const states: SessionState[] = [];
  session.on('stateChange', (state: SessionState) => states.push(state));
  return { device, session, states };
}

beforeEach(() => {
  vi.useFakeTimers();
});

afterEach(() => {
  vi.useRealTimers();
});

describe('SessionManager', () => {
  it('connects, registers for events and becomes ready', async () => {
    const { device, session, states } = setup();
    const ready = vi.fn();
    session.on('ready', ready);

    await session.start();

    expect(session.state).toBe(SessionState.Ready);
    expect(states).toEqual(['connecting', 'authenticating', 'ready']);
    expect(device.current.endpoint).toEqual({ host: '10.0.0.5' });
    expect(device.commands.map((c) => c.line)).toEqual(['heos://system/register_for_change_events?enable=on&SEQUENCE=1']);
    expect(ready).toHaveBeenCalledTimes(1);
    session.shutdown();
  });

  it('signs in when the account is signed out', async () => {
    const { device, session } = setup(CREDENTIALS);
    device.handle('system/check_account', () => ({ message: 'signed_out' }));

    await session.start();

    expect(device.sentPaths()).toEqual(['system/register_for_change_events', 'system/check_account', 'system/sign_in']);
    expect(device.commands[2].attributes).toMatchObject({ un: 'user@example.com', pw: 'test-secret' });
    session.shutdown();
  });

  it('skips sign in when already signed in as the same user', async () => {
    const { device, session } = setup(CREDENTIALS);
    device.handle('system/check_account', () => ({ message: 'signed_in&un=user@example.com' }));

    await session.start();

    expect(device.sentPaths()).toEqual(['system/register_for_change_events', 'system/check_account']);
    session.shutdown();
  });

  it('fails the first start with AuthError when credentials are rejected', async () => {
    const { device, session } = setup(CREDENTIALS);
    device.handle('system/check_account', () => ({ message: 'signed_out' }));
    device.handle('system/sign_in', () => ({ result: 'fail', message: 'eid=10&text=User not found' }));

    const error = await session.start().catch((e: unknown) => e);

    expect(error).toBeInstanceOf(AuthError);
    expect(error).toHaveProperty('message', 'Sign in failed for user@example.com: User not found');
    expect(session.state).toBe(SessionState.Disconnected);
    expect(session.lastError).toBe(error);
    expect(device.current.closed).toBe(true);
  });

  it('fails the first start with ConnectError and does not retry', async () => {
    const { device, session } = setup();
    device.refuseConnections = 1;

    await expect(session.start()).rejects.toBeInstanceOf(ConnectError);
    expect(session.state).toBe(SessionState.Disconnected);

    vi.advanceTimersByTime(60_000);
    await flush();
    expect(device.transports).toHaveLength(1);
  });

  it('rejects commands immediately while not connected', async () => {
    const { session } = setup();
    const error = await session.submit(Commands.getPlayers()).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(DisconnectedError);
    expect(error).toHaveProperty('message', 'Session is disconnected');
  });

  it('fails every outstanding command when the connection drops, then reconnects', async () => {
    const { device, session, states } = setup();
    device.handle('player/get_volume', () => null);
    await session.start();

    const results = [1, 2, 3].map((pid) => session.submit(Commands.getVolume(pid)).catch((e: unknown) => e));
    await flush();
    expect(session.correlator.outstanding).toBe(3);

    device.current.close();
    for (const error of await Promise.all(results)) {
      expect(error).toBeInstanceOf(DisconnectedError);
    }
    expect(session.state).toBe(SessionState.Degraded);

    vi.advanceTimersByTime(1000);
    await flush();

    expect(session.state).toBe(SessionState.Ready);
    expect(device.transports).toHaveLength(2);
    expect(states).toEqual(['connecting', 'authenticating', 'ready', 'degraded', 'connecting', 'authenticating', 'ready']);
    session.shutdown();
  });

  it('backs off exponentially between failed reconnect attempts', async () => {
    const { device, session } = setup();
    await session.start();

    device.refuseConnections = 3;
    device.current.close();
    await flush();
    expect(session.state).toBe(SessionState.Degraded);

    vi.advanceTimersByTime(999);
    await flush();
    expect(device.transports).toHaveLength(1);
    vi.advanceTimersByTime(1);
    await flush();
    expect(device.transports).toHaveLength(2);
    expect(session.state).toBe(SessionState.Degraded);
    expect(session.lastError).toBeInstanceOf(ConnectError);

    vi.advanceTimersByTime(1999);
    await flush();
    expect(device.transports).toHaveLength(2);
    vi.advanceTimersByTime(1);
    await flush();
    expect(device.transports).toHaveLength(3);

    vi.advanceTimersByTime(4000);
    await flush();
    expect(device.transports).toHaveLength(4);

    vi.advanceTimersByTime(8000);
    await flush();
    expect(device.transports).toHaveLength(5);
    expect(session.state).toBe(SessionState.Ready);
    session.shutdown();
  });

  it('stops reconnecting when credentials are rejected after a drop', async () => {
    const { device, session } = setup(CREDENTIALS);
    device.handle('system/check_account', () => ({ message: 'signed_out' }));
    await session.start();
    const errors: Error[] = [];
    session.on('error', (err: Error) => errors.push(err));

    device.handle('system/sign_in', () => ({ result: 'fail', message: 'eid=6&text=Invalid credentials' }));
    device.current.close();
    await flush();
    vi.advanceTimersByTime(1000);
    await flush();

    expect(session.state).toBe(SessionState.Disconnected);
    expect(errors).toHaveLength(1);
    expect(errors[0]).toBeInstanceOf(AuthError);

    vi.advanceTimersByTime(120_000);
    await flush();
    expect(device.transports).toHaveLength(2);
  });

  it('reconnects after consecutive heartbeat failures', async () => {
    const { device, session } = setup();
    await session.start();
    device.handle('system/heart_beat', () => null);

    vi.advanceTimersByTime(30_000);
    await flush();
    expect(device.sentPaths().filter((path) => path === 'system/heart_beat')).toHaveLength(1);

    vi.advanceTimersByTime(10_000);
    await flush();
    expect(session.state).toBe(SessionState.Ready);

    vi.advanceTimersByTime(30_000);
    await flush();
    expect(device.transports[0].closed).toBe(true);
    expect(session.state).toBe(SessionState.Degraded);

    device.handle('system/heart_beat', () => ({}));
    vi.advanceTimersByTime(1000);
    await flush();
    expect(session.state).toBe(SessionState.Ready);
    session.shutdown();
  });

  it('drops and re-establishes the connection after a protocol error', async () => {
    const { device, session } = setup();
    await session.start();

    device.current.receive('this is not json');
    await flush();

    expect(device.transports[0].closed).toBe(true);
    expect(session.state).toBe(SessionState.Degraded);

    vi.advanceTimersByTime(1000);
    await flush();
    expect(session.state).toBe(SessionState.Ready);
    session.shutdown();
  });

  it('runs ready hooks on every transition into ready', async () => {
    const { device, session } = setup();
    const hook = vi.fn();
    session.onReady(hook);

    await session.start();
    expect(hook).toHaveBeenCalledTimes(1);

    device.current.close();
    await flush();
    vi.advanceTimersByTime(1000);
    await flush();
    expect(hook).toHaveBeenCalledTimes(2);
    session.shutdown();
  });

  it('stays ready when a ready listener throws', async () => {
    const { device, session } = setup();
    const hook = vi.fn();
    session.onReady(hook);
    session.on('ready', () => {
      throw new Error('listener failed');
    });

    await session.start();

    expect(session.state).toBe(SessionState.Ready);
    expect(session.lastError).toBeNull();
    expect(hook).toHaveBeenCalledTimes(1);
    expect(device.current.closed).toBe(false);
    session.shutdown();
  });

  it('shuts down for good', async () => {
    const { device, session } = setup();
    device.handle('player/get_players', () => null);
    await session.start();

    const pending = session.submit(Commands.getPlayers()).catch((e: unknown) => e);
    session.shutdown();

    const error = await pending;
    expect(error).toBeInstanceOf(DisconnectedError);
    expect(error).toHaveProperty('message', 'Session shut down');
    expect(session.state).toBe(SessionState.Disconnected);
    expect(device.current.closed).toBe(true);

    vi.advanceTimersByTime(120_000);
    await flush();
    expect(device.transports).toHaveLength(1);
  });
});
