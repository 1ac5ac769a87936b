import { afterEach, describe, it, expect, vi } from 'vitest';
import { CommandCorrelator, correlationKey } from '../correlator.js';
import {
  CommandError,
  CommandTimeoutError,
  DisconnectedError,
  HeosErrorId,
  ProtocolError,
  SendError,
} from '../errors.js';
import type { HeosLogger } from '../logger.js';
import { Commands } from '../protocol/commands.js';
import { decodeMessage } from '../protocol/messages.js';
import { parseSent, responseLine, type DeviceReply } from './helpers/fake-device.js';

function setup(options: { send?: (line: string) => Promise<void>; logger?: HeosLogger } = {}) {
  const sent: string[] = [];
  const correlator = new CommandCorrelator({
    send: options.send ?? ((line) => {
      sent.push(line);
      return Promise.resolve();
    }),
    timeoutMs: 1000,
    logger: options.logger,
  });
  const offerLine = (line: string): boolean => {
    const message = decodeMessage(line);
    if (message.kind === 'event') throw new Error('expected a response');
    return correlator.offer(message);
  };
  const respond = (line: string, reply?: DeviceReply): boolean => offerLine(responseLine(parseSent(line), reply));
  return { correlator, sent, respond, offerLine };
}

afterEach(() => {
  vi.useRealTimers();
});

describe('correlationKey', () => {
  it('combines the command path with its target', () => {
    expect(correlationKey(Commands.setVolume(3, 10))).toBe('player/set_volume:pid=3');
    expect(correlationKey(Commands.getGroupVolume(9))).toBe('group/get_volume:gid=9');
    expect(correlationKey(Commands.getPlayers())).toBe('player/get_players');
  });
});

describe('CommandCorrelator', () => {
  it('sends the command with a sequence and resolves with the matching response', async () => {
    const { correlator, sent, respond } = setup();
    const result = correlator.submit(Commands.getVolume(1));

    expect(sent).toEqual(['heos://player/get_volume?pid=1&SEQUENCE=1']);
    expect(respond(sent[0], { message: 'level=20' })).toBe(true);

    const response = await result;
    expect(response.attributes.level).toBe('20');
    expect(correlator.outstanding).toBe(0);
  });

  it('queues a command behind another with the same key', async () => {
    const { correlator, sent, respond } = setup();
    const first = correlator.submit(Commands.setVolume(1, 10));
    const second = correlator.submit(Commands.setVolume(1, 20));

    expect(sent).toHaveLength(1);
    expect(correlator.outstanding).toBe(1);
    expect(correlator.waiting).toBe(1);

    respond(sent[0]);
    await first;
    expect(sent).toEqual([
      'heos://player/set_volume?pid=1&level=10&SEQUENCE=1',
      'heos://player/set_volume?pid=1&level=20&SEQUENCE=2',
    ]);
    expect(correlator.waiting).toBe(0);

    respond(sent[1]);
    const response = await second;
    expect(response.attributes.level).toBe('20');
  });

  it('keeps commands with different keys outstanding together', () => {
    const { correlator, sent } = setup();
    void correlator.submit(Commands.setVolume(1, 10)).catch(() => undefined);
    void correlator.submit(Commands.setVolume(2, 10)).catch(() => undefined);
    expect(sent).toHaveLength(2);
    expect(correlator.outstanding).toBe(2);
    correlator.failAll();
  });

  it('matches a response without a sequence by its target attribute', async () => {
    const { correlator, offerLine } = setup();
    const first = correlator.submit(Commands.getVolume(1)).catch((e: unknown) => e);
    const second = correlator.submit(Commands.getVolume(2));

    const consumed = offerLine(JSON.stringify({
      heos: { command: 'player/get_volume', result: 'success', message: 'pid=2&level=5' },
    }));

    expect(consumed).toBe(true);
    expect((await second).attributes.level).toBe('5');
    expect(correlator.outstanding).toBe(1);
    correlator.failAll();
    expect(await first).toBeInstanceOf(DisconnectedError);
  });

  it('discards responses that match nothing', async () => {
    const { correlator, offerLine } = setup();
    const pending = correlator.submit(Commands.getVolume(1)).catch((e: unknown) => e);

    expect(offerLine('{"heos":{"command":"player/get_volume","result":"success","message":"pid=1&SEQUENCE=99"}}')).toBe(false);
    expect(offerLine('{"heos":{"command":"player/get_mute","result":"success","message":"pid=1"}}')).toBe(false);
    expect(correlator.outstanding).toBe(1);

    correlator.failAll();
    await pending;
  });

  it('rejects with CommandError when the device reports a failure', async () => {
    const { correlator, sent, respond } = setup();
    const result = correlator.submit(Commands.getVolume(77)).catch((e: unknown) => e);
    respond(sent[0], { result: 'fail', message: 'eid=2&text=ID Not Valid' });

    const error = await result;
    expect(error).toBeInstanceOf(CommandError);
    expect(error).toMatchObject({ command: 'player/get_volume', errorId: HeosErrorId.InvalidId, text: 'ID Not Valid' });
    expect(error).toHaveProperty('message', 'player/get_volume failed: ID Not Valid (eid=2)');
  });

  it('keeps a command pending after a "command under process" acknowledgement', async () => {
    const { correlator, sent, offerLine, respond } = setup();
    const result = correlator.submit(Commands.browse(1028));

    const ack = offerLine(JSON.stringify({
      heos: { command: 'browse/browse', result: 'success', message: 'command under process&sid=1028&SEQUENCE=1' },
    }));
    expect(ack).toBe(true);
    expect(correlator.outstanding).toBe(1);

    respond(sent[0], { message: 'returned=0&count=0', payload: [] });
    expect((await result).payload).toEqual([]);
  });

  it('rejects a malformed response with ProtocolError', async () => {
    const { correlator, offerLine } = setup();
    const result = correlator.submit(Commands.getPlayers()).catch((e: unknown) => e);
    offerLine('{"heos":{"command":"player/get_players","message":"SEQUENCE=1"}}');
    expect(await result).toBeInstanceOf(ProtocolError);
  });

  it('times out, starts the next queued command and ignores the late response', async () => {
    vi.useFakeTimers();
    const { correlator, sent, respond } = setup();
    const first = correlator.submit(Commands.getVolume(1), { timeoutMs: 500 }).catch((e: unknown) => e);
    const second = correlator.submit(Commands.getVolume(1));

    vi.advanceTimersByTime(500);
    const error = await first;
    expect(error).toBeInstanceOf(CommandTimeoutError);
    expect(error).toHaveProperty('message', 'Command timed out after 500ms: player/get_volume');
    expect(sent).toHaveLength(2);

    expect(respond(sent[0], { message: 'level=1' })).toBe(false);
    respond(sent[1], { message: 'level=2' });
    expect((await second).attributes.level).toBe('2');
  });

  it('starts the timeout of a queued command when it is sent', async () => {
    vi.useFakeTimers();
    const { correlator, sent, respond } = setup();
    const first = correlator.submit(Commands.getMute(1));
    const second = correlator.submit(Commands.getMute(1)).catch((e: unknown) => e);

    vi.advanceTimersByTime(900);
    respond(sent[0], { message: 'state=off' });
    await first;

    vi.advanceTimersByTime(900);
    expect(correlator.outstanding).toBe(1);
    vi.advanceTimersByTime(100);
    expect(await second).toBeInstanceOf(CommandTimeoutError);
  });

  it('fails every outstanding and queued command', async () => {
    const { correlator } = setup();
    const results = [
      correlator.submit(Commands.getVolume(1)),
      correlator.submit(Commands.getVolume(1)),
      correlator.submit(Commands.getMute(2)),
    ].map((p) => p.catch((e: unknown) => e));

    correlator.failAll(new DisconnectedError('Connection lost'));

    for (const error of await Promise.all(results)) {
      expect(error).toBeInstanceOf(DisconnectedError);
      expect(error).toHaveProperty('message', 'Connection lost');
    }
    expect(correlator.outstanding).toBe(0);
    expect(correlator.waiting).toBe(0);
  });

  it('rejects with DisconnectedError when the write fails', async () => {
    const { correlator } = setup({ send: () => Promise.reject(new SendError('Not connected')) });
    const error = await correlator.submit(Commands.getPlayers()).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(DisconnectedError);
    expect(error).toHaveProperty('message', 'Unable to send player/get_players: Not connected');
    expect(correlator.outstanding).toBe(0);
  });

  it('redacts passwords in debug output', () => {
    const logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const { correlator } = setup({ logger });
    void correlator.submit(Commands.signIn('user@example.com', 'test-secret')).catch(() => undefined);
    expect(logger.debug).toHaveBeenCalledWith('sending command', {
      line: 'heos://system/sign_in?un=user@example.com&pw=***&SEQUENCE=1',
    });
    correlator.failAll();
  });
});
