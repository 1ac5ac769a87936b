import {
  CommandError,
  CommandTimeoutError,
  DisconnectedError,
  ProtocolError,
} from './errors.js';
import { noopLogger, type HeosLogger } from './logger.js';
import { DEFAULT_TIMINGS } from './options.js';
import {
  SEQUENCE_ATTRIBUTE,
  commandPath,
  encodeCommand,
  isUnderProcess,
  type HeosCommand,
  type HeosResponse,
  type MalformedResponse,
} from './protocol/messages.js';
import { parseInteger } from './util/values.js';

const TARGET_ATTRIBUTES = ['pid', 'gid'] as const;

interface CommandTarget {
  attribute: (typeof TARGET_ATTRIBUTES)[number];
  value: string;
}

interface PendingCommand {
  key: string;
  path: string;
  target: CommandTarget | null;
  sequence: number;
  issuedAt: number;
  resolve: (response: HeosResponse) => void;
  reject: (error: Error) => void;
  /** Writes the command; deferred while another command holds the key. */
  start: () => void;
  timer?: ReturnType<typeof setTimeout>;
}

export interface SubmitOptions {
  timeoutMs?: number;
}

export interface CorrelatorOptions {
  send: (line: string) => Promise<void>;
  timeoutMs?: number;
  logger?: HeosLogger;
  now?: () => number;
}

function commandTarget(command: HeosCommand): CommandTarget | null {
  for (const attribute of TARGET_ATTRIBUTES) {
    const value = command.attributes[attribute];
    if (value !== undefined) return { attribute, value: String(value) };
  }
  return null;
}

/** Identity used to serialise commands: the command path plus its player or group target. */
export function correlationKey(command: HeosCommand): string {
  const target = commandTarget(command);
  const path = commandPath(command);
  return target ? `${path}:${target.attribute}=${target.value}` : path;
}

/**
 * Matches responses to outstanding commands.
 *
 * Commands sharing a correlation key are queued: the next one is written only after the
 * previous one settled. Commands with different keys may be outstanding together.
 */
export class CommandCorrelator {
  private readonly send: (line: string) => Promise<void>;
  private readonly defaultTimeoutMs: number;
  private readonly log: HeosLogger;
  private readonly now: () => number;
  private readonly inflight = new Map<string, PendingCommand>();
  private readonly queued = new Map<string, PendingCommand[]>();
  private sequence = 0;

  constructor(options: CorrelatorOptions) {
    this.send = options.send;
    this.defaultTimeoutMs = options.timeoutMs ?? DEFAULT_TIMINGS.commandTimeoutMs;
    this.log = options.logger ?? noopLogger;
    this.now = options.now ?? Date.now;
  }

  /** Commands written and awaiting a response. */
  get outstanding(): number {
    return this.inflight.size;
  }

  /** Commands waiting behind another command with the same key. */
  get waiting(): number {
    let count = 0;
    for (const list of this.queued.values()) count += list.length;
    return count;
  }

  submit(command: HeosCommand, options: SubmitOptions = {}): Promise<HeosResponse> {
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;
    const key = correlationKey(command);

    return new Promise<HeosResponse>((resolve, reject) => {
      const pending: PendingCommand = {
        key,
        path: commandPath(command),
        target: commandTarget(command),
        sequence: 0,
        issuedAt: 0,
        resolve,
        reject,
        start: () => this.dispatch(command, pending, timeoutMs),
      };

      if (this.inflight.has(key)) {
        const list = this.queued.get(key) ?? [];
        list.push(pending);
        this.queued.set(key, list);
        this.log.debug('command queued behind same key', { key, waiting: list.length });
        return;
      }
      pending.start();
    });
  }

  /**
   * Offer a response. Returns true when it was consumed by an outstanding command
   * (including "command under process" acknowledgements).
   */
  offer(response: HeosResponse | MalformedResponse): boolean {
    const pending = this.match(response.command, response.attributes);
    if (!pending) {
      this.log.debug('discarding unmatched response', { command: response.command, message: response.message });
      return false;
    }

    if (response.kind === 'malformed') {
      this.settle(pending, () => pending.reject(new ProtocolError(`Malformed response to ${pending.path}: ${response.reason}`)));
      return true;
    }

    if (isUnderProcess(response)) {
      this.log.debug('command under process', { command: pending.path, sequence: pending.sequence });
      return true;
    }

    if (response.result === 'fail') {
      const attrs = response.attributes;
      const error = new CommandError(
        pending.path,
        parseInteger(attrs.eid),
        attrs.text ?? 'Unknown error',
        parseInteger(attrs.syserrno),
      );
      this.settle(pending, () => pending.reject(error));
    } else {
      this.settle(pending, () => pending.resolve(response));
    }
    return true;
  }

  /** Reject every outstanding and queued command. */
  failAll(error: Error = new DisconnectedError()): void {
    const all: PendingCommand[] = [...this.inflight.values()];
    for (const list of this.queued.values()) all.push(...list);
    this.inflight.clear();
    this.queued.clear();
    for (const pending of all) {
      if (pending.timer) clearTimeout(pending.timer);
      pending.reject(error);
    }
    if (all.length > 0) {
      this.log.debug('rejected outstanding commands', { count: all.length, error: error.message });
    }
  }

  private dispatch(command: HeosCommand, pending: PendingCommand, timeoutMs: number): void {
    this.sequence += 1;
    pending.sequence = this.sequence;
    pending.issuedAt = this.now();
    this.inflight.set(pending.key, pending);

    pending.timer = setTimeout(() => {
      if (this.inflight.get(pending.key) !== pending) return;
      this.log.warn('command timed out', { command: pending.path, timeoutMs });
      this.settle(pending, () => pending.reject(new CommandTimeoutError(pending.path, timeoutMs)));
    }, timeoutMs);

    const line = encodeCommand(command, pending.sequence);
    this.log.debug('sending command', { line: redact(line) });
    this.send(line).catch((err: unknown) => {
      if (this.inflight.get(pending.key) !== pending) return;
      const error = err instanceof Error ? err : new Error(String(err));
      this.settle(pending, () => pending.reject(new DisconnectedError(`Unable to send ${pending.path}: ${error.message}`, { cause: error })));
    });
  }

  /** Remove the command, run its completion, then start the next command queued on its key. */
  private settle(pending: PendingCommand, complete: () => void): void {
    if (pending.timer) clearTimeout(pending.timer);
    if (this.inflight.get(pending.key) === pending) {
      this.inflight.delete(pending.key);
    }
    complete();

    const list = this.queued.get(pending.key);
    const next = list?.shift();
    if (list && list.length === 0) this.queued.delete(pending.key);
    next?.start();
  }

  private match(path: string, attributes: Readonly<Record<string, string>>): PendingCommand | undefined {
    const sequence = parseInteger(attributes[SEQUENCE_ATTRIBUTE]);
    let best: PendingCommand | undefined;

    for (const pending of this.inflight.values()) {
      if (pending.path !== path) continue;
      if (sequence !== null) {
        if (pending.sequence === sequence) return pending;
        continue;
      }
      const target = pending.target;
      if (target && target.attribute in attributes && attributes[target.attribute] !== target.value) {
        continue;
      }
      if (!best || pending.issuedAt < best.issuedAt || (pending.issuedAt === best.issuedAt && pending.sequence < best.sequence)) {
        best = pending;
      }
    }
    return best;
  }
}

function redact(line: string): string {
  return line.replace(/([?&]pw=)[^&]*/, '$1***');
}
