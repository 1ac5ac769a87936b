import { noopLogger, type HeosLogger } from './logger.js';
import type { TransportFactory } from './transport.js';

/** Default HEOS CLI port. */
export const HEOS_PORT = 1255;

export interface Endpoint {
  host: string;
  port?: number;
}

export interface HeosCredentials {
  username: string;
  password: string;
}

/** Tunables shared by the session, correlator, registry sync and command facade. */
export interface HeosTimings {
  /** Time allowed for a command's response (default: 10000) */
  commandTimeoutMs: number;
  /** Time allowed for the TCP connection to open (default: 10000) */
  connectTimeoutMs: number;
  /** Interval between keep-alive commands (default: 30000) */
  heartbeatIntervalMs: number;
  /** Consecutive heartbeat failures that force a reconnect (default: 2) */
  heartbeatFailureThreshold: number;
  /** First reconnect delay, doubled on every failed attempt (default: 1000) */
  reconnectDelayMs: number;
  /** Upper bound of the reconnect delay (default: 30000) */
  maxReconnectDelayMs: number;
  /** Delay before retrying a failed registry refresh (default: 5000) */
  refreshRetryDelayMs: number;
  /** Time to wait for a group update after a grouping command (default: 3000) */
  groupGracePeriodMs: number;
  /** Longest inbound line accepted before the connection is dropped (default: 4 MiB) */
  maxLineLength: number;
  /** Events buffered per subscriber before the oldest is dropped (default: 256) */
  subscriberQueueSize: number;
}

export interface HeosOptions extends Partial<HeosTimings> {
  logger?: HeosLogger;
  transportFactory?: TransportFactory;
}

export interface ResolvedOptions extends HeosTimings {
  logger: HeosLogger;
  transportFactory?: TransportFactory;
}

export const DEFAULT_TIMINGS: HeosTimings = {
  commandTimeoutMs: 10_000,
  connectTimeoutMs: 10_000,
  heartbeatIntervalMs: 30_000,
  heartbeatFailureThreshold: 2,
  reconnectDelayMs: 1_000,
  maxReconnectDelayMs: 30_000,
  refreshRetryDelayMs: 5_000,
  groupGracePeriodMs: 3_000,
  maxLineLength: 4 * 1024 * 1024,
  subscriberQueueSize: 256,
};

const TIMING_KEYS: ReadonlyArray<keyof HeosTimings> = [
  'commandTimeoutMs',
  'connectTimeoutMs',
  'heartbeatIntervalMs',
  'heartbeatFailureThreshold',
  'reconnectDelayMs',
  'maxReconnectDelayMs',
  'refreshRetryDelayMs',
  'groupGracePeriodMs',
  'maxLineLength',
  'subscriberQueueSize',
];

export function resolveOptions(options: HeosOptions = {}): ResolvedOptions {
  const timings: HeosTimings = { ...DEFAULT_TIMINGS };
  for (const key of TIMING_KEYS) {
    const value = options[key];
    if (value === undefined) continue;
    if (!Number.isFinite(value) || value <= 0) {
      throw new RangeError(`${key} must be a positive number, got ${value}`);
    }
    timings[key] = value;
  }
  if (timings.maxReconnectDelayMs < timings.reconnectDelayMs) {
    throw new RangeError('maxReconnectDelayMs must not be lower than reconnectDelayMs');
  }
  return {
    ...timings,
    logger: options.logger ?? noopLogger,
    transportFactory: options.transportFactory,
  };
}

/** Exponential reconnect delay for a zero-based attempt number. */
export function backoffDelay(attempt: number, timings: Pick<HeosTimings, 'reconnectDelayMs' | 'maxReconnectDelayMs'>): number {
  const delay = timings.reconnectDelayMs * 2 ** Math.min(attempt, 30);
  return Math.min(delay, timings.maxReconnectDelayMs);
}
