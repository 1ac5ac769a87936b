export { HeosSystem } from './heos.js';
export { SessionManager, SessionState } from './session.js';
export { Registry, canonicalJson } from './registry.js';
export { RegistrySync } from './refresh.js';
export { CommandFacade } from './facade.js';
export { CommandCorrelator, correlationKey } from './correlator.js';
export { EventDemultiplexer } from './demultiplexer.js';
export { LineTransport } from './transport.js';
export { scan, DiscoveredDevice, parseHeosTxt } from './discovery.js';
export { createConsoleLogger, noopLogger } from './logger.js';
export { resolveOptions, DEFAULT_TIMINGS, HEOS_PORT } from './options.js';
export { Commands, AddCriteria } from './protocol/commands.js';
export { encodeCommand, decodeMessage } from './protocol/messages.js';
export { decodeEvent, EVENT_TYPES } from './protocol/events.js';
export { SourceId } from './media.js';
export { describePlayer } from './player.js';
export {
  HeosError,
  HeosErrorId,
  ConnectError,
  AuthError,
  ProtocolError,
  SendError,
  DisconnectedError,
  CommandTimeoutError,
  CommandError,
  RefreshError,
  InvalidGroupError,
} from './errors.js';
export type { Transport, TransportFactory } from './transport.js';
export type { HeosLogger, LogLevel } from './logger.js';
export type { Endpoint, HeosCredentials, HeosOptions, HeosTimings } from './options.js';
export type { HeosEvent, HeosEventType, EventOf } from './protocol/events.js';
export type { HeosCommand, HeosResponse } from './protocol/messages.js';
export type { PlayState, RepeatMode } from './protocol/commands.js';
export type { Player, Group, NowPlayingMedia } from './player.js';
export type { MusicSource, MediaItem, BrowseResult } from './media.js';
export type { RegistryDiff, RegistrySnapshot, RegistryChange } from './registry.js';
export type { PlaybackCommand, VolumeTarget, PlayMode, AccountStatus } from './facade.js';
export type { EventCallback, Unsubscribe } from './demultiplexer.js';
export type { ScanOptions } from './discovery.js';
