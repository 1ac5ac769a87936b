/** Error ids reported by HEOS devices in the `eid` attribute of a failed response. */
export enum HeosErrorId {
  UnrecognizedCommand = 1,
  InvalidId = 2,
  WrongArgumentCount = 3,
  DataNotAvailable = 4,
  ResourceNotAvailable = 5,
  InvalidCredentials = 6,
  CommandNotExecuted = 7,
  UserNotLoggedIn = 8,
  ParameterOutOfRange = 9,
  UserNotFound = 10,
  InternalError = 11,
  SystemError = 12,
  ProcessingPreviousCommand = 13,
  MediaCannotBePlayed = 14,
  OptionNotSupported = 15,
}

export class HeosError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The endpoint could not be reached. Retried by the session manager. */
export class ConnectError extends HeosError {}

/** Credentials were rejected. Never retried automatically. */
export class AuthError extends HeosError {}

/** A malformed or oversized message was received. */
export class ProtocolError extends HeosError {}

/** A write was attempted on a transport that is not connected. */
export class SendError extends HeosError {}

/** The connection closed while a command was outstanding or queued. */
export class DisconnectedError extends HeosError {
  constructor(message = 'Connection closed', options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class CommandTimeoutError extends HeosError {
  constructor(
    readonly command: string,
    readonly timeoutMs: number,
  ) {
    super(`Command timed out after ${timeoutMs}ms: ${command}`);
  }
}

/** The device rejected a command. */
export class CommandError extends HeosError {
  constructor(
    readonly command: string,
    readonly errorId: HeosErrorId | null,
    readonly text: string,
    readonly systemErrorNumber: number | null = null,
  ) {
    super(`${command} failed: ${text}${errorId === null ? '' : ` (eid=${errorId})`}`);
  }
}

export class RefreshError extends HeosError {}

export class InvalidGroupError extends HeosError {}
