export type SupervisorErrorCode =
  | "ARTIFACT_NOT_FOUND"
  | "CHANNEL_UNAVAILABLE"
  | "CHANNEL_CLOSED"
  | "COMMAND_TIMEOUT"
  | "CONFIG_INVALID";

export abstract class SupervisorError extends Error {
  abstract readonly code: SupervisorErrorCode;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

/** The launch artifact pattern matched no file in the server directory. Fatal to start, never retried. */
export class ArtifactNotFoundError extends SupervisorError {
  readonly code = "ARTIFACT_NOT_FOUND";
  constructor(
    readonly pattern: string,
    readonly directory: string,
  ) {
    super(`Unable to find a file in ${directory} matching the pattern: ${pattern}`);
  }
}

export class ChannelUnavailableError extends SupervisorError {
  readonly code = "CHANNEL_UNAVAILABLE";
  constructor(message = "Server console is not connected") {
    super(message);
  }
}

export class ChannelClosedError extends SupervisorError {
  readonly code = "CHANNEL_CLOSED";
  constructor(message = "Server console has closed") {
    super(message);
  }
}

export class CommandTimeoutError extends SupervisorError {
  readonly code = "COMMAND_TIMEOUT";
  constructor(
    readonly command: string,
    readonly timeoutMs: number,
  ) {
    super(`No console response to "${command}" within ${timeoutMs}ms`);
  }
}

export class ConfigError extends SupervisorError {
  readonly code = "CONFIG_INVALID";
  constructor(
    message: string,
    readonly file?: string,
  ) {
    super(file ? `${file}: ${message}` : message);
  }
}
