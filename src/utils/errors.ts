export class BridgeError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'BridgeError';
  }
}

export class SpawnError extends BridgeError {
  constructor(command: string, message: string, cause?: Error) {
    super(
      `Failed to spawn ${command}: ${message}`,
      'SPAWN_FAILED',
      { command, cause: cause?.message }
    );
    this.name = 'SpawnError';
  }
}

export class CommandNotFoundError extends BridgeError {
  constructor(command: string) {
    super(
      `Command not found: ${command}`,
      'COMMAND_NOT_FOUND',
      { command }
    );
    this.name = 'CommandNotFoundError';
  }
}

export class StreamClosedError extends BridgeError {
  constructor(sessionId: string) {
    super(
      'Process input stream is closed',
      'STREAM_CLOSED',
      { sessionId }
    );
    this.name = 'StreamClosedError';
  }
}

export class TerminationTimeoutError extends BridgeError {
  constructor(sessionId: string, pid: number | null, graceMs: number) {
    super(
      `Process did not exit within ${graceMs}ms of SIGTERM`,
      'TERMINATION_TIMEOUT',
      { sessionId, pid, graceMs }
    );
    this.name = 'TerminationTimeoutError';
  }
}

export class SessionNotFoundError extends BridgeError {
  constructor(sessionId: string) {
    super(
      'Session not found',
      'SESSION_NOT_FOUND',
      { sessionId }
    );
    this.name = 'SessionNotFoundError';
  }
}

export class OverflowTruncationError extends BridgeError {
  constructor(length: number, limit: number) {
    super(
      `Chunk of ${length} characters exceeds the limit of ${limit}`,
      'OVERFLOW_TRUNCATION',
      { length, limit }
    );
    this.name = 'OverflowTruncationError';
  }
}

export class IdSpaceExhaustedError extends BridgeError {
  constructor(attempts: number) {
    super(
      `Could not generate a unique session id after ${attempts} attempts`,
      'ID_SPACE_EXHAUSTED',
      { attempts }
    );
    this.name = 'IdSpaceExhaustedError';
  }
}

export class ConfigError extends BridgeError {
  constructor(public readonly issues: string[]) {
    super(
      `Invalid configuration: ${issues.join('; ')}`,
      'CONFIG_INVALID',
      { issues }
    );
    this.name = 'ConfigError';
  }
}
