export class AgentReplayError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: Error,
  ) {
    super(message);
    this.name = 'AgentReplayError';
  }
}

export class ConfigError extends AgentReplayError {
  constructor(message: string, cause?: Error) {
    super(message, 'CONFIG_ERROR', cause);
    this.name = 'ConfigError';
  }
}

/** A persisted trace that cannot be read: bad JSON or missing identifying fields. */
export class FormatError extends AgentReplayError {
  constructor(
    message: string,
    public readonly line?: number,
    cause?: Error,
  ) {
    super(line === undefined ? message : `${message} (line ${line})`, 'FORMAT_ERROR', cause);
    this.name = 'FormatError';
  }
}

export class ReplayRangeError extends AgentReplayError {
  constructor(
    public readonly target: number,
    public readonly totalSteps: number,
  ) {
    super(
      `Replay position ${target} is out of range (0-${Math.max(totalSteps - 1, 0)} of ${totalSteps} steps)`,
      'RANGE_ERROR',
    );
    this.name = 'ReplayRangeError';
  }
}

export class NotFoundError extends AgentReplayError {
  constructor(
    public readonly resource: 'trace' | 'span',
    public readonly ref: string,
  ) {
    super(`${resource === 'trace' ? 'Trace file' : 'Span'} not found: ${ref}`, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
