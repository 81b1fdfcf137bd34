export class HeraldError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Network failure talking to the calendar, Discord or the translation backend. */
export class TransportError extends HeraldError {}

export class FetchError extends TransportError {
  constructor(
    readonly sourceId: string,
    options?: { cause?: unknown },
  ) {
    super(`Failed to fetch events for calendar ${sourceId}`, options);
  }
}

export class PermissionError extends HeraldError {
  constructor(
    readonly channelId: string,
    options?: { cause?: unknown },
  ) {
    super(`Missing permission in channel ${channelId}`, options);
  }
}

export class MissingDestinationError extends HeraldError {
  constructor(
    readonly target: string,
    options?: { cause?: unknown },
  ) {
    super(`Destination ${target} does not exist or is not bound`, options);
  }
}

export class ConfigurationError extends HeraldError {}

export class StateCorruptionError extends HeraldError {
  constructor(
    readonly file: string,
    options?: { cause?: unknown },
  ) {
    super(`Persisted state at ${file} is malformed; starting empty`, options);
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? `${err.name}: ${err.message}` : String(err);
}
