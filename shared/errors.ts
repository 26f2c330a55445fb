// Errors a command can raise without leaving the session in a partial state.
export class SessionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** A token had the wrong shape where a specific one was required (the duration). */
export class ParseError extends SessionError {}

/** Input parsed fine but does not make sense against the current session. */
export class InputError extends SessionError {}

export class StorageError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'StorageError';
  }
}

export class CalendarUnavailableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CalendarUnavailableError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
