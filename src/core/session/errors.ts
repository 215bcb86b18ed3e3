export class SessionNotStartedError extends Error {
  constructor(operation: string) {
    super(`Chat session not started (${operation})`);
    this.name = 'SessionNotStartedError';
  }
}

export class SessionClosedError extends Error {
  constructor() {
    super('Chat session was closed; create a new session instead');
    this.name = 'SessionClosedError';
  }
}

export class SessionAlreadyStartedError extends Error {
  constructor() {
    super('Chat session already started. Call close() first.');
    this.name = 'SessionAlreadyStartedError';
  }
}

export class SessionWriteError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'SessionWriteError';
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
