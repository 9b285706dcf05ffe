/**
 * Typed error catalog for index, query and session failures.
 *
 * Extraction-level problems (unreadable files, malformed headers) never reach
 * this catalog: the scanner absorbs them as `ScanIssue` records. Everything
 * here is surfaced to the caller, and the CLI maps `exitCode` directly.
 */

export const EXIT_OK = 0;
export const EXIT_NOT_FOUND = 1;
export const EXIT_FAILURE = 2;

export class IndexError extends Error {
  constructor(
    public readonly exitCode: number,
    public readonly errorCode: string,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
  }

  toJSON(): Record<string, unknown> {
    return {
      error: {
        errorCode: this.errorCode,
        message: this.message,
        ...(this.details !== undefined && { details: this.details }),
      },
    };
  }
}

// Exit 1: nothing to show

export class IndexNotFoundError extends IndexError {
  constructor(details?: Record<string, unknown>) {
    super(EXIT_NOT_FOUND, 'INDEX_NOT_FOUND', 'Index not found. Run: scriptdex build', details);
  }
}

export class NoMatchesError extends IndexError {
  constructor(details?: Record<string, unknown>) {
    super(EXIT_NOT_FOUND, 'NO_MATCHES', 'No matches found', details);
  }
}

export class SessionNotFoundError extends IndexError {
  constructor(details?: Record<string, unknown>) {
    super(EXIT_NOT_FOUND, 'SESSION_NOT_FOUND', 'Session not found', details);
  }
}

// Exit 2: hard failures

export class InvalidSessionNameError extends IndexError {
  constructor(details?: Record<string, unknown>) {
    super(EXIT_FAILURE, 'INVALID_SESSION_NAME', 'Invalid session name', details);
  }
}

export class PersistenceFailureError extends IndexError {
  constructor(details?: Record<string, unknown>) {
    super(EXIT_FAILURE, 'PERSISTENCE_FAILURE', 'Could not write to disk', details);
  }
}

export class ConfigError extends IndexError {
  constructor(details?: Record<string, unknown>) {
    super(EXIT_FAILURE, 'CONFIG_ERROR', 'Invalid configuration', details);
  }
}
