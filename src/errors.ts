export type ErrorCode =
  | "PARSE_FAILED"
  | "MALFORMED_TREE"
  | "INVALID_CONFIGURATION"
  | "DEADLOCK"
  | "STORE_FAILED";

/** Base class for every error raised by the scheduler library. */
export class SchedulerError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export type SourceLocation = {
  /** 1-based line number in the edge-list source */
  line?: number;
  token?: string;
};

function withLocation(message: string, loc?: SourceLocation): string {
  if (loc?.line === undefined) return message;
  return `line ${loc.line}: ${message}`;
}

/** A token, edge or directive in the edge-list source could not be read. */
export class ParseError extends SchedulerError {
  readonly line?: number;
  readonly token?: string;

  constructor(message: string, loc?: SourceLocation) {
    super("PARSE_FAILED", withLocation(message, loc));
    this.line = loc?.line;
    this.token = loc?.token;
  }
}

/** The edges do not describe a single rooted out-tree. */
export class MalformedTreeError extends SchedulerError {
  readonly line?: number;
  readonly token?: string;

  constructor(message: string, loc?: SourceLocation) {
    super("MALFORMED_TREE", withLocation(message, loc));
    this.line = loc?.line;
    this.token = loc?.token;
  }
}

export class InvalidConfigurationError extends SchedulerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("INVALID_CONFIGURATION", message, options);
  }
}

/** The simulation stopped with tasks that never became ready. */
export class DeadlockError extends SchedulerError {
  readonly pending: string[];

  constructor(message: string, pending: string[]) {
    super("DEADLOCK", message);
    this.pending = pending;
  }
}

export class StoreError extends SchedulerError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("STORE_FAILED", message, options);
  }
}

export function isSchedulerError(err: unknown): err is SchedulerError {
  return err instanceof SchedulerError;
}
