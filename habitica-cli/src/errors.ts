export type ErrorCode =
  | 'config_error'
  | 'usage_error'
  | 'parse_error'
  | 'index_error'
  | 'unexpected_shape'
  | 'invariant_violation'
  | 'api_error';

export class HabiticaCliError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConfigError extends HabiticaCliError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('config_error', message, options);
  }
}

export class UsageError extends HabiticaCliError {
  constructor(message: string) {
    super('usage_error', message);
  }
}

/** Malformed task-id expression. */
export class ParseError extends HabiticaCliError {
  readonly input: string;

  constructor(input: string, reason: string) {
    super('parse_error', `Invalid task id "${input}": ${reason}`);
    this.input = input;
  }
}

export class TaskIndexError extends HabiticaCliError {
  readonly index: number;
  readonly length: number;

  constructor(index: number, length: number) {
    super('index_error', `Index ${index} is out of range for a list of ${length}`);
    this.index = index;
    this.length = length;
  }
}

/** A response was missing a field the command relies on. */
export class UnexpectedShapeError extends HabiticaCliError {
  readonly path: string;

  constructor(path: string, detail?: string) {
    super('unexpected_shape', `Unexpected response shape at ${path}${detail ? `: ${detail}` : ''}`);
    this.path = path;
  }
}

/** The server state after a batch update does not match what the update should have done. */
export class InvariantError extends HabiticaCliError {
  constructor(message: string) {
    super('invariant_violation', message);
  }
}

export class ApiError extends HabiticaCliError {
  readonly status: number;
  readonly serverCode: string;

  constructor(status: number, serverCode: string, message: string, options?: { cause?: unknown }) {
    super('api_error', message, options);
    this.status = status;
    this.serverCode = serverCode;
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
