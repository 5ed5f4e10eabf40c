/**
 * Error taxonomy for a conversion run.
 *
 * Every fatal condition is a {@link Doc2MdError}; heuristic uncertainty is not
 * an error and travels as a `Caveat` instead.
 */

export type Doc2MdErrorCode = 'PARSE_ERROR' | 'IO_ERROR' | 'CONFIG_ERROR';

export abstract class Doc2MdError extends Error {
  abstract readonly code: Doc2MdErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The input could not be turned into a document tree. */
export class ParseError extends Doc2MdError {
  readonly code = 'PARSE_ERROR';

  constructor(
    readonly path: string,
    reason: string,
    options?: { cause?: unknown }
  ) {
    super(`Failed to parse HTML at ${path}: ${reason}`, options);
  }
}

export type IOOperation = 'read' | 'write';

/** The input could not be read or the output could not be written. */
export class IOError extends Doc2MdError {
  readonly code = 'IO_ERROR';

  constructor(
    readonly path: string,
    readonly operation: IOOperation,
    cause: unknown
  ) {
    super(`Failed to ${operation} ${path}: ${describeCause(cause)}`, { cause });
  }
}

/** A configuration file, environment variable or flag holds an invalid value. */
export class ConfigError extends Doc2MdError {
  readonly code = 'CONFIG_ERROR';
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
