import { ConfigError, Doc2MdError, IOError, ParseError } from './errors.js';

/**
 * Process exit codes. These are stable: scripts wrapping the CLI rely on them.
 */
export const EXIT_CODES = {
  SUCCESS: 0,           // Markdown written
  CONVERSION_FAILURE: 1, // Input could not be parsed, or an unexpected failure
  INVALID_USAGE: 2,     // Bad flags, configuration file or environment value
  IO_FAILURE: 3         // Input unreadable or output unwritable
} as const;

export type ExitCode = typeof EXIT_CODES[keyof typeof EXIT_CODES];

export interface ExitStatusResult {
  code: ExitCode;
  category: 'success' | 'conversion' | 'usage' | 'io';
  message: string;
}

/**
 * Maps the outcome of a run to the exit status reported to the shell.
 */
export function evaluateExitStatus(error?: unknown): ExitStatusResult {
  if (error === undefined) {
    return { code: EXIT_CODES.SUCCESS, category: 'success', message: 'Conversion completed' };
  }

  if (error instanceof ConfigError) {
    return { code: EXIT_CODES.INVALID_USAGE, category: 'usage', message: error.message };
  }

  if (error instanceof IOError) {
    return { code: EXIT_CODES.IO_FAILURE, category: 'io', message: error.message };
  }

  if (error instanceof ParseError || error instanceof Doc2MdError) {
    return { code: EXIT_CODES.CONVERSION_FAILURE, category: 'conversion', message: error.message };
  }

  const message = error instanceof Error ? error.message : String(error);
  return { code: EXIT_CODES.CONVERSION_FAILURE, category: 'conversion', message: `Unexpected failure: ${message}` };
}

export function exitCodeFor(error?: unknown): ExitCode {
  return evaluateExitStatus(error).code;
}
