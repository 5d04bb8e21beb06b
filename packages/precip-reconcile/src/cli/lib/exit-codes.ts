/**
 * Process exit codes shared by the CLI entry point and its commands
 */

import { ConfigError } from '../../core/errors.js';

export const EXIT_CODES = {
  SUCCESS: 0,
  WARNINGS: 1,
  ERRORS: 2,
  CONFIG_ERROR: 3,
  UNKNOWN_COMMAND: 127,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export function exitCodeForError(error: unknown): ExitCode {
  return error instanceof ConfigError ? EXIT_CODES.CONFIG_ERROR : EXIT_CODES.ERRORS;
}
