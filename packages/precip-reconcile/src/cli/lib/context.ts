/**
 * Per-invocation state shared between the entry point and commands
 */

import type { CLIConfig } from './config.js';

export interface GlobalContext {
  readonly config: CLIConfig;
  readonly startTime: number;
}

export type ContextProvider = () => GlobalContext;

/** Writes one line of command output to stdout */
export type LinePrinter = (line: string) => void;

export const printLine: LinePrinter = (line) => {
  console.log(line);
};
