/**
 * Inspect DB Command
 *
 * Lists the columns of an incident table.
 *
 * Usage:
 *   precip-reconcile inspect-db <table>
 *
 * Exits with WARNINGS when the table has no visible columns.
 *
 * @module cli/commands/inspect-db
 */

import type { Command } from 'commander';
import { createLogger } from '../../core/utils/logger.js';
import type { ColumnInfo } from '../../incidents/incident-source.js';
import { printLine, type ContextProvider, type LinePrinter } from '../lib/context.js';
import { EXIT_CODES, type ExitCode } from '../lib/exit-codes.js';
import {
  createPostgresStore,
  type IncidentStore,
  type IncidentStoreFactory,
} from '../lib/incident-source-factory.js';

const log = createLogger({ module: 'inspect-db' });

export interface InspectDbOptions {
  readonly json: boolean;
  readonly print?: LinePrinter;
}

export function formatColumns(table: string, columns: readonly ColumnInfo[]): string[] {
  return [`Columns in ${table}:`, ...columns.map((c) => `  - "${c.name}"\t${c.dataType}`)];
}

export async function executeInspectDb(
  table: string,
  store: IncidentStore,
  options: InspectDbOptions
): Promise<ExitCode> {
  const print = options.print ?? printLine;
  try {
    const columns = await store.inspectTableSchema(table);

    if (options.json) {
      print(JSON.stringify({ table, columns }, null, 2));
    } else if (columns.length > 0) {
      formatColumns(table, columns).forEach((line) => print(line));
    }

    if (columns.length === 0) {
      log.warn('Table not found or has no visible columns', { table });
      return EXIT_CODES.WARNINGS;
    }
    return EXIT_CODES.SUCCESS;
  } finally {
    await store.close();
  }
}

export function registerInspectDbCommand(
  program: Command,
  context: ContextProvider,
  createStore: IncidentStoreFactory = createPostgresStore
): void {
  program
    .command('inspect-db <table>')
    .description('List the columns of an incident table')
    .action(async (table: string) => {
      const { config } = context();
      process.exitCode = await executeInspectDb(table, createStore(config), { json: config.json });
    });
}
