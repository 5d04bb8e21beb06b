/**
 * Comparison Commands
 *
 * Runs the reconciliation for one incident subset and writes the three
 * output documents.
 *
 * Usage:
 *   precip-reconcile run-comparison         # incidents with a non-zero value
 *   precip-reconcile run-zero-comparison    # incidents with a zero value
 *
 * @module cli/commands/compare
 */

import type { Command } from 'commander';
import type { FetchFn } from '../../acquisition/artifact-fetcher.js';
import { parseSourceTimestamp } from '../../alignment/timestamp.js';
import {
  runComparison,
  type ComparisonResult,
  type ComparisonSettings,
} from '../../comparison/orchestrator.js';
import { writeComparisonOutputs, type OutputFileNames } from '../../comparison/output.js';
import type { ValuePredicate } from '../../core/types.js';
import type { IncidentSource } from '../../incidents/incident-source.js';
import type { SleepFn } from '../../resilience/types.js';
import { resolvePath, type CLIConfig } from '../lib/config.js';
import { printLine, type ContextProvider, type LinePrinter } from '../lib/context.js';
import { EXIT_CODES, type ExitCode } from '../lib/exit-codes.js';
import { createPostgresStore, type IncidentStoreFactory } from '../lib/incident-source-factory.js';

export interface ComparisonCommandDeps {
  /** Called once the run settings are valid; the run closes what it returns */
  readonly openIncidentSource: () => IncidentSource;
  readonly fetchImpl?: FetchFn;
  readonly sleep?: SleepFn;
  readonly print?: LinePrinter;
}

export interface ComparisonCommandResult {
  readonly exitCode: ExitCode;
  readonly result: ComparisonResult;
  readonly outputs: OutputFileNames | null;
}

export function comparisonSettings(config: CLIConfig, predicate: ValuePredicate): ComparisonSettings {
  return {
    predicate,
    limit: config.incidents.limit,
    concurrency: config.fetch.concurrency,
    retry: { maxRetries: config.fetch.maxRetries, backoffSeconds: config.fetch.backoffSeconds },
    requestTimeoutMs: config.fetch.requestTimeoutMs,
    downloadTimeoutMs: config.fetch.downloadTimeoutMs,
    netcdf: config.sources.netcdf,
    grib2: config.sources.grib2,
    gribDirectory: resolvePath(config, 'gribDir'),
    sampleEpochMs: parseSourceTimestamp(config.grid.sampleTimestamp),
  };
}

export async function executeComparison(
  config: CLIConfig,
  predicate: ValuePredicate,
  deps: ComparisonCommandDeps
): Promise<ComparisonCommandResult> {
  const print = deps.print ?? printLine;
  const settings = comparisonSettings(config, predicate);
  const result = await runComparison(settings, {
    incidentSource: deps.openIncidentSource(),
    fetchImpl: deps.fetchImpl,
    sleep: deps.sleep,
  });

  if (result.status === 'no-incidents') {
    print(
      config.json
        ? JSON.stringify({ status: result.status, predicate }, null, 2)
        : `No ${predicate} incidents found; nothing written.`
    );
    return { exitCode: EXIT_CODES.SUCCESS, result, outputs: null };
  }

  const outputs = await writeComparisonOutputs(result, resolvePath(config, 'outputDir'), predicate);

  if (config.json) {
    print(
      JSON.stringify(
        {
          status: result.status,
          predicate,
          records: result.records.length,
          buckets: result.buckets,
          skippedIncidents: result.skippedIncidents,
          diagnostics: result.diagnostics,
          outputs,
        },
        null,
        2
      )
    );
  } else {
    print(`Merged ${result.records.length} records across ${result.buckets.length} time buckets.`);
    print(`  incidents: ${outputs.incidents}`);
    print(`  grib2 metadata: ${outputs.grib2}`);
    print(`  netcdf metadata: ${outputs.netcdf}`);
  }

  return { exitCode: EXIT_CODES.SUCCESS, result, outputs };
}

export function registerComparisonCommands(
  program: Command,
  context: ContextProvider,
  createStore: IncidentStoreFactory = createPostgresStore
): void {
  const register = (name: string, description: string, predicate: ValuePredicate): void => {
    program
      .command(name)
      .description(description)
      .action(async () => {
        const { config } = context();
        const { exitCode } = await executeComparison(config, predicate, {
          openIncidentSource: () => createStore(config),
        });
        process.exitCode = exitCode;
      });
  };

  register('run-comparison', 'Compare sources for incidents with a non-zero value', 'non-zero');
  register('run-zero-comparison', 'Compare sources for incidents with a zero value', 'zero');
}
