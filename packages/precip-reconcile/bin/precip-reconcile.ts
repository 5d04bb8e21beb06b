#!/usr/bin/env tsx
/**
 * precip-reconcile CLI Entry Point
 *
 * Matches incident records against the GRIB2 and NetCDF precipitation
 * grids and writes the merged results.
 *
 * @module precip-reconcile-cli
 */

import { Command, InvalidArgumentError } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

import { registerComparisonCommands } from '../src/cli/commands/compare.js';
import { registerInspectDbCommand } from '../src/cli/commands/inspect-db.js';
import { loadConfig, loadEnvFile, validateConfig } from '../src/cli/lib/config.js';
import type { GlobalContext } from '../src/cli/lib/context.js';
import { EXIT_CODES, exitCodeForError } from '../src/cli/lib/exit-codes.js';
import { configureLogger, errorMessage, logger } from '../src/core/utils/logger.js';

// ============================================================================
// Global State
// ============================================================================

let globalContext: GlobalContext | null = null;

function getGlobalContext(): GlobalContext {
  if (!globalContext) {
    throw new Error('Global context not initialized. Call initializeContext first.');
  }
  return globalContext;
}

// ============================================================================
// CLI Setup
// ============================================================================

const packageJsonSchema = z.object({ version: z.string() });

function getVersion(): string {
  const __dirname = dirname(fileURLToPath(import.meta.url));
  const packageJsonPath = join(__dirname, '..', 'package.json');
  try {
    const parsed = packageJsonSchema.safeParse(JSON.parse(readFileSync(packageJsonPath, 'utf-8')));
    return parsed.success ? parsed.data.version : '0.0.0';
  } catch {
    return '0.0.0';
  }
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

interface GlobalOptions {
  verbose?: boolean;
  json?: boolean;
  config?: string;
  concurrency?: number;
}

async function initializeContext(options: GlobalOptions): Promise<GlobalContext> {
  const startTime = Date.now();

  loadEnvFile();
  const config = await loadConfig({
    configPath: options.config,
    overrides: {
      verbose: options.verbose,
      json: options.json,
      concurrency: options.concurrency,
    },
  });
  validateConfig(config);

  configureLogger({ level: config.verbose ? 'debug' : undefined, json: config.json });

  globalContext = { config, startTime };
  return globalContext;
}

function createProgram(): Command {
  const program = new Command();

  program
    .name('precip-reconcile')
    .description('Reconcile GRIB2 and NetCDF precipitation grids against incident records')
    .version(getVersion(), '-V, --version', 'Output the version number')
    .option('-v, --verbose', 'Enable verbose output')
    .option('--json', 'Output as JSON (machine-readable)')
    .option('--config <path>', 'Path to config file (default: .precip-reconcilerc)')
    .option('--concurrency <n>', 'Concurrent downloads across both sources', parsePositiveInt)
    .hook('preAction', async (thisCommand) => {
      const options: GlobalOptions = thisCommand.opts();
      try {
        await initializeContext(options);
      } catch (error) {
        console.error(`Configuration error: ${errorMessage(error)}`);
        process.exit(EXIT_CODES.CONFIG_ERROR);
      }
    });

  registerInspectDbCommand(program, getGlobalContext);
  registerComparisonCommands(program, getGlobalContext);

  program.on('command:*', (operands: string[]) => {
    console.error(`Unknown command: ${operands[0] ?? ''}`);
    program.outputHelp({ error: true });
    process.exit(EXIT_CODES.UNKNOWN_COMMAND);
  });

  return program;
}

// ============================================================================
// Main Entry Point
// ============================================================================

async function main(): Promise<void> {
  const program = createProgram();

  try {
    await program.parseAsync(process.argv);
  } catch (error) {
    if (globalContext) {
      logger.error('Command failed', {
        error: errorMessage(error),
        duration_ms: Date.now() - globalContext.startTime,
      });
    } else {
      console.error(`Error: ${errorMessage(error)}`);
    }
    process.exit(exitCodeForError(error));
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(EXIT_CODES.ERRORS);
});
