/**
 * Comparison output documents
 *
 * Three JSON files per run, indented by 4, with distinct names for the
 * zero-valued subset so the two runs never overwrite each other.
 */

import { join } from 'node:path';
import type { ValuePredicate } from '../core/types.js';
import { atomicWriteJSON } from '../core/utils/atomic-write.js';
import { createLogger } from '../core/utils/logger.js';
import type { CompletedComparison } from './orchestrator.js';

const log = createLogger({ module: 'output' });

export interface OutputFileNames {
  readonly incidents: string;
  readonly grib2: string;
  readonly netcdf: string;
}

export const OUTPUT_FILES: Readonly<Record<ValuePredicate, OutputFileNames>> = {
  'non-zero': {
    incidents: 'value_not_zero.json',
    grib2: 'grib2_file_format.json',
    netcdf: 'netcdf_file_format.json',
  },
  zero: {
    incidents: 'incidents_zero_value.json',
    grib2: 'grib2_file_format_zero.json',
    netcdf: 'netcdf_file_format_zero.json',
  },
};

export const OUTPUT_INDENT = 4;

export async function writeComparisonOutputs(
  result: CompletedComparison,
  outputDirectory: string,
  predicate: ValuePredicate
): Promise<OutputFileNames> {
  const names = OUTPUT_FILES[predicate];
  const paths: OutputFileNames = {
    incidents: join(outputDirectory, names.incidents),
    grib2: join(outputDirectory, names.grib2),
    netcdf: join(outputDirectory, names.netcdf),
  };

  await atomicWriteJSON(paths.incidents, result.records, OUTPUT_INDENT);
  await atomicWriteJSON(paths.grib2, result.grib2Metadata, OUTPUT_INDENT);
  await atomicWriteJSON(paths.netcdf, result.netcdfMetadata, OUTPUT_INDENT);

  log.info('Wrote comparison outputs', { ...paths });
  return paths;
}
