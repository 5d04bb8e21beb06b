/**
 * Comparison Output Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, readdir, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { OUTPUT_FILES, writeComparisonOutputs } from '../../../comparison/output.js';
import type { CompletedComparison } from '../../../comparison/orchestrator.js';

const RESULT: CompletedComparison = {
  status: 'completed',
  records: [
    {
      incident_id: 'A-1',
      aligned_utc_timestamp: '2024-06-01T12:00:00+00:00',
      grib2_source_url: 'g',
      netcdf_source_url: 'n',
      db_netcdf_precip_mm: 1,
      db_netcdf_lat: null,
      db_netcdf_lon: null,
    },
  ],
  grib2Metadata: {},
  netcdfMetadata: {},
  buckets: [],
  diagnostics: { throttled: 0, invalidPayload: 0, exhausted: 0, succeeded: 2 },
  skippedIncidents: 0,
};

describe('writeComparisonOutputs', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'precip-output-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should write the three non-zero documents indented by 4', async () => {
    const paths = await writeComparisonOutputs(RESULT, join(dir, 'out'), 'non-zero');

    expect(paths.incidents).toBe(join(dir, 'out', 'value_not_zero.json'));
    expect((await readdir(join(dir, 'out'))).sort()).toEqual([
      'grib2_file_format.json',
      'netcdf_file_format.json',
      'value_not_zero.json',
    ]);
    const text = await readFile(paths.incidents, 'utf-8');
    expect(text.split('\n')[2]).toBe('        "incident_id": "A-1",');
    expect(await readFile(paths.grib2, 'utf-8')).toBe('{}');
  });

  it('should use separate names for the zero-valued run', async () => {
    const paths = await writeComparisonOutputs(RESULT, dir, 'zero');

    expect(paths).toEqual({
      incidents: join(dir, 'incidents_zero_value.json'),
      grib2: join(dir, 'grib2_file_format_zero.json'),
      netcdf: join(dir, 'netcdf_file_format_zero.json'),
    });
  });

  it('should never share a file name between the two runs', () => {
    const nonZero = Object.values(OUTPUT_FILES['non-zero']);
    const zero = Object.values(OUTPUT_FILES.zero);

    expect(nonZero.filter((name) => zero.includes(name))).toEqual([]);
  });
});
