/**
 * Comparison Command Tests
 *
 * Validates settings derived from configuration and the command output
 * for empty and completed runs.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { comparisonSettings, executeComparison } from '../../../cli/commands/compare.js';
import { DEFAULT_CONFIG, type CLIConfig } from '../../../cli/lib/config.js';
import { EXIT_CODES } from '../../../cli/lib/exit-codes.js';
import { TimestampError } from '../../../core/errors.js';
import { parseIncidentRows, type IncidentSource } from '../../../incidents/incident-source.js';
import { buildGrib2Archive } from '../../fixtures/grib2-builder.js';
import { buildGridNetcdf } from '../../fixtures/netcdf-builder.js';

function memorySource(rows: readonly Record<string, unknown>[]): IncidentSource {
  return {
    async fetchIncidents() {
      return parseIncidentRows(rows);
    },
    async close() {},
  };
}

function testConfig(dir: string, json = false): CLIConfig {
  return {
    ...DEFAULT_CONFIG,
    paths: { gribDir: join(dir, 'grib'), outputDir: join(dir, 'out') },
    fetch: { ...DEFAULT_CONFIG.fetch, maxRetries: 0, backoffSeconds: 0 },
    sources: {
      netcdf: { baseUrl: 'https://netcdf.test/raster2netcdf', productCode: 'mrms_a2m' },
      grib2: { ...DEFAULT_CONFIG.sources.grib2, bucketUrl: 'https://grib.test' },
    },
    verbose: false,
    json,
    configPath: null,
  };
}

describe('comparisonSettings', () => {
  it('should derive run settings from configuration', () => {
    const config: CLIConfig = {
      ...DEFAULT_CONFIG,
      verbose: false,
      json: false,
      configPath: '/srv/app/.precip-reconcilerc',
    };

    const settings = comparisonSettings(config, 'zero');

    expect(settings).toEqual({
      predicate: 'zero',
      limit: 400,
      concurrency: 20,
      retry: { maxRetries: 5, backoffSeconds: 60 },
      requestTimeoutMs: 60000,
      downloadTimeoutMs: 120000,
      netcdf: DEFAULT_CONFIG.sources.netcdf,
      grib2: DEFAULT_CONFIG.sources.grib2,
      gribDirectory: '/srv/app/data/grib2',
      sampleEpochMs: Date.UTC(2024, 5, 1, 12, 0, 0),
    });
  });
});

describe('executeComparison', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'precip-cmd-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should not open the incident source when the run settings are invalid', async () => {
    const openIncidentSource = vi.fn(() => memorySource([]));
    const config: CLIConfig = { ...testConfig(dir), grid: { sampleTimestamp: 'soon' } };

    await expect(executeComparison(config, 'zero', { openIncidentSource })).rejects.toThrow(
      TimestampError
    );
    expect(openIncidentSource).not.toHaveBeenCalled();
  });

  it('should report an empty subset without writing outputs', async () => {
    const lines: string[] = [];

    const outcome = await executeComparison(testConfig(dir), 'zero', {
      openIncidentSource: () => memorySource([]),
      print: (l) => lines.push(l),
    });

    expect(outcome.exitCode).toBe(EXIT_CODES.SUCCESS);
    expect(outcome.outputs).toBeNull();
    expect(lines).toEqual(['No zero incidents found; nothing written.']);
  });

  it('should report an empty subset as JSON', async () => {
    const lines: string[] = [];

    await executeComparison(testConfig(dir, true), 'non-zero', {
      openIncidentSource: () => memorySource([]),
      print: (l) => lines.push(l),
    });

    expect(lines).toEqual([JSON.stringify({ status: 'no-incidents', predicate: 'non-zero' }, null, 2)]);
  });

  it('should write outputs and summarize a completed run', async () => {
    const grib = buildGrib2Archive({ Ni: 2, Nj: 1, La1: 40, Lo1: 260, Di: 1, Dj: 1, values: [12, 24] });
    const netcdf = buildGridNetcdf({ lat: [40], lon: [-100, -99], values: [0.5, 1] });
    const fetchImpl = async (url: string): Promise<Response> => {
      if (url.startsWith('https://grib.test/') && url.endsWith('20240601-120000.grib2.gz')) {
        return new Response(new Uint8Array(grib));
      }
      if (url.startsWith('https://netcdf.test/')) {
        return new Response(new Uint8Array(netcdf));
      }
      return new Response(null, { status: 404 });
    };
    const lines: string[] = [];

    const outcome = await executeComparison(testConfig(dir), 'non-zero', {
      openIncidentSource: () =>
        memorySource([
          {
            incident_id: 'A',
            incident_lat: 40,
            incident_lon: -99.1,
            mrms_timestamp: '2024-06-01 12:01:00',
            data_value: 0.75,
          },
        ]),
      fetchImpl,
      sleep: async () => undefined,
      print: (l) => lines.push(l),
    });

    const incidentsPath = join(dir, 'out', 'value_not_zero.json');
    expect(outcome.exitCode).toBe(EXIT_CODES.SUCCESS);
    expect(lines).toEqual([
      'Merged 1 records across 1 time buckets.',
      `  incidents: ${incidentsPath}`,
      `  grib2 metadata: ${join(dir, 'out', 'grib2_file_format.json')}`,
      `  netcdf metadata: ${join(dir, 'out', 'netcdf_file_format.json')}`,
    ]);

    const written: unknown = JSON.parse(await readFile(incidentsPath, 'utf-8'));
    expect(written).toMatchObject([
      {
        incident_id: 'A',
        netcdf_precip_mm: 1,
        grib2_precip_raw_value_mm_hr: 24,
        db_netcdf_precip_mm: 0.75,
      },
    ]);
  });
});
