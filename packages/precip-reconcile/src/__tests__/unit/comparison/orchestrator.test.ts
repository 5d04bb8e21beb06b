/**
 * Comparison Orchestrator Tests
 *
 * Runs whole comparisons against an in-memory incident source and a fake
 * fetch that serves GRIB2 archives and NetCDF payloads built in-process.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { runComparison, type ComparisonSettings } from '../../../comparison/orchestrator.js';
import { GridUnavailableError } from '../../../core/errors.js';
import {
  parseIncidentRows,
  type IncidentBatch,
  type IncidentQuery,
  type IncidentSource,
} from '../../../incidents/incident-source.js';
import { buildGrib2Archive } from '../../fixtures/grib2-builder.js';
import { buildGridNetcdf } from '../../fixtures/netcdf-builder.js';

class InMemoryIncidentSource implements IncidentSource {
  readonly queries: IncidentQuery[] = [];
  closeCalls = 0;

  constructor(private readonly rows: readonly Record<string, unknown>[]) {}

  async fetchIncidents(query: IncidentQuery): Promise<IncidentBatch> {
    this.queries.push(query);
    return parseIncidentRows(this.rows.slice(0, query.limit));
  }

  async close(): Promise<void> {
    this.closeCalls++;
  }
}

const GRIB_ARCHIVE = buildGrib2Archive({
  Ni: 3,
  Nj: 2,
  La1: 40,
  Lo1: 260,
  Di: 1,
  Dj: 1,
  values: [0, 6, 12, 30, 60, 90],
});

const NETCDF_PAYLOAD = buildGridNetcdf({
  lat: [39, 40],
  lon: [-100, -99, -98],
  values: [1.5, 2.5, 3.5, 4.5, 5.5, 6.5],
});

const GRIB_1200_URL =
  'https://grib.test/CONUS/PrecipRate_00.00/20240601/MRMS_PrecipRate_00.00_20240601-120000.grib2.gz';

function route(url: string): Response {
  if (url === GRIB_1200_URL) {
    return new Response(new Uint8Array(GRIB_ARCHIVE));
  }
  if (url.startsWith('https://netcdf.test/')) {
    const stamp = new URL(url).searchParams.get('dstr');
    if (stamp === '202406011200' || stamp === '202406011204') {
      return new Response(new Uint8Array(NETCDF_PAYLOAD));
    }
    if (stamp === '202406011206') {
      return new Response('<html>Service Unavailable</html>');
    }
  }
  return new Response(null, { status: 404 });
}

function row(id: string, lat: number, lon: number, timestamp: string): Record<string, unknown> {
  return {
    incident_id: id,
    incident_lat: lat,
    incident_lon: lon,
    mrms_timestamp: timestamp,
    data_value: 1.25,
    mrms2_lat: lat,
    mrms2_lon: lon,
  };
}

describe('runComparison', () => {
  let dir: string;
  let settings: ComparisonSettings;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'precip-run-'));
    settings = {
      predicate: 'non-zero',
      limit: 400,
      concurrency: 4,
      retry: { maxRetries: 1, backoffSeconds: 0 },
      requestTimeoutMs: 5000,
      downloadTimeoutMs: 5000,
      netcdf: { baseUrl: 'https://netcdf.test/raster2netcdf', productCode: 'mrms_a2m' },
      grib2: {
        bucketUrl: 'https://grib.test',
        prefix: 'CONUS/PrecipRate_00.00',
        product: 'MRMS_PrecipRate_00.00',
        parameter: { discipline: 209, category: 6, number: 1 },
      },
      gribDirectory: join(dir, 'grib2'),
      sampleEpochMs: Date.UTC(2024, 5, 1, 12, 0, 0),
    };
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('should merge every available source into each incident record', async () => {
    const source = new InMemoryIncidentSource([
      row('A', 40.1, -99.05, '2024-06-01 12:00:30'),
      row('B', 39.0, -98.0, '2024-06-01 12:05:10'),
      row('C', 39.5, -99.5, '2024-06-01 12:07:59'),
      row('D', 39.5, -99.5, 'yesterday'),
    ]);
    const fetchImpl = vi.fn(async (url: string, _init?: RequestInit) => route(url));

    const result = await runComparison(settings, {
      incidentSource: source,
      fetchImpl,
      sleep: async () => undefined,
    });

    expect(result.status).toBe('completed');
    if (result.status !== 'completed') return;

    expect(result.records.map((r) => r.incident_id)).toEqual(['A', 'B', 'C']);
    expect(result.skippedIncidents).toBe(1);

    const [a, b, c] = result.records;
    expect(a.aligned_utc_timestamp).toBe('2024-06-01T12:00:00+00:00');
    expect(a.grib2_source_url).toBe(GRIB_1200_URL);
    expect(a.netcdf_source_url).toBe(
      'https://netcdf.test/raster2netcdf?dstr=202406011200&prod=mrms_a2m'
    );
    expect(a.netcdf_precip_mm).toBe(5.5);
    expect(a.netcdf_nearest_lat).toBe(40);
    expect(a.netcdf_nearest_lon).toBe(-99);
    expect(a.grib2_precip_raw_value_mm_hr).toBe(6);
    expect(a.grib2_precip_mm_2min).toBeCloseTo(0.2, 12);
    expect(a.grib2_precip_unit).toBe('mm/hr');
    expect(a.grib2_nearest_lat).toBeCloseTo(40, 6);
    expect(a.grib2_nearest_lon).toBeCloseTo(-99, 6);
    expect(a.db_netcdf_precip_mm).toBe(1.25);

    expect(b.aligned_utc_timestamp).toBe('2024-06-01T12:04:00+00:00');
    expect(b.netcdf_precip_mm).toBe(3.5);
    expect('grib2_precip_mm_2min' in b).toBe(false);

    expect('netcdf_precip_mm' in c).toBe(false);
    expect('grib2_precip_mm_2min' in c).toBe(false);

    expect(result.buckets).toEqual([
      { key: '2024-06-01T12:00:00Z', incidents: 1, state: 'merged', netcdf: 'matched', grib2: 'matched' },
      { key: '2024-06-01T12:04:00Z', incidents: 1, state: 'merged', netcdf: 'matched', grib2: 'missing-file' },
      {
        key: '2024-06-01T12:06:00Z',
        incidents: 1,
        state: 'merged',
        netcdf: 'invalid-payload',
        grib2: 'missing-file',
      },
    ]);
    expect(Object.keys(result.grib2Metadata)).toEqual(['MRMS_PrecipRate_00.00_20240601-120000.grib2.gz']);
    expect(Object.keys(result.netcdfMetadata)).toEqual(['202406011200', '202406011204']);
    expect(result.diagnostics).toEqual({ throttled: 0, invalidPayload: 1, exhausted: 2, succeeded: 3 });
  });

  it('should keep NetCDF fields for an incident whose GRIB2 cell is masked in a shared bucket', async () => {
    const maskedArchive = buildGrib2Archive({
      Ni: 3,
      Nj: 2,
      La1: 40,
      Lo1: 260,
      Di: 1,
      Dj: 1,
      values: [0, 6, NaN, 30, 60, 90],
    });
    const source = new InMemoryIncidentSource([
      row('A', 40.1, -99.05, '2024-06-01 12:00:30'),
      row('E', 40.1, -98.05, '2024-06-01 12:01:10'),
    ]);
    const fetchImpl = vi.fn(async (url: string, _init?: RequestInit) =>
      url === GRIB_1200_URL ? new Response(new Uint8Array(maskedArchive)) : route(url)
    );

    const result = await runComparison(settings, {
      incidentSource: source,
      fetchImpl,
      sleep: async () => undefined,
    });

    expect(result.status).toBe('completed');
    if (result.status !== 'completed') return;

    const [a, e] = result.records;
    expect([a.incident_id, e.incident_id]).toEqual(['A', 'E']);
    expect(a.aligned_utc_timestamp).toBe(e.aligned_utc_timestamp);

    expect(a.grib2_precip_raw_value_mm_hr).toBe(6);
    expect(a.grib2_precip_mm_2min).toBeCloseTo(0.2, 12);
    expect(a.netcdf_precip_mm).toBe(5.5);

    expect(e.netcdf_precip_mm).toBe(6.5);
    expect(e.netcdf_nearest_lat).toBe(40);
    expect(e.netcdf_nearest_lon).toBe(-98);
    expect(e.grib2_precip_mm_2min).toBeNull();
    expect(e.grib2_precip_raw_value_mm_hr).toBeNull();
    expect(e.grib2_nearest_lat).toBeCloseTo(40, 6);
    expect(e.grib2_nearest_lon).toBeCloseTo(-98, 6);

    expect(result.buckets).toEqual([
      { key: '2024-06-01T12:00:00Z', incidents: 2, state: 'merged', netcdf: 'matched', grib2: 'matched' },
    ]);
  });

  it('should reuse the downloaded GRIB2 file for the grid sample', async () => {
    const source = new InMemoryIncidentSource([row('A', 40.1, -99.05, '2024-06-01 12:01:00')]);
    const fetchImpl = vi.fn(async (url: string, _init?: RequestInit) => route(url));

    await runComparison(settings, { incidentSource: source, fetchImpl, sleep: async () => undefined });

    expect(fetchImpl.mock.calls.filter(([url]) => url === GRIB_1200_URL)).toHaveLength(1);
  });

  it('should pass the predicate and limit to the incident source and close it', async () => {
    const source = new InMemoryIncidentSource([row('A', 40.1, -99.05, '2024-06-01 12:00:30')]);
    const fetchImpl = vi.fn(async (url: string, _init?: RequestInit) => route(url));

    await runComparison(
      { ...settings, predicate: 'zero', limit: 10 },
      { incidentSource: source, fetchImpl, sleep: async () => undefined }
    );

    expect(source.queries).toEqual([{ predicate: 'zero', limit: 10 }]);
    expect(source.closeCalls).toBe(1);
  });

  it('should stop early when there are no incidents', async () => {
    const source = new InMemoryIncidentSource([{ incident_id: 'bad' }]);
    const fetchImpl = vi.fn(async (url: string, _init?: RequestInit) => route(url));

    const result = await runComparison(settings, { incidentSource: source, fetchImpl });

    expect(result).toEqual({ status: 'no-incidents', rejectedRows: 1 });
    expect(fetchImpl).not.toHaveBeenCalled();
    expect(source.closeCalls).toBe(1);
  });

  it('should abort and close the source when the grid sample is unavailable', async () => {
    const source = new InMemoryIncidentSource([row('A', 40.1, -99.05, '2024-06-01 12:10:00')]);
    const fetchImpl = vi.fn(
      async (_url: string, _init?: RequestInit) => new Response(null, { status: 404 })
    );

    await expect(
      runComparison(settings, { incidentSource: source, fetchImpl, sleep: async () => undefined })
    ).rejects.toThrow(GridUnavailableError);
    expect(source.closeCalls).toBe(1);
  });
});
