/**
 * NetCDF Extractor Tests
 *
 * Validates variable selection, fill handling, axis order and payload
 * validation for NetCDF-4 (HDF5) and classic NetCDF files built in-process.
 */

import { describe, it, expect } from 'vitest';
import { decodeNetcdf, extractNetcdf, isValidNetcdf } from '../../../extractors/netcdf-extractor.js';
import { NetcdfFormatError } from '../../../core/errors.js';
import { buildHdf5Netcdf } from '../../fixtures/hdf5-builder.js';
import { buildGridNetcdf, buildNetcdf, gzipBytes } from '../../fixtures/netcdf-builder.js';

const GRID = {
  lat: [35, 35.5],
  lon: [-98, -97.5, -97],
  values: [0, 1.5, -999, 2.5, 0.25, 3],
};

describe('decodeNetcdf', () => {
  it('should decode a NetCDF-4 (HDF5) payload', async () => {
    const extraction = await decodeNetcdf(await buildHdf5Netcdf(GRID), 'mrms_a2m');

    expect(extraction.variable).toBe('mrms_a2m');
    expect(extraction.rows).toBe(2);
    expect(extraction.cols).toBe(3);
    expect(Array.from(extraction.lat)).toEqual([35, 35.5]);
    expect(Array.from(extraction.lon)).toEqual([-98, -97.5, -97]);
    expect(Array.from(extraction.values)).toEqual([0, 1.5, NaN, 2.5, 0.25, 3]);
  });

  it('should describe a NetCDF-4 payload', async () => {
    const { metadata } = await decodeNetcdf(await buildHdf5Netcdf(GRID), 'mrms_a2m');

    expect(metadata.format).toBe('netcdf4');
    expect(metadata.dimensions).toEqual({ lat: 2, lon: 3 });
    expect(metadata.globalAttributes).toEqual({ title: 'test grid' });
    expect(metadata.variables.mrms_a2m?.dimensions).toEqual(['lat', 'lon']);
    expect(metadata.variables.mrms_a2m?.attributes.units).toBe('mm');
  });

  it('should read a gzip-wrapped NetCDF-4 payload with a singleton time axis', async () => {
    const bytes = gzipBytes(await buildHdf5Netcdf({ ...GRID, leadingAxes: 1 }));

    const extraction = await decodeNetcdf(bytes, 'mrms_a2m');

    expect(extraction.rows).toBe(2);
    expect(extraction.values[4]).toBe(0.25);
  });

  it('should decode the product variable with fill values as NaN', async () => {
    const extraction = await decodeNetcdf(buildGridNetcdf(GRID), 'mrms_a2m');

    expect(extraction.variable).toBe('mrms_a2m');
    expect(extraction.rows).toBe(2);
    expect(extraction.cols).toBe(3);
    expect(Array.from(extraction.lat)).toEqual([35, 35.5]);
    expect(Array.from(extraction.lon)).toEqual([-98, -97.5, -97]);
    expect(Array.from(extraction.values)).toEqual([0, 1.5, NaN, 2.5, 0.25, 3]);
  });

  it('should describe dimensions, attributes and variables', async () => {
    const { metadata } = await decodeNetcdf(buildGridNetcdf(GRID), 'mrms_a2m');

    expect(metadata.dimensions).toEqual({ lat: 2, lon: 3 });
    expect(metadata.globalAttributes).toEqual({ title: 'test grid' });
    expect(metadata.variables.mrms_a2m?.dimensions).toEqual(['lat', 'lon']);
    expect(metadata.variables.mrms_a2m?.attributes.units).toBe('mm');
  });

  it('should read a gzip-wrapped payload', async () => {
    const extraction = await decodeNetcdf(gzipBytes(buildGridNetcdf(GRID)), 'mrms_a2m');

    expect(extraction.values[3]).toBe(2.5);
  });

  it('should fall back to the first gridded variable when the product name differs', async () => {
    const extraction = await decodeNetcdf(buildGridNetcdf({ ...GRID, variable: 'band1' }), 'mrms_a2m');

    expect(extraction.variable).toBe('band1');
  });

  it('should transpose a variable stored longitude-first', async () => {
    const bytes = buildNetcdf({
      dimensions: [
        { name: 'lat', size: 2 },
        { name: 'lon', size: 3 },
      ],
      variables: [
        { name: 'lat', type: 'double', dimensions: ['lat'], values: [35, 36] },
        { name: 'lon', type: 'double', dimensions: ['lon'], values: [-98, -97, -96] },
        { name: 'mrms_a2m', type: 'float', dimensions: ['lon', 'lat'], values: [0, 10, 1, 11, 2, 12] },
      ],
    });

    const extraction = await decodeNetcdf(bytes, 'mrms_a2m');

    expect(Array.from(extraction.values)).toEqual([0, 1, 2, 10, 11, 12]);
  });

  it('should squeeze a singleton time dimension', async () => {
    const bytes = buildNetcdf({
      dimensions: [
        { name: 'time', size: 1 },
        { name: 'lat', size: 1 },
        { name: 'lon', size: 2 },
      ],
      variables: [
        { name: 'lat', type: 'double', dimensions: ['lat'], values: [35] },
        { name: 'lon', type: 'double', dimensions: ['lon'], values: [-98, -97] },
        { name: 'mrms_a2m', type: 'float', dimensions: ['time', 'lat', 'lon'], values: [4, 5] },
      ],
    });

    const extraction = await decodeNetcdf(bytes, 'mrms_a2m');

    expect(extraction.rows).toBe(1);
    expect(Array.from(extraction.values)).toEqual([4, 5]);
  });

  it('should reject a file without coordinate variables', async () => {
    const bytes = buildNetcdf({
      dimensions: [
        { name: 'y', size: 1 },
        { name: 'x', size: 2 },
      ],
      variables: [{ name: 'mrms_a2m', type: 'float', dimensions: ['y', 'x'], values: [1, 2] }],
    });

    await expect(decodeNetcdf(bytes, 'mrms_a2m')).rejects.toThrow(NetcdfFormatError);
  });
});

describe('isValidNetcdf', () => {
  it('should accept a NetCDF-4 payload', async () => {
    expect(await isValidNetcdf(await buildHdf5Netcdf(GRID))).toBe(true);
  });

  it('should accept a classic NetCDF payload', async () => {
    expect(await isValidNetcdf(buildGridNetcdf(GRID))).toBe(true);
  });

  it('should reject an HTML error page', async () => {
    expect(await isValidNetcdf(new TextEncoder().encode('<html>Service Unavailable</html>'))).toBe(false);
  });

  it('should reject an empty payload', async () => {
    expect(await isValidNetcdf(new Uint8Array(0))).toBe(false);
  });
});

describe('extractNetcdf', () => {
  it('should return null for an undecodable payload', async () => {
    expect(await extractNetcdf(new Uint8Array([1, 2, 3]), 'mrms_a2m', '202406011200')).toBeNull();
  });
});
