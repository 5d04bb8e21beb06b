/**
 * NetCDF Extractor
 *
 * Opens an in-memory NetCDF payload (gzip-wrapped or not), picks the product
 * variable, and returns it as a 2D (lat × lon) grid with its axes and
 * metadata. NetCDF-4 (HDF5) payloads are read with h5wasm; classic CDF-1/CDF-2
 * payloads with netcdfjs.
 *
 * Fill values become NaN; scale_factor and add_offset are applied.
 *
 * @module extractors/netcdf-extractor
 */

import { NetcdfFormatError } from '../core/errors.js';
import { createLogger, errorMessage } from '../core/utils/logger.js';
import { maybeGunzip } from './gzip.js';
import { isClassicNetcdf, openClassicNetcdf } from './netcdf/classic.js';
import { firstNumber, type NetcdfDataset, type NetcdfVariable } from './netcdf/dataset.js';
import { isHdf5, openHdf5Netcdf } from './netcdf/hdf5.js';

const log = createLogger({ module: 'netcdf-extractor' });

const LAT_NAMES = new Set(['lat', 'latitude', 'y']);
const LON_NAMES = new Set(['lon', 'longitude', 'long', 'x']);
const COORDINATE_NAMES = new Set([...LAT_NAMES, ...LON_NAMES, 'time']);

export interface NetcdfExtraction {
  readonly variable: string;
  readonly rows: number;
  readonly cols: number;
  /** Latitude axis (rows) */
  readonly lat: Float64Array;
  /** Longitude axis (columns), as stored */
  readonly lon: Float64Array;
  /** Row-major lat × lon values */
  readonly values: Float64Array;
  readonly metadata: NetcdfMetadata;
}

export interface NetcdfMetadata {
  readonly format: string;
  readonly dimensions: Readonly<Record<string, number>>;
  readonly globalAttributes: Readonly<Record<string, unknown>>;
  readonly variables: Readonly<
    Record<
      string,
      { readonly dimensions: readonly string[]; readonly attributes: Readonly<Record<string, unknown>> }
    >
  >;
}

// ============================================================================
// Helpers
// ============================================================================

async function openDataset(bytes: Uint8Array): Promise<NetcdfDataset> {
  const raw = maybeGunzip(bytes);
  if (isHdf5(raw)) {
    return openHdf5Netcdf(raw);
  }
  if (isClassicNetcdf(raw)) {
    return openClassicNetcdf(raw);
  }
  throw new NetcdfFormatError('Payload is neither NetCDF-4 (HDF5) nor classic NetCDF');
}

async function withDataset<T>(bytes: Uint8Array, fn: (dataset: NetcdfDataset) => T): Promise<T> {
  const dataset = await openDataset(bytes);
  try {
    return fn(dataset);
  } finally {
    await dataset.close();
  }
}

function describe(dataset: NetcdfDataset): NetcdfMetadata {
  const variables: Record<string, { dimensions: readonly string[]; attributes: Readonly<Record<string, unknown>> }> = {};
  for (const v of dataset.variables) {
    variables[v.name] = { dimensions: v.dimensions, attributes: v.attributes };
  }
  return {
    format: dataset.format,
    dimensions: dataset.dimensions,
    globalAttributes: dataset.globalAttributes,
    variables,
  };
}

function pickDataVariable(variables: readonly NetcdfVariable[], productCode: string): NetcdfVariable | null {
  const named = variables.find((v) => v.name === productCode);
  if (named) return named;
  return (
    variables.find(
      (v) => v.dimensions.length >= 2 && !COORDINATE_NAMES.has(v.name.toLowerCase())
    ) ?? null
  );
}

function readAxis(variables: readonly NetcdfVariable[], names: Set<string>): { name: string; values: Float64Array } | null {
  const variable = variables.find((v) => names.has(v.name.toLowerCase()) && v.dimensions.length === 1);
  if (!variable) return null;
  return { name: variable.name, values: variable.read() };
}

function decodeDataset(dataset: NetcdfDataset, productCode: string): NetcdfExtraction {
  const { variables } = dataset;
  const variable = pickDataVariable(variables, productCode);
  if (!variable) {
    throw new NetcdfFormatError(
      `No data variable found (expected '${productCode}', saw ${variables.map((v) => v.name).join(', ')})`
    );
  }

  const lat = readAxis(variables, LAT_NAMES);
  const lon = readAxis(variables, LON_NAMES);
  if (!lat || !lon) {
    throw new NetcdfFormatError('Latitude/longitude coordinate variables not found');
  }

  // Squeeze singleton dimensions (time, band)
  const shape = variable.dimensions
    .map((name, axis) => ({ name, size: variable.shape[axis] ?? 0 }))
    .filter((d) => d.size !== 1);
  if (shape.length !== 2) {
    throw new NetcdfFormatError(
      `Variable '${variable.name}' is not 2D after squeezing (${shape.map((d) => `${d.name}=${d.size}`).join(', ')})`
    );
  }

  const raw = variable.read();
  const rows = lat.values.length;
  const cols = lon.values.length;
  if (raw.length !== rows * cols) {
    throw new NetcdfFormatError(
      `Variable '${variable.name}' holds ${raw.length} values for a ${rows}x${cols} grid`
    );
  }

  const lonFirst =
    LON_NAMES.has(shape[0].name.toLowerCase()) || (shape[0].size === cols && shape[0].size !== rows);
  const expected = lonFirst ? [cols, rows] : [rows, cols];
  if (shape[0].size !== expected[0] || shape[1].size !== expected[1]) {
    throw new NetcdfFormatError(
      `Variable '${variable.name}' shape ${shape[0].size}x${shape[1].size} does not match axes ${rows}x${cols}`
    );
  }
  const { attributes } = variable;
  const fill = firstNumber(attributes._FillValue);
  const missing = firstNumber(attributes.missing_value);
  const scale = firstNumber(attributes.scale_factor) ?? 1;
  const offset = firstNumber(attributes.add_offset) ?? 0;

  const values = new Float64Array(rows * cols);
  for (let r = 0; r < rows; r++) {
    for (let c = 0; c < cols; c++) {
      const v = lonFirst ? raw[c * rows + r] : raw[r * cols + c];
      values[r * cols + c] = v === fill || v === missing ? NaN : v * scale + offset;
    }
  }

  return {
    variable: variable.name,
    rows,
    cols,
    lat: lat.values,
    lon: lon.values,
    values,
    metadata: describe(dataset),
  };
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Payload validator for the fetch layer: true when the bytes open as NetCDF
 * with at least one variable
 */
export async function isValidNetcdf(bytes: Uint8Array): Promise<boolean> {
  try {
    return await withDataset(bytes, (dataset) => dataset.variables.length > 0);
  } catch (error) {
    log.debug('Payload is not readable NetCDF', { error: errorMessage(error) });
    return false;
  }
}

/**
 * Decode the product variable of a NetCDF payload
 *
 * @throws NetcdfFormatError when the payload cannot be interpreted
 */
export async function decodeNetcdf(bytes: Uint8Array, productCode: string): Promise<NetcdfExtraction> {
  return withDataset(bytes, (dataset) => decodeDataset(dataset, productCode));
}

/**
 * Decode a NetCDF payload, logging and returning null when it cannot be read
 */
export async function extractNetcdf(
  bytes: Uint8Array,
  productCode: string,
  key: string
): Promise<NetcdfExtraction | null> {
  try {
    return await decodeNetcdf(bytes, productCode);
  } catch (error) {
    log.error('Failed to decode NetCDF payload', { key, error: errorMessage(error) });
    return null;
  }
}
