/**
 * NetCDF-4 reader over h5wasm
 *
 * NetCDF-4 files are HDF5 files. h5wasm opens them from disk, so the payload
 * is written to a temporary file that lives until the dataset is closed.
 *
 * Dimension names come from the 1D coordinate variables; an nD variable's
 * axes are named by matching their sizes against those coordinates.
 *
 * @module extractors/netcdf/hdf5
 */

import { randomUUID } from 'node:crypto';
import { unlink, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import * as h5wasm from 'h5wasm/node';
import { toFloat64, type NetcdfDataset, type NetcdfVariable } from './dataset.js';

const HDF5_SIGNATURE = [0x89, 0x48, 0x44, 0x46, 0x0d, 0x0a, 0x1a, 0x0a];

/** Bookkeeping attributes written by the NetCDF-4 library */
const RESERVED_ATTRIBUTES = new Set([
  'DIMENSION_LIST',
  'REFERENCE_LIST',
  'CLASS',
  'NAME',
  '_Netcdf4Dimid',
  '_Netcdf4Coordinates',
  '_nc3_strict',
]);

/** NAME carried by a dimension scale that has no coordinate variable */
const BARE_DIMENSION_NAME = 'This is a netCDF dimension but not a netCDF variable';

export function isHdf5(bytes: Uint8Array): boolean {
  return bytes.length >= HDF5_SIGNATURE.length && HDF5_SIGNATURE.every((b, i) => bytes[i] === b);
}

function attributeMap(attrs: Record<string, h5wasm.Attribute>): Record<string, unknown> {
  const map: Record<string, unknown> = {};
  for (const [name, attribute] of Object.entries(attrs)) {
    if (!RESERVED_ATTRIBUTES.has(name)) {
      map[name] = attribute.value;
    }
  }
  return map;
}

function isBareDimension(dataset: h5wasm.Dataset): boolean {
  const name = dataset.attrs.NAME?.value;
  return typeof name === 'string' && name.startsWith(BARE_DIMENSION_NAME);
}

/**
 * Name each axis of `shape` after a coordinate of the same length, preferring
 * coordinates not already used. Unmatched axes get `dim<i>`.
 */
function nameAxes(shape: readonly number[], coordinates: ReadonlyMap<string, number>): string[] {
  const used = new Set<string>();
  return shape.map((size, axis) => {
    for (const [name, length] of coordinates) {
      if (length === size && !used.has(name)) {
        used.add(name);
        return name;
      }
    }
    return `dim${axis}`;
  });
}

export async function openHdf5Netcdf(bytes: Uint8Array): Promise<NetcdfDataset> {
  await h5wasm.ready;
  const path = join(tmpdir(), `precip-reconcile-${randomUUID()}.nc`);
  await writeFile(path, bytes);

  let file: h5wasm.File;
  try {
    file = new h5wasm.File(path, 'r');
  } catch (error) {
    await unlink(path);
    throw error;
  }

  const datasets: h5wasm.Dataset[] = [];
  for (const name of file.keys()) {
    const entity = file.get(name);
    if (entity instanceof h5wasm.Dataset && !isBareDimension(entity)) {
      datasets.push(entity);
    }
  }

  // 1D datasets are coordinate variables, in file order
  const coordinates = new Map<string, number>();
  for (const dataset of datasets) {
    const shape = dataset.shape ?? [];
    if (shape.length === 1) {
      coordinates.set(key(dataset), shape[0]);
    }
  }
  const dimensions: Record<string, number> = Object.fromEntries(coordinates);

  const variables: NetcdfVariable[] = datasets.map((dataset) => {
    const shape = dataset.shape ?? [];
    const name = key(dataset);
    return {
      name,
      dimensions: shape.length === 1 ? [name] : nameAxes(shape, coordinates),
      shape,
      attributes: attributeMap(dataset.attrs),
      read: () => toFloat64(dataset.value),
    };
  });

  return {
    format: 'netcdf4',
    dimensions,
    globalAttributes: attributeMap(file.attrs),
    variables,
    close: async () => {
      try {
        file.close();
      } finally {
        await unlink(path);
      }
    },
  };
}

/** Dataset name without the leading slash */
function key(dataset: h5wasm.Dataset): string {
  return dataset.path.replace(/^\//, '');
}
