/**
 * Classic NetCDF (CDF-1/CDF-2) reader over netcdfjs
 *
 * @module extractors/netcdf/classic
 */

import { NetCDFReader } from 'netcdfjs';
import { toFloat64, type NetcdfDataset, type NetcdfVariable } from './dataset.js';

interface AttributeLike {
  readonly name: string;
  readonly value: unknown;
}

interface VariableLike {
  readonly name: string;
  readonly dimensions: readonly number[];
  readonly attributes: readonly AttributeLike[];
}

interface DimensionLike {
  readonly name: string;
  readonly size: number;
}

/** "CDF" followed by version 1 or 2 */
export function isClassicNetcdf(bytes: Uint8Array): boolean {
  return (
    bytes.length >= 4 &&
    bytes[0] === 0x43 &&
    bytes[1] === 0x44 &&
    bytes[2] === 0x46 &&
    (bytes[3] === 1 || bytes[3] === 2)
  );
}

function attributeMap(attributes: readonly AttributeLike[]): Record<string, unknown> {
  const map: Record<string, unknown> = {};
  for (const attribute of attributes) {
    map[attribute.name] = attribute.value;
  }
  return map;
}

export function openClassicNetcdf(bytes: Uint8Array): NetcdfDataset {
  // Copy so the reader sees an ArrayBuffer starting at offset 0
  const reader = new NetCDFReader(new Uint8Array(bytes).buffer);
  const dims: readonly DimensionLike[] = reader.dimensions;
  const sourceVariables: readonly VariableLike[] = reader.variables;
  const globals: readonly AttributeLike[] = reader.globalAttributes;

  const dimensions: Record<string, number> = {};
  for (const dim of dims) {
    dimensions[dim.name] = dim.size;
  }

  const variables: NetcdfVariable[] = sourceVariables.map((v) => ({
    name: v.name,
    dimensions: v.dimensions.map((id) => dims[id]?.name ?? String(id)),
    shape: v.dimensions.map((id) => dims[id]?.size ?? 0),
    attributes: attributeMap(v.attributes),
    read: () => toFloat64(reader.getDataVariable(v.name)),
  }));

  return {
    format: String(reader.version),
    dimensions,
    globalAttributes: attributeMap(globals),
    variables,
    close: async () => undefined,
  };
}
