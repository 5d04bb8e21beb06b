/**
 * Format-neutral view of a NetCDF payload
 *
 * Both the classic reader and the NetCDF-4 (HDF5) reader expose the payload
 * through this shape so variable selection, squeezing and fill handling live
 * in one place.
 *
 * @module extractors/netcdf/dataset
 */

export interface NetcdfVariable {
  readonly name: string;
  readonly dimensions: readonly string[];
  readonly shape: readonly number[];
  readonly attributes: Readonly<Record<string, unknown>>;
  /** Values in storage order, flattened */
  read(): Float64Array;
}

export interface NetcdfDataset {
  readonly format: string;
  readonly dimensions: Readonly<Record<string, number>>;
  readonly globalAttributes: Readonly<Record<string, unknown>>;
  readonly variables: readonly NetcdfVariable[];
  close(): Promise<void>;
}

function numbersOf(view: ArrayBufferView): number[] {
  if (view instanceof Float64Array || view instanceof Float32Array) return Array.from(view);
  if (view instanceof Int32Array || view instanceof Int16Array || view instanceof Int8Array) {
    return Array.from(view);
  }
  if (view instanceof Uint32Array || view instanceof Uint16Array || view instanceof Uint8Array) {
    return Array.from(view);
  }
  if (view instanceof BigInt64Array || view instanceof BigUint64Array) {
    return Array.from(view, Number);
  }
  return [];
}

/**
 * Flatten whatever a reader returned for a variable into numbers
 *
 * Nested arrays (one per record) are walked depth-first.
 */
export function toFloat64(data: unknown): Float64Array {
  if (data instanceof Float64Array) {
    return data;
  }
  const out: number[] = [];
  const visit = (value: unknown): void => {
    if (typeof value === 'number') {
      out.push(value);
    } else if (typeof value === 'bigint') {
      out.push(Number(value));
    } else if (Array.isArray(value)) {
      for (const item of value) visit(item);
    } else if (ArrayBuffer.isView(value)) {
      for (const item of numbersOf(value)) out.push(item);
    } else {
      out.push(NaN);
    }
  };
  visit(data);
  return Float64Array.from(out);
}

export function firstNumber(value: unknown): number | null {
  if (typeof value === 'number') return value;
  if (typeof value === 'bigint') return Number(value);
  if (Array.isArray(value) && typeof value[0] === 'number') return value[0];
  if (ArrayBuffer.isView(value)) {
    const [first] = numbersOf(value);
    return first ?? null;
  }
  return null;
}
