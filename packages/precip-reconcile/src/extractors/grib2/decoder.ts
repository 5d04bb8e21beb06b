/**
 * GRIB2 Decoder
 *
 * Parses GRIB2 files with vgrib2 and adapts each message to a `Grib2Field`
 * carrying the identification, grid, product and packing parameters the
 * extractor needs. vgrib2 hands back PNG-packed (template 5.41) data as the
 * raw section 7 bytes; those are decoded with fast-png and scaled here.
 *
 * Only regular latitude/longitude grids (template 3.0) are accepted.
 *
 * @module extractors/grib2/decoder
 */

import { decode as decodePng } from 'fast-png';
import { GRIB } from 'vgrib2';
import { z } from 'zod';
import { Grib2FormatError } from '../../core/errors.js';
import { errorMessage } from '../../core/utils/logger.js';

// ============================================================================
// Types
// ============================================================================

export interface Grib2GridDefinition {
  readonly numberOfPoints: number;
  readonly Ni: number;
  readonly Nj: number;
  /** Degrees */
  readonly La1: number;
  readonly Lo1: number;
  readonly La2: number;
  readonly Lo2: number;
  readonly Di: number;
  readonly Dj: number;
  readonly scanningMode: number;
  readonly iScansNegatively: boolean;
  readonly jScansPositively: boolean;
}

export interface Grib2ProductDefinition {
  readonly parameterCategory: number;
  readonly parameterNumber: number;
  readonly indicatorOfUnitOfTimeRange: number | null;
  readonly forecastTime: number | null;
  readonly typeOfFirstFixedSurface: number | null;
  /** First fixed surface value with its scale factor applied */
  readonly level: number | null;
}

export interface Grib2Packing {
  /** Data representation template number (0 simple, 41 PNG) */
  readonly template: number;
  readonly referenceValue: number;
  readonly binaryScaleFactor: number;
  readonly decimalScaleFactor: number;
}

export interface Grib2Field {
  readonly discipline: number;
  /** Reference time, epoch ms UTC */
  readonly referenceTime: number;
  readonly grid: Grib2GridDefinition;
  readonly product: Grib2ProductDefinition;
  readonly packing: Grib2Packing;
  readonly hasBitmap: boolean;
  /** Values in scan order; bitmap-masked points are NaN */
  readonly decodeValues: () => Float64Array;
}

// ============================================================================
// Message shape
// ============================================================================

type Section = Readonly<Record<string, unknown>>;

const sectionSchema = z.record(z.unknown());

const messageSchema = z
  .object({
    indicator: sectionSchema.optional(),
    identification: sectionSchema.optional(),
    gridDefinition: sectionSchema,
    productDefinition: sectionSchema.optional(),
    dataRepresentation: sectionSchema,
    bitMap: z.unknown().optional(),
    bitmap: z.unknown().optional(),
    data: z.unknown(),
  })
  .passthrough();

type Grib2Message = z.infer<typeof messageSchema>;

const PNG_SIGNATURE = [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a];
const PNG_TEMPLATE = 41;
const MISSING_U32 = 0xffffffff;

/** First finite number found under any of `names` */
function numberIn(section: Section | undefined, ...names: string[]): number | null {
  if (!section) return null;
  for (const name of names) {
    const value = section[name];
    if (typeof value === 'number' && Number.isFinite(value)) return value;
  }
  return null;
}

function requireNumber(section: Section | undefined, label: string, ...names: string[]): number {
  const value = numberIn(section, ...names);
  if (value === null) {
    throw new Grib2FormatError(`GRIB2 message has no ${label}`);
  }
  return value;
}

function isPng(bytes: Uint8Array): boolean {
  return bytes.length >= PNG_SIGNATURE.length && PNG_SIGNATURE.every((b, i) => bytes[i] === b);
}

// ============================================================================
// Section adapters
// ============================================================================

function referenceTimeOf(message: Grib2Message): number {
  const id = message.identification;
  const stamp = id?.referenceTime;
  if (typeof stamp === 'number') return stamp;
  if (stamp instanceof Date) return stamp.getTime();

  const year = requireNumber(id, 'reference year', 'year');
  return Date.UTC(
    year,
    requireNumber(id, 'reference month', 'month') - 1,
    requireNumber(id, 'reference day', 'day'),
    numberIn(id, 'hour') ?? 0,
    numberIn(id, 'minute') ?? 0,
    numberIn(id, 'second') ?? 0
  );
}

function gridOf(section: Section): Grib2GridDefinition {
  const template = numberIn(section, 'gridDefinitionTemplateNumber', 'templateNumber', 'template');
  if (template !== null && template !== 0) {
    throw new Grib2FormatError(`Unsupported grid definition template 3.${template}`);
  }

  const Ni = requireNumber(section, 'column count', 'nx', 'Ni', 'numberOfPointsAlongParallel');
  const Nj = requireNumber(section, 'row count', 'ny', 'Nj', 'numberOfPointsAlongMeridian');
  const la1 = requireNumber(section, 'first latitude', 'la1', 'La1');
  const lo1 = requireNumber(section, 'first longitude', 'lo1', 'Lo1');
  // Angles beyond degree range are in micro-degrees
  const unit = Math.abs(la1) > 90 || Math.abs(lo1) > 360 ? 1e-6 : 1;
  const La1 = la1 * unit;
  const Lo1 = lo1 * unit;

  const scanningMode = numberIn(section, 'scanningMode', 'scanMode') ?? 0;
  if (scanningMode & 0x10) {
    throw new Grib2FormatError('Boustrophedonic scanning is not supported');
  }
  if (scanningMode & 0x20) {
    throw new Grib2FormatError('Column-major (j-consecutive) scanning is not supported');
  }
  const iScansNegatively = (scanningMode & 0x80) !== 0;
  const jScansPositively = (scanningMode & 0x40) !== 0;

  const rawLa2 = numberIn(section, 'la2', 'La2');
  const rawLo2 = numberIn(section, 'lo2', 'Lo2');
  const rawDi = numberIn(section, 'dx', 'Di');
  const rawDj = numberIn(section, 'dy', 'Dj');

  const Di =
    rawDi !== null && rawDi !== MISSING_U32
      ? Math.abs(rawDi * unit)
      : rawLo2 !== null && Ni > 1
        ? Math.abs(rawLo2 * unit - Lo1) / (Ni - 1)
        : 0;
  const Dj =
    rawDj !== null && rawDj !== MISSING_U32
      ? Math.abs(rawDj * unit)
      : rawLa2 !== null && Nj > 1
        ? Math.abs(rawLa2 * unit - La1) / (Nj - 1)
        : 0;

  return {
    numberOfPoints: Ni * Nj,
    Ni,
    Nj,
    La1,
    Lo1,
    La2: rawLa2 !== null ? rawLa2 * unit : La1 + (jScansPositively ? 1 : -1) * (Nj - 1) * Dj,
    Lo2: rawLo2 !== null ? rawLo2 * unit : Lo1 + (iScansNegatively ? -1 : 1) * (Ni - 1) * Di,
    Di,
    Dj,
    scanningMode,
    iScansNegatively,
    jScansPositively,
  };
}

function productOf(section: Section | undefined): Grib2ProductDefinition {
  const surface = numberIn(section, 'typeOfFirstFixedSurface', 'firstFixedSurfaceType');
  const scaledValue = numberIn(section, 'scaledValueOfFirstFixedSurface', 'firstFixedSurfaceValue');
  const scale = numberIn(section, 'scaleFactorOfFirstFixedSurface', 'firstFixedSurfaceScale');
  const levelMissing =
    surface === null || surface === 255 || scaledValue === null || scaledValue === MISSING_U32;

  return {
    parameterCategory: requireNumber(section, 'parameter category', 'parameterCategory', 'category'),
    parameterNumber: requireNumber(section, 'parameter number', 'parameterNumber', 'number'),
    indicatorOfUnitOfTimeRange: numberIn(section, 'indicatorOfUnitOfTimeRange', 'timeUnit'),
    forecastTime: numberIn(section, 'forecastTime'),
    typeOfFirstFixedSurface: surface,
    level: levelMissing ? null : scaledValue / 10 ** (scale === null || scale === 255 ? 0 : scale),
  };
}

function packingOf(section: Section, rawPng: boolean): Grib2Packing {
  const template =
    numberIn(section, 'dataRepresentationTemplateNumber', 'templateNumber', 'template') ??
    (rawPng ? PNG_TEMPLATE : 0);
  return {
    template,
    referenceValue: requireNumber(section, 'reference value', 'referenceValue'),
    binaryScaleFactor: numberIn(section, 'binaryScaleFactor') ?? 0,
    decimalScaleFactor: numberIn(section, 'decimalScaleFactor') ?? 0,
  };
}

/**
 * Presence flag per grid point, or null when every point carries a value
 *
 * Accepts one entry per point or the packed bit string of section 6.
 */
function bitmapOf(message: Grib2Message, numberOfPoints: number): Uint8Array | null {
  const raw = message.bitMap ?? message.bitmap;
  let bits: unknown = raw;
  if (!ArrayBuffer.isView(raw) && !Array.isArray(raw)) {
    const section = sectionSchema.safeParse(raw);
    bits = section.success ? section.data.bitMap ?? section.data.bitmap ?? section.data.data : null;
  }

  const entries = bits instanceof Uint8Array || Array.isArray(bits) ? Array.from(bits, Number) : null;
  if (!entries || entries.length === 0) {
    return null;
  }

  if (entries.length === numberOfPoints) {
    return Uint8Array.from(entries, (v) => (v ? 1 : 0));
  }
  if (entries.length === Math.ceil(numberOfPoints / 8)) {
    const flags = new Uint8Array(numberOfPoints);
    for (let i = 0; i < numberOfPoints; i++) {
      flags[i] = (entries[i >> 3] >> (7 - (i & 7))) & 1;
    }
    return flags;
  }
  throw new Grib2FormatError(`Bitmap holds ${entries.length} entries for ${numberOfPoints} grid points`);
}

// ============================================================================
// Values
// ============================================================================

/**
 * Y = (R + X * 2^E) / 10^D over the PNG's samples
 */
function decodePngValues(bytes: Uint8Array, packing: Grib2Packing): Float64Array {
  const png = decodePng(bytes);
  const binary = 2 ** packing.binaryScaleFactor;
  const decimal = 10 ** packing.decimalScaleFactor;
  const values = new Float64Array(png.data.length);
  for (let i = 0; i < png.data.length; i++) {
    values[i] = (packing.referenceValue + png.data[i] * binary) / decimal;
  }
  return values;
}

function packedValues(data: unknown, packing: Grib2Packing): Float64Array {
  if (data instanceof Uint8Array) {
    if (!isPng(data)) {
      throw new Grib2FormatError(`Data representation template 5.${packing.template} is not supported`);
    }
    return decodePngValues(data, packing);
  }
  if (Array.isArray(data) || data instanceof Float64Array || data instanceof Float32Array) {
    return Float64Array.from(data, Number);
  }
  throw new Grib2FormatError('GRIB2 message carries no data values');
}

/**
 * Place packed values on the grid, NaN where the bitmap marks a point absent
 */
function spread(packed: Float64Array, bitmap: Uint8Array | null, numberOfPoints: number): Float64Array {
  if (!bitmap) {
    if (packed.length !== numberOfPoints) {
      throw new Grib2FormatError(
        `Decoded ${packed.length} values for ${numberOfPoints} grid points without a bitmap`
      );
    }
    return packed;
  }

  // Already on the full grid: mask in place
  if (packed.length === numberOfPoints) {
    return packed.map((v, i) => (bitmap[i] ? v : NaN));
  }

  const values = new Float64Array(numberOfPoints);
  let next = 0;
  for (let i = 0; i < numberOfPoints; i++) {
    if (bitmap[i]) {
      if (next >= packed.length) {
        throw new Grib2FormatError('Bitmap marks more points than were packed');
      }
      values[i] = packed[next++];
    } else {
      values[i] = NaN;
    }
  }
  return values;
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Adapt one parsed vgrib2 message
 *
 * @throws Grib2FormatError when a required parameter is missing or unsupported
 */
export function fieldFromMessage(input: unknown): Grib2Field {
  const parsed = messageSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Grib2FormatError(
      `Unexpected GRIB2 message shape: ${issue ? `${issue.path.join('.')} ${issue.message}` : 'invalid'}`
    );
  }
  const message = parsed.data;

  const rawPng = message.data instanceof Uint8Array && isPng(message.data);
  const grid = gridOf(message.gridDefinition);
  const packing = packingOf(message.dataRepresentation, rawPng);
  const bitmap = bitmapOf(message, grid.numberOfPoints);

  return {
    discipline: requireNumber(message.indicator ?? message, 'discipline', 'discipline'),
    referenceTime: referenceTimeOf(message),
    grid,
    product: productOf(message.productDefinition),
    packing,
    hasBitmap: bitmap !== null,
    decodeValues: () => spread(packedValues(message.data, packing), bitmap, grid.numberOfPoints),
  };
}

/**
 * Parse every message of a GRIB2 file
 *
 * @throws Grib2FormatError on structural problems
 */
export function parseGrib2(bytes: Uint8Array): Grib2Field[] {
  let messages: unknown;
  try {
    // Copy so the parser sees its own Buffer
    messages = GRIB.parseNoLookup(Buffer.from(bytes));
  } catch (error) {
    throw new Grib2FormatError(`GRIB2 parse failed: ${errorMessage(error)}`);
  }

  const list = z.array(z.unknown()).safeParse(messages);
  if (!list.success) {
    throw new Grib2FormatError('GRIB2 parser returned no message list');
  }
  return list.data.map(fieldFromMessage);
}

// ============================================================================
// Geometry
// ============================================================================

/**
 * Latitude and longitude axes of a regular lat/lon grid in scan order
 *
 * Row j of the value array lies on lat[j]; column i on lon[i].
 */
export function gridAxes(grid: Grib2GridDefinition): { lat: Float64Array; lon: Float64Array } {
  const lat = new Float64Array(grid.Nj);
  const lon = new Float64Array(grid.Ni);
  const dj = grid.jScansPositively ? grid.Dj : -grid.Dj;
  const di = grid.iScansNegatively ? -grid.Di : grid.Di;

  for (let j = 0; j < grid.Nj; j++) {
    lat[j] = grid.La1 + j * dj;
  }
  for (let i = 0; i < grid.Ni; i++) {
    lon[i] = grid.Lo1 + i * di;
  }
  return { lat, lon };
}
