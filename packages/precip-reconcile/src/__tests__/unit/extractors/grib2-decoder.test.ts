/**
 * GRIB2 Decoder Tests
 *
 * Validates how parsed GRIB2 messages become fields: section parameters,
 * bitmaps, PNG-packed data and grid geometry.
 */

import { describe, it, expect } from 'vitest';
import { fieldFromMessage, gridAxes, parseGrib2 } from '../../../extractors/grib2/decoder.js';
import { Grib2FormatError } from '../../../core/errors.js';
import { buildGrib2Message, encodePng16 } from '../../fixtures/grib2-builder.js';

interface MessageOverrides {
  readonly gridDefinition?: Record<string, unknown>;
  readonly productDefinition?: Record<string, unknown>;
  readonly dataRepresentation?: Record<string, unknown>;
  readonly bitMap?: unknown;
  readonly data?: unknown;
}

function message(overrides: MessageOverrides = {}): Record<string, unknown> {
  return {
    indicator: { discipline: 209, edition: 2 },
    identification: { year: 2024, month: 6, day: 1, hour: 12, minute: 4, second: 0 },
    gridDefinition: { nx: 3, ny: 2, la1: 40, lo1: 260, dx: 0.5, dy: 0.5, scanningMode: 0, ...overrides.gridDefinition },
    productDefinition: {
      parameterCategory: 6,
      parameterNumber: 1,
      typeOfFirstFixedSurface: 102,
      scaleFactorOfFirstFixedSurface: 0,
      scaledValueOfFirstFixedSurface: 500,
      ...overrides.productDefinition,
    },
    dataRepresentation: { referenceValue: 0, binaryScaleFactor: 0, decimalScaleFactor: 1, ...overrides.dataRepresentation },
    bitMap: overrides.bitMap,
    data: overrides.data ?? [0.5, 1.2, 7, 3, 0, 2.5],
  };
}

describe('fieldFromMessage', () => {
  it('should read identification, product and grid parameters', () => {
    const field = fieldFromMessage(message());

    expect(field.discipline).toBe(209);
    expect(field.referenceTime).toBe(Date.UTC(2024, 5, 1, 12, 4, 0));
    expect(field.product.parameterCategory).toBe(6);
    expect(field.product.parameterNumber).toBe(1);
    expect(field.product.typeOfFirstFixedSurface).toBe(102);
    expect(field.product.level).toBe(500);
    expect(field.grid).toEqual({
      numberOfPoints: 6,
      Ni: 3,
      Nj: 2,
      La1: 40,
      Lo1: 260,
      La2: 39.5,
      Lo2: 261,
      Di: 0.5,
      Dj: 0.5,
      scanningMode: 0,
      iScansNegatively: false,
      jScansPositively: false,
    });
    expect(field.hasBitmap).toBe(false);
    expect(Array.from(field.decodeValues())).toEqual([0.5, 1.2, 7, 3, 0, 2.5]);
  });

  it('should leave the level null when the surface is missing', () => {
    const field = fieldFromMessage(message({ productDefinition: { typeOfFirstFixedSurface: 255 } }));

    expect(field.product.level).toBeNull();
  });

  it('should spread packed values through a per-point bitmap', () => {
    const field = fieldFromMessage(
      message({ bitMap: [1, 1, 0, 1, 1, 1], data: [0.5, 1.2, 3, 0, 2.5] })
    );

    expect(field.hasBitmap).toBe(true);
    expect(Array.from(field.decodeValues())).toEqual([0.5, 1.2, NaN, 3, 0, 2.5]);
  });

  it('should read a bitmap given as the packed section bits', () => {
    const field = fieldFromMessage(
      message({ bitMap: { bitMapIndicator: 0, bitMap: Uint8Array.from([0b11011100]) }, data: [0.5, 1.2, 3, 0, 2.5] })
    );

    expect(Array.from(field.decodeValues())).toEqual([0.5, 1.2, NaN, 3, 0, 2.5]);
  });

  it('should mask absent points when values already cover the grid', () => {
    const field = fieldFromMessage(message({ bitMap: [1, 1, 0, 1, 1, 1] }));

    expect(Array.from(field.decodeValues())).toEqual([0.5, 1.2, NaN, 3, 0, 2.5]);
  });

  it('should decode PNG-packed data with the reference value and scale factors', () => {
    const field = fieldFromMessage(
      message({
        dataRepresentation: { referenceValue: 100 },
        data: encodePng16([0, 5, 10, 20, 1, 30]),
      })
    );

    expect(field.packing.template).toBe(41);
    expect(Array.from(field.decodeValues())).toEqual([10, 10.5, 11, 12, 10.1, 13]);
  });

  it('should decode PNG-packed data through a bitmap', () => {
    const field = fieldFromMessage(
      message({ bitMap: [1, 1, 0, 1, 1, 1], data: encodePng16([5, 12, 30, 0, 25]) })
    );

    expect(Array.from(field.decodeValues())).toEqual([0.5, 1.2, NaN, 3, 0, 2.5]);
  });

  it('should convert micro-degree grid angles to degrees', () => {
    const field = fieldFromMessage(
      message({ gridDefinition: { la1: 40_000_000, lo1: 260_000_000, dx: 500_000, dy: 500_000 } })
    );

    expect(field.grid.La1).toBeCloseTo(40, 9);
    expect(field.grid.Lo1).toBeCloseTo(260, 9);
    expect(field.grid.Di).toBeCloseTo(0.5, 9);
  });

  it('should reject a message without a parameter category', () => {
    expect(() => fieldFromMessage(message({ productDefinition: { parameterCategory: undefined } }))).toThrow(
      /parameter category/
    );
  });

  it('should reject grid templates other than regular lat/lon', () => {
    expect(() => fieldFromMessage(message({ gridDefinition: { templateNumber: 30 } }))).toThrow(
      Grib2FormatError
    );
  });

  it('should reject boustrophedonic scanning', () => {
    expect(() => fieldFromMessage(message({ gridDefinition: { scanningMode: 0x10 } }))).toThrow(
      /Boustrophedonic/
    );
  });

  it('should reject a bitmap that does not fit the grid', () => {
    expect(() => fieldFromMessage(message({ bitMap: [1, 0, 1] }))).toThrow(/3 entries for 6 grid points/);
  });

  it('should fail to decode raw bytes that are not PNG', () => {
    const field = fieldFromMessage(message({ data: new Uint8Array(12) }));

    expect(() => field.decodeValues()).toThrow(Grib2FormatError);
  });

  it('should reject a value that is not a message', () => {
    expect(() => fieldFromMessage('GRIB')).toThrow(Grib2FormatError);
  });
});

describe('parseGrib2', () => {
  it('should decode a simple-packed message with a bitmap', () => {
    const [field, ...rest] = parseGrib2(
      buildGrib2Message({ Ni: 3, Nj: 2, La1: 40, Lo1: 260, Di: 0.5, Dj: 0.5, values: [0.5, 1.2, NaN, 3, 0, 2.5] })
    );

    expect(rest).toHaveLength(0);
    expect(field.discipline).toBe(209);
    expect(field.product.parameterCategory).toBe(6);
    expect(field.product.parameterNumber).toBe(1);
    expect(field.grid.Ni).toBe(3);
    expect(field.grid.Nj).toBe(2);
    expect(Array.from(field.decodeValues())).toEqual([0.5, 1.2, NaN, 3, 0, 2.5]);
  });
});

describe('gridAxes', () => {
  it('should step latitude down and longitude east for scan mode 0', () => {
    const { lat, lon } = gridAxes(fieldFromMessage(message()).grid);

    expect(Array.from(lat)).toEqual([40, 39.5]);
    expect(Array.from(lon)).toEqual([260, 260.5, 261]);
  });

  it('should step latitude up when j scans positively', () => {
    const { grid } = fieldFromMessage(message({ gridDefinition: { scanningMode: 0x40 } }));
    const { lat } = gridAxes(grid);

    expect(grid.jScansPositively).toBe(true);
    expect(grid.La2).toBe(40.5);
    expect(Array.from(lat)).toEqual([40, 40.5]);
  });
});
