/**
 * Remote artifact locations
 *
 * NetCDF: an HTTP raster service keyed by (product code, YYYYMMDDHHMM),
 * returning the payload inline.
 * GRIB2: gzip objects in public object storage keyed by date folder and
 * file stamp, e.g.
 *   CONUS/PrecipRate_00.00/20240601/MRMS_PrecipRate_00.00_20240601-120000.grib2.gz
 *
 * @module acquisition/sources
 */

import { join } from 'node:path';
import { formatCompactStamp, formatFileStamp, formatPathDate } from '../alignment/timestamp.js';

export interface NetcdfSourceConfig {
  readonly baseUrl: string;
  readonly productCode: string;
}

export interface Grib2ParameterId {
  readonly discipline: number;
  readonly category: number;
  readonly number: number;
}

export interface Grib2SourceConfig {
  readonly bucketUrl: string;
  readonly prefix: string;
  readonly product: string;
  readonly parameter: Grib2ParameterId;
}

export function netcdfUrl(config: NetcdfSourceConfig, epochMs: number): string {
  const url = new URL(config.baseUrl);
  url.searchParams.set('dstr', formatCompactStamp(epochMs));
  url.searchParams.set('prod', config.productCode);
  return url.toString();
}

export function grib2ObjectName(config: Grib2SourceConfig, epochMs: number): string {
  return `${config.product}_${formatFileStamp(epochMs)}.grib2.gz`;
}

export function grib2Url(config: Grib2SourceConfig, epochMs: number): string {
  const base = config.bucketUrl.replace(/\/+$/, '');
  const prefix = config.prefix.replace(/^\/+|\/+$/g, '');
  return `${base}/${prefix}/${formatPathDate(epochMs)}/${grib2ObjectName(config, epochMs)}`;
}

/**
 * Local path of a downloaded GRIB2 object; one file per timestamp
 */
export function grib2LocalPath(directory: string, config: Grib2SourceConfig, epochMs: number): string {
  return join(directory, grib2ObjectName(config, epochMs));
}
