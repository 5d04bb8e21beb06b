/**
 * Incident Source
 *
 * The relational store is an external collaborator; the comparison run sees
 * it only through this interface. Rows are validated with zod at the seam so
 * downstream code can rely on numeric coordinates and a timestamp value.
 *
 * @module incidents/incident-source
 */

import { z } from 'zod';
import type { Incident, ValuePredicate } from '../core/types.js';

export interface IncidentQuery {
  readonly predicate: ValuePredicate;
  /** Maximum rows returned */
  readonly limit: number;
}

/**
 * Which row columns carry the fields the comparison needs
 */
export interface IncidentColumns {
  readonly id: string;
  readonly lat: string;
  readonly lon: string;
  readonly timestamp: string;
  /** Column the zero / non-zero predicate applies to */
  readonly value: string;
}

export const DEFAULT_INCIDENT_COLUMNS: IncidentColumns = {
  id: 'incident_id',
  lat: 'incident_lat',
  lon: 'incident_lon',
  timestamp: 'mrms_timestamp',
  value: 'data_value',
};

export interface ColumnInfo {
  readonly name: string;
  readonly dataType: string;
  readonly isNullable: boolean;
}

export interface RejectedRow {
  readonly index: number;
  readonly reason: string;
}

export interface IncidentBatch {
  readonly incidents: readonly Incident[];
  readonly rejected: readonly RejectedRow[];
}

export interface IncidentSource {
  fetchIncidents(query: IncidentQuery): Promise<IncidentBatch>;
  /** Release pooled connections; safe to call more than once */
  close(): Promise<void>;
}

export interface SchemaInspector {
  inspectTableSchema(table: string): Promise<readonly ColumnInfo[]>;
}

// ============================================================================
// Row validation
// ============================================================================

const NUMERIC_STRING = /^\s*[-+]?(\d+(\.\d*)?|\.\d+)([eE][-+]?\d+)?\s*$/;

/** numeric/decimal columns arrive from pg as strings */
const coordinateSchema = z.union([
  z.number().finite(),
  z
    .string()
    .regex(NUMERIC_STRING, 'not a number')
    .transform((value) => Number(value)),
]);

const idSchema = z.union([
  z.string().min(1),
  z.number().finite().transform((value) => String(value)),
  z.bigint().transform((value) => value.toString()),
]);

const timestampSchema = z.union([z.string().min(1), z.date()]);

function describeIssue(field: string, error: z.ZodError): string {
  const issue = error.issues[0];
  return `${field}: ${issue ? issue.message : 'invalid'}`;
}

/**
 * Validate one source row into an Incident
 *
 * @returns the incident, or a reason string when the row is unusable
 */
export function parseIncidentRow(
  row: Readonly<Record<string, unknown>>,
  columns: IncidentColumns = DEFAULT_INCIDENT_COLUMNS
): Incident | string {
  const id = idSchema.safeParse(row[columns.id]);
  if (!id.success) return describeIssue(columns.id, id.error);

  const lat = coordinateSchema.safeParse(row[columns.lat]);
  if (!lat.success) return describeIssue(columns.lat, lat.error);

  const lon = coordinateSchema.safeParse(row[columns.lon]);
  if (!lon.success) return describeIssue(columns.lon, lon.error);

  const timestamp = timestampSchema.safeParse(row[columns.timestamp]);
  if (!timestamp.success) return describeIssue(columns.timestamp, timestamp.error);

  if (lat.data < -90 || lat.data > 90) {
    return `${columns.lat}: latitude ${lat.data} out of range`;
  }

  return {
    id: id.data,
    lat: lat.data,
    lon: lon.data,
    timestamp: timestamp.data,
    row,
  };
}

/**
 * Validate a batch of rows, separating usable incidents from rejects
 */
export function parseIncidentRows(
  rows: readonly Readonly<Record<string, unknown>>[],
  columns: IncidentColumns = DEFAULT_INCIDENT_COLUMNS
): IncidentBatch {
  const incidents: Incident[] = [];
  const rejected: RejectedRow[] = [];

  rows.forEach((row, index) => {
    const parsed = parseIncidentRow(row, columns);
    if (typeof parsed === 'string') {
      rejected.push({ index, reason: parsed });
    } else {
      incidents.push(parsed);
    }
  });

  return { incidents, rejected };
}
