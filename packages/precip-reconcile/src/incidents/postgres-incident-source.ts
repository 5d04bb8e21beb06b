/**
 * PostgreSQL Incident Source
 *
 * Reads incident rows with node-postgres. The pool is small (one run issues
 * a single query) and is released through close(), which the orchestrator
 * calls on every exit path.
 */

import { Pool, types, type PoolConfig } from 'pg';
import { IncidentSourceError } from '../core/errors.js';
import { createLogger, errorMessage } from '../core/utils/logger.js';
import {
  DEFAULT_INCIDENT_COLUMNS,
  parseIncidentRows,
  type ColumnInfo,
  type IncidentBatch,
  type IncidentColumns,
  type IncidentQuery,
  type IncidentSource,
  type SchemaInspector,
} from './incident-source.js';

const log = createLogger({ module: 'postgres' });

/** pg type OID of `timestamp without time zone` */
const TIMESTAMP_OID = 1114;

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_$]*$/;

/**
 * Quote a possibly schema-qualified identifier ("public.table")
 *
 * @throws IncidentSourceError for anything that is not a plain identifier
 */
export function quoteIdentifier(name: string): string {
  const parts = name.split('.');
  if (parts.length > 2 || parts.some((part) => !IDENTIFIER.test(part))) {
    throw new IncidentSourceError(`Invalid SQL identifier: '${name}'`);
  }
  return parts.map((part) => `"${part}"`).join('.');
}

/**
 * SELECT for the zero / non-zero incident subset
 */
export function buildIncidentQuery(
  table: string,
  valueColumn: string,
  query: IncidentQuery
): { text: string; values: number[] } {
  const comparison = query.predicate === 'zero' ? '= 0.0' : '> 0.0';
  return {
    text: `SELECT * FROM ${quoteIdentifier(table)} WHERE ${quoteIdentifier(valueColumn)} ${comparison} LIMIT $1`,
    values: [query.limit],
  };
}

export interface PostgresIncidentSourceOptions {
  readonly connection: PoolConfig;
  readonly table: string;
  readonly columns?: IncidentColumns;
}

export class PostgresIncidentSource implements IncidentSource, SchemaInspector {
  private readonly pool: Pool;
  private readonly table: string;
  private readonly columns: IncidentColumns;
  private closed = false;

  constructor(options: PostgresIncidentSourceOptions) {
    // Zone-less timestamps stay strings so alignment attaches UTC itself
    // instead of node-postgres reading them in the process time zone.
    types.setTypeParser(TIMESTAMP_OID, (value: string) => value);

    this.pool = new Pool({
      ...options.connection,
      min: 1,
      max: 2,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: 10000,
    });
    this.table = options.table;
    this.columns = options.columns ?? DEFAULT_INCIDENT_COLUMNS;

    this.pool.on('error', (err: Error) => {
      log.error('Unexpected PostgreSQL pool error', {
        error: err.message,
        stack: err.stack,
      });
    });
  }

  async fetchIncidents(query: IncidentQuery): Promise<IncidentBatch> {
    const sql = buildIncidentQuery(this.table, this.columns.value, query);
    log.info('Fetching incidents', { table: this.table, predicate: query.predicate, limit: query.limit });

    let rows: Record<string, unknown>[];
    try {
      const result = await this.pool.query<Record<string, unknown>>(sql.text, sql.values);
      rows = result.rows;
    } catch (error) {
      throw new IncidentSourceError(`Incident query failed: ${errorMessage(error)}`, error);
    }

    const batch = parseIncidentRows(rows, this.columns);
    for (const reject of batch.rejected) {
      log.warn('Skipping malformed incident row', { row: reject.index, reason: reject.reason });
    }
    log.info('Fetched incidents', { rows: rows.length, usable: batch.incidents.length });
    return batch;
  }

  async inspectTableSchema(table: string): Promise<readonly ColumnInfo[]> {
    quoteIdentifier(table);
    const [schema, name] = table.includes('.') ? table.split('.') : [null, table];

    const result = await this.pool.query<{
      column_name: string;
      data_type: string;
      is_nullable: string;
    }>(
      `SELECT column_name, data_type, is_nullable
         FROM information_schema.columns
        WHERE table_name = $1 AND ($2::text IS NULL OR table_schema = $2)
        ORDER BY ordinal_position`,
      [name, schema]
    );

    return result.rows.map((row) => ({
      name: row.column_name,
      dataType: row.data_type,
      isNullable: row.is_nullable === 'YES',
    }));
  }

  async close(): Promise<void> {
    if (this.closed) {
      return;
    }
    this.closed = true;
    await this.pool.end();
  }
}
