/**
 * Builds the PostgreSQL incident source from configuration
 */

import type { IncidentSource, SchemaInspector } from '../../incidents/incident-source.js';
import { PostgresIncidentSource } from '../../incidents/postgres-incident-source.js';
import { loadDatabaseConfig, type CLIConfig } from './config.js';

export type IncidentStore = IncidentSource & SchemaInspector;

export type IncidentStoreFactory = (config: CLIConfig) => IncidentStore;

export const createPostgresStore: IncidentStoreFactory = (config) => {
  const db = loadDatabaseConfig();
  return new PostgresIncidentSource({
    connection: {
      host: db.host,
      port: db.port,
      database: db.database,
      user: db.user,
      password: db.password,
    },
    table: config.incidents.table,
    columns: config.incidents.columns,
  });
};
