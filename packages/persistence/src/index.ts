/**
 * @readroute/persistence
 *
 * PostgreSQL implementation of the routing endpoints using postgres.js and
 * DrizzleORM.
 *
 * @example
 * ```typescript
 * import { connectCluster, runMigrations } from '@readroute/persistence';
 *
 * await runMigrations(env.PRIMARY_URL, logger);
 * const cluster = connectCluster({ primaryUrl: env.PRIMARY_URL, replicaUrls: env.REPLICA_URLS }, logger);
 * const router = createRoutingFacade({ registry: cluster.registry, strategy, logger });
 * ```
 */

// Database connection
export { createDatabase, DEFAULT_STATEMENT_TIMEOUT_MS, type Database, type DatabaseConfig } from './connection.js';

// Migrations
export { runMigrations, MIGRATIONS_FOLDER } from './migrate.js';

// Endpoints
export {
	PostgresPrimaryEndpoint,
	PostgresReplicaEndpoint,
	createPrimaryEndpoint,
	createReplicaEndpoint,
	BULK_INSERT_PREFIX,
} from './postgres-endpoint.js';

export { connectCluster, replicaNodeId, type ClusterConfig, type PostgresCluster } from './cluster.js';

// Error mapping
export { toRoutingError, driverErrorCode, isConnectionCode } from './errors.js';

// Row mapping
export { readLsn, toRecordRow, toReplicaStatus, type ReplicaStatus } from './rows.js';

// Schema
export * from './schema/index.js';
