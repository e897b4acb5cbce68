/**
 * PostgreSQL Endpoints
 *
 * Endpoint capabilities backed by one postgres.js pool per node. Every
 * statement runs as a raw postgres.js query so an aborted call can cancel it
 * on the server; the drizzle schema types the inserted values.
 */

import type postgres from 'postgres';
import type { Logger } from '@readroute/logging';
import {
	QueryError,
	type CallOptions,
	type LogPosition,
	type NewRecord,
	type PrimaryEndpoint,
	type QueryEndpoint,
	type RecordQuery,
	type RecordRow,
	type ReplicaEndpoint,
} from '@readroute/routing';
import type { Database } from './connection.js';
import { toRoutingError } from './errors.js';
import {
	readLsn,
	toRecordRow,
	toReplicaStatus,
	type RawLsnRow,
	type RawRecordRow,
	type RawReplicationRow,
	type ReplicaStatus,
} from './rows.js';
import type { NewReplicationRecordRecord } from './schema/index.js';

export const BULK_INSERT_PREFIX = 'Lag test data ';

abstract class PostgresEndpoint implements QueryEndpoint {
	protected readonly logger: Logger;

	constructor(
		readonly nodeId: string,
		protected readonly database: Database,
		logger: Logger,
	) {
		this.logger = logger.child({ component: 'PostgresEndpoint', node: nodeId });
	}

	selectRecent(query: RecordQuery, options: CallOptions = {}): Promise<RecordRow[]> {
		const sql = this.database.client;
		const filter = query.ownerId === undefined ? sql`` : sql`WHERE owner_id = ${query.ownerId}`;
		return this.run(async () => {
			const rows = await this.execute(
				sql<RawRecordRow[]>`
					SELECT id, data, owner_id, created_at
					FROM replication_records
					${filter}
					ORDER BY id DESC
					LIMIT ${query.limit}
				`,
				options,
			);
			return rows.map(toRecordRow);
		});
	}

	isInRecovery(options: CallOptions = {}): Promise<boolean> {
		const sql = this.database.client;
		return this.run(async () => {
			const [row] = await this.execute(sql<{ in_recovery: boolean }[]>`SELECT pg_is_in_recovery() AS in_recovery`, options);
			if (!row) {
				throw new QueryError(`pg_is_in_recovery() returned no row on '${this.nodeId}'`, { endpointId: this.nodeId });
			}
			return row.in_recovery;
		});
	}

	close(): Promise<void> {
		return this.run(() => this.database.close());
	}

	/**
	 * Map every failure of `fn` onto a RoutingError for this node.
	 */
	protected async run<T>(fn: () => Promise<T>): Promise<T> {
		try {
			return await fn();
		} catch (error) {
			throw toRoutingError(error, this.nodeId, this.database.statementTimeoutMs);
		}
	}

	/**
	 * Execute a pending query, cancelling it on the server if `signal` aborts.
	 */
	protected async execute<T extends readonly (object | undefined)[]>(
		query: postgres.PendingQuery<T>,
		options: CallOptions,
	): Promise<postgres.RowList<T>> {
		const { signal } = options;
		if (signal?.aborted) {
			throw new QueryError(`Query on '${this.nodeId}' cancelled before it started`, {
				endpointId: this.nodeId,
				cause: signal.reason,
			});
		}

		const onAbort = () => {
			this.logger.debug('Cancelling in-flight query');
			query.cancel();
		};
		signal?.addEventListener('abort', onAbort, { once: true });
		try {
			return await query;
		} finally {
			signal?.removeEventListener('abort', onAbort);
		}
	}

	protected async readPosition(
		source: string,
		query: postgres.PendingQuery<RawLsnRow[]>,
		options: CallOptions,
	): Promise<LogPosition> {
		const rows = await this.execute(query, options);
		return readLsn(rows[0], this.nodeId, source);
	}
}

export class PostgresPrimaryEndpoint extends PostgresEndpoint implements PrimaryEndpoint {
	insertRecord(record: NewRecord, options: CallOptions = {}): Promise<number> {
		const sql = this.database.client;
		const values: NewReplicationRecordRecord = { data: record.data, ownerId: record.ownerId ?? null };
		return this.run(async () => {
			const [row] = await this.execute(
				sql<{ id: number }[]>`
					INSERT INTO replication_records (data, owner_id)
					VALUES (${values.data}, ${values.ownerId ?? null})
					RETURNING id
				`,
				options,
			);
			if (!row) {
				throw new QueryError(`Insert on '${this.nodeId}' returned no id`, { endpointId: this.nodeId });
			}
			return row.id;
		});
	}

	currentWritePosition(options: CallOptions = {}): Promise<LogPosition> {
		const sql = this.database.client;
		return this.run(() =>
			this.readPosition('pg_current_wal_lsn', sql<RawLsnRow[]>`SELECT pg_current_wal_lsn()::text AS lsn`, options),
		);
	}

	/**
	 * Connected standbys as reported by pg_stat_replication.
	 */
	replicationStatus(options: CallOptions = {}): Promise<ReplicaStatus[]> {
		const sql = this.database.client;
		return this.run(async () => {
			const rows = await this.execute(
				sql<RawReplicationRow[]>`
					SELECT
						application_name,
						client_addr::text AS client_addr,
						state,
						pg_current_wal_lsn()::text AS current_lsn,
						replay_lsn::text AS replay_lsn,
						EXTRACT(EPOCH FROM replay_lag)::float8 AS replay_lag_seconds
					FROM pg_stat_replication
					ORDER BY application_name
				`,
				options,
			);
			return rows.map(toReplicaStatus);
		});
	}

	/**
	 * Insert `count` generated rows in one server-side statement.
	 *
	 * @returns the number of rows inserted
	 */
	bulkInsert(count: number, options: CallOptions = {}): Promise<number> {
		if (!Number.isInteger(count) || count < 1) {
			return Promise.reject(new QueryError(`Bulk insert count must be a positive integer, got ${count}`));
		}
		const sql = this.database.client;
		return this.run(async () => {
			const result = await this.execute(
				sql`
					INSERT INTO replication_records (data)
					SELECT ${BULK_INSERT_PREFIX}::text || g::text
					FROM generate_series(1, ${count}) AS g
				`,
				options,
			);
			this.logger.info({ rows: result.count }, 'Bulk insert committed');
			return result.count;
		});
	}
}

export class PostgresReplicaEndpoint extends PostgresEndpoint implements ReplicaEndpoint {
	lastReplayPosition(options: CallOptions = {}): Promise<LogPosition> {
		const sql = this.database.client;
		return this.run(() =>
			this.readPosition(
				'pg_last_wal_replay_lsn',
				sql<RawLsnRow[]>`SELECT pg_last_wal_replay_lsn()::text AS lsn`,
				options,
			),
		);
	}
}

export function createPrimaryEndpoint(nodeId: string, database: Database, logger: Logger): PostgresPrimaryEndpoint {
	return new PostgresPrimaryEndpoint(nodeId, database, logger);
}

export function createReplicaEndpoint(nodeId: string, database: Database, logger: Logger): PostgresReplicaEndpoint {
	return new PostgresReplicaEndpoint(nodeId, database, logger);
}
