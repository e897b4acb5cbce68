/**
 * Mapping from raw result rows to routing types.
 */

import { LogPosition, PositionUnavailableError, errorMessage, type RecordRow } from '@readroute/routing';

export interface RawRecordRow {
	readonly id: number;
	readonly data: string;
	readonly owner_id: string | null;
	readonly created_at: Date;
}

export interface RawLsnRow {
	readonly lsn: string | null;
}

export interface RawReplicationRow {
	readonly application_name: string;
	readonly client_addr: string | null;
	readonly state: string | null;
	readonly current_lsn: string;
	readonly replay_lsn: string | null;
	readonly replay_lag_seconds: number | null;
}

/**
 * One row of pg_stat_replication as seen from the primary.
 */
export interface ReplicaStatus {
	readonly applicationName: string;
	readonly clientAddress: string | null;
	/** e.g. 'streaming', 'catchup' */
	readonly state: string | null;
	readonly replayPosition: LogPosition | undefined;
	/** Bytes of log written on the primary but not yet replayed */
	readonly lagBytes: bigint | undefined;
	/** Seconds between a commit and its replay, null while idle */
	readonly replayLagSeconds: number | null;
}

export function toRecordRow(raw: RawRecordRow): RecordRow {
	return { id: raw.id, data: raw.data, ownerId: raw.owner_id, createdAt: raw.created_at };
}

/**
 * Parse the text of an `lsn` column.
 *
 * @throws PositionUnavailableError when the row is missing, null or malformed
 */
export function readLsn(row: RawLsnRow | undefined, nodeId: string, source: string): LogPosition {
	const text = row?.lsn;
	if (text === undefined || text === null) {
		throw new PositionUnavailableError(`${source}() returned no position on '${nodeId}'`, { endpointId: nodeId });
	}
	try {
		return LogPosition.parse(text);
	} catch (cause) {
		throw new PositionUnavailableError(`${source}() on '${nodeId}': ${errorMessage(cause)}`, {
			endpointId: nodeId,
			cause,
		});
	}
}

export function toReplicaStatus(raw: RawReplicationRow): ReplicaStatus {
	const current = LogPosition.parse(raw.current_lsn);
	const replayPosition = raw.replay_lsn === null ? undefined : LogPosition.parse(raw.replay_lsn);
	return {
		applicationName: raw.application_name,
		clientAddress: raw.client_addr,
		state: raw.state,
		replayPosition,
		lagBytes: replayPosition && current.bytesAhead(replayPosition),
		replayLagSeconds: raw.replay_lag_seconds,
	};
}
