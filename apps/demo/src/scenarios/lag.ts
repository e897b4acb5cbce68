import type { Logger } from '@readroute/logging';
import type { ReplicaStatus } from '@readroute/persistence';
import type { CallOptions } from '@readroute/routing';

/**
 * What the lag utility needs from the primary.
 */
export interface LagSource {
	bulkInsert(count: number, options?: CallOptions): Promise<number>;
	replicationStatus(options?: CallOptions): Promise<ReplicaStatus[]>;
}

/**
 * Flood the primary with rows, then report how far each standby is behind.
 */
export async function runLagScenario(primary: LagSource, rows: number, logger: Logger): Promise<ReplicaStatus[]> {
	logger.info({ rows }, 'Inserting rows to build up replication lag');
	const inserted = await primary.bulkInsert(rows);

	const statuses = await primary.replicationStatus();
	if (statuses.length === 0) {
		logger.warn({ inserted }, 'No standbys connected to the primary');
	}
	for (const status of statuses) {
		logger.info(
			{
				replica: status.applicationName,
				state: status.state,
				lagBytes: status.lagBytes?.toString() ?? null,
				replayLagSeconds: status.replayLagSeconds,
			},
			`${status.applicationName}: ${status.lagBytes ?? 'unknown'} bytes behind`,
		);
	}
	return statuses;
}
