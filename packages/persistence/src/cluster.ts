/**
 * Cluster wiring: one pool per configured URL, bound into a replica registry.
 * Pools connect lazily, so nothing touches the network until the first query.
 */

import type { Logger } from '@readroute/logging';
import { createReplicaRegistry, parseEndpointUrl, type ReplicaNode, type ReplicaRegistry } from '@readroute/routing';
import { createDatabase } from './connection.js';
import {
	createPrimaryEndpoint,
	createReplicaEndpoint,
	type PostgresPrimaryEndpoint,
	type PostgresReplicaEndpoint,
} from './postgres-endpoint.js';

export interface ClusterConfig {
	readonly primaryUrl: string;
	/** One URL per replica, named replica1..replicaN in order */
	readonly replicaUrls: readonly string[];
	/** Pool size per node (default: 10) */
	readonly maxConnections?: number | undefined;
	/** Connection timeout in seconds */
	readonly connectTimeout?: number | undefined;
	/** Server-side statement timeout in milliseconds */
	readonly statementTimeoutMs?: number | undefined;
	/** Log every statement at debug level */
	readonly logQueries?: boolean | undefined;
}

export interface PostgresCluster {
	readonly registry: ReplicaRegistry;
	readonly primary: PostgresPrimaryEndpoint;
	readonly replicas: readonly PostgresReplicaEndpoint[];
}

export function replicaNodeId(index: number): string {
	return `replica${index + 1}`;
}

export function connectCluster(config: ClusterConfig, logger: Logger): PostgresCluster {
	const connect = (url: string) =>
		createDatabase({
			url,
			maxConnections: config.maxConnections,
			connectTimeout: config.connectTimeout,
			statementTimeoutMs: config.statementTimeoutMs,
			queryLogger: config.logQueries ? logger : undefined,
		});

	const primaryNode: ReplicaNode = { id: 'primary', role: 'primary', endpoint: parseEndpointUrl(config.primaryUrl) };
	const primary = createPrimaryEndpoint(primaryNode.id, connect(config.primaryUrl), logger);

	const replicaBindings = config.replicaUrls.map((url, i) => {
		const node: ReplicaNode = { id: replicaNodeId(i), role: 'replica', endpoint: parseEndpointUrl(url) };
		return { node, endpoint: createReplicaEndpoint(node.id, connect(url), logger) };
	});

	const registry = createReplicaRegistry({
		primary: { node: primaryNode, endpoint: primary },
		replicas: replicaBindings,
	});

	logger.info({ primary: primaryNode.id, replicas: replicaBindings.map((b) => b.node.id) }, 'Cluster configured');
	return { registry, primary, replicas: replicaBindings.map((b) => b.endpoint) };
}
