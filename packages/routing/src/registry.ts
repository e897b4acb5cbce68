/**
 * Replica Registry
 *
 * One primary and N replicas, each paired with the endpoint that executes
 * queries against it. Configured once and immutable afterwards.
 */

import type { Logger } from '@readroute/logging';
import { ConfigurationError, errorMessage } from './errors.js';
import type { CallOptions, PrimaryEndpoint, QueryEndpoint, ReplicaEndpoint, ReplicaNode } from './endpoint.js';

export interface NodeBinding<E extends QueryEndpoint> {
	readonly node: ReplicaNode;
	readonly endpoint: E;
}

export interface ReplicaRegistryConfig {
	readonly primary: NodeBinding<PrimaryEndpoint>;
	readonly replicas: readonly NodeBinding<ReplicaEndpoint>[];
}

export interface ReplicaRegistry {
	readonly primary: ReplicaNode;
	/** Replicas in configuration order */
	readonly replicas: readonly ReplicaNode[];
	/** @throws ConfigurationError for an unknown id */
	replica(id: string): ReplicaNode;
	primaryEndpoint(): PrimaryEndpoint;
	/** @throws ConfigurationError for an unknown id */
	replicaEndpoint(id: string): ReplicaEndpoint;
	/** Endpoint for any configured node */
	endpointFor(node: ReplicaNode): QueryEndpoint;
	/** Close every endpoint; the first failure is rethrown after all were attempted */
	close(): Promise<void>;
}

/**
 * Create a registry, validating roles and id uniqueness.
 *
 * @throws ConfigurationError on duplicate ids, role mismatches or endpoints bound to the wrong node
 */
export function createReplicaRegistry(config: ReplicaRegistryConfig): ReplicaRegistry {
	const primary = freezeNode(config.primary.node);
	if (primary.role !== 'primary') {
		throw new ConfigurationError(`Node '${primary.id}' is configured as primary but has role '${primary.role}'`);
	}
	assertBinding(config.primary);

	const replicaEndpoints = new Map<string, ReplicaEndpoint>();
	const replicaNodes = new Map<string, ReplicaNode>();
	for (const binding of config.replicas) {
		const node = freezeNode(binding.node);
		if (node.role !== 'replica') {
			throw new ConfigurationError(`Node '${node.id}' is listed as a replica but has role '${node.role}'`);
		}
		if (node.id === primary.id || replicaNodes.has(node.id)) {
			throw new ConfigurationError(`Duplicate node id '${node.id}'`);
		}
		assertBinding(binding);
		replicaNodes.set(node.id, node);
		replicaEndpoints.set(node.id, binding.endpoint);
	}

	const replicas = Object.freeze([...replicaNodes.values()]);

	function replica(id: string): ReplicaNode {
		const node = replicaNodes.get(id);
		if (!node) {
			throw new ConfigurationError(`Unknown replica '${id}'`);
		}
		return node;
	}

	function replicaEndpoint(id: string): ReplicaEndpoint {
		const endpoint = replicaEndpoints.get(id);
		if (!endpoint) {
			throw new ConfigurationError(`Unknown replica '${id}'`);
		}
		return endpoint;
	}

	return {
		primary,
		replicas,
		replica,
		primaryEndpoint: () => config.primary.endpoint,
		replicaEndpoint,
		endpointFor(node) {
			return node.role === 'primary' ? config.primary.endpoint : replicaEndpoint(node.id);
		},
		async close() {
			const endpoints: QueryEndpoint[] = [config.primary.endpoint, ...replicaEndpoints.values()];
			const results = await Promise.allSettled(endpoints.map((e) => e.close()));
			const failure = results.find((r): r is PromiseRejectedResult => r.status === 'rejected');
			if (failure) {
				throw failure.reason;
			}
		},
	};
}

function freezeNode(node: ReplicaNode): ReplicaNode {
	if (!node.id.trim()) {
		throw new ConfigurationError('Node id must not be blank');
	}
	return Object.freeze({
		id: node.id,
		role: node.role,
		endpoint: Object.freeze({
			...node.endpoint,
			credentials: Object.freeze({ ...node.endpoint.credentials }),
		}),
	});
}

function assertBinding(binding: NodeBinding<QueryEndpoint>): void {
	if (binding.endpoint.nodeId !== binding.node.id) {
		throw new ConfigurationError(
			`Endpoint for '${binding.endpoint.nodeId}' is bound to node '${binding.node.id}'`,
		);
	}
}

/**
 * Ask every node whether it is in recovery and compare with its configured
 * role: a primary must not be, a replica must be.
 *
 * @throws ConfigurationError listing every mismatching node
 */
export async function verifyRoles(registry: ReplicaRegistry, logger: Logger, options: CallOptions = {}): Promise<void> {
	const nodes = [registry.primary, ...registry.replicas];
	const mismatches: string[] = [];

	for (const node of nodes) {
		const inRecovery = await registry.endpointFor(node).isInRecovery(options);
		const reported = inRecovery ? 'replica' : 'primary';
		if (reported !== node.role) {
			mismatches.push(`${node.id} is configured as ${node.role} but reports ${reported}`);
		}
	}

	if (mismatches.length > 0) {
		logger.error({ mismatches }, 'Node role verification failed');
		throw new ConfigurationError(`Node roles do not match configuration: ${mismatches.join('; ')}`);
	}
	logger.debug({ nodes: nodes.map((n) => n.id) }, 'Node roles verified');
}

/**
 * Log-friendly summary of a failure on a node.
 */
export function describeFailure(node: ReplicaNode, error: unknown): string {
	return `${node.role} '${node.id}': ${errorMessage(error)}`;
}
