/**
 * Routing Strategy Contract
 *
 * A strategy owns two decisions: what to remember about a session after a
 * write, and which single node serves a session's next read. Writes always
 * go to the primary; that part is done by the facade, not by strategies.
 */

import { ConfigurationError } from './errors.js';
import type { CallOptions, ReplicaNode } from './endpoint.js';
import type { ReplicaRegistry } from './registry.js';
import type { Session } from './session-store.js';

export type StrategyName = 'time' | 'position' | 'sticky';

/**
 * Exactly one target node plus a human readable reason.
 */
export interface RoutingDecision {
	readonly target: ReplicaNode;
	readonly label: string;
}

export interface RoutingStrategy {
	readonly name: StrategyName;
	/**
	 * Called after a write committed on the primary, while the session lock is
	 * held. Returns the session snapshot to store.
	 */
	recordWrite(session: Session, options?: CallOptions): Promise<Session>;
	/** Choose the node for the session's next read */
	selectTarget(session: Session, options?: CallOptions): Promise<RoutingDecision>;
}

export const RoutingLabel = {
	primaryRequested: 'PRIMARY (requested)',
	primaryRecentWrite: 'PRIMARY (recent write)',
	primaryReplicaLagging: 'PRIMARY (replica lagging)',
	primaryPositionUnavailable: 'PRIMARY (replica position unavailable)',
	replica: (id: string) => `REPLICA ${id}`,
	replicaCaughtUp: (id: string) => `REPLICA ${id} (caught up)`,
	replicaSticky: (id: string) => `REPLICA ${id} (sticky)`,
} as const;

/**
 * The replica a read may use: the requested one, else the first configured.
 *
 * @throws ConfigurationError when no replica is configured or the id is unknown
 */
export function resolvePreferredReplica(registry: ReplicaRegistry, preferredReplica?: string | undefined): ReplicaNode {
	if (preferredReplica !== undefined) {
		return registry.replica(preferredReplica);
	}
	const first = registry.replicas[0];
	if (!first) {
		throw new ConfigurationError('No replicas configured');
	}
	return first;
}

export function primaryDecision(registry: ReplicaRegistry, label: string): RoutingDecision {
	return { target: registry.primary, label };
}
