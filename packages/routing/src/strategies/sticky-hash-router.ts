/**
 * Sticky Hash Router
 *
 * Each session key maps deterministically onto one replica, so a session's
 * successive reads see one replica's monotonically advancing state. This does
 * NOT give read-your-own-writes: the chosen replica may still lag the write.
 *
 * Default assignment is MD5(key) mod N. Changing N remaps nearly every key;
 * use `assignment: 'ring'` when replica membership changes.
 */

import { createHash } from 'node:crypto';
import type { Logger } from '@readroute/logging';
import type { ReplicaNode } from '../endpoint.js';
import { ConfigurationError } from '../errors.js';
import type { ReplicaRegistry } from '../registry.js';
import type { Session } from '../session-store.js';
import { RoutingLabel, type RoutingDecision, type RoutingStrategy } from '../strategy.js';
import { DEFAULT_VIRTUAL_NODES, createHashRing, type HashRing } from './hash-ring.js';

export type StickyAssignment = 'modulo' | 'ring';

export interface StickyHashRouterConfig {
	/** Default: modulo */
	assignment?: StickyAssignment;
	/** Virtual nodes per replica for ring assignment (default: 160) */
	virtualNodes?: number;
}

/**
 * MD5 digest of the key as an unsigned 128-bit integer.
 */
export function keyHash(sessionKey: string): bigint {
	return BigInt(`0x${createHash('md5').update(sessionKey, 'utf8').digest('hex')}`);
}

/**
 * Pick `replicaSet[hash(sessionKey) mod len]`.
 *
 * @throws ConfigurationError if the set is empty
 */
export function selectReplica<T>(sessionKey: string, replicaSet: readonly T[]): T {
	if (replicaSet.length === 0) {
		throw new ConfigurationError('Cannot select a replica from an empty replica set');
	}
	const index = Number(keyHash(sessionKey) % BigInt(replicaSet.length));
	const replica = replicaSet[index];
	if (replica === undefined) {
		throw new ConfigurationError(`Replica index ${index} outside set of ${replicaSet.length}`);
	}
	return replica;
}

export class StickyHashRouter implements RoutingStrategy {
	readonly name = 'sticky' as const;
	readonly assignment: StickyAssignment;
	private readonly ring: HashRing<ReplicaNode> | undefined;
	private readonly logger: Logger;

	/**
	 * @throws ConfigurationError if the registry has no replicas
	 */
	constructor(
		private readonly registry: ReplicaRegistry,
		config: StickyHashRouterConfig,
		logger: Logger,
	) {
		if (registry.replicas.length === 0) {
			throw new ConfigurationError('Sticky routing needs at least one replica');
		}
		this.assignment = config.assignment ?? 'modulo';
		this.ring =
			this.assignment === 'ring'
				? createHashRing(registry.replicas, (node) => node.id, config.virtualNodes ?? DEFAULT_VIRTUAL_NODES)
				: undefined;
		this.logger = logger.child({ component: 'StickyHashRouter', assignment: this.assignment });
	}

	/**
	 * Writes leave no trace: assignment depends on the key alone.
	 */
	async recordWrite(session: Session): Promise<Session> {
		return session;
	}

	replicaFor(sessionKey: string): ReplicaNode {
		return this.ring ? this.ring.lookup(sessionKey) : selectReplica(sessionKey, this.registry.replicas);
	}

	async selectTarget(session: Session): Promise<RoutingDecision> {
		const replica = this.replicaFor(session.sessionId);
		this.logger.trace({ sessionId: session.sessionId, replica: replica.id }, 'Sticky assignment');
		return { target: replica, label: RoutingLabel.replicaSticky(replica.id) };
	}
}
