/**
 * Time-Based Router
 *
 * Reads go to the primary for `thresholdMs` after a session's last write and
 * to a replica otherwise. This is approximate consistency only: a replica that
 * caught up early is skipped (false positive) and a replica lagging longer
 * than the threshold is still used (false negative).
 */

import type { Logger } from '@readroute/logging';
import type { NodeRole, ReplicaNode } from '../endpoint.js';
import { ConfigurationError } from '../errors.js';
import type { ReplicaRegistry } from '../registry.js';
import type { Session } from '../session-store.js';
import {
	RoutingLabel,
	primaryDecision,
	resolvePreferredReplica,
	type RoutingDecision,
	type RoutingStrategy,
} from '../strategy.js';

export interface Clock {
	/** Epoch millis */
	now(): number;
}

export const systemClock: Clock = {
	now: () => Date.now(),
};

export interface TimeBasedRouterConfig {
	/** How long reads stay on the primary after a write (default: 5000) */
	thresholdMs?: number;
	/** Replica used once the window has passed (default: first configured) */
	preferredReplica?: string;
	clock?: Clock;
}

export const DEFAULT_WRITE_THRESHOLD_MS = 5000;

export class TimeBasedRouter implements RoutingStrategy {
	readonly name = 'time' as const;
	readonly thresholdMs: number;
	readonly replica: ReplicaNode;
	private readonly clock: Clock;
	private readonly logger: Logger;

	constructor(
		private readonly registry: ReplicaRegistry,
		config: TimeBasedRouterConfig,
		logger: Logger,
	) {
		this.thresholdMs = config.thresholdMs ?? DEFAULT_WRITE_THRESHOLD_MS;
		if (!Number.isFinite(this.thresholdMs) || this.thresholdMs < 0) {
			throw new ConfigurationError(`thresholdMs must be a non-negative number, got ${this.thresholdMs}`);
		}
		this.replica = resolvePreferredReplica(registry, config.preferredReplica);
		this.clock = config.clock ?? systemClock;
		this.logger = logger.child({ component: 'TimeBasedRouter' });
	}

	/**
	 * Stamp the session with the current time.
	 */
	async recordWrite(session: Session): Promise<Session> {
		return { ...session, lastWriteTime: this.clock.now() };
	}

	/**
	 * Primary iff the last write is younger than the threshold.
	 */
	target(session: Session): NodeRole {
		if (session.lastWriteTime === undefined) {
			return 'replica';
		}
		const elapsed = this.clock.now() - session.lastWriteTime;
		return elapsed < this.thresholdMs ? 'primary' : 'replica';
	}

	async selectTarget(session: Session): Promise<RoutingDecision> {
		if (this.target(session) === 'primary') {
			return primaryDecision(this.registry, RoutingLabel.primaryRecentWrite);
		}
		this.logger.trace({ sessionId: session.sessionId, replica: this.replica.id }, 'Write window elapsed');
		return { target: this.replica, label: RoutingLabel.replica(this.replica.id) };
	}
}
