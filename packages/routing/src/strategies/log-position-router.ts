/**
 * Log-Position Router
 *
 * After each write the session remembers the primary's write position. A read
 * may use a replica only if that replica has replayed at least that far.
 *
 * The guarantee is exact with two caveats:
 * - the replay position is read at decision time, and the read runs slightly
 *   later. Replay is monotonic, so a replica that passed the check still
 *   contains the write when the read arrives.
 * - a write issued by another caller between check and read is not covered.
 *
 * Whenever a replica's position cannot be read (error, timeout, malformed
 * answer) the replica is treated as not caught up.
 */

import { ResultAsync } from 'neverthrow';
import type { Logger } from '@readroute/logging';
import type { CallOptions, ReplicaNode } from '../endpoint.js';
import { PositionUnavailableError, errorMessage, isRoutingError } from '../errors.js';
import { LogPosition } from '../position.js';
import type { ReplicaRegistry } from '../registry.js';
import type { Session } from '../session-store.js';
import {
	RoutingLabel,
	primaryDecision,
	resolvePreferredReplica,
	type RoutingDecision,
	type RoutingStrategy,
} from '../strategy.js';
import { assertTimeoutMs, withTimeout } from '../timeout.js';

export interface LogPositionRouterConfig {
	/** Deadline for reading a replica's replay position (default: 1000) */
	positionCheckTimeoutMs?: number;
	/** Deadline for reading the primary's write position (default: 5000) */
	writePositionTimeoutMs?: number;
	/** Replica checked by selectTarget (default: first configured) */
	preferredReplica?: string;
}

export const DEFAULT_POSITION_CHECK_TIMEOUT_MS = 1000;
export const DEFAULT_WRITE_POSITION_TIMEOUT_MS = 5000;

/**
 * Stored when the primary's position could not be captured after a write.
 * No replica can reach it, so the session reads from the primary until its
 * next write records a real position.
 */
export const UNREACHABLE_POSITION = LogPosition.fromBigInt(0xffffffffffffffffn);

export type CatchUpVerdict =
	| { readonly status: 'caught_up'; readonly replayPosition: LogPosition | undefined }
	| { readonly status: 'lagging'; readonly replayPosition: LogPosition; readonly bytesBehind: bigint }
	| { readonly status: 'unavailable'; readonly error: PositionUnavailableError };

export class LogPositionRouter implements RoutingStrategy {
	readonly name = 'position' as const;
	readonly replica: ReplicaNode;
	private readonly positionCheckTimeoutMs: number;
	private readonly writePositionTimeoutMs: number;
	private readonly logger: Logger;

	constructor(
		private readonly registry: ReplicaRegistry,
		config: LogPositionRouterConfig,
		logger: Logger,
	) {
		this.positionCheckTimeoutMs = assertTimeoutMs(
			'positionCheckTimeoutMs',
			config.positionCheckTimeoutMs ?? DEFAULT_POSITION_CHECK_TIMEOUT_MS,
		);
		this.writePositionTimeoutMs = assertTimeoutMs(
			'writePositionTimeoutMs',
			config.writePositionTimeoutMs ?? DEFAULT_WRITE_POSITION_TIMEOUT_MS,
		);
		this.replica = resolvePreferredReplica(registry, config.preferredReplica);
		this.logger = logger.child({ component: 'LogPositionRouter' });
	}

	/**
	 * Capture the primary's current write position onto the session. Must run
	 * after the write committed. If the position cannot be read the session is
	 * pinned to the primary (see UNREACHABLE_POSITION) instead of failing the
	 * already committed write.
	 */
	async recordWrite(session: Session, options: CallOptions = {}): Promise<Session> {
		const primary = this.registry.primary;
		const result = await ResultAsync.fromPromise(
			withTimeout(
				(signal) => this.registry.primaryEndpoint().currentWritePosition({ signal }),
				this.writePositionTimeoutMs,
				() =>
					new PositionUnavailableError(
						`Write position of '${primary.id}' not read within ${this.writePositionTimeoutMs}ms`,
						{ endpointId: primary.id },
					),
				options.signal,
			),
			(error) => toPositionUnavailable(primary, error),
		);

		if (result.isErr()) {
			this.logger.warn(
				{ sessionId: session.sessionId, err: result.error },
				'Write position unavailable, pinning session to primary',
			);
			return { ...session, lastWritePosition: UNREACHABLE_POSITION };
		}

		this.logger.debug(
			{ sessionId: session.sessionId, position: result.value.toString() },
			'Recorded write position',
		);
		return { ...session, lastWritePosition: result.value };
	}

	/**
	 * Read a replica's last replayed position. Never throws.
	 */
	readReplayPosition(replica: ReplicaNode, options: CallOptions = {}): ResultAsync<LogPosition, PositionUnavailableError> {
		return ResultAsync.fromPromise(
			withTimeout(
				(signal) => this.registry.replicaEndpoint(replica.id).lastReplayPosition({ signal }),
				this.positionCheckTimeoutMs,
				() =>
					new PositionUnavailableError(
						`Replay position of '${replica.id}' not read within ${this.positionCheckTimeoutMs}ms`,
						{ endpointId: replica.id },
					),
				options.signal,
			),
			(error) => toPositionUnavailable(replica, error),
		);
	}

	async checkReplica(session: Session, replica: ReplicaNode, options: CallOptions = {}): Promise<CatchUpVerdict> {
		const required = session.lastWritePosition;
		if (!required) {
			return { status: 'caught_up', replayPosition: undefined };
		}

		const reading = await this.readReplayPosition(replica, options);
		if (reading.isErr()) {
			return { status: 'unavailable', error: reading.error };
		}

		const replayPosition = reading.value;
		if (required.isReachedBy(replayPosition)) {
			return { status: 'caught_up', replayPosition };
		}
		return { status: 'lagging', replayPosition, bytesBehind: required.bytesAhead(replayPosition) };
	}

	/**
	 * True iff the session has no recorded write or the replica has replayed
	 * past it. False whenever the replica's position cannot be read.
	 */
	async isCaughtUp(session: Session, replica: ReplicaNode, options: CallOptions = {}): Promise<boolean> {
		const verdict = await this.checkReplica(session, replica, options);
		return verdict.status === 'caught_up';
	}

	selectTarget(session: Session, options: CallOptions = {}): Promise<RoutingDecision> {
		return this.target(session, this.replica, options);
	}

	/**
	 * The given replica if it has caught up with the session, else the primary.
	 *
	 * @throws ConfigurationError if `replica` is not a configured replica
	 */
	async target(session: Session, replica: ReplicaNode, options: CallOptions = {}): Promise<RoutingDecision> {
		// throws for the primary or an unknown id
		this.registry.replica(replica.id);
		const verdict = await this.checkReplica(session, replica, options);

		switch (verdict.status) {
			case 'caught_up':
				return { target: replica, label: RoutingLabel.replicaCaughtUp(replica.id) };

			case 'lagging':
				this.logger.debug(
					{
						sessionId: session.sessionId,
						replica: replica.id,
						required: session.lastWritePosition?.toString(),
						replayed: verdict.replayPosition.toString(),
						bytesBehind: verdict.bytesBehind.toString(),
					},
					'Replica behind session write position',
				);
				return primaryDecision(this.registry, RoutingLabel.primaryReplicaLagging);

			case 'unavailable':
				this.logger.warn(
					{ sessionId: session.sessionId, replica: replica.id, err: verdict.error },
					'Replica position unavailable, routing to primary',
				);
				return primaryDecision(this.registry, RoutingLabel.primaryPositionUnavailable);
		}
	}
}

function toPositionUnavailable(node: ReplicaNode, error: unknown): PositionUnavailableError {
	if (error instanceof PositionUnavailableError) {
		return error;
	}
	const reason = isRoutingError(error) ? `${error.code}: ${error.message}` : errorMessage(error);
	return new PositionUnavailableError(`Position of '${node.id}' unavailable (${reason})`, {
		endpointId: node.id,
		cause: error,
	});
}
