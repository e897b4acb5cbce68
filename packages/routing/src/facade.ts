/**
 * Routing Facade
 *
 * Single entry point over one active strategy:
 * - `write` always runs on the primary, then lets the strategy update the
 *   session while the session lock is still held.
 * - `read` asks the strategy for a target under the session lock, then runs
 *   the query on that node outside the lock.
 *
 * No fallback: when the chosen node fails, the error reaches the caller.
 * Every query runs under `queryTimeoutMs`; on expiry it is cancelled and a
 * QueryTimeoutError is raised. Session state is untouched by a failed call.
 */

import type { Logger, RoutingLogContext } from '@readroute/logging';
import { OWNER_ID_MAX_LENGTH, type CallOptions, type RecordRow, type ReplicaNode } from './endpoint.js';
import { QueryError, QueryTimeoutError, isRoutingError } from './errors.js';
import { describeFailure, type ReplicaRegistry } from './registry.js';
import { createInMemorySessionStore, type Session, type SessionStore } from './session-store.js';
import { RoutingLabel, primaryDecision, type RoutingDecision, type RoutingStrategy } from './strategy.js';
import { assertTimeoutMs, withTimeout } from './timeout.js';

export const DEFAULT_QUERY_TIMEOUT_MS = 5000;
export const DEFAULT_READ_LIMIT = 5;

export interface RoutingFacadeConfig {
	readonly registry: ReplicaRegistry;
	readonly strategy: RoutingStrategy;
	readonly logger: Logger;
	/** Default: a fresh in-memory store */
	readonly sessions?: SessionStore;
	/** Bound on every endpoint query (default: 5000) */
	readonly queryTimeoutMs?: number;
}

export interface WriteOptions {
	/** Structured owner identity stored alongside the payload */
	readonly ownerId?: string | undefined;
}

export interface ReadParams {
	/** Newest rows to return (default: 5) */
	readonly limit?: number | undefined;
	/** Only rows written with this owner id */
	readonly ownerId?: string | undefined;
	/** `false` sends the read to the primary without consulting the strategy */
	readonly preferReplica?: boolean | undefined;
}

export interface ReadResult {
	readonly rows: RecordRow[];
	readonly decision: RoutingDecision;
}

export interface RoutingFacade {
	readonly strategy: RoutingStrategy;
	readonly sessions: SessionStore;
	/** Insert on the primary; returns the new record id */
	write(sessionId: string, payload: string, options?: WriteOptions): Promise<number>;
	read(sessionId: string, params?: ReadParams): Promise<ReadResult>;
	/** Snapshot of a session's routing state */
	session(sessionId: string): Session;
	close(): Promise<void>;
}

export function createRoutingFacade(config: RoutingFacadeConfig): RoutingFacade {
	const { registry, strategy } = config;
	const sessions = config.sessions ?? createInMemorySessionStore();
	const queryTimeoutMs = assertTimeoutMs('queryTimeoutMs', config.queryTimeoutMs ?? DEFAULT_QUERY_TIMEOUT_MS);
	const logger = config.logger.child({ component: 'RoutingFacade', strategy: strategy.name });

	/**
	 * Run one query on a node under the query timeout, normalising failures to RoutingErrors.
	 */
	async function onNode<T>(node: ReplicaNode, run: (options: CallOptions) => Promise<T>): Promise<T> {
		try {
			return await withTimeout(
				(signal) => run({ signal }),
				queryTimeoutMs,
				() =>
					new QueryTimeoutError(`Query on '${node.id}' timed out after ${queryTimeoutMs}ms`, queryTimeoutMs, {
						endpointId: node.id,
					}),
			);
		} catch (error) {
			logger.error({ err: error, node: node.id }, `Query failed on ${describeFailure(node, error)}`);
			if (isRoutingError(error)) {
				throw error;
			}
			throw new QueryError(`Query on '${node.id}' failed`, { endpointId: node.id, cause: error });
		}
	}

	function assertSessionId(sessionId: string): void {
		if (!sessionId.trim()) {
			throw new QueryError('Session id must not be blank');
		}
	}

	function assertOwnerId(ownerId: string | undefined): void {
		if (ownerId === undefined) {
			return;
		}
		if (!ownerId.trim()) {
			throw new QueryError('Owner id must not be blank');
		}
		const length = [...ownerId].length;
		if (length > OWNER_ID_MAX_LENGTH) {
			throw new QueryError(`Owner id must be at most ${OWNER_ID_MAX_LENGTH} characters, got ${length}`);
		}
	}

	return {
		strategy,
		sessions,

		async write(sessionId, payload, options = {}) {
			assertSessionId(sessionId);
			assertOwnerId(options.ownerId);

			return sessions.withLock(sessionId, async (session) => {
				const primary = registry.primary;
				const recordId = await onNode(primary, (call) =>
					registry.primaryEndpoint().insertRecord({ data: payload, ownerId: options.ownerId }, call),
				);

				sessions.save(await strategy.recordWrite(session));

				const context: RoutingLogContext = { sessionId, target: primary.id, recordId };
				logger.debug(context, 'Write committed on primary');
				return recordId;
			});
		},

		async read(sessionId, params = {}) {
			assertSessionId(sessionId);
			assertOwnerId(params.ownerId);
			const limit = params.limit ?? DEFAULT_READ_LIMIT;
			if (!Number.isInteger(limit) || limit < 1) {
				throw new QueryError(`Read limit must be a positive integer, got ${limit}`);
			}

			const decision =
				params.preferReplica === false
					? primaryDecision(registry, RoutingLabel.primaryRequested)
					: await sessions.withLock(sessionId, (session) => strategy.selectTarget(session));

			const rows = await onNode(decision.target, (call) =>
				registry.endpointFor(decision.target).selectRecent({ limit, ownerId: params.ownerId }, call),
			);

			const context: RoutingLogContext = {
				sessionId,
				target: decision.target.id,
				label: decision.label,
				rows: rows.length,
			};
			logger.debug(context, 'Routed read');
			return { rows, decision };
		},

		session(sessionId) {
			return sessions.get(sessionId);
		},

		close() {
			return registry.close();
		},
	};
}
