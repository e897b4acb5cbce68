/**
 * @readroute/routing
 *
 * Read routing across one primary and N asynchronously replicated replicas.
 *
 * Three independent strategies, exactly one active per deployment:
 * - TimeBasedRouter: primary for a fixed window after a session's write
 * - LogPositionRouter: replica only once it replayed the session's last write
 * - StickyHashRouter: deterministic replica per session key
 *
 * @example
 * ```typescript
 * const registry = createReplicaRegistry({ primary, replicas });
 * const strategy = createStrategy(registry, { name: 'position' }, logger);
 * const router = createRoutingFacade({ registry, strategy, logger });
 *
 * await router.write('alice', 'hello');
 * const { rows, decision } = await router.read('alice', { limit: 3 });
 * ```
 */

export {
	RoutingError,
	ConnectionError,
	QueryError,
	QueryTimeoutError,
	ConfigurationError,
	PositionUnavailableError,
	isRoutingError,
	errorMessage,
	type RoutingErrorCode,
	type RoutingErrorOptions,
} from './errors.js';

export { LogPosition, type PositionOrder } from './position.js';

export {
	parseEndpointUrl,
	OWNER_ID_MAX_LENGTH,
	formatEndpointUrl,
	describeEndpoint,
	type NodeRole,
	type EndpointCredentials,
	type EndpointDescriptor,
	type ReplicaNode,
	type RecordRow,
	type NewRecord,
	type RecordQuery,
	type CallOptions,
	type QueryEndpoint,
	type PrimaryEndpoint,
	type ReplicaEndpoint,
} from './endpoint.js';

export {
	createReplicaRegistry,
	verifyRoles,
	describeFailure,
	type NodeBinding,
	type ReplicaRegistry,
	type ReplicaRegistryConfig,
} from './registry.js';

export { createInMemorySessionStore, type Session, type SessionStore } from './session-store.js';

export {
	RoutingLabel,
	primaryDecision,
	resolvePreferredReplica,
	type RoutingDecision,
	type RoutingStrategy,
	type StrategyName,
} from './strategy.js';

export * from './strategies/index.js';

export {
	createRoutingFacade,
	DEFAULT_QUERY_TIMEOUT_MS,
	DEFAULT_READ_LIMIT,
	type RoutingFacade,
	type RoutingFacadeConfig,
	type ReadParams,
	type ReadResult,
	type WriteOptions,
} from './facade.js';

export { waitForReplayPosition, type WaitForPositionOptions } from './wait-for-position.js';
export { withTimeout, assertTimeoutMs, MAX_TIMEOUT_MS } from './timeout.js';
