/**
 * Routing Error Types
 *
 * Every failure surfaced by the routing core is a RoutingError carrying a
 * `code` discriminant. None of them is retried inside the core; retry or
 * alternate-target policies belong to the caller.
 *
 * - CONNECTION: endpoint unreachable or authentication failed
 * - TIMEOUT: endpoint did not answer within the query timeout
 * - QUERY: malformed request or constraint violation at an endpoint
 * - CONFIGURATION: invalid registry or router setup (e.g. empty replica set)
 * - POSITION_UNAVAILABLE: a log position could not be obtained
 */

export type RoutingErrorCode = 'CONNECTION' | 'TIMEOUT' | 'QUERY' | 'CONFIGURATION' | 'POSITION_UNAVAILABLE';

export interface RoutingErrorOptions {
	/** Node the failure happened on, when known */
	endpointId?: string | undefined;
	cause?: unknown;
}

/**
 * Base class for all routing failures
 */
export class RoutingError extends Error {
	readonly code: RoutingErrorCode;
	readonly endpointId: string | undefined;

	constructor(code: RoutingErrorCode, message: string, options: RoutingErrorOptions = {}) {
		super(message, { cause: options.cause });
		this.name = 'RoutingError';
		this.code = code;
		this.endpointId = options.endpointId;
	}
}

/**
 * Endpoint unreachable or authentication failure.
 */
export class ConnectionError extends RoutingError {
	constructor(message: string, options: RoutingErrorOptions = {}) {
		super('CONNECTION', message, options);
		this.name = 'ConnectionError';
	}
}

/**
 * The endpoint did not answer before the query timeout; the in-flight query was cancelled.
 */
export class QueryTimeoutError extends RoutingError {
	readonly timeoutMs: number;

	constructor(message: string, timeoutMs: number, options: RoutingErrorOptions = {}) {
		super('TIMEOUT', message, options);
		this.name = 'QueryTimeoutError';
		this.timeoutMs = timeoutMs;
	}
}

/**
 * Malformed request or constraint violation reported by an endpoint.
 */
export class QueryError extends RoutingError {
	/** SQLSTATE or driver code, when the endpoint reported one */
	readonly sqlState: string | undefined;

	constructor(message: string, options: RoutingErrorOptions & { sqlState?: string | undefined } = {}) {
		super('QUERY', message, options);
		this.name = 'QueryError';
		this.sqlState = options.sqlState;
	}
}

/**
 * Invalid setup detected before any routing work is attempted.
 */
export class ConfigurationError extends RoutingError {
	constructor(message: string, options: RoutingErrorOptions = {}) {
		super('CONFIGURATION', message, options);
		this.name = 'ConfigurationError';
	}
}

/**
 * A primary write position or replica replay position could not be read.
 */
export class PositionUnavailableError extends RoutingError {
	constructor(message: string, options: RoutingErrorOptions = {}) {
		super('POSITION_UNAVAILABLE', message, options);
		this.name = 'PositionUnavailableError';
	}
}

/**
 * Check if an unknown value is a RoutingError.
 */
export function isRoutingError(value: unknown): value is RoutingError {
	return value instanceof RoutingError;
}

/**
 * Human readable message for any thrown value.
 */
export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
