/**
 * Driver Error Mapping
 *
 * Translates postgres.js and socket failures into routing errors:
 * - SQLSTATE class 08, class 28, 3D000, 53300, 57P01-57P03, socket errors
 *   and postgres.js connection codes become ConnectionError
 * - 57014 (statement cancelled or timed out) becomes QueryTimeoutError
 * - every other failure becomes QueryError, keeping the SQLSTATE
 */

import { ConnectionError, QueryError, QueryTimeoutError, errorMessage, isRoutingError, type RoutingError } from '@readroute/routing';

const SQLSTATE_PATTERN = /^[0-9A-Z]{5}$/;

const CONNECTION_SQLSTATES = new Set(['3D000', '53300', '57P01', '57P02', '57P03']);

const CONNECTION_CLASSES = new Set(['08', '28']);

const QUERY_CANCELED = '57014';

const CONNECTION_CODES = new Set([
	'ECONNREFUSED',
	'ECONNRESET',
	'ENOTFOUND',
	'ETIMEDOUT',
	'EHOSTUNREACH',
	'ENETUNREACH',
	'EPIPE',
	'EAI_AGAIN',
	'CONNECT_TIMEOUT',
	'CONNECTION_CLOSED',
	'CONNECTION_ENDED',
	'CONNECTION_DESTROYED',
]);

/**
 * The `code` of an error or of the first error in its cause chain that has one.
 */
export function driverErrorCode(error: unknown): string | undefined {
	let current: unknown = error;
	for (let depth = 0; depth < 5 && current instanceof Error; depth++) {
		if ('code' in current && typeof current.code === 'string') {
			return current.code;
		}
		current = current.cause;
	}
	return undefined;
}

export function isConnectionCode(code: string): boolean {
	if (CONNECTION_CODES.has(code) || CONNECTION_SQLSTATES.has(code)) {
		return true;
	}
	return SQLSTATE_PATTERN.test(code) && CONNECTION_CLASSES.has(code.slice(0, 2));
}

/**
 * Map a failure raised while talking to `endpointId` onto a RoutingError.
 * RoutingErrors pass through unchanged.
 */
export function toRoutingError(error: unknown, endpointId: string, statementTimeoutMs: number): RoutingError {
	if (isRoutingError(error)) {
		return error;
	}

	const code = driverErrorCode(error);
	const message = `${endpointId}: ${errorMessage(error)}`;

	if (code === QUERY_CANCELED) {
		return new QueryTimeoutError(message, statementTimeoutMs, { endpointId, cause: error });
	}
	if (code !== undefined && isConnectionCode(code)) {
		return new ConnectionError(message, { endpointId, cause: error });
	}
	return new QueryError(message, {
		endpointId,
		cause: error,
		sqlState: code !== undefined && SQLSTATE_PATTERN.test(code) ? code : undefined,
	});
}
