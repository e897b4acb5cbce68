import { describe, it, expect } from 'vitest';
import { ConnectionError, PositionUnavailableError, QueryError, QueryTimeoutError } from '@readroute/routing';
import { driverErrorCode, isConnectionCode, toRoutingError } from '../errors.js';

function driverError(message: string, code: string): Error {
	return Object.assign(new Error(message), { code });
}

describe('toRoutingError', () => {
	it('should map a refused socket to ConnectionError', () => {
		const cause = driverError('connect ECONNREFUSED 127.0.0.1:5433', 'ECONNREFUSED');

		const error = toRoutingError(cause, 'replica1', 30000);

		expect(error).toBeInstanceOf(ConnectionError);
		expect(error.message).toBe('replica1: connect ECONNREFUSED 127.0.0.1:5433');
		expect(error.endpointId).toBe('replica1');
		expect(error.cause).toBe(cause);
	});

	it.each(['28P01', '08006', '57P01', '3D000', 'CONNECT_TIMEOUT'])('should map %s to ConnectionError', (code) => {
		expect(toRoutingError(driverError('x', code), 'primary', 30000).code).toBe('CONNECTION');
	});

	it('should map a cancelled statement to QueryTimeoutError', () => {
		const error = toRoutingError(
			driverError('canceling statement due to statement timeout', '57014'),
			'replica2',
			2500,
		);

		expect(error).toBeInstanceOf(QueryTimeoutError);
		expect(error instanceof QueryTimeoutError && error.timeoutMs).toBe(2500);
	});

	it('should keep the SQLSTATE of other failures', () => {
		const error = toRoutingError(driverError('relation "replication_records" does not exist', '42P01'), 'primary', 1);

		expect(error).toBeInstanceOf(QueryError);
		expect(error instanceof QueryError && error.sqlState).toBe('42P01');
	});

	it('should map an error without a code to QueryError without SQLSTATE', () => {
		const error = toRoutingError(new Error('boom'), 'primary', 1);

		expect(error).toBeInstanceOf(QueryError);
		expect(error instanceof QueryError && error.sqlState).toBeUndefined();
	});

	it('should find the code on a wrapped cause', () => {
		const wrapped = new Error('Failed query', { cause: driverError('terminating connection', '57P01') });

		expect(toRoutingError(wrapped, 'primary', 1)).toBeInstanceOf(ConnectionError);
	});

	it('should pass routing errors through', () => {
		const original = new PositionUnavailableError('no position', { endpointId: 'primary' });

		expect(toRoutingError(original, 'primary', 1)).toBe(original);
	});

	it('should map non-Error values', () => {
		const error = toRoutingError('socket hang up', 'replica1', 1);

		expect(error.message).toBe('replica1: socket hang up');
		expect(error.code).toBe('QUERY');
	});
});

describe('driverErrorCode', () => {
	it('should return undefined when nothing in the chain has a code', () => {
		expect(driverErrorCode(new Error('a', { cause: new Error('b') }))).toBeUndefined();
		expect(driverErrorCode(undefined)).toBeUndefined();
	});
});

describe('isConnectionCode', () => {
	it('should only treat connection classes as connection failures when the code is a SQLSTATE', () => {
		expect(isConnectionCode('08001')).toBe(true);
		expect(isConnectionCode('23505')).toBe(false);
		expect(isConnectionCode('EPERM')).toBe(false);
	});
});
