/**
 * Consistent-hash ring with virtual nodes. Adding or removing one of N members
 * moves roughly 1/N of the keys, where modulo assignment moves most of them.
 */

import { createHash } from 'node:crypto';
import { ConfigurationError } from '../errors.js';

export const DEFAULT_VIRTUAL_NODES = 160;

interface RingPoint<T> {
	readonly hash: number;
	readonly member: T;
}

export interface HashRing<T> {
	readonly size: number;
	/** @throws ConfigurationError if the ring has no members */
	lookup(key: string): T;
}

/**
 * First 32 bits of the key's MD5 digest.
 */
export function ringHash(key: string): number {
	return createHash('md5').update(key, 'utf8').digest().readUInt32BE(0);
}

/**
 * Build a ring. `idOf` names each member; its virtual nodes are placed at
 * `ringHash("<id>#<n>")`.
 */
export function createHashRing<T>(
	members: readonly T[],
	idOf: (member: T) => string,
	virtualNodes: number = DEFAULT_VIRTUAL_NODES,
): HashRing<T> {
	if (!Number.isInteger(virtualNodes) || virtualNodes < 1) {
		throw new ConfigurationError(`virtualNodes must be a positive integer, got ${virtualNodes}`);
	}

	const points: RingPoint<T>[] = [];
	for (const member of members) {
		const id = idOf(member);
		for (let n = 0; n < virtualNodes; n++) {
			points.push({ hash: ringHash(`${id}#${n}`), member });
		}
	}
	// Ties broken by member id so the ring does not depend on insertion order
	points.sort((a, b) => a.hash - b.hash || idOf(a.member).localeCompare(idOf(b.member)));

	return {
		size: members.length,
		lookup(key) {
			const first = points[0];
			if (!first) {
				throw new ConfigurationError('Cannot assign a key on an empty hash ring');
			}
			const hash = ringHash(key);
			let lo = 0;
			let hi = points.length;
			while (lo < hi) {
				const mid = (lo + hi) >>> 1;
				const point = points[mid];
				if (point && point.hash < hash) {
					lo = mid + 1;
				} else {
					hi = mid;
				}
			}
			return (points[lo] ?? first).member;
		},
	};
}
