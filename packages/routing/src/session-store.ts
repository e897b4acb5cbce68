/**
 * Session Store
 *
 * Explicit, injectable home for per-client routing state. Session records are
 * immutable snapshots; an update replaces the whole record, so a reader sees
 * either the state before a write or after it and never a mix of the two.
 *
 * `withLock` serialises work for one session id (FIFO). Holders for different
 * ids never wait on each other.
 *
 * Only saved sessions are stored: reading an unknown id returns an empty
 * snapshot without keeping it. A saved session stays until `delete`; callers
 * delete sessions that no longer need read-your-writes routing.
 */

import type { LogPosition } from './position.js';

export interface Session {
	readonly sessionId: string;
	/** Epoch millis of the last write committed through the router */
	readonly lastWriteTime?: number | undefined;
	/** Primary write position captured right after the last write committed */
	readonly lastWritePosition?: LogPosition | undefined;
}

export interface SessionStore {
	/** Current snapshot; an unknown id yields an empty session that is not stored */
	get(sessionId: string): Session;
	/** Replace the stored snapshot */
	save(session: Session): void;
	/** Apply `fn` to the current snapshot and store the result */
	update(sessionId: string, fn: (session: Session) => Session): Session;
	/**
	 * Run `fn` while holding the session's lock. `fn` receives the snapshot
	 * current at acquisition. The lock is released when `fn` settles.
	 */
	withLock<T>(sessionId: string, fn: (session: Session) => Promise<T>): Promise<T>;
	/** Number of holders queued or running for a session */
	pendingCount(sessionId: string): number;
	delete(sessionId: string): boolean;
	size(): number;
}

interface LockEntry {
	tail: Promise<void>;
	holders: number;
}

/**
 * Create an in-process session store.
 */
export function createInMemorySessionStore(): SessionStore {
	const sessions = new Map<string, Session>();
	const locks = new Map<string, LockEntry>();

	function get(sessionId: string): Session {
		const existing = sessions.get(sessionId);
		if (existing) {
			return existing;
		}
		return Object.freeze({ sessionId });
	}

	function save(session: Session): void {
		sessions.set(session.sessionId, Object.freeze({ ...session }));
	}

	return {
		get,
		save,

		update(sessionId, fn) {
			const next = fn(get(sessionId));
			if (next.sessionId !== sessionId) {
				throw new Error(`Session update for '${sessionId}' returned session '${next.sessionId}'`);
			}
			save(next);
			return get(sessionId);
		},

		async withLock<T>(sessionId: string, fn: (session: Session) => Promise<T>): Promise<T> {
			let entry = locks.get(sessionId);
			if (!entry) {
				entry = { tail: Promise.resolve(), holders: 0 };
				locks.set(sessionId, entry);
			}
			const lock = entry;
			lock.holders++;

			let release: () => void = () => {};
			const held = new Promise<void>((resolve) => {
				release = resolve;
			});
			const previous = lock.tail;
			lock.tail = previous.then(() => held);

			await previous;
			try {
				return await fn(get(sessionId));
			} finally {
				release();
				lock.holders--;
				if (lock.holders === 0 && locks.get(sessionId) === lock) {
					locks.delete(sessionId);
				}
			}
		},

		pendingCount(sessionId) {
			return locks.get(sessionId)?.holders ?? 0;
		},

		delete(sessionId) {
			return sessions.delete(sessionId);
		},

		size() {
			return sessions.size;
		},
	};
}
