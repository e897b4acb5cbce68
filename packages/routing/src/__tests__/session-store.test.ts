import { describe, it, expect } from 'vitest';
import { LogPosition } from '../position.js';
import { createInMemorySessionStore } from '../session-store.js';

function deferred() {
	let resolve: () => void = () => {};
	const promise = new Promise<void>((r) => {
		resolve = r;
	});
	return { promise, resolve };
}

describe('InMemorySessionStore', () => {
	it('should return an empty session for an unknown id without storing it', () => {
		const store = createInMemorySessionStore();

		for (let i = 0; i < 100; i++) {
			expect(store.get(`reader-${i}`)).toEqual({ sessionId: `reader-${i}` });
		}

		expect(store.size()).toBe(0);
	});

	it('should keep saved sessions', () => {
		const store = createInMemorySessionStore();
		store.save({ sessionId: 'alice', lastWriteTime: 1000 });

		expect(store.get('alice')).toEqual({ sessionId: 'alice', lastWriteTime: 1000 });
		expect(store.get('alice')).toBe(store.get('alice'));
		expect(store.size()).toBe(1);
	});

	it('should not store sessions that were only locked', async () => {
		const store = createInMemorySessionStore();

		await store.withLock('bob', async (session) => session);

		expect(store.size()).toBe(0);
		expect(store.pendingCount('bob')).toBe(0);
	});

	it('should replace whole snapshots on update', () => {
		const store = createInMemorySessionStore();
		const before = store.get('alice');

		const after = store.update('alice', (s) => ({ ...s, lastWriteTime: 1000 }));

		expect(after.lastWriteTime).toBe(1000);
		expect(before.lastWriteTime).toBeUndefined();
		expect(Object.isFrozen(after)).toBe(true);
	});

	it('should refuse an update that changes the session id', () => {
		const store = createInMemorySessionStore();
		expect(() => store.update('alice', () => ({ sessionId: 'bob' }))).toThrow(
			"Session update for 'alice' returned session 'bob'",
		);
	});

	it('should delete sessions', () => {
		const store = createInMemorySessionStore();
		store.save({ sessionId: 'alice', lastWriteTime: 1000 });

		expect(store.delete('alice')).toBe(true);
		expect(store.delete('alice')).toBe(false);
		expect(store.size()).toBe(0);
	});

	describe('withLock', () => {
		it('should serialise holders of the same session in arrival order', async () => {
			const store = createInMemorySessionStore();
			const gate = deferred();
			const order: string[] = [];

			const first = store.withLock('alice', async () => {
				order.push('first:start');
				await gate.promise;
				order.push('first:end');
			});
			const second = store.withLock('alice', async () => {
				order.push('second');
			});

			await Promise.resolve();
			expect(store.pendingCount('alice')).toBe(2);

			gate.resolve();
			await Promise.all([first, second]);

			expect(order).toEqual(['first:start', 'first:end', 'second']);
			expect(store.pendingCount('alice')).toBe(0);
		});

		it('should not make unrelated sessions wait', async () => {
			const store = createInMemorySessionStore();
			const gate = deferred();
			const order: string[] = [];

			const alice = store.withLock('alice', async () => {
				await gate.promise;
				order.push('alice');
			});
			await store.withLock('bob', async () => {
				order.push('bob');
			});

			expect(order).toEqual(['bob']);
			gate.resolve();
			await alice;
			expect(order).toEqual(['bob', 'alice']);
		});

		it('should hand the next holder the snapshot saved by the previous one', async () => {
			const store = createInMemorySessionStore();
			const position = LogPosition.parse('0/10');

			const write = store.withLock('alice', async (session) => {
				store.save({ ...session, lastWritePosition: position });
			});
			const seen = store.withLock('alice', async (session) => session.lastWritePosition);

			await write;
			expect(await seen).toBe(position);
		});

		it('should release the lock when the holder fails', async () => {
			const store = createInMemorySessionStore();

			await expect(
				store.withLock('alice', async () => {
					throw new Error('insert failed');
				}),
			).rejects.toThrow('insert failed');

			await expect(store.withLock('alice', async () => 'next')).resolves.toBe('next');
			expect(store.pendingCount('alice')).toBe(0);
		});

		it('should never expose a half-applied update to concurrent readers', async () => {
			const store = createInMemorySessionStore();
			const position = LogPosition.parse('0/20');

			const writes = Array.from({ length: 20 }, (_, i) =>
				store.withLock('alice', async (session) => {
					await Promise.resolve();
					store.save({ ...session, lastWriteTime: i, lastWritePosition: position.advance(i) });
				}),
			);
			const reads = Array.from({ length: 20 }, () =>
				store.withLock('alice', async (session) => session),
			);

			await Promise.all(writes);
			for (const session of await Promise.all(reads)) {
				if (session.lastWriteTime === undefined) {
					expect(session.lastWritePosition).toBeUndefined();
				} else {
					expect(session.lastWritePosition?.toString()).toBe(position.advance(session.lastWriteTime).toString());
				}
			}
			expect(store.get('alice').lastWriteTime).toBe(19);
		});
	});
});
