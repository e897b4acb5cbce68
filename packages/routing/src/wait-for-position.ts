import type { ReplicaEndpoint } from './endpoint.js';
import { PositionUnavailableError, errorMessage } from './errors.js';
import type { LogPosition } from './position.js';

export interface WaitForPositionOptions {
	/** Give up after this long (default: 10000) */
	timeoutMs?: number;
	/** Pause between polls (default: 50) */
	intervalMs?: number;
	signal?: AbortSignal;
}

/**
 * Poll a replica until its replay position reaches `target`. Failed polls
 * count as "not yet".
 *
 * @returns the first replay position at or past `target`
 * @throws PositionUnavailableError when the deadline passes or `signal` aborts
 */
export async function waitForReplayPosition(
	replica: ReplicaEndpoint,
	target: LogPosition,
	options: WaitForPositionOptions = {},
): Promise<LogPosition> {
	const timeoutMs = options.timeoutMs ?? 10_000;
	const intervalMs = options.intervalMs ?? 50;
	const deadline = Date.now() + timeoutMs;
	let lastSeen: string = 'nothing';
	let lastError: unknown;

	for (;;) {
		if (options.signal?.aborted) {
			throw new PositionUnavailableError(`Stopped waiting for '${replica.nodeId}' to reach ${target.toString()}`, {
				endpointId: replica.nodeId,
				cause: options.signal.reason,
			});
		}

		try {
			const position = await replica.lastReplayPosition({ signal: options.signal });
			if (target.isReachedBy(position)) {
				return position;
			}
			lastSeen = position.toString();
		} catch (error) {
			lastError = error;
			lastSeen = `error (${errorMessage(error)})`;
		}

		const remaining = deadline - Date.now();
		if (remaining <= 0) {
			throw new PositionUnavailableError(
				`'${replica.nodeId}' did not reach ${target.toString()} within ${timeoutMs}ms (last: ${lastSeen})`,
				{ endpointId: replica.nodeId, cause: lastError },
			);
		}
		await sleep(Math.min(intervalMs, remaining));
	}
}

function sleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}
