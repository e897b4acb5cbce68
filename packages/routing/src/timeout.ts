import { ConfigurationError } from './errors.js';

/** Longest delay a Node.js timer honours; larger values fire after 1ms */
export const MAX_TIMEOUT_MS = 2_147_483_647;

/**
 * @throws ConfigurationError unless `value` is an integer in 1..MAX_TIMEOUT_MS
 */
export function assertTimeoutMs(name: string, value: number): number {
	if (!Number.isInteger(value) || value < 1 || value > MAX_TIMEOUT_MS) {
		throw new ConfigurationError(`${name} must be an integer between 1 and ${MAX_TIMEOUT_MS}, got ${value}`);
	}
	return value;
}

/**
 * Run an abortable call with a deadline. On expiry the call's signal is
 * aborted (so the endpoint can cancel the in-flight query) and the returned
 * promise rejects with `onTimeout()`, whether or not the call honours the
 * signal. An abort of `parent` is forwarded to the call.
 */
export async function withTimeout<T>(
	run: (signal: AbortSignal) => Promise<T>,
	timeoutMs: number,
	onTimeout: () => Error,
	parent?: AbortSignal,
): Promise<T> {
	const controller = new AbortController();
	const forwardAbort = () => controller.abort(parent?.reason);
	if (parent?.aborted) {
		controller.abort(parent.reason);
	} else {
		parent?.addEventListener('abort', forwardAbort, { once: true });
	}

	let timeoutId: ReturnType<typeof setTimeout> | undefined;
	const deadline = new Promise<never>((_, reject) => {
		timeoutId = setTimeout(() => {
			const error = onTimeout();
			controller.abort(error);
			reject(error);
		}, timeoutMs);
	});

	try {
		return await Promise.race([run(controller.signal), deadline]);
	} finally {
		clearTimeout(timeoutId);
		parent?.removeEventListener('abort', forwardAbort);
	}
}
