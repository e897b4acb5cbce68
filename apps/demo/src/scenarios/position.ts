import { waitForReplayPosition } from '@readroute/routing';
import type { ScenarioContext, ScenarioStep } from './types.js';
import { reportRead } from './types.js';

export interface PositionScenarioOptions {
	readonly sessionId?: string;
	/** Replica polled for catch-up (default: first configured) */
	readonly replicaId?: string;
	/** Give up waiting for the replica after this long (default: 10000) */
	readonly catchUpTimeoutMs?: number;
	readonly pollIntervalMs?: number;
}

/**
 * Write, read (primary while the replica lags), poll until the replica has
 * replayed the write, read again (replica).
 */
export async function runPositionScenario(
	context: ScenarioContext,
	options: PositionScenarioOptions = {},
): Promise<ScenarioStep[]> {
	const { router, registry, logger } = context;
	const sessionId = options.sessionId ?? 'alice';

	const recordId = await router.write(sessionId, 'LSN test data');
	const written = router.session(sessionId).lastWritePosition;
	logger.info({ sessionId, recordId, position: written?.toString() }, 'Wrote record on primary');

	const steps = [reportRead(logger, 'read after write', sessionId, await router.read(sessionId))];

	if (written) {
		const replicaId = options.replicaId ?? registry.replicas[0]?.id;
		if (replicaId !== undefined) {
			const reached = await waitForReplayPosition(registry.replicaEndpoint(replicaId), written, {
				timeoutMs: options.catchUpTimeoutMs ?? 10_000,
				intervalMs: options.pollIntervalMs ?? 50,
			});
			logger.info({ replica: replicaId, position: reached.toString() }, 'Replica caught up');
		}
	}

	steps.push(reportRead(logger, 'read after catch-up', sessionId, await router.read(sessionId)));
	return steps;
}
