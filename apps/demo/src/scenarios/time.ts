import type { ScenarioContext, ScenarioStep } from './types.js';
import { reportRead } from './types.js';

export interface TimeScenarioOptions {
	/** Must match the router's write threshold */
	readonly thresholdMs: number;
	readonly sessionId?: string;
}

/**
 * Write, read at once (primary), wait out the threshold, read again (replica).
 */
export async function runTimeScenario(context: ScenarioContext, options: TimeScenarioOptions): Promise<ScenarioStep[]> {
	const { router, logger } = context;
	const sessionId = options.sessionId ?? 'alice';

	const recordId = await router.write(sessionId, 'Time test data');
	logger.info({ sessionId, recordId }, 'Wrote record on primary');

	const steps = [reportRead(logger, 'read after write', sessionId, await router.read(sessionId, { limit: 3 }))];

	const waitMs = options.thresholdMs + 1000;
	logger.info({ waitMs }, 'Waiting past the write threshold');
	await context.sleep(waitMs);

	steps.push(reportRead(logger, 'read after threshold', sessionId, await router.read(sessionId, { limit: 3 })));
	return steps;
}
