import type { ScenarioContext, ScenarioStep } from './types.js';
import { reportRead } from './types.js';

export const STICKY_USERS = ['alice', 'bob', 'charlie'] as const;

/**
 * Each user writes and reads back their own rows; alice then reads three
 * more times and must land on the same replica each time.
 */
export async function runStickyScenario(
	context: ScenarioContext,
	users: readonly string[] = STICKY_USERS,
): Promise<ScenarioStep[]> {
	const { router, logger } = context;
	const steps: ScenarioStep[] = [];

	for (const user of users) {
		await router.write(user, 'Hello World', { ownerId: user });
		steps.push(reportRead(logger, 'read own rows', user, await router.read(user, { ownerId: user })));
	}

	const [first] = users;
	if (first !== undefined) {
		for (let i = 1; i <= 3; i++) {
			steps.push(reportRead(logger, `repeat read ${i}`, first, await router.read(first, { ownerId: first })));
		}
	}
	return steps;
}
