import type { Logger } from '@readroute/logging';
import type { ReadResult, ReplicaRegistry, RoutingFacade } from '@readroute/routing';

export interface ScenarioContext {
	readonly router: RoutingFacade;
	readonly registry: ReplicaRegistry;
	readonly logger: Logger;
	/** Waits used between steps; tests pass one that advances a manual clock */
	readonly sleep: (ms: number) => Promise<void>;
}

/**
 * One routed read as reported by a scenario.
 */
export interface ScenarioStep {
	readonly step: string;
	readonly sessionId: string;
	readonly target: string;
	readonly label: string;
	readonly rows: number;
}

export function sleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Log a read the way every scenario reports it and return it as a step.
 */
export function reportRead(logger: Logger, step: string, sessionId: string, result: ReadResult): ScenarioStep {
	const reported: ScenarioStep = {
		step,
		sessionId,
		target: result.decision.target.id,
		label: result.decision.label,
		rows: result.rows.length,
	};
	logger.info(reported, `${step}: ${reported.label}, ${reported.rows} rows`);
	return reported;
}
