import type { Logger } from '@readroute/logging';
import { connectCluster, runMigrations, type PostgresCluster } from '@readroute/persistence';
import {
	createRoutingFacade,
	createStrategy,
	verifyRoles,
	type ReplicaRegistry,
	type RoutingFacade,
	type StrategyConfig,
} from '@readroute/routing';
import type { DemoEnv } from './env.js';
import type { LagSource } from './scenarios/index.js';

export type DemoCommand = 'time' | 'position' | 'sticky' | 'lag';

export const DEMO_COMMANDS: readonly DemoCommand[] = ['time', 'position', 'sticky', 'lag'];

export function isDemoCommand(value: string): value is DemoCommand {
	return DEMO_COMMANDS.some((command) => command === value);
}

/**
 * Router settings for a strategy, taken from the environment.
 */
export function strategyConfig(name: StrategyConfig['name'], env: DemoEnv): StrategyConfig {
	switch (name) {
		case 'time':
			return { name, thresholdMs: env.WRITE_THRESHOLD_MS };
		case 'position':
			return { name, positionCheckTimeoutMs: env.POSITION_CHECK_TIMEOUT_MS };
		case 'sticky':
			return { name, assignment: env.STICKY_ASSIGNMENT };
	}
}

/**
 * What a demo run needs from a connected cluster.
 */
export interface DemoCluster {
	readonly registry: ReplicaRegistry;
	readonly primary: LagSource;
}

/**
 * Migrate the primary, connect every node and check roles.
 */
export async function connectDemoCluster(env: DemoEnv, logger: Logger): Promise<PostgresCluster> {
	if (env.AUTO_MIGRATE) {
		await runMigrations(env.PRIMARY_URL, logger);
	}

	const cluster = connectCluster(
		{
			primaryUrl: env.PRIMARY_URL,
			replicaUrls: env.REPLICA_URLS,
			maxConnections: env.DB_MAX_CONNECTIONS,
			logQueries: env.LOG_LEVEL === 'trace',
		},
		logger,
	);

	try {
		await verifyRoles(cluster.registry, logger);
	} catch (error) {
		await cluster.registry.close();
		throw error;
	}
	return cluster;
}

/**
 * Build the router for a strategy over a connected registry.
 *
 * @throws ConfigurationError when the strategy cannot run on this cluster
 */
export function createDemoRouter(
	registry: ReplicaRegistry,
	strategyName: StrategyConfig['name'],
	env: DemoEnv,
	logger: Logger,
): RoutingFacade {
	return createRoutingFacade({
		registry,
		strategy: createStrategy(registry, strategyConfig(strategyName, env), logger),
		logger,
		queryTimeoutMs: env.QUERY_TIMEOUT_MS,
	});
}
