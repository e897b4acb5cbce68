/**
 * readroute demo
 *
 * Usage: readroute-demo [time|position|sticky|lag]
 *
 * Runs one routing scenario against a primary and its replicas. Without a
 * command the scenario of ROUTING_STRATEGY runs.
 */

import { createLogger, setDefaultLogger, type Logger } from '@readroute/logging';
import { errorMessage, type RoutingFacade } from '@readroute/routing';
import { loadEnv, type DemoEnv } from './env.js';
import { runLagScenario, runPositionScenario, runStickyScenario, runTimeScenario, sleep } from './scenarios/index.js';
import {
	DEMO_COMMANDS,
	connectDemoCluster,
	createDemoRouter,
	isDemoCommand,
	type DemoCluster,
	type DemoCommand,
} from './setup.js';

export interface DemoDependencies {
	connect(env: DemoEnv, logger: Logger): Promise<DemoCluster>;
}

const defaultDependencies: DemoDependencies = { connect: connectDemoCluster };

export async function runDemo(
	command: DemoCommand,
	env: DemoEnv,
	logger: Logger,
	dependencies: DemoDependencies = defaultDependencies,
): Promise<void> {
	const cluster = await dependencies.connect(env, logger);

	// lag talks to the primary only; no routing strategy is built for it
	if (command === 'lag') {
		try {
			await runLagScenario(cluster.primary, env.LAG_ROWS, logger);
		} finally {
			await cluster.registry.close();
		}
		return;
	}

	let router: RoutingFacade;
	try {
		router = createDemoRouter(cluster.registry, command, env, logger);
	} catch (error) {
		await cluster.registry.close();
		throw error;
	}
	const context = { router, registry: cluster.registry, logger, sleep };

	try {
		switch (command) {
			case 'time':
				await runTimeScenario(context, { thresholdMs: env.WRITE_THRESHOLD_MS });
				break;
			case 'position':
				await runPositionScenario(context);
				break;
			case 'sticky':
				await runStickyScenario(context);
				break;
		}
	} finally {
		await router.close();
	}
}

const isMainModule =
	typeof process !== 'undefined' &&
	process.argv[1] &&
	(process.argv[1].endsWith('/index.ts') || process.argv[1].endsWith('/index.js'));

if (isMainModule) {
	const env = loadEnv();
	const logger = createLogger({
		level: env.LOG_LEVEL,
		serviceName: 'readroute-demo',
		pretty: env.NODE_ENV === 'development',
	});
	setDefaultLogger(logger);

	const command = process.argv[2] ?? env.ROUTING_STRATEGY;
	if (!isDemoCommand(command)) {
		logger.error({ command }, `Unknown command, expected one of: ${DEMO_COMMANDS.join(', ')}`);
		process.exit(2);
	}

	try {
		await runDemo(command, env, logger);
	} catch (error) {
		logger.error({ err: error }, `Demo failed: ${errorMessage(error)}`);
		process.exitCode = 1;
	}
}
