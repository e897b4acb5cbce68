import type { Logger } from '@readroute/logging';
import type { ReplicaRegistry } from '../registry.js';
import type { RoutingStrategy } from '../strategy.js';
import { LogPositionRouter, type LogPositionRouterConfig } from './log-position-router.js';
import { StickyHashRouter, type StickyHashRouterConfig } from './sticky-hash-router.js';
import { TimeBasedRouter, type TimeBasedRouterConfig } from './time-based-router.js';

export * from './hash-ring.js';
export * from './log-position-router.js';
export * from './sticky-hash-router.js';
export * from './time-based-router.js';

export type StrategyConfig =
	| ({ readonly name: 'time' } & TimeBasedRouterConfig)
	| ({ readonly name: 'position' } & LogPositionRouterConfig)
	| ({ readonly name: 'sticky' } & StickyHashRouterConfig);

/**
 * Build the one strategy active for a deployment.
 */
export function createStrategy(registry: ReplicaRegistry, config: StrategyConfig, logger: Logger): RoutingStrategy {
	switch (config.name) {
		case 'time':
			return new TimeBasedRouter(registry, config, logger);
		case 'position':
			return new LogPositionRouter(registry, config, logger);
		case 'sticky':
			return new StickyHashRouter(registry, config, logger);
	}
}
