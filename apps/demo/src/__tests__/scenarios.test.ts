import { describe, it, expect } from 'vitest';
import { createSilentLogger } from '@readroute/logging';
import type { ReplicaStatus } from '@readroute/persistence';
import {
	LogPosition,
	PositionUnavailableError,
	createRoutingFacade,
	createStrategy,
	type StrategyConfig,
} from '@readroute/routing';
import { ManualClock, createInMemoryCluster, type InMemoryCluster } from '@readroute/routing/testing';
import {
	runLagScenario,
	runPositionScenario,
	runStickyScenario,
	runTimeScenario,
	sleep,
	type ScenarioContext,
} from '../scenarios/index.js';

const logger = createSilentLogger();

function contextFor(cluster: InMemoryCluster, strategy: StrategyConfig, wait = sleep): ScenarioContext {
	return {
		router: createRoutingFacade({
			registry: cluster.registry,
			strategy: createStrategy(cluster.registry, strategy, logger),
			logger,
		}),
		registry: cluster.registry,
		logger,
		sleep: wait,
	};
}

describe('runTimeScenario', () => {
	it('should read from the primary first and from the replica after the threshold', async () => {
		const cluster = createInMemoryCluster();
		const clock = new ManualClock();
		const waits: number[] = [];
		const context = contextFor(cluster, { name: 'time', thresholdMs: 5000, clock }, async (ms) => {
			waits.push(ms);
			clock.advance(ms);
		});

		const steps = await runTimeScenario(context, { thresholdMs: 5000 });

		expect(waits).toEqual([6000]);
		expect(steps).toEqual([
			{ step: 'read after write', sessionId: 'alice', target: 'primary', label: 'PRIMARY (recent write)', rows: 1 },
			// replica1 has not replayed the write
			{ step: 'read after threshold', sessionId: 'alice', target: 'replica1', label: 'REPLICA replica1', rows: 0 },
		]);
	});
});

describe('runPositionScenario', () => {
	it('should switch to the replica once it replayed the write', async () => {
		const cluster = createInMemoryCluster();
		const context = contextFor(cluster, { name: 'position' });
		setTimeout(() => cluster.replica('replica1').catchUp(), 20);

		const steps = await runPositionScenario(context, { pollIntervalMs: 5 });

		expect(steps.map((s) => [s.label, s.rows])).toEqual([
			['PRIMARY (replica lagging)', 1],
			['REPLICA replica1 (caught up)', 1],
		]);
	});

	it('should fail when the replica never catches up', async () => {
		const cluster = createInMemoryCluster();
		const context = contextFor(cluster, { name: 'position' });

		await expect(runPositionScenario(context, { catchUpTimeoutMs: 30, pollIntervalMs: 5 })).rejects.toBeInstanceOf(
			PositionUnavailableError,
		);
	});
});

describe('runStickyScenario', () => {
	it('should keep every user on one replica and write only to the primary', async () => {
		const cluster = createInMemoryCluster();
		const context = contextFor(cluster, { name: 'sticky' });

		const steps = await runStickyScenario(context);

		expect(steps.map((s) => s.sessionId)).toEqual(['alice', 'bob', 'charlie', 'alice', 'alice', 'alice']);
		const aliceTargets = new Set(steps.filter((s) => s.sessionId === 'alice').map((s) => s.target));
		expect(aliceTargets.size).toBe(1);
		expect(steps.every((s) => s.label === `REPLICA ${s.target} (sticky)`)).toBe(true);
		expect(cluster.primary.log.map((e) => e.row.ownerId)).toEqual(['alice', 'bob', 'charlie']);
		expect(cluster.replicas.map((r) => r.calls.insertRecord)).toEqual([0, 0]);
	});
});

describe('runLagScenario', () => {
	it('should insert the rows and return the reported standbys', async () => {
		const inserted: number[] = [];
		const status: ReplicaStatus = {
			applicationName: 'replica1',
			clientAddress: '172.18.0.3',
			state: 'streaming',
			replayPosition: LogPosition.parse('0/4000000'),
			lagBytes: 0x1000000n,
			replayLagSeconds: 1.5,
		};
		const primary = {
			async bulkInsert(count: number) {
				inserted.push(count);
				return count;
			},
			async replicationStatus() {
				return [status];
			},
		};

		const statuses = await runLagScenario(primary, 1000, logger);

		expect(inserted).toEqual([1000]);
		expect(statuses).toEqual([status]);
	});
});
