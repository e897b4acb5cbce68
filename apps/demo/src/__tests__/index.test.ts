import { describe, it, expect } from 'vitest';
import { createSilentLogger } from '@readroute/logging';
import { ConfigurationError } from '@readroute/routing';
import { createInMemoryCluster } from '@readroute/routing/testing';
import { loadEnv } from '../env.js';
import { runDemo } from '../index.js';
import type { LagSource } from '../scenarios/index.js';

const logger = createSilentLogger();

function lagSource(inserted: number[]): LagSource {
	return {
		async bulkInsert(count) {
			inserted.push(count);
			return count;
		},
		async replicationStatus() {
			return [];
		},
	};
}

describe('runDemo', () => {
	it('should run lag against a primary without replicas', async () => {
		const cluster = createInMemoryCluster({ replicaIds: [] });
		const inserted: number[] = [];
		const env = loadEnv({ LAG_ROWS: '1000' });

		await runDemo('lag', env, logger, {
			connect: async () => ({ registry: cluster.registry, primary: lagSource(inserted) }),
		});

		expect(inserted).toEqual([1000]);
		expect(cluster.primary.closed).toBe(true);
	});

	it('should close the cluster when the strategy needs replicas it does not have', async () => {
		const cluster = createInMemoryCluster({ replicaIds: [] });
		const inserted: number[] = [];

		await expect(
			runDemo('time', loadEnv({}), logger, {
				connect: async () => ({ registry: cluster.registry, primary: lagSource(inserted) }),
			}),
		).rejects.toThrow(new ConfigurationError('No replicas configured'));

		expect(inserted).toEqual([]);
		expect(cluster.primary.closed).toBe(true);
	});
});
