/**
 * Database Migration Runner
 *
 * Applies the SQL files in `migrations/` in file-name order over a single
 * non-pooled connection. Every statement in them is idempotent, so running
 * the migrations twice is harmless.
 */

import { readdir, readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { join } from 'node:path';
import type { Logger } from '@readroute/logging';
import { createDatabase } from './connection.js';

export const MIGRATIONS_FOLDER = fileURLToPath(new URL('../migrations/', import.meta.url));

/**
 * Run every migration against the database at `databaseUrl`.
 *
 * @returns the file names applied, in order
 */
export async function runMigrations(
	databaseUrl: string,
	logger: Logger,
	migrationsFolder: string = MIGRATIONS_FOLDER,
): Promise<string[]> {
	const files = (await readdir(migrationsFolder)).filter((name) => name.endsWith('.sql')).sort();
	const database = createDatabase({ url: databaseUrl, maxConnections: 1 });
	try {
		for (const file of files) {
			const text = await readFile(join(migrationsFolder, file), 'utf8');
			await database.client.unsafe(text);
			logger.info({ migration: file }, 'Migration applied');
		}
		return files;
	} finally {
		await database.close();
	}
}
