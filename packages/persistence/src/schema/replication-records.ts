/**
 * Replication Records Schema
 *
 * Append-only table written on the primary and read back from whichever
 * node the router picks. Mirrors migrations/0001_replication_records.sql.
 */

import { pgTable, serial, text, varchar, timestamp, index } from 'drizzle-orm/pg-core';
import { OWNER_ID_MAX_LENGTH } from '@readroute/routing';

export const replicationRecords = pgTable(
	'replication_records',
	{
		id: serial('id').primaryKey(),
		data: text('data').notNull(),
		// Structured owner identity used by per-user reads
		ownerId: varchar('owner_id', { length: OWNER_ID_MAX_LENGTH }),
		createdAt: timestamp('created_at', { withTimezone: true, mode: 'date' }).notNull().defaultNow(),
	},
	(table) => [index('idx_replication_records_owner').on(table.ownerId, table.id.desc())],
);

export type ReplicationRecordRecord = typeof replicationRecords.$inferSelect;
export type NewReplicationRecordRecord = typeof replicationRecords.$inferInsert;
