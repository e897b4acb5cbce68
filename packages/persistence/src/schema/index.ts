export {
	replicationRecords,
	type ReplicationRecordRecord,
	type NewReplicationRecordRecord,
} from './replication-records.js';
