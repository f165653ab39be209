/**
 * Common utilities for the store package.
 */

export type {
	KVStore,
	KVEntry,
	WriteBatch,
	BatchOp,
	IterateOptions,
} from './kv-store.js';

export { InMemoryKVStore } from './memory-store.js';

export {
	VersionClock,
	commitVersionBytes,
	type CommitVersion,
	type VersionClockOptions,
} from './version-clock.js';

export {
	TransactionCoordinator,
	splitVersionstampTrailer,
	type TransactionCallbacks,
} from './transaction.js';

export { scanTuples, type TupleEntry, type ScanTuplesOptions } from './tuple-scan.js';

export { createLogger } from './logger.js';
