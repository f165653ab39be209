/**
 * Configuration types for the store package.
 */

/**
 * Logging configuration.
 */
export interface LoggingConfig {
	/** Debug namespace filter (e.g., 'tuplekey:*'). Unset leaves DEBUG in charge. */
	namespaces?: string;
}

/**
 * Full store configuration.
 */
export interface StoreConfig {
	/** Commit version handed to the first committed transaction. */
	initialVersion: bigint;
	/** Amount the commit version grows between commit batches. */
	versionStep: number;
	/**
	 * Transactions sharing one commit version. Each gets its own batch
	 * number (0, 1, ...) within the version.
	 */
	commitBatchSize: number;

	logging: LoggingConfig;
}

/**
 * Partial configuration, as read from a file, the environment or code.
 */
export interface PartialStoreConfig {
	initialVersion?: bigint;
	versionStep?: number;
	commitBatchSize?: number;
	logging?: Partial<LoggingConfig>;
}

export const DEFAULT_CONFIG: StoreConfig = {
	initialVersion: 1n,
	versionStep: 1,
	commitBatchSize: 1,
	logging: {},
};
