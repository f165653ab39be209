/**
 * Abstract sorted key-value store interface.
 * Keys are compared as unsigned byte sequences, the order packed tuples rely on.
 */

/** Range and direction of a scan. Unset bounds are open. */
export interface IterateOptions {
	gte?: Uint8Array;
	gt?: Uint8Array;
	lte?: Uint8Array;
	lt?: Uint8Array;
	/** Iterate from the upper bound down. Bounds keep their meaning. */
	reverse?: boolean;
	/** Applied after ordering, so a reverse scan keeps the highest keys. */
	limit?: number;
}

export interface KVEntry {
	key: Uint8Array;
	value: Uint8Array;
}

export type BatchOp =
	| { type: 'put'; key: Uint8Array; value: Uint8Array }
	| { type: 'delete'; key: Uint8Array };

/** Operations queued against a store and applied together by write(). */
export interface WriteBatch {
	put(key: Uint8Array, value: Uint8Array): void;
	delete(key: Uint8Array): void;
	/** Apply the queued operations in order, then empty the batch. */
	write(): Promise<void>;
	clear(): void;
}

export interface KVStore {
	/** Undefined when the key is absent. */
	get(key: Uint8Array): Promise<Uint8Array | undefined>;

	put(key: Uint8Array, value: Uint8Array): Promise<void>;

	delete(key: Uint8Array): Promise<void>;

	has(key: Uint8Array): Promise<boolean>;

	/** Entries within the bounds, ascending by unsigned byte order unless reversed. */
	iterate(options?: IterateOptions): AsyncIterable<KVEntry>;

	batch(): WriteBatch;

	/** Every later call fails with MisuseError. */
	close(): Promise<void>;

	/**
	 * Number of keys in a range (exact for the in-memory store).
	 */
	approximateCount(options?: IterateOptions): Promise<number>;
}
