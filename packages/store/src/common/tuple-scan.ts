/**
 * Range reads that hand back decoded tuple keys.
 */

import type { Subspace, Tuple } from '@tuplekey/tuple';
import type { KVStore } from './kv-store.js';

export interface TupleEntry {
	key: Tuple;
	value: Uint8Array;
}

export interface ScanTuplesOptions {
	/** Only keys whose tuple starts with these elements. */
	prefix?: Tuple;
	reverse?: boolean;
	limit?: number;
}

/**
 * Iterate every key stored under `subspace` (optionally below `prefix`) in
 * tuple order, decoding each key relative to the subspace.
 */
export async function* scanTuples(
	store: KVStore,
	subspace: Subspace,
	options: ScanTuplesOptions = {}
): AsyncIterable<TupleEntry> {
	const { begin, end } = subspace.range(options.prefix ?? []);
	for await (const entry of store.iterate({ gte: begin, lt: end, reverse: options.reverse, limit: options.limit })) {
		yield { key: subspace.unpack(entry.key), value: entry.value };
	}
}
