/**
 * In-memory KVStore implementation.
 *
 * Stands in for the database in tests and tools. Entries are kept in a
 * Map keyed by hex (hex preserves byte order) and sorted on iteration.
 */

import { MisuseError, compareBytes, toHex } from '@tuplekey/tuple';
import type { BatchOp, IterateOptions, KVEntry, KVStore, WriteBatch } from './kv-store.js';
import { memoryLog } from './logger.js';

function inRange(key: Uint8Array, options: IterateOptions | undefined): boolean {
	if (!options) return true;
	if (options.gte && compareBytes(key, options.gte) < 0) return false;
	if (options.gt && compareBytes(key, options.gt) <= 0) return false;
	if (options.lte && compareBytes(key, options.lte) > 0) return false;
	if (options.lt && compareBytes(key, options.lt) >= 0) return false;
	return true;
}

export class InMemoryKVStore implements KVStore {
	private data = new Map<string, KVEntry>();
	private closed = false;

	async get(key: Uint8Array): Promise<Uint8Array | undefined> {
		this.checkOpen();
		return this.data.get(toHex(key))?.value;
	}

	async put(key: Uint8Array, value: Uint8Array): Promise<void> {
		this.checkOpen();
		// Store copies to prevent external mutation
		this.data.set(toHex(key), {
			key: new Uint8Array(key),
			value: new Uint8Array(value),
		});
	}

	async delete(key: Uint8Array): Promise<void> {
		this.checkOpen();
		this.data.delete(toHex(key));
	}

	async has(key: Uint8Array): Promise<boolean> {
		this.checkOpen();
		return this.data.has(toHex(key));
	}

	async *iterate(options?: IterateOptions): AsyncIterable<KVEntry> {
		this.checkOpen();

		const entries = Array.from(this.data.values())
			.filter(entry => inRange(entry.key, options))
			.sort((a, b) => compareBytes(a.key, b.key));

		if (options?.reverse) {
			entries.reverse();
		}

		const limit = options?.limit ?? entries.length;
		for (let i = 0; i < entries.length && i < limit; i++) {
			yield entries[i];
		}
	}

	batch(): WriteBatch {
		const ops: BatchOp[] = [];
		const store = this;

		return {
			put(key: Uint8Array, value: Uint8Array): void {
				ops.push({ type: 'put', key: new Uint8Array(key), value: new Uint8Array(value) });
			},
			delete(key: Uint8Array): void {
				ops.push({ type: 'delete', key: new Uint8Array(key) });
			},
			async write(): Promise<void> {
				store.checkOpen();
				for (const op of ops) {
					if (op.type === 'put') {
						await store.put(op.key, op.value);
					} else {
						await store.delete(op.key);
					}
				}
				memoryLog('Wrote batch of %d operations', ops.length);
				ops.length = 0;
			},
			clear(): void {
				ops.length = 0;
			},
		};
	}

	async close(): Promise<void> {
		this.closed = true;
		this.data.clear();
	}

	async approximateCount(options?: IterateOptions): Promise<number> {
		this.checkOpen();
		if (!options) {
			return this.data.size;
		}
		let count = 0;
		for (const entry of this.data.values()) {
			if (inRange(entry.key, options)) count++;
		}
		return options.limit !== undefined ? Math.min(count, options.limit) : count;
	}

	/**
	 * Clear all data without closing the store.
	 */
	clear(): void {
		this.checkOpen();
		this.data.clear();
	}

	get size(): number {
		return this.data.size;
	}

	private checkOpen(): void {
		if (this.closed) {
			throw new MisuseError('InMemoryKVStore is closed');
		}
	}
}
