/**
 * Transaction coordinator.
 *
 * Buffers mutations and writes them to the store in one batch on commit.
 * Versionstamped mutations carry a packWithVersionstamp trailer; at commit
 * the coordinator overwrites the 10-byte placeholder with the commit's
 * version and batch number and drops the trailer, which is the database's
 * half of the offset-trailer contract.
 */

import {
	MisuseError,
	StatusCode,
	TupleError,
	tags,
	toHex,
} from '@tuplekey/tuple';
import type { KVStore } from './kv-store.js';
import { transactionLog as log } from './logger.js';
import { type CommitVersion, VersionClock, commitVersionBytes } from './version-clock.js';

/** Operation recorded in the transaction. */
type PendingOp =
	| { type: 'put'; key: Uint8Array; value: Uint8Array }
	| { type: 'delete'; key: Uint8Array }
	| { type: 'versionstamped-key'; key: Uint8Array; offset: number; value: Uint8Array }
	| { type: 'versionstamped-value'; key: Uint8Array; value: Uint8Array; offset: number };

/** Callback for transaction lifecycle events. */
export interface TransactionCallbacks {
	/** `versionstamp` is the 10 transaction bytes, absent when nothing was written. */
	onCommit: (versionstamp: Uint8Array | undefined) => void;
	onRollback: () => void;
}

interface Deferred<T> {
	promise: Promise<T>;
	resolve: (value: T) => void;
	reject: (reason: Error) => void;
}

function defer<T>(): Deferred<T> {
	let resolve: (value: T) => void = () => undefined;
	let reject: (reason: Error) => void = () => undefined;
	const promise = new Promise<T>((res, rej) => {
		resolve = res;
		reject = rej;
	});
	return { promise, resolve, reject };
}

/**
 * Split a versionstamped argument into its body and placeholder offset.
 */
export function splitVersionstampTrailer(bytes: Uint8Array): { body: Uint8Array; offset: number } {
	if (bytes.length < tags.VERSIONSTAMP_TRAILER_BYTES) {
		throw new MisuseError('Versionstamped argument is missing its offset trailer');
	}
	const bodyLength = bytes.length - tags.VERSIONSTAMP_TRAILER_BYTES;
	const offset = new DataView(bytes.buffer, bytes.byteOffset + bodyLength, tags.VERSIONSTAMP_TRAILER_BYTES)
		.getUint16(0, true);
	if (offset + tags.TRANSACTION_VERSION_BYTES > bodyLength) {
		throw new MisuseError(`Versionstamp offset ${offset} leaves no room for the placeholder in ${bodyLength} bytes`);
	}
	return { body: bytes.slice(0, bodyLength), offset };
}

function patch(body: Uint8Array, offset: number, stamp: Uint8Array): Uint8Array {
	const out = body.slice();
	out.set(stamp, offset);
	return out;
}

/**
 * Coordinates a single transaction against a KVStore.
 *
 * All mutations are buffered. On commit they are written atomically and
 * versionstamped arguments are completed. On rollback they are discarded.
 */
export class TransactionCoordinator {
	private readonly store: KVStore;
	private readonly clock: VersionClock;

	private inTransaction = false;
	private pendingOps: PendingOp[] = [];
	private callbacks: TransactionCallbacks[] = [];
	private versionstamp?: Deferred<Uint8Array>;

	constructor(store: KVStore, clock: VersionClock = new VersionClock()) {
		this.store = store;
		this.clock = clock;
	}

	/** Register callbacks for transaction lifecycle events. */
	registerCallbacks(callbacks: TransactionCallbacks): void {
		this.callbacks.push(callbacks);
	}

	isInTransaction(): boolean {
		return this.inTransaction;
	}

	/** Begin a transaction. No-op when one is already open. */
	begin(): void {
		if (this.inTransaction) {
			return;
		}
		this.inTransaction = true;
		this.pendingOps = [];
		this.versionstamp = undefined;
	}

	put(key: Uint8Array, value: Uint8Array): void {
		this.checkActive();
		this.pendingOps.push({ type: 'put', key: key.slice(), value: value.slice() });
	}

	delete(key: Uint8Array): void {
		this.checkActive();
		this.pendingOps.push({ type: 'delete', key: key.slice() });
	}

	/**
	 * Queue a put whose key holds an incomplete versionstamp.
	 * @param keyWithTrailer Output of packWithVersionstamp
	 */
	setVersionstampedKey(keyWithTrailer: Uint8Array, value: Uint8Array): void {
		this.checkActive();
		const { body, offset } = splitVersionstampTrailer(keyWithTrailer);
		this.pendingOps.push({ type: 'versionstamped-key', key: body, offset, value: value.slice() });
	}

	/**
	 * Queue a put whose value holds an incomplete versionstamp.
	 * @param valueWithTrailer Output of packWithVersionstamp
	 */
	setVersionstampedValue(key: Uint8Array, valueWithTrailer: Uint8Array): void {
		this.checkActive();
		const { body, offset } = splitVersionstampTrailer(valueWithTrailer);
		this.pendingOps.push({ type: 'versionstamped-value', key: key.slice(), value: body, offset });
	}

	/**
	 * The 10 transaction bytes this transaction's versionstamps receive.
	 * Resolves after commit; rejects on rollback or on a commit with no writes.
	 */
	getVersionstamp(): Promise<Uint8Array> {
		this.checkActive();
		this.versionstamp ??= defer<Uint8Array>();
		return this.versionstamp.promise;
	}

	async commit(): Promise<void> {
		if (!this.inTransaction) {
			return;
		}

		const waiting = this.versionstamp;
		try {
			if (this.pendingOps.length === 0) {
				waiting?.reject(new TupleError('Transaction committed without writes has no versionstamp', StatusCode.MISUSE));
				for (const cb of this.callbacks) {
					cb.onCommit(undefined);
				}
				return;
			}

			const commit: CommitVersion = this.clock.next();
			const stamp = commitVersionBytes(commit);

			const batch = this.store.batch();
			for (const op of this.pendingOps) {
				switch (op.type) {
					case 'put':
						batch.put(op.key, op.value);
						break;
					case 'delete':
						batch.delete(op.key);
						break;
					case 'versionstamped-key':
						batch.put(patch(op.key, op.offset, stamp), op.value);
						break;
					case 'versionstamped-value':
						batch.put(op.key, patch(op.value, op.offset, stamp));
						break;
				}
			}
			await batch.write();

			log('Committed %d operations at version %s batch %d (%s)',
				this.pendingOps.length, commit.version.toString(), commit.batchNumber, toHex(stamp));

			waiting?.resolve(stamp);
			for (const cb of this.callbacks) {
				cb.onCommit(stamp);
			}
		} catch (e) {
			waiting?.reject(e instanceof Error ? e : new TupleError(String(e)));
			throw e;
		} finally {
			this.clearTransaction();
		}
	}

	rollback(): void {
		if (!this.inTransaction) {
			return;
		}

		this.versionstamp?.reject(new TupleError('Transaction rolled back', StatusCode.ERROR));

		for (const cb of this.callbacks) {
			cb.onRollback();
		}

		this.clearTransaction();
	}

	/** Get the underlying store for direct reads. */
	getStore(): KVStore {
		return this.store;
	}

	private checkActive(): void {
		if (!this.inTransaction) {
			throw new MisuseError('Cannot queue operation outside transaction');
		}
	}

	private clearTransaction(): void {
		this.inTransaction = false;
		this.pendingOps = [];
		this.versionstamp = undefined;
	}
}
