/**
 * Commit version source for the in-memory store.
 *
 * Issues (version, batch number) pairs in strictly increasing order. Up to
 * commitBatchSize consecutive commits share a version and are told apart by
 * batch number, as transactions committed together by one database proxy are.
 */

import { StatusCode, TupleError } from '@tuplekey/tuple';
import type { StoreConfig } from '../config/types.js';
import { DEFAULT_CONFIG } from '../config/types.js';

const MAX_U64 = 0xffff_ffff_ffff_ffffn;

export interface CommitVersion {
	readonly version: bigint;
	readonly batchNumber: number;
}

export type VersionClockOptions = Pick<StoreConfig, 'initialVersion' | 'versionStep' | 'commitBatchSize'>;

export class VersionClock {
	private version: bigint;
	private batchIndex = 0;
	private readonly step: bigint;
	private readonly batchSize: number;

	constructor(options: VersionClockOptions = DEFAULT_CONFIG) {
		this.version = options.initialVersion;
		this.step = BigInt(options.versionStep);
		this.batchSize = options.commitBatchSize;
	}

	next(): CommitVersion {
		if (this.batchIndex >= this.batchSize) {
			this.version += this.step;
			this.batchIndex = 0;
		}
		if (this.version > MAX_U64) {
			throw new TupleError('Commit version exhausted the 64-bit range', StatusCode.RANGE);
		}
		return { version: this.version, batchNumber: this.batchIndex++ };
	}
}

/** The 10 transaction bytes of a versionstamp: version u64 BE, batch u16 BE. */
export function commitVersionBytes(commit: CommitVersion): Uint8Array {
	const out = new Uint8Array(10);
	const view = new DataView(out.buffer);
	view.setBigUint64(0, commit.version, false);
	view.setUint16(8, commit.batchNumber, false);
	return out;
}
