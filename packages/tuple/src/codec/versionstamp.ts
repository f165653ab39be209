/**
 * Versionstamps: 96-bit commit identifiers.
 *
 * Wire layout (12 bytes, big-endian):
 *   [0..7]   transaction version  u64  ─┐ assigned by the database at commit
 *   [8..9]   batch number         u16  ─┘
 *   [10..11] user version         u16     chosen by the caller
 *
 * An incomplete versionstamp writes 0xFF over the first 10 bytes. The
 * database overwrites them after commit, locating them through the offset
 * trailer that packWithVersionstamp appends. Decoding always yields a
 * complete stamp: the placeholder bytes read back as the all-ones version.
 */

import { TupleError } from '../common/errors.js';
import { StatusCode } from '../common/types.js';
import { TRANSACTION_VERSION_BYTES, VERSIONSTAMP_BYTES } from './tags.js';

const MAX_U64 = 0xffff_ffff_ffff_ffffn;
const MAX_U16 = 0xffff;

export interface CompleteVersionstamp {
	readonly complete: true;
	readonly transactionVersion: bigint;
	readonly batchNumber: number;
	readonly userVersion: number;
}

export interface IncompleteVersionstamp {
	readonly complete: false;
	readonly userVersion: number;
}

export type Versionstamp = CompleteVersionstamp | IncompleteVersionstamp;

function checkU16(value: number, name: string): void {
	if (!Number.isInteger(value) || value < 0 || value > MAX_U16) {
		throw new TupleError(`Versionstamp ${name} must be an unsigned 16-bit integer, got ${value}`, StatusCode.RANGE);
	}
}

export function completeVersionstamp(
	transactionVersion: bigint,
	batchNumber: number,
	userVersion: number = 0
): CompleteVersionstamp {
	if (transactionVersion < 0n || transactionVersion > MAX_U64) {
		throw new TupleError(`Versionstamp transactionVersion must be an unsigned 64-bit integer, got ${transactionVersion}`, StatusCode.RANGE);
	}
	checkU16(batchNumber, 'batchNumber');
	checkU16(userVersion, 'userVersion');
	return { complete: true, transactionVersion, batchNumber, userVersion };
}

export function incompleteVersionstamp(userVersion: number = 0): IncompleteVersionstamp {
	checkU16(userVersion, 'userVersion');
	return { complete: false, userVersion };
}

/**
 * Build a complete versionstamp from the 10 transaction bytes a commit yields.
 */
export function versionstampFromTransactionVersion(
	transactionBytes: Uint8Array,
	userVersion: number = 0
): CompleteVersionstamp {
	if (transactionBytes.length !== TRANSACTION_VERSION_BYTES) {
		throw new TupleError(`Expected ${TRANSACTION_VERSION_BYTES} transaction version bytes, got ${transactionBytes.length}`, StatusCode.FORMAT);
	}
	const view = new DataView(transactionBytes.buffer, transactionBytes.byteOffset, TRANSACTION_VERSION_BYTES);
	return completeVersionstamp(view.getBigUint64(0, false), view.getUint16(8, false), userVersion);
}

export function encodeVersionstamp(stamp: Versionstamp): Uint8Array {
	const out = new Uint8Array(VERSIONSTAMP_BYTES);
	const view = new DataView(out.buffer);
	if (stamp.complete) {
		view.setBigUint64(0, stamp.transactionVersion, false);
		view.setUint16(8, stamp.batchNumber, false);
	} else {
		out.fill(0xff, 0, TRANSACTION_VERSION_BYTES);
	}
	view.setUint16(10, stamp.userVersion, false);
	return out;
}

/**
 * Read 12 versionstamp bytes at `offset`.
 */
export function decodeVersionstamp(bytes: Uint8Array, offset: number = 0): CompleteVersionstamp {
	if (offset + VERSIONSTAMP_BYTES > bytes.length) {
		throw new TupleError(`Expected ${VERSIONSTAMP_BYTES} bytes for versionstamp`, StatusCode.FORMAT);
	}
	const view = new DataView(bytes.buffer, bytes.byteOffset + offset, VERSIONSTAMP_BYTES);
	return {
		complete: true,
		transactionVersion: view.getBigUint64(0, false),
		batchNumber: view.getUint16(8, false),
		userVersion: view.getUint16(10, false),
	};
}

export function versionstampsEqual(a: Versionstamp, b: Versionstamp): boolean {
	if (a.complete && b.complete) {
		return a.transactionVersion === b.transactionVersion
			&& a.batchNumber === b.batchNumber
			&& a.userVersion === b.userVersion;
	}
	return !a.complete && !b.complete && a.userVersion === b.userVersion;
}

/** Diagnostic form, e.g. `Versionstamp(0x00000000000004d2:0001:0000)`. */
export function versionstampToString(stamp: Versionstamp): string {
	const user = stamp.userVersion.toString(16).padStart(4, '0');
	if (!stamp.complete) {
		return `Versionstamp(<incomplete>:${user})`;
	}
	const tr = stamp.transactionVersion.toString(16).padStart(16, '0');
	const batch = stamp.batchNumber.toString(16).padStart(4, '0');
	return `Versionstamp(0x${tr}:${batch}:${user})`;
}
