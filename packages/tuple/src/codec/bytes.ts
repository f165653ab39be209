/**
 * Byte helpers shared by the encoder, decoder and subspace code.
 */

import { TupleError } from '../common/errors.js';
import { StatusCode } from '../common/types.js';

/**
 * Growable output buffer. The encoder appends to one writer per pack call
 * and nested tuples write into the same writer.
 */
export class ByteWriter {
	private buf: Uint8Array;
	private pos = 0;

	constructor(initialCapacity: number = 64) {
		this.buf = new Uint8Array(Math.max(initialCapacity, 16));
	}

	get length(): number {
		return this.pos;
	}

	writeByte(byte: number): void {
		this.ensure(1);
		this.buf[this.pos++] = byte;
	}

	writeBytes(bytes: Uint8Array): void {
		this.ensure(bytes.length);
		this.buf.set(bytes, this.pos);
		this.pos += bytes.length;
	}

	/** Copy of the bytes written so far. */
	finish(): Uint8Array {
		return this.buf.slice(0, this.pos);
	}

	private ensure(extra: number): void {
		if (this.pos + extra <= this.buf.length) return;
		let capacity = this.buf.length * 2;
		while (capacity < this.pos + extra) capacity *= 2;
		const next = new Uint8Array(capacity);
		next.set(this.buf.subarray(0, this.pos));
		this.buf = next;
	}
}

/**
 * Unsigned lexicographic comparison. Returns -1, 0 or 1.
 * A proper prefix sorts before any longer sequence it prefixes.
 */
export function compareBytes(a: Uint8Array, b: Uint8Array): number {
	const len = Math.min(a.length, b.length);
	for (let i = 0; i < len; i++) {
		if (a[i] !== b[i]) {
			return a[i] < b[i] ? -1 : 1;
		}
	}
	return a.length === b.length ? 0 : a.length < b.length ? -1 : 1;
}

/**
 * Concatenate multiple byte arrays.
 */
export function concatBytes(...arrays: Uint8Array[]): Uint8Array {
	const totalLength = arrays.reduce((sum, arr) => sum + arr.length, 0);
	const result = new Uint8Array(totalLength);
	let offset = 0;
	for (const arr of arrays) {
		result.set(arr, offset);
		offset += arr.length;
	}
	return result;
}

export function startsWith(bytes: Uint8Array, prefix: Uint8Array): boolean {
	if (prefix.length > bytes.length) return false;
	for (let i = 0; i < prefix.length; i++) {
		if (bytes[i] !== prefix[i]) return false;
	}
	return true;
}

/**
 * First key that sorts after every key beginning with `key`.
 * Trailing 0xFF bytes are dropped, then the last byte is incremented.
 */
export function strinc(key: Uint8Array): Uint8Array {
	let end = key.length;
	while (end > 0 && key[end - 1] === 0xff) end--;
	if (end === 0) {
		throw new TupleError('Key must contain at least one byte that is not 0xFF', StatusCode.RANGE);
	}
	const result = key.slice(0, end);
	result[end - 1]++;
	return result;
}

/** Lowercase hex, two digits per byte. */
export function toHex(bytes: Uint8Array): string {
	return Array.from(bytes).map(b => b.toString(16).padStart(2, '0')).join('');
}
