/**
 * Arbitrary-precision integer encoding.
 *
 * Zero is the single byte INT_ZERO_CODE. A magnitude of n bytes (n <= 8) is
 * tagged INT_ZERO_CODE + n when positive and INT_ZERO_CODE - n when negative;
 * negative payloads are the one's complement of the magnitude, so larger
 * magnitudes produce smaller bytes. Longer magnitudes use the outermost tags
 * followed by an explicit length byte (complemented for negatives).
 */

import { TupleDecodeError, TupleError } from '../common/errors.js';
import { StatusCode } from '../common/types.js';
import type { ByteWriter } from './bytes.js';
import {
	INT_ZERO_CODE,
	MAX_EXTENDED_INT_BYTES,
	MAX_FIXED_INT_BYTES,
	NEG_INT_START,
	POS_INT_END,
} from './tags.js';

/** Number of bytes in the big-endian form of a non-negative bigint. */
export function byteLength(magnitude: bigint): number {
	if (magnitude === 0n) return 0;
	return Math.ceil(magnitude.toString(16).length / 2);
}

function toBigEndian(magnitude: bigint, length: number): Uint8Array {
	const out = new Uint8Array(length);
	let rest = magnitude;
	for (let i = length - 1; i >= 0; i--) {
		out[i] = Number(rest & 0xffn);
		rest >>= 8n;
	}
	return out;
}

function fromBigEndian(bytes: Uint8Array, start: number, length: number): bigint {
	let value = 0n;
	for (let i = start; i < start + length; i++) {
		value = (value << 8n) | BigInt(bytes[i]);
	}
	return value;
}

function allOnes(length: number): bigint {
	return (1n << BigInt(8 * length)) - 1n;
}

export function encodeInteger(value: bigint, out: ByteWriter): void {
	if (value === 0n) {
		out.writeByte(INT_ZERO_CODE);
		return;
	}

	const negative = value < 0n;
	const magnitude = negative ? -value : value;
	const length = byteLength(magnitude);

	if (length > MAX_EXTENDED_INT_BYTES) {
		throw new TupleError(`Integer magnitude of ${length} bytes exceeds the ${MAX_EXTENDED_INT_BYTES}-byte limit`, StatusCode.RANGE);
	}

	if (length <= MAX_FIXED_INT_BYTES) {
		if (negative) {
			out.writeByte(INT_ZERO_CODE - length);
			out.writeBytes(toBigEndian(allOnes(length) - magnitude, length));
		} else {
			out.writeByte(INT_ZERO_CODE + length);
			out.writeBytes(toBigEndian(magnitude, length));
		}
		return;
	}

	if (negative) {
		out.writeByte(NEG_INT_START);
		out.writeByte(length ^ 0xff);
		out.writeBytes(toBigEndian(allOnes(length) - magnitude, length));
	} else {
		out.writeByte(POS_INT_END);
		out.writeByte(length);
		out.writeBytes(toBigEndian(magnitude, length));
	}
}

/** True when `code` opens an integer. */
export function isIntegerCode(code: number): boolean {
	return code >= NEG_INT_START && code <= POS_INT_END;
}

/**
 * Decode the integer whose tag sits at `offset`.
 * Returns the value and the offset just past it.
 */
export function decodeInteger(bytes: Uint8Array, offset: number): { value: bigint; next: number } {
	const code = bytes[offset];
	if (code === INT_ZERO_CODE) {
		return { value: 0n, next: offset + 1 };
	}

	let start = offset + 1;
	let length: number;
	let negative: boolean;

	if (code === POS_INT_END || code === NEG_INT_START) {
		if (start >= bytes.length) {
			throw new TupleDecodeError('truncated', offset, 'missing integer length byte');
		}
		negative = code === NEG_INT_START;
		length = negative ? bytes[start] ^ 0xff : bytes[start];
		start++;
	} else {
		negative = code < INT_ZERO_CODE;
		length = negative ? INT_ZERO_CODE - code : code - INT_ZERO_CODE;
	}

	if (start + length > bytes.length) {
		throw new TupleDecodeError('truncated', offset, `expected ${length} integer bytes`);
	}

	const raw = fromBigEndian(bytes, start, length);
	const value = negative ? raw - allOnes(length) : raw;
	return { value, next: start + length };
}
