/**
 * Order-preserving IEEE 754 encoding.
 *
 * The big-endian bit pattern has its sign bit flipped; negative values have
 * every other bit flipped as well. Byte order then matches numeric order:
 *   -NaN < -Inf < -1 < -0 < +0 < +1 < +Inf < +NaN
 */

import { TupleDecodeError } from '../common/errors.js';
import type { ByteWriter } from './bytes.js';
import { DOUBLE_BYTES, FLOAT_BYTES } from './tags.js';

/** Apply the ordering transform in place. */
function orderBits(bytes: Uint8Array): void {
	if ((bytes[0] & 0x80) !== 0) {
		for (let i = 0; i < bytes.length; i++) {
			bytes[i] ^= 0xff;
		}
	} else {
		bytes[0] ^= 0x80;
	}
}

/** Undo orderBits in place. A cleared high bit means the value was negative. */
function restoreBits(bytes: Uint8Array): void {
	if ((bytes[0] & 0x80) === 0) {
		for (let i = 0; i < bytes.length; i++) {
			bytes[i] ^= 0xff;
		}
	} else {
		bytes[0] ^= 0x80;
	}
}

export function floatOrderBytes(value: number): Uint8Array {
	const bytes = new Uint8Array(FLOAT_BYTES);
	new DataView(bytes.buffer).setFloat32(0, value, false);
	orderBits(bytes);
	return bytes;
}

export function doubleOrderBytes(value: number): Uint8Array {
	const bytes = new Uint8Array(DOUBLE_BYTES);
	new DataView(bytes.buffer).setFloat64(0, value, false);
	orderBits(bytes);
	return bytes;
}

export function encodeFloat(value: number, out: ByteWriter): void {
	out.writeBytes(floatOrderBytes(value));
}

export function encodeDouble(value: number, out: ByteWriter): void {
	out.writeBytes(doubleOrderBytes(value));
}

/** `offset` points at the tag; the payload follows it. */
export function decodeFloat(bytes: Uint8Array, offset: number): { value: number; next: number } {
	const start = offset + 1;
	if (start + FLOAT_BYTES > bytes.length) {
		throw new TupleDecodeError('truncated', offset, `expected ${FLOAT_BYTES} float bytes`);
	}
	const copy = bytes.slice(start, start + FLOAT_BYTES);
	restoreBits(copy);
	return { value: new DataView(copy.buffer).getFloat32(0, false), next: start + FLOAT_BYTES };
}

export function decodeDouble(bytes: Uint8Array, offset: number): { value: number; next: number } {
	const start = offset + 1;
	if (start + DOUBLE_BYTES > bytes.length) {
		throw new TupleDecodeError('truncated', offset, `expected ${DOUBLE_BYTES} double bytes`);
	}
	const copy = bytes.slice(start, start + DOUBLE_BYTES);
	restoreBits(copy);
	return { value: new DataView(copy.buffer).getFloat64(0, false), next: start + DOUBLE_BYTES };
}
