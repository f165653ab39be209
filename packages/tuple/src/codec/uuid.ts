/**
 * 128-bit UUID held as four unsigned 32-bit words, most significant first.
 */

import { TupleError } from '../common/errors.js';
import { StatusCode } from '../common/types.js';
import { UUID_BYTES } from './tags.js';

export interface Uuid {
	readonly w1: number;
	readonly w2: number;
	readonly w3: number;
	readonly w4: number;
}

function checkWord(word: number, name: string): void {
	if (!Number.isInteger(word) || word < 0 || word > 0xffffffff) {
		throw new TupleError(`UUID word ${name} out of range: ${word}`, StatusCode.RANGE);
	}
}

export function uuid(w1: number, w2: number, w3: number, w4: number): Uuid {
	checkWord(w1, 'w1');
	checkWord(w2, 'w2');
	checkWord(w3, 'w3');
	checkWord(w4, 'w4');
	return { w1, w2, w3, w4 };
}

/**
 * Parse the canonical 8-4-4-4-12 hex form.
 */
export function parseUuid(text: string): Uuid {
	const hex = text.trim().toLowerCase();
	if (!/^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/.test(hex)) {
		throw new TupleError(`Malformed UUID: ${text}`, StatusCode.FORMAT);
	}
	const digits = hex.replace(/-/g, '');
	return uuid(
		parseInt(digits.slice(0, 8), 16),
		parseInt(digits.slice(8, 16), 16),
		parseInt(digits.slice(16, 24), 16),
		parseInt(digits.slice(24, 32), 16),
	);
}

export function formatUuid(value: Uuid): string {
	const digits = [value.w1, value.w2, value.w3, value.w4]
		.map(w => w.toString(16).padStart(8, '0'))
		.join('');
	return `${digits.slice(0, 8)}-${digits.slice(8, 12)}-${digits.slice(12, 16)}-${digits.slice(16, 20)}-${digits.slice(20)}`;
}

export function uuidToBytes(value: Uuid): Uint8Array {
	const out = new Uint8Array(UUID_BYTES);
	const view = new DataView(out.buffer);
	view.setUint32(0, value.w1, false);
	view.setUint32(4, value.w2, false);
	view.setUint32(8, value.w3, false);
	view.setUint32(12, value.w4, false);
	return out;
}

export function uuidFromBytes(bytes: Uint8Array, offset: number = 0): Uuid {
	if (offset + UUID_BYTES > bytes.length) {
		throw new TupleError(`Expected ${UUID_BYTES} bytes for UUID`, StatusCode.FORMAT);
	}
	const view = new DataView(bytes.buffer, bytes.byteOffset + offset, UUID_BYTES);
	return {
		w1: view.getUint32(0, false),
		w2: view.getUint32(4, false),
		w3: view.getUint32(8, false),
		w4: view.getUint32(12, false),
	};
}

export function uuidsEqual(a: Uuid, b: Uuid): boolean {
	return a.w1 === b.w1 && a.w2 === b.w2 && a.w3 === b.w3 && a.w4 === b.w4;
}
