/**
 * Tuple decoder.
 *
 * Single pass, dispatching on each tag byte. The top level runs until the
 * input is exhausted; a nested tuple runs until its own unescaped 0x00.
 * Any failure aborts the whole decode. There is no partial result.
 */

import { MisuseError, TupleDecodeError } from '../common/errors.js';
import { createLogger } from '../common/logger.js';
import type { Elem, Tuple } from './elements.js';
import { decodeDouble, decodeFloat } from './float.js';
import { decodeInteger, isIntegerCode } from './integer.js';
import {
	BYTES_CODE,
	DOUBLE_CODE,
	ESCAPE,
	FALSE_CODE,
	FLOAT_CODE,
	NESTED_CODE,
	NULL_CODE,
	STRING_CODE,
	TERMINATOR,
	TRUE_CODE,
	UUID_BYTES,
	UUID_CODE,
	VERSIONSTAMP_BYTES,
	VERSIONSTAMP_CODE,
} from './tags.js';
import { uuidFromBytes } from './uuid.js';
import { decodeVersionstamp } from './versionstamp.js';

const log = createLogger('tuple:decode');
const errorLog = log.extend('error');

const textDecoder = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

export type DecodeResult =
	| { readonly ok: true; readonly value: Tuple }
	| { readonly ok: false; readonly error: TupleDecodeError };

interface Decoded<T> {
	value: T;
	next: number;
}

/** Read a 0x00-terminated, 0x00 0xFF-escaped payload following the tag at `offset`. */
function readEscaped(bytes: Uint8Array, offset: number): Decoded<Uint8Array> {
	const chunks: Uint8Array[] = [];
	let from = offset + 1;
	let i = from;
	while (i < bytes.length) {
		if (bytes[i] === TERMINATOR) {
			if (i + 1 < bytes.length && bytes[i + 1] === ESCAPE) {
				chunks.push(bytes.subarray(from, i + 1));
				i += 2;
				from = i;
				continue;
			}
			chunks.push(bytes.subarray(from, i));
			return { value: join(chunks), next: i + 1 };
		}
		i++;
	}
	throw new TupleDecodeError('truncated', offset, 'missing terminator');
}

function join(chunks: Uint8Array[]): Uint8Array {
	if (chunks.length === 1) return chunks[0].slice();
	const total = chunks.reduce((sum, c) => sum + c.length, 0);
	const out = new Uint8Array(total);
	let pos = 0;
	for (const chunk of chunks) {
		out.set(chunk, pos);
		pos += chunk.length;
	}
	return out;
}

function readText(bytes: Uint8Array, offset: number): Decoded<string> {
	const { value: payload, next } = readEscaped(bytes, offset);
	try {
		return { value: textDecoder.decode(payload), next };
	} catch (e) {
		throw new TupleDecodeError('invalid-utf8', offset, undefined, e instanceof Error ? e : undefined);
	}
}

function readElem(bytes: Uint8Array, offset: number): Decoded<Elem> {
	const code = bytes[offset];

	if (isIntegerCode(code)) {
		const { value, next } = decodeInteger(bytes, offset);
		return { value: { kind: 'int', value }, next };
	}

	switch (code) {
		case NULL_CODE:
			return { value: { kind: 'null' }, next: offset + 1 };
		case BYTES_CODE: {
			const { value, next } = readEscaped(bytes, offset);
			return { value: { kind: 'bytes', value }, next };
		}
		case STRING_CODE: {
			const { value, next } = readText(bytes, offset);
			return { value: { kind: 'text', value }, next };
		}
		case NESTED_CODE: {
			const { value, next } = readNested(bytes, offset);
			return { value: { kind: 'tuple', value }, next };
		}
		case FLOAT_CODE: {
			const { value, next } = decodeFloat(bytes, offset);
			return { value: { kind: 'float', value }, next };
		}
		case DOUBLE_CODE: {
			const { value, next } = decodeDouble(bytes, offset);
			return { value: { kind: 'double', value }, next };
		}
		case FALSE_CODE:
			return { value: { kind: 'bool', value: false }, next: offset + 1 };
		case TRUE_CODE:
			return { value: { kind: 'bool', value: true }, next: offset + 1 };
		case UUID_CODE:
			if (offset + 1 + UUID_BYTES > bytes.length) {
				throw new TupleDecodeError('truncated', offset, `expected ${UUID_BYTES} UUID bytes`);
			}
			return { value: { kind: 'uuid', value: uuidFromBytes(bytes, offset + 1) }, next: offset + 1 + UUID_BYTES };
		case VERSIONSTAMP_CODE:
			if (offset + 1 + VERSIONSTAMP_BYTES > bytes.length) {
				throw new TupleDecodeError('truncated', offset, `expected ${VERSIONSTAMP_BYTES} versionstamp bytes`);
			}
			return {
				value: { kind: 'versionstamp', value: decodeVersionstamp(bytes, offset + 1) },
				next: offset + 1 + VERSIONSTAMP_BYTES,
			};
		default:
			throw new TupleDecodeError('unknown-tag', offset, `0x${code.toString(16).padStart(2, '0')}`);
	}
}

function readNested(bytes: Uint8Array, offset: number): Decoded<Tuple> {
	const elems: Elem[] = [];
	let pos = offset + 1;
	for (;;) {
		if (pos >= bytes.length) {
			throw new TupleDecodeError('invalid-nested-tuple', offset, 'missing terminator');
		}
		if (bytes[pos] === TERMINATOR) {
			if (pos + 1 < bytes.length && bytes[pos + 1] === ESCAPE) {
				elems.push({ kind: 'null' });
				pos += 2;
				continue;
			}
			return { value: elems, next: pos + 1 };
		}
		const { value, next } = readElem(bytes, pos);
		elems.push(value);
		pos = next;
	}
}

/**
 * Decode a whole byte sequence into a tuple, skipping `prefixLength` leading
 * bytes. Throws TupleDecodeError on malformed input.
 */
export function unpack(bytes: Uint8Array, prefixLength: number = 0): Tuple {
	if (!Number.isInteger(prefixLength) || prefixLength < 0 || prefixLength > bytes.length) {
		throw new MisuseError(`Prefix length ${prefixLength} is outside 0..${bytes.length}`);
	}
	const elems: Elem[] = [];
	let pos = prefixLength;
	while (pos < bytes.length) {
		const { value, next } = readElem(bytes, pos);
		elems.push(value);
		pos = next;
	}
	return elems;
}

/**
 * Decode without throwing. Decode failures come back as `{ ok: false }`;
 * anything else propagates.
 */
export function tryUnpack(bytes: Uint8Array, prefixLength: number = 0): DecodeResult {
	try {
		return { ok: true, value: unpack(bytes, prefixLength) };
	} catch (e) {
		if (e instanceof TupleDecodeError) {
			errorLog('Decode failed: %s', e.message);
			return { ok: false, error: e };
		}
		throw e;
	}
}
