/**
 * Tuple encoder.
 *
 * Elements are written back to back, each introduced by its tag. Byte
 * strings, text and nested tuples end in an unescaped 0x00; any 0x00 inside
 * them is written as 0x00 0xFF. Inside a nested tuple a null element is also
 * written as 0x00 0xFF so it cannot be mistaken for the terminator.
 */

import { MisuseError, TupleError } from '../common/errors.js';
import { createLogger } from '../common/logger.js';
import { StatusCode } from '../common/types.js';
import { ByteWriter } from './bytes.js';
import { type Elem, type Tuple, countIncompleteVersionstamps } from './elements.js';
import { encodeDouble, encodeFloat } from './float.js';
import { encodeInteger } from './integer.js';
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
	UUID_CODE,
	VERSIONSTAMP_CODE,
	VERSIONSTAMP_TRAILER_BYTES,
} from './tags.js';
import { uuidToBytes } from './uuid.js';
import { encodeVersionstamp } from './versionstamp.js';

const log = createLogger('tuple:encode');

const textEncoder = new TextEncoder();

/** Offsets of incomplete versionstamp placeholders seen while encoding. */
interface EncodeState {
	readonly placeholders: number[];
}

function writeEscaped(payload: Uint8Array, out: ByteWriter): void {
	let from = 0;
	for (let i = 0; i < payload.length; i++) {
		if (payload[i] === TERMINATOR) {
			out.writeBytes(payload.subarray(from, i + 1));
			out.writeByte(ESCAPE);
			from = i + 1;
		}
	}
	out.writeBytes(payload.subarray(from));
	out.writeByte(TERMINATOR);
}

function writeElem(elem: Elem, out: ByteWriter, nested: boolean, state: EncodeState): void {
	switch (elem.kind) {
		case 'null':
			out.writeByte(NULL_CODE);
			if (nested) out.writeByte(ESCAPE);
			return;
		case 'bytes':
			out.writeByte(BYTES_CODE);
			writeEscaped(elem.value, out);
			return;
		case 'text':
			out.writeByte(STRING_CODE);
			writeEscaped(textEncoder.encode(elem.value), out);
			return;
		case 'int':
			encodeInteger(elem.value, out);
			return;
		case 'float':
			out.writeByte(FLOAT_CODE);
			encodeFloat(elem.value, out);
			return;
		case 'double':
			out.writeByte(DOUBLE_CODE);
			encodeDouble(elem.value, out);
			return;
		case 'bool':
			out.writeByte(elem.value ? TRUE_CODE : FALSE_CODE);
			return;
		case 'uuid':
			out.writeByte(UUID_CODE);
			out.writeBytes(uuidToBytes(elem.value));
			return;
		case 'tuple':
			out.writeByte(NESTED_CODE);
			for (const inner of elem.value) {
				writeElem(inner, out, true, state);
			}
			out.writeByte(TERMINATOR);
			return;
		case 'versionstamp':
			out.writeByte(VERSIONSTAMP_CODE);
			if (!elem.value.complete) {
				state.placeholders.push(out.length);
			}
			out.writeBytes(encodeVersionstamp(elem.value));
			return;
	}
}

function writeTuple(tuple: Tuple, prefix: Uint8Array | undefined, state: EncodeState): ByteWriter {
	const out = new ByteWriter((prefix?.length ?? 0) + tuple.length * 10);
	if (prefix) out.writeBytes(prefix);
	for (const elem of tuple) {
		writeElem(elem, out, false, state);
	}
	return out;
}

/**
 * Encode a single element with top-level rules.
 */
export function encodeElem(elem: Elem): Uint8Array {
	return pack([elem]);
}

/**
 * Encode a tuple into order-preserving bytes, optionally after a raw prefix.
 *
 * Tuples holding an incomplete versionstamp are rejected: their bytes only
 * make sense to the database as a versionstamped mutation argument, which
 * packWithVersionstamp produces.
 */
export function pack(tuple: Tuple, prefix?: Uint8Array): Uint8Array {
	const state: EncodeState = { placeholders: [] };
	const out = writeTuple(tuple, prefix, state);
	if (state.placeholders.length > 0) {
		throw new MisuseError('Tuple contains an incomplete versionstamp; use packWithVersionstamp for versionstamped mutations');
	}
	return out.finish();
}

/**
 * Encode a tuple holding exactly one incomplete versionstamp for a
 * versionstamped key or value mutation.
 *
 * The result ends with a 2-byte little-endian trailer giving the offset,
 * from the start of the result (prefix included), of the 10-byte
 * placeholder. The database overwrites the placeholder at commit and drops
 * the trailer. These bytes do not unpack: strip the trailer first.
 */
export function packWithVersionstamp(tuple: Tuple, prefix?: Uint8Array): Uint8Array {
	const count = countIncompleteVersionstamps(tuple);
	if (count !== 1) {
		throw new MisuseError(`packWithVersionstamp requires exactly one incomplete versionstamp, found ${count}`);
	}

	const state: EncodeState = { placeholders: [] };
	const out = writeTuple(tuple, prefix, state);
	const offset = state.placeholders[0];
	if (offset > 0xffff) {
		throw new TupleError(`Versionstamp offset ${offset} does not fit the 2-byte trailer`, StatusCode.TOOBIG);
	}

	const trailer = new Uint8Array(VERSIONSTAMP_TRAILER_BYTES);
	new DataView(trailer.buffer).setUint16(0, offset, true);
	out.writeBytes(trailer);

	log('Packed versionstamped tuple: %d bytes, placeholder at %d', out.length, offset);
	return out.finish();
}
