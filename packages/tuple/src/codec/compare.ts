/**
 * Semantic ordering of tuples.
 *
 * Agrees with byte-wise comparison of the packed form: compareTuples(a, b)
 * has the same sign as compareBytes(pack(a), pack(b)).
 */

import { compareBytes } from './bytes.js';
import type { Elem, Tuple } from './elements.js';
import { doubleOrderBytes, floatOrderBytes } from './float.js';
import {
	BYTES_CODE,
	DOUBLE_CODE,
	FALSE_CODE,
	FLOAT_CODE,
	INT_ZERO_CODE,
	NESTED_CODE,
	NULL_CODE,
	STRING_CODE,
	TRUE_CODE,
	UUID_CODE,
	VERSIONSTAMP_CODE,
} from './tags.js';
import { encodeVersionstamp } from './versionstamp.js';

const textEncoder = new TextEncoder();

/** Position of an element's type in the cross-type order. */
function typeRank(elem: Elem): number {
	switch (elem.kind) {
		case 'null': return NULL_CODE;
		case 'bytes': return BYTES_CODE;
		case 'text': return STRING_CODE;
		case 'tuple': return NESTED_CODE;
		case 'int': return INT_ZERO_CODE;
		case 'float': return FLOAT_CODE;
		case 'double': return DOUBLE_CODE;
		case 'bool': return elem.value ? TRUE_CODE : FALSE_CODE;
		case 'uuid': return UUID_CODE;
		case 'versionstamp': return VERSIONSTAMP_CODE;
	}
}

function sign(n: number): number {
	return n < 0 ? -1 : n > 0 ? 1 : 0;
}

export function compareElems(a: Elem, b: Elem): number {
	const rank = sign(typeRank(a) - typeRank(b));
	if (rank !== 0) return rank;

	switch (a.kind) {
		case 'null':
			return 0;
		case 'bytes':
			return b.kind === 'bytes' ? compareBytes(a.value, b.value) : 0;
		case 'text':
			// UTF-8 byte order is code point order; UTF-16 `<` is not.
			return b.kind === 'text' ? compareBytes(textEncoder.encode(a.value), textEncoder.encode(b.value)) : 0;
		case 'tuple':
			return b.kind === 'tuple' ? compareTuples(a.value, b.value) : 0;
		case 'int':
			return b.kind === 'int' ? (a.value < b.value ? -1 : a.value > b.value ? 1 : 0) : 0;
		case 'float':
			return b.kind === 'float' ? compareBytes(floatOrderBytes(a.value), floatOrderBytes(b.value)) : 0;
		case 'double':
			return b.kind === 'double' ? compareBytes(doubleOrderBytes(a.value), doubleOrderBytes(b.value)) : 0;
		case 'bool':
			return 0;
		case 'uuid': {
			if (b.kind !== 'uuid') return 0;
			const x = a.value;
			const y = b.value;
			return sign(x.w1 - y.w1) || sign(x.w2 - y.w2) || sign(x.w3 - y.w3) || sign(x.w4 - y.w4);
		}
		case 'versionstamp':
			return b.kind === 'versionstamp'
				? compareBytes(encodeVersionstamp(a.value), encodeVersionstamp(b.value))
				: 0;
	}
}

/** Element-wise; a proper prefix sorts first. */
export function compareTuples(a: Tuple, b: Tuple): number {
	const len = Math.min(a.length, b.length);
	for (let i = 0; i < len; i++) {
		const cmp = compareElems(a[i], b[i]);
		if (cmp !== 0) return cmp;
	}
	return sign(a.length - b.length);
}
