/**
 * Tuple element model.
 *
 * A closed union over the value types the ordered encoding supports. Each
 * variant maps to exactly one tag family (see tags.ts). Elements are plain
 * immutable objects; equality is structural.
 */

import { TupleError } from '../common/errors.js';
import { StatusCode } from '../common/types.js';
import { type Uuid, uuidsEqual } from './uuid.js';
import { type Versionstamp, versionstampsEqual } from './versionstamp.js';

export type Elem =
	| { readonly kind: 'null' }
	| { readonly kind: 'bytes'; readonly value: Uint8Array }
	| { readonly kind: 'text'; readonly value: string }
	| { readonly kind: 'int'; readonly value: bigint }
	| { readonly kind: 'float'; readonly value: number }
	| { readonly kind: 'double'; readonly value: number }
	| { readonly kind: 'bool'; readonly value: boolean }
	| { readonly kind: 'uuid'; readonly value: Uuid }
	| { readonly kind: 'tuple'; readonly value: Tuple }
	| { readonly kind: 'versionstamp'; readonly value: Versionstamp };

/** An ordered sequence of elements; one encodable unit. */
export type Tuple = readonly Elem[];

export type ElemKind = Elem['kind'];

const NULL_ELEM: Elem = { kind: 'null' };

/**
 * Element constructors.
 *
 * @example
 * ```typescript
 * const key: Tuple = [Elem.text('users'), Elem.int(42), Elem.bool(true)];
 * ```
 */
export const Elem = {
	null: (): Elem => NULL_ELEM,
	bytes: (value: Uint8Array): Elem => ({ kind: 'bytes', value }),
	text: (value: string): Elem => ({ kind: 'text', value }),
	int: (value: bigint | number): Elem => {
		if (typeof value === 'number') {
			if (!Number.isSafeInteger(value)) {
				throw new TupleError(`Integer element requires a safe integer or bigint, got ${value}`, StatusCode.RANGE);
			}
			return { kind: 'int', value: BigInt(value) };
		}
		return { kind: 'int', value };
	},
	/** Rounds to binary32 so the element holds what its 4-byte encoding reproduces. */
	float: (value: number): Elem => ({ kind: 'float', value: Math.fround(value) }),
	double: (value: number): Elem => ({ kind: 'double', value }),
	bool: (value: boolean): Elem => ({ kind: 'bool', value }),
	uuid: (value: Uuid): Elem => ({ kind: 'uuid', value }),
	tuple: (value: Tuple): Elem => ({ kind: 'tuple', value }),
	versionstamp: (value: Versionstamp): Elem => ({ kind: 'versionstamp', value }),
} as const;

function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
	if (a.length !== b.length) return false;
	for (let i = 0; i < a.length; i++) {
		if (a[i] !== b[i]) return false;
	}
	return true;
}

export function elemsEqual(a: Elem, b: Elem): boolean {
	switch (a.kind) {
		case 'null':
			return b.kind === 'null';
		case 'bytes':
			return b.kind === 'bytes' && bytesEqual(a.value, b.value);
		case 'text':
			return b.kind === 'text' && a.value === b.value;
		case 'int':
			return b.kind === 'int' && a.value === b.value;
		case 'float':
			return b.kind === 'float' && Object.is(a.value, b.value);
		case 'double':
			return b.kind === 'double' && Object.is(a.value, b.value);
		case 'bool':
			return b.kind === 'bool' && a.value === b.value;
		case 'uuid':
			return b.kind === 'uuid' && uuidsEqual(a.value, b.value);
		case 'tuple':
			return b.kind === 'tuple' && tuplesEqual(a.value, b.value);
		case 'versionstamp':
			return b.kind === 'versionstamp' && versionstampsEqual(a.value, b.value);
	}
}

export function tuplesEqual(a: Tuple, b: Tuple): boolean {
	if (a.length !== b.length) return false;
	for (let i = 0; i < a.length; i++) {
		if (!elemsEqual(a[i], b[i])) return false;
	}
	return true;
}

/** Count incomplete versionstamps, nested tuples included. */
export function countIncompleteVersionstamps(tuple: Tuple): number {
	let count = 0;
	for (const elem of tuple) {
		if (elem.kind === 'versionstamp' && !elem.value.complete) {
			count++;
		} else if (elem.kind === 'tuple') {
			count += countIncompleteVersionstamps(elem.value);
		}
	}
	return count;
}
