/**
 * Test helpers: a seeded generator of random tuples.
 */

import { Elem, type Tuple, completeVersionstamp, uuid } from '../src/index.js';

/** Deterministic PRNG (mulberry32) so failures reproduce. */
export function seededRandom(seed: number): () => number {
	let state = seed >>> 0;
	return () => {
		state = (state + 0x6d2b79f5) >>> 0;
		let t = state;
		t = Math.imul(t ^ (t >>> 15), t | 1);
		t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
		return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
	};
}

function randInt(rand: () => number, maxExclusive: number): number {
	return Math.floor(rand() * maxExclusive);
}

function randBytes(rand: () => number, maxLength: number): Uint8Array {
	const out = new Uint8Array(randInt(rand, maxLength + 1));
	for (let i = 0; i < out.length; i++) {
		// Bias toward 0x00 and 0xFF to exercise escaping.
		const pick = rand();
		out[i] = pick < 0.2 ? 0x00 : pick < 0.3 ? 0xff : randInt(rand, 256);
	}
	return out;
}

function randBigInt(rand: () => number): bigint {
	const length = randInt(rand, 20);
	let value = 0n;
	for (let i = 0; i < length; i++) {
		value = (value << 8n) | BigInt(randInt(rand, 256));
	}
	return rand() < 0.5 ? -value : value;
}

function randText(rand: () => number): string {
	const length = randInt(rand, 8);
	let text = '';
	for (let i = 0; i < length; i++) {
		const pick = rand();
		if (pick < 0.15) {
			text += '\u0000';
		} else if (pick < 0.6) {
			text += String.fromCodePoint(0x20 + randInt(rand, 0x5f));
		} else if (pick < 0.85) {
			// BMP, skipping the surrogate block
			const cp = 0x80 + randInt(rand, 0xd800 - 0x80);
			text += String.fromCodePoint(cp);
		} else {
			text += String.fromCodePoint(0x10000 + randInt(rand, 0x10ffff - 0x10000));
		}
	}
	return text;
}

const SPECIAL_DOUBLES = [0, -0, 1, -1, 1.5, -1.5, Infinity, -Infinity, NaN, Number.MIN_VALUE, -Number.MAX_VALUE];

function randDouble(rand: () => number): number {
	if (rand() < 0.3) {
		return SPECIAL_DOUBLES[randInt(rand, SPECIAL_DOUBLES.length)];
	}
	return (rand() - 0.5) * 10 ** randInt(rand, 40);
}

function randWord(rand: () => number): number {
	return randInt(rand, 0x10000) * 0x10000 + randInt(rand, 0x10000);
}

export function randomElem(rand: () => number, depth: number = 0): Elem {
	switch (randInt(rand, depth < 2 ? 10 : 9)) {
		case 0: return Elem.null();
		case 1: return Elem.bytes(randBytes(rand, 6));
		case 2: return Elem.text(randText(rand));
		case 3: return Elem.int(randBigInt(rand));
		case 4: return Elem.float(randDouble(rand));
		case 5: return Elem.double(randDouble(rand));
		case 6: return Elem.bool(rand() < 0.5);
		case 7: return Elem.uuid(uuid(randWord(rand), randWord(rand), randWord(rand), randWord(rand)));
		case 8: return Elem.versionstamp(completeVersionstamp(
			BigInt(randWord(rand)) << 32n | BigInt(randWord(rand)) >> 1n,
			randInt(rand, 0x10000),
			randInt(rand, 0x10000),
		));
		default: return Elem.tuple(randomTuple(rand, depth + 1));
	}
}

export function randomTuple(rand: () => number, depth: number = 0): Tuple {
	const length = randInt(rand, 5);
	const tuple: Elem[] = [];
	for (let i = 0; i < length; i++) {
		tuple.push(randomElem(rand, depth));
	}
	return tuple;
}

/** Format bytes for assertion messages. */
export function hex(bytes: Uint8Array): string {
	return Array.from(bytes).map(b => b.toString(16).padStart(2, '0')).join(' ');
}
