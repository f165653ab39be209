/**
 * Tests for subspaces and key range helpers.
 */

import { expect } from 'chai';
import {
	Elem,
	MisuseError,
	Subspace,
	TupleError,
	compareBytes,
	incompleteVersionstamp,
	strinc,
} from '../src/index.js';

const APP_PREFIX = [0x02, 0x61, 0x70, 0x70, 0x00]; // ('app',)

describe('Subspace', () => {
	const app = new Subspace([Elem.text('app')]);

	it('packs its prefix tuple into the key', () => {
		expect(Array.from(app.key())).to.deep.equal(APP_PREFIX);
	});

	it('prefixes packed tuples', () => {
		expect(Array.from(app.pack([Elem.int(1)]))).to.deep.equal([...APP_PREFIX, 0x15, 0x01]);
	});

	it('combines a raw prefix with the tuple prefix', () => {
		const raw = new Subspace([Elem.int(0)], new Uint8Array([0xfe]));
		expect(Array.from(raw.pack([Elem.bool(true)]))).to.deep.equal([0xfe, 0x14, 0x27]);
	});

	it('unpacks keys relative to the prefix', () => {
		const key = app.pack([Elem.text('users'), Elem.int(42)]);
		expect(app.unpack(key)).to.deep.equal([Elem.text('users'), Elem.int(42)]);
	});

	it('rejects keys from another subspace', () => {
		const other = new Subspace([Elem.text('other')]);
		expect(app.contains(other.pack([Elem.int(1)]))).to.be.false;
		expect(() => app.unpack(other.pack([Elem.int(1)]))).to.throw(MisuseError, /not in subspace/);
	});

	it('nests child subspaces', () => {
		const users = app.subspace([Elem.text('users')]);
		expect(users.pack([Elem.int(1)])).to.deep.equal(app.pack([Elem.text('users'), Elem.int(1)]));
		expect(app.contains(users.key())).to.be.true;
	});

	it('builds a range covering every key below a tuple', () => {
		const { begin, end } = app.range([Elem.text('users')]);
		const inside = [
			app.pack([Elem.text('users'), Elem.null()]),
			app.pack([Elem.text('users'), Elem.int(-1000)]),
			app.pack([Elem.text('users'), Elem.tuple([Elem.bytes(new Uint8Array([0xff]))])]),
			app.pack([Elem.text('users'), Elem.bool(true), Elem.int(3)]),
		];
		const outside = [
			app.pack([Elem.text('users')]),
			app.pack([Elem.text('user')]),
			app.pack([Elem.text('users2'), Elem.int(1)]),
		];
		for (const key of inside) {
			expect(compareBytes(key, begin)).to.be.at.least(0);
			expect(compareBytes(key, end)).to.equal(-1);
		}
		for (const key of outside) {
			const below = compareBytes(key, begin) < 0;
			const above = compareBytes(key, end) >= 0;
			expect(below || above).to.be.true;
		}
	});

	it('builds the whole-subspace range by default', () => {
		const { begin, end } = app.range();
		expect(Array.from(begin)).to.deep.equal([...APP_PREFIX, 0x00]);
		expect(Array.from(end)).to.deep.equal([...APP_PREFIX, 0xff]);
	});

	it('packs versionstamped keys with the offset past the prefix', () => {
		const packed = app.packWithVersionstamp([Elem.versionstamp(incompleteVersionstamp())]);
		expect(packed[packed.length - 2]).to.equal(APP_PREFIX.length + 1);
		expect(packed[packed.length - 1]).to.equal(0);
	});
});

describe('strinc', () => {
	it('increments the last byte', () => {
		expect(Array.from(strinc(new Uint8Array([0x01, 0x02])))).to.deep.equal([0x01, 0x03]);
	});

	it('drops trailing 0xFF bytes first', () => {
		expect(Array.from(strinc(new Uint8Array([0x01, 0x02, 0xff, 0xff])))).to.deep.equal([0x01, 0x03]);
	});

	it('rejects keys made only of 0xFF', () => {
		expect(() => strinc(new Uint8Array([0xff, 0xff]))).to.throw(TupleError, /not 0xFF/);
		expect(() => strinc(new Uint8Array(0))).to.throw(TupleError);
	});
});
