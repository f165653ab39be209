/**
 * Tests for versionstamps and the versionstamped mutation encoding.
 */

import { expect } from 'chai';
import {
	Elem,
	MisuseError,
	StatusCode,
	TupleError,
	completeVersionstamp,
	decodeVersionstamp,
	encodeVersionstamp,
	incompleteVersionstamp,
	pack,
	packWithVersionstamp,
	tuplesEqual,
	unpack,
	versionstampFromTransactionVersion,
	versionstampToString,
	versionstampsEqual,
} from '../src/index.js';

const PLACEHOLDER = [0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff];

function trailerOffset(bytes: Uint8Array): number {
	return bytes[bytes.length - 2] | (bytes[bytes.length - 1] << 8);
}

describe('Versionstamps', () => {
	describe('construction', () => {
		it('accepts the full unsigned ranges', () => {
			const vs = completeVersionstamp(0xfffffffffffffffen, 0xffff, 0xffff);
			expect(vs).to.deep.equal({ complete: true, transactionVersion: 0xfffffffffffffffen, batchNumber: 0xffff, userVersion: 0xffff });
		});

		it('rejects out-of-range fields', () => {
			expect(() => completeVersionstamp(-1n, 0, 0)).to.throw(TupleError, /64-bit/);
			expect(() => completeVersionstamp(1n << 64n, 0, 0)).to.throw(TupleError, /64-bit/);
			expect(() => completeVersionstamp(1n, 0x10000, 0)).to.throw(TupleError, /batchNumber/);
			expect(() => completeVersionstamp(1n, 0, -1)).to.throw(TupleError, /userVersion/);
			expect(() => incompleteVersionstamp(1.5)).to.throw(TupleError, /userVersion/);
		});

		it('accepts the all-ones transaction version and batch number', () => {
			expect(completeVersionstamp(0xffffffffffffffffn, 0xffff, 5)).to.deep.equal({
				complete: true, transactionVersion: 0xffffffffffffffffn, batchNumber: 0xffff, userVersion: 5,
			});
		});

		it('builds a complete stamp from commit bytes', () => {
			const commit = new Uint8Array([0, 0, 0, 0, 0, 0, 0x04, 0xd2, 0x00, 0x03]);
			expect(versionstampFromTransactionVersion(commit, 9)).to.deep.equal(completeVersionstamp(1234n, 3, 9));
			expect(() => versionstampFromTransactionVersion(new Uint8Array(9))).to.throw(TupleError, /10 transaction version bytes/);
		});
	});

	describe('12-byte form', () => {
		it('writes complete stamps big-endian', () => {
			expect(encodeVersionstamp(completeVersionstamp(0x0102030405060708n, 0x090a, 0x0b0c)))
				.to.deep.equal(new Uint8Array([1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12]));
		});

		it('writes incomplete stamps as a placeholder', () => {
			expect(encodeVersionstamp(incompleteVersionstamp(0x0102)))
				.to.deep.equal(new Uint8Array([...PLACEHOLDER, 0x01, 0x02]));
		});

		it('reads placeholder bytes back as the all-ones complete stamp', () => {
			expect(decodeVersionstamp(new Uint8Array([...PLACEHOLDER, 0x00, 0x05])))
				.to.deep.equal(completeVersionstamp(0xffffffffffffffffn, 0xffff, 5));
		});

		it('compares structurally', () => {
			expect(versionstampsEqual(completeVersionstamp(1n, 2, 3), completeVersionstamp(1n, 2, 3))).to.be.true;
			expect(versionstampsEqual(completeVersionstamp(1n, 2, 3), completeVersionstamp(1n, 2, 4))).to.be.false;
			expect(versionstampsEqual(incompleteVersionstamp(3), incompleteVersionstamp(3))).to.be.true;
			expect(versionstampsEqual(incompleteVersionstamp(3), completeVersionstamp(1n, 2, 3))).to.be.false;
		});

		it('formats for diagnostics', () => {
			expect(versionstampToString(completeVersionstamp(1234n, 1, 0))).to.equal('Versionstamp(0x00000000000004d2:0001:0000)');
			expect(versionstampToString(incompleteVersionstamp(2))).to.equal('Versionstamp(<incomplete>:0002)');
		});
	});

	describe('pack', () => {
		it('round-trips complete stamps exactly', () => {
			const tuple = [Elem.versionstamp(completeVersionstamp(0xdeadbeefdeadbeefn, 0xbeef, 12))];
			const [decoded] = unpack(pack(tuple));
			expect(decoded).to.deep.equal({
				kind: 'versionstamp',
				value: { complete: true, transactionVersion: 0xdeadbeefdeadbeefn, batchNumber: 0xbeef, userVersion: 12 },
			});
		});

		it('round-trips the all-ones complete stamp', () => {
			const tuple = [Elem.text('k'), Elem.versionstamp(completeVersionstamp(0xffffffffffffffffn, 0xffff, 5))];
			const packed = pack(tuple);
			expect(Array.from(packed.subarray(3))).to.deep.equal([0x33, ...PLACEHOLDER, 0x00, 0x05]);
			expect(tuplesEqual(unpack(packed), tuple)).to.be.true;
		});

		it('rejects incomplete stamps', () => {
			expect(() => pack([Elem.versionstamp(incompleteVersionstamp())]))
				.to.throw(MisuseError, /packWithVersionstamp/);
			expect(() => pack([Elem.tuple([Elem.versionstamp(incompleteVersionstamp())])]))
				.to.throw(MisuseError);
		});
	});

	describe('packWithVersionstamp', () => {
		it('appends the placeholder offset as a little-endian trailer', () => {
			const packed = packWithVersionstamp([Elem.text('k'), Elem.versionstamp(incompleteVersionstamp(7))]);
			expect(packed).to.deep.equal(new Uint8Array([
				0x02, 0x6b, 0x00,
				0x33, ...PLACEHOLDER, 0x00, 0x07,
				0x04, 0x00,
			]));
			expect(trailerOffset(packed)).to.equal(4);
		});

		it('counts the prefix in the offset', () => {
			const packed = packWithVersionstamp([Elem.text('k'), Elem.versionstamp(incompleteVersionstamp(7))], new Uint8Array([0xaa, 0xbb]));
			expect(packed.length).to.equal(20);
			expect(trailerOffset(packed)).to.equal(6);
			expect(Array.from(packed.subarray(6, 16))).to.deep.equal(PLACEHOLDER);
		});

		it('finds a stamp inside a nested tuple', () => {
			const packed = packWithVersionstamp([Elem.tuple([Elem.int(1), Elem.versionstamp(incompleteVersionstamp())])]);
			expect(trailerOffset(packed)).to.equal(4);
			expect(Array.from(packed.subarray(4, 14))).to.deep.equal(PLACEHOLDER);
		});

		it('leaves a placeholder that decodes as the all-ones stamp once the trailer is dropped', () => {
			const packed = packWithVersionstamp([Elem.int(5), Elem.versionstamp(incompleteVersionstamp(3))]);
			expect(unpack(packed.subarray(0, packed.length - 2))).to.deep.equal([
				Elem.int(5),
				Elem.versionstamp(completeVersionstamp(0xffffffffffffffffn, 0xffff, 3)),
			]);
		});

		it('requires exactly one incomplete stamp', () => {
			expect(() => packWithVersionstamp([Elem.int(1)])).to.throw(MisuseError, /found 0/);
			expect(() => packWithVersionstamp([
				Elem.versionstamp(incompleteVersionstamp(1)),
				Elem.tuple([Elem.versionstamp(incompleteVersionstamp(2))]),
			])).to.throw(MisuseError, /found 2/);
		});

		it('rejects offsets that do not fit in two bytes', () => {
			const prefix = new Uint8Array(0x10000);
			expect(() => packWithVersionstamp([Elem.versionstamp(incompleteVersionstamp())], prefix))
				.to.throw(TupleError)
				.with.property('code', StatusCode.TOOBIG);
		});
	});
});
