/**
 * Tests for scanTuples.
 */

import { expect } from 'chai';
import { Elem, Subspace, type Tuple } from '@tuplekey/tuple';
import { InMemoryKVStore } from '../src/common/memory-store.js';
import { scanTuples } from '../src/common/tuple-scan.js';
import { collect } from './utils.js';

describe('scanTuples', () => {
	const users = new Subspace([Elem.text('users')]);
	const orders = new Subspace([Elem.text('orders')]);
	let store: InMemoryKVStore;

	const rows: Tuple[] = [
		[Elem.int(10), Elem.text('name')],
		[Elem.int(-3), Elem.text('name')],
		[Elem.int(10), Elem.text('email')],
		[Elem.int(2)],
		[Elem.null()],
	];

	beforeEach(async () => {
		store = new InMemoryKVStore();
		for (const [i, row] of rows.entries()) {
			await store.put(users.pack(row), new Uint8Array([i]));
		}
		await store.put(orders.pack([Elem.int(1)]), new Uint8Array([99]));
	});

	afterEach(async () => {
		await store.close();
	});

	it('yields decoded keys in tuple order', async () => {
		const keys = (await collect(scanTuples(store, users))).map(e => e.key);
		expect(keys).to.deep.equal([
			[Elem.null()],
			[Elem.int(-3), Elem.text('name')],
			[Elem.int(2)],
			[Elem.int(10), Elem.text('email')],
			[Elem.int(10), Elem.text('name')],
		]);
	});

	it('keeps values with their keys', async () => {
		const entries = await collect(scanTuples(store, users, { prefix: [Elem.int(-3)] }));
		expect(entries).to.have.length(1);
		expect(entries[0].value).to.deep.equal(new Uint8Array([1]));
	});

	it('restricts to a tuple prefix', async () => {
		const keys = (await collect(scanTuples(store, users, { prefix: [Elem.int(10)] }))).map(e => e.key);
		expect(keys).to.deep.equal([
			[Elem.int(10), Elem.text('email')],
			[Elem.int(10), Elem.text('name')],
		]);
	});

	it('scans backwards with a limit', async () => {
		const keys = (await collect(scanTuples(store, users, { reverse: true, limit: 2 }))).map(e => e.key);
		expect(keys).to.deep.equal([
			[Elem.int(10), Elem.text('name')],
			[Elem.int(10), Elem.text('email')],
		]);
	});

	it('stays inside its subspace', async () => {
		const entries = await collect(scanTuples(store, orders));
		expect(entries.map(e => e.key)).to.deep.equal([[Elem.int(1)]]);
	});
});
