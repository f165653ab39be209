/**
 * Subspaces: a fixed key prefix built from a raw byte prefix and a packed tuple.
 *
 * Storage keys under a subspace are `prefix || pack(tuple)`. Range scans over
 * everything stored below a tuple use range(), which relies on every packed
 * element starting with a tag in 0x01..0xFE.
 */

import { MisuseError } from './common/errors.js';
import { concatBytes, startsWith, toHex } from './codec/bytes.js';
import { unpack } from './codec/decoding.js';
import type { Tuple } from './codec/elements.js';
import { pack, packWithVersionstamp } from './codec/encoding.js';

export interface KeyRange {
	/** Inclusive lower bound. */
	begin: Uint8Array;
	/** Exclusive upper bound. */
	end: Uint8Array;
}

export class Subspace {
	private readonly rawPrefix: Uint8Array;

	constructor(prefixTuple: Tuple = [], rawPrefix: Uint8Array = new Uint8Array(0)) {
		this.rawPrefix = pack(prefixTuple, rawPrefix);
	}

	/** The subspace's own key prefix. */
	key(): Uint8Array {
		return this.rawPrefix.slice();
	}

	pack(tuple: Tuple = []): Uint8Array {
		return pack(tuple, this.rawPrefix);
	}

	/** Versionstamped mutation encoding; the trailer offset counts the prefix. */
	packWithVersionstamp(tuple: Tuple): Uint8Array {
		return packWithVersionstamp(tuple, this.rawPrefix);
	}

	unpack(key: Uint8Array): Tuple {
		if (!this.contains(key)) {
			throw new MisuseError(`Key ${toHex(key)} is not in subspace ${toHex(this.rawPrefix)}`);
		}
		return unpack(key, this.rawPrefix.length);
	}

	contains(key: Uint8Array): boolean {
		return startsWith(key, this.rawPrefix);
	}

	/** Child subspace whose prefix extends this one by `tuple`. */
	subspace(tuple: Tuple): Subspace {
		return new Subspace(tuple, this.rawPrefix);
	}

	/**
	 * Range holding every key that packs a tuple beginning with `tuple`,
	 * excluding the key for `tuple` itself.
	 */
	range(tuple: Tuple = []): KeyRange {
		const packed = this.pack(tuple);
		return {
			begin: concatBytes(packed, new Uint8Array([0x00])),
			end: concatBytes(packed, new Uint8Array([0xff])),
		};
	}
}
