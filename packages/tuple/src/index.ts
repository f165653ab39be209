/**
 * Ordered tuple encoding for sorted key-value stores.
 *
 * Packs typed, nested values into bytes whose unsigned lexicographic order
 * matches the values' order, so packed tuples can be used directly as keys.
 *
 * Usage:
 *   import { Elem, pack, unpack } from '@tuplekey/tuple';
 *
 *   const key = pack([Elem.text('users'), Elem.int(42)]);
 *   const [table, id] = unpack(key);
 */

// ─── Errors, logging ──────────────────────────────────────────────────────────
export { StatusCode } from './common/types.js';
export {
	TupleError,
	TupleDecodeError,
	MisuseError,
	type DecodeFailure,
} from './common/errors.js';
export { createLogger, enableLogging, disableLogging, isLoggingEnabled } from './common/logger.js';

// ─── Element model ────────────────────────────────────────────────────────────
export {
	Elem,
	elemsEqual,
	tuplesEqual,
	countIncompleteVersionstamps,
	type Tuple,
	type ElemKind,
} from './codec/elements.js';

export {
	uuid,
	parseUuid,
	formatUuid,
	uuidToBytes,
	uuidFromBytes,
	uuidsEqual,
	type Uuid,
} from './codec/uuid.js';

export {
	completeVersionstamp,
	incompleteVersionstamp,
	versionstampFromTransactionVersion,
	encodeVersionstamp,
	decodeVersionstamp,
	versionstampsEqual,
	versionstampToString,
	type Versionstamp,
	type CompleteVersionstamp,
	type IncompleteVersionstamp,
} from './codec/versionstamp.js';

// ─── Codec ────────────────────────────────────────────────────────────────────
export { pack, packWithVersionstamp, encodeElem } from './codec/encoding.js';
export { unpack, tryUnpack, type DecodeResult } from './codec/decoding.js';
export { compareElems, compareTuples } from './codec/compare.js';
export { compareBytes, concatBytes, startsWith, strinc, toHex } from './codec/bytes.js';
export * as tags from './codec/tags.js';

// ─── Subspace ─────────────────────────────────────────────────────────────────
export { Subspace, type KeyRange } from './subspace.js';
