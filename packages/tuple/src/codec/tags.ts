/**
 * Type tags for the ordered tuple encoding.
 *
 * Tags sort in the same order as the types they introduce, so comparing
 * encoded tuples byte-wise compares first by type and then by value:
 *
 *   0x00        null
 *   0x01        byte string
 *   0x02        text (UTF-8)
 *   0x05        nested tuple
 *   0x0B        negative integer, explicit length byte
 *   0x0C..0x13  negative integer, 8..1 magnitude bytes
 *   0x14        integer zero
 *   0x15..0x1C  positive integer, 1..8 magnitude bytes
 *   0x1D        positive integer, explicit length byte
 *   0x20        float (IEEE 754 binary32)
 *   0x21        double (IEEE 754 binary64)
 *   0x26        false
 *   0x27        true
 *   0x30        UUID
 *   0x33        versionstamp (96 bits)
 *
 * These values are part of the stored key format. Changing any of them
 * invalidates every key already written.
 */

export const NULL_CODE = 0x00;
export const BYTES_CODE = 0x01;
export const STRING_CODE = 0x02;
export const NESTED_CODE = 0x05;
export const NEG_INT_START = 0x0b;
export const INT_ZERO_CODE = 0x14;
export const POS_INT_END = 0x1d;
export const FLOAT_CODE = 0x20;
export const DOUBLE_CODE = 0x21;
export const FALSE_CODE = 0x26;
export const TRUE_CODE = 0x27;
export const UUID_CODE = 0x30;
export const VERSIONSTAMP_CODE = 0x33;

/** Terminator for byte strings, text and nested tuples. */
export const TERMINATOR = 0x00;

/** Second byte of an escaped 0x00 inside a byte string, text or nested tuple. */
export const ESCAPE = 0xff;

/** Largest magnitude, in bytes, that the fixed integer tags express. */
export const MAX_FIXED_INT_BYTES = 8;

/** Largest magnitude, in bytes, that the extended integer form expresses. */
export const MAX_EXTENDED_INT_BYTES = 0xff;

export const FLOAT_BYTES = 4;
export const DOUBLE_BYTES = 8;
export const UUID_BYTES = 16;
export const VERSIONSTAMP_BYTES = 12;

/** Bytes of a versionstamp the database fills in at commit. */
export const TRANSACTION_VERSION_BYTES = 10;

/** Size of the little-endian offset appended by packWithVersionstamp. */
export const VERSIONSTAMP_TRAILER_BYTES = 2;
