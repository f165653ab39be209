import { StatusCode } from './types.js';

/**
 * Base class for tuple layer errors.
 * Carries a status code so callers can branch without matching on messages.
 */
export class TupleError extends Error {
	public code: number;
	public cause?: Error;

	constructor(message: string, code: number = StatusCode.ERROR, cause?: Error) {
		super(message);
		this.code = code;
		this.name = 'TupleError';
		this.cause = cause;

		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, TupleError);
		}
	}
}

/** Why a byte sequence failed to decode. */
export type DecodeFailure =
	| 'truncated'
	| 'unknown-tag'
	| 'invalid-nested-tuple'
	| 'invalid-utf8';

/**
 * Raised (or returned, from tryUnpack) when bytes are not a well-formed tuple.
 * `offset` is the position of the element that failed, not of the byte that
 * exposed the failure.
 */
export class TupleDecodeError extends TupleError {
	public readonly reason: DecodeFailure;
	public readonly offset: number;

	constructor(reason: DecodeFailure, offset: number, detail?: string, cause?: Error) {
		const code = reason === 'invalid-utf8' ? StatusCode.CORRUPT : StatusCode.FORMAT;
		super(`Tuple decode failed (${reason}) at offset ${offset}${detail ? `: ${detail}` : ''}`, code, cause);
		this.reason = reason;
		this.offset = offset;
		this.name = 'TupleDecodeError';
		Object.setPrototypeOf(this, TupleDecodeError.prototype);
	}
}

/**
 * Error thrown when the API is used incorrectly, e.g. handing an incomplete
 * versionstamp to the general encoder.
 */
export class MisuseError extends TupleError {
	constructor(message: string = 'API misuse') {
		super(message, StatusCode.MISUSE);
		this.name = 'MisuseError';
		Object.setPrototypeOf(this, MisuseError.prototype);
	}
}
