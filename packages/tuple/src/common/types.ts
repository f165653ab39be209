/**
 * Status codes carried by tuple layer errors.
 * Numbering follows the SQLite-style codes used by the surrounding store.
 */
export enum StatusCode {
	ERROR = 1,
	CORRUPT = 11,
	TOOBIG = 18,
	MISUSE = 21,
	FORMAT = 24,
	RANGE = 25,
}
