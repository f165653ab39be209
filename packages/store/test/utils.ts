/**
 * Shared helpers for store tests.
 */

/** Collect all entries from an async iterable. */
export async function collect<T>(iter: AsyncIterable<T>): Promise<T[]> {
	const result: T[] = [];
	for await (const item of iter) result.push(item);
	return result;
}
