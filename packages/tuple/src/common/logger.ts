import debug from 'debug';

// Base namespace for the project
const BASE_NAMESPACE = 'tuplekey';

/**
 * Creates a namespaced debug logger instance.
 *
 * Example: createLogger('tuple:decode') -> returns a debugger for 'tuplekey:tuple:decode'
 *
 * Usage:
 * const log = createLogger('tuple:decode');
 * log('Decoding %d bytes', bytes.length);
 * const errorLog = log.extend('error'); // Creates 'tuplekey:tuple:decode:error'
 * errorLog('Decode failed: %O', error);
 *
 * @param subNamespace The specific subsystem namespace (e.g. 'tuple:encode', 'store:transaction')
 */
export function createLogger(subNamespace: string): debug.Debugger {
	return debug(`${BASE_NAMESPACE}:${subNamespace}`);
}

/**
 * Enable tuplekey debug logging programmatically.
 *
 * @param pattern - Debug pattern to enable (default: 'tuplekey:*')
 *   Examples:
 *   - 'tuplekey:*' - everything
 *   - 'tuplekey:tuple:*' - codec only
 *   - 'tuplekey:store:transaction' - commit and versionstamp patching
 * @param logFn - Optional custom log function. Defaults to the debug library's stderr writer.
 *
 * @example
 * ```typescript
 * import { enableLogging } from '@tuplekey/tuple';
 *
 * enableLogging('tuplekey:store:*');
 * ```
 */
export function enableLogging(
	pattern: string = `${BASE_NAMESPACE}:*`,
	logFn?: (...args: unknown[]) => void
): void {
	if (logFn) {
		debug.log = logFn;
	}
	debug.enable(pattern);
}

/** Disable all tuplekey debug logging. */
export function disableLogging(): void {
	debug.disable();
}

/**
 * Check if logging is enabled for a specific namespace.
 * @param namespace - The namespace to check (without 'tuplekey:' prefix)
 */
export function isLoggingEnabled(namespace: string): boolean {
	return debug.enabled(`${BASE_NAMESPACE}:${namespace}`);
}
