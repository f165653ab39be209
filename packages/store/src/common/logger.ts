/**
 * Debug loggers for the store package.
 *
 * Uses the 'debug' library for configurable, namespace-based logging.
 * Enable with DEBUG=tuplekey:store:* or enableLogging() from @tuplekey/tuple.
 */

import debug from 'debug';

const ROOT_NAMESPACE = 'tuplekey:store';

/**
 * Create a namespaced logger.
 *
 * @param namespace - Sub-namespace (e.g., 'memory', 'transaction')
 */
export function createLogger(namespace: string): debug.Debugger {
	return debug(`${ROOT_NAMESPACE}:${namespace}`);
}

export const memoryLog = createLogger('memory');
export const transactionLog = createLogger('transaction');
export const configLog = createLogger('config');
