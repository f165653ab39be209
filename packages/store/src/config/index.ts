/**
 * Configuration module exports.
 */

export {
	type StoreConfig,
	type PartialStoreConfig,
	type LoggingConfig,
	DEFAULT_CONFIG,
} from './types.js';

export {
	loadConfig,
	loadConfigFile,
	loadEnvConfig,
	parseConfigObject,
	type LoadConfigOptions,
} from './loader.js';
