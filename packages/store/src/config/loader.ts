/**
 * Configuration loading from multiple sources.
 *
 * Priority (highest to lowest):
 * 1. Programmatic overrides
 * 2. Environment variables
 * 3. Config file
 * 4. Defaults
 */

import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { StatusCode, TupleError, enableLogging } from '@tuplekey/tuple';
import { configLog } from '../common/logger.js';
import { type PartialStoreConfig, type StoreConfig, DEFAULT_CONFIG } from './types.js';

const MAX_U64 = 0xffff_ffff_ffff_ffffn;
const MAX_U16 = 0xffff;

function parseVersion(raw: unknown, source: string): bigint {
	let value: bigint;
	if (typeof raw === 'bigint') {
		value = raw;
	} else if (typeof raw === 'number' && Number.isSafeInteger(raw)) {
		value = BigInt(raw);
	} else if (typeof raw === 'string' && /^\d+$/.test(raw.trim())) {
		value = BigInt(raw.trim());
	} else {
		throw new TupleError(`${source}: expected a non-negative integer, got ${String(raw)}`, StatusCode.RANGE);
	}
	if (value < 0n || value > MAX_U64) {
		throw new TupleError(`${source}: version must fit in 64 bits`, StatusCode.RANGE);
	}
	return value;
}

function parsePositiveInt(raw: unknown, source: string, max: number): number {
	const value = typeof raw === 'string' ? Number(raw.trim()) : raw;
	if (typeof value !== 'number' || !Number.isInteger(value) || value < 1 || value > max) {
		throw new TupleError(`${source}: expected an integer between 1 and ${max}, got ${String(raw)}`, StatusCode.RANGE);
	}
	return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate a parsed JSON document into a partial configuration.
 */
export function parseConfigObject(raw: unknown, source: string = 'config'): PartialStoreConfig {
	if (!isRecord(raw)) {
		throw new TupleError(`${source}: expected a JSON object`, StatusCode.FORMAT);
	}
	const config: PartialStoreConfig = {};
	if (raw.initialVersion !== undefined) {
		config.initialVersion = parseVersion(raw.initialVersion, `${source}.initialVersion`);
	}
	if (raw.versionStep !== undefined) {
		config.versionStep = parsePositiveInt(raw.versionStep, `${source}.versionStep`, Number.MAX_SAFE_INTEGER);
	}
	if (raw.commitBatchSize !== undefined) {
		config.commitBatchSize = parsePositiveInt(raw.commitBatchSize, `${source}.commitBatchSize`, MAX_U16 + 1);
	}
	if (isRecord(raw.logging) && typeof raw.logging.namespaces === 'string') {
		config.logging = { namespaces: raw.logging.namespaces };
	}
	return config;
}

/**
 * Load configuration from a JSON file. A missing file yields no settings.
 */
export function loadConfigFile(configPath: string): PartialStoreConfig {
	const resolved = resolve(configPath);
	if (!existsSync(resolved)) {
		configLog('Config file not found: %s', resolved);
		return {};
	}

	let parsed: unknown;
	try {
		parsed = JSON.parse(readFileSync(resolved, 'utf-8'));
	} catch (err) {
		configLog('Failed to parse config file %s: %O', resolved, err);
		throw new TupleError(`Failed to parse config file: ${resolved}`, StatusCode.FORMAT, err instanceof Error ? err : undefined);
	}
	configLog('Loaded config from %s', resolved);
	return parseConfigObject(parsed, resolved);
}

/**
 * Load configuration from environment variables.
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): PartialStoreConfig {
	const config: PartialStoreConfig = {};

	if (env.TUPLEKEY_INITIAL_VERSION) {
		config.initialVersion = parseVersion(env.TUPLEKEY_INITIAL_VERSION, 'TUPLEKEY_INITIAL_VERSION');
	}
	if (env.TUPLEKEY_VERSION_STEP) {
		config.versionStep = parsePositiveInt(env.TUPLEKEY_VERSION_STEP, 'TUPLEKEY_VERSION_STEP', Number.MAX_SAFE_INTEGER);
	}
	if (env.TUPLEKEY_COMMIT_BATCH_SIZE) {
		config.commitBatchSize = parsePositiveInt(env.TUPLEKEY_COMMIT_BATCH_SIZE, 'TUPLEKEY_COMMIT_BATCH_SIZE', MAX_U16 + 1);
	}
	if (env.TUPLEKEY_DEBUG) {
		config.logging = { namespaces: env.TUPLEKEY_DEBUG };
	}

	return config;
}

function merge(base: StoreConfig, patch: PartialStoreConfig): StoreConfig {
	return {
		initialVersion: patch.initialVersion ?? base.initialVersion,
		versionStep: patch.versionStep ?? base.versionStep,
		commitBatchSize: patch.commitBatchSize ?? base.commitBatchSize,
		logging: { ...base.logging, ...patch.logging },
	};
}

export interface LoadConfigOptions {
	configFile?: string;
	overrides?: PartialStoreConfig;
	env?: NodeJS.ProcessEnv;
}

/**
 * Resolve the effective configuration and apply its logging settings.
 */
export function loadConfig(options: LoadConfigOptions = {}): StoreConfig {
	let config = DEFAULT_CONFIG;
	if (options.configFile) {
		config = merge(config, loadConfigFile(options.configFile));
	}
	config = merge(config, loadEnvConfig(options.env));
	if (options.overrides) {
		config = merge(config, options.overrides);
	}

	if (config.logging.namespaces) {
		enableLogging(config.logging.namespaces);
	}
	configLog('Resolved config: initialVersion=%s versionStep=%d commitBatchSize=%d',
		config.initialVersion.toString(), config.versionStep, config.commitBatchSize);
	return config;
}
