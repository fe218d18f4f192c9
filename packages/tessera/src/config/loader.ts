/**
 * Configuration loading from multiple sources.
 *
 * Priority (highest to lowest):
 * 1. Programmatic options
 * 2. Environment variables
 * 3. Config file
 * 4. Defaults
 */

import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { createLogger } from '../common/logger.js';
import { ConfigError } from '../common/errors.js';
import {
	type ExecutionMode,
	type PartialTranslatorConfig,
	type TranslatorConfig,
	DEFAULT_CONFIG,
	EXECUTION_MODES,
} from './types.js';

const log = createLogger('config');

export const DEFAULT_CONFIG_FILE = 'tessera.json';

export function parseExecutionMode(value: unknown, source: string): ExecutionMode {
	const mode = EXECUTION_MODES.find(m => m === value);
	if (mode === undefined) {
		throw new ConfigError(`Invalid execution mode ${JSON.stringify(value)} in ${source}; expected one of ${EXECUTION_MODES.join(', ')}`);
	}
	return mode;
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(section: Record<string, unknown>, key: string, source: string): string | undefined {
	const value = section[key];
	if (value === undefined || typeof value === 'string') {
		return value;
	}
	throw new ConfigError(`Expected a string for '${key}' in ${source}`);
}

/**
 * Checks the shape of a parsed config object.
 * Unknown keys are ignored.
 */
export function validateConfig(value: unknown, source: string): PartialTranslatorConfig {
	if (!isRecord(value)) {
		throw new ConfigError(`Config in ${source} must be a JSON object`);
	}
	const config: PartialTranslatorConfig = {};

	if (value.mode !== undefined) {
		config.mode = parseExecutionMode(value.mode, source);
	}

	if (value.shuffle !== undefined) {
		if (!isRecord(value.shuffle)) {
			throw new ConfigError(`'shuffle' in ${source} must be an object`);
		}
		const name = optionalString(value.shuffle, 'name', source);
		const serializedWriteInfo = optionalString(value.shuffle, 'serializedWriteInfo', source);
		config.shuffle = {};
		if (name !== undefined) config.shuffle.name = name;
		if (serializedWriteInfo !== undefined) config.shuffle.serializedWriteInfo = serializedWriteInfo;
	}

	if (value.logging !== undefined) {
		if (!isRecord(value.logging)) {
			throw new ConfigError(`'logging' in ${source} must be an object`);
		}
		const namespaces = optionalString(value.logging, 'namespaces', source);
		config.logging = namespaces === undefined ? {} : { namespaces };
	}

	return config;
}

/**
 * Load configuration from a JSON file.
 */
export function loadConfigFile(configPath: string): PartialTranslatorConfig {
	const resolved = resolve(configPath);
	if (!existsSync(resolved)) {
		log('Config file not found: %s', resolved);
		return {};
	}

	let parsed: unknown;
	try {
		parsed = JSON.parse(readFileSync(resolved, 'utf-8'));
	} catch (err) {
		log('Failed to parse config file %s: %O', resolved, err);
		throw new ConfigError(`Failed to parse config file: ${resolved}`, err instanceof Error ? err : undefined);
	}
	log('Loaded config from %s', resolved);
	return validateConfig(parsed, resolved);
}

/**
 * Load configuration from environment variables.
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): PartialTranslatorConfig {
	const config: PartialTranslatorConfig = {};

	if (env.TESSERA_MODE) {
		config.mode = parseExecutionMode(env.TESSERA_MODE, 'TESSERA_MODE');
	}

	// Shuffle
	if (env.TESSERA_SHUFFLE_NAME) {
		config.shuffle = { name: env.TESSERA_SHUFFLE_NAME };
	}
	if (env.TESSERA_SHUFFLE_WRITE_INFO) {
		config.shuffle = config.shuffle || {};
		config.shuffle.serializedWriteInfo = env.TESSERA_SHUFFLE_WRITE_INFO;
	}

	// Logging
	if (env.TESSERA_LOG) {
		config.logging = { namespaces: env.TESSERA_LOG };
	}

	return config;
}

/**
 * Deep merge configuration objects.
 */
export function mergeConfig(
	base: TranslatorConfig,
	...overrides: PartialTranslatorConfig[]
): TranslatorConfig {
	const result = { ...base };

	for (const override of overrides) {
		if (override.mode !== undefined) result.mode = override.mode;

		if (override.shuffle) {
			result.shuffle = { ...result.shuffle, ...override.shuffle };
		}
		if (override.logging) {
			result.logging = { ...result.logging, ...override.logging };
		}
	}

	return result;
}

/**
 * Load full configuration from all sources.
 */
export function loadConfig(options: {
	configPath?: string;
	overrides?: PartialTranslatorConfig;
	env?: NodeJS.ProcessEnv;
} = {}): TranslatorConfig {
	const sources: PartialTranslatorConfig[] = [];

	// Load from file if specified or default exists
	const configPath = options.configPath || DEFAULT_CONFIG_FILE;
	if (options.configPath || existsSync(configPath)) {
		sources.push(loadConfigFile(configPath));
	}

	// Load from environment
	sources.push(loadEnvConfig(options.env));

	// Apply programmatic overrides
	if (options.overrides) {
		sources.push(options.overrides);
	}

	const config = mergeConfig(DEFAULT_CONFIG, ...sources);
	log('Final config: %O', config);

	return config;
}
