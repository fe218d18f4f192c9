/**
 * Configuration module exports.
 */

export {
	type TranslatorConfig,
	type PartialTranslatorConfig,
	type ExecutionMode,
	type ShuffleConfig,
	type LoggingConfig,
	DEFAULT_CONFIG,
	EXECUTION_MODES,
} from './types.js';

export {
	DEFAULT_CONFIG_FILE,
	loadConfig,
	loadConfigFile,
	loadEnvConfig,
	mergeConfig,
	parseExecutionMode,
	validateConfig,
} from './loader.js';
