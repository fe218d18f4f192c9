/**
 * Configuration types for the plan translator.
 */

/** How stages of a query hand rows to each other */
export type ExecutionMode = 'interactive' | 'batch';

export const EXECUTION_MODES: readonly ExecutionMode[] = ['interactive', 'batch'];

/**
 * Shuffle settings. Only read in batch mode.
 */
export interface ShuffleConfig {
	/** Shuffle implementation the writer targets */
	name: string;
	/** Pre-serialized writer parameters; without them batch fragments must have a single output partition */
	serializedWriteInfo?: string;
}

/**
 * Logging configuration.
 */
export interface LoggingConfig {
	/** Debug namespace filter (e.g., 'tessera:lowering:*') */
	namespaces?: string;
}

/**
 * Full translator configuration.
 */
export interface TranslatorConfig {
	mode: ExecutionMode;
	shuffle: ShuffleConfig;
	logging: LoggingConfig;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG: TranslatorConfig = {
	mode: 'interactive',
	shuffle: {
		name: 'local',
	},
	logging: {},
};

/**
 * Partial configuration for merging.
 */
export type PartialTranslatorConfig = {
	mode?: ExecutionMode;
	shuffle?: Partial<ShuffleConfig>;
	logging?: Partial<LoggingConfig>;
};
