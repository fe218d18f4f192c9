import type { ExpressionConverter } from './expression-converter.js';
import type { TranslatorConfig } from '../config/types.js';
import { BatchPlanTranslator, InteractivePlanTranslator, type PlanTranslator } from './plan-translator.js';
import { createLogger, enableLogging } from '../common/logger.js';

const log = createLogger('lowering');

/**
 * Builds the translator for the configured execution mode.
 * Enables the configured logging namespaces, if any.
 */
export function createPlanTranslator(converter: ExpressionConverter, config: TranslatorConfig): PlanTranslator {
	if (config.logging.namespaces) {
		enableLogging(config.logging.namespaces);
	}
	log('Creating %s plan translator', config.mode);
	switch (config.mode) {
		case 'interactive':
			return new InteractivePlanTranslator(converter);
		case 'batch':
			return new BatchPlanTranslator(converter, {
				name: config.shuffle.name,
				serializedWriteInfo: config.shuffle.serializedWriteInfo,
			});
	}
}
