export type { ExpressionConverter } from './expression-converter.js';
export {
	PlanTranslator,
	InteractivePlanTranslator,
	BatchPlanTranslator,
	type ShuffleOptions,
	type TranslationContext,
	toAggregationStep,
	toBoundType,
	toJoinType,
	toWindowType,
} from './plan-translator.js';
export { assembleFragment, toExecutionStrategy, FRAGMENT_OUTPUT_ID } from './fragment-assembler.js';
export { createPlanTranslator } from './create-translator.js';
export {
	toColumnHandle,
	toHiveColumn,
	toInsertTableHandle,
	toLocationHandle,
	toTableHandle,
	type TranslatedTable,
} from './connector-handles.js';
export {
	compilePartitioning,
	toKeyChannel,
	toPartitionedOutput,
	toPartitionKeys,
	type CompiledPartitioning,
} from './partitioning.js';
export { tryConvertOffsetLimit } from './rewrites/offset-limit.js';
export { tryConvertSemiJoin } from './rewrites/semi-join.js';
export { parseTaskId, taskUniqueId, type TaskId } from './task-id.js';
export { toFieldAccess, toSortOrder, toSortingKeys } from './variables.js';
