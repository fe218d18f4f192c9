import type * as wire from '../protocol/index.js';
import type { PlanTranslator, TranslationContext } from './plan-translator.js';
import type { ExecutionStrategy, PlanFragment } from '../plan/fragment.js';
import { invariant, unsupported } from '../common/errors.js';
import { createLogger } from '../common/logger.js';

const log = createLogger('lowering', 'fragment');

/** Partitioned output of a non-Output fragment root always carries this id */
export const FRAGMENT_OUTPUT_ID = 'root';

export function toExecutionStrategy(strategy: wire.StageExecutionStrategy): ExecutionStrategy {
	switch (strategy) {
		case 'UNGROUPED_EXECUTION':
			return 'ungrouped';
		case 'FIXED_LIFESPAN_SCHEDULE_GROUPED_EXECUTION':
		case 'DYNAMIC_LIFESPAN_SCHEDULE_GROUPED_EXECUTION':
			return 'grouped';
		case 'RECOVERABLE_GROUPED_EXECUTION':
			return unsupported('Recoverable grouped execution is not supported', strategy);
		default:
			return unsupported(`Unsupported stage execution strategy: ${String(strategy)}`, String(strategy));
	}
}

/**
 * Lowers one wire fragment. An Output root is final on its own; any other
 * root is wrapped in a partitioned output per the fragment's scheme. The
 * translator then gets the last word on the tail.
 *
 * @throws UnsupportedConstructError, InvariantViolationError
 */
export function assembleFragment(
	translator: PlanTranslator,
	fragment: wire.WirePlanFragment,
	ctx: TranslationContext,
): PlanFragment {
	const descriptor = fragment.stageExecutionDescriptor;
	const executionStrategy = toExecutionStrategy(descriptor.stageExecutionStrategy);
	const groupedExecutionLeafNodeIds = new Set(descriptor.groupedExecutionScanNodes);
	invariant(
		executionStrategy !== 'grouped' || groupedExecutionLeafNodeIds.size > 0,
		`Grouped execution of fragment ${fragment.id} requires at least one grouped leaf node`,
		descriptor.stageExecutionStrategy,
	);

	log('Fragment %s: %s execution over %d lifespan(s)', fragment.id, executionStrategy, descriptor.totalLifespans);

	const root = fragment.root['@type'] === 'output'
		? translator.translate(fragment.root, ctx)
		: translator.toPartitionedOutput(FRAGMENT_OUTPUT_ID, fragment.partitioningScheme, translator.translate(fragment.root, ctx));

	return {
		planNode: translator.completeFragment(root),
		executionStrategy,
		numSplitGroups: descriptor.totalLifespans,
		groupedExecutionLeafNodeIds,
	};
}
