import type { PartitioningScheme } from './partitioning.js';
import type { WirePlanNode } from './plan.js';

export type StageExecutionStrategy =
	| 'UNGROUPED_EXECUTION'
	| 'FIXED_LIFESPAN_SCHEDULE_GROUPED_EXECUTION'
	| 'DYNAMIC_LIFESPAN_SCHEDULE_GROUPED_EXECUTION'
	| 'RECOVERABLE_GROUPED_EXECUTION';

export interface StageExecutionDescriptor {
	readonly stageExecutionStrategy: StageExecutionStrategy;
	readonly groupedExecutionScanNodes: readonly string[];
	readonly totalLifespans: number;
}

/** One stage of a distributed query as shipped to a worker task */
export interface WirePlanFragment {
	readonly id: string;
	readonly root: WirePlanNode;
	readonly partitioningScheme: PartitioningScheme;
	readonly stageExecutionDescriptor: StageExecutionDescriptor;
}
