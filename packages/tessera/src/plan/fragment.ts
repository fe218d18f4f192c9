import type { PlanNode } from './nodes/plan-node.js';

export type ExecutionStrategy = 'ungrouped' | 'grouped';

/** An executable stage, ready for the local engine */
export interface PlanFragment {
	readonly planNode: PlanNode;
	readonly executionStrategy: ExecutionStrategy;
	/** Number of lifespans the grouped leaves are split into */
	readonly numSplitGroups: number;
	/** Ids of the scan nodes that run per lifespan; empty for ungrouped execution */
	readonly groupedExecutionLeafNodeIds: ReadonlySet<string>;
}
