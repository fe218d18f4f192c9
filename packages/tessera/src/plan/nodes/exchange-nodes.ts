import { PlanNodeType } from './plan-node-type.js';
import { LeafPlanNode, PlanNode, formatSortKeys, type SortOrder } from './plan-node.js';
import type { RowType } from '../../types/row-type.js';
import type { FieldAccessExpr } from '../expressions.js';
import { GATHER, formatPartitionFunction, type PartitionFunctionSpec } from '../partition-function.js';
import { invariant } from '../../common/errors.js';

/** Receives rows from upstream tasks over the network */
export class ExchangeNode extends LeafPlanNode {
	override readonly nodeType = PlanNodeType.Exchange;

	constructor(id: string, public readonly outputType: RowType) {
		super(id);
	}
}

/** Receives sorted streams from upstream tasks and merges them */
export class MergeExchangeNode extends LeafPlanNode {
	override readonly nodeType = PlanNodeType.MergeExchange;

	constructor(
		id: string,
		public readonly outputType: RowType,
		public readonly sortingKeys: readonly FieldAccessExpr[],
		public readonly sortingOrders: readonly SortOrder[],
	) {
		super(id);
	}

	override getLogicalProperties(): Record<string, unknown> {
		return { orderBy: formatSortKeys(this.sortingKeys, this.sortingOrders) };
	}
}

/** Batch-mode counterpart of ExchangeNode: reads a shuffle */
export class ShuffleReadNode extends LeafPlanNode {
	override readonly nodeType = PlanNodeType.ShuffleRead;

	constructor(id: string, public readonly outputType: RowType) {
		super(id);
	}
}

abstract class MultiSourcePlanNode extends PlanNode {
	constructor(id: string, public readonly sources: readonly PlanNode[]) {
		super(id);
		invariant(sources.length > 0, `Node ${id} needs at least one source`, id);
	}

	get outputType(): RowType {
		return this.sources[0].outputType;
	}

	getSources(): readonly PlanNode[] {
		return this.sources;
	}
}

/** Merges sorted in-process streams */
export class LocalMergeNode extends MultiSourcePlanNode {
	override readonly nodeType = PlanNodeType.LocalMerge;

	constructor(
		id: string,
		public readonly sortingKeys: readonly FieldAccessExpr[],
		public readonly sortingOrders: readonly SortOrder[],
		sources: readonly PlanNode[],
	) {
		super(id, sources);
	}

	override getLogicalProperties(): Record<string, unknown> {
		return { orderBy: formatSortKeys(this.sortingKeys, this.sortingOrders) };
	}
}

export type LocalPartitionType = 'gather' | 'repartition';

/** Redistributes rows across the drivers of one task */
export class LocalPartitionNode extends MultiSourcePlanNode {
	override readonly nodeType = PlanNodeType.LocalPartition;

	constructor(
		id: string,
		public readonly type: LocalPartitionType,
		public readonly partitionFunctionSpec: PartitionFunctionSpec,
		sources: readonly PlanNode[],
	) {
		super(id, sources);
	}

	static gather(id: string, sources: readonly PlanNode[]): LocalPartitionNode {
		return new LocalPartitionNode(id, 'gather', GATHER, sources);
	}

	override getLogicalProperties(): Record<string, unknown> {
		return { type: this.type, partitionFunction: formatPartitionFunction(this.partitionFunctionSpec) };
	}
}
