import { PlanNodeType } from './plan-node-type.js';
import { UnaryPlanNode, formatSortKeys, type PlanNode, type SortOrder } from './plan-node.js';
import type { RowType } from '../../types/row-type.js';
import type { FieldAccessExpr } from '../expressions.js';

/** Skips `offset` rows, then passes at most `count` rows */
export class LimitNode extends UnaryPlanNode {
	override readonly nodeType = PlanNodeType.Limit;

	constructor(
		id: string,
		public readonly offset: bigint,
		public readonly count: bigint,
		public readonly isPartial: boolean,
		source: PlanNode,
	) {
		super(id, source);
	}

	get outputType(): RowType {
		return this.source.outputType;
	}

	override getLogicalProperties(): Record<string, unknown> {
		return { offset: this.offset, count: this.count, partial: this.isPartial };
	}
}

export class TopNNode extends UnaryPlanNode {
	override readonly nodeType = PlanNodeType.TopN;

	constructor(
		id: string,
		public readonly sortingKeys: readonly FieldAccessExpr[],
		public readonly sortingOrders: readonly SortOrder[],
		public readonly count: bigint,
		public readonly isPartial: boolean,
		source: PlanNode,
	) {
		super(id, source);
	}

	get outputType(): RowType {
		return this.source.outputType;
	}

	override getLogicalProperties(): Record<string, unknown> {
		return {
			orderBy: formatSortKeys(this.sortingKeys, this.sortingOrders),
			count: this.count,
			partial: this.isPartial,
		};
	}
}

export class OrderByNode extends UnaryPlanNode {
	override readonly nodeType = PlanNodeType.OrderBy;

	constructor(
		id: string,
		public readonly sortingKeys: readonly FieldAccessExpr[],
		public readonly sortingOrders: readonly SortOrder[],
		public readonly isPartial: boolean,
		source: PlanNode,
	) {
		super(id, source);
	}

	get outputType(): RowType {
		return this.source.outputType;
	}

	override getLogicalProperties(): Record<string, unknown> {
		return { orderBy: formatSortKeys(this.sortingKeys, this.sortingOrders), partial: this.isPartial };
	}
}
