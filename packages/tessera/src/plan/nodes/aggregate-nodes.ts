import { PlanNodeType } from './plan-node-type.js';
import { UnaryPlanNode, type PlanNode } from './plan-node.js';
import { rowType, type RowType } from '../../types/row-type.js';
import { BIGINT, type SqlType } from '../../types/sql-type.js';
import { formatExpr, type CallExpr, type FieldAccessExpr } from '../expressions.js';

export type AggregationStep = 'partial' | 'final' | 'intermediate' | 'single';

export interface Aggregate {
	/** The call's type is the aggregate's output type for this step */
	readonly call: CallExpr;
	readonly rawInputTypes: readonly SqlType[];
	readonly mask?: FieldAccessExpr;
	readonly distinct: boolean;
}

/**
 * Grouped or global aggregation.
 * Output: grouping keys, then one column per aggregate.
 */
export class AggregationNode extends UnaryPlanNode {
	override readonly nodeType = PlanNodeType.Aggregation;
	readonly outputType: RowType;

	constructor(
		id: string,
		public readonly step: AggregationStep,
		public readonly groupingKeys: readonly FieldAccessExpr[],
		/** Keys the input is already clustered on; non-empty only for streaming aggregation */
		public readonly preGroupedKeys: readonly FieldAccessExpr[],
		public readonly aggregateNames: readonly string[],
		public readonly aggregates: readonly Aggregate[],
		public readonly globalGroupingSets: readonly number[],
		public readonly groupId: FieldAccessExpr | undefined,
		public readonly ignoreNullKeys: boolean,
		source: PlanNode,
	) {
		super(id, source);
		this.outputType = rowType(
			[...groupingKeys.map(k => k.name), ...aggregateNames],
			[...groupingKeys.map(k => k.type), ...aggregates.map(a => a.call.type)],
		);
	}

	get isStreaming(): boolean {
		return this.preGroupedKeys.length > 0;
	}

	override getLogicalProperties(): Record<string, unknown> {
		return {
			step: this.step,
			groupBy: this.groupingKeys.map(formatExpr),
			aggregates: Object.fromEntries(this.aggregateNames.map((n, i) => [n, formatExpr(this.aggregates[i].call)])),
			streaming: this.isStreaming,
		};
	}
}

export interface GroupingKeyInfo {
	readonly output: string;
	readonly input: FieldAccessExpr;
}

/**
 * Replicates each input row once per grouping set, nulling the keys that are
 * not part of the set. Output: grouping keys, aggregation inputs, group id.
 */
export class GroupIdNode extends UnaryPlanNode {
	override readonly nodeType = PlanNodeType.GroupId;
	readonly outputType: RowType;

	constructor(
		id: string,
		/** Grouping sets over input fields */
		public readonly groupingSets: readonly (readonly FieldAccessExpr[])[],
		public readonly groupingKeyInfos: readonly GroupingKeyInfo[],
		public readonly aggregationInputs: readonly FieldAccessExpr[],
		public readonly groupIdName: string,
		source: PlanNode,
	) {
		super(id, source);
		this.outputType = rowType(
			[...groupingKeyInfos.map(g => g.output), ...aggregationInputs.map(a => a.name), groupIdName],
			[...groupingKeyInfos.map(g => g.input.type), ...aggregationInputs.map(a => a.type), BIGINT],
		);
	}

	override getLogicalProperties(): Record<string, unknown> {
		return {
			groupingSets: this.groupingSets.map(set => set.map(formatExpr)),
			groupId: this.groupIdName,
		};
	}
}
