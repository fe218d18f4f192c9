import { PlanNodeType } from './plan-node-type.js';
import { UnaryPlanNode, formatSortKeys, type PlanNode, type SortOrder } from './plan-node.js';
import { rowType, type RowType } from '../../types/row-type.js';
import { formatExpr, type CallExpr, type FieldAccessExpr, type TypedExpr } from '../expressions.js';

export type WindowType = 'range' | 'rows';
export type BoundType = 'unboundedPreceding' | 'preceding' | 'currentRow' | 'following' | 'unboundedFollowing';

export interface Frame {
	readonly type: WindowType;
	readonly startType: BoundType;
	readonly startValue?: TypedExpr;
	readonly endType: BoundType;
	readonly endValue?: TypedExpr;
}

export interface WindowFunction {
	readonly functionCall: CallExpr;
	readonly frame: Frame;
	readonly ignoreNulls: boolean;
}

/** Output: every source column, then one column per window function */
export class WindowNode extends UnaryPlanNode {
	override readonly nodeType = PlanNodeType.Window;
	readonly outputType: RowType;

	constructor(
		id: string,
		public readonly partitionKeys: readonly FieldAccessExpr[],
		public readonly sortingKeys: readonly FieldAccessExpr[],
		public readonly sortingOrders: readonly SortOrder[],
		public readonly windowColumnNames: readonly string[],
		public readonly windowFunctions: readonly WindowFunction[],
		public readonly inputsSorted: boolean,
		source: PlanNode,
	) {
		super(id, source);
		this.outputType = rowType(
			[...source.outputType.names, ...windowColumnNames],
			[...source.outputType.types, ...windowFunctions.map(f => f.functionCall.type)],
		);
	}

	override getLogicalProperties(): Record<string, unknown> {
		return {
			partitionBy: this.partitionKeys.map(formatExpr),
			orderBy: formatSortKeys(this.sortingKeys, this.sortingOrders),
			functions: Object.fromEntries(
				this.windowColumnNames.map((n, i) => [n, formatExpr(this.windowFunctions[i].functionCall)])
			),
		};
	}
}
