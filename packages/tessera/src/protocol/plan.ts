/**
 * The coordinator's plan tree. Every node has a stable string id; children are
 * embedded. The translator only reads these objects.
 */
import type { CallExpression, RowExpression, Variable } from './expressions.js';
import type { ColumnHandle, TableHandle } from './connector.js';
import type { PartitioningScheme } from './partitioning.js';

/** An int64 on the wire. Values beyond 2^53 must arrive as decimal strings to keep their precision. */
export type WireInt64 = number | string;

export type SortOrder = 'ASC_NULLS_FIRST' | 'ASC_NULLS_LAST' | 'DESC_NULLS_FIRST' | 'DESC_NULLS_LAST';

export interface Ordering {
	readonly variable: Variable;
	readonly sortOrder: SortOrder;
}

export interface OrderingScheme {
	readonly orderBy: readonly Ordering[];
}

export interface Assignment {
	readonly variable: Variable;
	readonly expression: RowExpression;
}

interface WireNode<Tag extends string> {
	readonly '@type': Tag;
	readonly id: string;
}

export type ExchangeType = 'GATHER' | 'REPARTITION' | 'REPLICATE';
export type ExchangeScope = 'LOCAL' | 'REMOTE_STREAMING' | 'REMOTE_MATERIALIZED';

export interface ExchangeNode extends WireNode<'exchange'> {
	readonly type: ExchangeType;
	readonly scope: ExchangeScope;
	readonly partitioningScheme: PartitioningScheme;
	readonly sources: readonly WirePlanNode[];
	/** Per source, the source columns feeding the output layout, positionally */
	readonly inputs: readonly (readonly Variable[])[];
	readonly ensureSourceOrdering: boolean;
	readonly orderingScheme?: OrderingScheme;
}

export interface FilterNode extends WireNode<'filter'> {
	readonly source: WirePlanNode;
	readonly predicate: RowExpression;
}

export interface ProjectNode extends WireNode<'project'> {
	readonly source: WirePlanNode;
	readonly assignments: readonly Assignment[];
}

export interface ValuesNode extends WireNode<'values'> {
	readonly outputVariables: readonly Variable[];
	readonly rows: readonly (readonly RowExpression[])[];
}

export interface ScanAssignment {
	readonly variable: Variable;
	readonly column: ColumnHandle;
}

export interface TableScanNode extends WireNode<'tablescan'> {
	readonly table: TableHandle;
	readonly outputVariables: readonly Variable[];
	readonly assignments: readonly ScanAssignment[];
}

export type AggregationStep = 'PARTIAL' | 'FINAL' | 'INTERMEDIATE' | 'SINGLE';

export interface Aggregation {
	readonly call: CallExpression;
	readonly isDistinct: boolean;
	readonly mask?: Variable;
}

export interface GroupingSetDescriptor {
	readonly groupingKeys: readonly Variable[];
	readonly groupingSetCount: number;
	readonly globalGroupingSets: readonly number[];
}

export interface AggregationNode extends WireNode<'aggregation'> {
	readonly source: WirePlanNode;
	readonly aggregations: readonly { readonly variable: Variable; readonly aggregation: Aggregation }[];
	readonly groupingSets: GroupingSetDescriptor;
	readonly preGroupedVariables: readonly Variable[];
	readonly step: AggregationStep;
	readonly hashVariable?: Variable;
	readonly groupIdVariable?: Variable;
}

export interface GroupIdNode extends WireNode<'groupid'> {
	readonly source: WirePlanNode;
	/** Grouping sets keyed by output column */
	readonly groupingSets: readonly (readonly Variable[])[];
	/** Output grouping column → the input column it copies */
	readonly groupingColumns: readonly { readonly output: Variable; readonly input: Variable }[];
	readonly aggregationArguments: readonly Variable[];
	readonly groupIdVariable: Variable;
}

export interface DistinctLimitNode extends WireNode<'distinctlimit'> {
	readonly source: WirePlanNode;
	readonly limit: WireInt64;
	readonly partial: boolean;
	readonly distinctVariables: readonly Variable[];
	readonly hashVariable?: Variable;
}

export type JoinType = 'INNER' | 'LEFT' | 'RIGHT' | 'FULL';

export interface EquiJoinClause {
	readonly left: Variable;
	readonly right: Variable;
}

export interface JoinNode extends WireNode<'join'> {
	readonly type: JoinType;
	readonly left: WirePlanNode;
	readonly right: WirePlanNode;
	readonly criteria: readonly EquiJoinClause[];
	readonly outputVariables: readonly Variable[];
	readonly filter?: RowExpression;
	readonly distributionType?: 'PARTITIONED' | 'REPLICATED';
}

export interface MergeJoinNode extends WireNode<'mergejoin'> {
	readonly type: JoinType;
	readonly left: WirePlanNode;
	readonly right: WirePlanNode;
	readonly criteria: readonly EquiJoinClause[];
	readonly outputVariables: readonly Variable[];
	readonly filter?: RowExpression;
}

/** Produces all probe rows plus a boolean flag telling whether each one matched */
export interface SemiJoinNode extends WireNode<'semijoin'> {
	readonly source: WirePlanNode;
	readonly filteringSource: WirePlanNode;
	readonly sourceJoinVariable: Variable;
	readonly filteringSourceJoinVariable: Variable;
	readonly semiJoinOutput: Variable;
}

export interface RemoteSourceNode extends WireNode<'remoteSource'> {
	readonly sourceFragmentIds: readonly string[];
	readonly outputVariables: readonly Variable[];
	readonly ensureSourceOrdering: boolean;
	readonly orderingScheme?: OrderingScheme;
	readonly exchangeType: ExchangeType;
}

export interface TopNNode extends WireNode<'topn'> {
	readonly source: WirePlanNode;
	readonly count: WireInt64;
	readonly orderingScheme: OrderingScheme;
	readonly step: 'SINGLE' | 'PARTIAL' | 'FINAL';
}

export interface LimitNode extends WireNode<'limit'> {
	readonly source: WirePlanNode;
	readonly count: WireInt64;
	readonly step: 'PARTIAL' | 'FINAL';
}

export interface SortNode extends WireNode<'sort'> {
	readonly source: WirePlanNode;
	readonly orderingScheme: OrderingScheme;
	readonly isPartial: boolean;
}

export interface UnnestNode extends WireNode<'unnest'> {
	readonly source: WirePlanNode;
	readonly replicateVariables: readonly Variable[];
	readonly unnestVariables: readonly { readonly variable: Variable; readonly outputs: readonly Variable[] }[];
	readonly ordinalityVariable?: Variable;
}

export interface EnforceSingleRowNode extends WireNode<'enforceSingleRow'> {
	readonly source: WirePlanNode;
}

export interface TableWriterNode extends WireNode<'tableWriter'> {
	readonly source: WirePlanNode;
	readonly rowCountVariable: Variable;
	readonly fragmentVariable: Variable;
	readonly tableCommitContextVariable: Variable;
	readonly columns: readonly Variable[];
	readonly columnNames: readonly string[];
}

export interface AssignUniqueIdNode extends WireNode<'assignUniqueId'> {
	readonly source: WirePlanNode;
	readonly idVariable: Variable;
}

export type WindowType = 'RANGE' | 'ROWS';
export type BoundType = 'UNBOUNDED_PRECEDING' | 'PRECEDING' | 'CURRENT_ROW' | 'FOLLOWING' | 'UNBOUNDED_FOLLOWING';

export interface Frame {
	readonly type: WindowType;
	readonly startType: BoundType;
	readonly startValue?: Variable;
	readonly endType: BoundType;
	readonly endValue?: Variable;
}

export interface WindowFunction {
	readonly functionCall: CallExpression;
	readonly frame: Frame;
	readonly ignoreNulls: boolean;
}

export interface WindowNode extends WireNode<'window'> {
	readonly source: WirePlanNode;
	readonly specification: {
		readonly partitionBy: readonly Variable[];
		readonly orderingScheme?: OrderingScheme;
	};
	readonly windowFunctions: readonly { readonly variable: Variable; readonly function: WindowFunction }[];
	readonly prePartitionedInputs: readonly Variable[];
	readonly preSortedOrderPrefix: number;
}

/** Numbers rows; only lowered as part of the OFFSET pattern */
export interface RowNumberNode extends WireNode<'rownumber'> {
	readonly source: WirePlanNode;
	readonly partitionBy: readonly Variable[];
	readonly rowNumberVariable: Variable;
	readonly maxRowCountPerPartition?: number;
	readonly partial: boolean;
}

export interface OutputNode extends WireNode<'output'> {
	readonly source: WirePlanNode;
	readonly columnNames: readonly string[];
	readonly outputVariables: readonly Variable[];
}

export type WirePlanNode =
	| ExchangeNode
	| FilterNode
	| ProjectNode
	| ValuesNode
	| TableScanNode
	| AggregationNode
	| GroupIdNode
	| DistinctLimitNode
	| JoinNode
	| MergeJoinNode
	| SemiJoinNode
	| RemoteSourceNode
	| TopNNode
	| LimitNode
	| SortNode
	| UnnestNode
	| EnforceSingleRowNode
	| TableWriterNode
	| AssignUniqueIdNode
	| WindowNode
	| RowNumberNode
	| OutputNode;

export type WirePlanNodeTag = WirePlanNode['@type'];
