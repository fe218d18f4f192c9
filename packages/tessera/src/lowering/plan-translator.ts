import type * as wire from '../protocol/index.js';
import type { ExpressionConverter } from './expression-converter.js';
import type { PlanFragment } from '../plan/fragment.js';
import type { PlanNode } from '../plan/nodes/plan-node.js';
import { TableScanNode, ValuesNode } from '../plan/nodes/scan-nodes.js';
import {
	AssignUniqueIdNode, EnforceSingleRowNode, FilterNode, ProjectNode, UnnestNode,
} from '../plan/nodes/relational-nodes.js';
import { LimitNode, OrderByNode, TopNNode } from '../plan/nodes/ordering-nodes.js';
import { AggregationNode, GroupIdNode, type Aggregate, type AggregationStep } from '../plan/nodes/aggregate-nodes.js';
import { HashJoinNode, MergeJoinNode, NestedLoopJoinNode, type JoinType } from '../plan/nodes/join-nodes.js';
import { WindowNode, type BoundType, type Frame, type WindowFunction, type WindowType } from '../plan/nodes/window-node.js';
import { ExchangeNode, LocalMergeNode, LocalPartitionNode, MergeExchangeNode, ShuffleReadNode } from '../plan/nodes/exchange-nodes.js';
import {
	PartitionAndSerializeNode, PartitionedOutputNode, ShuffleWriteNode, TableWriteNode,
} from '../plan/nodes/output-nodes.js';
import { field, type CallExpr, type FieldAccessExpr } from '../plan/expressions.js';
import type { ColumnHandle } from '../plan/handles.js';
import type { ScalarValue } from '../common/types.js';
import { ROUND_ROBIN } from '../plan/partition-function.js';
import { toRowType } from '../types/row-type.js';
import { parseTypeSignature } from '../types/sql-type.js';
import { invariant, InvariantViolationError, tagOf, unsupported } from '../common/errors.js';
import { createLogger } from '../common/logger.js';
import { toColumnHandle, toInsertTableHandle, toTableHandle } from './connector-handles.js';
import { toKeyChannel, toPartitionedOutput, toPartitionKeys } from './partitioning.js';
import { parseTaskId, taskUniqueId } from './task-id.js';
import { toFieldAccess, toFieldAccesses, toRowCount, toSortingKeys } from './variables.js';
import { tryConvertOffsetLimit } from './rewrites/offset-limit.js';
import { tryConvertSemiJoin } from './rewrites/semi-join.js';
import { isHashPartition, isRoundRobinPartition } from './rewrites/patterns.js';
import { assembleFragment } from './fragment-assembler.js';

const log = createLogger('lowering', 'translator');

/** Per-fragment inputs that some node translations need */
export interface TranslationContext {
	/** `queryId.stageId.stageExecutionId.id.attemptNumber` of the task running the fragment */
	readonly taskId: string;
	/** Write target; required only when the fragment contains a table writer */
	readonly tableWriteInfo?: wire.TableWriteInfo;
}

export function toJoinType(type: wire.JoinType): JoinType {
	switch (type) {
		case 'INNER': return 'inner';
		case 'LEFT': return 'left';
		case 'RIGHT': return 'right';
		case 'FULL': return 'full';
		default: return unsupported(`Unsupported join type: ${String(type)}`, String(type));
	}
}

export function toAggregationStep(step: wire.AggregationStep): AggregationStep {
	switch (step) {
		case 'PARTIAL': return 'partial';
		case 'FINAL': return 'final';
		case 'INTERMEDIATE': return 'intermediate';
		case 'SINGLE': return 'single';
		default: return unsupported(`Unsupported aggregation step: ${String(step)}`, String(step));
	}
}

export function toWindowType(type: wire.WindowType): WindowType {
	switch (type) {
		case 'RANGE': return 'range';
		case 'ROWS': return 'rows';
		default: return unsupported(`Unsupported window type: ${String(type)}`, String(type));
	}
}

export function toBoundType(type: wire.BoundType): BoundType {
	switch (type) {
		case 'UNBOUNDED_PRECEDING': return 'unboundedPreceding';
		case 'PRECEDING': return 'preceding';
		case 'CURRENT_ROW': return 'currentRow';
		case 'FOLLOWING': return 'following';
		case 'UNBOUNDED_FOLLOWING': return 'unboundedFollowing';
		default: return unsupported(`Unsupported window frame bound type: ${String(type)}`, String(type));
	}
}

/**
 * Lowers a coordinator plan tree into the executable plan.
 *
 * One translator serves many fragments; it holds no per-fragment state, so
 * everything a single translation needs travels in the {@link TranslationContext}.
 * Subclasses decide how rows arrive from and leave for other stages.
 */
export abstract class PlanTranslator {
	constructor(protected readonly converter: ExpressionConverter) {}

	/**
	 * Translates a whole fragment: execution strategy, plan tree and output tail.
	 * @throws UnsupportedConstructError, InvariantViolationError
	 */
	assemble(fragment: wire.WirePlanFragment, tableWriteInfo: wire.TableWriteInfo | undefined, taskId: string): PlanFragment {
		return assembleFragment(this, fragment, { taskId, tableWriteInfo });
	}

	/** Translates a subtree; children are translated before their parent */
	translate(node: wire.WirePlanNode, ctx: TranslationContext): PlanNode {
		log('Translating %s node %s', node['@type'], node.id);
		switch (node['@type']) {
			case 'exchange':
				return this.translateLocalExchange(node, ctx);
			case 'filter':
				return tryConvertSemiJoin(node, this.converter, n => this.translate(n, ctx))
					?? new FilterNode(node.id, this.converter.toInternalExpr(node.predicate), this.translate(node.source, ctx));
			case 'project':
				return tryConvertOffsetLimit(node, this.converter, n => this.translate(n, ctx))
					?? this.translateProject(node, ctx);
			case 'values':
				return this.translateValues(node);
			case 'tablescan':
				return this.translateTableScan(node);
			case 'aggregation':
				return this.translateAggregation(node, ctx);
			case 'groupid':
				return this.translateGroupId(node, ctx);
			case 'distinctlimit':
				return this.translateDistinctLimit(node, ctx);
			case 'join':
				return this.translateJoin(node, ctx);
			case 'mergejoin':
				return this.translateMergeJoin(node, ctx);
			case 'semijoin':
				return unsupported(`Semi join ${node.id} must sit directly under a filter`, 'semijoin');
			case 'remoteSource':
				return this.translateRemoteSource(node);
			case 'topn': {
				const { keys, orders } = toSortingKeys(node.orderingScheme);
				const count = toRowCount(node.count, node.id);
				return new TopNNode(node.id, keys, orders, count, node.step === 'PARTIAL', this.translate(node.source, ctx));
			}
			case 'limit':
				return new LimitNode(
					node.id,
					0n,
					toRowCount(node.count, node.id),
					node.step === 'PARTIAL',
					this.translate(node.source, ctx),
				);
			case 'sort': {
				const { keys, orders } = toSortingKeys(node.orderingScheme);
				return new OrderByNode(node.id, keys, orders, node.isPartial, this.translate(node.source, ctx));
			}
			case 'unnest':
				return this.translateUnnest(node, ctx);
			case 'enforceSingleRow':
				return new EnforceSingleRowNode(node.id, this.translate(node.source, ctx));
			case 'tableWriter':
				return this.translateTableWriter(node, ctx);
			case 'assignUniqueId':
				return new AssignUniqueIdNode(
					node.id,
					node.idVariable.name,
					taskUniqueId(parseTaskId(ctx.taskId)),
					this.translate(node.source, ctx),
				);
			case 'window':
				return this.translateWindow(node, ctx);
			case 'rownumber':
				return unsupported(`Row number ${node.id} is only supported as part of OFFSET`, 'rownumber');
			case 'output':
				return PartitionedOutputNode.single(node.id, toRowType(node.outputVariables), this.translate(node.source, ctx));
			default:
				return unsupported(`Unsupported plan node: ${tagOf(node)}`, tagOf(node));
		}
	}

	/** Builds the node that ships the fragment's rows per its partitioning scheme */
	toPartitionedOutput(id: string, scheme: wire.PartitioningScheme, source: PlanNode): PartitionedOutputNode {
		return toPartitionedOutput(id, scheme, source, this.converter);
	}

	/**
	 * Last step of fragment assembly; replaces the output tail where the
	 * execution mode ships rows differently. The default keeps the root.
	 */
	completeFragment(root: PlanNode): PlanNode {
		return root;
	}

	/** Rows produced by an upstream stage */
	protected abstract translateRemoteSource(node: wire.RemoteSourceNode): PlanNode;

	protected translateLocalExchange(node: wire.ExchangeNode, ctx: TranslationContext): PlanNode {
		if (node.scope !== 'LOCAL') {
			return unsupported(`Unsupported exchange scope: ${node.scope}`, node.scope);
		}

		const sources = node.sources.map(s => this.translate(s, ctx));

		if (node.orderingScheme !== undefined) {
			const { keys, orders } = toSortingKeys(node.orderingScheme);
			return new LocalMergeNode(node.id, keys, orders, sources);
		}

		if (node.type !== 'GATHER' && node.type !== 'REPARTITION') {
			return unsupported(`Unsupported local exchange type: ${node.type}`, node.type);
		}

		const outputType = toRowType(node.partitioningScheme.outputLayout);
		invariant(
			node.inputs.length === sources.length,
			`Exchange ${node.id} has ${sources.length} sources but ${node.inputs.length} input layouts`,
			'exchange',
		);

		// Each source is re-projected so the exchange's layout holds positionally
		const projected = sources.map((source, i) => new ProjectNode(
			`${node.id}.${i}`,
			outputType.names,
			node.inputs[i].map((input, j) => field(input.name, outputType.types[j])),
			source,
		));

		if (isHashPartition(node)) {
			const keys = toPartitionKeys(node.partitioningScheme.partitioning.arguments, this.converter);
			return new LocalPartitionNode(node.id, 'repartition', {
				kind: 'hash',
				inputType: outputType,
				keyChannels: keys.map(k => toKeyChannel(k, outputType)),
			}, projected);
		}
		if (isRoundRobinPartition(node)) {
			return new LocalPartitionNode(node.id, 'repartition', ROUND_ROBIN, projected);
		}
		if (node.type === 'GATHER') {
			return LocalPartitionNode.gather(node.id, projected);
		}
		return unsupported(`Unsupported partitioning of local exchange ${node.id}`, 'exchange');
	}

	protected translateProject(node: wire.ProjectNode, ctx: TranslationContext): ProjectNode {
		return new ProjectNode(
			node.id,
			node.assignments.map(a => a.variable.name),
			node.assignments.map(a => this.converter.toInternalExpr(a.expression)),
			this.translate(node.source, ctx),
		);
	}

	protected translateValues(node: wire.ValuesNode): ValuesNode {
		const rows = node.rows.map(row => row.map((cell): ScalarValue => {
			const expr = this.converter.toInternalExpr(cell);
			if (expr.kind !== 'constant') {
				throw new InvariantViolationError(`Expected constant expression in values node ${node.id}`, 'values');
			}
			return expr.value;
		}));
		return new ValuesNode(node.id, toRowType(node.outputVariables), rows);
	}

	protected translateTableScan(node: wire.TableScanNode): TableScanNode {
		const { tableHandle, partitionColumns } = toTableHandle(node.table, this.converter);
		const assignments = new Map<string, ColumnHandle>();
		for (const { variable, column } of node.assignments) {
			assignments.set(variable.name, toColumnHandle(column));
		}
		for (const [name, column] of partitionColumns) {
			if (!assignments.has(name)) {
				assignments.set(name, column);
			}
		}
		return new TableScanNode(node.id, toRowType(node.outputVariables), tableHandle, assignments);
	}

	private toCall(expression: wire.CallExpression, nodeId: string): CallExpr {
		const expr = this.converter.toInternalExpr(expression);
		if (expr.kind !== 'call') {
			throw new InvariantViolationError(`Expected call expression in node ${nodeId}, got ${expr.kind}`, expression.displayName);
		}
		return expr;
	}

	protected translateAggregation(node: wire.AggregationNode, ctx: TranslationContext): AggregationNode {
		const aggregates = node.aggregations.map(({ aggregation }): Aggregate => ({
			call: this.toCall(aggregation.call, node.id),
			rawInputTypes: aggregation.call.functionHandle.argumentTypes.map(parseTypeSignature),
			mask: aggregation.mask && toFieldAccess(aggregation.mask),
			distinct: aggregation.isDistinct,
		}));

		const grouping = node.groupingSets;
		// Streaming needs a single grouping set over input already clustered on the keys
		const streamable = node.preGroupedVariables.length > 0
			&& grouping.groupingSetCount === 1
			&& grouping.globalGroupingSets.length === 0;

		return new AggregationNode(
			node.id,
			toAggregationStep(node.step),
			toFieldAccesses(grouping.groupingKeys),
			streamable ? toFieldAccesses(node.preGroupedVariables) : [],
			node.aggregations.map(a => a.variable.name),
			aggregates,
			grouping.globalGroupingSets,
			node.groupIdVariable && toFieldAccess(node.groupIdVariable),
			false,
			this.translate(node.source, ctx),
		);
	}

	protected translateGroupId(node: wire.GroupIdNode, ctx: TranslationContext): GroupIdNode {
		const inputByOutput = new Map<string, wire.Variable>();
		for (const { output, input } of node.groupingColumns) {
			inputByOutput.set(output.name, input);
		}

		const groupingSets = node.groupingSets.map(set => set.map((key): FieldAccessExpr => {
			const input = inputByOutput.get(key.name);
			if (input === undefined) {
				throw new InvariantViolationError(`Grouping key ${key.name} has no source column in node ${node.id}`, 'groupid');
			}
			return field(input.name, parseTypeSignature(key.type));
		}));

		return new GroupIdNode(
			node.id,
			groupingSets,
			node.groupingColumns.map(({ output, input }) => ({ output: output.name, input: toFieldAccess(input) })),
			toFieldAccesses(node.aggregationArguments),
			node.groupIdVariable.name,
			this.translate(node.source, ctx),
		);
	}

	/** DISTINCT with LIMIT: a key-only aggregation feeding a limit */
	protected translateDistinctLimit(node: wire.DistinctLimitNode, ctx: TranslationContext): LimitNode {
		const aggregation = new AggregationNode(
			node.id,
			'single',
			toFieldAccesses(node.distinctVariables),
			[],
			[],
			[],
			[],
			undefined,
			false,
			this.translate(node.source, ctx),
		);
		return new LimitNode(`${node.id}.limit`, 0n, toRowCount(node.limit, node.id), node.partial, aggregation);
	}

	protected translateJoin(node: wire.JoinNode, ctx: TranslationContext): PlanNode {
		const left = this.translate(node.left, ctx);
		const right = this.translate(node.right, ctx);
		const outputType = toRowType(node.outputVariables);

		if (node.criteria.length === 0 && node.type === 'INNER' && node.filter === undefined) {
			return new NestedLoopJoinNode(node.id, 'inner', undefined, left, right, outputType);
		}

		return new HashJoinNode(
			node.id,
			toJoinType(node.type),
			false,
			node.criteria.map(c => toFieldAccess(c.left)),
			node.criteria.map(c => toFieldAccess(c.right)),
			node.filter && this.converter.toInternalExpr(node.filter),
			left,
			right,
			outputType,
		);
	}

	protected translateMergeJoin(node: wire.MergeJoinNode, ctx: TranslationContext): MergeJoinNode {
		return new MergeJoinNode(
			node.id,
			toJoinType(node.type),
			node.criteria.map(c => toFieldAccess(c.left)),
			node.criteria.map(c => toFieldAccess(c.right)),
			node.filter && this.converter.toInternalExpr(node.filter),
			this.translate(node.left, ctx),
			this.translate(node.right, ctx),
			toRowType(node.outputVariables),
		);
	}

	protected translateUnnest(node: wire.UnnestNode, ctx: TranslationContext): UnnestNode {
		const ordinality = node.ordinalityVariable;
		const outputType = toRowType([
			...node.replicateVariables,
			...node.unnestVariables.flatMap(u => u.outputs),
			...(ordinality ? [ordinality] : []),
		]);
		return new UnnestNode(
			node.id,
			toFieldAccesses(node.replicateVariables),
			node.unnestVariables.map(u => toFieldAccess(u.variable)),
			outputType,
			ordinality?.name,
			this.translate(node.source, ctx),
		);
	}

	protected translateTableWriter(node: wire.TableWriterNode, ctx: TranslationContext): TableWriteNode {
		const insertTableHandle = toInsertTableHandle(ctx.tableWriteInfo);
		const outputType = toRowType([node.rowCountVariable, node.fragmentVariable, node.tableCommitContextVariable]);
		return new TableWriteNode(
			node.id,
			toRowType(node.columns),
			node.columnNames,
			insertTableHandle,
			outputType,
			'noCommit',
			this.translate(node.source, ctx),
		);
	}

	private toFrame(frame: wire.Frame): Frame {
		return {
			type: toWindowType(frame.type),
			startType: toBoundType(frame.startType),
			startValue: frame.startValue && this.converter.toInternalExpr(frame.startValue),
			endType: toBoundType(frame.endType),
			endValue: frame.endValue && this.converter.toInternalExpr(frame.endValue),
		};
	}

	protected translateWindow(node: wire.WindowNode, ctx: TranslationContext): WindowNode {
		const { keys, orders } = toSortingKeys(node.specification.orderingScheme);
		const functions = node.windowFunctions.map(({ function: fn }): WindowFunction => ({
			functionCall: this.toCall(fn.functionCall, node.id),
			frame: this.toFrame(fn.frame),
			ignoreNulls: fn.ignoreNulls,
		}));
		return new WindowNode(
			node.id,
			toFieldAccesses(node.specification.partitionBy),
			keys,
			orders,
			node.windowFunctions.map(f => f.variable.name),
			functions,
			node.preSortedOrderPrefix > 0,
			this.translate(node.source, ctx),
		);
	}
}

/** Stages exchange rows over the network while they run */
export class InteractivePlanTranslator extends PlanTranslator {
	protected translateRemoteSource(node: wire.RemoteSourceNode): PlanNode {
		const outputType = toRowType(node.outputVariables);
		if (node.orderingScheme !== undefined) {
			const { keys, orders } = toSortingKeys(node.orderingScheme);
			return new MergeExchangeNode(node.id, outputType, keys, orders);
		}
		return new ExchangeNode(node.id, outputType);
	}
}

export interface ShuffleOptions {
	/** Name of the shuffle implementation rows are written to */
	readonly name: string;
	/** Opaque, pre-serialized parameters for the shuffle writer */
	readonly serializedWriteInfo?: string;
}

/**
 * Stages exchange rows through a shuffle: each fragment writes its partitions
 * to the shuffle and later stages read them back.
 */
export class BatchPlanTranslator extends PlanTranslator {
	constructor(converter: ExpressionConverter, private readonly shuffle: ShuffleOptions) {
		super(converter);
	}

	protected translateRemoteSource(node: wire.RemoteSourceNode): PlanNode {
		return new ShuffleReadNode(node.id, toRowType(node.outputVariables));
	}

	/**
	 * Swaps the partitioned output for a partition-and-serialize step feeding the shuffle writer.
	 * Without shuffle write info the fragment's output must already be single.
	 */
	override completeFragment(root: PlanNode): PlanNode {
		if (!(root instanceof PartitionedOutputNode)) {
			throw new InvariantViolationError(`Fragment root ${root.toString()} is not a partitioned output`, root.nodeType);
		}
		if (root.isBroadcast) {
			return unsupported('Broadcast output is not supported in batch mode', 'broadcast');
		}
		if (root.replicateNullsAndAny) {
			return unsupported('Replicating nulls and any row is not supported in batch mode', 'replicateNullsAndAny');
		}

		const writeInfo = this.shuffle.serializedWriteInfo;
		if (writeInfo === undefined) {
			invariant(
				root.numPartitions === 1,
				`Batch fragment with ${root.numPartitions} output partitions requires shuffle write info`,
				'shuffle',
			);
			return root;
		}

		log('Writing %d partition(s) to shuffle %s', root.numPartitions, this.shuffle.name);
		const serialize = new PartitionAndSerializeNode(
			'shuffle-partition-serialize',
			root.keys,
			root.numPartitions,
			root.outputType,
			root.partitionFunctionSpec,
			root.source,
		);
		return new ShuffleWriteNode(
			'root',
			this.shuffle.name,
			writeInfo,
			LocalPartitionNode.gather('shuffle-gather', [serialize]),
		);
	}
}
