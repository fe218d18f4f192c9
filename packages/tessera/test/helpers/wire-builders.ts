import type * as wire from '../../src/protocol/index.js';
import { BUILTIN_NAMESPACE } from '../../src/protocol/expressions.js';

export function variable(name: string, type = 'bigint'): wire.Variable {
	return { '@type': 'variable', name, type };
}

export function literal(type: string, value: string | number | boolean | null): wire.ConstantExpression {
	return { '@type': 'constant', type, valueBlock: JSON.stringify(value) };
}

export function bigintLiteral(value: number | bigint): wire.ConstantExpression {
	return { '@type': 'constant', type: 'bigint', valueBlock: JSON.stringify(value.toString()) };
}

export function call(
	name: string,
	args: readonly wire.RowExpression[],
	returnType = 'boolean',
	kind: wire.FunctionKind = 'SCALAR',
	namespace = BUILTIN_NAMESPACE,
): wire.CallExpression {
	return {
		'@type': 'call',
		displayName: name,
		functionHandle: {
			kind,
			name: `${namespace}.${name}`,
			argumentTypes: args.map(typeOf),
			returnType,
		},
		returnType,
		arguments: args,
	};
}

function typeOf(expression: wire.RowExpression): string {
	switch (expression['@type']) {
		case 'variable':
		case 'constant':
			return expression.type;
		case 'call':
		case 'special':
			return expression.returnType;
	}
}

export function not(argument: wire.RowExpression, namespace = BUILTIN_NAMESPACE): wire.CallExpression {
	return call('not', [argument], 'boolean', 'SCALAR', namespace);
}

export function greaterThan(
	left: wire.RowExpression,
	right: wire.RowExpression,
	namespace = BUILTIN_NAMESPACE,
): wire.CallExpression {
	return call('$operator$greater_than', [left, right], 'boolean', 'SCALAR', namespace);
}

export function or(...args: wire.RowExpression[]): wire.SpecialFormExpression {
	return { '@type': 'special', form: 'OR', returnType: 'boolean', arguments: args };
}

// Domains

/** A marker; omit the value for an unbounded side */
export function marker(type: string, bound: wire.BoundKind, value?: unknown): wire.Marker {
	return value === undefined
		? { type, bound }
		: { type, bound, valueBlock: JSON.stringify(typeof value === 'bigint' ? value.toString() : value) };
}

/** `[low, high]`, `(low, high)` etc.; `undefined` on a side means unbounded */
export function range(
	type: string,
	low: unknown,
	high: unknown,
	{ lowExclusive = false, highExclusive = false } = {},
): wire.Range {
	return {
		low: marker(type, lowExclusive || low === undefined ? 'ABOVE' : 'EXACTLY', low),
		high: marker(type, highExclusive || high === undefined ? 'BELOW' : 'EXACTLY', high),
	};
}

export function point(type: string, value: unknown): wire.Range {
	return range(type, value, value);
}

export function sortable(type: string, ranges: readonly wire.Range[], nullAllowed = false): wire.Domain {
	return { values: { '@type': 'sortable', type, ranges }, nullAllowed };
}

// Plan nodes

export function tableScan(id: string, outputs: readonly wire.Variable[], tableName = 'lineitem'): wire.TableScanNode {
	return {
		'@type': 'tablescan',
		id,
		table: {
			connectorId: 'tpch',
			connectorHandle: { '@type': 'tpch', tableName, scaleFactor: 0.01 },
			connectorTableLayout: { '@type': 'tpch', table: { '@type': 'tpch', tableName, scaleFactor: 0.01 } },
		},
		outputVariables: outputs,
		assignments: outputs.map(v => ({
			variable: v,
			column: { '@type': 'tpch', columnName: v.name, type: v.type },
		})),
	};
}

export function systemPartitioning(
	partitioning: wire.SystemPartitioning,
	fn: wire.SystemPartitionFunction,
): wire.PartitioningHandle {
	return { connectorHandle: { '@type': '$remote', partitioning, function: fn } };
}

export function scheme(
	handle: wire.PartitioningHandle,
	outputLayout: readonly wire.Variable[],
	options: { args?: readonly wire.RowExpression[]; bucketToPartition?: readonly number[]; replicateNullsAndAny?: boolean } = {},
): wire.PartitioningScheme {
	return {
		partitioning: { handle, arguments: options.args ?? [] },
		outputLayout,
		replicateNullsAndAny: options.replicateNullsAndAny ?? false,
		bucketToPartition: options.bucketToPartition,
	};
}

/** Single-source local exchange passing its source's columns through */
export function localExchange(
	id: string,
	source: wire.WirePlanNode,
	layout: readonly wire.Variable[],
	fn: 'ROUND_ROBIN' | 'GATHER' = 'ROUND_ROBIN',
): wire.ExchangeNode {
	const handle = fn === 'ROUND_ROBIN' ? systemPartitioning('FIXED', 'ROUND_ROBIN') : systemPartitioning('SINGLE', 'SINGLE');
	return {
		'@type': 'exchange',
		id,
		type: fn === 'ROUND_ROBIN' ? 'REPARTITION' : 'GATHER',
		scope: 'LOCAL',
		partitioningScheme: scheme(handle, layout),
		sources: [source],
		inputs: [layout],
		ensureSourceOrdering: false,
	};
}

export function identityProject(id: string, source: wire.WirePlanNode, outputs: readonly wire.Variable[]): wire.ProjectNode {
	return {
		'@type': 'project',
		id,
		source,
		assignments: outputs.map(v => ({ variable: v, expression: v })),
	};
}

export interface OffsetLimitOptions {
	readonly columns: readonly wire.Variable[];
	readonly rowNumber: wire.Variable;
	readonly projected?: readonly wire.Variable[];
	readonly offset?: wire.RowExpression;
	readonly count?: wire.WireInt64;
	readonly topExchange?: 'ROUND_ROBIN' | 'GATHER';
	readonly rowNumberExchange?: 'ROUND_ROBIN' | 'GATHER';
	readonly predicateNamespace?: string;
}

/**
 * `OFFSET 5 LIMIT 10` as the coordinator plans it: a projection dropping the row
 * number, over a limit, over a row-number filter, over a row number of `scan`.
 */
export function offsetLimitChain(options: OffsetLimitOptions): wire.ProjectNode {
	const { columns, rowNumber: rn } = options;
	const layout = [...columns, rn];
	const rowNumber: wire.RowNumberNode = {
		'@type': 'rownumber',
		id: 'rownumber',
		source: tableScan('scan', columns),
		partitionBy: [],
		rowNumberVariable: rn,
		partial: false,
	};
	const filter: wire.FilterNode = {
		'@type': 'filter',
		id: 'filter',
		source: localExchange('ex3', rowNumber, layout, options.rowNumberExchange ?? 'ROUND_ROBIN'),
		predicate: greaterThan(rn, options.offset ?? bigintLiteral(5), options.predicateNamespace),
	};
	const limit: wire.LimitNode = {
		'@type': 'limit',
		id: 'limit',
		source: localExchange('ex2', filter, layout, 'GATHER'),
		count: options.count ?? 10,
		step: 'FINAL',
	};
	return identityProject(
		'project',
		localExchange('ex1', limit, layout, options.topExchange ?? 'ROUND_ROBIN'),
		options.projected ?? columns,
	);
}

/** Filter `predicate` over a semi join of `probe` (key `a`) against `build` (key `k`) flagging `matched` */
export function semiJoinFilter(predicate: wire.RowExpression): wire.FilterNode {
	const key = variable('a');
	const buildKey = variable('k');
	return {
		'@type': 'filter',
		id: 'filter',
		predicate,
		source: {
			'@type': 'semijoin',
			id: 'semijoin',
			source: tableScan('probe', [key]),
			filteringSource: tableScan('build', [buildKey], 'orders'),
			sourceJoinVariable: key,
			filteringSourceJoinVariable: buildKey,
			semiJoinOutput: variable('matched', 'boolean'),
		},
	};
}

export function fragment(
	root: wire.WirePlanNode,
	partitioningScheme: wire.PartitioningScheme,
	descriptor: Partial<wire.StageExecutionDescriptor> = {},
): wire.WirePlanFragment {
	return {
		id: '1',
		root,
		partitioningScheme,
		stageExecutionDescriptor: {
			stageExecutionStrategy: descriptor.stageExecutionStrategy ?? 'UNGROUPED_EXECUTION',
			groupedExecutionScanNodes: descriptor.groupedExecutionScanNodes ?? [],
			totalLifespans: descriptor.totalLifespans ?? 1,
		},
	};
}

export const TASK_ID = '20240101_000000_00000_abcde.3.0.7.0';
