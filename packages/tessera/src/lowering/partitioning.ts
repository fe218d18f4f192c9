import type * as wire from '../protocol/index.js';
import type { ExpressionConverter } from './expression-converter.js';
import type { PlanNode } from '../plan/nodes/plan-node.js';
import { PartitionedOutputNode } from '../plan/nodes/output-nodes.js';
import { ROUND_ROBIN, type KeyChannel, type PartitionFunctionSpec } from '../plan/partition-function.js';
import { formatExpr, type TypedExpr } from '../plan/expressions.js';
import { indexOfField, toRowType, type RowType } from '../types/row-type.js';
import { invariant, InvariantViolationError, tagOf, unsupported } from '../common/errors.js';
import { createLogger } from '../common/logger.js';

const log = createLogger('lowering', 'partitioning');

/** How a fragment's output is distributed to consumers */
export type CompiledPartitioning =
	| { readonly kind: 'single' }
	| { readonly kind: 'broadcast' }
	| { readonly kind: 'partitioned'; readonly numPartitions: number; readonly spec: PartitionFunctionSpec };

const SINGLE: CompiledPartitioning = { kind: 'single' };

/**
 * Partition keys must resolve to input fields or literals.
 * @throws InvariantViolationError for any other expression
 */
export function toPartitionKeys(args: readonly wire.RowExpression[], converter: ExpressionConverter): TypedExpr[] {
	return args.map(arg => {
		const expr = converter.toInternalExpr(arg);
		if (expr.kind !== 'field' && expr.kind !== 'constant') {
			throw new InvariantViolationError(
				`Unexpected partition key ${formatExpr(expr)}. Expected variable or constant.`,
				arg['@type'],
			);
		}
		return expr;
	});
}

/** Field keys map to their input channel; literal keys carry a one-row vector */
export function toKeyChannel(key: TypedExpr, inputType: RowType): KeyChannel {
	switch (key.kind) {
		case 'field':
			return { kind: 'column', channel: indexOfField(inputType, key.name) };
		case 'constant':
			return { kind: 'constant', vector: { type: key.type, values: [key.value] } };
		default:
			throw new InvariantViolationError('Expression must be field access or constant', key.kind);
	}
}

function requireBucketToPartition(mapping: readonly number[] | undefined, construct: string): readonly number[] {
	if (mapping === undefined || mapping.length === 0) {
		throw new InvariantViolationError(`Partitioning ${construct} requires a bucket-to-partition mapping`, construct);
	}
	return mapping;
}

/**
 * Resolves a partitioning handle and function into an output distribution.
 * Any partitioning that resolves to a single consumer collapses to `single`.
 *
 * @throws UnsupportedConstructError for unsupported handle/function combinations
 */
export function compilePartitioning(
	handle: wire.ConnectorPartitioningHandle,
	keyChannels: readonly KeyChannel[],
	inputType: RowType,
	bucketToPartition: readonly number[] | undefined,
): CompiledPartitioning {
	switch (handle['@type']) {
		case '$remote':
			return compileSystemPartitioning(handle, keyChannels, inputType, bucketToPartition);
		case 'hive':
			return compileHivePartitioning(handle, keyChannels, bucketToPartition);
		default:
			return unsupported(`Unsupported partitioning handle: ${tagOf(handle)}`, tagOf(handle));
	}
}

function compileSystemPartitioning(
	handle: wire.SystemPartitioningHandle,
	keyChannels: readonly KeyChannel[],
	inputType: RowType,
	bucketToPartition: readonly number[] | undefined,
): CompiledPartitioning {
	switch (handle.partitioning) {
		case 'SINGLE':
			if (handle.function !== 'SINGLE') {
				return unsupported(`Unsupported partitioning function: ${handle.function}`, handle.function);
			}
			return SINGLE;
		case 'FIXED':
			switch (handle.function) {
				case 'ROUND_ROBIN':
				case 'HASH': {
					const numPartitions = requireBucketToPartition(bucketToPartition, handle.function).length;
					if (numPartitions === 1) {
						log('%s partitioning over one partition collapses to single', handle.function);
						return SINGLE;
					}
					const spec: PartitionFunctionSpec = handle.function === 'HASH'
						? { kind: 'hash', inputType, keyChannels }
						: ROUND_ROBIN;
					return { kind: 'partitioned', numPartitions, spec };
				}
				case 'BROADCAST':
					return { kind: 'broadcast' };
				default:
					return unsupported(`Unsupported partitioning function: ${handle.function}`, handle.function);
			}
		default:
			return unsupported(`Unsupported kind of system partitioning: ${handle.partitioning}`, handle.partitioning);
	}
}

function compileHivePartitioning(
	handle: wire.HivePartitioningHandle,
	keyChannels: readonly KeyChannel[],
	bucketToPartition: readonly number[] | undefined,
): CompiledPartitioning {
	const mapping = requireBucketToPartition(bucketToPartition, 'hive');
	const numPartitions = mapping.reduce((max, p) => Math.max(max, p), 0) + 1;
	if (numPartitions === 1) {
		log('Hive bucketing over one partition collapses to single');
		return SINGLE;
	}
	if (handle.bucketFunctionType !== 'HIVE_COMPATIBLE') {
		return unsupported(`Unsupported Hive bucket function type: ${handle.bucketFunctionType}`, handle.bucketFunctionType);
	}
	return {
		kind: 'partitioned',
		numPartitions,
		spec: { kind: 'hiveBucket', bucketCount: handle.bucketCount, bucketToPartition: mapping, keyChannels },
	};
}

/**
 * Builds the node that ships a fragment's rows to its consumers.
 * Hash channels are resolved against the source's output; the sent rows follow the scheme's output layout.
 */
export function toPartitionedOutput(
	id: string,
	scheme: wire.PartitioningScheme,
	source: PlanNode,
	converter: ExpressionConverter,
): PartitionedOutputNode {
	const keys = toPartitionKeys(scheme.partitioning.arguments, converter);
	const inputType = source.outputType;
	const keyChannels = keys.map(k => toKeyChannel(k, inputType));
	const outputType = toRowType(scheme.outputLayout);

	const compiled = compilePartitioning(
		scheme.partitioning.handle.connectorHandle,
		keyChannels,
		inputType,
		scheme.bucketToPartition,
	);
	switch (compiled.kind) {
		case 'single':
			return PartitionedOutputNode.single(id, outputType, source);
		case 'broadcast':
			return PartitionedOutputNode.broadcast(id, 1, outputType, source);
		case 'partitioned':
			invariant(compiled.numPartitions > 1, 'Partitioned output needs more than one partition', id);
			return new PartitionedOutputNode(
				id,
				'partitioned',
				keys,
				compiled.numPartitions,
				scheme.replicateNullsAndAny,
				compiled.spec,
				outputType,
				source,
			);
	}
}
