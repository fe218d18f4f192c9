import type * as wire from '../../protocol/index.js';
import { sameVariable } from '../../protocol/expressions.js';

/**
 * Whether a REPARTITION exchange uses the given function of the FIXED system partitioning.
 */
export function isFixedPartition(node: wire.ExchangeNode, fn: wire.SystemPartitionFunction): boolean {
	if (node.type !== 'REPARTITION') {
		return false;
	}
	const handle = node.partitioningScheme.partitioning.handle.connectorHandle;
	return handle['@type'] === '$remote' && handle.partitioning === 'FIXED' && handle.function === fn;
}

export function isHashPartition(node: wire.ExchangeNode): boolean {
	return isFixedPartition(node, 'HASH');
}

export function isRoundRobinPartition(node: wire.ExchangeNode): boolean {
	return isFixedPartition(node, 'ROUND_ROBIN');
}

/** The node as a local exchange with exactly one source, or null */
export function asLocalSingleSourceExchange(node: wire.WirePlanNode): wire.ExchangeNode | null {
	if (node['@type'] === 'exchange' && node.scope === 'LOCAL' && node.sources.length === 1) {
		return node;
	}
	return null;
}

/** The node as a projection whose every assignment is `x := x`, or null */
export function asIdentityProjection(node: wire.WirePlanNode): wire.ProjectNode | null {
	if (node['@type'] !== 'project') {
		return null;
	}
	return node.assignments.every(a => sameVariable(a.expression, a.variable)) ? node : null;
}
