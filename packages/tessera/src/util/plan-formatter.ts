import type { PlanNode } from '../plan/nodes/plan-node.js';
import { formatRowType } from '../types/row-type.js';

export interface FormatPlanOptions {
	/** Include each node's output row type */
	showTypes?: boolean;
	/** Indentation per level */
	indent?: string;
}

/**
 * Render a property value for display. Handles bigint, which JSON cannot.
 */
export function formatPropertyValue(value: unknown): string {
	if (Array.isArray(value)) {
		return `[${value.map(formatPropertyValue).join(', ')}]`;
	}
	if (value instanceof Map) {
		return `{${[...value].map(([k, v]) => `${String(k)}: ${formatPropertyValue(v)}`).join(', ')}}`;
	}
	if (typeof value === 'object' && value !== null) {
		return `{${Object.entries(value).map(([k, v]) => `${k}: ${formatPropertyValue(v)}`).join(', ')}}`;
	}
	return String(value);
}

function formatProperties(props: Record<string, unknown>): string {
	return Object.entries(props)
		.filter(([, v]) => v !== undefined)
		.map(([k, v]) => `${k}=${formatPropertyValue(v)}`)
		.join(' ');
}

/**
 * Walk the plan pre-order. The callback receives each node and its depth.
 */
export function visitPlan(root: PlanNode, fn: (node: PlanNode, depth: number) => void, depth = 0): void {
	fn(root, depth);
	for (const source of root.getSources()) {
		visitPlan(source, fn, depth + 1);
	}
}

/**
 * Render a plan as an indented tree, one line per node.
 *
 * Example:
 *   PartitionedOutput[root] kind=partitioned numPartitions=1 ...
 *     Filter[2] predicate=gt("a", 5:bigint)
 *       TableScan[1] table=tiny.orders columns=[a]
 */
export function formatPlan(root: PlanNode, options: FormatPlanOptions = {}): string {
	const indent = options.indent ?? '  ';
	const lines: string[] = [];
	visitPlan(root, (node, depth) => {
		const parts = [node.toString()];
		const props = formatProperties(node.getLogicalProperties());
		if (props) parts.push(props);
		if (options.showTypes) parts.push(`-> ${formatRowType(node.outputType)}`);
		lines.push(indent.repeat(depth) + parts.join(' '));
	});
	return lines.join('\n');
}
