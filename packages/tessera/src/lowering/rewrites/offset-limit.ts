import type * as wire from '../../protocol/index.js';
import { asScalarCall, GREATER_THAN_OPERATOR, sameVariable } from '../../protocol/expressions.js';
import type { ExpressionConverter } from '../expression-converter.js';
import type { PlanNode } from '../../plan/nodes/plan-node.js';
import { ProjectNode } from '../../plan/nodes/relational-nodes.js';
import { LimitNode } from '../../plan/nodes/ordering-nodes.js';
import { createLogger } from '../../common/logger.js';
import { toRowCount } from '../variables.js';
import { asIdentityProjection, asLocalSingleSourceExchange, isRoundRobinPartition } from './patterns.js';

const log = createLogger('lowering', 'rewrite:offset-limit');

type Translate = (node: wire.WirePlanNode) => PlanNode;

function noMatch(reason: string, id: string): null {
	log('No OFFSET/LIMIT match at %s: %s', id, reason);
	return null;
}

/**
 * OFFSET n LIMIT m arrives as
 *
 *   Project (drops the row number)
 *     LocalExchange (round robin)
 *       Limit m
 *         LocalExchange
 *           Filter rowNumber > n
 *             LocalExchange
 *               RowNumber
 *
 * and becomes Project over a single Limit with offset n.
 * Returns null when the shape differs in any way.
 *
 * Only direct `x := rowNumber` assignments are checked; an expression that
 * merely reads the row number column is not detected.
 */
export function tryConvertOffsetLimit(
	node: wire.ProjectNode,
	converter: ExpressionConverter,
	translate: Translate,
): ProjectNode | null {
	if (asIdentityProjection(node) === null) {
		return noMatch('projection is not an identity', node.id);
	}

	const exchangeAboveLimit = asLocalSingleSourceExchange(node.source);
	if (exchangeAboveLimit === null || !isRoundRobinPartition(exchangeAboveLimit)) {
		return noMatch('no round-robin local exchange below the projection', node.id);
	}

	const limit = exchangeAboveLimit.sources[0];
	if (limit['@type'] !== 'limit') {
		return noMatch('no limit', node.id);
	}

	const exchangeAboveFilter = asLocalSingleSourceExchange(limit.source);
	if (exchangeAboveFilter === null) {
		return noMatch('no local exchange below the limit', node.id);
	}

	const filter = exchangeAboveFilter.sources[0];
	if (filter['@type'] !== 'filter') {
		return noMatch('no filter', node.id);
	}

	const exchangeAboveRowNumber = asLocalSingleSourceExchange(filter.source);
	if (exchangeAboveRowNumber === null) {
		return noMatch('no local exchange below the filter', node.id);
	}

	const rowNumber = exchangeAboveRowNumber.sources[0];
	if (rowNumber['@type'] !== 'rownumber') {
		return noMatch('no row number', node.id);
	}
	const rowNumberVariable = rowNumber.rowNumberVariable;

	const gt = asScalarCall(filter.predicate, GREATER_THAN_OPERATOR);
	if (gt === null || gt.arguments.length !== 2 || !sameVariable(gt.arguments[0], rowNumberVariable)) {
		return noMatch('filter is not rowNumber > constant', node.id);
	}

	const offsetExpr = converter.toInternalExpr(gt.arguments[1]);
	if (offsetExpr.kind !== 'constant' || offsetExpr.type.kind !== 'bigint' || typeof offsetExpr.value !== 'bigint') {
		return noMatch('offset is not a bigint constant', node.id);
	}

	if (node.assignments.some(a => sameVariable(a.expression, rowNumberVariable))) {
		return noMatch('projection keeps the row number', node.id);
	}

	// Every upstream column except the row number must survive
	const expected = exchangeAboveLimit.partitioningScheme.outputLayout
		.filter(v => !(v.name === rowNumberVariable.name && v.type === rowNumberVariable.type));
	const projected = node.assignments.map(a => a.variable);
	if (expected.length !== projected.length
		|| !expected.every(v => projected.some(p => sameVariable(p, v)))) {
		return noMatch('projection drops more than the row number', node.id);
	}

	log('Collapsing OFFSET %s LIMIT %s at %s', offsetExpr.value, limit.count, node.id);
	return new ProjectNode(
		node.id,
		projected.map(v => v.name),
		node.assignments.map(a => converter.toInternalExpr(a.expression)),
		new LimitNode(
			limit.id,
			offsetExpr.value,
			toRowCount(limit.count, limit.id),
			limit.step === 'PARTIAL',
			translate(rowNumber.source),
		),
	);
}
