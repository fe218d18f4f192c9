import type * as wire from '../../protocol/index.js';
import { asScalarCall, NOT_FUNCTION, sameVariable } from '../../protocol/expressions.js';
import type { ExpressionConverter } from '../expression-converter.js';
import type { PlanNode } from '../../plan/nodes/plan-node.js';
import { FilterNode, ProjectNode } from '../../plan/nodes/relational-nodes.js';
import { HashJoinNode, type JoinType } from '../../plan/nodes/join-nodes.js';
import { constant, field, type TypedExpr } from '../../plan/expressions.js';
import { rowType } from '../../types/row-type.js';
import { BOOLEAN } from '../../types/sql-type.js';
import { createLogger } from '../../common/logger.js';
import { toFieldAccess } from '../variables.js';

const log = createLogger('lowering', 'rewrite:semi-join');

type Translate = (node: wire.WirePlanNode) => PlanNode;

/** Which join a filter over the semi join's match flag amounts to */
function filteringJoinType(predicate: wire.RowExpression, flag: wire.Variable): JoinType | null {
	if (sameVariable(predicate, flag)) {
		return 'leftSemiFilter';
	}
	const not = asScalarCall(predicate, NOT_FUNCTION);
	if (not !== null && not.arguments.length === 1 && sameVariable(not.arguments[0], flag)) {
		return 'anti';
	}
	return null;
}

/**
 * A semi join yields every probe row plus a match flag, and a Filter on top
 * picks rows by that flag. Filtering on the flag (or its negation) becomes a
 * semi (or null-aware anti) hash join with the flag re-added as a constant;
 * any other predicate keeps the Filter over a flag-projecting semi join.
 *
 * Returns null when the filter's source is not a semi join.
 */
export function tryConvertSemiJoin(
	node: wire.FilterNode,
	converter: ExpressionConverter,
	translate: Translate,
): PlanNode | null {
	const semiJoin = node.source;
	if (semiJoin['@type'] !== 'semijoin') {
		return null;
	}

	const flag = semiJoin.semiJoinOutput;
	const joinType = filteringJoinType(node.predicate, flag);

	const leftKeys = [toFieldAccess(semiJoin.sourceJoinVariable)];
	const rightKeys = [toFieldAccess(semiJoin.filteringSourceJoinVariable)];
	const left = translate(semiJoin.source);
	const right = translate(semiJoin.filteringSource);

	const leftType = left.outputType;
	const names = [...leftType.names, flag.name];

	if (joinType === null) {
		log('Semi join %s: predicate uses the flag; projecting semi join under the filter', semiJoin.id);
		return new FilterNode(
			node.id,
			converter.toInternalExpr(node.predicate),
			new HashJoinNode(
				semiJoin.id,
				'leftSemiProject',
				false,
				leftKeys,
				rightKeys,
				undefined,
				left,
				right,
				rowType(names, [...leftType.types, BOOLEAN]),
			),
		);
	}

	log('Semi join %s: filtering %s join', semiJoin.id, joinType);
	const projections: TypedExpr[] = leftType.names.map((name, i) => field(name, leftType.types[i]));
	projections.push(constant(BOOLEAN, joinType === 'leftSemiFilter'));

	return new ProjectNode(
		node.id,
		names,
		projections,
		new HashJoinNode(
			semiJoin.id,
			joinType,
			joinType === 'anti',
			leftKeys,
			rightKeys,
			undefined,
			left,
			right,
			leftType,
		),
	);
}
