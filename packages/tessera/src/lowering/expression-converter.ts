import type { ScalarValue } from '../common/types.js';
import type { RowExpression } from '../protocol/expressions.js';
import type { SqlType } from '../types/sql-type.js';
import type { TypedExpr } from '../plan/expressions.js';

/**
 * Turns wire row expressions into engine expressions and decodes literal blocks.
 * Implementations are supplied by the host; the lowering code treats it as opaque.
 */
export interface ExpressionConverter {
	/** Field references, calls, special forms and constants */
	toInternalExpr(expression: RowExpression): TypedExpr;

	/**
	 * Decodes a single-row encoded block.
	 * Integer-family values come back as bigint, DATE as a day count or an ISO date string.
	 */
	constantValueOf(type: SqlType, valueBlock: string): ScalarValue;
}
