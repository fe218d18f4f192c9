import type { ExpressionConverter } from '../../src/lowering/expression-converter.js';
import type * as wire from '../../src/protocol/index.js';
import type { ScalarValue } from '../../src/common/types.js';
import { constant, field, type TypedExpr } from '../../src/plan/expressions.js';
import { isIntegerType, parseTypeSignature, type SqlType } from '../../src/types/sql-type.js';

/**
 * In-process converter for tests. Value blocks are JSON; integer-family
 * literals may be JSON numbers or decimal strings and decode to bigint.
 */
export class FakeConverter implements ExpressionConverter {
	toInternalExpr(expression: wire.RowExpression): TypedExpr {
		switch (expression['@type']) {
			case 'variable':
				return field(expression.name, parseTypeSignature(expression.type));
			case 'constant': {
				const type = parseTypeSignature(expression.type);
				return constant(type, this.constantValueOf(type, expression.valueBlock));
			}
			case 'call':
				return {
					kind: 'call',
					name: lastSegment(expression.functionHandle.name),
					type: parseTypeSignature(expression.returnType),
					inputs: expression.arguments.map(a => this.toInternalExpr(a)),
				};
			case 'special':
				return {
					kind: 'call',
					name: expression.form.toLowerCase(),
					type: parseTypeSignature(expression.returnType),
					inputs: expression.arguments.map(a => this.toInternalExpr(a)),
				};
		}
	}

	constantValueOf(type: SqlType, valueBlock: string): ScalarValue {
		const value: unknown = JSON.parse(valueBlock);
		if (isIntegerType(type) && (typeof value === 'number' || typeof value === 'string')) {
			return BigInt(value);
		}
		if (value === null || typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
			return value;
		}
		throw new Error(`Unsupported test literal: ${valueBlock}`);
	}
}

function lastSegment(name: string): string {
	return name.slice(name.lastIndexOf('.') + 1);
}
