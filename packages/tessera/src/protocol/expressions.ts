/**
 * Row expressions as shipped by the coordinator.
 * Types travel as string signatures; constants travel as opaque encoded blocks.
 */

/** A reference to a named column. Two variables are the same column iff name and type match. */
export interface Variable {
	readonly '@type': 'variable';
	readonly name: string;
	readonly type: string;
}

/** A literal. `valueBlock` is an encoded single-row block only the expression converter decodes. */
export interface ConstantExpression {
	readonly '@type': 'constant';
	readonly type: string;
	readonly valueBlock: string;
}

export type FunctionKind = 'SCALAR' | 'AGGREGATE' | 'WINDOW';

export interface FunctionHandle {
	readonly kind: FunctionKind;
	/** Fully qualified name, e.g. `catalog.schema.not` */
	readonly name: string;
	readonly argumentTypes: readonly string[];
	readonly returnType: string;
}

export interface CallExpression {
	readonly '@type': 'call';
	readonly displayName: string;
	readonly functionHandle: FunctionHandle;
	readonly returnType: string;
	readonly arguments: readonly RowExpression[];
}

export type SpecialForm =
	| 'IF' | 'NULL_IF' | 'SWITCH' | 'WHEN' | 'IS_NULL' | 'COALESCE'
	| 'IN' | 'AND' | 'OR' | 'DEREFERENCE' | 'ROW_CONSTRUCTOR' | 'BIND';

export interface SpecialFormExpression {
	readonly '@type': 'special';
	readonly form: SpecialForm;
	readonly returnType: string;
	readonly arguments: readonly RowExpression[];
}

export type RowExpression = Variable | ConstantExpression | CallExpression | SpecialFormExpression;

/** Column identity as the rewrites compare it: same name and same type signature */
export function sameVariable(actual: RowExpression, expected: Variable): boolean {
	return actual['@type'] === 'variable' && actual.name === expected.name && actual.type === expected.type;
}

/** Catalog and schema that builtin functions resolve under */
export const BUILTIN_NAMESPACE = 'presto.default';
export const NOT_FUNCTION = `${BUILTIN_NAMESPACE}.not`;
export const GREATER_THAN_OPERATOR = `${BUILTIN_NAMESPACE}.$operator$greater_than`;

/**
 * Returns the expression as a call when it is a scalar call of the named builtin.
 * `functionName` is fully qualified; a same-named function in another namespace does not match.
 */
export function asScalarCall(expression: RowExpression, functionName: string): CallExpression | null {
	if (expression['@type'] !== 'call') {
		return null;
	}
	const handle = expression.functionHandle;
	if (handle.kind === 'SCALAR' && handle.name === functionName) {
		return expression;
	}
	return null;
}
