import type { CellValue, TableRef } from '../common/types.js';
import { SchemaError } from '../common/errors.js';
import type { ColumnType } from '../types/column-type.js';
import type {
	AggregateFunction,
	BinaryOperator,
	Expression,
	UnaryOperator,
} from './ast.js';
import type { ColumnData, ContextProvider, EvalContext } from './context.js';
import { evaluate } from './evaluate.js';
import { expressionToString } from './stringify.js';

/** Anything usable as an operand: an expression or a plain value taken as literal. */
export type ExprLike = Expr | CellValue;

export interface ApplyOptions {
	/** Pass nulls through without calling the function (default true) */
	filterNones?: boolean;
	/** Declared result type; inferred from the results when absent */
	type?: ColumnType;
	label?: string;
}

export function toExpression(value: ExprLike): Expression {
	return value instanceof Expr ? value.node : { type: 'literal', value };
}

/**
 * Fluent wrapper around an expression node.
 *
 * ```ts
 * const mz = table.column('mz');
 * table.filter(mz.ge(100).and(mz.lt(200)));
 * ```
 */
export class Expr {
	constructor(readonly node: Expression) {}

	// Arithmetic
	add(other: ExprLike): Expr { return this.binary('add', other); }
	sub(other: ExprLike): Expr { return this.binary('sub', other); }
	mul(other: ExprLike): Expr { return this.binary('mul', other); }
	div(other: ExprLike): Expr { return this.binary('div', other); }
	mod(other: ExprLike): Expr { return this.binary('mod', other); }
	pow(other: ExprLike): Expr { return this.binary('pow', other); }
	neg(): Expr { return this.unary('neg'); }
	abs(): Expr { return this.unary('abs'); }

	// Comparison
	eq(other: ExprLike): Expr { return this.binary('eq', other); }
	ne(other: ExprLike): Expr { return this.binary('ne', other); }
	lt(other: ExprLike): Expr { return this.binary('lt', other); }
	le(other: ExprLike): Expr { return this.binary('le', other); }
	gt(other: ExprLike): Expr { return this.binary('gt', other); }
	ge(other: ExprLike): Expr { return this.binary('ge', other); }

	/** Inclusive range check */
	between(low: ExprLike, high: ExprLike): Expr {
		return this.ge(low).and(this.le(high));
	}

	// Logic
	and(other: ExprLike): Expr { return this.binary('and', other); }
	or(other: ExprLike): Expr { return this.binary('or', other); }
	xor(other: ExprLike): Expr { return this.binary('xor', other); }
	not(): Expr { return this.unary('not'); }

	// Text and membership
	startsWith(prefix: ExprLike): Expr { return this.binary('startsWith', prefix); }
	endsWith(suffix: ExprLike): Expr { return this.binary('endsWith', suffix); }
	contains(item: ExprLike): Expr { return this.binary('contains', item); }
	isIn(candidates: readonly CellValue[]): Expr { return this.binary('isIn', [...candidates]); }

	// Missing values
	isNone(): Expr { return this.unary('isNone'); }
	isNotNone(): Expr { return this.unary('isNotNone'); }

	/**
	 * Maps `fn` over the values. By default nulls are passed through without
	 * calling `fn`.
	 */
	apply(fn: (value: CellValue) => CellValue, options: ApplyOptions = {}): Expr {
		return new Expr({
			type: 'apply',
			fn,
			operand: this.node,
			filterNones: options.filterNones ?? true,
			resultType: options.type,
			label: options.label,
		});
	}

	/** `whenTrue` where this expression holds, else `whenFalse` */
	thenElse(whenTrue: ExprLike, whenFalse: ExprLike): Expr {
		return new Expr({
			type: 'conditional',
			condition: this.node,
			whenTrue: toExpression(whenTrue),
			whenFalse: toExpression(whenFalse),
		});
	}

	// Aggregates
	count(): Expr { return this.aggregate('count'); }
	sum(): Expr { return this.aggregate('sum'); }
	min(): Expr { return this.aggregate('min'); }
	max(): Expr { return this.aggregate('max'); }
	mean(): Expr { return this.aggregate('mean'); }
	std(): Expr { return this.aggregate('std'); }
	countNone(): Expr { return this.aggregate('countNone'); }
	countNotNone(): Expr { return this.aggregate('countNotNone'); }
	uniqueNotNone(): Expr { return this.aggregate('uniqueNotNone'); }
	hasNone(): Expr { return this.aggregate('hasNone'); }
	len(): Expr { return this.aggregate('len'); }

	/**
	 * Turns an aggregate into a per-row value computed over the rows sharing
	 * the same keys.
	 */
	groupBy(...keys: ExprLike[]): Expr {
		if (this.node.type !== 'aggregate') {
			throw new SchemaError('groupBy applies to aggregate expressions only');
		}
		return new Expr({ ...this.node, groupBy: keys.map(toExpression) });
	}

	evaluate(context?: EvalContext): ColumnData {
		return evaluate(this.node, context);
	}

	toString(): string {
		return expressionToString(this.node);
	}

	private unary(operator: UnaryOperator): Expr {
		return new Expr({ type: 'unary', operator, operand: this.node });
	}

	private binary(operator: BinaryOperator, other: ExprLike): Expr {
		return new Expr({ type: 'binary', operator, left: this.node, right: toExpression(other) });
	}

	private aggregate(fn: AggregateFunction): Expr {
		return new Expr({ type: 'aggregate', fn, operand: this.node });
	}
}

/**
 * Expression referencing one column of a table, with direct access to the
 * column's current values.
 */
export class ColumnHandle extends Expr {
	constructor(private readonly source: ContextProvider, readonly name: string, readonly columnType: ColumnType) {
		super({ type: 'column', table: source.ref, name, columnType });
	}

	get tableRef(): TableRef {
		return this.source.ref;
	}

	/** Current values of the column, copied */
	get values(): CellValue[] {
		const data = this.source.columnContext([this.name]).get(this.name);
		if (!data) {
			throw new SchemaError(`column ${this.name} no longer exists`);
		}
		return [...data.values];
	}
}

/** Literal value as expression */
export function lit(value: CellValue): Expr {
	return new Expr({ type: 'literal', value });
}

/** Conjunction of all operands; `true` for none. */
export function and(...operands: ExprLike[]): Expr {
	const [first, ...rest] = operands;
	if (operands.length === 0) return lit(true);
	return rest.reduce<Expr>((acc, operand) => acc.and(operand), new Expr(toExpression(first)));
}

/** Disjunction of all operands; `false` for none. */
export function or(...operands: ExprLike[]): Expr {
	const [first, ...rest] = operands;
	if (operands.length === 0) return lit(false);
	return rest.reduce<Expr>((acc, operand) => acc.or(operand), new Expr(toExpression(first)));
}

export function not(operand: ExprLike): Expr {
	return new Expr(toExpression(operand)).not();
}

/** Conditional expression */
export function when(condition: ExprLike, whenTrue: ExprLike, whenFalse: ExprLike): Expr {
	return new Expr(toExpression(condition)).thenElse(whenTrue, whenFalse);
}
