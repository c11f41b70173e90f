import type { CellValue, TableRef } from '../common/types.js';
import type { ColumnType } from '../types/column-type.js';

/**
 * Expression tree definitions.
 * Nodes are immutable plain objects; `Expr` in builders.ts wraps them for
 * fluent construction.
 */

// Base for all expression nodes
export interface ExprNode {
	readonly type: 'literal' | 'column' | 'unary' | 'binary' | 'apply' | 'aggregate' | 'conditional';
}

export type Expression = LiteralExpr | ColumnExpr | UnaryExpr | BinaryExpr | ApplyExpr | AggregateExpr | ConditionalExpr;

// Constant value, broadcast against any column
export interface LiteralExpr extends ExprNode {
	readonly type: 'literal';
	readonly value: CellValue;
}

// Reference to a column of a specific table
export interface ColumnExpr extends ExprNode {
	readonly type: 'column';
	readonly table: TableRef;
	readonly name: string;
	readonly columnType: ColumnType;
}

export type UnaryOperator = 'neg' | 'not' | 'abs' | 'isNone' | 'isNotNone';

export interface UnaryExpr extends ExprNode {
	readonly type: 'unary';
	readonly operator: UnaryOperator;
	readonly operand: Expression;
}

export type ArithmeticOperator = 'add' | 'sub' | 'mul' | 'div' | 'mod' | 'pow';
export type ComparisonOperator = 'eq' | 'ne' | 'lt' | 'le' | 'gt' | 'ge';
export type LogicalOperator = 'and' | 'or' | 'xor';
export type MembershipOperator = 'startsWith' | 'endsWith' | 'contains' | 'isIn';
export type BinaryOperator = ArithmeticOperator | ComparisonOperator | LogicalOperator | MembershipOperator;

export interface BinaryExpr extends ExprNode {
	readonly type: 'binary';
	readonly operator: BinaryOperator;
	readonly left: Expression;
	readonly right: Expression;
}

/** Maps a function over the operand's values */
export interface ApplyExpr extends ExprNode {
	readonly type: 'apply';
	readonly fn: (value: CellValue) => CellValue;
	readonly operand: Expression;
	/** Pass nulls through without calling `fn` */
	readonly filterNones: boolean;
	readonly resultType?: ColumnType;
	/** Label used when the expression is rendered */
	readonly label?: string;
}

export type AggregateFunction =
	| 'count' | 'sum' | 'min' | 'max' | 'mean' | 'std'
	| 'countNone' | 'countNotNone' | 'uniqueNotNone' | 'hasNone' | 'len';

/**
 * Reduces the operand's values to a single, broadcastable value, or with
 * `groupBy` to one value per row, aggregated over the rows sharing its key.
 */
export interface AggregateExpr extends ExprNode {
	readonly type: 'aggregate';
	readonly fn: AggregateFunction;
	readonly operand: Expression;
	readonly groupBy?: readonly Expression[];
}

export interface ConditionalExpr extends ExprNode {
	readonly type: 'conditional';
	readonly condition: Expression;
	readonly whenTrue: Expression;
	readonly whenFalse: Expression;
}

export const COMPARISON_OPERATORS: ReadonlySet<BinaryOperator> = new Set<BinaryOperator>(['eq', 'ne', 'lt', 'le', 'gt', 'ge']);
export const LOGICAL_OPERATORS: ReadonlySet<BinaryOperator> = new Set<BinaryOperator>(['and', 'or', 'xor']);
export const ARITHMETIC_OPERATORS: ReadonlySet<BinaryOperator> = new Set<BinaryOperator>(['add', 'sub', 'mul', 'div', 'mod', 'pow']);

/**
 * Visits every node of the tree, parents first.
 */
export function walkExpression(node: Expression, visit: (node: Expression) => void): void {
	visit(node);
	switch (node.type) {
		case 'literal':
		case 'column':
			return;
		case 'unary':
		case 'apply':
			walkExpression(node.operand, visit);
			return;
		case 'aggregate':
			walkExpression(node.operand, visit);
			for (const key of node.groupBy ?? []) walkExpression(key, visit);
			return;
		case 'binary':
			walkExpression(node.left, visit);
			walkExpression(node.right, visit);
			return;
		case 'conditional':
			walkExpression(node.condition, visit);
			walkExpression(node.whenTrue, visit);
			walkExpression(node.whenFalse, visit);
			return;
	}
}

/**
 * Columns referenced by an expression, grouped by table.
 */
export function neededColumns(node: Expression): Map<TableRef, Set<string>> {
	const needed = new Map<TableRef, Set<string>>();
	walkExpression(node, n => {
		if (n.type !== 'column') return;
		let names = needed.get(n.table);
		if (!names) {
			names = new Set();
			needed.set(n.table, names);
		}
		names.add(n.name);
	});
	return needed;
}
