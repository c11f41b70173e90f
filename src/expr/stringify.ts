/**
 * Renders expression trees as readable text, e.g. `((mz >= 100) and (rt < 30))`.
 *
 * Formatting Notes:
 * - Every binary operation is parenthesized.
 * - Text literals are single quoted with quotes escaped.
 * - Applied functions render as `label(operand)`, `apply(operand)` without a label.
 */
import type { CellValue } from '../common/types.js';
import { cellRepr } from '../util/format.js';
import type { BinaryOperator, Expression, UnaryOperator } from './ast.js';

const BINARY_SYMBOLS: Record<BinaryOperator, string> = {
	add: '+',
	sub: '-',
	mul: '*',
	div: '/',
	mod: '%',
	pow: '**',
	eq: '==',
	ne: '!=',
	lt: '<',
	le: '<=',
	gt: '>',
	ge: '>=',
	and: 'and',
	or: 'or',
	xor: 'xor',
	startsWith: 'startswith',
	endsWith: 'endswith',
	contains: 'contains',
	isIn: 'in',
};

function literalToString(value: CellValue): string {
	return cellRepr(value);
}

function unaryToString(operator: UnaryOperator, operand: string): string {
	switch (operator) {
		case 'neg': return `-${operand}`;
		case 'not': return `not ${operand}`;
		case 'abs': return `abs(${operand})`;
		case 'isNone': return `${operand} is None`;
		case 'isNotNone': return `${operand} is not None`;
	}
}

export function expressionToString(node: Expression): string {
	switch (node.type) {
		case 'literal':
			return literalToString(node.value);
		case 'column':
			return node.name;
		case 'unary':
			return unaryToString(node.operator, expressionToString(node.operand));
		case 'binary':
			return `(${expressionToString(node.left)} ${BINARY_SYMBOLS[node.operator]} ${expressionToString(node.right)})`;
		case 'apply':
			return `${node.label ?? 'apply'}(${expressionToString(node.operand)})`;
		case 'aggregate': {
			const aggregated = `${expressionToString(node.operand)}.${node.fn}`;
			if (!node.groupBy || node.groupBy.length === 0) return aggregated;
			return `${aggregated} by (${node.groupBy.map(expressionToString).join(', ')})`;
		}
		case 'conditional':
			return `(${expressionToString(node.whenTrue)} if ${expressionToString(node.condition)} else ${expressionToString(node.whenFalse)})`;
	}
}
