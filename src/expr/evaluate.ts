import { BTree } from 'digitree';
import { ArgumentError, SchemaError, ShapeMismatchError, TypeMismatchError } from '../common/errors.js';
import { createLogger } from '../common/logger.js';
import { isCellList, isCellRecord, isHashable, type CellValue } from '../common/types.js';
import type { ColumnType } from '../types/column-type.js';
import { BOOL_TYPE, FLOAT_TYPE, INT_TYPE, STR_TYPE } from '../types/builtin-types.js';
import { commonTypeFor, typeOfValue } from '../types/inference.js';
import { cellsEqual, compareCells, compareRows } from '../util/comparison.js';
import type {
	AggregateExpr,
	ApplyExpr,
	ArithmeticOperator,
	BinaryExpr,
	BinaryOperator,
	ComparisonOperator,
	ConditionalExpr,
	Expression,
	UnaryExpr,
} from './ast.js';
import { ARITHMETIC_OPERATORS, COMPARISON_OPERATORS, LOGICAL_OPERATORS } from './ast.js';
import type { ColumnData, EvalContext } from './context.js';

const log = createLogger('expr:evaluate');

/**
 * Evaluates an expression against a context.
 *
 * The result holds a single value when every referenced column has a single
 * value (or none is referenced), and one value per row otherwise. Operands
 * of different lengths broadcast when one of them has length 1.
 *
 * Missing values: comparisons with `null` are false, arithmetic yields
 * `null`, logical operators read `null` as false.
 *
 * @throws ShapeMismatchError for operands of irreconcilable lengths
 * @throws SchemaError for columns missing from the context
 */
export function evaluate(node: Expression, context: EvalContext = new Map()): ColumnData {
	switch (node.type) {
		case 'literal':
			return { values: [node.value], sorted: false, type: typeOfValue(node.value) };
		case 'column': {
			const data = context.get(node.table)?.get(node.name);
			if (!data) {
				throw new SchemaError(`column ${node.name} is not available in the evaluation context`);
			}
			return data;
		}
		case 'unary':
			return evaluateUnary(node, context);
		case 'binary':
			return evaluateBinary(node, context);
		case 'apply':
			return evaluateApply(node, context);
		case 'aggregate':
			return evaluateAggregate(node, context);
		case 'conditional':
			return evaluateConditional(node, context);
	}
}

/**
 * Truthiness of a cell: `null`, `false`, zero, empty text and empty
 * collections are false.
 */
export function isTruthy(value: CellValue): boolean {
	if (value === null) return false;
	switch (typeof value) {
		case 'boolean': return value;
		case 'number': return value !== 0;
		case 'bigint': return value !== 0n;
		case 'string': return value.length > 0;
	}
	if (value instanceof Uint8Array) return value.length > 0;
	if (isCellList(value)) return value.length > 0;
	if (isHashable(value)) return true;
	return Object.keys(value).length > 0;
}

function describe(value: CellValue): string {
	if (value === null) return 'null';
	if (value instanceof Uint8Array) return 'bytes';
	if (isCellList(value)) return 'list';
	if (isHashable(value)) return value.cellType ?? 'object';
	if (isCellRecord(value)) return 'dict';
	return typeof value;
}

function broadcastLength(operator: string, ...lengths: number[]): number {
	let length = 1;
	for (const l of lengths) {
		if (l === length || l === 1) continue;
		if (length !== 1) {
			throw new ShapeMismatchError(
				`operands of '${operator}' have lengths ${lengths.join(' and ')} which can not be broadcast`,
				length,
				l
			);
		}
		length = l;
	}
	return length;
}

function at(values: readonly CellValue[], i: number): CellValue {
	return values.length === 1 ? values[0] : values[i];
}

function isNaNValue(value: CellValue): boolean {
	return typeof value === 'number' && Number.isNaN(value);
}

// --- unary ---

function negate(value: CellValue, operator: 'neg' | 'abs'): CellValue {
	if (value === null) return null;
	const numeric = typeof value === 'boolean' ? (value ? 1 : 0) : value;
	if (typeof numeric === 'number') return operator === 'neg' ? -numeric : Math.abs(numeric);
	if (typeof numeric === 'bigint') return operator === 'neg' || numeric < 0n ? -numeric : numeric;
	throw new TypeMismatchError(`bad operand type for ${operator}: ${describe(value)}`);
}

function evaluateUnary(node: UnaryExpr, context: EvalContext): ColumnData {
	const operand = evaluate(node.operand, context);
	switch (node.operator) {
		case 'neg':
		case 'abs': {
			const values = operand.values.map(v => negate(v, node.operator === 'neg' ? 'neg' : 'abs'));
			const type = operand.type === BOOL_TYPE ? INT_TYPE : operand.type;
			return { values, sorted: false, type };
		}
		case 'not':
			return { values: operand.values.map(v => !isTruthy(v)), sorted: false, type: BOOL_TYPE };
		case 'isNone':
			return { values: operand.values.map(v => v === null), sorted: false, type: BOOL_TYPE };
		case 'isNotNone':
			return { values: operand.values.map(v => v !== null), sorted: false, type: BOOL_TYPE };
	}
}

// --- binary ---

type Numeric = number | bigint;

function asNumeric(value: CellValue): Numeric | undefined {
	if (typeof value === 'boolean') return value ? 1 : 0;
	if (typeof value === 'number' || typeof value === 'bigint') return value;
	return undefined;
}

function floatArithmetic(operator: ArithmeticOperator, x: number, y: number): number | null {
	switch (operator) {
		case 'add': return x + y;
		case 'sub': return x - y;
		case 'mul': return x * y;
		case 'div': return y === 0 ? null : x / y;
		case 'mod': return y === 0 ? null : x - y * Math.floor(x / y);
		case 'pow': return x ** y;
	}
}

function bigintArithmetic(operator: ArithmeticOperator, x: bigint, y: bigint): CellValue {
	switch (operator) {
		case 'add': return x + y;
		case 'sub': return x - y;
		case 'mul': return x * y;
		case 'div': return y === 0n ? null : Number(x) / Number(y);
		case 'mod': return y === 0n ? null : ((x % y) + y) % y;
		case 'pow': return y < 0n ? Number(x) ** Number(y) : x ** y;
	}
}

function arithmetic(operator: ArithmeticOperator, a: CellValue, b: CellValue): CellValue {
	if (a === null || b === null) return null;
	if (operator === 'add') {
		if (typeof a === 'string' && typeof b === 'string') return a + b;
		if (isCellList(a) && isCellList(b)) return [...a, ...b];
	}
	const x = asNumeric(a);
	const y = asNumeric(b);
	if (x === undefined || y === undefined) {
		throw new TypeMismatchError(`unsupported operand types for ${operator}: ${describe(a)} and ${describe(b)}`);
	}
	if (typeof x === 'bigint' || typeof y === 'bigint') {
		const integral = (v: Numeric) => typeof v === 'bigint' || Number.isInteger(v);
		if (integral(x) && integral(y)) {
			return bigintArithmetic(operator, BigInt(x), BigInt(y));
		}
		return floatArithmetic(operator, Number(x), Number(y));
	}
	return floatArithmetic(operator, x, y);
}

function compare(operator: ComparisonOperator, a: CellValue, b: CellValue): boolean {
	if (a === null || b === null) return false;
	if (isNaNValue(a) || isNaNValue(b)) return operator === 'ne';
	const cmp = compareCells(a, b);
	switch (operator) {
		case 'eq': return cmp === 0;
		case 'ne': return cmp !== 0;
		case 'lt': return cmp < 0;
		case 'le': return cmp <= 0;
		case 'gt': return cmp > 0;
		case 'ge': return cmp >= 0;
	}
}

function membership(operator: BinaryOperator, a: CellValue, b: CellValue): boolean {
	if (a === null || b === null) return false;
	switch (operator) {
		case 'startsWith':
		case 'endsWith':
			if (typeof a !== 'string' || typeof b !== 'string') {
				throw new TypeMismatchError(`${operator} needs text operands, got ${describe(a)} and ${describe(b)}`);
			}
			return operator === 'startsWith' ? a.startsWith(b) : a.endsWith(b);
		case 'contains':
			if (typeof a === 'string' && typeof b === 'string') return a.includes(b);
			if (isCellList(a)) return a.some(v => cellsEqual(v, b));
			throw new TypeMismatchError(`contains needs a text or list operand, got ${describe(a)}`);
		case 'isIn':
			if (!isCellList(b)) {
				throw new TypeMismatchError(`isIn needs a list of candidates, got ${describe(b)}`);
			}
			return b.some(v => cellsEqual(v, a));
		default:
			throw new ArgumentError(`${operator} is not a membership operator`);
	}
}

function arithmeticType(operator: BinaryOperator, left: ColumnType, right: ColumnType, values: readonly CellValue[]): ColumnType {
	if (operator === 'div') return FLOAT_TYPE;
	const integral = (t: ColumnType) => t === INT_TYPE || t === BOOL_TYPE;
	if (integral(left) && integral(right)) {
		return values.some(v => typeof v === 'number' && !Number.isInteger(v)) ? FLOAT_TYPE : INT_TYPE;
	}
	if ((left === FLOAT_TYPE || integral(left)) && (right === FLOAT_TYPE || integral(right))) {
		return FLOAT_TYPE;
	}
	if (operator === 'add' && left === STR_TYPE && right === STR_TYPE) return STR_TYPE;
	return commonTypeFor(values);
}

const FLIPPED: Record<ComparisonOperator, ComparisonOperator> = {
	eq: 'eq', ne: 'ne', lt: 'gt', le: 'ge', gt: 'lt', ge: 'le',
};

function isComparisonOperator(operator: BinaryOperator): operator is ComparisonOperator {
	return COMPARISON_OPERATORS.has(operator);
}

function isArithmeticOperator(operator: BinaryOperator): operator is ArithmeticOperator {
	return ARITHMETIC_OPERATORS.has(operator);
}

/** First index in [lo, hi) for which `pred` is false; `pred` must be true then false. */
function partitionPoint(values: readonly CellValue[], lo: number, hi: number, pred: (value: CellValue) => boolean): number {
	while (lo < hi) {
		const mid = (lo + hi) >>> 1;
		if (pred(values[mid])) lo = mid + 1;
		else hi = mid;
	}
	return lo;
}

/**
 * Comparison of ascending values against a scalar by binary search.
 * Nulls and NaN sort first and never match, as in the linear scan.
 */
function sortedComparison(values: readonly CellValue[], operator: ComparisonOperator, threshold: CellValue): boolean[] | undefined {
	if (operator === 'ne') return undefined;
	const n = values.length;
	const start = partitionPoint(values, 0, n, v => v === null || isNaNValue(v));
	const firstGe = partitionPoint(values, start, n, v => compareCells(v, threshold) < 0);
	const firstGt = partitionPoint(values, firstGe, n, v => compareCells(v, threshold) <= 0);
	const [from, to] = {
		lt: [start, firstGe],
		le: [start, firstGt],
		gt: [firstGt, n],
		ge: [firstGe, n],
		eq: [firstGe, firstGt],
	}[operator];
	const mask = new Array<boolean>(n).fill(false);
	mask.fill(true, from, to);
	return mask;
}

function trySortedComparison(operator: ComparisonOperator, left: ColumnData, right: ColumnData): boolean[] | undefined {
	const scalarOf = (data: ColumnData) =>
		data.values.length === 1 && data.values[0] !== null && !isNaNValue(data.values[0]) ? data.values[0] : undefined;
	if (left.sorted && left.values.length > 1) {
		const scalar = scalarOf(right);
		if (scalar !== undefined) return sortedComparison(left.values, operator, scalar);
	}
	if (right.sorted && right.values.length > 1) {
		const scalar = scalarOf(left);
		if (scalar !== undefined) return sortedComparison(right.values, FLIPPED[operator], scalar);
	}
	return undefined;
}

function evaluateBinary(node: BinaryExpr, context: EvalContext): ColumnData {
	const left = evaluate(node.left, context);
	const right = evaluate(node.right, context);
	const operator = node.operator;
	const length = broadcastLength(operator, left.values.length, right.values.length);

	if (isComparisonOperator(operator)) {
		const fast = trySortedComparison(operator, left, right);
		if (fast) {
			log('binary search for %s over %d sorted values', operator, fast.length);
			return { values: fast, sorted: false, type: BOOL_TYPE };
		}
		const values = new Array<boolean>(length);
		for (let i = 0; i < length; i++) {
			values[i] = compare(operator, at(left.values, i), at(right.values, i));
		}
		return { values, sorted: false, type: BOOL_TYPE };
	}

	if (LOGICAL_OPERATORS.has(operator)) {
		const values = new Array<boolean>(length);
		for (let i = 0; i < length; i++) {
			const a = isTruthy(at(left.values, i));
			const b = isTruthy(at(right.values, i));
			values[i] = operator === 'and' ? a && b : operator === 'or' ? a || b : a !== b;
		}
		return { values, sorted: false, type: BOOL_TYPE };
	}

	if (isArithmeticOperator(operator)) {
		const values = new Array<CellValue>(length);
		for (let i = 0; i < length; i++) {
			values[i] = arithmetic(operator, at(left.values, i), at(right.values, i));
		}
		return { values, sorted: false, type: arithmeticType(operator, left.type, right.type, values) };
	}

	const values = new Array<boolean>(length);
	for (let i = 0; i < length; i++) {
		values[i] = membership(operator, at(left.values, i), at(right.values, i));
	}
	return { values, sorted: false, type: BOOL_TYPE };
}

// --- apply / aggregate / conditional ---

function evaluateApply(node: ApplyExpr, context: EvalContext): ColumnData {
	const operand = evaluate(node.operand, context);
	const values = operand.values.map(v => (v === null && node.filterNones ? null : node.fn(v)));
	return { values, sorted: false, type: node.resultType ?? commonTypeFor(values) };
}

function numericValues(fn: string, values: readonly CellValue[]): number[] {
	return values.map(v => {
		const numeric = asNumeric(v);
		if (numeric === undefined) {
			throw new TypeMismatchError(`${fn} needs numeric values, got ${describe(v)}`);
		}
		return Number(numeric);
	});
}

function aggregate(node: AggregateExpr, operand: ColumnData): [CellValue, ColumnType] {
	const all = operand.values;
	const present = all.filter(v => v !== null);
	const numericType = operand.type === BOOL_TYPE ? INT_TYPE : operand.type;
	switch (node.fn) {
		case 'len':
			return [all.length, INT_TYPE];
		case 'count':
		case 'countNotNone':
			return [present.length, INT_TYPE];
		case 'countNone':
			return [all.length - present.length, INT_TYPE];
		case 'hasNone':
			return [present.length < all.length, BOOL_TYPE];
		case 'sum': {
			let total: CellValue = 0;
			for (const v of present) total = arithmetic('add', total, v);
			return [total, numericType];
		}
		case 'min':
		case 'max': {
			if (present.length === 0) return [null, operand.type];
			const sign = node.fn === 'min' ? -1 : 1;
			let best = present[0];
			for (const v of present) {
				if (compareCells(v, best) * sign > 0) best = v;
			}
			return [best, operand.type];
		}
		case 'mean':
		case 'std': {
			if (present.length === 0) return [null, FLOAT_TYPE];
			const numbers = numericValues(node.fn, present);
			const mean = numbers.reduce((s, v) => s + v, 0) / numbers.length;
			if (node.fn === 'mean') return [mean, FLOAT_TYPE];
			const variance = numbers.reduce((s, v) => s + (v - mean) ** 2, 0) / numbers.length;
			return [Math.sqrt(variance), FLOAT_TYPE];
		}
		case 'uniqueNotNone': {
			const distinct: CellValue[] = [];
			for (const v of present) {
				if (!distinct.some(d => cellsEqual(d, v))) distinct.push(v);
			}
			if (distinct.length > 1) {
				throw new ArgumentError(`uniqueNotNone found ${distinct.length} distinct values`);
			}
			return [distinct.length === 1 ? distinct[0] : null, operand.type];
		}
	}
}

interface Group {
	readonly key: CellValue[];
	readonly rows: number[];
}

function evaluateAggregate(node: AggregateExpr, context: EvalContext): ColumnData {
	const operand = evaluate(node.operand, context);
	if (!node.groupBy || node.groupBy.length === 0) {
		const [value, type] = aggregate(node, operand);
		return { values: [value], sorted: false, type };
	}

	const keys = node.groupBy.map(k => evaluate(k, context));
	const length = broadcastLength('groupBy', operand.values.length, ...keys.map(k => k.values.length));
	const groups = new BTree<CellValue[], Group>(group => group.key, compareRows);
	const groupOfRow = new Array<Group>(length);
	for (let i = 0; i < length; i++) {
		const key = keys.map(k => at(k.values, i));
		let group = groups.get(key);
		if (!group) {
			group = { key, rows: [] };
			groups.insert(group);
		}
		group.rows.push(i);
		groupOfRow[i] = group;
	}

	const results = new Map<Group, CellValue>();
	let type = operand.type;
	for (const group of new Set(groupOfRow)) {
		const subset: ColumnData = { ...operand, values: group.rows.map(i => at(operand.values, i)) };
		const [value, groupType] = aggregate(node, subset);
		results.set(group, value);
		type = groupType;
	}
	const values = groupOfRow.map(group => results.get(group) ?? null);
	return { values, sorted: false, type };
}

function evaluateConditional(node: ConditionalExpr, context: EvalContext): ColumnData {
	const condition = evaluate(node.condition, context);
	const whenTrue = evaluate(node.whenTrue, context);
	const whenFalse = evaluate(node.whenFalse, context);
	const length = broadcastLength('conditional', condition.values.length, whenTrue.values.length, whenFalse.values.length);
	const values = new Array<CellValue>(length);
	for (let i = 0; i < length; i++) {
		values[i] = isTruthy(at(condition.values, i)) ? at(whenTrue.values, i) : at(whenFalse.values, i);
	}
	const type = whenTrue.type === whenFalse.type ? whenTrue.type : commonTypeFor(values);
	return { values, sorted: false, type };
}
