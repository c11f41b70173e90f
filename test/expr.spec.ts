import { expect } from 'chai';
import { Table } from '../src/table/table.js';
import { Expr, and, lit, not, or, when } from '../src/expr/builders.js';
import { buildContext, type EvalContext } from '../src/expr/context.js';
import { evaluate, isTruthy } from '../src/expr/evaluate.js';
import { neededColumns } from '../src/expr/ast.js';
import { ArgumentError, SchemaError, ShapeMismatchError, TypeMismatchError } from '../src/common/errors.js';
import type { CellValue } from '../src/common/types.js';

describe('Expressions', () => {
	describe('literals', () => {
		it('should evaluate arithmetic to a single value', () => {
			const result = lit(1).add(2).evaluate();
			expect(result.values).to.deep.equal([3]);
			expect(result.type.name).to.equal('int');
		});

		it('should divide to float and yield null for division by zero', () => {
			expect(lit(7).div(2).evaluate().values).to.deep.equal([3.5]);
			expect(lit(7).div(2).evaluate().type.name).to.equal('float');
			expect(lit(1).div(0).evaluate().values).to.deep.equal([null]);
			expect(lit(1).mod(0).evaluate().values).to.deep.equal([null]);
		});

		it('should take the sign of the divisor for modulo', () => {
			expect(lit(-7).mod(3).evaluate().values).to.deep.equal([2]);
			expect(lit(7).mod(-3).evaluate().values).to.deep.equal([-2]);
		});

		it('should keep big integers exact', () => {
			expect(lit(2n).pow(70).evaluate().values).to.deep.equal([1180591620717411303424n]);
			expect(lit(2n).add(0.5).evaluate().values).to.deep.equal([2.5]);
		});

		it('should concatenate text and lists', () => {
			expect(lit('ab').add('cd').evaluate().values).to.deep.equal(['abcd']);
			expect(lit([1]).add([2]).evaluate().values).to.deep.equal([[1, 2]]);
		});

		it('should propagate nulls through arithmetic', () => {
			expect(lit(null).add(1).evaluate().values).to.deep.equal([null]);
			expect(lit(null).neg().evaluate().values).to.deep.equal([null]);
		});

		it('should compare nulls and NaN as unequal', () => {
			expect(lit(null).eq(null).evaluate().values).to.deep.equal([false]);
			expect(lit(NaN).eq(NaN).evaluate().values).to.deep.equal([false]);
			expect(lit(NaN).ne(NaN).evaluate().values).to.deep.equal([true]);
		});

		it('should read null as false in logic', () => {
			expect(lit(null).and(true).evaluate().values).to.deep.equal([false]);
			expect(lit(null).or(true).evaluate().values).to.deep.equal([true]);
			expect(not(null).evaluate().values).to.deep.equal([true]);
			expect(lit(true).xor(false).evaluate().values).to.deep.equal([true]);
		});

		it('should reject mismatched operand types', () => {
			expect(() => lit('a').sub(1).evaluate()).to.throw(TypeMismatchError);
			expect(() => lit(1).startsWith('1').evaluate()).to.throw(TypeMismatchError);
			expect(() => lit(1).isIn([1]).contains(1).evaluate()).to.throw(TypeMismatchError);
		});

		it('should fold empty conjunctions and disjunctions', () => {
			expect(and().evaluate().values).to.deep.equal([true]);
			expect(or().evaluate().values).to.deep.equal([false]);
			expect(and(true, 1, 'x').evaluate().values).to.deep.equal([true]);
			expect(or(0, '', null).evaluate().values).to.deep.equal([false]);
		});
	});

	describe('truthiness', () => {
		it('should treat empty and zero values as false', () => {
			const falsy: CellValue[] = [null, false, 0, 0n, '', [], {}, new Uint8Array(0)];
			const truthy: CellValue[] = [true, 1, -1n, 'x', [0], { a: null }, new Uint8Array(1)];
			expect(falsy.map(isTruthy)).to.deep.equal(falsy.map(() => false));
			expect(truthy.map(isTruthy)).to.deep.equal(truthy.map(() => true));
		});
	});

	describe('columns', () => {
		let table: Table;
		let context: EvalContext;
		const values = (e: Expr) => e.evaluate(context).values;

		beforeEach(() => {
			table = new Table(
				['a', 'b', 's'],
				['int', 'int', 'str'],
				['%d', '%d', '%s'],
				[[1, null, 'abc'], [2, 5, 'xbc'], [3, 6, null]],
			);
			context = buildContext([table.ref, table.columnContext()]);
		});

		it('should combine columns row by row', () => {
			const a = table.column('a');
			const b = table.column('b');
			expect(values(a.add(b))).to.deep.equal([null, 7, 9]);
			expect(values(a.mul(2))).to.deep.equal([2, 4, 6]);
			expect(values(b.isNone())).to.deep.equal([true, false, false]);
			expect(values(b.isNotNone())).to.deep.equal([false, true, true]);
			expect(values(a.neg().abs())).to.deep.equal([1, 2, 3]);
		});

		it('should test text and membership', () => {
			const s = table.column('s');
			const a = table.column('a');
			expect(values(s.startsWith('a'))).to.deep.equal([true, false, false]);
			expect(values(s.endsWith('bc'))).to.deep.equal([true, true, false]);
			expect(values(s.contains('b'))).to.deep.equal([true, true, false]);
			expect(values(a.isIn([1, 3]))).to.deep.equal([true, false, true]);
			expect(values(a.between(2, 3))).to.deep.equal([false, true, true]);
		});

		it('should choose values conditionally', () => {
			const a = table.column('a');
			const result = when(a.gt(1), 'big', 'small').evaluate(context);
			expect(result.values).to.deep.equal(['small', 'big', 'big']);
			expect(result.type.name).to.equal('str');
		});

		it('should apply functions and pass nulls through', () => {
			const b = table.column('b');
			const double = (v: CellValue) => (typeof v === 'number' ? v * 2 : -1);
			expect(values(b.apply(double))).to.deep.equal([null, 10, 12]);
			expect(values(b.apply(double, { filterNones: false }))).to.deep.equal([-1, 10, 12]);
		});

		it('should aggregate over all rows', () => {
			const a = table.column('a');
			const b = table.column('b');
			expect(values(a.sum())).to.deep.equal([6]);
			expect(values(a.min())).to.deep.equal([1]);
			expect(values(a.max())).to.deep.equal([3]);
			expect(values(a.mean())).to.deep.equal([2]);
			expect(values(a.len())).to.deep.equal([3]);
			expect(values(b.min())).to.deep.equal([5]);
			expect(values(b.count())).to.deep.equal([2]);
			expect(values(b.countNone())).to.deep.equal([1]);
			expect(values(b.countNotNone())).to.deep.equal([2]);
			expect(values(b.hasNone())).to.deep.equal([true]);
			const [std] = values(a.std());
			expect(std).to.be.closeTo(Math.sqrt(2 / 3), 1e-12);
		});

		it('should compare rows against aggregates', () => {
			const a = table.column('a');
			expect(values(a.gt(a.mean()))).to.deep.equal([false, false, true]);
		});

		it('should find the single distinct value', () => {
			const t = Table.toTable('v', [null, 4, 4]);
			const ctx = buildContext([t.ref, t.columnContext()]);
			expect(t.column('v').uniqueNotNone().evaluate(ctx).values).to.deep.equal([4]);
			expect(() => table.column('b').uniqueNotNone().evaluate(context)).to.throw(ArgumentError);
		});

		it('should aggregate per group', () => {
			const t = new Table(['g', 'v'], ['int', 'int'], ['%d', '%d'], [[1, 10], [1, 20], [2, 5]]);
			const ctx = buildContext([t.ref, t.columnContext()]);
			const g = t.column('g');
			const v = t.column('v');
			expect(v.sum().groupBy(g).evaluate(ctx).values).to.deep.equal([30, 30, 5]);
			expect(v.max().groupBy(g).evaluate(ctx).values).to.deep.equal([20, 20, 5]);
			expect(() => v.groupBy(g)).to.throw(SchemaError);
		});

		it('should reject operands of different lengths', () => {
			const other = Table.toTable('a', [1, 2]);
			const both = buildContext([table.ref, table.columnContext()], [other.ref, other.columnContext()]);
			expect(() => table.column('a').add(other.column('a')).evaluate(both)).to.throw(ShapeMismatchError);
		});

		it('should report columns missing from the context', () => {
			expect(() => evaluate(table.column('a').node)).to.throw(SchemaError);
		});

		it('should expose current column values', () => {
			const a = table.column('a');
			expect(a.values).to.deep.equal([1, 2, 3]);
			expect(a.tableRef).to.equal(table.ref);
			expect(a.columnType.name).to.equal('int');
		});

		it('should collect the columns an expression needs', () => {
			const other = Table.toTable('x', [1]);
			const e = table.column('a').add(table.column('b')).gt(other.column('x'));
			const needed = neededColumns(e.node);
			expect(Array.from(needed.get(table.ref) ?? [])).to.deep.equal(['a', 'b']);
			expect(Array.from(needed.get(other.ref) ?? [])).to.deep.equal(['x']);
		});
	});

	describe('text form', () => {
		it('should parenthesize binary operations', () => {
			const t = Table.toTable('a', [1]);
			t.addColumn('b', 2);
			const a = t.column('a');
			const b = t.column('b');
			expect(String(a.ge(2).and(b.isNone()))).to.equal('((a >= 2) and b is None)');
			expect(String(and(a.gt(1), b.isNotNone(), true))).to.equal('(((a > 1) and b is not None) and True)');
			expect(String(a.isIn([1, 2]))).to.equal('(a in [1, 2])');
			expect(String(a.neg())).to.equal('-a');
		});

		it('should quote text literals', () => {
			expect(String(lit('x'))).to.equal("'x'");
			expect(String(lit("it's"))).to.equal("'it\\'s'");
			expect(String(lit(null))).to.equal('None');
		});

		it('should render aggregates, applications and conditionals', () => {
			const t = Table.toTable('a', [1]);
			t.addColumn('b', 2);
			const a = t.column('a');
			const b = t.column('b');
			expect(String(a.count().groupBy(b))).to.equal('a.count by (b)');
			expect(String(a.apply(v => v, { label: 'f' }))).to.equal('f(a)');
			expect(String(a.apply(v => v))).to.equal('apply(a)');
			expect(String(when(a.gt(1), 'big', 'small'))).to.equal("('big' if (a > 1) else 'small')");
		});
	});
});
