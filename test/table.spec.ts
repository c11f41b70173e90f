import { expect } from 'chai';
import { Table } from '../src/table/table.js';
import {
	ArgumentError,
	NameCollisionError,
	SchemaError,
	ShapeMismatchError,
	TypeMismatchError,
} from '../src/common/errors.js';
import { lit } from '../src/expr/builders.js';

function sample(): Table {
	return new Table(['a', 'b'], ['int', 'str'], ['%d', '%s'], [[1, 'x'], [2, 'y'], [3, 'z']]);
}

describe('Table', () => {
	describe('construction', () => {
		it('should hold names, types, formats and rows', () => {
			const t = sample();
			expect(t.length).to.equal(3);
			expect(t.getColNames()).to.deep.equal(['a', 'b']);
			expect(t.getColTypeNames()).to.deep.equal(['int', 'str']);
			expect(t.getColFormats()).to.deep.equal(['%d', '%s']);
			expect(t.rows).to.deep.equal([[1, 'x'], [2, 'y'], [3, 'z']]);
		});

		it('should copy the rows it is given', () => {
			const rows = [[1, 'x']];
			const t = new Table(['a', 'b'], ['int', 'str'], ['%d', '%s'], rows);
			rows[0][0] = 5;
			expect(t.rows[0][0]).to.equal(1);
		});

		it('should read an empty format as hidden', () => {
			const t = new Table(['a'], ['int'], ['']);
			expect(t.getColFormat('a')).to.equal(null);
			expect(t.getVisibleCols()).to.deep.equal([]);
		});

		it('should reject postfixed names', () => {
			expect(() => new Table(['a__0'], ['int'], ['%d'])).to.throw(SchemaError);
		});

		it('should reject duplicate names', () => {
			expect(() => new Table(['a', 'a'], ['int', 'int'], ['%d', '%d'])).to.throw(SchemaError, 'multiple columns: a');
		});

		it('should reject names of table members', () => {
			expect(() => new Table(['rows'], ['int'], ['%d'])).to.throw(SchemaError, "column name 'rows' not allowed");
			expect(() => new Table(['length'], ['int'], ['%d'])).to.throw(SchemaError);
		});

		it('should reject numeric container types', () => {
			expect(() => new Table(['a'], ['float64'], ['%f'])).to.throw(TypeMismatchError, "use 'float' instead");
		});

		it('should reject unknown types', () => {
			expect(() => new Table(['a'], ['quaternion'], ['%s'])).to.throw(TypeMismatchError, "unknown column type 'quaternion'");
		});

		it('should reject rows of the wrong length', () => {
			expect(() => new Table(['a'], ['int'], ['%d'], [[1, 2]])).to.throw(ShapeMismatchError);
		});

		it('should reject unknown format names', () => {
			expect(() => new Table(['a'], ['int'], ['nope'])).to.throw(SchemaError, "unknown column format 'nope'");
		});

		it('should build one-column tables', () => {
			const t = Table.toTable('mz', [1, 2.5, null], { title: 'masses' });
			expect(t.getColTypeNames()).to.deep.equal(['float']);
			expect(t.getColFormat('mz')).to.equal('%.5f');
			expect(t.title).to.equal('masses');
			expect(t.rows).to.deep.equal([[1], [2.5], [null]]);
		});
	});

	describe('rows', () => {
		it('should convert values when adding rows', () => {
			const t = sample();
			t.addRow(['5', 7]);
			t.addRow([1.7, 'q']);
			expect(t.rows[3]).to.deep.equal([5, '7']);
			expect(t.rows[4]).to.deep.equal([1, 'q']);
		});

		it('should roll back rows that fail to convert', () => {
			const t = sample();
			expect(() => t.addRow(['abc', 'q'])).to.throw(TypeMismatchError);
			expect(() => t.addRow([1])).to.throw(ShapeMismatchError);
			expect(t.length).to.equal(3);
		});

		it('should check row indices', () => {
			const t = sample();
			expect(() => t.setRow(3, [4, 'w'])).to.throw(ArgumentError);
			t.setRow(0, [9, 'w']);
			expect(t.rows[0]).to.deep.equal([9, 'w']);
		});

		it('should only set values of own rows', () => {
			const t = sample();
			const other = sample();
			expect(() => t.setValue(other.rows[0], 'a', 5)).to.throw(ArgumentError);
			t.setValue(t.rows[1], 'a', '12');
			expect(t.getValue(t.rows[1], 'a')).to.equal(12);
		});

		it('should return the default for unknown columns', () => {
			const t = sample();
			expect(t.getValue(t.rows[0], 'nope', 7)).to.equal(7);
			expect(t.getValue(t.rows[0], 'nope')).to.equal(null);
			expect(t.getValues(t.rows[0])).to.deep.equal({ a: 1, b: 'x' });
		});

		it('should iterate over rows', () => {
			const seen: unknown[] = [];
			for (const row of sample()) seen.push(row[1]);
			expect(seen).to.deep.equal(['x', 'y', 'z']);
		});
	});

	describe('addColumn', () => {
		it('should add expression columns', () => {
			const t = sample();
			t.addColumn('c', t.column('a').mul(10));
			expect(t.getColNames()).to.deep.equal(['a', 'b', 'c']);
			expect(t.getColType('c').name).to.equal('int');
			expect(t.getColFormat('c')).to.equal('%d');
			expect(t.rows.map(row => row[2])).to.deep.equal([10, 20, 30]);
		});

		it('should broadcast single values', () => {
			const t = sample();
			t.addColumn('k', 5);
			t.addColumn('l', lit('n'));
			expect(t.rows.map(row => row.slice(2))).to.deep.equal([[5, 'n'], [5, 'n'], [5, 'n']]);
			expect(t.getColTypeNames()).to.deep.equal(['int', 'str', 'int', 'str']);
		});

		it('should add positional values normalized to their overall type', () => {
			const t = sample();
			t.addColumn('d', [1, 2.5, null]);
			expect(t.getColType('d').name).to.equal('float');
			expect(t.getColFormat('d')).to.equal('%.2f');
			expect(t.rows.map(row => row[2])).to.deep.equal([1, 2.5, null]);
		});

		it('should replicate arrays as constant values', () => {
			const t = sample();
			t.addConstantColumn('pair', [1, 2]);
			expect(t.getColType('pair').name).to.equal('list');
			expect(t.rows.map(row => row[2])).to.deep.equal([[1, 2], [1, 2], [1, 2]]);
			expect(t.rows[0][2]).to.not.equal(t.rows[1][2]);
		});

		it('should add columns computed per row', () => {
			const t = sample();
			t.addColumn('e', (table, row, name) => `${name}:${String(table.getValue(row, 'b'))}`);
			expect(t.rows.map(row => row[2])).to.deep.equal(['e:x', 'e:y', 'e:z']);
		});

		it('should convert values to a declared type', () => {
			const t = sample();
			t.addColumn('f', [1, 2, 3], { type: 'str', format: '%r' });
			expect(t.rows.map(row => row[2])).to.deep.equal(['1', '2', '3']);
			expect(t.getColFormat('f')).to.equal('%r');
		});

		it('should keep constants as given whatever the declared type', () => {
			const t = sample();
			t.addColumn('c', 'abc', { type: 'int' });
			t.addColumn('d', 1.7, { type: 'int' });
			t.addConstantColumn('e', 'x', { type: 'float' });
			expect(t.getColTypeNames()).to.deep.equal(['int', 'str', 'int', 'int', 'float']);
			expect(t.rows.map(row => row.slice(2))).to.deep.equal([
				['abc', 1.7, 'x'],
				['abc', 1.7, 'x'],
				['abc', 1.7, 'x'],
			]);
		});

		it('should guess formats from the name', () => {
			const t = sample();
			t.addColumn('mz', [100, 200, 300]);
			t.addColumn('rt', [1.5, 2.5, 3.5]);
			t.addColumn('hidden', 0, { format: null });
			expect(t.getColFormat('mz')).to.equal('%.5f');
			expect(t.getColFormat('rt')).to.equal('minutes');
			expect(t.getColFormat('hidden')).to.equal(null);
		});

		it('should reject positional values of the wrong length', () => {
			const t = sample();
			expect(() => t.addColumn('d', [1, 2])).to.throw(ShapeMismatchError);
			expect(t.getColNames()).to.deep.equal(['a', 'b']);
		});

		it('should reject taken and postfixed names', () => {
			const t = sample();
			expect(() => t.addColumn('a', 1)).to.throw(NameCollisionError);
			expect(() => t.addColumn('c__0', 1)).to.throw(SchemaError);
			expect(() => t.addColumn('meta', 1)).to.throw(SchemaError);
		});

		it('should insert before and after named and numbered columns', () => {
			const t = Table.toTable('b', [1]);
			t.addColumn('d', 3);
			t.addColumn('c', 2, { insertAfter: 'b' });
			t.addColumn('a', 0, { insertBefore: 'b' });
			expect(t.getColNames()).to.deep.equal(['a', 'b', 'c', 'd']);
			expect(t.rows[0]).to.deep.equal([0, 1, 2, 3]);

			t.addColumn('x', 9, { insertBefore: -1 });
			t.addColumn('y', 8, { insertAfter: -1 });
			expect(t.getColNames()).to.deep.equal(['a', 'b', 'c', 'x', 'd', 'y']);
		});

		it('should not take both insert positions', () => {
			const t = sample();
			expect(() => t.addColumn('c', 1, { insertBefore: 'a', insertAfter: 'b' })).to.throw(ArgumentError);
		});

		it('should prepend an enumeration', () => {
			const t = sample();
			t.addEnumeration();
			expect(t.getColNames()).to.deep.equal(['id', 'a', 'b']);
			expect(t.getColFormat('id')).to.equal('%d');
			expect(t.rows.map(row => row[0])).to.deep.equal([0, 1, 2]);
		});
	});

	describe('column algebra', () => {
		it('should replace a column in place', () => {
			const t = sample();
			t.replaceColumn('a', t.column('a').add(1));
			expect(t.getColNames()).to.deep.equal(['a', 'b']);
			expect(t.rows.map(row => row[0])).to.deep.equal([2, 3, 4]);
		});

		it('should update present columns and add missing ones', () => {
			const t = sample();
			t.updateColumn('b', 'w');
			t.updateColumn('c', true);
			expect(t.getColNames()).to.deep.equal(['a', 'b', 'c']);
			expect(t.rows[0]).to.deep.equal([1, 'w', true]);
		});

		it('should drop columns after checking all names', () => {
			const t = sample();
			expect(() => t.dropColumns('b', 'nope')).to.throw(SchemaError);
			expect(t.getColNames()).to.deep.equal(['a', 'b']);
			t.dropColumns('b');
			expect(t.rows).to.deep.equal([[1], [2], [3]]);
			t.dropColumns(['a']);
			expect(t.length).to.equal(0);
		});

		it('should report expected, found and missing names', () => {
			expect(() => sample().ensureColNames('a', 'q')).to.throw(SchemaError, 'expected names a, q, found a but q were missing');
		});

		it('should rename atomically', () => {
			const t = sample();
			expect(() => t.renameColumns({ a: 'x' }, { a: 'y' })).to.throw(SchemaError);
			expect(() => t.renameColumns({ a: 'z', b: 'z' })).to.throw(SchemaError);
			expect(() => t.renameColumns({ a: 'b' })).to.throw(NameCollisionError);
			expect(() => t.renameColumns({ a: 'x', q: 'y' })).to.throw(SchemaError);
			expect(() => t.renameColumns({ a: 'x__1' })).to.throw(SchemaError);
			expect(t.getColNames()).to.deep.equal(['a', 'b']);

			t.renameColumns({ a: 'b', b: 'a' });
			expect(t.getColNames()).to.deep.equal(['b', 'a']);
			t.renameColumn('b', 'first');
			expect(t.getColNames()).to.deep.equal(['first', 'a']);
		});

		it('should change types and formats', () => {
			const t = sample();
			t.setColType('a', 'float');
			t.setColFormat('a', '%.1f');
			expect(t.getColType('a').name).to.equal('float');
			expect(t.getColFormat('a')).to.equal('%.1f');
			expect(() => t.setColFormat('a', 'unknown')).to.throw(SchemaError);
			expect(t.getColFormat('a')).to.equal('%.1f');
		});

		it('should extract columns in the given order', () => {
			const t = sample();
			t.title = 'source';
			const e = t.extractColumns('b', 'a');
			expect(e.getColNames()).to.deep.equal(['b', 'a']);
			expect(e.rows[0]).to.deep.equal(['x', 1]);
			expect(e.title).to.equal('source');
			expect(() => t.extractColumns('a', 'a')).to.throw(SchemaError);
		});
	});

	describe('postfixes', () => {
		function postfixed(): Table {
			return new Table(['a', 'a__0', 'b__1'], ['int', 'int', 'int'], ['%d', '%d', '%d'], [[1, 2, 3]], { allowPostfixes: true });
		}

		it('should find postfixes and their range', () => {
			const t = postfixed();
			expect(t.findPostfixes()).to.deep.equal(['', '__0', '__1']);
			expect(t.minPostfix()).to.equal(-1);
			expect(t.maxPostfix()).to.equal(1);
			expect(sample().maxPostfix()).to.equal(-1);
		});

		it('should remove all postfixes', () => {
			const t = new Table(['a__0', 'b__1'], ['int', 'int'], ['%d', '%d'], [], { allowPostfixes: true });
			t.removePostfixes();
			expect(t.getColNames()).to.deep.equal(['a', 'b']);
		});

		it('should reject removals that make names ambiguous', () => {
			const t = postfixed();
			expect(() => t.removePostfixes('__0')).to.throw(SchemaError, 'ambiguous');
			expect(t.getColNames()).to.deep.equal(['a', 'a__0', 'b__1']);
		});

		it('should rename postfixes', () => {
			const t = postfixed();
			t.renamePostfixes({ '__0': '_left' });
			expect(t.getColNames()).to.deep.equal(['a', 'a_left', 'b__1']);
		});
	});

	describe('queries', () => {
		it('should keep all rows or none for single values', () => {
			const t = sample();
			expect(t.filter(true).length).to.equal(3);
			const none = t.filter(false);
			expect(none.length).to.equal(0);
			expect(none.getColNames()).to.deep.equal(['a', 'b']);
		});

		it('should filter by expression', () => {
			const t = sample();
			expect(t.filter(t.column('a').ge(2)).rows).to.deep.equal([[2, 'y'], [3, 'z']]);
		});

		it('should filter by grouped aggregates', () => {
			const t = Table.toTable('v', [1, 1, 2]);
			const v = t.column('v');
			expect(t.filter(v.count().groupBy(v).eq(1)).rows).to.deep.equal([[2]]);
		});

		it('should reject expressions over other tables', () => {
			const t = sample();
			const other = sample();
			expect(() => t.filter(other.column('a').gt(1))).to.throw(SchemaError);
		});

		it('should copy without aliasing', () => {
			const t = sample();
			const c = t.copy();
			c.setValue(c.rows[0], 'a', 99);
			expect(t.rows[0][0]).to.equal(1);
			expect(c.rows[0]).to.not.equal(t.rows[0]);
		});

		it('should slice rows and clone the schema', () => {
			const t = sample();
			expect(t.slice(1).rows).to.deep.equal([[2, 'y'], [3, 'z']]);
			expect(t.slice(0, 1).rows).to.deep.equal([[1, 'x']]);
			const empty = t.buildEmptyClone();
			expect(empty.length).to.equal(0);
			expect(empty.getColTypeNames()).to.deep.equal(['int', 'str']);
		});

		it('should sort stably and return the permutation', () => {
			const t = new Table(['a', 'b'], ['int', 'str'], ['%d', '%s'], [[3, 'x'], [1, 'y'], [2, 'z'], [1, 'w']]);
			const descending = t.copy();

			expect(t.sortBy('a')).to.deep.equal([1, 3, 2, 0]);
			expect(t.rows.map(row => row[1])).to.deep.equal(['y', 'w', 'z', 'x']);
			expect(t.primaryIndex).to.equal('a');

			expect(descending.sortBy('a', false)).to.deep.equal([0, 2, 1, 3]);
			expect(descending.rows.map(row => row[1])).to.deep.equal(['x', 'z', 'y', 'w']);
			expect(descending.primaryIndex).to.equal(null);
		});

		it('should sort by composite keys', () => {
			const t = new Table(['a', 'b'], ['int', 'int'], ['%d', '%d'], [[1, 2], [0, 5], [1, 1]]);
			expect(t.sortBy(['a', 'b'], [true, false])).to.deep.equal([1, 0, 2]);
		});

		it('should give the same results with and without the primary index', () => {
			const t = new Table(['a'], ['int'], ['%d'], [[2], [null], [NaN], [1], [3]]);
			t.sortBy('a');
			const linear = t.copy();
			linear.primaryIndex = null;
			for (const threshold of [0, 1, 2, 3, 4]) {
				const a = t.column('a');
				const b = linear.column('a');
				expect(t.filter(a.lt(threshold)).rows).to.deep.equal(linear.filter(b.lt(threshold)).rows);
				expect(t.filter(a.ge(threshold)).rows).to.deep.equal(linear.filter(b.ge(threshold)).rows);
				expect(t.filter(a.eq(threshold)).rows).to.deep.equal(linear.filter(b.eq(threshold)).rows);
			}
			expect(t.filter(t.column('a').lt(2)).rows).to.deep.equal([[1]]);
		});

		it('should drop the primary index when the column changes', () => {
			const t = sample();
			t.sortBy('a');
			t.setValue(t.rows[0], 'b', 'changed');
			expect(t.primaryIndex).to.equal('a');
			t.setValue(t.rows[0], 'a', 10);
			expect(t.primaryIndex).to.equal(null);
		});

		it('should split by keys in order of first appearance', () => {
			const t = new Table(['g', 'v'], ['int', 'str'], ['%d', '%s'], [[1, 'a'], [2, 'b'], [1, 'c'], [3, 'd'], [2, 'e']]);
			const parts = t.splitBy('g');
			expect(parts.map(part => part.rows.map(row => row[1]))).to.deep.equal([['a', 'c'], ['b', 'e'], ['d']]);
			parts[0].setValue(parts[0].rows[0], 'v', 'changed');
			expect(t.rows[0][1]).to.equal('a');
		});

		it('should keep the first of equal rows', () => {
			const t = new Table(['a', 'b'], ['int', 'str'], ['%d', null], [[1, 'a'], [1, 'a'], [2, 'b'], [1, 'a'], [1, 'c']]);
			expect(t.uniqueRows().rows).to.deep.equal([[1, 'a'], [2, 'b'], [1, 'c']]);
		});

		it('should append tables of the same schema', () => {
			const t = sample();
			t.append(sample(), [sample()]);
			expect(t.length).to.equal(9);

			const renamed = sample();
			renamed.renameColumn('b', 'c');
			expect(() => t.append(sample(), renamed)).to.throw(SchemaError);
			const retyped = sample();
			retyped.setColType('a', 'float');
			expect(() => t.append(retyped)).to.throw(SchemaError);
			expect(t.length).to.equal(9);
		});

		it('should collapse groups into nested tables', () => {
			const t = new Table(['g', 'v'], ['int', 'str'], ['%d', '%s'], [[1, 'x'], [1, 'y'], [2, 'z']]);
			const c = t.collapse('g');
			expect(c.getColNames()).to.deep.equal(['g', 'collapsed']);
			expect(c.getColTypeNames()).to.deep.equal(['int', 'Table']);
			expect(c.rows.map(row => row[0])).to.deep.equal([1, 2]);
			const first = c.rows[0][1];
			expect(first).to.be.instanceOf(Table);
			if (first instanceof Table) {
				expect(first.title).to.equal('g=1');
				expect(first.rows).to.deep.equal([[1, 'x'], [1, 'y']]);
			}
		});
	});

	describe('uniqueId', () => {
		it('should be stable for equal content', () => {
			const a = sample();
			const b = sample();
			b.title = 'another title';
			expect(a.uniqueId()).to.equal(b.uniqueId());
			expect(a.uniqueId()).to.match(/^[0-9a-f]{64}$/);
			expect(a.equals(b)).to.equal(true);
		});

		it('should change with values, formats and meta', () => {
			const base = sample().uniqueId();
			const value = sample();
			value.setValue(value.rows[2], 'b', 'q');
			const format = sample();
			format.setColFormat('a', '%5d');
			const meta = sample();
			meta.meta.source = 'elsewhere';
			expect(value.uniqueId()).to.not.equal(base);
			expect(format.uniqueId()).to.not.equal(base);
			expect(meta.uniqueId()).to.not.equal(base);
		});

		it('should be cached in meta until the next mutation', () => {
			const t = sample();
			const id = t.uniqueId();
			expect(t.meta.unique_id).to.equal(id);
			t.addRow([4, 'w']);
			expect(t.meta.unique_id).to.equal(undefined);
			expect(t.uniqueId()).to.not.equal(id);
		});

		it('should describe the content of derived tables', () => {
			const t = sample();
			t.uniqueId();
			const build = (names: string[], rows: (number | string)[][]) =>
				new Table(names, ['int', 'str'].slice(0, names.length), ['%d', '%s'].slice(0, names.length), rows);
			expect(t.filter(false).uniqueId()).to.equal(build(['a', 'b'], []).uniqueId());
			expect(t.slice(1).uniqueId()).to.equal(build(['a', 'b'], [[2, 'y'], [3, 'z']]).uniqueId());
			expect(t.extractColumns('a').uniqueId()).to.equal(build(['a'], [[1], [2], [3]]).uniqueId());
			expect(t.splitBy('a')[0].uniqueId()).to.equal(build(['a', 'b'], [[1, 'x']]).uniqueId());
			expect(t.buildEmptyClone().uniqueId()).to.not.equal(t.uniqueId());
			expect(t.collapse('a').meta.unique_id).to.equal(undefined);
		});

		it('should drop a digest passed in with the meta data', () => {
			const t = sample();
			const copy = new Table(['a'], ['int'], ['%d'], [[9]], { meta: t.meta });
			t.uniqueId();
			const other = new Table(['a'], ['int'], ['%d'], [[9]], { meta: t.meta });
			expect(other.meta.unique_id).to.equal(undefined);
			expect(other.uniqueId()).to.equal(copy.uniqueId());
		});

		it('should ignore where a table was loaded from', () => {
			const t = sample();
			const id = t.uniqueId();
			const moved = sample();
			moved.meta.loaded_from = '/data/somewhere.table';
			expect(moved.uniqueId()).to.equal(id);
		});
	});

	describe('rendering', () => {
		it('should render names, types and formatted rows', () => {
			const t = new Table(['a', 'b', 'h'], ['int', 'str', 'int'], ['%d', '%s', null], [[1, 'x', 0], [22, null, 0]]);
			const expected = [
				'a'.padEnd(8) + ' b',
				'int'.padEnd(8) + ' str',
				'------'.padEnd(8) + ' ------',
				'1'.padEnd(8) + ' x',
				'22'.padEnd(8) + ' -',
			].join('\n') + '\n';
			expect(t.render()).to.equal(expected);
		});

		it('should widen columns to the widest value', () => {
			const t = Table.toTable('name', ['a rather long value']);
			const [header, , , row] = t.render().split('\n');
			expect(header).to.equal('name');
			expect(row).to.equal('a rather long value');
			expect(t.render({ width: 30 }).split('\n')[2]).to.equal('------');
		});

		it('should elide the middle of long tables', () => {
			const t = Table.toTable('n', [0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
			const lines = t.render({ maxLines: 4 }).trimEnd().split('\n');
			expect(lines.slice(3)).to.deep.equal(['0', '1', '...', '7', '8', '9']);
		});

		it('should print a title', () => {
			const lines = sample().render({ title: 'peaks' }).split('\n');
			expect(lines.slice(0, 2)).to.deep.equal(['peaks', '=====']);
		});

		it('should print to a target', () => {
			const chunks: string[] = [];
			const t = sample();
			t.print({}, { write: (text: string) => chunks.push(text) });
			expect(chunks.join('')).to.equal(t.render());
			expect(String(t)).to.equal(t.render({ maxLines: 25 }));
		});
	});
});
