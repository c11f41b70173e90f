import { resolve as resolvePath } from 'node:path';
import {
	ArgumentError,
	SchemaError,
	ShapeMismatchError,
	TypeMismatchError,
	asError,
} from '../common/errors.js';
import { createLogger } from '../common/logger.js';
import {
	isCellList,
	isHashable,
	metaKey,
	type CellValue,
	type Hashable,
	type Meta,
	type Row,
	type TableRef,
} from '../common/types.js';
import { tableOptions } from '../core/options.js';
import { neededColumns, type Expression } from '../expr/ast.js';
import { ColumnHandle, Expr, toExpression, type ExprLike } from '../expr/builders.js';
import { buildContext, type ColumnData, type ContextProvider, type EvalContext } from '../expr/context.js';
import { evaluate } from '../expr/evaluate.js';
import { registerObjectCodec } from '../io/codec.js';
import { decodeStrict, encodeTableState, fileExists, readTableFile, writeTableFile, type TableState } from '../io/table-file.js';
import { INT_TYPE, TABLE_TYPE } from '../types/builtin-types.js';
import type { ColumnType } from '../types/column-type.js';
import { commonTypeFor, convertListToOverallType } from '../types/inference.js';
import { resolveColumnType, type ColumnTypeSpec } from '../types/registry.js';
import { cellToString, guessFormatFor, type ColumnFormat } from '../util/format.js';
import { Digest } from '../util/hash.js';
import {
	POSTFIX_SEPARATOR,
	findPostfixes,
	getPostfix,
	incrementedPostfixes,
	postfixValues,
	supportedPostfixes,
} from '../util/postfix.js';
import { ColumnRegistry } from './column-registry.js';
import { renderTable, type RenderOptions } from './render.js';
import { copyCell, copyRecord, copyRow, distinctRows, filterRows, groupRows, joinRows, sortPermutation } from './row-ops.js';

const log = createLogger('table');
const joinLog = log.extend('join');

let nextRef: TableRef = 1;

export interface TableOptions {
	title?: string | null;
	meta?: Meta;
	/** Permit `name__<k>` column names, as produced by joins and loaders */
	allowPostfixes?: boolean;
}

/** Computes the value of a new column for one row. */
export type RowFunction = (table: Table, row: readonly CellValue[], name: string) => CellValue;

/**
 * Source of a new column's values:
 * - an expression over the table's columns
 * - a row function
 * - an array holding one value per row
 * - any other value, replicated to every row
 */
export type ColumnSource = Expr | RowFunction | CellValue;

export interface AddColumnOptions {
	/** Inferred from the values when absent */
	type?: ColumnTypeSpec;
	/** `''` or absent: guessed from name and type; null: hidden */
	format?: ColumnFormat;
	insertBefore?: string | number;
	insertAfter?: string | number;
}

export interface StoreOptions {
	forceOverwrite?: boolean;
	/** Deduplicate content-identical cell objects first; default from the `store.compress` option */
	compressed?: boolean;
}

export interface ToTableOptions {
	type?: ColumnTypeSpec;
	format?: ColumnFormat;
	title?: string | null;
	meta?: Meta;
}

export interface PrintTarget {
	write(text: string): unknown;
}

type NameList = (string | readonly string[])[];

function isRowFunction(source: ColumnSource): source is RowFunction {
	return typeof source === 'function';
}

function coerceCell(type: ColumnType, name: string, value: CellValue): CellValue {
	if (value === null || !type.coerce) return value;
	try {
		return type.coerce(value);
	} catch (e) {
		const error = asError(e);
		throw new TypeMismatchError(`column ${name}: ${error.message}`, error);
	}
}

/** Copy of `meta` without the cached digest of the table it came from. */
function metaWithoutId(meta: Meta): Meta {
	const copy = copyRecord(meta);
	delete copy.unique_id;
	return copy;
}

let memberNames: ReadonlySet<string> | undefined;

/** Names of everything reachable as a member of a table instance. */
function reservedMemberNames(table: Table): ReadonlySet<string> {
	if (!memberNames) {
		const names = new Set<string>(Object.keys(table));
		let proto: object | null = Object.getPrototypeOf(table);
		while (proto !== null) {
			for (const name of Object.getOwnPropertyNames(proto)) names.add(name);
			proto = Object.getPrototypeOf(proto);
		}
		memberNames = names;
	}
	return memberNames;
}

/**
 * In-memory table: an ordered set of typed, formatted columns over a list
 * of rows.
 *
 * Query operations (`filter`, `join`, `splitBy`, ...) return new tables with
 * copied rows. Column algebra and row updates mutate in place and drop the
 * cached content digest.
 *
 * ```ts
 * const t = new Table(['mz', 'rt'], ['float', 'float'], ['%.5f', 'minutes'], [[100.5, 30], [201, 60]]);
 * const heavy = t.filter(t.column('mz').gt(150));
 * ```
 */
export class Table implements Hashable, ContextProvider {
	readonly cellType = 'Table';
	readonly ref: TableRef = nextRef++;
	title: string | null;
	meta: Meta;
	/** Column known to be sorted ascending; enables binary search in filters */
	primaryIndex: string | null = null;
	/** Format version of the file the table was loaded from */
	version: string | null = null;
	private readonly columns: ColumnRegistry;
	private _rows: Row[];
	private handles = new Map<string, ColumnHandle>();

	/**
	 * @throws SchemaError for duplicate, reserved or postfixed names and unknown formats
	 * @throws TypeMismatchError for unknown or numeric container types
	 * @throws ShapeMismatchError for rows not matching the columns
	 */
	constructor(
		names: readonly string[],
		types: readonly ColumnTypeSpec[],
		formats: readonly ColumnFormat[],
		rows: readonly (readonly CellValue[])[] = [],
		options: TableOptions = {},
	) {
		if (!options.allowPostfixes) {
			const postfixed = names.filter(name => name.includes(POSTFIX_SEPARATOR));
			if (postfixed.length > 0) {
				throw new SchemaError(`column names ${postfixed.join(', ')} contain '${POSTFIX_SEPARATOR}'`);
			}
		}
		this.columns = new ColumnRegistry(
			names,
			types.map(resolveColumnType),
			formats.map(format => (format === '' ? null : format)),
			() => reservedMemberNames(this),
		);
		this._rows = rows.map((row, i) => {
			if (row.length !== names.length) {
				throw new ShapeMismatchError(`row ${i} has ${row.length} values, expected ${names.length}`, names.length, row.length);
			}
			return copyRow(row);
		});
		this.title = options.title ?? null;
		this.meta = options.meta ? metaWithoutId(options.meta) : {};
		this.columns.checkReserved();
	}

	/** Builds a table that takes ownership of `rows`. */
	private static adopt(
		names: readonly string[],
		types: readonly ColumnType[],
		formats: readonly ColumnFormat[],
		rows: Row[],
		title: string | null,
		meta: Meta,
	): Table {
		const table = new Table(names, types, formats, [], { title, meta, allowPostfixes: true });
		table._rows = rows;
		return table;
	}

	/** Builds a table from decoded file content. */
	static fromState(state: TableState): Table {
		return Table.adopt(
			state.names,
			state.typeNames.map(resolveColumnType),
			state.formats,
			state.rows,
			state.title,
			state.meta,
		);
	}

	toState(): TableState {
		return {
			names: [...this.columns.names],
			typeNames: this.getColTypeNames(),
			formats: [...this.columns.formats],
			title: this.title,
			meta: { ...this.meta },
			rows: this._rows,
		};
	}

	/**
	 * One-column table.
	 */
	static toTable(name: string, values: readonly CellValue[], options: ToTableOptions = {}): Table {
		const declared = options.type !== undefined ? resolveColumnType(options.type) : undefined;
		const type = declared ?? commonTypeFor(values);
		const cells = declared ? values.map(value => coerceCell(declared, name, value)) : convertListToOverallType(values);
		const format = options.format === undefined || options.format === '' ? guessFormatFor(name, type) : options.format;
		return new Table([name], [type], [format], cells.map(value => [value]), {
			title: options.title ?? null,
			meta: options.meta,
		});
	}

	// ============================================================================
	// Schema access
	// ============================================================================

	get rows(): readonly (readonly CellValue[])[] {
		return this._rows;
	}

	get length(): number {
		return this._rows.length;
	}

	[Symbol.iterator](): Iterator<readonly CellValue[]> {
		return this._rows[Symbol.iterator]();
	}

	getColNames(): string[] {
		return [...this.columns.names];
	}

	getColTypes(): ColumnType[] {
		return [...this.columns.types];
	}

	getColTypeNames(): string[] {
		return this.columns.types.map(type => type.name);
	}

	getColFormats(): ColumnFormat[] {
		return [...this.columns.formats];
	}

	getColType(name: string): ColumnType {
		return this.columns.getColType(name);
	}

	getColFormat(name: string): ColumnFormat {
		return this.columns.getColFormat(name);
	}

	getVisibleCols(): string[] {
		return this.columns.getVisibleCols();
	}

	getIndex(name: string): number {
		return this.columns.getIndex(name);
	}

	hasColumn(name: string): boolean {
		return this.columns.hasColumn(name);
	}

	hasColumns(...names: string[]): boolean {
		return this.columns.hasColumns(...names);
	}

	ensureColNames(...names: NameList): void {
		this.columns.ensureColNames(...names);
	}

	/**
	 * Expression handle of a column.
	 * @throws SchemaError for unknown names
	 */
	column(name: string): ColumnHandle {
		let handle = this.handles.get(name);
		if (!handle) {
			handle = new ColumnHandle(this, name, this.columns.getColType(name));
			this.handles.set(name, handle);
		}
		return handle;
	}

	columnContext(names: Iterable<string> = this.columns.names): Map<string, ColumnData> {
		const context = new Map<string, ColumnData>();
		for (const name of names) {
			const index = this.columns.getIndex(name);
			context.set(name, {
				values: this._rows.map(row => row[index]),
				sorted: this.primaryIndex === name,
				type: this.columns.types[index],
			});
		}
		return context;
	}

	private contextFor(node: Expression, operation: string): EvalContext {
		const needed = neededColumns(node);
		for (const ref of needed.keys()) {
			if (ref !== this.ref) {
				throw new SchemaError(`${operation} expression refers to columns of another table`);
			}
		}
		return buildContext([this.ref, this.columnContext(needed.get(this.ref) ?? [])]);
	}

	/** Drops derived state: the cached digest and the column handles. */
	resetInternals(): void {
		delete this.meta.unique_id;
		this.handles.clear();
	}

	// ============================================================================
	// Rows
	// ============================================================================

	/**
	 * Appends a row, converting values to the column types. A failing row is
	 * not kept.
	 */
	addRow(row: readonly CellValue[]): void {
		this._rows.push(new Array<CellValue>(this.columns.length).fill(null));
		try {
			this.setRow(this._rows.length - 1, row);
		} catch (e) {
			this._rows.pop();
			throw e;
		}
	}

	/**
	 * @throws ArgumentError for indices out of range
	 * @throws ShapeMismatchError for rows of the wrong length
	 * @throws TypeMismatchError for values not convertible to their column type
	 */
	setRow(index: number, row: readonly CellValue[]): void {
		if (!Number.isInteger(index) || index < 0 || index >= this._rows.length) {
			throw new ArgumentError(`row index ${index} out of range 0..${this._rows.length - 1}`);
		}
		if (row.length !== this.columns.length) {
			throw new ShapeMismatchError(`row has ${row.length} values, expected ${this.columns.length}`, this.columns.length, row.length);
		}
		const types = this.columns.types;
		const names = this.columns.names;
		this._rows[index] = row.map((value, i) => coerceCell(types[i], names[i], value));
		this.primaryIndex = null;
		this.resetInternals();
	}

	/**
	 * Sets one cell of a row owned by this table.
	 * @throws ArgumentError when `row` is not one of the table's rows
	 */
	setValue(row: readonly CellValue[], name: string, value: CellValue): void {
		const owned = this._rows.find(candidate => candidate === row);
		if (!owned) {
			throw new ArgumentError('row does not belong to this table');
		}
		const index = this.columns.getIndex(name);
		owned[index] = coerceCell(this.columns.types[index], name, value);
		if (this.primaryIndex === name) {
			this.primaryIndex = null;
		}
		this.resetInternals();
	}

	/** Value of a cell; `defaultValue` for unknown columns */
	getValue(row: readonly CellValue[], name: string, defaultValue: CellValue = null): CellValue {
		return this.columns.hasColumn(name) ? row[this.columns.getIndex(name)] : defaultValue;
	}

	getValues(row: readonly CellValue[]): Record<string, CellValue> {
		const values: Record<string, CellValue> = {};
		this.columns.names.forEach((name, i) => {
			values[name] = row[i];
		});
		return values;
	}

	// ============================================================================
	// Column algebra
	// ============================================================================

	/**
	 * Adds a column.
	 *
	 * @throws NameCollisionError when the name is taken
	 * @throws SchemaError for names containing `__` and unknown insert positions
	 * @throws ShapeMismatchError when values and rows differ in number
	 * @throws ArgumentError when both insert positions are given
	 */
	addColumn(name: string, source: ColumnSource, options: AddColumnOptions = {}): void {
		this.columns.checkNewName(name);
		this.insertComputed(name, source, options, false);
	}

	/** Adds a column holding `value` in every row, arrays included. */
	addConstantColumn(name: string, value: CellValue, options: AddColumnOptions = {}): void {
		this.columns.checkNewName(name);
		this.insertComputed(name, value, options, true);
	}

	/** Adds a column of nulls under a name that may carry a postfix. */
	addNullColumn(name: string, type: ColumnTypeSpec, format: ColumnFormat): void {
		this.columns.checkNewName(name, true);
		this.insertComputed(name, null, { type, format }, true);
	}

	private insertComputed(name: string, source: ColumnSource, options: AddColumnOptions, constant: boolean): void {
		if (options.insertBefore !== undefined && options.insertAfter !== undefined) {
			throw new ArgumentError('can not handle insertBefore and insertAfter at the same time');
		}
		const position = this.columns.insertPosition(options.insertBefore, options.insertAfter);
		const declared = options.type !== undefined ? resolveColumnType(options.type) : undefined;
		const computed = this.computeColumn(name, source, declared, constant);
		const type = declared ?? computed.type;
		const values = declared && !computed.verbatim
			? computed.values.map(value => coerceCell(declared, name, value))
			: computed.values;
		const format = options.format === undefined || options.format === '' ? guessFormatFor(name, type) : options.format;

		this.columns.insert(position, name, type, format);
		this._rows.forEach((row, i) => {
			row.splice(position, 0, values[i]);
		});
		this.resetInternals();
		log('added column %s (%s) at %d', name, type.name, position);
	}

	private computeColumn(
		name: string,
		source: ColumnSource,
		declared: ColumnType | undefined,
		constant: boolean,
	): { values: CellValue[]; type: ColumnType; verbatim: boolean } {
		const count = this._rows.length;
		if (source instanceof Expr) {
			const result = evaluate(source.node, this.contextFor(source.node, 'column'));
			if (result.values.length === 1) {
				return { values: this._rows.map(() => copyCell(result.values[0])), type: result.type, verbatim: false };
			}
			if (result.values.length !== count) {
				throw new ShapeMismatchError(
					`expression for column ${name} has ${result.values.length} values, table has ${count} rows`,
					count,
					result.values.length
				);
			}
			return { values: [...result.values], type: result.type, verbatim: false };
		}
		if (isRowFunction(source)) {
			const values = this._rows.map(row => source(this, row, name));
			return { values, type: commonTypeFor(values), verbatim: false };
		}
		if (!constant && isCellList(source)) {
			if (source.length !== count) {
				throw new ShapeMismatchError(`column ${name} has ${source.length} values, table has ${count} rows`, count, source.length);
			}
			const values = declared ? copyRow(source) : convertListToOverallType(copyRow(source));
			return { values, type: commonTypeFor(values), verbatim: false };
		}
		return { values: this._rows.map(() => copyCell(source)), type: commonTypeFor([source]), verbatim: true };
	}

	/**
	 * Replaces a column by new values at the same position.
	 * @throws SchemaError when the column does not exist
	 */
	replaceColumn(name: string, source: ColumnSource, options: Omit<AddColumnOptions, 'insertBefore' | 'insertAfter'> = {}): void {
		this.columns.ensureColNames(name);
		const temporary = `${name}${POSTFIX_SEPARATOR}tmp`;
		this.columns.checkNewName(temporary, true);
		this.insertComputed(temporary, source, { ...options, insertBefore: name }, false);
		const wasIndexed = this.primaryIndex === name;
		this.dropColumns(name);
		this.columns.applyRenames(new Map([[temporary, name]]));
		if (wasIndexed) this.primaryIndex = null;
		this.resetInternals();
	}

	/** Replaces the column when present, else adds it. */
	updateColumn(name: string, source: ColumnSource, options: AddColumnOptions = {}): void {
		if (this.columns.hasColumn(name)) {
			this.replaceColumn(name, source, { type: options.type, format: options.format });
		} else {
			this.addColumn(name, source, options);
		}
	}

	/**
	 * Removes columns; removing every column empties the rows.
	 * @throws SchemaError naming the missing columns, before anything is removed
	 */
	dropColumns(...names: NameList): void {
		const flat = names.flat();
		this.columns.ensureColNames(flat);
		const indices = new Set(flat.map(name => this.columns.getIndex(name)));
		this.columns.remove([...indices]);
		if (this.columns.length === 0) {
			this._rows = [];
		} else {
			this._rows = this._rows.map(row => row.filter((_, i) => !indices.has(i)));
		}
		if (this.primaryIndex !== null && flat.includes(this.primaryIndex)) {
			this.primaryIndex = null;
		}
		this.resetInternals();
	}

	/**
	 * Renames columns. All mappings are validated before any name changes.
	 * @throws SchemaError for unknown or repeated old names, repeated new names and `__`
	 * @throws NameCollisionError when a new name is already a column
	 */
	renameColumns(...mappings: Readonly<Record<string, string>>[]): void {
		const renames = this.columns.checkRenames(mappings);
		this.columns.applyRenames(renames);
		if (this.primaryIndex !== null) {
			this.primaryIndex = renames.get(this.primaryIndex) ?? this.primaryIndex;
		}
		this.resetInternals();
	}

	renameColumn(oldName: string, newName: string): void {
		this.renameColumns({ [oldName]: newName });
	}

	setColType(name: string, type: ColumnTypeSpec): void {
		this.columns.setColType(name, resolveColumnType(type));
		this.resetInternals();
	}

	setColFormat(name: string, format: ColumnFormat): void {
		this.columns.setColFormat(name, format);
		this.resetInternals();
	}

	/** Prepends an integer column numbering the rows from 0. */
	addEnumeration(name: string = 'id'): void {
		this.addColumn(name, this._rows.map((_, i) => i), { type: INT_TYPE, format: '%d', insertBefore: 0 });
	}

	/**
	 * New table with the given columns in the given order.
	 * @throws SchemaError for repeated or missing names
	 */
	extractColumns(...names: NameList): Table {
		const flat = names.flat();
		if (new Set(flat).size !== flat.length) {
			throw new SchemaError(`duplicate names in ${flat.join(', ')}`);
		}
		this.columns.ensureColNames(flat);
		const indices = flat.map(name => this.columns.getIndex(name));
		return Table.adopt(
			flat,
			indices.map(i => this.columns.types[i]),
			indices.map(i => this.columns.formats[i]),
			this._rows.map(row => copyRow(indices.map(i => row[i]))),
			this.title,
			this.meta,
		);
	}

	// ============================================================================
	// Postfixes
	// ============================================================================

	findPostfixes(): string[] {
		return Array.from(findPostfixes(this.columns.names)).sort();
	}

	minPostfix(): number {
		return Math.min(...postfixValues(this.columns.names));
	}

	maxPostfix(): number {
		return Math.max(...postfixValues(this.columns.names));
	}

	supportedPostfixes(prefixes: readonly string[]): string[] {
		return supportedPostfixes(this.columns.names, prefixes);
	}

	/**
	 * Strips postfixes from the column names: everything from `__` on when
	 * called without arguments, else the first matching one of `postfixes`.
	 * @throws SchemaError when names become ambiguous
	 */
	removePostfixes(...postfixes: string[]): void {
		const strip = (name: string): string => {
			if (postfixes.length === 0) {
				const at = name.indexOf(POSTFIX_SEPARATOR);
				return at < 0 ? name : name.slice(0, at);
			}
			const postfix = postfixes.find(p => p !== '' && name.endsWith(p));
			return postfix === undefined ? name : name.slice(0, name.length - postfix.length);
		};
		this.renameAll(this.columns.names.map(strip), 'removing postfixes');
	}

	/**
	 * Replaces postfixes by mapping, e.g. `{ '__0': '_right' }`.
	 * @throws SchemaError when a new name contains `__`
	 */
	renamePostfixes(mapping: Readonly<Record<string, string>>): void {
		const renames: Record<string, string> = {};
		for (const name of this.columns.names) {
			const postfix = getPostfix(name);
			if (postfix === null || !(postfix in mapping)) continue;
			const renamed = name.slice(0, name.length - postfix.length) + mapping[postfix];
			if (renamed.includes(POSTFIX_SEPARATOR)) {
				throw new SchemaError(`renaming ${name} to ${renamed} leaves '${POSTFIX_SEPARATOR}' in the name`);
			}
			renames[name] = renamed;
		}
		this.renameColumns(renames);
	}

	private renameAll(names: readonly string[], operation: string): void {
		const previous = this.columns.names;
		this.columns.replaceNames(names, operation);
		if (this.primaryIndex !== null) {
			this.primaryIndex = names[previous.indexOf(this.primaryIndex)];
		}
		this.resetInternals();
	}

	// ============================================================================
	// Queries
	// ============================================================================

	/**
	 * Rows for which `condition` holds. A single value keeps all rows or none.
	 * @throws ShapeMismatchError when the condition has neither 1 value nor one per row
	 */
	filter(condition: ExprLike): Table {
		const node = toExpression(condition);
		const result = evaluate(node, this.contextFor(node, 'filter'));
		const table = this.withRows(filterRows(this._rows, result.values));
		table.primaryIndex = this.primaryIndex;
		return table;
	}

	/**
	 * Combines every row with every row of `other` for which `condition`
	 * holds. Columns of `other` get renumbered postfixes.
	 */
	join(other: Table, condition: ExprLike = true, title?: string): Table {
		return this.joinWith(other, condition, title, false);
	}

	/** Like `join`, and keeps unmatched rows of this table with nulls on the right. */
	leftJoin(other: Table, condition: ExprLike = true, title?: string): Table {
		return this.joinWith(other, condition, title, true);
	}

	private joinWith(other: Table, condition: ExprLike, title: string | undefined, outer: boolean): Table {
		if (!(other instanceof Table)) {
			throw new ArgumentError('can only join with tables');
		}
		if (other === this) {
			throw new ArgumentError('join a table with a copy of itself');
		}
		const node = toExpression(condition);
		const needed = neededColumns(node);
		for (const ref of needed.keys()) {
			if (ref !== this.ref && ref !== other.ref) {
				throw new SchemaError('join expression refers to columns of a third table');
			}
		}
		const leftNames = Array.from(needed.get(this.ref) ?? []);
		const leftIndices = leftNames.map(name => this.columns.getIndex(name));
		const rightContext = other.columnContext(needed.get(other.ref) ?? []);
		const types = this.columns.types;

		const onProgress = tableOptions.getBooleanOption('join.logProgress')
			? (percent: number) => joinLog('%s %d%%', outer ? 'left join' : 'join', percent)
			: undefined;
		const rows = joinRows(
			this._rows,
			other._rows,
			(leftRow) => {
				const leftContext = new Map<string, ColumnData>();
				leftNames.forEach((name, i) => {
					const index = leftIndices[i];
					leftContext.set(name, { values: [leftRow[index]], sorted: false, type: types[index] });
				});
				return evaluate(node, buildContext([this.ref, leftContext], [other.ref, rightContext])).values;
			},
			{ outer, rightWidth: other.columns.length, onProgress },
		);

		const incrementBy = this.maxPostfix() - other.minPostfix() + 1;
		const meta: Meta = {
			[metaKey({ kind: 'table', ref: this.ref })]: metaWithoutId(this.meta),
			[metaKey({ kind: 'table', ref: other.ref })]: metaWithoutId(other.meta),
		};
		log('%s of %d x %d rows gave %d rows', outer ? 'left join' : 'join', this.length, other.length, rows.length);
		return Table.adopt(
			[...this.columns.names, ...incrementedPostfixes(other.columns.names, incrementBy)],
			[...this.columns.types, ...other.columns.types],
			[...this.columns.formats, ...other.columns.formats],
			rows,
			title ?? `${cellToString(this.title)} vs ${cellToString(other.title)}`,
			meta,
		);
	}

	/**
	 * Stable in-place sort. Returns the permutation applied: entry `i` is the
	 * former index of the row now at `i`.
	 */
	sortBy(names: string | readonly string[], ascending: boolean | readonly boolean[] = true): number[] {
		const keys = typeof names === 'string' ? [names] : [...names];
		const directions = typeof ascending === 'boolean' ? keys.map(() => ascending) : [...ascending];
		if (directions.length !== keys.length) {
			throw new ArgumentError(`got ${keys.length} sort columns but ${directions.length} directions`);
		}
		this.columns.ensureColNames(keys);
		const permutation = sortPermutation(this._rows, keys.map(name => this.columns.getIndex(name)), directions);
		const rows = this._rows;
		this._rows = permutation.map(i => rows[i]);
		this.primaryIndex = keys.length > 0 && directions[0] ? keys[0] : null;
		this.resetInternals();
		return permutation;
	}

	/**
	 * One table per distinct combination of values, in order of first appearance.
	 */
	splitBy(...names: NameList): Table[] {
		const flat = names.flat();
		this.columns.ensureColNames(flat);
		const groups = groupRows(this._rows, flat.map(name => this.columns.getIndex(name)));
		return groups.map(group => {
			const table = this.withRows(group.rows);
			table.primaryIndex = this.primaryIndex;
			return table;
		});
	}

	/** Distinct rows over all columns, hidden ones included; first occurrence kept */
	uniqueRows(): Table {
		const table = this.withRows(distinctRows(this._rows));
		table.primaryIndex = this.primaryIndex;
		return table;
	}

	/**
	 * Appends copies of the rows of other tables with the same column names and types.
	 * @throws SchemaError before any row is added when a table does not match
	 */
	append(...tables: (Table | readonly Table[])[]): void {
		const flat = tables.flat();
		const names = this.columns.names.join(', ');
		const typeNames = this.getColTypeNames().join(', ');
		for (const table of flat) {
			if (!(table instanceof Table)) {
				throw new ArgumentError('can only append tables');
			}
			if (table.columns.names.join(', ') !== names) {
				throw new SchemaError(`column names differ: expected ${names}, got ${table.columns.names.join(', ')}`);
			}
			if (table.getColTypeNames().join(', ') !== typeNames) {
				throw new SchemaError(`column types differ: expected ${typeNames}, got ${table.getColTypeNames().join(', ')}`);
			}
		}
		for (const table of flat) {
			for (const row of table._rows) this._rows.push(copyRow(row));
		}
		this.primaryIndex = null;
		this.resetInternals();
	}

	/**
	 * One row per distinct combination of `names`, with the rows of that
	 * combination as a nested table in column `collapsed`.
	 */
	collapse(...names: string[]): Table {
		this.columns.ensureColNames(names);
		const rows = this.splitBy(...names).map(sub => {
			const keyValues = names.map(name => sub.getValue(sub._rows[0], name));
			sub.title = names.map((name, i) => `${name}=${cellToString(keyValues[i])}`).join(', ');
			return [...keyValues, sub];
		});
		return Table.adopt(
			[...names, 'collapsed'],
			[...names.map(name => this.columns.getColType(name)), TABLE_TYPE],
			[...names.map(name => this.columns.getColFormat(name)), '%s'],
			rows,
			null,
			this.meta,
		);
	}

	slice(start?: number, end?: number): Table {
		const table = this.withRows(this._rows.slice(start, end).map(copyRow));
		table.primaryIndex = this.primaryIndex;
		return table;
	}

	copy(): Table {
		return this.slice();
	}

	buildEmptyClone(): Table {
		return this.withRows([]);
	}

	private withRows(rows: Row[]): Table {
		return Table.adopt(this.columns.names, this.columns.types, this.columns.formats, rows, this.title, this.meta);
	}

	// ============================================================================
	// Identity
	// ============================================================================

	/**
	 * SHA-256 hex digest over names, types, formats, meta and cells.
	 * Cached in `meta.unique_id` until the next mutation.
	 */
	uniqueId(): string {
		const cached = this.meta.unique_id;
		if (typeof cached === 'string') return cached;

		const meta: Record<string, CellValue> = {};
		for (const [key, value] of Object.entries(this.meta)) {
			if (key !== 'unique_id' && key !== 'loaded_from') meta[key] = value;
		}
		const digest = new Digest()
			.value(this.columns.names)
			.value(this.getColTypeNames())
			.value(this.columns.formats)
			.value(meta)
			.update(`r${this._rows.length}[`);
		for (const row of this._rows) digest.value(row);
		const id = digest.update(']').hex();
		this.meta.unique_id = id;
		return id;
	}

	equals(other: Hashable): boolean {
		return other instanceof Table && other.uniqueId() === this.uniqueId();
	}

	/**
	 * Replaces content-identical cell objects by one shared instance, nested
	 * tables included.
	 * @returns number of cells replaced
	 */
	compressBlobs(canonical: Map<string, Hashable> = new Map()): number {
		let replaced = 0;
		for (const row of this._rows) {
			row.forEach((value, i) => {
				if (value instanceof Table) {
					replaced += value.compressBlobs(canonical);
				} else if (isHashable(value)) {
					const key = `${value.cellType ?? value.constructor.name}:${value.uniqueId()}`;
					const known = canonical.get(key);
					if (known === undefined) {
						canonical.set(key, value);
					} else if (known !== value) {
						row[i] = known;
						replaced++;
					}
				}
			});
		}
		return replaced;
	}

	// ============================================================================
	// Persistence
	// ============================================================================

	/**
	 * Writes the table to a `.table` file.
	 * @throws ArgumentError when the file exists and `forceOverwrite` is not set
	 */
	store(path: string, options: StoreOptions = {}): void {
		if (!options.forceOverwrite && fileExists(path)) {
			throw new ArgumentError(`${path} exists, use forceOverwrite to replace it`);
		}
		if (options.compressed ?? tableOptions.getBooleanOption('store.compress')) {
			const replaced = this.compressBlobs();
			if (replaced > 0) log('shared %d duplicate cell objects before storing', replaced);
		}
		writeTableFile(path, this.toState());
	}

	/**
	 * Reads a table stored by `store`, or by older versions of the format.
	 * @throws LoadError when no known layout can read the file
	 */
	static load(path: string): Table {
		const { table, version } = readTableFile(path, state => Table.fromState(state));
		table.meta.loaded_from = resolvePath(path);
		table.version = version;
		return table;
	}

	// ============================================================================
	// Rendering
	// ============================================================================

	render(options: RenderOptions = {}): string {
		return renderTable(
			{
				names: this.columns.names,
				types: this.columns.types,
				formats: this.columns.formats,
				formatters: this.columns.formatters,
				rows: this._rows,
			},
			{
				width: options.width ?? tableOptions.getNumberOption('print.width'),
				maxLines: options.maxLines ?? null,
				title: options.title ?? null,
			},
		);
	}

	print(options: RenderOptions = {}, out: PrintTarget = process.stdout): void {
		out.write(this.render(options));
	}

	toString(): string {
		return this.render({ maxLines: tableOptions.getNumberOption('print.maxLines') });
	}
}

registerObjectCodec<Table>({
	name: 'Table',
	is: (value): value is Table => value instanceof Table,
	encode: (table) => encodeTableState(table.toState()),
	decode: (payload, session) => Table.fromState(decodeStrict(payload, session)),
});

