import { NameCollisionError, SchemaError, ShapeMismatchError } from '../common/errors.js';
import type { ColumnType } from '../types/column-type.js';
import { compileFormatter, type CellFormatter, type ColumnFormat } from '../util/format.js';
import { POSTFIX_SEPARATOR } from '../util/postfix.js';

/** Column names that would shadow table members */
export type ReservedNames = () => ReadonlySet<string>;

function sortedList(names: Iterable<string>): string {
	return Array.from(new Set(names)).sort().join(', ');
}

/**
 * Ordered column names, types and formats of a table, index-aligned.
 */
export class ColumnRegistry {
	private _names: string[];
	private _types: ColumnType[];
	private _formats: ColumnFormat[];
	private indices = new Map<string, number>();
	private _formatters: CellFormatter[] = [];

	constructor(
		names: readonly string[],
		types: readonly ColumnType[],
		formats: readonly ColumnFormat[],
		private readonly reservedNames: ReservedNames,
	) {
		if (names.length !== types.length || names.length !== formats.length) {
			throw new ShapeMismatchError(
				`got ${names.length} column names, ${types.length} types and ${formats.length} formats`,
				names.length,
				types.length !== names.length ? types.length : formats.length
			);
		}
		const counts = new Map<string, number>();
		for (const name of names) counts.set(name, (counts.get(name) ?? 0) + 1);
		const multiples = Array.from(counts).filter(([, count]) => count > 1).map(([name]) => name);
		if (multiples.length > 0) {
			throw new SchemaError(`multiple columns: ${multiples.join(', ')}`);
		}
		this._names = [...names];
		this._types = [...types];
		this._formats = [...formats];
		this.recompute();
	}

	get names(): readonly string[] { return this._names; }
	get types(): readonly ColumnType[] { return this._types; }
	get formats(): readonly ColumnFormat[] { return this._formats; }
	get formatters(): readonly CellFormatter[] { return this._formatters; }
	get length(): number { return this._names.length; }

	/**
	 * Rebuilds the name index and the formatters.
	 * @throws SchemaError for unknown formatter names
	 */
	recompute(): void {
		this.indices = new Map(this._names.map((name, i) => [name, i]));
		this._formatters = this._formats.map(compileFormatter);
	}

	/**
	 * @throws SchemaError naming the first column that shadows a table member
	 */
	checkReserved(names: readonly string[] = this._names): void {
		const reserved = this.reservedNames();
		for (const name of names) {
			if (reserved.has(name)) {
				throw new SchemaError(`column name '${name}' not allowed`);
			}
		}
	}

	getIndex(name: string): number {
		const index = this.indices.get(name);
		if (index === undefined) {
			throw new SchemaError(`column with name '${name}' not in table`);
		}
		return index;
	}

	hasColumn(name: string): boolean {
		return this.indices.has(name);
	}

	hasColumns(...names: string[]): boolean {
		return names.every(name => this.hasColumn(name));
	}

	/**
	 * @throws SchemaError listing the expected, found and missing names
	 */
	ensureColNames(...names: (string | readonly string[])[]): void {
		const flat = names.flat();
		const missing = flat.filter(name => !this.hasColumn(name));
		if (missing.length === 0) return;
		const found = flat.filter(name => this.hasColumn(name));
		const expected = sortedList(flat);
		const missingText = sortedList(missing);
		const message = expected !== missingText
			? `expected names ${expected}, found ${sortedList(found)} but ${missingText} were missing`
			: `expected names ${expected} but found ${sortedList(found)}`;
		throw new SchemaError(message);
	}

	getColType(name: string): ColumnType {
		return this._types[this.getIndex(name)];
	}

	getColFormat(name: string): ColumnFormat {
		return this._formats[this.getIndex(name)];
	}

	setColType(name: string, type: ColumnType): void {
		this._types[this.getIndex(name)] = type;
	}

	/**
	 * @throws SchemaError for unknown formatter names; the format is left unchanged
	 */
	setColFormat(name: string, format: ColumnFormat): void {
		const index = this.getIndex(name);
		const formatter = compileFormatter(format);
		this._formats[index] = format;
		this._formatters[index] = formatter;
	}

	/** Names of columns with a format, i.e. rendered ones */
	getVisibleCols(): string[] {
		return this._names.filter((_, i) => this._formats[i] !== null);
	}

	/**
	 * Validates a name for a new column.
	 * @throws NameCollisionError when the name is taken
	 * @throws SchemaError for the reserved separator or member names
	 */
	checkNewName(name: string, allowSeparator = false): void {
		if (!allowSeparator && name.includes(POSTFIX_SEPARATOR)) {
			throw new SchemaError(`double underscore in '${name}' not allowed`);
		}
		if (this.hasColumn(name)) {
			throw new NameCollisionError(`column with name '${name}' already exists`);
		}
		this.checkReserved([name]);
	}

	/**
	 * Resolves an insert position given as name or index (negative counts from the end).
	 * @returns index the new column gets
	 */
	insertPosition(insertBefore?: string | number, insertAfter?: string | number): number {
		const resolve = (position: string | number): number => {
			if (typeof position === 'string') {
				if (!this.hasColumn(position)) {
					throw new SchemaError(`column '${position}' does not exist`);
				}
				return this.getIndex(position);
			}
			if (!Number.isInteger(position)) {
				throw new SchemaError(`can not handle insert position ${position}`);
			}
			return position < 0 ? position + this._names.length : position;
		};
		if (insertBefore !== undefined) return resolve(insertBefore);
		if (insertAfter !== undefined) return resolve(insertAfter) + 1;
		return this._names.length;
	}

	insert(index: number, name: string, type: ColumnType, format: ColumnFormat): void {
		const formatter = compileFormatter(format);
		this._names.splice(index, 0, name);
		this._types.splice(index, 0, type);
		this._formats.splice(index, 0, format);
		this._formatters.splice(index, 0, formatter);
		this.indices = new Map(this._names.map((n, i) => [n, i]));
	}

	/** Removes the columns at the given indices. */
	remove(indices: readonly number[]): void {
		const drop = new Set(indices);
		const keep = (_: unknown, i: number) => !drop.has(i);
		this._names = this._names.filter(keep);
		this._types = this._types.filter(keep);
		this._formats = this._formats.filter(keep);
		this._formatters = this._formatters.filter(keep);
		this.indices = new Map(this._names.map((n, i) => [n, i]));
	}

	/**
	 * Validates renames without applying them: every old name exists and
	 * appears once; every new name appears once, carries no separator and is
	 * not a column that keeps its name.
	 */
	checkRenames(mappings: readonly Readonly<Record<string, string>>[]): Map<string, string> {
		const renames = new Map<string, string>();
		for (const mapping of mappings) {
			for (const oldName of Object.keys(mapping)) {
				if (renames.has(oldName)) {
					throw new SchemaError(`name overlap in column names to rename: ${oldName}`);
				}
				if (!this.hasColumn(oldName)) {
					throw new SchemaError(`column '${oldName}' does not exist`);
				}
				renames.set(oldName, mapping[oldName]);
			}
		}
		const newNames = new Set<string>();
		for (const newName of renames.values()) {
			if (newNames.has(newName)) {
				throw new SchemaError(`name overlap in new column names: ${newName}`);
			}
			if (this.hasColumn(newName) && !renames.has(newName)) {
				throw new NameCollisionError(`column '${newName}' already exists`);
			}
			if (newName.includes(POSTFIX_SEPARATOR)) {
				throw new SchemaError(`double underscore in '${newName}' not allowed`);
			}
			newNames.add(newName);
		}
		this.checkReserved([...newNames]);
		return renames;
	}

	/** Applies renames without validation. */
	applyRenames(renames: ReadonlyMap<string, string>): void {
		this._names = this._names.map(name => renames.get(name) ?? name);
		this.indices = new Map(this._names.map((n, i) => [n, i]));
	}

	/**
	 * Replaces all names at once, e.g. when stripping postfixes.
	 * @throws SchemaError when the result holds duplicates
	 */
	replaceNames(names: readonly string[], context: string): void {
		if (new Set(names).size !== names.length || names.length !== this._names.length) {
			throw new SchemaError(`${context} results in ambiguous column names ${names.join(', ')}`);
		}
		this.checkReserved(names);
		this._names = [...names];
		this.indices = new Map(this._names.map((n, i) => [n, i]));
	}
}
