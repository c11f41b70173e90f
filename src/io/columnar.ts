import { ShapeMismatchError, TypeMismatchError, asError } from '../common/errors.js';
import type { CellValue, Meta, Row } from '../common/types.js';
import { Table } from '../table/table.js';
import type { ColumnType } from '../types/column-type.js';
import { commonTypeFor } from '../types/inference.js';
import { resolveColumnType, type ColumnTypeSpec } from '../types/registry.js';
import { guessFormatFor, type ColumnFormat } from '../util/format.js';

/** Column name to values, in column order */
export type ColumnarData = Record<string, readonly (CellValue | undefined)[]>;

export interface FromColumnsOptions {
	/** Declared types by column name; inferred otherwise */
	types?: Readonly<Record<string, ColumnTypeSpec>>;
	/** Formats by column name or by type name */
	formats?: Readonly<Record<string, ColumnFormat>>;
	title?: string | null;
	meta?: Meta;
}

const INTERCHANGE_FORMATS: Readonly<Record<string, ColumnFormat>> = {
	int: '%d',
	float: '%f',
	str: '%s',
	bool: '%s',
	object: null,
};

function normalize(value: CellValue | undefined): CellValue {
	if (value === undefined) return null;
	if (typeof value === 'number' && Number.isNaN(value)) return null;
	return value;
}

function convert(type: ColumnType, value: CellValue): CellValue {
	if (value === null || !type.coerce) return value;
	try {
		return type.coerce(value);
	} catch (e) {
		throw new TypeMismatchError(`can not convert to ${type.name}`, asError(e));
	}
}

function formatFor(name: string, type: ColumnType, formats: Readonly<Record<string, ColumnFormat>>): ColumnFormat {
	if (name in formats) return formats[name];
	if (type.name in formats) return formats[type.name];
	if (type.name in INTERCHANGE_FORMATS) return INTERCHANGE_FORMATS[type.name];
	return guessFormatFor(name, type);
}

/**
 * Columns of a table keyed by name; NaN becomes null.
 */
export function toColumns(table: Table): Record<string, CellValue[]> {
	const columns: Record<string, CellValue[]> = {};
	table.getColNames().forEach((name, i) => {
		columns[name] = table.rows.map(row => normalize(row[i]));
	});
	return columns;
}

/**
 * Builds a table from named columns of equal length. Undefined and NaN
 * values become null.
 *
 * @throws ShapeMismatchError when the columns differ in length
 */
export function fromColumns(data: ColumnarData, options: FromColumnsOptions = {}): Table {
	const names = Object.keys(data);
	const length = names.length > 0 ? data[names[0]].length : 0;
	const columns = names.map(name => {
		const values = data[name];
		if (values.length !== length) {
			throw new ShapeMismatchError(`column ${name} has ${values.length} values, expected ${length}`, length, values.length);
		}
		return values.map(normalize);
	});
	const types = names.map((name, i) => {
		const declared = options.types?.[name];
		return declared !== undefined ? resolveColumnType(declared) : commonTypeFor(columns[i]);
	});
	const formats = names.map((name, i) => formatFor(name, types[i], options.formats ?? {}));
	const rows: Row[] = Array.from({ length }, (_, r) => columns.map((column, c) =>
		options.types?.[names[c]] !== undefined ? convert(types[c], column[r]) : column[r]
	));
	return new Table(names, types, formats, rows, {
		title: options.title ?? null,
		meta: options.meta,
		allowPostfixes: true,
	});
}

/**
 * Builds a table from a row-major matrix. Values of `int`, `float` and `str`
 * columns are converted to the column type; NaN becomes null.
 *
 * @throws ShapeMismatchError for rows of the wrong length
 */
export function fromMatrix(
	matrix: readonly (readonly (CellValue | undefined)[])[],
	names: readonly string[],
	types?: readonly ColumnTypeSpec[],
	formats?: readonly ColumnFormat[],
): Table {
	for (const [what, given] of [['types', types], ['formats', formats]] as const) {
		if (given && given.length !== names.length) {
			throw new ShapeMismatchError(`got ${given.length} ${what} for ${names.length} columns`, names.length, given.length);
		}
	}
	const rows = matrix.map((row, i) => {
		if (row.length !== names.length) {
			throw new ShapeMismatchError(`row ${i} has ${row.length} values, expected ${names.length}`, names.length, row.length);
		}
		return row.map(normalize);
	});
	const columnTypes = names.map((_, c) =>
		types ? resolveColumnType(types[c]) : commonTypeFor(rows.map(row => row[c]))
	);
	const columnFormats = names.map((name, c) => {
		const format = formats?.[c];
		return format === undefined || format === '' ? guessFormatFor(name, columnTypes[c]) : format;
	});
	return new Table(
		names,
		columnTypes,
		columnFormats,
		rows.map(row => row.map((value, c) => convert(columnTypes[c], value))),
	);
}
