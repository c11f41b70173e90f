import { ArgumentError, SchemaError } from '../common/errors.js';
import { createLogger } from '../common/logger.js';
import type { ColumnType } from '../types/column-type.js';
import type { ColumnFormat } from '../util/format.js';
import { Table } from './table.js';

const log = createLogger('table:merge');

export interface MergeOptions {
	/** Supplies the column names, types and formats of the result */
	reference?: Table;
	/** Take the first seen type and format where tables disagree */
	forceMerge?: boolean;
}

interface ColumnSpec {
	name: string;
	type: ColumnType;
	format: ColumnFormat;
}

function collectColumns(tables: readonly Table[], forceMerge: boolean): ColumnSpec[] {
	const columns = new Map<string, ColumnSpec>();
	for (const table of tables) {
		const names = table.getColNames();
		const types = table.getColTypes();
		const formats = table.getColFormats();
		names.forEach((name, i) => {
			const seen = columns.get(name);
			if (!seen) {
				columns.set(name, { name, type: types[i], format: formats[i] });
				return;
			}
			if (forceMerge) return;
			if (seen.type.name !== types[i].name) {
				throw new SchemaError(`column ${name} has conflicting types ${seen.type.name} and ${types[i].name}`);
			}
			if (seen.format !== formats[i]) {
				throw new SchemaError(`column ${name} has conflicting formats ${String(seen.format)} and ${String(formats[i])}`);
			}
		});
	}
	return Array.from(columns.values());
}

/**
 * Concatenates the rows of tables with differing columns. The result has
 * the columns of `reference`, else the union of all columns in order of
 * first appearance; columns a table lacks are filled with nulls.
 *
 * ```ts
 * const merged = mergeTables([t1, t2]);
 * ```
 *
 * @throws SchemaError for conflicting column types or formats unless `forceMerge` is set
 */
export function mergeTables(tables: readonly Table[], options: MergeOptions = {}): Table {
	if (tables.length === 0) {
		throw new ArgumentError('need at least one table to merge');
	}
	const reference = options.reference;
	const columns: ColumnSpec[] = reference
		? reference.getColNames().map(name => ({
			name,
			type: reference.getColType(name),
			format: reference.getColFormat(name),
		}))
		: collectColumns(tables, options.forceMerge ?? false);
	const names = columns.map(column => column.name);

	const extended = tables.map(table => {
		const missing = columns.filter(column => !table.hasColumn(column.name));
		const source = missing.length > 0 || options.forceMerge ? table.copy() : table;
		for (const column of missing) {
			source.addNullColumn(column.name, column.type, column.format);
		}
		if (options.forceMerge) {
			for (const column of columns) {
				if (source.getColType(column.name).name !== column.type.name) {
					source.setColType(column.name, column.type);
				}
			}
		}
		return source.extractColumns(names);
	});

	const [result, ...rest] = extended;
	result.append(rest);
	log('merged %d tables into %d rows x %d columns', tables.length, result.length, names.length);
	return result;
}
