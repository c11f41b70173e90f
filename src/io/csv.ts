/**
 * CSV import and export. The text format is lossy: only names and cell
 * text survive, types and formats are guessed again on import.
 */

import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import { basename, extname, resolve } from 'node:path';
import Papa from 'papaparse';
import { ArgumentError, LoadError } from '../common/errors.js';
import { createLogger } from '../common/logger.js';
import type { CellValue, Row } from '../common/types.js';
import { tableOptions } from '../core/options.js';
import { Table } from '../table/table.js';
import { parseFloatText, parseIntegerText } from '../types/builtin-types.js';
import { commonTypeFor } from '../types/inference.js';
import { cellToString, guessFormatFor, type ColumnFormat } from '../util/format.js';

const log = createLogger('io:csv');

export interface StoreCSVOptions {
	/** Skip columns whose format is null (default true) */
	onlyVisibleColumns?: boolean;
	/** Default from the `csv.separator` option */
	separator?: string;
}

export interface LoadCSVOptions {
	/** Default from the `csv.separator` option */
	separator?: string;
	/** Keep the text `None` instead of reading it as null; default from the `csv.keepNone` option */
	keepNone?: boolean;
	/** Formats by column name, overriding the guessed ones */
	formats?: Readonly<Record<string, ColumnFormat>>;
}

/**
 * Converts cell text to the narrowest value: integer, then float, then float
 * with a decimal comma, else the text itself.
 */
export function bestConvert(text: string): CellValue {
	const integer = parseIntegerText(text);
	if (integer !== undefined) return integer;
	const float = parseFloatText(text);
	if (float !== undefined) return float;
	const commaFloat = parseFloatText(text.replace(/,/g, '.'));
	if (commaFloat !== undefined) return commaFloat;
	return text;
}

/**
 * Writes the table as CSV. When `path` exists, `path.1`, `path.2`, ... are
 * tried until a free name is found.
 *
 * @returns path actually written
 * @throws ArgumentError when `path` does not end in `.csv`
 */
export function storeCSV(table: Table, path: string, options: StoreCSVOptions = {}): string {
	if (extname(path).toUpperCase() !== '.CSV') {
		throw new ArgumentError(`${path} has wrong file type extension`);
	}
	let target = path;
	for (let i = 1; existsSync(target); i++) {
		log('%s exists', target);
		target = `${path}.${i}`;
	}
	const names = (options.onlyVisibleColumns ?? true) ? table.getVisibleCols() : table.getColNames();
	const indices = names.map(name => table.getIndex(name));
	const text = Papa.unparse(
		[names, ...table.rows.map(row => indices.map(i => cellToString(row[i])))],
		{ delimiter: options.separator ?? tableOptions.getStringOption('csv.separator'), newline: '\n' },
	);
	writeFileSync(target, text + '\n', 'utf-8');
	log('wrote %d rows to %s', table.length, target);
	return target;
}

/**
 * Reads a CSV file with a header line. Header names are trimmed and runs of
 * spaces become `_`; cells are trimmed and converted by `bestConvert`.
 *
 * @throws LoadError for malformed files
 */
export function loadCSV(path: string, options: LoadCSVOptions = {}): Table {
	const separator = options.separator ?? tableOptions.getStringOption('csv.separator');
	const keepNone = options.keepNone ?? tableOptions.getBooleanOption('csv.keepNone');
	const parsed = Papa.parse<string[]>(readFileSync(path, 'utf-8'), {
		delimiter: separator,
		skipEmptyLines: true,
	});
	if (parsed.errors.length > 0) {
		const [first] = parsed.errors;
		throw new LoadError(`can not parse ${path}: ${first.message} (row ${first.row})`);
	}
	const [header, ...lines] = parsed.data;
	if (!header) {
		throw new LoadError(`${path} has no header line`);
	}
	const names = header.map(name => name.trim().replace(/ +/g, '_'));
	const convert = (text: string): CellValue => (!keepNone && text === 'None' ? null : bestConvert(text));
	const rows: Row[] = lines.map((line, i) => {
		if (line.length !== names.length) {
			throw new LoadError(`line ${i + 2} of ${path} has ${line.length} fields, expected ${names.length}`);
		}
		return line.map(cell => convert(cell.trim()));
	});

	const types = names.map((_, i) => commonTypeFor(rows.map(row => row[i])));
	const formats = names.map((name, i) => {
		const special = options.formats?.[name];
		return special !== undefined ? special : guessFormatFor(name, types[i]);
	});
	log('read %d rows x %d columns from %s', rows.length, names.length, path);
	return new Table(names, types, formats, rows, {
		title: basename(path),
		meta: { loaded_from: resolve(path) },
		allowPostfixes: true,
	});
}
