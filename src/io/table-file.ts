/**
 * `.table` file persistence.
 *
 * Layout: a header line `emzed_version=<major>.<minor>.<patch>\n` followed by
 * the encoded list `[names, typeNames, formats, title, meta, rows]`.
 *
 * Older files carry a record keyed by `colNames`, `colTypes`, `colFormats`,
 * `title`, `meta`, `rows` (or the same names with a leading underscore), with
 * or without a header line.
 */

import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import { LoadError, asError } from '../common/errors.js';
import { createLogger } from '../common/logger.js';
import { isCellList, isCellRecord, type CellValue, type Meta, type Row } from '../common/types.js';
import type { ColumnFormat } from '../util/format.js';
import { ValueReader, ValueWriter, createDecodeSession, type DecodeSession } from './codec.js';

const log = createLogger('io:table-file');
const warnLog = log.extend('warn');

export const FILE_HEADER_PREFIX = 'emzed_version=';
export const FORMAT_VERSION: readonly [number, number, number] = [2, 0, 2];

/** Everything a table file holds. */
export interface TableState {
	names: string[];
	typeNames: string[];
	formats: ColumnFormat[];
	title: string | null;
	meta: Meta;
	rows: Row[];
}

export type LoadStage = 'strict' | 'legacy' | 'raw-legacy';

export interface LoadedTable<T> {
	table: T;
	stage: LoadStage;
	/** Version from the header line; null for files without one */
	version: string | null;
}

const NEWLINE = 0x0a;

export function encodeTableState(state: TableState): Uint8Array {
	return new ValueWriter()
		.writeValue([state.names, state.typeNames, state.formats, state.title, state.meta, state.rows])
		.bytes();
}

/**
 * Writes header and payload.
 */
export function writeTableFile(path: string, state: TableState): void {
	const header = new TextEncoder().encode(`${FILE_HEADER_PREFIX}${FORMAT_VERSION.join('.')}\n`);
	const payload = encodeTableState(state);
	const data = new Uint8Array(header.length + payload.length);
	data.set(header, 0);
	data.set(payload, header.length);
	writeFileSync(path, data);
	log('Stored %d rows x %d columns to %s', state.rows.length, state.names.length, path);
}

export function fileExists(path: string): boolean {
	return existsSync(path);
}

// ============================================================================
// Decoding
// ============================================================================

function decodeWhole(buffer: Uint8Array, session: DecodeSession = createDecodeSession()): CellValue {
	const reader = new ValueReader(buffer, session);
	const value = reader.readValue();
	if (!reader.done) {
		throw new LoadError(`${buffer.length - reader.position} trailing bytes after table payload`);
	}
	return value;
}

function expectStrings(value: CellValue, what: string): string[] {
	if (!isCellList(value)) throw new LoadError(`${what} is not a list`);
	return value.map(item => {
		if (typeof item !== 'string') throw new LoadError(`${what} holds a non-text entry`);
		return item;
	});
}

function expectFormats(value: CellValue): ColumnFormat[] {
	if (!isCellList(value)) throw new LoadError('column formats are not a list');
	return value.map(item => {
		if (item !== null && typeof item !== 'string') throw new LoadError('column formats hold a non-text entry');
		return item;
	});
}

function expectTitle(value: CellValue): string | null {
	if (value !== null && typeof value !== 'string') throw new LoadError('title is not text');
	return value;
}

function expectMeta(value: CellValue): Meta {
	if (value === null) return {};
	if (!isCellRecord(value)) throw new LoadError('meta is not a record');
	return { ...value };
}

function expectRows(value: CellValue, width: number): Row[] {
	if (!isCellList(value)) throw new LoadError('rows are not a list');
	return value.map((row, i) => {
		if (!isCellList(row)) throw new LoadError(`row ${i} is not a list`);
		if (row.length !== width) throw new LoadError(`row ${i} has ${row.length} values, expected ${width}`);
		return [...row];
	});
}

function stateFromParts(parts: readonly CellValue[]): TableState {
	const [names, typeNames, formats, title, meta, rows] = parts;
	const state: TableState = {
		names: expectStrings(names, 'column names'),
		typeNames: expectStrings(typeNames, 'column types'),
		formats: expectFormats(formats),
		title: expectTitle(title),
		meta: expectMeta(meta),
		rows: [],
	};
	if (state.typeNames.length !== state.names.length || state.formats.length !== state.names.length) {
		throw new LoadError('column names, types and formats differ in length');
	}
	state.rows = expectRows(rows, state.names.length);
	return state;
}

/**
 * Decodes the payload of a current file, or of a table nested in a cell
 * when called with the session of the enclosing payload.
 */
export function decodeStrict(payload: Uint8Array, session?: DecodeSession): TableState {
	const data = decodeWhole(payload, session);
	if (!isCellList(data)) {
		throw new LoadError('data item from file is not a list');
	}
	if (data.length !== 6) {
		throw new LoadError(`number of data items from file is ${data.length}, expected 6`);
	}
	return stateFromParts(data);
}

const LEGACY_KEYS = ['colNames', 'colTypes', 'colFormats'] as const;

/**
 * Decodes the record layout of older files.
 */
export function decodeLegacy(payload: Uint8Array): TableState {
	const data = decodeWhole(payload);
	if (!isCellRecord(data)) {
		throw new LoadError('legacy payload is not a record');
	}
	const record: Record<string, CellValue> = { ...data };
	const present = LEGACY_KEYS.filter(key => key in record);
	if (present.length > 0) {
		if (present.length !== LEGACY_KEYS.length) {
			throw new LoadError('can not read table, internal mismatch');
		}
		for (const key of LEGACY_KEYS) {
			record[`_${key}`] = record[key];
			delete record[key];
		}
	}
	for (const key of ['_colNames', '_colTypes', '_colFormats', 'rows']) {
		if (!(key in record)) throw new LoadError(`legacy payload lacks ${key}`);
	}
	return stateFromParts([
		record._colNames,
		record._colTypes,
		record._colFormats,
		record.title ?? null,
		record.meta ?? null,
		record.rows,
	]);
}

/**
 * Reads a table file, trying in order: the current layout after a valid
 * header, the legacy layout of the payload, the legacy layout of the whole
 * file. `build` turns a decoded state into the caller's table; its failures
 * fall through to the next stage as well.
 *
 * @throws LoadError when no stage succeeds
 */
export function readTableFile<T>(path: string, build: (state: TableState) => T): LoadedTable<T> {
	const data = new Uint8Array(readFileSync(path));
	const newline = data.indexOf(NEWLINE);
	const headerText = newline >= 0 ? new TextDecoder().decode(data.subarray(0, newline)) : '';
	const payload = newline >= 0 ? data.subarray(newline + 1) : new Uint8Array(0);
	const version = headerText.startsWith(FILE_HEADER_PREFIX) ? headerText.slice(FILE_HEADER_PREFIX.length) : null;

	const stages: [LoadStage, () => TableState][] = [];
	if (version !== null) {
		stages.push(['strict', () => decodeStrict(payload)]);
	}
	stages.push(['legacy', () => decodeLegacy(payload)]);
	stages.push(['raw-legacy', () => decodeLegacy(data)]);

	const failures: string[] = [];
	for (const [stage, decode] of stages) {
		try {
			const table = build(decode());
			log('Loaded %s using the %s layout', path, stage);
			return { table, stage, version };
		} catch (e) {
			const error = asError(e);
			warnLog('%s layout failed for %s: %s', stage, path, error.message);
			failures.push(`${stage}: ${error.message}`);
		}
	}
	throw new LoadError(`can not load ${path}: ${failures.join('; ')}`);
}
