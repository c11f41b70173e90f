/**
 * Status codes attached to every table error.
 * Numbering follows the SQLite result codes.
 */
export enum StatusCode {
	OK = 0,
	ERROR = 1,
	INTERNAL = 2,
	CORRUPT = 11,
	NOTFOUND = 12,
	SCHEMA = 17,
	CONSTRAINT = 19,
	MISMATCH = 20,
	MISUSE = 21,
	FORMAT = 24,
	RANGE = 25,
}

/**
 * Capability shared by every object that may be stored in a cell and
 * contribute to a table's content digest: tables, blobs and domain objects.
 */
export interface Hashable {
	/** Name of the registered column type describing this object, e.g. 'Table'. */
	readonly cellType?: string;
	/** Stable hex digest over the full semantic content. */
	uniqueId(): string;
	/** Returns an independent object with identical content. */
	copy(): Hashable;
	/** Optional value equality; defaults to comparing `uniqueId()`. */
	equals?(other: Hashable): boolean;
}

/**
 * A single cell of a table.
 * `null` marks a missing value and is legal in every column.
 */
export type CellValue =
	| null
	| boolean
	| number
	| bigint
	| string
	| Uint8Array
	| Hashable
	| readonly CellValue[]
	| CellRecord;

export interface CellRecord {
	readonly [key: string]: CellValue;
}

/** A row is index-aligned with the table's column registry. */
export type Row = CellValue[];

/** Free-form table annotations. Keys are produced by `metaKey()` when they are not plain names. */
export type Meta = Record<string, CellValue>;

/** Per-process identity of a table, used to key evaluation contexts. */
export type TableRef = number;

export function isHashable(value: CellValue | undefined): value is Hashable {
	return typeof value === 'object'
		&& value !== null
		&& !Array.isArray(value)
		&& !(value instanceof Uint8Array)
		&& 'uniqueId' in value
		&& typeof value.uniqueId === 'function';
}

export function isCellRecord(value: CellValue | undefined): value is CellRecord {
	return typeof value === 'object'
		&& value !== null
		&& !Array.isArray(value)
		&& !(value instanceof Uint8Array)
		&& !isHashable(value);
}

export function isCellList(value: CellValue | undefined): value is readonly CellValue[] {
	return Array.isArray(value);
}

/**
 * Keys of the meta mapping: either a plain annotation name or a reference to
 * another table (join provenance).
 */
export type MetaKey =
	| { kind: 'name'; name: string }
	| { kind: 'table'; ref: TableRef };

const TABLE_KEY_PREFIX = '@table:';

export function metaKey(key: MetaKey): string {
	return key.kind === 'name' ? key.name : `${TABLE_KEY_PREFIX}${key.ref}`;
}

export function parseMetaKey(key: string): MetaKey {
	if (key.startsWith(TABLE_KEY_PREFIX)) {
		const ref = Number(key.slice(TABLE_KEY_PREFIX.length));
		if (Number.isInteger(ref)) {
			return { kind: 'table', ref };
		}
	}
	return { kind: 'name', name: key };
}
