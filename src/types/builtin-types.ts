import { isCellList, isCellRecord, isHashable, type CellValue } from '../common/types.js';
import type { ColumnType } from './column-type.js';

const INTEGER_PATTERN = /^[+-]?\d+$/;
const SPECIAL_FLOATS: Record<string, number> = {
	'nan': NaN,
	'inf': Infinity,
	'+inf': Infinity,
	'-inf': -Infinity,
	'infinity': Infinity,
	'+infinity': Infinity,
	'-infinity': -Infinity,
};

/**
 * Parses text the way a strict integer constructor would: optional sign and
 * digits only. Returns undefined when the text is not an integer.
 */
export function parseIntegerText(text: string): number | bigint | undefined {
	const trimmed = text.trim();
	if (!INTEGER_PATTERN.test(trimmed)) return undefined;
	const parsed = Number(trimmed);
	return Number.isSafeInteger(parsed) ? parsed : BigInt(trimmed);
}

/**
 * Parses text as a float, accepting exponent notation and the special
 * values nan / inf. Returns undefined when the text is not a number.
 */
export function parseFloatText(text: string): number | undefined {
	const trimmed = text.trim();
	if (trimmed === '') return undefined;
	const special = SPECIAL_FLOATS[trimmed.toLowerCase()];
	if (special !== undefined) return special;
	const parsed = Number(trimmed);
	return Number.isNaN(parsed) ? undefined : parsed;
}

function describe(value: CellValue): string {
	if (value === null) return 'null';
	if (value instanceof Uint8Array) return 'bytes';
	if (isCellList(value)) return 'list';
	if (isHashable(value)) return value.constructor.name;
	return typeof value;
}

/**
 * int - whole numbers (number or bigint)
 */
export const INT_TYPE: ColumnType = {
	name: 'int',
	isNumeric: true,
	defaultFormat: '%d',

	accepts: (v) => (typeof v === 'number' && Number.isInteger(v)) || typeof v === 'bigint',

	coerce: (v) => {
		if (v === null) return null;
		if (typeof v === 'bigint') return v;
		if (typeof v === 'number') {
			if (!Number.isFinite(v)) {
				throw new TypeError(`Cannot convert ${v} to int`);
			}
			return Math.trunc(v);
		}
		if (typeof v === 'boolean') return v ? 1 : 0;
		if (typeof v === 'string') {
			const parsed = parseIntegerText(v);
			if (parsed === undefined) {
				throw new TypeError(`Cannot convert '${v}' to int`);
			}
			return parsed;
		}
		throw new TypeError(`Cannot convert ${describe(v)} to int`);
	},
};

/**
 * float - floating point numbers
 */
export const FLOAT_TYPE: ColumnType = {
	name: 'float',
	isNumeric: true,
	defaultFormat: '%.2f',

	accepts: (v) => typeof v === 'number',

	coerce: (v) => {
		if (v === null) return null;
		if (typeof v === 'number') return v;
		if (typeof v === 'bigint') return Number(v);
		if (typeof v === 'boolean') return v ? 1.0 : 0.0;
		if (typeof v === 'string') {
			const parsed = parseFloatText(v);
			if (parsed === undefined) {
				throw new TypeError(`Cannot convert '${v}' to float`);
			}
			return parsed;
		}
		throw new TypeError(`Cannot convert ${describe(v)} to float`);
	},
};

/**
 * str - text
 */
export const STR_TYPE: ColumnType = {
	name: 'str',
	isTextual: true,
	defaultFormat: '%s',

	accepts: (v) => typeof v === 'string',

	coerce: (v) => {
		if (v === null) return null;
		if (typeof v === 'string') return v;
		if (typeof v === 'number' || typeof v === 'bigint' || typeof v === 'boolean') {
			return String(v);
		}
		if (isHashable(v)) {
			return v.toString();
		}
		throw new TypeError(`Cannot convert ${describe(v)} to str`);
	},
};

/**
 * bool - true / false, no conversion on write
 */
export const BOOL_TYPE: ColumnType = {
	name: 'bool',
	accepts: (v) => typeof v === 'boolean',
};

/**
 * bytes - raw binary content
 */
export const BYTES_TYPE: ColumnType = {
	name: 'bytes',
	accepts: (v) => v instanceof Uint8Array,
};

/**
 * list - ordered sequences of cell values
 */
export const LIST_TYPE: ColumnType = {
	name: 'list',
	accepts: (v) => isCellList(v),
};

/**
 * dict - string keyed records of cell values
 */
export const DICT_TYPE: ColumnType = {
	name: 'dict',
	accepts: (v) => isCellRecord(v),
};

/**
 * object - anything; the fallback when a column mixes value kinds
 */
export const OBJECT_TYPE: ColumnType = {
	name: 'object',
	accepts: () => true,
};

/**
 * Builds the column type of a content-hashable cell class.
 * `cellType` on the stored objects must equal the type name.
 */
export function hashableType(name: string): ColumnType {
	return {
		name,
		accepts: (v) => isHashable(v) && v.cellType === name,
	};
}

/** Nested tables */
export const TABLE_TYPE: ColumnType = hashableType('Table');

/** Binary blobs with a content digest */
export const BLOB_TYPE: ColumnType = hashableType('Blob');

function numericContainer(name: string): ColumnType {
	return {
		name,
		numericContainer: true,
		accepts: () => false,
	};
}

/**
 * Vectorized numeric dtypes. They are known so that a declaration using
 * them fails with a precise message instead of an unknown-type error.
 */
export const NUMERIC_CONTAINER_TYPES: readonly ColumnType[] = [
	'int8', 'int16', 'int32', 'int64',
	'uint8', 'uint16', 'uint32', 'uint64',
	'float16', 'float32', 'float64',
	'Int8Array', 'Int16Array', 'Int32Array', 'BigInt64Array',
	'Uint8ClampedArray', 'Uint16Array', 'Uint32Array', 'BigUint64Array',
	'Float32Array', 'Float64Array',
].map(numericContainer);
