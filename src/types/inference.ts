import { isCellList, isHashable, type CellValue } from '../common/types.js';
import type { ColumnType } from './column-type.js';
import {
	BOOL_TYPE,
	BYTES_TYPE,
	DICT_TYPE,
	FLOAT_TYPE,
	INT_TYPE,
	LIST_TYPE,
	OBJECT_TYPE,
	STR_TYPE,
} from './builtin-types.js';
import { typeRegistry } from './registry.js';

/**
 * Type of a single non-null value.
 * Integral numbers are `int`; content-hashable objects resolve through the
 * registry by their `cellType`.
 */
export function typeOfValue(value: CellValue): ColumnType {
	if (value === null) return OBJECT_TYPE;
	switch (typeof value) {
		case 'boolean': return BOOL_TYPE;
		case 'number': return Number.isInteger(value) ? INT_TYPE : FLOAT_TYPE;
		case 'bigint': return INT_TYPE;
		case 'string': return STR_TYPE;
	}
	if (value instanceof Uint8Array) return BYTES_TYPE;
	if (isCellList(value)) return LIST_TYPE;
	if (isHashable(value)) {
		return (value.cellType !== undefined ? typeRegistry.getType(value.cellType) : undefined) ?? OBJECT_TYPE;
	}
	return DICT_TYPE;
}

const NUMERIC_WIDENING = new Set(['bool', 'int', 'float']);

/**
 * Determines the common column type of a list of values, ignoring nulls.
 *
 * - all values of one type: that type
 * - a mix of bool / int / float: float if any float is present, else int
 * - anything else, or no non-null value at all: object
 */
export function commonTypeFor(values: readonly CellValue[]): ColumnType {
	const seen = new Map<string, ColumnType>();
	for (const value of values) {
		if (value === null) continue;
		const type = typeOfValue(value);
		seen.set(type.name, type);
	}
	if (seen.size === 0) return OBJECT_TYPE;
	if (seen.size === 1) {
		const [only] = seen.values();
		return only;
	}
	if (Array.from(seen.keys()).every(name => NUMERIC_WIDENING.has(name))) {
		return seen.has('float') ? FLOAT_TYPE : INT_TYPE;
	}
	return OBJECT_TYPE;
}

/**
 * Normalizes values to their common type when that type converts values on
 * write (int, float, str). Other lists are returned as given.
 */
export function convertListToOverallType(values: readonly CellValue[]): CellValue[] {
	const type = commonTypeFor(values);
	const coerce = type.coerce;
	if (!coerce) return [...values];
	return values.map(v => (v === null ? null : coerce(v)));
}
