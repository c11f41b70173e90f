import { isCellList, isHashable, type CellRecord, type CellValue, type Hashable } from '../common/types.js';

/** Value classes in their sort order */
enum ValueClass {
	NULL = 0,
	NUMERIC = 1, // boolean, number, bigint
	TEXT = 2,
	BYTES = 3,
	LIST = 4,
	RECORD = 5,
	OBJECT = 6,
}

function getValueClass(v: CellValue): ValueClass {
	if (v === null) return ValueClass.NULL;

	const type = typeof v;
	if (type === 'number' || type === 'boolean' || type === 'bigint') return ValueClass.NUMERIC;
	if (type === 'string') return ValueClass.TEXT;
	if (v instanceof Uint8Array) return ValueClass.BYTES;
	if (isCellList(v)) return ValueClass.LIST;
	if (isHashable(v)) return ValueClass.OBJECT;
	return ValueClass.RECORD;
}

function toNumeric(v: boolean | number | bigint): number | bigint {
	return typeof v === 'boolean' ? (v ? 1 : 0) : v;
}

/**
 * NaN equals NaN and sorts below every other number.
 */
function compareNumbers(a: number | bigint, b: number | bigint): number {
	const nanA = typeof a === 'number' && Number.isNaN(a);
	const nanB = typeof b === 'number' && Number.isNaN(b);
	if (nanA || nanB) {
		return nanA === nanB ? 0 : nanA ? -1 : 1;
	}
	return a < b ? -1 : a > b ? 1 : 0;
}

function compareStrings(a: string, b: string): number {
	return a < b ? -1 : a > b ? 1 : 0;
}

function compareBytes(a: Uint8Array, b: Uint8Array): number {
	const len = Math.min(a.length, b.length);
	for (let i = 0; i < len; i++) {
		if (a[i] !== b[i]) {
			return a[i] < b[i] ? -1 : 1;
		}
	}
	return a.length < b.length ? -1 : a.length > b.length ? 1 : 0;
}

function compareLists(a: readonly CellValue[], b: readonly CellValue[]): number {
	const len = Math.min(a.length, b.length);
	for (let i = 0; i < len; i++) {
		const cmp = compareCells(a[i], b[i]);
		if (cmp !== 0) return cmp;
	}
	return a.length < b.length ? -1 : a.length > b.length ? 1 : 0;
}

function compareRecords(a: CellRecord, b: CellRecord): number {
	const keysA = Object.keys(a).sort();
	const keysB = Object.keys(b).sort();
	const len = Math.min(keysA.length, keysB.length);
	for (let i = 0; i < len; i++) {
		const keyCmp = compareStrings(keysA[i], keysB[i]);
		if (keyCmp !== 0) return keyCmp;
		const valueCmp = compareCells(a[keysA[i]], b[keysB[i]]);
		if (valueCmp !== 0) return valueCmp;
	}
	return keysA.length < keysB.length ? -1 : keysA.length > keysB.length ? 1 : 0;
}

function compareHashables(a: Hashable, b: Hashable): number {
	if (a === b) return 0;
	if (a.equals?.(b)) return 0;
	return compareStrings(a.uniqueId(), b.uniqueId());
}

/**
 * Total order over cell values, used for sorting, grouping and deduplication.
 * Order of classes: null < numeric (booleans count as 0 / 1) < text < bytes <
 * list < record < content-hashable objects. Lists and records compare
 * element-wise, objects by their content digest.
 *
 * @returns -1 if a < b, 0 if a equals b, 1 if a > b
 */
export function compareCells(a: CellValue, b: CellValue): number {
	const classA = getValueClass(a);
	const classB = getValueClass(b);

	if (classA !== classB) {
		return classA < classB ? -1 : 1;
	}

	switch (classA) {
		case ValueClass.NULL:
			return 0;
		case ValueClass.NUMERIC:
			if ((typeof a === 'number' || typeof a === 'boolean' || typeof a === 'bigint')
				&& (typeof b === 'number' || typeof b === 'boolean' || typeof b === 'bigint')) {
				return compareNumbers(toNumeric(a), toNumeric(b));
			}
			return 0;
		case ValueClass.TEXT:
			return typeof a === 'string' && typeof b === 'string' ? compareStrings(a, b) : 0;
		case ValueClass.BYTES:
			return a instanceof Uint8Array && b instanceof Uint8Array ? compareBytes(a, b) : 0;
		case ValueClass.LIST:
			return isCellList(a) && isCellList(b) ? compareLists(a, b) : 0;
		case ValueClass.OBJECT:
			return isHashable(a) && isHashable(b) ? compareHashables(a, b) : 0;
		case ValueClass.RECORD:
			return isRecord(a) && isRecord(b) ? compareRecords(a, b) : 0;
	}
}

function isRecord(v: CellValue): v is CellRecord {
	return getValueClass(v) === ValueClass.RECORD;
}

/**
 * Lexicographic comparison of two rows (or key tuples).
 */
export function compareRows(a: readonly CellValue[], b: readonly CellValue[]): number {
	return compareLists(a, b);
}

/** Deep structural equality of two cells. */
export function cellsEqual(a: CellValue, b: CellValue): boolean {
	return compareCells(a, b) === 0;
}

/** True for numbers, bigints and booleans (NaN included). */
export function isNumericValue(v: CellValue): v is number | bigint | boolean {
	return getValueClass(v) === ValueClass.NUMERIC;
}
