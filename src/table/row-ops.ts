import { BTree } from 'digitree';
import { ShapeMismatchError } from '../common/errors.js';
import { createLogger } from '../common/logger.js';
import { isCellList, isCellRecord, type CellRecord, type CellValue, type Row } from '../common/types.js';
import { isTruthy } from '../expr/evaluate.js';
import { compareCells, compareRows } from '../util/comparison.js';

const log = createLogger('table:rows');

/**
 * Copies a cell. Lists, records and bytes are copied; content-hashable
 * objects are immutable by contract and shared.
 */
export function copyCell(value: CellValue): CellValue {
	if (value instanceof Uint8Array) return value.slice();
	if (isCellList(value)) return value.map(copyCell);
	if (isCellRecord(value)) {
		const copy: Record<string, CellValue> = {};
		for (const [key, item] of Object.entries(value)) copy[key] = copyCell(item);
		return copy;
	}
	return value;
}

export function copyRow(row: readonly CellValue[]): Row {
	return row.map(copyCell);
}

export function copyRecord(record: CellRecord): Record<string, CellValue> {
	const copy: Record<string, CellValue> = {};
	for (const [key, item] of Object.entries(record)) copy[key] = copyCell(item);
	return copy;
}

/**
 * Rows selected by a mask. A single value selects all rows or none.
 * @throws ShapeMismatchError when the mask length is neither 1 nor the row count
 */
export function filterRows(rows: readonly Row[], mask: readonly CellValue[]): Row[] {
	if (mask.length === 1) {
		return isTruthy(mask[0]) ? rows.map(copyRow) : [];
	}
	if (mask.length !== rows.length) {
		throw new ShapeMismatchError(
			`filter result has ${mask.length} values, table has ${rows.length} rows`,
			rows.length,
			mask.length
		);
	}
	const result: Row[] = [];
	for (let i = 0; i < rows.length; i++) {
		if (isTruthy(mask[i])) result.push(copyRow(rows[i]));
	}
	return result;
}

/**
 * Calls `report` with 0, 10, ... 100 as `step` advances through `total`.
 */
export class ProgressReporter {
	private lastDecile = -1;

	constructor(private readonly total: number, private readonly report: (percent: number) => void) {}

	step(done: number): void {
		const decile = this.total === 0 ? 10 : Math.floor((10 * done) / this.total);
		if (decile > this.lastDecile) {
			this.lastDecile = decile;
			this.report(decile * 10);
		}
	}
}

export interface JoinRowsOptions {
	/** Emit unmatched left rows once, padded with nulls */
	outer: boolean;
	rightWidth: number;
	onProgress?: (percent: number) => void;
}

/**
 * Nested loop join. `matches` yields the match mask over the right rows for
 * one left row; a single value matches all right rows or none.
 *
 * @throws ShapeMismatchError when a mask length is neither 1 nor the right row count
 */
export function joinRows(
	leftRows: readonly Row[],
	rightRows: readonly Row[],
	matches: (leftRow: Row, index: number) => readonly CellValue[],
	options: JoinRowsOptions,
): Row[] {
	const result: Row[] = [];
	const progress = options.onProgress ? new ProgressReporter(leftRows.length, options.onProgress) : undefined;
	leftRows.forEach((leftRow, i) => {
		progress?.step(i);
		const mask = matches(leftRow, i);
		let matched = 0;
		if (mask.length === 1) {
			if (isTruthy(mask[0])) {
				for (const rightRow of rightRows) {
					result.push([...copyRow(leftRow), ...copyRow(rightRow)]);
				}
				matched = rightRows.length;
			}
		} else if (mask.length === rightRows.length) {
			for (let j = 0; j < rightRows.length; j++) {
				if (isTruthy(mask[j])) {
					result.push([...copyRow(leftRow), ...copyRow(rightRows[j])]);
					matched++;
				}
			}
		} else {
			throw new ShapeMismatchError(
				`join condition has ${mask.length} values, right table has ${rightRows.length} rows`,
				rightRows.length,
				mask.length
			);
		}
		if (matched === 0 && options.outer) {
			result.push([...copyRow(leftRow), ...new Array<CellValue>(options.rightWidth).fill(null)]);
		}
	});
	progress?.step(leftRows.length);
	return result;
}

export interface RowGroup {
	key: CellValue[];
	rows: Row[];
}

/**
 * Groups rows by the values at `keyIndices`. Groups come in first-seen
 * order and keep the row order within; rows are copied.
 */
export function groupRows(rows: readonly Row[], keyIndices: readonly number[]): RowGroup[] {
	const tree = new BTree<CellValue[], RowGroup>(group => group.key, compareRows);
	const groups: RowGroup[] = [];
	for (const row of rows) {
		const key = keyIndices.map(i => row[i]);
		let group = tree.get(key);
		if (!group) {
			group = { key, rows: [] };
			tree.insert(group);
			groups.push(group);
		}
		group.rows.push(copyRow(row));
	}
	log('grouped %d rows into %d groups', rows.length, groups.length);
	return groups;
}

/** Copies of the distinct rows; the first occurrence is kept. */
export function distinctRows(rows: readonly Row[]): Row[] {
	const seen = new BTree<Row, Row>(row => row, compareRows);
	const result: Row[] = [];
	for (const row of rows) {
		if (seen.insert(row).on) {
			result.push(copyRow(row));
		}
	}
	return result;
}

/**
 * Stable sort permutation over composite keys: `permutation[i]` is the
 * original index of the row that ends up at position `i`. Ties keep their
 * original order for both directions.
 */
export function sortPermutation(rows: readonly Row[], keyIndices: readonly number[], ascending: readonly boolean[]): number[] {
	const permutation = rows.map((_, i) => i);
	permutation.sort((a, b) => {
		for (let k = 0; k < keyIndices.length; k++) {
			const index = keyIndices[k];
			const order = compareCells(rows[a][index], rows[b][index]);
			if (order !== 0) return ascending[k] ? order : -order;
		}
		return a - b;
	});
	return permutation;
}
