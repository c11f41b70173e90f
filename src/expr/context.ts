import type { CellValue, TableRef } from '../common/types.js';
import type { ColumnType } from '../types/column-type.js';

/**
 * Values of one column (or one evaluated expression).
 * `values` holds a single broadcastable value or one value per row.
 */
export interface ColumnData {
	readonly values: readonly CellValue[];
	/** Values are in ascending order and may be binary searched */
	readonly sorted: boolean;
	readonly type: ColumnType;
}

/** Column data of every table taking part in an evaluation, keyed by table and column name. */
export type EvalContext = Map<TableRef, Map<string, ColumnData>>;

/** Anything that can provide an evaluation context. */
export interface ContextProvider {
	readonly ref: TableRef;
	columnContext(names?: Iterable<string>): Map<string, ColumnData>;
}

/**
 * Merges per-table contexts into one evaluation context.
 */
export function buildContext(...entries: [TableRef, Map<string, ColumnData>][]): EvalContext {
	const context: EvalContext = new Map();
	for (const [ref, columns] of entries) {
		const existing = context.get(ref);
		if (existing) {
			for (const [name, data] of columns) existing.set(name, data);
		} else {
			context.set(ref, new Map(columns));
		}
	}
	return context;
}
