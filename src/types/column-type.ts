import type { CellValue } from '../common/types.js';

/**
 * Column types define which values a column holds and how values are
 * normalized when a row is written.
 */
export interface ColumnType {
	// Identity
	/** Type name (e.g., "int", "str", "Table"); also the persisted form */
	readonly name: string;

	// Validation
	/** Check if a non-null value belongs to this type */
	accepts(value: CellValue): boolean;
	/** Convert a value to the canonical form; throws TypeError when impossible */
	coerce?(value: CellValue): CellValue;

	// Rendering
	/** Format used when none is given and the column name gives no hint */
	readonly defaultFormat?: string;

	// Metadata
	/** Is this a numeric type? */
	readonly isNumeric?: boolean;
	/** Is this a textual type? */
	readonly isTextual?: boolean;
	/**
	 * Marks vectorized numeric containers (typed arrays and friends).
	 * Such types are never accepted as declared column types.
	 */
	readonly numericContainer?: boolean;
}

export function isColumnType(value: unknown): value is ColumnType {
	return typeof value === 'object'
		&& value !== null
		&& 'name' in value
		&& typeof value.name === 'string'
		&& 'accepts' in value
		&& typeof value.accepts === 'function';
}
