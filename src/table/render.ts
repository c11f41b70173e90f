import type { CellValue, Row } from '../common/types.js';
import type { ColumnType } from '../types/column-type.js';
import type { CellFormatter, ColumnFormat } from '../util/format.js';

/** What the renderer needs to know about a table. */
export interface RenderSource {
	readonly names: readonly string[];
	readonly types: readonly ColumnType[];
	readonly formats: readonly ColumnFormat[];
	readonly formatters: readonly CellFormatter[];
	readonly rows: readonly Row[];
}

export interface RenderOptions {
	/** Minimum column width */
	width?: number;
	/** Elide the middle rows of longer tables; null renders everything */
	maxLines?: number | null;
	/** Printed above the columns, underlined */
	title?: string | null;
}

/**
 * Renders the visible columns (format not null) as aligned text: names,
 * type names, a separator line and the formatted rows.
 *
 * With `maxLines` set and more rows than that, the first `maxLines / 2`
 * rows are followed by `...` and the last `maxLines / 2 + 1` rows.
 */
export function renderTable(source: RenderSource, options: Required<RenderOptions>): string {
	const visible = source.formats
		.map((format, index) => ({ format, index }))
		.filter(({ format }) => format !== null);

	const formatCell = (row: readonly CellValue[], column: number): string =>
		source.formatters[column](row[column]) ?? '-';

	const widths = visible.map(({ index }) => {
		let widest = 1;
		for (const row of source.rows) {
			widest = Math.max(widest, formatCell(row, index).length);
		}
		return Math.max(widest, source.names[index].length, options.width);
	});

	const line = (cells: readonly string[]) =>
		cells.map((cell, i) => cell.padEnd(widths[i])).join(' ').trimEnd();
	const rowLine = (row: readonly CellValue[]) => line(visible.map(({ index }) => formatCell(row, index)));

	const lines: string[] = [];
	if (options.title !== null) {
		lines.push(options.title, '='.repeat(options.title.length));
	}
	lines.push(line(visible.map(({ index }) => source.names[index])));
	lines.push(line(visible.map(({ index }) => source.types[index].name)));
	lines.push(line(visible.map(() => '------')));

	const rows = source.rows;
	if (options.maxLines !== null && rows.length > options.maxLines) {
		const half = Math.floor(options.maxLines / 2);
		for (const row of rows.slice(0, half)) lines.push(rowLine(row));
		lines.push('...');
		for (const row of rows.slice(rows.length - half - 1)) lines.push(rowLine(row));
	} else {
		for (const row of rows) lines.push(rowLine(row));
	}
	return lines.join('\n') + '\n';
}
