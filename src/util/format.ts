import { SchemaError } from '../common/errors.js';
import { isCellList, isHashable, type CellValue } from '../common/types.js';
import type { ColumnType } from '../types/column-type.js';
import { createLogger } from '../common/logger.js';

const log = createLogger('util:format');
const warnLog = log.extend('warn');

/**
 * A column format: `null` hides the column, a string starting with `%` is a
 * printf-style interpolation, anything else names a registered formatter.
 */
export type ColumnFormat = string | null;

/** Renders one cell; `null` means the column is hidden. */
export type CellFormatter = (value: CellValue) => string | null;

/** Renders one non-null cell for a named format. */
export type NamedFormatter = (value: CellValue) => string;

const namedFormatters = new Map<string, NamedFormatter>();

const objectIds = new WeakMap<object, number>();
let nextObjectId = 1;

/** Process-local identifier of an object, assigned on first use. */
export function objectId(value: object): number {
	let id = objectIds.get(value);
	if (id === undefined) {
		id = nextObjectId++;
		objectIds.set(value, id);
	}
	return id;
}

/**
 * Register a named formatter, usable as a column format.
 */
export function registerFormatter(name: string, formatter: NamedFormatter): void {
	if (name.startsWith('%')) {
		throw new SchemaError(`formatter name ${name} must not start with '%'`);
	}
	if (namedFormatters.has(name)) {
		warnLog('Overwriting existing formatter: %s', name);
	}
	namedFormatters.set(name, formatter);
}

export function getFormatter(name: string): NamedFormatter | undefined {
	return namedFormatters.get(name);
}

/** Seconds rendered as minutes with two decimals, e.g. `'1.50m'`. */
export const MINUTES_FORMAT = 'minutes';
/** Hex object id of the cell. */
export const HEX_ID_FORMAT = 'hexId';

registerFormatter(MINUTES_FORMAT, (value) => {
	const seconds = toFloat(value);
	return `${(seconds / 60).toFixed(2)}m`;
});

registerFormatter(HEX_ID_FORMAT, (value) => {
	if (typeof value === 'object' && value !== null) {
		return objectId(value).toString(16);
	}
	return formatHex(toInteger(value), false);
});

// --- printf subset ---

const CONVERSION_PATTERN = /%([-0]*)(\d+)?(?:\.(\d+))?([diusrfFeEgGxX%])/g;

function toFloat(value: CellValue): number {
	if (typeof value === 'number') return value;
	if (typeof value === 'bigint') return Number(value);
	if (typeof value === 'boolean') return value ? 1 : 0;
	throw new TypeError(`a number is required, not ${describeValue(value)}`);
}

function toInteger(value: CellValue): number | bigint {
	if (typeof value === 'bigint') return value;
	const num = toFloat(value);
	if (!Number.isFinite(num)) {
		throw new TypeError(`cannot convert ${num} to integer`);
	}
	return Math.trunc(num);
}

function describeValue(value: CellValue): string {
	if (value === null) return 'None';
	if (value instanceof Uint8Array) return 'bytes';
	if (isCellList(value)) return 'list';
	if (isHashable(value)) return value.cellType ?? value.constructor.name;
	return typeof value;
}

function nonFinite(value: number): string | undefined {
	if (Number.isNaN(value)) return 'nan';
	if (value === Infinity) return 'inf';
	if (value === -Infinity) return '-inf';
	return undefined;
}

/** Two digit exponent, e.g. `1.5e+05` */
function normalizeExponent(text: string): string {
	return text.replace(/e([+-])(\d)$/, 'e$10$2');
}

function formatGeneral(value: number, precision: number): string {
	const special = nonFinite(value);
	if (special !== undefined) return special;
	const p = precision === 0 ? 1 : precision;
	if (value === 0) return '0';
	const exponent = Number(value.toExponential(p - 1).split('e')[1]);
	if (exponent >= -4 && exponent < p) {
		const fixed = value.toFixed(p - 1 - exponent);
		return fixed.includes('.') ? fixed.replace(/\.?0+$/, '') : fixed;
	}
	const [mantissa, exp] = value.toExponential(p - 1).split('e');
	const trimmed = mantissa.includes('.') ? mantissa.replace(/\.?0+$/, '') : mantissa;
	return normalizeExponent(`${trimmed}e${exp}`);
}

function formatHex(value: number | bigint, upper: boolean): string {
	const negative = value < 0;
	const text = (typeof value === 'bigint' ? (negative ? -value : value) : Math.abs(value)).toString(16);
	return (negative ? '-' : '') + (upper ? text.toUpperCase() : text);
}

function convertOne(conversion: string, precision: number | undefined, value: CellValue): string {
	switch (conversion) {
		case 'd':
		case 'i':
		case 'u':
			return toInteger(value).toString();
		case 's':
			return cellToString(value);
		case 'r':
			return cellRepr(value);
		case 'f':
		case 'F': {
			const num = toFloat(value);
			return nonFinite(num) ?? num.toFixed(precision ?? 6);
		}
		case 'e':
		case 'E': {
			const num = toFloat(value);
			const text = nonFinite(num) ?? normalizeExponent(num.toExponential(precision ?? 6));
			return conversion === 'E' ? text.toUpperCase() : text;
		}
		case 'g':
		case 'G': {
			const text = formatGeneral(toFloat(value), precision ?? 6);
			return conversion === 'G' ? text.toUpperCase() : text;
		}
		case 'x':
		case 'X':
			return formatHex(toInteger(value), conversion === 'X');
		default:
			throw new TypeError(`unsupported format character '${conversion}'`);
	}
}

function pad(text: string, width: number | undefined, flags: string, numeric: boolean): string {
	if (width === undefined || text.length >= width) return text;
	if (flags.includes('-')) return text.padEnd(width);
	if (flags.includes('0') && numeric) {
		const sign = text.startsWith('-') ? '-' : '';
		return sign + text.slice(sign.length).padStart(width - sign.length, '0');
	}
	return text.padStart(width);
}

/**
 * Interpolates a single value into a printf-style format.
 * @throws TypeError when the format does not hold exactly one conversion or
 * the value does not fit it
 */
export function interpolate(format: string, value: CellValue): string {
	let conversions = 0;
	const result = format.replace(CONVERSION_PATTERN, (_match, flags: string, width: string | undefined, precision: string | undefined, conversion: string) => {
		if (conversion === '%') return '%';
		conversions++;
		if (conversions > 1) {
			throw new TypeError('not enough arguments for format string');
		}
		const text = convertOne(conversion, precision === undefined ? undefined : Number(precision), value);
		const numeric = !'sr'.includes(conversion);
		return pad(text, width === undefined ? undefined : Number(width), flags, numeric);
	});
	if (conversions === 0) {
		throw new TypeError('not all arguments converted during string formatting');
	}
	return result;
}

// --- plain rendering ---

/**
 * Plain text of a cell: `None` for null, strings as they are, lists and
 * records with their elements in repr form.
 */
export function cellToString(value: CellValue): string {
	if (value === null) return 'None';
	switch (typeof value) {
		case 'string': return value;
		case 'boolean': return value ? 'True' : 'False';
		case 'number': return nonFinite(value) ?? String(value);
		case 'bigint': return value.toString();
	}
	if (value instanceof Uint8Array) {
		return `b'${Buffer.from(value).toString('hex')}'`;
	}
	if (isCellList(value)) {
		return `[${value.map(cellRepr).join(', ')}]`;
	}
	if (isHashable(value)) {
		if (value.toString !== Object.prototype.toString) {
			return value.toString();
		}
		return `<${value.cellType ?? value.constructor.name} ${value.uniqueId().slice(0, 8)}>`;
	}
	return `{${Object.entries(value).map(([k, v]) => `${cellRepr(k)}: ${cellRepr(v)}`).join(', ')}}`;
}

/** Like `cellToString` but strings are quoted. */
export function cellRepr(value: CellValue): string {
	if (typeof value === 'string') {
		return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
	}
	return cellToString(value);
}

// --- column formatters ---

/**
 * Compiles a column format to a cell formatter.
 * - `null`: hidden column, every cell renders as `null`
 * - `%...`: interpolation; `null` cells render as `-`, failures as `''`
 * - otherwise: the registered formatter of that name; `null` cells render as `-`
 *
 * @throws SchemaError for unknown formatter names
 */
export function compileFormatter(format: ColumnFormat): CellFormatter {
	if (format === null) {
		return () => null;
	}
	if (format.startsWith('%')) {
		return (value) => {
			if (value === null) return '-';
			try {
				return interpolate(format, value);
			} catch (e) {
				log('format %s failed for %s: %s', format, describeValue(value), e instanceof Error ? e.message : String(e));
				return '';
			}
		};
	}
	const named = namedFormatters.get(format);
	if (!named) {
		throw new SchemaError(`unknown column format '${format}'`);
	}
	return (value) => (value === null ? '-' : named(value));
}

/**
 * Format used for a column when none is declared: `int` / `float` columns
 * whose name starts with `m` get five decimals, with `rt` are rendered as
 * minutes; other columns use their type's default, else `%r`.
 */
export function guessFormatFor(name: string, type: ColumnType): string {
	if (type.name === 'int' || type.name === 'float') {
		if (name.startsWith('m')) return '%.5f';
		if (name.startsWith('rt')) return MINUTES_FORMAT;
	}
	return type.defaultFormat ?? '%r';
}
