import { SchemaError } from '../common/errors.js';

/** Separator between a column's base name and its postfix tag */
export const POSTFIX_SEPARATOR = '__';

/**
 * Postfix of a column name: `'__<k>'` for tagged names, `''` for untagged
 * names and `null` for internal names (those starting with the separator).
 * @throws SchemaError when the name holds more than one separator
 */
export function getPostfix(name: string): string | null {
	if (name.startsWith(POSTFIX_SEPARATOR)) {
		return null;
	}
	const fields = name.split(POSTFIX_SEPARATOR);
	if (fields.length > 2) {
		throw new SchemaError(`invalid column name ${name}`);
	}
	return fields.length === 1 ? '' : POSTFIX_SEPARATOR + fields[1];
}

/** Numeric value of a postfix; the empty postfix counts as -1. */
export function postfixValue(postfix: string): number {
	if (postfix === '') return -1;
	const value = Number(postfix.slice(POSTFIX_SEPARATOR.length));
	if (!Number.isInteger(value) || value < 0) {
		throw new SchemaError(`postfix ${postfix} is not a non-negative integer tag`);
	}
	return value;
}

/**
 * Distinct postfixes of the given names, internal names skipped.
 */
export function findPostfixes(names: readonly string[]): Set<string> {
	const postfixes = new Set<string>();
	for (const name of names) {
		const postfix = getPostfix(name);
		if (postfix !== null) postfixes.add(postfix);
	}
	return postfixes;
}

/**
 * Numeric tags of the given names. A list without any taggable name yields
 * `[-1]` so that min and max are both -1.
 */
export function postfixValues(names: readonly string[]): number[] {
	const values = Array.from(findPostfixes(names), postfixValue);
	return values.length > 0 ? values : [-1];
}

/**
 * Renumbers every tag by `by`; untagged names count as -1 and get the tag
 * `by - 1`. Internal names are kept as they are.
 */
export function incrementedPostfixes(names: readonly string[], by: number): string[] {
	return names.map(name => {
		const postfix = getPostfix(name);
		if (postfix === null) return name;
		const prefix = postfix === '' ? name : name.slice(0, name.length - postfix.length);
		return `${prefix}${POSTFIX_SEPARATOR}${by + postfixValue(postfix)}`;
	});
}

/**
 * Suffixes shared by columns starting with every one of the given prefixes.
 *
 * For columns `rt, rtmin, rtmax, rt1, rtmin1`:
 * - `['rt']` gives `['', '1', 'max', 'min', 'min1']`
 * - `['rt', 'rtmin']` gives `['', '1']`
 */
export function supportedPostfixes(names: readonly string[], prefixes: readonly string[]): string[] {
	const counter = new Map<string, number>();
	for (const prefix of prefixes) {
		for (const name of names) {
			if (name.startsWith(prefix)) {
				const suffix = name.slice(prefix.length);
				counter.set(suffix, (counter.get(suffix) ?? 0) + 1);
			}
		}
	}
	const supported: string[] = [];
	for (const [suffix, count] of counter) {
		if (count === prefixes.length) supported.push(suffix);
	}
	return supported.sort();
}
