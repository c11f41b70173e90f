import { createHash, type Hash } from 'node:crypto';
import { isCellList, isHashable, type CellValue } from '../common/types.js';

/**
 * Incremental SHA-256 digest. Strings are fed as UTF-8.
 */
export class Digest {
	private readonly hash: Hash = createHash('sha256');

	update(data: string | Uint8Array): this {
		this.hash.update(data);
		return this;
	}

	/**
	 * Feeds a cell value in a canonical, self-delimiting form. Record keys are
	 * sorted; content-hashable objects contribute their own `uniqueId()`.
	 */
	value(value: CellValue): this {
		if (value === null) return this.update('N;');
		switch (typeof value) {
			case 'boolean': return this.update(value ? 'T;' : 'F;');
			case 'number': return this.update(`n${Object.is(value, -0) ? '-0' : String(value)};`);
			case 'bigint': return this.update(`i${value.toString()};`);
			case 'string': return this.update(`s${value.length}:`).update(value);
		}
		if (value instanceof Uint8Array) {
			return this.update(`b${value.length}:`).update(value);
		}
		if (isCellList(value)) {
			this.update(`l${value.length}[`);
			for (const item of value) this.value(item);
			return this.update(']');
		}
		if (isHashable(value)) {
			return this.update(`h${value.cellType ?? ''}:${value.uniqueId()};`);
		}
		const keys = Object.keys(value).sort();
		this.update(`d${keys.length}{`);
		for (const key of keys) {
			this.value(key).value(value[key]);
		}
		return this.update('}');
	}

	hex(): string {
		return this.hash.digest('hex');
	}
}

export function sha256Hex(data: string | Uint8Array): string {
	return new Digest().update(data).hex();
}
