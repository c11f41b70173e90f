import { LoadError } from '../common/errors.js';
import type { Hashable } from '../common/types.js';
import { ValueReader, ValueWriter, registerObjectCodec } from '../io/codec.js';
import { Cached } from '../util/cached.js';
import { Digest } from '../util/hash.js';

/**
 * Opaque binary payload stored in a cell, e.g. an image or a serialized
 * spectrum. `kind` is a free-form hint such as `'PNG'`.
 */
export class Blob implements Hashable {
	readonly cellType = 'Blob';
	private readonly digest = new Cached(() => {
		const digest = new Digest().update(this.kind ?? '').update('\0');
		return digest.update(this.data).hex();
	});

	constructor(readonly data: Uint8Array, readonly kind: string | null = null) {}

	uniqueId(): string {
		return this.digest.value;
	}

	copy(): Blob {
		return new Blob(this.data.slice(), this.kind);
	}

	equals(other: Hashable): boolean {
		return other instanceof Blob && other.uniqueId() === this.uniqueId();
	}

	get length(): number {
		return this.data.length;
	}

	toString(): string {
		return `<Blob ${this.kind ?? 'data'} ${this.data.length} bytes>`;
	}
}

registerObjectCodec<Blob>({
	name: 'Blob',
	is: (value): value is Blob => value instanceof Blob,
	encode: (blob) => new ValueWriter().writeValue(blob.kind).writeValue(blob.data).bytes(),
	decode: (payload, session) => {
		const reader = new ValueReader(payload, session);
		const kind = reader.readValue();
		const data = reader.readValue();
		if ((kind !== null && typeof kind !== 'string') || !(data instanceof Uint8Array) || !reader.done) {
			throw new LoadError('malformed blob payload');
		}
		return new Blob(data, kind);
	},
});
