/**
 * Binary encoding of cell values for persistent storage.
 *
 * Every value starts with a type prefix byte:
 *   0x00 - NULL
 *   0x01 - FALSE
 *   0x02 - TRUE
 *   0x03 - INTEGER (safe integer, big-endian int64)
 *   0x04 - REAL (IEEE 754, big-endian)
 *   0x05 - BIGINT (length-prefixed decimal text)
 *   0x06 - TEXT (length-prefixed UTF-8)
 *   0x07 - BYTES (length-prefixed)
 *   0x08 - LIST (element count, then the elements)
 *   0x09 - RECORD (entry count, then key text and value per entry)
 *   0x0A - OBJECT (codec name text, length-prefixed payload)
 *
 * Lengths and counts are variable-length unsigned integers.
 * Objects (tables, blobs, domain cells) are written by the codec registered
 * under their `cellType`.
 */

import { LoadError, TypeMismatchError } from '../common/errors.js';
import { createLogger } from '../common/logger.js';
import { isCellList, isHashable, type CellRecord, type CellValue, type Hashable } from '../common/types.js';
import { sha256Hex } from '../util/hash.js';

const log = createLogger('io:codec');
const warnLog = log.extend('warn');

const TYPE_NULL = 0x00;
const TYPE_FALSE = 0x01;
const TYPE_TRUE = 0x02;
const TYPE_INTEGER = 0x03;
const TYPE_REAL = 0x04;
const TYPE_BIGINT = 0x05;
const TYPE_TEXT = 0x06;
const TYPE_BYTES = 0x07;
const TYPE_LIST = 0x08;
const TYPE_RECORD = 0x09;
const TYPE_OBJECT = 0x0a;

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder('utf-8', { fatal: true });

// ============================================================================
// Object codecs
// ============================================================================

/**
 * Decoding state shared by all values of one payload.
 * Content-identical objects decode to one shared instance.
 */
export interface DecodeSession {
	readonly objects: Map<string, Hashable>;
}

export function createDecodeSession(): DecodeSession {
	return { objects: new Map() };
}

/**
 * Writes and reads one kind of content-hashable cell object.
 * `name` must equal the `cellType` of the objects it handles.
 */
export interface ObjectCodec<T extends Hashable = Hashable> {
	readonly name: string;
	is(value: Hashable): value is T;
	encode(value: T): Uint8Array;
	decode(payload: Uint8Array, session: DecodeSession): T;
}

const objectCodecs = new Map<string, ObjectCodec>();

/**
 * Register a codec for a cell object type.
 */
export function registerObjectCodec<T extends Hashable>(codec: ObjectCodec<T>): void {
	if (objectCodecs.has(codec.name)) {
		warnLog('Overwriting existing object codec: %s', codec.name);
	}
	objectCodecs.set(codec.name, codec);
}

export function getObjectCodec(name: string): ObjectCodec | undefined {
	return objectCodecs.get(name);
}

// ============================================================================
// Writing
// ============================================================================

/**
 * Accumulates encoded values.
 */
export class ValueWriter {
	private chunks: Uint8Array[] = [];
	private size = 0;

	writeByte(byte: number): this {
		return this.writeBytes(new Uint8Array([byte]));
	}

	writeBytes(bytes: Uint8Array): this {
		this.chunks.push(bytes);
		this.size += bytes.length;
		return this;
	}

	/**
	 * Unsigned integer as a variable-length byte sequence.
	 * Uses high bit continuation: 1xxxxxxx means more bytes follow.
	 */
	writeVarInt(value: number): this {
		if (value < 0 || !Number.isInteger(value)) throw new TypeMismatchError('VarInt must be a non-negative integer');

		const bytes: number[] = [];
		do {
			let byte = value % 0x80;
			value = Math.floor(value / 0x80);
			if (value > 0) byte |= 0x80;
			bytes.push(byte);
		} while (value > 0);

		return this.writeBytes(new Uint8Array(bytes));
	}

	writeText(text: string): this {
		const bytes = textEncoder.encode(text);
		return this.writeVarInt(bytes.length).writeBytes(bytes);
	}

	writeValue(value: CellValue): this {
		if (value === null) return this.writeByte(TYPE_NULL);

		switch (typeof value) {
			case 'boolean':
				return this.writeByte(value ? TYPE_TRUE : TYPE_FALSE);
			case 'number':
				return Number.isSafeInteger(value) && !Object.is(value, -0)
					? this.writeInteger(value)
					: this.writeReal(value);
			case 'bigint':
				return this.writeByte(TYPE_BIGINT).writeText(value.toString());
			case 'string':
				return this.writeByte(TYPE_TEXT).writeText(value);
		}

		if (value instanceof Uint8Array) {
			return this.writeByte(TYPE_BYTES).writeVarInt(value.length).writeBytes(value);
		}
		if (isCellList(value)) {
			this.writeByte(TYPE_LIST).writeVarInt(value.length);
			for (const item of value) this.writeValue(item);
			return this;
		}
		if (isHashable(value)) {
			return this.writeObject(value);
		}
		return this.writeRecord(value);
	}

	/** Concatenation of everything written so far. */
	bytes(): Uint8Array {
		const result = new Uint8Array(this.size);
		let offset = 0;
		for (const chunk of this.chunks) {
			result.set(chunk, offset);
			offset += chunk.length;
		}
		return result;
	}

	private writeInteger(value: number): this {
		const buffer = new Uint8Array(9);
		buffer[0] = TYPE_INTEGER;
		new DataView(buffer.buffer).setBigInt64(1, BigInt(value), false);
		return this.writeBytes(buffer);
	}

	private writeReal(value: number): this {
		const buffer = new Uint8Array(9);
		buffer[0] = TYPE_REAL;
		new DataView(buffer.buffer).setFloat64(1, value, false);
		return this.writeBytes(buffer);
	}

	private writeRecord(value: CellRecord): this {
		const entries = Object.entries(value);
		this.writeByte(TYPE_RECORD).writeVarInt(entries.length);
		for (const [key, item] of entries) {
			this.writeText(key).writeValue(item);
		}
		return this;
	}

	private writeObject(value: Hashable): this {
		const name = value.cellType;
		const codec = name === undefined ? undefined : objectCodecs.get(name);
		if (!codec || !codec.is(value)) {
			throw new TypeMismatchError(`no codec registered for cell objects of type ${name ?? value.constructor.name}`);
		}
		const payload = codec.encode(value);
		return this.writeByte(TYPE_OBJECT).writeText(codec.name).writeVarInt(payload.length).writeBytes(payload);
	}
}

/**
 * Encode a single cell value.
 */
export function encodeValue(value: CellValue): Uint8Array {
	return new ValueWriter().writeValue(value).bytes();
}

// ============================================================================
// Reading
// ============================================================================

/**
 * Reads values from an encoded buffer.
 * @throws LoadError for truncated input and unknown type prefixes
 */
export class ValueReader {
	private offset: number;

	constructor(
		private readonly buffer: Uint8Array,
		readonly session: DecodeSession = createDecodeSession(),
		offset: number = 0,
	) {
		this.offset = offset;
	}

	get position(): number {
		return this.offset;
	}

	get done(): boolean {
		return this.offset >= this.buffer.length;
	}

	readByte(): number {
		this.require(1, 'type byte');
		return this.buffer[this.offset++];
	}

	readBytes(length: number): Uint8Array {
		this.require(length, `${length} bytes`);
		const bytes = this.buffer.slice(this.offset, this.offset + length);
		this.offset += length;
		return bytes;
	}

	readVarInt(): number {
		let result = 0;
		let factor = 1;
		for (;;) {
			this.require(1, 'VarInt byte');
			const byte = this.buffer[this.offset++];
			result += (byte & 0x7f) * factor;
			if ((byte & 0x80) === 0) break;
			factor *= 0x80;
			if (factor > Number.MAX_SAFE_INTEGER) {
				throw new LoadError('VarInt too large');
			}
		}
		return result;
	}

	readText(): string {
		const bytes = this.readBytes(this.readVarInt());
		try {
			return textDecoder.decode(bytes);
		} catch (e) {
			throw new LoadError('invalid UTF-8 text', e instanceof Error ? e : undefined);
		}
	}

	readValue(): CellValue {
		const typePrefix = this.readByte();

		switch (typePrefix) {
			case TYPE_NULL:
				return null;
			case TYPE_FALSE:
				return false;
			case TYPE_TRUE:
				return true;
			case TYPE_INTEGER:
				return Number(new DataView(this.readBytes(8).buffer).getBigInt64(0, false));
			case TYPE_REAL:
				return new DataView(this.readBytes(8).buffer).getFloat64(0, false);
			case TYPE_BIGINT:
				return this.readBigInt();
			case TYPE_TEXT:
				return this.readText();
			case TYPE_BYTES:
				return this.readBytes(this.readVarInt());
			case TYPE_LIST: {
				const count = this.readVarInt();
				const items: CellValue[] = [];
				for (let i = 0; i < count; i++) items.push(this.readValue());
				return items;
			}
			case TYPE_RECORD: {
				const count = this.readVarInt();
				const record: Record<string, CellValue> = {};
				for (let i = 0; i < count; i++) {
					const key = this.readText();
					record[key] = this.readValue();
				}
				return record;
			}
			case TYPE_OBJECT:
				return this.readObject();
			default:
				throw new LoadError(`Unknown type prefix: 0x${typePrefix.toString(16)} at offset ${this.offset - 1}`);
		}
	}

	private readBigInt(): bigint {
		const text = this.readText();
		if (!/^-?\d+$/.test(text)) {
			throw new LoadError(`invalid big integer text '${text}'`);
		}
		return BigInt(text);
	}

	private readObject(): Hashable {
		const name = this.readText();
		const payload = this.readBytes(this.readVarInt());
		const codec = objectCodecs.get(name);
		if (!codec) {
			throw new LoadError(`no codec registered for cell objects of type ${name}`);
		}
		const key = `${name}:${sha256Hex(payload)}`;
		const known = this.session.objects.get(key);
		if (known) return known;
		const decoded = codec.decode(payload, this.session);
		this.session.objects.set(key, decoded);
		return decoded;
	}

	private require(count: number, what: string): void {
		if (this.offset + count > this.buffer.length) {
			throw new LoadError(`Buffer underflow: expected ${what} at offset ${this.offset}`);
		}
	}
}

/**
 * Decode a buffer holding exactly one value.
 * @throws LoadError when bytes are left over
 */
export function decodeValue(buffer: Uint8Array, session?: DecodeSession): CellValue {
	const reader = new ValueReader(buffer, session);
	const value = reader.readValue();
	if (!reader.done) {
		throw new LoadError(`${buffer.length - reader.position} trailing bytes after encoded value`);
	}
	return value;
}
