import type { ColumnType } from './column-type.js';
import { isColumnType } from './column-type.js';
import {
	INT_TYPE,
	FLOAT_TYPE,
	STR_TYPE,
	BOOL_TYPE,
	BYTES_TYPE,
	LIST_TYPE,
	DICT_TYPE,
	OBJECT_TYPE,
	TABLE_TYPE,
	BLOB_TYPE,
	NUMERIC_CONTAINER_TYPES,
} from './builtin-types.js';
import { TypeMismatchError } from '../common/errors.js';
import { createLogger } from '../common/logger.js';

const log = createLogger('types:registry');
const warnLog = log.extend('warn');
const debugLog = log.extend('debug');

/** A declared column type: the type itself or its registered name. */
export type ColumnTypeSpec = ColumnType | string;

/**
 * Global type registry that maps type names to column type definitions.
 */
class TypeRegistry {
	private types = new Map<string, ColumnType>();

	constructor() {
		// Register built-in types
		this.registerType(INT_TYPE);
		this.registerType(FLOAT_TYPE);
		this.registerType(STR_TYPE);
		this.registerType(BOOL_TYPE);
		this.registerType(BYTES_TYPE);
		this.registerType(LIST_TYPE);
		this.registerType(DICT_TYPE);
		this.registerType(OBJECT_TYPE);
		this.registerType(TABLE_TYPE);
		this.registerType(BLOB_TYPE);
		for (const container of NUMERIC_CONTAINER_TYPES) {
			this.types.set(container.name, container);
		}

		// Register common aliases
		this.types.set('long', INT_TYPE);
		this.types.set('integer', INT_TYPE);
		this.types.set('number', FLOAT_TYPE);
		this.types.set('string', STR_TYPE);
		this.types.set('boolean', BOOL_TYPE);
		this.types.set('tuple', LIST_TYPE);
	}

	/**
	 * Register a new column type, e.g. for a domain cell class.
	 * @throws TypeMismatchError for numeric container types
	 */
	registerType(type: ColumnType): void {
		if (type.numericContainer) {
			throw new TypeMismatchError(`numeric container type '${type.name}' can not be registered as column type`);
		}
		if (this.types.has(type.name)) {
			warnLog('Overwriting existing type: %s', type.name);
		}
		this.types.set(type.name, type);
		debugLog('Registered type: %s', type.name);
	}

	/**
	 * Get a column type by name.
	 * @returns The column type, or undefined if not found
	 */
	getType(name: string): ColumnType | undefined {
		return this.types.get(name);
	}

	/**
	 * Check if a type is registered.
	 */
	hasType(name: string): boolean {
		return this.types.has(name);
	}

	/**
	 * Get all registered type names (aliases included).
	 */
	getTypeNames(): string[] {
		return Array.from(this.types.keys());
	}

	/**
	 * Resolves a declared type to its definition.
	 * @throws TypeMismatchError for unknown names, numeric containers and non-types
	 */
	resolve(spec: unknown): ColumnType {
		const type = typeof spec === 'string' ? this.types.get(spec) : spec;
		if (type === undefined) {
			throw new TypeMismatchError(`unknown column type '${String(spec)}'`);
		}
		if (!isColumnType(type)) {
			throw new TypeMismatchError(`${describeNonType(spec)} is not a column type`);
		}
		if (type.numericContainer) {
			const replacement = type.name.toLowerCase().includes('float') ? 'float' : 'int';
			throw new TypeMismatchError(
				`numeric container type '${type.name}' is not allowed as column type, use '${replacement}' instead`
			);
		}
		return type;
	}
}

function describeNonType(value: unknown): string {
	if (value === null) return 'null';
	if (typeof value === 'object') return Object.prototype.toString.call(value);
	return `${typeof value} ${String(value)}`;
}

/**
 * Global type registry instance.
 */
export const typeRegistry = new TypeRegistry();

/**
 * Convenience function to register a column type.
 */
export function registerType(type: ColumnType): void {
	typeRegistry.registerType(type);
}

/**
 * Convenience function to look up a column type.
 */
export function getType(name: string): ColumnType | undefined {
	return typeRegistry.getType(name);
}

/**
 * Resolves a declared column type (instance or name).
 */
export function resolveColumnType(spec: unknown): ColumnType {
	return typeRegistry.resolve(spec);
}
