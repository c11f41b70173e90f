import { StatusCode } from './types.js';

/**
 * Base class for table engine errors.
 * Carries a status code and an optional underlying cause.
 */
export class TableError extends Error {
	public code: number;
	public cause?: Error;

	constructor(message: string, code: number = StatusCode.ERROR, cause?: Error) {
		super(message);
		this.code = code;
		this.name = 'TableError';
		this.cause = cause;

		// Maintain stack trace in V8
		if (Error.captureStackTrace) {
			Error.captureStackTrace(this, TableError);
		}
	}
}

/**
 * Duplicate, missing or reserved column names
 */
export class SchemaError extends TableError {
	constructor(message: string, code: number = StatusCode.SCHEMA) {
		super(message, code);
		this.name = 'SchemaError';
		Object.setPrototypeOf(this, SchemaError.prototype);
	}
}

/**
 * Row or column lengths that cannot be reconciled
 */
export class ShapeMismatchError extends TableError {
	public expected?: number;
	public actual?: number;

	constructor(message: string, expected?: number, actual?: number) {
		super(message, StatusCode.MISMATCH);
		this.name = 'ShapeMismatchError';
		this.expected = expected;
		this.actual = actual;
		Object.setPrototypeOf(this, ShapeMismatchError.prototype);
	}
}

/**
 * A value or declared column type that does not fit
 */
export class TypeMismatchError extends TableError {
	constructor(message: string, cause?: Error) {
		super(message, StatusCode.MISMATCH, cause);
		this.name = 'TypeMismatchError';
		Object.setPrototypeOf(this, TypeMismatchError.prototype);
	}
}

/**
 * Adding or renaming onto a column name that is already taken
 */
export class NameCollisionError extends TableError {
	constructor(message: string) {
		super(message, StatusCode.CONSTRAINT);
		this.name = 'NameCollisionError';
		Object.setPrototypeOf(this, NameCollisionError.prototype);
	}
}

/**
 * A persisted payload that no known format could read
 */
export class LoadError extends TableError {
	constructor(message: string, cause?: Error) {
		super(message, StatusCode.CORRUPT, cause);
		this.name = 'LoadError';
		Object.setPrototypeOf(this, LoadError.prototype);
	}
}

/**
 * The API was called with arguments it cannot work with
 */
export class ArgumentError extends TableError {
	constructor(message: string = 'invalid argument') {
		super(message, StatusCode.MISUSE);
		this.name = 'ArgumentError';
		Object.setPrototypeOf(this, ArgumentError.prototype);
	}
}

/**
 * Normalizes anything caught in a `catch` clause to an Error.
 */
export function asError(thrown: unknown): Error {
	return thrown instanceof Error ? thrown : new Error(String(thrown));
}
