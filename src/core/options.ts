/**
 * Centralized table engine options with change notifications
 */

import { createLogger } from '../common/logger.js';
import { ArgumentError, TableError, asError } from '../common/errors.js';
import { StatusCode } from '../common/types.js';

const log = createLogger('core:options');
const errorLog = log.extend('error');

export type OptionValue = boolean | string | number;
export type OptionType = 'boolean' | 'string' | 'number';

export interface OptionDefinition {
	type: OptionType;
	defaultValue: OptionValue;
	aliases?: string[];
	description?: string;
	/** Rejects values outside the accepted domain by returning a message */
	validate?: (value: OptionValue) => string | undefined;
	onChange?: OptionChangeListener;
}

export interface OptionChangeEvent {
	key: string;
	oldValue: OptionValue;
	newValue: OptionValue;
}

export type OptionChangeListener = (event: OptionChangeEvent) => void;

/**
 * Options manager with registration, aliases and change listeners
 */
export class TableOptionsManager {
	private options = new Map<string, OptionValue>();
	private definitions = new Map<string, OptionDefinition>();
	private aliases = new Map<string, string>(); // alias -> canonical key
	private listeners = new Map<string, Set<OptionChangeListener>>();

	/**
	 * Register an option with its definition
	 */
	registerOption(key: string, definition: OptionDefinition): void {
		if (this.definitions.has(key)) {
			throw new TableError(`Option ${key} is already registered`, StatusCode.INTERNAL);
		}

		this.definitions.set(key, definition);
		this.options.set(key, definition.defaultValue);

		if (definition.aliases) {
			for (const alias of definition.aliases) {
				if (this.aliases.has(alias.toLowerCase())) {
					throw new TableError(`Option alias ${alias} is already registered`, StatusCode.INTERNAL);
				}
				this.aliases.set(alias.toLowerCase(), key);
			}
		}

		log('Registered option %s (type: %s, default: %j)', key, definition.type, definition.defaultValue);
	}

	/**
	 * Set an option value and notify listeners
	 */
	setOption(key: string, value: unknown): void {
		const { canonicalKey, definition } = this.lookup(key);
		const convertedValue = this.convertValue(value, definition, key);
		const problem = definition.validate?.(convertedValue);
		if (problem !== undefined) {
			throw new ArgumentError(`Invalid value for option ${key}: ${problem}`);
		}
		const oldValue = this.options.get(canonicalKey) ?? definition.defaultValue;

		if (oldValue === convertedValue) {
			return;
		}

		this.options.set(canonicalKey, convertedValue);
		log('Option %s changed: %j → %j', canonicalKey, oldValue, convertedValue);

		this.notifyListeners(canonicalKey, definition, { key: canonicalKey, oldValue, newValue: convertedValue });
	}

	/**
	 * Restore an option (or all options) to the registered default
	 */
	resetOption(key?: string): void {
		if (key === undefined) {
			for (const registered of this.definitions.keys()) {
				this.resetOption(registered);
			}
			return;
		}
		const { definition } = this.lookup(key);
		this.setOption(key, definition.defaultValue);
	}

	/**
	 * Get an option value
	 */
	getOption(key: string): OptionValue {
		const { canonicalKey, definition } = this.lookup(key);
		return this.options.get(canonicalKey) ?? definition.defaultValue;
	}

	getBooleanOption(key: string): boolean {
		const value = this.getOption(key);
		if (typeof value !== 'boolean') {
			throw new TableError(`Option ${key} is not a boolean (got ${typeof value})`, StatusCode.INTERNAL);
		}
		return value;
	}

	getStringOption(key: string): string {
		const value = this.getOption(key);
		if (typeof value !== 'string') {
			throw new TableError(`Option ${key} is not a string (got ${typeof value})`, StatusCode.INTERNAL);
		}
		return value;
	}

	getNumberOption(key: string): number {
		const value = this.getOption(key);
		if (typeof value !== 'number') {
			throw new TableError(`Option ${key} is not a number (got ${typeof value})`, StatusCode.INTERNAL);
		}
		return value;
	}

	/**
	 * Subscribe to changes of one option. Returns the unsubscribe function.
	 */
	onChange(key: string, listener: OptionChangeListener): () => void {
		const { canonicalKey } = this.lookup(key);
		let set = this.listeners.get(canonicalKey);
		if (!set) {
			set = new Set();
			this.listeners.set(canonicalKey, set);
		}
		set.add(listener);
		return () => {
			set.delete(listener);
		};
	}

	getAllOptions(): Record<string, OptionValue> {
		const result: Record<string, OptionValue> = {};
		for (const [key, value] of this.options) {
			result[key] = value;
		}
		return result;
	}

	getOptionDefinitions(): Record<string, OptionDefinition> {
		const result: Record<string, OptionDefinition> = {};
		for (const [key, definition] of this.definitions) {
			result[key] = { ...definition };
		}
		return result;
	}

	private lookup(key: string): { canonicalKey: string; definition: OptionDefinition } {
		const canonicalKey = this.resolveKey(key);
		const definition = canonicalKey === null ? undefined : this.definitions.get(canonicalKey);
		if (canonicalKey === null || !definition) {
			throw new ArgumentError(`Unknown option: ${key}`);
		}
		return { canonicalKey, definition };
	}

	private resolveKey(key: string): string | null {
		const lowerKey = key.toLowerCase();

		const aliasTarget = this.aliases.get(lowerKey);
		if (aliasTarget) {
			return aliasTarget;
		}

		for (const registeredKey of this.definitions.keys()) {
			if (registeredKey.toLowerCase() === lowerKey) {
				return registeredKey;
			}
		}

		return null;
	}

	private convertValue(value: unknown, definition: OptionDefinition, originalKey: string): OptionValue {
		switch (definition.type) {
			case 'boolean':
				return this.convertToBoolean(value, originalKey);
			case 'string':
				return String(value);
			case 'number':
				return this.convertToNumber(value, originalKey);
		}
	}

	private convertToBoolean(value: unknown, key: string): boolean {
		if (typeof value === 'boolean') {
			return value;
		}
		if (typeof value === 'string') {
			const lower = value.toLowerCase();
			if (lower === 'true' || lower === '1' || lower === 'on' || lower === 'yes') {
				return true;
			}
			if (lower === 'false' || lower === '0' || lower === 'off' || lower === 'no') {
				return false;
			}
		}
		if (typeof value === 'number') {
			return value !== 0;
		}
		throw new ArgumentError(`Invalid boolean value for option ${key}: ${String(value)}`);
	}

	private convertToNumber(value: unknown, key: string): number {
		if (typeof value === 'number') {
			return value;
		}
		if (typeof value === 'string' && value.trim() !== '') {
			const num = Number(value);
			if (!isNaN(num)) {
				return num;
			}
		}
		throw new ArgumentError(`Invalid number value for option ${key}: ${String(value)}`);
	}

	private notifyListeners(key: string, definition: OptionDefinition, event: OptionChangeEvent): void {
		const listeners = [
			...(definition.onChange ? [definition.onChange] : []),
			...(this.listeners.get(key) ?? []),
		];
		for (const listener of listeners) {
			try {
				listener(event);
			} catch (error) {
				errorLog('Error in option change listener for %s: %s', key, asError(error).message);
			}
		}
	}
}

const positiveInteger = (value: OptionValue): string | undefined =>
	typeof value === 'number' && Number.isInteger(value) && value > 0 ? undefined : 'expected a positive integer';

/**
 * Builds a manager holding the engine's options at their defaults.
 */
export function createTableOptions(): TableOptionsManager {
	const manager = new TableOptionsManager();
	manager.registerOption('print.width', {
		type: 'number',
		defaultValue: 8,
		aliases: ['col_width', 'colWidth'],
		description: 'Minimum rendered column width',
		validate: positiveInteger,
	});
	manager.registerOption('print.maxLines', {
		type: 'number',
		defaultValue: 25,
		aliases: ['max_lines'],
		description: 'Rows rendered before the output is elided',
		validate: positiveInteger,
	});
	manager.registerOption('store.compress', {
		type: 'boolean',
		defaultValue: true,
		aliases: ['compress'],
		description: 'Deduplicate content-identical cell objects before storing',
	});
	manager.registerOption('csv.separator', {
		type: 'string',
		defaultValue: ';',
		aliases: ['sep'],
		description: 'Field separator for CSV import and export',
		validate: (value) => (typeof value === 'string' && value.length === 1 ? undefined : 'expected a single character'),
	});
	manager.registerOption('csv.keepNone', {
		type: 'boolean',
		defaultValue: false,
		aliases: ['keep_none'],
		description: 'Keep the text "None" in CSV imports instead of reading it as missing',
	});
	manager.registerOption('join.logProgress', {
		type: 'boolean',
		defaultValue: true,
		description: 'Log join progress in steps of ten percent',
	});
	return manager;
}

/** Options shared by every table in the process. */
export const tableOptions = createTableOptions();
