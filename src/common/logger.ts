import debug from 'debug';

// Base namespace for the project
const BASE_NAMESPACE = 'rowframe';

/**
 * Creates a namespaced debug logger instance.
 *
 * Example: createLogger('table') -> returns a debugger for 'rowframe:table'
 * Example: createLogger('io:table-file') -> returns a debugger for 'rowframe:io:table-file'
 *
 * Usage:
 * const log = createLogger('table');
 * log('Joining %d x %d rows', left, right);
 * const warnLog = log.extend('warn'); // Creates 'rowframe:table:warn'
 * warnLog('Falling back to legacy format: %O', error);
 *
 * @param subNamespace The specific subsystem namespace (e.g., 'table', 'expr', 'io:csv')
 */
export function createLogger(subNamespace: string): debug.Debugger {
	return debug(`${BASE_NAMESPACE}:${subNamespace}`);
}

/**
 * Enable debug logging programmatically.
 *
 * @param pattern - Debug pattern to enable (default: 'rowframe:*')
 *   Examples:
 *   - 'rowframe:*' - everything
 *   - 'rowframe:table' - query operations and column algebra
 *   - 'rowframe:io:*' - persistence and CSV
 *   - 'rowframe:*,-rowframe:expr' - all except expression evaluation
 * @param logFn - Optional custom log function. Defaults to debug's stderr writer.
 */
export function enableLogging(
	pattern: string = `${BASE_NAMESPACE}:*`,
	logFn?: (...args: unknown[]) => void
): void {
	if (logFn) {
		debug.log = logFn;
	}
	debug.enable(pattern);
}

/**
 * Disable all debug logging.
 */
export function disableLogging(): void {
	debug.disable();
}

/**
 * Check if logging is enabled for a specific namespace (without the 'rowframe:' prefix).
 */
export function isLoggingEnabled(namespace: string): boolean {
	return debug.enabled(`${BASE_NAMESPACE}:${namespace}`);
}
