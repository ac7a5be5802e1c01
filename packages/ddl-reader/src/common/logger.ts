import debug from 'debug';

// Base namespace for the project
const BASE_NAMESPACE = 'ddl-reader';

/**
 * Creates a namespaced debug logger instance.
 *
 * Example: createLogger('lexer') -> returns a debugger for 'ddl-reader:lexer'
 *
 * Usage:
 * const log = createLogger('parser');
 * log('Parsing statement %d', index);
 * const warnLog = log.extend('warn'); // Creates 'ddl-reader:parser:warn'
 * warnLog('Skipped clause: %s', text);
 *
 * @param subNamespace The specific subsystem namespace (e.g., 'lexer', 'parser', 'schema:alter')
 */
export function createLogger(subNamespace: string): debug.Debugger {
	return debug(`${BASE_NAMESPACE}:${subNamespace}`);
}

/**
 * Enable debug logging programmatically.
 *
 * @param pattern - Debug pattern to enable (default: 'ddl-reader:*')
 *   Examples:
 *   - 'ddl-reader:*' - all logs
 *   - 'ddl-reader:parser*' - reducer and type parser only
 *   - 'ddl-reader:*,-ddl-reader:lexer' - everything except the tokenizer
 * @param logFn - Optional custom log function. Defaults to stderr output.
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

/** Disable all debug logging. */
export function disableLogging(): void {
	debug.disable();
}

/**
 * Check if logging is enabled for a specific namespace.
 *
 * @param namespace - The namespace to check (without the 'ddl-reader:' prefix)
 */
export function isLoggingEnabled(namespace: string): boolean {
	return debug.enabled(`${BASE_NAMESPACE}:${namespace}`);
}
