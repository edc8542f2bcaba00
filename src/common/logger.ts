import debug from 'debug';

// Base namespace for the project
const BASE_NAMESPACE = 'deltalog';

/**
 * Creates a namespaced debug logger instance.
 *
 * Example: createLogger('analysis:symbols') -> returns a debugger for 'deltalog:analysis:symbols'
 *
 * Usage:
 * const log = createLogger('analysis:delta');
 * log('Found %d update predicates', count);
 * const errorLog = log.extend('error'); // Creates 'deltalog:analysis:delta:error'
 * errorLog('Analysis failed: %O', error);
 *
 * @param subNamespace The specific subsystem namespace (e.g., 'analysis:columns', 'analysis:rule')
 * @returns A debug instance.
 */
export function createLogger(subNamespace: string): debug.Debugger {
	return debug(`${BASE_NAMESPACE}:${subNamespace}`);
}

/**
 * Enable deltalog debug logging programmatically.
 *
 * @param pattern - Debug pattern to enable (default: 'deltalog:*')
 *   Examples:
 *   - 'deltalog:*' - all logs
 *   - 'deltalog:analysis:rule' - per-rule variable and equality tables only
 *   - 'deltalog:*,-deltalog:analysis:rule' - all except the per-rule chatter
 * @param logFn - Optional custom log function. Defaults to the debug library's stderr writer.
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

/** Disable all deltalog debug logging. */
export function disableLogging(): void {
	debug.disable();
}

/**
 * Check if logging is enabled for a specific namespace.
 *
 * @param namespace - The namespace to check (without 'deltalog:' prefix)
 */
export function isLoggingEnabled(namespace: string): boolean {
	return debug.enabled(`${BASE_NAMESPACE}:${namespace}`);
}
