import { MisuseError } from '../common/errors.js';

/**
 * Naming settings for the names the analysis synthesizes. Passed explicitly
 * to each builder that needs them.
 */
export interface AnalysisOptions {
	/** Prefix of positional column names given to intensional predicates (`col0`, `col1`, ...). */
	columnPrefix: string;
	/** Prefix of the placeholder variables in canonical delta atoms (`COL0`, `COL1`, ...). */
	placeholderPrefix: string;
	/** Prefix marking a temporary relation derived from a predicate. */
	tempPrefix: string;
}

export const DEFAULT_ANALYSIS_OPTIONS: Readonly<AnalysisOptions> = Object.freeze({
	columnPrefix: 'col',
	placeholderPrefix: 'COL',
	tempPrefix: '__temp__',
});

const IDENTIFIER_PREFIX = /^[A-Za-z_][A-Za-z0-9_]*$/;

/**
 * Merges `options` over the defaults. Every prefix must be usable as the
 * start of an SQL identifier.
 */
export function resolveAnalysisOptions(options?: Partial<AnalysisOptions>): AnalysisOptions {
	const resolved: AnalysisOptions = {
		columnPrefix: options?.columnPrefix ?? DEFAULT_ANALYSIS_OPTIONS.columnPrefix,
		placeholderPrefix: options?.placeholderPrefix ?? DEFAULT_ANALYSIS_OPTIONS.placeholderPrefix,
		tempPrefix: options?.tempPrefix ?? DEFAULT_ANALYSIS_OPTIONS.tempPrefix,
	};
	for (const [name, value] of Object.entries(resolved)) {
		if (!IDENTIFIER_PREFIX.test(value)) {
			throw new MisuseError(`Option ${name} must be a non-empty identifier prefix, got '${value}'`);
		}
	}
	return resolved;
}

/** `<prefix>0 .. <prefix>(count-1)` */
export function positionalNames(prefix: string, count: number): string[] {
	return Array.from({ length: count }, (_, i) => `${prefix}${i}`);
}
