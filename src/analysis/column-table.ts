import { BTree } from 'digitree';
import { MisuseError } from '../common/errors.js';
import { createLogger } from '../common/logger.js';
import { StatusCode } from '../common/types.js';
import { variableToString } from '../emit/ast-stringify.js';
import { type SymtKey, compareKeys, formatKey } from './key.js';
import { type AnalysisOptions, positionalNames, resolveAnalysisOptions } from './options.js';
import type { SymbolTable } from './symbol-table.js';

const log = createLogger('analysis:columns');

interface ColumnEntry {
	readonly key: SymtKey;
	readonly columns: readonly string[];
}

/**
 * Column names of every predicate, one per argument position.
 */
export class ColumnNameTable {
	private entriesByKey = new BTree<SymtKey, ColumnEntry>(
		(entry: ColumnEntry) => entry.key,
		compareKeys
	);

	/** Records `columns` for `key` unless the key already has names. Returns true if recorded. */
	define(key: SymtKey, columns: readonly string[]): boolean {
		return this.entriesByKey.insert({ key, columns }).on;
	}

	get(key: SymtKey): readonly string[] | undefined {
		return this.entriesByKey.get(key)?.columns;
	}

	/** @throws MisuseError when no predicate with this signature was declared or derived */
	getOrFail(key: SymtKey): readonly string[] {
		const columns = this.get(key);
		if (!columns) {
			throw new MisuseError(`No column names for predicate ${formatKey(key)}`, StatusCode.NOTFOUND);
		}
		return columns;
	}

	has(key: SymtKey): boolean {
		return this.entriesByKey.find(key).on;
	}

	get size(): number {
		return this.entriesByKey.getCount();
	}

	*keys(): IterableIterator<SymtKey> {
		for (const path of this.entriesByKey.ascending(this.entriesByKey.first())) {
			const entry = this.entriesByKey.at(path);
			if (entry !== undefined) {
				yield entry.key;
			}
		}
	}
}

/**
 * Extensional predicates take their column names from the variables of their
 * first declaration; intensional predicates not already named get positional
 * names (`col0`, `col1`, ...).
 */
export function buildColumnNameTable(
	edb: SymbolTable,
	idb: SymbolTable,
	options?: Partial<AnalysisOptions>
): ColumnNameTable {
	const { columnPrefix } = resolveAnalysisOptions(options);
	const table = new ColumnNameTable();

	for (const { key, rules } of edb.entries()) {
		const first = rules[0];
		if (first) {
			table.define(key, first.head.args.map(variableToString));
		}
	}

	let synthesized = 0;
	for (const key of idb.keys()) {
		if (table.define(key, positionalNames(columnPrefix, key.arity))) {
			synthesized++;
		}
	}

	log('Column table: %d predicates (%d synthesized)', table.size, synthesized);
	return table;
}
