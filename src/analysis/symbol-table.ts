import { BTree } from 'digitree';
import type * as AST from '../parser/ast.js';
import { MisuseError } from '../common/errors.js';
import { createLogger } from '../common/logger.js';
import { statementToString } from '../emit/ast-stringify.js';
import { type SymtKey, compareKeys, keyOfRule } from './key.js';

const log = createLogger('analysis:symbols');

export interface SymbolEntry {
	readonly key: SymtKey;
	/** Rules whose head has `key`, in insertion order. */
	readonly rules: readonly AST.RuleStmt[];
}

/**
 * Groups rule statements by the signature of their head. Inserting a second
 * rule for a signature appends to that signature's list.
 */
export class SymbolTable {
	private entriesByKey = new BTree<SymtKey, SymbolEntry>(
		(entry: SymbolEntry) => entry.key,
		compareKeys
	);

	/**
	 * Adds a rule under its head signature.
	 * @throws MisuseError when `stmt` is not a rule
	 */
	insert(stmt: AST.Statement): void {
		if (stmt.type !== 'rule') {
			throw new MisuseError(`SymbolTable.insert called with a ${stmt.type} statement`);
		}
		const key = keyOfRule(stmt);
		const existing = this.entriesByKey.get(key);
		if (existing) {
			this.entriesByKey.upsert({ key: existing.key, rules: [...existing.rules, stmt] });
		} else {
			this.entriesByKey.insert({ key, rules: [stmt] });
		}
	}

	get(key: SymtKey): readonly AST.RuleStmt[] | undefined {
		return this.entriesByKey.get(key)?.rules;
	}

	has(key: SymtKey): boolean {
		return this.entriesByKey.find(key).on;
	}

	get size(): number {
		return this.entriesByKey.getCount();
	}

	/** Entries in signature order. */
	*entries(): IterableIterator<SymbolEntry> {
		for (const path of this.entriesByKey.ascending(this.entriesByKey.first())) {
			const entry = this.entriesByKey.at(path);
			if (entry !== undefined) {
				yield entry;
			}
		}
	}

	*keys(): IterableIterator<SymtKey> {
		for (const entry of this.entries()) {
			yield entry.key;
		}
	}
}

/**
 * Collects the derived relations of a program: every rule whose head is a
 * plain predicate. Rules with delta heads are reported by the delta extractor.
 */
export function extractIntensional(program: AST.Program): SymbolTable {
	const idb = new SymbolTable();
	for (const stmt of program.statements) {
		switch (stmt.type) {
			case 'rule':
				if (stmt.head.type === 'pred') {
					idb.insert(stmt);
				}
				break;
			case 'query':
			case 'base':
				break;
		}
	}
	log('Intensional table: %d predicates', idb.size);
	return idb;
}

/**
 * Collects the input relations of a program. Each base fact is stored as a
 * rule with an empty body so both tables share one shape.
 */
export function extractExtensional(program: AST.Program): SymbolTable {
	const edb = new SymbolTable();
	for (const stmt of program.statements) {
		switch (stmt.type) {
			case 'base':
				edb.insert({ type: 'rule', head: stmt.atom, body: [], loc: stmt.loc });
				break;
			case 'rule':
			case 'query':
				break;
		}
	}
	log('Extensional table: %d predicates', edb.size);
	return edb;
}

/** Concatenation of every stored statement's printed form, one per line. */
export function symbolTableToString(table: SymbolTable): string {
	const lines: string[] = [];
	for (const entry of table.entries()) {
		for (const rule of entry.rules) {
			lines.push(statementToString(rule));
		}
	}
	return lines.join('\n');
}
