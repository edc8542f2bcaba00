import type * as AST from '../parser/ast.js';
import { MisuseError, SemanticError } from '../common/errors.js';
import { createLogger } from '../common/logger.js';
import { variableToString } from '../emit/ast-stringify.js';
import { aliasOfKey, formatKey, keyOfAtom, symtKey } from './key.js';
import type { ColumnNameTable } from './column-table.js';

const log = createLogger('analysis:rule');
const errorLog = log.extend('error');

/**
 * One column of one atom occurrence within a rule body. The occurrence index
 * tells apart repeated uses of the same predicate (self-joins).
 */
export interface ColumnReference {
	readonly predicateName: string;
	readonly arity: number;
	/** Zero-based position of the atom among the body atoms. */
	readonly occurrence: number;
	readonly column: string;
}

/** Alias of the atom occurrence a reference belongs to: `name_a<arity>_<occurrence>`. */
export function occurrenceAlias(ref: ColumnReference): string {
	return `${aliasOfKey(symtKey(ref.predicateName, ref.arity))}_${ref.occurrence}`;
}

/** `name_a<arity>_<occurrence>.<column>`, the form the SQL emitter writes. */
export function formatColumnReference(ref: ColumnReference): string {
	return `${occurrenceAlias(ref)}.${ref.column}`;
}

/**
 * Per-rule map from variable name to every body column where the variable
 * occurs, most recent occurrence first.
 */
export class VariableTable {
	private references = new Map<string, readonly ColumnReference[]>();

	add(name: string, ref: ColumnReference): void {
		const existing = this.references.get(name) ?? [];
		this.references.set(name, [ref, ...existing]);
	}

	get(name: string): readonly ColumnReference[] | undefined {
		return this.references.get(name);
	}

	has(name: string): boolean {
		return this.references.has(name);
	}

	get size(): number {
		return this.references.size;
	}

	names(): string[] {
		return Array.from(this.references.keys());
	}

	entries(): [string, readonly ColumnReference[]][] {
		return Array.from(this.references.entries());
	}
}

/**
 * Builds the variable table of a rule from its body atoms, in written order.
 * Every atom takes the next occurrence index, repeated predicates included.
 * Constant and anonymous arguments do not take part in joins and are skipped.
 *
 * @throws SemanticError when an atom uses an aggregate as an argument
 * @throws MisuseError when an atom's predicate has no column names, or their count differs from its arity
 */
export function buildVariableTable(columns: ColumnNameTable, atoms: readonly AST.Atom[]): VariableTable {
	const table = new VariableTable();

	atoms.forEach((atom, occurrence) => {
		const key = keyOfAtom(atom);
		const names = columns.getOrFail(key);
		if (names.length !== atom.args.length) {
			throw new MisuseError(`Predicate ${formatKey(key)} has ${names.length} column names for ${atom.args.length} arguments`);
		}

		atom.args.forEach((arg, i) => {
			switch (arg.type) {
				case 'named':
				case 'numbered':
					table.add(variableToString(arg), {
						predicateName: atom.name,
						arity: key.arity,
						occurrence,
						column: names[i],
					});
					break;
				case 'aggregate': {
					const message = `Goal ${formatKey(key)} contains an aggregate function as a variable, which is only allowed in rule heads`;
					errorLog(message);
					throw new SemanticError(message, key, arg.loc ?? atom.loc);
				}
				case 'constant':
				case 'anonymous':
					break;
			}
		});
	});

	log('Variable table: %d variables over %d atoms', table.size, atoms.length);
	return table;
}

export interface JoinCondition {
	readonly variable: string;
	readonly left: ColumnReference;
	readonly right: ColumnReference;
}

/**
 * Equi-join conditions implied by a variable table: for each variable seen in
 * more than one column, its earliest reference is joined to each other one.
 * Variables are visited in name order.
 */
export function joinConditions(table: VariableTable): JoinCondition[] {
	const conditions: JoinCondition[] = [];
	const names = table.names().sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
	for (const variable of names) {
		const [anchor, ...rest] = [...(table.get(variable) ?? [])].reverse();
		for (const other of rest) {
			conditions.push({ variable, left: anchor, right: other });
		}
	}
	return conditions;
}
