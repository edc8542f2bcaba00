import type * as AST from '../parser/ast.js';
import { atomArity } from '../parser/ast.js';
import { MisuseError } from '../common/errors.js';
import { variableToString } from '../emit/ast-stringify.js';

/**
 * Predicate signature: identifies a relation by name and arity.
 * Every table in the analysis layer is keyed by it.
 */
export interface SymtKey {
	readonly name: string;
	readonly arity: number;
}

export function symtKey(name: string, arity: number): SymtKey {
	return { name, arity };
}

export function keyOfAtom(atom: AST.Atom): SymtKey {
	return { name: atom.name, arity: atomArity(atom) };
}

/** Signature of a rule's head. */
export function keyOfRule(stmt: AST.Statement): SymtKey {
	if (stmt.type !== 'rule') {
		throw new MisuseError(`keyOfRule called with a ${stmt.type} statement`);
	}
	return keyOfAtom(stmt.head);
}

/** Byte-wise string order, independent of locale. */
function compareStrings(a: string, b: string): number {
	return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Total order on signatures: name first, then arity.
 * This is the single notion of "same signature" for every table and set.
 */
export function compareKeys(a: SymtKey, b: SymtKey): number {
	const byName = compareStrings(a.name, b.name);
	if (byName !== 0) return byName;
	return a.arity - b.arity;
}

export function keysEqual(a: SymtKey, b: SymtKey): boolean {
	return compareKeys(a, b) === 0;
}

/** `name/arity` */
export function formatKey(key: SymtKey): string {
	return `${key.name}/${key.arity}`;
}

/** The relation alias the SQL emitter uses for a predicate: `name_a<arity>`. */
export function aliasOfKey(key: SymtKey): string {
	return `${key.name}_a${key.arity}`;
}

/** Sorted copy of `keys` with duplicates (under compareKeys) removed. */
export function removeRepeatedKeys(keys: readonly SymtKey[]): SymtKey[] {
	const sorted = [...keys].sort(compareKeys);
	return sorted.filter((key, i) => i === 0 || compareKeys(sorted[i - 1], key) !== 0);
}

/** Orders variables by their printed form. */
export function compareVariables(a: AST.Variable, b: AST.Variable): number {
	return compareStrings(variableToString(a), variableToString(b));
}

/** Orders atoms by the signature of the predicate they reference; the atom form is ignored. */
export function compareAtoms(a: AST.Atom, b: AST.Atom): number {
	return compareKeys(keyOfAtom(a), keyOfAtom(b));
}
