import { BTree } from 'digitree';
import type * as AST from '../parser/ast.js';
import { type SymtKey, compareAtoms, compareKeys, compareVariables } from './key.js';

/**
 * Deduplicating set ordered by a comparator. Two values are the same member
 * exactly when the comparator returns zero; iteration is ascending.
 */
export class OrderedSet<T> implements Iterable<T> {
	private tree: BTree<T, T>;

	constructor(public readonly compare: (a: T, b: T) => number, values?: Iterable<T>) {
		this.tree = new BTree<T, T>((value: T) => value, compare);
		if (values) {
			for (const value of values) {
				this.add(value);
			}
		}
	}

	/** Adds `value` unless an equal member exists. Returns true if it was added. */
	add(value: T): boolean {
		return this.tree.insert(value).on;
	}

	/** Adds `value`, displacing an equal member if present. */
	replace(value: T): void {
		this.tree.upsert(value);
	}

	has(value: T): boolean {
		return this.tree.find(value).on;
	}

	/** The stored member equal to `value`, if any. */
	get(value: T): T | undefined {
		return this.tree.get(value);
	}

	get size(): number {
		return this.tree.getCount();
	}

	*values(): IterableIterator<T> {
		for (const path of this.tree.ascending(this.tree.first())) {
			const value = this.tree.at(path);
			if (value !== undefined) {
				yield value;
			}
		}
	}

	[Symbol.iterator](): IterableIterator<T> {
		return this.values();
	}

	toArray(): T[] {
		return Array.from(this.values());
	}
}

export type KeySet = OrderedSet<SymtKey>;
export type VariableSet = OrderedSet<AST.Variable>;
export type AtomSet = OrderedSet<AST.Atom>;

export function createKeySet(keys?: Iterable<SymtKey>): KeySet {
	return new OrderedSet(compareKeys, keys);
}

export function createVariableSet(variables?: Iterable<AST.Variable>): VariableSet {
	return new OrderedSet(compareVariables, variables);
}

export function createAtomSet(atoms?: Iterable<AST.Atom>): AtomSet {
	return new OrderedSet(compareAtoms, atoms);
}
