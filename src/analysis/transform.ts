import type * as AST from '../parser/ast.js';
import { type AnalysisOptions, positionalNames, resolveAnalysisOptions } from './options.js';
import { type VariableSet, createVariableSet } from './ordered-set.js';

/**
 * Replaces an atom's arguments with the placeholders `COL0..COL(n-1)`, keeping
 * its form and predicate, so only the atom's shape remains. The result carries
 * no source location.
 */
export function canonicalizeAtom<T extends AST.AtomType>(
	atom: AST.Atom & { type: T },
	options?: Partial<AnalysisOptions>
): AST.Atom & { type: T } {
	const { placeholderPrefix } = resolveAnalysisOptions(options);
	const args = positionalNames(placeholderPrefix, atom.args.length)
		.map((name): AST.NamedVar => ({ type: 'named', name }));
	return { type: atom.type, name: atom.name, args };
}

/** Same atom over the temporary relation `__temp__<name>`. */
export function toTempAtom<A extends AST.Atom>(atom: A, options?: Partial<AnalysisOptions>): A {
	const { tempPrefix } = resolveAnalysisOptions(options);
	return { ...atom, name: `${tempPrefix}${atom.name}` };
}

function toPlainAtom(atom: AST.Atom): AST.PredAtom {
	return { ...atom, type: 'pred' };
}

/**
 * Rewrites every delta atom in rule heads and in relational or negated body
 * literals into the plain predicate it updates. Queries and base facts are
 * returned unchanged.
 */
export function deltaToPlain(program: AST.Program): AST.Program {
	const toPlainLiteral = (lit: AST.Literal): AST.Literal => {
		switch (lit.type) {
			case 'rel':
			case 'not':
				return { ...lit, atom: toPlainAtom(lit.atom) };
			case 'equal':
			case 'inequal':
				return lit;
		}
	};

	return {
		...program,
		statements: program.statements.map((stmt): AST.Statement => {
			switch (stmt.type) {
				case 'rule':
					return { ...stmt, head: toPlainAtom(stmt.head), body: stmt.body.map(toPlainLiteral) };
				case 'query':
				case 'base':
					return stmt;
			}
		}),
	};
}

/** The variables a literal mentions, in argument order. */
export function literalVariables(lit: AST.Literal): AST.Variable[] {
	switch (lit.type) {
		case 'rel':
		case 'not':
			return lit.atom.args;
		case 'equal':
		case 'inequal':
			return [lit.variable];
	}
}

/** Every distinct variable of `literals`, ordered by printed form. */
export function literalsVariableSet(literals: readonly AST.Literal[]): VariableSet {
	return createVariableSet(literals.flatMap(literalVariables));
}
