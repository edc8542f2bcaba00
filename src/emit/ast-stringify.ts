/**
 * Functions to convert program AST nodes back into source text.
 *
 * Formatting Notes:
 * - Delta heads print with a leading `+` (insert) or `-` (delete).
 * - String constants are single-quoted with embedded quotes doubled.
 * - Rules with an empty body print as facts.
 */
import type * as AST from '../parser/ast.js';

export function constantToString(c: AST.Constant): string {
	switch (c.type) {
		case 'int':
			return String(c.value);
		case 'real':
			return c.lexeme ?? String(c.value);
		case 'string':
			return `'${c.value.replace(/'/g, "''")}'`;
		case 'bool':
			return c.value ? 'true' : 'false';
		case 'null':
			return 'null';
	}
}

/**
 * The printed form of a variable. Two named or numbered variables denote the
 * same variable exactly when their printed forms are equal.
 */
export function variableToString(v: AST.Variable): string {
	switch (v.type) {
		case 'named':
			return v.name;
		case 'numbered':
			return `_${v.index}`;
		case 'aggregate':
			return `${v.func}(${v.variable})`;
		case 'constant':
			return constantToString(v.value);
		case 'anonymous':
			return '_';
	}
}

export function atomToString(atom: AST.Atom): string {
	const body = `${atom.name}(${atom.args.map(variableToString).join(', ')})`;
	switch (atom.type) {
		case 'pred':
			return body;
		case 'deltaInsert':
			return `+${body}`;
		case 'deltaDelete':
			return `-${body}`;
	}
}

export function literalToString(lit: AST.Literal): string {
	switch (lit.type) {
		case 'rel':
			return atomToString(lit.atom);
		case 'not':
			return `not ${atomToString(lit.atom)}`;
		case 'equal':
			return `${variableToString(lit.variable)} = ${constantToString(lit.value)}`;
		case 'inequal':
			return `${variableToString(lit.variable)} ${lit.operator} ${constantToString(lit.value)}`;
	}
}

export function statementToString(stmt: AST.Statement): string {
	switch (stmt.type) {
		case 'rule':
			return stmt.body.length === 0
				? `${atomToString(stmt.head)}.`
				: `${atomToString(stmt.head)} :- ${stmt.body.map(literalToString).join(', ')}.`;
		case 'query':
			return `?- ${atomToString(stmt.atom)}.`;
		case 'base':
			return `${atomToString(stmt.atom)}.`;
	}
}

export function programToString(program: AST.Program): string {
	return program.statements.map(statementToString).join('\n');
}
