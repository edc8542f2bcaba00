/**
 * Deltalog Abstract Syntax Tree (AST) definitions
 * These interfaces define the structure of a parsed program: rules, base facts,
 * the query, and the delta (insert/delete) update rules.
 */

/** A point in the source text, as tracked by the lexer. */
export interface SourcePosition {
	fileName: string;
	line: number;
	/** Absolute offset of the first character of `line`. */
	lineStart: number;
	/** Absolute offset of this position. */
	offset: number;
}

export interface SourceSpan {
	start: SourcePosition;
	end: SourcePosition;
}

// Base for all AST nodes
export interface AstNode {
	type: 'int' | 'real' | 'string' | 'bool' | 'null'
		| 'named' | 'numbered' | 'aggregate' | 'constant' | 'anonymous'
		| 'pred' | 'deltaInsert' | 'deltaDelete'
		| 'rel' | 'not' | 'equal' | 'inequal'
		| 'rule' | 'query' | 'base' | 'program';
	loc?: SourceSpan;
}

// Constants

export interface IntConst extends AstNode {
	type: 'int';
	value: number;
}

export interface RealConst extends AstNode {
	type: 'real';
	value: number;
	lexeme?: string; // Original text, e.g. '2.0'
}

export interface StringConst extends AstNode {
	type: 'string';
	value: string;
}

export interface BoolConst extends AstNode {
	type: 'bool';
	value: boolean;
}

export interface NullConst extends AstNode {
	type: 'null';
}

export type Constant = IntConst | RealConst | StringConst | BoolConst | NullConst;

// Variables

export interface NamedVar extends AstNode {
	type: 'named';
	name: string;
}

/** Positional variable introduced by a rewrite, printed `_<index>`. */
export interface NumberedVar extends AstNode {
	type: 'numbered';
	index: number;
}

/** Aggregate over a variable, e.g. `SUM(X)`; only meaningful in rule heads. */
export interface AggregateVar extends AstNode {
	type: 'aggregate';
	func: string;
	variable: string;
}

/** A constant written directly in an argument position. */
export interface ConstVar extends AstNode {
	type: 'constant';
	value: Constant;
}

export interface AnonymousVar extends AstNode {
	type: 'anonymous';
}

export type Variable = NamedVar | NumberedVar | AggregateVar | ConstVar | AnonymousVar;

// Atoms (rterms)

export type AtomType = 'pred' | 'deltaInsert' | 'deltaDelete';

export interface Atom extends AstNode {
	type: AtomType;
	name: string;
	args: Variable[];
}

/** Steady-state relation, `p(X, Y)`. */
export interface PredAtom extends Atom {
	type: 'pred';
}

/** Insertion into a relation, `+p(X, Y)`. */
export interface DeltaInsertAtom extends Atom {
	type: 'deltaInsert';
}

/** Deletion from a relation, `-p(X, Y)`. */
export interface DeltaDeleteAtom extends Atom {
	type: 'deltaDelete';
}

export type DeltaAtom = DeltaInsertAtom | DeltaDeleteAtom;

// Body literals

export interface RelLiteral extends AstNode {
	type: 'rel';
	atom: Atom;
}

export interface NotLiteral extends AstNode {
	type: 'not';
	atom: Atom;
}

/** `X = c`, or `AGG(X) = c` when constraining a head aggregate. */
export interface EqualLiteral extends AstNode {
	type: 'equal';
	variable: Variable;
	value: Constant;
}

export type ComparisonOperator = '<>' | '<' | '>' | '<=' | '>=';

export interface InequalLiteral extends AstNode {
	type: 'inequal';
	operator: ComparisonOperator;
	variable: Variable;
	value: Constant;
}

export type Literal = RelLiteral | NotLiteral | EqualLiteral | InequalLiteral;

// Statements

export interface RuleStmt extends AstNode {
	type: 'rule';
	head: Atom;
	body: Literal[];
}

export interface QueryStmt extends AstNode {
	type: 'query';
	atom: Atom;
}

/** Declares an extensional (input) relation. */
export interface BaseStmt extends AstNode {
	type: 'base';
	atom: Atom;
}

export type Statement = RuleStmt | QueryStmt | BaseStmt;

export interface Program extends AstNode {
	type: 'program';
	statements: Statement[];
}

export function isDeltaAtom(atom: Atom): atom is DeltaAtom {
	return atom.type === 'deltaInsert' || atom.type === 'deltaDelete';
}

export function atomArity(atom: Atom): number {
	return atom.args.length;
}
