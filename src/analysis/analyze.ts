import type * as AST from '../parser/ast.js';
import { createLogger } from '../common/logger.js';
import { atomToString } from '../emit/ast-stringify.js';
import { type ColumnNameTable, buildColumnNameTable } from './column-table.js';
import { extractDeltaPredicates } from './delta.js';
import { type EqualityTable, buildEqualityTable } from './equality-table.js';
import { type AnalysisOptions, resolveAnalysisOptions } from './options.js';
import { getQuery } from './query.js';
import { type SymbolTable, extractExtensional, extractIntensional } from './symbol-table.js';
import { type VariableTable, buildVariableTable } from './variable-table.js';

const log = createLogger('analysis');

/** Program-wide tables, built once per compilation. */
export interface ProgramAnalysis {
	readonly options: AnalysisOptions;
	readonly extensional: SymbolTable;
	readonly intensional: SymbolTable;
	readonly columns: ColumnNameTable;
	readonly query: AST.QueryStmt;
	/** Canonical update predicates, in signature order. */
	readonly deltas: readonly AST.DeltaAtom[];
}

/** Tables of a single rule, built when the rule is translated. */
export interface RuleAnalysis {
	readonly variables: VariableTable;
	readonly equalities: EqualityTable;
	/** `AGG(X) = c` literals; these constrain the head aggregate and are not variable bindings. */
	readonly aggregateConstraints: readonly AST.EqualLiteral[];
}

/**
 * Builds the program-wide tables. Fails on the first violation: a missing or
 * repeated query, then a program without update rules.
 */
export function analyzeProgram(program: AST.Program, options?: Partial<AnalysisOptions>): ProgramAnalysis {
	const resolved = resolveAnalysisOptions(options);
	const extensional = extractExtensional(program);
	const intensional = extractIntensional(program);
	const columns = buildColumnNameTable(extensional, intensional, resolved);
	const query = getQuery(program);
	const deltas = extractDeltaPredicates(program, resolved);

	log('Analyzed program: %d statements, query %s, %d update predicates',
		program.statements.length, atomToString(query.atom), deltas.length);

	return { options: resolved, extensional, intensional, columns, query, deltas };
}

/**
 * Builds the variable table from the rule's positive atoms and the equality
 * table from its `variable = constant` literals.
 */
export function analyzeRule(columns: ColumnNameTable, rule: AST.RuleStmt): RuleAnalysis {
	const atoms: AST.Atom[] = [];
	const bindings: AST.EqualLiteral[] = [];
	const aggregateConstraints: AST.EqualLiteral[] = [];

	for (const lit of rule.body) {
		switch (lit.type) {
			case 'rel':
				atoms.push(lit.atom);
				break;
			case 'equal':
				if (lit.variable.type === 'aggregate') {
					aggregateConstraints.push(lit);
				} else {
					bindings.push(lit);
				}
				break;
			case 'not':
			case 'inequal':
				break;
		}
	}

	return {
		variables: buildVariableTable(columns, atoms),
		equalities: buildEqualityTable(bindings),
		aggregateConstraints,
	};
}
