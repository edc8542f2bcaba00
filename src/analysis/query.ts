import type * as AST from '../parser/ast.js';
import { SemanticError } from '../common/errors.js';

/**
 * The program's single query statement.
 * @throws SemanticError when the program has no query or more than one
 */
export function getQuery(program: AST.Program): AST.QueryStmt {
	const queries = program.statements.filter((stmt): stmt is AST.QueryStmt => stmt.type === 'query');
	if (queries.length === 0) {
		throw new SemanticError('The program has no query');
	}
	if (queries.length > 1) {
		throw new SemanticError('The program has more than one query', undefined, queries[1].loc);
	}
	return queries[0];
}
