import type * as AST from '../parser/ast.js';
import { isDeltaAtom } from '../parser/ast.js';
import { SemanticError } from '../common/errors.js';
import { createLogger } from '../common/logger.js';
import { atomToString } from '../emit/ast-stringify.js';
import type { AnalysisOptions } from './options.js';
import { createAtomSet } from './ordered-set.js';
import { canonicalizeAtom } from './transform.js';

const log = createLogger('analysis:delta');
const errorLog = log.extend('error');

// An insert and a delete on the same signature share one set entry; the insert form is kept.
function formRank(atom: AST.Atom): number {
	return atom.type === 'deltaDelete' ? 1 : 0;
}

/**
 * The distinct update predicates of a program: the heads of every rule with a
 * delta head, canonicalized to `name(COL0, ..., COL<n-1>)` and deduplicated by
 * signature. The result is ordered by signature, whatever the statement order.
 *
 * @throws SemanticError when no rule has a delta head
 */
export function extractDeltaPredicates(program: AST.Program, options?: Partial<AnalysisOptions>): AST.DeltaAtom[] {
	const deltas = createAtomSet();

	for (const stmt of program.statements) {
		if (stmt.type !== 'rule' || !isDeltaAtom(stmt.head)) continue;

		const canonical = canonicalizeAtom(stmt.head, options);
		const existing = deltas.get(canonical);
		if (!existing) {
			deltas.add(canonical);
		} else if (formRank(canonical) < formRank(existing)) {
			deltas.replace(canonical);
		}
	}

	const result = deltas.toArray().filter(isDeltaAtom);
	if (result.length === 0) {
		errorLog('No rule in the program has a delta head');
		throw new SemanticError('The program has no update');
	}

	log('Update predicates: %s', result.map(atomToString).join(', '));
	return result;
}
