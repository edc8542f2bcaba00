import { expect } from 'chai';
import { extractDeltaPredicates } from '../../src/analysis/delta.js';
import { SemanticError } from '../../src/common/errors.js';
import { atomToString } from '../../src/emit/ast-stringify.js';
import type { Atom, SourceSpan, Statement } from '../../src/parser/ast.js';
import { base, del, ineq, ins, int, position, pred, program, query, rel, rule, v } from '../helpers/builders.js';

function spanOfLine(line: number): SourceSpan {
	return { start: position(line, line * 20, line * 20), end: position(line, line * 20, line * 20 + 5) };
}

function located<A extends Atom>(atom: A, line: number): A {
	return { ...atom, loc: spanOfLine(line) };
}

function deltaStrings(...statements: Statement[]): string[] {
	return extractDeltaPredicates(program(...statements)).map(atomToString);
}

describe('Delta Predicate Extraction', () => {
	it('should canonicalize a delta-insert head', () => {
		const deltas = extractDeltaPredicates(program(
			rule(ins('price', v('N'), v('A')), rel(pred('price', v('N'), v('A'))), ineq('>', v('A'), int(5))),
		));
		expect(deltas).to.deep.equal([ins('price', v('COL0'), v('COL1'))]);
	});

	it('should collapse rules on the same signature with different variables', () => {
		expect(deltaStrings(
			rule(ins('emp', v('X'), v('Y')), rel(pred('hire', v('X'), v('Y')))),
			rule(ins('emp', v('A'), v('B')), rel(pred('transfer', v('A'), v('B')))),
		)).to.deep.equal(['+emp(COL0, COL1)']);
	});

	it('should keep signatures with different arities apart', () => {
		expect(deltaStrings(
			rule(del('t', v('X')), rel(pred('s', v('X')))),
			rule(del('t', v('X'), v('Y')), rel(pred('s2', v('X'), v('Y')))),
		)).to.deep.equal(['-t(COL0)', '-t(COL0, COL1)']);
	});

	it('should order results by signature, not by program order', () => {
		expect(deltaStrings(
			rule(ins('zeta', v('X')), rel(pred('s', v('X')))),
			rule(del('alpha', v('X')), rel(pred('s', v('X')))),
			rule(ins('mid', v('X')), rel(pred('s', v('X')))),
		)).to.deep.equal(['-alpha(COL0)', '+mid(COL0)', '+zeta(COL0)']);
	});

	it('should give the same set for any statement order', () => {
		const statements: Statement[] = [
			rule(del('p', v('X')), rel(pred('q', v('X')))),
			rule(ins('p', v('Y')), rel(pred('r', v('Y')))),
			rule(ins('s', v('X'), v('Y')), rel(pred('q', v('X'))), rel(pred('r', v('Y')))),
			query(pred('p', v('X'))),
		];
		const forward = deltaStrings(...statements);
		const backward = deltaStrings(...[...statements].reverse());
		expect(forward).to.deep.equal(['+p(COL0)', '+s(COL0, COL1)']);
		expect(backward).to.deep.equal(forward);
	});

	it('should give deep-equal results for located rules in any order', () => {
		const statements: Statement[] = [
			{ ...rule(located(ins('p', v('X')), 1), rel(pred('q', v('X')))), loc: spanOfLine(1) },
			{ ...rule(located(ins('p', v('Y')), 2), rel(pred('r', v('Y')))), loc: spanOfLine(2) },
			{ ...rule(located(del('t', v('Z'), v('W')), 3), rel(pred('s', v('Z'), v('W')))), loc: spanOfLine(3) },
		];
		const forward = extractDeltaPredicates(program(...statements));
		const backward = extractDeltaPredicates(program(...[...statements].reverse()));
		expect(forward).to.deep.equal([ins('p', v('COL0')), del('t', v('COL0'), v('COL1'))]);
		expect(backward).to.deep.equal(forward);
		expect(forward[0]).to.not.have.property('loc');
	});

	it('should ignore plain rules, queries and base facts', () => {
		expect(deltaStrings(
			base(pred('price', v('name'), v('amount'))),
			rule(pred('cheap', v('N')), rel(pred('price', v('N'), v('A')))),
			rule(del('price', v('N'), v('A')), rel(pred('price', v('N'), v('A'))), ineq('>', v('A'), int(100))),
			query(pred('cheap', v('N'))),
		)).to.deep.equal(['-price(COL0, COL1)']);
	});

	it('should honour a custom placeholder prefix', () => {
		const deltas = extractDeltaPredicates(
			program(rule(ins('p', v('X'), v('Y')), rel(pred('q', v('X'), v('Y'))))),
			{ placeholderPrefix: 'ARG' },
		);
		expect(deltas.map(atomToString)).to.deep.equal(['+p(ARG0, ARG1)']);
	});

	it('should fail when no rule has a delta head', () => {
		expect(() => extractDeltaPredicates(program(
			base(pred('price', v('name'), v('amount'))),
			rule(pred('cheap', v('N')), rel(pred('price', v('N'), v('A')))),
			query(pred('cheap', v('N'))),
		))).to.throw(SemanticError, 'The program has no update');
	});
});
