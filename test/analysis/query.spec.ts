import { expect } from 'chai';
import { getQuery } from '../../src/analysis/query.js';
import { SemanticError } from '../../src/common/errors.js';
import { base, pred, program, query, rel, rule, v } from '../helpers/builders.js';

describe('getQuery', () => {
	it('should return the single query statement', () => {
		const q = query(pred('cheap', v('N')));
		const prog = program(
			base(pred('price', v('name'), v('amount'))),
			q,
			rule(pred('cheap', v('N')), rel(pred('price', v('N'), v('A')))),
		);
		expect(getQuery(prog)).to.equal(q);
	});

	it('should fail without a query', () => {
		expect(() => getQuery(program(base(pred('price', v('name'))))))
			.to.throw(SemanticError, 'The program has no query');
	});

	it('should fail with more than one query', () => {
		expect(() => getQuery(program(query(pred('a', v('X'))), query(pred('b', v('X'))))))
			.to.throw(SemanticError, 'The program has more than one query');
	});
});
