import { expect } from 'chai';
import {
	aliasOfKey, compareAtoms, compareKeys, compareVariables, formatKey, keyOfAtom, keyOfRule,
	keysEqual, removeRepeatedKeys, symtKey,
} from '../../src/analysis/key.js';
import { MisuseError } from '../../src/common/errors.js';
import { base, del, ins, num, pred, rel, rule, v } from '../helpers/builders.js';

describe('Predicate keys', () => {
	describe('compareKeys', () => {
		it('should order by name first', () => {
			expect(compareKeys(symtKey('a', 5), symtKey('b', 1))).to.be.lessThan(0);
			expect(compareKeys(symtKey('b', 1), symtKey('a', 5))).to.be.greaterThan(0);
		});

		it('should order by arity when names match', () => {
			expect(compareKeys(symtKey('p', 1), symtKey('p', 2))).to.be.lessThan(0);
			expect(compareKeys(symtKey('p', 2), symtKey('p', 2))).to.equal(0);
		});

		it('should compare names byte-wise', () => {
			expect(compareKeys(symtKey('Z', 0), symtKey('a', 0))).to.be.lessThan(0);
		});
	});

	it('keysEqual should agree with the comparator', () => {
		expect(keysEqual(symtKey('p', 2), { name: 'p', arity: 2 })).to.be.true;
		expect(keysEqual(symtKey('p', 2), symtKey('p', 3))).to.be.false;
	});

	it('should derive keys from atoms regardless of form', () => {
		expect(keyOfAtom(pred('price', v('N'), v('A')))).to.deep.equal({ name: 'price', arity: 2 });
		expect(keyOfAtom(ins('price', v('N'), v('A')))).to.deep.equal({ name: 'price', arity: 2 });
		expect(keyOfAtom(pred('flag'))).to.deep.equal({ name: 'flag', arity: 0 });
	});

	describe('keyOfRule', () => {
		it('should use the head signature', () => {
			expect(keyOfRule(rule(pred('cheap', v('N')), rel(pred('price', v('N'), v('A')))))).to.deep.equal({ name: 'cheap', arity: 1 });
		});

		it('should reject non-rule statements', () => {
			expect(() => keyOfRule(base(pred('price', v('N'))))).to.throw(MisuseError);
		});
	});

	it('should format keys and aliases', () => {
		expect(formatKey(symtKey('price', 2))).to.equal('price/2');
		expect(aliasOfKey(symtKey('price', 2))).to.equal('price_a2');
	});

	it('removeRepeatedKeys should sort and deduplicate', () => {
		const keys = [symtKey('q', 1), symtKey('p', 2), symtKey('q', 1), symtKey('p', 1), symtKey('p', 2)];
		expect(removeRepeatedKeys(keys)).to.deep.equal([
			{ name: 'p', arity: 1 },
			{ name: 'p', arity: 2 },
			{ name: 'q', arity: 1 },
		]);
		expect(keys).to.have.length(5);
	});

	describe('compareVariables', () => {
		it('should treat variables with the same printed form as equal', () => {
			expect(compareVariables(v('X'), v('X'))).to.equal(0);
			expect(compareVariables(num(1), v('_1'))).to.equal(0);
		});

		it('should order by printed form', () => {
			expect(compareVariables(v('A'), v('B'))).to.be.lessThan(0);
			expect(compareVariables(v('B'), num(0))).to.be.lessThan(0);
		});
	});

	it('compareAtoms should ignore arguments and form', () => {
		expect(compareAtoms(ins('p', v('X')), del('p', v('Y')))).to.equal(0);
		expect(compareAtoms(pred('p', v('X')), pred('p', v('X'), v('Y')))).to.be.lessThan(0);
	});
});
