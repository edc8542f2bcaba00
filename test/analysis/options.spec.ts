import { expect } from 'chai';
import { DEFAULT_ANALYSIS_OPTIONS, positionalNames, resolveAnalysisOptions } from '../../src/analysis/options.js';
import { MisuseError } from '../../src/common/errors.js';

describe('Analysis options', () => {
	it('should default every prefix', () => {
		expect(resolveAnalysisOptions()).to.deep.equal({ columnPrefix: 'col', placeholderPrefix: 'COL', tempPrefix: '__temp__' });
		expect(resolveAnalysisOptions()).to.not.equal(DEFAULT_ANALYSIS_OPTIONS);
	});

	it('should merge partial options', () => {
		expect(resolveAnalysisOptions({ columnPrefix: 'c' }).columnPrefix).to.equal('c');
		expect(resolveAnalysisOptions({ columnPrefix: 'c' }).placeholderPrefix).to.equal('COL');
	});

	it('should reject prefixes that cannot start an identifier', () => {
		expect(() => resolveAnalysisOptions({ columnPrefix: '' })).to.throw(MisuseError, 'columnPrefix');
		expect(() => resolveAnalysisOptions({ tempPrefix: '1x' })).to.throw(MisuseError, 'tempPrefix');
	});

	it('positionalNames should count from zero', () => {
		expect(positionalNames('col', 3)).to.deep.equal(['col0', 'col1', 'col2']);
		expect(positionalNames('col', 0)).to.deep.equal([]);
	});
});
