import { expect } from 'chai';
import { filterAccepts } from '../../src/filter/evaluate.js';
import { ALWAYS_FALSE, IS_NOT_NULL, IS_NULL, bigintRange, type Filter } from '../../src/filter/filter.js';

describe('filterAccepts', () => {
	it('treats null per the filter kind', () => {
		expect(filterAccepts(IS_NULL, null)).to.equal(true);
		expect(filterAccepts(IS_NOT_NULL, null)).to.equal(false);
		expect(filterAccepts(ALWAYS_FALSE, null)).to.equal(false);
		expect(filterAccepts(bigintRange(0n, 1n, true), null)).to.equal(true);
		expect(filterAccepts(bigintRange(0n, 1n, false), null)).to.equal(false);
	});

	it('accepts integral numbers in bigint filters', () => {
		const filter = bigintRange(1n, 3n, false);
		expect(filterAccepts(filter, 2)).to.equal(true);
		expect(filterAccepts(filter, 2.5)).to.equal(false);
		expect(filterAccepts(filter, '2')).to.equal(false);
	});

	it('rejects NaN in a multi-range unless NaN is allowed', () => {
		const ranges: Filter[] = [{
			kind: 'doubleRange',
			lower: 0,
			lowerUnbounded: false,
			lowerExclusive: false,
			upper: 1,
			upperUnbounded: false,
			upperExclusive: false,
			nullAllowed: false,
		}];
		expect(filterAccepts({ kind: 'multiRange', filters: ranges, nullAllowed: false, nanAllowed: false }, Number.NaN)).to.equal(false);
		expect(filterAccepts({ kind: 'multiRange', filters: ranges, nullAllowed: false, nanAllowed: true }, Number.NaN)).to.equal(true);
	});

	it('compares booleans exactly', () => {
		const filter: Filter = { kind: 'boolValue', value: false, nullAllowed: false };
		expect(filterAccepts(filter, false)).to.equal(true);
		expect(filterAccepts(filter, true)).to.equal(false);
		expect(filterAccepts(filter, 0)).to.equal(false);
	});

	it('negates value sets', () => {
		const filter: Filter = { kind: 'negatedBigintValues', values: new Set([4n]), nullAllowed: false };
		expect(filterAccepts(filter, 4n)).to.equal(false);
		expect(filterAccepts(filter, 5n)).to.equal(true);
	});
});
