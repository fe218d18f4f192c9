import { expect } from 'chai';
import { formatPlan, formatPropertyValue, visitPlan } from '../../src/util/plan-formatter.js';
import { ValuesNode } from '../../src/plan/nodes/scan-nodes.js';
import { EnforceSingleRowNode, FilterNode } from '../../src/plan/nodes/relational-nodes.js';
import { LimitNode } from '../../src/plan/nodes/ordering-nodes.js';
import { constant, field } from '../../src/plan/expressions.js';
import { rowType } from '../../src/types/row-type.js';
import { BIGINT, BOOLEAN } from '../../src/types/sql-type.js';

function samplePlan(): LimitNode {
	const values = new ValuesNode('1', rowType(['a'], [BIGINT]), [[1n], [2n]]);
	const filter = new FilterNode('2', {
		kind: 'call',
		name: 'gt',
		type: BOOLEAN,
		inputs: [field('a', BIGINT), constant(BIGINT, 1n)],
	}, values);
	return new LimitNode('3', 0n, 10n, false, filter);
}

describe('Plan formatter', () => {
	it('renders one indented line per node', () => {
		expect(formatPlan(samplePlan())).to.equal([
			'Limit[3] offset=0 count=10 partial=false',
			'  Filter[2] predicate=gt("a", 1:bigint)',
			'    Values[1] rows=2',
		].join('\n'));
	});

	it('appends output types on request', () => {
		const lines = formatPlan(samplePlan(), { showTypes: true, indent: '\t' }).split('\n');
		expect(lines[2]).to.equal('\t\tValues[1] rows=2 -> ROW<a:bigint>');
	});

	it('omits the property list for nodes without properties', () => {
		const plan = new EnforceSingleRowNode('4', samplePlan());
		expect(formatPlan(plan).split('\n')[0]).to.equal('EnforceSingleRow[4]');
	});

	it('visits nodes pre-order with their depth', () => {
		const visited: [string, number][] = [];
		visitPlan(samplePlan(), (node, depth) => visited.push([node.id, depth]));
		expect(visited).to.deep.equal([['3', 0], ['2', 1], ['1', 2]]);
	});

	it('formats nested property values', () => {
		expect(formatPropertyValue([1n, 'x'])).to.equal('[1, x]');
		expect(formatPropertyValue(new Map([['k', [true]]]))).to.equal('{k: [true]}');
		expect(formatPropertyValue({ a: { b: 2 } })).to.equal('{a: {b: 2}}');
	});
});
