import { expect } from 'chai';
import { BatchPlanTranslator, InteractivePlanTranslator } from '../../src/lowering/plan-translator.js';
import { FRAGMENT_OUTPUT_ID, toExecutionStrategy } from '../../src/lowering/fragment-assembler.js';
import { LocalPartitionNode } from '../../src/plan/nodes/exchange-nodes.js';
import { PartitionAndSerializeNode, PartitionedOutputNode, ShuffleWriteNode } from '../../src/plan/nodes/output-nodes.js';
import { BIGINT } from '../../src/types/sql-type.js';
import { InvariantViolationError, UnsupportedConstructError } from '../../src/common/errors.js';
import type * as wire from '../../src/protocol/index.js';
import { FakeConverter } from '../helpers/fake-converter.js';
import { TASK_ID, fragment, scheme, systemPartitioning, variable } from '../helpers/wire-builders.js';

const converter = new FakeConverter();
const a = variable('a');
const source: wire.ValuesNode = { '@type': 'values', id: 'v', outputVariables: [a], rows: [] };
const output: wire.OutputNode = { '@type': 'output', id: 'out', source, columnNames: ['a'], outputVariables: [a] };

const single = scheme(systemPartitioning('SINGLE', 'SINGLE'), [a]);
const hashed = scheme(systemPartitioning('FIXED', 'HASH'), [a], { args: [a], bucketToPartition: [0, 1, 2] });

describe('Fragment assembler', () => {
	it('maps stage execution strategies', () => {
		expect(toExecutionStrategy('UNGROUPED_EXECUTION')).to.equal('ungrouped');
		expect(toExecutionStrategy('FIXED_LIFESPAN_SCHEDULE_GROUPED_EXECUTION')).to.equal('grouped');
		expect(toExecutionStrategy('DYNAMIC_LIFESPAN_SCHEDULE_GROUPED_EXECUTION')).to.equal('grouped');
		expect(() => toExecutionStrategy('RECOVERABLE_GROUPED_EXECUTION')).to.throw(UnsupportedConstructError, 'Recoverable');
	});

	describe('interactive', () => {
		const translator = new InteractivePlanTranslator(converter);

		it('keeps an output root as the fragment output', () => {
			const result = translator.assemble(fragment(output, single), undefined, TASK_ID);
			expect(result.executionStrategy).to.equal('ungrouped');
			expect(result.numSplitGroups).to.equal(1);
			expect([...result.groupedExecutionLeafNodeIds]).to.deep.equal([]);

			expect(result.planNode).to.be.instanceOf(PartitionedOutputNode);
			expect(result.planNode.id).to.equal('out');
			expect(result.planNode.getSources()[0].id).to.equal('v');
		});

		it('wraps any other root in a partitioned output', () => {
			const result = translator.assemble(fragment(source, hashed), undefined, TASK_ID);
			const root = result.planNode;
			if (!(root instanceof PartitionedOutputNode)) {
				throw new Error(`Unexpected root ${root.toString()}`);
			}
			expect(root.id).to.equal(FRAGMENT_OUTPUT_ID);
			expect(root.numPartitions).to.equal(3);
			expect(root.keys).to.deep.equal([{ kind: 'field', name: 'a', type: BIGINT }]);
		});

		it('carries grouped execution leaves and lifespans', () => {
			const result = translator.assemble(fragment(output, single, {
				stageExecutionStrategy: 'FIXED_LIFESPAN_SCHEDULE_GROUPED_EXECUTION',
				groupedExecutionScanNodes: ['v'],
				totalLifespans: 4,
			}), undefined, TASK_ID);
			expect(result.executionStrategy).to.equal('grouped');
			expect(result.numSplitGroups).to.equal(4);
			expect(result.groupedExecutionLeafNodeIds.has('v')).to.equal(true);
		});

		it('requires grouped leaves for grouped execution', () => {
			expect(() => translator.assemble(fragment(output, single, {
				stageExecutionStrategy: 'DYNAMIC_LIFESPAN_SCHEDULE_GROUPED_EXECUTION',
			}), undefined, TASK_ID)).to.throw(InvariantViolationError, 'requires at least one grouped leaf node');
		});

		it('rejects recoverable grouped execution', () => {
			expect(() => translator.assemble(fragment(output, single, {
				stageExecutionStrategy: 'RECOVERABLE_GROUPED_EXECUTION',
				groupedExecutionScanNodes: ['v'],
			}), undefined, TASK_ID)).to.throw(UnsupportedConstructError);
		});
	});

	describe('batch', () => {
		it('keeps a single output when there is no shuffle to write', () => {
			const translator = new BatchPlanTranslator(converter, { name: 'local' });
			const result = translator.assemble(fragment(source, single), undefined, TASK_ID);
			expect(result.planNode).to.be.instanceOf(PartitionedOutputNode);
			expect(result.planNode.id).to.equal(FRAGMENT_OUTPUT_ID);
		});

		it('requires shuffle write info for several partitions', () => {
			const translator = new BatchPlanTranslator(converter, { name: 'local' });
			expect(() => translator.assemble(fragment(source, hashed), undefined, TASK_ID))
				.to.throw(InvariantViolationError, 'Batch fragment with 3 output partitions requires shuffle write info');
		});

		it('writes partitions to the shuffle', () => {
			const translator = new BatchPlanTranslator(converter, { name: 'local', serializedWriteInfo: 'test-info' });
			const root = translator.assemble(fragment(source, hashed), undefined, TASK_ID).planNode;
			if (!(root instanceof ShuffleWriteNode)) {
				throw new Error(`Unexpected root ${root.toString()}`);
			}
			expect(root.id).to.equal('root');
			expect(root.shuffleName).to.equal('local');
			expect(root.serializedShuffleWriteInfo).to.equal('test-info');

			const gather = root.source;
			if (!(gather instanceof LocalPartitionNode)) {
				throw new Error(`Unexpected node ${gather.toString()}`);
			}
			expect(gather.id).to.equal('shuffle-gather');
			expect(gather.type).to.equal('gather');

			const serialize = gather.sources[0];
			if (!(serialize instanceof PartitionAndSerializeNode)) {
				throw new Error(`Unexpected node ${serialize.toString()}`);
			}
			expect(serialize.id).to.equal('shuffle-partition-serialize');
			expect(serialize.numPartitions).to.equal(3);
			expect(serialize.keys).to.deep.equal([{ kind: 'field', name: 'a', type: BIGINT }]);
			expect(serialize.serializedRowType.names).to.deep.equal(['a']);
			expect(serialize.partitionFunctionSpec).to.deep.equal({
				kind: 'hash',
				inputType: { names: ['a'], types: [BIGINT] },
				keyChannels: [{ kind: 'column', channel: 0 }],
			});
			expect(serialize.source.id).to.equal('v');
			expect(serialize.outputType.names).to.deep.equal(['partition', 'data']);
		});

		it('writes an output root to the shuffle too', () => {
			const translator = new BatchPlanTranslator(converter, { name: 'local', serializedWriteInfo: 'test-info' });
			const root = translator.assemble(fragment(output, single), undefined, TASK_ID).planNode;
			expect(root).to.be.instanceOf(ShuffleWriteNode);
		});

		it('rejects broadcast output', () => {
			const translator = new BatchPlanTranslator(converter, { name: 'local', serializedWriteInfo: 'test-info' });
			const broadcast = scheme(systemPartitioning('FIXED', 'BROADCAST'), [a]);
			expect(() => translator.assemble(fragment(source, broadcast), undefined, TASK_ID))
				.to.throw(UnsupportedConstructError, 'Broadcast output is not supported in batch mode');
		});

		it('rejects replicating nulls and any row', () => {
			const translator = new BatchPlanTranslator(converter, { name: 'local', serializedWriteInfo: 'test-info' });
			const replicating = scheme(systemPartitioning('FIXED', 'HASH'), [a], {
				args: [a],
				bucketToPartition: [0, 1],
				replicateNullsAndAny: true,
			});
			expect(() => translator.assemble(fragment(source, replicating), undefined, TASK_ID))
				.to.throw(UnsupportedConstructError, 'Replicating nulls');
		});
	});
});
