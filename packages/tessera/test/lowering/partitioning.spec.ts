import { expect } from 'chai';
import { compilePartitioning, toKeyChannel, toPartitionedOutput, toPartitionKeys } from '../../src/lowering/partitioning.js';
import { ValuesNode } from '../../src/plan/nodes/scan-nodes.js';
import { rowType } from '../../src/types/row-type.js';
import { BIGINT } from '../../src/types/sql-type.js';
import { constant } from '../../src/plan/expressions.js';
import { InvariantViolationError, UnsupportedConstructError } from '../../src/common/errors.js';
import type * as wire from '../../src/protocol/index.js';
import { FakeConverter } from '../helpers/fake-converter.js';
import { bigintLiteral, call, scheme, systemPartitioning, variable } from '../helpers/wire-builders.js';

const converter = new FakeConverter();
const inputType = rowType(['a', 'b'], [BIGINT, BIGINT]);
const keyChannels = [{ kind: 'column' as const, channel: 1 }];

function system(partitioning: wire.SystemPartitioning, fn: wire.SystemPartitionFunction): wire.SystemPartitioningHandle {
	return { '@type': '$remote', partitioning, function: fn };
}

function hive(bucketFunctionType: wire.BucketFunctionType = 'HIVE_COMPATIBLE'): wire.HivePartitioningHandle {
	return { '@type': 'hive', bucketCount: 4, bucketFunctionType };
}

describe('Partitioning compiler', () => {
	describe('single-partition collapse', () => {
		it('collapses hash, round-robin and hive bucketing over one partition to single', () => {
			expect(compilePartitioning(system('FIXED', 'HASH'), keyChannels, inputType, [0])).to.deep.equal({ kind: 'single' });
			expect(compilePartitioning(system('FIXED', 'ROUND_ROBIN'), [], inputType, [0])).to.deep.equal({ kind: 'single' });
			expect(compilePartitioning(hive(), keyChannels, inputType, [0, 0, 0, 0])).to.deep.equal({ kind: 'single' });
		});

		it('collapses hive bucketing before checking the bucket function', () => {
			expect(compilePartitioning(hive('ENGINE_NATIVE'), keyChannels, inputType, [0, 0])).to.deep.equal({ kind: 'single' });
		});

		it('keeps SINGLE partitioning single', () => {
			expect(compilePartitioning(system('SINGLE', 'SINGLE'), [], inputType, undefined)).to.deep.equal({ kind: 'single' });
		});
	});

	it('compiles hash partitioning', () => {
		expect(compilePartitioning(system('FIXED', 'HASH'), keyChannels, inputType, [0, 1, 2])).to.deep.equal({
			kind: 'partitioned',
			numPartitions: 3,
			spec: { kind: 'hash', inputType, keyChannels },
		});
	});

	it('compiles round-robin partitioning', () => {
		expect(compilePartitioning(system('FIXED', 'ROUND_ROBIN'), [], inputType, [0, 1])).to.deep.equal({
			kind: 'partitioned',
			numPartitions: 2,
			spec: { kind: 'roundRobin' },
		});
	});

	it('counts hive partitions from the largest mapped partition', () => {
		expect(compilePartitioning(hive(), keyChannels, inputType, [0, 1, 0, 1])).to.deep.equal({
			kind: 'partitioned',
			numPartitions: 2,
			spec: { kind: 'hiveBucket', bucketCount: 4, bucketToPartition: [0, 1, 0, 1], keyChannels },
		});
	});

	it('compiles broadcast', () => {
		expect(compilePartitioning(system('FIXED', 'BROADCAST'), [], inputType, undefined)).to.deep.equal({ kind: 'broadcast' });
	});

	it('rejects unsupported combinations', () => {
		expect(() => compilePartitioning(hive('ENGINE_NATIVE'), keyChannels, inputType, [0, 1]))
			.to.throw(UnsupportedConstructError, 'ENGINE_NATIVE');
		expect(() => compilePartitioning(system('SOURCE', 'UNKNOWN'), [], inputType, undefined))
			.to.throw(UnsupportedConstructError, 'SOURCE');
		expect(() => compilePartitioning(system('SINGLE', 'HASH'), [], inputType, undefined))
			.to.throw(UnsupportedConstructError, 'HASH');
		expect(() => compilePartitioning(system('FIXED', 'UNKNOWN'), [], inputType, [0, 1]))
			.to.throw(UnsupportedConstructError, 'UNKNOWN');
	});

	it('requires a bucket mapping for bucketed partitionings', () => {
		expect(() => compilePartitioning(system('FIXED', 'HASH'), keyChannels, inputType, undefined))
			.to.throw(InvariantViolationError, 'bucket-to-partition');
		expect(() => compilePartitioning(hive(), keyChannels, inputType, []))
			.to.throw(InvariantViolationError, 'bucket-to-partition');
	});

	describe('partition keys', () => {
		it('accepts fields and constants', () => {
			const keys = toPartitionKeys([variable('b'), bigintLiteral(7)], converter);
			expect(toKeyChannel(keys[0], inputType)).to.deep.equal({ kind: 'column', channel: 1 });
			expect(toKeyChannel(keys[1], inputType)).to.deep.equal({
				kind: 'constant',
				vector: { type: BIGINT, values: [7n] },
			});
		});

		it('rejects other expressions', () => {
			expect(() => toPartitionKeys([call('abs', [variable('a')], 'bigint')], converter))
				.to.throw(InvariantViolationError, 'Expected variable or constant');
		});

		it('rejects fields missing from the input', () => {
			const [key] = toPartitionKeys([variable('z')], converter);
			expect(() => toKeyChannel(key, inputType)).to.throw(InvariantViolationError, "Field 'z' not found in row(a, b)");
		});

		it('gives literal keys a one-row vector', () => {
			expect(toKeyChannel(constant(BIGINT, 1n), inputType)).to.deep.equal({
				kind: 'constant',
				vector: { type: BIGINT, values: [1n] },
			});
		});
	});

	describe('toPartitionedOutput', () => {
		const source = new ValuesNode('0', inputType, []);
		const layout = [variable('a'), variable('b')];

		it('builds a hashed output over the source channels', () => {
			const output = toPartitionedOutput(
				'root',
				scheme(systemPartitioning('FIXED', 'HASH'), layout, { args: [variable('b')], bucketToPartition: [0, 1, 2, 3] }),
				source,
				converter,
			);
			expect(output.id).to.equal('root');
			expect(output.kind).to.equal('partitioned');
			expect(output.numPartitions).to.equal(4);
			expect(output.keys).to.deep.equal([{ kind: 'field', name: 'b', type: BIGINT }]);
			expect(output.partitionFunctionSpec).to.deep.equal({ kind: 'hash', inputType, keyChannels });
			expect(output.source).to.equal(source);
		});

		it('builds a single output for one partition', () => {
			const output = toPartitionedOutput(
				'root',
				scheme(systemPartitioning('FIXED', 'HASH'), layout, { args: [variable('b')], bucketToPartition: [0] }),
				source,
				converter,
			);
			expect(output.numPartitions).to.equal(1);
			expect(output.keys).to.deep.equal([]);
			expect(output.partitionFunctionSpec).to.deep.equal({ kind: 'gather' });
		});

		it('builds a broadcast output', () => {
			const output = toPartitionedOutput('root', scheme(systemPartitioning('FIXED', 'BROADCAST'), layout), source, converter);
			expect(output.isBroadcast).to.equal(true);
			expect(output.numPartitions).to.equal(1);
		});

		it('carries replicate-nulls-and-any through', () => {
			const output = toPartitionedOutput(
				'root',
				scheme(systemPartitioning('FIXED', 'HASH'), layout, {
					args: [variable('b')],
					bucketToPartition: [0, 1],
					replicateNullsAndAny: true,
				}),
				source,
				converter,
			);
			expect(output.replicateNullsAndAny).to.equal(true);
		});
	});
});
