import { expect } from 'chai';
import debug from 'debug';
import { format } from 'node:util';
import {
	ConfigError, InvariantViolationError, TesseraError, UnsupportedConstructError, invariant, tagOf, unsupported,
} from '../src/common/errors.js';
import { StatusCode } from '../src/common/types.js';
import { createLogger, disableLogging, enableLogging, isLoggingEnabled } from '../src/common/logger.js';

describe('Errors', () => {
	it('gives each fatal kind its own status code and construct', () => {
		const u = new UnsupportedConstructError('no such node', 'mystery');
		expect(u).to.be.instanceOf(TesseraError);
		expect(u.code).to.equal(StatusCode.UNSUPPORTED);
		expect(u.construct).to.equal('mystery');
		expect(u.name).to.equal('UnsupportedConstructError');

		const i = new InvariantViolationError('broken', 'values');
		expect(i).to.be.instanceOf(TesseraError);
		expect(i.code).to.equal(StatusCode.INTERNAL);
		expect(i.construct).to.equal('values');
		expect(i).to.not.be.instanceOf(UnsupportedConstructError);
	});

	it('keeps the cause of a config error', () => {
		const cause = new Error('bad json');
		const e = new ConfigError('cannot load', cause);
		expect(e.code).to.equal(StatusCode.MISUSE);
		expect(e.cause).to.equal(cause);
	});

	it('throws from the helpers', () => {
		expect(() => unsupported('nope', 'x')).to.throw(UnsupportedConstructError, 'nope');
		expect(() => invariant(false, 'must hold')).to.throw(InvariantViolationError, 'must hold');
		expect(() => invariant(true, 'must hold')).to.not.throw();
	});

	it('reads wire tags defensively', () => {
		expect(tagOf({ '@type': 'future' })).to.equal('future');
		expect(tagOf({ '@type': 3 })).to.equal('object');
		expect(tagOf('text')).to.equal('string');
		expect(tagOf(null)).to.equal('object');
	});
});

describe('Logging', () => {
	afterEach(() => {
		disableLogging();
	});

	it('enables namespaces by pattern', () => {
		enableLogging('tessera:lowering:*');
		expect(isLoggingEnabled('lowering', 'translator')).to.equal(true);
		expect(isLoggingEnabled('config')).to.equal(false);
	});

	it('enables whole areas', () => {
		enableLogging(['filter', 'config']);
		expect(isLoggingEnabled('filter')).to.equal(true);
		expect(isLoggingEnabled('config', 'loader')).to.equal(true);
		expect(isLoggingEnabled('lowering', 'translator')).to.equal(false);
	});

	it('routes output through a custom writer', () => {
		const originalLog = debug.log;
		const lines: string[] = [];
		try {
			enableLogging(['config'], (...args: unknown[]) => { lines.push(format(...args)); });
			createLogger('config', 'test')('hello %s', 'world');
		} finally {
			debug.log = originalLog;
		}
		expect(lines).to.have.length(1);
		expect(lines[0]).to.contain('hello world');
	});

	it('is silent once disabled', () => {
		enableLogging();
		disableLogging();
		expect(isLoggingEnabled('lowering', 'translator')).to.equal(false);
	});
});
