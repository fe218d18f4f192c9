/**
 * Tests for configuration loading.
 */

import { expect } from 'chai';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
	DEFAULT_CONFIG, loadConfig, loadConfigFile, loadEnvConfig, mergeConfig, validateConfig,
} from '../src/config/index.js';
import { ConfigError } from '../src/common/errors.js';
import { createPlanTranslator } from '../src/lowering/create-translator.js';
import { BatchPlanTranslator, InteractivePlanTranslator } from '../src/lowering/plan-translator.js';
import { FakeConverter } from './helpers/fake-converter.js';

describe('Configuration', () => {
	describe('DEFAULT_CONFIG', () => {
		it('should default to interactive mode with the local shuffle', () => {
			expect(DEFAULT_CONFIG.mode).to.equal('interactive');
			expect(DEFAULT_CONFIG.shuffle.name).to.equal('local');
			expect(DEFAULT_CONFIG.shuffle.serializedWriteInfo).to.equal(undefined);
		});
	});

	describe('loadEnvConfig', () => {
		it('should load the mode from TESSERA_MODE', () => {
			expect(loadEnvConfig({ TESSERA_MODE: 'batch' }).mode).to.equal('batch');
		});

		it('should reject an unknown mode', () => {
			expect(() => loadEnvConfig({ TESSERA_MODE: 'streaming' })).to.throw(ConfigError, 'Invalid execution mode');
		});

		it('should load shuffle settings', () => {
			const config = loadEnvConfig({ TESSERA_SHUFFLE_NAME: 'disk', TESSERA_SHUFFLE_WRITE_INFO: '{"dir":"/tmp"}' });
			expect(config.shuffle).to.deep.equal({ name: 'disk', serializedWriteInfo: '{"dir":"/tmp"}' });
		});

		it('should load logging namespaces', () => {
			expect(loadEnvConfig({ TESSERA_LOG: 'tessera:*' }).logging).to.deep.equal({ namespaces: 'tessera:*' });
		});

		it('should return nothing for an empty environment', () => {
			expect(loadEnvConfig({})).to.deep.equal({});
		});
	});

	describe('validateConfig', () => {
		it('should accept a well-formed object', () => {
			expect(validateConfig({ mode: 'batch', shuffle: { name: 'disk' }, extra: 1 }, 'test')).to.deep.equal({
				mode: 'batch',
				shuffle: { name: 'disk' },
			});
		});

		it('should reject non-objects and mistyped fields', () => {
			expect(() => validateConfig([], 'test')).to.throw(ConfigError, 'must be a JSON object');
			expect(() => validateConfig({ shuffle: 'disk' }, 'test')).to.throw(ConfigError, "'shuffle' in test must be an object");
			expect(() => validateConfig({ shuffle: { name: 3 } }, 'test')).to.throw(ConfigError, "Expected a string for 'name'");
		});
	});

	describe('mergeConfig', () => {
		it('should apply later sources over earlier ones', () => {
			const config = mergeConfig(
				DEFAULT_CONFIG,
				{ mode: 'batch', shuffle: { name: 'disk' } },
				{ shuffle: { serializedWriteInfo: 'info' } },
			);
			expect(config.mode).to.equal('batch');
			expect(config.shuffle).to.deep.equal({ name: 'disk', serializedWriteInfo: 'info' });
		});
	});

	describe('loadConfig', () => {
		let dir: string;

		beforeEach(() => {
			dir = mkdtempSync(join(tmpdir(), 'tessera-config-'));
		});

		afterEach(() => {
			rmSync(dir, { recursive: true, force: true });
		});

		it('should return defaults when no overrides', () => {
			const config = loadConfig({ env: {} });
			expect(config).to.deep.equal(DEFAULT_CONFIG);
		});

		it('should layer file, environment and overrides', () => {
			const path = join(dir, 'tessera.json');
			writeFileSync(path, JSON.stringify({ mode: 'batch', shuffle: { name: 'file', serializedWriteInfo: 'from-file' } }));
			const config = loadConfig({
				configPath: path,
				env: { TESSERA_SHUFFLE_NAME: 'env' },
				overrides: { shuffle: { serializedWriteInfo: 'override' } },
			});
			expect(config.mode).to.equal('batch');
			expect(config.shuffle).to.deep.equal({ name: 'env', serializedWriteInfo: 'override' });
		});

		it('should ignore a missing file', () => {
			expect(loadConfigFile(join(dir, 'absent.json'))).to.deep.equal({});
		});

		it('should fail on unparseable JSON', () => {
			const path = join(dir, 'broken.json');
			writeFileSync(path, '{ mode: ');
			expect(() => loadConfigFile(path)).to.throw(ConfigError, 'Failed to parse config file');
		});
	});

	describe('createPlanTranslator', () => {
		it('should build the translator for the configured mode', () => {
			const converter = new FakeConverter();
			expect(createPlanTranslator(converter, DEFAULT_CONFIG)).to.be.instanceOf(InteractivePlanTranslator);
			expect(createPlanTranslator(converter, mergeConfig(DEFAULT_CONFIG, { mode: 'batch' })))
				.to.be.instanceOf(BatchPlanTranslator);
		});
	});
});
