import assert from 'node:assert/strict';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import test from 'node:test';
import { normalizeFactoryTestConfig, readFactoryTestConfig, resolveConfigPath } from '../config/factoryTestConfig';
import { RecordingLogger } from './testHelpers';

function makeRoot(config?: string): string {
	const root = fs.mkdtempSync(path.join(os.tmpdir(), 'factory-test-config-'));
	if (config !== undefined) {
		fs.mkdirSync(path.join(root, 'config'), { recursive: true });
		fs.writeFileSync(path.join(root, 'config', 'factory-test.json'), config, 'utf8');
	}
	return root;
}

test('normalizeFactoryTestConfig fills defaults for an empty object', () => {
	const config = normalizeFactoryTestConfig({});

	assert.deepEqual(config.transport, {
		kind: 'tcp',
		host: '127.0.0.1',
		port: 7400,
		path: '/dev/ttyUSB0',
		baudRate: 115200
	});
	assert.equal(config.loopFrequencyHz, 20);
	assert.equal(config.resultFile, path.join('results', 'factory-test.csv'));
	assert.deepEqual(config.camera, { calibrationFile: '', deviceIndex: 0, command: '', args: [] });
	assert.equal(config.logLevel, 'info');
});

test('normalizeFactoryTestConfig sanitizes out-of-range values', () => {
	const config = normalizeFactoryTestConfig({
		transport: { kind: 'bluetooth', port: -3, baudRate: 300 },
		loopFrequencyHz: 0,
		logLevel: 'verbose',
		camera: { deviceIndex: 2.8, args: ['--fps', 30] }
	});

	assert.equal(config.transport.kind, 'tcp');
	assert.equal(config.transport.port, 1);
	assert.equal(config.transport.baudRate, 1200);
	assert.equal(config.loopFrequencyHz, 1);
	assert.equal(config.logLevel, 'info');
	assert.equal(config.camera.deviceIndex, 2);
	assert.deepEqual(config.camera.args, ['--fps']);
});

test('readFactoryTestConfig reads the file and resolves the result file against the root', () => {
	const root = makeRoot(
		JSON.stringify({
			transport: { kind: 'serial', path: '/dev/ttyACM0', baudRate: 57600 },
			resultFile: 'out/units.csv',
			logLevel: 'debug'
		})
	);
	const logger = new RecordingLogger();

	const config = readFactoryTestConfig(root, logger, {});

	assert.equal(config.transport.kind, 'serial');
	assert.equal(config.transport.path, '/dev/ttyACM0');
	assert.equal(config.transport.baudRate, 57600);
	assert.equal(config.resultFile, path.join(root, 'out', 'units.csv'));
	assert.equal(config.logLevel, 'debug');
	assert.deepEqual(logger.entries, []);
});

test('readFactoryTestConfig falls back to defaults and warns when the file is missing', () => {
	const root = makeRoot();
	const logger = new RecordingLogger();

	const config = readFactoryTestConfig(root, logger, {});

	assert.equal(config.transport.kind, 'tcp');
	assert.equal(config.resultFile, path.join(root, 'results', 'factory-test.csv'));
	assert.equal(logger.entries.length, 1);
	assert.equal(logger.entries[0].level, 'warn');
	assert.equal(logger.entries[0].message, 'Factory test config fallback to defaults.');
	assert.equal(logger.entries[0].meta?.configPath, path.join(root, 'config', 'factory-test.json'));
});

test('readFactoryTestConfig rejects a non-object JSON root', () => {
	const root = makeRoot('[1, 2]');
	const logger = new RecordingLogger();

	readFactoryTestConfig(root, logger, {});

	assert.equal(logger.entries[0].meta?.reason, 'JSON root must be an object.');
});

test('environment overrides take precedence over the file', () => {
	const root = makeRoot(JSON.stringify({ logLevel: 'warn', resultFile: 'a.csv' }));

	const config = readFactoryTestConfig(root, undefined, {
		FACTORY_TEST_LOG_LEVEL: ' debug ',
		FACTORY_TEST_RESULT_FILE: '/var/tmp/station-3.csv'
	});

	assert.equal(config.logLevel, 'debug');
	assert.equal(config.resultFile, '/var/tmp/station-3.csv');
});

test('an invalid log level override keeps the file value', () => {
	const root = makeRoot(JSON.stringify({ logLevel: 'warn' }));

	const config = readFactoryTestConfig(root, undefined, { FACTORY_TEST_LOG_LEVEL: 'loud' });

	assert.equal(config.logLevel, 'warn');
});

test('resolveConfigPath honours FACTORY_TEST_CONFIG relative to the root', () => {
	assert.equal(resolveConfigPath('/srv/station', { FACTORY_TEST_CONFIG: 'alt/cfg.json' }), '/srv/station/alt/cfg.json');
	assert.equal(resolveConfigPath('/srv/station', {}), '/srv/station/config/factory-test.json');
});
