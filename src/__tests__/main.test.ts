import assert from 'node:assert/strict';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import test from 'node:test';
import { FactoryTestError } from '../errors/FactoryTestError';
import { startHarness } from '../main';
import { MemoryResultSink } from '../results/resultSink';
import { MockRobotLink } from '../transport/mockRobotLink';
import { ScriptedYawSensor, VirtualClock } from './testHelpers';

class BrokenLink extends MockRobotLink {
	public async open(): Promise<void> {
		throw new Error('EACCES');
	}
}

function makeRoot(): string {
	return fs.mkdtempSync(path.join(os.tmpdir(), 'factory-test-harness-'));
}

test('startHarness wires the link to the sequencer and drives it from the control loop', async () => {
	const logLines: string[] = [];
	const prompts: string[] = [];
	const clock = new VirtualClock();
	const link = new MockRobotLink();
	const sensor = new ScriptedYawSensor([]);
	const sink = new MemoryResultSink();

	const runtime = await startHarness({
		rootPath: makeRoot(),
		env: {},
		writeLog: (line) => logLines.push(line),
		writePrompt: (text) => prompts.push(text),
		clock,
		link,
		visualSensor: sensor,
		resultSink: sink
	});

	assert.equal(link.isOpen, true);
	assert.equal(runtime.config.loopFrequencyHz, 20);
	assert.equal(runtime.loop.isRunning, true);
	assert.match(logLines[0], /\[warn\] Factory test config fallback to defaults\. /);
	assert.ok(logLines.some((line) => /\[info\] Factory test harness started \{"transport":"tcp","loopFrequencyHz":20,/.test(line)));

	link.emit({ topic: 'lifecycle', state: 'online' });
	link.emit({ topic: 'identification', udid: [10, 11, 12], hardware: 'h', firmware: 'f', software: 's' });
	await clock.advance(100);

	assert.equal(runtime.sequencer.currentStep, 'testDcAdapter');
	assert.deepEqual(prompts, ['== DC adapter plug test [INFO] ==\n   Plug and unplug adapter to robot 1 time(s)\n']);

	link.emitRaw('garbage\n');
	assert.match(logLines.at(-1) ?? '', /\[warn\] Invalid frame: malformed JSON\.$/);

	link.emit({ topic: 'lifecycle', state: 'offline' });
	assert.equal(sink.rows.length, 1);
	assert.equal(sink.rows[0].serial, '0000000A-0000000B-0000000C');

	await runtime.stop();
	assert.equal(link.isOpen, false);
	assert.equal(runtime.loop.isRunning, false);
	assert.equal(sensor.closeCalls, 1);
	assert.match(logLines.at(-1) ?? '', /\[info\] Factory test harness stopped$/);
});

test('startHarness honours the configured log level', async () => {
	const root = makeRoot();
	fs.mkdirSync(path.join(root, 'config'));
	fs.writeFileSync(path.join(root, 'config', 'factory-test.json'), JSON.stringify({ logLevel: 'error' }), 'utf8');
	const logLines: string[] = [];

	const runtime = await startHarness({
		rootPath: root,
		env: {},
		writeLog: (line) => logLines.push(line),
		writePrompt: () => undefined,
		clock: new VirtualClock(),
		link: new MockRobotLink(),
		visualSensor: new ScriptedYawSensor([]),
		resultSink: new MemoryResultSink()
	});
	await runtime.stop();

	assert.deepEqual(logLines, []);
});

test('startHarness fails with TRANSPORT_UNAVAILABLE when the link refuses to open', async () => {
	await assert.rejects(
		startHarness({
			rootPath: makeRoot(),
			env: {},
			writeLog: () => undefined,
			clock: new VirtualClock(),
			link: new MockRobotLink({ failOpen: new Error('no bridge') }),
			visualSensor: new ScriptedYawSensor([]),
			resultSink: new MemoryResultSink()
		}),
		(error: unknown) => error instanceof FactoryTestError && error.code === 'TRANSPORT_UNAVAILABLE' && error.fatal
	);
});

test('startHarness wraps unexpected link errors', async () => {
	await assert.rejects(
		startHarness({
			rootPath: makeRoot(),
			env: {},
			writeLog: () => undefined,
			clock: new VirtualClock(),
			link: new BrokenLink(),
			visualSensor: new ScriptedYawSensor([]),
			resultSink: new MemoryResultSink()
		}),
		(error: unknown) =>
			error instanceof FactoryTestError &&
			error.code === 'TRANSPORT_UNAVAILABLE' &&
			error.message === 'Robot link could not be opened: EACCES'
	);
});
