import assert from 'node:assert/strict';
import test from 'node:test';
import { FactoryTestError } from '../errors/FactoryTestError';
import { MAX_PENDING_FRAME_LENGTH } from '../protocol/frameCodec';
import type { RobotEvent } from '../protocol/robotEvents';
import { createRobotLink } from '../transport/linkFactory';
import { MockRobotLink } from '../transport/mockRobotLink';
import { SerialLink } from '../transport/serialLink';
import { TcpLink } from '../transport/tcpLink';

test('MockRobotLink decodes raw frames split across chunks', () => {
	const link = new MockRobotLink();
	const events: RobotEvent[] = [];
	link.onEvent((event) => events.push(event));

	link.emitRaw('{"topic":"lifecycle","state":"onl');
	link.emitRaw('ine"}\n{"topic":"button","button":1,"state":0}\n');

	assert.deepEqual(events, [
		{ topic: 'lifecycle', state: 'online' },
		{ topic: 'button', button: 1, state: 0 }
	]);
});

test('an endless line is dropped with an INVALID_FRAME error', () => {
	const link = new MockRobotLink();
	const events: RobotEvent[] = [];
	const errors: Error[] = [];
	link.onEvent((event) => events.push(event));
	link.onError((error) => errors.push(error));

	link.emitRaw('x'.repeat(MAX_PENDING_FRAME_LENGTH + 1));
	link.emitRaw('tail\n{"topic":"lifecycle","state":"online"}\n');

	assert.equal(errors.length, 1);
	const [error] = errors;
	assert.ok(error instanceof FactoryTestError);
	assert.equal(error.code, 'INVALID_FRAME');
	assert.equal(error.message, `Invalid frame: no delimiter within ${MAX_PENDING_FRAME_LENGTH + 1} characters; line dropped.`);
	assert.deepEqual(events, [{ topic: 'lifecycle', state: 'online' }]);
});

test('MockRobotLink reports undecodable frames and keeps going', () => {
	const link = new MockRobotLink();
	const events: RobotEvent[] = [];
	const errors: Error[] = [];
	link.onEvent((event) => events.push(event));
	link.onError((error) => errors.push(error));

	link.emitRaw('not json\n{"topic":"power","event":"batteryLow"}\n');

	assert.equal(errors.length, 1);
	assert.ok(errors[0] instanceof FactoryTestError);
	assert.equal(errors[0].message, 'Invalid frame: malformed JSON.');
	assert.deepEqual(events, [{ topic: 'power', event: 'batteryLow' }]);
});

test('unsubscribed listeners stop receiving events', () => {
	const link = new MockRobotLink();
	let count = 0;
	const unsubscribe = link.onEvent(() => {
		count += 1;
	});

	link.emit({ topic: 'lifecycle', state: 'online' });
	unsubscribe();
	link.emit({ topic: 'lifecycle', state: 'offline' });

	assert.equal(count, 1);
});

test('MockRobotLink records commands only while open', async () => {
	const link = new MockRobotLink();
	const errors: Error[] = [];
	link.onError((error) => errors.push(error));

	link.publish({ topic: 'sound', sound: 3 });
	await link.open();
	link.publish({ topic: 'sound', sound: 4 });
	await link.close();

	assert.deepEqual(link.sentCommands, [{ topic: 'sound', sound: 4 }]);
	assert.equal(errors[0].message, 'Mock link is not open; command dropped.');
	assert.equal(link.isOpen, false);
});

test('MockRobotLink can refuse to open', async () => {
	const link = new MockRobotLink({ failOpen: new Error('bridge offline') });

	await assert.rejects(
		link.open(),
		(error: unknown) =>
			error instanceof FactoryTestError &&
			error.code === 'TRANSPORT_UNAVAILABLE' &&
			error.message === 'Mock link refused to open: bridge offline'
	);
});

test('createRobotLink picks the link for the configured transport', () => {
	const base = { host: '127.0.0.1', port: 7400, path: '/dev/ttyUSB0', baudRate: 115200 };

	assert.ok(createRobotLink({ ...base, kind: 'tcp' }) instanceof TcpLink);
	assert.ok(createRobotLink({ ...base, kind: 'serial' }) instanceof SerialLink);
});
