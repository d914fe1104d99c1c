import assert from 'node:assert/strict';
import test from 'node:test';
import { allOutputsOff, digitalOutput } from '../protocol/robotCommands';
import { DIGITAL_IO_PROMPT, handleDigitalInput, startDigitalIoTest } from '../protocols/digitalInput';
import { handleButtonEvent } from '../protocols/orderedSequence';
import { ContextHarness, createContextHarness } from './testHelpers';

function pressInput(h: ContextHarness, channel: number): void {
	const values = [true, true, true, true];
	values[channel] = false;
	handleDigitalInput(h.ctx, { topic: 'digitalInput', values });
	handleDigitalInput(h.ctx, { topic: 'digitalInput', values: [true, true, true, true] });
}

test('starting the test clears the mask and switches the outputs off', () => {
	const h = createContextHarness('testDigitalIoPorts');
	h.record.devices.digitalInput.value = 5;

	startDigitalIoTest(h.ctx);

	assert.equal(h.record.devices.digitalInput.value, 0);
	assert.deepEqual(h.commands, [allOutputsOff()]);
	assert.equal(h.prompt.visible?.text, DIGITAL_IO_PROMPT.instructions);
});

test('a low input is mirrored on its output and recorded', () => {
	const h = createContextHarness('testDigitalIoPorts');

	handleDigitalInput(h.ctx, { topic: 'digitalInput', values: [true, true, false, true] });

	assert.equal(h.record.devices.digitalInput.value, 0b0100);
	assert.deepEqual(h.commands, [digitalOutput([2], true)]);
});

test('only the first low channel of an event counts', () => {
	const h = createContextHarness('testDigitalIoPorts');

	handleDigitalInput(h.ctx, { topic: 'digitalInput', values: [true, false, false, true] });

	assert.equal(h.record.devices.digitalInput.value, 0b0010);
});

test('all four inputs ask the operator and an accept verifies input and output', () => {
	const h = createContextHarness('testDigitalIoPorts');

	for (const channel of [0, 1, 2]) {
		pressInput(h, channel);
	}
	assert.equal(h.confirmation.pending, false);
	pressInput(h, 3);

	assert.equal(h.record.devices.digitalInput.value, 0b1111);
	assert.equal(h.confirmation.pending, true);
	assert.equal(h.prompt.visible?.text, DIGITAL_IO_PROMPT.confirm);
	assert.deepEqual(h.commands.at(-1), allOutputsOff());

	handleButtonEvent(h.ctx, { topic: 'button', button: 0, state: 0 });

	assert.equal(h.record.devices.digitalInput.verified, true);
	assert.equal(h.record.devices.digitalOutput.verified, true);
	assert.deepEqual(h.steps, ['testDigitalIoPorts', 'testAnalogInputPorts']);
});

test('digital input outside its step is ignored', () => {
	const h = createContextHarness('testAnalogInputPorts');

	handleDigitalInput(h.ctx, { topic: 'digitalInput', values: [false, true, true, true] });

	assert.equal(h.record.devices.digitalInput.value, 0);
	assert.deepEqual(h.commands, []);
});
