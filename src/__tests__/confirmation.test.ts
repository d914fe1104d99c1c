import assert from 'node:assert/strict';
import test from 'node:test';
import { confirmedDevices, handleConfirmationAnswer } from '../protocols/confirmation';
import { handleButtonEvent } from '../protocols/orderedSequence';
import { createContextHarness } from './testHelpers';

test('confirmedDevices names the operator-judged devices per step', () => {
	assert.deepEqual(confirmedDevices('testLeds'), { label: 'LEDs', devices: ['led1', 'led2'] });
	assert.deepEqual(confirmedDevices('testDigitalIoPorts'), {
		label: 'Digital I/O',
		devices: ['digitalInput', 'digitalOutput']
	});
	assert.equal(confirmedDevices('testCliffSensors'), undefined);
});

test('releasing the accept button verifies the devices and advances', () => {
	const h = createContextHarness('testLeds');
	h.confirmation.pending = true;

	handleButtonEvent(h.ctx, { topic: 'button', button: 0, state: 0 });

	assert.equal(h.record.devices.led1.verified, true);
	assert.equal(h.record.devices.led2.verified, true);
	assert.equal(h.confirmation.pending, false);
	assert.deepEqual(h.logger.messages('info'), ['LEDs evaluation completed']);
	assert.deepEqual(h.steps, ['testLeds', 'testSounds']);
	assert.equal(h.prompt.hideCount, 1);
});

test('releasing the reject button advances without verifying', () => {
	const h = createContextHarness('testSounds');
	h.confirmation.pending = true;

	handleButtonEvent(h.ctx, { topic: 'button', button: 2, state: 0 });

	assert.equal(h.record.devices.sounds.verified, false);
	assert.deepEqual(h.logger.messages('warn'), ["Sounds didn't pass the test"]);
	assert.deepEqual(h.steps, ['testSounds', 'testCliffSensors']);
});

test('the middle button is swallowed while an answer is pending', () => {
	const h = createContextHarness('testLeds');
	h.confirmation.pending = true;

	assert.equal(handleConfirmationAnswer(h.ctx, { topic: 'button', button: 1, state: 0 }), true);

	assert.equal(h.confirmation.pending, true);
	assert.deepEqual(h.steps, ['testLeds']);
	assert.deepEqual(h.logger.entries, []);
});

test('presses and unsolicited releases are not taken as answers', () => {
	const h = createContextHarness('testLeds');

	assert.equal(handleConfirmationAnswer(h.ctx, { topic: 'button', button: 0, state: 0 }), false);
	h.confirmation.pending = true;
	assert.equal(handleConfirmationAnswer(h.ctx, { topic: 'button', button: 0, state: 1 }), false);
	assert.equal(h.record.devices.led1.verified, false);
	assert.deepEqual(h.steps, ['testLeds']);
});
