import assert from 'node:assert/strict';
import test from 'node:test';
import { buttonsOk } from '../device/unitRecord';
import type { ButtonIndex, ButtonStateCode } from '../protocol/robotEvents';
import { buttonProgress, expectedButtonEvent, handleButtonEvent } from '../protocols/orderedSequence';
import { ContextHarness, createContextHarness } from './testHelpers';

function press(h: ContextHarness, button: ButtonIndex, state: ButtonStateCode): void {
	handleButtonEvent(h.ctx, { topic: 'button', button, state });
}

test('buttonProgress counts halves from the first press step', () => {
	assert.equal(buttonProgress('button0Pressed'), 0);
	assert.equal(buttonProgress('button1Released'), 3);
	assert.equal(buttonProgress('button2Released'), 5);
});

test('expectedButtonEvent alternates press and release per button', () => {
	assert.deepEqual(expectedButtonEvent(0), { button: 0, state: 1 });
	assert.deepEqual(expectedButtonEvent(3), { button: 1, state: 0 });
	assert.deepEqual(expectedButtonEvent(4), { button: 2, state: 1 });
});

test('pressing the buttons left to right verifies all three', () => {
	const h = createContextHarness('button0Pressed');

	for (const button of [0, 1, 2] as const) {
		press(h, button, 1);
		press(h, button, 0);
	}

	assert.equal(buttonsOk(h.record), true);
	assert.equal(h.steps.at(-1), 'testLeds');
	assert.equal(h.steps.length, 7);
	assert.equal(h.logger.messages('info').at(-1), 'Buttons evaluation completed');
	assert.equal(h.prompt.hideCount, 1);
});

test('a button is verified only once released', () => {
	const h = createContextHarness('button0Pressed');

	press(h, 0, 1);
	assert.equal(h.record.devices.button0.verified, false);
	press(h, 0, 0);
	assert.equal(h.record.devices.button0.verified, true);
	assert.deepEqual(h.logger.messages('info'), ['Button 0 pressed, as expected', 'Button 0 released, as expected']);
});

test('an out-of-order button is warned about and the step holds', () => {
	const h = createContextHarness('button0Pressed');

	press(h, 1, 1);

	assert.deepEqual(h.steps, ['button0Pressed']);
	assert.equal(h.logger.entries.length, 1);
	assert.deepEqual(h.logger.entries[0], {
		level: 'warn',
		message: 'Unexpected button event: Button 1 pressed',
		meta: { expectedButton: 0, expectedState: 1 }
	});
});

test('button events outside the button steps are ignored', () => {
	const h = createContextHarness('testCliffSensors');

	press(h, 0, 1);

	assert.deepEqual(h.logger.messages('debug'), ['Button 0 pressed; ignoring']);
	assert.deepEqual(h.steps, ['testCliffSensors']);
});
