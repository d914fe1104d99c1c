import assert from 'node:assert/strict';
import test from 'node:test';
import {
	INITIAL_STEP,
	isStepBetween,
	nextStepIndex,
	stepAt,
	stepIndex,
	STEPS,
	TERMINAL_STEP
} from '../sequencer/steps';
import { durationMs } from '../sequencer/testLimits';

test('steps run from initialization to evaluationCompleted', () => {
	assert.equal(STEPS.length, 33);
	assert.equal(STEPS[0], INITIAL_STEP);
	assert.equal(STEPS[STEPS.length - 1], TERMINAL_STEP);
});

test('nextStepIndex moves one position and refuses to pass the terminal step', () => {
	assert.equal(stepAt(nextStepIndex(stepIndex('button0Pressed'))), 'button0Released');
	assert.throws(() => nextStepIndex(stepIndex(TERMINAL_STEP)), RangeError);
});

test('stepAt rejects positions outside the sequence', () => {
	assert.throws(() => stepAt(-1), /No qualification step at index -1\./);
	assert.throws(() => stepAt(33), RangeError);
});

test('isStepBetween is inclusive on both ends', () => {
	assert.equal(isStepBetween('button0Pressed', 'button0Pressed', 'button2Released'), true);
	assert.equal(isStepBetween('button2Released', 'button0Pressed', 'button2Released'), true);
	assert.equal(isStepBetween('testLeds', 'button0Pressed', 'button2Released'), false);
});

test('durationMs converts an amount and speed into milliseconds', () => {
	assert.equal(durationMs(0.4, 0.2), 2000);
	assert.equal(durationMs(Math.PI, -Math.PI / 2), 2000);
	assert.equal(durationMs(Math.PI / 4, Math.PI / 5), 1250);
	assert.equal(durationMs(2 * Math.PI, Math.PI / 3), 6000);
});
