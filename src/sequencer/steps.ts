/**
 * Qualification steps in execution order. The sequencer only ever moves one
 * position forward, or back to `initialization` once a unit is finalized.
 */
export const STEPS = [
	'initialization',
	'getSerialNumber',
	'testDcAdapter',
	'testDockingBase',
	'button0Pressed',
	'button0Released',
	'button1Pressed',
	'button1Released',
	'button2Pressed',
	'button2Released',
	'testLeds',
	'testSounds',
	'testCliffSensors',
	'testWheelDropSensors',
	'centerBumperPressed',
	'centerBumperReleased',
	'pointRightBumper',
	'rightBumperPressed',
	'rightBumperReleased',
	'pointLeftBumper',
	'leftBumperPressed',
	'leftBumperReleased',
	'prepareMotorsTest',
	'testMotorsForward',
	'testMotorsBackward',
	'testMotorsClockwise',
	'testMotorsCounterClockwise',
	'evalMotorsCurrent',
	'measureGyroError',
	'measureCharging',
	'testDigitalIoPorts',
	'testAnalogInputPorts',
	'evaluationCompleted'
] as const;

export type Step = typeof STEPS[number];

export const INITIAL_STEP: Step = 'initialization';
export const TERMINAL_STEP: Step = 'evaluationCompleted';

export function stepIndex(step: Step): number {
	return STEPS.indexOf(step);
}

export function stepAt(index: number): Step {
	const step = STEPS[index];
	if (step === undefined) {
		throw new RangeError(`No qualification step at index ${index}.`);
	}
	return step;
}

/** Index of the step after `index`; the terminal step has no successor. */
export function nextStepIndex(index: number): number {
	if (index >= STEPS.length - 1) {
		throw new RangeError(`Cannot advance past ${TERMINAL_STEP}.`);
	}
	return index + 1;
}

/** True when `step` lies within [first, last] in execution order. */
export function isStepBetween(step: Step, first: Step, last: Step): boolean {
	const index = stepIndex(step);
	return index >= stepIndex(first) && index <= stepIndex(last);
}
