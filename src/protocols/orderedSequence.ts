import type { DeviceId } from '../device/deviceSlots';
import { buttonsOk } from '../device/unitRecord';
import { BUTTON_STATE, ButtonEvent, ButtonIndex, ButtonStateCode } from '../protocol/robotEvents';
import { isStepBetween, Step, stepIndex } from '../sequencer/steps';
import { handleConfirmationAnswer } from './confirmation';
import type { ProtocolContext } from './protocolContext';

const BUTTON_DEVICE: Record<ButtonIndex, DeviceId> = {
	0: 'button0',
	1: 'button1',
	2: 'button2'
};

export interface ButtonExpectation {
	button: number;
	state: ButtonStateCode;
}

/** Progress counts matched halves from `button0Pressed`: press then release, button by button. */
export function buttonProgress(step: Step): number {
	return stepIndex(step) - stepIndex('button0Pressed');
}

export function expectedButtonEvent(progress: number): ButtonExpectation {
	return {
		button: Math.floor(progress / 2),
		state: progress % 2 === 0 ? BUTTON_STATE.PRESSED : BUTTON_STATE.RELEASED
	};
}

function describeButton(event: ButtonEvent): string {
	return `Button ${event.button} ${event.state === BUTTON_STATE.PRESSED ? 'pressed' : 'released'}`;
}

/**
 * Function buttons double as the operator's accept/reject input. A pending
 * confirmation takes precedence over the ordered press/release sequence.
 */
export function handleButtonEvent(ctx: ProtocolContext, event: ButtonEvent): void {
	if (handleConfirmationAnswer(ctx, event)) {
		return;
	}
	if (buttonsOk(ctx.record)) {
		return;
	}

	if (!isStepBetween(ctx.step, 'button0Pressed', 'button2Released')) {
		ctx.logger.debug(`${describeButton(event)}; ignoring`);
		return;
	}

	const expected = expectedButtonEvent(buttonProgress(ctx.step));
	if (event.button !== expected.button || event.state !== expected.state) {
		ctx.logger.warn(`Unexpected button event: ${describeButton(event)}`, {
			expectedButton: expected.button,
			expectedState: expected.state
		});
		return;
	}

	ctx.logger.info(`${describeButton(event)}, as expected`);
	if (event.state === BUTTON_STATE.RELEASED) {
		ctx.record.devices[BUTTON_DEVICE[event.button]].verified = true;
	}
	if (ctx.step === 'button2Released') {
		ctx.logger.info('Buttons evaluation completed');
		ctx.prompt.hide();
	}
	ctx.advance();
}
