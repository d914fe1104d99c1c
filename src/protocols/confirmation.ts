import type { DeviceId } from '../device/deviceSlots';
import { markVerified } from '../device/unitRecord';
import { BUTTON_STATE, ButtonEvent } from '../protocol/robotEvents';
import type { Step } from '../sequencer/steps';
import type { ProtocolContext } from './protocolContext';

export const ACCEPT_BUTTON = 0;
export const REJECT_BUTTON = 2;

interface ConfirmedDevices {
	label: string;
	devices: readonly DeviceId[];
}

/** Steps whose devices only the operator can judge. */
export function confirmedDevices(step: Step): ConfirmedDevices | undefined {
	switch (step) {
		case 'testLeds':
			return { label: 'LEDs', devices: ['led1', 'led2'] };
		case 'testSounds':
			return { label: 'Sounds', devices: ['sounds'] };
		case 'testDigitalIoPorts':
			return { label: 'Digital I/O', devices: ['digitalInput', 'digitalOutput'] };
		default:
			return undefined;
	}
}

/**
 * Interpret a button release as the operator's verdict. Returns true when the
 * event was consumed as an answer (or deliberately ignored while one is pending).
 */
export function handleConfirmationAnswer(ctx: ProtocolContext, event: ButtonEvent): boolean {
	const target = confirmedDevices(ctx.step);
	if (!target || !ctx.isConfirmationPending() || event.state !== BUTTON_STATE.RELEASED) {
		return false;
	}
	if (event.button !== ACCEPT_BUTTON && event.button !== REJECT_BUTTON) {
		return true;
	}

	const accepted = event.button === ACCEPT_BUTTON;
	for (const device of target.devices) {
		markVerified(ctx.record, device, accepted);
	}
	if (accepted) {
		ctx.logger.info(`${target.label} evaluation completed`);
	} else {
		ctx.logger.warn(`${target.label} didn't pass the test`);
	}

	// No further answers until the next step asks.
	ctx.clearConfirmation();
	ctx.prompt.hide();
	ctx.advance();
	return true;
}
