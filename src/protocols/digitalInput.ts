import { allOutputsOff, DIGITAL_CHANNELS, digitalOutput } from '../protocol/robotCommands';
import type { DigitalInputEvent } from '../protocol/robotEvents';
import { DIGITAL_INPUT_FULL_MASK } from '../sequencer/testLimits';
import type { ProtocolContext } from './protocolContext';

export const DIGITAL_IO_PROMPT = {
	title: 'Digital I/O test',
	instructions:
		'Press the four digital input buttons sequentially, from DI-1 to DI-4\n' +
		'The digital output LED below should switch on and off as the result',
	confirm: 'Press left function button if LEDs blinked as expected or right otherwise'
} as const;

/** Step entry: forget earlier presses and make sure every test board LED is off. */
export function startDigitalIoTest(ctx: ProtocolContext): void {
	ctx.prompt.show('info', DIGITAL_IO_PROMPT.title, DIGITAL_IO_PROMPT.instructions);
	ctx.record.devices.digitalInput.value = 0;
	ctx.publish(allOutputsOff());
}

/**
 * Inputs are active low. The first low channel is recorded in the input mask
 * and mirrored on its output; an all-high event switches the outputs off and,
 * once all four inputs have been seen, asks the operator to confirm.
 */
export function handleDigitalInput(ctx: ProtocolContext, event: DigitalInputEvent): void {
	if (ctx.step !== 'testDigitalIoPorts' || ctx.record.devices.digitalInput.verified) {
		return;
	}

	const status = ctx.record.devices.digitalInput;
	const channels = Math.min(event.values.length, DIGITAL_CHANNELS);
	for (let channel = 0; channel < channels; channel += 1) {
		if (!event.values[channel]) {
			status.value |= 1 << channel;
			ctx.publish(digitalOutput([channel], true));
			return;
		}
	}

	ctx.publish(allOutputsOff());
	if (status.value === DIGITAL_INPUT_FULL_MASK) {
		ctx.prompt.show('info', DIGITAL_IO_PROMPT.title, DIGITAL_IO_PROMPT.confirm);
		ctx.requestConfirmation();
	}
}
