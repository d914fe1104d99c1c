import { DEVICE_LABELS, DeviceId } from '../device/deviceSlots';
import { cliffsOk, powerSourcesOk, UnitRecord, wheelDropsOk } from '../device/unitRecord';
import type {
	BumperEvent,
	CliffEvent,
	CliffSensor,
	PowerEvent,
	PowerEventKind,
	WheelDropEvent
} from '../protocol/robotEvents';
import { BUMPER, BUTTON_STATE } from '../protocol/robotEvents';
import { BUMPERS_TEST, ROUND_TRIPS } from '../sequencer/testLimits';
import type { Step } from '../sequencer/steps';
import type { ProtocolContext } from './protocolContext';

export type ParityAction = 'engage' | 'release';

/** Even counters expect the engage half of the pair, odd ones the release. */
export function expectedAction(counter: number): ParityAction {
	return counter % 2 === 0 ? 'engage' : 'release';
}

export type ParityOutcome = 'matched' | 'completed' | 'mismatch' | 'already-verified';

/**
 * Count one half of an engage/release pair for `device`. A mismatch leaves
 * the counter untouched; `roundTrips` complete pairs verify the device.
 */
export function applyParityEvent(
	record: UnitRecord,
	device: DeviceId,
	action: ParityAction,
	roundTrips: number
): ParityOutcome {
	const status = record.devices[device];
	if (status.verified) {
		return 'already-verified';
	}
	if (action !== expectedAction(status.value)) {
		return 'mismatch';
	}

	status.value += 1;
	if (status.value >= roundTrips * 2) {
		status.verified = true;
		return 'completed';
	}
	return 'matched';
}

const CLIFF_DEVICE: Record<CliffSensor, DeviceId> = {
	left: 'cliffLeft',
	center: 'cliffCenter',
	right: 'cliffRight'
};

export function handleCliffEvent(ctx: ProtocolContext, event: CliffEvent): void {
	if (ctx.step !== 'testCliffSensors') {
		ctx.logger.debug('Cliff event outside its test step; ignoring', { sensor: event.sensor, state: event.state });
		return;
	}

	const device = CLIFF_DEVICE[event.sensor];
	const outcome = applyParityEvent(ctx.record, device, event.state === 'cliff' ? 'engage' : 'release', ROUND_TRIPS.CLIFF);
	switch (outcome) {
		case 'already-verified':
			return;
		case 'mismatch':
			ctx.logger.warn('Unexpected cliff sensor event', { sensor: event.sensor, state: event.state });
			return;
		case 'matched':
			ctx.logger.info(`${DEVICE_LABELS[device]} reports ${event.state}, as expected`);
			return;
		case 'completed':
			ctx.logger.info(`${DEVICE_LABELS[device]} evaluation completed`);
			if (cliffsOk(ctx.record)) {
				ctx.prompt.hide();
				ctx.advance();
			}
			return;
	}
}

export function handleWheelDropEvent(ctx: ProtocolContext, event: WheelDropEvent): void {
	if (ctx.step !== 'testWheelDropSensors') {
		ctx.logger.debug('Wheel drop event outside its test step; ignoring', { wheel: event.wheel, state: event.state });
		return;
	}

	const device: DeviceId = event.wheel === 'left' ? 'wheelDropLeft' : 'wheelDropRight';
	const action: ParityAction = event.state === 'dropped' ? 'engage' : 'release';
	const outcome = applyParityEvent(ctx.record, device, action, ROUND_TRIPS.WHEEL_DROP);
	switch (outcome) {
		case 'already-verified':
			return;
		case 'mismatch':
			ctx.logger.warn('Unexpected wheel drop event', { wheel: event.wheel, state: event.state });
			return;
		case 'matched':
			ctx.logger.info(`${DEVICE_LABELS[device]} ${event.state}, as expected`);
			return;
		case 'completed':
			ctx.logger.info(`${DEVICE_LABELS[device]} evaluation completed`);
			if (wheelDropsOk(ctx.record)) {
				ctx.prompt.hide();
				ctx.advance();
			}
			return;
	}
}

/** Power notices the battery raises on its own; not worth a warning mid-test. */
const UNSOLICITED_POWER_EVENTS: readonly PowerEventKind[] = ['chargeCompleted', 'batteryLow', 'batteryCritical'];

function powerActionFor(step: Step, event: PowerEventKind): ParityAction | undefined {
	if (event === 'unplugged') {
		return 'release';
	}
	if ((event === 'pluggedToAdapter' && step === 'testDcAdapter') || (event === 'pluggedToDock' && step === 'testDockingBase')) {
		return 'engage';
	}
	return undefined;
}

export function handlePowerEvent(ctx: ProtocolContext, event: PowerEvent): void {
	if (powerSourcesOk(ctx.record)) {
		return;
	}

	if (ctx.step !== 'testDcAdapter' && ctx.step !== 'testDockingBase') {
		if (!UNSOLICITED_POWER_EVENTS.includes(event.event)) {
			ctx.logger.warn('Power event outside the power plug steps', { event: event.event, step: ctx.step });
		}
		return;
	}

	const device: DeviceId = ctx.step === 'testDcAdapter' ? 'powerJack' : 'powerDock';
	if (ctx.record.devices[device].verified) {
		return;
	}

	const action = powerActionFor(ctx.step, event.event);
	const outcome = action === undefined ? 'mismatch' : applyParityEvent(ctx.record, device, action, ROUND_TRIPS.POWER_PLUG);
	switch (outcome) {
		case 'already-verified':
			return;
		case 'mismatch':
			ctx.logger.warn('Unexpected power event', { event: event.event, step: ctx.step });
			return;
		case 'matched':
			ctx.logger.info(`${DEVICE_LABELS[device]} ${event.event === 'unplugged' ? 'unplugged' : 'plugged'}, as expected`);
			return;
		case 'completed':
			ctx.logger.info(`${DEVICE_LABELS[device]} plugging evaluation completed`);
			ctx.prompt.hide();
			ctx.advance();
			return;
	}
}

const BUMPER_DEVICE: Record<BumperEvent['bumper'], DeviceId> = {
	[BUMPER.LEFT]: 'bumperLeft',
	[BUMPER.CENTER]: 'bumperCenter',
	[BUMPER.RIGHT]: 'bumperRight'
};

/** Bumper the current step drives the base into, if any. */
export function expectedBumper(step: Step): BumperEvent['bumper'] | undefined {
	switch (step) {
		case 'centerBumperPressed':
		case 'centerBumperReleased':
			return BUMPER.CENTER;
		case 'rightBumperPressed':
		case 'rightBumperReleased':
			return BUMPER.RIGHT;
		case 'leftBumperPressed':
		case 'leftBumperReleased':
			return BUMPER.LEFT;
		default:
			return undefined;
	}
}

function isBumperWindow(step: Step): boolean {
	return step === 'centerBumperPressed' || expectedBumper(step) !== undefined || step === 'pointRightBumper' || step === 'pointLeftBumper';
}

/**
 * A matching press backs the base off for a fixed time and moves to the
 * release step; the back-off's completion then moves past it. The release
 * verifies the bumper.
 */
export function handleBumperEvent(ctx: ProtocolContext, event: BumperEvent): void {
	const state = event.state === BUTTON_STATE.PRESSED ? 'pressed' : 'released';
	if (!isBumperWindow(ctx.step)) {
		ctx.logger.debug('Bumper accidental hit; ignoring', { bumper: event.bumper, state });
		return;
	}

	const bumper = expectedBumper(ctx.step);
	const device = BUMPER_DEVICE[event.bumper];
	if (bumper !== event.bumper) {
		ctx.logger.warn('Unexpected bumper event', { bumper: event.bumper, state, step: ctx.step });
		return;
	}
	if (ctx.record.devices[device].verified) {
		return;
	}

	const action: ParityAction = event.state === BUTTON_STATE.PRESSED ? 'engage' : 'release';
	const outcome = applyParityEvent(ctx.record, device, action, ROUND_TRIPS.BUMPER);
	if (outcome === 'mismatch' || outcome === 'already-verified') {
		ctx.logger.warn('Unexpected bumper event', { bumper: event.bumper, state, step: ctx.step });
		return;
	}

	ctx.logger.info(`${DEVICE_LABELS[device]} ${state}, as expected`);
	if (action === 'engage') {
		ctx.drive(-BUMPERS_TEST.LINEAR_SPEED, 0, BUMPERS_TEST.BACK_OFF_MS);
		ctx.advance();
		return;
	}

	ctx.prompt.hide();
	if (ctx.step === 'leftBumperReleased') {
		ctx.logger.info('Bumper evaluation completed');
	}
}
