import type { UnitRecord } from '../device/unitRecord';
import { markVerified, motorsOk } from '../device/unitRecord';
import type { TelemetryEvent } from '../protocol/robotEvents';
import { MOTOR_MAX_CURRENT } from '../sequencer/testLimits';
import type { ProtocolContext } from './protocolContext';

/** Keep the highest current each wheel motor has drawn so far. */
export function recordMotorCurrent(record: UnitRecord, telemetry: TelemetryEvent): void {
	const [left, right] = telemetry.motorCurrent;
	record.devices.motorLeft.value = Math.max(record.devices.motorLeft.value, left);
	record.devices.motorRight.value = Math.max(record.devices.motorRight.value, right);
}

export function evaluateMotorCurrent(ctx: ProtocolContext): void {
	const { motorLeft, motorRight } = ctx.record.devices;
	markVerified(ctx.record, 'motorLeft', motorLeft.value <= MOTOR_MAX_CURRENT);
	markVerified(ctx.record, 'motorRight', motorRight.value <= MOTOR_MAX_CURRENT);

	const peaks = `(${motorLeft.value}, ${motorRight.value})`;
	if (motorsOk(ctx.record)) {
		ctx.logger.info(`Motors current evaluation completed ${peaks}`);
	} else {
		ctx.logger.warn(`Motors current too high! ${peaks}`);
	}
}
