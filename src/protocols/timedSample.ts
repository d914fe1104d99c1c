import type { UnitRecord } from '../device/unitRecord';
import { FactoryTestError } from '../errors/FactoryTestError';
import type { TelemetryEvent } from '../protocol/robotEvents';
import { CHARGING_TEST } from '../sequencer/testLimits';
import type { PollResult, ProtocolContext } from './protocolContext';

/** Latest battery voltage while the charger reports current flowing. */
export function recordChargingSample(record: UnitRecord, telemetry: TelemetryEvent): void {
	if (telemetry.charger !== 0) {
		record.devices.charging.value = telemetry.battery;
	}
}

function formatVolts(tenths: number): string {
	return (tenths / 10).toFixed(1);
}

/**
 * Charge measurement: wait for charging to start, let it settle, then take
 * two battery voltage samples a fixed window apart.
 */
export async function measureCharging(ctx: ProtocolContext, entry: boolean): Promise<PollResult> {
	const status = ctx.record.devices.charging;
	const measureSeconds = Math.round(CHARGING_TEST.MEASURE_MS / 1_000);
	if (entry) {
		ctx.prompt.show('info', 'Charge measurement', `Plug the adaptor to the robot and wait ${measureSeconds} seconds`);
	}

	const periodMs = 1_000 / ctx.frequencyHz;
	const attempts = Math.ceil(CHARGING_TEST.START_TIMEOUT_MS / periodMs);
	for (let i = 0; i < attempts && status.value === 0; i += 1) {
		await ctx.clock.sleep(periodMs);
		if (!ctx.stillCurrent()) {
			return 'aborted';
		}
	}

	ctx.prompt.hide();
	if (status.value === 0) {
		const timeoutSeconds = Math.round(CHARGING_TEST.START_TIMEOUT_MS / 1_000);
		const error = new FactoryTestError({
			code: 'ACQUISITION_TIMEOUT',
			message: `Adaptor not plugged after ${timeoutSeconds} seconds; aborting charge measurement`,
			serial: ctx.record.serial
		});
		ctx.logger.error(error.message, { code: error.code });
		ctx.prompt.show('error', 'Charge measurement', `Adaptor not plugged after ${timeoutSeconds} seconds`);
		return 'aborted';
	}

	await ctx.clock.sleep(CHARGING_TEST.SETTLE_MS);
	if (!ctx.stillCurrent()) {
		return 'aborted';
	}
	const first = status.value;

	await ctx.clock.sleep(CHARGING_TEST.MEASURE_MS);
	if (!ctx.stillCurrent()) {
		return 'aborted';
	}
	const second = status.value;

	status.value = second - first;
	const message = `Charge measurement: ${formatVolts(status.value)} V in ${measureSeconds} seconds`;
	if (status.value >= CHARGING_TEST.MIN_VOLTAGE_GAIN) {
		ctx.logger.info(message);
		status.verified = true;
	} else {
		ctx.logger.warn(message);
	}
	return 'done';
}
