import { ORIENTATION_SLOT } from '../device/unitRecord';
import { FactoryTestError, toErrorMessage } from '../errors/FactoryTestError';
import { durationMs, GYRO_TEST } from '../sequencer/testLimits';
import type { VisualReferenceSensor } from '../vision/visualReference';
import type { PollResult, ProtocolContext } from './protocolContext';

const TWO_PI = 2 * Math.PI;

/** Wrap an angle difference into (-pi, pi]. */
export function wrapYaw(angle: number): number {
	let wrapped = angle - TWO_PI * Math.floor((angle + Math.PI) / TWO_PI);
	if (wrapped <= -Math.PI) {
		wrapped += TWO_PI;
	}
	return wrapped;
}

export interface CameraTarget {
	calibrationFile: string;
	deviceIndex: number;
}

const PROMPT_TITLE = 'Gyroscope test';
const LEGS = 2;

/**
 * Poll the camera until it recognises the fiducial. The camera looks at the
 * base from above, so its yaw is negated. NaN means every attempt failed;
 * undefined means the unit or step changed while waiting.
 */
async function acquireReferenceYaw(ctx: ProtocolContext, sensor: VisualReferenceSensor): Promise<number | undefined> {
	for (let attempt = 0; attempt < GYRO_TEST.MAX_POLL_ATTEMPTS; attempt += 1) {
		await ctx.clock.sleep(GYRO_TEST.POLL_INTERVAL_MS);
		if (!ctx.stillCurrent()) {
			return undefined;
		}
		const yaw = -sensor.currentYaw();
		if (!Number.isNaN(yaw)) {
			ctx.prompt.hide();
			return yaw;
		}
		ctx.prompt.show('warn', PROMPT_TITLE, 'Cannot recognize the check board; please place the robot right below the camera');
	}
	return Number.NaN;
}

/**
 * Compare the onboard yaw with the camera's reference before and after a full
 * turn each way; a gyro that drifts shows up as a change in the difference.
 */
export async function measureGyroscope(
	ctx: ProtocolContext,
	sensor: VisualReferenceSensor,
	camera: CameraTarget,
	entry: boolean
): Promise<PollResult> {
	if (entry) {
		ctx.prompt.show('info', PROMPT_TITLE, 'Place the robot with the check board right below the camera');
	}

	let ready: boolean;
	try {
		ready = await sensor.init(camera.calibrationFile, camera.deviceIndex);
	} catch (error) {
		ctx.logger.error('Visual reference sensor failed to start', { error: toErrorMessage(error) });
		ready = false;
	}
	try {
		if (!ctx.stillCurrent()) {
			return 'aborted';
		}
		if (!ready) {
			const error = new FactoryTestError({
				code: 'SENSOR_INIT_FAILED',
				message: 'Gyroscope test initialization failed; aborting test',
				serial: ctx.record.serial
			});
			ctx.logger.error(error.message, { code: error.code });
			ctx.prompt.hide();
			return 'aborted';
		}
		return await runLegs(ctx, sensor);
	} finally {
		await sensor.close();
	}
}

async function runLegs(ctx: ProtocolContext, sensor: VisualReferenceSensor): Promise<PollResult> {
	const { record } = ctx;
	const turnMs = durationMs(GYRO_TEST.TURN, GYRO_TEST.ANGULAR_SPEED);

	for (let leg = 0; leg < LEGS; leg += 1) {
		const reference = await acquireReferenceYaw(ctx, sensor);
		if (reference === undefined) {
			return 'aborted';
		}
		if (Number.isNaN(reference)) {
			const error = new FactoryTestError({
				code: 'ACQUISITION_TIMEOUT',
				message: `Cannot recognize the check board after ${GYRO_TEST.MAX_POLL_ATTEMPTS} attempts; gyroscope test aborted`,
				serial: record.serial
			});
			ctx.logger.error(error.message, { code: error.code });
			ctx.prompt.show('error', PROMPT_TITLE, 'Cannot recognize the check board; gyroscope test aborted');
			return 'aborted';
		}

		const onboard = record.orientation[ORIENTATION_SLOT.LATEST_YAW];
		const diff = wrapYaw(onboard - reference);
		ctx.logger.info(
			`Gyroscope test ${leg + 1} result: imu yaw = ${onboard.toFixed(3)} / vo yaw = ${reference.toFixed(3)} / diff = ${diff.toFixed(3)}`
		);
		record.orientation[leg * 2] = onboard;
		record.orientation[leg * 2 + 1] = diff;

		if (leg === 0) {
			await ctx.move(0, GYRO_TEST.ANGULAR_SPEED, turnMs);
			await ctx.move(0, -GYRO_TEST.ANGULAR_SPEED, turnMs);
			if (!ctx.stillCurrent()) {
				return 'aborted';
			}
		}
		record.devices.gyroscope.value += 1;
	}

	const first = record.orientation[ORIENTATION_SLOT.FIRST_DIFF];
	const second = record.orientation[ORIENTATION_SLOT.SECOND_DIFF];
	const summary = `diff 1 = ${first.toFixed(3)} / diff 2 = ${second.toFixed(3)}`;
	if (Math.abs(first - second) <= GYRO_TEST.MAX_DIFF_RAD) {
		ctx.logger.info(`Gyroscope testing successful: ${summary}`);
		record.devices.gyroscope.verified = true;
	} else {
		ctx.logger.warn(`Gyroscope testing failed: ${summary}`);
	}
	ctx.prompt.hide();
	return 'done';
}
