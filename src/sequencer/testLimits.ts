/** Motor current test: linear speed (m/s), angular speed (rad/s), distance (m), turn (rad). */
export const MOTORS_TEST = {
	LINEAR_SPEED: 0.2,
	ANGULAR_SPEED: Math.PI / 2,
	DISTANCE: 0.4,
	TURN: Math.PI
} as const;

export const BUMPERS_TEST = {
	LINEAR_SPEED: 0.1,
	ANGULAR_SPEED: Math.PI / 5,
	APPROACH_DELAY_MS: 1_500,
	BACK_OFF_MS: 1_500
} as const;

export const GYRO_TEST = {
	ANGULAR_SPEED: Math.PI / 3,
	/** One full turn each way. */
	TURN: 2 * Math.PI,
	MAX_DIFF_RAD: 0.05,
	POLL_INTERVAL_MS: 200,
	MAX_POLL_ATTEMPTS: 80
} as const;

export const CHARGING_TEST = {
	START_TIMEOUT_MS: 40_000,
	SETTLE_MS: 2_000,
	MEASURE_MS: 10_000,
	/** Tenths of a volt. */
	MIN_VOLTAGE_GAIN: 2
} as const;

export const ANALOG_TEST = {
	/** Millivolts. */
	LOW_THRESHOLD: 2,
	HIGH_THRESHOLD: 4_090,
	LOW_INDICATOR_CHANNEL: 0,
	HIGH_INDICATOR_CHANNEL: 3
} as const;

/** Units of 10 mA. */
export const MOTOR_MAX_CURRENT = 24;

/** Required engage/release round trips per device family. */
export const ROUND_TRIPS = {
	CLIFF: 2,
	WHEEL_DROP: 2,
	POWER_PLUG: 1,
	BUMPER: 1
} as const;

export const LEDS_TEST = {
	ON_MS: 1_000,
	OFF_MS: 500
} as const;

export const SOUNDS_TEST = {
	INTERVAL_MS: 1_200
} as const;

/** All four digital inputs pressed. */
export const DIGITAL_INPUT_FULL_MASK = 0b1111;

export const SERIAL_WAIT_LOG_INTERVAL_MS = 2_000;

export function durationMs(amount: number, speed: number): number {
	return Math.round((Math.abs(amount) / Math.abs(speed)) * 1_000);
}
