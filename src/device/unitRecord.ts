import type { HealthLevel } from '../protocol/robotEvents';
import {
	BUMPER_DEVICES,
	BUTTON_DEVICES,
	CLIFF_DEVICES,
	DEVICE_IDS,
	DeviceId,
	IR_DOCK_DEVICES,
	MOTOR_DEVICES,
	POWER_DEVICES,
	WHEEL_DROP_DEVICES
} from './deviceSlots';

export const ANALOG_CHANNELS = 4;

/** Running extremes start outside any 16-bit reading so the first sample replaces them. */
export const ANALOG_MIN_SENTINEL = 0x7fff;
export const ANALOG_MAX_SENTINEL = -0x8000;

export interface DeviceStatus {
	verified: boolean;
	/** Device-specific: event counter, peak current, voltage delta or bitmask. */
	value: number;
}

export interface AnalogChannel {
	last: number;
	min: number;
	max: number;
	delta: number;
}

export interface UnitVersions {
	hardware: string;
	firmware: string;
	software: string;
}

/**
 * Orientation buffer slots: two (onboard yaw, difference) pairs, then the
 * latest raw onboard yaw.
 */
export const ORIENTATION_SLOT = {
	FIRST_YAW: 0,
	FIRST_DIFF: 1,
	SECOND_YAW: 2,
	SECOND_DIFF: 3,
	LATEST_YAW: 4
} as const;

export type OrientationBuffer = [number, number, number, number, number];

export interface UnitRecord {
	readonly sequenceId: number;
	serial: string;
	/** Raw unique device id the serial was derived from. */
	udid: number[];
	versions: UnitVersions;
	devices: Record<DeviceId, DeviceStatus>;
	analogChannels: AnalogChannel[];
	orientation: OrientationBuffer;
	diagnostics: string;
	health: HealthLevel;
}

function unverified(): DeviceStatus {
	return { verified: false, value: 0 };
}

function createDeviceTable(): Record<DeviceId, DeviceStatus> {
	return {
		versionInfo: unverified(),
		irDockLeft: unverified(),
		irDockCenter: unverified(),
		irDockRight: unverified(),
		button0: unverified(),
		button1: unverified(),
		button2: unverified(),
		bumperLeft: unverified(),
		bumperCenter: unverified(),
		bumperRight: unverified(),
		wheelDropLeft: unverified(),
		wheelDropRight: unverified(),
		cliffLeft: unverified(),
		cliffCenter: unverified(),
		cliffRight: unverified(),
		powerJack: unverified(),
		powerDock: unverified(),
		charging: unverified(),
		led1: unverified(),
		led2: unverified(),
		sounds: unverified(),
		motorLeft: unverified(),
		motorRight: unverified(),
		gyroscope: unverified(),
		digitalInput: unverified(),
		digitalOutput: unverified(),
		analogInput: unverified()
	};
}

export function createAnalogChannel(): AnalogChannel {
	return { last: 0, min: ANALOG_MIN_SENTINEL, max: ANALOG_MAX_SENTINEL, delta: 0 };
}

export function createUnitRecord(sequenceId: number): UnitRecord {
	return {
		sequenceId,
		serial: '',
		udid: [],
		versions: { hardware: '', firmware: '', software: '' },
		devices: createDeviceTable(),
		analogChannels: Array.from({ length: ANALOG_CHANNELS }, createAnalogChannel),
		orientation: [0, 0, 0, 0, 0],
		diagnostics: '',
		health: 'ERROR'
	};
}

/**
 * Latch a device as verified. A verified flag is never cleared; passing
 * `false` leaves the current state untouched.
 */
export function markVerified(record: UnitRecord, id: DeviceId, verified = true): void {
	if (verified) {
		record.devices[id].verified = true;
	}
}

function allVerified(record: UnitRecord, ids: readonly DeviceId[]): boolean {
	return ids.every((id) => record.devices[id].verified);
}

export const buttonsOk = (record: UnitRecord): boolean => allVerified(record, BUTTON_DEVICES);
export const bumpersOk = (record: UnitRecord): boolean => allVerified(record, BUMPER_DEVICES);
export const wheelDropsOk = (record: UnitRecord): boolean => allVerified(record, WHEEL_DROP_DEVICES);
export const cliffsOk = (record: UnitRecord): boolean => allVerified(record, CLIFF_DEVICES);
export const powerSourcesOk = (record: UnitRecord): boolean => allVerified(record, POWER_DEVICES);
export const irDockOk = (record: UnitRecord): boolean => allVerified(record, IR_DOCK_DEVICES);
export const motorsOk = (record: UnitRecord): boolean => allVerified(record, MOTOR_DEVICES);
export const allOk = (record: UnitRecord): boolean => allVerified(record, DEVICE_IDS);

export function versionSummary(record: UnitRecord): string {
	const { hardware, firmware, software } = record.versions;
	return `${hardware}/${firmware}/${software}`;
}
