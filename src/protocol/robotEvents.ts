/**
 * Inbound messages published by the unit's driver bridge.
 * Engage/release states follow the driver convention: 1 = engaged, 0 = released.
 */

export const BUTTON_STATE = {
	RELEASED: 0,
	PRESSED: 1
} as const;

export type ButtonStateCode = typeof BUTTON_STATE[keyof typeof BUTTON_STATE];

/** Function buttons, numbered left to right. */
export type ButtonIndex = 0 | 1 | 2;

/** Bumpers in driver order: 0 = left, 1 = center, 2 = right. */
export const BUMPER = {
	LEFT: 0,
	CENTER: 1,
	RIGHT: 2
} as const;

export type BumperIndex = typeof BUMPER[keyof typeof BUMPER];

export type WheelSide = 'left' | 'right';

export type WheelDropState = 'raised' | 'dropped';

export type CliffSensor = 'left' | 'center' | 'right';

export type CliffState = 'floor' | 'cliff';

export const POWER_EVENTS = [
	'unplugged',
	'pluggedToAdapter',
	'pluggedToDock',
	'chargeCompleted',
	'batteryLow',
	'batteryCritical'
] as const;

export type PowerEventKind = typeof POWER_EVENTS[number];

export type HealthLevel = 'OK' | 'WARN' | 'ERROR';

export interface Quaternion {
	x: number;
	y: number;
	z: number;
	w: number;
}

export interface DiagnosticKeyValue {
	key: string;
	value: string;
}

export interface DiagnosticStatus {
	name: string;
	level: number;
	message: string;
	values: DiagnosticKeyValue[];
}

export interface IdentificationEvent {
	topic: 'identification';
	/** Unique device id bytes. */
	udid: number[];
	hardware: string;
	firmware: string;
	software: string;
}

export interface TelemetryEvent {
	topic: 'telemetry';
	/** Left and right motor current, in units of 10 mA. */
	motorCurrent: [number, number];
	/** Nonzero while the charger is feeding the battery. */
	charger: number;
	/** Battery voltage in tenths of a volt. */
	battery: number;
	/** Raw analog input readings in millivolts. */
	analogInput: number[];
}

export interface DockInfraredEvent {
	topic: 'dockInfrared';
	data: [number, number, number];
}

export interface OrientationEvent {
	topic: 'orientation';
	orientation: Quaternion;
}

export interface ButtonEvent {
	topic: 'button';
	button: ButtonIndex;
	state: ButtonStateCode;
}

export interface BumperEvent {
	topic: 'bumper';
	bumper: BumperIndex;
	state: ButtonStateCode;
}

export interface WheelDropEvent {
	topic: 'wheelDrop';
	wheel: WheelSide;
	state: WheelDropState;
}

export interface CliffEvent {
	topic: 'cliff';
	sensor: CliffSensor;
	state: CliffState;
}

export interface PowerEvent {
	topic: 'power';
	event: PowerEventKind;
}

export interface DigitalInputEvent {
	topic: 'digitalInput';
	/** Per-channel level; inputs are active low, so `false` means pressed. */
	values: boolean[];
}

export interface DiagnosticsEvent {
	topic: 'diagnostics';
	status: DiagnosticStatus[];
}

export interface HealthStatusEvent {
	topic: 'healthStatus';
	level: HealthLevel;
}

export interface LifecycleEvent {
	topic: 'lifecycle';
	state: 'online' | 'offline';
}

export type RobotEvent =
	| IdentificationEvent
	| TelemetryEvent
	| DockInfraredEvent
	| OrientationEvent
	| ButtonEvent
	| BumperEvent
	| WheelDropEvent
	| CliffEvent
	| PowerEvent
	| DigitalInputEvent
	| DiagnosticsEvent
	| HealthStatusEvent
	| LifecycleEvent;

export type RobotEventTopic = RobotEvent['topic'];

export function formatUdid(udid: readonly number[]): string {
	return udid.map((part) => (part >>> 0).toString(16).toUpperCase().padStart(8, '0')).join('-');
}

export function yawFromQuaternion(q: Quaternion): number {
	return Math.atan2(2 * (q.w * q.z + q.x * q.y), 1 - 2 * (q.y * q.y + q.z * q.z));
}
