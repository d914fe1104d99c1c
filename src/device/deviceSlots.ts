/**
 * Device slots tracked for every unit, in result-column order.
 */
export const DEVICE_IDS = [
	'versionInfo',
	'irDockLeft',
	'irDockCenter',
	'irDockRight',
	'button0',
	'button1',
	'button2',
	'bumperLeft',
	'bumperCenter',
	'bumperRight',
	'wheelDropLeft',
	'wheelDropRight',
	'cliffLeft',
	'cliffCenter',
	'cliffRight',
	'powerJack',
	'powerDock',
	'charging',
	'led1',
	'led2',
	'sounds',
	'motorLeft',
	'motorRight',
	'gyroscope',
	'digitalInput',
	'digitalOutput',
	'analogInput'
] as const;

export type DeviceId = typeof DEVICE_IDS[number];

export const DEVICE_LABELS: Record<DeviceId, string> = {
	versionInfo: 'Version info',
	irDockLeft: 'Left dock IR',
	irDockCenter: 'Center dock IR',
	irDockRight: 'Right dock IR',
	button0: 'Button 0',
	button1: 'Button 1',
	button2: 'Button 2',
	bumperLeft: 'Left bumper',
	bumperCenter: 'Center bumper',
	bumperRight: 'Right bumper',
	wheelDropLeft: 'Left wheel drop',
	wheelDropRight: 'Right wheel drop',
	cliffLeft: 'Left cliff sensor',
	cliffCenter: 'Center cliff sensor',
	cliffRight: 'Right cliff sensor',
	powerJack: 'Adapter',
	powerDock: 'Docking base',
	charging: 'Charging',
	led1: 'LED 1',
	led2: 'LED 2',
	sounds: 'Sounds',
	motorLeft: 'Left motor',
	motorRight: 'Right motor',
	gyroscope: 'Gyroscope',
	digitalInput: 'Digital input',
	digitalOutput: 'Digital output',
	analogInput: 'Analog input'
};

export const BUTTON_DEVICES = ['button0', 'button1', 'button2'] as const satisfies readonly DeviceId[];

/** Indexed like `BumperIndex`: left, center, right. */
export const BUMPER_DEVICES = ['bumperLeft', 'bumperCenter', 'bumperRight'] as const satisfies readonly DeviceId[];

export const WHEEL_DROP_DEVICES = ['wheelDropLeft', 'wheelDropRight'] as const satisfies readonly DeviceId[];

export const CLIFF_DEVICES = ['cliffLeft', 'cliffCenter', 'cliffRight'] as const satisfies readonly DeviceId[];

export const POWER_DEVICES = ['powerJack', 'powerDock'] as const satisfies readonly DeviceId[];

export const IR_DOCK_DEVICES = ['irDockLeft', 'irDockCenter', 'irDockRight'] as const satisfies readonly DeviceId[];

export const MOTOR_DEVICES = ['motorLeft', 'motorRight'] as const satisfies readonly DeviceId[];
