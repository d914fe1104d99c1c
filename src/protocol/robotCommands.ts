export const LED_COLOR = {
	BLACK: 0,
	GREEN: 1,
	ORANGE: 2,
	RED: 3
} as const;

export type LedColor = typeof LED_COLOR[keyof typeof LED_COLOR];

export const LED_COLOR_NAMES: Record<LedColor, string> = {
	[LED_COLOR.BLACK]: 'BLACK',
	[LED_COLOR.GREEN]: 'GREEN',
	[LED_COLOR.ORANGE]: 'ORANGE',
	[LED_COLOR.RED]: 'RED'
};

export const SOUND = {
	ON: 0,
	OFF: 1,
	RECHARGE: 2,
	BUTTON: 3,
	ERROR: 4,
	CLEANING_START: 5,
	CLEANING_END: 6
} as const;

export type SoundId = typeof SOUND[keyof typeof SOUND];

export const SOUND_NAMES: Record<SoundId, string> = {
	[SOUND.ON]: 'ON',
	[SOUND.OFF]: 'OFF',
	[SOUND.RECHARGE]: 'RECHARGE',
	[SOUND.BUTTON]: 'BUTTON',
	[SOUND.ERROR]: 'ERROR',
	[SOUND.CLEANING_START]: 'CLEANING START',
	[SOUND.CLEANING_END]: 'CLEANING END'
};

export const DIGITAL_CHANNELS = 4;

export type ChannelFlags = [boolean, boolean, boolean, boolean];

export interface VelocityCommand {
	topic: 'velocity';
	/** m/s */
	linear: number;
	/** rad/s */
	angular: number;
}

export interface LedCommand {
	topic: 'led';
	led: 1 | 2;
	color: LedColor;
}

export interface SoundCommand {
	topic: 'sound';
	sound: SoundId;
}

/**
 * Only channels whose mask bit is set are driven; the others keep their level.
 */
export interface DigitalOutputCommand {
	topic: 'digitalOutput';
	values: ChannelFlags;
	mask: ChannelFlags;
}

export type RobotCommand = VelocityCommand | LedCommand | SoundCommand | DigitalOutputCommand;

export function noChannels(): ChannelFlags {
	return [false, false, false, false];
}

export function allChannels(): ChannelFlags {
	return [true, true, true, true];
}

/** Build an output command that drives the given channels to `level`. */
export function digitalOutput(channels: readonly number[], level: boolean): DigitalOutputCommand {
	const values = noChannels();
	const mask = noChannels();
	for (const channel of channels) {
		if (channel >= 0 && channel < DIGITAL_CHANNELS) {
			values[channel] = level;
			mask[channel] = true;
		}
	}
	return { topic: 'digitalOutput', values, mask };
}

/** Switch every output channel off. */
export function allOutputsOff(): DigitalOutputCommand {
	return { topic: 'digitalOutput', values: noChannels(), mask: allChannels() };
}
