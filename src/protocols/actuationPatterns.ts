import { LED_COLOR, LED_COLOR_NAMES, LedColor, SOUND, SOUND_NAMES, SoundId } from '../protocol/robotCommands';
import { LEDS_TEST, SOUNDS_TEST } from '../sequencer/testLimits';
import type { ProtocolContext } from './protocolContext';

const LED_CYCLE: readonly LedColor[] = [LED_COLOR.GREEN, LED_COLOR.ORANGE, LED_COLOR.RED];

const SOUND_CYCLE: readonly SoundId[] = [
	SOUND.ON,
	SOUND.OFF,
	SOUND.RECHARGE,
	SOUND.BUTTON,
	SOUND.ERROR,
	SOUND.CLEANING_START,
	SOUND.CLEANING_END
];

const ANSWER_HINT = 'Press left function button if so or right otherwise\n';

/**
 * The first cycle after entering the step only shows the pattern; answers
 * are accepted from the second cycle on.
 */
function armConfirmation(ctx: ProtocolContext, entry: boolean): void {
	if (entry) {
		ctx.clearConfirmation();
	} else {
		ctx.requestConfirmation();
	}
}

function setLeds(ctx: ProtocolContext, color: LedColor): void {
	ctx.publish({ topic: 'led', led: 1, color });
	ctx.publish({ topic: 'led', led: 2, color });
}

/** One blink of both LEDs through each color; stops early once the step moves on. */
export async function runLedPattern(ctx: ProtocolContext, entry: boolean): Promise<void> {
	armConfirmation(ctx, entry);
	for (const color of LED_CYCLE) {
		if (!ctx.stillCurrent()) {
			return;
		}
		ctx.prompt.show(
			'info',
			'LEDs test',
			`You should see both LEDs blinking in green, orange and red alternatively\n${entry ? '' : ANSWER_HINT}${LED_COLOR_NAMES[color]}`
		);
		setLeds(ctx, color);
		await ctx.clock.sleep(LEDS_TEST.ON_MS);
		setLeds(ctx, LED_COLOR.BLACK);
		await ctx.clock.sleep(LEDS_TEST.OFF_MS);
	}
}

export async function runSoundPattern(ctx: ProtocolContext, entry: boolean): Promise<void> {
	armConfirmation(ctx, entry);
	for (const sound of SOUND_CYCLE) {
		if (!ctx.stillCurrent()) {
			return;
		}
		ctx.prompt.show(
			'info',
			'Sounds test',
			"You should hear sounds for 'On', 'Off', 'Recharge', 'Button', 'Error', 'Cleaning Start' and 'Cleaning End' continuously\n" +
				`${entry ? '' : ANSWER_HINT}${SOUND_NAMES[sound]}`
		);
		ctx.publish({ topic: 'sound', sound });
		await ctx.clock.sleep(SOUNDS_TEST.INTERVAL_MS);
	}
}
