import { ANALOG_CHANNELS, UnitRecord } from '../device/unitRecord';
import { allOutputsOff, digitalOutput } from '../protocol/robotCommands';
import { ANALOG_TEST } from '../sequencer/testLimits';
import type { PollResult, ProtocolContext } from './protocolContext';

/** Low threshold of channel i is bit i, high threshold bit i + 4. */
export const ANALOG_FULL_COVERAGE = 0xff;

export function lowCoverageBit(channel: number): number {
	return 1 << channel;
}

export function highCoverageBit(channel: number): number {
	return 1 << (channel + ANALOG_CHANNELS);
}

/** Fold one telemetry sample into the per-channel last/min/max/delta table. */
export function recordAnalogSample(record: UnitRecord, samples: readonly number[]): void {
	const count = Math.min(samples.length, record.analogChannels.length);
	for (let i = 0; i < count; i += 1) {
		const sample = samples[i];
		const channel = record.analogChannels[i];
		if (sample === undefined || channel === undefined) {
			continue;
		}
		channel.delta = sample - channel.last;
		channel.last = sample;
		channel.min = Math.min(channel.min, sample);
		channel.max = Math.max(channel.max, sample);
	}
}

type Indicator = 'low' | 'high';

const INDICATOR_CHANNEL: Record<Indicator, number> = {
	low: ANALOG_TEST.LOW_INDICATOR_CHANNEL,
	high: ANALOG_TEST.HIGH_INDICATOR_CHANNEL
};

/**
 * Threshold scan over the analog inputs. Every newly covered threshold lights
 * its indicator output for one second, counted in control ticks.
 */
export class AnalogThresholdScan {
	private readonly countdown: Record<Indicator, number> = { low: 0, high: 0 };

	public pendingPulses(): number {
		return this.countdown.low + this.countdown.high;
	}

	public poll(ctx: ProtocolContext, entry: boolean): PollResult {
		const status = ctx.record.devices.analogInput;
		if (entry) {
			ctx.prompt.show(
				'info',
				'Test analogue input',
				'Turn analogue input screws clockwise and counterclockwise until reaching the limits\n' +
					'The four LEDs below should get illuminated when completed'
			);
			ctx.publish(allOutputsOff());
			status.value = 0;
			this.countdown.low = 0;
			this.countdown.high = 0;
		}

		this.tickDown(ctx, 'low');
		this.tickDown(ctx, 'high');

		const pulseTicks = Math.max(1, Math.round(ctx.frequencyHz));
		ctx.record.analogChannels.forEach((channel, index) => {
			if ((status.value & lowCoverageBit(index)) === 0 && channel.min <= ANALOG_TEST.LOW_THRESHOLD) {
				status.value |= lowCoverageBit(index);
				this.pulse(ctx, 'low', pulseTicks);
			}
			if ((status.value & highCoverageBit(index)) === 0 && channel.max >= ANALOG_TEST.HIGH_THRESHOLD) {
				status.value |= highCoverageBit(index);
				this.pulse(ctx, 'high', pulseTicks);
			}
		});

		if (status.value !== ANALOG_FULL_COVERAGE || this.pendingPulses() > 0) {
			return 'pending';
		}

		ctx.logger.info('Analogue input evaluation completed');
		status.verified = true;
		ctx.prompt.hide();
		return 'done';
	}

	private pulse(ctx: ProtocolContext, indicator: Indicator, ticks: number): void {
		this.countdown[indicator] = ticks;
		ctx.publish(digitalOutput([INDICATOR_CHANNEL[indicator]], true));
	}

	private tickDown(ctx: ProtocolContext, indicator: Indicator): void {
		if (this.countdown[indicator] <= 0) {
			return;
		}
		this.countdown[indicator] -= 1;
		if (this.countdown[indicator] === 0) {
			ctx.publish(digitalOutput([INDICATOR_CHANNEL[indicator]], false));
		}
	}
}
