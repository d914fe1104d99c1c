import { Logger, NoopLogger } from '../diagnostics/logger';
import { toErrorMessage } from '../errors/FactoryTestError';
import type { Clock, TimerHandle } from './clock';

export interface ControlLoopOptions {
	tick: () => Promise<void>;
	clock: Clock;
	frequencyHz: number;
	logger?: Logger;
}

/**
 * Fixed-rate driver for the sequencer. The next tick is scheduled only after
 * the previous one settles, so ticks never overlap; a slow tick shortens the
 * following wait instead of queueing work.
 */
export class ControlLoop {
	private readonly tick: () => Promise<void>;
	private readonly clock: Clock;
	private readonly periodMs: number;
	private readonly logger: Logger;

	private running = false;
	private timer?: TimerHandle;
	private inFlight?: Promise<void>;
	private completedTicks = 0;

	public constructor(options: ControlLoopOptions) {
		this.tick = options.tick;
		this.clock = options.clock;
		this.periodMs = 1_000 / Math.max(1, options.frequencyHz);
		this.logger = options.logger ?? new NoopLogger();
	}

	public get isRunning(): boolean {
		return this.running;
	}

	public get tickCount(): number {
		return this.completedTicks;
	}

	public start(): void {
		if (this.running) {
			return;
		}
		this.running = true;
		this.schedule(this.periodMs);
	}

	/** Stop scheduling and wait for a tick already in progress. */
	public async stop(): Promise<void> {
		this.running = false;
		this.timer?.cancel();
		this.timer = undefined;
		await this.inFlight;
	}

	private schedule(delayMs: number): void {
		this.timer = this.clock.setTimer(delayMs, () => {
			this.timer = undefined;
			this.inFlight = this.runOnce();
		});
	}

	private async runOnce(): Promise<void> {
		const startedAt = this.clock.now();
		try {
			await this.tick();
		} catch (error) {
			this.logger.error('Control loop tick failed', { error: toErrorMessage(error) });
		}
		this.completedTicks += 1;
		this.inFlight = undefined;

		if (this.running) {
			const elapsed = this.clock.now() - startedAt;
			this.schedule(Math.max(0, this.periodMs - elapsed));
		}
	}
}
