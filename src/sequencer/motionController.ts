import { Logger, NoopLogger } from '../diagnostics/logger';
import type { VelocityCommand } from '../protocol/robotCommands';
import type { Clock, TimerHandle } from './clock';

export interface MotionControllerOptions {
	publish: (command: VelocityCommand) => void;
	clock: Clock;
	/** Raised when a non-blocking timed motion has run its course and the base is stopped. */
	onMotionComplete: () => void;
	logger?: Logger;
}

/**
 * Issues velocity commands for scripted moves. At most one timed,
 * non-blocking move is armed at a time; arming another replaces it.
 */
export class MotionController {
	private readonly publish: (command: VelocityCommand) => void;
	private readonly clock: Clock;
	private readonly onMotionComplete: () => void;
	private readonly logger: Logger;
	private pending?: TimerHandle;

	public constructor(options: MotionControllerOptions) {
		this.publish = options.publish;
		this.clock = options.clock;
		this.onMotionComplete = options.onMotionComplete;
		this.logger = options.logger ?? new NoopLogger();
	}

	public isActive(): boolean {
		return this.pending !== undefined;
	}

	/**
	 * Publish (linear, angular) now. With a duration and `blocking`, suspend the
	 * caller for that long and then stop; otherwise behave like `drive`.
	 */
	public async move(linear: number, angular: number, durationMs = 0, blocking = false): Promise<void> {
		if (!blocking || durationMs <= 0) {
			this.drive(linear, angular, durationMs);
			return;
		}

		this.publishVelocity(linear, angular);
		await this.clock.sleep(durationMs);
		this.publishVelocity(0, 0);
	}

	/**
	 * Publish (linear, angular) now and, with a duration, arm the timer that
	 * stops the base and raises completion. Safe to call from event handlers.
	 */
	public drive(linear: number, angular: number, durationMs = 0): void {
		this.publishVelocity(linear, angular);
		if (durationMs <= 0) {
			return;
		}

		this.pending?.cancel();
		this.logger.debug('Timed motion armed', { linear, angular, durationMs });
		const handle = this.clock.setTimer(durationMs, () => {
			if (this.pending !== handle) {
				return;
			}
			this.pending = undefined;
			this.publishVelocity(0, 0);
			this.onMotionComplete();
		});
		this.pending = handle;
	}

	/** Disarm any timed move and stop the base without raising completion. */
	public cancel(): void {
		if (!this.pending) {
			return;
		}
		this.pending.cancel();
		this.pending = undefined;
		this.publishVelocity(0, 0);
	}

	private publishVelocity(linear: number, angular: number): void {
		this.publish({ topic: 'velocity', linear, angular });
	}
}
