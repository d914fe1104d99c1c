export interface TimerHandle {
	cancel(): void;
}

/**
 * Time source for the control loop, scripted motions and the cooperative
 * waits inside measurement sub-phases. Tests substitute a virtual clock.
 */
export interface Clock {
	now(): number;
	sleep(ms: number): Promise<void>;
	setTimer(ms: number, callback: () => void): TimerHandle;
}

export class SystemClock implements Clock {
	public now(): number {
		return Date.now();
	}

	public sleep(ms: number): Promise<void> {
		return new Promise((resolve) => setTimeout(resolve, Math.max(0, ms)));
	}

	public setTimer(ms: number, callback: () => void): TimerHandle {
		const timer = setTimeout(callback, Math.max(0, ms));
		return {
			cancel: () => clearTimeout(timer)
		};
	}
}
