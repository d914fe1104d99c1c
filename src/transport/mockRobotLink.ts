import type { RobotCommand } from '../protocol/robotCommands';
import type { RobotEvent } from '../protocol/robotEvents';
import { FramedRobotLink } from './robotLink';

/** In-process link: tests inject events or raw wire text and inspect what was published. */
export class MockRobotLink extends FramedRobotLink {
	public readonly sentCommands: RobotCommand[] = [];

	private opened = false;
	private readonly failOpen?: Error;

	public constructor(options: { failOpen?: Error } = {}) {
		super();
		this.failOpen = options.failOpen;
	}

	public get isOpen(): boolean {
		return this.opened;
	}

	public async open(): Promise<void> {
		if (this.failOpen) {
			throw this.unavailable(`Mock link refused to open: ${this.failOpen.message}`, this.failOpen);
		}
		this.opened = true;
	}

	public async close(): Promise<void> {
		this.opened = false;
		this.resetFraming();
	}

	public publish(command: RobotCommand): void {
		if (!this.opened) {
			this.reportError(this.unavailable('Mock link is not open; command dropped.'));
			return;
		}
		this.sentCommands.push(command);
	}

	public emit(event: RobotEvent): void {
		this.dispatch(event);
	}

	public emitRaw(chunk: string): void {
		this.receive(chunk);
	}
}
