import { FactoryTestError } from '../errors/FactoryTestError';
import { decodeFrame, LineFramer } from '../protocol/frameCodec';
import type { RobotCommand } from '../protocol/robotCommands';
import type { RobotEvent } from '../protocol/robotEvents';

export type RobotEventListener = (event: RobotEvent) => void;
export type LinkErrorListener = (error: Error) => void;

/**
 * Bidirectional channel to the unit's driver bridge: decoded events in,
 * actuation commands out.
 */
export interface RobotLink {
	open(): Promise<void>;
	close(): Promise<void>;
	publish(command: RobotCommand): void;
	onEvent(listener: RobotEventListener): () => void;
	onError(listener: LinkErrorListener): () => void;
}

/**
 * Listener bookkeeping and newline framing shared by the stream-backed links.
 * A frame that fails to decode is reported through `onError` and dropped.
 */
export abstract class FramedRobotLink implements RobotLink {
	private readonly eventListeners = new Set<RobotEventListener>();
	private readonly errorListeners = new Set<LinkErrorListener>();
	private readonly framer = new LineFramer({
		onOverflow: (length) =>
			this.reportError(
				new FactoryTestError({
					code: 'INVALID_FRAME',
					message: `Invalid frame: no delimiter within ${length} characters; line dropped.`
				})
			)
	});

	public abstract open(): Promise<void>;
	public abstract close(): Promise<void>;
	public abstract publish(command: RobotCommand): void;

	public onEvent(listener: RobotEventListener): () => void {
		this.eventListeners.add(listener);
		return () => this.eventListeners.delete(listener);
	}

	public onError(listener: LinkErrorListener): () => void {
		this.errorListeners.add(listener);
		return () => this.errorListeners.delete(listener);
	}

	protected receive(chunk: string): void {
		for (const line of this.framer.push(chunk)) {
			let event: RobotEvent;
			try {
				event = decodeFrame(line);
			} catch (error) {
				this.reportError(error instanceof Error ? error : new Error(String(error)));
				continue;
			}
			this.dispatch(event);
		}
	}

	protected dispatch(event: RobotEvent): void {
		for (const listener of this.eventListeners) {
			listener(event);
		}
	}

	protected reportError(error: Error): void {
		for (const listener of this.errorListeners) {
			listener(error);
		}
	}

	protected resetFraming(): void {
		this.framer.reset();
	}

	protected unavailable(message: string, cause?: unknown): FactoryTestError {
		return new FactoryTestError({ code: 'TRANSPORT_UNAVAILABLE', message, cause });
	}
}
