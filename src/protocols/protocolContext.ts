import type { Logger } from '../diagnostics/logger';
import type { UnitRecord } from '../device/unitRecord';
import type { RobotCommand } from '../protocol/robotCommands';
import type { Clock } from '../sequencer/clock';
import type { Step } from '../sequencer/steps';
import type { PromptSink } from '../ui/promptSink';

/**
 * What a protocol may see and do while handling one event or one tick.
 * `record` and `step` are captured when the context is built; cooperative
 * phases call `stillCurrent()` after every suspension before touching either.
 */
export interface ProtocolContext {
	readonly record: UnitRecord;
	readonly step: Step;
	readonly logger: Logger;
	readonly prompt: PromptSink;
	readonly clock: Clock;
	/** Control loop rate; pulse lengths are expressed in ticks of this rate. */
	readonly frequencyHz: number;
	/** True while the captured record is under test and the step has not moved. */
	stillCurrent(): boolean;
	advance(): void;
	publish(command: RobotCommand): void;
	/** Non-blocking scripted motion; a timed move's completion advances the step. */
	drive(linear: number, angular: number, durationMs?: number): void;
	/** Blocking scripted motion: resolves once the base has been stopped again. */
	move(linear: number, angular: number, durationMs: number): Promise<void>;
	isConfirmationPending(): boolean;
	requestConfirmation(): void;
	clearConfirmation(): void;
}

/** Outcome of a polled measurement step. */
export type PollResult = 'done' | 'pending' | 'aborted';
