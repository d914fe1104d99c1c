import { Logger, NoopLogger } from '../diagnostics/logger';
import { EvaluatedLedger } from '../device/evaluatedLedger';
import { allOk, createUnitRecord, UnitRecord, versionSummary } from '../device/unitRecord';
import { FactoryTestError, toErrorMessage } from '../errors/FactoryTestError';
import type { RobotCommand } from '../protocol/robotCommands';
import { formatUdid, IdentificationEvent, LifecycleEvent, RobotEvent } from '../protocol/robotEvents';
import { runLedPattern, runSoundPattern } from '../protocols/actuationPatterns';
import { startDigitalIoTest, handleDigitalInput } from '../protocols/digitalInput';
import { handleDockInfrared } from '../protocols/dockInfrared';
import { CameraTarget, measureGyroscope } from '../protocols/externalReference';
import { handleButtonEvent } from '../protocols/orderedSequence';
import {
	handleBumperEvent,
	handleCliffEvent,
	handlePowerEvent,
	handleWheelDropEvent
} from '../protocols/parityCounter';
import { evaluateMotorCurrent, recordMotorCurrent } from '../protocols/peakTracking';
import type { ProtocolContext } from '../protocols/protocolContext';
import { AnalogThresholdScan, recordAnalogSample } from '../protocols/thresholdCrossing';
import { measureCharging, recordChargingSample } from '../protocols/timedSample';
import { applyHealthStatus, formatDiagnostics, recordOrientation } from '../protocols/unitDiagnostics';
import { buildResultRow, ResultSink } from '../results/resultSink';
import { NoopPromptSink, PromptSink } from '../ui/promptSink';
import type { VisualReferenceSensor } from '../vision/visualReference';
import type { Clock } from './clock';
import { MotionController } from './motionController';
import { INITIAL_STEP, isStepBetween, nextStepIndex, Step, stepAt, stepIndex } from './steps';
import {
	BUMPERS_TEST,
	durationMs,
	MOTORS_TEST,
	ROUND_TRIPS,
	SERIAL_WAIT_LOG_INTERVAL_MS
} from './testLimits';

export interface TestSequencerOptions {
	publish: (command: RobotCommand) => void;
	clock: Clock;
	resultSink: ResultSink;
	visualSensor: VisualReferenceSensor;
	camera: CameraTarget;
	frequencyHz: number;
	logger?: Logger;
	prompt?: PromptSink;
	ledger?: EvaluatedLedger;
}

/** Step entry instructions for the steps that only wait on the operator. */
const ENTRY_PROMPTS: Partial<Record<Step, { title: string; text: string }>> = {
	testDcAdapter: {
		title: 'DC adapter plug test',
		text: `Plug and unplug adapter to robot ${ROUND_TRIPS.POWER_PLUG} time(s)`
	},
	testDockingBase: {
		title: 'Docking base plug test',
		text: `Plug and unplug robot to its base ${ROUND_TRIPS.POWER_PLUG} time(s)`
	},
	button0Pressed: {
		title: 'Function buttons test',
		text: 'Press the three function buttons sequentially from left to right'
	},
	testCliffSensors: {
		title: 'Cliff sensors test',
		text: `Raise and lower robot ${ROUND_TRIPS.CLIFF} time(s) to test cliff sensors`
	},
	testWheelDropSensors: {
		title: 'Wheel drop sensors test',
		text: `Raise and lower robot ${ROUND_TRIPS.WHEEL_DROP} time(s) to test wheel drop sensors`
	}
};

const MOTORS_PROMPT = 'Motors current test';

/**
 * Owns the unit under test and the current qualification step. Events from
 * the link are dispatched to the matching protocol as they arrive; `tick()`
 * runs the current step's action once per control period.
 */
export class TestSequencer {
	private readonly publishCommand: (command: RobotCommand) => void;
	private readonly clock: Clock;
	private readonly resultSink: ResultSink;
	private readonly visualSensor: VisualReferenceSensor;
	private readonly camera: CameraTarget;
	private readonly frequencyHz: number;
	private readonly logger: Logger;
	private readonly prompt: PromptSink;
	private readonly ledger: EvaluatedLedger;
	private readonly motion: MotionController;
	private readonly analogScan = new AnalogThresholdScan();

	private record?: UnitRecord;
	private stepPosition = stepIndex(INITIAL_STEP);
	private previousStep?: Step;
	private confirmationPending = false;
	private lastSerialWaitLog?: number;
	/** Identification received while no unit was under test; applied on the next online. */
	private pendingIdentification?: IdentificationEvent;

	public constructor(options: TestSequencerOptions) {
		this.publishCommand = options.publish;
		this.clock = options.clock;
		this.resultSink = options.resultSink;
		this.visualSensor = options.visualSensor;
		this.camera = options.camera;
		this.frequencyHz = options.frequencyHz;
		this.logger = options.logger ?? new NoopLogger();
		this.prompt = options.prompt ?? new NoopPromptSink();
		this.ledger = options.ledger ?? new EvaluatedLedger();
		this.motion = new MotionController({
			publish: (command) => this.publishCommand(command),
			clock: this.clock,
			logger: this.logger,
			onMotionComplete: () => this.handleMotionComplete()
		});
	}

	public get currentStep(): Step {
		return stepAt(this.stepPosition);
	}

	public get unitUnderTest(): UnitRecord | undefined {
		return this.record;
	}

	public get evaluated(): EvaluatedLedger {
		return this.ledger;
	}

	public isConfirmationPending(): boolean {
		return this.confirmationPending;
	}

	public isMotionActive(): boolean {
		return this.motion.isActive();
	}

	public async tick(): Promise<void> {
		const record = this.record;
		if (!record || this.motion.isActive()) {
			return;
		}

		const step = this.currentStep;
		const entry = step !== this.previousStep;
		this.previousStep = step;
		await this.runStep(this.createContext(record, step), entry);
	}

	public onEvent(event: RobotEvent): void {
		if (event.topic === 'lifecycle') {
			this.handleLifecycle(event);
			return;
		}

		const record = this.record;
		if (!record) {
			if (event.topic === 'identification') {
				this.pendingIdentification = event;
			}
			return;
		}
		const ctx = this.createContext(record, this.currentStep);

		switch (event.topic) {
			case 'identification':
				this.handleIdentification(record, event);
				return;
			case 'telemetry':
				if (isStepBetween(ctx.step, 'testMotorsForward', 'testMotorsCounterClockwise')) {
					recordMotorCurrent(record, event);
				} else if (ctx.step === 'measureCharging') {
					recordChargingSample(record, event);
				} else if (ctx.step === 'testAnalogInputPorts') {
					recordAnalogSample(record, event.analogInput);
				}
				return;
			case 'dockInfrared':
				handleDockInfrared(ctx, event);
				return;
			case 'orientation':
				recordOrientation(record, event);
				return;
			case 'button':
				handleButtonEvent(ctx, event);
				return;
			case 'bumper':
				handleBumperEvent(ctx, event);
				return;
			case 'wheelDrop':
				handleWheelDropEvent(ctx, event);
				return;
			case 'cliff':
				handleCliffEvent(ctx, event);
				return;
			case 'power':
				handlePowerEvent(ctx, event);
				return;
			case 'digitalInput':
				handleDigitalInput(ctx, event);
				return;
			case 'diagnostics':
				record.diagnostics = formatDiagnostics(event.status);
				return;
			case 'healthStatus':
				applyHealthStatus(ctx, event);
				return;
		}
	}

	private createContext(record: UnitRecord, step: Step): ProtocolContext {
		return {
			record,
			step,
			logger: this.logger,
			prompt: this.prompt,
			clock: this.clock,
			frequencyHz: this.frequencyHz,
			stillCurrent: () => this.record === record && this.currentStep === step,
			advance: () => this.advance(),
			publish: (command) => this.publishCommand(command),
			drive: (linear, angular, duration) => this.motion.drive(linear, angular, duration),
			move: (linear, angular, duration) => this.motion.move(linear, angular, duration, true),
			isConfirmationPending: () => this.confirmationPending,
			requestConfirmation: () => {
				this.confirmationPending = true;
			},
			clearConfirmation: () => {
				this.confirmationPending = false;
			}
		};
	}

	private advance(): void {
		this.stepPosition = nextStepIndex(this.stepPosition);
	}

	private resetStep(): void {
		this.stepPosition = stepIndex(INITIAL_STEP);
		this.confirmationPending = false;
	}

	private handleMotionComplete(): void {
		if (!this.record) {
			return;
		}
		this.advance();
	}

	private async runStep(ctx: ProtocolContext, entry: boolean): Promise<void> {
		const entryPrompt = ENTRY_PROMPTS[ctx.step];
		if (entry && entryPrompt) {
			this.prompt.show('info', entryPrompt.title, entryPrompt.text);
		}

		switch (ctx.step) {
			case 'initialization':
				this.advance();
				return;
			case 'getSerialNumber':
				this.awaitSerialNumber(ctx);
				return;
			case 'testLeds':
				await runLedPattern(ctx, entry);
				return;
			case 'testSounds':
				await runSoundPattern(ctx, entry);
				return;
			case 'centerBumperPressed':
				if (entry) {
					this.prompt.show(
						'info',
						'Bumper sensors test',
						'Place the robot facing a wall; after a while, the robot will move forward'
					);
					await this.clock.sleep(BUMPERS_TEST.APPROACH_DELAY_MS);
					if (ctx.stillCurrent()) {
						ctx.drive(BUMPERS_TEST.LINEAR_SPEED, 0);
					}
				}
				return;
			case 'pointRightBumper':
				ctx.drive(0, BUMPERS_TEST.ANGULAR_SPEED, durationMs(Math.PI / 4, BUMPERS_TEST.ANGULAR_SPEED));
				return;
			case 'rightBumperPressed':
			case 'leftBumperPressed':
				ctx.drive(BUMPERS_TEST.LINEAR_SPEED, 0);
				return;
			case 'pointLeftBumper':
				ctx.drive(0, -BUMPERS_TEST.ANGULAR_SPEED, durationMs(Math.PI / 2, BUMPERS_TEST.ANGULAR_SPEED));
				return;
			case 'prepareMotorsTest':
				if (entry) {
					this.prompt.show('info', MOTORS_PROMPT, 'Now the robot will move forward...');
				}
				// Turn back parallel to the wall.
				ctx.drive(0, -BUMPERS_TEST.ANGULAR_SPEED, durationMs(Math.PI / 4, BUMPERS_TEST.ANGULAR_SPEED));
				return;
			case 'testMotorsForward':
				ctx.drive(MOTORS_TEST.LINEAR_SPEED, 0, durationMs(MOTORS_TEST.DISTANCE, MOTORS_TEST.LINEAR_SPEED));
				return;
			case 'testMotorsBackward':
				ctx.drive(-MOTORS_TEST.LINEAR_SPEED, 0, durationMs(MOTORS_TEST.DISTANCE, MOTORS_TEST.LINEAR_SPEED));
				this.prompt.show('info', MOTORS_PROMPT, 'Now the robot will move backward...');
				return;
			case 'testMotorsClockwise':
				ctx.drive(0, -MOTORS_TEST.ANGULAR_SPEED, durationMs(MOTORS_TEST.TURN, MOTORS_TEST.ANGULAR_SPEED));
				this.prompt.show('info', MOTORS_PROMPT, '...and spin to evaluate motors');
				return;
			case 'testMotorsCounterClockwise':
				ctx.drive(0, MOTORS_TEST.ANGULAR_SPEED, durationMs(MOTORS_TEST.TURN, MOTORS_TEST.ANGULAR_SPEED));
				return;
			case 'evalMotorsCurrent':
				this.prompt.hide();
				evaluateMotorCurrent(ctx);
				this.advance();
				return;
			case 'measureGyroError':
				await measureGyroscope(ctx, this.visualSensor, this.camera, entry);
				this.advanceIfCurrent(ctx);
				return;
			case 'measureCharging':
				await measureCharging(ctx, entry);
				this.advanceIfCurrent(ctx);
				return;
			case 'testDigitalIoPorts':
				if (entry) {
					startDigitalIoTest(ctx);
				}
				return;
			case 'testAnalogInputPorts':
				if (this.analogScan.poll(ctx, entry) === 'done') {
					this.advance();
				}
				return;
			case 'evaluationCompleted':
				this.prompt.show(
					'info',
					'Evaluation result',
					`Evaluation completed. Overall result: ${allOk(ctx.record) ? 'PASS' : 'FAILED'}`
				);
				this.finalize();
				return;
			default:
				// Waiting on events or on a timed motion to finish.
				return;
		}
	}

	private advanceIfCurrent(ctx: ProtocolContext): void {
		if (ctx.stillCurrent()) {
			this.advance();
		}
	}

	private awaitSerialNumber(ctx: ProtocolContext): void {
		if (ctx.record.devices.versionInfo.verified) {
			this.advance();
			return;
		}
		const now = this.clock.now();
		if (this.lastSerialWaitLog === undefined || now - this.lastSerialWaitLog >= SERIAL_WAIT_LOG_INTERVAL_MS) {
			this.lastSerialWaitLog = now;
			this.logger.debug('Waiting for serial number...');
		}
	}

	private handleLifecycle(event: LifecycleEvent): void {
		if (event.state === 'online') {
			if (this.record) {
				this.logger.warn(`New robot connected while ${this.record.serial} is still under evaluation; saving...`);
				this.finalize();
			} else {
				this.logger.info('New robot connected');
			}

			const created = createUnitRecord(this.ledger.size);
			this.record = created;
			this.stepPosition = stepIndex('getSerialNumber');
			this.previousStep = undefined;
			this.confirmationPending = false;
			this.lastSerialWaitLog = undefined;

			const pending = this.pendingIdentification;
			this.pendingIdentification = undefined;
			if (pending) {
				this.handleIdentification(created, pending);
			}
			return;
		}

		this.pendingIdentification = undefined;
		const record = this.record;
		if (!record) {
			this.logger.warn('Robot offline event received, but no robot is under evaluation');
			return;
		}
		if (allOk(record)) {
			this.logger.info(`Robot ${record.serial} evaluation successfully completed`);
		} else {
			this.logger.info(`Robot ${record.serial} disconnected without finishing the evaluation`);
		}
		this.finalize();
	}

	private handleIdentification(record: UnitRecord, event: IdentificationEvent): void {
		const serial = formatUdid(event.udid);
		if (record.devices.versionInfo.verified) {
			if (serial === record.serial) {
				this.logger.debug(`Version info received more than once for ${serial}`);
				return;
			}
			// The newer id wins; the bridge can republish late after a unit swap.
			this.logger.warn(`Overwriting version info: old SN: ${record.serial} / new SN: ${serial}`);
		}

		record.serial = serial;
		record.udid = [...event.udid];

		if (this.ledger.has(serial)) {
			const error = new FactoryTestError({
				code: 'DUPLICATE_UNIT',
				message: `Robot ${serial} has been previously evaluated. Proceed with a new robot`,
				serial
			});
			this.logger.error(error.message, { code: error.code });
			this.prompt.show('error', 'Known robot', error.message);
			this.discardRecord();
			return;
		}

		record.versions = { hardware: event.hardware, firmware: event.firmware, software: event.software };
		record.devices.versionInfo.verified = true;
		this.logger.info(`UDID: ${serial}. Hardware/firmware/software version: ${versionSummary(record)}`);
	}

	private discardRecord(): void {
		this.motion.cancel();
		this.record = undefined;
		this.resetStep();
	}

	/** Persist the unit, remember it for this session and wait for the next one. */
	private finalize(): void {
		const record = this.record;
		if (!record) {
			return;
		}

		this.motion.cancel();
		this.logger.info(`Saving results for ${record.serial}`);
		try {
			this.resultSink.append(buildResultRow(record));
		} catch (error) {
			this.logger.error('Could not save unit results', { serial: record.serial, error: toErrorMessage(error) });
		}

		this.ledger.append(record);
		this.record = undefined;
		this.pendingIdentification = undefined;
		this.resetStep();
	}
}
