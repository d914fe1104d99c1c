#!/usr/bin/env node
import { FactoryTestConfigSnapshot, readFactoryTestConfig } from './config/factoryTestConfig';
import { LineLogger, Logger } from './diagnostics/logger';
import { FactoryTestError, toErrorMessage } from './errors/FactoryTestError';
import { CsvResultSink } from './results/csvResultSink';
import type { ResultSink } from './results/resultSink';
import { Clock, SystemClock } from './sequencer/clock';
import { ControlLoop } from './sequencer/controlLoop';
import { TestSequencer } from './sequencer/testSequencer';
import { createRobotLink } from './transport/linkFactory';
import type { RobotLink } from './transport/robotLink';
import { ConsolePromptSink, PromptSink } from './ui/promptSink';
import { ProcessYawSensor } from './vision/processYawSensor';
import type { VisualReferenceSensor } from './vision/visualReference';

export interface HarnessOptions {
	rootPath: string;
	env?: NodeJS.ProcessEnv;
	writeLog?: (line: string) => void;
	writePrompt?: (text: string) => void;
	clock?: Clock;
	link?: RobotLink;
	visualSensor?: VisualReferenceSensor;
	resultSink?: ResultSink;
}

export interface HarnessRuntime {
	config: FactoryTestConfigSnapshot;
	logger: Logger;
	sequencer: TestSequencer;
	loop: ControlLoop;
	stop(): Promise<void>;
}

function reportLinkError(logger: Logger, error: Error): void {
	if (error instanceof FactoryTestError && error.code === 'INVALID_FRAME') {
		logger.warn(error.message);
		return;
	}
	logger.error('Robot link error', { error: error.message });
}

/**
 * Wire configuration, link, sequencer and control loop together. Throws a
 * `TRANSPORT_UNAVAILABLE` error when the link cannot be opened.
 */
export async function startHarness(options: HarnessOptions): Promise<HarnessRuntime> {
	const env = options.env ?? process.env;
	const writeLog = options.writeLog ?? ((line: string) => process.stderr.write(`${line}\n`));
	const writePrompt = options.writePrompt ?? ((text: string) => process.stdout.write(text));

	const config = readFactoryTestConfig(options.rootPath, new LineLogger(writeLog), env);
	const logger = new LineLogger(writeLog, config.logLevel);
	const prompt: PromptSink = new ConsolePromptSink(writePrompt);
	const clock = options.clock ?? new SystemClock();
	const link = options.link ?? createRobotLink(config.transport);
	const visualSensor =
		options.visualSensor ??
		new ProcessYawSensor({ command: config.camera.command, args: config.camera.args, logger });

	const sequencer = new TestSequencer({
		publish: (command) => link.publish(command),
		clock,
		resultSink: options.resultSink ?? new CsvResultSink(config.resultFile),
		visualSensor,
		camera: { calibrationFile: config.camera.calibrationFile, deviceIndex: config.camera.deviceIndex },
		frequencyHz: config.loopFrequencyHz,
		logger,
		prompt
	});

	link.onEvent((event) => {
		try {
			sequencer.onEvent(event);
		} catch (error) {
			logger.error('Event handling failed', { topic: event.topic, error: toErrorMessage(error) });
		}
	});
	link.onError((error) => reportLinkError(logger, error));

	try {
		await link.open();
	} catch (error) {
		if (error instanceof FactoryTestError) {
			throw error;
		}
		throw new FactoryTestError({
			code: 'TRANSPORT_UNAVAILABLE',
			message: `Robot link could not be opened: ${toErrorMessage(error)}`,
			cause: error
		});
	}

	const loop = new ControlLoop({
		tick: () => sequencer.tick(),
		clock,
		frequencyHz: config.loopFrequencyHz,
		logger
	});
	loop.start();
	logger.info('Factory test harness started', {
		transport: config.transport.kind,
		loopFrequencyHz: config.loopFrequencyHz,
		resultFile: config.resultFile
	});

	return {
		config,
		logger,
		sequencer,
		loop,
		stop: async () => {
			await loop.stop();
			await link.close();
			await visualSensor.close();
			logger.info('Factory test harness stopped');
		}
	};
}

async function main(): Promise<void> {
	const runtime = await startHarness({ rootPath: process.cwd() }).catch((error: unknown) => {
		const logger = new LineLogger((line) => process.stderr.write(`${line}\n`));
		logger.fatal('Factory test harness could not start', { error: toErrorMessage(error) });
		process.exitCode = 1;
		return undefined;
	});
	if (!runtime) {
		return;
	}

	const shutdown = (): void => {
		runtime.stop().catch((error: unknown) => {
			runtime.logger.error('Shutdown failed', { error: toErrorMessage(error) });
			process.exitCode = 1;
		});
	};
	process.once('SIGINT', shutdown);
	process.once('SIGTERM', shutdown);
}

if (require.main === module) {
	void main().catch((error: unknown) => {
		process.stderr.write(`Unhandled error: ${toErrorMessage(error)}\n`);
		process.exitCode = 1;
	});
}
