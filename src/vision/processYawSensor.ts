import { spawn } from 'node:child_process';
import * as readline from 'node:readline';
import type { Readable } from 'node:stream';
import { Logger, NoopLogger } from '../diagnostics/logger';
import type { VisualReferenceSensor } from './visualReference';

/** The part of a child process the sensor relies on. */
export interface EstimatorProcess {
	readonly stdout: Readable | null;
	on(event: 'spawn', listener: () => void): unknown;
	on(event: 'error', listener: (error: Error) => void): unknown;
	on(event: 'exit', listener: (code: number | null) => void): unknown;
	kill(): boolean;
}

export type EstimatorSpawner = (command: string, args: string[]) => EstimatorProcess;

export interface ProcessYawSensorOptions {
	command: string;
	args?: string[];
	logger?: Logger;
	spawnProcess?: EstimatorSpawner;
}

const spawnEstimator: EstimatorSpawner = (command, args) => spawn(command, args, { stdio: ['ignore', 'pipe', 'ignore'] });

/** `nan`, blank or unparsable lines mean no fiducial in view. */
export function parseYawLine(line: string): number {
	const text = line.trim();
	if (text.length === 0) {
		return Number.NaN;
	}
	const value = Number(text);
	return Number.isFinite(value) ? value : Number.NaN;
}

/**
 * Runs an external estimator that prints one yaw per stdout line and keeps the
 * latest value.
 */
export class ProcessYawSensor implements VisualReferenceSensor {
	private readonly command: string;
	private readonly args: string[];
	private readonly logger: Logger;
	private readonly spawnProcess: EstimatorSpawner;

	private child?: EstimatorProcess;
	private lines?: readline.Interface;
	private latestYaw = Number.NaN;

	public constructor(options: ProcessYawSensorOptions) {
		this.command = options.command;
		this.args = options.args ?? [];
		this.logger = options.logger ?? new NoopLogger();
		this.spawnProcess = options.spawnProcess ?? spawnEstimator;
	}

	public async init(calibrationPath: string, deviceIndex: number): Promise<boolean> {
		await this.close();
		if (!this.command) {
			this.logger.error('No yaw estimator command configured.');
			return false;
		}

		const args = [...this.args, '--calibration', calibrationPath, '--device', String(deviceIndex)];
		const child = this.spawnProcess(this.command, args);
		const stdout = child.stdout;
		if (!stdout) {
			child.kill();
			this.logger.error('Yaw estimator has no output stream.', { command: this.command });
			return false;
		}

		this.child = child;
		this.latestYaw = Number.NaN;
		this.lines = readline.createInterface({ input: stdout });
		this.lines.on('line', (line) => {
			this.latestYaw = parseYawLine(line);
		});

		return new Promise<boolean>((resolve) => {
			child.on('spawn', () => resolve(true));
			child.on('error', (error) => {
				this.logger.error('Yaw estimator failed to start.', { command: this.command, error: error.message });
				this.detach(child);
				resolve(false);
			});
			child.on('exit', (code) => {
				if (this.child === child) {
					this.logger.warn('Yaw estimator exited.', { code });
					this.detach(child);
				}
			});
		});
	}

	public currentYaw(): number {
		return this.child ? this.latestYaw : Number.NaN;
	}

	public async close(): Promise<void> {
		const child = this.child;
		if (!child) {
			return;
		}
		this.detach(child);
		child.kill();
	}

	private detach(child: EstimatorProcess): void {
		if (this.child !== child) {
			return;
		}
		this.child = undefined;
		this.lines?.close();
		this.lines = undefined;
		this.latestYaw = Number.NaN;
	}
}
