import * as fs from 'node:fs';
import * as path from 'node:path';
import { LOG_LEVELS, LogLevel, Logger } from '../diagnostics/logger';
import { isPlainObject, sanitizeEnum, sanitizeNumber, sanitizeString, sanitizeStringList } from './sanitizers';

const RELATIVE_CONFIG_PATH = path.join('config', 'factory-test.json');

export type TransportKind = 'tcp' | 'serial';

const TRANSPORT_KINDS: readonly TransportKind[] = ['tcp', 'serial'];

const DEFAULT_TRANSPORT_KIND: TransportKind = 'tcp';
const DEFAULT_TCP_HOST = '127.0.0.1';
const DEFAULT_TCP_PORT = 7_400;
const DEFAULT_SERIAL_PATH = '/dev/ttyUSB0';
const DEFAULT_BAUD_RATE = 115_200;
const DEFAULT_LOOP_FREQUENCY_HZ = 20;
const MIN_LOOP_FREQUENCY_HZ = 1;
const DEFAULT_RESULT_FILE = path.join('results', 'factory-test.csv');
const DEFAULT_CAMERA_DEVICE_INDEX = 0;
const DEFAULT_LOG_LEVEL: LogLevel = 'info';

export interface TransportConfigSnapshot {
	kind: TransportKind;
	host: string;
	port: number;
	path: string;
	baudRate: number;
}

export interface CameraConfigSnapshot {
	calibrationFile: string;
	deviceIndex: number;
	/** Executable that prints one yaw estimate (radians, or `nan`) per line. */
	command: string;
	args: string[];
}

export interface FactoryTestConfigSnapshot {
	transport: TransportConfigSnapshot;
	loopFrequencyHz: number;
	resultFile: string;
	camera: CameraConfigSnapshot;
	logLevel: LogLevel;
}

function normalizeTransport(raw: unknown): TransportConfigSnapshot {
	const section = isPlainObject(raw) ? raw : {};
	return {
		kind: sanitizeEnum(section.kind, TRANSPORT_KINDS, DEFAULT_TRANSPORT_KIND),
		host: sanitizeString(section.host, DEFAULT_TCP_HOST),
		port: sanitizeNumber(section.port, DEFAULT_TCP_PORT, 1),
		path: sanitizeString(section.path, DEFAULT_SERIAL_PATH),
		baudRate: sanitizeNumber(section.baudRate, DEFAULT_BAUD_RATE, 1_200)
	};
}

function normalizeCamera(raw: unknown): CameraConfigSnapshot {
	const section = isPlainObject(raw) ? raw : {};
	return {
		calibrationFile: sanitizeString(section.calibrationFile, ''),
		deviceIndex: sanitizeNumber(section.deviceIndex, DEFAULT_CAMERA_DEVICE_INDEX, 0),
		command: sanitizeString(section.command, ''),
		args: sanitizeStringList(section.args)
	};
}

export function normalizeFactoryTestConfig(raw: Record<string, unknown>): FactoryTestConfigSnapshot {
	return {
		transport: normalizeTransport(raw.transport),
		loopFrequencyHz: sanitizeNumber(raw.loopFrequencyHz, DEFAULT_LOOP_FREQUENCY_HZ, MIN_LOOP_FREQUENCY_HZ),
		resultFile: sanitizeString(raw.resultFile, DEFAULT_RESULT_FILE),
		camera: normalizeCamera(raw.camera),
		logLevel: sanitizeEnum(raw.logLevel, LOG_LEVELS, DEFAULT_LOG_LEVEL)
	};
}

/**
 * Environment variables take precedence over the file so a station can
 * redirect results or verbosity without editing the shared config.
 */
function applyEnvOverrides(config: FactoryTestConfigSnapshot, env: NodeJS.ProcessEnv): FactoryTestConfigSnapshot {
	return {
		...config,
		logLevel: sanitizeEnum(env.FACTORY_TEST_LOG_LEVEL?.trim(), LOG_LEVELS, config.logLevel),
		resultFile: sanitizeString(env.FACTORY_TEST_RESULT_FILE, config.resultFile)
	};
}

export function resolveConfigPath(rootPath: string, env: NodeJS.ProcessEnv = process.env): string {
	const override = env.FACTORY_TEST_CONFIG?.trim();
	if (override) {
		return path.resolve(rootPath, override);
	}
	return path.join(rootPath, RELATIVE_CONFIG_PATH);
}

export function readFactoryTestConfig(
	rootPath: string,
	logger?: Logger,
	env: NodeJS.ProcessEnv = process.env
): FactoryTestConfigSnapshot {
	const configPath = resolveConfigPath(rootPath, env);
	let fileConfig: FactoryTestConfigSnapshot;
	try {
		const rawText = fs.readFileSync(configPath, 'utf8');
		const parsed: unknown = JSON.parse(rawText);
		if (!isPlainObject(parsed)) {
			throw new Error('JSON root must be an object.');
		}
		fileConfig = normalizeFactoryTestConfig(parsed);
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error);
		logger?.warn('Factory test config fallback to defaults.', {
			configPath,
			reason
		});
		fileConfig = normalizeFactoryTestConfig({});
	}

	const resolved = applyEnvOverrides(fileConfig, env);
	return {
		...resolved,
		resultFile: path.resolve(rootPath, resolved.resultFile)
	};
}
