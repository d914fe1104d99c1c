import { isPlainObject } from '../config/sanitizers';
import { FactoryTestError } from '../errors/FactoryTestError';
import type { RobotCommand } from './robotCommands';
import {
	BumperIndex,
	ButtonIndex,
	ButtonStateCode,
	DiagnosticStatus,
	HealthLevel,
	POWER_EVENTS,
	PowerEventKind,
	RobotEvent
} from './robotEvents';

/**
 * Frames are single-line JSON objects terminated by `\n`, discriminated by `topic`.
 */
export const FRAME_DELIMITER = '\n';

/** Longest partial line kept while waiting for its delimiter, in characters. */
export const MAX_PENDING_FRAME_LENGTH = 64 * 1024;

function invalid(reason: string): FactoryTestError {
	return new FactoryTestError({ code: 'INVALID_FRAME', message: `Invalid frame: ${reason}` });
}

function requireNumber(body: Record<string, unknown>, key: string): number {
	const value = body[key];
	if (typeof value !== 'number' || !Number.isFinite(value)) {
		throw invalid(`"${key}" must be a finite number.`);
	}
	return value;
}

function requireString(body: Record<string, unknown>, key: string): string {
	const value = body[key];
	if (typeof value !== 'string') {
		throw invalid(`"${key}" must be a string.`);
	}
	return value;
}

function requireNumberArray(body: Record<string, unknown>, key: string, length?: number): number[] {
	const value = body[key];
	if (!Array.isArray(value) || !value.every((entry) => typeof entry === 'number' && Number.isFinite(entry))) {
		throw invalid(`"${key}" must be an array of numbers.`);
	}
	if (length !== undefined && value.length !== length) {
		throw invalid(`"${key}" must have ${length} entries.`);
	}
	return value.map(Number);
}

function requireOneOf<T extends string | number>(body: Record<string, unknown>, key: string, allowed: readonly T[]): T {
	const match = allowed.find((entry) => entry === body[key]);
	if (match === undefined) {
		throw invalid(`"${key}" must be one of ${allowed.join(', ')}.`);
	}
	return match;
}

const BUTTON_INDEXES: readonly ButtonIndex[] = [0, 1, 2];
const BUMPER_INDEXES: readonly BumperIndex[] = [0, 1, 2];
const STATE_CODES: readonly ButtonStateCode[] = [0, 1];
const HEALTH_LEVELS: readonly HealthLevel[] = ['OK', 'WARN', 'ERROR'];

function decodeDiagnosticStatus(raw: unknown): DiagnosticStatus {
	if (!isPlainObject(raw)) {
		throw invalid('diagnostic status entries must be objects.');
	}
	const values = Array.isArray(raw.values) ? raw.values : [];
	return {
		name: requireString(raw, 'name'),
		level: requireNumber(raw, 'level'),
		message: typeof raw.message === 'string' ? raw.message : '',
		values: values.filter(isPlainObject).map((entry) => ({
			key: String(entry.key ?? ''),
			value: String(entry.value ?? '')
		}))
	};
}

export function decodeRobotEvent(raw: unknown): RobotEvent {
	if (!isPlainObject(raw)) {
		throw invalid('frame root must be an object.');
	}

	const topic = raw.topic;
	switch (topic) {
		case 'identification':
			return {
				topic: 'identification',
				udid: requireNumberArray(raw, 'udid'),
				hardware: requireString(raw, 'hardware'),
				firmware: requireString(raw, 'firmware'),
				software: requireString(raw, 'software')
			};
		case 'telemetry': {
			const [left, right] = requireNumberArray(raw, 'motorCurrent', 2);
			return {
				topic: 'telemetry',
				motorCurrent: [left, right],
				charger: requireNumber(raw, 'charger'),
				battery: requireNumber(raw, 'battery'),
				analogInput: requireNumberArray(raw, 'analogInput')
			};
		}
		case 'dockInfrared': {
			const [left, center, right] = requireNumberArray(raw, 'data', 3);
			return { topic: 'dockInfrared', data: [left, center, right] };
		}
		case 'orientation': {
			const orientation = raw.orientation;
			if (!isPlainObject(orientation)) {
				throw invalid('"orientation" must be a quaternion object.');
			}
			return {
				topic: 'orientation',
				orientation: {
					x: requireNumber(orientation, 'x'),
					y: requireNumber(orientation, 'y'),
					z: requireNumber(orientation, 'z'),
					w: requireNumber(orientation, 'w')
				}
			};
		}
		case 'button':
			return {
				topic: 'button',
				button: requireOneOf(raw, 'button', BUTTON_INDEXES),
				state: requireOneOf(raw, 'state', STATE_CODES)
			};
		case 'bumper':
			return {
				topic: 'bumper',
				bumper: requireOneOf(raw, 'bumper', BUMPER_INDEXES),
				state: requireOneOf(raw, 'state', STATE_CODES)
			};
		case 'wheelDrop':
			return {
				topic: 'wheelDrop',
				wheel: requireOneOf(raw, 'wheel', ['left', 'right'] as const),
				state: requireOneOf(raw, 'state', ['raised', 'dropped'] as const)
			};
		case 'cliff':
			return {
				topic: 'cliff',
				sensor: requireOneOf(raw, 'sensor', ['left', 'center', 'right'] as const),
				state: requireOneOf(raw, 'state', ['floor', 'cliff'] as const)
			};
		case 'power': {
			const event: PowerEventKind = requireOneOf(raw, 'event', POWER_EVENTS);
			return { topic: 'power', event };
		}
		case 'digitalInput': {
			const values = raw.values;
			if (!Array.isArray(values) || !values.every((entry) => typeof entry === 'boolean')) {
				throw invalid('"values" must be an array of booleans.');
			}
			return { topic: 'digitalInput', values: values.map(Boolean) };
		}
		case 'diagnostics': {
			const status = raw.status;
			if (!Array.isArray(status)) {
				throw invalid('"status" must be an array.');
			}
			return { topic: 'diagnostics', status: status.map(decodeDiagnosticStatus) };
		}
		case 'healthStatus':
			return { topic: 'healthStatus', level: requireOneOf(raw, 'level', HEALTH_LEVELS) };
		case 'lifecycle':
			return { topic: 'lifecycle', state: requireOneOf(raw, 'state', ['online', 'offline'] as const) };
		default:
			throw invalid(`unknown topic ${JSON.stringify(topic)}.`);
	}
}

export function decodeFrame(line: string): RobotEvent {
	let parsed: unknown;
	try {
		parsed = JSON.parse(line);
	} catch (error) {
		throw new FactoryTestError({ code: 'INVALID_FRAME', message: 'Invalid frame: malformed JSON.', cause: error });
	}
	return decodeRobotEvent(parsed);
}

export function encodeCommand(command: RobotCommand): string {
	return `${JSON.stringify(command)}${FRAME_DELIMITER}`;
}

export interface LineFramerOptions {
	maxPendingLength?: number;
	/** Called with the dropped length when a partial line outgrows the limit. */
	onOverflow?: (length: number) => void;
}

/**
 * Accumulates raw chunks and yields complete lines; a trailing partial line
 * is kept until its delimiter arrives. A partial line over the limit is
 * dropped along with the rest of that line.
 */
export class LineFramer {
	private readonly maxPendingLength: number;
	private readonly onOverflow?: (length: number) => void;
	private pending = '';
	private discarding = false;

	public constructor(options: LineFramerOptions = {}) {
		this.maxPendingLength = options.maxPendingLength ?? MAX_PENDING_FRAME_LENGTH;
		this.onOverflow = options.onOverflow;
	}

	public push(chunk: string): string[] {
		let text = chunk;
		if (this.discarding) {
			const end = text.indexOf(FRAME_DELIMITER);
			if (end < 0) {
				return [];
			}
			this.discarding = false;
			text = text.slice(end + FRAME_DELIMITER.length);
		}

		this.pending += text;
		const parts = this.pending.split(FRAME_DELIMITER);
		this.pending = parts.pop() ?? '';
		if (this.pending.length > this.maxPendingLength) {
			const dropped = this.pending.length;
			this.pending = '';
			this.discarding = true;
			this.onOverflow?.(dropped);
		}
		return parts.map((part) => part.trim()).filter((part) => part.length > 0);
	}

	public reset(): void {
		this.pending = '';
		this.discarding = false;
	}
}
