import * as fs from 'node:fs';
import * as path from 'node:path';
import { DEVICE_IDS } from '../device/deviceSlots';
import { FactoryTestError, toErrorMessage } from '../errors/FactoryTestError';
import type { ResultRow, ResultSink } from './resultSink';

export const CSV_HEADER = [
	'sequenceId',
	'serial',
	'hardware',
	'firmware',
	'software',
	...DEVICE_IDS.flatMap((id) => [`${id}.ok`, `${id}.value`]),
	'passed',
	'diagnostics'
].join(',');

export function csvField(value: string | number | boolean): string {
	const text = String(value);
	if (/[",\r\n]/.test(text)) {
		return `"${text.replace(/"/g, '""')}"`;
	}
	return text;
}

export function toCsvLine(row: ResultRow): string {
	const fields: Array<string | number | boolean> = [
		row.sequenceId,
		row.serial,
		row.hardware,
		row.firmware,
		row.software,
		...row.devices.flatMap((device) => [device.verified ? 1 : 0, device.value]),
		row.passed ? 'PASS' : 'FAILED',
		row.diagnostics
	];
	return fields.map(csvField).join(',');
}

/**
 * One CSV line per finalized unit. The header is written only when the file
 * is created; existing rows are never rewritten.
 */
export class CsvResultSink implements ResultSink {
	private readonly filePath: string;

	public constructor(filePath: string) {
		this.filePath = filePath;
	}

	public get path(): string {
		return this.filePath;
	}

	public append(row: ResultRow): void {
		try {
			fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
			const isNew = !fs.existsSync(this.filePath) || fs.statSync(this.filePath).size === 0;
			const text = `${isNew ? `${CSV_HEADER}\n` : ''}${toCsvLine(row)}\n`;
			fs.appendFileSync(this.filePath, text, 'utf8');
		} catch (error) {
			throw new FactoryTestError({
				code: 'RESULT_SINK_FAILED',
				message: `Could not append results to ${this.filePath}: ${toErrorMessage(error)}`,
				serial: row.serial,
				cause: error
			});
		}
	}
}
