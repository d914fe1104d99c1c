import { DEVICE_IDS, DeviceId } from '../device/deviceSlots';
import { allOk, UnitRecord } from '../device/unitRecord';

export interface ResultRow {
	sequenceId: number;
	serial: string;
	hardware: string;
	firmware: string;
	software: string;
	devices: Array<{ id: DeviceId; verified: boolean; value: number }>;
	passed: boolean;
	diagnostics: string;
}

/** Durable, append-only store of finalized units. */
export interface ResultSink {
	append(row: ResultRow): void;
}

export function buildResultRow(record: UnitRecord): ResultRow {
	return {
		sequenceId: record.sequenceId,
		serial: record.serial,
		hardware: record.versions.hardware,
		firmware: record.versions.firmware,
		software: record.versions.software,
		devices: DEVICE_IDS.map((id) => ({ id, ...record.devices[id] })),
		passed: allOk(record),
		diagnostics: record.diagnostics
	};
}

/** Keeps rows in memory; used by tests and dry runs. */
export class MemoryResultSink implements ResultSink {
	public readonly rows: ResultRow[] = [];

	public append(row: ResultRow): void {
		this.rows.push(row);
	}
}
