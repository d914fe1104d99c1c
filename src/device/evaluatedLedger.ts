import type { UnitRecord } from './unitRecord';

/**
 * Records finalized during the current session, in finalization order, with a
 * serial index for re-evaluation checks. Results from earlier sessions are not
 * reloaded.
 */
export class EvaluatedLedger {
	private readonly records: UnitRecord[] = [];
	private readonly serials = new Set<string>();

	public get size(): number {
		return this.records.length;
	}

	public has(serial: string): boolean {
		return this.serials.has(serial);
	}

	/**
	 * Units that went offline before identifying themselves are kept in order
	 * but never indexed, so they cannot block a later unit.
	 */
	public append(record: UnitRecord): void {
		this.records.push(record);
		if (record.serial.length > 0) {
			this.serials.add(record.serial);
		}
	}
}
