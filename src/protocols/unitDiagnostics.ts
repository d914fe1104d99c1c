import { ORIENTATION_SLOT, UnitRecord } from '../device/unitRecord';
import type { DiagnosticStatus, HealthStatusEvent, OrientationEvent } from '../protocol/robotEvents';
import { yawFromQuaternion } from '../protocol/robotEvents';
import type { ProtocolContext } from './protocolContext';

export function formatDiagnostics(status: readonly DiagnosticStatus[]): string {
	const lines: string[] = [];
	for (const entry of status) {
		lines.push(`Device: ${entry.name}`, `Level: ${entry.level}`, `Message: ${entry.message}`);
		for (const { key, value } of entry.values) {
			lines.push(`   ${key}: ${value}`);
		}
	}
	return lines.map((line) => `${line}\n`).join('');
}

/**
 * Top-level health only moves until the first OK; a unit that reported
 * healthy once keeps that state.
 */
export function applyHealthStatus(ctx: ProtocolContext, event: HealthStatusEvent): void {
	const { record } = ctx;
	if (record.health === 'OK') {
		return;
	}

	record.health = event.level;
	if (event.level === 'OK') {
		ctx.logger.info(`Robot ${record.serial} diagnostics received with OK status`);
		return;
	}

	ctx.logger.warn(`Robot ${record.serial} diagnostics received with ${event.level} status`);
	if (record.diagnostics.length > 0) {
		ctx.logger.warn(`Full diagnostics:\n${record.diagnostics}`);
	}
}

export function recordOrientation(record: UnitRecord, event: OrientationEvent): void {
	record.orientation[ORIENTATION_SLOT.LATEST_YAW] = yawFromQuaternion(event.orientation);
}
