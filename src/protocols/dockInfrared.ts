import type { DeviceId } from '../device/deviceSlots';
import { irDockOk } from '../device/unitRecord';
import type { DockInfraredEvent } from '../protocol/robotEvents';
import type { ProtocolContext } from './protocolContext';

const RECEIVERS: readonly DeviceId[] = ['irDockLeft', 'irDockCenter', 'irDockRight'];

/** Docking beacon readings count at any step; each receiver passes on its first positive reading. */
export function handleDockInfrared(ctx: ProtocolContext, event: DockInfraredEvent): void {
	const { record } = ctx;
	if (irDockOk(record)) {
		return;
	}

	RECEIVERS.forEach((device, index) => {
		const reading = event.data[index] ?? 0;
		if (reading > 0) {
			record.devices[device].value = reading;
			record.devices[device].verified = true;
		}
	});

	if (irDockOk(record)) {
		const readings = RECEIVERS.map((device) => record.devices[device].value).join('/');
		ctx.logger.info(`Docking ir sensor evaluation completed: ${readings}`);
	}
}
