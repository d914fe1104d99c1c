import { HarnessError } from './HarnessError';

/**
 * Error codes raised while qualifying a unit.
 */
export type FactoryTestErrorCode =
	| 'TRANSPORT_UNAVAILABLE'
	| 'INVALID_FRAME'
	| 'ACQUISITION_TIMEOUT'
	| 'DUPLICATE_UNIT'
	| 'SENSOR_INIT_FAILED'
	| 'RESULT_SINK_FAILED';

/**
 * Only a transport failing at start-up stops the harness; everything else
 * is contained to the device or unit it concerns.
 */
export const FATAL_ERROR_CODES: readonly FactoryTestErrorCode[] = ['TRANSPORT_UNAVAILABLE'];

export class FactoryTestError extends HarnessError {
	public readonly serial?: string;

	public constructor(options: {
		code: FactoryTestErrorCode;
		message: string;
		serial?: string;
		cause?: unknown;
	}) {
		super(options.code, options.message, options.cause);
		this.name = 'FactoryTestError';
		this.serial = options.serial;
	}

	public get fatal(): boolean {
		return FATAL_ERROR_CODES.some((code) => code === this.code);
	}
}

export function toErrorMessage(error: unknown): string {
	if (error instanceof Error) {
		return error.message;
	}
	return String(error);
}
