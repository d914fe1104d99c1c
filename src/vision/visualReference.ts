/**
 * Camera-based yaw estimator watching a fiducial on top of the unit.
 */
export interface VisualReferenceSensor {
	init(calibrationPath: string, deviceIndex: number): Promise<boolean>;
	/** Radians; NaN while no fiducial is recognised. */
	currentYaw(): number;
	close(): Promise<void>;
}
