import { StringDecoder } from 'node:string_decoder';
import { encodeCommand } from '../protocol/frameCodec';
import type { RobotCommand } from '../protocol/robotCommands';
import { toErrorMessage } from '../errors/FactoryTestError';
import { FramedRobotLink } from './robotLink';

/** The slice of a serial port the link drives. */
export interface SerialPortLike {
	open(callback: (error: Error | null) => void): void;
	close(callback: (error: Error | null) => void): void;
	write(data: string, callback: (error?: Error | null) => void): void;
	onData(listener: (chunk: Buffer) => void): void;
	onError(listener: (error: Error) => void): void;
	onClose(listener: () => void): void;
}

export type SerialPortFactory = (path: string, baudRate: number) => Promise<SerialPortLike>;

export interface SerialLinkOptions {
	path: string;
	baudRate?: number;
	/** Test seam; defaults to the `serialport` package. */
	portFactory?: SerialPortFactory;
}

async function openNativePort(path: string, baudRate: number): Promise<SerialPortLike> {
	const { SerialPort } = await import('serialport');
	const port = new SerialPort({ path, baudRate, autoOpen: false });
	return {
		open: (callback) => port.open(callback),
		close: (callback) => port.close(callback),
		write: (data, callback) => {
			port.write(data, callback);
		},
		onData: (listener) => {
			port.on('data', listener);
		},
		onError: (listener) => {
			port.on('error', listener);
		},
		onClose: (listener) => {
			port.on('close', listener);
		}
	};
}

function openPort(port: SerialPortLike): Promise<void> {
	return new Promise<void>((resolve, reject) => {
		port.open((error) => (error ? reject(error) : resolve()));
	});
}

/** Same framing as the TCP link, over a USB serial adapter. */
export class SerialLink extends FramedRobotLink {
	private readonly portPath: string;
	private readonly baudRate: number;
	private readonly portFactory: SerialPortFactory;

	private port?: SerialPortLike;
	private opening?: Promise<void>;
	private closing = false;

	public constructor(options: SerialLinkOptions) {
		super();
		this.portPath = options.path;
		this.baudRate = options.baudRate ?? 115_200;
		this.portFactory = options.portFactory ?? openNativePort;
	}

	public async open(): Promise<void> {
		if (this.port) {
			return;
		}
		if (!this.portPath) {
			throw this.unavailable('Serial link requires a non-empty port path (for example /dev/ttyUSB0).');
		}
		if (this.opening) {
			return this.opening;
		}

		this.opening = this.openInternal().finally(() => {
			this.opening = undefined;
		});
		return this.opening;
	}

	public async close(): Promise<void> {
		const port = this.port;
		this.port = undefined;
		this.resetFraming();
		if (!port) {
			return;
		}

		this.closing = true;
		await new Promise<void>((resolve) => {
			port.close(() => resolve());
		});
		this.closing = false;
	}

	public publish(command: RobotCommand): void {
		const port = this.port;
		if (!port) {
			this.reportError(this.unavailable('Serial link is not open; command dropped.'));
			return;
		}
		port.write(encodeCommand(command), (error) => {
			if (error) {
				this.reportError(error);
			}
		});
	}

	private async acquirePort(): Promise<SerialPortLike> {
		try {
			const port = await this.portFactory(this.portPath, this.baudRate);
			await openPort(port);
			return port;
		} catch (error) {
			throw this.unavailable(`Serial port ${this.portPath} could not be opened: ${toErrorMessage(error)}`, error);
		}
	}

	private async openInternal(): Promise<void> {
		const port = await this.acquirePort();
		this.port = port;
		this.resetFraming();
		// Multi-byte characters may straddle two chunks.
		const decoder = new StringDecoder('utf8');
		port.onData((chunk) => this.receive(decoder.write(chunk)));
		port.onError((error) => this.reportError(error));
		port.onClose(() => {
			if (this.port === port && !this.closing) {
				this.port = undefined;
				this.reportError(this.unavailable('Serial port closed.'));
			}
		});
	}
}
