import * as net from 'node:net';
import { encodeCommand } from '../protocol/frameCodec';
import type { RobotCommand } from '../protocol/robotCommands';
import { FramedRobotLink } from './robotLink';

const DEFAULT_TCP_PORT = 7_400;
const DEFAULT_CONNECT_TIMEOUT_MS = 5_000;

export interface TcpLinkOptions {
	host: string;
	port?: number;
	connectTimeoutMs?: number;
}

/** Newline-delimited JSON over a TCP connection to the driver bridge. No reconnect. */
export class TcpLink extends FramedRobotLink {
	private readonly host: string;
	private readonly port: number;
	private readonly connectTimeoutMs: number;

	private socket?: net.Socket;
	private openPromise?: Promise<void>;
	private closing = false;

	public constructor(options: TcpLinkOptions) {
		super();
		this.host = options.host;
		this.port = options.port ?? DEFAULT_TCP_PORT;
		this.connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_MS;
	}

	public async open(): Promise<void> {
		if (this.socket) {
			return;
		}
		if (this.openPromise) {
			return this.openPromise;
		}

		this.openPromise = this.connect().finally(() => {
			this.openPromise = undefined;
		});
		return this.openPromise;
	}

	public async close(): Promise<void> {
		const socket = this.socket;
		this.socket = undefined;
		this.resetFraming();
		if (!socket) {
			return;
		}

		this.closing = true;
		await new Promise<void>((resolve) => {
			socket.end(() => resolve());
		});
		socket.destroy();
		socket.removeAllListeners();
		this.closing = false;
	}

	public publish(command: RobotCommand): void {
		const socket = this.socket;
		if (!socket) {
			this.reportError(this.unavailable('TCP link is not open; command dropped.'));
			return;
		}
		socket.write(encodeCommand(command), 'utf8', (error) => {
			if (error) {
				this.reportError(error);
			}
		});
	}

	private connect(): Promise<void> {
		return new Promise<void>((resolve, reject) => {
			const socket = net.createConnection({ host: this.host, port: this.port });
			socket.setEncoding('utf8');
			socket.setNoDelay(true);

			const timer = setTimeout(() => {
				socket.destroy();
				reject(this.unavailable(`TCP connect to ${this.host}:${this.port} timed out after ${this.connectTimeoutMs}ms.`));
			}, this.connectTimeoutMs);

			socket.once('connect', () => {
				clearTimeout(timer);
				socket.removeAllListeners('error');
				this.socket = socket;
				this.resetFraming();
				socket.on('data', (chunk: string) => this.receive(chunk));
				socket.on('error', (error) => this.reportError(error));
				socket.on('close', () => {
					if (this.socket === socket && !this.closing) {
						this.socket = undefined;
						this.reportError(this.unavailable('TCP link closed by peer.'));
					}
				});
				resolve();
			});

			socket.once('error', (error) => {
				clearTimeout(timer);
				socket.destroy();
				reject(this.unavailable(`TCP connect to ${this.host}:${this.port} failed: ${error.message}`, error));
			});
		});
	}
}
