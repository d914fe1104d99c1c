import type { TransportConfigSnapshot } from '../config/factoryTestConfig';
import type { RobotLink } from './robotLink';
import { SerialLink, SerialPortFactory } from './serialLink';
import { TcpLink } from './tcpLink';

export interface LinkFactoryOverrides {
	serialPortFactory?: SerialPortFactory;
}

export function createRobotLink(config: TransportConfigSnapshot, overrides: LinkFactoryOverrides = {}): RobotLink {
	switch (config.kind) {
		case 'serial':
			return new SerialLink({
				path: config.path,
				baudRate: config.baudRate,
				portFactory: overrides.serialPortFactory
			});
		case 'tcp':
			return new TcpLink({ host: config.host, port: config.port });
	}
}
