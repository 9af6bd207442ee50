import { TcpTransport } from "./adapters/tcp";
import { UdpTransport } from "./adapters/udp";
import type { DatagramTransportOptions, StreamTransportOptions, TransportAdapter, TransportFactory } from "./types";

/**
 * Opens real sockets: TCP or TLS for the reliable channel, UDP for datagrams.
 */
export class NodeTransportFactory implements TransportFactory {
	openStream(options: StreamTransportOptions): Promise<TransportAdapter> {
		return TcpTransport.connect(options);
	}

	openDatagram(options: DatagramTransportOptions): Promise<TransportAdapter> {
		return UdpTransport.open(options);
	}
}
