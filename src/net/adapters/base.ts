import type { TransportAdapter } from "../types";

/**
 * Handler bookkeeping shared by the transport adapters.
 *
 * A socket is read from the moment it is wrapped, usually before its owner
 * has registered anything; a relay that greets on accept writes in that
 * window. Bytes that arrive with no message handler are held and replayed to
 * the first one registered, and a close with no close handler is reported to
 * the first one registered.
 */
export abstract class BaseTransport implements TransportAdapter {
	private messageHandlers: Array<(data: Uint8Array) => void> = [];
	private closeHandlers: Array<(reason?: Error) => void> = [];
	private errorHandlers: Array<(error: Error) => void> = [];
	private backlog: Uint8Array[] = [];
	private unreportedClose: { reason: Error | undefined } | null = null;

	abstract send(data: Uint8Array): boolean;
	abstract close(): Promise<void>;

	onMessage(handler: (data: Uint8Array) => void): void {
		this.messageHandlers.push(handler);
		if (this.backlog.length === 0) return;

		const held = this.backlog;
		this.backlog = [];
		for (const data of held) {
			handler(data);
		}
	}

	onClose(handler: (reason?: Error) => void): void {
		this.closeHandlers.push(handler);

		const pending = this.unreportedClose;
		if (pending) {
			this.unreportedClose = null;
			handler(pending.reason);
		}
	}

	onError(handler: (error: Error) => void): void {
		this.errorHandlers.push(handler);
	}

	protected emitMessage(data: Uint8Array): void {
		if (this.messageHandlers.length === 0) {
			this.backlog.push(data);
			return;
		}
		for (const handler of this.messageHandlers) {
			handler(data);
		}
	}

	protected emitError(error: Error): void {
		for (const handler of this.errorHandlers) {
			handler(error);
		}
	}

	protected emitClose(reason: Error | undefined): void {
		if (this.closeHandlers.length === 0) {
			this.unreportedClose = { reason };
			return;
		}
		for (const handler of this.closeHandlers) {
			handler(reason);
		}
	}
}
