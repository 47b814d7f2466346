/**
 * Bridges event-driven sources (net.Server "connection", ssh2 "tcp connection")
 * to the pull-style Listener.accept().
 *
 * Once failed, the queue stays failed: waiting and future accepts reject with
 * the same ListenerClosedError and late arrivals are destroyed.
 */

import type { ListenerClosedError } from "./errors.js";
import type { IncomingConnection } from "./types.js";

interface Waiter {
	resolve: (connection: IncomingConnection) => void;
	reject: (error: ListenerClosedError) => void;
}

export class ConnectionQueue {
	private readonly _pending: IncomingConnection[] = [];
	private readonly _waiters: Waiter[] = [];
	private _failure: ListenerClosedError | undefined;

	get failure(): ListenerClosedError | undefined {
		return this._failure;
	}

	push(connection: IncomingConnection): void {
		if (this._failure) {
			connection.stream.destroy();
			return;
		}
		const waiter = this._waiters.shift();
		if (waiter) {
			waiter.resolve(connection);
		} else {
			this._pending.push(connection);
		}
	}

	next(): Promise<IncomingConnection> {
		const ready = this._pending.shift();
		if (ready) return Promise.resolve(ready);
		if (this._failure) return Promise.reject(this._failure);
		return new Promise<IncomingConnection>((resolve, reject) => {
			this._waiters.push({ resolve, reject });
		});
	}

	fail(error: ListenerClosedError): void {
		if (this._failure) return;
		this._failure = error;
		for (const waiter of this._waiters.splice(0)) {
			waiter.reject(error);
		}
		for (const connection of this._pending.splice(0)) {
			connection.stream.destroy();
		}
	}
}
