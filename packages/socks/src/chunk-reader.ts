import type { Duplex } from "node:stream";

// Largest handshake message is 262 bytes
const DEFAULT_HIGH_WATER_MARK = 16 * 1024;

/**
 * Exact-length reads over a stream for the handshake phase.
 *
 * Clients may split or coalesce handshake messages across TCP segments, so
 * incoming data is buffered and handed out in the sizes the parser asks for.
 * Bytes sent ahead of a read are capped at highWaterMark: past that the
 * stream is paused until the next read. Once the handshake is done,
 * detach() gives the stream back (paused) along with any bytes that
 * arrived early.
 */
export class ChunkReader {
	private _buffer: Buffer = Buffer.alloc(0);
	private _pending: { size: number; resolve(chunk: Buffer): void; reject(error: Error): void } | undefined;
	private _failure: Error | undefined;

	constructor(
		private readonly _stream: Duplex,
		private readonly _highWaterMark: number = DEFAULT_HIGH_WATER_MARK,
	) {
		_stream.on("data", this._onData);
		_stream.on("end", this._onEnd);
		_stream.on("close", this._onEnd);
		_stream.on("error", this._onError);
	}

	read(size: number): Promise<Buffer> {
		if (this._pending) {
			return Promise.reject(new Error("read already in progress"));
		}
		if (this._buffer.length >= size) {
			return Promise.resolve(this._take(size));
		}
		if (this._failure) {
			return Promise.reject(this._failure);
		}
		return new Promise((resolve, reject) => {
			this._pending = { size, resolve, reject };
			if (this._stream.isPaused()) this._stream.resume();
		});
	}

	/** Stop buffering. Returns bytes received beyond what was read. */
	detach(): Buffer {
		this._stream.off("data", this._onData);
		this._stream.off("end", this._onEnd);
		this._stream.off("close", this._onEnd);
		this._stream.off("error", this._onError);
		this._stream.pause();
		const rest = this._buffer;
		this._buffer = Buffer.alloc(0);
		return rest;
	}

	private _take(size: number): Buffer {
		const chunk = this._buffer.subarray(0, size);
		this._buffer = this._buffer.subarray(size);
		return chunk;
	}

	private _settle(): void {
		const pending = this._pending;
		if (!pending) return;
		if (this._buffer.length >= pending.size) {
			this._pending = undefined;
			pending.resolve(this._take(pending.size));
		} else if (this._failure) {
			this._pending = undefined;
			pending.reject(this._failure);
		}
	}

	private readonly _onData = (chunk: Buffer): void => {
		this._buffer = Buffer.concat([this._buffer, chunk]);
		this._settle();
		if (!this._pending && this._buffer.length >= this._highWaterMark) this._stream.pause();
	};

	private readonly _onEnd = (): void => {
		this._failure ??= new Error("connection closed during handshake");
		this._settle();
	};

	private readonly _onError = (error: Error): void => {
		this._failure ??= error;
		this._settle();
	};
}
