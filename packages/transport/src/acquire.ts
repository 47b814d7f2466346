/**
 * TransportAcquirer: turn a TransportConfig into a ready-to-accept Listener.
 *
 * Dispatched once at startup. Every failure is fatal to the caller; nothing
 * here retries.
 */

import { bindLocal } from "./local-bind.js";
import { forwardRemote } from "./remote-forward.js";
import type { AcquiredListener, AcquireOptions, TransportConfig } from "./types.js";

export async function acquireListener(config: TransportConfig, options: AcquireOptions = {}): Promise<AcquiredListener> {
	switch (config.kind) {
		case "local":
			return bindLocal(config, options.logger);
		case "remote":
			return forwardRemote(config, options);
	}
}
