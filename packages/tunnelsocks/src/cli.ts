#!/usr/bin/env -S node --import tsx
/**
 * CLI entry point.
 *
 * Run with: npm start -- [args...]
 */
process.title = "tunnelsocks";

import { main } from "./main.js";

main(process.argv.slice(2)).then(
	(status) => {
		// Relays still in flight must not keep a failed process alive
		if (status !== 0) process.exit(status);
	},
	(error: unknown) => {
		process.stderr.write(`error: ${String(error)}\n`);
		process.exit(1);
	},
);
