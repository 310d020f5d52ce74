#!/usr/bin/env node

// CHANGE: Thin CLI shell wrapper - single point of process.exit
// WHY: APP returns ExitCode; BIN exits the process and owns signal handling
// FORMAT THEOREM: ∀run: returns exitCode → process.exit(exitCode) occurs exactly once at shell boundary
// PURITY: SHELL (BIN layer)
// INVARIANT: First SIGINT/SIGTERM cancels the running step; later signals are ignored
// COMPLEXITY: O(1) time/space (delegates to APP)

import { main } from "../main.js";

const controller = new AbortController();

const cancelOn = (signal: NodeJS.Signals): void => {
	process.on(signal, () => {
		if (controller.signal.aborted) return;
		console.error(`\n⚠️  Received ${signal}, cancelling the running step...`);
		controller.abort(signal);
	});
};

cancelOn("SIGINT");
cancelOn("SIGTERM");

/**
 * CLI entry point for ci-verify.
 *
 * @remarks
 * - @pure false (process termination and console I/O)
 * - @postcondition process terminates exactly once
 */
void (async (): Promise<void> => {
	try {
		const code = await main(process.argv.slice(2), {
			signal: controller.signal,
		});
		process.exit(code);
	} catch (error) {
		console.error("Fatal error:", error);
		process.exit(1);
	}
})();
