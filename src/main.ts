// CHANGE: Thin programmatic entry: parse argv, delegate to APP
// PURITY: APP (no process.exit; only composition)
// INVARIANT: Returns ExitCode as value without terminating the process
// COMPLEXITY: O(1)

import { Effect, Either } from "effect";

import {
	describeAppError,
	runVerification,
	type VerificationRuntime,
} from "./app/runVerification.js";
import type { ExitCode } from "./core/models.js";
import { parseCLIArgs } from "./shell/config/cli.js";

/**
 * Entry for programmatic usage (without terminating process).
 *
 * @param argv Arguments without the node and script entries
 * @returns ExitCode (0 on success)
 */
export async function main(
	argv: ReadonlyArray<string> = process.argv.slice(2),
	runtime: VerificationRuntime = {},
): Promise<ExitCode> {
	const parsed = parseCLIArgs(argv);
	if (Either.isLeft(parsed)) {
		const { message, exitCode } = describeAppError(parsed.left);
		console.error(`❌ ${message}`);
		return exitCode;
	}
	return Effect.runPromise(runVerification(parsed.right, runtime));
}
