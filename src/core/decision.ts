// CHANGE: Pure decision function mapping a finished PipelineRun to a process exit code
// WHY: Centralize termination logic in the Functional Core; BIN only calls process.exit
// FORMAT THEOREM: ∀run: computeExitCode(run) = 0 ↔ result(run) = Success
// PURITY: CORE
// INVARIANT: No side effects, deterministic mapping PipelineRun → ExitCode
// COMPLEXITY: O(1) time / O(1) space

import { Effect, pipe } from "effect";
import { match } from "ts-pattern";

import type { ExitCode, PipelineRun, StepFailure } from "./models.js";

/**
 * Sentinel exit codes for failures that carry no exit code of their own.
 * Values follow the shell conventions for the same situations.
 */
export const EXIT_NOT_FOUND = 127;
export const EXIT_TIMED_OUT = 124;
export const EXIT_CANCELLED = 130;
/** Used when the run was never completed. */
export const EXIT_FAILURE = 1;

/**
 * Exit code that a failed step contributes to the process.
 *
 * @pure true
 * @postcondition result ≠ 0
 */
export const exitCodeOfFailure = (failure: StepFailure): ExitCode =>
	match(failure)
		.with({ _tag: "StepNonZeroExit" }, ({ exitCode }) =>
			exitCode === 0 ? EXIT_FAILURE : exitCode,
		)
		.with({ _tag: "StepNotFound" }, () => EXIT_NOT_FOUND)
		.with({ _tag: "StepTimedOut" }, () => EXIT_TIMED_OUT)
		.with({ _tag: "StepCancelled" }, () => EXIT_CANCELLED)
		.exhaustive();

/**
 * Computes process exit code from a finished run (pure function).
 *
 * @returns 0 on Success; the failing step's exit code (or sentinel) on Halted;
 *          EXIT_FAILURE for a run that was never completed
 *
 * @pure true
 * @complexity O(1)
 *
 * @example
 * ```ts
 * computeExitCode(run); // 0 when every step passed
 * ```
 */
export const computeExitCode = (run: PipelineRun): ExitCode =>
	pipe(run.result, (result) =>
		match(result)
			.with({ _tag: "Success" }, () => 0)
			.with({ _tag: "Halted" }, ({ failure }) => exitCodeOfFailure(failure))
			.with({ _tag: "Pending" }, () => EXIT_FAILURE)
			.exhaustive(),
	);

/**
 * Computes exit code as an Effect for composition with other Effects.
 *
 * @effect Effect<ExitCode, never, never>
 * @complexity O(1)
 */
export const computeExitCodeEffect = (
	run: PipelineRun,
): Effect.Effect<ExitCode> => pipe(run, computeExitCode, Effect.succeed);
