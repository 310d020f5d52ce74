// CHANGE: Human-readable summary of a finished PipelineRun
// WHY: The report names the failing step and shows its output so nothing has to be re-run
// PURITY: CORE
// INVARIANT: Output depends only on the run value; captured output is reproduced verbatim
// COMPLEXITY: O(|output|)

import { match } from "ts-pattern";

import type { PipelineRun, StepFailure, StepCommand } from "../models.js";

export const OUTPUT_BEGIN = "----- output -----";
export const OUTPUT_END = "----- end output -----";

/**
 * Renders a command for display. Arguments containing whitespace or quotes
 * are single-quoted so the line can be pasted into a shell.
 *
 * @pure true
 */
export const formatCommand = (command: StepCommand): string =>
	[command.program, ...command.args]
		.map((part) =>
			/^[\w@%+=:,.\/-]+$/u.test(part)
				? part
				: `'${part.replaceAll("'", `'\\''`)}'`,
		)
		.join(" ");

/**
 * One-line description of why a step failed.
 *
 * @pure true
 */
export const describeFailure = (failure: StepFailure): string =>
	match(failure)
		.with(
			{ _tag: "StepNonZeroExit" },
			({ exitCode }) => `exited with code ${exitCode}`,
		)
		.with(
			{ _tag: "StepNotFound" },
			({ program, detail }) => `command not found: ${program} (${detail})`,
		)
		.with(
			{ _tag: "StepTimedOut" },
			({ timeoutMs }) => `timed out after ${timeoutMs}ms`,
		)
		.with({ _tag: "StepCancelled" }, ({ signal }) => `cancelled (${signal})`)
		.exhaustive();

const pluralSteps = (n: number): string => (n === 1 ? "step" : "steps");

/**
 * Produces the summary text for a run.
 *
 * - Success: confirmation that all N steps passed
 * - Halted: failing step name, position, failure, captured output verbatim
 *
 * @pure true
 *
 * @example
 * ```ts
 * report(run);
 * // "✅ All 4 steps passed."
 * ```
 */
export function report(run: PipelineRun): string {
	const total = run.records.length;
	return match(run.result)
		.with(
			{ _tag: "Success" },
			() => `✅ All ${total} ${pluralSteps(total)} passed.`,
		)
		.with({ _tag: "Halted" }, ({ index, stepName, failure }) =>
			[
				`❌ Pipeline halted at step ${index + 1} of ${total}: ${stepName}`,
				`   ${describeFailure(failure)}`,
				OUTPUT_BEGIN,
				failure.output,
				OUTPUT_END,
			].join("\n"),
		)
		.with(
			{ _tag: "Pending" },
			() => `⚠️ Pipeline did not complete (${total} ${pluralSteps(total)}).`,
		)
		.exhaustive();
}
