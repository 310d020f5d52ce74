// CHANGE: Console output for pipeline progress and the final report
// WHY: Progress lines echo the exact command so a failing step can be re-run by hand
// PURITY: SHELL (console I/O)
// INVARIANT: Success report → stdout; Halted / incomplete report → stderr

import { match } from "ts-pattern";

import { describeFailure, formatCommand, report } from "../../core/format/report.js";
import type { PipelineRun, Step, StepRecord } from "../../core/models.js";
import type { PipelineReporter } from "../pipeline/runner.js";

const position = (index: number, total: number): string =>
	`[${index + 1}/${total}]`;

/**
 * Reporter printing one line when a step starts and one when it finishes.
 */
export const consoleReporter: PipelineReporter = {
	onStepStart: (step: Step, index: number, total: number): void => {
		console.log(`\n▶ ${position(index, total)} ${step.name}`);
		console.log(`   ↳ Command: ${formatCommand(step.command)}`);
	},
	onStepFinish: (record: StepRecord, index: number, total: number): void => {
		const { name } = record.step;
		const line = match(record.outcome)
			.with(
				{ _tag: "Passed" },
				({ durationMs }) => `✅ ${name} passed (${durationMs}ms)`,
			)
			.with(
				{ _tag: "Failed" },
				({ failure, durationMs }) =>
					`❌ ${name} failed: ${describeFailure(failure)} (${durationMs}ms)`,
			)
			.with({ _tag: "NotRun" }, () => `⏭️  ${name} not run`)
			.exhaustive();
		console.log(`${position(index, total)} ${line}`);
	},
};

export const silentReporter: PipelineReporter = {
	onStepStart: () => undefined,
	onStepFinish: () => undefined,
};

/**
 * Prints the planned steps without running them.
 */
export function printPlan(steps: ReadonlyArray<Step>): void {
	console.log(`📋 ${steps.length} step(s) planned:`);
	steps.forEach((step, index) => {
		console.log(`  ${index + 1}. ${step.name}: ${formatCommand(step.command)}`);
	});
}

/**
 * Writes the final report.
 */
export function printReport(run: PipelineRun): void {
	const text = report(run);
	if (run.result._tag === "Success") {
		console.log(`\n${text}`);
	} else {
		console.error(`\n${text}`);
	}
}
