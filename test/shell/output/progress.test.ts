// CHANGE: Specs for progress lines, the plan listing and report routing
// PURITY: SHELL - console is spied, nothing is printed

import { afterEach, beforeEach, describe, expect, it, type MockInstance, vi } from "vitest";

import { StepNonZeroExit } from "../../../src/core/errors.js";
import { initRun, recordFailed, recordPassed, completeRun } from "../../../src/core/pipeline.js";
import {
	consoleReporter,
	printPlan,
	printReport,
	silentReporter,
} from "../../../src/shell/output/progress.js";
import { step, stepsOf } from "../../utils/builders.js";

let log: MockInstance<typeof console.log>;
let error: MockInstance<typeof console.error>;

beforeEach(() => {
	log = vi.spyOn(console, "log").mockImplementation(() => undefined);
	error = vi.spyOn(console, "error").mockImplementation(() => undefined);
});

afterEach(() => {
	vi.restoreAllMocks();
});

const lines = (spy: MockInstance<typeof console.log>): unknown[] =>
	spy.mock.calls.map((call) => call[0]);

const lint = step("lint", {
	command: { program: "cargo", args: ["clippy", "--", "-D", "warnings"] },
});

describe("consoleReporter", () => {
	it("prints the position, name and exact command when a step starts", () => {
		consoleReporter.onStepStart(lint, 1, 4);
		expect(lines(log)).toEqual([
			"\n▶ [2/4] lint",
			"   ↳ Command: cargo clippy -- -D warnings",
		]);
	});

	it("prints a passed step with its duration", () => {
		consoleReporter.onStepFinish(
			{ step: lint, outcome: { _tag: "Passed", durationMs: 12 } },
			1,
			4,
		);
		expect(lines(log)).toEqual(["[2/4] ✅ lint passed (12ms)"]);
	});

	it("prints a failed step with the failure description", () => {
		consoleReporter.onStepFinish(
			{
				step: lint,
				outcome: {
					_tag: "Failed",
					failure: new StepNonZeroExit({ exitCode: 1, output: "" }),
					durationMs: 5,
				},
			},
			1,
			4,
		);
		expect(lines(log)).toEqual(["[2/4] ❌ lint failed: exited with code 1 (5ms)"]);
	});
});

describe("silentReporter", () => {
	it("prints nothing", () => {
		silentReporter.onStepStart(lint, 0, 1);
		silentReporter.onStepFinish({ step: lint, outcome: { _tag: "NotRun" } }, 0, 1);
		expect(log).not.toHaveBeenCalled();
		expect(error).not.toHaveBeenCalled();
	});
});

describe("printPlan", () => {
	it("lists each step with its command, quoting arguments that need it", () => {
		printPlan([
			step("fmt", { command: { program: "cargo", args: ["fmt", "--", "--check"] } }),
			step("tests", {
				command: { program: "cargo", args: ["nextest", "-E", "not test(serial_db)"] },
			}),
		]);
		expect(lines(log)).toEqual([
			"📋 2 step(s) planned:",
			"  1. fmt: cargo fmt -- --check",
			"  2. tests: cargo nextest -E 'not test(serial_db)'",
		]);
	});
});

describe("printReport", () => {
	it("writes a successful report to stdout", () => {
		printReport(completeRun(recordPassed(initRun(stepsOf("a")), 0, 1)));
		expect(lines(log)).toEqual(["\n✅ All 1 step passed."]);
		expect(error).not.toHaveBeenCalled();
	});

	it("writes a halted report to stderr", () => {
		const failure = new StepNonZeroExit({ exitCode: 2, output: "diff\n" });
		printReport(recordFailed(initRun(stepsOf("a", "b")), 0, failure, 1));
		expect(log).not.toHaveBeenCalled();
		expect(error.mock.calls.map((call) => call[0])).toEqual([
			[
				"\n❌ Pipeline halted at step 1 of 2: a",
				"   exited with code 2",
				"----- output -----",
				"diff\n",
				"----- end output -----",
			].join("\n"),
		]);
	});
});
