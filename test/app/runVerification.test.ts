// CHANGE: End-to-end specs for the APP layer with an in-process executor
// WHY: Configuration layering, --list/--help and exit-code mapping without the real toolchain
// PURITY: SHELL - temporary cwd, console spied, no child processes

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

import { Effect } from "effect";
import { afterEach, beforeEach, describe, expect, it, type MockInstance, vi } from "vitest";

import {
	cliConfigLayer,
	describeAppError,
	EXIT_USAGE,
	runVerification,
} from "../../src/app/runVerification.js";
import { EmptyPipeline, InvariantViolation } from "../../src/core/errors.js";
import type { CLIOptions } from "../../src/core/types/index.js";
import { main } from "../../src/main.js";
import { USAGE } from "../../src/shell/config/cli.js";
import { DEFAULT_CONFIG_FILE } from "../../src/shell/config/loader.js";
import { silentReporter } from "../../src/shell/output/progress.js";
import type {
	CommandExecutor,
	ExecutionRequest,
} from "../../src/shell/process/executor.js";

/** Maps a default step's command line back to the step name. */
const stepKey = (args: ReadonlyArray<string>): string => {
	if (args.includes("fmt")) return "format-check";
	if (args.includes("clippy")) return "lint";
	return args.at(-1)?.startsWith("not ") === true ? "tests:non-serial" : "tests:serial";
};

const toolchainExecutor = (exitCodes: Readonly<Record<string, number>> = {}) => {
	const calls: string[] = [];
	const requests: ExecutionRequest[] = [];
	const executor: CommandExecutor = (request) =>
		Effect.sync(() => {
			const key = stepKey(request.command.args);
			calls.push(key);
			requests.push(request);
			return { exitCode: exitCodes[key] ?? 0, output: `${key} output\n` };
		});
	return { executor, calls, requests };
};

const options = (over: Partial<CLIOptions> = {}): CLIOptions => ({
	list: false,
	help: false,
	...over,
});

let dir = "";
let log: MockInstance<typeof console.log>;
let error: MockInstance<typeof console.error>;

beforeEach(() => {
	dir = fs.mkdtempSync(path.join(os.tmpdir(), "ci-verify-app-"));
	log = vi.spyOn(console, "log").mockImplementation(() => undefined);
	error = vi.spyOn(console, "error").mockImplementation(() => undefined);
});

afterEach(() => {
	vi.restoreAllMocks();
	fs.rmSync(dir, { recursive: true, force: true });
});

const writeConfig = (content: unknown): string => {
	const file = path.join(dir, DEFAULT_CONFIG_FILE);
	fs.writeFileSync(file, JSON.stringify(content), "utf8");
	return file;
};

const verify = (
	cli: CLIOptions,
	fake: ReturnType<typeof toolchainExecutor>,
): Promise<number> =>
	Effect.runPromise(
		runVerification(cli, {
			cwd: dir,
			env: { PATH: "/usr/bin" },
			executor: fake.executor,
			reporter: silentReporter,
		}),
	);

const errorLines = (): unknown[] => error.mock.calls.map((call) => call[0]);

describe("runVerification: pipeline", () => {
	it("runs the four default steps in order and exits 0", async () => {
		const fake = toolchainExecutor();
		await expect(verify(options(), fake)).resolves.toBe(0);
		expect(fake.calls).toEqual([
			"format-check",
			"lint",
			"tests:non-serial",
			"tests:serial",
		]);
		expect(fake.requests.map((r) => r.cwd)).toEqual([dir, dir, dir, dir]);
		expect(fake.requests[0]?.env).toEqual({ PATH: "/usr/bin" });
		expect(log.mock.calls.map((call) => call[0])).toEqual([
			`🔍 Verifying ${dir} (4 steps)`,
			"\n✅ All 4 steps passed.",
		]);
	});

	it("stops at a failing lint step and returns its exit code", async () => {
		const fake = toolchainExecutor({ lint: 3 });
		await expect(verify(options(), fake)).resolves.toBe(3);
		expect(fake.calls).toEqual(["format-check", "lint"]);
		expect(errorLines()).toEqual([
			[
				"\n❌ Pipeline halted at step 2 of 4: lint",
				"   exited with code 3",
				"----- output -----",
				"lint output\n",
				"----- end output -----",
			].join("\n"),
		]);
	});

	it("applies command-line flags over the configuration file", async () => {
		writeConfig({ timeoutMs: 100, bin: "worker", serialMarker: "serial_io" });
		const fake = toolchainExecutor();
		await verify(options({ timeoutMs: 500, bin: "server" }), fake);
		expect(fake.requests.map((r) => r.timeoutMs)).toEqual([500, 500, 500, 500]);
		const serial = fake.requests[3]?.command.args ?? [];
		expect(serial.slice(-4)).toEqual(["--bin", "server", "-E", "test(serial_io)"]);
	});

	it("applies per-step overrides from the configuration file", async () => {
		writeConfig({ steps: { lint: { cwd: "crates/core", env: { RUSTFLAGS: "-Dwarnings" } } } });
		const fake = toolchainExecutor();
		await verify(options(), fake);
		expect(fake.requests[1]?.cwd).toBe(path.join(dir, "crates/core"));
		expect(fake.requests[1]?.env).toEqual({
			PATH: "/usr/bin",
			RUSTFLAGS: "-Dwarnings",
		});
	});
});

describe("runVerification: listing and help", () => {
	it("--list prints the plan and runs nothing", async () => {
		const fake = toolchainExecutor();
		await expect(verify(options({ list: true }), fake)).resolves.toBe(0);
		expect(fake.calls).toEqual([]);
		const printed = log.mock.calls.map((call) => call[0]);
		expect(printed[0]).toBe("📋 4 step(s) planned:");
		expect(printed[1]).toBe(
			"  1. format-check: cargo +nightly-2024-04-03 fmt -- --check",
		);
		expect(printed).toHaveLength(5);
	});

	it("--help prints usage without reading configuration", async () => {
		writeConfig({ toolchain: "" });
		const fake = toolchainExecutor();
		await expect(verify(options({ help: true }), fake)).resolves.toBe(0);
		expect(log.mock.calls.map((call) => call[0])).toEqual([USAGE]);
		expect(fake.calls).toEqual([]);
	});
});

describe("runVerification: configuration problems", () => {
	it("maps an invalid configuration file to the usage exit code", async () => {
		const file = writeConfig({ toolchain: "" });
		const fake = toolchainExecutor();
		await expect(verify(options(), fake)).resolves.toBe(EXIT_USAGE);
		expect(fake.calls).toEqual([]);
		expect(errorLines()).toEqual([
			`❌ Configuration error in ${file}: toolchain: must be a non-empty string`,
		]);
	});

	it("rejects an override for a step that does not exist", async () => {
		writeConfig({ steps: { docs: { program: "mdbook" } } });
		const fake = toolchainExecutor();
		await expect(verify(options(), fake)).resolves.toBe(EXIT_USAGE);
		expect(errorLines()).toEqual([
			"❌ Configuration error: unknown step override(s): docs; known steps: format-check, lint, tests:non-serial, tests:serial",
		]);
	});
});

describe("describeAppError", () => {
	it("maps pipeline-level errors to messages and exit codes", () => {
		expect(describeAppError(new EmptyPipeline())).toEqual({
			message: "No steps to run",
			exitCode: EXIT_USAGE,
		});
		expect(
			describeAppError(new InvariantViolation({ where: "runPipeline", detail: "x" })),
		).toEqual({ message: "Invariant violated in runPipeline: x", exitCode: 1 });
	});
});

describe("cliConfigLayer", () => {
	it("contributes only the flags that were given", () => {
		expect(cliConfigLayer(options())).toEqual({});
		expect(cliConfigLayer(options({ toolchain: "stable", list: true }))).toEqual({
			toolchain: "stable",
		});
	});
});

describe("main", () => {
	it("reports a usage error with the usage text and exits 2", async () => {
		await expect(main(["--bogus"])).resolves.toBe(2);
		expect(errorLines()).toEqual([`❌ unknown option --bogus\n\n${USAGE}`]);
	});

	it("parses argv and runs the pipeline", async () => {
		const fake = toolchainExecutor({ "tests:serial": 101 });
		await expect(
			main(["--timeout", "250"], {
				cwd: dir,
				executor: fake.executor,
				reporter: silentReporter,
			}),
		).resolves.toBe(101);
		expect(fake.requests.map((r) => r.timeoutMs)).toEqual([250, 250, 250, 250]);
	});
});
