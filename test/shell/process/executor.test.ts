// CHANGE: Specs for the child-process executor
// WHY: Exit code, combined output and the three failure origins must be observed on real processes
// PURITY: SHELL - spawns `node -e <script>` children only
// INVARIANT: Every test child terminates on its own or is killed by the executor

import * as os from "node:os";
import * as path from "node:path";

import { Effect } from "effect";
import { describe, expect, it } from "vitest";

import {
	abortReasonOf,
	type ExecutionRequest,
	signalExitCode,
	spawnExecutor,
} from "../../../src/shell/process/executor.js";

const nodeScript = (
	script: string,
	over: Partial<ExecutionRequest> = {},
): ExecutionRequest => ({
	command: { program: process.execPath, args: ["-e", script] },
	cwd: process.cwd(),
	env: process.env,
	...over,
});

const complete = (request: ExecutionRequest) =>
	Effect.runPromise(spawnExecutor(request));

const failWith = (request: ExecutionRequest) =>
	Effect.runPromise(Effect.flip(spawnExecutor(request)));

describe("spawnExecutor: completed processes", () => {
	it("captures exit code 0 and stdout", async () => {
		const result = await complete(nodeScript(`process.stdout.write("formatted\\n")`));
		expect(result).toEqual({ exitCode: 0, output: "formatted\n" });
	});

	it("reports a non-zero exit as a completed execution", async () => {
		const result = await complete(
			nodeScript(`process.stderr.write("lint failed\\n"); process.exit(3)`),
		);
		expect(result).toEqual({ exitCode: 3, output: "lint failed\n" });
	});

	it("combines stdout and stderr into one stream", async () => {
		const result = await complete(
			nodeScript(
				`process.stdout.write("out\\n"); setTimeout(() => { process.stderr.write("err\\n"); process.exit(1); }, 100)`,
			),
		);
		expect(result).toEqual({ exitCode: 1, output: "out\nerr\n" });
	});

	it("passes the request environment to the child", async () => {
		const result = await complete(
			nodeScript(`process.stdout.write(process.env.CI_VERIFY_PROBE ?? "unset")`, {
				env: { ...process.env, CI_VERIFY_PROBE: "test-value" },
			}),
		);
		expect(result).toEqual({ exitCode: 0, output: "test-value" });
	});
});

describe("spawnExecutor: failures", () => {
	it("maps a missing executable to StepNotFound", async () => {
		const error = await failWith({
			command: { program: "ci-verify-no-such-program", args: [] },
			cwd: process.cwd(),
			env: process.env,
		});
		expect(error._tag).toBe("StepNotFound");
		if (error._tag === "StepNotFound") {
			expect(error.program).toBe("ci-verify-no-such-program");
			expect(error.detail).toBe(`ENOENT in ${process.cwd()}`);
		}
	});

	it("names the working directory when it does not exist", async () => {
		const missing = path.join(os.tmpdir(), "ci-verify-missing-cwd", "crate");
		const error = await failWith(
			nodeScript(`process.exit(0)`, { cwd: missing }),
		);
		expect(error._tag).toBe("StepNotFound");
		if (error._tag === "StepNotFound") {
			expect(error.program).toBe(process.execPath);
			expect(error.detail).toBe(`ENOENT in ${missing}`);
		}
	});

	it("terminates a step that exceeds its timeout", async () => {
		const error = await failWith(
			nodeScript(`setInterval(() => {}, 1000)`, { timeoutMs: 300 }),
		);
		expect(error._tag).toBe("StepTimedOut");
		if (error._tag === "StepTimedOut") {
			expect(error.timeoutMs).toBe(300);
		}
	});

	it("terminates the running step when the signal is aborted", async () => {
		const controller = new AbortController();
		const pending = failWith(
			nodeScript(`setInterval(() => {}, 1000)`, { signal: controller.signal }),
		);
		setTimeout(() => controller.abort("SIGTERM"), 200);
		const error = await pending;
		expect(error._tag).toBe("StepCancelled");
		if (error._tag === "StepCancelled") {
			expect(error.signal).toBe("SIGTERM");
		}
	});
});

describe("helpers", () => {
	it("signalExitCode follows the 128 + n convention", () => {
		expect(signalExitCode("SIGTERM")).toBe(143);
		expect(signalExitCode("SIGKILL")).toBe(137);
		expect(signalExitCode(null)).toBe(1);
	});

	it("abortReasonOf reads string reasons only", () => {
		const named = new AbortController();
		named.abort("SIGINT");
		expect(abortReasonOf(named.signal)).toBe("SIGINT");

		const plain = new AbortController();
		plain.abort();
		expect(abortReasonOf(plain.signal)).toBe("aborted");
	});
});
