// CHANGE: Child-process executor for pipeline steps
// WHY: The pipeline core only needs exit code and combined output; this module owns the process
// SOURCE: https://nodejs.org/api/child_process.html#child_processspawncommand-args-options
// PURITY: SHELL (spawns external processes)
// EFFECT: Effect<ExecutionCompleted, StepNotFound | StepTimedOut | StepCancelled>
// INVARIANT: ∀ request: exactly one of {completed, not found, timed out, cancelled} is produced
// COMPLEXITY: O(|output|) space

import { spawn } from "node:child_process";
import { constants } from "node:os";

import { Effect } from "effect";

import {
	StepCancelled,
	StepNotFound,
	StepTimedOut,
} from "../../core/errors.js";
import type { StepCommand } from "../../core/models.js";

export interface ExecutionRequest {
	readonly command: StepCommand;
	readonly cwd: string;
	readonly env: NodeJS.ProcessEnv;
	readonly timeoutMs?: number;
	readonly signal?: AbortSignal;
}

/**
 * The process ran to completion (any exit code, including non-zero).
 */
export interface ExecutionCompleted {
	readonly exitCode: number;
	readonly output: string;
}

export type ExecutionFailure = StepNotFound | StepTimedOut | StepCancelled;

/**
 * Contract between the runner and whatever executes commands.
 * Tests substitute an in-process implementation.
 */
export type CommandExecutor = (
	request: ExecutionRequest,
) => Effect.Effect<ExecutionCompleted, ExecutionFailure>;

/** Grace period between SIGTERM and SIGKILL for a terminated step. */
export const KILL_GRACE_MS = 5_000;

type Termination =
	| { readonly kind: "timeout"; readonly timeoutMs: number }
	| { readonly kind: "cancel"; readonly reason: string };

/**
 * Exit code of a process killed by a signal, shell convention 128 + n.
 *
 * @pure true
 */
export const signalExitCode = (signal: NodeJS.Signals | null): number => {
	const signo = Object.entries(constants.signals).find(
		([name]) => name === signal,
	)?.[1];
	return signo === undefined ? 1 : 128 + signo;
};

/**
 * Human-readable cancellation reason carried by an AbortSignal.
 *
 * @pure true
 */
export const abortReasonOf = (signal: AbortSignal): string => {
	const reason: unknown = signal.reason;
	return typeof reason === "string" ? reason : "aborted";
};

const errnoOf = (error: Error): string =>
	"code" in error && typeof error.code === "string" ? error.code : error.message;

/**
 * Spawns the step command without a shell and captures stdout and stderr
 * into one string in arrival order.
 *
 * - spawn error (ENOENT, EACCES, ...) → StepNotFound; a missing cwd is also
 *   ENOENT, so the detail names the working directory
 * - timeout → SIGTERM (SIGKILL after KILL_GRACE_MS), StepTimedOut
 * - request.signal aborted → SIGTERM (SIGKILL after KILL_GRACE_MS), StepCancelled
 * - fiber interrupted → SIGKILL
 *
 * @pure false - spawns an external process
 * @effect Effect<ExecutionCompleted, ExecutionFailure>
 */
export const spawnExecutor: CommandExecutor = (request) =>
	Effect.suspend(() => {
		const { command, signal } = request;
		if (signal?.aborted === true) {
			return Effect.fail(
				new StepCancelled({ signal: abortReasonOf(signal), output: "" }),
			);
		}
		return Effect.async<ExecutionCompleted, ExecutionFailure>((resume) => {
			let output = "";
			let settled = false;
			let termination: Termination | null = null;
			let timer: NodeJS.Timeout | undefined;
			let killTimer: NodeJS.Timeout | undefined;

			const onAbort = (): void => {
				if (signal !== undefined) {
					terminate({ kind: "cancel", reason: abortReasonOf(signal) });
				}
			};

			const settle = (
				exit: Effect.Effect<ExecutionCompleted, ExecutionFailure>,
			): void => {
				if (settled) return;
				settled = true;
				clearTimeout(timer);
				clearTimeout(killTimer);
				signal?.removeEventListener("abort", onAbort);
				resume(exit);
			};

			const notFound = (error: Error): void => {
				settle(
					Effect.fail(
						new StepNotFound({
							program: command.program,
							detail: `${errnoOf(error)} in ${request.cwd}`,
							output,
						}),
					),
				);
			};

			let child: ReturnType<typeof spawnChild>;
			try {
				child = spawnChild(request);
			} catch (error) {
				notFound(error instanceof Error ? error : new Error(String(error)));
				return;
			}

			function terminate(reason: Termination): void {
				if (termination !== null || settled) return;
				termination = reason;
				child.kill("SIGTERM");
				killTimer = setTimeout(() => {
					child.kill("SIGKILL");
				}, KILL_GRACE_MS);
			}

			child.stdout.setEncoding("utf8");
			child.stderr.setEncoding("utf8");
			child.stdout.on("data", (chunk: string) => {
				output += chunk;
			});
			child.stderr.on("data", (chunk: string) => {
				output += chunk;
			});

			child.on("error", notFound);
			child.on("close", (code, killSignal) => {
				if (termination?.kind === "timeout") {
					settle(
						Effect.fail(
							new StepTimedOut({ timeoutMs: termination.timeoutMs, output }),
						),
					);
					return;
				}
				if (termination?.kind === "cancel") {
					settle(
						Effect.fail(
							new StepCancelled({ signal: termination.reason, output }),
						),
					);
					return;
				}
				settle(
					Effect.succeed({
						exitCode: code ?? signalExitCode(killSignal),
						output,
					}),
				);
			});

			const { timeoutMs } = request;
			if (timeoutMs !== undefined) {
				timer = setTimeout(() => {
					terminate({ kind: "timeout", timeoutMs });
				}, timeoutMs);
			}
			signal?.addEventListener("abort", onAbort, { once: true });

			return Effect.sync(() => {
				if (settled) return;
				settled = true;
				clearTimeout(timer);
				clearTimeout(killTimer);
				signal?.removeEventListener("abort", onAbort);
				child.kill("SIGKILL");
			});
		});
	});

function spawnChild(request: ExecutionRequest) {
	return spawn(request.command.program, [...request.command.args], {
		cwd: request.cwd,
		env: request.env,
		stdio: ["ignore", "pipe", "pipe"],
	});
}
