// CHANGE: Sequential fail-fast runner over a non-empty list of steps
// WHY: Steps run strictly in declaration order; the first failure halts the run
// PURITY: SHELL (drives the executor); state transitions are delegated to CORE
// EFFECT: Effect<PipelineRun, never>
// INVARIANT: ∀ i < j: attempt(step_i) completes before attempt(step_j) begins
// INVARIANT: The returned Effect never fails; step failures are data inside PipelineRun
// COMPLEXITY: O(n) steps, each bounded by its child process

import * as path from "node:path";

import { Clock, Effect, Either } from "effect";

import { StepNonZeroExit } from "../../core/errors.js";
import type {
	PipelineRun,
	Step,
	StepRecord,
	Steps,
} from "../../core/models.js";
import {
	completeRun,
	initRun,
	recordFailed,
	recordPassed,
} from "../../core/pipeline.js";
import {
	type CommandExecutor,
	type ExecutionRequest,
	spawnExecutor,
} from "../process/executor.js";

/**
 * Lifecycle hooks invoked around each step.
 */
export interface PipelineReporter {
	readonly onStepStart: (step: Step, index: number, total: number) => void;
	readonly onStepFinish: (
		record: StepRecord,
		index: number,
		total: number,
	) => void;
}

/**
 * @property executor Command collaborator; defaults to the child-process executor
 * @property cwd Base working directory; a step's own cwd is resolved against it
 * @property env Base environment; defaults to process.env
 * @property defaultTimeoutMs Applied to steps without their own timeoutMs
 * @property signal Aborting it cancels the running step and halts the run
 */
export interface RunOptions {
	readonly executor?: CommandExecutor;
	readonly cwd?: string;
	readonly env?: NodeJS.ProcessEnv;
	readonly defaultTimeoutMs?: number;
	readonly signal?: AbortSignal;
	readonly reporter?: PipelineReporter;
}

/**
 * Builds the executor request for a step.
 *
 * @pure true
 * @invariant env = base ⊕ step.env (step wins)
 */
export const toRequest = (
	step: Step,
	options: RunOptions,
): ExecutionRequest => {
	const baseCwd = options.cwd ?? process.cwd();
	const timeoutMs = step.timeoutMs ?? options.defaultTimeoutMs;
	return {
		command: step.command,
		cwd: step.cwd === undefined ? baseCwd : path.resolve(baseCwd, step.cwd),
		env: { ...(options.env ?? process.env), ...step.env },
		...(timeoutMs === undefined ? {} : { timeoutMs }),
		...(options.signal === undefined ? {} : { signal: options.signal }),
	};
};

const attempt = (
	run: PipelineRun,
	step: Step,
	index: number,
	options: RunOptions,
	executor: CommandExecutor,
): Effect.Effect<PipelineRun> =>
	Effect.gen(function* () {
		const startedAt = yield* Clock.currentTimeMillis;
		const result = yield* Effect.either(executor(toRequest(step, options)));
		const durationMs = (yield* Clock.currentTimeMillis) - startedAt;
		return Either.match(result, {
			onLeft: (failure) => recordFailed(run, index, failure, durationMs),
			onRight: ({ exitCode, output }) =>
				exitCode === 0
					? recordPassed(run, index, durationMs)
					: recordFailed(
							run,
							index,
							new StepNonZeroExit({ exitCode, output }),
							durationMs,
						),
		});
	});

/**
 * Executes the steps in order, halting at the first failure.
 *
 * @returns the completed PipelineRun: Success, or Halted at the failing step
 *
 * @pure false - runs external commands through the executor
 * @effect Effect<PipelineRun, never>
 * @postcondition Halted(k) → steps after k were never handed to the executor
 * @complexity O(n) where n = |steps|
 *
 * @example
 * ```ts
 * const run = await Effect.runPromise(runPipeline(steps));
 * console.log(report(run));
 * ```
 */
export const runPipeline = (
	steps: Steps,
	options: RunOptions = {},
): Effect.Effect<PipelineRun> =>
	Effect.gen(function* () {
		const executor = options.executor ?? spawnExecutor;
		const total = steps.length;
		let run = initRun(steps);

		for (const [index, step] of steps.entries()) {
			options.reporter?.onStepStart(step, index, total);
			run = yield* attempt(run, step, index, options, executor);
			const record = run.records[index];
			if (record !== undefined) {
				options.reporter?.onStepFinish(record, index, total);
			}
			if (run.result._tag === "Halted") break;
		}

		return completeRun(run);
	});
