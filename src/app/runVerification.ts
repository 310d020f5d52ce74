// CHANGE: Application layer orchestration (APP) for the verification pipeline
// WHY: APP composes CORE decisions with SHELL effects and returns an exit code as a value
// PURITY: APP (no process.exit here)
// EFFECT: Effect<ExitCode, never>
// INVARIANT: Configuration problems never reach the runner; run invariants are checked before reporting
// COMPLEXITY: O(n) where n = |steps|

import { Effect } from "effect";
import { match } from "ts-pattern";

import { computeExitCodeEffect, EXIT_FAILURE } from "../core/decision.js";
import type { AppError } from "../core/errors.js";
import type { ExitCode } from "../core/models.js";
import { checkRunInvariants } from "../core/pipeline.js";
import { DEFAULT_CONFIG, resolveSteps } from "../core/steps.js";
import type { CLIOptions, VerifyConfigInput } from "../core/types/index.js";
import { USAGE } from "../shell/config/cli.js";
import { loadVerifyConfig, mergeConfig } from "../shell/config/loader.js";
import {
	consoleReporter,
	printPlan,
	printReport,
} from "../shell/output/progress.js";
import type { CommandExecutor } from "../shell/process/executor.js";
import type { PipelineReporter } from "../shell/pipeline/runner.js";
import { runPipeline } from "../shell/pipeline/runner.js";

/** Exit code for configuration and usage problems. */
export const EXIT_USAGE = 2;

/**
 * Process-level collaborators; every field has a production default.
 */
export interface VerificationRuntime {
	readonly cwd?: string;
	readonly env?: NodeJS.ProcessEnv;
	readonly executor?: CommandExecutor;
	readonly reporter?: PipelineReporter;
	readonly signal?: AbortSignal;
}

/**
 * Configuration layer contributed by command-line flags.
 *
 * @pure true
 */
export const cliConfigLayer = (options: CLIOptions): VerifyConfigInput => ({
	...(options.toolchain === undefined ? {} : { toolchain: options.toolchain }),
	...(options.serialMarker === undefined
		? {}
		: { serialMarker: options.serialMarker }),
	...(options.bin === undefined ? {} : { bin: options.bin }),
	...(options.timeoutMs === undefined ? {} : { timeoutMs: options.timeoutMs }),
});

/**
 * Message and exit code for an error that stopped the pipeline from running.
 *
 * @pure true
 */
export const describeAppError = (
	error: AppError,
): { readonly message: string; readonly exitCode: ExitCode } =>
	match(error)
		.with({ _tag: "ConfigError" }, ({ detail, path }) => ({
			message: `Configuration error${path === undefined ? "" : ` in ${path}`}: ${detail}`,
			exitCode: EXIT_USAGE,
		}))
		.with({ _tag: "CliUsageError" }, ({ detail }) => ({
			message: `${detail}\n\n${USAGE}`,
			exitCode: EXIT_USAGE,
		}))
		.with({ _tag: "EmptyPipeline" }, () => ({
			message: "No steps to run",
			exitCode: EXIT_USAGE,
		}))
		.with({ _tag: "InvariantViolation" }, ({ where, detail }) => ({
			message: `Invariant violated in ${where}: ${detail}`,
			exitCode: EXIT_FAILURE,
		}))
		.exhaustive();

/**
 * Orchestrates one verification run and returns ExitCode as value (no process.exit).
 *
 * @pure false (coordinates effects), but does not terminate the process
 * @effect Effect<ExitCode, never> - errors are reported and mapped to exit codes
 * @postcondition result = 0 ↔ every step passed (or --list / --help)
 */
export function runVerification(
	cliOptions: CLIOptions,
	runtime: VerificationRuntime = {},
): Effect.Effect<ExitCode> {
	const cwd = runtime.cwd ?? process.cwd();

	const program = Effect.gen(function* () {
		if (cliOptions.help) {
			console.log(USAGE);
			return 0;
		}

		const fileConfig = yield* loadVerifyConfig(cliOptions.configPath, cwd);
		const config = mergeConfig(
			DEFAULT_CONFIG,
			fileConfig,
			cliConfigLayer(cliOptions),
		);
		const steps = yield* resolveSteps(config);

		if (cliOptions.list) {
			printPlan(steps);
			return 0;
		}

		console.log(`🔍 Verifying ${cwd} (${steps.length} steps)`);
		const run = yield* runPipeline(steps, {
			cwd,
			reporter: runtime.reporter ?? consoleReporter,
			...(runtime.env === undefined ? {} : { env: runtime.env }),
			...(runtime.executor === undefined ? {} : { executor: runtime.executor }),
			...(runtime.signal === undefined ? {} : { signal: runtime.signal }),
		});
		yield* checkRunInvariants(run);

		printReport(run);
		return yield* computeExitCodeEffect(run);
	});

	return program.pipe(
		Effect.catchAll((error: AppError) =>
			Effect.sync(() => {
				const { message, exitCode } = describeAppError(error);
				console.error(`❌ ${message}`);
				return exitCode;
			}),
		),
	);
}
