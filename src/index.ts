// CHANGE: Public API entry point for library consumers
// WHY: Export APP orchestration, the runner and CORE utilities; keep process handling in BIN
// PURITY: Re-exports only (meta-module)
// INVARIANT: All exports are either pure functions, typed interfaces, or Effect-returning shells

// ═══════════════════════════════════════════════════════════════════════════════
// ORCHESTRATION
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Verification run for programmatic usage.
 *
 * @example
 * ```typescript
 * import { Effect } from "effect";
 * import { runVerification } from "ci-verify";
 *
 * const exitCode = await Effect.runPromise(
 *   runVerification({ list: false, help: false, timeoutMs: 600_000 }),
 * );
 * ```
 */
export {
	runVerification,
	type VerificationRuntime,
} from "./app/runVerification.js";
export { main } from "./main.js";

/**
 * Sequential fail-fast runner and its collaborators.
 */
export {
	type PipelineReporter,
	type RunOptions,
	runPipeline,
} from "./shell/pipeline/runner.js";
export {
	type CommandExecutor,
	type ExecutionCompleted,
	type ExecutionFailure,
	type ExecutionRequest,
	spawnExecutor,
} from "./shell/process/executor.js";
export { consoleReporter, silentReporter } from "./shell/output/progress.js";

// ═══════════════════════════════════════════════════════════════════════════════
// CORE TYPES AND PURE FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

export type {
	ExitCode,
	PipelineRun,
	RunResult,
	Step,
	StepCommand,
	StepFailure,
	StepOutcome,
	StepRecord,
	Steps,
} from "./core/models.js";
export {
	ConfigError,
	EmptyPipeline,
	InvariantViolation,
	StepCancelled,
	StepNonZeroExit,
	StepNotFound,
	StepTimedOut,
} from "./core/errors.js";
export {
	checkRunInvariants,
	countByStatus,
	initRun,
	makeSteps,
} from "./core/pipeline.js";
export { computeExitCode, exitCodeOfFailure } from "./core/decision.js";
export { formatCommand, report } from "./core/format/report.js";
export {
	makePartitionPolicy,
	type PartitionPolicy,
	partitionTests,
	type TestPartition,
	type TestPhase,
} from "./core/partition.js";
export { buildDefaultSteps, resolveSteps } from "./core/steps.js";
export type {
	CLIOptions,
	StepOverride,
	VerifyConfig,
} from "./core/types/index.js";
