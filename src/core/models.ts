// CHANGE: Domain models for the verification pipeline (pure, immutable)
// WHY: CORE holds data and invariants only; SHELL executes commands
// PURITY: CORE
// INVARIANT: CORE defines no effects; data is immutable
// COMPLEXITY: O(1)

import type { Array as Arr } from "effect";

import type {
	StepCancelled,
	StepNonZeroExit,
	StepNotFound,
	StepTimedOut,
} from "./errors.js";

/**
 * Process exit code produced by a pipeline invocation.
 *
 * @remarks
 * - 0 iff the run succeeded
 * - otherwise the failing step's exit code or a sentinel (see decision.ts)
 */
export type ExitCode = number;

/**
 * External program invocation. Opaque to the pipeline: never parsed or split.
 */
export interface StepCommand {
	readonly program: string;
	readonly args: ReadonlyArray<string>;
}

/**
 * One named unit of the verification pipeline.
 *
 * @property env Overrides merged over the caller's environment
 * @property cwd Working directory override
 * @property timeoutMs Per-step timeout; falls back to the run default
 */
export interface Step {
	readonly name: string;
	readonly command: StepCommand;
	readonly env?: Readonly<Record<string, string>>;
	readonly cwd?: string;
	readonly timeoutMs?: number;
}

/**
 * Non-empty ordered list of steps.
 *
 * @invariant length ≥ 1 (enforced by the type)
 */
export type Steps = Arr.NonEmptyReadonlyArray<Step>;

/**
 * Reason a step was recorded as Failed.
 *
 * @invariant discriminated by `_tag`; all variants halt the run identically
 */
export type StepFailure =
	| StepNotFound
	| StepNonZeroExit
	| StepTimedOut
	| StepCancelled;

export type StepOutcome =
	| { readonly _tag: "NotRun" }
	| { readonly _tag: "Passed"; readonly durationMs: number }
	| {
			readonly _tag: "Failed";
			readonly failure: StepFailure;
			readonly durationMs: number;
	  };

export type StepStatus = StepOutcome["_tag"];

export interface StepRecord {
	readonly step: Step;
	readonly outcome: StepOutcome;
}

/**
 * Terminal result of a run.
 *
 * - Pending: the run has not been completed yet (only seen mid-run)
 * - Halted: `index` is the 0-based position of the failing step
 */
export type RunResult =
	| { readonly _tag: "Pending" }
	| { readonly _tag: "Success" }
	| {
			readonly _tag: "Halted";
			readonly index: number;
			readonly stepName: string;
			readonly failure: StepFailure;
	  };

/**
 * State of one pipeline invocation.
 *
 * @property cursor index of the last attempted step, -1 before any attempt
 * @invariant Halted → exactly one Failed record, all earlier Passed, all later NotRun
 * @invariant Success ↔ ∀ r ∈ records: r.outcome = Passed
 */
export interface PipelineRun {
	readonly records: ReadonlyArray<StepRecord>;
	readonly cursor: number;
	readonly result: RunResult;
}

export interface StatusCounts {
	readonly passed: number;
	readonly failed: number;
	readonly notRun: number;
}
