// CHANGE: Typed error ADT for the verification pipeline using Effect.Data
// WHY: Step failures travel as values inside a PipelineRun, never as thrown exceptions
// SOURCE: https://effect.website/docs/data-types/data
// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * Step executable could not be resolved or spawned (ENOENT, EACCES, ...).
 *
 * @pure true (Data class)
 * @invariant program.length > 0
 */
export class StepNotFound extends Data.TaggedError("StepNotFound")<{
	readonly program: string;
	readonly detail: string;
	readonly output: string;
}> {}

/**
 * Step command ran and returned a non-zero exit code.
 *
 * @pure true (Data class)
 * @invariant exitCode ≠ 0
 */
export class StepNonZeroExit extends Data.TaggedError("StepNonZeroExit")<{
	readonly exitCode: number;
	readonly output: string;
}> {}

/**
 * Step command exceeded its timeout and was terminated.
 *
 * @pure true (Data class)
 * @invariant timeoutMs > 0
 */
export class StepTimedOut extends Data.TaggedError("StepTimedOut")<{
	readonly timeoutMs: number;
	readonly output: string;
}> {}

/**
 * The run was cancelled while this step was running or about to start.
 *
 * @pure true (Data class)
 */
export class StepCancelled extends Data.TaggedError("StepCancelled")<{
	readonly signal: string;
	readonly output: string;
}> {}

/**
 * A pipeline was constructed from an empty list of steps.
 *
 * @pure true (Data class)
 */
export class EmptyPipeline extends Data.TaggedError("EmptyPipeline")<{}> {}

/**
 * Invariant violation - a PipelineRun is in an impossible state
 *
 * @pure true (Data class)
 * @invariant where.length > 0 ∧ detail.length > 0
 */
export class InvariantViolation extends Data.TaggedError("InvariantViolation")<{
	readonly where: string;
	readonly detail: string;
}> {}

/**
 * Configuration file unreadable, malformed, or referring to unknown steps.
 *
 * @pure true (Data class)
 */
export class ConfigError extends Data.TaggedError("ConfigError")<{
	readonly detail: string;
	readonly path?: string;
}> {}

/**
 * Command line could not be parsed.
 *
 * @pure true (Data class)
 */
export class CliUsageError extends Data.TaggedError("CliUsageError")<{
	readonly detail: string;
}> {}

/**
 * Union of errors that prevent a pipeline from being run at all.
 */
export type AppError =
	| EmptyPipeline
	| InvariantViolation
	| ConfigError
	| CliUsageError;
