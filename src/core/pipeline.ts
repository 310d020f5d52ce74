// CHANGE: Pure state transitions for a PipelineRun
// WHY: The halt point and its cause are inspectable values instead of a side effect of process exit
// FORMAT THEOREM: ∀run: result(run) = Success ↔ ∀r ∈ records(run): r.outcome = Passed
// PURITY: CORE
// INVARIANT: Every transition returns a new PipelineRun; inputs are never mutated
// COMPLEXITY: O(n) per transition where n = |steps|

import { Array as Arr, Either, pipe } from "effect";

import { EmptyPipeline, InvariantViolation } from "./errors.js";
import type {
	PipelineRun,
	StatusCounts,
	Step,
	StepFailure,
	StepOutcome,
	Steps,
} from "./models.js";

const NOT_RUN: StepOutcome = { _tag: "NotRun" };

/**
 * Narrows a plain list of steps to a non-empty one.
 *
 * @returns Right(steps) when at least one step is given, Left(EmptyPipeline) otherwise
 *
 * @pure true
 * @complexity O(1)
 */
export const makeSteps = (
	steps: ReadonlyArray<Step>,
): Either.Either<Steps, EmptyPipeline> =>
	Arr.isNonEmptyReadonlyArray(steps)
		? Either.right(steps)
		: Either.left(new EmptyPipeline());

/**
 * Fresh run: every step NotRun, nothing attempted yet.
 *
 * @pure true
 * @postcondition cursor = -1 ∧ result = Pending
 */
export const initRun = (steps: Steps): PipelineRun => ({
	records: steps.map((step) => ({ step, outcome: NOT_RUN })),
	cursor: -1,
	result: { _tag: "Pending" },
});

const withOutcome = (
	run: PipelineRun,
	index: number,
	outcome: StepOutcome,
): PipelineRun => ({
	...run,
	records: run.records.map((record, i) =>
		i === index ? { ...record, outcome } : record,
	),
	cursor: index,
});

/**
 * Records a passed step.
 *
 * @pure true
 * @precondition 0 ≤ index < |records|
 */
export const recordPassed = (
	run: PipelineRun,
	index: number,
	durationMs: number,
): PipelineRun => withOutcome(run, index, { _tag: "Passed", durationMs });

/**
 * Records a failed step and halts the run at it.
 *
 * @pure true
 * @precondition 0 ≤ index < |records|
 * @postcondition result = Halted(index)
 */
export const recordFailed = (
	run: PipelineRun,
	index: number,
	failure: StepFailure,
	durationMs: number,
): PipelineRun => {
	const next = withOutcome(run, index, {
		_tag: "Failed",
		failure,
		durationMs,
	});
	const stepName = run.records[index]?.step.name ?? "";
	return {
		...next,
		result: { _tag: "Halted", index, stepName, failure },
	};
};

/**
 * Closes a run that was not halted: Success iff every record passed.
 *
 * @pure true
 * @invariant Halted runs are returned unchanged
 */
export const completeRun = (run: PipelineRun): PipelineRun => {
	if (run.result._tag === "Halted") return run;
	const allPassed = run.records.every((r) => r.outcome._tag === "Passed");
	return allPassed ? { ...run, result: { _tag: "Success" } } : run;
};

/**
 * Counts records by status.
 *
 * @pure true
 * @invariant passed + failed + notRun = |records|
 */
export const countByStatus = (run: PipelineRun): StatusCounts =>
	run.records.reduce<StatusCounts>(
		(acc, { outcome }) => {
			switch (outcome._tag) {
				case "Passed":
					return { ...acc, passed: acc.passed + 1 };
				case "Failed":
					return { ...acc, failed: acc.failed + 1 };
				case "NotRun":
					return { ...acc, notRun: acc.notRun + 1 };
			}
		},
		{ passed: 0, failed: 0, notRun: 0 },
	);

const violation = (detail: string): InvariantViolation =>
	new InvariantViolation({ where: "PipelineRun", detail });

const checkHalted = (
	run: PipelineRun,
	index: number,
): Either.Either<PipelineRun, InvariantViolation> => {
	const misplaced = run.records.findIndex((record, i) => {
		const expected = i < index ? "Passed" : i === index ? "Failed" : "NotRun";
		return record.outcome._tag !== expected;
	});
	if (misplaced !== -1) {
		return Either.left(
			violation(
				`record ${misplaced} is ${run.records[misplaced]?.outcome._tag ?? "missing"} in a run halted at ${index}`,
			),
		);
	}
	return run.cursor === index
		? Either.right(run)
		: Either.left(violation(`cursor ${run.cursor} ≠ halt index ${index}`));
};

/**
 * Validates the structural invariants of a PipelineRun.
 *
 * @returns Right(run) when the run is consistent, Left(InvariantViolation) otherwise
 *
 * @pure true
 * @invariant Halted(k) → records[0..k) Passed ∧ records[k] Failed ∧ records(k..n) NotRun
 * @invariant Success ↔ all records Passed
 * @complexity O(n)
 */
export const checkRunInvariants = (
	run: PipelineRun,
): Either.Either<PipelineRun, InvariantViolation> =>
	pipe(countByStatus(run), (counts) => {
		switch (run.result._tag) {
			case "Halted":
				return checkHalted(run, run.result.index);
			case "Success":
				return counts.passed === run.records.length
					? Either.right(run)
					: Either.left(
							violation(
								`Success with ${counts.passed} of ${run.records.length} steps passed`,
							),
						);
			case "Pending":
				return counts.failed === 0
					? Either.right(run)
					: Either.left(violation("Failed record in a pending run"));
		}
	});
