// CHANGE: Default verification steps and per-step overrides
// WHY: Format check, strict lint, then the two test partitions, in that order
// PURITY: CORE
// INVARIANT: Both test steps take their filter from the same PartitionPolicy
// COMPLEXITY: O(n) where n = |steps|

import { Array as Arr, Either } from "effect";

import { ConfigError } from "./errors.js";
import type { Step, Steps } from "./models.js";
import {
	DEFAULT_SERIAL_MARKER,
	makePartitionPolicy,
	type TestPhase,
} from "./partition.js";
import type { StepOverride, VerifyConfig } from "./types/index.js";

export const DEFAULT_TOOLCHAIN = "nightly-2024-04-03";

export const STEP_FORMAT_CHECK = "format-check";
export const STEP_LINT = "lint";
export const STEP_TESTS_NON_SERIAL = "tests:non-serial";
export const STEP_TESTS_SERIAL = "tests:serial";

/** Largest delay a Node.js timer honours; longer ones fire after 1ms. */
export const MAX_TIMEOUT_MS = 2_147_483_647;

export const DEFAULT_CONFIG: VerifyConfig = {
	toolchain: DEFAULT_TOOLCHAIN,
	serialMarker: DEFAULT_SERIAL_MARKER,
	steps: {},
};

const CARGO = "cargo";
const FEATURE_FLAGS = ["--all-targets", "--all-features"] as const;

const testStep = (
	name: string,
	phase: TestPhase,
	config: VerifyConfig,
): Step => {
	const policy = makePartitionPolicy(config.serialMarker);
	const binArgs = config.bin === undefined ? [] : ["--bin", config.bin];
	return {
		name,
		command: {
			program: CARGO,
			args: [
				"nextest",
				"run",
				"--workspace",
				...FEATURE_FLAGS,
				...binArgs,
				"-E",
				policy.filterFor(phase),
			],
		},
	};
};

/**
 * The four default steps, in execution order.
 *
 * @pure true
 * @postcondition names = [format-check, lint, tests:non-serial, tests:serial]
 */
export const buildDefaultSteps = (config: VerifyConfig): Steps => [
	{
		name: STEP_FORMAT_CHECK,
		command: {
			program: CARGO,
			args: [`+${config.toolchain}`, "fmt", "--", "--check"],
		},
	},
	{
		name: STEP_LINT,
		command: {
			program: CARGO,
			args: [
				`+${config.toolchain}`,
				"clippy",
				"--all",
				"--all-features",
				"--all-targets",
				"--",
				"-D",
				"warnings",
			],
		},
	},
	testStep(STEP_TESTS_NON_SERIAL, "non-serial", config),
	testStep(STEP_TESTS_SERIAL, "serial", config),
];

const applyOverride = (
	step: Step,
	override: StepOverride | undefined,
	defaultTimeoutMs: number | undefined,
): Step => {
	const timeoutMs = override?.timeoutMs ?? step.timeoutMs ?? defaultTimeoutMs;
	const env =
		override?.env === undefined ? step.env : { ...step.env, ...override.env };
	const cwd = override?.cwd ?? step.cwd;
	return {
		name: step.name,
		command: {
			program: override?.program ?? step.command.program,
			args: override?.args ?? step.command.args,
		},
		...(env === undefined ? {} : { env }),
		...(cwd === undefined ? {} : { cwd }),
		...(timeoutMs === undefined ? {} : { timeoutMs }),
	};
};

/**
 * Applies configured overrides and the default timeout to a list of steps.
 *
 * @returns Left(ConfigError) when an override names a step that does not exist
 *
 * @pure true
 * @invariant step order and names are preserved
 */
export const applyOverrides = (
	steps: Steps,
	config: VerifyConfig,
): Either.Either<Steps, ConfigError> => {
	const known = new Set(steps.map((s) => s.name));
	const unknown = Object.keys(config.steps).filter((name) => !known.has(name));
	if (unknown.length > 0) {
		return Either.left(
			new ConfigError({
				detail: `unknown step override(s): ${unknown.join(", ")}; known steps: ${[...known].join(", ")}`,
			}),
		);
	}
	return Either.right(
		Arr.map(steps, (step) =>
			applyOverride(step, config.steps[step.name], config.timeoutMs),
		),
	);
};

/**
 * Default steps with overrides applied.
 *
 * @pure true
 */
export const resolveSteps = (
	config: VerifyConfig,
): Either.Either<Steps, ConfigError> =>
	applyOverrides(buildDefaultSteps(config), config);
