// CHANGE: CLI argument parsing for ci-verify
// WHY: Flags map onto configuration layers; no arguments runs the default pipeline
// PURITY: SHELL (reads process.argv by default); parsing itself is deterministic
// INVARIANT: Unknown flags and missing values are reported as CliUsageError, never ignored

import { Either } from "effect";

import { CliUsageError } from "../../core/errors.js";
import { isValidSerialMarker } from "../../core/partition.js";
import { MAX_TIMEOUT_MS } from "../../core/steps.js";
import type { CLIOptions } from "../../core/types/index.js";

export const USAGE = `Usage: ci-verify [options]

Runs format-check, lint, tests:non-serial and tests:serial in order and stops
at the first failing step.

Options:
  --config <path>         configuration file (default: ci-verify.config.json)
  --timeout <ms>          default per-step timeout in milliseconds
  --serial-marker <name>  test-name marker selecting the serial partition
  --toolchain <name>      toolchain pin for format-check and lint
  --bin <name>            restrict the test phases to one binary target
  --list                  print the planned steps without running them
  -h, --help              print this message`;

type MutableOptions = { -readonly [K in keyof CLIOptions]: CLIOptions[K] };

// CHANGE: Value-flag handlers in a lookup table
// WHY: Keeps the argument loop free of per-flag branching
type ValueFlagHandler = (
	value: string,
	current: MutableOptions,
) => Either.Either<MutableOptions, CliUsageError>;

const stringFlag =
	(key: "configPath" | "toolchain" | "bin"): ValueFlagHandler =>
	(value, current) =>
		Either.right({ ...current, [key]: value });

const valueHandlers: Readonly<Record<string, ValueFlagHandler>> = {
	"--config": stringFlag("configPath"),
	"--serial-marker": (value, current) =>
		isValidSerialMarker(value)
			? Either.right({ ...current, serialMarker: value })
			: Either.left(
					new CliUsageError({
						detail: `--serial-marker may contain only letters, digits, "_" and ":", got "${value}"`,
					}),
				),
	"--toolchain": stringFlag("toolchain"),
	"--bin": stringFlag("bin"),
	"--timeout": (value, current) => {
		const timeoutMs = Number(value);
		if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
			return Either.left(
				new CliUsageError({
					detail: `--timeout expects a positive integer, got "${value}"`,
				}),
			);
		}
		return timeoutMs > MAX_TIMEOUT_MS
			? Either.left(
					new CliUsageError({
						detail: `--timeout must not exceed ${MAX_TIMEOUT_MS}, got "${value}"`,
					}),
				)
			: Either.right({ ...current, timeoutMs });
	},
};

const booleanFlags: Readonly<Record<string, (o: MutableOptions) => MutableOptions>> = {
	"--list": (o) => ({ ...o, list: true }),
	"--help": (o) => ({ ...o, help: true }),
	"-h": (o) => ({ ...o, help: true }),
};

/**
 * Splits `--flag=value` into `["--flag", "value"]`.
 *
 * @pure true
 */
const expandInline = (args: ReadonlyArray<string>): string[] =>
	args.flatMap((arg) => {
		const eq = arg.indexOf("=");
		return arg.startsWith("--") && eq > 0
			? [arg.slice(0, eq), arg.slice(eq + 1)]
			: [arg];
	});

/**
 * Parses command-line arguments.
 *
 * @returns Right(options) or Left(CliUsageError) for an unknown flag,
 *          a positional argument, or a flag missing its value
 *
 * @example
 * ```ts
 * parseCLIArgs(["--timeout", "60000", "--list"]);
 * // Right({ timeoutMs: 60000, list: true, help: false })
 * ```
 */
export function parseCLIArgs(
	argv: ReadonlyArray<string> = process.argv.slice(2),
): Either.Either<CLIOptions, CliUsageError> {
	const args = expandInline(argv);
	let state: MutableOptions = { list: false, help: false };

	for (let i = 0; i < args.length; i++) {
		const arg = args.at(i) ?? "";
		if (arg.length === 0) continue;

		const toggle = booleanFlags[arg];
		if (toggle !== undefined) {
			state = toggle(state);
			continue;
		}

		const handler = valueHandlers[arg];
		if (handler === undefined) {
			return Either.left(
				new CliUsageError({
					detail: arg.startsWith("-")
						? `unknown option ${arg}`
						: `unexpected argument ${arg}`,
				}),
			);
		}

		const value = args.at(i + 1);
		if (value === undefined || value.length === 0) {
			return Either.left(
				new CliUsageError({ detail: `${arg} expects a value` }),
			);
		}
		const next = handler(value, state);
		if (Either.isLeft(next)) return next;
		state = next.right;
		i++;
	}

	return Either.right(state);
}
