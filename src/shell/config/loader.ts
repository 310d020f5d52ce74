// CHANGE: Configuration loading for ci-verify.config.json
// WHY: Toolchain pin, serial marker, timeouts and per-step overrides live outside the code
// PURITY: SHELL (reads the filesystem); validation helpers are pure
// EFFECT: Effect<VerifyConfigInput, ConfigError>
// INVARIANT: A missing default file yields {}; a missing explicit file is a ConfigError

import * as fs from "node:fs";
import * as path from "node:path";

import { Effect } from "effect";

import { ConfigError } from "../../core/errors.js";
import { isValidSerialMarker } from "../../core/partition.js";
import { MAX_TIMEOUT_MS } from "../../core/steps.js";
import type {
	StepOverride,
	VerifyConfig,
	VerifyConfigInput,
} from "../../core/types/index.js";

export const DEFAULT_CONFIG_FILE = "ci-verify.config.json";

/**
 * Type representing any valid JSON value.
 *
 * @invariant Must be serializable to JSON
 */
export type JSONValue =
	| string
	| number
	| boolean
	| null
	| ReadonlyArray<JSONValue>
	| { readonly [key: string]: JSONValue };

type JSONObject = { readonly [key: string]: JSONValue };

function isJSONObject(value: JSONValue): value is JSONObject {
	return value !== null && typeof value === "object" && !Array.isArray(value);
}

function isString(value: JSONValue): value is string {
	return typeof value === "string";
}

function isPositiveInteger(value: JSONValue): value is number {
	return typeof value === "number" && Number.isInteger(value) && value > 0;
}

function isStringArray(value: JSONValue): value is ReadonlyArray<string> {
	return Array.isArray(value) && value.every((v: JSONValue) => isString(v));
}

function isStringRecord(
	value: JSONValue,
): value is { readonly [key: string]: string } {
	return isJSONObject(value) && Object.values(value).every(isString);
}

// CHANGE: Field validators return an error message or null
// WHY: One message per offending field, collected in document order
type FieldCheck = (value: JSONValue) => string | null;

const requires =
	(guard: (value: JSONValue) => boolean, description: string): FieldCheck =>
	(value) =>
		guard(value) ? null : `must be ${description}`;

const nonEmptyString = requires(
	(v) => isString(v) && v.length > 0,
	"a non-empty string",
);
const timeout: FieldCheck = (value) => {
	if (!isPositiveInteger(value)) return "must be a positive integer";
	return value > MAX_TIMEOUT_MS ? `must not exceed ${MAX_TIMEOUT_MS}` : null;
};

const markerCheck: FieldCheck = (value) =>
	isString(value) && isValidSerialMarker(value)
		? null
		: 'must contain only letters, digits, "_" and ":"';

const OVERRIDE_FIELDS: Readonly<Record<keyof StepOverride, FieldCheck>> = {
	program: nonEmptyString,
	args: requires(isStringArray, "an array of strings"),
	env: requires(isStringRecord, "an object of string values"),
	cwd: nonEmptyString,
	timeoutMs: timeout,
};

const TOP_LEVEL_FIELDS: Readonly<
	Record<Exclude<keyof VerifyConfig, "steps">, FieldCheck>
> = {
	toolchain: nonEmptyString,
	serialMarker: markerCheck,
	bin: nonEmptyString,
	timeoutMs: timeout,
};

function hasKey<K extends string>(
	table: Readonly<Record<K, FieldCheck>>,
	key: string,
): key is K {
	return Object.hasOwn(table, key);
}

function checkFields<K extends string>(
	object: JSONObject,
	table: Readonly<Record<K, FieldCheck>>,
	where: string,
	ignore: ReadonlyArray<string> = [],
): string[] {
	const problems: string[] = [];
	for (const [key, value] of Object.entries(object)) {
		if (ignore.includes(key)) continue;
		if (!hasKey(table, key)) {
			problems.push(`${where}${key}: unknown field`);
			continue;
		}
		const problem = table[key](value);
		if (problem !== null) problems.push(`${where}${key}: ${problem}`);
	}
	return problems;
}

const pick = <T extends JSONValue>(
	object: JSONObject,
	key: string,
	guard: (value: JSONValue) => value is T,
): T | undefined => {
	const value = object[key];
	return value !== undefined && guard(value) ? value : undefined;
};

function toOverride(object: JSONObject): StepOverride {
	const program = pick(object, "program", isString);
	const args = pick(object, "args", isStringArray);
	const env = pick(object, "env", isStringRecord);
	const cwd = pick(object, "cwd", isString);
	const timeoutMs = pick(object, "timeoutMs", isPositiveInteger);
	return {
		...(program === undefined ? {} : { program }),
		...(args === undefined ? {} : { args }),
		...(env === undefined ? {} : { env }),
		...(cwd === undefined ? {} : { cwd }),
		...(timeoutMs === undefined ? {} : { timeoutMs }),
	};
}

/**
 * Validates a parsed configuration document.
 *
 * @returns the configuration fields present in the document, or every problem found
 *
 * @pure true
 */
export function parseConfig(
	value: JSONValue,
): { readonly ok: true; readonly config: VerifyConfigInput } | {
	readonly ok: false;
	readonly problems: ReadonlyArray<string>;
} {
	if (!isJSONObject(value)) {
		return { ok: false, problems: ["configuration must be a JSON object"] };
	}

	const problems = checkFields(value, TOP_LEVEL_FIELDS, "", ["steps"]);
	const steps: Record<string, StepOverride> = {};
	const rawSteps = value["steps"];
	if (rawSteps !== undefined) {
		if (isJSONObject(rawSteps)) {
			for (const [name, override] of Object.entries(rawSteps)) {
				if (!isJSONObject(override)) {
					problems.push(`steps.${name}: must be an object`);
					continue;
				}
				problems.push(...checkFields(override, OVERRIDE_FIELDS, `steps.${name}.`));
				steps[name] = toOverride(override);
			}
		} else {
			problems.push("steps: must be an object");
		}
	}

	if (problems.length > 0) return { ok: false, problems };

	const toolchain = pick(value, "toolchain", isString);
	const serialMarker = pick(value, "serialMarker", isString);
	const bin = pick(value, "bin", isString);
	const timeoutMs = pick(value, "timeoutMs", isPositiveInteger);
	return {
		ok: true,
		config: {
			...(toolchain === undefined ? {} : { toolchain }),
			...(serialMarker === undefined ? {} : { serialMarker }),
			...(bin === undefined ? {} : { bin }),
			...(timeoutMs === undefined ? {} : { timeoutMs }),
			...(rawSteps === undefined ? {} : { steps }),
		},
	};
}

const readText = (file: string): Effect.Effect<string, ConfigError> =>
	Effect.try({
		try: () => fs.readFileSync(file, "utf8"),
		catch: (error) =>
			new ConfigError({
				detail: `cannot read configuration: ${String(error)}`,
				path: file,
			}),
	});

const parseJSON = (
	raw: string,
	file: string,
): Effect.Effect<JSONValue, ConfigError> =>
	Effect.try({
		try: (): JSONValue => JSON.parse(raw),
		catch: (error) =>
			new ConfigError({
				detail: `invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
				path: file,
			}),
	});

/**
 * Loads the configuration file.
 *
 * @param explicitPath --config value; when absent the default file in cwd is tried
 * @param cwd Directory the paths are resolved against
 *
 * @pure false - reads the filesystem
 * @effect Effect<VerifyConfigInput, ConfigError>
 */
export function loadVerifyConfig(
	explicitPath: string | undefined,
	cwd: string = process.cwd(),
): Effect.Effect<VerifyConfigInput, ConfigError> {
	const file = path.resolve(cwd, explicitPath ?? DEFAULT_CONFIG_FILE);
	return Effect.gen(function* () {
		if (explicitPath === undefined && !fs.existsSync(file)) {
			return {};
		}
		const raw = yield* readText(file);
		const json = yield* parseJSON(raw, file);
		const parsed = parseConfig(json);
		if (!parsed.ok) {
			return yield* Effect.fail(
				new ConfigError({ detail: parsed.problems.join("; "), path: file }),
			);
		}
		return parsed.config;
	});
}

/**
 * Merges configuration layers; later layers win field by field,
 * step overrides are merged per step name.
 *
 * @pure true
 */
export function mergeConfig(
	base: VerifyConfig,
	...layers: ReadonlyArray<VerifyConfigInput>
): VerifyConfig {
	return layers.reduce<VerifyConfig>((acc, layer) => {
		const steps: Record<string, StepOverride> = { ...acc.steps };
		for (const [name, override] of Object.entries(layer.steps ?? {})) {
			steps[name] = { ...steps[name], ...override };
		}
		const bin = layer.bin ?? acc.bin;
		const timeoutMs = layer.timeoutMs ?? acc.timeoutMs;
		return {
			toolchain: layer.toolchain ?? acc.toolchain,
			serialMarker: layer.serialMarker ?? acc.serialMarker,
			...(bin === undefined ? {} : { bin }),
			...(timeoutMs === undefined ? {} : { timeoutMs }),
			steps,
		};
	}, base);
}
