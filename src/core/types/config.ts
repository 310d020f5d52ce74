// CHANGE: Configuration and CLI option types for the verification pipeline
// WHY: Shared by the config loader (SHELL), the CLI parser (SHELL) and the step builder (CORE)
// PURITY: CORE

/**
 * Per-step override taken from the configuration file.
 * Every present field replaces the default step's field.
 */
export interface StepOverride {
	readonly program?: string;
	readonly args?: ReadonlyArray<string>;
	readonly env?: Readonly<Record<string, string>>;
	readonly cwd?: string;
	readonly timeoutMs?: number;
}

/**
 * Resolved pipeline configuration (defaults ⊕ file ⊕ CLI flags).
 *
 * @property toolchain Toolchain pin passed as `+<toolchain>` to format and lint
 * @property serialMarker Test-name marker selecting the serial partition
 * @property bin Optional binary target restricting the test phases
 * @property timeoutMs Default timeout applied to steps without their own
 * @property steps Overrides keyed by step name
 */
export interface VerifyConfig {
	readonly toolchain: string;
	readonly serialMarker: string;
	readonly bin?: string;
	readonly timeoutMs?: number;
	readonly steps: Readonly<Record<string, StepOverride>>;
}

/**
 * Partial configuration as read from a file or the command line.
 */
export type VerifyConfigInput = Partial<VerifyConfig>;

/**
 * Command line options.
 *
 * @property configPath Explicit configuration file; a missing explicit file is an error
 * @property list Print the planned steps without running them
 * @property help Print usage
 */
export interface CLIOptions {
	readonly configPath?: string;
	readonly timeoutMs?: number;
	readonly serialMarker?: string;
	readonly toolchain?: string;
	readonly bin?: string;
	readonly list: boolean;
	readonly help: boolean;
}
