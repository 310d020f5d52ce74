// CHANGE: Central export file for configuration types
// WHY: Single import point for types shared by SHELL and CORE

export type {
	CLIOptions,
	StepOverride,
	VerifyConfig,
	VerifyConfigInput,
} from "./config.js";
