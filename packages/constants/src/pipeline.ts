import type { UserErrorMessage } from "./types";

/**
 * Generate pipeline execution phases.
 */
export enum PipelinePhase {
	READ = "read",
	VALIDATE = "validate",
	BUILD = "build",
	WRITE = "write",
}

/**
 * Human-readable labels for each pipeline phase, used in log messages.
 */
export const PipelinePhaseLabels: Record<PipelinePhase, string> = {
	[PipelinePhase.READ]: "Read",
	[PipelinePhase.VALIDATE]: "Validate",
	[PipelinePhase.BUILD]: "Build",
	[PipelinePhase.WRITE]: "Write",
};

export const PipelineErrors = {
	READ_FAILURE: (path: string, message: string): UserErrorMessage => [
		`Failed to read request "${path}"`,
		message,
	],
	INVALID_JSON: (path: string, message: string): UserErrorMessage => [
		`Request "${path}" is not valid JSON`,
		message,
	],
	INVALID_REQUEST: (path: string, issues: string[]): UserErrorMessage => [
		`Request "${path}" does not describe a diagram`,
		...issues,
	],
	BUILD_FAILURE: (code: string, message: string): UserErrorMessage => [
		`Diagram build error [${code}]`,
		message,
	],
	WRITE_FAILURE: (path: string, code: string, message: string): UserErrorMessage => [
		`Failed to write "${path}" [${code}]`,
		message,
	],
} as const;
