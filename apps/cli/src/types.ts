import type { RequestKind } from "@sketchloom/core";

/**
 * CLI subcommand identifying which operation to perform.
 */
export enum Command {
    GENERATE = "generate",
    EXAMPLE = "example",
}

/**
 * Exit codes for CLI process.
 */
export enum ExitCode {
    SUCCESS = 0,
    GENERATE_ERROR = 1,
    CONFIG_ERROR = 2,
}

/**
 * Parsed CLI arguments.
 */
export interface ParseOptions {
    command: Command;
    output: string;
    input?: string;
    kind?: RequestKind;
    background?: string;
    indent?: number;
    configPath?: string;
    noConfig: boolean;
    verbose: boolean;
    quiet: boolean;
    json: boolean;
    help: boolean;
    version: boolean;
}

/**
 * Output mode for formatting.
 */
export type OutputMode = "normal" | "verbose" | "quiet" | "json";
