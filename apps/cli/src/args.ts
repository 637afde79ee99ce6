import {
    Command as CommanderProgram,
    CommanderError,
    InvalidArgumentError,
    Option,
} from "commander";
import { z } from "zod";
import { CLIDescriptions, CLIErrors } from "@sketchloom/constants";
import { EXAMPLE_OUTPUT, REQUEST_KINDS, formatIssues } from "@sketchloom/core";
import { Command, type ParseOptions } from "./types";

export const VERSION = "0.1.0";

const MAX_INDENT = 10;

/**
 * Options commander hands to an action, checked before use.
 * `config` is a path for --config, false for --no-config, absent otherwise.
 */
const SharedOptionsSchema = z.object({
    config: z.union([z.string(), z.literal(false)]).optional(),
    verbose: z.boolean(),
    quiet: z.boolean(),
    json: z.boolean(),
});

const GenerateOptionsSchema = SharedOptionsSchema.extend({
    input: z.string().optional(),
    kind: z.enum(REQUEST_KINDS).optional(),
    background: z.string().optional(),
    indent: z.number().int().optional(),
});

type SharedOptions = z.infer<typeof SharedOptionsSchema>;

/**
 * Parse and validate --indent value.
 */
function parseIndent(value: string): number {
    const n = Number.parseInt(value, 10);
    if (Number.isNaN(n) || n < 0 || n > MAX_INDENT) {
        throw new InvalidArgumentError(`must be between 0 and ${MAX_INDENT}`);
    }
    return n;
}

/**
 * Add shared options to a subcommand.
 */
function addSharedOptions(cmd: CommanderProgram): CommanderProgram {
    return cmd
        .option("--config <path>", "use specific config file")
        .option("--no-config", "skip config file loading")
        .option("-v, --verbose", "show detailed output", false)
        .option("-q, --quiet", "show errors only", false)
        .option("--json", "output as JSON lines", false);
}

/**
 * Create the commander program with all subcommands.
 */
export function createProgram(): CommanderProgram {
    const program = new CommanderProgram();
    program
        .name("sketchloom")
        .description(CLIDescriptions.PROGRAM)
        .version(VERSION)
        .exitOverride()
        .configureOutput({
            writeOut: () => {},
            writeErr: () => {},
        });

    addSharedOptions(
        program
            .command(Command.GENERATE)
            .description(CLIDescriptions.GENERATE)
            .argument("<output>", "output path (.excalidraw is added when it has no extension)")
            .option("-i, --input <file>", "request JSON file (default: stdin)")
            .addOption(new Option("-k, --kind <kind>", "override the request kind").choices(REQUEST_KINDS))
            .option("-b, --background <color>", "canvas background color")
            .option("--indent <n>", `JSON indentation (0-${MAX_INDENT}, default: 2)`, parseIndent),
    );

    addSharedOptions(
        program
            .command(Command.EXAMPLE)
            .description(CLIDescriptions.EXAMPLE)
            .argument("[output]", "output path", EXAMPLE_OUTPUT),
    );

    return program;
}

function checkOptions<T extends SharedOptions>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, opts: unknown): T {
    const parsed = schema.safeParse(opts);
    if (!parsed.success) {
        throw new Error(formatIssues(parsed.error).join("; "));
    }
    // Post-parse validation: conflicting flags
    if (parsed.data.verbose && parsed.data.quiet) {
        throw new Error(CLIErrors.CONFLICTING_FLAGS);
    }
    return parsed.data;
}

function baseOptions(command: Command, output: string, opts: SharedOptions): ParseOptions {
    return {
        command,
        output,
        configPath: typeof opts.config === "string" ? opts.config : undefined,
        noConfig: opts.config === false,
        verbose: opts.verbose,
        quiet: opts.quiet,
        json: opts.json,
        help: false,
        version: false,
    };
}

function flagOnly(flag: "help" | "version"): ParseOptions {
    return {
        command: Command.GENERATE,
        output: EXAMPLE_OUTPUT,
        noConfig: false,
        verbose: false,
        quiet: false,
        json: false,
        help: flag === "help",
        version: flag === "version",
    };
}

/**
 * Parse CLI arguments into ParseOptions using commander.
 *
 * @param args - Command-line arguments (without program name)
 * @throws Error if unknown flag, missing value, or invalid subcommand
 */
export function parseArgs(args: string[]): ParseOptions {
    const program = createProgram();

    let result: ParseOptions | undefined;

    for (const cmd of program.commands) {
        if (cmd.name() === Command.GENERATE) {
            cmd.action((output: string, opts: unknown) => {
                const checked = checkOptions(GenerateOptionsSchema, opts);
                result = {
                    ...baseOptions(Command.GENERATE, output, checked),
                    input: checked.input,
                    kind: checked.kind,
                    background: checked.background,
                    indent: checked.indent,
                };
            });
        } else if (cmd.name() === Command.EXAMPLE) {
            cmd.action((output: string, opts: unknown) => {
                result = baseOptions(Command.EXAMPLE, output, checkOptions(SharedOptionsSchema, opts));
            });
        }
    }

    try {
        program.parse(args, { from: "user" });
    } catch (err) {
        if (err instanceof CommanderError) {
            if (err.code === "commander.helpDisplayed") {
                return flagOnly("help");
            }
            if (err.code === "commander.version") {
                return flagOnly("version");
            }
            if (err.code === "commander.help") {
                throw new Error(CLIErrors.MISSING_SUBCOMMAND);
            }
            // Map commander error messages to our format
            throw new Error(err.message.replace(/^error: /, ""));
        }
        throw err;
    }

    if (!result) {
        throw new Error(CLIErrors.MISSING_SUBCOMMAND);
    }

    return result;
}
