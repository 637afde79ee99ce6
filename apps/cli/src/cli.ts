import {
    EXAMPLE_REQUEST,
    type Pipeline,
    type PipelineConfig,
    type PipelineResult,
} from "@sketchloom/core";
import { CLIErrors } from "@sketchloom/constants";
import { createLogger, createJsonLogger, type LogMode } from "@sketchloom/logger";
import { createProgram, parseArgs } from "./args";
import { ConfigLoader, DEFAULT_CONFIG, type ResolvedConfig } from "./config-loader";
import { ProgressReporter } from "./progress-reporter";
import { Command, ExitCode, type OutputMode, type ParseOptions } from "./types";

export { Command, ExitCode, type OutputMode, type ParseOptions } from "./types";

const LOG_MODE_MAP: Record<OutputMode, LogMode> = {
    quiet: "error",
    normal: "info",
    verbose: "debug",
    json: "debug",
};

/**
 * Main CLI class.
 */
export class CLI {
    private pipeline: Pipeline;
    private stdin?: AsyncIterable<Uint8Array | string>;

    /**
     * @param stdin - request stream used by `generate` when no --input is given
     */
    constructor(pipeline: Pipeline, stdin?: AsyncIterable<Uint8Array | string>) {
        this.pipeline = pipeline;
        this.stdin = stdin;
    }

    /**
     * Run CLI with given arguments.
     * @returns Exit code
     */
    async run(args: string[]): Promise<number> {
        // Default logger — ensures all errors (including arg parse) are structured
        let logger = createLogger("sketchloom", "info");
        let options: ParseOptions;

        // Unknown flags, missing subcommand, conflicting options → CONFIG_ERROR
        try {
            options = parseArgs(args);
        } catch (error) {
            logger.error(error instanceof Error ? error.message : String(error));
            return ExitCode.CONFIG_ERROR;
        }

        if (options.help) {
            console.log(createProgram().helpInformation());
            return ExitCode.SUCCESS;
        }

        if (options.version) {
            console.log(createProgram().version());
            return ExitCode.SUCCESS;
        }

        // Recreate logger with user's output mode
        const mode = this.getOutputMode(options);
        logger = mode === "json"
            ? createJsonLogger("sketchloom", LOG_MODE_MAP[mode])
            : createLogger("sketchloom", LOG_MODE_MAP[mode]);

        let config: PipelineConfig;
        try {
            config = await this.buildConfig(options);
        } catch (error) {
            logger.error(`Config error: ${error instanceof Error ? error.message : String(error)}`);
            return ExitCode.CONFIG_ERROR;
        }

        const result = await this.pipeline.run(config, logger);

        const reporter = new ProgressReporter(mode);
        for (const err of result.errors) {
            reporter.error(err);
        }
        reporter.complete(options.command, result);

        return this.getExitCode(result);
    }

    /**
     * Build PipelineConfig from the config file and flags (flags win).
     * - GENERATE: request from --input, else stdin
     * - EXAMPLE: the built-in example request
     */
    async buildConfig(options: ParseOptions): Promise<PipelineConfig> {
        let base: ResolvedConfig;
        if (options.noConfig) {
            base = { ...DEFAULT_CONFIG };
        } else {
            const configPath = options.configPath ?? ConfigLoader.findConfigFile();
            base = await ConfigLoader.load(configPath);
        }

        const config: PipelineConfig = {
            output: options.output,
            indent: options.indent ?? base.indent,
            defaults: base.defaults,
        };

        switch (options.command) {
            case Command.EXAMPLE:
                config.request = EXAMPLE_REQUEST;
                break;
            case Command.GENERATE:
                if (options.input !== undefined) {
                    config.input = options.input;
                } else if (this.stdin !== undefined) {
                    config.stdin = this.stdin;
                } else {
                    throw new Error(CLIErrors.NO_INPUT);
                }
                config.kind = options.kind;
                config.background = options.background;
                break;
        }

        return config;
    }

    private getOutputMode(options: ParseOptions): OutputMode {
        if (options.json) return "json";
        if (options.quiet) return "quiet";
        if (options.verbose) return "verbose";
        return "normal";
    }

    private getExitCode(result: PipelineResult): number {
        if (result.errors.length > 0 || !result.outputPath) {
            return ExitCode.GENERATE_ERROR;
        }
        return ExitCode.SUCCESS;
    }
}
