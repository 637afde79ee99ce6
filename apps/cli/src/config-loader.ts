import type { DiagramDefaults } from "@sketchloom/core";
import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { dirname, join, resolve } from "node:path";
import { z } from "zod";
import { formatIssues } from "@sketchloom/core";

/**
 * Shape of `sketchloom.config.json`.
 */
export const ConfigFileSchema = z
    .object({
        background: z.string().min(1).optional(),
        source: z.string().min(1).optional(),
        indent: z.number().int().min(0).max(10).optional(),
        flowchart: z
            .object({
                direction: z.enum(["vertical", "horizontal"]).optional(),
                spacing: z.number().finite().nonnegative().optional(),
            })
            .strict()
            .optional(),
    })
    .strict();

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/**
 * Configuration after file loading, before CLI flags are applied.
 */
export interface ResolvedConfig {
    defaults: DiagramDefaults;
    indent: number;
}

/**
 * Default built-in configuration.
 */
export const DEFAULT_CONFIG: ResolvedConfig = {
    defaults: {},
    indent: 2,
};

/**
 * Config file search locations.
 */
const CONFIG_FILENAMES = ["sketchloom.config.json", ".sketchloom.json"];

export const CONFIG_ENV_VAR = "SKETCHLOOM_CONFIG";

/**
 * Loads and merges configuration from files and CLI options.
 */
export class ConfigLoader {
    /**
     * Find config file using priority order:
     * 1. SKETCHLOOM_CONFIG env var
     * 2. Search up from startDir to git root
     * 3. User config (~/.config/sketchloom/config.json)
     */
    static findConfigFile(startDir: string = process.cwd()): string | undefined {
        // Priority 1: env var
        const envConfig = process.env[CONFIG_ENV_VAR];
        if (envConfig && existsSync(envConfig)) {
            return envConfig;
        }

        // Priority 2: Walk up from startDir to git root
        let currentDir = resolve(startDir);

        while (true) {
            for (const filename of CONFIG_FILENAMES) {
                const configPath = join(currentDir, filename);
                if (existsSync(configPath)) {
                    return configPath;
                }
            }

            if (existsSync(join(currentDir, ".git"))) {
                break;
            }

            const parentDir = dirname(currentDir);
            if (parentDir === currentDir) {
                break;
            }
            currentDir = parentDir;
        }

        // Priority 3: User config
        const homeDir = process.env.HOME ?? homedir();
        if (homeDir) {
            const userConfig = join(homeDir, ".config", "sketchloom", "config.json");
            if (existsSync(userConfig)) {
                return userConfig;
            }
        }

        return undefined;
    }

    /**
     * Load configuration from file.
     * @throws Error if the file is not valid JSON or has unknown or mistyped keys
     */
    static async load(path?: string): Promise<ResolvedConfig> {
        if (!path) {
            return { ...DEFAULT_CONFIG };
        }

        const content = await readFile(path, "utf-8");
        let parsed: unknown;
        try {
            parsed = JSON.parse(content);
        } catch {
            throw new Error(`Invalid config file: parse error at ${path}`);
        }

        const result = ConfigFileSchema.safeParse(parsed);
        if (!result.success) {
            throw new Error(`Invalid config file ${path}: ${formatIssues(result.error).join("; ")}`);
        }
        return this.mergeWithDefaults(result.data);
    }

    /**
     * Flatten the nested file structure (flowchart.*) into diagram defaults.
     */
    private static mergeWithDefaults(file: ConfigFile): ResolvedConfig {
        return {
            defaults: {
                background: file.background,
                source: file.source,
                direction: file.flowchart?.direction,
                spacing: file.flowchart?.spacing,
            },
            indent: file.indent ?? DEFAULT_CONFIG.indent,
        };
    }
}
