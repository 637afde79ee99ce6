import type { PipelineError, PipelineResult, SkippedEdge } from "@sketchloom/core";
import { Command, type OutputMode } from "./types";

/**
 * Formats run summaries and errors for the chosen output mode.
 */
export class ProgressReporter {
    private mode: OutputMode;

    constructor(mode: OutputMode = "normal") {
        this.mode = mode;
    }

    /**
     * Display the completion summary.
     */
    complete(command: Command, result: PipelineResult): void {
        if (this.mode === "json") {
            console.log(JSON.stringify({
                type: "complete",
                command,
                outputPath: result.outputPath ?? null,
                stats: result.stats,
                skippedEdges: result.skippedEdges,
            }));
        } else if (this.mode !== "quiet") {
            console.log(this.formatResult(command, result));
        }
    }

    /**
     * Display an error.
     */
    error(error: PipelineError): void {
        if (this.mode === "json") {
            console.log(JSON.stringify({ type: "error", error }));
        } else {
            console.error(this.formatError(error));
        }
    }

    formatResult(command: Command, result: PipelineResult): string {
        const { stats } = result;
        if (!result.outputPath) {
            return `Generate failed: ${stats.errorsCount} error(s)`;
        }

        const lines = [
            `${command === Command.EXAMPLE ? "Example" : "Diagram"} written: ${result.outputPath}`,
            `  ${stats.elements} elements (${stats.nodes} nodes, ${stats.edges} edges)`,
        ];
        if (stats.edgesSkipped > 0) {
            lines.push(`  ${stats.edgesSkipped} edge(s) skipped:`);
            for (const edge of result.skippedEdges) {
                lines.push(`    ${this.formatSkipped(edge)}`);
            }
        }
        return lines.join("\n");
    }

    private formatSkipped(edge: SkippedEdge): string {
        return `${edge.from} → ${edge.to} (unknown: ${edge.missingKeys.join(", ")})`;
    }

    /**
     * Headline and detail lines of the user message, then the raw cause.
     */
    private formatError(error: PipelineError): string {
        const [headline, ...details] = error.userMessage;
        const lines = [`[${error.phase}] ${headline}`, ...details.map((detail) => `  ${detail}`)];
        if (!details.includes(error.message)) {
            lines.push(`  (${error.code}) ${error.message}`);
        }
        return lines.join("\n");
    }
}
