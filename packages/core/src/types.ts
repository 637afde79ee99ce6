import type { Logger, AppLogObj } from "@sketchloom/logger";
import type { PipelinePhase, UserErrorMessage } from "@sketchloom/constants";
import type { IdentitySource, JitterSource, SceneDocument } from "@sketchloom/scene";
import type { DiagramDefaults, DiagramRequestInput, RequestKind, SkippedEdge } from "./request";

/**
 * Configuration for one generate run.
 */
export interface PipelineConfig {
    /**
     * Destination path. `.excalidraw` is appended when it has no extension.
     */
    output: string;
    /**
     * Request file. When absent the request comes from `request` or `stdin`.
     */
    input?: string;
    /**
     * Request given in memory; the read phase is skipped.
     */
    request?: DiagramRequestInput;
    /**
     * Stream read when neither `input` nor `request` is set.
     */
    stdin?: AsyncIterable<Uint8Array | string>;
    /**
     * Overrides the request's kind.
     */
    kind?: RequestKind;
    /**
     * Overrides the request's background.
     */
    background?: string;
    /**
     * JSON indentation of the written document.
     * Defaults to 2
     */
    indent?: number;
    /**
     * Request size limit in MB.
     * Defaults to 10
     */
    maxInputSizeMb?: number;
    /**
     * Fallbacks from the config file.
     */
    defaults?: DiagramDefaults;
    identity?: IdentitySource;
    jitter?: JitterSource;
}

/**
 * Default configuration values.
 */
export const DEFAULT_CONFIG = {
    indent: 2,
    maxInputSizeMb: 10,
} as const;

/**
 * Aggregated statistics for a run.
 */
export interface PipelineStats {
    /**
     * Nodes in the request.
     */
    nodes: number;
    /**
     * Edges that produced connectors.
     */
    edges: number;
    /**
     * Edges dropped for unknown endpoints.
     */
    edgesSkipped: number;
    /**
     * Elements in the written document.
     */
    elements: number;
    /**
     * Bytes of JSON text written.
     */
    bytesWritten: number;
    /**
     * Total errors encountered.
     */
    errorsCount: number;
}

/**
 * Error that occurred during pipeline execution.
 */
export interface PipelineError {
    phase: PipelinePhase;
    /**
     * Request or output path the error relates to.
     */
    path: string;
    /**
     * Raw error message.
     */
    message: string;
    /**
     * System or domain error code (ENOENT, INVALID_JSON, INVALID_SHAPE, ...).
     */
    code: string;
    /**
     * Human-friendly error description.
     */
    userMessage: UserErrorMessage;
}

/**
 * Aggregate result from a run.
 */
export interface PipelineResult {
    /**
     * Path written, when the write phase succeeded.
     */
    outputPath?: string;
    /**
     * The built document, when the build phase succeeded.
     */
    document?: SceneDocument;
    errors: PipelineError[];
    skippedEdges: SkippedEdge[];
    stats: PipelineStats;
}

/**
 * Pipeline contract for injectable pipeline implementations.
 */
export interface Pipeline {
    run(config: PipelineConfig, logger: Logger<AppLogObj>): Promise<PipelineResult>;
}
