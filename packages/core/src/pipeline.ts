import {
    BuildEvent,
    IoEvent,
    LogLevel,
    PipelineErrors,
    PipelinePhase,
} from "@sketchloom/constants";
import { PipelineEventBus } from "@sketchloom/event-bus";
import { DocumentWriteError, DocumentWriter, RequestReader, STDIN_LABEL, type RequestSource } from "@sketchloom/io";
import type { Logger, AppLogObj } from "@sketchloom/logger";
import { DiagramError } from "@sketchloom/scene";
import { ErrorSubscriber } from "./error-subscriber";
import { LogSubscriber } from "./log-subscriber";
import {
    RequestErrorCode,
    RequestTranslator,
    RequestValidationError,
    parseRequest,
    validateRequest,
    type DiagramRequest,
    type Translation,
} from "./request";
import {
    DEFAULT_CONFIG,
    type Pipeline,
    type PipelineConfig,
    type PipelineResult,
    type PipelineStats,
} from "./types";

const MEMORY_LABEL = "<request>";

/** Request text from a reader, or a value handed over in memory */
type LoadedRequest = { path: string; text: string } | { path: string; value: unknown };

/**
 * Main orchestrator that runs the generate pipeline:
 * Phase 1 (read request) → Phase 2 (validate) → Phase 3 (build diagram)
 * → Phase 4 (write document).
 *
 * Every phase reports through a per-run event bus; a failed phase ends the run.
 */
export class GeneratePipeline implements Pipeline {
    private reader: RequestReader;
    private writer: DocumentWriter;

    constructor(reader: RequestReader = new RequestReader(), writer: DocumentWriter = new DocumentWriter()) {
        this.reader = reader;
        this.writer = writer;
    }

    async run(config: PipelineConfig, logger: Logger<AppLogObj>): Promise<PipelineResult> {
        const bus = new PipelineEventBus();
        const logSubscriber = new LogSubscriber(logger);
        const errorSubscriber = new ErrorSubscriber();
        bus.onAll((payload) => logSubscriber.handle(payload));
        bus.onLevel(LogLevel.ERROR, (payload) => errorSubscriber.handle(payload));

        const stats: PipelineStats = {
            nodes: 0,
            edges: 0,
            edgesSkipped: 0,
            elements: 0,
            bytesWritten: 0,
            errorsCount: 0,
        };
        const result: PipelineResult = { errors: errorSubscriber.errors, skippedEdges: [], stats };
        const finish = (): PipelineResult => {
            stats.errorsCount = errorSubscriber.count;
            return result;
        };

        // Phase 1: Read
        bus.emitPhaseStart(PipelinePhase.READ);
        const source = await this.read(config, bus);
        bus.emitPhaseEnd(PipelinePhase.READ);
        if (!source) return finish();

        // Phase 2: Validate
        bus.emitPhaseStart(PipelinePhase.VALIDATE);
        const request = this.validate(source, config, bus);
        bus.emitPhaseEnd(PipelinePhase.VALIDATE, request ? { nodes: request.nodes.length, edges: request.edges.length } : undefined);
        if (!request) return finish();

        // Phase 3: Build
        bus.emitPhaseStart(PipelinePhase.BUILD);
        const translation = this.build(request, config, source.path, bus);
        if (translation) {
            stats.nodes = translation.nodes;
            stats.edges = translation.edges;
            stats.edgesSkipped = translation.skipped.length;
            stats.elements = translation.diagram.size;
            result.skippedEdges = translation.skipped;
            result.document = translation.diagram.toDocument();
        }
        bus.emitPhaseEnd(PipelinePhase.BUILD, { elements: stats.elements, edgesSkipped: stats.edgesSkipped });
        if (!translation) return finish();

        // Phase 4: Write
        bus.emitPhaseStart(PipelinePhase.WRITE);
        const text = translation.diagram.serialize(config.indent ?? DEFAULT_CONFIG.indent);
        const outputPath = await this.write(text, config.output, bus);
        if (outputPath) {
            result.outputPath = outputPath;
            stats.bytesWritten = Buffer.byteLength(text, "utf8");
        }
        bus.emitPhaseEnd(PipelinePhase.WRITE, { bytesWritten: stats.bytesWritten });

        return finish();
    }

    /**
     * Phase 1: Obtain the request from memory, a file, or stdin.
     * An in-memory request is carried through as-is.
     */
    private async read(
        config: PipelineConfig,
        bus: PipelineEventBus,
    ): Promise<LoadedRequest | null> {
        if (config.request !== undefined) {
            bus.emitDebug(IoEvent.REQUEST_READ, PipelinePhase.READ, "Using in-memory request");
            return { path: MEMORY_LABEL, value: config.request };
        }

        let source: RequestSource | null;
        if (config.input !== undefined) {
            source = await this.reader.readFile(config.input, { maxSizeMb: config.maxInputSizeMb ?? DEFAULT_CONFIG.maxInputSizeMb }, bus);
        } else if (config.stdin !== undefined) {
            source = await this.reader.readStream(config.stdin, STDIN_LABEL, bus);
        } else {
            bus.emitError(IoEvent.REQUEST_READ, PipelinePhase.READ, {
                path: STDIN_LABEL,
                message: "No request input given",
                code: "NO_INPUT",
                userMessage: PipelineErrors.READ_FAILURE(STDIN_LABEL, "No request input given"),
            });
            return null;
        }

        return source ? { path: source.path, text: source.content } : null;
    }

    /**
     * Phase 2: Decode and validate the request, applying the kind override.
     */
    private validate(
        source: LoadedRequest,
        config: PipelineConfig,
        bus: PipelineEventBus,
    ): DiagramRequest | null {
        const overrides = { kind: config.kind };
        try {
            const request = "text" in source
                ? parseRequest(source.text, overrides)
                : validateRequest(source.value, overrides);
            bus.emitInfo(BuildEvent.REQUEST_VALIDATION, PipelinePhase.VALIDATE, "Request valid", {
                path: source.path,
                kind: request.kind,
            });
            return config.background !== undefined ? { ...request, background: config.background } : request;
        } catch (error: unknown) {
            if (!(error instanceof RequestValidationError)) throw error;
            bus.emitError(BuildEvent.REQUEST_VALIDATION, PipelinePhase.VALIDATE, {
                path: source.path,
                message: error.message,
                code: error.code,
                userMessage: error.code === RequestErrorCode.INVALID_JSON
                    ? PipelineErrors.INVALID_JSON(source.path, error.message)
                    : PipelineErrors.INVALID_REQUEST(source.path, error.issues),
            });
            return null;
        }
    }

    /**
     * Phase 3: Build the diagram. Unknown edge endpoints are warnings, not errors.
     */
    private build(
        request: DiagramRequest,
        config: PipelineConfig,
        path: string,
        bus: PipelineEventBus,
    ): Translation | null {
        const translator = new RequestTranslator({
            defaults: config.defaults,
            identity: config.identity,
            jitter: config.jitter,
        });

        let translation: Translation;
        try {
            translation = translator.translate(request);
        } catch (error: unknown) {
            if (!(error instanceof DiagramError)) throw error;
            bus.emitError(BuildEvent.DIAGRAM_BUILD, PipelinePhase.BUILD, {
                path,
                message: error.message,
                code: error.code,
                userMessage: PipelineErrors.BUILD_FAILURE(error.code, error.message),
            });
            return null;
        }

        for (const edge of translation.skipped) {
            bus.emitWarn(
                BuildEvent.EDGE_SKIPPED,
                PipelinePhase.BUILD,
                `Edge "${edge.from}" → "${edge.to}" skipped: unknown node ${edge.missingKeys.map((key) => `"${key}"`).join(", ")}`,
                { from: edge.from, to: edge.to, missingKeys: edge.missingKeys },
            );
        }
        bus.emitInfo(BuildEvent.DIAGRAM_BUILD, PipelinePhase.BUILD, "Diagram built", {
            kind: request.kind,
            elements: translation.diagram.size,
        });
        return translation;
    }

    /**
     * Phase 4: Write the serialized document.
     */
    private async write(text: string, output: string, bus: PipelineEventBus): Promise<string | null> {
        try {
            const outputPath = await this.writer.write(text, output);
            bus.emitInfo(IoEvent.DOCUMENT_WRITE, PipelinePhase.WRITE, "Document written", { path: outputPath });
            return outputPath;
        } catch (error: unknown) {
            if (!(error instanceof DocumentWriteError)) throw error;
            bus.emitError(IoEvent.DOCUMENT_WRITE, PipelinePhase.WRITE, {
                path: error.path,
                message: error.message,
                code: error.code,
                userMessage: PipelineErrors.WRITE_FAILURE(error.path, error.code, error.message),
            });
            return null;
        }
    }
}
