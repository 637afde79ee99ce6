import { afterAll, beforeAll, beforeEach, describe, expect, it } from "vitest";
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Readable } from "node:stream";
import { PipelinePhase } from "@sketchloom/constants";
import { createMemoryLogger, type AppLogObj, type Logger } from "@sketchloom/logger";
import { createCounterIdentity, createCounterJitter } from "@sketchloom/scene";
import { GeneratePipeline } from "../src/pipeline";
import { EXAMPLE_REQUEST } from "../src/request";
import type { PipelineConfig } from "../src/types";

const REQUEST = JSON.stringify({
    nodes: [
        { id: "web", label: "Web", x: 100, y: 100 },
        { id: "api", label: "API", x: 400, y: 100 },
    ],
    edges: [{ from: "web", to: "api", label: "HTTPS" }],
});

describe("GeneratePipeline", () => {
    const pipeline = new GeneratePipeline();
    let dir: string;
    let logger: Logger<AppLogObj>;
    let logs: Record<string, unknown>[];

    function config(overrides: Partial<PipelineConfig> = {}): PipelineConfig {
        return {
            output: join(dir, "out"),
            identity: createCounterIdentity("p"),
            jitter: createCounterJitter(),
            ...overrides,
        };
    }

    function messages(): unknown[] {
        return logs.map((log) => log["0"]);
    }

    beforeAll(async () => {
        dir = await mkdtemp(join(tmpdir(), "sketchloom-pipeline-"));
        await writeFile(join(dir, "request.json"), REQUEST);
        await writeFile(join(dir, "broken.json"), "{ nodes: [");
        await writeFile(join(dir, "invalid.json"), '{"nodes":[{"shape":"hexagon"}]}');
        await writeFile(
            join(dir, "dangling.json"),
            JSON.stringify({ nodes: [{ id: "a" }], edges: [{ from: "a", to: "ghost" }] }),
        );
    });

    afterAll(async () => {
        await rm(dir, { recursive: true, force: true });
    });

    beforeEach(() => {
        ({ logger, logs } = createMemoryLogger("test-pipeline"));
    });

    describe("Feature: Successful Runs", () => {
        it("should build a request file and write the document", async () => {
            const result = await pipeline.run(config({ input: join(dir, "request.json") }), logger);

            expect(result.errors).toEqual([]);
            expect(result.outputPath).toBe(join(dir, "out.excalidraw"));
            expect(result.stats).toMatchObject({ nodes: 2, edges: 1, edgesSkipped: 0, elements: 6, errorsCount: 0 });

            const written = await readFile(join(dir, "out.excalidraw"), "utf8");
            expect(result.stats.bytesWritten).toBe(Buffer.byteLength(written, "utf8"));
            const doc = JSON.parse(written);
            expect(doc.type).toBe("excalidraw");
            expect(doc.elements).toHaveLength(6);
            expect(doc.elements[0].id).toBe("p-1");
        });

        it("should log the phases in order", async () => {
            await pipeline.run(config({ input: join(dir, "request.json") }), logger);
            const phaseLogs = messages().filter((m) => typeof m === "string" && m.includes(" phase "));

            expect(phaseLogs).toEqual([
                "Read phase started",
                "Read phase ended",
                "Validate phase started",
                "Validate phase ended",
                "Build phase started",
                "Build phase ended",
                "Write phase started",
                "Write phase ended",
            ]);
        });

        it("should build an in-memory request without reading", async () => {
            const result = await pipeline.run(config({ request: EXAMPLE_REQUEST, output: join(dir, "example") }), logger);

            expect(result.errors).toEqual([]);
            expect(result.stats).toMatchObject({ nodes: 3, edges: 2, elements: 10 });
            expect(messages()).toContain("Using in-memory request");
        });

        it("should read the request from stdin", async () => {
            const result = await pipeline.run(
                config({ stdin: Readable.from([REQUEST]), output: join(dir, "piped.excalidraw") }),
                logger,
            );

            expect(result.errors).toEqual([]);
            expect(result.outputPath).toBe(join(dir, "piped.excalidraw"));
        });

        it("should produce identical output for identical runs", async () => {
            await pipeline.run(config({ input: join(dir, "request.json"), output: join(dir, "first") }), logger);
            await pipeline.run(config({ input: join(dir, "request.json"), output: join(dir, "second") }), logger);

            const first = await readFile(join(dir, "first.excalidraw"), "utf8");
            const second = await readFile(join(dir, "second.excalidraw"), "utf8");
            expect(first).toBe(second);
        });

        it("should write compact JSON with indent 0", async () => {
            const result = await pipeline.run(config({ request: { nodes: [] }, indent: 0 }), logger);
            const written = await readFile(join(dir, "out.excalidraw"), "utf8");

            expect(result.errors).toEqual([]);
            expect(written).not.toContain("\n");
        });
    });

    describe("Feature: Overrides", () => {
        it("should apply the kind override", async () => {
            const result = await pipeline.run(
                config({ request: { nodes: [{ id: "a" }, { id: "b" }] }, kind: "flowchart" }),
                logger,
            );

            expect(result.document?.elements.map((e) => e.y)).toEqual([100, 100, 240, 240]);
        });

        it("should prefer the background flag over request and config", async () => {
            const result = await pipeline.run(
                config({
                    request: { background: "#111111", nodes: [] },
                    background: "#222222",
                    defaults: { background: "#333333" },
                }),
                logger,
            );

            expect(result.document?.appState.viewBackgroundColor).toBe("#222222");
        });

        it("should fall back to the configured source", async () => {
            const result = await pipeline.run(
                config({ request: { nodes: [] }, defaults: { source: "sketchloom" } }),
                logger,
            );

            expect(result.document?.source).toBe("sketchloom");
        });
    });

    describe("Feature: Skipped Edges", () => {
        it("should report unknown endpoints as warnings, not errors", async () => {
            const result = await pipeline.run(config({ input: join(dir, "dangling.json") }), logger);

            expect(result.errors).toEqual([]);
            expect(result.skippedEdges).toEqual([{ from: "a", to: "ghost", missingKeys: ["ghost"] }]);
            expect(result.stats.edgesSkipped).toBe(1);
            expect(messages()).toContain('Edge "a" → "ghost" skipped: unknown node "ghost"');
            expect(result.outputPath).toBeDefined();
        });
    });

    describe("Feature: Failures", () => {
        it("should fail the read phase without an input", async () => {
            const result = await pipeline.run(config(), logger);

            expect(result.errors).toHaveLength(1);
            expect(result.errors[0]).toMatchObject({ phase: PipelinePhase.READ, code: "NO_INPUT", path: "<stdin>" });
            expect(result.stats.errorsCount).toBe(1);
            expect(result.document).toBeUndefined();
        });

        it("should fail the read phase for a missing file", async () => {
            const path = join(dir, "missing.json");
            const result = await pipeline.run(config({ input: path }), logger);

            expect(result.errors[0]).toMatchObject({ phase: PipelinePhase.READ, code: "ENOENT", path });
            expect(result.outputPath).toBeUndefined();
        });

        it("should fail validation for malformed JSON", async () => {
            const path = join(dir, "broken.json");
            const result = await pipeline.run(config({ input: path }), logger);

            expect(result.errors).toHaveLength(1);
            expect(result.errors[0]?.phase).toBe(PipelinePhase.VALIDATE);
            expect(result.errors[0]?.code).toBe("INVALID_JSON");
            expect(result.errors[0]?.userMessage[0]).toBe(`Request "${path}" is not valid JSON`);
        });

        it("should list schema issues in the user message", async () => {
            const path = join(dir, "invalid.json");
            const result = await pipeline.run(config({ input: path }), logger);

            expect(result.errors[0]?.code).toBe("INVALID_REQUEST");
            expect(result.errors[0]?.userMessage[0]).toBe(`Request "${path}" does not describe a diagram`);
            expect(result.errors[0]?.userMessage[1]).toMatch(/^nodes\.0\.shape: /);
        });

        it("should fail the write phase when the parent directory is missing", async () => {
            const output = join(dir, "nowhere", "diagram");
            const result = await pipeline.run(config({ request: { nodes: [] }, output }), logger);

            expect(result.document).toBeDefined();
            expect(result.outputPath).toBeUndefined();
            expect(result.errors[0]).toMatchObject({
                phase: PipelinePhase.WRITE,
                code: "ENOENT",
                path: join(dir, "nowhere", "diagram.excalidraw"),
            });
            expect(result.stats.bytesWritten).toBe(0);
        });
    });
});
