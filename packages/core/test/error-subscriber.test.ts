import { beforeEach, describe, expect, it } from "vitest";
import { BuildEvent, IoEvent, LogLevel, PhaseEvent, PipelinePhase } from "@sketchloom/constants";
import type { ErrorPayload, LogPayload, PhasePayload } from "@sketchloom/event-bus";
import { ErrorSubscriber } from "../src/error-subscriber";

// ─── Helpers ───

function makeErrorEvent(overrides: Partial<ErrorPayload> = {}): ErrorPayload {
	return {
		event: IoEvent.REQUEST_READ,
		level: LogLevel.ERROR,
		phase: PipelinePhase.READ,
		timestamp: Date.now(),
		path: "/some/request.json",
		message: "Path not found",
		code: "ENOENT",
		userMessage: ["File not found", "/some/request.json does not exist"],
		...overrides,
	};
}

function makeLogEvent(level: LogPayload["level"], overrides: Partial<LogPayload> = {}): LogPayload {
	return {
		event: BuildEvent.DIAGRAM_BUILD,
		level,
		phase: PipelinePhase.BUILD,
		timestamp: Date.now(),
		message: `Test ${level} message`,
		...overrides,
	};
}

function makePhaseEvent(event: PhaseEvent): PhasePayload {
	return { event, level: LogLevel.INFO, phase: PipelinePhase.READ, timestamp: Date.now() };
}

// ─── Tests ───

describe("ErrorSubscriber", () => {
	let subscriber: ErrorSubscriber;

	beforeEach(() => {
		subscriber = new ErrorSubscriber();
	});

	describe("Feature: ERROR Event Accumulation", () => {
		it("should accumulate a single ERROR event as PipelineError", () => {
			subscriber.handle(makeErrorEvent());

			expect(subscriber.count).toBe(1);
			expect(subscriber.errors[0]).toEqual({
				phase: PipelinePhase.READ,
				path: "/some/request.json",
				message: "Path not found",
				code: "ENOENT",
				userMessage: ["File not found", "/some/request.json does not exist"],
			});
		});

		it("should keep errors in arrival order", () => {
			subscriber.handle(makeErrorEvent({ code: "ENOENT" }));
			subscriber.handle(makeErrorEvent({ phase: PipelinePhase.VALIDATE, code: "INVALID_JSON" }));
			subscriber.handle(makeErrorEvent({ phase: PipelinePhase.WRITE, code: "EACCES" }));

			expect(subscriber.errors.map((e) => e.code)).toEqual(["ENOENT", "INVALID_JSON", "EACCES"]);
			expect(subscriber.errors.map((e) => e.phase)).toEqual([
				PipelinePhase.READ,
				PipelinePhase.VALIDATE,
				PipelinePhase.WRITE,
			]);
		});

		it("should drop the bus-only fields", () => {
			subscriber.handle(makeErrorEvent());

			expect(subscriber.errors[0]).not.toHaveProperty("timestamp");
			expect(subscriber.errors[0]).not.toHaveProperty("event");
		});
	});

	describe("Feature: Non-ERROR Filtering", () => {
		it("should ignore WARN, INFO and DEBUG events", () => {
			subscriber.handle(makeLogEvent(LogLevel.WARN));
			subscriber.handle(makeLogEvent(LogLevel.INFO));
			subscriber.handle(makeLogEvent(LogLevel.DEBUG));

			expect(subscriber.count).toBe(0);
		});

		it("should ignore phase events", () => {
			subscriber.handle(makePhaseEvent(PhaseEvent.PHASE_START));
			subscriber.handle(makePhaseEvent(PhaseEvent.PHASE_END));

			expect(subscriber.errors).toEqual([]);
		});
	});
});
