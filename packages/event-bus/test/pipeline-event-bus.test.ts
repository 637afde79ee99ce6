import { beforeEach, describe, expect, it, vi } from "vitest";
import {
	BuildEvent,
	IoEvent,
	LogLevel,
	PhaseEvent,
	PipelinePhase,
} from "@sketchloom/constants";
import type { BusPayload, ErrorPayload, LogPayload, PhasePayload } from "../src/types";
import { PipelineEventBus } from "../src/pipeline-event-bus";

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

function makePhaseEvent(event: PhaseEvent, overrides: Partial<PhasePayload> = {}): PhasePayload {
	return {
		event,
		level: LogLevel.INFO,
		phase: PipelinePhase.READ,
		timestamp: Date.now(),
		...overrides,
	};
}

// ─── Tests ───

describe("PipelineEventBus", () => {
	let bus: PipelineEventBus;

	beforeEach(() => {
		bus = new PipelineEventBus();
	});

	describe("Feature: Level Channel", () => {
		it("should call a handler registered for the payload's level", () => {
			const handler = vi.fn();
			bus.onLevel(LogLevel.ERROR, handler);

			const event = makeErrorEvent();
			bus.emit(event);

			expect(handler).toHaveBeenCalledTimes(1);
			expect(handler).toHaveBeenCalledWith(event);
		});

		it("should not call a handler registered for another level", () => {
			const handler = vi.fn();
			bus.onLevel(LogLevel.WARN, handler);

			bus.emit(makeErrorEvent());
			bus.emit(makeLogEvent(LogLevel.INFO));

			expect(handler).not.toHaveBeenCalled();
		});

		it("should deliver phase events on the INFO level", () => {
			const handler = vi.fn();
			bus.onLevel(LogLevel.INFO, handler);

			bus.emit(makePhaseEvent(PhaseEvent.PHASE_START));

			expect(handler).toHaveBeenCalledTimes(1);
		});

		it("should stop calling a handler after offLevel", () => {
			const handler = vi.fn();
			bus.onLevel(LogLevel.ERROR, handler);
			bus.offLevel(LogLevel.ERROR, handler);

			bus.emit(makeErrorEvent());

			expect(handler).not.toHaveBeenCalled();
		});
	});

	describe("Feature: Event Channel", () => {
		it("should route by event type regardless of level", () => {
			const received: BusPayload[] = [];
			bus.onEvent(BuildEvent.EDGE_SKIPPED, (payload) => received.push(payload));

			bus.emit(makeLogEvent(LogLevel.WARN, { event: BuildEvent.EDGE_SKIPPED }));
			bus.emit(makeLogEvent(LogLevel.DEBUG, { event: BuildEvent.EDGE_SKIPPED }));
			bus.emit(makeLogEvent(LogLevel.WARN, { event: BuildEvent.DIAGRAM_BUILD }));

			expect(received.map((p) => p.level)).toEqual([LogLevel.WARN, LogLevel.DEBUG]);
		});

		it("should only remove the specified handler, leaving others intact", () => {
			const first = vi.fn();
			const second = vi.fn();
			bus.onEvent(IoEvent.REQUEST_READ, first);
			bus.onEvent(IoEvent.REQUEST_READ, second);
			bus.offEvent(IoEvent.REQUEST_READ, first);

			bus.emit(makeErrorEvent());

			expect(first).not.toHaveBeenCalled();
			expect(second).toHaveBeenCalledTimes(1);
		});

		it("should not throw when unregistering a handler that was never registered", () => {
			expect(() => bus.offEvent(IoEvent.DOCUMENT_WRITE, vi.fn())).not.toThrow();
			expect(() => bus.offLevel(LogLevel.DEBUG, vi.fn())).not.toThrow();
			expect(() => bus.offAll(vi.fn())).not.toThrow();
		});
	});

	describe("Feature: Broadcast Channel", () => {
		it("should deliver every payload to onAll handlers", () => {
			const handler = vi.fn();
			bus.onAll(handler);

			bus.emit(makeErrorEvent());
			bus.emit(makeLogEvent(LogLevel.DEBUG));
			bus.emit(makePhaseEvent(PhaseEvent.PHASE_END));

			expect(handler).toHaveBeenCalledTimes(3);
		});

		it("should stop after offAll", () => {
			const handler = vi.fn();
			bus.onAll(handler);
			bus.offAll(handler);

			bus.emit(makeErrorEvent());

			expect(handler).not.toHaveBeenCalled();
		});

		it("should deliver once per channel a handler is registered on", () => {
			const handler = vi.fn();
			bus.onLevel(LogLevel.ERROR, handler);
			bus.onEvent(IoEvent.REQUEST_READ, handler);
			bus.onAll(handler);

			bus.emit(makeErrorEvent());

			expect(handler).toHaveBeenCalledTimes(3);
		});
	});

	describe("Feature: Delivery Guarantees", () => {
		it("should deliver events synchronously", () => {
			let delivered = false;
			bus.onAll(() => {
				delivered = true;
			});

			bus.emit(makeErrorEvent());

			expect(delivered).toBe(true);
		});

		it("should call level, event, then broadcast handlers", () => {
			const order: string[] = [];
			bus.onAll(() => order.push("all"));
			bus.onEvent(IoEvent.REQUEST_READ, () => order.push("event"));
			bus.onLevel(LogLevel.ERROR, () => order.push("level"));

			bus.emit(makeErrorEvent());

			expect(order).toEqual(["level", "event", "all"]);
		});

		it("should call handlers of one channel in registration order", () => {
			const order: number[] = [];
			bus.onAll(() => order.push(1));
			bus.onAll(() => order.push(2));
			bus.onAll(() => order.push(3));

			bus.emit(makeLogEvent(LogLevel.INFO));

			expect(order).toEqual([1, 2, 3]);
		});

		it("should deliver the payload unchanged (same object reference)", () => {
			let received: BusPayload | undefined;
			bus.onAll((payload) => {
				received = payload;
			});

			const event = makePhaseEvent(PhaseEvent.PHASE_END, { stats: { elements: 4 } });
			bus.emit(event);

			expect(received).toBe(event);
		});

		it("should propagate handler errors to the emit caller", () => {
			bus.onAll(() => {
				throw new Error("handler failed");
			});

			expect(() => bus.emit(makeErrorEvent())).toThrow("handler failed");
		});
	});

	describe("Feature: Convenience Emitters", () => {
		let received: BusPayload[];

		beforeEach(() => {
			received = [];
			bus.onAll((payload) => received.push(payload));
		});

		it("should build an ERROR payload with emitError", () => {
			bus.emitError(IoEvent.DOCUMENT_WRITE, PipelinePhase.WRITE, {
				path: "/out.excalidraw",
				message: "EACCES: permission denied",
				code: "EACCES",
				userMessage: ["Permission denied"],
			});

			expect(received[0]).toMatchObject({
				event: IoEvent.DOCUMENT_WRITE,
				level: LogLevel.ERROR,
				phase: PipelinePhase.WRITE,
				path: "/out.excalidraw",
				code: "EACCES",
			});
			expect(typeof received[0]?.timestamp).toBe("number");
		});

		it("should set the level for each log emitter", () => {
			bus.emitWarn(BuildEvent.EDGE_SKIPPED, PipelinePhase.BUILD, "w", { from: "a" });
			bus.emitInfo(BuildEvent.DIAGRAM_BUILD, PipelinePhase.BUILD, "i");
			bus.emitDebug(IoEvent.REQUEST_READ, PipelinePhase.READ, "d");

			expect(received.map((p) => p.level)).toEqual([LogLevel.WARN, LogLevel.INFO, LogLevel.DEBUG]);
			expect(received[0]).toMatchObject({ message: "w", context: { from: "a" } });
		});

		it("should mark phase boundaries", () => {
			bus.emitPhaseStart(PipelinePhase.VALIDATE);
			bus.emitPhaseEnd(PipelinePhase.VALIDATE, { nodes: 3 });

			expect(received[0]).toMatchObject({ event: PhaseEvent.PHASE_START, level: LogLevel.INFO, phase: PipelinePhase.VALIDATE });
			expect(received[1]).toMatchObject({ event: PhaseEvent.PHASE_END, stats: { nodes: 3 } });
		});
	});
});
