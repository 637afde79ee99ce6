import {
	LogLevel,
	PhaseEvent,
	type PipelineEvent,
	type PipelinePhase,
} from "@sketchloom/constants";
import type { BusPayload, ErrorPayload, EventHandler } from "./types";

type ErrorFields = Pick<ErrorPayload, "path" | "message" | "code" | "userMessage">;

/**
 * Routes typed payloads from producers to registered subscribers via three
 * independent channels: by log level, by event type, and broadcast.
 */
export class PipelineEventBus {
	private levelHandlers = new Map<LogLevel, EventHandler[]>();
	private eventHandlers = new Map<PipelineEvent, EventHandler[]>();
	private allHandlers: EventHandler[] = [];

	/**
	 * Deliver payload synchronously to all matching handlers across all three channels:
	 * 1. Level channel — handlers registered for the payload's level
	 * 2. Event channel — handlers registered for the payload's event type
	 * 3. Broadcast channel — handlers registered via onAll()
	 */
	emit(payload: BusPayload): void {
		for (const handler of this.levelHandlers.get(payload.level) ?? []) {
			handler(payload);
		}
		for (const handler of this.eventHandlers.get(payload.event) ?? []) {
			handler(payload);
		}
		for (const handler of this.allHandlers) {
			handler(payload);
		}
	}

	// ─── Level-based registration ───

	onLevel(level: LogLevel, handler: EventHandler): void {
		register(this.levelHandlers, level, handler);
	}

	offLevel(level: LogLevel, handler: EventHandler): void {
		unregister(this.levelHandlers.get(level), handler);
	}

	// ─── Event-based registration ───

	onEvent(event: PipelineEvent, handler: EventHandler): void {
		register(this.eventHandlers, event, handler);
	}

	offEvent(event: PipelineEvent, handler: EventHandler): void {
		unregister(this.eventHandlers.get(event), handler);
	}

	// ─── Broadcast registration ───

	onAll(handler: EventHandler): void {
		this.allHandlers.push(handler);
	}

	offAll(handler: EventHandler): void {
		unregister(this.allHandlers, handler);
	}

	// ─── Convenience emit methods ───

	emitError(event: PipelineEvent, phase: PipelinePhase, error: ErrorFields): void {
		this.emit({ ...error, event, level: LogLevel.ERROR, phase, timestamp: Date.now() });
	}

	emitWarn(event: PipelineEvent, phase: PipelinePhase, message: string, context?: Record<string, unknown>): void {
		this.emit({ event, level: LogLevel.WARN, phase, timestamp: Date.now(), message, context });
	}

	emitInfo(event: PipelineEvent, phase: PipelinePhase, message: string, context?: Record<string, unknown>): void {
		this.emit({ event, level: LogLevel.INFO, phase, timestamp: Date.now(), message, context });
	}

	emitDebug(event: PipelineEvent, phase: PipelinePhase, message: string, context?: Record<string, unknown>): void {
		this.emit({ event, level: LogLevel.DEBUG, phase, timestamp: Date.now(), message, context });
	}

	emitPhaseStart(phase: PipelinePhase): void {
		this.emit({ event: PhaseEvent.PHASE_START, level: LogLevel.INFO, phase, timestamp: Date.now() });
	}

	emitPhaseEnd(phase: PipelinePhase, stats?: Record<string, number>): void {
		this.emit({ event: PhaseEvent.PHASE_END, level: LogLevel.INFO, phase, timestamp: Date.now(), stats });
	}
}

function register<K>(map: Map<K, EventHandler[]>, key: K, handler: EventHandler): void {
	let list = map.get(key);
	if (!list) {
		list = [];
		map.set(key, list);
	}
	list.push(handler);
}

function unregister(list: EventHandler[] | undefined, handler: EventHandler): void {
	if (!list) return;
	const index = list.indexOf(handler);
	if (index !== -1) {
		list.splice(index, 1);
	}
}
