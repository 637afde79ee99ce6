import type {
	LogLevel,
	PhaseEvent,
	PipelineEvent,
	PipelinePhase,
	UserErrorMessage,
} from "@sketchloom/constants";

/**
 * Fields shared by every payload on the pipeline event bus.
 * Every payload carries two orthogonal dimensions: event (what happened) and level (severity).
 */
interface BasePayload {
	event: PipelineEvent;
	phase: PipelinePhase;
	timestamp: number;
}

/**
 * Payload for ERROR-level events — a pipeline error with a user-facing message.
 */
export interface ErrorPayload extends BasePayload {
	level: LogLevel.ERROR;
	path: string;
	message: string;
	code: string;
	userMessage: UserErrorMessage;
}

/**
 * Payload for WARN, INFO, and DEBUG-level events — a log message with optional context.
 */
export interface LogPayload extends BasePayload {
	level: LogLevel.WARN | LogLevel.INFO | LogLevel.DEBUG;
	message: string;
	context?: Record<string, unknown>;
}

/**
 * Payload for phase boundary events — marks PHASE_START and PHASE_END.
 */
export interface PhasePayload extends BasePayload {
	event: PhaseEvent;
	level: LogLevel.INFO;
	stats?: Record<string, number>;
}

export type BusPayload = ErrorPayload | LogPayload | PhasePayload;

/**
 * Callback type for event subscribers.
 */
export type EventHandler = (payload: BusPayload) => void;
