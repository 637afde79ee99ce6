/**
 * Log severity level — orthogonal to event types.
 */
export enum LogLevel {
	ERROR = "ERROR",
	WARN = "WARN",
	INFO = "INFO",
	DEBUG = "DEBUG",
}

/**
 * Tier 1 — Generic events not tied to a specific domain.
 */
export enum GenericEvent {
	LOG = "LOG",
}

/**
 * Tier 2 — Pipeline phase boundary markers.
 */
export enum PhaseEvent {
	PHASE_START = "PHASE_START",
	PHASE_END = "PHASE_END",
}

/**
 * Tier 3 — IO module events.
 */
export enum IoEvent {
	REQUEST_READ = "REQUEST_READ",
	DOCUMENT_WRITE = "DOCUMENT_WRITE",
}

/**
 * Tier 3 — Diagram build events.
 */
export enum BuildEvent {
	REQUEST_VALIDATION = "REQUEST_VALIDATION",
	DIAGRAM_BUILD = "DIAGRAM_BUILD",
	EDGE_SKIPPED = "EDGE_SKIPPED",
}

/**
 * Union of all event types across all tiers.
 */
export type PipelineEvent = GenericEvent | PhaseEvent | IoEvent | BuildEvent;
