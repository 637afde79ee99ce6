import type { Logger, AppLogObj } from "@sketchloom/logger";
import { LogLevel, PhaseEvent, PipelinePhaseLabels } from "@sketchloom/constants";
import type { BusPayload } from "@sketchloom/event-bus";

/**
 * Subscribes to all payloads via bus.onAll() and routes them to the
 * appropriate Logger method based on payload level.
 *
 * Routing:
 *   ERROR, WARN  → logger.warn()
 *   INFO         → logger.info()
 *   DEBUG        → logger.debug()
 *   PhasePayload → logger.info() (with phase start/end formatting)
 *
 * Errors are logged at warn here; the CLI reports them once more as a
 * summary at error level when the run fails.
 */
export class LogSubscriber {
	private readonly logger: Logger<AppLogObj>;

	constructor(logger: Logger<AppLogObj>) {
		this.logger = logger;
	}

	handle(event: BusPayload): void {
		if (!("message" in event)) {
			const label = PipelinePhaseLabels[event.phase];
			const verb = event.event === PhaseEvent.PHASE_START ? "started" : "ended";
			this.logger.info(`${label} phase ${verb}`, { phase: event.phase, ...event.stats });
			return;
		}

		switch (event.level) {
			case LogLevel.ERROR:
				this.logger.warn(event.message, { phase: event.phase, path: event.path, code: event.code });
				break;
			case LogLevel.WARN:
				this.logger.warn(event.message, { phase: event.phase, ...event.context });
				break;
			case LogLevel.INFO:
				this.logger.info(event.message, { phase: event.phase, ...event.context });
				break;
			case LogLevel.DEBUG:
				this.logger.debug(event.message, { phase: event.phase, ...event.context });
				break;
		}
	}
}
