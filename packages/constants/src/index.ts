export type { UserErrorMessage } from "./types";
export { IoErrors, ioErrorMessage } from "./io";
export { PipelinePhase, PipelinePhaseLabels, PipelineErrors } from "./pipeline";
export { CLIErrors, CLIDescriptions } from "./cli";
export {
	LogLevel,
	GenericEvent,
	PhaseEvent,
	IoEvent,
	BuildEvent,
	type PipelineEvent,
} from "./events";
