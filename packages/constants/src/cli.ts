export const CLIErrors = {
	MISSING_SUBCOMMAND:
		"Missing subcommand. Usage: sketchloom <generate|example> [output]",
	CONFLICTING_FLAGS:
		"Conflicting flags: --verbose and --quiet cannot be used together",
	NO_INPUT:
		"No request given. Pass --input <file> or pipe JSON on stdin",
} as const;

export const CLIDescriptions = {
	PROGRAM: "Generate Excalidraw diagrams from node/edge requests",
	GENERATE: "Build a diagram from a JSON request and write it to <output>",
	EXAMPLE: "Write an example Frontend → Backend → Database diagram",
} as const;
