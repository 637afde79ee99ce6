import type { UserErrorMessage } from "./types";

export const IoErrors = {
	PATH_NOT_FOUND: ["File or parent directory does not exist"],
	PERMISSION_DENIED: ["Permission denied"],
	IS_DIRECTORY: ["Path is a directory"],
	INVALID_ENCODING: ["Invalid UTF-8 encoding"],
	TOO_LARGE: ["Request exceeds the size limit"],
	UNEXPECTED_ERROR: ["Unexpected I/O error"],
} as const satisfies Record<string, UserErrorMessage>;

/**
 * Map a Node.js system error code to its user-facing message.
 */
export function ioErrorMessage(code: string): UserErrorMessage {
	switch (code) {
		case "ENOENT":
			return IoErrors.PATH_NOT_FOUND;
		case "EACCES":
		case "EPERM":
			return IoErrors.PERMISSION_DENIED;
		case "EISDIR":
			return IoErrors.IS_DIRECTORY;
		case "INVALID_ENCODING":
			return IoErrors.INVALID_ENCODING;
		case "TOO_LARGE":
			return IoErrors.TOO_LARGE;
		default:
			return IoErrors.UNEXPECTED_ERROR;
	}
}
