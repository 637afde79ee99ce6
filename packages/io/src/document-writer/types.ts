import { ioErrorMessage, type UserErrorMessage } from "@sketchloom/constants";

export const DOCUMENT_EXTENSION = ".excalidraw";

/**
 * A document could not be written. `code` is the system error code
 * (ENOENT, EACCES, EISDIR, …).
 */
export class DocumentWriteError extends Error {
	readonly code: string;
	readonly path: string;
	readonly userMessage: UserErrorMessage;

	constructor(code: string, path: string, message: string) {
		super(message);
		this.name = "DocumentWriteError";
		this.code = code;
		this.path = path;
		this.userMessage = ioErrorMessage(code);
	}
}
