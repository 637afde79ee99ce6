import { writeFile } from "node:fs/promises";
import { extname } from "node:path";
import { errorCode, errorMessage } from "../errors";
import { DOCUMENT_EXTENSION, DocumentWriteError } from "./types";

/**
 * Target path for a document: the `.excalidraw` extension is added only
 * when the path has none.
 */
export function resolveOutputPath(path: string): string {
	return extname(path) === "" ? `${path}${DOCUMENT_EXTENSION}` : path;
}

/**
 * Writes serialized documents to disk. No directories are created.
 */
export class DocumentWriter {
	/**
	 * @returns the path actually written
	 * @throws DocumentWriteError when the write fails
	 */
	public async write(text: string, path: string): Promise<string> {
		const target = resolveOutputPath(path);
		try {
			await writeFile(target, text, "utf8");
		} catch (error: unknown) {
			throw new DocumentWriteError(errorCode(error), target, errorMessage(error, "Error writing document"));
		}
		return target;
	}
}
