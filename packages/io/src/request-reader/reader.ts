import { readFile, stat } from "node:fs/promises";
import { IoEvent, PipelinePhase, ioErrorMessage } from "@sketchloom/constants";
import type { PipelineEventBus } from "@sketchloom/event-bus";
import { errorCode, errorMessage } from "../errors";
import { STDIN_LABEL, type ReadOptions, type RequestSource } from "./types";

const DEFAULT_MAX_SIZE_MB = 10;

/**
 * Reads request text from a file or a stream. Failures are reported on the
 * bus and yield `null`; nothing is thrown to the caller.
 */
export class RequestReader {
	public async readFile(path: string, options: ReadOptions = {}, bus?: PipelineEventBus): Promise<RequestSource | null> {
		const maxSizeMb = options.maxSizeMb ?? DEFAULT_MAX_SIZE_MB;
		bus?.emitDebug(IoEvent.REQUEST_READ, PipelinePhase.READ, "Reading request", { path, maxSizeMb });

		try {
			const info = await stat(path);
			if (info.isDirectory()) {
				this.fail(bus, path, "EISDIR", "Request path is a directory");
				return null;
			}
			const sizeMb = info.size / (1024 * 1024);
			if (sizeMb > maxSizeMb) {
				this.fail(bus, path, "TOO_LARGE", `Request is ${sizeMb.toFixed(2)} MB, limit is ${maxSizeMb} MB`);
				return null;
			}

			return this.decode(await readFile(path), path, bus);
		} catch (error: unknown) {
			this.fail(bus, path, errorCode(error, "EACCES"), errorMessage(error, "Error reading request"));
			return null;
		}
	}

	/**
	 * Drain a stream (typically stdin) and decode it as one request.
	 */
	public async readStream(
		stream: AsyncIterable<Uint8Array | string>,
		label: string = STDIN_LABEL,
		bus?: PipelineEventBus,
	): Promise<RequestSource | null> {
		bus?.emitDebug(IoEvent.REQUEST_READ, PipelinePhase.READ, "Reading request stream", { path: label });

		const chunks: Buffer[] = [];
		try {
			for await (const chunk of stream) {
				chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf8") : Buffer.from(chunk));
			}
		} catch (error: unknown) {
			this.fail(bus, label, errorCode(error), errorMessage(error, "Error reading stream"));
			return null;
		}

		return this.decode(Buffer.concat(chunks), label, bus);
	}

	private decode(bytes: Uint8Array, path: string, bus?: PipelineEventBus): RequestSource | null {
		let content: string;
		try {
			content = new TextDecoder("utf-8", { fatal: true }).decode(bytes);
		} catch {
			this.fail(bus, path, "INVALID_ENCODING", "Invalid UTF-8 encoding");
			return null;
		}

		bus?.emitInfo(IoEvent.REQUEST_READ, PipelinePhase.READ, "Request read", { path, bytes: bytes.byteLength });
		return { path, content };
	}

	private fail(bus: PipelineEventBus | undefined, path: string, code: string, message: string): void {
		bus?.emitError(IoEvent.REQUEST_READ, PipelinePhase.READ, {
			path,
			message,
			code,
			userMessage: ioErrorMessage(code),
		});
	}
}
