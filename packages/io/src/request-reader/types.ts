/**
 * Raw request text and where it came from.
 */
export interface RequestSource {
	/**
	 * File path, or a label such as `<stdin>` for streamed input.
	 */
	path: string;
	/**
	 * Decoded UTF-8 content.
	 */
	content: string;
}

export interface ReadOptions {
	/**
	 * Requests larger than this are rejected (default 10).
	 */
	maxSizeMb?: number;
}

export const STDIN_LABEL = "<stdin>";
