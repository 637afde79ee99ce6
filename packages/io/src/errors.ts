/**
 * System error code of a thrown value, or `fallback` when it carries none.
 */
export function errorCode(error: unknown, fallback = "UNKNOWN"): string {
	if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
		return error.code;
	}
	return fallback;
}

export function errorMessage(error: unknown, fallback: string): string {
	return error instanceof Error ? error.message : fallback;
}
