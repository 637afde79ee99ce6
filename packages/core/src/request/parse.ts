import { RequestErrorCode, RequestValidationError } from "./errors";
import { DiagramRequestSchema, formatIssues, type DiagramRequest, type RequestKind } from "./schema";

export interface RequestOverrides {
    /** Replaces the request's own `kind` before validation */
    kind?: RequestKind;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Validate an already-decoded request value.
 *
 * @throws RequestValidationError INVALID_REQUEST
 */
export function validateRequest(value: unknown, overrides: RequestOverrides = {}): DiagramRequest {
    const candidate = overrides.kind !== undefined && isRecord(value) ? { ...value, kind: overrides.kind } : value;
    const result = DiagramRequestSchema.safeParse(candidate);
    if (!result.success) {
        const issues = formatIssues(result.error);
        throw new RequestValidationError(
            RequestErrorCode.INVALID_REQUEST,
            `Invalid request: ${issues.length} issue(s)`,
            issues,
        );
    }
    return result.data;
}

/**
 * Decode request text and validate it.
 *
 * @throws RequestValidationError INVALID_JSON or INVALID_REQUEST
 */
export function parseRequest(text: string, overrides: RequestOverrides = {}): DiagramRequest {
    let value: unknown;
    try {
        value = JSON.parse(text);
    } catch (error: unknown) {
        const message = error instanceof Error ? error.message : "Malformed JSON";
        throw new RequestValidationError(RequestErrorCode.INVALID_JSON, message);
    }
    return validateRequest(value, overrides);
}
