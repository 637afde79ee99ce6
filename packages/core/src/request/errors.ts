export enum RequestErrorCode {
    INVALID_JSON = "INVALID_JSON",
    INVALID_REQUEST = "INVALID_REQUEST",
}

/**
 * Request text that is not JSON, or JSON that does not describe a diagram.
 */
export class RequestValidationError extends Error {
    readonly code: RequestErrorCode;
    readonly issues: string[];

    constructor(code: RequestErrorCode, message: string, issues: string[] = []) {
        super(message);
        this.name = "RequestValidationError";
        this.code = code;
        this.issues = issues;
    }
}
