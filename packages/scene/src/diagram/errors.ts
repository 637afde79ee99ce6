/**
 * Error codes for diagram construction.
 */
export enum DiagramErrorCode {
  INVALID_SHAPE = "INVALID_SHAPE",
  UNKNOWN_ELEMENT = "UNKNOWN_ELEMENT",
  DUPLICATE_ELEMENT = "DUPLICATE_ELEMENT",
}

/**
 * Error thrown when a diagram operation is called with input it cannot draw.
 */
export class DiagramError extends Error {
  constructor(
    public readonly code: DiagramErrorCode,
    message: string,
    public readonly subject: string,
  ) {
    super(message);
    this.name = "DiagramError";
  }
}
