/**
 * A user-facing error message: a headline followed by optional detail lines.
 */
export type UserErrorMessage = readonly [headline: string, ...details: string[]];
