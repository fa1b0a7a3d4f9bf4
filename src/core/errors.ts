// CHANGE: Introduce typed domain error ADT for Functional Core using Effect.Data
// WHY: Access-layer failures travel as typed values; the engine itself has no error channel
// REF: Architecture plan (FCIS, typed errors), Effect Data API
// SOURCE: https://effect.website/docs/data-types/data
// PURITY: CORE
// INVARIANT: Errors are values (no throw), discriminated by `_tag`
// COMPLEXITY: O(1)

import { Data } from "effect";

/**
 * Source path could not be stat'ed, listed or read.
 *
 * @pure true (Data class)
 * @invariant detail.length > 0
 */
export class FSError extends Data.TaggedError("FS")<{
	readonly detail: string;
	readonly path: string;
}> {}

/**
 * Report destination could not be created or written.
 *
 * @pure true (Data class)
 * @invariant detail.length > 0
 */
export class ReportWriteError extends Data.TaggedError("ReportWrite")<{
	readonly detail: string;
	readonly path: string;
}> {}

/**
 * Explicitly requested config file is unreadable or malformed.
 *
 * @pure true (Data class)
 */
export class ConfigError extends Data.TaggedError("Config")<{
	readonly detail: string;
	readonly path: string;
}> {}

/**
 * Union type of all application errors for Effect signatures
 *
 * @pure true
 * @invariant All errors extend Data.TaggedError
 */
export type AppError = FSError | ReportWriteError | ConfigError;

/**
 * Extract a message from a caught value.
 *
 * @pure true
 * @complexity O(1)
 */
export function describeError(error: unknown): string {
	if (error instanceof Error) return error.message;
	return String(error);
}
