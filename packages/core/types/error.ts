import type { ZodError } from "zod"

export interface BaseError {
	type: string
	message: string
	cause?: BaseError
	rawError?: Error
}

export type ValidationError =
	| (BaseError & {
			type: "validation"
			source: "zod"
			field: string
			path?: string
			zodError: ZodError
	  })
	| (BaseError & {
			type: "validation"
			source: "manual"
			field: string
			path?: string
	  })

export type ParseError = BaseError & {
	type: "parse"
	source: string
	path?: string
}

export type IoError = BaseError & {
	type: "io"
	path: string
	operation: string
}

/** The snapshot broke one of the invariants the index relies on. */
export type InvariantError = BaseError & {
	type: "invariant"
	subject: string
}

export type CoreError =
	| ValidationError
	| ParseError
	| IoError
	| InvariantError

export type Result<T, E extends BaseError = CoreError> =
	| { ok: true; value: T }
	| { ok: false; error: E }

/**
 * Thrown by index queries when a caller breaks a precondition, or when the
 * snapshot is missing data a built index should always have.
 */
export class IndexInvariantError extends Error {
	constructor(message: string) {
		super(message)
		this.name = "IndexInvariantError"
	}
}

export function formatZodError(error: ZodError, fallback: string): string {
	const issues = error.issues.map((issue) => {
		const path = issue.path.length > 0 ? issue.path.join(".") : fallback
		return `${path}: ${issue.message}`
	})
	return issues.join("; ")
}
