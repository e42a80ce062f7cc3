/**
 * Malformed input that makes the whole run meaningless: bad time or duration
 * shapes, unreadable files, invalid configuration.
 */
export class FatalInputError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options)
		this.name = 'FatalInputError'
	}
}

export function describeError(e: unknown): string {
	return e instanceof Error ? e.message : String(e)
}
