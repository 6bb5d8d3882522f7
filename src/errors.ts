/**
 * Error taxonomy for the mirror pipeline
 *
 * Only ConfigurationError is fatal. Everything else is isolated to the file,
 * directory or archive it concerns and reported as an event.
 */

interface CauseOptions {
	cause?: unknown
}

/** Network, timeout or non-2xx status during a single download attempt */
export class TransientFetchError extends Error {
	override readonly name = "TransientFetchError"
	readonly status: number | undefined

	constructor(
		message: string,
		options: CauseOptions & { status?: number } = {},
	) {
		super(message, { cause: options.cause })
		this.status = options.status
	}
}

/** A directory listing page could not be loaded or parsed */
export class TraversalError extends Error {
	override readonly name = "TraversalError"

	constructor(
		readonly url: string,
		message: string,
		options: CauseOptions = {},
	) {
		super(message, { cause: options.cause })
	}
}

/** Malformed archive, or an extraction/deletion failure */
export class ArchiveError extends Error {
	override readonly name = "ArchiveError"

	constructor(
		readonly archivePath: string,
		message: string,
		options: CauseOptions = {},
	) {
		super(message, { cause: options.cause })
	}
}

/** Required configuration missing or invalid; aborts before any network I/O */
export class ConfigurationError extends Error {
	override readonly name = "ConfigurationError"
}

export function describeError(err: unknown): string {
	return err instanceof Error ? err.message : String(err)
}
