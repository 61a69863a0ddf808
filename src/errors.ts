/**
 * Error types for conditions that end a run
 *
 * Per-item failures (a manifest that won't parse, an icon that won't
 * download) are reported as outcome values instead and never thrown.
 */

/** Invalid install path, missing/malformed library folders file, missing credentials */
export class ConfigurationError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options)
		this.name = "ConfigurationError"
	}
}

/** Login rejected by Steam, auth session failure, or disconnect before logon */
export class AuthenticationError extends Error {
	readonly result: number | undefined

	constructor(message: string, result?: number, options?: { cause?: unknown }) {
		super(message, options)
		this.name = "AuthenticationError"
		this.result = result
	}
}

/**
 * Thrown when the session orchestrator is asked to make a state change
 * its transition table does not allow.
 */
export class SessionStateError extends Error {
	readonly from: string
	readonly to: string

	constructor(message: string, from: string, to: string) {
		super(message)
		this.name = "SessionStateError"
		this.from = from
		this.to = to
	}
}

/** Short message for user output */
export function errorMessage(err: unknown): string {
	return err instanceof Error ? err.message : String(err)
}
