/**
 * Authentication flows
 *
 * Each flow turns user interaction into a refresh token the orchestrator
 * can log on with. Which flow runs is decided once, before connecting.
 */

import { ConfigurationError } from "../errors.js"
import { log } from "../logger.js"
import type {
	AuthPollResult,
	AuthSession,
	SteamGuardAuthenticator,
	SteamSession,
} from "./types.js"

export type AuthCredential =
	| { kind: "device-linked"; accountName: string; refreshToken: string }
	| {
			kind: "credentials"
			accountName: string
			refreshToken: string
			guardData?: string | undefined
	  }

export interface AuthFlow {
	readonly kind: AuthCredential["kind"]
	/**
	 * Run the flow to completion. Aborting the signal cancels the pending
	 * auth session and rejects.
	 */
	produceCredential(
		session: SteamSession,
		signal: AbortSignal,
	): Promise<AuthCredential>
}

/** Shows a QR challenge to the user */
export interface ChallengeRenderer {
	render(url: string, refreshed: boolean): Promise<void>
}

/**
 * Cancel the auth session once the run is aborted, at once if it already
 * is. Returns the detach function.
 */
function cancelOnAbort(authSession: AuthSession, signal: AbortSignal): () => void {
	const onAbort = () => authSession.cancel()
	if (signal.aborted) {
		onAbort()
		return () => undefined
	}
	signal.addEventListener("abort", onAbort, { once: true })
	return () => signal.removeEventListener("abort", onAbort)
}

/** Wait for an auth session's result, or reject when the run is aborted */
async function pollUntilDone(
	authSession: AuthSession,
	signal: AbortSignal,
): Promise<AuthPollResult> {
	if (signal.aborted) throw new Error("Authentication cancelled")

	let onAbort: (() => void) | undefined
	const aborted = new Promise<never>((_, reject) => {
		onAbort = () => reject(new Error("Authentication cancelled"))
		signal.addEventListener("abort", onAbort, { once: true })
	})
	const polling = authSession.pollingWaitForResult()

	// Whichever promise loses the race may still settle later
	void aborted.catch(() => undefined)
	void polling.catch(() => undefined)

	try {
		return await Promise.race([polling, aborted])
	} finally {
		if (onAbort) signal.removeEventListener("abort", onAbort)
	}
}

// ─────────────────────────────────────────────────────────────────────────────
// Device-linked (QR code)
// ─────────────────────────────────────────────────────────────────────────────

export class DeviceLinkedAuthFlow implements AuthFlow {
	readonly kind = "device-linked" as const

	constructor(private readonly renderer: ChallengeRenderer) {}

	async produceCredential(
		session: SteamSession,
		signal: AbortSignal,
	): Promise<AuthCredential> {
		log.auth.info("starting QR code authentication")
		const qrSession = await session.beginAuthSessionViaQR()
		const detach = cancelOnAbort(qrSession, signal)

		qrSession.onChallengeUrlChanged = url => {
			log.auth.debug("challenge URL refreshed")
			this.renderer.render(url, true).catch(err => {
				log.auth.warn(
					{ error: err instanceof Error ? err.message : String(err) },
					"failed to render refreshed challenge",
				)
			})
		}

		try {
			await this.renderer.render(qrSession.challengeUrl, false)
			const result = await pollUntilDone(qrSession, signal)
			log.auth.info({ accountName: result.accountName }, "QR login approved")
			return {
				kind: "device-linked",
				accountName: result.accountName,
				refreshToken: result.refreshToken,
			}
		} finally {
			detach()
			qrSession.onChallengeUrlChanged = undefined
		}
	}
}

// ─────────────────────────────────────────────────────────────────────────────
// Username + password with Steam Guard
// ─────────────────────────────────────────────────────────────────────────────

export class CredentialsAuthFlow implements AuthFlow {
	readonly kind = "credentials" as const
	private readonly username: string
	private readonly password: string
	/** Machine token from an earlier login in this run; never written to disk */
	private guardData: string | undefined

	constructor(
		username: string | undefined,
		password: string | undefined,
		private readonly authenticator: SteamGuardAuthenticator,
	) {
		if (!username?.trim() || !password) {
			throw new ConfigurationError(
				"Username and password are required when not using QR code authentication",
			)
		}
		this.username = username.trim()
		this.password = password
	}

	get heldGuardData(): string | undefined {
		return this.guardData
	}

	async produceCredential(
		session: SteamSession,
		signal: AbortSignal,
	): Promise<AuthCredential> {
		log.auth.info({ username: this.username }, "logging in with credentials")
		const authSession = await session.beginAuthSessionViaCredentials({
			username: this.username,
			password: this.password,
			guardData: this.guardData,
			authenticator: this.authenticator,
		})

		const detach = cancelOnAbort(authSession, signal)
		let result: AuthPollResult
		try {
			result = await pollUntilDone(authSession, signal)
		} finally {
			detach()
		}
		if (result.newGuardData) {
			this.guardData = result.newGuardData
		}

		return {
			kind: "credentials",
			accountName: result.accountName,
			refreshToken: result.refreshToken,
			guardData: this.guardData,
		}
	}
}

export type AuthFlowOptions =
	| { method: "qr"; renderer: ChallengeRenderer }
	| {
			method: "credentials"
			username: string | undefined
			password: string | undefined
			authenticator: SteamGuardAuthenticator
	  }

export function createAuthFlow(options: AuthFlowOptions): AuthFlow {
	switch (options.method) {
		case "qr":
			return new DeviceLinkedAuthFlow(options.renderer)
		case "credentials":
			return new CredentialsAuthFlow(
				options.username,
				options.password,
				options.authenticator,
			)
	}
}
