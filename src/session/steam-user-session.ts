/**
 * SteamSession on top of steam-user and steam-session
 *
 * steam-user owns the CM connection, logon and PICS requests; steam-session
 * runs the authentication handshakes that produce a refresh token. Both are
 * event emitters; everything they report is translated into SessionEvents
 * for the orchestrator's pump.
 */

import SteamUser from "steam-user"
import {
	EAuthSessionGuardType,
	EAuthTokenPlatformType,
	LoginSession,
} from "steam-session"
import { z } from "zod"
import { AuthenticationError, errorMessage } from "../errors.js"
import { keyValuesFromObject, type KeyValueNode } from "../keyvalues.js"
import { log } from "../logger.js"
import { CompletionSignal } from "./signal.js"
import {
	EResult,
	type AuthPollResult,
	type AuthSession,
	type CredentialsAuthDetails,
	type LogOnDetails,
	type QrAuthSession,
	type SessionEvent,
	type SteamSession,
} from "./types.js"

/** How long a QR challenge is shown before a fresh one replaces it */
const QR_CHALLENGE_LIFETIME_MS = 120_000

const ProductInfoResponseSchema = z.object({
	apps: z.record(z.string(), z.object({ appinfo: z.unknown() }).passthrough()),
})

/** Turn a getProductInfo() response into app id → KeyValues tree */
export function parseProductInfoResponse(raw: unknown): Map<number, KeyValueNode> {
	const apps = new Map<number, KeyValueNode>()
	const parsed = ProductInfoResponseSchema.safeParse(raw)
	if (!parsed.success) {
		log.session.warn({ error: parsed.error.message }, "unexpected product info shape")
		return apps
	}
	for (const [id, entry] of Object.entries(parsed.data.apps)) {
		const appId = Number(id)
		if (!Number.isInteger(appId) || entry.appinfo === undefined) continue
		apps.set(appId, keyValuesFromObject("appinfo", entry.appinfo))
	}
	return apps
}

function resultOf(err: unknown): number {
	if (typeof err === "object" && err !== null && "eresult" in err) {
		const value = err.eresult
		if (typeof value === "number") return value
	}
	return EResult.Fail
}

// ─────────────────────────────────────────────────────────────────────────────
// Auth sessions
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Wraps one steam-session LoginSession. Listeners are attached before the
 * login is started so no outcome can be missed.
 */
class LoginSessionHandle {
	readonly done = new CompletionSignal<AuthPollResult>()
	private newGuardData: string | undefined

	constructor(readonly login: LoginSession) {
		login.on("authenticated", () => {
			this.done.resolve({
				accountName: login.accountName,
				refreshToken: login.refreshToken,
				newGuardData: this.newGuardData,
			})
		})
		login.on("steamGuardMachineToken", () => {
			this.newGuardData = login.steamGuardMachineToken
		})
		login.on("error", (err: Error) => {
			this.done.reject(
				new AuthenticationError(`Authentication failed: ${err.message}`, resultOf(err), {
					cause: err,
				}),
			)
		})
	}

	cancel(): void {
		if (this.done.isSettled) return
		this.login.cancelLoginAttempt()
		this.done.reject(new AuthenticationError("Authentication cancelled"))
	}
}

class QrLoginSession implements QrAuthSession {
	onChallengeUrlChanged: ((url: string) => void) | undefined
	private readonly result = new CompletionSignal<AuthPollResult>()
	private handle: LoginSessionHandle | undefined
	private url = ""
	private cancelled = false

	get challengeUrl(): string {
		return this.url
	}

	async start(): Promise<void> {
		await this.begin()
	}

	pollingWaitForResult(): Promise<AuthPollResult> {
		return this.result.promise
	}

	cancel(): void {
		this.cancelled = true
		this.handle?.cancel()
		this.result.reject(new AuthenticationError("Authentication cancelled"))
	}

	private async begin(): Promise<void> {
		const login = new LoginSession(EAuthTokenPlatformType.SteamClient)
		login.loginTimeout = QR_CHALLENGE_LIFETIME_MS
		const handle = new LoginSessionHandle(login)
		this.handle = handle

		// An expired challenge is replaced, not reported as a failure
		handle.login.on("timeout", () => {
			if (this.cancelled || this.handle !== handle) return
			log.auth.debug("QR challenge expired, requesting a new one")
			this.rotate().catch(err => {
				this.result.reject(err)
			})
		})
		void handle.done.promise.then(
			value => this.result.resolve(value),
			err => {
				if (this.handle === handle) this.result.reject(err)
			},
		)

		const started = await handle.login.startWithQR()
		this.url = started.qrChallengeUrl
	}

	private async rotate(): Promise<void> {
		await this.begin()
		this.onChallengeUrlChanged?.(this.url)
	}
}

class CredentialsLoginSession implements AuthSession {
	private readonly handle = new LoginSessionHandle(
		new LoginSession(EAuthTokenPlatformType.SteamClient),
	)

	async start(details: CredentialsAuthDetails): Promise<void> {
		const login = this.handle.login
		login.on("timeout", () => {
			this.handle.done.reject(new AuthenticationError("Authentication timed out"))
		})

		const started = await login.startWithCredentials({
			accountName: details.username,
			password: details.password,
			steamGuardMachineToken: details.guardData,
		})
		if (!started.actionRequired) return

		const actions = started.validActions ?? []
		const offered = (type: EAuthSessionGuardType) =>
			actions.find(action => action.type === type)

		if (offered(EAuthSessionGuardType.DeviceConfirmation)) {
			if (await details.authenticator.acceptDeviceConfirmation()) return
		}

		const deviceCode = offered(EAuthSessionGuardType.DeviceCode)
		if (deviceCode) {
			await this.submitCodes(wasIncorrect =>
				details.authenticator.getDeviceCode(wasIncorrect),
			)
			return
		}

		const emailCode = offered(EAuthSessionGuardType.EmailCode)
		if (emailCode) {
			const email = emailCode.detail ?? "your email address"
			await this.submitCodes(wasIncorrect =>
				details.authenticator.getEmailCode(email, wasIncorrect),
			)
			return
		}

		if (offered(EAuthSessionGuardType.EmailConfirmation)) {
			log.auth.info("waiting for email confirmation")
			return
		}

		throw new AuthenticationError(
			`Unsupported Steam Guard challenge: ${actions.map(a => a.type).join(", ")}`,
		)
	}

	pollingWaitForResult(): Promise<AuthPollResult> {
		return this.handle.done.promise
	}

	cancel(): void {
		this.handle.cancel()
	}

	private async submitCodes(
		ask: (previousCodeWasIncorrect: boolean) => Promise<string>,
	): Promise<void> {
		let wasIncorrect = false
		for (;;) {
			const code = (await ask(wasIncorrect)).trim()
			try {
				await this.handle.login.submitSteamGuardCode(code)
				return
			} catch (err) {
				const result = resultOf(err)
				if (
					result !== EResult.InvalidLoginAuthCode &&
					result !== EResult.TwoFactorCodeMismatch
				) {
					throw err
				}
				log.auth.debug({ result }, "Steam Guard code rejected")
				wasIncorrect = true
			}
		}
	}
}

// ─────────────────────────────────────────────────────────────────────────────
// Session
// ─────────────────────────────────────────────────────────────────────────────

export class SteamUserSession implements SteamSession {
	private readonly client = new SteamUser({ autoRelogin: false })
	private listener: ((event: SessionEvent) => void) | undefined
	private loggedOn = false
	private loggingOff = false
	private closed = false

	constructor() {
		this.client.on("loggedOn", () => {
			this.loggedOn = true
			this.emit({
				type: "loggedOn",
				result: EResult.OK,
				extendedResult: EResult.OK,
				steamId: this.client.steamID?.getSteamID64(),
			})
		})
		this.client.on("error", (err: Error) => {
			const result = resultOf(err)
			log.session.debug({ result, error: err.message }, "steam-user error")
			if (!this.loggedOn) {
				this.emit({ type: "loggedOn", result, extendedResult: result })
			} else {
				this.emitDisconnected(false)
			}
		})
		this.client.on("disconnected", (result: number, msg?: string) => {
			log.session.debug({ result, msg }, "steam-user disconnected")
			// logOff() has already reported its own disconnect
			if (!this.loggingOff) this.emitDisconnected(false)
		})
	}

	subscribe(listener: (event: SessionEvent) => void): () => void {
		this.listener = listener
		return () => {
			if (this.listener === listener) this.listener = undefined
		}
	}

	/** steam-user opens the connection inside logOn(); report ready right away */
	connect(): void {
		setImmediate(() => this.emit({ type: "connected" }))
	}

	disconnect(): void {
		if (this.closed) return
		this.closed = true
		if (this.loggedOn && !this.loggingOff) this.client.logOff()
	}

	logOn(details: LogOnDetails): void {
		this.client.logOn({ refreshToken: details.refreshToken })
	}

	logOff(): void {
		if (this.loggingOff) return
		this.loggingOff = true
		this.client.logOff()
		this.emit({ type: "loggedOff", result: EResult.OK })
		this.emitDisconnected(true)
	}

	requestProductInfo(appIds: number[]): void {
		const requested = [...appIds]
		this.client
			.getProductInfo(requested, [], false)
			.then(response => {
				this.emit({
					type: "productInfo",
					requested,
					apps: parseProductInfoResponse(response),
				})
			})
			.catch(err => {
				log.session.warn({ appIds: requested, error: errorMessage(err) }, "product info request failed")
				this.emit({ type: "productInfo", requested, apps: new Map() })
			})
	}

	async beginAuthSessionViaQR(): Promise<QrAuthSession> {
		const session = new QrLoginSession()
		await session.start()
		return session
	}

	async beginAuthSessionViaCredentials(
		details: CredentialsAuthDetails,
	): Promise<AuthSession> {
		const session = new CredentialsLoginSession()
		await session.start(details)
		return session
	}

	private emitDisconnected(userInitiated: boolean): void {
		if (this.closed && !userInitiated) return
		this.emit({ type: "disconnected", userInitiated })
		this.loggedOn = false
	}

	private emit(event: SessionEvent): void {
		this.listener?.(event)
	}
}
