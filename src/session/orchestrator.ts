/**
 * Session orchestrator
 *
 * Owns the Steam session for one run:
 *   disconnected → connecting → connected → authenticating → logged-on
 *     → logging-off → disconnected
 *
 * with a branch to failed from any pre-logoff state (login rejected, auth
 * error, unsolicited disconnect). Work passed to run() only executes once
 * logged-on has been reached, and every pump subscription made here is
 * disposed before run() returns.
 */

import { AuthenticationError, SessionStateError, errorMessage } from "../errors.js"
import { log } from "../logger.js"
import type { AuthFlow } from "./auth.js"
import { EventPump, type Subscription } from "./pump.js"
import { CompletionSignal } from "./signal.js"
import {
	EResult,
	describeResult,
	type DisconnectedEvent,
	type LoggedOffEvent,
	type LoggedOnEvent,
	type SteamSession,
} from "./types.js"

export type SessionState =
	| "disconnected"
	| "connecting"
	| "connected"
	| "authenticating"
	| "logged-on"
	| "logging-off"
	| "failed"

/** Valid transitions per state */
export const SESSION_TRANSITIONS: Record<SessionState, SessionState[]> = {
	disconnected: ["connecting"],
	connecting: ["connected", "failed"],
	connected: ["authenticating", "failed"],
	authenticating: ["logged-on", "failed"],
	"logged-on": ["logging-off", "failed"],
	"logging-off": ["disconnected"],
	failed: ["disconnected"],
}

export function canTransition(from: SessionState, to: SessionState): boolean {
	return SESSION_TRANSITIONS[from].includes(to)
}

export interface OrchestratorOptions {
	/** Longest single wait of the event pump */
	pumpIntervalMs: number
	/** How long to wait for Steam to confirm logoff */
	logoffGraceMs: number
}

/** What work running inside a logged-on session gets to use */
export interface SessionContext {
	session: SteamSession
	pump: EventPump
	/** Aborted when the session drops */
	signal: AbortSignal
}

export const DEFAULT_ORCHESTRATOR_OPTIONS: OrchestratorOptions = {
	pumpIntervalMs: 1000,
	logoffGraceMs: 2000,
}

export class SessionOrchestrator {
	private current: SessionState = "disconnected"
	private readonly pump = new EventPump()
	private readonly controller = new AbortController()
	private readonly loginSignal = new CompletionSignal<boolean>()
	private readonly disconnectSignal = new CompletionSignal<void>()
	private readonly subscriptions: Subscription[] = []
	private readonly history: SessionState[] = ["disconnected"]
	private failure: AuthenticationError | undefined
	private steamId: string | undefined
	private started = false

	constructor(
		private readonly session: SteamSession,
		private readonly authFlow: AuthFlow,
		private readonly options: OrchestratorOptions = DEFAULT_ORCHESTRATOR_OPTIONS,
	) {}

	get state(): SessionState {
		return this.current
	}

	/** Every state entered so far, in order */
	get states(): readonly SessionState[] {
		return this.history
	}

	get loggedOnSteamId(): string | undefined {
		return this.steamId
	}

	/**
	 * Connect, authenticate, run the work while logged on, then log off.
	 * Throws AuthenticationError when logon is never reached.
	 */
	async run<T>(work: (context: SessionContext) => Promise<T>): Promise<T> {
		if (this.started) {
			throw new SessionStateError(
				"Session orchestrator can only run once",
				this.current,
				"connecting",
			)
		}
		this.started = true

		this.subscriptions.push(
			this.pump.subscribe("connected", () => this.onConnected()),
			this.pump.subscribe("disconnected", event => this.onDisconnected(event)),
			this.pump.subscribe("loggedOn", event => this.onLoggedOn(event)),
			this.pump.subscribe("loggedOff", event => this.onLoggedOff(event)),
		)
		const unsubscribeSession = this.session.subscribe(event => this.pump.post(event))

		const pumpTask = this.pump.run(
			this.controller.signal,
			this.options.pumpIntervalMs,
		)

		try {
			log.session.info("connecting to Steam")
			this.transition("connecting")
			this.session.connect()

			const loggedOn = await this.loginSignal.promise
			if (!loggedOn) {
				throw this.failure ?? new AuthenticationError("Login failed")
			}

			try {
				return await work({
					session: this.session,
					pump: this.pump,
					signal: this.controller.signal,
				})
			} finally {
				await this.logOff()
			}
		} finally {
			this.controller.abort()
			await pumpTask
			for (const subscription of this.subscriptions) subscription.dispose()
			this.subscriptions.length = 0
			unsubscribeSession()
			if (this.current === "failed") this.transition("disconnected")
			this.session.disconnect()
		}
	}

	private async logOff(): Promise<void> {
		if (this.current !== "logged-on") return

		log.session.info("logging off from Steam")
		this.transition("logging-off")
		this.session.logOff()

		const waited = await this.disconnectSignal.wait(this.options.logoffGraceMs)
		if (waited.status !== "resolved") {
			log.session.debug(
				{ graceMs: this.options.logoffGraceMs },
				"no disconnect confirmation within grace period",
			)
			this.transition("disconnected")
		}
	}

	private transition(to: SessionState): void {
		if (!canTransition(this.current, to)) {
			throw new SessionStateError(
				`Invalid session transition: ${this.current} → ${to}`,
				this.current,
				to,
			)
		}
		log.session.debug({ from: this.current, to }, "state change")
		this.current = to
		this.history.push(to)
	}

	/**
	 * End the run unsuccessfully. Safe to call from any handler, any number
	 * of times.
	 */
	private fail(error: AuthenticationError): void {
		if (canTransition(this.current, "failed")) {
			this.transition("failed")
		}
		this.failure ??= error
		this.loginSignal.resolve(false)
		this.controller.abort()
	}

	// ─────────────────────────────────────────────────────────────────────────
	// Event handlers (called from the pump; must not block)
	// ─────────────────────────────────────────────────────────────────────────

	private onConnected(): void {
		if (this.current !== "connecting") return
		log.session.info("connected to Steam")
		this.transition("connected")
		this.transition("authenticating")

		// Auth interaction runs on its own task so the pump keeps turning
		this.authenticate().catch(err => {
			if (this.controller.signal.aborted) {
				log.auth.debug({ error: errorMessage(err) }, "authentication stopped")
				return
			}
			log.auth.error({ error: errorMessage(err) }, "authentication error")
			this.fail(
				err instanceof AuthenticationError
					? err
					: new AuthenticationError(`Authentication error: ${errorMessage(err)}`, undefined, {
							cause: err,
						}),
			)
		})
	}

	private async authenticate(): Promise<void> {
		const credential = await this.authFlow.produceCredential(
			this.session,
			this.controller.signal,
		)
		if (this.current !== "authenticating") return

		log.session.debug({ accountName: credential.accountName }, "logging on")
		this.session.logOn({
			accountName: credential.accountName,
			refreshToken: credential.refreshToken,
		})
	}

	private onLoggedOn(event: LoggedOnEvent): void {
		if (this.current !== "authenticating") return

		if (event.result !== EResult.OK) {
			const extended =
				event.extendedResult !== EResult.OK
					? ` (extended result: ${describeResult(event.extendedResult)})`
					: ""
			log.session.error(
				{ result: event.result, extendedResult: event.extendedResult },
				"logon rejected",
			)
			this.fail(
				new AuthenticationError(
					`Failed to log on to Steam: ${describeResult(event.result)}${extended}`,
					event.result,
				),
			)
			return
		}

		this.steamId = event.steamId
		log.session.info({ steamId: event.steamId }, "logged on to Steam")
		this.transition("logged-on")
		this.loginSignal.resolve(true)
	}

	private onDisconnected(event: DisconnectedEvent): void {
		if (this.current === "logging-off") {
			log.session.info("disconnected from Steam")
			this.transition("disconnected")
			this.disconnectSignal.resolve()
			return
		}

		if (this.current === "failed" || this.current === "disconnected") return

		log.session.warn(
			{ state: this.current, userInitiated: event.userInitiated },
			"unexpected disconnection from Steam",
		)
		this.fail(
			new AuthenticationError(
				`Disconnected from Steam while ${this.current}`,
				EResult.NoConnection,
			),
		)
	}

	private onLoggedOff(event: LoggedOffEvent): void {
		log.session.info({ result: describeResult(event.result) }, "logged off from Steam")
	}
}
