/**
 * Steam session port
 *
 * The orchestrator, auth flows and icon pipeline only talk to Steam through
 * these interfaces. SteamUserSession implements them on steam-user and
 * steam-session; tests use an in-process fake.
 */

import type { KeyValueNode } from "../keyvalues.js"

/** The EResult codes this tool inspects */
export const EResult = {
	Invalid: 0,
	OK: 1,
	Fail: 2,
	NoConnection: 3,
	InvalidPassword: 5,
	InvalidLoginAuthCode: 65,
	AccountLogonDenied: 63,
	Expired: 27,
	TwoFactorCodeMismatch: 88,
} as const

export function describeResult(code: number): string {
	const name = Object.entries(EResult).find(([, value]) => value === code)?.[0]
	return name ? `${name} (${code})` : `EResult ${code}`
}

// ─────────────────────────────────────────────────────────────────────────────
// Events
// ─────────────────────────────────────────────────────────────────────────────

export interface ConnectedEvent {
	type: "connected"
}

export interface DisconnectedEvent {
	type: "disconnected"
	/** True when disconnect()/logOff() was called locally */
	userInitiated: boolean
}

export interface LoggedOnEvent {
	type: "loggedOn"
	result: number
	extendedResult: number
	steamId?: string | undefined
}

export interface LoggedOffEvent {
	type: "loggedOff"
	result: number
}

/** Response to requestProductInfo(); apps Steam did not return are absent */
export interface ProductInfoEvent {
	type: "productInfo"
	/** App ids of the request this answers */
	requested: number[]
	apps: Map<number, KeyValueNode>
}

export type SessionEvent =
	| ConnectedEvent
	| DisconnectedEvent
	| LoggedOnEvent
	| LoggedOffEvent
	| ProductInfoEvent

export type SessionEventType = SessionEvent["type"]

// ─────────────────────────────────────────────────────────────────────────────
// Authentication
// ─────────────────────────────────────────────────────────────────────────────

export interface AuthPollResult {
	accountName: string
	refreshToken: string
	/** Steam Guard machine token issued for this device, if any */
	newGuardData?: string | undefined
}

export interface AuthSession {
	/** Resolves once Steam accepts the login; rejects on failure */
	pollingWaitForResult(): Promise<AuthPollResult>
	cancel(): void
}

export interface QrAuthSession extends AuthSession {
	readonly challengeUrl: string
	/** Called after Steam replaces the challenge URL */
	onChallengeUrlChanged: ((url: string) => void) | undefined
}

/** Answers Steam Guard challenges during a credentials login */
export interface SteamGuardAuthenticator {
	getDeviceCode(previousCodeWasIncorrect: boolean): Promise<string>
	getEmailCode(email: string, previousCodeWasIncorrect: boolean): Promise<string>
	/** True to wait for approval in the mobile app instead of entering a code */
	acceptDeviceConfirmation(): Promise<boolean>
}

export interface CredentialsAuthDetails {
	username: string
	password: string
	guardData?: string | undefined
	authenticator: SteamGuardAuthenticator
}

export interface LogOnDetails {
	accountName: string
	refreshToken: string
}

// ─────────────────────────────────────────────────────────────────────────────
// Session
// ─────────────────────────────────────────────────────────────────────────────

export interface SteamSession {
	connect(): void
	disconnect(): void
	/** Register the single consumer of session events; returns its disposer */
	subscribe(listener: (event: SessionEvent) => void): () => void
	logOn(details: LogOnDetails): void
	logOff(): void
	/** Answered by a productInfo event */
	requestProductInfo(appIds: number[]): void
	beginAuthSessionViaQR(): Promise<QrAuthSession>
	beginAuthSessionViaCredentials(
		details: CredentialsAuthDetails,
	): Promise<AuthSession>
}
