/**
 * Session orchestrator lifecycle tests against an in-process session
 */

import { describe, it, expect } from "vitest"
import { AuthenticationError, SessionStateError } from "../src/errors.js"
import type { AuthCredential, AuthFlow } from "../src/session/auth.js"
import {
	SessionOrchestrator,
	canTransition,
	type SessionContext,
} from "../src/session/orchestrator.js"
import { EResult } from "../src/session/types.js"
import { FakeSteamSession, stubAuthFlow } from "./helpers/fake-session.js"

const FAST = { pumpIntervalMs: 10, logoffGraceMs: 200 }

function waitForAbort(signal: AbortSignal): Promise<void> {
	return new Promise(resolve => {
		if (signal.aborted) return resolve()
		signal.addEventListener("abort", () => resolve(), { once: true })
	})
}

/** Auth flow that only ends when the run is torn down */
const hangingAuthFlow: AuthFlow = {
	kind: "device-linked",
	produceCredential(_session, signal): Promise<AuthCredential> {
		return waitForAbort(signal).then(() => {
			throw new Error("Authentication cancelled")
		})
	},
}

describe("canTransition", () => {
	it("allows only the lifecycle edges", () => {
		expect(canTransition("disconnected", "connecting")).toBe(true)
		expect(canTransition("authenticating", "logged-on")).toBe(true)
		expect(canTransition("logged-on", "failed")).toBe(true)
		expect(canTransition("disconnected", "logged-on")).toBe(false)
		expect(canTransition("logging-off", "failed")).toBe(false)
		expect(canTransition("failed", "connecting")).toBe(false)
	})
})

describe("SessionOrchestrator", () => {
	it("logs on, runs the work, then logs off", async () => {
		const session = new FakeSteamSession({ steamId: "76561190000000042" })
		const flow = stubAuthFlow()
		const orchestrator = new SessionOrchestrator(session, flow, FAST)
		let context: SessionContext | undefined

		const result = await orchestrator.run(async ctx => {
			context = ctx
			session.calls.push("work")
			expect(orchestrator.state).toBe("logged-on")
			return 42
		})

		expect(result).toBe(42)
		expect(flow.calls).toBe(1)
		expect(orchestrator.loggedOnSteamId).toBe("76561190000000042")
		expect(session.logOnDetails).toEqual([
			{ accountName: "tester", refreshToken: "test-refresh-token" },
		])
		expect(session.calls).toEqual(["connect", "logOn", "work", "logOff", "disconnect"])
		expect(orchestrator.states).toEqual([
			"disconnected",
			"connecting",
			"connected",
			"authenticating",
			"logged-on",
			"logging-off",
			"disconnected",
		])
		expect(context?.pump.subscriberCount).toBe(0)
		expect(context?.signal.aborted).toBe(true)
		expect(session.hasListener).toBe(false)
	})

	it("fails without running the work when logon is rejected", async () => {
		const session = new FakeSteamSession({
			logOnResult: EResult.InvalidPassword,
			extendedResult: EResult.OK,
		})
		const orchestrator = new SessionOrchestrator(session, stubAuthFlow(), FAST)
		let workRan = false

		const error = await orchestrator
			.run(async () => {
				workRan = true
			})
			.catch((err: unknown) => err)

		expect(error).toBeInstanceOf(AuthenticationError)
		expect(error).toMatchObject({
			message: "Failed to log on to Steam: InvalidPassword (5)",
			result: EResult.InvalidPassword,
		})
		expect(workRan).toBe(false)
		expect(session.productInfoRequests).toEqual([])
		expect(session.calls).toEqual(["connect", "logOn", "disconnect"])
		expect(orchestrator.states.slice(-3)).toEqual(["authenticating", "failed", "disconnected"])
		expect(session.hasListener).toBe(false)
	})

	it("includes a distinct extended result in the failure", async () => {
		const session = new FakeSteamSession({
			logOnResult: EResult.AccountLogonDenied,
			extendedResult: EResult.Expired,
		})
		const orchestrator = new SessionOrchestrator(session, stubAuthFlow(), FAST)

		await expect(orchestrator.run(async () => undefined)).rejects.toThrow(
			"Failed to log on to Steam: AccountLogonDenied (63) (extended result: Expired (27))",
		)
	})

	it("wraps an auth flow error", async () => {
		const session = new FakeSteamSession()
		const flow: AuthFlow = {
			kind: "credentials",
			produceCredential: async () => {
				throw new Error("no network")
			},
		}
		const orchestrator = new SessionOrchestrator(session, flow, FAST)

		await expect(orchestrator.run(async () => undefined)).rejects.toThrow(
			"Authentication error: no network",
		)
		expect(session.calls).toEqual(["connect", "disconnect"])
	})

	it("fails when the connection drops before logon", async () => {
		const session = new FakeSteamSession()
		const orchestrator = new SessionOrchestrator(session, hangingAuthFlow, FAST)

		const running = orchestrator.run(async () => undefined)
		setTimeout(() => session.dropConnection(), 20)

		await expect(running).rejects.toThrow("Disconnected from Steam while authenticating")
		expect(orchestrator.states.slice(-2)).toEqual(["failed", "disconnected"])
	})

	it("aborts the work context when the connection drops after logon", async () => {
		const session = new FakeSteamSession()
		const orchestrator = new SessionOrchestrator(session, stubAuthFlow(), FAST)

		const result = await orchestrator.run(async ctx => {
			session.dropConnection()
			await waitForAbort(ctx.signal)
			return "stopped"
		})

		expect(result).toBe("stopped")
		expect(session.calls).not.toContain("logOff")
		expect(orchestrator.states.slice(-3)).toEqual(["logged-on", "failed", "disconnected"])
	})

	it("finishes logoff after the grace period when Steam never confirms", async () => {
		const session = new FakeSteamSession({ confirmLogOff: false })
		const orchestrator = new SessionOrchestrator(session, stubAuthFlow(), {
			pumpIntervalMs: 10,
			logoffGraceMs: 30,
		})

		await orchestrator.run(async () => undefined)

		expect(orchestrator.state).toBe("disconnected")
		expect(orchestrator.states.slice(-2)).toEqual(["logging-off", "disconnected"])
	})

	it("logs off even when the work throws", async () => {
		const session = new FakeSteamSession()
		const orchestrator = new SessionOrchestrator(session, stubAuthFlow(), FAST)

		await expect(
			orchestrator.run(async () => {
				throw new Error("work failed")
			}),
		).rejects.toThrow("work failed")
		expect(session.calls).toEqual(["connect", "logOn", "logOff", "disconnect"])
	})

	it("can only run once", async () => {
		const session = new FakeSteamSession()
		const orchestrator = new SessionOrchestrator(session, stubAuthFlow(), FAST)
		await orchestrator.run(async () => undefined)

		await expect(orchestrator.run(async () => undefined)).rejects.toBeInstanceOf(
			SessionStateError,
		)
	})
})
